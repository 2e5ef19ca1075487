import { z } from 'zod';

export const runStatusSchema = z.enum(['RUNNING', 'SUCCESS', 'FAILED']);

export const runIdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listRunsQuerySchema = z.object({
  status: runStatusSchema.optional(),
  limit: z.coerce.number().int().positive().max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const triggerRunSchema = z.object({
  requestedBy: z.string().min(1).max(100).default('api'),
  asOfDate: z.string().date().optional(),
});

export const starSchemaEtlJobSchema = triggerRunSchema.extend({
  requestedAt: z.string().datetime(),
});

export type ListRunsQuery = z.infer<typeof listRunsQuerySchema>;
export type TriggerRunInput = z.infer<typeof triggerRunSchema>;
export type StarSchemaEtlJobData = z.infer<typeof starSchemaEtlJobSchema>;
