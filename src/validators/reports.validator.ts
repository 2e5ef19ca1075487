import { z } from 'zod';

export const monthlyEncountersQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(2200).optional(),
});

export const diagnosisProcedurePairsQuerySchema = z.object({
  minEncounters: z.coerce.number().int().positive().default(2),
  limit: z.coerce.number().int().positive().max(100).default(20),
});

export const readmissionRatesQuerySchema = z.object({
  minEncounters: z.coerce.number().int().positive().default(10),
});

export const revenueQuerySchema = z.object({
  year: z.coerce.number().int().min(1900).max(2200),
});

export type MonthlyEncountersQuery = z.infer<typeof monthlyEncountersQuerySchema>;
export type DiagnosisProcedurePairsQuery = z.infer<typeof diagnosisProcedurePairsQuerySchema>;
export type ReadmissionRatesQuery = z.infer<typeof readmissionRatesQuerySchema>;
export type RevenueQuery = z.infer<typeof revenueQuerySchema>;
