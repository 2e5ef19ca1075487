import { Request, Response, NextFunction } from 'express';
import { EtlRunsService } from '../services/etl-runs.service';
import {
  listRunsQuerySchema,
  runIdParamSchema,
  triggerRunSchema,
} from '../validators/runs.validator';

export class RunsController {
  private service: EtlRunsService;

  constructor() {
    this.service = new EtlRunsService();
  }

  listRuns = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listRunsQuerySchema.parse(req.query);
      const result = await this.service.listRuns(query);
      res.json(result);
    } catch (error) {
      next(error);
    }
  };

  getRun = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = runIdParamSchema.parse(req.params);
      const run = await this.service.getRun(id);
      res.json({ data: run });
    } catch (error) {
      next(error);
    }
  };

  triggerRun = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = triggerRunSchema.parse(req.body ?? {});
      const request = await this.service.requestRun(input);
      res.status(202).json({ data: request });
    } catch (error) {
      next(error);
    }
  };
}
