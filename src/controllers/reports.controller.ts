import { Request, Response, NextFunction } from 'express';
import { ReportingService } from '../services/reporting.service';
import {
  monthlyEncountersQuerySchema,
  diagnosisProcedurePairsQuerySchema,
  readmissionRatesQuerySchema,
  revenueQuerySchema,
} from '../validators/reports.validator';

export class ReportsController {
  private service: ReportingService;

  constructor() {
    this.service = new ReportingService();
  }

  monthlyEncounters = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = monthlyEncountersQuerySchema.parse(req.query);
      const rows = await this.service.monthlyEncounters(query);
      res.json({ data: rows, count: rows.length });
    } catch (error) {
      next(error);
    }
  };

  diagnosisProcedurePairs = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = diagnosisProcedurePairsQuerySchema.parse(req.query);
      const rows = await this.service.diagnosisProcedurePairs(query);
      res.json({ data: rows, count: rows.length });
    } catch (error) {
      next(error);
    }
  };

  readmissionRates = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = readmissionRatesQuerySchema.parse(req.query);
      const rows = await this.service.readmissionRates(query);
      res.json({ data: rows, count: rows.length });
    } catch (error) {
      next(error);
    }
  };

  revenue = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = revenueQuerySchema.parse(req.query);
      const rows = await this.service.revenue(query);
      res.json({ data: rows, count: rows.length });
    } catch (error) {
      next(error);
    }
  };
}
