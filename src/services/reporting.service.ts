import { ReportingRepository } from '../repositories/reporting.repository';
import type {
  MonthlyEncounterRow,
  DiagnosisProcedurePairRow,
  ReadmissionRateRow,
  RevenueRow,
} from '../repositories/reporting.repository';
import type {
  MonthlyEncountersQuery,
  DiagnosisProcedurePairsQuery,
  ReadmissionRatesQuery,
  RevenueQuery,
} from '../validators/reports.validator';

export class ReportingService {
  private repository: ReportingRepository;

  constructor() {
    this.repository = new ReportingRepository();
  }

  async monthlyEncounters(query: MonthlyEncountersQuery): Promise<MonthlyEncounterRow[]> {
    return this.repository.monthlyEncountersBySpecialty(query.year);
  }

  async diagnosisProcedurePairs(query: DiagnosisProcedurePairsQuery): Promise<DiagnosisProcedurePairRow[]> {
    return this.repository.topDiagnosisProcedurePairs(query.minEncounters, query.limit);
  }

  async readmissionRates(query: ReadmissionRatesQuery): Promise<ReadmissionRateRow[]> {
    return this.repository.readmissionRatesBySpecialty(query.minEncounters);
  }

  async revenue(query: RevenueQuery): Promise<RevenueRow[]> {
    return this.repository.revenueBySpecialtyAndMonth(query.year);
  }
}
