import { describe, it, expect, beforeEach, vi } from 'vitest';
import request from 'supertest';
import app from '../../app';

const reportingService = vi.hoisted(() => ({
  monthlyEncounters: vi.fn(),
  diagnosisProcedurePairs: vi.fn(),
  readmissionRates: vi.fn(),
  revenue: vi.fn(),
}));

vi.mock('../../services/reporting.service', () => ({
  ReportingService: vi.fn(function () {
    return reportingService;
  }),
}));
vi.mock('../../services/etl-runs.service', () => ({
  EtlRunsService: vi.fn(function () {
    return {};
  }),
}));

describe('Reports API', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should return monthly encounter volume', async () => {
    const rows = [
      {
        year: 2024,
        month: 1,
        monthName: 'January',
        specialtyName: 'Cardiology',
        encounterTypeName: 'OUTPATIENT',
        totalEncounters: 12,
        uniquePatients: 9,
      },
    ];
    reportingService.monthlyEncounters.mockResolvedValue(rows);

    const response = await request(app).get('/api/reports/monthly-encounters?year=2024').expect(200);

    expect(response.body).toEqual({ data: rows, count: 1 });
    expect(reportingService.monthlyEncounters).toHaveBeenCalledWith({ year: 2024 });
  });

  it('should apply default thresholds to diagnosis and procedure pairs', async () => {
    reportingService.diagnosisProcedurePairs.mockResolvedValue([]);

    const response = await request(app).get('/api/reports/diagnosis-procedure-pairs').expect(200);

    expect(response.body).toEqual({ data: [], count: 0 });
    expect(reportingService.diagnosisProcedurePairs).toHaveBeenCalledWith({ minEncounters: 2, limit: 20 });
  });

  it('should pass the readmission threshold', async () => {
    reportingService.readmissionRates.mockResolvedValue([]);

    await request(app).get('/api/reports/readmission-rates?minEncounters=5').expect(200);

    expect(reportingService.readmissionRates).toHaveBeenCalledWith({ minEncounters: 5 });
  });

  it('should require a year for revenue', async () => {
    await request(app).get('/api/reports/revenue').expect(400);

    expect(reportingService.revenue).not.toHaveBeenCalled();
  });

  it('should return revenue for a year', async () => {
    reportingService.revenue.mockResolvedValue([]);

    await request(app).get('/api/reports/revenue?year=2024').expect(200);

    expect(reportingService.revenue).toHaveBeenCalledWith({ year: 2024 });
  });
});
