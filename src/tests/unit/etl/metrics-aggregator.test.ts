import { describe, it, expect } from 'vitest';
import { aggregateEncounterMetrics } from '../../../etl/metrics-aggregator';
import { DataConversionError } from '../../../errors';
import {
  createBilling,
  createEncounter,
  createEncounterDiagnosis,
  createEncounterProcedure,
  createProvider,
  createSnapshot,
} from '../../utils/mock-factories';

describe('aggregateEncounterMetrics', () => {
  it('should count details and sum billing without fan-out', () => {
    const snapshot = createSnapshot({
      providers: [createProvider({ providerId: 1, specialtyId: 4 })],
      encounters: [createEncounter({ encounterId: 1 })],
      encounterDiagnoses: [
        createEncounterDiagnosis({ encounterDiagnosisId: 1, diagnosisId: 1 }),
        createEncounterDiagnosis({ encounterDiagnosisId: 2, diagnosisId: 2 }),
        createEncounterDiagnosis({ encounterDiagnosisId: 3, diagnosisId: 2 }),
      ],
      encounterProcedures: [
        createEncounterProcedure({ encounterProcedureId: 1, procedureId: 1 }),
        createEncounterProcedure({ encounterProcedureId: 2, procedureId: 2 }),
        createEncounterProcedure({ encounterProcedureId: 3, procedureId: 3 }),
      ],
      billing: [
        createBilling({ billingId: 1, claimAmount: '100.00', allowedAmount: '80.00' }),
        createBilling({ billingId: 2, claimAmount: '50.50', allowedAmount: null }),
      ],
    });

    const { metrics, excluded } = aggregateEncounterMetrics(snapshot);

    expect(metrics).toHaveLength(1);
    expect(metrics[0]).toMatchObject({
      encounterId: 1,
      specialtyId: 4,
      diagnosisCount: 2,
      procedureCount: 3,
      totalClaimCents: 15050,
      totalAllowedCents: 8000,
    });
    expect(excluded).toEqual({});
  });

  it('should keep sums absent for encounters without billing', () => {
    const snapshot = createSnapshot({
      providers: [createProvider()],
      encounters: [createEncounter({ encounterId: 9 })],
    });

    const { metrics } = aggregateEncounterMetrics(snapshot);

    expect(metrics[0].totalClaimCents).toBeNull();
    expect(metrics[0].totalAllowedCents).toBeNull();
    expect(metrics[0].diagnosisCount).toBe(0);
  });

  it('should exclude undated encounters and encounters with unknown providers', () => {
    const snapshot = createSnapshot({
      providers: [createProvider({ providerId: 1 })],
      encounters: [
        createEncounter({ encounterId: 1 }),
        createEncounter({ encounterId: 2, encounterDate: null }),
        createEncounter({ encounterId: 3, providerId: 99 }),
        createEncounter({ encounterId: 4, providerId: null }),
      ],
    });

    const { metrics, excluded } = aggregateEncounterMetrics(snapshot);

    expect(metrics.map(m => m.encounterId)).toEqual([1]);
    expect(excluded).toEqual({ encounter_missing_date: 1, encounter_unknown_provider: 2 });
  });

  it('should fail on amounts that are not decimals', () => {
    const snapshot = createSnapshot({
      providers: [createProvider()],
      encounters: [createEncounter()],
      billing: [createBilling({ claimAmount: 'n/a' })],
    });

    expect(() => aggregateEncounterMetrics(snapshot)).toThrow(DataConversionError);
  });
});
