import type { EncounterMetrics, ExclusionCounts, SourceSnapshot } from './interfaces';
import { parseOptionalSourceDate, parseSourceDate } from './calendar';
import { addNullable, toCents } from './money';

interface EncounterDetail {
  diagnosisIds: Set<number>;
  procedureIds: Set<number>;
  totalClaimCents: number | null;
  totalAllowedCents: number | null;
}

export interface AggregationResult {
  metrics: EncounterMetrics[];
  excluded: ExclusionCounts;
}

function emptyDetail(): EncounterDetail {
  return {
    diagnosisIds: new Set(),
    procedureIds: new Set(),
    totalClaimCents: null,
    totalAllowedCents: null,
  };
}

/**
 * Builds one aggregate per dated encounter with a known provider. Each detail
 * table is folded into its own per-encounter accumulator, so diagnoses,
 * procedures and billing lines never multiply each other.
 */
export function aggregateEncounterMetrics(snapshot: SourceSnapshot): AggregationResult {
  const details = new Map<number, EncounterDetail>();
  const detailFor = (encounterId: number): EncounterDetail => {
    let detail = details.get(encounterId);
    if (!detail) {
      detail = emptyDetail();
      details.set(encounterId, detail);
    }
    return detail;
  };

  for (const link of snapshot.encounterDiagnoses) {
    detailFor(link.encounterId).diagnosisIds.add(link.diagnosisId);
  }

  for (const link of snapshot.encounterProcedures) {
    detailFor(link.encounterId).procedureIds.add(link.procedureId);
  }

  for (const line of snapshot.billing) {
    const detail = detailFor(line.encounterId);
    detail.totalClaimCents = addNullable(
      detail.totalClaimCents,
      toCents(line.claimAmount, 'billing', 'claim_amount')
    );
    detail.totalAllowedCents = addNullable(
      detail.totalAllowedCents,
      toCents(line.allowedAmount, 'billing', 'allowed_amount')
    );
  }

  const specialtyByProvider = new Map(snapshot.providers.map(p => [p.providerId, p.specialtyId]));

  const metrics: EncounterMetrics[] = [];
  let missingDate = 0;
  let unknownProvider = 0;

  for (const encounter of snapshot.encounters) {
    if (encounter.encounterDate === null) {
      missingDate++;
      continue;
    }

    const { providerId } = encounter;
    if (providerId === null || !specialtyByProvider.has(providerId)) {
      unknownProvider++;
      continue;
    }

    const detail = details.get(encounter.encounterId) ?? emptyDetail();

    metrics.push({
      encounterId: encounter.encounterId,
      patientId: encounter.patientId,
      providerId,
      departmentId: encounter.departmentId,
      specialtyId: specialtyByProvider.get(providerId) ?? null,
      encounterType: encounter.encounterType,
      encounterDate: parseSourceDate(encounter.encounterDate, 'encounters', 'encounter_date'),
      dischargeDate: parseOptionalSourceDate(encounter.dischargeDate, 'encounters', 'discharge_date'),
      diagnosisCount: detail.diagnosisIds.size,
      procedureCount: detail.procedureIds.size,
      totalClaimCents: detail.totalClaimCents,
      totalAllowedCents: detail.totalAllowedCents,
    });
  }

  const excluded: ExclusionCounts = {};
  if (missingDate > 0) {
    excluded.encounter_missing_date = missingDate;
  }
  if (unknownProvider > 0) {
    excluded.encounter_unknown_provider = unknownProvider;
  }

  return { metrics, excluded };
}
