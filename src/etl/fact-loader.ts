import type { FactEncounter } from '../drizzle/types';
import type { DimensionName } from '../types';
import type { EncounterMetrics, ExclusionCounts } from './interfaces';
import type { LoadedDimensions } from './dimensions';
import { normalizeEncounterType } from './dimensions';
import { SurrogateKeyMap } from './surrogate-keys';
import { lengthOfStayDays, toDateKey } from './calendar';
import { centsToDecimal } from './money';

export interface UnresolvedEncounter {
  encounterId: number;
  dimensions: DimensionName[];
}

export interface FactLoadResult {
  facts: FactEncounter[];
  keys: SurrogateKeyMap<number>;
  unresolved: UnresolvedEncounter[];
  excluded: ExclusionCounts;
}

type ResolvedKeys = Pick<
  FactEncounter,
  'dateKey' | 'patientKey' | 'providerKey' | 'specialtyKey' | 'departmentKey' | 'encounterTypeKey'
>;

function resolveKeys(
  row: EncounterMetrics,
  dimensions: LoadedDimensions,
  dateKeys: Set<number>
): ResolvedKeys | DimensionName[] {
  const dateKey = toDateKey(row.encounterDate);
  const patientKey = dimensions.patient.keys.resolve(row.patientId);
  const providerKey = dimensions.provider.keys.resolve(row.providerId);
  const specialtyKey = dimensions.specialty.keys.resolve(row.specialtyId);
  const departmentKey = dimensions.department.keys.resolve(row.departmentId);
  const encounterTypeKey = dimensions.encounterType.keys.resolve(
    row.encounterType === null ? null : normalizeEncounterType(row.encounterType)
  );

  const missing: DimensionName[] = [];
  if (!dateKeys.has(dateKey)) missing.push('date');
  if (patientKey === undefined) missing.push('patient');
  if (providerKey === undefined) missing.push('provider');
  if (specialtyKey === undefined) missing.push('specialty');
  if (departmentKey === undefined) missing.push('department');
  if (encounterTypeKey === undefined) missing.push('encounter_type');

  if (
    patientKey === undefined ||
    providerKey === undefined ||
    specialtyKey === undefined ||
    departmentKey === undefined ||
    encounterTypeKey === undefined ||
    missing.length > 0
  ) {
    return missing;
  }

  return { dateKey, patientKey, providerKey, specialtyKey, departmentKey, encounterTypeKey };
}

/**
 * Projects aggregates onto dimension keys. A row is kept only when every
 * dimension key resolves; the rest are reported as unresolved and dropped.
 * Fact keys are assigned here, in ascending encounter id order.
 */
export function loadFacts(metrics: EncounterMetrics[], dimensions: LoadedDimensions): FactLoadResult {
  const dateKeys = new Set(dimensions.date.rows.map(d => d.dateKey));
  const unresolved: UnresolvedEncounter[] = [];
  const resolved: Array<{ row: EncounterMetrics; keys: ResolvedKeys }> = [];

  for (const row of metrics) {
    const keys = resolveKeys(row, dimensions, dateKeys);
    if (Array.isArray(keys)) {
      unresolved.push({ encounterId: row.encounterId, dimensions: keys });
    } else {
      resolved.push({ row, keys });
    }
  }

  const encounterKeys = SurrogateKeyMap.fromUnique(
    'fact_encounters',
    resolved.map(({ row }) => row.encounterId)
  );

  const facts = resolved
    .map(({ row, keys }) => ({
      encounterKey: encounterKeys.require(row.encounterId),
      encounterId: row.encounterId,
      ...keys,
      isReadmission: false,
      totalClaimAmount: centsToDecimal(row.totalClaimCents ?? 0),
      totalAllowedAmount: centsToDecimal(row.totalAllowedCents ?? 0),
      lengthOfStayDays: lengthOfStayDays(row.encounterDate, row.dischargeDate),
      diagnosisCount: row.diagnosisCount,
      procedureCount: row.procedureCount,
    }))
    .sort((a, b) => a.encounterKey - b.encounterKey);

  return {
    facts,
    keys: encounterKeys,
    unresolved,
    excluded: unresolved.length > 0 ? { fact_unresolved_dimension: unresolved.length } : {},
  };
}
