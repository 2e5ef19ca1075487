import type {
  BridgeEncounterDiagnosis,
  BridgeEncounterProcedure,
  SourceEncounterDiagnosis,
  SourceEncounterProcedure,
} from '../drizzle/types';
import type { ExclusionCounts } from './interfaces';
import type { SurrogateKeyMap } from './surrogate-keys';
import { DataIntegrityError } from '../errors';

export interface BridgeLoadResult<Row> {
  rows: Row[];
  excluded: ExclusionCounts;
}

function assertUniquePair(seen: Set<string>, table: string, encounterKey: number, dimensionKey: number) {
  const pair = `${encounterKey}:${dimensionKey}`;
  if (seen.has(pair)) {
    throw new DataIntegrityError(`Duplicate ${table} key (${encounterKey}, ${dimensionKey})`, {
      table,
      encounterKey,
      dimensionKey,
    });
  }
  seen.add(pair);
}

function byCompositeKey<Row>(first: (row: Row) => number, second: (row: Row) => number) {
  return (a: Row, b: Row) => first(a) - first(b) || second(a) - second(b);
}

/** Links whose encounter has no fact row, or whose diagnosis has no dimension row, are skipped. */
export function loadDiagnosisBridge(
  links: SourceEncounterDiagnosis[],
  encounterKeys: SurrogateKeyMap<number>,
  diagnosisKeys: SurrogateKeyMap<number>
): BridgeLoadResult<BridgeEncounterDiagnosis> {
  const seen = new Set<string>();
  const rows: BridgeEncounterDiagnosis[] = [];
  let skipped = 0;

  for (const link of links) {
    const encounterKey = encounterKeys.resolve(link.encounterId);
    const diagnosisKey = diagnosisKeys.resolve(link.diagnosisId);
    if (encounterKey === undefined || diagnosisKey === undefined) {
      skipped++;
      continue;
    }
    assertUniquePair(seen, 'bridge_encounter_diagnoses', encounterKey, diagnosisKey);
    rows.push({ encounterKey, diagnosisKey, diagnosisSequence: link.diagnosisSequence });
  }

  rows.sort(byCompositeKey(r => r.encounterKey, r => r.diagnosisKey));

  return { rows, excluded: skipped > 0 ? { bridge_diagnosis_unmatched: skipped } : {} };
}

export function loadProcedureBridge(
  links: SourceEncounterProcedure[],
  encounterKeys: SurrogateKeyMap<number>,
  procedureKeys: SurrogateKeyMap<number>
): BridgeLoadResult<BridgeEncounterProcedure> {
  const seen = new Set<string>();
  const rows: BridgeEncounterProcedure[] = [];
  let skipped = 0;

  for (const link of links) {
    const encounterKey = encounterKeys.resolve(link.encounterId);
    const procedureKey = procedureKeys.resolve(link.procedureId);
    if (encounterKey === undefined || procedureKey === undefined) {
      skipped++;
      continue;
    }
    assertUniquePair(seen, 'bridge_encounter_procedures', encounterKey, procedureKey);
    rows.push({ encounterKey, procedureKey, procedureDate: link.procedureDate });
  }

  rows.sort(byCompositeKey(r => r.encounterKey, r => r.procedureKey));

  return { rows, excluded: skipped > 0 ? { bridge_procedure_unmatched: skipped } : {} };
}
