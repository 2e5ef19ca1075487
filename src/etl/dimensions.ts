import type {
  DimDate,
  DimDepartment,
  DimDiagnosis,
  DimEncounterType,
  DimPatient,
  DimProcedure,
  DimProvider,
  DimSpecialty,
} from '../drizzle/types';
import type { DimensionName } from '../types';
import type { ExclusionCounts, SourceSnapshot } from './interfaces';
import { SurrogateKeyMap } from './surrogate-keys';
import { ageInYears, buildDateRow, parseSourceDate, toDateKey } from './calendar';
import {
  ADULT_MIN_AGE,
  AGE_GROUPS,
  SENIOR_MIN_AGE,
  UNKNOWN_CREDENTIAL,
} from '../config/etl';
import { DimensionLoadError } from '../errors';
import { logger } from '../utils/logger';

export interface DimensionLoadResult<Row> {
  dimension: DimensionName;
  rows: Row[];
  excluded: ExclusionCounts;
}

export interface KeyedDimensionLoadResult<Row, K extends number | string> extends DimensionLoadResult<Row> {
  keys: SurrogateKeyMap<K>;
}

export interface LoadedDimensions {
  specialty: KeyedDimensionLoadResult<DimSpecialty, number>;
  department: KeyedDimensionLoadResult<DimDepartment, number>;
  provider: KeyedDimensionLoadResult<DimProvider, number>;
  patient: KeyedDimensionLoadResult<DimPatient, number>;
  diagnosis: KeyedDimensionLoadResult<DimDiagnosis, number>;
  procedure: KeyedDimensionLoadResult<DimProcedure, number>;
  encounterType: KeyedDimensionLoadResult<DimEncounterType, string>;
  date: DimensionLoadResult<DimDate>;
}

export interface DimensionLoadOptions {
  /** Reference date for patient ages. */
  asOf: Date;
}

export function normalizeEncounterType(value: string): string {
  return value.trim().toUpperCase();
}

export function buildFullName(firstName: string | null, lastName: string | null): string {
  return [firstName, lastName]
    .filter((part): part is string => part !== null)
    .join(' ')
    .trim();
}

export function ageGroupFor(age: number): string {
  if (age < ADULT_MIN_AGE) {
    return AGE_GROUPS.MINOR;
  }
  if (age < SENIOR_MIN_AGE) {
    return AGE_GROUPS.ADULT;
  }
  return AGE_GROUPS.SENIOR;
}

function byKey<Row>(key: (row: Row) => number) {
  return (a: Row, b: Row) => key(a) - key(b);
}

export function loadSpecialtyDimension(snapshot: SourceSnapshot): KeyedDimensionLoadResult<DimSpecialty, number> {
  const keys = SurrogateKeyMap.fromUnique('specialty', snapshot.specialties.map(s => s.specialtyId));

  const rows = snapshot.specialties
    .map(s => ({
      specialtyKey: keys.require(s.specialtyId),
      specialtyId: s.specialtyId,
      specialtyName: s.specialtyName,
      specialtyCode: s.specialtyCode,
    }))
    .sort(byKey(r => r.specialtyKey));

  return { dimension: 'specialty', rows, keys, excluded: {} };
}

export function loadDepartmentDimension(snapshot: SourceSnapshot): KeyedDimensionLoadResult<DimDepartment, number> {
  const keys = SurrogateKeyMap.fromUnique('department', snapshot.departments.map(d => d.departmentId));

  const rows = snapshot.departments
    .map(d => ({
      departmentKey: keys.require(d.departmentId),
      departmentId: d.departmentId,
      departmentName: d.departmentName,
      floor: d.floor,
      capacity: d.capacity,
    }))
    .sort(byKey(r => r.departmentKey));

  return { dimension: 'department', rows, keys, excluded: {} };
}

export function loadProviderDimension(snapshot: SourceSnapshot): KeyedDimensionLoadResult<DimProvider, number> {
  const keys = SurrogateKeyMap.fromUnique('provider', snapshot.providers.map(p => p.providerId));

  const rows = snapshot.providers
    .map(p => ({
      providerKey: keys.require(p.providerId),
      providerId: p.providerId,
      fullName: buildFullName(p.firstName, p.lastName),
      credential: (p.credential ?? UNKNOWN_CREDENTIAL).toUpperCase(),
    }))
    .sort(byKey(r => r.providerKey));

  return { dimension: 'provider', rows, keys, excluded: {} };
}

export function loadPatientDimension(
  snapshot: SourceSnapshot,
  options: DimensionLoadOptions
): KeyedDimensionLoadResult<DimPatient, number> {
  const eligible = snapshot.patients.filter(
    (p): p is typeof p & { dateOfBirth: string } => p.dateOfBirth !== null
  );
  const missingBirthDate = snapshot.patients.length - eligible.length;

  const keys = SurrogateKeyMap.fromUnique('patient', eligible.map(p => p.patientId));

  const rows = eligible
    .map(p => {
      const currentAge = ageInYears(parseSourceDate(p.dateOfBirth, 'patients', 'date_of_birth'), options.asOf);
      return {
        patientKey: keys.require(p.patientId),
        patientId: p.patientId,
        firstName: p.firstName,
        lastName: p.lastName,
        gender: p.gender === null ? null : p.gender.toUpperCase(),
        dateOfBirth: p.dateOfBirth,
        mrn: p.mrn,
        currentAge,
        ageGroup: ageGroupFor(currentAge),
      };
    })
    .sort(byKey(r => r.patientKey));

  if (missingBirthDate > 0) {
    logger.warn('Patients without date of birth excluded from dim_patient', { count: missingBirthDate });
  }

  return {
    dimension: 'patient',
    rows,
    keys,
    excluded: missingBirthDate > 0 ? { patient_missing_birth_date: missingBirthDate } : {},
  };
}

export function loadDiagnosisDimension(snapshot: SourceSnapshot): KeyedDimensionLoadResult<DimDiagnosis, number> {
  const keys = SurrogateKeyMap.fromUnique('diagnosis', snapshot.diagnoses.map(d => d.diagnosisId));

  const rows = snapshot.diagnoses
    .map(d => ({
      diagnosisKey: keys.require(d.diagnosisId),
      diagnosisId: d.diagnosisId,
      icd10Code: d.icd10Code,
      icd10Description: d.icd10Description,
    }))
    .sort(byKey(r => r.diagnosisKey));

  return { dimension: 'diagnosis', rows, keys, excluded: {} };
}

export function loadProcedureDimension(snapshot: SourceSnapshot): KeyedDimensionLoadResult<DimProcedure, number> {
  const keys = SurrogateKeyMap.fromUnique('procedure', snapshot.procedures.map(p => p.procedureId));

  const rows = snapshot.procedures
    .map(p => ({
      procedureKey: keys.require(p.procedureId),
      procedureId: p.procedureId,
      cptCode: p.cptCode,
      cptDescription: p.cptDescription,
    }))
    .sort(byKey(r => r.procedureKey));

  return { dimension: 'procedure', rows, keys, excluded: {} };
}

/** Lookup dimension built from the distinct normalized types observed on encounters. */
export function loadEncounterTypeDimension(
  snapshot: SourceSnapshot
): KeyedDimensionLoadResult<DimEncounterType, string> {
  const observed = snapshot.encounters
    .map(e => e.encounterType)
    .filter((type): type is string => type !== null)
    .map(normalizeEncounterType);

  const keys = SurrogateKeyMap.fromDistinct('encounter_type', observed);

  const rows = keys
    .entries()
    .map(([encounterTypeName, encounterTypeKey]) => ({ encounterTypeKey, encounterTypeName }))
    .sort(byKey(r => r.encounterTypeKey));

  return { dimension: 'encounter_type', rows, keys, excluded: {} };
}

export function loadDateDimension(snapshot: SourceSnapshot): DimensionLoadResult<DimDate> {
  const byDateKey = new Map<number, DimDate>();

  for (const encounter of snapshot.encounters) {
    if (encounter.encounterDate === null) {
      continue;
    }
    const date = parseSourceDate(encounter.encounterDate, 'encounters', 'encounter_date');
    const dateKey = toDateKey(date);
    if (!byDateKey.has(dateKey)) {
      byDateKey.set(dateKey, buildDateRow(date));
    }
  }

  const rows = [...byDateKey.values()].sort(byKey(r => r.dateKey));

  return { dimension: 'date', rows, excluded: {} };
}

/**
 * Runs every dimension loader. Loaders are independent: one failing does not
 * stop the others, but any failure fails the whole step so no fact row is
 * built against a missing dimension.
 */
export async function loadDimensions(
  snapshot: SourceSnapshot,
  options: DimensionLoadOptions,
  onLoaded?: (result: DimensionLoadResult<unknown>) => Promise<void>
): Promise<LoadedDimensions> {
  const failures: Array<{ dimension: DimensionName; error: unknown }> = [];

  const settle = async <R extends DimensionLoadResult<unknown>>(
    dimension: DimensionName,
    load: () => R
  ): Promise<R | undefined> => {
    try {
      const result = load();
      if (onLoaded) {
        await onLoaded(result);
      }
      return result;
    } catch (error) {
      logger.error('Dimension load failed', {
        dimension,
        error: error instanceof Error ? error.message : String(error),
      });
      failures.push({ dimension, error });
      return undefined;
    }
  };

  const [specialty, department, provider, patient, diagnosis, procedure, encounterType, date] =
    await Promise.all([
      settle('specialty', () => loadSpecialtyDimension(snapshot)),
      settle('department', () => loadDepartmentDimension(snapshot)),
      settle('provider', () => loadProviderDimension(snapshot)),
      settle('patient', () => loadPatientDimension(snapshot, options)),
      settle('diagnosis', () => loadDiagnosisDimension(snapshot)),
      settle('procedure', () => loadProcedureDimension(snapshot)),
      settle('encounter_type', () => loadEncounterTypeDimension(snapshot)),
      settle('date', () => loadDateDimension(snapshot)),
    ]);

  if (!specialty || !department || !provider || !patient || !diagnosis || !procedure || !encounterType || !date) {
    throw new DimensionLoadError(failures);
  }

  return { specialty, department, provider, patient, diagnosis, procedure, encounterType, date };
}
