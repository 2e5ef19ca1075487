import type {
  SourceSpecialty,
  SourceDepartment,
  SourceProvider,
  SourcePatient,
  SourceDiagnosis,
  SourceProcedure,
  SourceEncounter,
  SourceEncounterDiagnosis,
  SourceEncounterProcedure,
  SourceBilling,
  DimSpecialty,
  DimDepartment,
  DimProvider,
  DimPatient,
  DimDiagnosis,
  DimProcedure,
  DimEncounterType,
  DimDate,
  FactEncounter,
  BridgeEncounterDiagnosis,
  BridgeEncounterProcedure,
  EtlRun,
} from '../drizzle/types';
import type { EtlPhase, ExclusionReason, RunStatus, TerminalRunStatus } from '../types';

/** Everything the pipeline reads from the normalized source, extracted once per run. */
export interface SourceSnapshot {
  specialties: SourceSpecialty[];
  departments: SourceDepartment[];
  providers: SourceProvider[];
  patients: SourcePatient[];
  diagnoses: SourceDiagnosis[];
  procedures: SourceProcedure[];
  encounters: SourceEncounter[];
  encounterDiagnoses: SourceEncounterDiagnosis[];
  encounterProcedures: SourceEncounterProcedure[];
  billing: SourceBilling[];
}

export interface StarSchemaStage {
  specialties: DimSpecialty[];
  departments: DimDepartment[];
  providers: DimProvider[];
  patients: DimPatient[];
  diagnoses: DimDiagnosis[];
  procedures: DimProcedure[];
  encounterTypes: DimEncounterType[];
  dates: DimDate[];
  facts: FactEncounter[];
  diagnosisBridge: BridgeEncounterDiagnosis[];
  procedureBridge: BridgeEncounterProcedure[];
}

export type TargetTable = keyof StarSchemaStage;

export type TableCounts = Record<TargetTable, number>;

export type ExclusionCounts = Partial<Record<ExclusionReason, number>>;

/**
 * Intermediate per-encounter aggregate. Sums stay `null` when the encounter
 * has no billing amount at all; the fact projection turns that into zero.
 */
export interface EncounterMetrics {
  encounterId: number;
  patientId: number | null;
  providerId: number;
  departmentId: number | null;
  specialtyId: number | null;
  encounterType: string | null;
  encounterDate: Date;
  dischargeDate: Date | null;
  diagnosisCount: number;
  procedureCount: number;
  totalClaimCents: number | null;
  totalAllowedCents: number | null;
}

export interface SourceReader {
  extractSnapshot(): Promise<SourceSnapshot>;
}

export interface WarehouseWriter {
  /** Replaces the whole target schema with the stage in one transaction. */
  publish(stage: StarSchemaStage): Promise<TableCounts>;
}

export interface RunStore {
  create(startedAt: string): Promise<EtlRun>;
  findById(runId: number): Promise<EtlRun | null>;
  findActive(startedAfter: string): Promise<EtlRun | null>;
  updatePhase(runId: number, phase: EtlPhase, recordsProcessed?: number): Promise<EtlRun | null>;
  finish(
    runId: number,
    status: TerminalRunStatus,
    endedAt: string,
    errorMessage?: string
  ): Promise<EtlRun | null>;
  list(query: { status?: RunStatus; limit: number; offset: number }): Promise<{ data: EtlRun[]; total: number }>;
}

export interface PipelineResult {
  runId: number;
  status: TerminalRunStatus;
  durationMs: number;
  tables: TableCounts;
  exclusions: ExclusionCounts;
}
