import { vi } from 'vitest';
import type {
  SourceBilling,
  SourceDepartment,
  SourceDiagnosis,
  SourceEncounter,
  SourceEncounterDiagnosis,
  SourceEncounterProcedure,
  SourcePatient,
  SourceProcedure,
  SourceProvider,
  SourceSpecialty,
  EtlRun,
} from '../../drizzle/types';
import type {
  RunStore,
  SourceReader,
  SourceSnapshot,
  StarSchemaStage,
  TableCounts,
  WarehouseWriter,
} from '../../etl/interfaces';
import type { EtlPhase, RunStatus, TerminalRunStatus } from '../../types';

export function createSpecialty(overrides: Partial<SourceSpecialty> = {}): SourceSpecialty {
  return { specialtyId: 1, specialtyName: 'Cardiology', specialtyCode: 'CARD', ...overrides };
}

export function createDepartment(overrides: Partial<SourceDepartment> = {}): SourceDepartment {
  return { departmentId: 1, departmentName: 'Heart Center', floor: 2, capacity: 40, ...overrides };
}

export function createProvider(overrides: Partial<SourceProvider> = {}): SourceProvider {
  return {
    providerId: 1,
    firstName: 'Ada',
    lastName: 'Stone',
    credential: 'md',
    specialtyId: 1,
    departmentId: 1,
    ...overrides,
  };
}

export function createPatient(overrides: Partial<SourcePatient> = {}): SourcePatient {
  return {
    patientId: 1,
    firstName: 'Test',
    lastName: 'Patient',
    dateOfBirth: '1980-06-15',
    gender: 'f',
    mrn: 'MRN-0001',
    ...overrides,
  };
}

export function createDiagnosis(overrides: Partial<SourceDiagnosis> = {}): SourceDiagnosis {
  return { diagnosisId: 1, icd10Code: 'I10', icd10Description: 'Essential hypertension', ...overrides };
}

export function createProcedure(overrides: Partial<SourceProcedure> = {}): SourceProcedure {
  return { procedureId: 1, cptCode: '99213', cptDescription: 'Office visit', ...overrides };
}

export function createEncounter(overrides: Partial<SourceEncounter> = {}): SourceEncounter {
  return {
    encounterId: 1,
    patientId: 1,
    providerId: 1,
    encounterType: 'Outpatient',
    encounterDate: '2024-01-10 09:00:00',
    dischargeDate: null,
    departmentId: 1,
    ...overrides,
  };
}

export function createEncounterDiagnosis(
  overrides: Partial<SourceEncounterDiagnosis> = {}
): SourceEncounterDiagnosis {
  return { encounterDiagnosisId: 1, encounterId: 1, diagnosisId: 1, diagnosisSequence: 1, ...overrides };
}

export function createEncounterProcedure(
  overrides: Partial<SourceEncounterProcedure> = {}
): SourceEncounterProcedure {
  return { encounterProcedureId: 1, encounterId: 1, procedureId: 1, procedureDate: '2024-01-10', ...overrides };
}

export function createBilling(overrides: Partial<SourceBilling> = {}): SourceBilling {
  return {
    billingId: 1,
    encounterId: 1,
    claimAmount: '100.00',
    allowedAmount: '80.00',
    claimDate: '2024-01-12',
    claimStatus: 'Paid',
    ...overrides,
  };
}

export function createSnapshot(overrides: Partial<SourceSnapshot> = {}): SourceSnapshot {
  return {
    specialties: [],
    departments: [],
    providers: [],
    patients: [],
    diagnoses: [],
    procedures: [],
    encounters: [],
    encounterDiagnoses: [],
    encounterProcedures: [],
    billing: [],
    ...overrides,
  };
}

export function createEtlRun(overrides: Partial<EtlRun> = {}): EtlRun {
  return {
    etlRunId: 1,
    runStartDatetime: '2024-03-01T02:00:00.000Z',
    runEndDatetime: null,
    status: 'RUNNING',
    recordsProcessed: null,
    errorMessage: null,
    etlPhase: 'INITIALIZATION',
    ...overrides,
  };
}

export function createMockRunStore() {
  return {
    create: vi.fn<RunStore['create']>(),
    findById: vi.fn<RunStore['findById']>(),
    findActive: vi.fn<RunStore['findActive']>(),
    updatePhase: vi.fn<RunStore['updatePhase']>(),
    finish: vi.fn<RunStore['finish']>(),
    list: vi.fn<RunStore['list']>(),
  };
}

/** Keeps `etl_control` rows in memory with the same RUNNING-only update rules as the repository. */
export class InMemoryRunStore implements RunStore {
  runs: EtlRun[] = [];

  async create(startedAt: string): Promise<EtlRun> {
    const run = createEtlRun({ etlRunId: this.runs.length + 1, runStartDatetime: startedAt });
    this.runs.push(run);
    return { ...run };
  }

  async findById(runId: number): Promise<EtlRun | null> {
    const run = this.runs.find(r => r.etlRunId === runId);
    return run ? { ...run } : null;
  }

  async findActive(startedAfter: string): Promise<EtlRun | null> {
    const active = this.runs
      .filter(r => r.status === 'RUNNING' && r.runStartDatetime >= startedAfter)
      .sort((a, b) => b.runStartDatetime.localeCompare(a.runStartDatetime));
    return active.length > 0 ? { ...active[0] } : null;
  }

  async updatePhase(runId: number, phase: EtlPhase, recordsProcessed?: number): Promise<EtlRun | null> {
    const run = this.runs.find(r => r.etlRunId === runId && r.status === 'RUNNING');
    if (!run) {
      return null;
    }
    run.etlPhase = phase;
    if (recordsProcessed !== undefined) {
      run.recordsProcessed = recordsProcessed;
    }
    return { ...run };
  }

  async finish(
    runId: number,
    status: TerminalRunStatus,
    endedAt: string,
    errorMessage?: string
  ): Promise<EtlRun | null> {
    const run = this.runs.find(r => r.etlRunId === runId && r.status === 'RUNNING');
    if (!run) {
      return null;
    }
    run.status = status;
    run.runEndDatetime = endedAt;
    run.errorMessage = errorMessage ?? null;
    if (status === 'SUCCESS') {
      run.etlPhase = 'COMPLETED';
    }
    return { ...run };
  }

  async list(query: { status?: RunStatus; limit: number; offset: number }) {
    const matching = this.runs
      .filter(r => !query.status || r.status === query.status)
      .sort((a, b) => b.etlRunId - a.etlRunId);
    return { data: matching.slice(query.offset, query.offset + query.limit), total: matching.length };
  }
}

export class InMemorySource implements SourceReader {
  extractions = 0;

  constructor(public snapshot: SourceSnapshot) {}

  async extractSnapshot(): Promise<SourceSnapshot> {
    this.extractions++;
    return this.snapshot;
  }
}

/** Publishes atomically: a failing publish leaves the previous stage in place. */
export class InMemoryWarehouse implements WarehouseWriter {
  published: StarSchemaStage | null = null;
  failWith: Error | null = null;

  async publish(stage: StarSchemaStage): Promise<TableCounts> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.published = stage;
    return {
      specialties: stage.specialties.length,
      departments: stage.departments.length,
      providers: stage.providers.length,
      patients: stage.patients.length,
      diagnoses: stage.diagnoses.length,
      procedures: stage.procedures.length,
      encounterTypes: stage.encounterTypes.length,
      dates: stage.dates.length,
      facts: stage.facts.length,
      diagnosisBridge: stage.diagnosisBridge.length,
      procedureBridge: stage.procedureBridge.length,
    };
  }
}
