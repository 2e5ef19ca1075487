import type {
  ExclusionCounts,
  PipelineResult,
  SourceReader,
  SourceSnapshot,
  StarSchemaStage,
  TableCounts,
  WarehouseWriter,
} from './interfaces';
import type { DimensionName, EtlPhase, ExclusionReason } from '../types';
import { loadDimensions } from './dimensions';
import { aggregateEncounterMetrics } from './metrics-aggregator';
import { loadFacts } from './fact-loader';
import { classifyReadmissions } from './readmission';
import { loadDiagnosisBridge, loadProcedureBridge } from './bridges';
import { SourceRepository } from '../repositories/source.repository';
import { WarehouseRepository } from '../repositories/warehouse.repository';
import { RunTrackerService } from '../services/run-tracker.service';
import { READMISSION_WINDOW_DAYS } from '../config/etl';
import { etlPhaseDuration, etlRowsExcluded, etlRowsPublished } from '../config/metrics';
import { EtlPhaseError } from '../errors';
import { logger } from '../utils/logger';

export interface PipelineOptions {
  /** Load date used for patient ages. Defaults to now. */
  asOf?: Date;
  readmissionWindowDays?: number;
}

export function createEmptyStage(): StarSchemaStage {
  return {
    specialties: [],
    departments: [],
    providers: [],
    patients: [],
    diagnoses: [],
    procedures: [],
    encounterTypes: [],
    dates: [],
    facts: [],
    diagnosisBridge: [],
    procedureBridge: [],
  };
}

const DIMENSION_PHASES: Record<DimensionName, EtlPhase> = {
  specialty: 'DIM_SPECIALTY_LOADED',
  department: 'DIM_DEPARTMENT_LOADED',
  provider: 'DIM_PROVIDER_LOADED',
  patient: 'DIM_PATIENT_LOADED',
  diagnosis: 'DIM_DIAGNOSIS_LOADED',
  procedure: 'DIM_PROCEDURE_LOADED',
  encounter_type: 'DIM_ENCOUNTER_TYPE_LOADED',
  date: 'DIM_DATE_LOADED',
};

const EXCLUSION_REASONS: ExclusionReason[] = [
  'patient_missing_birth_date',
  'encounter_missing_date',
  'encounter_unknown_provider',
  'fact_unresolved_dimension',
  'bridge_diagnosis_unmatched',
  'bridge_procedure_unmatched',
];

function countSourceRows(snapshot: SourceSnapshot): number {
  return Object.values(snapshot).reduce((total, rows) => total + rows.length, 0);
}

function countTableRows(counts: TableCounts): number {
  return Object.values(counts).reduce((total, count) => total + count, 0);
}

/**
 * Full-refresh load of the star schema. Every phase works on an in-memory
 * stage built from one source snapshot; the target is only written by the
 * final publish, in a single transaction.
 */
export class StarSchemaPipeline {
  private source: SourceReader;
  private warehouse: WarehouseWriter;
  private tracker: RunTrackerService;

  constructor(source?: SourceReader, warehouse?: WarehouseWriter, tracker?: RunTrackerService) {
    this.source = source ?? new SourceRepository();
    this.warehouse = warehouse ?? new WarehouseRepository();
    this.tracker = tracker ?? new RunTrackerService();
  }

  async run(options: PipelineOptions = {}): Promise<PipelineResult> {
    const startedAt = Date.now();
    const asOf = options.asOf ?? new Date();
    const windowDays = options.readmissionWindowDays ?? READMISSION_WINDOW_DAYS;
    const exclusions: ExclusionCounts = {};

    const runId = await this.tracker.start();
    let currentPhase: EtlPhase = 'INITIALIZATION';

    const phase = async <T>(
      name: EtlPhase,
      work: () => T | Promise<T>,
      rowsOf: (result: T) => number
    ): Promise<T> => {
      currentPhase = name;
      const endTimer = etlPhaseDuration.startTimer({ phase: name });
      const result = await work();
      const seconds = endTimer();
      const rows = rowsOf(result);

      await this.tracker.advance(runId, name, rows);
      logger.info('ETL phase finished', { runId, phase: name, rows, durationSeconds: seconds });

      return result;
    };

    const exclude = (counts: ExclusionCounts) => {
      for (const reason of EXCLUSION_REASONS) {
        const count = counts[reason];
        if (count) {
          exclusions[reason] = (exclusions[reason] ?? 0) + count;
          etlRowsExcluded.inc({ reason }, count);
        }
      }
    };

    try {
      const stage = await phase('CLEANUP_COMPLETE', () => createEmptyStage(), () => 0);

      const snapshot = await phase('SOURCE_EXTRACTED', () => this.source.extractSnapshot(), countSourceRows);

      const dimensions = await phase(
        'ALL_DIMENSIONS_LOADED',
        () =>
          loadDimensions(snapshot, { asOf }, async (result) => {
            await this.tracker.advance(runId, DIMENSION_PHASES[result.dimension], result.rows.length);
          }),
        (loaded) => Object.values(loaded).reduce((total, result) => total + result.rows.length, 0)
      );

      stage.specialties = dimensions.specialty.rows;
      stage.departments = dimensions.department.rows;
      stage.providers = dimensions.provider.rows;
      stage.patients = dimensions.patient.rows;
      stage.diagnoses = dimensions.diagnosis.rows;
      stage.procedures = dimensions.procedure.rows;
      stage.encounterTypes = dimensions.encounterType.rows;
      stage.dates = dimensions.date.rows;
      exclude(dimensions.patient.excluded);

      const aggregation = await phase(
        'STAGING_TABLE_CREATED',
        () => aggregateEncounterMetrics(snapshot),
        (result) => result.metrics.length
      );
      exclude(aggregation.excluded);

      const factLoad = await phase(
        'FACT_TABLE_LOADED',
        () => loadFacts(aggregation.metrics, dimensions),
        (result) => result.facts.length
      );
      exclude(factLoad.excluded);
      if (factLoad.unresolved.length > 0) {
        logger.warn('Encounters with unresolved dimension keys excluded from fact_encounters', {
          runId,
          count: factLoad.unresolved.length,
          sample: factLoad.unresolved.slice(0, 10),
        });
      }

      const readmissions = await phase(
        'READMISSIONS_FLAGGED',
        () => classifyReadmissions(factLoad.facts, snapshot.encounters, windowDays),
        (result) => result.flagged
      );
      stage.facts = readmissions.facts;

      const bridges = await phase(
        'BRIDGES_LOADED',
        () => ({
          diagnoses: loadDiagnosisBridge(snapshot.encounterDiagnoses, factLoad.keys, dimensions.diagnosis.keys),
          procedures: loadProcedureBridge(snapshot.encounterProcedures, factLoad.keys, dimensions.procedure.keys),
        }),
        (result) => result.diagnoses.rows.length + result.procedures.rows.length
      );
      stage.diagnosisBridge = bridges.diagnoses.rows;
      stage.procedureBridge = bridges.procedures.rows;
      exclude(bridges.diagnoses.excluded);
      exclude(bridges.procedures.excluded);

      const tables = await phase('PUBLISHED', () => this.warehouse.publish(stage), countTableRows);
      for (const [table, count] of Object.entries(tables)) {
        etlRowsPublished.set({ table }, count);
      }

      await this.tracker.complete(runId, 'SUCCESS');

      return {
        runId,
        status: 'SUCCESS',
        durationMs: Date.now() - startedAt,
        tables,
        exclusions,
      };
    } catch (error) {
      try {
        await this.tracker.complete(runId, 'FAILED', error);
      } catch (trackerError) {
        logger.error('Failed to mark ETL run as FAILED', {
          runId,
          error: trackerError instanceof Error ? trackerError.message : String(trackerError),
        });
      }
      throw new EtlPhaseError(currentPhase, runId, error);
    }
  }
}
