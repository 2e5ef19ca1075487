import { getTableColumns, sql, type Table } from 'drizzle-orm';
import { BaseRepository } from './base.repository';
import {
  dimSpecialty,
  dimDepartment,
  dimProvider,
  dimPatient,
  dimDiagnoses,
  dimProcedures,
  dimEncounterType,
  dimDate,
  factEncounters,
  bridgeEncounterDiagnoses,
  bridgeEncounterProcedures,
} from '../drizzle/olap.schema';
import type { StarSchemaStage, TableCounts, WarehouseWriter } from '../etl/interfaces';
import { logger } from '../utils/logger';

function columnCount(table: Table): number {
  return Object.keys(getTableColumns(table)).length;
}

export class WarehouseRepository extends BaseRepository implements WarehouseWriter {
  /**
   * Truncates and reloads every star schema table inside one transaction.
   * Readers keep seeing the previous load until the commit.
   */
  async publish(stage: StarSchemaStage): Promise<TableCounts> {
    return await this.executeInTransaction(async (tx) => {
      await tx.execute(sql`TRUNCATE TABLE
        ${bridgeEncounterProcedures},
        ${bridgeEncounterDiagnoses},
        ${factEncounters},
        ${dimDate},
        ${dimEncounterType},
        ${dimProcedures},
        ${dimDiagnoses},
        ${dimPatient},
        ${dimProvider},
        ${dimDepartment},
        ${dimSpecialty}`);

      logger.debug('Star schema truncated');

      const counts: TableCounts = {
        specialties: await this.insertInBatches(stage.specialties, columnCount(dimSpecialty), batch => tx.insert(dimSpecialty).values(batch)),
        departments: await this.insertInBatches(stage.departments, columnCount(dimDepartment), batch => tx.insert(dimDepartment).values(batch)),
        providers: await this.insertInBatches(stage.providers, columnCount(dimProvider), batch => tx.insert(dimProvider).values(batch)),
        patients: await this.insertInBatches(stage.patients, columnCount(dimPatient), batch => tx.insert(dimPatient).values(batch)),
        diagnoses: await this.insertInBatches(stage.diagnoses, columnCount(dimDiagnoses), batch => tx.insert(dimDiagnoses).values(batch)),
        procedures: await this.insertInBatches(stage.procedures, columnCount(dimProcedures), batch => tx.insert(dimProcedures).values(batch)),
        encounterTypes: await this.insertInBatches(stage.encounterTypes, columnCount(dimEncounterType), batch => tx.insert(dimEncounterType).values(batch)),
        dates: await this.insertInBatches(stage.dates, columnCount(dimDate), batch => tx.insert(dimDate).values(batch)),
        facts: await this.insertInBatches(stage.facts, columnCount(factEncounters), batch => tx.insert(factEncounters).values(batch)),
        diagnosisBridge: await this.insertInBatches(stage.diagnosisBridge, columnCount(bridgeEncounterDiagnoses), batch => tx.insert(bridgeEncounterDiagnoses).values(batch)),
        procedureBridge: await this.insertInBatches(stage.procedureBridge, columnCount(bridgeEncounterProcedures), batch => tx.insert(bridgeEncounterProcedures).values(batch)),
      };

      return counts;
    });
  }
}
