import { describe, it, expect, beforeEach, vi } from 'vitest';
import { getTableColumns, getTableName, type Table } from 'drizzle-orm';
import { WarehouseRepository } from '../../../repositories/warehouse.repository';
import { BaseRepository, MAX_QUERY_PARAMETERS, rowsPerInsert } from '../../../repositories/base.repository';
import { createEmptyStage } from '../../../etl/pipeline';
import { buildDateRow } from '../../../etl/calendar';
import type { FactEncounter } from '../../../drizzle/types';

const database = vi.hoisted(() => {
  const log: Array<{ table: string; rows: number; columns: number } | 'truncate'> = [];
  const tx = {
    execute: vi.fn(async () => {
      log.push('truncate');
    }),
    insert: vi.fn(),
  };
  const warehouseDb = {
    transaction: vi.fn(async (callback: (transaction: typeof tx) => Promise<unknown>) => callback(tx)),
  };
  return { log, tx, warehouseDb };
});

vi.mock('../../../config/database', () => ({
  sourceDb: {},
  warehouseDb: database.warehouseDb,
}));

function columnsOf(table: Table): number {
  return Object.keys(getTableColumns(table)).length;
}

function fact(encounterKey: number): FactEncounter {
  return {
    encounterKey,
    encounterId: encounterKey,
    dateKey: 20240101,
    patientKey: 1,
    providerKey: 1,
    specialtyKey: 1,
    departmentKey: 1,
    encounterTypeKey: 1,
    isReadmission: false,
    totalClaimAmount: '0.00',
    totalAllowedAmount: '0.00',
    lengthOfStayDays: 0,
    diagnosisCount: 0,
    procedureCount: 0,
  };
}

class ExposedRepository extends BaseRepository {
  chunk<Row>(rows: Row[], columnCount: number, batchSize: number) {
    const sizes: number[] = [];
    return this.insertInBatches(
      rows,
      columnCount,
      async (batch) => {
        sizes.push(batch.length);
      },
      batchSize
    ).then((total) => ({ total, sizes }));
  }
}

describe('WarehouseRepository - Unit Tests', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    database.log.length = 0;
    database.tx.insert.mockImplementation((table: Table) => ({
      values: vi.fn(async (batch: unknown[]) => {
        database.log.push({ table: getTableName(table), rows: batch.length, columns: columnsOf(table) });
      }),
    }));
  });

  describe('publish', () => {
    it('should truncate first and reload tables in foreign key order', async () => {
      const stage = createEmptyStage();
      stage.specialties = [{ specialtyKey: 1, specialtyId: 1, specialtyName: 'Cardiology', specialtyCode: null }];
      stage.dates = [buildDateRow(new Date(2024, 0, 1))];
      stage.facts = [fact(1)];
      stage.diagnosisBridge = [{ encounterKey: 1, diagnosisKey: 1, diagnosisSequence: 1 }];

      const counts = await new WarehouseRepository().publish(stage);

      expect(database.warehouseDb.transaction).toHaveBeenCalledTimes(1);
      expect(database.log[0]).toBe('truncate');
      expect(database.log.slice(1).map(entry => (entry === 'truncate' ? entry : entry.table))).toEqual([
        'dim_specialty',
        'dim_date',
        'fact_encounters',
        'bridge_encounter_diagnoses',
      ]);
      expect(counts).toMatchObject({ specialties: 1, dates: 1, facts: 1, diagnosisBridge: 1, patients: 0 });
    });

    it('should keep every insert under the bind parameter limit', async () => {
      const stage = createEmptyStage();
      stage.facts = Array.from({ length: 5000 }, (_, index) => fact(index + 1));
      stage.dates = Array.from({ length: 7000 }, (_, index) => ({
        ...buildDateRow(new Date(2024, 0, 1)),
        dateKey: index + 1,
      }));

      await new WarehouseRepository().publish(stage);

      const inserts: typeof database.log = database.log.filter(entry => entry !== 'truncate');
      for (const entry of inserts) {
        if (entry !== 'truncate') {
          expect(entry.rows * entry.columns).toBeLessThan(MAX_QUERY_PARAMETERS);
        }
      }
      expect(inserts.map(entry => (entry === 'truncate' ? 0 : entry.rows))).toEqual([6553, 447, 4680, 320]);
    });
  });

  describe('insertInBatches', () => {
    it('should split rows at the batch size', async () => {
      const rows = Array.from({ length: 25 }, (_, index) => index);

      const result = await new ExposedRepository().chunk(rows, 3, 10);

      expect(result).toEqual({ total: 25, sizes: [10, 10, 5] });
    });

    it('should shrink chunks for wide rows', async () => {
      const rows = Array.from({ length: 7 }, (_, index) => index);

      const result = await new ExposedRepository().chunk(rows, 20000, 10);

      expect(result.sizes).toEqual([3, 3, 1]);
    });

    it('should not insert anything for an empty table', async () => {
      const result = await new ExposedRepository().chunk([], 5, 10);

      expect(result).toEqual({ total: 0, sizes: [] });
    });
  });

  it('should size chunks from the column count', () => {
    expect(rowsPerInsert(14, 10000)).toBe(4680);
    expect(rowsPerInsert(10, 10000)).toBe(6553);
    expect(rowsPerInsert(2, 10000)).toBe(10000);
  });
});
