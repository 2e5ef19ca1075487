import { warehouseDb, type WarehouseDb } from '../config/database';
import { ETL_BATCH_SIZE } from '../config/etl';

export type WarehouseTransaction = Parameters<Parameters<WarehouseDb['transaction']>[0]>[0];

/** postgres-js refuses a query with this many bind parameters or more. */
export const MAX_QUERY_PARAMETERS = 65534;

/** Rows per multi-row INSERT: one bind parameter per column per row. */
export function rowsPerInsert(columnCount: number, batchSize: number = ETL_BATCH_SIZE): number {
  const parameterLimit = Math.floor((MAX_QUERY_PARAMETERS - 1) / Math.max(columnCount, 1));
  return Math.max(1, Math.min(batchSize, parameterLimit));
}

export class BaseRepository {
  protected db = warehouseDb;

  protected async executeInTransaction<T>(
    callback: (tx: WarehouseTransaction) => Promise<T>
  ): Promise<T> {
    return await this.db.transaction(async (tx) => {
      return await callback(tx);
    });
  }

  protected async insertInBatches<Row>(
    rows: Row[],
    columnCount: number,
    insert: (batch: Row[]) => Promise<unknown>,
    batchSize: number = ETL_BATCH_SIZE
  ): Promise<number> {
    const chunkSize = rowsPerInsert(columnCount, batchSize);
    for (let offset = 0; offset < rows.length; offset += chunkSize) {
      await insert(rows.slice(offset, offset + chunkSize));
    }
    return rows.length;
  }
}
