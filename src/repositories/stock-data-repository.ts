import { DatabaseService } from '../config/database';
import { STOCK_TABLE } from '../db/schema';
import { LatestStockSample, TableSummary } from '../types/models/ingestion';
import { StockRecord } from '../types/models/stock';
import { LoadError } from '../utils/errors/app-error';
import { toIsoDate } from '../utils/dates';
import { logger } from '../utils/logger';
import { summarizeTable } from './table-summary';

const UPSERT_STOCK_SQL = `
  INSERT INTO ${STOCK_TABLE}
    ("date", open_price, high_price, low_price, close_price, adjusted_close,
     volume, dividend_amount, split_coefficient)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
  ON CONFLICT ("date") DO UPDATE SET
    open_price = EXCLUDED.open_price,
    high_price = EXCLUDED.high_price,
    low_price = EXCLUDED.low_price,
    close_price = EXCLUDED.close_price,
    adjusted_close = EXCLUDED.adjusted_close,
    volume = EXCLUDED.volume,
    dividend_amount = EXCLUDED.dividend_amount,
    split_coefficient = EXCLUDED.split_coefficient,
    ingested_at = NOW()`;

interface LatestStockRow {
  date: unknown;
  close_price: number | string;
  volume: number | string;
}

/**
 * Repository for stock_raw_data, keyed by trading date
 */
export class StockDataRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Upserts every record inside one transaction. Nothing is kept if any statement fails.
   * @returns Number of rows inserted or updated
   */
  async upsertMany(records: StockRecord[]): Promise<number> {
    const count = await this.db.transaction(STOCK_TABLE, async (tx) => {
      let upserted = 0;
      for (const record of records) {
        await tx.query(UPSERT_STOCK_SQL, [
          record.date,
          record.open_price,
          record.high_price,
          record.low_price,
          record.close_price,
          record.adjusted_close,
          record.volume,
          record.dividend_amount,
          record.split_coefficient,
        ]);
        upserted++;
      }
      return upserted;
    });

    logger.info('stock_records_upserted', { table: STOCK_TABLE, count });
    return count;
  }

  async summarize(): Promise<TableSummary> {
    return summarizeTable(this.db, STOCK_TABLE);
  }

  /**
   * Most recent trading day on record, or null for an empty table
   */
  async findLatest(): Promise<LatestStockSample | null> {
    try {
      const result = await this.db.query<LatestStockRow>(
        `SELECT "date", close_price, volume FROM ${STOCK_TABLE} ORDER BY "date" DESC LIMIT 1`
      );
      const row = result.rows[0];
      if (!row) {
        return null;
      }
      return {
        date: toIsoDate(row.date),
        closePrice: Number(row.close_price),
        volume: Number(row.volume),
      };
    } catch (error) {
      throw new LoadError(`Failed to read latest row of ${STOCK_TABLE}`, STOCK_TABLE, error);
    }
  }
}
