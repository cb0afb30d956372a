import { Queryable } from '../config/database';
import { TableSummary } from '../types/models/ingestion';
import { LoadError } from '../utils/errors/app-error';
import { toIsoDate } from '../utils/dates';

interface SummaryRow {
  total_count: number | string;
  earliest_date: unknown;
  latest_date: unknown;
}

/**
 * Row count and date span of one of the raw tables. `table` must be one of the schema constants.
 */
export async function summarizeTable(db: Queryable, table: string): Promise<TableSummary> {
  try {
    const result = await db.query<SummaryRow>(
      `SELECT COUNT(*) AS total_count, MIN("date") AS earliest_date, MAX("date") AS latest_date
       FROM ${table}`
    );
    const row = result.rows[0];
    return {
      table,
      totalCount: row ? Number(row.total_count) : 0,
      earliestDate: row ? toIsoDate(row.earliest_date) : null,
      latestDate: row ? toIsoDate(row.latest_date) : null,
    };
  } catch (error) {
    throw new LoadError(`Failed to verify ${table}`, table, error);
  }
}
