import { AlphaVantageDailyRow, AlphaVantageTimeSeries, StockRecord, StockTransformOptions } from '../types/models/stock';
import { TransformSummary } from '../types/models/ingestion';
import { alphaVantageRowSchema, isoDateSchema } from '../types/schemas/providers';
import { RecordError } from '../utils/errors/app-error';
import { formatZodError, summarizeZodError } from '../utils/errors/zod-error';
import { addDays, formatIsoDate } from '../utils/dates';
import { logger } from '../utils/logger';

export interface StockTransformResult {
  records: StockRecord[];
  errors: RecordError[];
  summary: TransformSummary;
}

/**
 * Converts one Alpha Vantage row into a StockRecord.
 * @throws RecordError when the date or any field does not coerce
 */
export function transformStockRow(date: string, raw: unknown): StockRecord {
  const dateResult = isoDateSchema.safeParse(date);
  if (!dateResult.success) {
    throw new RecordError(date, summarizeZodError(dateResult.error), {
      validationErrors: formatZodError(dateResult.error),
    });
  }

  const row = alphaVantageRowSchema.safeParse(raw);
  if (!row.success) {
    throw new RecordError(date, summarizeZodError(row.error), {
      validationErrors: formatZodError(row.error),
    });
  }

  return {
    date: dateResult.data,
    open_price: row.data['1. open'],
    high_price: row.data['2. high'],
    low_price: row.data['3. low'],
    close_price: row.data['4. close'],
    adjusted_close: row.data['5. adjusted close'],
    volume: row.data['6. volume'],
    dividend_amount: row.data['7. dividend amount'],
    split_coefficient: row.data['8. split coefficient'],
  };
}

/**
 * Re-derives the provider row a record came from
 */
export function toRawStockRow(record: StockRecord): AlphaVantageDailyRow {
  return {
    '1. open': String(record.open_price),
    '2. high': String(record.high_price),
    '3. low': String(record.low_price),
    '4. close': String(record.close_price),
    '5. adjusted close': String(record.adjusted_close),
    '6. volume': String(record.volume),
    '7. dividend amount': String(record.dividend_amount),
    '8. split coefficient': String(record.split_coefficient),
  };
}

/**
 * Transforms the whole series, oldest first. Rows that fail conversion are logged and skipped.
 * With `windowDays` only dates after `asOf - windowDays` are kept.
 */
export function transformStockData(
  series: AlphaVantageTimeSeries,
  options: StockTransformOptions = {}
): StockTransformResult {
  const records: StockRecord[] = [];
  const errors: RecordError[] = [];

  for (const [date, raw] of Object.entries(series)) {
    try {
      records.push(transformStockRow(date, raw));
    } catch (error) {
      if (!(error instanceof RecordError)) {
        throw error;
      }
      logger.warn('stock_record_skipped', { date, reason: error.message });
      errors.push(error);
    }
  }

  let kept = records;
  if (options.windowDays !== undefined) {
    const cutoff = addDays(options.asOf ?? formatIsoDate(new Date()), -options.windowDays);
    kept = records.filter(record => record.date > cutoff);
  }
  kept.sort((a, b) => a.date.localeCompare(b.date));

  logger.info('stock_records_transformed', {
    accepted: kept.length,
    skipped: errors.length,
    outsideWindow: records.length - kept.length,
  });

  return {
    records: kept,
    errors,
    summary: { accepted: kept.length, skipped: errors.length },
  };
}
