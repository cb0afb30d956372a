import { toRawStockRow, transformStockData, transformStockRow } from '../stock-transformer';
import { RecordError } from '../../utils/errors/app-error';
import { alphaVantagePayload, silenceLogs, stockRow } from '../../__tests__/fixtures';

describe('stock-transformer', () => {
  beforeEach(() => {
    silenceLogs();
  });

  describe('transformStockRow', () => {
    it('should convert every provider field', () => {
      expect(transformStockRow('2024-02-29', stockRow('58.6100', { '7. dividend amount': '0.2075' }))).toEqual({
        date: '2024-02-29',
        open_price: 59.8,
        high_price: 60.45,
        low_price: 59.51,
        close_price: 58.61,
        adjusted_close: 58.61,
        volume: 15234100,
        dividend_amount: 0.2075,
        split_coefficient: 1,
      });
    });

    it('should reject a non-numeric field', () => {
      expect(() => transformStockRow('2024-02-29', stockRow('n/a'))).toThrow(RecordError);
    });

    it('should reject a fractional volume', () => {
      expect(() => transformStockRow('2024-02-29', stockRow('58.61', { '6. volume': '100.5' }))).toThrow(
        'Invalid record 2024-02-29: 6. volume: Expected integer, received float'
      );
    });

    it('should reject an invalid date key', () => {
      expect(() => transformStockRow('2024-02-30', stockRow('58.61'))).toThrow(
        'Invalid record 2024-02-30: unknown: Date must be a calendar date in YYYY-MM-DD format'
      );
    });
  });

  describe('transformStockData', () => {
    it('should return records sorted by date', () => {
      const result = transformStockData(alphaVantagePayload()['Time Series (Daily)']);

      expect(result.records.map(record => record.date)).toEqual(['2024-02-29', '2024-03-01']);
      expect(result.records.map(record => record.close_price)).toEqual([58.61, 60.31]);
      expect(result.summary).toEqual({ accepted: 2, skipped: 0 });
      expect(result.errors).toEqual([]);
    });

    it('should skip a malformed record and keep transforming the rest', () => {
      const { '4. close': _close, ...missingClose } = stockRow('61.00');
      const result = transformStockData({
        '2024-03-04': stockRow('61.2000'),
        '2024-03-01': stockRow('abc'),
        '2024-02-29': missingClose,
        '2024-02-28': stockRow('58.9000'),
      });

      expect(result.records.map(record => record.date)).toEqual(['2024-02-28', '2024-03-04']);
      expect(result.errors.map(error => error.recordKey)).toEqual(['2024-03-01', '2024-02-29']);
      expect(result.summary).toEqual({ accepted: 2, skipped: 2 });
    });

    it('should skip rows that are not objects', () => {
      const result = transformStockData({ '2024-03-01': 'not a row', '2024-02-29': stockRow('58.61') });
      expect(result.records).toHaveLength(1);
      expect(result.errors[0].recordKey).toBe('2024-03-01');
    });

    it('should keep only the trailing window when requested', () => {
      const series = {
        '2024-03-01': stockRow('60.31'),
        '2024-02-29': stockRow('58.61'),
        '2024-02-23': stockRow('57.02'),
      };

      const result = transformStockData(series, { windowDays: 7, asOf: '2024-03-01' });

      expect(result.records.map(record => record.date)).toEqual(['2024-02-29', '2024-03-01']);
      expect(result.summary).toEqual({ accepted: 2, skipped: 0 });
    });
  });

  describe('toRawStockRow', () => {
    it('should preserve every numeric value through transform and re-derivation', () => {
      const series = {
        '2024-03-01': stockRow('60.3100', { '7. dividend amount': '0.2075', '8. split coefficient': '3.0' }),
        '2024-02-29': stockRow('58.61', { '1. open': '1e2', '6. volume': '0' }),
      };

      for (const record of transformStockData(series).records) {
        const original = series[record.date as keyof typeof series];
        const rederived = toRawStockRow(record);
        for (const field of Object.keys(original) as Array<keyof typeof original>) {
          expect(Number(rederived[field])).toBe(Number(original[field]));
        }
      }
    });
  });
});
