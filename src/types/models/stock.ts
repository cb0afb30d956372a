/**
 * One trading day as returned by Alpha Vantage TIME_SERIES_DAILY_ADJUSTED.
 * Values arrive as strings; keys carry the provider's numbering.
 */
export interface AlphaVantageDailyRow {
  '1. open': string;
  '2. high': string;
  '3. low': string;
  '4. close': string;
  '5. adjusted close': string;
  '6. volume': string;
  '7. dividend amount': string;
  '8. split coefficient': string;
}

/**
 * Time series keyed by trading date (YYYY-MM-DD). Rows are left untyped until transformed.
 */
export type AlphaVantageTimeSeries = Record<string, unknown>;

/**
 * Row of stock_raw_data; `date` is the natural key
 */
export interface StockRecord {
  date: string;
  open_price: number;
  high_price: number;
  low_price: number;
  close_price: number;
  adjusted_close: number;
  volume: number;
  dividend_amount: number;
  split_coefficient: number;
}

/**
 * `compact` is the latest 100 trading days, `full` the whole history
 */
export type StockOutputSize = 'compact' | 'full';

export interface StockTransformOptions {
  /** Keep only the trailing N calendar days ending at `asOf` */
  windowDays?: number;
  /** Reference date (YYYY-MM-DD) for the window, defaults to today */
  asOf?: string;
}
