import { EventEmitter } from 'events';
import { AxiosError, AxiosHeaders } from 'axios';
import { Client } from 'pg';
import { DatabaseConfig, DatabaseService } from '../config/database';
import { ProviderApiConfig } from '../config/providers';
import { City } from '../types/models/weather';

export const TEST_ENV: NodeJS.ProcessEnv = {
  ALPHA_VANTAGE_API_KEY: 'test-av-key',
  WEATHER_API_KEY: 'test-weather-key',
  DB_PASSWORD: 'test-password',
};

export const TEST_PROVIDER_CONFIG: ProviderApiConfig = {
  baseURL: 'http://provider.test',
  apiKey: 'test-api-key',
  timeout: 1000,
};

export const TEST_DB_CONFIG: DatabaseConfig = {
  host: 'localhost',
  port: 5432,
  database: 'ingestion_test',
  user: 'postgres',
  password: 'test-password',
  ssl: false,
  ensureSchema: true,
};

export const BENTONVILLE: City = {
  name: 'Bentonville',
  latitude: 36.3729,
  longitude: -94.2088,
  timezone: 'America/Chicago',
};

export const stockRow = (close: string, overrides: Record<string, string> = {}) => ({
  '1. open': '59.8000',
  '2. high': '60.4500',
  '3. low': '59.5100',
  '4. close': close,
  '5. adjusted close': close,
  '6. volume': '15234100',
  '7. dividend amount': '0.0000',
  '8. split coefficient': '1.0',
  ...overrides,
});

export const alphaVantagePayload = () => ({
  'Meta Data': {
    '1. Information': 'Daily Time Series with Splits and Dividend Events',
    '2. Symbol': 'WMT',
  },
  'Time Series (Daily)': {
    '2024-03-01': stockRow('60.3100'),
    '2024-02-29': stockRow('58.6100', { '7. dividend amount': '0.2075' }),
  },
});

export const openMeteoPayload = () => ({
  latitude: 36.37,
  longitude: -94.21,
  timezone: 'America/Chicago',
  daily: {
    time: ['2024-02-29', '2024-03-01'],
    temperature_2m_mean: [8.4, 11.2],
    temperature_2m_min: [2.1, 5],
    temperature_2m_max: [14.6, 17.9],
    precipitation_sum: [0, 3.2],
    relative_humidity_2m_mean: [61.4, 78],
    pressure_msl_mean: [1018.2, 1011.7],
    wind_speed_10m_max: [18.7, 24.1],
  },
});

export const httpResponse = <T>(data: T, status = 200) => ({
  data,
  status,
  statusText: 'OK',
  headers: {},
  config: { headers: new AxiosHeaders() },
});

export const axiosHttpError = (status: number, data: unknown): AxiosError => {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data,
    status,
    statusText: 'Error',
    headers: {},
    config,
  });
};

type StoredRows = Map<string, unknown[]>;

export interface FakeTables {
  stock_raw_data: StoredRows;
  weather_raw_data: StoredRows;
  /** Makes the matching statement throw, as a constraint violation would */
  failWhen?: (sql: string, params: unknown[]) => Error | undefined;
}

const result = (rows: Record<string, unknown>[]) => ({ rows, rowCount: rows.length, command: '', oid: 0, fields: [] });

const sortedDates = (rows: StoredRows): string[] => [...rows.values()].map(params => String(params[0])).sort();

/**
 * Stands in for a `pg` Client over shared in-memory tables. Upserts replace the row stored under the
 * table's unique key, and BEGIN/ROLLBACK restore the state seen at BEGIN. Values come back as strings,
 * the way the driver returns NUMERIC and BIGINT columns.
 */
export const fakePgClient = (tables: FakeTables) => {
  let snapshot: { stock: StoredRows; weather: StoredRows } | null = null;

  const execute = async (text: string, params: unknown[] = []) => {
    const sql = text.trim();
    const failure = tables.failWhen?.(sql, params);
    if (failure) {
      throw failure;
    }

    if (sql === 'BEGIN') {
      snapshot = { stock: new Map(tables.stock_raw_data), weather: new Map(tables.weather_raw_data) };
      return result([]);
    }
    if (sql === 'COMMIT') {
      snapshot = null;
      return result([]);
    }
    if (sql === 'ROLLBACK') {
      if (snapshot) {
        tables.stock_raw_data = snapshot.stock;
        tables.weather_raw_data = snapshot.weather;
      }
      snapshot = null;
      return result([]);
    }
    if (sql.startsWith('CREATE TABLE')) {
      return result([]);
    }
    if (sql.startsWith('INSERT INTO stock_raw_data')) {
      tables.stock_raw_data.set(String(params[0]), params);
      return { ...result([]), rowCount: 1 };
    }
    if (sql.startsWith('INSERT INTO weather_raw_data')) {
      tables.weather_raw_data.set(`${params[0]}|${params[1]}`, params);
      return { ...result([]), rowCount: 1 };
    }
    if (sql.startsWith('SELECT COUNT(*)')) {
      const dates = sortedDates(sql.includes('stock_raw_data') ? tables.stock_raw_data : tables.weather_raw_data);
      return result([
        {
          total_count: String(dates.length),
          earliest_date: dates[0] ?? null,
          latest_date: dates[dates.length - 1] ?? null,
        },
      ]);
    }
    if (sql.startsWith('SELECT "date", close_price, volume')) {
      const latest = sortedDates(tables.stock_raw_data).pop();
      const row = latest === undefined ? undefined : tables.stock_raw_data.get(latest);
      return result(row ? [{ date: row[0], close_price: String(row[4]), volume: String(row[6]) }] : []);
    }
    throw new Error(`Unexpected statement: ${sql}`);
  };

  return Object.assign(new EventEmitter(), {
    connect: jest.fn(async () => undefined),
    query: jest.fn(execute),
    end: jest.fn(async () => undefined),
  });
};

/**
 * Tables shared by every service created from the same instance
 */
export const createFakeDatabase = () => {
  const tables: FakeTables = { stock_raw_data: new Map(), weather_raw_data: new Map() };
  const clients: Array<ReturnType<typeof fakePgClient>> = [];
  return {
    tables,
    /** Every client handed out, most recent last */
    clients,
    createService: (config: DatabaseConfig = TEST_DB_CONFIG) =>
      new DatabaseService(config, () => {
        const client = fakePgClient(tables);
        clients.push(client);
        return client as unknown as Client;
      }),
  };
};

export const silenceLogs = (): void => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
};
