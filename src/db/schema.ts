import { Queryable } from '../config/database';
import { logger } from '../utils/logger';

export const STOCK_TABLE = 'stock_raw_data';
export const WEATHER_TABLE = 'weather_raw_data';

/**
 * DDL for the raw tables. The UNIQUE constraints are what the upserts' ON CONFLICT targets rely on.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS ${STOCK_TABLE} (
    id SERIAL PRIMARY KEY,
    "date" DATE NOT NULL,
    open_price NUMERIC(12, 4) NOT NULL,
    high_price NUMERIC(12, 4) NOT NULL,
    low_price NUMERIC(12, 4) NOT NULL,
    close_price NUMERIC(12, 4) NOT NULL,
    adjusted_close NUMERIC(12, 4) NOT NULL,
    volume BIGINT NOT NULL,
    dividend_amount NUMERIC(12, 4) NOT NULL DEFAULT 0,
    split_coefficient NUMERIC(12, 4) NOT NULL DEFAULT 1,
    ingested_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT stock_raw_data_date_key UNIQUE ("date")
  )`,
  `CREATE TABLE IF NOT EXISTS ${WEATHER_TABLE} (
    id SERIAL PRIMARY KEY,
    "date" DATE NOT NULL,
    city VARCHAR(100) NOT NULL,
    temperature_avg NUMERIC(6, 2) NOT NULL,
    temperature_min NUMERIC(6, 2) NOT NULL,
    temperature_max NUMERIC(6, 2) NOT NULL,
    humidity INTEGER,
    pressure NUMERIC(7, 2) NOT NULL,
    wind_speed NUMERIC(6, 2) NOT NULL,
    weather_condition VARCHAR(20) NOT NULL,
    weather_description VARCHAR(255) NOT NULL,
    visibility NUMERIC(6, 2) NOT NULL,
    uv_index NUMERIC(4, 1) NOT NULL,
    ingested_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT weather_raw_data_date_city_key UNIQUE ("date", city)
  )`,
];

/**
 * Creates both raw tables when they do not exist yet
 */
export async function ensureSchema(db: Queryable): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.query(statement);
  }
  logger.info('schema_ready', { tables: [STOCK_TABLE, WEATHER_TABLE] });
}
