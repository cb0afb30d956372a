import dotenv from 'dotenv';
import { z } from 'zod';
import { DatabaseConfig } from './database';
import { DEFAULT_CITY, MAX_CITIES_PER_RUN, SUPPORTED_CITIES, findCity } from './cities';
import {
  DEFAULT_ALPHA_VANTAGE_URL,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_WEATHER_API_URL,
  ProviderApiConfig,
} from './providers';
import { StockOutputSize } from '../types/models/stock';
import { City, DateRange } from '../types/models/weather';
import { isoDateSchema } from '../types/schemas/providers';
import { ConfigError } from '../utils/errors/app-error';
import { formatZodError, summarizeZodError } from '../utils/errors/zod-error';
import { addDays, formatIsoDate } from '../utils/dates';
import { LOG_LEVELS, LogLevel } from '../utils/logger';

export interface IngestionSettings {
  symbol: string;
  outputSize: StockOutputSize;
  windowDays?: number;
  cities: City[];
  weatherRange: DateRange;
}

export interface AppConfig {
  alphaVantage: ProviderApiConfig;
  weatherApi: ProviderApiConfig;
  database: DatabaseConfig;
  ingestion: IngestionSettings;
  logLevel: LogLevel;
}

const requiredString = (name: string) =>
  z
    .string({
      required_error: `${name} is required`,
      invalid_type_error: `${name} must be a string`,
    })
    .trim()
    .min(1, `${name} is required`);

const positiveInteger = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be a positive integer`)
    .transform(Number)
    .pipe(z.number().int().positive(`${name} must be a positive integer`));

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform(value => value === 'true' || value === '1');

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .default('info')
  .refine((value): value is LogLevel => LOG_LEVELS.some(level => level === value), {
    message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`,
  });

export const environmentSchema = z.object({
  ALPHA_VANTAGE_API_KEY: requiredString('ALPHA_VANTAGE_API_KEY'),
  WEATHER_API_KEY: requiredString('WEATHER_API_KEY'),
  ALPHA_VANTAGE_URL: z.string().url().default(DEFAULT_ALPHA_VANTAGE_URL),
  WEATHER_API_URL: z.string().url().default(DEFAULT_WEATHER_API_URL),
  HTTP_TIMEOUT_MS: positiveInteger('HTTP_TIMEOUT_MS').default(String(DEFAULT_HTTP_TIMEOUT_MS)),

  DB_HOST: z.string().trim().min(1).default('localhost'),
  DB_PORT: positiveInteger('DB_PORT')
    .default('5432')
    .pipe(z.number().max(65535, 'DB_PORT must be at most 65535')),
  DB_NAME: z.string().trim().min(1).default('market_weather_db'),
  DB_USER: z.string().trim().min(1).default('postgres'),
  DB_PASSWORD: requiredString('DB_PASSWORD'),
  DB_SSL: booleanFlag('false'),
  DB_ENSURE_SCHEMA: booleanFlag('true'),

  STOCK_SYMBOL: z
    .string()
    .trim()
    .toUpperCase()
    .regex(/^[A-Z][A-Z0-9.\-]{0,9}$/, 'STOCK_SYMBOL must be a ticker such as WMT')
    .default('WMT'),
  STOCK_OUTPUT_SIZE: z.enum(['compact', 'full']).default('compact'),
  STOCK_WINDOW_DAYS: positiveInteger('STOCK_WINDOW_DAYS').optional(),

  WEATHER_CITIES: z.string().default(DEFAULT_CITY),
  WEATHER_START_DATE: isoDateSchema.optional(),
  WEATHER_END_DATE: isoDateSchema.optional(),
  WEATHER_LOOKBACK_DAYS: positiveInteger('WEATHER_LOOKBACK_DAYS').default('100'),

  LOG_LEVEL: logLevelSchema,
});

export type Environment = z.infer<typeof environmentSchema>;

function resolveCities(list: string): City[] {
  const names = list
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);

  if (names.length === 0 || names.length > MAX_CITIES_PER_RUN) {
    throw new ConfigError(`WEATHER_CITIES must name 1 to ${MAX_CITIES_PER_RUN} cities`, { cities: names });
  }

  return names.map(name => {
    const city = findCity(name);
    if (!city) {
      throw new ConfigError(`Unsupported city in WEATHER_CITIES: ${name}`, {
        supported: SUPPORTED_CITIES.map(c => c.name),
      });
    }
    return city;
  });
}

/**
 * Weather window: explicit dates when given, otherwise from `WEATHER_LOOKBACK_DAYS` days before
 * yesterday through yesterday, both ends inclusive.
 */
export function resolveWeatherRange(
  env: Pick<Environment, 'WEATHER_START_DATE' | 'WEATHER_END_DATE' | 'WEATHER_LOOKBACK_DAYS'>,
  today: Date
): DateRange {
  const endDate = env.WEATHER_END_DATE ?? addDays(formatIsoDate(today), -1);
  const startDate = env.WEATHER_START_DATE ?? addDays(endDate, -env.WEATHER_LOOKBACK_DAYS);

  if (startDate > endDate) {
    throw new ConfigError('WEATHER_START_DATE must not be after WEATHER_END_DATE', { startDate, endDate });
  }

  return { startDate, endDate };
}

/**
 * Reads `.env` into process.env without overriding variables already set.
 */
export function loadDotEnv(): void {
  dotenv.config();
}

/**
 * Validates the environment and builds the run configuration.
 * @throws ConfigError listing every missing or malformed variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, today: Date = new Date()): AppConfig {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${summarizeZodError(parsed.error)}`, {
      validationErrors: formatZodError(parsed.error),
    });
  }

  const vars = parsed.data;
  return {
    alphaVantage: {
      baseURL: vars.ALPHA_VANTAGE_URL,
      apiKey: vars.ALPHA_VANTAGE_API_KEY,
      timeout: vars.HTTP_TIMEOUT_MS,
    },
    weatherApi: {
      baseURL: vars.WEATHER_API_URL,
      apiKey: vars.WEATHER_API_KEY,
      timeout: vars.HTTP_TIMEOUT_MS,
    },
    database: {
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      database: vars.DB_NAME,
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
      ssl: vars.DB_SSL,
      ensureSchema: vars.DB_ENSURE_SCHEMA,
    },
    ingestion: {
      symbol: vars.STOCK_SYMBOL,
      outputSize: vars.STOCK_OUTPUT_SIZE,
      windowDays: vars.STOCK_WINDOW_DAYS,
      cities: resolveCities(vars.WEATHER_CITIES),
      weatherRange: resolveWeatherRange(vars, today),
    },
    logLevel: vars.LOG_LEVEL,
  };
}
