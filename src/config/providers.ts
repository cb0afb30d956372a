/**
 * Connection settings shared by the two upstream APIs
 */
export interface ProviderApiConfig {
  /** Base URL for the API endpoint */
  baseURL: string;
  /** Static API key sent as a query parameter */
  apiKey: string;
  /** Request timeout in milliseconds */
  timeout: number;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

export const DEFAULT_ALPHA_VANTAGE_URL = 'https://www.alphavantage.co';

export const ALPHA_VANTAGE_PATH = '/query';

/**
 * Keyed archive endpoint; the free host (archive-api.open-meteo.com) serves the same contract.
 */
export const DEFAULT_WEATHER_API_URL = 'https://customer-archive-api.open-meteo.com';

export const OPEN_METEO_ARCHIVE_PATH = '/v1/archive';

export const ALPHA_VANTAGE_FUNCTION = 'TIME_SERIES_DAILY_ADJUSTED';

export const OPEN_METEO_DAILY_VARIABLES = [
  'temperature_2m_mean',
  'temperature_2m_min',
  'temperature_2m_max',
  'precipitation_sum',
  'relative_humidity_2m_mean',
  'pressure_msl_mean',
  'wind_speed_10m_max',
  'uv_index_max',
] as const;

/**
 * Placeholders for columns the archive's daily series does not supply.
 * `uv_index` falls back to this only for days with no `uv_index_max`.
 */
export const WEATHER_PLACEHOLDERS = {
  VISIBILITY_KM: 10,
  UV_INDEX: 5,
} as const;
