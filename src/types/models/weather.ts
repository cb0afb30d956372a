import { WeatherCondition } from '../common/enums';

/**
 * A city the ingestion knows coordinates for
 */
export interface City {
  name: string;
  latitude: number;
  longitude: number;
  timezone: string;
}

export interface DateRange {
  startDate: string;
  endDate: string;
}

/**
 * Daily block of the Open-Meteo archive response: one array per variable, aligned on `time`
 */
export interface OpenMeteoDaily {
  time: unknown[];
  temperature_2m_mean?: unknown[];
  temperature_2m_min?: unknown[];
  temperature_2m_max?: unknown[];
  precipitation_sum?: unknown[];
  relative_humidity_2m_mean?: unknown[];
  pressure_msl_mean?: unknown[];
  wind_speed_10m_max?: unknown[];
  uv_index_max?: unknown[];
}

/**
 * Row of weather_raw_data; (`date`, `city`) is the natural key
 */
export interface WeatherRecord {
  date: string;
  city: string;
  temperature_avg: number;
  temperature_min: number;
  temperature_max: number;
  humidity: number | null;
  pressure: number;
  wind_speed: number;
  weather_condition: WeatherCondition;
  weather_description: string;
  visibility: number;
  uv_index: number;
}
