import { WEATHER_PLACEHOLDERS } from '../config/providers';
import { WeatherCondition } from '../types/common/enums';
import { TransformSummary } from '../types/models/ingestion';
import { OpenMeteoDaily, WeatherRecord } from '../types/models/weather';
import { openMeteoDaySchema } from '../types/schemas/providers';
import { RecordError } from '../utils/errors/app-error';
import { formatZodError, summarizeZodError } from '../utils/errors/zod-error';
import { logger } from '../utils/logger';

export interface WeatherTransformResult {
  records: WeatherRecord[];
  errors: RecordError[];
  summary: TransformSummary;
}

export function deriveCondition(precipitation: number | null | undefined): WeatherCondition {
  return precipitation != null && precipitation > 0 ? WeatherCondition.PRECIPITATION : WeatherCondition.CLEAR;
}

export function describeWeather(precipitation: number | null | undefined): string {
  if (deriveCondition(precipitation) === WeatherCondition.CLEAR) {
    return 'No precipitation';
  }
  return `Precipitation: ${precipitation} mm`;
}

/**
 * Builds the record for index `index` of the parallel arrays.
 * @throws RecordError when the day is missing a required value or a value does not coerce
 */
export function transformWeatherDay(city: string, daily: OpenMeteoDaily, index: number): WeatherRecord {
  const rawDate = daily.time[index];
  const key = `${city}@${typeof rawDate === 'string' ? rawDate : `#${index}`}`;

  const day = openMeteoDaySchema.safeParse({
    date: rawDate,
    temperature_avg: daily.temperature_2m_mean?.[index],
    temperature_min: daily.temperature_2m_min?.[index],
    temperature_max: daily.temperature_2m_max?.[index],
    precipitation: daily.precipitation_sum?.[index],
    humidity: daily.relative_humidity_2m_mean?.[index],
    pressure: daily.pressure_msl_mean?.[index],
    wind_speed: daily.wind_speed_10m_max?.[index],
    uv_index: daily.uv_index_max?.[index],
  });

  if (!day.success) {
    throw new RecordError(key, summarizeZodError(day.error), {
      validationErrors: formatZodError(day.error),
    });
  }

  const { data } = day;
  return {
    date: data.date,
    city,
    temperature_avg: data.temperature_avg,
    temperature_min: data.temperature_min,
    temperature_max: data.temperature_max,
    humidity: data.humidity == null ? null : Math.round(data.humidity),
    pressure: data.pressure,
    wind_speed: data.wind_speed,
    weather_condition: deriveCondition(data.precipitation),
    weather_description: describeWeather(data.precipitation),
    visibility: WEATHER_PLACEHOLDERS.VISIBILITY_KM,
    uv_index: data.uv_index ?? WEATHER_PLACEHOLDERS.UV_INDEX,
  };
}

/**
 * Transforms one city's daily arrays, oldest first. Days that fail conversion are logged and skipped.
 */
export function transformWeatherData(city: string, daily: OpenMeteoDaily): WeatherTransformResult {
  const records: WeatherRecord[] = [];
  const errors: RecordError[] = [];

  for (let index = 0; index < daily.time.length; index++) {
    try {
      records.push(transformWeatherDay(city, daily, index));
    } catch (error) {
      if (!(error instanceof RecordError)) {
        throw error;
      }
      logger.warn('weather_record_skipped', { city, key: error.recordKey, reason: error.message });
      errors.push(error);
    }
  }

  records.sort((a, b) => a.date.localeCompare(b.date));

  // visibility is never in the archive's daily series; uv_index only when uv_index_max is absent
  const placeholderColumns = ['visibility'];
  if (!daily.uv_index_max) {
    placeholderColumns.push('uv_index');
  }
  logger.warn('weather_placeholder_columns', { city, columns: placeholderColumns });

  logger.info('weather_records_transformed', { city, accepted: records.length, skipped: errors.length });

  return {
    records,
    errors,
    summary: { accepted: records.length, skipped: errors.length },
  };
}
