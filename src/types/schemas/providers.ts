import { z } from 'zod';
import { isIsoDate } from '../../utils/dates';

export const isoDateSchema = z
  .string({
    required_error: 'Date is required',
    invalid_type_error: 'Date must be a string',
  })
  .refine(isIsoDate, 'Date must be a calendar date in YYYY-MM-DD format');

// Providers send numbers either as JSON numbers or as numeric strings
const numericInput = z.union([z.number(), z.string().trim().min(1, 'Value is empty')]);

export const decimalSchema = numericInput.pipe(z.coerce.number().finite());

export const integerSchema = numericInput.pipe(z.coerce.number().finite().int());

export const alphaVantageRowSchema = z.object({
  '1. open': decimalSchema,
  '2. high': decimalSchema,
  '3. low': decimalSchema,
  '4. close': decimalSchema,
  '5. adjusted close': decimalSchema,
  '6. volume': integerSchema,
  '7. dividend amount': decimalSchema,
  '8. split coefficient': decimalSchema,
});

/**
 * One day assembled from the Open-Meteo parallel arrays
 */
export const openMeteoDaySchema = z.object({
  date: isoDateSchema,
  temperature_avg: decimalSchema,
  temperature_min: decimalSchema,
  temperature_max: decimalSchema,
  precipitation: decimalSchema.nullish(),
  humidity: decimalSchema.nullish(),
  pressure: decimalSchema,
  wind_speed: decimalSchema,
  uv_index: decimalSchema.nullish(),
});

export type OpenMeteoDay = z.infer<typeof openMeteoDaySchema>;

/**
 * Top level of a TIME_SERIES_DAILY_ADJUSTED response. Notices (rate limits, bad keys)
 * arrive with HTTP 200 in place of the series.
 */
export const alphaVantageResponseSchema = z
  .object({
    'Meta Data': z.record(z.unknown()).optional(),
    'Time Series (Daily)': z.record(z.unknown()).optional(),
    'Error Message': z.string().optional(),
    Note: z.string().optional(),
    Information: z.string().optional(),
  })
  .passthrough();

export type AlphaVantageResponse = z.infer<typeof alphaVantageResponseSchema>;

const dailySeries = z.array(z.unknown()).optional();

export const openMeteoArchiveResponseSchema = z
  .object({
    error: z.boolean().optional(),
    reason: z.string().optional(),
    timezone: z.string().optional(),
    daily: z
      .object({
        time: z.array(z.unknown()),
        temperature_2m_mean: dailySeries,
        temperature_2m_min: dailySeries,
        temperature_2m_max: dailySeries,
        precipitation_sum: dailySeries,
        relative_humidity_2m_mean: dailySeries,
        pressure_msl_mean: dailySeries,
        wind_speed_10m_max: dailySeries,
        uv_index_max: dailySeries,
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type OpenMeteoArchiveResponse = z.infer<typeof openMeteoArchiveResponseSchema>;
