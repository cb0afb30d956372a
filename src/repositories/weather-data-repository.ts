import { DatabaseService } from '../config/database';
import { WEATHER_TABLE } from '../db/schema';
import { TableSummary } from '../types/models/ingestion';
import { WeatherRecord } from '../types/models/weather';
import { logger } from '../utils/logger';
import { summarizeTable } from './table-summary';

const UPSERT_WEATHER_SQL = `
  INSERT INTO ${WEATHER_TABLE}
    ("date", city, temperature_avg, temperature_min, temperature_max, humidity,
     pressure, wind_speed, weather_condition, weather_description, visibility, uv_index)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
  ON CONFLICT ("date", city) DO UPDATE SET
    temperature_avg = EXCLUDED.temperature_avg,
    temperature_min = EXCLUDED.temperature_min,
    temperature_max = EXCLUDED.temperature_max,
    humidity = EXCLUDED.humidity,
    pressure = EXCLUDED.pressure,
    wind_speed = EXCLUDED.wind_speed,
    weather_condition = EXCLUDED.weather_condition,
    weather_description = EXCLUDED.weather_description,
    visibility = EXCLUDED.visibility,
    uv_index = EXCLUDED.uv_index,
    ingested_at = NOW()`;

/**
 * Repository for weather_raw_data, keyed by (date, city)
 */
export class WeatherDataRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Upserts every record inside one transaction. Nothing is kept if any statement fails.
   */
  async upsertMany(records: WeatherRecord[]): Promise<number> {
    const count = await this.db.transaction(WEATHER_TABLE, async (tx) => {
      let upserted = 0;
      for (const record of records) {
        await tx.query(UPSERT_WEATHER_SQL, [
          record.date,
          record.city,
          record.temperature_avg,
          record.temperature_min,
          record.temperature_max,
          record.humidity,
          record.pressure,
          record.wind_speed,
          record.weather_condition,
          record.weather_description,
          record.visibility,
          record.uv_index,
        ]);
        upserted++;
      }
      return upserted;
    });

    logger.info('weather_records_upserted', { table: WEATHER_TABLE, count });
    return count;
  }

  async summarize(): Promise<TableSummary> {
    return summarizeTable(this.db, WEATHER_TABLE);
  }
}
