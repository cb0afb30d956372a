import { OPEN_METEO_ARCHIVE_PATH, OPEN_METEO_DAILY_VARIABLES, ProviderApiConfig } from '../config/providers';
import { City, DateRange, OpenMeteoDaily } from '../types/models/weather';
import { openMeteoArchiveResponseSchema } from '../types/schemas/providers';
import { FetchError } from '../utils/errors/app-error';
import { HttpClient, createHttpClient, getJson } from '../utils/http-client';
import { logger } from '../utils/logger';

export const OPEN_METEO_PROVIDER = 'OpenMeteo';

/**
 * Fetcher for the Open-Meteo historical archive. Returns the `daily` block,
 * one array per variable aligned on `daily.time`.
 */
export class OpenMeteoRepository {
  private readonly client: HttpClient;

  constructor(private readonly config: ProviderApiConfig, client?: HttpClient) {
    this.client = client ?? createHttpClient(config);
  }

  async fetchDailyHistory(city: City, range: DateRange): Promise<OpenMeteoDaily> {
    logger.info('open_meteo_fetch', { city: city.name, ...range });

    const body = await getJson(this.client, OPEN_METEO_PROVIDER, OPEN_METEO_ARCHIVE_PATH, {
      params: {
        latitude: city.latitude,
        longitude: city.longitude,
        start_date: range.startDate,
        end_date: range.endDate,
        daily: OPEN_METEO_DAILY_VARIABLES.join(','),
        timezone: city.timezone,
        apikey: this.config.apiKey,
      },
    });

    const parsed = openMeteoArchiveResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(OPEN_METEO_PROVIDER, 'Unexpected response shape');
    }
    if (parsed.data.error) {
      throw new FetchError(OPEN_METEO_PROVIDER, parsed.data.reason ?? 'API reported an error');
    }

    const daily = parsed.data.daily;
    if (!daily) {
      throw new FetchError(OPEN_METEO_PROVIDER, `No daily data found for ${city.name}`);
    }

    logger.info('open_meteo_fetched', { city: city.name, days: daily.time.length });
    return daily;
  }
}
