import { ALPHA_VANTAGE_FUNCTION, ALPHA_VANTAGE_PATH, ProviderApiConfig } from '../config/providers';
import { AlphaVantageTimeSeries, StockOutputSize } from '../types/models/stock';
import { alphaVantageResponseSchema } from '../types/schemas/providers';
import { FetchError } from '../utils/errors/app-error';
import { HttpClient, createHttpClient, getJson } from '../utils/http-client';
import { logger } from '../utils/logger';

export const ALPHA_VANTAGE_PROVIDER = 'AlphaVantage';

/**
 * Fetcher for the Alpha Vantage daily adjusted time series.
 *
 * One request per call and no retry. Alpha Vantage reports most failures
 * (unknown symbol, invalid key, rate limit) with HTTP 200 and a notice in
 * place of the series, so the body is checked before it is returned.
 *
 * @example
 * ```typescript
 * const repo = new AlphaVantageRepository({ baseURL, apiKey, timeout: 10000 });
 * const series = await repo.fetchDailyAdjusted('WMT');
 * ```
 */
export class AlphaVantageRepository {
  private readonly client: HttpClient;

  constructor(private readonly config: ProviderApiConfig, client?: HttpClient) {
    this.client = client ?? createHttpClient(config);
  }

  /**
   * Gets the daily adjusted series for one symbol
   * @returns Raw rows keyed by trading date
   * @throws FetchError on HTTP failure or a provider notice
   */
  async fetchDailyAdjusted(symbol: string, outputSize: StockOutputSize = 'compact'): Promise<AlphaVantageTimeSeries> {
    logger.info('alpha_vantage_fetch', { symbol, outputSize });

    const body = await getJson(this.client, ALPHA_VANTAGE_PROVIDER, ALPHA_VANTAGE_PATH, {
      params: {
        function: ALPHA_VANTAGE_FUNCTION,
        symbol,
        outputsize: outputSize,
        datatype: 'json',
        apikey: this.config.apiKey,
      },
    });

    const parsed = alphaVantageResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(ALPHA_VANTAGE_PROVIDER, 'Unexpected response shape');
    }

    const data = parsed.data;
    if (data['Error Message']) {
      throw new FetchError(ALPHA_VANTAGE_PROVIDER, `API error: ${data['Error Message']}`);
    }
    if (data.Note) {
      throw new FetchError(ALPHA_VANTAGE_PROVIDER, `API note (likely rate limited): ${data.Note}`);
    }
    if (data.Information) {
      throw new FetchError(ALPHA_VANTAGE_PROVIDER, `API information: ${data.Information}`);
    }

    const series = data['Time Series (Daily)'];
    if (!series) {
      throw new FetchError(ALPHA_VANTAGE_PROVIDER, 'No time series data found in API response');
    }

    logger.info('alpha_vantage_fetched', { symbol, tradingDays: Object.keys(series).length });
    return series;
  }
}
