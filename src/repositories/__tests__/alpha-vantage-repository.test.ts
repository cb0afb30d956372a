import { AlphaVantageRepository } from '../alpha-vantage-repository';
import { FetchError } from '../../utils/errors/app-error';
import {
  TEST_PROVIDER_CONFIG,
  alphaVantagePayload,
  axiosHttpError,
  httpResponse,
  silenceLogs,
} from '../../__tests__/fixtures';

describe('AlphaVantageRepository', () => {
  let get: jest.Mock;
  let repo: AlphaVantageRepository;

  beforeEach(() => {
    silenceLogs();
    get = jest.fn();
    repo = new AlphaVantageRepository(TEST_PROVIDER_CONFIG, { get });
  });

  describe('fetchDailyAdjusted', () => {
    it('should return the daily series keyed by date', async () => {
      get.mockResolvedValueOnce(httpResponse(alphaVantagePayload()));

      const series = await repo.fetchDailyAdjusted('WMT');

      expect(Object.keys(series)).toEqual(['2024-03-01', '2024-02-29']);
      expect(get).toHaveBeenCalledTimes(1);
      expect(get).toHaveBeenCalledWith('/query', {
        params: {
          function: 'TIME_SERIES_DAILY_ADJUSTED',
          symbol: 'WMT',
          outputsize: 'compact',
          datatype: 'json',
          apikey: 'test-api-key',
        },
      });
    });

    it('should pass the requested output size', async () => {
      get.mockResolvedValueOnce(httpResponse(alphaVantagePayload()));

      await repo.fetchDailyAdjusted('WMT', 'full');

      expect(get.mock.calls[0][1].params.outputsize).toBe('full');
    });

    it('should fail on a rate limit notice', async () => {
      get.mockResolvedValueOnce(httpResponse({ Note: 'Thank you for using Alpha Vantage! Call frequency exceeded.' }));

      await expect(repo.fetchDailyAdjusted('WMT')).rejects.toThrow(
        'AlphaVantage: API note (likely rate limited): Thank you for using Alpha Vantage! Call frequency exceeded.'
      );
    });

    it('should fail on an error message', async () => {
      get.mockResolvedValueOnce(httpResponse({ 'Error Message': 'Invalid API call.' }));

      await expect(repo.fetchDailyAdjusted('NOPE')).rejects.toThrow('AlphaVantage: API error: Invalid API call.');
    });

    it('should fail on an information notice', async () => {
      get.mockResolvedValueOnce(httpResponse({ Information: 'Premium endpoint.' }));

      await expect(repo.fetchDailyAdjusted('WMT')).rejects.toThrow('AlphaVantage: API information: Premium endpoint.');
    });

    it('should fail when the series is missing', async () => {
      get.mockResolvedValueOnce(httpResponse({ 'Meta Data': {} }));

      await expect(repo.fetchDailyAdjusted('WMT')).rejects.toThrow(
        'AlphaVantage: No time series data found in API response'
      );
    });

    it('should fail when the body is not an object', async () => {
      get.mockResolvedValueOnce(httpResponse('<html>maintenance</html>'));

      await expect(repo.fetchDailyAdjusted('WMT')).rejects.toThrow('AlphaVantage: Unexpected response shape');
    });

    it('should surface the HTTP status without retrying', async () => {
      get.mockRejectedValueOnce(axiosHttpError(503, { message: 'Service Unavailable' }));

      const error = await repo.fetchDailyAdjusted('WMT').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({
        message: 'AlphaVantage: Service Unavailable',
        provider: 'AlphaVantage',
        status: 503,
        code: 'FETCH_ERROR',
      });
      expect(get).toHaveBeenCalledTimes(1);
    });

    it('should wrap a transport failure', async () => {
      get.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND provider.test'));

      await expect(repo.fetchDailyAdjusted('WMT')).rejects.toThrow(
        'AlphaVantage: getaddrinfo ENOTFOUND provider.test'
      );
    });
  });
});
