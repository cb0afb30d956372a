import { FetchError } from '../errors/app-error';
import { extractProviderMessage, getJson } from '../http-client';
import { axiosHttpError, httpResponse, silenceLogs } from '../../__tests__/fixtures';

describe('http-client', () => {
  beforeEach(() => {
    silenceLogs();
  });

  describe('extractProviderMessage', () => {
    it('should read the known notice fields', () => {
      expect(extractProviderMessage({ error: true, reason: 'Parameter start_date is invalid' })).toBe(
        'Parameter start_date is invalid'
      );
      expect(extractProviderMessage({ 'Error Message': 'Invalid API call' })).toBe('Invalid API call');
      expect(extractProviderMessage({ message: 'Not found' })).toBe('Not found');
    });

    it('should use a plain text body', () => {
      expect(extractProviderMessage('  Bad Gateway \n')).toBe('Bad Gateway');
    });

    it('should return undefined when there is nothing to read', () => {
      expect(extractProviderMessage({ status: 'error' })).toBeUndefined();
      expect(extractProviderMessage(null)).toBeUndefined();
      expect(extractProviderMessage('')).toBeUndefined();
    });
  });

  describe('getJson', () => {
    it('should return the response body', async () => {
      const client = { get: jest.fn().mockResolvedValue(httpResponse({ ok: true })) };
      await expect(getJson(client, 'Test', '/path', { params: { a: 1 } })).resolves.toEqual({ ok: true });
      expect(client.get).toHaveBeenCalledWith('/path', { params: { a: 1 } });
    });

    it('should wrap HTTP errors with the provider message and status', async () => {
      const client = { get: jest.fn().mockRejectedValue(axiosHttpError(429, { message: 'Too many requests' })) };
      const request = getJson(client, 'Test', '/path', {});
      await expect(request).rejects.toBeInstanceOf(FetchError);
      await expect(request).rejects.toMatchObject({
        message: 'Test: Too many requests',
        provider: 'Test',
        status: 429,
      });
      expect(client.get).toHaveBeenCalledTimes(1);
    });

    it('should wrap transport failures without a status', async () => {
      const client = { get: jest.fn().mockRejectedValue(new Error('socket hang up')) };
      await expect(getJson(client, 'Test', '/path', {})).rejects.toMatchObject({
        message: 'Test: socket hang up',
        status: undefined,
      });
    });
  });
});
