import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { ProviderApiConfig } from '../config/providers';
import { FetchError } from './errors/app-error';
import { logger } from './logger';

/**
 * The slice of an Axios instance the fetchers need
 */
export type HttpClient = Pick<AxiosInstance, 'get'>;

export function createHttpClient(config: ProviderApiConfig): HttpClient {
  return axios.create({
    baseURL: config.baseURL,
    headers: {
      Accept: 'application/json',
    },
    timeout: config.timeout,
  });
}

/**
 * Pulls a human-readable notice out of a provider error body, if it has one
 */
export function extractProviderMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    return body.trim() || undefined;
  }
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  for (const key of ['reason', 'Error Message', 'Note', 'Information', 'message']) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Issues a single GET and returns the decoded body. There is no retry: a non-2xx status
 * or a transport failure becomes a FetchError for `provider`.
 */
export async function getJson(
  client: HttpClient,
  provider: string,
  url: string,
  config: AxiosRequestConfig
): Promise<unknown> {
  const start = Date.now();
  try {
    const response = await client.get<unknown>(url, config);
    logger.debug('provider_response', { provider, url, status: response.status, duration: Date.now() - start });
    return response.data;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const message = extractProviderMessage(error.response?.data) ?? error.message;
      logger.error('provider_request_failed', { provider, url, status, error: message });
      throw new FetchError(provider, message, status, error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.error('provider_request_failed', { provider, url, error: message });
    throw new FetchError(provider, message, undefined, error);
  }
}
