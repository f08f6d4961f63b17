import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { RemoteApiError } from '../core/errors.js';
import { logger } from '../util/logger.js';

export interface HttpClientConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Authenticated JSON client for the Confluence REST API. Requests are not
 * retried: any failure surfaces as a RemoteApiError.
 */
export class HttpClient {
  private client: AxiosInstance;

  constructor(config: HttpClientConfig) {
    const auth = Buffer.from(`${config.username}:${config.password}`).toString('base64');

    this.client = axios.create({
      baseURL: config.baseUrl,
      headers: {
        'Authorization': `Basic ${auth}`,
        'Accept': 'application/json',
        'Content-Type': 'application/json'
      },
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS
    });

    this.client.interceptors.response.use(
      (response) => {
        logger.debug('HTTP response', {
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status
        });
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          logger.debug('HTTP error', {
            method: error.config?.method?.toUpperCase(),
            url: error.config?.url,
            status: error.response?.status,
            message: error.message
          });
        }
        return Promise.reject(error);
      }
    );
  }

  async get<T>(url: string, config?: AxiosRequestConfig): Promise<T> {
    return this.request<T>('GET', url, undefined, config);
  }

  async post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    return this.request<T>('POST', url, data, config);
  }

  private async request<T>(
    method: string,
    url: string,
    data?: unknown,
    config?: AxiosRequestConfig
  ): Promise<T> {
    try {
      const response: AxiosResponse<T> = await this.client.request<T>({
        method,
        url,
        data,
        ...config
      });
      return response.data;
    } catch (error) {
      throw toRemoteApiError(method, url, error);
    }
  }
}

export function toRemoteApiError(method: string, url: string, error: unknown): RemoteApiError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const message = status
      ? `${method} ${url} failed with status ${status}`
      : `${method} ${url} failed: ${error.message}`;
    return new RemoteApiError(message, { method, url, status, response: error.response?.data }, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new RemoteApiError(`${method} ${url} failed: ${reason}`, { method, url }, { cause: error });
}
