import axios, { AxiosInstance, AxiosRequestConfig, AxiosError } from 'axios';
import https from 'https';
import { createLogger } from '../core/Logger';
import type { HttpClientConfig, ApiErrorDetail } from '../types/http.types';

const logger = createLogger('HTTP');

/**
 * Create an HTTP client with request logging.
 * No retries: a request has to finish inside its polling slot.
 */
export function createHttpClient(config: HttpClientConfig): AxiosInstance {
  const axiosConfig: AxiosRequestConfig = {
    baseURL: config.baseURL,
    timeout: config.timeout ?? 30000,
    headers: {
      Accept: 'application/json',
      ...(config.headers ?? {}),
    },
  };

  if (config.verifySsl === false) {
    axiosConfig.httpsAgent = new https.Agent({
      rejectUnauthorized: false,
    });
  }

  const client = axios.create(axiosConfig);
  addLoggingInterceptor(client);

  return client;
}

/**
 * Add request/response logging interceptor
 */
function addLoggingInterceptor(client: AxiosInstance): void {
  client.interceptors.request.use((config) => {
    logger.debug(`${config.method?.toUpperCase()} ${config.baseURL ?? ''}${config.url ?? ''}`);
    return config;
  });

  client.interceptors.response.use(
    (response) => {
      logger.debug(
        `${response.config.method?.toUpperCase()} ${response.config.url} - ${response.status}`
      );
      return response;
    },
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        const status = error.response ? String(error.response.status) : 'No response';
        logger.debug(`${error.config?.method?.toUpperCase()} ${error.config?.url} - ${status}`);
      }
      return Promise.reject(error);
    }
  );
}

/**
 * Format a request failure for logging. `url` is the full target URL.
 */
export function formatHttpError(error: unknown, url: string): string {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  const axiosError: AxiosError = error;

  if (axiosError.response) {
    const { status, statusText } = axiosError.response;
    return `[HTTP ${status}] Error executing request to ${url}: ${statusText || axiosError.message}`;
  }

  if (isTimeoutError(axiosError)) {
    return `Timeout connecting to ${url}: ${axiosError.message}`;
  }

  if (axiosError.request) {
    return `Error connecting to ${url}: ${axiosError.code || axiosError.message}`;
  }

  return `Unexpected error while sending request to ${url}: ${axiosError.message}`;
}

function isTimeoutError(error: AxiosError): boolean {
  return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
}

/**
 * Check if an error is a client error (4xx)
 */
export function isClientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status !== undefined && status >= 400 && status < 500;
}

/**
 * Pull the `{ error: { key, message, hint } }` body out of a failed response
 */
export function extractApiError(error: unknown): ApiErrorDetail | undefined {
  if (!axios.isAxiosError(error)) {
    return undefined;
  }

  const data: unknown = error.response?.data;
  if (!isRecord(data) || !isRecord(data.error)) {
    return undefined;
  }

  const { key, message, hint } = data.error;
  if (typeof key !== 'string' || typeof message !== 'string') {
    return undefined;
  }

  return typeof hint === 'string' ? { key, message, hint } : { key, message };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
