/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseURL: string;
  timeout?: number;
  verifySsl?: boolean;
  headers?: Record<string, string>;
}

/**
 * Structured error reported by the Pi-hole v6 API
 */
export interface ApiErrorDetail {
  key: string;
  message: string;
  hint?: string;
}
