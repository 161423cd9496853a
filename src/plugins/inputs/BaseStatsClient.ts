import type { AxiosInstance } from 'axios';
import type winston from 'winston';
import { createLogger } from '../../core/Logger';
import { createHttpClient, formatHttpError, isClientError, extractApiError } from '../../utils/http';
import type {
  AuthResult,
  Instance,
  SessionState,
  StatsClient,
  StatsClientOptions,
} from '../../types/stats.types';
import type {
  SummaryStats,
  TopClientsStats,
  TopDomainsStats,
  UpstreamStats,
  HistoryStats,
  BlockingStats,
} from '../../types/pihole.types';

export type QueryParams = Record<string, string | number | boolean>;

/**
 * Abstract base class for Pi-hole API clients.
 * Owns the HTTP client, the session state and the request error policy:
 * every failure is logged and turned into `undefined`.
 */
export abstract class BaseStatsClient implements StatsClient {
  readonly instance: Readonly<Pick<Instance, 'alias' | 'address'>>;
  readonly requiresAuth: boolean;

  protected httpClient: AxiosInstance;
  protected logger: winston.Logger;
  protected credential: string;
  private sessionState: SessionState = { status: 'unauthenticated' };

  constructor(instance: Instance, options: StatsClientOptions) {
    this.instance = { alias: instance.alias, address: instance.address.replace(/\/+$/, '') };
    this.credential = instance.credential ?? '';
    this.requiresAuth = this.credential !== '';
    this.logger = createLogger(`${this.constructor.name}:${instance.alias}`);
    this.httpClient = createHttpClient({
      baseURL: this.getBaseUrl(),
      timeout: options.requestTimeoutSeconds * 1000,
      verifySsl: options.verifySsl,
    });
  }

  get session(): SessionState {
    return this.sessionState;
  }

  /**
   * Authenticate with the given credential, or the configured one.
   * The plaintext credential is discarded whatever the outcome.
   */
  async authenticate(credential?: string): Promise<AuthResult> {
    const secret = credential ?? this.credential;
    this.credential = '';

    if (!secret) {
      return { ok: false, reason: 'no credential' };
    }

    const result = await this.login(secret);
    if (result.ok) {
      this.sessionState = { status: 'authenticated', token: result.sessionToken };
    } else {
      this.logger.error(`[${this.instance.alias}] Authentication failed: ${result.reason}`);
    }
    return result;
  }

  abstract fetchSummary(): Promise<SummaryStats | undefined>;
  abstract fetchTopClients(count: number): Promise<TopClientsStats | undefined>;
  abstract fetchTopDomains(count: number, blocked: boolean): Promise<TopDomainsStats | undefined>;
  abstract fetchUpstreams(): Promise<UpstreamStats | undefined>;
  abstract fetchHistory(): Promise<HistoryStats | undefined>;
  abstract fetchBlockingStatus(): Promise<BlockingStats | undefined>;

  /**
   * Root path of the API relative to the instance address
   */
  protected abstract getBaseUrl(): string;

  /**
   * Perform the API-specific login exchange
   */
  protected abstract login(secret: string): Promise<AuthResult>;

  /**
   * Session token to attach to a request, or null when none is held
   */
  protected sessionToken(): string | null {
    return this.sessionState.status === 'authenticated' ? this.sessionState.token : null;
  }

  /**
   * GET a resource. Returns undefined without a request when a session is
   * required but missing, and on any request failure.
   */
  protected async httpGet<T>(
    path: string,
    params?: QueryParams,
    headers?: Record<string, string>
  ): Promise<T | undefined> {
    if (this.requiresAuth && this.sessionState.status !== 'authenticated') {
      this.logger.debug(`[${this.instance.alias}] Not authenticated, skipping ${path}`);
      return undefined;
    }

    try {
      const response = await this.httpClient.get<T>(path, { params, headers });
      return response.data;
    } catch (error) {
      this.logRequestError(error, path);
      return undefined;
    }
  }

  /**
   * POST a JSON body. Failures are logged and returned as undefined.
   */
  protected async httpPost<T>(path: string, data: unknown): Promise<T | undefined> {
    try {
      const response = await this.httpClient.post<T>(path, data);
      return response.data;
    } catch (error) {
      this.logRequestError(error, path);
      return undefined;
    }
  }

  private logRequestError(error: unknown, path: string): void {
    const url = `${this.getBaseUrl()}${path}`;
    this.logger.error(`[${this.instance.alias}] ${formatHttpError(error, url)}`);

    if (isClientError(error)) {
      const detail = extractApiError(error);
      if (detail) {
        const hint = detail.hint ? `(Hint: ${detail.hint})` : '';
        this.logger.error(`[${this.instance.alias}] [${detail.key}] ${detail.message} ${hint}`.trimEnd());
      }
    }
  }
}
