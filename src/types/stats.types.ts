import type {
  SummaryStats,
  TopClientsStats,
  TopDomainsStats,
  UpstreamStats,
  HistoryStats,
  BlockingStats,
} from './pihole.types';

export type ApiVersion = 'v6' | 'legacy';

/**
 * One monitored Pi-hole as resolved from configuration
 */
export interface Instance {
  alias: string;
  address: string;
  credential?: string;
}

export type SessionState =
  | { status: 'unauthenticated' }
  | { status: 'authenticated'; token: string | null };

export type AuthResult =
  | { ok: true; sessionToken: string | null }
  | { ok: false; reason: string };

/**
 * Everything fetched from one instance during one polling cycle.
 * A missing category means the fetch failed or the API does not offer it.
 */
export interface StatsSnapshot {
  readonly summary?: SummaryStats;
  readonly topClients?: TopClientsStats;
  readonly topPermittedDomains?: TopDomainsStats;
  readonly topBlockedDomains?: TopDomainsStats;
  readonly upstreams?: UpstreamStats;
  readonly history?: HistoryStats;
  readonly blocking?: BlockingStats;
}

export interface StatsClient {
  readonly instance: Readonly<Pick<Instance, 'alias' | 'address'>>;
  readonly session: SessionState;
  /** Whether the instance was configured with a credential */
  readonly requiresAuth: boolean;
  authenticate(credential?: string): Promise<AuthResult>;
  fetchSummary(): Promise<SummaryStats | undefined>;
  fetchTopClients(count: number): Promise<TopClientsStats | undefined>;
  fetchTopDomains(count: number, blocked: boolean): Promise<TopDomainsStats | undefined>;
  fetchUpstreams(): Promise<UpstreamStats | undefined>;
  fetchHistory(): Promise<HistoryStats | undefined>;
  fetchBlockingStatus(): Promise<BlockingStats | undefined>;
}

export interface StatsClientOptions {
  requestTimeoutSeconds: number;
  verifySsl: boolean;
}
