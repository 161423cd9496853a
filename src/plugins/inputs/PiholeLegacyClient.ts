import { BaseStatsClient } from './BaseStatsClient';
import type { QueryParams } from './BaseStatsClient';
import type { AuthResult } from '../../types/stats.types';
import type {
  SummaryStats,
  TopClient,
  TopClientsStats,
  TopDomainsStats,
  UpstreamStats,
  HistoryBucket,
  HistoryStats,
  BlockingStats,
  LegacySummaryRaw,
  LegacyTopItems,
  LegacyQuerySources,
  LegacyOverTimeData,
  LegacyStatus,
} from '../../types/pihole.types';

const REPLY_PREFIX = 'reply_';

/**
 * Client for the pre-v6 PHP API (`/admin/api.php`).
 * The API token travels in the `auth` query parameter; there is no session
 * exchange, so `authenticate` only stores the token.
 */
export class PiholeLegacyClient extends BaseStatsClient {
  /** Pending topItems requests by count, shared by the permitted and blocked lookups */
  private readonly pendingTopItems = new Map<number, Promise<LegacyTopItems | undefined>>();

  protected getBaseUrl(): string {
    return `${this.instance.address}/admin/api.php`;
  }

  protected async login(secret: string): Promise<AuthResult> {
    return { ok: true, sessionToken: secret };
  }

  async fetchSummary(): Promise<SummaryStats | undefined> {
    const raw = await this.get<LegacySummaryRaw>({ summaryRaw: '' });
    if (!raw || typeof raw.dns_queries_today !== 'number') {
      return undefined;
    }
    return toSummary(raw);
  }

  async fetchTopClients(count: number): Promise<TopClientsStats | undefined> {
    const raw = await this.get<LegacyQuerySources>({ getQuerySources: count });
    if (!raw?.top_sources) {
      return undefined;
    }
    return {
      clients: Object.entries(raw.top_sources).map(([source, hits]) => toTopClient(source, hits)),
    };
  }

  async fetchTopDomains(count: number, blocked: boolean): Promise<TopDomainsStats | undefined> {
    const raw = await this.topItems(count);
    const items = blocked ? raw?.top_ads : raw?.top_queries;
    if (!items) {
      return undefined;
    }
    return {
      domains: Object.entries(items).map(([domain, hits]) => ({ domain, count: hits })),
    };
  }

  /**
   * The PHP API only reports forward destinations as percentages, without
   * ports or response times, so there is nothing to map.
   */
  async fetchUpstreams(): Promise<UpstreamStats | undefined> {
    return undefined;
  }

  async fetchHistory(): Promise<HistoryStats | undefined> {
    const raw = await this.get<LegacyOverTimeData>({ overTimeData10mins: '' });
    if (!raw?.domains_over_time) {
      return undefined;
    }

    const blocked = raw.ads_over_time ?? {};
    const history: HistoryBucket[] = Object.entries(raw.domains_over_time).map(
      ([timestamp, total]) => ({
        timestamp: Number(timestamp),
        total,
        blocked: blocked[timestamp] ?? 0,
      })
    );
    return { history };
  }

  async fetchBlockingStatus(): Promise<BlockingStats | undefined> {
    const raw = await this.get<LegacyStatus>({ status: '' });
    if (!raw?.status) {
      return undefined;
    }
    return { blocking: raw.status, timer: null };
  }

  private topItems(count: number): Promise<LegacyTopItems | undefined> {
    const pending = this.pendingTopItems.get(count);
    if (pending) {
      return pending;
    }
    const request = this.get<LegacyTopItems>({ topItems: count }).finally(() => {
      this.pendingTopItems.delete(count);
    });
    this.pendingTopItems.set(count, request);
    return request;
  }

  private get<T>(params: QueryParams): Promise<T | undefined> {
    const token = this.sessionToken();
    return this.httpGet<T>('', token ? { ...params, auth: token } : params);
  }
}

function toSummary(raw: LegacySummaryRaw): SummaryStats {
  const replies: Record<string, number> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(REPLY_PREFIX) && typeof value === 'number') {
      replies[key.slice(REPLY_PREFIX.length)] = value;
    }
  }

  const gravity: Record<string, number> = {
    domains_being_blocked: raw.domains_being_blocked,
  };
  if (raw.gravity_last_updated?.file_exists) {
    gravity.last_update = raw.gravity_last_updated.absolute;
  }

  return {
    gravity,
    clients: {
      active: raw.unique_clients,
      total: raw.clients_ever_seen,
    },
    queries: {
      total: raw.dns_queries_today,
      blocked: raw.ads_blocked_today,
      percent_blocked: raw.ads_percentage_today,
      unique_domains: raw.unique_domains,
      forwarded: raw.queries_forwarded,
      cached: raw.queries_cached,
      types: {},
      status: {},
      replies,
    },
  };
}

function toTopClient(source: string, count: number): TopClient {
  const separator = source.indexOf('|');
  if (separator === -1) {
    return { ip: source, name: null, count };
  }
  return { ip: source.slice(separator + 1), name: source.slice(0, separator), count };
}
