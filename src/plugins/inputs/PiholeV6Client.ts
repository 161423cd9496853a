import { BaseStatsClient } from './BaseStatsClient';
import type { AuthResult } from '../../types/stats.types';
import type {
  AuthResponse,
  SummaryStats,
  TopClientsStats,
  TopDomainsStats,
  UpstreamStats,
  HistoryStats,
  BlockingStats,
} from '../../types/pihole.types';

export const SESSION_HEADER = 'X-FTL-SID';

/**
 * Client for the Pi-hole FTL v6 REST API.
 * https://ftl.pi-hole.net/master/docs/
 */
export class PiholeV6Client extends BaseStatsClient {
  protected getBaseUrl(): string {
    return `${this.instance.address}/api`;
  }

  protected async login(secret: string): Promise<AuthResult> {
    const response = await this.httpPost<AuthResponse>('/auth', { password: secret });
    if (!response) {
      return { ok: false, reason: 'login request failed' };
    }
    if (!response.session?.valid) {
      return { ok: false, reason: response.session?.message ?? 'session is not valid' };
    }
    return { ok: true, sessionToken: response.session.sid };
  }

  fetchSummary(): Promise<SummaryStats | undefined> {
    return this.get<SummaryStats>('/stats/summary');
  }

  fetchTopClients(count: number): Promise<TopClientsStats | undefined> {
    return this.get<TopClientsStats>('/stats/top_clients', { count });
  }

  fetchTopDomains(count: number, blocked: boolean): Promise<TopDomainsStats | undefined> {
    return this.get<TopDomainsStats>('/stats/top_domains', { count, blocked });
  }

  fetchUpstreams(): Promise<UpstreamStats | undefined> {
    return this.get<UpstreamStats>('/stats/upstreams');
  }

  fetchHistory(): Promise<HistoryStats | undefined> {
    return this.get<HistoryStats>('/history');
  }

  fetchBlockingStatus(): Promise<BlockingStats | undefined> {
    return this.get<BlockingStats>('/dns/blocking');
  }

  private get<T>(path: string, params?: Record<string, number | boolean>): Promise<T | undefined> {
    const token = this.sessionToken();
    const headers = token ? { [SESSION_HEADER]: token } : undefined;
    return this.httpGet<T>(path, params, headers);
  }
}
