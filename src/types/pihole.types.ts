/**
 * Pi-hole API response types.
 * The FTL v6 shapes double as the normalised snapshot model; legacy responses
 * are converted into them by the legacy client.
 */

// =============================================================================
// FTL v6
// =============================================================================

export interface AuthResponse {
  session: {
    valid: boolean;
    totp?: boolean;
    sid: string | null;
    csrf?: string | null;
    validity?: number;
    message?: string | null;
  };
}

export interface SummaryQueries {
  total: number;
  blocked: number;
  percent_blocked: number;
  unique_domains: number;
  forwarded: number;
  cached: number;
  frequency?: number;
  types: Record<string, number>;
  status: Record<string, number>;
  replies: Record<string, number>;
  [key: string]: number | Record<string, number> | undefined;
}

export interface SummaryStats {
  queries: SummaryQueries;
  clients: Record<string, number>;
  gravity: Record<string, number>;
  took?: number;
}

export interface TopClient {
  ip: string;
  name: string | null;
  count: number;
}

export interface TopClientsStats {
  clients: TopClient[];
  total_queries?: number;
  blocked_queries?: number;
}

export interface TopDomain {
  domain: string;
  count: number;
}

export interface TopDomainsStats {
  domains: TopDomain[];
  total_queries?: number;
  blocked_queries?: number;
}

export interface Upstream {
  ip: string | null;
  name: string | null;
  port: number;
  count: number;
  statistics: {
    response: number;
    variance: number;
  };
}

export interface UpstreamStats {
  upstreams: Upstream[];
  forwarded_queries?: number;
  total_queries?: number;
}

export interface HistoryBucket {
  timestamp: number;
  [field: string]: number;
}

export interface HistoryStats {
  history: HistoryBucket[];
}

export type BlockingState = 'enabled' | 'disabled' | 'failed' | 'unknown';

export interface BlockingStats {
  blocking: BlockingState | string;
  timer: number | null;
}

// =============================================================================
// Legacy PHP API (admin/api.php)
// =============================================================================

export interface LegacySummaryRaw {
  domains_being_blocked: number;
  dns_queries_today: number;
  ads_blocked_today: number;
  ads_percentage_today: number;
  unique_domains: number;
  queries_forwarded: number;
  queries_cached: number;
  clients_ever_seen: number;
  unique_clients: number;
  dns_queries_all_types?: number;
  status?: string;
  gravity_last_updated?: {
    file_exists: boolean;
    absolute: number;
  };
  [key: string]: unknown;
}

export interface LegacyTopItems {
  top_queries: Record<string, number>;
  top_ads: Record<string, number>;
}

export interface LegacyQuerySources {
  /** Keys are `hostname|ip` or a bare `ip` */
  top_sources: Record<string, number>;
}

export interface LegacyOverTimeData {
  domains_over_time: Record<string, number>;
  ads_over_time: Record<string, number>;
}

export interface LegacyStatus {
  status: string;
}
