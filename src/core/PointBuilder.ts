import { createLogger } from './Logger';
import type { DataPoint, FieldValue, PointTags } from '../types/point.types';
import type { StatsSnapshot } from '../types/stats.types';
import type {
  SummaryStats,
  TopClient,
  TopDomain,
  Upstream,
  HistoryStats,
  BlockingStats,
} from '../types/pihole.types';

const logger = createLogger('PointBuilder');

/** Written in place of a missing value inside a top-N entry */
export const MISSING_VALUE = 'None';

/** Separates entries of an encoded top-N list */
export const ENTRY_SEPARATOR = ',';
/** Separates the values inside one entry */
export const VALUE_SEPARATOR = '|';

/** Keys of the remaining `queries` summary written as floats */
const FLOAT_QUERY_FIELDS = new Set(['percent_blocked', 'frequency']);

/** Nested `queries` groups written as measurements of their own */
const QUERY_GROUPS = {
  replies: 'query_replies',
  status: 'query_statuses',
  types: 'query_types',
} as const;

type Scalar = string | number | null | undefined;

/**
 * Join top-N entries into a single string field value. Missing values are
 * written as `None`.
 *
 * Top lists are stored as one string rather than one field per entry: the set
 * of clients, domains and upstreams changes from cycle to cycle, and a
 * per-entry field would keep returning the last value of an entry that has
 * dropped off the list.
 */
export function encodeTopList(entries: readonly (readonly Scalar[])[]): string {
  return entries
    .map((values) => values.map((value) => (value ?? MISSING_VALUE).toString()).join(VALUE_SEPARATOR))
    .join(ENTRY_SEPARATOR);
}

/**
 * Split an encoded top-N list back into its entries
 */
export function decodeTopList(encoded: string): string[][] {
  if (encoded === '') {
    return [];
  }
  return encoded.split(ENTRY_SEPARATOR).map((entry) => entry.split(VALUE_SEPARATOR));
}

export function encodeTopClients(clients: readonly TopClient[]): string {
  return encodeTopList(clients.map((client) => [client.ip, client.name, client.count]));
}

export function encodeTopDomains(domains: readonly TopDomain[]): string {
  return encodeTopList(domains.map((domain) => [domain.domain, domain.count]));
}

export function encodeUpstreams(upstreams: readonly Upstream[]): string {
  return encodeTopList(
    upstreams.map((upstream) => [
      upstream.ip,
      upstream.name,
      upstream.port,
      upstream.count,
      upstream.statistics?.response,
      upstream.statistics?.variance,
    ])
  );
}

/**
 * Hostname part of an instance address, without IPv6 brackets
 */
export function hostnameOf(address: string): string {
  try {
    return new URL(address).hostname.replace(/^\[(.*)\]$/, '$1');
  } catch {
    return address;
  }
}

/**
 * Pure transformation of a polling snapshot into time-series points.
 * Reads never modify the snapshot.
 */
export class PointBuilder {
  private readonly tags: PointTags;

  constructor(alias: string, address: string) {
    this.tags = { alias, hostname: hostnameOf(address) };
  }

  /**
   * Build every point for one snapshot. `nowSeconds` is used for all points
   * except history buckets, which carry their own timestamps.
   */
  build(snapshot: StatsSnapshot, nowSeconds: number): DataPoint[] {
    const now = Math.floor(nowSeconds);
    const points: DataPoint[] = [];

    if (snapshot.summary) {
      points.push(...this.summaryPoints(snapshot.summary, now));
    }

    if (snapshot.topClients?.clients) {
      this.pushPoint(points, 'top_clients', now, {
        top_clients: { type: 'string', value: encodeTopClients(snapshot.topClients.clients) },
      });
    }

    if (snapshot.topPermittedDomains?.domains) {
      this.pushPoint(points, 'top_permitted_domains', now, {
        top_permitted_domains: {
          type: 'string',
          value: encodeTopDomains(snapshot.topPermittedDomains.domains),
        },
      });
    }

    if (snapshot.topBlockedDomains?.domains) {
      this.pushPoint(points, 'top_blocked_domains', now, {
        top_blocked_domains: {
          type: 'string',
          value: encodeTopDomains(snapshot.topBlockedDomains.domains),
        },
      });
    }

    if (snapshot.upstreams?.upstreams) {
      this.pushPoint(points, 'upstreams', now, {
        upstreams: { type: 'string', value: encodeUpstreams(snapshot.upstreams.upstreams) },
      });
    }

    if (snapshot.history?.history) {
      points.push(...this.historyPoints(snapshot.history));
    }

    if (snapshot.blocking) {
      points.push(this.blockingPoint(snapshot.blocking, now));
    }

    return points;
  }

  private summaryPoints(summary: SummaryStats, now: number): DataPoint[] {
    const points: DataPoint[] = [];

    this.pushPoint(points, 'gravity', now, this.uintFields('gravity', summary.gravity));
    this.pushPoint(points, 'clients', now, this.uintFields('clients', summary.clients));

    const queries: Record<string, unknown> = summary.queries ?? {};
    for (const [group, measurement] of Object.entries(QUERY_GROUPS)) {
      const values = queries[group];
      if (isRecord(values)) {
        this.pushPoint(points, measurement, now, this.uintFields(measurement, values));
      }
    }

    const remaining: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(queries)) {
      if (key in QUERY_GROUPS || typeof value !== 'number' || !Number.isFinite(value)) {
        continue;
      }
      if (FLOAT_QUERY_FIELDS.has(key)) {
        remaining[key] = { type: 'float', value };
      } else if (this.isCount('queries', key, value)) {
        remaining[key] = { type: 'uint', value };
      }
    }
    this.pushPoint(points, 'queries', now, remaining);

    return points;
  }

  private historyPoints(history: HistoryStats): DataPoint[] {
    const points: DataPoint[] = [];

    for (const bucket of history.history) {
      const { timestamp, ...values } = bucket;
      if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
        continue;
      }
      this.pushPoint(points, 'history', Math.floor(timestamp), this.uintFields('history', values));
    }

    return points;
  }

  private blockingPoint(blocking: BlockingStats, now: number): DataPoint {
    const timer = typeof blocking.timer === 'number' ? Math.trunc(blocking.timer) : -1;
    return {
      measurement: 'blocking',
      tags: { ...this.tags },
      fields: {
        blocking: { type: 'string', value: String(blocking.blocking) },
        timer: { type: 'int', value: timer },
      },
      timestamp: now,
    };
  }

  private uintFields(measurement: string, values: Record<string, unknown> | undefined): Record<string, FieldValue> {
    const fields: Record<string, FieldValue> = {};
    for (const [key, value] of Object.entries(values ?? {})) {
      if (typeof value === 'number' && Number.isFinite(value) && this.isCount(measurement, key, value)) {
        fields[key] = { type: 'uint', value };
      }
    }
    return fields;
  }

  /**
   * Whether a value fits an unsigned integer field. Rejected values are logged.
   */
  private isCount(measurement: string, key: string, value: number): boolean {
    if (Number.isInteger(value) && value >= 0) {
      return true;
    }
    logger.warn(`[${this.tags.alias}] Dropping ${measurement}.${key}: ${value} is not a non-negative integer`);
    return false;
  }

  /**
   * Append a point unless it would carry no fields
   */
  private pushPoint(
    points: DataPoint[],
    measurement: string,
    timestamp: number,
    fields: Record<string, FieldValue>
  ): void {
    if (Object.keys(fields).length === 0) {
      return;
    }
    points.push({ measurement, tags: { ...this.tags }, fields, timestamp });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
