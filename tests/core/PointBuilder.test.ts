import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  PointBuilder,
  encodeTopList,
  decodeTopList,
  encodeTopClients,
  encodeTopDomains,
  encodeUpstreams,
  hostnameOf,
} from '../../src/core/PointBuilder';
import type { StatsSnapshot } from '../../src/types/stats.types';
import type { SummaryStats } from '../../src/types/pihole.types';

// Mock the logger
const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('../../src/core/Logger', () => ({
  createLogger: () => mockLogger,
}));

const NOW = 1700000000;

const summary: SummaryStats = {
  queries: {
    total: 1000,
    blocked: 250,
    percent_blocked: 25,
    unique_domains: 300,
    forwarded: 600,
    cached: 150,
    frequency: 1.5,
    types: { A: 700, AAAA: 300 },
    status: { GRAVITY: 250, FORWARDED: 600 },
    replies: { IP: 800, NXDOMAIN: 20 },
  },
  clients: { active: 4, total: 9 },
  gravity: { domains_being_blocked: 120000, last_update: 1699990000 },
};

function measurements(snapshot: StatsSnapshot): string[] {
  return new PointBuilder('pi1', 'http://pi.hole:80').build(snapshot, NOW).map((p) => p.measurement);
}

describe('PointBuilder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('encodeTopList', () => {
    it('should join values with | and entries with ,', () => {
      expect(encodeTopList([['a', 1], ['b', 2]])).toBe('a|1,b|2');
    });

    it('should encode null and undefined as None', () => {
      expect(encodeTopList([['10.0.0.9', null, 3], ['x', undefined]])).toBe('10.0.0.9|None|3,x|None');
    });

    it('should return an empty string for an empty list', () => {
      expect(encodeTopList([])).toBe('');
    });
  });

  describe('decodeTopList', () => {
    it('should return no entries for an empty string', () => {
      expect(decodeTopList('')).toEqual([]);
    });

    it('should recover the entries of an encoded client list', () => {
      const encoded = encodeTopClients([
        { ip: '10.0.0.2', name: 'host2', count: 5 },
        { ip: '10.0.0.3', name: null, count: 2 },
      ]);
      expect(decodeTopList(encoded)).toEqual([
        ['10.0.0.2', 'host2', '5'],
        ['10.0.0.3', 'None', '2'],
      ]);
    });
  });

  describe('encoders', () => {
    it('should encode top clients as ip|name|count', () => {
      expect(
        encodeTopClients([
          { ip: '10.0.0.2', name: 'host2', count: 5 },
          { ip: '10.0.0.3', name: 'host3', count: 2 },
        ])
      ).toBe('10.0.0.2|host2|5,10.0.0.3|host3|2');
    });

    it('should encode top domains as domain|count', () => {
      expect(
        encodeTopDomains([
          { domain: 'example.com', count: 42 },
          { domain: 'example.org', count: 7 },
        ])
      ).toBe('example.com|42,example.org|7');
    });

    it('should encode upstreams with their response statistics', () => {
      expect(
        encodeUpstreams([
          {
            ip: '1.1.1.1',
            name: 'one.one.one.one',
            port: 53,
            count: 100,
            statistics: { response: 0.012, variance: 0.001 },
          },
          { ip: null, name: 'cache', port: -1, count: 40, statistics: { response: 0, variance: 0 } },
        ])
      ).toBe('1.1.1.1|one.one.one.one|53|100|0.012|0.001,None|cache|-1|40|0|0');
    });
  });

  describe('hostnameOf', () => {
    it('should return the host of a URL', () => {
      expect(hostnameOf('http://192.168.1.2:8080')).toBe('192.168.1.2');
    });

    it('should strip IPv6 brackets', () => {
      expect(hostnameOf('http://[fd00::1]:80')).toBe('fd00::1');
    });

    it('should fall back to the raw address', () => {
      expect(hostnameOf('not a url')).toBe('not a url');
    });
  });

  describe('build', () => {
    it('should tag every point with alias and hostname', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole:80').build({ summary }, NOW);
      expect(points.length).toBeGreaterThan(0);
      for (const point of points) {
        expect(point.tags).toEqual({ alias: 'pi1', hostname: 'pi.hole' });
      }
    });

    it('should split the summary into its measurements', () => {
      expect(measurements({ summary })).toEqual([
        'gravity',
        'clients',
        'query_replies',
        'query_statuses',
        'query_types',
        'queries',
      ]);
    });

    it('should write percent_blocked and frequency as floats and the rest as uints', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build({ summary }, NOW);
      const queries = points.find((p) => p.measurement === 'queries');
      expect(queries?.fields).toEqual({
        total: { type: 'uint', value: 1000 },
        blocked: { type: 'uint', value: 250 },
        percent_blocked: { type: 'float', value: 25 },
        unique_domains: { type: 'uint', value: 300 },
        forwarded: { type: 'uint', value: 600 },
        cached: { type: 'uint', value: 150 },
        frequency: { type: 'float', value: 1.5 },
      });
    });

    it('should write nested query groups as uint fields', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build({ summary }, NOW);
      const replies = points.find((p) => p.measurement === 'query_replies');
      expect(replies?.fields).toEqual({
        IP: { type: 'uint', value: 800 },
        NXDOMAIN: { type: 'uint', value: 20 },
      });
    });

    it('should floor the current time for non-history points', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build({ summary }, NOW + 0.75);
      expect(points.every((p) => p.timestamp === NOW)).toBe(true);
    });

    it('should store top clients as one string field', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build(
        {
          topClients: {
            clients: [
              { ip: '10.0.0.2', name: 'host2', count: 5 },
              { ip: '10.0.0.3', name: 'host3', count: 2 },
            ],
          },
        },
        NOW
      );
      expect(points).toEqual([
        {
          measurement: 'top_clients',
          tags: { alias: 'pi1', hostname: 'pi.hole' },
          fields: { top_clients: { type: 'string', value: '10.0.0.2|host2|5,10.0.0.3|host3|2' } },
          timestamp: NOW,
        },
      ]);
    });

    it('should keep permitted and blocked domains apart', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build(
        {
          topPermittedDomains: { domains: [{ domain: 'example.com', count: 3 }] },
          topBlockedDomains: { domains: [{ domain: 'ads.example.net', count: 9 }] },
        },
        NOW
      );
      expect(points.map((p) => [p.measurement, p.fields])).toEqual([
        ['top_permitted_domains', { top_permitted_domains: { type: 'string', value: 'example.com|3' } }],
        ['top_blocked_domains', { top_blocked_domains: { type: 'string', value: 'ads.example.net|9' } }],
      ]);
    });

    it('should write an empty top list as an empty string', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build({ topClients: { clients: [] } }, NOW);
      expect(points[0].fields).toEqual({ top_clients: { type: 'string', value: '' } });
    });

    it('should write one history point per bucket at its own timestamp', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build(
        {
          history: {
            history: [
              { timestamp: 1699999400.5, total: 10, blocked: 2 },
              { timestamp: 1700000000, total: 12, blocked: 3 },
            ],
          },
        },
        NOW + 500
      );
      expect(points.map((p) => [p.measurement, p.timestamp, p.fields])).toEqual([
        ['history', 1699999400, { total: { type: 'uint', value: 10 }, blocked: { type: 'uint', value: 2 } }],
        ['history', 1700000000, { total: { type: 'uint', value: 12 }, blocked: { type: 'uint', value: 3 } }],
      ]);
    });

    it('should write a missing blocking timer as -1', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build(
        { blocking: { blocking: 'enabled', timer: null } },
        NOW
      );
      expect(points[0]).toEqual({
        measurement: 'blocking',
        tags: { alias: 'pi1', hostname: 'pi.hole' },
        fields: {
          blocking: { type: 'string', value: 'enabled' },
          timer: { type: 'int', value: -1 },
        },
        timestamp: NOW,
      });
    });

    it('should truncate a fractional blocking timer', () => {
      const points = new PointBuilder('pi1', 'http://pi.hole').build(
        { blocking: { blocking: 'disabled', timer: 29.8 } },
        NOW
      );
      expect(points[0].fields.timer).toEqual({ type: 'int', value: 29 });
    });

    it('should produce only the categories present in the snapshot', () => {
      expect(measurements({ blocking: { blocking: 'enabled', timer: null } })).toEqual(['blocking']);
      expect(measurements({})).toEqual([]);
    });

    it('should skip measurements with no numeric fields', () => {
      const sparse: SummaryStats = {
        ...summary,
        clients: {},
        queries: { ...summary.queries, replies: {} },
      };
      const names = measurements({ summary: sparse });
      expect(names).not.toContain('clients');
      expect(names).not.toContain('query_replies');
      expect(names).toContain('gravity');
    });

    it('should drop a negative count and keep the rest of the snapshot', () => {
      const broken: SummaryStats = {
        ...summary,
        gravity: { domains_being_blocked: -2, last_update: 1699990000 },
      };
      const points = new PointBuilder('pi1', 'http://pi.hole').build(
        { summary: broken, blocking: { blocking: 'enabled', timer: null } },
        NOW
      );

      expect(points.find((p) => p.measurement === 'gravity')?.fields).toEqual({
        last_update: { type: 'uint', value: 1699990000 },
      });
      expect(points.map((p) => p.measurement)).toEqual([
        'gravity',
        'clients',
        'query_replies',
        'query_statuses',
        'query_types',
        'queries',
        'blocking',
      ]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[pi1] Dropping gravity.domains_being_blocked: -2 is not a non-negative integer'
      );
    });

    it('should drop a fractional count but keep float query fields', () => {
      const odd: SummaryStats = {
        ...summary,
        queries: { ...summary.queries, cached: 2.5, percent_blocked: 12.75 },
      };
      const points = new PointBuilder('pi1', 'http://pi.hole').build({ summary: odd }, NOW);
      const queries = points.find((p) => p.measurement === 'queries');

      expect(queries?.fields.cached).toBeUndefined();
      expect(queries?.fields.percent_blocked).toEqual({ type: 'float', value: 12.75 });
    });

    it('should not modify the snapshot', () => {
      const snapshot: StatsSnapshot = {
        summary,
        history: { history: [{ timestamp: NOW, total: 1 }] },
      };
      const copy = JSON.parse(JSON.stringify(snapshot));
      new PointBuilder('pi1', 'http://pi.hole').build(snapshot, NOW);
      expect(snapshot).toEqual(copy);
    });
  });
});
