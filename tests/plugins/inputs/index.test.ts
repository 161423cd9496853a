import { describe, it, expect, vi } from 'vitest';
import { getStatsClientFactory, PiholeV6Client, PiholeLegacyClient } from '../../../src/plugins/inputs';

// Mock the logger
vi.mock('../../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe('Stats Clients Index', () => {
  describe('getStatsClientFactory', () => {
    const instance = { alias: 'pi1', address: 'http://10.0.0.1' };
    const options = { requestTimeoutSeconds: 5, verifySsl: true };

    it('should build a v6 client', () => {
      expect(getStatsClientFactory('v6')(instance, options)).toBeInstanceOf(PiholeV6Client);
    });

    it('should build a legacy client', () => {
      expect(getStatsClientFactory('legacy')(instance, options)).toBeInstanceOf(PiholeLegacyClient);
    });
  });
});
