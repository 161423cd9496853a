import { PiholeV6Client } from './PiholeV6Client';
import { PiholeLegacyClient } from './PiholeLegacyClient';
import type { ApiVersion, Instance, StatsClient, StatsClientOptions } from '../../types/stats.types';

export { BaseStatsClient } from './BaseStatsClient';
export { PiholeV6Client, SESSION_HEADER } from './PiholeV6Client';
export { PiholeLegacyClient } from './PiholeLegacyClient';

export type StatsClientFactory = (instance: Instance, options: StatsClientOptions) => StatsClient;

const clientFactories: Record<ApiVersion, StatsClientFactory> = {
  v6: (instance, options) => new PiholeV6Client(instance, options),
  legacy: (instance, options) => new PiholeLegacyClient(instance, options),
};

/**
 * Look up the client constructor for a Pi-hole API generation
 */
export function getStatsClientFactory(apiVersion: ApiVersion): StatsClientFactory {
  return clientFactories[apiVersion];
}
