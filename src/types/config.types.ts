import type { ApiVersion, Instance } from './stats.types';
import type { InfluxDBConfig } from '../config/schemas/config.schema';

/**
 * Fully resolved and validated exporter configuration
 */
export interface ExporterConfig {
  intervalSeconds: number;
  /** min(interval / 2, 30) */
  requestTimeoutSeconds: number;
  apiVersion: ApiVersion;
  numTopItems: number;
  numTopClients: number;
  /** Verify TLS certificates of https Pi-hole addresses */
  piholeVerifySsl: boolean;
  instances: Instance[];
  influxdb: InfluxDBConfig;
}
