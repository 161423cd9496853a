export {
  ConfigLoader,
  DEFAULT_CONFIG_FILE,
  MAX_REQUEST_TIMEOUT_SECONDS,
  requestTimeoutSeconds,
  resolveInstances,
} from './ConfigLoader';
export type { ConfigLoaderOptions, ResolvedInstances } from './ConfigLoader';
export {
  ExporterSettingsSchema,
  PiholeSettingsSchema,
  InfluxDBConfigSchema,
} from './schemas/config.schema';
export type { ExporterSettings, PiholeSettings, InfluxDBConfig } from './schemas/config.schema';
export type { ExporterConfig } from '../types/config.types';
