import * as fs from 'fs';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { ConfigValidationError } from '../core/errors';
import { ExporterSettingsSchema } from './schemas/config.schema';
import type { ExporterSettings } from './schemas/config.schema';
import type { ExporterConfig } from '../types/config.types';
import type { Instance } from '../types/stats.types';

const logger = createLogger('ConfigLoader');

export const DEFAULT_CONFIG_FILE = './config/pihole-influxdb.yaml';

/** Upper bound on a single request, whatever the interval */
export const MAX_REQUEST_TIMEOUT_SECONDS = 30;

/**
 * Environment variables and the settings path each one overrides
 */
const ENV_MAPPINGS: Record<string, [string, string] | [string]> = {
  INTERVAL_SECONDS: ['intervalSeconds'],
  PIHOLE_ALIAS: ['pihole', 'alias'],
  PIHOLE_ADDRESS: ['pihole', 'address'],
  PIHOLE_PASSWORD: ['pihole', 'password'],
  PIHOLE_API_VERSION: ['pihole', 'apiVersion'],
  PIHOLE_NUM_TOP_ITEMS: ['pihole', 'numTopItems'],
  PIHOLE_NUM_TOP_CLIENTS: ['pihole', 'numTopClients'],
  PIHOLE_VERIFY_SSL: ['pihole', 'verifySsl'],
  INFLUXDB_ADDRESS: ['influxdb', 'address'],
  INFLUXDB_ORG: ['influxdb', 'org'],
  INFLUXDB_TOKEN: ['influxdb', 'token'],
  INFLUXDB_BUCKET: ['influxdb', 'bucket'],
  INFLUXDB_CREATE_BUCKET: ['influxdb', 'createBucket'],
  INFLUXDB_VERIFY_SSL: ['influxdb', 'verifySsl'],
};

export interface ConfigLoaderOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit YAML path; a missing explicit file is an error */
  configFile?: string;
}

export interface ResolvedInstances {
  instances: Instance[];
  warnings: string[];
  errors: string[];
}

/**
 * Request timeout for a polling interval: half the interval, capped at 30s
 */
export function requestTimeoutSeconds(intervalSeconds: number): number {
  return Math.min(0.5 * intervalSeconds, MAX_REQUEST_TIMEOUT_SECONDS);
}

/**
 * Zip aliases, addresses and credentials into instances.
 * Duplicate addresses keep their first occurrence.
 */
export function resolveInstances(
  aliases: string[],
  addresses: string[],
  credentials: string[] = []
): ResolvedInstances {
  const warnings: string[] = [];
  const errors: string[] = [];

  const usable = addresses.filter((address) => address !== '');
  if (usable.length === 0) {
    errors.push('No Pi-hole instances provided');
    return { instances: [], warnings, errors };
  }
  if (aliases.length !== addresses.length) {
    errors.push('The number of Pi-hole aliases provided does not match the number of Pi-hole addresses');
    return { instances: [], warnings, errors };
  }

  const byAddress = new Map<string, Instance>();
  addresses.forEach((address, index) => {
    const alias = aliases[index];
    if (byAddress.has(address)) {
      warnings.push(`Duplicate Pi-hole address provided (${address}), skipping...`);
      return;
    }

    const credential = credentials[index];
    if (!credential) {
      warnings.push(`No password provided for ${alias}, some data will not be available`);
    }

    byAddress.set(address, credential ? { alias, address, credential } : { alias, address });
  });

  return { instances: [...byAddress.values()], warnings, errors };
}

/**
 * ConfigLoader resolves built-in defaults, an optional YAML file and
 * environment variables (in increasing precedence) into an ExporterConfig.
 */
export class ConfigLoader {
  private env: NodeJS.ProcessEnv;
  private configFile?: string;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.configFile = options.configFile ?? this.env.CONFIG_FILE;
  }

  /**
   * @throws ConfigValidationError listing every problem found
   */
  load(): ExporterConfig {
    const raw = this.applyEnvOverrides(this.readConfigFile());

    const result = ExporterSettingsSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigValidationError(
        result.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
      );
    }

    const config = this.resolve(result.data);
    this.logConfigSummary(config);
    return config;
  }

  private resolve(settings: ExporterSettings): ExporterConfig {
    const { pihole } = settings;
    const { instances, warnings, errors } = resolveInstances(
      pihole.alias,
      pihole.address,
      pihole.password
    );

    const problems = [...errors];
    for (const instance of instances) {
      if (!isHttpUrl(instance.address)) {
        problems.push(`Invalid Pi-hole address for ${instance.alias}: ${instance.address}`);
      }
    }
    if (problems.length > 0) {
      throw new ConfigValidationError(problems);
    }

    for (const warning of warnings) {
      logger.warn(warning);
    }

    return {
      intervalSeconds: settings.intervalSeconds,
      requestTimeoutSeconds: requestTimeoutSeconds(settings.intervalSeconds),
      apiVersion: pihole.apiVersion,
      numTopItems: pihole.numTopItems,
      numTopClients: pihole.numTopClients,
      piholeVerifySsl: pihole.verifySsl,
      instances,
      influxdb: settings.influxdb,
    };
  }

  private readConfigFile(): Record<string, unknown> {
    const filePath = this.configFile ?? DEFAULT_CONFIG_FILE;

    if (!fs.existsSync(filePath)) {
      if (this.configFile) {
        throw new ConfigValidationError([`Configuration file not found: ${filePath}`]);
      }
      return {};
    }

    logger.info(`Loading configuration from: ${filePath}`);
    let parsed: unknown;
    try {
      parsed = yaml.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new ConfigValidationError([`Failed to parse YAML configuration: ${message}`]);
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigValidationError([`Configuration file ${filePath} must contain a mapping`]);
    }
    return parsed;
  }

  /**
   * Layer environment variables over the file settings
   */
  private applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
    const merged: Record<string, unknown> = {
      ...config,
      pihole: { ...asRecord(config.pihole) },
      influxdb: { ...asRecord(config.influxdb) },
    };

    for (const [name, path] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[name];
      if (value === undefined || value === '') continue;

      if (path.length === 1) {
        merged[path[0]] = value;
      } else {
        const section = asRecord(merged[path[0]]);
        section[path[1]] = value;
        merged[path[0]] = section;
      }
      logger.debug(`Applied env override: ${name}`);
    }

    return merged;
  }

  private logConfigSummary(config: ExporterConfig): void {
    logger.info('================== Configuration ==================');
    config.instances.forEach((instance, index) => {
      const label = index === 0 ? 'Pi-holes:           ' : '                    ';
      const auth = instance.credential ? '(credential set)' : '(no credential)';
      logger.info(`${label} ${instance.alias} ${instance.address} ${auth}`);
    });
    logger.info(`Pi-hole API:         ${config.apiVersion}`);
    logger.info(`Pi-hole verify SSL:  ${config.piholeVerifySsl}`);
    logger.info(`Poll interval:       ${config.intervalSeconds} seconds`);
    logger.info(`Request timeout:     ${config.requestTimeoutSeconds} seconds`);
    logger.info(`InfluxDB address:    ${config.influxdb.address}`);
    logger.info(`InfluxDB org:        ${config.influxdb.org}`);
    logger.info(`InfluxDB token:      ${config.influxdb.token ? '******' : '(None)'}`);
    logger.info(`InfluxDB bucket:     ${config.influxdb.bucket}`);
    logger.info(`InfluxDB verify SSL: ${config.influxdb.verifySsl}`);
    logger.info('===================================================');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
