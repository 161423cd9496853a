import { createLogger } from './Logger';
import { Scheduler } from './Scheduler';
import { InstancePoller } from './InstancePoller';
import { StartupError } from './errors';
import { getStatsClientFactory } from '../plugins/inputs';
import type { StatsClientFactory } from '../plugins/inputs';
import { InfluxDB2Sink } from '../plugins/outputs/InfluxDB2Sink';
import type { ExporterConfig } from '../types/config.types';
import type { StatsClient } from '../types/stats.types';
import type { WriteSink } from '../types/point.types';

const logger = createLogger('Orchestrator');

export type OrchestratorState = 'STARTING' | 'VERIFYING_BUCKET' | 'RUNNING' | 'STOPPING' | 'STOPPED';

/** Signals that stop the exporter cleanly */
export const TERMINATION_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
/** Signals that are handled but end the process as a failure */
export const FAILURE_SIGNALS: readonly NodeJS.Signals[] = ['SIGHUP'];

export interface OrchestratorDependencies {
  sink?: WriteSink;
  clientFactory?: StatsClientFactory;
  scheduler?: Scheduler;
  exit?: (code: number) => void;
}

/**
 * Polls every configured Pi-hole on its own schedule. Nothing is scheduled
 * until the bucket is confirmed; instances with a credential log in once up
 * front, then each gets one job. Signals stop the scheduler and exit.
 */
export class Orchestrator {
  private readonly config: ExporterConfig;
  private readonly sink: WriteSink;
  private readonly scheduler: Scheduler;
  private readonly clients: StatsClient[];
  private readonly exit: (code: number) => void;

  private state: OrchestratorState = 'STARTING';
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: ExporterConfig, deps: OrchestratorDependencies = {}) {
    this.config = config;
    this.sink = deps.sink ?? new InfluxDB2Sink(config.influxdb);
    this.scheduler = deps.scheduler ?? new Scheduler();
    this.exit = deps.exit ?? ((code) => process.exit(code));

    const factory = deps.clientFactory ?? getStatsClientFactory(config.apiVersion);
    this.clients = config.instances.map((instance) =>
      factory(instance, {
        requestTimeoutSeconds: config.requestTimeoutSeconds,
        verifySsl: config.piholeVerifySsl,
      })
    );
  }

  /**
   * Verify the bucket, authenticate and schedule one job per instance.
   * @throws StartupError when the bucket is unusable; nothing is scheduled
   */
  async start(): Promise<void> {
    if (this.state !== 'STARTING') {
      logger.warn(`Orchestrator cannot start from state ${this.state}`);
      return;
    }

    logger.info('Starting...');

    const healthy = await this.sink.healthCheck();
    if (healthy) {
      logger.info('InfluxDB: healthy');
    } else {
      logger.warn('InfluxDB: unhealthy');
    }

    this.state = 'VERIFYING_BUCKET';
    if (!(await this.sink.ensureBucket())) {
      this.state = 'STOPPED';
      throw new StartupError(`InfluxDB bucket ${this.config.influxdb.bucket} is not available`);
    }

    await this.authenticateClients();

    for (const client of this.clients) {
      const poller = new InstancePoller(client, this.sink, {
        numTopClients: this.config.numTopClients,
        numTopItems: this.config.numTopItems,
      });
      this.scheduler.every(
        `${client.instance.alias}@${client.instance.address}`,
        this.config.intervalSeconds,
        () => poller.runCycle()
      );
    }

    this.state = 'RUNNING';
    logger.info(`Polling ${this.clients.length} Pi-hole instance(s) every ${this.config.intervalSeconds}s`);
  }

  /**
   * Stop scheduling new cycles. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }
    if (this.state === 'STOPPED') {
      return;
    }

    this.shutdownPromise = this.performShutdown();
    return this.shutdownPromise;
  }

  /**
   * Stop, then exit 0 for termination signals and 1 for anything else
   */
  async handleSignal(signal: NodeJS.Signals): Promise<void> {
    const code = TERMINATION_SIGNALS.includes(signal) ? 0 : 1;
    logger.info(`Received ${signal}, stopping...`);

    try {
      await this.stop();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Shutdown failed: ${message}`);
      this.exit(1);
      return;
    }

    this.exit(code);
  }

  /**
   * Install process signal and crash handlers
   */
  setupSignalHandlers(): void {
    for (const signal of [...TERMINATION_SIGNALS, ...FAILURE_SIGNALS]) {
      process.on(signal, () => {
        void this.handleSignal(signal);
      });
    }

    process.on('uncaughtException', (error) => {
      logger.error(`Uncaught exception: ${error.message}`);
      logger.error(error.stack || '');
      this.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      const message = reason instanceof Error ? reason.message : String(reason);
      logger.error(`Unhandled rejection: ${message}`);
      this.exit(1);
    });
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getClients(): readonly StatsClient[] {
    return this.clients;
  }

  private async authenticateClients(): Promise<void> {
    for (const client of this.clients) {
      if (!client.requiresAuth) {
        continue;
      }
      const result = await client.authenticate();
      if (result.ok) {
        logger.info(`[${client.instance.alias}] Authenticated`);
      } else {
        logger.warn(`[${client.instance.alias}] Not authenticated (${result.reason}), some data will not be available`);
      }
    }
  }

  private async performShutdown(): Promise<void> {
    this.state = 'STOPPING';
    logger.info('Stopping...');
    await this.scheduler.stop();
    this.state = 'STOPPED';
    logger.info('Stopped');
  }
}
