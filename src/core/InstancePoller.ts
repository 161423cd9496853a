import { createLogger } from './Logger';
import { PointBuilder } from './PointBuilder';
import type { StatsClient, StatsSnapshot } from '../types/stats.types';
import type { WriteSink } from '../types/point.types';

const logger = createLogger('InstancePoller');

export interface PollerOptions {
  numTopClients: number;
  numTopItems: number;
  now?: () => number;
}

export type CycleOutcome = 'written' | 'skipped' | 'failed';

/**
 * Runs the poll, transform, write cycle for one Pi-hole instance
 */
export class InstancePoller {
  private readonly builder: PointBuilder;
  private readonly now: () => number;

  constructor(
    private readonly client: StatsClient,
    private readonly sink: WriteSink,
    private readonly options: PollerOptions
  ) {
    this.builder = new PointBuilder(client.instance.alias, client.instance.address);
    this.now = options.now ?? (() => Date.now());
  }

  get alias(): string {
    return this.client.instance.alias;
  }

  /**
   * Fetch every statistics category. Each fetch fails on its own.
   */
  async poll(): Promise<StatsSnapshot> {
    const { numTopClients, numTopItems } = this.options;

    const [
      summary,
      topClients,
      topPermittedDomains,
      topBlockedDomains,
      upstreams,
      history,
      blocking,
    ] = await Promise.all([
      this.client.fetchSummary(),
      this.client.fetchTopClients(numTopClients),
      this.client.fetchTopDomains(numTopItems, false),
      this.client.fetchTopDomains(numTopItems, true),
      this.client.fetchUpstreams(),
      this.client.fetchHistory(),
      this.client.fetchBlockingStatus(),
    ]);

    return {
      summary,
      topClients,
      topPermittedDomains,
      topBlockedDomains,
      upstreams,
      history,
      blocking,
    };
  }

  /**
   * One full cycle. Never throws.
   */
  async runCycle(): Promise<CycleOutcome> {
    try {
      const queryStart = this.now();
      const snapshot = await this.poll();
      logger.info(`[${this.alias}] Queried successfully in ${this.now() - queryStart}ms`);

      if (!snapshot.summary) {
        logger.warn(`[${this.alias}] No summary statistics received, skipping write`);
        return 'skipped';
      }

      const points = this.builder.build(snapshot, this.now() / 1000);

      const writeStart = this.now();
      if (!(await this.sink.writeBatch(points))) {
        return 'failed';
      }
      logger.info(`[${this.alias}] Wrote to InfluxDB successfully in ${this.now() - writeStart}ms`);
      return 'written';
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`[${this.alias}] Polling cycle failed: ${message}`);
      return 'failed';
    }
  }
}
