import { createLogger } from './Logger';

const logger = createLogger('Scheduler');

export const DEFAULT_TICK_MS = 1000;
export const DEFAULT_DRAIN_TIMEOUT_MS = 30000;

export type JobTask = () => Promise<unknown>;

export interface SchedulerOptions {
  /** How often due jobs are checked */
  tickMs?: number;
  /** How long stop() waits for in-flight jobs */
  drainTimeoutMs?: number;
  now?: () => number;
}

export interface JobInfo {
  name: string;
  intervalMs: number;
  nextRunAt: number;
  runs: number;
  running: boolean;
}

interface ScheduledJob {
  readonly name: string;
  readonly intervalMs: number;
  readonly task: JobTask;
  nextRunAt: number;
  runs: number;
  current: Promise<void> | null;
}

/**
 * Fixed-interval job scheduler.
 *
 * A job runs as soon as it is registered and then every interval measured
 * from its registration time. A tick timer checks for due jobs; each due job
 * is started as its own task, so a slow job never delays another. A job that
 * is still running when its next slot comes up skips that slot.
 */
export class Scheduler {
  private readonly tickMs: number;
  private readonly drainTimeoutMs: number;
  private readonly now: () => number;

  private jobs: Map<string, ScheduledJob> = new Map();
  private timer: NodeJS.Timeout | null = null;
  private stopping = false;

  constructor(options: SchedulerOptions = {}) {
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Register a job, run it immediately and start ticking if not already
   */
  every(name: string, intervalSeconds: number, task: JobTask): void {
    if (this.stopping) {
      throw new Error('Scheduler is stopped');
    }
    if (!(intervalSeconds > 0)) {
      throw new Error(`Invalid interval for job ${name}: ${intervalSeconds}`);
    }
    if (this.jobs.has(name)) {
      throw new Error(`Job ${name} is already scheduled`);
    }

    const intervalMs = intervalSeconds * 1000;
    const job: ScheduledJob = {
      name,
      intervalMs,
      task,
      nextRunAt: this.now() + intervalMs,
      runs: 0,
      current: null,
    };
    this.jobs.set(name, job);
    this.launch(job);

    if (!this.timer) {
      this.timer = setInterval(() => this.tick(), this.tickMs);
    }

    logger.info(`Scheduled job: ${name} (every ${intervalSeconds}s)`);
  }

  /**
   * Start every job whose next run time has passed
   */
  tick(): void {
    if (this.stopping) {
      return;
    }

    const now = this.now();
    for (const job of this.jobs.values()) {
      if (now < job.nextRunAt) {
        continue;
      }

      // Missed slots are not replayed
      while (job.nextRunAt <= now) {
        job.nextRunAt += job.intervalMs;
      }

      if (job.current) {
        logger.debug(`Job ${job.name} is still running, skipping`);
        continue;
      }

      this.launch(job);
    }
  }

  /**
   * Stop scheduling and wait (bounded) for in-flight jobs
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const running = [...this.jobs.values()]
      .map((job) => job.current)
      .filter((current): current is Promise<void> => current !== null);

    if (running.length > 0) {
      logger.info(`Waiting for ${running.length} running job(s) to complete...`);
      let drainTimer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<'timeout'>((resolve) => {
        drainTimer = setTimeout(() => resolve('timeout'), this.drainTimeoutMs);
      });
      const outcome = await Promise.race([Promise.all(running), timedOut]);
      clearTimeout(drainTimer);
      if (outcome === 'timeout') {
        logger.warn('Timeout waiting for jobs to complete');
      }
    }

    logger.info(`Stopped ${this.jobs.size} job(s)`);
  }

  getJobs(): JobInfo[] {
    return [...this.jobs.values()].map((job) => ({
      name: job.name,
      intervalMs: job.intervalMs,
      nextRunAt: job.nextRunAt,
      runs: job.runs,
      running: job.current !== null,
    }));
  }

  isStopped(): boolean {
    return this.stopping;
  }

  private launch(job: ScheduledJob): void {
    job.runs++;
    job.current = this.execute(job).finally(() => {
      job.current = null;
    });
  }

  private async execute(job: ScheduledJob): Promise<void> {
    try {
      logger.debug(`Executing job: ${job.name}`);
      await job.task();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Job ${job.name} failed: ${message}`);
    }
  }
}
