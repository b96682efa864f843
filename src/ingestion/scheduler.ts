import cron from 'node-cron';
import type { PipelineOrchestrator } from './orchestrator.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'scheduler' });

export type CrawlRunner = Pick<PipelineOrchestrator, 'runAll'>;

export interface SchedulerOptions {
  cron: string;
  timezone: string;
  limitPerCategory: number;
}

export class CrawlScheduler {
  private isRunning = false;
  private current: Promise<void> | null = null;
  private task: cron.ScheduledTask | null = null;

  constructor(
    private readonly orchestrator: CrawlRunner,
    private readonly options: SchedulerOptions,
  ) {}

  get running(): boolean {
    return this.isRunning;
  }

  start(): void {
    log.info({ cron: this.options.cron, timezone: this.options.timezone }, 'Starting crawl scheduler');
    this.task = cron.schedule(this.options.cron, () => this.trigger('cron'), { timezone: this.options.timezone });
  }

  /** Starts a run unless one is already in progress. Resolves when that run ends. */
  trigger(reason: string): Promise<void> {
    if (this.isRunning) {
      log.warn({ reason }, 'Previous crawl still running, skipping');
      return this.current ?? Promise.resolve();
    }

    this.isRunning = true;
    this.current = this.run(reason).finally(() => {
      this.isRunning = false;
      this.current = null;
    });
    return this.current;
  }

  /** Stops the cron task and waits for an in-progress run to wind down. */
  async stop(): Promise<void> {
    this.task?.stop();
    this.task = null;
    log.info('Scheduler stopped');
    if (this.current) await this.current;
  }

  private async run(reason: string): Promise<void> {
    try {
      log.info({ reason }, 'Crawl triggered');
      const summary = await this.orchestrator.runAll(this.options.limitPerCategory);
      log.info(
        { urlsSucceeded: summary.urlsSucceeded, urlsFailed: summary.urlsFailed },
        'Scheduled crawl complete',
      );
    } catch (err) {
      log.error({ err }, 'Scheduled crawl failed');
    }
  }
}
