// ===========================================
// SCAN SCHEDULER
// Runs the pipeline on a fixed cadence while the bot is enabled
// ===========================================

import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { BotState } from './bot-state.js';
import type { ScanOptions } from './pipeline.js';
import type { ScanSummary } from '../types/index.js';

const log = componentLogger('scheduler');

export interface ScanRunner {
  runScan(options?: ScanOptions): Promise<ScanSummary>;
}

export class ScanScheduler {
  private isRunning = false;
  private scanTimer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private lastRunAt: Date | null = null;

  constructor(
    private readonly pipeline: ScanRunner,
    private readonly state: BotState,
    private readonly now: () => Date = () => new Date()
  ) {
    state.onIntervalChange(minutes => this.reschedule(minutes));
  }

  /**
   * Run immediately, then every check interval
   */
  start(): void {
    if (this.isRunning) {
      log.warn('Scheduler already running');
      return;
    }

    this.isRunning = true;
    log.info({ minutes: this.state.getCheckInterval() }, 'Starting scan loop');

    this.tick();
    this.schedule(this.state.getCheckInterval());
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;
    if (this.scanTimer) {
      clearInterval(this.scanTimer);
      this.scanTimer = null;
    }

    if (this.current) {
      await this.current;
    }
    log.info('Scheduler stopped');
  }

  getLastRunAt(): string | null {
    return this.lastRunAt ? this.lastRunAt.toISOString() : null;
  }

  get running(): boolean {
    return this.isRunning;
  }

  private schedule(minutes: number): void {
    if (this.scanTimer) clearInterval(this.scanTimer);
    this.scanTimer = setInterval(() => this.tick(), minutes * 60_000);
  }

  private reschedule(minutes: number): void {
    if (!this.isRunning) return;
    log.info({ minutes }, 'Rescheduling scan loop');
    this.schedule(minutes);
  }

  private tick(): void {
    if (!this.state.isEnabled()) {
      log.debug('Bot disabled, skipping scheduled scan');
      return;
    }
    if (this.current) {
      log.debug('Previous scheduled scan still running');
      return;
    }

    this.lastRunAt = this.now();
    this.current = this.pipeline
      .runScan()
      .then(summary => {
        log.debug({ alerted: summary.alerted }, 'Scheduled scan finished');
      })
      .catch((error: unknown) => {
        log.error({ error: errorMessage(error) }, 'Scheduled scan failed');
      })
      .finally(() => {
        this.current = null;
      });
  }
}
