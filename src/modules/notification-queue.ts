// ===========================================
// NOTIFICATION QUEUE
// Alerts are queued by the scan and delivered by a separate worker
// ===========================================

import { v4 as uuidv4 } from 'uuid';
import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { sleep, type Sleeper } from '../utils/rate-limiter.js';
import type { AlertRecord, TokenAlert } from '../types/index.js';

const log = componentLogger('notifications');

export interface Notifier {
  sendTokenAlert(alert: AlertRecord): Promise<boolean>;
  sendMessage(text: string): Promise<boolean>;
}

export interface AlertSink {
  enqueue(alert: TokenAlert): AlertRecord | null;
}

export interface NotificationQueueOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  historyLimit?: number;
  sleep?: Sleeper;
  now?: () => Date;
}

/**
 * FIFO of pending alerts. One worker drains it; each alert gets a bounded
 * number of attempts and ends up in the history either way. An address
 * with an alert still pending is not queued twice.
 */
export class NotificationQueue implements AlertSink {
  private readonly pending: AlertRecord[] = [];
  private readonly history: AlertRecord[] = [];
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly historyLimit: number;
  private readonly sleeper: Sleeper;
  private readonly now: () => Date;

  private worker: Promise<void> | null = null;
  private accepting = true;

  constructor(private readonly notifier: Notifier, options: NotificationQueueOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.historyLimit = options.historyLimit ?? 200;
    this.sleeper = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  enqueue(alert: TokenAlert): AlertRecord | null {
    if (!this.accepting) {
      log.warn({ address: alert.candidate.address }, 'Queue stopped, alert dropped');
      return null;
    }

    if (this.pending.some(p => p.candidate.address === alert.candidate.address)) {
      log.debug({ address: alert.candidate.address }, 'Alert already pending for token');
      return null;
    }

    const record: AlertRecord = {
      ...alert,
      id: uuidv4(),
      timestamp: this.now().toISOString(),
      delivered: false,
    };
    this.pending.push(record);
    log.info({ id: record.id, symbol: alert.candidate.symbol, depth: this.pending.length }, 'Alert queued');

    this.kick();
    return record;
  }

  get depth(): number {
    return this.pending.length;
  }

  /**
   * Most recent first
   */
  getHistory(limit = 20): AlertRecord[] {
    return this.history.slice(-limit).reverse();
  }

  /**
   * Resolves once every queued alert has been attempted
   */
  async drain(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  async stop(): Promise<void> {
    this.accepting = false;
    await this.drain();
    log.info({ delivered: this.history.filter(a => a.delivered).length }, 'Notification queue stopped');
  }

  private kick(): void {
    if (this.worker) return;
    this.worker = this.work()
      .catch((error: unknown) => {
        log.error({ error: errorMessage(error) }, 'Notification worker crashed');
      })
      .finally(() => {
        this.worker = null;
        if (this.pending.length > 0) this.kick();
      });
  }

  private async work(): Promise<void> {
    let next = this.pending[0];
    while (next) {
      const delivered = await this.deliver(next);
      this.pending.shift();
      this.remember({ ...next, delivered });
      next = this.pending[0];
    }
  }

  private async deliver(record: AlertRecord): Promise<boolean> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        if (await this.notifier.sendTokenAlert(record)) {
          return true;
        }
        log.warn({ id: record.id, attempt }, 'Alert delivery attempt failed');
      } catch (error) {
        log.warn({ id: record.id, attempt, error: errorMessage(error) }, 'Alert delivery attempt threw');
      }

      if (attempt < this.maxAttempts) {
        await this.sleeper(this.retryDelayMs * 2 ** (attempt - 1));
      }
    }

    log.error({ id: record.id, symbol: record.candidate.symbol, attempts: this.maxAttempts }, 'Giving up on alert');
    return false;
  }

  private remember(record: AlertRecord): void {
    this.history.push(record);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
