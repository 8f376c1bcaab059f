// ===========================================
// BOT STATE
// Processed tokens, thresholds, scan interval, enabled and test-mode flags
// ===========================================

import { z } from 'zod';
import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { StateDocument, StateStore } from './state-store.js';
import type { ThresholdConfig } from '../types/index.js';

const log = componentLogger('bot-state');

export const MIN_CHECK_INTERVAL_MINUTES = 1;
export const MAX_CHECK_INTERVAL_MINUTES = 60;

// ============ SCHEMAS ============

const finite = z.number().finite();

export const thresholdUpdateSchema = z.object({
  minMarketCap: finite.nonnegative(),
  minVolume: finite.nonnegative(),
  minPriceChangePct: finite,
  minLiquidity: finite.nonnegative(),
  minBuySellRatio: finite.nonnegative(),
  minSafetyScore: finite.min(0).max(100),
}).partial().strict();

export type ThresholdUpdate = z.infer<typeof thresholdUpdateSchema>;

const THRESHOLD_KEYS: ReadonlyArray<keyof ThresholdConfig> = [
  'minMarketCap',
  'minVolume',
  'minPriceChangePct',
  'minLiquidity',
  'minBuySellRatio',
  'minSafetyScore',
];

export const checkIntervalSchema = z.number().int().min(MIN_CHECK_INTERVAL_MINUTES).max(MAX_CHECK_INTERVAL_MINUTES);

const processedTokensSchema = z.array(z.string());
const intervalSchema = z.object({ minutes: checkIntervalSchema });
const flagsSchema = z.object({
  enabled: z.boolean(),
  testMode: z.boolean().default(false),
});

// ============ STATE ============

export interface BotStateDefaults {
  thresholds: ThresholdConfig;
  checkIntervalMinutes: number;
  enabled: boolean;
}

export interface Mutation<T> {
  value: T;
  persisted: boolean;
}

type IntervalListener = (minutes: number) => void;

/**
 * Sole owner of mutable bot state. Every mutation is queued behind the
 * previous one and written through to the store before it resolves; a
 * failed write leaves the in-memory change in place and reports
 * `persisted: false`.
 */
export class BotState {
  private thresholds: ThresholdConfig;
  private checkIntervalMinutes: number;
  private enabled: boolean;
  private testMode = false;
  private readonly processed = new Set<string>();

  private tail: Promise<unknown> = Promise.resolve();
  private readonly intervalListeners: IntervalListener[] = [];

  constructor(private readonly store: StateStore, defaults: BotStateDefaults) {
    this.thresholds = { ...defaults.thresholds };
    this.checkIntervalMinutes = defaults.checkIntervalMinutes;
    this.enabled = defaults.enabled;
  }

  /**
   * Overlay each persisted document on the defaults. Missing documents are
   * normal on first start; unreadable ones are logged and ignored.
   */
  async load(): Promise<void> {
    const thresholds = await this.readDocument('thresholds', thresholdUpdateSchema.strip());
    if (thresholds) {
      this.applyThresholds(thresholds);
    }

    const processed = await this.readDocument('processed_tokens', processedTokensSchema);
    if (processed) {
      for (const address of processed) this.processed.add(address);
    }

    const interval = await this.readDocument('interval', intervalSchema);
    if (interval) {
      this.checkIntervalMinutes = interval.minutes;
    }

    const flags = await this.readDocument('state', flagsSchema);
    if (flags) {
      this.enabled = flags.enabled;
      this.testMode = flags.testMode;
    }

    log.info({
      store: this.store.kind,
      enabled: this.enabled,
      testMode: this.testMode,
      checkIntervalMinutes: this.checkIntervalMinutes,
      processedCount: this.processed.size,
      thresholds: this.thresholds,
    }, 'Bot state loaded');
  }

  // ============ READS ============

  getThresholds(): ThresholdConfig {
    return { ...this.thresholds };
  }

  getCheckInterval(): number {
    return this.checkIntervalMinutes;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isTestMode(): boolean {
    return this.testMode;
  }

  isProcessed(address: string): boolean {
    return this.processed.has(address);
  }

  getProcessedTokens(): string[] {
    return [...this.processed];
  }

  get processedCount(): number {
    return this.processed.size;
  }

  onIntervalChange(listener: IntervalListener): void {
    this.intervalListeners.push(listener);
  }

  // ============ MUTATIONS ============

  /**
   * Record an address. The value is false when another caller recorded it
   * first; only the caller that gets true may alert on it.
   */
  markProcessed(address: string): Promise<Mutation<boolean>> {
    return this.serialize(async () => {
      if (this.processed.has(address)) {
        return { value: false, persisted: true };
      }
      this.processed.add(address);
      const persisted = await this.persist('processed_tokens', this.getProcessedTokens());
      return { value: true, persisted };
    });
  }

  updateThresholds(update: ThresholdUpdate): Promise<Mutation<ThresholdConfig>> {
    return this.serialize(async () => {
      this.applyThresholds(update);
      log.info({ thresholds: this.thresholds }, 'Thresholds updated');
      const persisted = await this.persist('thresholds', this.thresholds);
      return { value: this.getThresholds(), persisted };
    });
  }

  setEnabled(enabled: boolean): Promise<Mutation<boolean>> {
    return this.serialize(async () => {
      this.enabled = enabled;
      log.info({ enabled }, enabled ? 'Bot enabled' : 'Bot disabled');
      return { value: enabled, persisted: await this.persistFlags() };
    });
  }

  setTestMode(testMode: boolean): Promise<Mutation<boolean>> {
    return this.serialize(async () => {
      this.testMode = testMode;
      log.info({ testMode }, 'Test mode changed');
      return { value: testMode, persisted: await this.persistFlags() };
    });
  }

  /**
   * @throws RangeError when minutes is outside 1..60
   */
  setCheckInterval(minutes: number): Promise<Mutation<number>> {
    if (!checkIntervalSchema.safeParse(minutes).success) {
      return Promise.reject(new RangeError(
        `Check interval must be an integer between ${MIN_CHECK_INTERVAL_MINUTES} and ${MAX_CHECK_INTERVAL_MINUTES} minutes`
      ));
    }

    return this.serialize(async () => {
      this.checkIntervalMinutes = minutes;
      log.info({ minutes }, 'Check interval changed');
      const persisted = await this.persist('interval', { minutes });
      for (const listener of this.intervalListeners) listener(minutes);
      return { value: minutes, persisted };
    });
  }

  /**
   * Write every document; used at the end of a scan and on shutdown
   */
  persistAll(): Promise<boolean> {
    return this.serialize(async () => {
      const results = [
        await this.persist('thresholds', this.thresholds),
        await this.persist('processed_tokens', this.getProcessedTokens()),
        await this.persist('interval', { minutes: this.checkIntervalMinutes }),
        await this.persistFlags(),
      ];
      return results.every(Boolean);
    });
  }

  // ============ INTERNALS ============

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The chain only orders work; each caller sees its own rejection
    this.tail = run.catch(() => undefined);
    return run;
  }

  private applyThresholds(update: ThresholdUpdate): void {
    const next = { ...this.thresholds };
    for (const key of THRESHOLD_KEYS) {
      const value = update[key];
      if (value !== undefined) next[key] = value;
    }
    this.thresholds = next;
  }

  private persistFlags(): Promise<boolean> {
    return this.persist('state', { enabled: this.enabled, testMode: this.testMode });
  }

  private async persist(name: StateDocument, value: unknown): Promise<boolean> {
    try {
      await this.store.write(name, value);
      return true;
    } catch (error) {
      log.error({ document: name, error: errorMessage(error) }, 'Failed to persist state document');
      return false;
    }
  }

  private async readDocument<S extends z.ZodTypeAny>(name: StateDocument, schema: S): Promise<z.infer<S> | null> {
    let raw: unknown;
    try {
      raw = await this.store.read(name);
    } catch (error) {
      log.warn({ document: name, error: errorMessage(error) }, 'Unreadable state document, using defaults');
      return null;
    }

    if (raw === undefined) return null;

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ document: name, issues: parsed.error.issues.length }, 'Invalid state document, using defaults');
      return null;
    }
    return parsed.data;
  }
}
