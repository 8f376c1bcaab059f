// ===========================================
// MODULE 4: QUALIFICATION PIPELINE
// Scan cycle: candidates -> verify -> score -> thresholds -> alert
// ===========================================

import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { describeThresholdFailures, failedMarketThresholds, meetsSafetyThreshold } from './threshold-filter.js';
import type { MarketDataSource } from './market-data.js';
import type { ChainVerifier } from './chain-verifier.js';
import type { SafetyScorer } from './safety-scorer.js';
import type { BotState } from './bot-state.js';
import type { AlertSink } from './notification-queue.js';
import type {
  ScanSummary,
  SpecificTokenResult,
  TokenAlert,
  TokenCandidate,
  TokenDiagnostic,
} from '../types/index.js';

const log = componentLogger('pipeline');

const DEFAULT_MAX_ALERTS_PER_SCAN = 10;

export type PipelinePhase = 'Idle' | 'Scanning' | 'Verifying' | 'Scoring' | 'Deciding';

export interface PipelineDeps {
  marketData: MarketDataSource;
  verifier: ChainVerifier;
  scorer: SafetyScorer;
  state: BotState;
  alerts: AlertSink;
  maxAlertsPerScan?: number;
  now?: () => Date;
}

export interface ScanOptions {
  // Treat verification and safety as passing; alerts are logged, not sent
  force?: boolean;
}

type Outcome = 'alerted' | 'invalid' | 'lowSafety' | 'belowThresholds';

interface Evaluation {
  outcome: Outcome;
  alert: TokenAlert;
  reason: string;
  // Verification and safety really passed, not just bypassed by force
  passedChecks: boolean;
}

export class QualificationPipeline {
  private phase: PipelinePhase = 'Idle';
  private inFlight: Promise<ScanSummary> | null = null;
  private lastScan: ScanSummary | null = null;
  private readonly maxAlertsPerScan: number;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDeps) {
    this.maxAlertsPerScan = deps.maxAlertsPerScan ?? DEFAULT_MAX_ALERTS_PER_SCAN;
    this.now = deps.now ?? (() => new Date());
  }

  getPhase(): PipelinePhase {
    return this.phase;
  }

  isScanning(): boolean {
    return this.inFlight !== null;
  }

  getLastScan(): ScanSummary | null {
    return this.lastScan;
  }

  /**
   * Run one scan cycle. A call made while a cycle is running gets that
   * cycle's result instead of starting another.
   */
  runScan(options: ScanOptions = {}): Promise<ScanSummary> {
    if (this.inFlight) {
      log.info('Scan already in progress, joining it');
      return this.inFlight;
    }

    const run = this.executeScan(options.force ?? false).finally(() => {
      this.inFlight = null;
      this.phase = 'Idle';
    });
    this.inFlight = run;
    return run;
  }

  /**
   * Look up one token and put it through the same rule as a scan
   */
  async checkSpecificToken(address: string): Promise<SpecificTokenResult> {
    log.info({ address }, 'Checking specific token');

    if (this.deps.state.isProcessed(address)) {
      return { address, qualified: false, reason: 'Token already processed' };
    }

    const candidate = await this.deps.marketData.fetchPairByAddress(address);
    if (!candidate) {
      return { address, qualified: false, reason: 'No trading pair found' };
    }

    const evaluation = await this.evaluate(candidate, false);
    const { alert } = evaluation;
    if (evaluation.outcome === 'alerted' && !(await this.emit(evaluation, this.deps.state.isTestMode()))) {
      return { address, qualified: false, reason: 'Token already processed', candidate };
    }

    return {
      address,
      qualified: evaluation.outcome === 'alerted',
      reason: evaluation.reason,
      candidate,
      safetyScore: alert.safetyScore,
      isValid: alert.isValid,
    };
  }

  /**
   * Diagnostic view of a token; changes no state
   */
  async verifyToken(address: string): Promise<TokenDiagnostic> {
    const [verification, safetyScore, candidate] = await Promise.all([
      this.deps.verifier.verify(address),
      this.deps.scorer.getSafetyScore(address),
      this.deps.marketData.fetchPairByAddress(address),
    ]);

    return {
      address,
      isValid: verification.isValid,
      verificationSource: verification.source,
      safetyScore,
      isSafe: meetsSafetyThreshold(safetyScore, this.deps.state.getThresholds()),
      name: candidate?.name,
      symbol: candidate?.symbol,
    };
  }

  // ============ SCAN CYCLE ============

  private async executeScan(force: boolean): Promise<ScanSummary> {
    const summary: ScanSummary = {
      startedAt: this.now().toISOString(),
      finishedAt: '',
      force,
      candidates: 0,
      skippedProcessed: 0,
      invalid: 0,
      lowSafety: 0,
      belowThresholds: 0,
      alerted: 0,
    };

    // Force mode never delivers
    const dryRun = force || this.deps.state.isTestMode();

    try {
      this.phase = 'Scanning';
      log.info({ force, dryRun }, 'Starting token scan');

      const candidates = await this.deps.marketData.fetchCandidates();
      summary.candidates = candidates.length;

      if (candidates.length === 0) {
        log.info('No candidates this cycle');
        return this.finish(summary, false);
      }

      for (const candidate of candidates) {
        if (this.deps.state.isProcessed(candidate.address)) {
          summary.skippedProcessed++;
          log.debug({ symbol: candidate.symbol, address: candidate.address }, 'Skipping already processed token');
          continue;
        }

        if (summary.alerted >= this.maxAlertsPerScan) {
          log.info({ limit: this.maxAlertsPerScan }, 'Alert limit reached, remaining tokens roll to next scan');
          break;
        }

        try {
          const evaluation = await this.evaluate(candidate, force);
          if (evaluation.outcome === 'alerted') {
            const emitted = await this.emit(evaluation, dryRun);
            summary[emitted ? 'alerted' : 'skippedProcessed']++;
          } else {
            summary[evaluation.outcome]++;
          }
        } catch (error) {
          log.error({ address: candidate.address, error: errorMessage(error) }, 'Error evaluating token');
        }
      }
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Error in scan cycle');
    }

    return this.finish(summary, true);
  }

  private async finish(summary: ScanSummary, persist: boolean): Promise<ScanSummary> {
    if (persist) {
      await this.deps.state.persistAll();
    }
    summary.finishedAt = this.now().toISOString();
    this.lastScan = summary;
    log.info(summary, 'Scan complete');
    return summary;
  }

  private async evaluate(candidate: TokenCandidate, force: boolean): Promise<Evaluation> {
    const thresholds = this.deps.state.getThresholds();
    const label = { symbol: candidate.symbol, address: candidate.address };

    this.phase = 'Verifying';
    const verification = await this.deps.verifier.verify(candidate.address);
    const alert: TokenAlert = {
      candidate,
      safetyScore: 0,
      isValid: verification.isValid,
      verificationSource: verification.source,
    };

    if (!verification.isValid && !force) {
      log.warn(label, 'Token failed chain verification, skipping');
      return { outcome: 'invalid', alert, reason: 'Token failed chain verification', passedChecks: false };
    }

    this.phase = 'Scoring';
    alert.safetyScore = await this.deps.scorer.getSafetyScore(candidate.address);
    const passedChecks = verification.isValid && meetsSafetyThreshold(alert.safetyScore, thresholds);

    if (!passedChecks && !force) {
      log.warn({ ...label, score: alert.safetyScore }, 'Safety score too low, skipping');
      return {
        outcome: 'lowSafety',
        alert,
        reason: `Safety score ${alert.safetyScore} below ${thresholds.minSafetyScore}`,
        passedChecks,
      };
    }

    this.phase = 'Deciding';
    const failed = failedMarketThresholds(candidate, thresholds);
    if (failed.length > 0) {
      const reason = `Below thresholds: ${describeThresholdFailures(candidate, failed)}`;
      log.debug({ ...label, failed }, reason);
      return { outcome: 'belowThresholds', alert, reason, passedChecks };
    }

    log.info({ ...label, score: alert.safetyScore }, 'Token qualified');
    return { outcome: 'alerted', alert, reason: 'Token meets all criteria', passedChecks };
  }

  /**
   * Record and deliver a qualified token. Returns false when another
   * caller already recorded it, in which case nothing is sent.
   */
  private async emit(evaluation: Evaluation, dryRun: boolean): Promise<boolean> {
    const { alert } = evaluation;
    const label = { symbol: alert.candidate.symbol, address: alert.candidate.address };

    // Forced passes over failed checks are logged, never recorded
    if (!evaluation.passedChecks) {
      log.info({ ...label, isValid: alert.isValid, score: alert.safetyScore }, 'Forced alert logged, token not recorded');
      return true;
    }

    const { value: added, persisted } = await this.deps.state.markProcessed(alert.candidate.address);
    if (!added) {
      log.info(label, 'Token already processed, alert suppressed');
      return false;
    }
    if (!persisted) {
      log.warn({ address: alert.candidate.address }, 'Processed set not persisted');
    }

    if (dryRun) {
      log.info(label, 'Test mode - alert not sent');
      return true;
    }

    this.deps.alerts.enqueue(alert);
    return true;
  }
}
