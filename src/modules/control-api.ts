// ===========================================
// CONTROL API
// HTTP surface for status, thresholds and manual scans
// ===========================================

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { componentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/parse.js';
import { thresholdUpdateSchema, type BotState } from './bot-state.js';
import {
  INTEGRATION_TEST_MESSAGE,
  formatIntegrationsWorkingMessage,
  formatIntervalChangeMessage,
  formatThresholdsMessage,
} from './telegram.js';
import type { QualificationPipeline } from './pipeline.js';
import type { MarketDataSource } from './market-data.js';
import type { SafetyScorer } from './safety-scorer.js';
import type { NotificationQueue, Notifier } from './notification-queue.js';
import type { ScanScheduler } from './scheduler.js';
import type { ChainVerifier, SolanaChainVerifier } from './chain-verifier.js';
import type { AlertRecord, BotStatus } from '../types/index.js';

const log = componentLogger('control-api');

export const SERVICE_NAME = 'solana-token-signal-bot';
export const SERVICE_VERSION = '1.0.0';

// Long-lived tokens every upstream should know
export const INTEGRATION_TEST_TOKENS: Readonly<Record<string, string>> = {
  EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v: 'USDC',
  DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263: 'BONK',
  '7dHbWXmci3dT8UFYWYZweBLXgycu7Y3iL6trKn1Y7ARj': 'stSOL',
};

const booleanParam = z.enum(['true', 'false']).transform(value => value === 'true');
const alertLimitParam = z.coerce.number().int().min(1).max(200).default(20);

// ============ STATUS ============

export interface StatusSources {
  state: BotState;
  pipeline: Pick<QualificationPipeline, 'isScanning' | 'getLastScan'>;
  scheduler: Pick<ScanScheduler, 'getLastRunAt'>;
  queue: Pick<NotificationQueue, 'depth'>;
  verifier: Pick<ChainVerifier, 'currentIntervalMs'>;
  startedAt: number;
  clock?: () => number;
}

export function buildStatus(sources: StatusSources): BotStatus {
  const clock = sources.clock ?? Date.now;
  const { state } = sources;

  return {
    enabled: state.isEnabled(),
    testMode: state.isTestMode(),
    scanInProgress: sources.pipeline.isScanning(),
    lastRunAt: sources.scheduler.getLastRunAt(),
    lastScan: sources.pipeline.getLastScan(),
    checkIntervalMinutes: state.getCheckInterval(),
    processedCount: state.processedCount,
    thresholds: state.getThresholds(),
    queueDepth: sources.queue.depth,
    verifierIntervalMs: sources.verifier.currentIntervalMs,
    uptimeMs: clock() - sources.startedAt,
  };
}

// ============ DEPENDENCIES ============

export interface ControlApiDeps {
  state: BotState;
  pipeline: Pick<QualificationPipeline, 'runScan' | 'checkSpecificToken' | 'verifyToken'>;
  alerts: Pick<NotificationQueue, 'getHistory'>;
  chain: Pick<SolanaChainVerifier, 'getTokenInfo' | 'isValidToken'>;
  marketData: Pick<MarketDataSource, 'fetchPairByAddress'>;
  scorer: Pick<SafetyScorer, 'getSafetyScore'>;
  notifier: Notifier;
  getStatus: () => BotStatus;
  now?: () => Date;
}

// ============ INTEGRATION CHECK ============

type IntegrationStatus = 'success' | 'failed' | 'error';

export interface IntegrationResult {
  status: IntegrationStatus;
  results?: Array<Record<string, unknown>>;
  error?: string;
}

export interface IntegrationReport {
  timestamp: string;
  all_working: boolean;
  results: {
    dexscreener: IntegrationResult;
    rugcheck: IntegrationResult;
    solana_verification: IntegrationResult;
    telegram: IntegrationResult;
  };
}

async function checkIntegration(
  run: () => Promise<{ ok: boolean; results?: Array<Record<string, unknown>> }>
): Promise<IntegrationResult> {
  try {
    const { ok, results } = await run();
    return results ? { status: ok ? 'success' : 'failed', results } : { status: ok ? 'success' : 'failed' };
  } catch (error) {
    return { status: 'error', error: errorMessage(error) };
  }
}

/**
 * Exercise every upstream with well-known tokens and send a Telegram
 * test message. A follow-up message goes out when everything works.
 */
export async function runIntegrationCheck(
  deps: Pick<ControlApiDeps, 'marketData' | 'scorer' | 'chain' | 'notifier'>,
  now: () => Date
): Promise<IntegrationReport> {
  const tokens = Object.entries(INTEGRATION_TEST_TOKENS);

  const dexscreener = await checkIntegration(async () => {
    const results: Array<Record<string, unknown>> = [];
    for (const [address, symbol] of tokens) {
      const pair = await deps.marketData.fetchPairByAddress(address);
      results.push(pair
        ? { address, symbol, found: true, data: { name: pair.name, liquidity: pair.liquidityUsd } }
        : { address, symbol, found: false });
    }
    return { ok: results.some(result => result.found === true), results };
  });

  const rugcheck = await checkIntegration(async () => {
    const results: Array<Record<string, unknown>> = [];
    for (const [address, symbol] of tokens) {
      results.push({ address, symbol, safety_score: await deps.scorer.getSafetyScore(address) });
    }
    return { ok: true, results };
  });

  const solanaVerification = await checkIntegration(async () => {
    const results: Array<Record<string, unknown>> = [];
    for (const [address, symbol] of tokens) {
      results.push({ address, symbol, is_valid: await deps.chain.isValidToken(address) });
    }
    return { ok: true, results };
  });

  const telegram = await checkIntegration(async () => ({
    ok: await deps.notifier.sendMessage(INTEGRATION_TEST_MESSAGE),
  }));

  const results = { dexscreener, rugcheck, solana_verification: solanaVerification, telegram };
  const allWorking = Object.values(results).every(result => result.status === 'success');
  const timestamp = now().toISOString();

  if (allWorking) {
    await deps.notifier.sendMessage(formatIntegrationsWorkingMessage(timestamp));
  }
  log.info({ allWorking }, 'API integration check complete');

  return { timestamp, all_working: allWorking, results };
}

export function buildSampleAlert(now: Date): AlertRecord {
  const stamp = now.toISOString().slice(11, 19).replace(/:/g, '');
  return {
    id: uuidv4(),
    timestamp: now.toISOString(),
    candidate: {
      address: `test_address_${stamp}`,
      name: '[TEST] Sample Token',
      symbol: 'TEST',
      marketCapUsd: 2_500_000,
      volume24hUsd: 500_000,
      priceChangePct24h: 25.5,
      liquidityUsd: 100_000,
      buySellRatio: 2.5,
      priceUsd: 0.0025,
      sourceUrl: 'https://dexscreener.com',
    },
    safetyScore: 85,
    isValid: true,
    verificationSource: 'KnownList',
    delivered: false,
  };
}

// ============ APP ============

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function badRequest(res: Response, error: string, issues?: z.ZodIssue[]): void {
  res.status(400).json(issues ? { error, issues } : { error });
}

export function createControlApp(deps: ControlApiDeps): Express {
  const { state, pipeline } = deps;
  const now = deps.now ?? (() => new Date());

  const app = express();
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.status(200).json({ name: SERVICE_NAME, version: SERVICE_VERSION, status: 'running' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy', timestamp: now().toISOString() });
  });

  app.get('/status', (_req: Request, res: Response) => {
    res.status(200).json(deps.getStatus());
  });

  // ============ BOT CONTROL ============

  app.post('/toggle', route(async (req, res) => {
    const parsed = booleanParam.safeParse(req.query.enable);
    if (!parsed.success) {
      badRequest(res, 'Query parameter enable must be true or false');
      return;
    }

    const { value, persisted } = await state.setEnabled(parsed.data);
    res.status(200).json({ status: 'success', enabled: value, persisted });
  }));

  app.post('/test-mode/:enable', route(async (req, res) => {
    const parsed = booleanParam.safeParse(req.params.enable);
    if (!parsed.success) {
      badRequest(res, 'Test mode must be true or false');
      return;
    }

    const { value, persisted } = await state.setTestMode(parsed.data);
    res.status(200).json({ status: 'success', test_mode: value, persisted });
  }));

  app.post('/check-interval/:minutes', route(async (req, res) => {
    try {
      const { value, persisted } = await state.setCheckInterval(Number(req.params.minutes));
      if (!(await deps.notifier.sendMessage(formatIntervalChangeMessage(value)))) {
        log.warn({ minutes: value }, 'Interval change not announced on Telegram');
      }
      res.status(200).json({ status: 'success', check_interval: value, persisted });
    } catch (error) {
      if (error instanceof RangeError) {
        badRequest(res, `Invalid interval: ${req.params.minutes} (${error.message})`);
        return;
      }
      throw error;
    }
  }));

  // ============ THRESHOLDS ============

  app.get('/thresholds', (_req: Request, res: Response) => {
    res.status(200).json(state.getThresholds());
  });

  app.post('/thresholds', route(async (req, res) => {
    const parsed = thresholdUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, 'Invalid thresholds', parsed.error.issues);
      return;
    }

    const { value, persisted } = await state.updateThresholds(parsed.data);
    res.status(200).json({ status: 'success', thresholds: value, persisted });
  }));

  app.post('/send-thresholds-telegram', route(async (_req, res) => {
    const sent = await deps.notifier.sendMessage(formatThresholdsMessage(state.getThresholds()));
    if (sent) {
      res.status(200).json({ status: 'success', message: 'Thresholds sent to Telegram' });
    } else {
      res.status(502).json({ status: 'error', message: 'Failed to send thresholds to Telegram' });
    }
  }));

  // ============ SCANS ============

  app.post('/run-now', route(async (_req, res) => {
    if (!state.isEnabled()) {
      badRequest(res, 'Bot is disabled. Enable it first.');
      return;
    }

    const summary = await pipeline.runScan();
    res.status(200).json({ status: 'success', summary });
  }));

  app.post('/check-now', (_req: Request, res: Response) => {
    pipeline.runScan().catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, 'Triggered scan failed');
    });
    res.status(202).json({ status: 'success', message: 'Token check triggered' });
  });

  app.post('/force-threshold-check', route(async (_req, res) => {
    const summary = await pipeline.runScan({ force: true });
    res.status(200).json({ status: 'success', summary });
  }));

  // ============ DIAGNOSTICS ============

  app.get('/test-api-integrations', route(async (_req, res) => {
    res.status(200).json(await runIntegrationCheck(deps, now));
  }));

  app.post('/test-alert', route(async (_req, res) => {
    const alert = buildSampleAlert(now());
    if (await deps.notifier.sendTokenAlert(alert)) {
      res.status(200).json({ status: 'success', message: 'Test alert sent', address: alert.candidate.address });
    } else {
      res.status(502).json({ status: 'error', message: 'Failed to send test alert' });
    }
  }));

  // ============ TOKENS ============

  app.get('/tokens', (_req: Request, res: Response) => {
    const tokens = state.getProcessedTokens();
    res.status(200).json({ token_count: tokens.length, tokens });
  });

  app.get('/alerts', (req: Request, res: Response) => {
    const parsed = alertLimitParam.safeParse(req.query.limit);
    if (!parsed.success) {
      badRequest(res, 'limit must be an integer between 1 and 200');
      return;
    }
    res.status(200).json(deps.alerts.getHistory(parsed.data));
  });

  app.get('/verify-token/:address', route(async (req, res) => {
    res.status(200).json(await pipeline.verifyToken(req.params.address));
  }));

  app.get('/token-info/:address', route(async (req, res) => {
    const info = await deps.chain.getTokenInfo(req.params.address);
    if (!info) {
      res.status(404).json({ error: 'Token mint not found on chain' });
      return;
    }
    res.status(200).json(info);
  }));

  app.post('/verify-and-alert/:address', route(async (req, res) => {
    const result = await pipeline.checkSpecificToken(req.params.address);
    res.status(200).json({ status: result.qualified ? 'success' : 'failed', ...result });
  }));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isRecord(error) && error.type === 'entity.parse.failed') {
      badRequest(res, 'Request body is not valid JSON');
      return;
    }
    log.error({ path: req.path, error: errorMessage(error) }, 'Request failed');
    res.status(500).json({ error: errorMessage(error) });
  });

  return app;
}
