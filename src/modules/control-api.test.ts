import { describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import {
  INTEGRATION_TEST_TOKENS,
  buildStatus,
  createControlApp,
  SERVICE_NAME,
  SERVICE_VERSION,
} from './control-api.js';
import { BotState } from './bot-state.js';
import {
  INTEGRATION_TEST_MESSAGE,
  formatIntegrationsWorkingMessage,
  formatIntervalChangeMessage,
  formatThresholdsMessage,
} from './telegram.js';
import { MemoryStateStore } from '../test-support/memory-store.js';
import { JUP, WIF, defaultThresholds, makeAlertRecord, makeCandidate } from '../test-support/fixtures.js';
import type {
  BotStatus,
  ScanSummary,
  AlertRecord,
  SpecificTokenResult,
  TokenCandidate,
  TokenChainInfo,
  TokenDiagnostic,
} from '../types/index.js';

const summary: ScanSummary = {
  startedAt: '2024-05-01T12:00:00.000Z',
  finishedAt: '2024-05-01T12:00:02.000Z',
  force: false,
  candidates: 5,
  skippedProcessed: 1,
  invalid: 0,
  lowSafety: 1,
  belowThresholds: 2,
  alerted: 1,
};

function setup(enabled = true) {
  const store = new MemoryStateStore();
  const state = new BotState(store, {
    thresholds: defaultThresholds,
    checkIntervalMinutes: 10,
    enabled,
  });

  const diagnostic: TokenDiagnostic = {
    address: WIF,
    isValid: true,
    verificationSource: 'KnownList',
    safetyScore: 80,
    isSafe: true,
    name: 'dogwifhat',
    symbol: 'WIF',
  };
  const specific: SpecificTokenResult = { address: JUP, qualified: false, reason: 'No trading pair found' };

  const pipeline = {
    runScan: vi.fn(async () => summary),
    checkSpecificToken: vi.fn(async () => specific),
    verifyToken: vi.fn(async () => diagnostic),
  };
  const alerts = { getHistory: vi.fn((_limit?: number) => [makeAlertRecord({ delivered: true })]) };
  const tokenInfo: TokenChainInfo = {
    address: WIF,
    decimals: 6,
    supply: '998843000000000',
    accounts: [{ address: 'Holder1111111111111111111111111111111111111', amount: '1000', uiAmount: 0.001 }],
  };
  const chain = {
    getTokenInfo: vi.fn(async (address: string) => (address === WIF ? tokenInfo : null)),
    isValidToken: vi.fn(async (_address: string) => true),
  };
  const marketData = {
    fetchPairByAddress: vi.fn(async (address: string): Promise<TokenCandidate | null> =>
      INTEGRATION_TEST_TOKENS[address] === 'USDC' ? makeCandidate({ address, name: 'USD Coin', liquidityUsd: 5_000_000 }) : null),
  };
  const scorer = { getSafetyScore: vi.fn(async (_address: string) => 95) };
  const notifier = {
    sendMessage: vi.fn(async (_text: string) => true),
    sendTokenAlert: vi.fn(async (_alert: AlertRecord) => true),
  };
  const status: BotStatus = {
    enabled,
    testMode: false,
    scanInProgress: false,
    lastRunAt: null,
    lastScan: null,
    checkIntervalMinutes: 10,
    processedCount: 0,
    thresholds: defaultThresholds,
    queueDepth: 0,
    verifierIntervalMs: 2000,
    uptimeMs: 5000,
  };

  const app = createControlApp({
    state,
    pipeline,
    alerts,
    chain,
    marketData,
    scorer,
    notifier,
    getStatus: () => status,
    now: () => new Date('2024-05-01T12:00:00.000Z'),
  });

  return { app, state, store, pipeline, alerts, chain, marketData, scorer, notifier, diagnostic, tokenInfo };
}

describe('control API', () => {
  it('serves the banner and health check', async () => {
    const { app } = setup();

    const root = await request(app).get('/');
    expect(root.body).toEqual({ name: SERVICE_NAME, version: SERVICE_VERSION, status: 'running' });

    const health = await request(app).get('/health');
    expect(health.status).toBe(200);
    expect(health.body).toEqual({ status: 'healthy', timestamp: '2024-05-01T12:00:00.000Z' });
  });

  it('reports status', async () => {
    const { app } = setup();

    const res = await request(app).get('/status');
    expect(res.body).toMatchObject({ enabled: true, checkIntervalMinutes: 10, verifierIntervalMs: 2000 });
  });

  describe('POST /toggle', () => {
    it('sets the enabled flag', async () => {
      const { app, state, store } = setup(false);

      const res = await request(app).post('/toggle?enable=true');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'success', enabled: true, persisted: true });
      expect(state.isEnabled()).toBe(true);
      expect(store.get('state')).toEqual({ enabled: true, testMode: false });
    });

    it('rejects a missing or unparsable flag', async () => {
      const { app } = setup();

      await request(app).post('/toggle').expect(400);
      await request(app).post('/toggle?enable=yes').expect(400);
    });

    it('reports a write that did not reach the store', async () => {
      const { app, state, store } = setup(false);
      store.failWrites = true;

      const res = await request(app).post('/toggle?enable=true');

      expect(res.body).toEqual({ status: 'success', enabled: true, persisted: false });
      expect(state.isEnabled()).toBe(true);
    });
  });

  describe('thresholds', () => {
    it('returns the current thresholds', async () => {
      const { app } = setup();

      const res = await request(app).get('/thresholds');
      expect(res.body).toEqual(defaultThresholds);
    });

    it('applies a partial update', async () => {
      const { app, state } = setup();

      const res = await request(app).post('/thresholds').send({ minMarketCap: 750000, minSafetyScore: 70 });

      expect(res.status).toBe(200);
      expect(res.body.thresholds).toEqual({ ...defaultThresholds, minMarketCap: 750000, minSafetyScore: 70 });
      expect(res.body.persisted).toBe(true);
      expect(state.getThresholds().minMarketCap).toBe(750000);
    });

    it('rejects out-of-range, unknown and mistyped fields', async () => {
      const { app, state } = setup();

      await request(app).post('/thresholds').send({ minSafetyScore: 150 }).expect(400);
      await request(app).post('/thresholds').send({ minHolders: 10 }).expect(400);
      await request(app).post('/thresholds').send({ minVolume: '300000' }).expect(400);
      expect(state.getThresholds()).toEqual(defaultThresholds);
    });

    it('rejects a body that is not JSON', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/thresholds')
        .set('Content-Type', 'application/json')
        .send('{"minVolume":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Request body is not valid JSON' });
    });

    it('posts the thresholds to the chat', async () => {
      const { app, notifier } = setup();

      await request(app).post('/send-thresholds-telegram').expect(200);
      expect(notifier.sendMessage).toHaveBeenCalledWith(formatThresholdsMessage(defaultThresholds));

      notifier.sendMessage.mockResolvedValueOnce(false);
      const failed = await request(app).post('/send-thresholds-telegram');
      expect(failed.status).toBe(502);
      expect(failed.body.status).toBe('error');
    });
  });

  describe('scans', () => {
    it('refuses a manual scan while disabled', async () => {
      const { app, pipeline } = setup(false);

      const res = await request(app).post('/run-now');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Bot is disabled. Enable it first.' });
      expect(pipeline.runScan).not.toHaveBeenCalled();
    });

    it('waits for a manual scan and returns its summary', async () => {
      const { app } = setup();

      const res = await request(app).post('/run-now');
      expect(res.body).toEqual({ status: 'success', summary });
    });

    it('triggers a background check without waiting', async () => {
      const { app, pipeline } = setup();

      const res = await request(app).post('/check-now');

      expect(res.status).toBe(202);
      expect(pipeline.runScan).toHaveBeenCalledTimes(1);
    });

    it('runs a forced scan', async () => {
      const { app, pipeline } = setup(false);

      await request(app).post('/force-threshold-check').expect(200);
      expect(pipeline.runScan).toHaveBeenCalledWith({ force: true });
    });

    it('answers 500 when a scan throws', async () => {
      const { app, pipeline } = setup();
      pipeline.runScan.mockRejectedValueOnce(new Error('store closed'));

      const res = await request(app).post('/force-threshold-check');
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'store closed' });
    });
  });

  describe('mode and interval', () => {
    it('toggles test mode', async () => {
      const { app, state } = setup();

      const res = await request(app).post('/test-mode/true');

      expect(res.body).toEqual({ status: 'success', test_mode: true, persisted: true });
      expect(state.isTestMode()).toBe(true);
      await request(app).post('/test-mode/on').expect(400);
    });

    it('accepts intervals from 1 to 60 minutes', async () => {
      const { app, state, notifier } = setup();

      const res = await request(app).post('/check-interval/5');
      expect(res.body).toEqual({ status: 'success', check_interval: 5, persisted: true });
      expect(state.getCheckInterval()).toBe(5);
      expect(notifier.sendMessage).toHaveBeenCalledTimes(1);
      expect(notifier.sendMessage).toHaveBeenCalledWith(
        '⚙️ The Solana Token Bot check interval has been updated to 5 minutes'
      );

      await request(app).post('/check-interval/0').expect(400);
      await request(app).post('/check-interval/61').expect(400);
      await request(app).post('/check-interval/2.5').expect(400);
      await request(app).post('/check-interval/soon').expect(400);
      expect(state.getCheckInterval()).toBe(5);
      expect(notifier.sendMessage).toHaveBeenCalledTimes(1);
    });

    it('still applies the interval when the announcement fails', async () => {
      const { app, state, notifier } = setup();
      notifier.sendMessage.mockResolvedValueOnce(false);

      await request(app).post('/check-interval/30').expect(200);
      expect(state.getCheckInterval()).toBe(30);
      expect(notifier.sendMessage).toHaveBeenCalledWith(formatIntervalChangeMessage(30));
    });
  });

  describe('diagnostics', () => {
    const USDC = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
    const BONK = 'DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263';
    const STSOL = '7dHbWXmci3dT8UFYWYZweBLXgycu7Y3iL6trKn1Y7ARj';

    it('reports every integration working and says so on Telegram', async () => {
      const { app, notifier, scorer, chain } = setup();

      const res = await request(app).get('/test-api-integrations');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        timestamp: '2024-05-01T12:00:00.000Z',
        all_working: true,
        results: {
          dexscreener: {
            status: 'success',
            results: [
              { address: USDC, symbol: 'USDC', found: true, data: { name: 'USD Coin', liquidity: 5_000_000 } },
              { address: BONK, symbol: 'BONK', found: false },
              { address: STSOL, symbol: 'stSOL', found: false },
            ],
          },
          rugcheck: {
            status: 'success',
            results: [
              { address: USDC, symbol: 'USDC', safety_score: 95 },
              { address: BONK, symbol: 'BONK', safety_score: 95 },
              { address: STSOL, symbol: 'stSOL', safety_score: 95 },
            ],
          },
          solana_verification: {
            status: 'success',
            results: [
              { address: USDC, symbol: 'USDC', is_valid: true },
              { address: BONK, symbol: 'BONK', is_valid: true },
              { address: STSOL, symbol: 'stSOL', is_valid: true },
            ],
          },
          telegram: { status: 'success' },
        },
      });
      expect(scorer.getSafetyScore).toHaveBeenCalledTimes(3);
      expect(chain.isValidToken).toHaveBeenCalledTimes(3);
      expect(notifier.sendMessage.mock.calls.map(([text]) => text)).toEqual([
        INTEGRATION_TEST_MESSAGE,
        formatIntegrationsWorkingMessage('2024-05-01T12:00:00.000Z'),
      ]);
    });

    it('reports failed and erroring integrations without the all-working message', async () => {
      const { app, notifier, marketData, scorer } = setup();
      marketData.fetchPairByAddress.mockResolvedValue(null);
      scorer.getSafetyScore.mockRejectedValueOnce(new Error('rugcheck down'));
      notifier.sendMessage.mockResolvedValueOnce(false);

      const res = await request(app).get('/test-api-integrations');

      expect(res.status).toBe(200);
      expect(res.body.all_working).toBe(false);
      expect(res.body.results.dexscreener.status).toBe('failed');
      expect(res.body.results.rugcheck).toEqual({ status: 'error', error: 'rugcheck down' });
      expect(res.body.results.solana_verification.status).toBe('success');
      expect(res.body.results.telegram).toEqual({ status: 'failed' });
      expect(notifier.sendMessage).toHaveBeenCalledTimes(1);
    });

    it('sends a sample alert', async () => {
      const { app, notifier } = setup();

      const res = await request(app).post('/test-alert');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'success', message: 'Test alert sent', address: 'test_address_120000' });
      expect(notifier.sendTokenAlert).toHaveBeenCalledTimes(1);
      const alert = notifier.sendTokenAlert.mock.calls[0]?.[0];
      expect(alert).toMatchObject({
        timestamp: '2024-05-01T12:00:00.000Z',
        safetyScore: 85,
        candidate: {
          name: '[TEST] Sample Token',
          symbol: 'TEST',
          priceChangePct24h: 25.5,
          volume24hUsd: 500_000,
          marketCapUsd: 2_500_000,
          liquidityUsd: 100_000,
        },
      });
    });

    it('answers 502 when the sample alert is not delivered', async () => {
      const { app, notifier } = setup();
      notifier.sendTokenAlert.mockResolvedValueOnce(false);

      const res = await request(app).post('/test-alert');
      expect(res.status).toBe(502);
      expect(res.body).toEqual({ status: 'error', message: 'Failed to send test alert' });
    });
  });

  describe('tokens and alerts', () => {
    it('lists processed tokens', async () => {
      const { app, state } = setup();
      await state.markProcessed(WIF);
      await state.markProcessed(JUP);

      const res = await request(app).get('/tokens');
      expect(res.body).toEqual({ token_count: 2, tokens: [WIF, JUP] });
    });

    it('returns recent alerts with a bounded limit', async () => {
      const { app, alerts } = setup();

      const res = await request(app).get('/alerts');
      expect(res.body).toHaveLength(1);
      expect(res.body[0].delivered).toBe(true);
      expect(alerts.getHistory).toHaveBeenLastCalledWith(20);

      await request(app).get('/alerts?limit=5').expect(200);
      expect(alerts.getHistory).toHaveBeenLastCalledWith(5);

      await request(app).get('/alerts?limit=0').expect(400);
    });

    it('runs a token diagnostic', async () => {
      const { app, pipeline, diagnostic } = setup();

      const res = await request(app).get(`/verify-token/${WIF}`);

      expect(res.body).toEqual(diagnostic);
      expect(pipeline.verifyToken).toHaveBeenCalledWith(WIF);
    });

    it('returns on-chain token info', async () => {
      const { app, tokenInfo } = setup();

      const res = await request(app).get(`/token-info/${WIF}`);
      expect(res.body).toEqual(tokenInfo);

      await request(app).get(`/token-info/${JUP}`).expect(404);
    });

    it('checks a specific token', async () => {
      const { app, pipeline } = setup();

      const res = await request(app).post(`/verify-and-alert/${JUP}`);

      expect(res.body).toEqual({ status: 'failed', address: JUP, qualified: false, reason: 'No trading pair found' });
      expect(pipeline.checkSpecificToken).toHaveBeenCalledWith(JUP);
    });
  });
});

describe('buildStatus', () => {
  it('collects status from each component', async () => {
    const state = new BotState(new MemoryStateStore(), {
      thresholds: defaultThresholds,
      checkIntervalMinutes: 15,
      enabled: true,
    });
    await state.markProcessed(WIF);

    const status = buildStatus({
      state,
      pipeline: { isScanning: () => true, getLastScan: () => summary },
      scheduler: { getLastRunAt: () => '2024-05-01T11:50:00.000Z' },
      queue: { depth: 2 },
      verifier: { currentIntervalMs: 2800 },
      startedAt: 1_000,
      clock: () => 61_000,
    });

    expect(status).toEqual({
      enabled: true,
      testMode: false,
      scanInProgress: true,
      lastRunAt: '2024-05-01T11:50:00.000Z',
      lastScan: summary,
      checkIntervalMinutes: 15,
      processedCount: 1,
      thresholds: defaultThresholds,
      queueDepth: 2,
      verifierIntervalMs: 2800,
      uptimeMs: 60_000,
    });
  });
});
