// ===========================================
// SOLANA TOKEN SIGNAL BOT - MAIN ENTRY POINT
// ===========================================

import type { Server } from 'http';
import { appConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { createStateStore } from './modules/state-store.js';
import { BotState } from './modules/bot-state.js';
import { DexScreenerClient } from './modules/market-data.js';
import { RugCheckClient } from './modules/safety-scorer.js';
import { SolanaChainVerifier } from './modules/chain-verifier.js';
import { NotificationQueue } from './modules/notification-queue.js';
import { TelegramNotifier, formatStartupMessage } from './modules/telegram.js';
import { QualificationPipeline } from './modules/pipeline.js';
import { ScanScheduler } from './modules/scheduler.js';
import { buildStatus, createControlApp, SERVICE_VERSION } from './modules/control-api.js';

// ============ STARTUP ============

function logDiagnostics(): void {
  logger.info('='.repeat(50));
  logger.info({ version: SERVICE_VERSION }, 'SOLANA TOKEN SIGNAL BOT');
  logger.info('='.repeat(50));
  logger.info({
    env: appConfig.nodeEnv,
    port: appConfig.port,
    dexScreener: appConfig.dexScreenerApiUrl,
    solanaRpc: appConfig.solanaRpcUrl,
    rpcKeyConfigured: appConfig.solanaRpcKey !== '',
    rugCheck: appConfig.rugCheckApiUrl,
    rugCheckKeyConfigured: appConfig.rugCheckApiKey !== '',
    telegramConfigured: appConfig.telegramBotToken !== '' && appConfig.telegramChatId !== '',
    storage: appConfig.databaseUrl ? 'postgres' : appConfig.dataDir,
  }, 'Starting up...');
}

async function main(): Promise<void> {
  const startedAt = Date.now();
  logDiagnostics();

  // Restore persisted state over the configured defaults
  const store = createStateStore({ databaseUrl: appConfig.databaseUrl, dataDir: appConfig.dataDir });
  const state = new BotState(store, {
    thresholds: appConfig.thresholds,
    checkIntervalMinutes: appConfig.bot.checkIntervalMinutes,
    enabled: appConfig.bot.enabled,
  });
  await state.load();

  const marketData = new DexScreenerClient({ baseUrl: appConfig.dexScreenerApiUrl });
  const scorer = new RugCheckClient({ apiUrl: appConfig.rugCheckApiUrl, apiKey: appConfig.rugCheckApiKey });
  const verifier = new SolanaChainVerifier({ rpcUrl: appConfig.solanaRpcUrl, rpcKey: appConfig.solanaRpcKey });

  const notifier = new TelegramNotifier({
    token: appConfig.telegramBotToken,
    chatId: appConfig.telegramChatId,
  });
  const queue = new NotificationQueue(notifier);

  const pipeline = new QualificationPipeline({
    marketData,
    verifier,
    scorer,
    state,
    alerts: queue,
    maxAlertsPerScan: appConfig.bot.maxAlertsPerScan,
  });
  const scheduler = new ScanScheduler(pipeline, state);

  const getStatus = () => buildStatus({ state, pipeline, scheduler, queue, verifier, startedAt });

  const app = createControlApp({
    state,
    pipeline,
    alerts: queue,
    chain: verifier,
    marketData,
    scorer,
    notifier,
    getStatus,
  });
  const server: Server = app.listen(appConfig.port, '0.0.0.0', () => {
    logger.info({ port: appConfig.port, host: '0.0.0.0' }, 'Control API listening');
  });
  server.on('error', (error) => {
    logger.error({ error: error.message }, 'Control API server error');
  });

  if (appConfig.telegramCommandsEnabled) {
    notifier.startCommands({
      getStatus,
      getThresholds: () => state.getThresholds(),
      runScan: () => pipeline.runScan(),
    });
  }

  await notifier.sendMessage(formatStartupMessage({
    startedAt: new Date(startedAt).toISOString(),
    enabled: state.isEnabled(),
    checkIntervalMinutes: state.getCheckInterval(),
    processedCount: state.processedCount,
  }));

  scheduler.start();
  logger.info({ enabled: state.isEnabled() }, 'Bot is running! Press Ctrl+C to stop.');

  // Handle graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    await scheduler.stop();
    await notifier.stop();
    await new Promise<void>(resolve => server.close(() => resolve()));
    await queue.stop();

    if (!(await state.persistAll())) {
      logger.warn('State not fully persisted on shutdown');
    }
    await store.close();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

// ============ RUN ============

main().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Fatal error during startup');
  process.exit(1);
});
