// ===========================================
// CONFIGURATION LOADER
// ===========================================

import { config } from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from '../types/index.js';

// Load .env file
config();

const booleanFlag = (fallback: boolean) =>
  z.string().optional().transform(val => (val === undefined || val === '' ? fallback : val.toLowerCase() === 'true'));

// Unset and empty numeric variables both fall back to the default
const envNumber = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(val => (val === '' ? undefined : val), schema);

// Environment validation schema
const envSchema = z.object({
  // Telegram - alerts are logged only when the token is missing
  TELEGRAM_BOT_TOKEN: z.string().optional().default(''),
  TELEGRAM_CHAT_ID: z.string().optional().default(''),
  TELEGRAM_COMMANDS_ENABLED: booleanFlag(false),

  // Upstream APIs
  DEXSCREENER_API_URL: z.string().url().default('https://api.dexscreener.com/latest/dex'),
  SOLANA_RPC_URL: z.string().url().default('https://api.mainnet-beta.solana.com'),
  SOLANA_RPC_KEY: z.string().optional().default(''),
  RUGCHECK_API_URL: z.string().url().default('https://api.rugcheck.xyz/v1'),
  RUGCHECK_API_KEY: z.string().optional().default(''),

  // Persistence - DATABASE_URL switches state storage from files to Postgres
  DATA_DIR: z.string().min(1).default('./data'),
  DATABASE_URL: z.string().optional().default(''),

  // Scanning
  BOT_ENABLED: booleanFlag(false),
  CHECK_INTERVAL_MINUTES: envNumber(z.coerce.number().int().min(1).max(60).default(10)),
  MAX_ALERTS_PER_SCAN: envNumber(z.coerce.number().int().min(1).default(10)),

  // Default thresholds (overridden by the persisted thresholds document)
  MIN_MARKET_CAP: envNumber(z.coerce.number().default(500000)),
  MIN_VOLUME: envNumber(z.coerce.number().default(300000)),
  MIN_PRICE_CHANGE: envNumber(z.coerce.number().default(20)),
  MIN_LIQUIDITY: envNumber(z.coerce.number().default(100000)),
  MIN_BUY_SELL_RATIO: envNumber(z.coerce.number().default(2.0)),
  MIN_SAFETY_SCORE: envNumber(z.coerce.number().min(0).max(100).default(80)),

  // System
  PORT: envNumber(z.coerce.number().int().default(8000)),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    console.error('❌ Invalid environment configuration:');
    console.error(parsed.error.format());
    process.exit(1);
  }

  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    port: e.PORT,

    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    telegramChatId: e.TELEGRAM_CHAT_ID,
    telegramCommandsEnabled: e.TELEGRAM_COMMANDS_ENABLED,

    dexScreenerApiUrl: e.DEXSCREENER_API_URL.replace(/\/+$/, ''),
    solanaRpcUrl: e.SOLANA_RPC_URL,
    solanaRpcKey: e.SOLANA_RPC_KEY,
    rugCheckApiUrl: e.RUGCHECK_API_URL.replace(/\/+$/, ''),
    rugCheckApiKey: e.RUGCHECK_API_KEY,

    dataDir: e.DATA_DIR,
    databaseUrl: e.DATABASE_URL,

    bot: {
      enabled: e.BOT_ENABLED,
      checkIntervalMinutes: e.CHECK_INTERVAL_MINUTES,
      maxAlertsPerScan: e.MAX_ALERTS_PER_SCAN,
    },

    thresholds: {
      minMarketCap: e.MIN_MARKET_CAP,
      minVolume: e.MIN_VOLUME,
      minPriceChangePct: e.MIN_PRICE_CHANGE,
      minLiquidity: e.MIN_LIQUIDITY,
      minBuySellRatio: e.MIN_BUY_SELL_RATIO,
      minSafetyScore: e.MIN_SAFETY_SCORE,
    },
  };
}

export const appConfig = loadConfig();
export default appConfig;
