// ===========================================
// SHARED TYPES
// ===========================================

// ============ MARKET DATA ============

export interface TokenCandidate {
  address: string;
  name: string;
  symbol: string;
  marketCapUsd: number;
  volume24hUsd: number;
  priceChangePct24h: number;
  liquidityUsd: number;
  // buys/sells over 24h; Infinity when there are only buys
  buySellRatio: number;
  priceUsd: number;
  sourceUrl: string;
}

// ============ SAFETY ============

export type RiskLevel = 'VERY_LOW' | 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH';

export interface SafetyAssessment {
  address: string;
  score: number;
  riskLevel: RiskLevel;
  riskFactors: string[];
  isHeuristic: boolean;
}

// ============ VERIFICATION ============

export type VerificationSource =
  | 'KnownList'
  | 'RpcMetadata'
  | 'RpcAccountInfo'
  | 'PermissiveFallback'
  | 'InvalidFormat';

export interface VerificationResult {
  address: string;
  isValid: boolean;
  source: VerificationSource;
}

export interface TokenSupply {
  amount: string;
  decimals: number;
  fromAccountInfo: boolean;
}

export interface TokenAccountSummary {
  address: string;
  amount: string;
  uiAmount: number;
}

export interface TokenChainInfo {
  address: string;
  decimals: number;
  supply: string;
  accounts: TokenAccountSummary[];
}

// ============ THRESHOLDS ============

export interface ThresholdConfig {
  minMarketCap: number;
  minVolume: number;
  minPriceChangePct: number;
  minLiquidity: number;
  minBuySellRatio: number;
  minSafetyScore: number;
}

export type MarketThresholdKey = Exclude<keyof ThresholdConfig, 'minSafetyScore'>;

// ============ ALERTS ============

export interface TokenAlert {
  candidate: TokenCandidate;
  safetyScore: number;
  isValid: boolean;
  verificationSource: VerificationSource;
}

export interface AlertRecord extends TokenAlert {
  id: string;
  timestamp: string;
  delivered: boolean;
}

// ============ PIPELINE ============

export interface ScanSummary {
  startedAt: string;
  finishedAt: string;
  force: boolean;
  candidates: number;
  skippedProcessed: number;
  invalid: number;
  lowSafety: number;
  belowThresholds: number;
  alerted: number;
}

export interface SpecificTokenResult {
  address: string;
  qualified: boolean;
  reason: string;
  candidate?: TokenCandidate;
  safetyScore?: number;
  isValid?: boolean;
}

export interface TokenDiagnostic {
  address: string;
  isValid: boolean;
  verificationSource: VerificationSource;
  safetyScore: number;
  isSafe: boolean;
  name?: string;
  symbol?: string;
}

export interface BotStatus {
  enabled: boolean;
  testMode: boolean;
  scanInProgress: boolean;
  lastRunAt: string | null;
  lastScan: ScanSummary | null;
  checkIntervalMinutes: number;
  processedCount: number;
  thresholds: ThresholdConfig;
  queueDepth: number;
  verifierIntervalMs: number;
  uptimeMs: number;
}

// ============ CONFIG ============

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  port: number;

  telegramBotToken: string;
  telegramChatId: string;
  telegramCommandsEnabled: boolean;

  dexScreenerApiUrl: string;
  solanaRpcUrl: string;
  solanaRpcKey: string;
  rugCheckApiUrl: string;
  rugCheckApiKey: string;

  dataDir: string;
  databaseUrl: string;

  bot: {
    enabled: boolean;
    checkIntervalMinutes: number;
    maxAlertsPerScan: number;
  };

  thresholds: ThresholdConfig;
}
