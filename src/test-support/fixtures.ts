import type { AlertRecord, ThresholdConfig, TokenCandidate } from '../types/index.js';

export const WIF = 'EKpQGSJtjMFqKZ9KQanSqYXRcF8fBopzLHYxdM65zcjm';
export const JUP = 'JUPyiwrYJFskUPiHa7hkeR8VUtAeFoSYbKedZNsDvCN';
export const RAYDIUM = '675kPX9MHTjS2zt1qfr1NHHS2ny3z6VXYLWQnLa4cYLY';
export const METAPLEX = 'metaqbxxUerdq28cj1RbAWkYQm3ybzjb6a8bt518x1s';

export const defaultThresholds: ThresholdConfig = {
  minMarketCap: 500000,
  minVolume: 300000,
  minPriceChangePct: 20,
  minLiquidity: 100000,
  minBuySellRatio: 2.0,
  minSafetyScore: 80,
};

export function makeCandidate(overrides: Partial<TokenCandidate> = {}): TokenCandidate {
  const address = overrides.address ?? WIF;
  return {
    address,
    name: 'Test Token',
    symbol: 'TEST',
    marketCapUsd: 600000,
    volume24hUsd: 400000,
    priceChangePct24h: 25,
    liquidityUsd: 150000,
    buySellRatio: 2.5,
    priceUsd: 0.0123,
    sourceUrl: `https://dexscreener.com/solana/${address}`,
    ...overrides,
  };
}

export function makeAlertRecord(overrides: Partial<AlertRecord> = {}): AlertRecord {
  return {
    id: '00000000-0000-4000-8000-000000000001',
    timestamp: '2024-05-01T12:00:00.000Z',
    candidate: makeCandidate(),
    safetyScore: 85,
    isValid: true,
    verificationSource: 'RpcMetadata',
    delivered: false,
    ...overrides,
  };
}
