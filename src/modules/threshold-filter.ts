// ===========================================
// THRESHOLD FILTER
// ===========================================

import type { MarketThresholdKey, ThresholdConfig, TokenCandidate } from '../types/index.js';

const MARKET_CHECKS: ReadonlyArray<{ key: MarketThresholdKey; value: (c: TokenCandidate) => number }> = [
  { key: 'minMarketCap', value: c => c.marketCapUsd },
  { key: 'minVolume', value: c => c.volume24hUsd },
  { key: 'minPriceChangePct', value: c => c.priceChangePct24h },
  { key: 'minLiquidity', value: c => c.liquidityUsd },
  { key: 'minBuySellRatio', value: c => c.buySellRatio },
];

/**
 * Market thresholds the candidate misses. Plain `>=` on the normalized
 * values: a field that defaulted to 0 fails any positive minimum.
 */
export function failedMarketThresholds(candidate: TokenCandidate, thresholds: ThresholdConfig): MarketThresholdKey[] {
  return MARKET_CHECKS
    .filter(check => !(check.value(candidate) >= thresholds[check.key]))
    .map(check => check.key);
}

export function meetsSafetyThreshold(score: number, thresholds: ThresholdConfig): boolean {
  return score >= thresholds.minSafetyScore;
}

export function describeThresholdFailures(candidate: TokenCandidate, failed: MarketThresholdKey[]): string {
  const labels: Record<MarketThresholdKey, string> = {
    minMarketCap: `market cap ${candidate.marketCapUsd}`,
    minVolume: `volume ${candidate.volume24hUsd}`,
    minPriceChangePct: `price change ${candidate.priceChangePct24h}%`,
    minLiquidity: `liquidity ${candidate.liquidityUsd}`,
    minBuySellRatio: `buy/sell ratio ${candidate.buySellRatio}`,
  };
  return failed.map(key => labels[key]).join(', ');
}
