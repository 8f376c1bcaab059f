import { describe, expect, it } from 'vitest';
import {
  describeThresholdFailures,
  failedMarketThresholds,
  meetsSafetyThreshold,
} from './threshold-filter.js';
import type { ThresholdConfig, TokenCandidate } from '../types/index.js';

const thresholds: ThresholdConfig = {
  minMarketCap: 500000,
  minVolume: 300000,
  minPriceChangePct: 20,
  minLiquidity: 100000,
  minBuySellRatio: 2.0,
  minSafetyScore: 80,
};

const candidate: TokenCandidate = {
  address: 'EKpQGSJtjMFqKZ9KQanSqYXRcF8fBopzLHYxdM65zcjm',
  name: 'Test Token',
  symbol: 'TEST',
  marketCapUsd: 600000,
  volume24hUsd: 400000,
  priceChangePct24h: 25,
  liquidityUsd: 150000,
  buySellRatio: 2.5,
  priceUsd: 0.01,
  sourceUrl: 'https://dexscreener.com/solana/test',
};

describe('threshold filter', () => {
  it('passes a candidate above every minimum', () => {
    expect(failedMarketThresholds(candidate, thresholds)).toEqual([]);
  });

  it('treats each minimum as inclusive', () => {
    const exact = {
      ...candidate,
      marketCapUsd: 500000,
      volume24hUsd: 300000,
      priceChangePct24h: 20,
      liquidityUsd: 100000,
      buySellRatio: 2.0,
    };
    expect(failedMarketThresholds(exact, thresholds)).toEqual([]);
    expect(meetsSafetyThreshold(80, thresholds)).toBe(true);
  });

  it('fails a single field just below its minimum', () => {
    expect(failedMarketThresholds({ ...candidate, volume24hUsd: 299999.99 }, thresholds)).toEqual(['minVolume']);
  });

  it('fails defaulted zero fields', () => {
    const empty = { ...candidate, marketCapUsd: 0, liquidityUsd: 0 };
    expect(failedMarketThresholds(empty, thresholds)).toEqual(['minMarketCap', 'minLiquidity']);
  });

  it('lets an infinite buy/sell ratio through', () => {
    expect(failedMarketThresholds({ ...candidate, buySellRatio: Infinity }, thresholds)).toEqual([]);
  });

  it('rejects a safety score just below the minimum', () => {
    expect(meetsSafetyThreshold(79.9, thresholds)).toBe(false);
  });

  it('describes failures for logs', () => {
    const low = { ...candidate, marketCapUsd: 1000, priceChangePct24h: 3 };
    expect(describeThresholdFailures(low, failedMarketThresholds(low, thresholds))).toBe(
      'market cap 1000, price change 3%'
    );
  });
});
