// ===========================================
// MODULE 1: MARKET DATA SOURCE (DexScreener)
// Candidate discovery and pair lookup
// ===========================================

import axios, { AxiosInstance } from 'axios';
import { appConfig } from '../config/index.js';
import { componentLogger } from '../utils/logger.js';
import { TTLCache, type Clock } from '../utils/rate-limiter.js';
import { classifyUpstreamError } from '../utils/errors.js';
import { asRecord, isRecord, nestedOrScalar, toNumber, toText } from '../utils/parse.js';
import type { TokenCandidate } from '../types/index.js';

const log = componentLogger('dexscreener');

// ============ CONSTANTS ============

const CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes
const REQUEST_TIMEOUT_MS = 15000;
const MIN_ADDRESS_LENGTH = 10;
const CANDIDATES_CACHE_KEY = 'solana:candidates';

// Liquidity is taken as ~20% of market cap when nothing better exists
const LIQUIDITY_TO_MARKET_CAP = 5;

const ALTERNATE_BASE_URLS = [
  'https://api.dexscreener.com/latest/dex',
  'https://api.dexscreener.io/latest/dex',
  'https://api.dexscreener.com/v2/dex',
];

const CANDIDATE_PATHS = [
  '/search/trending?chain=solana',
  '/tokens/solana',
  '/search?q=solana',
];

// ============ NORMALIZATION ============

/**
 * Unwrap the three payload shapes the aggregator has been seen to return:
 * `{ pairs: [...] }`, a bare non-empty list, or `{ data: [...] }`.
 */
export function extractPairList(payload: unknown): unknown[] | null {
  if (isRecord(payload) && Array.isArray(payload.pairs)) {
    return payload.pairs;
  }
  if (Array.isArray(payload) && payload.length > 0) {
    return payload;
  }
  if (isRecord(payload) && Array.isArray(payload.data)) {
    return payload.data;
  }
  return null;
}

function resolveBaseToken(pair: Record<string, unknown>): Record<string, unknown> {
  if (isRecord(pair.baseToken) && Object.keys(pair.baseToken).length > 0) {
    return pair.baseToken;
  }
  const tokens = asRecord(pair.tokens);
  if (isRecord(tokens.base)) {
    return tokens.base;
  }
  return asRecord(pair.base);
}

function resolveMarketCap(pair: Record<string, unknown>, priceUsd: number, liquidityUsd: number): number {
  const direct = toNumber(pair.fdv) || toNumber(pair.marketCap) || toNumber(asRecord(pair.market).cap);
  if (direct !== 0) return direct;

  const supply = toNumber(pair.supply);
  if (supply > 0 && priceUsd > 0) {
    return supply * priceUsd;
  }

  if (liquidityUsd > 0) {
    return liquidityUsd * LIQUIDITY_TO_MARKET_CAP;
  }

  return 0;
}

export function computeBuySellRatio(buys: number, sells: number): number {
  if (sells > 0) return buys / sells;
  if (buys > 0) return Infinity;
  return 1.0;
}

/**
 * Turn one raw pair into a candidate. Every numeric field falls back to 0
 * on its own; the record is dropped only when no plausible address exists.
 */
export function normalizePair(raw: unknown, fallbackAddress?: string): TokenCandidate | null {
  if (!isRecord(raw)) return null;

  const baseToken = resolveBaseToken(raw);

  const address =
    toText(baseToken.address, '') ||
    toText(baseToken.id, '') ||
    toText(raw.baseTokenAddress, '') ||
    toText(raw.pairAddress, '') ||
    (fallbackAddress ?? '');

  if (address.length < MIN_ADDRESS_LENGTH) {
    return null;
  }

  const priceUsd = toNumber(raw.priceUsd);
  const liquidityUsd = nestedOrScalar(raw.liquidity, 'usd');

  let buySellRatio = 1.0;
  const txns = asRecord(raw.txns);
  if (isRecord(txns.h24)) {
    const buys = Math.trunc(toNumber(txns.h24.buys));
    const sells = Math.trunc(toNumber(txns.h24.sells));
    buySellRatio = computeBuySellRatio(buys, sells);
  }

  return {
    address,
    name: toText(baseToken.name, 'Unknown'),
    symbol: toText(baseToken.symbol, 'Unknown'),
    marketCapUsd: resolveMarketCap(raw, priceUsd, liquidityUsd),
    volume24hUsd: nestedOrScalar(raw.volume, 'h24'),
    priceChangePct24h: nestedOrScalar(raw.priceChange, 'h24'),
    liquidityUsd,
    buySellRatio,
    priceUsd,
    sourceUrl: toText(raw.url, `https://dexscreener.com/solana/${address}`),
  };
}

function chainOf(pair: unknown): string | null {
  if (!isRecord(pair) || typeof pair.chainId !== 'string') return null;
  return pair.chainId;
}

/**
 * Pick the pair that best represents `address`: an exact base-token match,
 * else the deepest Solana pool, else whatever came first.
 */
export function selectPair(pairs: unknown[], address: string): unknown | null {
  if (pairs.length === 0) return null;

  const wanted = address.toLowerCase();
  for (const pair of pairs) {
    const chain = chainOf(pair);
    if (chain !== null && chain !== 'solana') continue;

    const candidate = normalizePair(pair);
    if (candidate && candidate.address.toLowerCase() === wanted) {
      return pair;
    }
  }

  const solanaPairs = pairs.filter(p => chainOf(p) === 'solana');
  if (solanaPairs.length > 0) {
    const liquidityOf = (p: unknown) => (isRecord(p) && isRecord(p.liquidity) ? toNumber(p.liquidity.usd) : 0);
    return [...solanaPairs].sort((a, b) => liquidityOf(b) - liquidityOf(a))[0];
  }

  return pairs[0];
}

// ============ CLIENT ============

export interface MarketDataSource {
  fetchCandidates(): Promise<TokenCandidate[]>;
  fetchPairByAddress(address: string): Promise<TokenCandidate | null>;
}

export interface DexScreenerClientOptions {
  baseUrl?: string;
  alternateBaseUrls?: string[];
  http?: AxiosInstance;
  cacheTtlMs?: number;
  clock?: Clock;
}

export class DexScreenerClient implements MarketDataSource {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly alternateBaseUrls: string[];
  private readonly cacheTtlMs: number;
  private readonly cache: TTLCache<TokenCandidate[]>;
  private lastSuccessfulEndpoint: string | null = null;

  constructor(options: DexScreenerClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? appConfig.dexScreenerApiUrl;
    this.alternateBaseUrls = options.alternateBaseUrls ?? ALTERNATE_BASE_URLS;
    this.cacheTtlMs = options.cacheTtlMs ?? CACHE_TTL_MS;
    this.cache = new TTLCache<TokenCandidate[]>({ maxSize: 10, clock: options.clock, cleanupIntervalMs: 0 });
    this.http = options.http ?? axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      validateStatus: () => true,
    });
  }

  /**
   * Fetch and normalize the current Solana candidates.
   * Returns an empty list when every endpoint fails.
   */
  async fetchCandidates(): Promise<TokenCandidate[]> {
    const cached = this.cache.get(CANDIDATES_CACHE_KEY);
    if (cached) {
      log.debug({ count: cached.length }, 'Candidate cache hit');
      return cached;
    }

    for (const endpoint of this.candidateEndpoints()) {
      const pairs = await this.fetchPairList(endpoint);
      if (pairs === null) continue;

      const candidates: TokenCandidate[] = [];
      for (const pair of pairs) {
        const candidate = normalizePair(pair);
        if (candidate) candidates.push(candidate);
      }

      log.info({ endpoint, pairs: pairs.length, candidates: candidates.length }, 'Fetched Solana candidates');

      this.lastSuccessfulEndpoint = endpoint;
      this.cache.set(CANDIDATES_CACHE_KEY, candidates, this.cacheTtlMs);
      return candidates;
    }

    log.error('All DexScreener endpoints failed, no candidates this cycle');
    return [];
  }

  /**
   * Look up the pair that best represents a single token
   */
  async fetchPairByAddress(address: string): Promise<TokenCandidate | null> {
    for (const endpoint of this.pairEndpoints(address)) {
      const payload = await this.fetchPayload(endpoint);
      if (payload === undefined) continue;

      const pairs = extractPairList(payload);
      if (pairs !== null && pairs.length > 0) {
        const selected = selectPair(pairs, address);
        const candidate = normalizePair(selected, address);
        if (candidate) {
          log.info({ endpoint, address: address.slice(0, 8), symbol: candidate.symbol }, 'Resolved token pair');
          return candidate;
        }
        continue;
      }

      // Single pair wrapped in { data: {...} }
      if (isRecord(payload) && isRecord(payload.data)) {
        const candidate = normalizePair(payload.data, address);
        if (candidate) return candidate;
      }
    }

    log.warn({ address }, 'Could not find a pair for token');
    return null;
  }

  getLastSuccessfulEndpoint(): string | null {
    return this.lastSuccessfulEndpoint;
  }

  private candidateEndpoints(): string[] {
    const endpoints: string[] = [];
    if (this.lastSuccessfulEndpoint) {
      endpoints.push(this.lastSuccessfulEndpoint);
    }
    for (const base of [this.baseUrl, ...this.alternateBaseUrls]) {
      for (const path of CANDIDATE_PATHS) {
        endpoints.push(`${base}${path}`);
      }
    }
    return [...new Set(endpoints)];
  }

  private pairEndpoints(address: string): string[] {
    const encoded = encodeURIComponent(address);
    const endpoints: string[] = [];
    for (const base of [this.baseUrl, ...this.alternateBaseUrls]) {
      endpoints.push(`${base}/tokens/${encoded}`);
      endpoints.push(`${base}/search?q=${encoded}`);
    }
    return [...new Set(endpoints)];
  }

  private async fetchPairList(endpoint: string): Promise<unknown[] | null> {
    const payload = await this.fetchPayload(endpoint);
    if (payload === undefined) return null;

    const pairs = extractPairList(payload);
    if (pairs === null) {
      log.warn({ endpoint, sample: JSON.stringify(payload ?? null).slice(0, 200) }, 'Unexpected response format');
    }
    return pairs;
  }

  /**
   * GET an endpoint; `undefined` means the endpoint failed and the next
   * one should be tried.
   */
  private async fetchPayload(endpoint: string): Promise<unknown> {
    try {
      log.debug({ endpoint }, 'Trying DexScreener endpoint');
      const response = await this.http.get<unknown>(endpoint);

      if (response.status !== 200) {
        log.warn({ endpoint, status: response.status }, 'DexScreener endpoint returned non-200');
        return undefined;
      }
      return response.data;
    } catch (error) {
      const failure = classifyUpstreamError(error);
      log.warn({ endpoint, kind: failure.kind, error: failure.message }, 'DexScreener request failed');
      return undefined;
    }
  }
}
