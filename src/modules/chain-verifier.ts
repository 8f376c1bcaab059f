// ===========================================
// MODULE 3: CHAIN VERIFIER (Solana JSON-RPC)
// Confirms an address is a token mint; permissive on every error path
// ===========================================

import axios, { AxiosInstance } from 'axios';
import { PublicKey } from '@solana/web3.js';
import { appConfig } from '../config/index.js';
import { componentLogger } from '../utils/logger.js';
import { AdaptiveThrottle, TTLCache, sleep, type Clock, type Sleeper } from '../utils/rate-limiter.js';
import { classifyStatus, classifyUpstreamError, isTimeoutError } from '../utils/errors.js';
import { asRecord, isRecord, toNumber, toText, type JsonRecord } from '../utils/parse.js';
import type {
  TokenAccountSummary,
  TokenChainInfo,
  TokenSupply,
  VerificationResult,
  VerificationSource,
} from '../types/index.js';

const log = componentLogger('solana-rpc');

// ============ CONSTANTS ============

const BASE_CACHE_TTL_MS = 2 * 60 * 60 * 1000; // 2 hours
// Validity changes far less often than supply or holders
const VALIDITY_CACHE_TTL_MS = BASE_CACHE_TTL_MS * 2;
const REQUEST_TIMEOUT_MS = 15000;

const INITIAL_INTERVAL_MS = 2000;
const INTERVAL_STEP_MS = 200;
const MAX_INTERVAL_MS = 10000;
// Past this the node is clearly overloaded; stop asking
const SHORT_CIRCUIT_INTERVAL_MS = 5000;

const MIN_ADDRESS_LENGTH = 30;
const MAX_ADDRESS_LENGTH = 50;

const TOKEN_PROGRAM_ID = 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA';

export const KNOWN_TOKENS: Readonly<Record<string, string>> = {
  EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v: 'USDC',
  Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB: 'USDT',
  So11111111111111111111111111111111111111112: 'Wrapped SOL',
  mSoLzYCxHdYgdzU16g5QSh3i5K3z3KZK7ytfqcJm7So: 'mSOL',
  '7dHbWXmci3dT8UFYWYZweBLXgycu7Y3iL6trKn1Y7ARj': 'stSOL',
  DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263: 'BONK',
  HZ1JovNiVvGrGNiiYvEozEVgZ58xaU3RKwX8eACQBCt3: 'PYTH',
  orcaEKTdK7LKz57vaAYr9QeNsVEPfiu6QeMU1kektZE: 'ORCA',
  AFbX8oGjGpmVFywbVouvhQSRmiW2aR1mohfahi4Y2AdB: 'GST',
  MangoCzJ36AjZyKwVj3VnYU4GTonjfVEnJmvvWaxLac: 'MNGO',
  '4k3Dyjzvzp8eMZWUXbBCjEvwSkkk59S5iCNLY3QrkX6R': 'RAY',
};

const FALLBACK_RPC_URLS = [
  'https://api.mainnet-beta.solana.com',
  'https://solana-api.projectserum.com',
  'https://rpc.ankr.com/solana',
  'https://solana-mainnet.g.alchemy.com/v2/demo',
  'https://solana.public-rpc.com',
];

// ============ FORMAT ============

export function isPlausibleAddress(address: string): boolean {
  if (address.length < MIN_ADDRESS_LENGTH || address.length > MAX_ADDRESS_LENGTH) {
    return false;
  }
  try {
    new PublicKey(address);
    return true;
  } catch {
    return false;
  }
}

// ============ RPC RESPONSE PARSING ============

function resultValue(body: JsonRecord | null): unknown {
  if (!body) return undefined;
  const result = body.result;
  return isRecord(result) ? result.value : undefined;
}

function parseSupply(value: unknown): TokenSupply | null {
  if (!isRecord(value)) return null;
  return {
    amount: toText(value.amount, '0'),
    decimals: Math.trunc(toNumber(value.decimals)),
    fromAccountInfo: false,
  };
}

function parseMintAccount(value: unknown): TokenSupply | null {
  if (!isRecord(value)) return null;
  const parsed = asRecord(asRecord(value.data).parsed);
  if (parsed.type !== 'mint') return null;

  const info = asRecord(parsed.info);
  return {
    amount: toText(info.supply, '0'),
    decimals: Math.trunc(toNumber(info.decimals)),
    fromAccountInfo: true,
  };
}

function parseLargestAccounts(value: unknown): TokenAccountSummary[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map(entry => ({
    address: toText(entry.address, ''),
    amount: toText(entry.amount, '0'),
    uiAmount: toNumber(entry.uiAmount),
  }));
}

function parseDelegateAccounts(value: unknown): TokenAccountSummary[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map(entry => {
    const info = asRecord(asRecord(asRecord(asRecord(entry.account).data).parsed).info);
    const tokenAmount = asRecord(info.tokenAmount);
    return {
      address: toText(entry.pubkey, ''),
      amount: toText(tokenAmount.amount, '0'),
      uiAmount: toNumber(tokenAmount.uiAmount),
    };
  });
}

// ============ CLIENT ============

export interface ChainVerifier {
  verify(address: string): Promise<VerificationResult>;
  isValidToken(address: string): Promise<boolean>;
  readonly currentIntervalMs: number;
}

export interface SolanaVerifierOptions {
  rpcUrl?: string;
  rpcKey?: string;
  fallbackUrls?: string[];
  http?: AxiosInstance;
  maxRetries?: number;
  retryDelayMs?: number;
  clock?: Clock;
  sleep?: Sleeper;
}

export class SolanaChainVerifier implements ChainVerifier {
  private readonly http: AxiosInstance;
  private readonly rpcUrl: string;
  private readonly rpcKey: string;
  private readonly fallbackUrls: string[];
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleeper: Sleeper;
  private readonly throttle: AdaptiveThrottle;

  private readonly validityCache: TTLCache<VerificationResult>;
  private readonly supplyCache: TTLCache<TokenSupply>;
  private readonly accountsCache: TTLCache<TokenAccountSummary[]>;
  private requestId = 0;

  constructor(options: SolanaVerifierOptions = {}) {
    this.rpcUrl = options.rpcUrl ?? appConfig.solanaRpcUrl;
    this.rpcKey = options.rpcKey ?? appConfig.solanaRpcKey;
    this.fallbackUrls = (options.fallbackUrls ?? FALLBACK_RPC_URLS).filter(url => url !== this.rpcUrl);
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.sleeper = options.sleep ?? sleep;

    this.throttle = new AdaptiveThrottle({
      serviceName: 'solana-rpc',
      initialIntervalMs: INITIAL_INTERVAL_MS,
      stepMs: INTERVAL_STEP_MS,
      maxIntervalMs: MAX_INTERVAL_MS,
      clock: options.clock,
      sleep: this.sleeper,
    });

    const cacheOptions = { maxSize: 2000, clock: options.clock };
    this.validityCache = new TTLCache<VerificationResult>(cacheOptions);
    this.supplyCache = new TTLCache<TokenSupply>(cacheOptions);
    this.accountsCache = new TTLCache<TokenAccountSummary[]>(cacheOptions);

    this.http = options.http ?? axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      validateStatus: () => true,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  get currentIntervalMs(): number {
    return this.throttle.currentIntervalMs;
  }

  async isValidToken(address: string): Promise<boolean> {
    const result = await this.verify(address);
    return result.isValid;
  }

  async verify(address: string): Promise<VerificationResult> {
    const cached = this.validityCache.get(address);
    if (cached) return cached;

    if (KNOWN_TOKENS[address]) {
      return this.remember({ address, isValid: true, source: 'KnownList' });
    }

    if (!isPlausibleAddress(address)) {
      log.warn({ address }, 'Invalid token address format');
      return this.remember({ address, isValid: false, source: 'InvalidFormat' });
    }

    if (this.throttle.currentIntervalMs > SHORT_CIRCUIT_INTERVAL_MS) {
      log.warn(
        { address: address.slice(0, 8), intervalMs: this.throttle.currentIntervalMs },
        'RPC heavily rate limited, assuming token is valid'
      );
      return this.remember({ address, isValid: true, source: 'PermissiveFallback' });
    }

    const supply = await this.getTokenMetadata(address);
    let source: VerificationSource = 'PermissiveFallback';
    if (supply) {
      source = supply.fromAccountInfo ? 'RpcAccountInfo' : 'RpcMetadata';
    } else {
      log.warn({ address: address.slice(0, 8) }, 'Could not confirm token on chain, assuming valid');
    }

    return this.remember({ address, isValid: true, source });
  }

  /**
   * Supply and decimals from getTokenSupply, falling back to the parsed
   * mint account. `null` when neither call produced a mint.
   */
  async getTokenMetadata(address: string): Promise<TokenSupply | null> {
    const cached = this.supplyCache.get(address);
    if (cached) return cached;

    let supply = parseSupply(resultValue(await this.rpc('getTokenSupply', [address])));
    if (!supply) {
      const accountBody = await this.rpc('getAccountInfo', [address, { encoding: 'jsonParsed' }]);
      supply = parseMintAccount(resultValue(accountBody));
    }

    if (supply) {
      this.supplyCache.set(address, supply, BASE_CACHE_TTL_MS);
    }
    return supply;
  }

  async getTokenAccounts(address: string, limit = 5): Promise<TokenAccountSummary[]> {
    const cacheKey = `${address}:${limit}`;
    const cached = this.accountsCache.get(cacheKey);
    if (cached) return cached;

    let accounts = parseLargestAccounts(resultValue(await this.rpc('getTokenLargestAccounts', [address])));
    if (accounts.length === 0) {
      const body = await this.rpc('getTokenAccountsByDelegate', [
        address,
        { programId: TOKEN_PROGRAM_ID },
        { encoding: 'jsonParsed' },
      ]);
      accounts = parseDelegateAccounts(resultValue(body));
    }

    const limited = accounts.slice(0, limit);
    if (limited.length > 0) {
      this.accountsCache.set(cacheKey, limited, BASE_CACHE_TTL_MS);
    }
    return limited;
  }

  async getTokenInfo(address: string): Promise<TokenChainInfo | null> {
    const supply = await this.getTokenMetadata(address);
    if (!supply) return null;

    return {
      address,
      decimals: supply.decimals,
      supply: supply.amount,
      accounts: await this.getTokenAccounts(address),
    };
  }

  private remember(result: VerificationResult): VerificationResult {
    this.validityCache.set(result.address, result, VALIDITY_CACHE_TTL_MS);
    return result;
  }

  // ============ TRANSPORT ============

  /**
   * One JSON-RPC call: the primary endpoint with retries, then each
   * fallback once. Returns the response body, or `null` when every
   * endpoint failed.
   */
  private async rpc(method: string, params: unknown[]): Promise<JsonRecord | null> {
    await this.throttle.wait();

    const payload = { jsonrpc: '2.0', id: ++this.requestId, method, params };
    const primaryHeaders: Record<string, string> = {};
    if (this.rpcKey) {
      primaryHeaders.Authorization = `Bearer ${this.rpcKey}`;
    }

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.http.post<unknown>(this.rpcUrl, payload, { headers: primaryHeaders });
        const kind = classifyStatus(response.status);

        if (kind === null) {
          if (isRecord(response.data)) return response.data;
          log.warn({ method, endpoint: this.rpcUrl }, 'Malformed RPC response');
          break;
        }

        if (kind === 'RATE_LIMITED') {
          this.throttle.recordRateLimit();
          if (attempt < this.maxRetries) {
            const backoffMs = this.retryDelayMs * 2 ** attempt;
            log.warn({ method, attempt: attempt + 1, backoffMs }, 'RPC rate limited, backing off');
            await this.sleeper(backoffMs);
            continue;
          }
          log.warn({ method }, 'RPC rate limit retries exhausted');
          break;
        }

        log.warn({ method, status: response.status, kind }, 'RPC request failed');
        break;
      } catch (error) {
        if (isTimeoutError(error) && attempt < this.maxRetries) {
          log.warn({ method, attempt: attempt + 1 }, 'RPC request timed out, retrying');
          continue;
        }
        const failure = classifyUpstreamError(error);
        log.warn({ method, kind: failure.kind, error: failure.message }, 'RPC transport error');
        break;
      }
    }

    return this.tryFallbacks(method, payload);
  }

  private async tryFallbacks(method: string, payload: JsonRecord): Promise<JsonRecord | null> {
    for (const endpoint of this.fallbackUrls) {
      try {
        log.info({ method, endpoint }, 'Trying fallback RPC endpoint');
        const response = await this.http.post<unknown>(endpoint, payload);

        if (response.status === 200 && isRecord(response.data)) {
          return response.data;
        }
        if (response.status === 429) {
          this.throttle.recordRateLimit();
        }
        log.warn({ method, endpoint, status: response.status }, 'Fallback RPC endpoint failed');
      } catch (error) {
        const failure = classifyUpstreamError(error);
        log.warn({ method, endpoint, kind: failure.kind, error: failure.message }, 'Fallback RPC endpoint error');
      }
    }

    log.error({ method }, 'All RPC endpoints failed');
    return null;
  }
}
