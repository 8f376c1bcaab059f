// ===========================================
// MODULE 2: SAFETY SCORER (RugCheck)
// 0-100 safety score per token, never fails
// ===========================================

import axios, { AxiosInstance } from 'axios';
import { appConfig } from '../config/index.js';
import { componentLogger } from '../utils/logger.js';
import { TTLCache, type Clock } from '../utils/rate-limiter.js';
import { classifyStatus, classifyUpstreamError } from '../utils/errors.js';
import { isRecord, toNumber, type JsonRecord } from '../utils/parse.js';
import type { RiskLevel, SafetyAssessment } from '../types/index.js';

const log = componentLogger('rugcheck');

// ============ CONSTANTS ============

// Cache assessments for 1 hour
const CACHE_TTL_MS = 60 * 60 * 1000;
const REQUEST_TIMEOUT_MS = 10000;
// This many 404s in a row means the service is down, not the token unknown
const MAX_CONSECUTIVE_NOT_FOUND = 3;

const HEURISTIC_BASE_SCORE = 80;
const EXPECTED_ADDRESS_LENGTHS = [43, 44];
const EXPECTED_PREFIXES = ['E', 'A', 'B', 'S', 'C', 'D'];

export const TRUSTED_TOKENS: Readonly<Record<string, string>> = {
  EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v: 'USDC',
  Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB: 'USDT',
  So11111111111111111111111111111111111111112: 'Wrapped SOL',
  mSoLzYCxHdYgdzU16g5QSh3i5K3z3KZK7ytfqcJm7So: 'mSOL',
};

export const SAFETY_RATING_SCORES: Readonly<Record<string, number>> = {
  VERY_SAFE: 95,
  SAFE: 85,
  PROBABLY_SAFE: 75,
  NEUTRAL: 50,
  SUSPICIOUS: 30,
  RISKY: 15,
  HIGH_RISK: 5,
};

export const RISK_LEVEL_SCORES: Readonly<Record<string, number>> = {
  VERY_LOW: 90,
  LOW: 75,
  MEDIUM: 50,
  HIGH: 25,
  VERY_HIGH: 10,
};

const UNKNOWN_CATEGORY_SCORE = 50;

function endpointTemplates(apiUrl: string): string[] {
  const unversioned = apiUrl.replace(/\/v1$/, '');
  return [
    `${apiUrl}/scan/{chain}/{address}`,
    `${apiUrl}/tokens/{chain}/{address}`,
    `${apiUrl}/tokens?chain={chain}&address={address}`,
    `${apiUrl}/scan?chain={chain}&address={address}`,
    `${unversioned}/scan/{chain}/{address}`,
    `${unversioned}/tokens/scan/{chain}/{address}`,
    'https://api.staking.rugcheck.xyz/v1/tokens/scan/{chain}/{address}',
    'https://api.rugcheck.xyz/v1/scan/{chain}/{address}',
    'https://api.rugcheck.xyz/tokens/scan/{chain}/{address}',
    'https://rugchecker.com/api/tokens/scan/{chain}/{address}',
  ];
}

// ============ SCORING ============

export function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

export function scoreToRiskLevel(score: number): RiskLevel {
  if (score >= 90) return 'VERY_LOW';
  if (score >= 75) return 'LOW';
  if (score >= 50) return 'MEDIUM';
  if (score >= 25) return 'HIGH';
  return 'VERY_HIGH';
}

const RISK_LEVELS: readonly RiskLevel[] = ['VERY_LOW', 'LOW', 'MEDIUM', 'HIGH', 'VERY_HIGH'];

function parseRiskLevel(value: unknown): RiskLevel | null {
  if (typeof value !== 'string') return null;
  const upper = value.toUpperCase();
  return RISK_LEVELS.find(level => level === upper) ?? null;
}

function extractRiskFactors(payload: JsonRecord): unknown[] | null {
  for (const key of ['riskFactors', 'risk_factors', 'risks']) {
    const value = payload[key];
    if (Array.isArray(value)) return value;
  }
  return null;
}

function describeRiskFactor(item: unknown): string {
  if (typeof item === 'string') return item;
  if (isRecord(item)) {
    if (typeof item.name === 'string') return item.name;
    if (typeof item.description === 'string') return item.description;
  }
  return 'Unspecified risk';
}

/**
 * Local estimate used when the scoring service cannot answer.
 */
export function heuristicAssessment(address: string): SafetyAssessment {
  const trusted = TRUSTED_TOKENS[address];
  if (trusted) {
    return { address, score: 100, riskLevel: 'VERY_LOW', riskFactors: [], isHeuristic: true };
  }

  let score = HEURISTIC_BASE_SCORE;
  const riskFactors: string[] = [];

  if (!EXPECTED_ADDRESS_LENGTHS.includes(address.length)) {
    riskFactors.push('Unusual address length');
    score -= 10;
  }

  if (!EXPECTED_PREFIXES.includes(address.charAt(0))) {
    riskFactors.push('Unusual address prefix');
    score -= 5;
  }

  let riskLevel: RiskLevel = 'LOW';
  if (score < 40) riskLevel = 'HIGH';
  else if (score < 60) riskLevel = 'MEDIUM';

  return { address, score: clampScore(score), riskLevel, riskFactors, isHeuristic: true };
}

/**
 * Read a score out of whichever representation the service returned:
 * a numeric score, a categorical safety rating, a risk level, or a list
 * of risk factors. `null` when none of them is present.
 */
export function normalizeSafetyPayload(payload: unknown, address: string): SafetyAssessment | null {
  if (!isRecord(payload)) return null;

  const factorList = extractRiskFactors(payload);
  const riskFactors = factorList ? factorList.map(describeRiskFactor) : [];
  const statedLevel = parseRiskLevel(payload.riskLevel ?? payload.risk_level);

  const build = (score: number): SafetyAssessment => {
    const clamped = clampScore(score);
    return {
      address,
      score: clamped,
      riskLevel: statedLevel ?? scoreToRiskLevel(clamped),
      riskFactors,
      isHeuristic: false,
    };
  };

  const direct = toNumber(payload.score, NaN);
  if (Number.isFinite(direct)) {
    return build(direct);
  }

  if ('safetyRating' in payload) {
    const rating = payload.safetyRating;
    if (typeof rating === 'number' && Number.isFinite(rating)) {
      return build(rating);
    }
    if (typeof rating === 'string') {
      return build(SAFETY_RATING_SCORES[rating.toUpperCase()] ?? UNKNOWN_CATEGORY_SCORE);
    }
  }

  const levelValue = payload.riskLevel ?? payload.risk_level;
  if (typeof levelValue === 'string') {
    return build(RISK_LEVEL_SCORES[levelValue.toUpperCase()] ?? UNKNOWN_CATEGORY_SCORE);
  }

  if (factorList) {
    return build(100 - factorList.length * 10);
  }

  return null;
}

// ============ CLIENT ============

export interface SafetyScorer {
  getSafetyScore(address: string): Promise<number>;
  assess(address: string): Promise<SafetyAssessment>;
}

export interface RugCheckClientOptions {
  apiUrl?: string;
  apiKey?: string;
  chain?: string;
  endpointTemplates?: string[];
  http?: AxiosInstance;
  cacheTtlMs?: number;
  clock?: Clock;
}

export class RugCheckClient implements SafetyScorer {
  private readonly http: AxiosInstance;
  private readonly templates: string[];
  private readonly chain: string;
  private readonly headers: Record<string, string>;
  private readonly cacheTtlMs: number;
  private readonly cache: TTLCache<SafetyAssessment>;
  private lastSuccessfulTemplate: string | null = null;

  constructor(options: RugCheckClientOptions = {}) {
    const apiUrl = options.apiUrl ?? appConfig.rugCheckApiUrl;
    const apiKey = options.apiKey ?? appConfig.rugCheckApiKey;

    this.templates = options.endpointTemplates ?? endpointTemplates(apiUrl);
    this.chain = options.chain ?? 'solana';
    this.cacheTtlMs = options.cacheTtlMs ?? CACHE_TTL_MS;
    this.cache = new TTLCache<SafetyAssessment>({ maxSize: 500, clock: options.clock });
    this.http = options.http ?? axios.create({
      timeout: REQUEST_TIMEOUT_MS,
      validateStatus: () => true,
    });

    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (apiKey) {
      this.headers.Authorization = `Bearer ${apiKey}`;
    } else {
      log.warn('No RugCheck API key provided - API functionality may be limited');
    }
  }

  async getSafetyScore(address: string): Promise<number> {
    const assessment = await this.assess(address);
    return assessment.score;
  }

  async isSafe(address: string, minScore: number): Promise<boolean> {
    const score = await this.getSafetyScore(address);
    log.info({ address: address.slice(0, 8), score, minScore }, 'Safety check');
    return score >= minScore;
  }

  /**
   * Full assessment for a token. Falls back to the local heuristic when the
   * service is unreachable, rejects our key, or answers in a shape we do
   * not recognize; heuristic results are cached like real ones.
   */
  async assess(address: string): Promise<SafetyAssessment> {
    const cacheKey = `${this.chain}:${address}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      log.debug({ address: address.slice(0, 8) }, 'RugCheck cache hit');
      return cached;
    }

    const assessment = (await this.queryService(address)) ?? this.fallback(address);
    this.cache.set(cacheKey, assessment, this.cacheTtlMs);
    return assessment;
  }

  private fallback(address: string): SafetyAssessment {
    const assessment = heuristicAssessment(address);
    log.warn({ address: address.slice(0, 8), score: assessment.score }, 'Using heuristic safety score');
    return assessment;
  }

  private orderedTemplates(): string[] {
    const ordered = this.lastSuccessfulTemplate
      ? [this.lastSuccessfulTemplate, ...this.templates]
      : this.templates;
    return [...new Set(ordered)];
  }

  private async queryService(address: string): Promise<SafetyAssessment | null> {
    let consecutiveNotFound = 0;

    for (const template of this.orderedTemplates()) {
      const endpoint = template
        .replace('{chain}', encodeURIComponent(this.chain))
        .replace('{address}', encodeURIComponent(address));

      try {
        const response = await this.http.get<unknown>(endpoint, { headers: this.headers });
        const kind = classifyStatus(response.status);

        if (kind === null) {
          this.lastSuccessfulTemplate = template;
          const assessment = normalizeSafetyPayload(response.data, address);
          if (!assessment) {
            log.warn({ endpoint }, 'Unrecognized RugCheck response shape');
            return null;
          }
          log.debug({ address: address.slice(0, 8), score: assessment.score }, 'RugCheck analysis complete');
          return assessment;
        }

        if (kind === 'AUTH_REJECTED') {
          // No point trying other endpoints with the same key
          log.error({ status: response.status }, 'RugCheck authentication failed - API key may be invalid');
          return null;
        }

        if (kind === 'NOT_FOUND') {
          consecutiveNotFound++;
          if (consecutiveNotFound >= MAX_CONSECUTIVE_NOT_FOUND) {
            log.warn({ consecutiveNotFound }, 'Repeated RugCheck 404s - service looks down');
            return null;
          }
          continue;
        }

        consecutiveNotFound = 0;
        log.warn({ endpoint, status: response.status, kind }, 'RugCheck endpoint error');
      } catch (error) {
        consecutiveNotFound = 0;
        const failure = classifyUpstreamError(error);
        log.warn({ endpoint, kind: failure.kind, error: failure.message }, 'RugCheck request failed');
      }
    }

    log.warn({ address: address.slice(0, 8) }, 'All RugCheck endpoints failed');
    return null;
  }
}
