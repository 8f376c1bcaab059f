// ===========================================
// DEFENSIVE PAYLOAD PARSING
// Upstream JSON is read field by field; a bad field never sinks the record
// ===========================================

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

/**
 * Coerce numbers and numeric strings ("12.5", "+25%") to a finite
 * number. Anything else yields the fallback.
 */
export function toNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }

  if (typeof value === 'string') {
    const cleaned = value.replace(/%/g, '').trim();
    if (cleaned === '') return fallback;

    const direct = Number(cleaned);
    if (Number.isFinite(direct)) return direct;

    // Last resort: first numeric run in the string
    const match = cleaned.match(/-?\d+\.?\d*/);
    if (match) {
      const extracted = Number(match[0]);
      if (Number.isFinite(extracted)) return extracted;
    }
  }

  return fallback;
}

export function toText(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim() !== '') return value;
  return fallback;
}

/**
 * Read either `{ [key]: x }` or a bare scalar. DexScreener reports
 * volume as `{ h24: … }` and liquidity as `{ usd: … }`, but mirrors and
 * older payloads flatten them.
 */
export function nestedOrScalar(value: unknown, key: string): number {
  if (isRecord(value)) {
    return key in value ? toNumber(value[key]) : 0;
  }
  return toNumber(value);
}
