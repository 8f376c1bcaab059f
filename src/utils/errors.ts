// ===========================================
// UPSTREAM ERROR TAXONOMY
// ===========================================

import axios from 'axios';

export type UpstreamErrorKind =
  | 'UPSTREAM_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'AUTH_REJECTED'
  | 'NOT_FOUND'
  | 'MALFORMED_RESPONSE';

export interface UpstreamFailure {
  kind: UpstreamErrorKind;
  status: number | null;
  message: string;
}

export function classifyStatus(status: number): UpstreamErrorKind | null {
  if (status >= 200 && status < 300) return null;
  if (status === 429) return 'RATE_LIMITED';
  if (status === 401 || status === 403) return 'AUTH_REJECTED';
  if (status === 404) return 'NOT_FOUND';
  return 'UPSTREAM_UNAVAILABLE';
}

export function isTimeoutError(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Map anything thrown by an upstream call onto the taxonomy.
 * Transport failures without a response count as unavailability.
 */
export function classifyUpstreamError(error: unknown): UpstreamFailure {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    const kind = status === null ? 'UPSTREAM_UNAVAILABLE' : classifyStatus(status) ?? 'MALFORMED_RESPONSE';
    return { kind, status, message: error.message };
  }

  if (error instanceof SyntaxError) {
    return { kind: 'MALFORMED_RESPONSE', status: null, message: error.message };
  }

  return { kind: 'UPSTREAM_UNAVAILABLE', status: null, message: errorMessage(error) };
}
