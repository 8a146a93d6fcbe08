/**
 * Maps whatever a backend throws (axios errors, Node network errors, aborts,
 * plain messages) onto the provider failure taxonomy. Adapters call this so that
 * nothing backend-specific crosses the adapter boundary.
 */
import { isAxiosError } from 'axios';
import { ProviderError } from '../utils/errors';
import { ProviderFailure } from '../types/dataset';

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'ECONNABORTED', 'ERR_CANCELED']);
const INVALID_INPUT_STATUSES = new Set([400, 404, 413, 415, 422]);
const TRANSIENT_STATUSES = new Set([408, 409, 425]);

/**
 * Parses a Retry-After header value (delta seconds or an HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
    return Math.round(value * 1000);
  }
  if (typeof value !== 'string' || !value.trim()) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

export function classifyHttpStatus(status: number): ProviderFailure['kind'] {
  if (status === 429) return 'RateLimited';
  if (status === 401 || status === 403) return 'AuthFailure';
  if (INVALID_INPUT_STATUSES.has(status)) return 'InvalidInput';
  if (TRANSIENT_STATUSES.has(status) || status >= 500) return 'Transient';
  return 'Unknown';
}

function extractApiMessage(data: unknown): string | undefined {
  if (typeof data === 'string') return data || undefined;
  if (typeof data !== 'object' || data === null) return undefined;
  const error = Reflect.get(data, 'error');
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null) {
    const message = Reflect.get(error, 'message');
    if (typeof message === 'string') return message;
  }
  const message = Reflect.get(data, 'message');
  return typeof message === 'string' ? message : undefined;
}

export function classifyProviderError(error: unknown): ProviderFailure {
  if (error instanceof ProviderError) {
    return error.toFailure();
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      const kind = classifyHttpStatus(status);
      const apiMessage = extractApiMessage(error.response?.data);
      const failure: ProviderFailure = {
        kind,
        message: `HTTP ${status}${apiMessage ? `: ${apiMessage}` : ''}`,
      };
      if (kind === 'RateLimited') {
        const retryAfterMs = parseRetryAfter(error.response?.headers?.['retry-after']);
        if (retryAfterMs !== undefined) failure.retryAfterMs = retryAfterMs;
      }
      return failure;
    }
    if (error.code && TRANSIENT_CODES.has(error.code)) {
      return { kind: 'Transient', message: `${error.code}: ${error.message}` };
    }
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code && TRANSIENT_CODES.has(code)) {
      return { kind: 'Transient', message: `${code}: ${error.message}` };
    }
    if (error.name === 'AbortError' || error.name === 'CanceledError' || /timeout|timed? ?out|aborted/i.test(error.message)) {
      return { kind: 'Transient', message: error.message };
    }
    if (/rate.?limit|too many requests/i.test(error.message)) {
      return { kind: 'RateLimited', message: error.message };
    }
    if (/unauthori[sz]ed|invalid api key|authentication/i.test(error.message)) {
      return { kind: 'AuthFailure', message: error.message };
    }
    return { kind: 'Unknown', message: error.message };
  }

  return { kind: 'Unknown', message: String(error) };
}

export function isRetryable(kind: ProviderFailure['kind']): boolean {
  return kind === 'Transient' || kind === 'RateLimited';
}
