import {PermanentSyncError, TransientSyncError} from '../events/errors.js';

const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];
const RATE_LIMIT_REASONS = ['rateLimitExceeded', 'userRateLimitExceeded'];
const NETWORK_ERROR_CODES = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
];

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null && key in value
    ? Reflect.get(value, key)
    : undefined;
}

/** HTTP status of a googleapis (gaxios) error, if it carries one. */
export function googleStatusOf(error: unknown): number | undefined {
  const status = field(field(error, 'response'), 'status');
  if (typeof status === 'number') return status;
  const code = field(error, 'code');
  if (typeof code === 'number') return code;
  if (typeof code === 'string' && /^\d{3}$/.test(code)) return parseInt(code, 10);
  return undefined;
}

export function googleReasonsOf(error: unknown): string[] {
  const errors = field(field(field(field(error, 'response'), 'data'), 'error'), 'errors');
  if (!Array.isArray(errors)) return [];
  return errors
    .map(item => field(item, 'reason'))
    .filter((reason): reason is string => typeof reason === 'string');
}

export function isRateLimitError(error: unknown): boolean {
  const status = googleStatusOf(error);
  if (status === 429) return true;
  return (
    status === 403 &&
    googleReasonsOf(error).some(reason => RATE_LIMIT_REASONS.includes(reason))
  );
}

export function isTransientGoogleError(error: unknown): boolean {
  const status = googleStatusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS_CODES.includes(status) || isRateLimitError(error);
  }
  const code = field(error, 'code');
  if (typeof code === 'string' && NETWORK_ERROR_CODES.includes(code)) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return message.includes('timeout') || message.includes('socket hang up');
}

/**
 * Maps a googleapis error onto the sync error taxonomy.
 */
export function classifyGoogleError(
  error: unknown,
  operation: string,
): TransientSyncError | PermanentSyncError {
  const status = googleStatusOf(error);
  const detail = error instanceof Error ? error.message : String(error);
  const message = `${operation} failed${status ? ` (${status})` : ''}: ${detail}`;
  return isTransientGoogleError(error)
    ? new TransientSyncError(message, status, {cause: error})
    : new PermanentSyncError(message, status, {cause: error});
}
