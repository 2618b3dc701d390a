export type EventSyncErrorKind =
  | 'unparsable_date'
  | 'ambiguous_date'
  | 'insufficient_data'
  | 'concurrent_modification'
  | 'transient_sync'
  | 'permanent_sync'
  | 'processed_message_integrity'
  | 'deadline_exceeded';

/**
 * Base class for every error the sync engine raises on purpose.
 * `kind` is what metrics and API responses key on.
 */
export abstract class EventSyncError extends Error {
  abstract readonly kind: EventSyncErrorKind;

  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnparsableDateError extends EventSyncError {
  readonly kind = 'unparsable_date';

  constructor(
    readonly phrase: string,
    detail?: string,
  ) {
    super(
      detail
        ? `Could not interpret date "${phrase}": ${detail}`
        : `Could not interpret date "${phrase}"`,
    );
  }
}

export class AmbiguousDateError extends EventSyncError {
  readonly kind = 'ambiguous_date';

  constructor(
    readonly phrase: string,
    readonly interpretations: string[],
  ) {
    super(
      `Date "${phrase}" is ambiguous${interpretations.length > 0 ? ` (${interpretations.join(' | ')})` : ''}`,
    );
  }
}

export class InsufficientDataError extends EventSyncError {
  readonly kind = 'insufficient_data';
}

export class ConcurrentModificationError extends EventSyncError {
  readonly kind = 'concurrent_modification';

  constructor(
    readonly identityKey: string,
    readonly expectedVersion: number | null,
  ) {
    super(
      `Synced event ${identityKey} changed concurrently (expected version ${expectedVersion ?? 'none'})`,
    );
  }
}

/** Retryable calendar failure: timeouts, network resets, 5xx, rate limits. */
export class TransientSyncError extends EventSyncError {
  readonly kind = 'transient_sync';

  constructor(
    message: string,
    readonly status?: number,
    options?: {cause?: unknown},
  ) {
    super(message, options);
  }
}

export class PermanentSyncError extends EventSyncError {
  readonly kind = 'permanent_sync';

  constructor(
    message: string,
    readonly status?: number,
    options?: {cause?: unknown},
  ) {
    super(message, options);
  }
}

export class ProcessedMessageIntegrityError extends EventSyncError {
  readonly kind = 'processed_message_integrity';

  constructor(
    readonly messageId: string,
    detail: string,
  ) {
    super(`Processed-message record for ${messageId} is corrupt: ${detail}`);
  }
}

export class DeadlineExceededError extends EventSyncError {
  readonly kind = 'deadline_exceeded';

  constructor(
    readonly messageId: string,
    readonly deadlineMs: number,
  ) {
    super(`Processing of message ${messageId} exceeded ${deadlineMs}ms`);
  }
}

export function describeError(error: unknown): {
  errorType: string;
  message: string;
} {
  return {
    errorType: error instanceof Error ? error.constructor.name : typeof error,
    message: error instanceof Error ? error.message : String(error),
  };
}
