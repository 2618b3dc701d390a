import type {
  EventCandidate,
  ResolvedCandidate,
  SkippedExtraction,
  SyncFailure,
  SyncFailureKind,
  SyncOperation,
  SyncedEvent,
  SyncedEventInput,
} from '../types/events.js';
import {
  ConcurrentModificationError,
  PermanentSyncError,
  describeError,
} from './errors.js';
import type {KeyedLock} from './keyedLock.js';
import type {SyncMetrics} from './metrics.js';
import type {CalendarEventPayload, CalendarService} from './ports.js';
import {RetryError, RetryOptions, untilAborted, withRetry} from './retry.js';
import type {SyncStateStore} from './store.js';

export interface ReconcilePlan {
  operations: SyncOperation[];
  skips: SkippedExtraction[];
}

export interface PlanOptions {
  threadId: string;
  /** Set when an extraction in the message failed to normalize. */
  suppressCancellation: boolean;
}

export type OperationOutcome =
  | 'created'
  | 'updated'
  | 'cancelled'
  | 'unchanged'
  | 'skipped';

export interface ExecutionSummary {
  created: number;
  updated: number;
  cancelled: number;
  unchanged: number;
  failures: SyncFailure[];
}

export interface ReconcilerDeps {
  store: SyncStateStore;
  calendar: CalendarService;
  lock: KeyedLock;
  retry: Omit<RetryOptions, 'label' | 'signal'>;
  metrics?: SyncMetrics;
  now?: () => Date;
}

function keyOf(operation: SyncOperation): string {
  return operation.type === 'cancel'
    ? operation.syncedEvent.identityKey
    : operation.candidate.identityKey;
}

function payloadOf(candidate: EventCandidate): CalendarEventPayload {
  return {
    title: candidate.title,
    description: candidate.description,
    location: candidate.location,
    durationMinutes: candidate.durationMinutes,
    time: candidate.normalizedTime,
  };
}

/**
 * Calendar idempotency key. A revived event needs a fresh one, since the
 * cancelled event still holds the plain key.
 */
export function idempotencyKeyFor(
  candidate: EventCandidate,
  previous?: SyncedEvent,
): string {
  return previous
    ? `${candidate.identityKey}r${previous.version}`
    : candidate.identityKey;
}

function withoutVersion(event: SyncedEvent): SyncedEventInput {
  const {version: _version, ...rest} = event;
  return rest;
}

/**
 * Turns resolved candidates into the operations that bring the calendar in
 * line with the message. Candidates sharing a key collapse to the most
 * confident; active events of the thread missing from the batch are
 * cancelled unless the batch is empty or incomplete.
 */
export function planOperations(
  resolved: ResolvedCandidate[],
  activeForThread: SyncedEvent[],
  options: PlanOptions,
): ReconcilePlan {
  const kept = new Map<string, ResolvedCandidate>();
  const skips: SkippedExtraction[] = [];

  for (const entry of resolved) {
    const key = entry.candidate.identityKey;
    const current = kept.get(key);
    if (!current) {
      kept.set(key, entry);
      continue;
    }
    const [winner, loser] =
      entry.candidate.extractionConfidence > current.candidate.extractionConfidence
        ? [entry, current]
        : [current, entry];
    kept.set(key, winner);
    skips.push({
      title: loser.candidate.title,
      reason: 'duplicate_in_batch',
      message: `Same event as "${winner.candidate.title}"`,
    });
  }

  const operations: SyncOperation[] = [];
  for (const {candidate, resolution} of kept.values()) {
    switch (resolution.type) {
      case 'new':
        operations.push({type: 'create', candidate, previous: resolution.previous});
        break;
      case 'updated_duplicate':
        operations.push({type: 'update', syncedEvent: resolution.syncedEvent, candidate});
        break;
      case 'unchanged_duplicate':
        operations.push({type: 'noop', syncedEvent: resolution.syncedEvent, candidate});
        break;
    }
  }

  if (kept.size > 0 && !options.suppressCancellation) {
    for (const event of activeForThread) {
      if (
        event.sourceThreadId === options.threadId &&
        event.status === 'active' &&
        !kept.has(event.identityKey)
      ) {
        operations.push({type: 'cancel', syncedEvent: event});
      }
    }
  }

  return {operations, skips};
}

/**
 * Re-derives what an operation should do against the key's current record.
 * Returns null when nothing is left to do.
 */
export function rederiveOperation(
  operation: SyncOperation,
  fresh: SyncedEvent | null,
): SyncOperation | null {
  if (operation.type === 'cancel') {
    if (
      !fresh ||
      fresh.status !== 'active' ||
      fresh.version !== operation.syncedEvent.version
    ) {
      return null;
    }
    return {type: 'cancel', syncedEvent: fresh};
  }

  const {candidate} = operation;
  if (!fresh) {
    return {type: 'create', candidate};
  }
  if (fresh.status === 'cancelled') {
    return {type: 'create', candidate, previous: fresh};
  }
  return fresh.lastSyncedStateHash === candidate.stateHash
    ? {type: 'noop', syncedEvent: fresh, candidate}
    : {type: 'update', syncedEvent: fresh, candidate};
}

function failureKindOf(error: unknown): SyncFailureKind {
  if (error instanceof RetryError) {
    if (error.exhausted) return 'transient_exhausted';
    return error.lastError instanceof PermanentSyncError ? 'permanent' : 'unknown';
  }
  if (error instanceof ConcurrentModificationError) {
    return 'concurrent_modification';
  }
  return 'unknown';
}

function attemptsOf(error: unknown): number {
  if (error instanceof RetryError) return error.attempts;
  // a conflict is only surfaced on the second reconciliation pass
  return error instanceof ConcurrentModificationError ? 2 : 1;
}

/**
 * Applies sync operations to the calendar and the state store.
 *
 * Operations run one at a time, each under the keyed lock for its identity
 * key. Under the lock the record is re-read and the operation re-derived,
 * the calendar write is retried on transient errors, and the store is
 * written with compare-and-set only after the calendar acknowledged.
 */
export class SyncReconciler {
  constructor(private readonly deps: ReconcilerDeps) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async execute(
    operations: SyncOperation[],
    signal?: AbortSignal,
  ): Promise<ExecutionSummary> {
    const summary: ExecutionSummary = {
      created: 0,
      updated: 0,
      cancelled: 0,
      unchanged: 0,
      failures: [],
    };

    for (const operation of operations) {
      signal?.throwIfAborted();
      const key = keyOf(operation);
      try {
        const outcome = await this.deps.lock.run(key, () =>
          this.applyWithConflictRetry(operation, signal),
        );
        switch (outcome) {
          case 'created':
            summary.created++;
            break;
          case 'updated':
            summary.updated++;
            break;
          case 'unchanged':
            summary.unchanged++;
            break;
          case 'cancelled':
            summary.cancelled++;
            break;
          case 'skipped':
            break;
        }
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        const failure: SyncFailure = {
          identityKey: key,
          operation: operation.type,
          kind: failureKindOf(error),
          message: error instanceof Error ? error.message : String(error),
          attempts: attemptsOf(error),
        };
        this.deps.metrics?.recordFailure(failure.kind);
        console.error(
          `[Reconciler] [${new Date().toISOString()}] ${operation.type} failed for ${key}:`,
          {...failure, ...describeError(error)},
        );
        summary.failures.push(failure);
      }
    }

    return summary;
  }

  private async applyWithConflictRetry(
    operation: SyncOperation,
    signal?: AbortSignal,
  ): Promise<OperationOutcome> {
    const key = keyOf(operation);
    for (let pass = 1; ; pass++) {
      const fresh = await this.deps.store.get(key);
      const action = rederiveOperation(operation, fresh);
      if (!action) {
        console.log(`[Reconciler] Nothing left to do for ${key} (${operation.type})`);
        return 'skipped';
      }
      try {
        return await this.apply(action, signal);
      } catch (error) {
        if (error instanceof ConcurrentModificationError && pass === 1) {
          console.warn(
            `[Reconciler] [${new Date().toISOString()}] Record ${key} changed concurrently, reconciling again`,
          );
          continue;
        }
        throw error;
      }
    }
  }

  private retryOptions(label: string, signal?: AbortSignal): RetryOptions {
    return {...this.deps.retry, label, signal};
  }

  private async apply(
    action: SyncOperation,
    signal?: AbortSignal,
  ): Promise<OperationOutcome> {
    const {calendar, store, metrics} = this.deps;
    const key = keyOf(action);
    const short = key.slice(0, 12);

    switch (action.type) {
      case 'noop':
        metrics?.recordOperation('noop');
        return 'unchanged';

      case 'create': {
        const {candidate, previous} = action;
        const externalEventId = await withRetry(
          () =>
            untilAborted(
              calendar.create(
                payloadOf(candidate),
                idempotencyKeyFor(candidate, previous),
                signal,
              ),
              signal,
            ),
          this.retryOptions(`create ${short}`, signal),
        );
        try {
          await store.put(
            {
              identityKey: key,
              externalEventId,
              lastSyncedStateHash: candidate.stateHash,
              lastSyncedAt: this.now(),
              status: 'active',
              sourceThreadId: candidate.sourceThreadId,
              sourceMessageId: candidate.sourceMessageId,
              title: candidate.title,
            },
            previous ? previous.version : null,
          );
        } catch (error) {
          if (error instanceof ConcurrentModificationError) {
            await this.compensateOrphan(key, externalEventId, signal);
          }
          throw error;
        }
        metrics?.recordOperation('create');
        console.log(
          `[Reconciler] [${new Date().toISOString()}] Created "${candidate.title}" as ${externalEventId}${previous ? ' (revived)' : ''}`,
        );
        return 'created';
      }

      case 'update': {
        const {candidate, syncedEvent} = action;
        await withRetry(
          () =>
            untilAborted(
              calendar.update(syncedEvent.externalEventId, payloadOf(candidate), signal),
              signal,
            ),
          this.retryOptions(`update ${short}`, signal),
        );
        await store.put(
          {
            ...withoutVersion(syncedEvent),
            lastSyncedStateHash: candidate.stateHash,
            lastSyncedAt: this.now(),
            sourceMessageId: candidate.sourceMessageId,
            title: candidate.title,
          },
          syncedEvent.version,
        );
        metrics?.recordOperation('update');
        console.log(
          `[Reconciler] [${new Date().toISOString()}] Updated "${candidate.title}" (${syncedEvent.externalEventId})`,
        );
        return 'updated';
      }

      case 'cancel': {
        const {syncedEvent} = action;
        await withRetry(
          () => untilAborted(calendar.cancel(syncedEvent.externalEventId, signal), signal),
          this.retryOptions(`cancel ${short}`, signal),
        );
        await store.put(
          {
            ...withoutVersion(syncedEvent),
            status: 'cancelled',
            lastSyncedAt: this.now(),
          },
          syncedEvent.version,
        );
        metrics?.recordOperation('cancel');
        console.log(
          `[Reconciler] [${new Date().toISOString()}] Cancelled "${syncedEvent.title}" (${syncedEvent.externalEventId})`,
        );
        return 'cancelled';
      }
    }
  }

  /**
   * A create whose record lost the race leaves an event nobody tracks.
   * Cancel it unless the winning record points at the same event.
   */
  private async compensateOrphan(
    identityKey: string,
    externalEventId: string,
    signal?: AbortSignal,
  ): Promise<void> {
    const winner = await this.deps.store.get(identityKey);
    if (winner?.externalEventId === externalEventId) {
      return;
    }
    try {
      await withRetry(
        () =>
          untilAborted(this.deps.calendar.cancel(externalEventId, signal), signal),
        this.retryOptions(`compensate ${identityKey.slice(0, 12)}`, signal),
      );
      console.warn(
        `[Reconciler] [${new Date().toISOString()}] Cancelled orphaned event ${externalEventId} for ${identityKey}`,
      );
    } catch (error) {
      console.error(
        `[Reconciler] [${new Date().toISOString()}] Could not cancel orphaned event ${externalEventId}:`,
        describeError(error),
      );
    }
  }
}
