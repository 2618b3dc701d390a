import type {
  ResolutionType,
  SkipReason,
  SyncFailureKind,
  SyncOperationType,
} from '../types/events.js';

export type MessageOutcome =
  | 'processed'
  | 'already_processed'
  | 'no_events'
  | 'deadline_exceeded'
  | 'integrity_error'
  | 'error';

export interface MetricsSnapshot {
  candidatesByResolution: Record<ResolutionType, number>;
  operationsByType: Record<SyncOperationType, number>;
  failuresByKind: Record<SyncFailureKind, number>;
  skipsByReason: Record<SkipReason, number>;
  messagesByOutcome: Record<MessageOutcome, number>;
  startedAt: string;
}

type Counters = Omit<MetricsSnapshot, 'startedAt'>;

function emptyCounters(): Counters {
  return {
    candidatesByResolution: {new: 0, unchanged_duplicate: 0, updated_duplicate: 0},
    operationsByType: {create: 0, update: 0, noop: 0, cancel: 0},
    failuresByKind: {
      permanent: 0,
      transient_exhausted: 0,
      concurrent_modification: 0,
      unknown: 0,
    },
    skipsByReason: {
      below_confidence_threshold: 0,
      low_confidence_time: 0,
      duplicate_in_batch: 0,
      unparsable_date: 0,
      ambiguous_date: 0,
      insufficient_data: 0,
    },
    messagesByOutcome: {
      processed: 0,
      already_processed: 0,
      no_events: 0,
      deadline_exceeded: 0,
      integrity_error: 0,
      error: 0,
    },
  };
}

/**
 * Process-local counters, exposed on /api/metrics.
 */
export class SyncMetrics {
  private counters = emptyCounters();
  private startedAt = new Date();

  recordResolution(type: ResolutionType): void {
    this.counters.candidatesByResolution[type]++;
  }

  recordOperation(type: SyncOperationType): void {
    this.counters.operationsByType[type]++;
  }

  recordFailure(kind: SyncFailureKind): void {
    this.counters.failuresByKind[kind]++;
  }

  recordSkip(reason: SkipReason): void {
    this.counters.skipsByReason[reason]++;
  }

  recordMessage(outcome: MessageOutcome): void {
    this.counters.messagesByOutcome[outcome]++;
  }

  snapshot(): MetricsSnapshot {
    const {counters} = this;
    return {
      candidatesByResolution: {...counters.candidatesByResolution},
      operationsByType: {...counters.operationsByType},
      failuresByKind: {...counters.failuresByKind},
      skipsByReason: {...counters.skipsByReason},
      messagesByOutcome: {...counters.messagesByOutcome},
      startedAt: this.startedAt.toISOString(),
    };
  }

  reset(): void {
    this.counters = emptyCounters();
    this.startedAt = new Date();
  }
}
