import type {
  EventCandidate,
  ProcessingResult,
  RawExtraction,
  SkipReason,
  SkippedExtraction,
} from '../types/events.js';
import {CandidateBuilderOptions, buildCandidate} from './candidateBuilder.js';
import {
  DeadlineExceededError,
  EventSyncError,
  ProcessedMessageIntegrityError,
  describeError,
} from './errors.js';
import type {SyncMetrics} from './metrics.js';
import type {EmailMessage, EventExtractor} from './ports.js';
import {planOperations, SyncReconciler} from './reconciler.js';
import {resolveCandidates} from './resolver.js';
import {untilAborted} from './retry.js';
import type {SyncStateStore} from './store.js';

export interface MessageProcessorOptions {
  candidates: Omit<CandidateBuilderOptions, 'now'>;
  deadlineMs: number;
}

export interface MessageProcessorDeps {
  store: SyncStateStore;
  extractor: EventExtractor;
  reconciler: SyncReconciler;
  options: MessageProcessorOptions;
  metrics?: SyncMetrics;
  now?: () => Date;
}

const SKIPPABLE_ERRORS: Partial<Record<EventSyncError['kind'], SkipReason>> = {
  unparsable_date: 'unparsable_date',
  ambiguous_date: 'ambiguous_date',
  insufficient_data: 'insufficient_data',
};

function emptyResult(messageId: string, alreadyProcessed: boolean): ProcessingResult {
  return {
    messageId,
    alreadyProcessed,
    created: 0,
    updated: 0,
    cancelled: 0,
    unchanged: 0,
    failed: 0,
    skipped: 0,
    failures: [],
    skips: [],
  };
}

/**
 * Single entry point for one email: extract, normalize, resolve, reconcile,
 * then record the message as processed. Redelivering a processed message
 * is a no-op.
 */
export class MessageProcessor {
  constructor(private readonly deps: MessageProcessorDeps) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async processMessage(message: EmailMessage): Promise<ProcessingResult> {
    const {metrics} = this.deps;
    const startTime = Date.now();

    try {
      if (await this.deps.store.isMessageProcessed(message.id)) {
        console.log(`[Message Processor] Message ${message.id} already processed, skipping`);
        metrics?.recordMessage('already_processed');
        return emptyResult(message.id, true);
      }

      const controller = new AbortController();
      const timer = setTimeout(
        () =>
          controller.abort(
            new DeadlineExceededError(message.id, this.deps.options.deadlineMs),
          ),
        this.deps.options.deadlineMs,
      );
      try {
        const result = await this.run(message, controller.signal);
        console.log(
          `[Message Processor] [${new Date().toISOString()}] Processed message ${message.id} (${Date.now() - startTime}ms)`,
          {
            created: result.created,
            updated: result.updated,
            cancelled: result.cancelled,
            unchanged: result.unchanged,
            failed: result.failed,
            skipped: result.skipped,
          },
        );
        return result;
      } finally {
        clearTimeout(timer);
      }
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        metrics?.recordMessage('deadline_exceeded');
      } else if (error instanceof ProcessedMessageIntegrityError) {
        metrics?.recordMessage('integrity_error');
      } else {
        metrics?.recordMessage('error');
      }
      console.error(
        `[Message Processor] [${new Date().toISOString()}] Message ${message.id} aborted:`,
        describeError(error),
      );
      throw error;
    }
  }

  private async extract(
    message: EmailMessage,
    signal: AbortSignal,
  ): Promise<RawExtraction[]> {
    try {
      return await untilAborted(
        this.deps.extractor.extract(message, {
          timezone: this.deps.options.candidates.defaultTimezone,
          signal,
        }),
        signal,
      );
    } catch (error) {
      if (signal.aborted) {
        throw signal.reason;
      }
      console.warn(
        `[Message Processor] Extraction failed for message ${message.id}, treating as no events:`,
        describeError(error),
      );
      return [];
    }
  }

  private buildCandidates(
    message: EmailMessage,
    extractions: RawExtraction[],
  ): {candidates: EventCandidate[]; skips: SkippedExtraction[]; incomplete: boolean} {
    const candidates: EventCandidate[] = [];
    const skips: SkippedExtraction[] = [];
    let incomplete = false;

    for (const extraction of extractions) {
      try {
        const outcome = buildCandidate(
          extraction,
          {
            messageId: message.id,
            threadId: message.threadId,
            receivedAt: message.receivedAt,
          },
          {...this.deps.options.candidates, now: () => this.now()},
        );
        if (outcome.status === 'candidate') {
          candidates.push(outcome.candidate);
        } else {
          skips.push({title: extraction.title, reason: outcome.reason});
        }
      } catch (error) {
        const reason =
          error instanceof EventSyncError ? SKIPPABLE_ERRORS[error.kind] : undefined;
        if (!reason || !(error instanceof Error)) {
          throw error;
        }
        incomplete = true;
        console.warn(`[Message Processor] Skipping "${extraction.title}" in ${message.id}:`, {
          reason,
          message: error.message,
        });
        skips.push({title: extraction.title, reason, message: error.message});
      }
    }

    return {candidates, skips, incomplete};
  }

  private async run(
    message: EmailMessage,
    signal: AbortSignal,
  ): Promise<ProcessingResult> {
    const {store, reconciler, metrics} = this.deps;
    const result = emptyResult(message.id, false);

    const extractions = await this.extract(message, signal);
    const {candidates, skips, incomplete} = this.buildCandidates(message, extractions);

    signal.throwIfAborted();
    const resolved = await untilAborted(resolveCandidates(candidates, store), signal);
    for (const {resolution} of resolved) {
      metrics?.recordResolution(resolution.type);
    }

    const active = await untilAborted(store.listActiveForThread(message.threadId), signal);
    const plan = planOperations(resolved, active, {
      threadId: message.threadId,
      suppressCancellation: incomplete,
    });
    if (incomplete && active.length > 0) {
      console.log(
        `[Message Processor] Not cancelling events of thread ${message.threadId}: an extraction in ${message.id} could not be read`,
      );
    }

    const summary = await untilAborted(reconciler.execute(plan.operations, signal), signal);

    result.created = summary.created;
    result.updated = summary.updated;
    result.cancelled = summary.cancelled;
    result.unchanged = summary.unchanged;
    result.failures = summary.failures;
    result.failed = summary.failures.length;
    result.skips = [...skips, ...plan.skips];
    result.skipped = result.skips.length;
    for (const skip of result.skips) {
      metrics?.recordSkip(skip.reason);
    }

    // Any failure other than a permanent one leaves the message for the next delivery.
    const retryable = summary.failures.filter(failure => failure.kind !== 'permanent');
    if (retryable.length === 0) {
      if (summary.failures.length > 0) {
        console.warn(
          `[Message Processor] Recording ${message.id} as processed with ${summary.failures.length} permanent failure(s)`,
        );
      }
      await store.markMessageProcessed({
        messageId: message.id,
        threadId: message.threadId,
        processedAt: this.now(),
        candidateIdentityKeys: candidates.map(candidate => candidate.identityKey),
      });
    }

    metrics?.recordMessage(candidates.length > 0 ? 'processed' : 'no_events');
    return result;
  }
}
