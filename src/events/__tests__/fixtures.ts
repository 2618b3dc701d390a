import {CandidateBuilderOptions, SourceMessage, buildCandidate} from '../candidateBuilder.js';
import type {CalendarEventPayload, CalendarService} from '../ports.js';
import type {EventCandidate, RawExtraction} from '../../types/events.js';

// Monday 1 January 2024, 09:00 UTC
export const RECEIVED_AT = new Date('2024-01-01T09:00:00Z');

export const builderOptions: CandidateBuilderOptions = {
  minConfidence: 0.5,
  dropLowConfidenceTimes: false,
  defaultDurationMinutes: 30,
  defaultTimezone: 'UTC',
  now: () => RECEIVED_AT,
};

export function extraction(overrides: Partial<RawExtraction> = {}): RawExtraction {
  return {
    title: 'Team lunch',
    dateText: 'tomorrow at noon',
    location: 'Cafe',
    confidence: 0.9,
    ...overrides,
  };
}

export function candidateFor(
  overrides: Partial<RawExtraction> = {},
  source: Partial<SourceMessage> = {},
): EventCandidate {
  const outcome = buildCandidate(
    extraction(overrides),
    {messageId: 'msg-1', threadId: 'thread-a', receivedAt: RECEIVED_AT, ...source},
    builderOptions,
  );
  if (outcome.status !== 'candidate') {
    throw new Error(`fixture was filtered: ${outcome.reason}`);
  }
  return outcome.candidate;
}

type CalendarOp = 'create' | 'update' | 'cancel';

/**
 * In-process calendar. The idempotency key doubles as the event id, so a
 * repeated create lands on the same event.
 */
export class FakeCalendar implements CalendarService {
  readonly events = new Map<string, CalendarEventPayload>();
  readonly calls: {op: CalendarOp; id: string}[] = [];
  failWith?: (op: CalendarOp, title: string | undefined, id: string) => Error | undefined;

  async create(event: CalendarEventPayload, idempotencyKey: string): Promise<string> {
    this.calls.push({op: 'create', id: idempotencyKey});
    const error = this.failWith?.('create', event.title, idempotencyKey);
    if (error) throw error;
    this.events.set(idempotencyKey, event);
    return idempotencyKey;
  }

  async update(externalEventId: string, event: CalendarEventPayload): Promise<void> {
    this.calls.push({op: 'update', id: externalEventId});
    const error = this.failWith?.('update', event.title, externalEventId);
    if (error) throw error;
    this.events.set(externalEventId, event);
  }

  async cancel(externalEventId: string): Promise<void> {
    this.calls.push({op: 'cancel', id: externalEventId});
    const error = this.failWith?.('cancel', this.events.get(externalEventId)?.title, externalEventId);
    if (error) throw error;
    this.events.delete(externalEventId);
  }

  callsOf(op: CalendarOp): string[] {
    return this.calls.filter(call => call.op === op).map(call => call.id);
  }
}

export const noDelayRetry = {
  maxAttempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
  sleep: async () => {},
};
