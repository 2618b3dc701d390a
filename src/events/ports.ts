import type {NormalizedTime, RawExtraction} from '../types/events.js';

/** What a calendar needs to know to render one event. */
export interface CalendarEventPayload {
  title: string;
  description: string;
  location: string;
  durationMinutes: number;
  time: NormalizedTime;
}

/**
 * External calendar. Implementations raise TransientSyncError for
 * failures worth retrying and PermanentSyncError for the rest, and abort
 * the request when `signal` fires.
 */
export interface CalendarService {
  /**
   * Creates the event and returns its external id. Replaying the same
   * `idempotencyKey` must not produce a second event.
   */
  create(
    event: CalendarEventPayload,
    idempotencyKey: string,
    signal?: AbortSignal,
  ): Promise<string>;
  update(
    externalEventId: string,
    event: CalendarEventPayload,
    signal?: AbortSignal,
  ): Promise<void>;
  /** Cancelling an event that is already gone succeeds. */
  cancel(externalEventId: string, signal?: AbortSignal): Promise<void>;
}

export interface EmailMessage {
  id: string;
  threadId: string;
  subject: string;
  bodyText: string;
  headers: Record<string, string>;
  receivedAt: Date;
}

export interface EmailPage {
  messages: EmailMessage[];
  nextPageToken?: string;
}

/** A mailbox read page by page. The same message may be delivered again. */
export interface EmailSource {
  listMessages(pageToken?: string): Promise<EmailPage>;
}

export interface ExtractionRequest {
  timezone: string;
  signal?: AbortSignal;
}

/**
 * Pulls event mentions out of a message. Failure and "nothing found" both
 * come back as an empty list.
 */
export interface EventExtractor {
  extract(
    message: EmailMessage,
    request: ExtractionRequest,
  ): Promise<RawExtraction[]>;
}
