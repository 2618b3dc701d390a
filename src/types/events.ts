/**
 * Structured event fields returned by the extraction model for one message.
 * Ephemeral: discarded once candidates have been built.
 */
export interface RawExtraction {
  title: string;
  description?: string | null;
  dateText?: string | null;
  recurrenceText?: string | null;
  location?: string | null;
  durationMinutes?: number | null;
  confidence: number; // 0..1
}

export type WeekdayCode = 'MO' | 'TU' | 'WE' | 'TH' | 'FR' | 'SA' | 'SU';

export type RecurrenceFrequency = 'daily' | 'weekly' | 'monthly';

export interface RecurrenceRule {
  frequency: RecurrenceFrequency;
  interval: number;
  byWeekday: WeekdayCode[];
  byMonthDay?: number;
  // e.g. 1 with byWeekday [MO] = first Monday, -1 = last
  bySetPosition?: number;
  start: string; // ISO with offset, first occurrence
  // yyyy-MM-dd of an explicit "starting ..." day, if the text named one
  startsOn?: string;
  until?: string;
  count?: number;
}

interface NormalizedTimeBase {
  timezone: string; // IANA
  allDay: boolean;
  lowConfidence: boolean;
}

export interface NormalizedInstant extends NormalizedTimeBase {
  kind: 'instant';
  start: string; // ISO with offset
}

export interface NormalizedRecurrence extends NormalizedTimeBase {
  kind: 'recurrence';
  rule: RecurrenceRule;
}

export type NormalizedTime = NormalizedInstant | NormalizedRecurrence;

export interface EventCandidate {
  identityKey: string;
  stateHash: string;
  title: string;
  description: string;
  location: string;
  durationMinutes: number;
  normalizedTime: NormalizedTime;
  sourceMessageId: string;
  sourceThreadId: string;
  extractionConfidence: number;
  lowConfidence: boolean;
  extractedAt: Date;
}

export type SyncedEventStatus = 'active' | 'cancelled';

export interface SyncedEvent {
  identityKey: string;
  externalEventId: string;
  lastSyncedStateHash: string;
  lastSyncedAt: Date;
  status: SyncedEventStatus;
  sourceThreadId: string;
  sourceMessageId: string;
  title: string;
  version: number;
}

/** Fields written by a put; the store assigns the next version. */
export type SyncedEventInput = Omit<SyncedEvent, 'version'>;

export interface ProcessedMessageRecord {
  messageId: string;
  threadId: string;
  processedAt: Date;
  candidateIdentityKeys: string[];
}

export type ResolutionType = 'new' | 'unchanged_duplicate' | 'updated_duplicate';

export type Resolution =
  | {type: 'new'; previous?: SyncedEvent}
  | {type: 'unchanged_duplicate'; syncedEvent: SyncedEvent}
  | {type: 'updated_duplicate'; syncedEvent: SyncedEvent};

export interface ResolvedCandidate {
  candidate: EventCandidate;
  resolution: Resolution;
}

export type SyncOperation =
  | {type: 'create'; candidate: EventCandidate; previous?: SyncedEvent}
  | {type: 'update'; syncedEvent: SyncedEvent; candidate: EventCandidate}
  | {type: 'noop'; syncedEvent: SyncedEvent; candidate: EventCandidate}
  | {type: 'cancel'; syncedEvent: SyncedEvent};

export type SyncOperationType = SyncOperation['type'];

export type SyncFailureKind =
  | 'permanent'
  | 'transient_exhausted'
  | 'concurrent_modification'
  | 'unknown';

export interface SyncFailure {
  identityKey: string;
  operation: SyncOperationType;
  kind: SyncFailureKind;
  message: string;
  attempts: number;
}

export type SkipReason =
  | 'below_confidence_threshold'
  | 'low_confidence_time'
  | 'duplicate_in_batch'
  | 'unparsable_date'
  | 'ambiguous_date'
  | 'insufficient_data';

export interface SkippedExtraction {
  title: string;
  reason: SkipReason;
  message?: string;
}

export interface ProcessingResult {
  messageId: string;
  alreadyProcessed: boolean;
  created: number;
  updated: number;
  cancelled: number;
  unchanged: number;
  failed: number;
  skipped: number;
  failures: SyncFailure[];
  skips: SkippedExtraction[];
}
