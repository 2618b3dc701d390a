import type {EventCandidate, RawExtraction, SkipReason} from '../types/events.js';
import {InsufficientDataError} from './errors.js';
import {computeIdentityKey, computeStateHash, normalizeTitle} from './identity.js';
import {DateOrder, normalizeTime} from './normalizer.js';

export interface CandidateBuilderOptions {
  minConfidence: number;
  dropLowConfidenceTimes: boolean;
  defaultDurationMinutes: number;
  defaultTimezone: string;
  dateOrder?: DateOrder;
  now?: () => Date;
}

export interface SourceMessage {
  messageId: string;
  threadId: string;
  receivedAt: Date;
}

export type CandidateOutcome =
  | {status: 'candidate'; candidate: EventCandidate}
  | {status: 'filtered'; reason: Extract<SkipReason, 'below_confidence_threshold' | 'low_confidence_time'>};

function text(value: string | null | undefined): string {
  return value?.trim() ?? '';
}

/**
 * Validates one extraction and turns it into an EventCandidate. Extractions
 * under the confidence threshold are filtered out rather than rejected.
 *
 * @throws InsufficientDataError for a missing title or date, or a malformed
 *   confidence or duration
 * @throws UnparsableDateError / AmbiguousDateError from the normalizer
 */
export function buildCandidate(
  extraction: RawExtraction,
  source: SourceMessage,
  options: CandidateBuilderOptions,
): CandidateOutcome {
  const {confidence} = extraction;
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new InsufficientDataError(
      `Extraction confidence must be between 0 and 1, got ${confidence}`,
    );
  }

  const title = text(extraction.title);
  if (normalizeTitle(title).length === 0) {
    throw new InsufficientDataError('Extraction has no usable title');
  }
  const dateText = text(extraction.dateText);
  const recurrenceText = text(extraction.recurrenceText);
  if (!dateText && !recurrenceText) {
    throw new InsufficientDataError(`Extraction "${title}" has no date`);
  }

  const duration = extraction.durationMinutes;
  if (
    duration !== null &&
    duration !== undefined &&
    (!Number.isFinite(duration) || duration <= 0)
  ) {
    throw new InsufficientDataError(
      `Extraction "${title}" has an invalid duration: ${duration}`,
    );
  }

  if (confidence < options.minConfidence) {
    return {status: 'filtered', reason: 'below_confidence_threshold'};
  }

  const normalizedTime = normalizeTime(
    {dateText, recurrenceText},
    {
      referenceNow: source.receivedAt,
      defaultTimezone: options.defaultTimezone,
      dateOrder: options.dateOrder,
    },
  );
  if (normalizedTime.lowConfidence && options.dropLowConfidenceTimes) {
    return {status: 'filtered', reason: 'low_confidence_time'};
  }

  const location = text(extraction.location);
  const durationMinutes = Math.round(duration ?? options.defaultDurationMinutes);

  return {
    status: 'candidate',
    candidate: {
      identityKey: computeIdentityKey(title, normalizedTime),
      stateHash: computeStateHash({
        title,
        time: normalizedTime,
        location,
        durationMinutes,
      }),
      title,
      description: text(extraction.description),
      location,
      durationMinutes,
      normalizedTime,
      sourceMessageId: source.messageId,
      sourceThreadId: source.threadId,
      extractionConfidence: confidence,
      lowConfidence: normalizedTime.lowConfidence,
      extractedAt: options.now ? options.now() : new Date(),
    },
  };
}
