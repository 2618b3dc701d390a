import {buildCandidate} from '../candidateBuilder.js';
import {InsufficientDataError, UnparsableDateError} from '../errors.js';
import {RECEIVED_AT, builderOptions, extraction} from './fixtures.js';

const source = {messageId: 'msg-1', threadId: 'thread-a', receivedAt: RECEIVED_AT};

describe('buildCandidate', () => {
  it('should build a candidate with defaults applied', () => {
    const outcome = buildCandidate(extraction(), source, builderOptions);
    expect(outcome.status).toBe('candidate');
    if (outcome.status !== 'candidate') return;
    const {candidate} = outcome;
    expect(candidate.title).toBe('Team lunch');
    expect(candidate.description).toBe('');
    expect(candidate.location).toBe('Cafe');
    expect(candidate.durationMinutes).toBe(30);
    expect(candidate.normalizedTime).toEqual({
      kind: 'instant',
      start: '2024-01-02T12:00:00Z',
      timezone: 'UTC',
      allDay: false,
      lowConfidence: false,
    });
    expect(candidate.sourceMessageId).toBe('msg-1');
    expect(candidate.sourceThreadId).toBe('thread-a');
    expect(candidate.extractionConfidence).toBe(0.9);
    expect(candidate.extractedAt).toEqual(RECEIVED_AT);
    expect(candidate.identityKey).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should round the duration', () => {
    const outcome = buildCandidate(extraction({durationMinutes: 44.6}), source, builderOptions);
    expect(outcome.status === 'candidate' && outcome.candidate.durationMinutes).toBe(45);
  });

  it('should filter an extraction under the confidence threshold without failing', () => {
    expect(buildCandidate(extraction({confidence: 0.2}), source, builderOptions)).toEqual({
      status: 'filtered',
      reason: 'below_confidence_threshold',
    });
  });

  it('should filter before reading the date', () => {
    const outcome = buildCandidate(
      extraction({confidence: 0.2, dateText: 'whenever suits'}),
      source,
      builderOptions,
    );
    expect(outcome).toEqual({status: 'filtered', reason: 'below_confidence_threshold'});
  });

  it('should drop low-confidence times when configured to', () => {
    const outcome = buildCandidate(extraction({dateText: 'Friday at 9'}), source, {
      ...builderOptions,
      dropLowConfidenceTimes: true,
    });
    expect(outcome).toEqual({status: 'filtered', reason: 'low_confidence_time'});
  });

  it('should keep low-confidence times by default and flag them', () => {
    const outcome = buildCandidate(extraction({dateText: 'Friday at 9'}), source, builderOptions);
    expect(outcome.status === 'candidate' && outcome.candidate.lowConfidence).toBe(true);
  });

  it('should reject a confidence outside 0..1', () => {
    expect(() => buildCandidate(extraction({confidence: 1.5}), source, builderOptions)).toThrow(
      InsufficientDataError,
    );
  });

  it('should reject a title with nothing left after normalizing', () => {
    expect(() => buildCandidate(extraction({title: ' !! '}), source, builderOptions)).toThrow(
      InsufficientDataError,
    );
  });

  it('should reject an extraction without a date', () => {
    expect(() =>
      buildCandidate(extraction({dateText: null, recurrenceText: ''}), source, builderOptions),
    ).toThrow(InsufficientDataError);
  });

  it('should reject a non-positive duration', () => {
    expect(() =>
      buildCandidate(extraction({durationMinutes: 0}), source, builderOptions),
    ).toThrow(InsufficientDataError);
  });

  it('should let normalizer errors through', () => {
    expect(() =>
      buildCandidate(extraction({dateText: '2024-13-40'}), source, builderOptions),
    ).toThrow(UnparsableDateError);
  });
});
