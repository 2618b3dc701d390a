import {createHash} from 'node:crypto';
import {DateTime} from 'luxon';
import type {NormalizedTime} from '../types/events.js';
import {patternOf, recurrenceSignature} from './recurrence.js';

const REPLY_PREFIX = /^\s*(?:re|fwd?|aw|sv)\s*:\s*/i;

/**
 * Title reduced to what identifies it: lowercase, no diacritics, no
 * punctuation, no reply/forward prefixes, single spaces.
 */
export function normalizeTitle(title: string): string {
  let text = title.normalize('NFKD').replace(/\p{M}+/gu, '');
  while (REPLY_PREFIX.test(text)) {
    text = text.replace(REPLY_PREFIX, '');
  }
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function instantOf(iso: string): DateTime {
  return DateTime.fromISO(iso, {setZone: true});
}

/**
 * Zone-independent text for a NormalizedTime. Two phrases that mean the
 * same moment or the same rule map to the same string; a recurrence's
 * anchored first occurrence is left out, so re-reading "every Tuesday" a
 * week later does not change it.
 */
export function canonicalTime(time: NormalizedTime): string {
  if (time.kind === 'instant') {
    const start = instantOf(time.start);
    return time.allDay
      ? `date|${start.setZone(time.timezone).toFormat('yyyy-MM-dd')}`
      : `instant|${start.toUTC().toFormat("yyyy-MM-dd'T'HH:mm:ss'Z'")}`;
  }

  const {rule} = time;
  const start = instantOf(rule.start).setZone(time.timezone);
  const parts = [
    'rrule',
    recurrenceSignature(patternOf(rule)),
    time.allDay ? 'allday' : `at=${start.toFormat('HH:mm')}`,
    `tz=${time.timezone}`,
  ];
  if (rule.until) {
    parts.push(
      `until=${instantOf(rule.until).setZone(time.timezone).toFormat('yyyy-MM-dd')}`,
    );
  }
  if (rule.count !== undefined) {
    parts.push(`count=${rule.count}`);
  }
  return parts.join('|');
}

function sha256(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/** Stable key for "the same event": normalized title plus canonical time. */
export function computeIdentityKey(title: string, time: NormalizedTime): string {
  return sha256(`${normalizeTitle(title)}\n${canonicalTime(time)}`);
}

/**
 * Hash of the fields whose change makes a known event an update. An
 * explicit series start counts; the anchored first occurrence does not.
 */
export function computeStateHash(fields: {
  title: string;
  time: NormalizedTime;
  location: string;
  durationMinutes: number;
}): string {
  return sha256(
    JSON.stringify([
      fields.title.trim(),
      canonicalTime(fields.time),
      fields.time.kind === 'recurrence' ? fields.time.rule.startsOn ?? null : null,
      fields.location.trim(),
      fields.durationMinutes,
    ]),
  );
}
