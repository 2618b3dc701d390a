import {DateTime} from 'luxon';
import {Frequency, RRule, Weekday} from 'rrule';
import type {
  NormalizedRecurrence,
  RecurrenceFrequency,
  RecurrenceRule,
  WeekdayCode,
} from '../types/events.js';

export const WEEKDAY_ORDER: WeekdayCode[] = [
  'MO',
  'TU',
  'WE',
  'TH',
  'FR',
  'SA',
  'SU',
];

const RRULE_WEEKDAYS: Record<WeekdayCode, Weekday> = {
  MO: RRule.MO,
  TU: RRule.TU,
  WE: RRule.WE,
  TH: RRule.TH,
  FR: RRule.FR,
  SA: RRule.SA,
  SU: RRule.SU,
};

const RRULE_FREQUENCIES: Record<RecurrenceFrequency, Frequency> = {
  daily: RRule.DAILY,
  weekly: RRule.WEEKLY,
  monthly: RRule.MONTHLY,
};

/** Luxon weekday (1 = Monday .. 7 = Sunday) to its RFC 5545 code. */
export function weekdayCodeOf(dt: DateTime): WeekdayCode {
  return WEEKDAY_ORDER[dt.weekday - 1];
}

export function sortWeekdays(days: Iterable<WeekdayCode>): WeekdayCode[] {
  const unique = new Set(days);
  return WEEKDAY_ORDER.filter(day => unique.has(day));
}

/*
 * rrule works on "floating" dates: the UTC fields of a Date carry the
 * wall-clock time in the event's zone. Converting at the edges keeps
 * occurrences at the same local time across DST changes.
 */
function toFloating(dt: DateTime): Date {
  return new Date(
    Date.UTC(dt.year, dt.month - 1, dt.day, dt.hour, dt.minute, dt.second),
  );
}

function fromFloating(date: Date, zone: string): DateTime {
  return DateTime.fromObject(
    {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hour: date.getUTCHours(),
      minute: date.getUTCMinutes(),
      second: date.getUTCSeconds(),
    },
    {zone},
  );
}

export interface RecurrencePattern {
  frequency: RecurrenceFrequency;
  interval: number;
  byWeekday: WeekdayCode[];
  byMonthDay?: number;
  bySetPosition?: number;
}

function buildRRule(
  pattern: RecurrencePattern,
  dtstart: DateTime,
  bounds: {until?: DateTime; count?: number} = {},
): RRule {
  return new RRule({
    freq: RRULE_FREQUENCIES[pattern.frequency],
    interval: pattern.interval,
    dtstart: toFloating(dtstart),
    byweekday:
      pattern.byWeekday.length > 0
        ? pattern.byWeekday.map(code => RRULE_WEEKDAYS[code])
        : null,
    bymonthday: pattern.byMonthDay ?? null,
    bysetpos: pattern.bySetPosition ?? null,
    until: bounds.until ? toFloating(bounds.until) : null,
    count: bounds.count ?? null,
  });
}

/**
 * First occurrence of `pattern` at `timeOfDay` on or after `lowerBound`,
 * or null when the pattern never fires (e.g. "the 31st" bounded by until).
 */
export function firstOccurrenceOnOrAfter(
  pattern: RecurrencePattern,
  lowerBound: DateTime,
  timeOfDay: {hour: number; minute: number},
  until?: DateTime,
): DateTime | null {
  const zone = lowerBound.zoneName ?? 'UTC';
  const anchor = lowerBound
    .startOf('day')
    .set({hour: timeOfDay.hour, minute: timeOfDay.minute});
  const rule = buildRRule(pattern, anchor, {until});
  const next = rule.after(toFloating(lowerBound), true);
  return next ? fromFloating(next, zone) : null;
}

export function patternOf(rule: RecurrenceRule): RecurrencePattern {
  return {
    frequency: rule.frequency,
    interval: rule.interval,
    byWeekday: rule.byWeekday,
    byMonthDay: rule.byMonthDay,
    bySetPosition: rule.bySetPosition,
  };
}

/**
 * Enumerates occurrences forward from the rule's start, at most `limit`.
 */
export function enumerateOccurrences(
  time: NormalizedRecurrence,
  limit = 10,
): DateTime[] {
  const {rule, timezone} = time;
  const start = DateTime.fromISO(rule.start, {setZone: true}).setZone(
    timezone,
  );
  const rrule = buildRRule(patternOf(rule), start, {
    until: rule.until
      ? DateTime.fromISO(rule.until, {setZone: true}).setZone(timezone)
      : undefined,
    count: rule.count,
  });
  return rrule
    .all((_date, index) => index < limit)
    .map(date => fromFloating(date, timezone));
}

/**
 * Order-independent signature of the repeating pattern, e.g.
 * `FREQ=WEEKLY;INTERVAL=1;BYDAY=MO,WE`. Doubles as the body of an RRULE.
 */
export function recurrenceSignature(pattern: RecurrencePattern): string {
  const parts = [
    `FREQ=${pattern.frequency.toUpperCase()}`,
    `INTERVAL=${pattern.interval}`,
  ];
  if (pattern.byWeekday.length > 0) {
    parts.push(`BYDAY=${sortWeekdays(pattern.byWeekday).join(',')}`);
  }
  if (pattern.byMonthDay !== undefined) {
    parts.push(`BYMONTHDAY=${pattern.byMonthDay}`);
  }
  if (pattern.bySetPosition !== undefined) {
    parts.push(`BYSETPOS=${pattern.bySetPosition}`);
  }
  return parts.join(';');
}

/** RFC 5545 line for calendar APIs, e.g. `RRULE:FREQ=DAILY;INTERVAL=1;COUNT=5`. */
export function toRRuleLine(time: NormalizedRecurrence): string {
  const {rule} = time;
  let line = `RRULE:${recurrenceSignature(patternOf(rule))}`;
  if (rule.until) {
    const until = DateTime.fromISO(rule.until, {setZone: true});
    line += time.allDay
      ? `;UNTIL=${until.setZone(time.timezone).toFormat('yyyyMMdd')}`
      : `;UNTIL=${until.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")}`;
  }
  if (rule.count !== undefined) {
    line += `;COUNT=${rule.count}`;
  }
  return line;
}
