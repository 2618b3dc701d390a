import * as chrono from 'chrono-node';
import {DateTime, DurationLikeObject, IANAZone} from 'luxon';
import type {
  NormalizedTime,
  RecurrenceFrequency,
  WeekdayCode,
} from '../types/events.js';
import {AmbiguousDateError, UnparsableDateError} from './errors.js';
import {
  RecurrencePattern,
  WEEKDAY_ORDER,
  firstOccurrenceOnOrAfter,
  sortWeekdays,
  weekdayCodeOf,
} from './recurrence.js';

export type DateOrder = 'MDY' | 'DMY';

export interface NormalizeOptions {
  referenceNow: Date;
  defaultTimezone: string;
  // how to read 03/04; without it such dates are ambiguous
  dateOrder?: DateOrder;
}

export interface NormalizeInput {
  dateText?: string | null;
  recurrenceText?: string | null;
}

interface TimeOfDay {
  hour: number;
  minute: number;
  inferred: boolean;
}

interface ResolvedDay {
  date: DateTime;
  inferred: boolean;
  // bare weekdays move a week ahead once their time has passed
  rollsForward: boolean;
}

interface Context {
  zone: string;
  now: DateTime;
  dateOrder?: DateOrder;
}

const TZ_ABBREVIATIONS: Record<string, string> = {
  et: 'America/New_York',
  est: 'America/New_York',
  edt: 'America/New_York',
  ct: 'America/Chicago',
  cst: 'America/Chicago',
  cdt: 'America/Chicago',
  mt: 'America/Denver',
  mst: 'America/Denver',
  mdt: 'America/Denver',
  pt: 'America/Los_Angeles',
  pst: 'America/Los_Angeles',
  pdt: 'America/Los_Angeles',
  utc: 'UTC',
  gmt: 'UTC',
};

const WEEKDAY_NAMES: Record<string, WeekdayCode> = {
  monday: 'MO',
  mondays: 'MO',
  mon: 'MO',
  tuesday: 'TU',
  tuesdays: 'TU',
  tues: 'TU',
  tue: 'TU',
  wednesday: 'WE',
  wednesdays: 'WE',
  wed: 'WE',
  thursday: 'TH',
  thursdays: 'TH',
  thurs: 'TH',
  thur: 'TH',
  thu: 'TH',
  friday: 'FR',
  fridays: 'FR',
  fri: 'FR',
  saturday: 'SA',
  saturdays: 'SA',
  sat: 'SA',
  sunday: 'SU',
  sundays: 'SU',
  sun: 'SU',
};

const WEEKDAY_PATTERN = Object.keys(WEEKDAY_NAMES)
  .sort((a, b) => b.length - a.length)
  .join('|');

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

const NUMBER_PATTERN = `\\d{1,3}|${Object.keys(NUMBER_WORDS).join('|')}`;

const ORDINALS: Record<string, number> = {
  first: 1,
  '1st': 1,
  second: 2,
  '2nd': 2,
  third: 3,
  '3rd': 3,
  fourth: 4,
  '4th': 4,
  last: -1,
};

const RECURRENCE_HINT = new RegExp(
  `\\b(every|each|daily|weekly|monthly|biweekly|fortnightly|bimonthly|weekdays|weekends|${Object.keys(
    WEEKDAY_NAMES,
  )
    .filter(name => name.endsWith('s') && name.length > 5)
    .join('|')})\\b`,
);

type SpanUnit = 'days' | 'weeks' | 'months';

function spanUnitOf(unit: string): SpanUnit {
  if (unit.startsWith('day')) return 'days';
  if (unit.startsWith('week')) return 'weeks';
  return 'months';
}

function spanOf(unit: SpanUnit, count: number): DurationLikeObject {
  switch (unit) {
    case 'days':
      return {days: count};
    case 'weeks':
      return {weeks: count};
    default:
      return {months: count};
  }
}

function parseCount(token: string): number {
  const word = NUMBER_WORDS[token];
  return word ?? parseInt(token, 10);
}

function clean(text: string): string {
  return text
    .toLowerCase()
    .replace(/\b([ap])\.m\.?/g, '$1m')
    .replace(/[,;!?]/g, ' ')
    .replace(/\.(\s|$)/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function assertValid(dt: DateTime, phrase: string): DateTime {
  if (!dt.isValid) {
    throw new UnparsableDateError(phrase, dt.invalidExplanation ?? 'invalid date');
  }
  return dt;
}

function toIso(dt: DateTime, phrase: string): string {
  const iso = assertValid(dt, phrase).toISO({suppressMilliseconds: true});
  if (!iso) {
    throw new UnparsableDateError(phrase, 'could not format date');
  }
  return iso;
}

const ISO_TIMESTAMP =
  /\b(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}(?::?\d{2})?)?(?![\w:])/i;

/** IANA name for a fixed UTC offset; Etc/GMT signs run the other way. */
function zoneForOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0 || offsetMinutes % 60 !== 0) {
    return 'UTC';
  }
  const hours = -offsetMinutes / 60;
  if (hours < -14 || hours > 12) {
    return 'UTC';
  }
  return `Etc/GMT${hours > 0 ? '+' : ''}${hours}`;
}

/**
 * Rewrites an ISO 8601 timestamp as "yyyy-mm-dd hh:mm" and returns the
 * instant when it carries an offset. Offsets that are not whole hours are
 * read in UTC.
 */
function extractTimestamp(raw: string): {instant?: DateTime; rest: string} {
  const stamp = raw.match(ISO_TIMESTAMP);
  if (!stamp) {
    return {rest: raw};
  }
  if (!stamp[3]) {
    return {rest: raw.replace(stamp[0], ` ${stamp[1]} ${stamp[2].slice(0, 5)} `)};
  }
  const parsed = DateTime.fromISO(`${stamp[1]}T${stamp[2]}${stamp[3]}`, {setZone: true});
  const instant = assertValid(parsed, raw).setZone(zoneForOffset(parsed.offset));
  return {
    instant,
    rest: raw.replace(stamp[0], ` ${instant.toFormat('yyyy-MM-dd HH:mm')} `),
  };
}

/**
 * Pulls an explicit zone (IANA name or US/UTC abbreviation) out of the
 * phrase. IANA names are matched before lowercasing.
 */
function extractNamedZone(raw: string): {zone?: string; rest: string} {
  const iana = raw.match(/\b([A-Za-z]+\/[A-Za-z_]+(?:\/[A-Za-z_]+)?)\b/);
  if (iana && IANAZone.isValidZone(iana[1])) {
    return {zone: iana[1], rest: clean(raw.replace(iana[0], ' '))};
  }
  const text = clean(raw);
  const abbr = text.match(
    /\b(et|est|edt|ct|cst|cdt|mt|mst|mdt|pt|pst|pdt|utc|gmt)\b/,
  );
  if (abbr) {
    return {
      zone: TZ_ABBREVIATIONS[abbr[1]],
      rest: text.replace(abbr[0], ' ').replace(/\s+/g, ' ').trim(),
    };
  }
  return {rest: text};
}

/**
 * Explicit zone of a phrase: the offset of an ISO timestamp, or a zone
 * name. A name that disagrees with the timestamp's offset is ambiguous.
 */
function extractZone(raw: string): {zone?: string; rest: string} {
  const stamp = extractTimestamp(raw);
  const named = extractNamedZone(stamp.rest);
  if (!stamp.instant) {
    return named;
  }
  if (named.zone && named.zone !== stamp.instant.zoneName) {
    if (stamp.instant.setZone(named.zone).offset !== stamp.instant.offset) {
      throw new AmbiguousDateError(raw, [stamp.instant.toISO() ?? raw, named.zone]);
    }
    return named;
  }
  return {zone: stamp.instant.zoneName ?? 'UTC', rest: named.rest};
}

function toHour24(
  hour: number,
  minute: number,
  meridiem: string | undefined,
  phrase: string,
): TimeOfDay {
  if (minute > 59) {
    throw new UnparsableDateError(phrase, `invalid minute ${minute}`);
  }
  if (meridiem) {
    if (hour < 1 || hour > 12) {
      throw new UnparsableDateError(phrase, `invalid hour ${hour}${meridiem}`);
    }
    const base = hour % 12;
    return {hour: meridiem === 'pm' ? base + 12 : base, minute, inferred: false};
  }
  if (hour > 23) {
    throw new UnparsableDateError(phrase, `invalid hour ${hour}`);
  }
  if (hour === 0 || hour >= 13) {
    return {hour, minute, inferred: false};
  }
  // No am/pm: assume business hours, 7-11 morning and 12-6 afternoon.
  return {hour: hour <= 6 ? hour + 12 : hour, minute, inferred: true};
}

// The end needs minutes or a meridiem, so "10:00-11:30" is a range and
// "10:00 until 15 march" is not.
const RANGE_REGEX =
  /(?<![\d/.:-])\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)?\s*(?:-|–|to|till|until)\s*(\d{1,2})(?::(\d{2})\s*(am|pm)?|\s*(am|pm))\b(?![/.:]\d|-\d)/;
const TIME_REGEX =
  /\b(noon|midday|midnight)\b|\b(\d{1,2}):(\d{2})\s*(am|pm)?\b|\b(\d{1,2})\s*(am|pm)\b|\bat\s+(\d{1,2})\b(?!\s*(?:st|nd|rd|th|am|pm)\b|[/.:-]\d)/g;

/**
 * Start of a time range. A start without am/pm takes the end's, unless
 * that would put it after the end ("11-1pm" starts at 11am).
 */
function rangeStart(range: RegExpMatchArray, phrase: string): TimeOfDay {
  const hour = parseInt(range[1], 10);
  const minute = range[2] ? parseInt(range[2], 10) : 0;
  const endMeridiem = range[6] ?? range[7];
  if (range[3] || !endMeridiem) {
    return toHour24(hour, minute, range[3], phrase);
  }
  const end = toHour24(
    parseInt(range[4], 10),
    range[5] ? parseInt(range[5], 10) : 0,
    endMeridiem,
    phrase,
  );
  const start = toHour24(hour, minute, endMeridiem, phrase);
  if (start.hour * 60 + start.minute < end.hour * 60 + end.minute) {
    return start;
  }
  return toHour24(hour, minute, endMeridiem === 'pm' ? 'am' : 'pm', phrase);
}

/**
 * Finds the time of day in the phrase. Ranges keep their start; several
 * distinct times are ambiguous.
 */
function extractTime(
  text: string,
  phrase: string,
): {time?: TimeOfDay; rest: string} {
  let rest = text;
  const found: TimeOfDay[] = [];

  const range = rest.match(RANGE_REGEX);
  if (range) {
    found.push(rangeStart(range, phrase));
    rest = rest.replace(range[0], ' ');
  }

  for (const match of rest.matchAll(TIME_REGEX)) {
    if (match[1]) {
      found.push({hour: match[1] === 'midnight' ? 0 : 12, minute: 0, inferred: false});
    } else if (match[2]) {
      found.push(
        toHour24(parseInt(match[2], 10), parseInt(match[3], 10), match[4], phrase),
      );
    } else if (match[5]) {
      found.push(toHour24(parseInt(match[5], 10), 0, match[6], phrase));
    } else if (match[7]) {
      found.push(toHour24(parseInt(match[7], 10), 0, undefined, phrase));
    }
  }
  rest = rest.replace(TIME_REGEX, ' ');

  const distinct = new Map(
    found.map(t => [`${String(t.hour).padStart(2, '0')}:${String(t.minute).padStart(2, '0')}`, t]),
  );
  if (distinct.size > 1) {
    throw new AmbiguousDateError(phrase, [...distinct.keys()]);
  }
  const [time] = distinct.values();
  return {time, rest: rest.replace(/\s+/g, ' ').trim()};
}

function weekdayIndex(code: WeekdayCode): number {
  return WEEKDAY_ORDER.indexOf(code) + 1;
}

function weekdaysIn(text: string): WeekdayCode[] {
  const regex = new RegExp(`\\b(${WEEKDAY_PATTERN})\\b`, 'g');
  return sortWeekdays(
    [...text.matchAll(regex)].map(match => WEEKDAY_NAMES[match[1]]),
  );
}

function nearestFutureDate(
  ctx: Context,
  month: number,
  day: number,
  phrase: string,
): DateTime {
  const today = ctx.now.startOf('day');
  let candidate = assertValid(
    DateTime.fromObject({year: today.year, month, day}, {zone: ctx.zone}),
    phrase,
  );
  if (candidate < today) {
    candidate = assertValid(candidate.plus({years: 1}), phrase);
  }
  return candidate;
}

function numericDay(
  match: RegExpMatchArray,
  ctx: Context,
  phrase: string,
): ResolvedDay {
  const first = parseInt(match[1], 10);
  const second = parseInt(match[2], 10);
  let order = ctx.dateOrder;
  if (first > 12 && second <= 12) {
    order = 'DMY';
  } else if (second > 12 && first <= 12) {
    order = 'MDY';
  } else if (!order && first !== second) {
    throw new AmbiguousDateError(phrase, [
      `month ${first} day ${second}`,
      `day ${first} month ${second}`,
    ]);
  }
  const month = order === 'DMY' ? second : first;
  const day = order === 'DMY' ? first : second;

  if (match[3]) {
    const rawYear = parseInt(match[3], 10);
    const year = match[3].length === 2 ? 2000 + rawYear : rawYear;
    return {
      date: assertValid(
        DateTime.fromObject({year, month, day}, {zone: ctx.zone}),
        phrase,
      ),
      inferred: false,
      rollsForward: false,
    };
  }
  return {
    date: nearestFutureDate(ctx, month, day, phrase),
    inferred: true,
    rollsForward: false,
  };
}

function relativeWeekday(
  code: WeekdayCode,
  modifier: string | undefined,
  base: DateTime,
): ResolvedDay {
  const offset = (weekdayIndex(code) - base.weekday + 7) % 7;
  if (modifier === 'next') {
    return {date: base.plus({days: offset || 7}), inferred: false, rollsForward: false};
  }
  return {date: base.plus({days: offset}), inferred: false, rollsForward: offset === 0};
}

function chronoDay(text: string, ctx: Context, phrase: string): {
  day: ResolvedDay;
  time?: TimeOfDay;
} {
  // chrono reads the reference's local fields, so hand it the zone's wall clock
  const reference = new Date(
    ctx.now.year,
    ctx.now.month - 1,
    ctx.now.day,
    ctx.now.hour,
    ctx.now.minute,
  );
  const results = chrono.parse(text, reference, {forwardDate: true});
  if (results.length === 0) {
    throw new UnparsableDateError(phrase);
  }
  const days = new Set(
    results.map(result =>
      [
        result.start.get('year'),
        result.start.get('month'),
        result.start.get('day'),
      ].join('-'),
    ),
  );
  if (days.size > 1) {
    throw new AmbiguousDateError(phrase, [...days.keys()]);
  }
  const [result] = results;
  const {start} = result;
  const year = start.get('year');
  const month = start.get('month');
  const day = start.get('day');
  if (year === null || month === null || day === null) {
    throw new UnparsableDateError(phrase, 'no calendar day found');
  }
  const date = assertValid(
    DateTime.fromObject({year, month, day}, {zone: ctx.zone}),
    phrase,
  );
  const certain =
    start.isCertain('year') && start.isCertain('month') && start.isCertain('day');

  const hour = start.get('hour');
  const minute = start.get('minute') ?? 0;
  const time =
    start.isCertain('hour') && hour !== null
      ? {hour, minute, inferred: false}
      : undefined;

  return {day: {date, inferred: !certain, rollsForward: false}, time};
}

/**
 * Resolves the calendar day of a phrase that has had its zone and time
 * removed. Returns null when nothing date-like is left.
 */
function resolveDay(
  text: string,
  ctx: Context,
  phrase: string,
): {day: ResolvedDay; time?: TimeOfDay} | null {
  const rest = text
    .replace(/\b(at|on|by|around|about|@|the)\b/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  if (rest.length === 0) {
    return null;
  }
  const today = ctx.now.startOf('day');
  const mentioned = weekdaysIn(rest);

  const explicit = (date: DateTime, inferred: boolean): {day: ResolvedDay} => {
    if (mentioned.length > 0 && !mentioned.includes(weekdayCodeOf(date))) {
      throw new AmbiguousDateError(phrase, [
        date.toISODate() ?? '',
        mentioned.join(','),
      ]);
    }
    return {day: {date, inferred, rollsForward: false}};
  };

  const iso = rest.match(/\b(\d{4})-(\d{1,2})-(\d{1,2})\b/);
  if (iso) {
    const date = assertValid(
      DateTime.fromObject(
        {
          year: parseInt(iso[1], 10),
          month: parseInt(iso[2], 10),
          day: parseInt(iso[3], 10),
        },
        {zone: ctx.zone},
      ),
      phrase,
    );
    return explicit(date, false);
  }

  const numeric = rest.match(/\b(\d{1,2})[/.](\d{1,2})(?:[/.](\d{2}|\d{4}))?\b/);
  if (numeric) {
    const {date, inferred} = numericDay(numeric, ctx, phrase);
    return explicit(date, inferred);
  }

  if (/\bday after tomorrow\b/.test(rest)) {
    return {day: {date: today.plus({days: 2}), inferred: false, rollsForward: false}};
  }
  if (/\btomorrow\b/.test(rest)) {
    return {day: {date: today.plus({days: 1}), inferred: false, rollsForward: false}};
  }
  if (/\b(today|tonight)\b/.test(rest)) {
    return {day: {date: today, inferred: false, rollsForward: false}};
  }

  const offset = rest.match(
    new RegExp(
      `\\b(?:in\\s+(${NUMBER_PATTERN})\\s+(days?|weeks?|months?)|(${NUMBER_PATTERN})\\s+(days?|weeks?|months?)\\s+from\\s+(?:now|today))\\b`,
    ),
  );
  if (offset) {
    const count = parseCount(offset[1] ?? offset[3]);
    const unit = spanUnitOf(offset[2] ?? offset[4]);
    return {
      day: {date: today.plus(spanOf(unit, count)), inferred: false, rollsForward: false},
    };
  }

  const weekdayNextWeek = rest.match(
    new RegExp(`\\b(${WEEKDAY_PATTERN})\\s+(?:of\\s+)?next\\s+week\\b`),
  );
  if (weekdayNextWeek) {
    const code = WEEKDAY_NAMES[weekdayNextWeek[1]];
    const nextMonday = today.startOf('week').plus({weeks: 1});
    return {
      day: {
        date: nextMonday.plus({days: weekdayIndex(code) - 1}),
        inferred: false,
        rollsForward: false,
      },
    };
  }

  const vague = rest.match(/\b(next|this|coming)\s+(week|weekend|month|year)\b/);
  if (vague) {
    throw new AmbiguousDateError(phrase, []);
  }

  if (mentioned.length > 1) {
    throw new AmbiguousDateError(phrase, mentioned);
  }
  const weekday = rest.match(
    new RegExp(`\\b(?:(next|this|coming)\\s+)?(${WEEKDAY_PATTERN})\\b`),
  );
  if (weekday && !/\d/.test(rest)) {
    return {day: relativeWeekday(WEEKDAY_NAMES[weekday[2]], weekday[1], today)};
  }

  const fallback = chronoDay(rest, ctx, phrase);
  return {...explicit(fallback.day.date, fallback.day.inferred), time: fallback.time};
}

function resolveZone(defaultTimezone: string, ...explicit: (string | undefined)[]): string {
  const zones = new Set(explicit.filter((z): z is string => Boolean(z)));
  if (zones.size > 1) {
    throw new AmbiguousDateError(explicit.join(' / '), [...zones]);
  }
  const [zone] = zones;
  return zone ?? defaultTimezone;
}

function normalizeInstant(
  dateText: string,
  ctx: Context,
  parsed: {time?: TimeOfDay; rest: string},
): NormalizedTime {
  const resolved = resolveDay(parsed.rest, ctx, dateText);
  const time = parsed.time ?? resolved?.time;

  if (!resolved && !time) {
    throw new UnparsableDateError(dateText);
  }

  if (!resolved) {
    // A time with no day: the next time that clock time comes round.
    const today = ctx.now.startOf('day');
    let start = today.set({hour: time?.hour ?? 0, minute: time?.minute ?? 0});
    if (start < ctx.now) {
      start = start.plus({days: 1});
    }
    return {
      kind: 'instant',
      start: toIso(start, dateText),
      timezone: ctx.zone,
      allDay: false,
      lowConfidence: true,
    };
  }

  const {day} = resolved;
  if (!time) {
    return {
      kind: 'instant',
      start: toIso(day.date.startOf('day'), dateText),
      timezone: ctx.zone,
      allDay: true,
      lowConfidence: day.inferred,
    };
  }

  let start = day.date.set({hour: time.hour, minute: time.minute, second: 0});
  if (day.rollsForward && start < ctx.now) {
    start = start.plus({weeks: 1});
  }
  return {
    kind: 'instant',
    start: toIso(start, dateText),
    timezone: ctx.zone,
    allDay: false,
    lowConfidence: day.inferred || time.inferred,
  };
}

interface RecurrenceBounds {
  starting?: ResolvedDay;
  until?: ResolvedDay;
  span?: {count: number; unit: SpanUnit};
  count?: number;
  rest: string;
}

function extractBounds(text: string, ctx: Context, phrase: string): RecurrenceBounds {
  let rest = text;
  const bounds: RecurrenceBounds = {rest};

  const span = rest.match(
    new RegExp(`\\bfor\\s+(${NUMBER_PATTERN})\\s+(days?|weeks?|months?|times|occurrences|sessions)\\b`),
  );
  if (span) {
    const count = parseCount(span[1]);
    if (/^(day|week|month)/.test(span[2])) {
      bounds.span = {count, unit: spanUnitOf(span[2])};
    } else {
      bounds.count = count;
    }
    rest = rest.replace(span[0], ' ');
  }

  const times = rest.match(new RegExp(`\\b(${NUMBER_PATTERN})\\s+times\\b`));
  if (times) {
    bounds.count = parseCount(times[1]);
    rest = rest.replace(times[0], ' ');
  }

  const until = rest.match(
    /\b(?:until|till|through|thru|ending(?:\s+on)?|ends(?:\s+on)?)\s+(.+?)(?=\s+\b(?:starting|beginning|from|effective)\b|$)/,
  );
  if (until) {
    const resolved = resolveDay(until[1], ctx, phrase);
    if (!resolved) {
      throw new UnparsableDateError(phrase, 'missing end date');
    }
    bounds.until = resolved.day;
    rest = rest.replace(until[0], ' ');
  }

  const starting = rest.match(
    /\b(?:starting(?:\s+on)?|beginning(?:\s+on)?|from|effective|as of)\s+(.+?)(?=\s+\b(?:until|till|through|thru|ending|ends)\b|$)/,
  );
  if (starting) {
    const resolved = resolveDay(starting[1], ctx, phrase);
    if (!resolved) {
      throw new UnparsableDateError(phrase, 'missing start date');
    }
    bounds.starting = resolved.day;
    rest = rest.replace(starting[0], ' ');
  }

  bounds.rest = rest.replace(/\s+/g, ' ').trim();
  return bounds;
}

function parsePattern(text: string, phrase: string): Partial<RecurrencePattern> {
  if (/\b(bimonthly|biannually|twice\s+a\s+(week|month))\b/.test(text)) {
    throw new AmbiguousDateError(phrase, []);
  }

  const nth = text.match(
    new RegExp(
      `\\b(first|1st|second|2nd|third|3rd|fourth|4th|last)\\s+(${WEEKDAY_PATTERN})\\s+(?:of\\s+)?(?:each|every|the)?\\s*month\\b`,
    ),
  );
  if (nth) {
    return {
      frequency: 'monthly',
      interval: 1,
      byWeekday: [WEEKDAY_NAMES[nth[2]]],
      bySetPosition: ORDINALS[nth[1]],
    };
  }

  const pattern: Partial<RecurrencePattern> = {};
  const unitFrequency = (unit: string): RecurrenceFrequency => {
    if (unit in WEEKDAY_NAMES) return 'weekly';
    return unit.startsWith('day') ? 'daily' : unit.startsWith('week') ? 'weekly' : 'monthly';
  };

  const everyOther = text.match(
    new RegExp(`\\bevery\\s+other\\s+(day|week|month|${WEEKDAY_PATTERN})\\b`),
  );
  const everyN = text.match(
    new RegExp(`\\bevery\\s+(${NUMBER_PATTERN})\\s+(days|weeks|months)\\b`),
  );
  if (everyOther) {
    pattern.frequency = unitFrequency(everyOther[1]);
    pattern.interval = 2;
  } else if (everyN) {
    pattern.frequency = unitFrequency(everyN[2]);
    pattern.interval = parseCount(everyN[1]);
  } else if (/\b(biweekly|fortnightly)\b/.test(text)) {
    pattern.frequency = 'weekly';
    pattern.interval = 2;
  } else if (/\b(daily|every\s+day|each\s+day)\b/.test(text)) {
    pattern.frequency = 'daily';
  } else if (/\b(every\s+)?weekdays?\b/.test(text) && !/\bweekends?\b/.test(text)) {
    pattern.frequency = 'weekly';
    pattern.byWeekday = ['MO', 'TU', 'WE', 'TH', 'FR'];
  } else if (/\b(every\s+)?weekends?\b/.test(text)) {
    pattern.frequency = 'weekly';
    pattern.byWeekday = ['SA', 'SU'];
  } else if (/\b(weekly|every\s+week|each\s+week)\b/.test(text)) {
    pattern.frequency = 'weekly';
  } else if (/\b(monthly|every\s+month|each\s+month)\b/.test(text)) {
    pattern.frequency = 'monthly';
  }

  const days = weekdaysIn(text.replace(/\bweekdays?\b|\bweekends?\b/g, ' '));
  if (days.length > 0 && !pattern.byWeekday) {
    if (pattern.frequency === 'daily' || pattern.frequency === 'monthly') {
      throw new AmbiguousDateError(phrase, [pattern.frequency, days.join(',')]);
    }
    pattern.frequency = 'weekly';
    pattern.byWeekday = days;
  }

  const monthDay = text.match(/\b(?:on\s+)?the\s+(\d{1,2})(?:st|nd|rd|th)?\b|\b(\d{1,2})(?:st|nd|rd|th)\b/);
  if (monthDay) {
    const value = parseInt(monthDay[1] ?? monthDay[2], 10);
    if (pattern.frequency === undefined || pattern.frequency === 'monthly') {
      if (value < 1 || value > 31) {
        throw new UnparsableDateError(phrase, `invalid day of month ${value}`);
      }
      pattern.frequency = 'monthly';
      pattern.byMonthDay = value;
    }
  }

  return pattern;
}

function normalizeRecurrence(
  recurrenceText: string,
  dateText: string | undefined,
  ctx: Context,
  recurrenceParts: {time?: TimeOfDay; rest: string},
  dateParts: {time?: TimeOfDay; rest: string} | undefined,
): NormalizedTime {
  const phrase = [recurrenceText, dateText].filter(Boolean).join(' / ');
  const bounds = extractBounds(recurrenceParts.rest, ctx, phrase);
  const parsed = parsePattern(bounds.rest, phrase);
  if (!parsed.frequency) {
    throw new UnparsableDateError(phrase, 'no repeat frequency found');
  }

  let time = recurrenceParts.time;
  let starting = bounds.starting;
  if (dateParts) {
    if (
      time &&
      dateParts.time &&
      (time.hour !== dateParts.time.hour || time.minute !== dateParts.time.minute)
    ) {
      throw new AmbiguousDateError(phrase, [
        `${time.hour}:${time.minute}`,
        `${dateParts.time.hour}:${dateParts.time.minute}`,
      ]);
    }
    time = time ?? dateParts.time;
    if (!starting) {
      const resolved = resolveDay(dateParts.rest, ctx, phrase);
      starting = resolved?.day;
      time = time ?? resolved?.time;
    }
  }

  const lowerBound =
    starting && starting.date.startOf('day') > ctx.now
      ? starting.date.startOf('day')
      : ctx.now;
  const pattern: RecurrencePattern = {
    frequency: parsed.frequency,
    interval: parsed.interval ?? 1,
    byWeekday: parsed.byWeekday ?? [],
    byMonthDay: parsed.byMonthDay,
    bySetPosition: parsed.bySetPosition,
  };
  if (pattern.interval < 1) {
    throw new UnparsableDateError(phrase, 'interval must be at least 1');
  }
  if (pattern.frequency === 'weekly' && pattern.byWeekday.length === 0) {
    pattern.byWeekday = [weekdayCodeOf(lowerBound)];
  }
  if (
    pattern.frequency === 'monthly' &&
    pattern.byMonthDay === undefined &&
    pattern.bySetPosition === undefined
  ) {
    pattern.byMonthDay = lowerBound.day;
  }

  const until = bounds.until?.date.endOf('day');
  const first = firstOccurrenceOnOrAfter(
    pattern,
    lowerBound,
    {hour: time?.hour ?? 0, minute: time?.minute ?? 0},
    until,
  );
  if (!first) {
    throw new UnparsableDateError(phrase, 'rule has no occurrence in range');
  }

  let end = until;
  if (bounds.span) {
    end = first
      .plus(spanOf(bounds.span.unit, bounds.span.count))
      .minus({days: 1})
      .endOf('day');
  }
  if (end && end <= first) {
    throw new UnparsableDateError(phrase, 'end is not after start');
  }
  if (bounds.count !== undefined && bounds.count < 1) {
    throw new UnparsableDateError(phrase, 'count must be at least 1');
  }

  return {
    kind: 'recurrence',
    timezone: ctx.zone,
    allDay: time === undefined,
    lowConfidence: Boolean(time?.inferred || starting?.inferred || bounds.until?.inferred),
    rule: {
      frequency: pattern.frequency,
      interval: pattern.interval,
      byWeekday: pattern.byWeekday,
      ...(pattern.byMonthDay !== undefined && {byMonthDay: pattern.byMonthDay}),
      ...(pattern.bySetPosition !== undefined && {bySetPosition: pattern.bySetPosition}),
      start: toIso(time === undefined ? first.startOf('day') : first, phrase),
      ...(starting && {startsOn: starting.date.toFormat('yyyy-MM-dd')}),
      ...(end && {until: toIso(end.set({millisecond: 0}), phrase)}),
      ...(bounds.count !== undefined && {count: bounds.count}),
    },
  };
}

export function looksRecurring(text: string): boolean {
  return RECURRENCE_HINT.test(clean(text));
}

/**
 * Turns the date and recurrence phrases of one extraction into a
 * NormalizedTime, resolved against `referenceNow` in the phrase's own zone
 * or the default one.
 *
 * @throws UnparsableDateError when nothing can be read from the phrases
 * @throws AmbiguousDateError when they admit several readings
 */
export function normalizeTime(
  input: NormalizeInput,
  options: NormalizeOptions,
): NormalizedTime {
  if (!IANAZone.isValidZone(options.defaultTimezone)) {
    throw new Error(`Invalid default timezone: ${options.defaultTimezone}`);
  }

  let dateText = input.dateText?.trim() || undefined;
  let recurrenceText = input.recurrenceText?.trim() || undefined;
  if (!recurrenceText && dateText && looksRecurring(dateText)) {
    recurrenceText = dateText;
    dateText = undefined;
  }
  if (!dateText && !recurrenceText) {
    throw new UnparsableDateError('', 'no date text');
  }

  const dateZone = dateText ? extractZone(dateText) : undefined;
  const recurrenceZone = recurrenceText ? extractZone(recurrenceText) : undefined;
  const zone = resolveZone(
    options.defaultTimezone,
    dateZone?.zone,
    recurrenceZone?.zone,
  );
  const ctx: Context = {
    zone,
    now: DateTime.fromJSDate(options.referenceNow, {zone}),
    dateOrder: options.dateOrder,
  };

  const dateParts =
    dateText && dateZone ? extractTime(dateZone.rest, dateText) : undefined;

  if (recurrenceText && recurrenceZone) {
    return normalizeRecurrence(
      recurrenceText,
      dateText,
      ctx,
      extractTime(recurrenceZone.rest, recurrenceText),
      dateParts,
    );
  }
  if (!dateText || !dateParts) {
    throw new UnparsableDateError('', 'no date text');
  }
  return normalizeInstant(dateText, ctx, dateParts);
}
