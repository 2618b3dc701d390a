import {AmbiguousDateError, UnparsableDateError} from '../errors.js';
import {computeIdentityKey} from '../identity.js';
import {looksRecurring, normalizeTime} from '../normalizer.js';

// Monday 1 January 2024, 09:00 UTC
const MONDAY = new Date('2024-01-01T09:00:00Z');

const utc = {referenceNow: MONDAY, defaultTimezone: 'UTC'};

describe('normalizeTime', () => {
  describe('single dates', () => {
    it('should resolve "next Tuesday at 3pm" to the following day', () => {
      expect(normalizeTime({dateText: 'next Tuesday at 3pm'}, utc)).toEqual({
        kind: 'instant',
        start: '2024-01-02T15:00:00Z',
        timezone: 'UTC',
        allDay: false,
        lowConfidence: false,
      });
    });

    it('should give "next Tue at 3pm" and "Tuesday 15:00" the same identity', () => {
      const a = normalizeTime({dateText: 'next Tue at 3pm'}, utc);
      const b = normalizeTime({dateText: 'Tuesday 15:00'}, utc);
      expect(a).toEqual(b);
      expect(computeIdentityKey('Design review', a)).toBe(
        computeIdentityKey('Design review', b),
      );
    });

    it('should roll a bare weekday forward a week once its time has passed', () => {
      const time = normalizeTime({dateText: 'Monday at 8am'}, utc);
      expect(time).toMatchObject({kind: 'instant', start: '2024-01-08T08:00:00Z'});
    });

    it('should keep a bare weekday today when its time is still ahead', () => {
      const time = normalizeTime({dateText: 'Monday at 11am'}, utc);
      expect(time).toMatchObject({kind: 'instant', start: '2024-01-01T11:00:00Z'});
    });

    it('should honour an explicit zone abbreviation', () => {
      expect(normalizeTime({dateText: 'tomorrow at 10am EST'}, utc)).toEqual({
        kind: 'instant',
        start: '2024-01-02T10:00:00-05:00',
        timezone: 'America/New_York',
        allDay: false,
        lowConfidence: false,
      });
    });

    it('should keep the start of a time range', () => {
      const time = normalizeTime({dateText: 'Friday 3 to 4pm'}, utc);
      expect(time).toMatchObject({start: '2024-01-05T15:00:00Z', lowConfidence: false});
    });

    it('should give a range start the other meridiem when it would pass the end', () => {
      const time = normalizeTime({dateText: '11-1pm tomorrow'}, utc);
      expect(time).toMatchObject({start: '2024-01-02T11:00:00Z', lowConfidence: false});
    });

    it('should read a 24-hour range', () => {
      expect(normalizeTime({dateText: '10:00 - 11:00 tomorrow'}, utc)).toMatchObject({
        kind: 'instant',
        start: '2024-01-02T10:00:00Z',
        allDay: false,
      });
      expect(normalizeTime({dateText: 'Jan 15 10:00-11:30'}, utc)).toMatchObject({
        kind: 'instant',
        start: '2024-01-15T10:00:00Z',
        allDay: false,
      });
    });

    it('should keep the UTC instant of a timestamp ending in Z', () => {
      const chicago = {...utc, defaultTimezone: 'America/Chicago'};
      expect(normalizeTime({dateText: '2024-01-15T15:00Z'}, chicago)).toEqual({
        kind: 'instant',
        start: '2024-01-15T15:00:00Z',
        timezone: 'UTC',
        allDay: false,
        lowConfidence: false,
      });
    });

    it('should keep the offset of a timestamp', () => {
      expect(normalizeTime({dateText: '2024-01-15T15:00:00-05:00'}, utc)).toEqual({
        kind: 'instant',
        start: '2024-01-15T15:00:00-05:00',
        timezone: 'Etc/GMT+5',
        allDay: false,
        lowConfidence: false,
      });
    });

    it('should prefer a zone name that agrees with the timestamp offset', () => {
      expect(normalizeTime({dateText: '2024-01-15T15:00:00-05:00 EST'}, utc)).toEqual({
        kind: 'instant',
        start: '2024-01-15T15:00:00-05:00',
        timezone: 'America/New_York',
        allDay: false,
        lowConfidence: false,
      });
    });

    it('should flag a guessed meridiem as low confidence', () => {
      const time = normalizeTime({dateText: 'Friday at 9'}, utc);
      expect(time).toMatchObject({start: '2024-01-05T09:00:00Z', lowConfidence: true});
    });

    it('should make a date without a time an all-day event', () => {
      expect(normalizeTime({dateText: 'in 3 days'}, utc)).toEqual({
        kind: 'instant',
        start: '2024-01-04T00:00:00Z',
        timezone: 'UTC',
        allDay: true,
        lowConfidence: false,
      });
    });

    it('should place a time without a date at its next occurrence', () => {
      expect(normalizeTime({dateText: '3pm'}, utc)).toEqual({
        kind: 'instant',
        start: '2024-01-01T15:00:00Z',
        timezone: 'UTC',
        allDay: false,
        lowConfidence: true,
      });
    });

    it('should read numeric dates with the configured order', () => {
      const time = normalizeTime({dateText: '03/04'}, {...utc, dateOrder: 'DMY'});
      expect(time).toEqual({
        kind: 'instant',
        start: '2024-04-03T00:00:00Z',
        timezone: 'UTC',
        allDay: true,
        lowConfidence: true,
      });
    });

    it('should read an ISO date', () => {
      const time = normalizeTime({dateText: '2024-02-14 at 18:30'}, utc);
      expect(time).toMatchObject({start: '2024-02-14T18:30:00Z', lowConfidence: false});
    });
  });

  describe('ambiguous and unreadable phrases', () => {
    it('should reject a numeric date when no order is configured', () => {
      expect(() => normalizeTime({dateText: '03/04'}, utc)).toThrow(AmbiguousDateError);
    });

    it('should reject vague spans', () => {
      expect(() => normalizeTime({dateText: 'next week'}, utc)).toThrow(AmbiguousDateError);
    });

    it('should reject several weekdays', () => {
      expect(() => normalizeTime({dateText: 'Monday or Wednesday'}, utc)).toThrow(
        AmbiguousDateError,
      );
    });

    it('should reject several distinct times', () => {
      expect(() => normalizeTime({dateText: 'Friday at 2pm or 4pm'}, utc)).toThrow(
        AmbiguousDateError,
      );
    });

    it('should reject a weekday that contradicts the date', () => {
      // 3 January 2024 is a Wednesday
      expect(() => normalizeTime({dateText: 'Tuesday 2024-01-03'}, utc)).toThrow(
        AmbiguousDateError,
      );
    });

    it('should reject a zone name that contradicts the timestamp offset', () => {
      expect(() => normalizeTime({dateText: '2024-01-15T15:00Z PST'}, utc)).toThrow(
        AmbiguousDateError,
      );
    });

    it('should reject bimonthly recurrences', () => {
      expect(() => normalizeTime({recurrenceText: 'bimonthly'}, utc)).toThrow(
        AmbiguousDateError,
      );
    });

    it('should reject empty input', () => {
      expect(() => normalizeTime({dateText: '  '}, utc)).toThrow(UnparsableDateError);
    });

    it('should reject an invalid calendar date', () => {
      expect(() => normalizeTime({dateText: '2024-02-30'}, utc)).toThrow(UnparsableDateError);
    });

    it('should reject a recurrence without a frequency', () => {
      expect(() => normalizeTime({recurrenceText: 'every so often'}, utc)).toThrow(
        UnparsableDateError,
      );
    });
  });

  describe('recurrences', () => {
    it('should anchor "every Tuesday" to the next Tuesday', () => {
      expect(normalizeTime({recurrenceText: 'every Tuesday'}, utc)).toEqual({
        kind: 'recurrence',
        timezone: 'UTC',
        allDay: true,
        lowConfidence: false,
        rule: {
          frequency: 'weekly',
          interval: 1,
          byWeekday: ['TU'],
          start: '2024-01-02T00:00:00Z',
        },
      });
    });

    it('should keep the same identity when the rule is re-read a week later', () => {
      const first = normalizeTime({recurrenceText: 'every Tuesday'}, utc);
      const later = normalizeTime(
        {recurrenceText: 'every Tuesday'},
        {...utc, referenceNow: new Date('2024-01-08T09:00:00Z')},
      );
      expect(later.kind === 'recurrence' && later.rule.start).toBe('2024-01-09T00:00:00Z');
      expect(computeIdentityKey('Standup', first)).toBe(computeIdentityKey('Standup', later));
    });

    it('should route a recurring phrase given as a date', () => {
      const time = normalizeTime({dateText: 'weekdays at 9am'}, utc);
      expect(time).toMatchObject({
        kind: 'recurrence',
        allDay: false,
        rule: {
          frequency: 'weekly',
          byWeekday: ['MO', 'TU', 'WE', 'TH', 'FR'],
          start: '2024-01-01T09:00:00Z',
        },
      });
    });

    it('should bound a daily rule by a span', () => {
      const time = normalizeTime({recurrenceText: 'every day at 9am for 5 days'}, utc);
      expect(time).toMatchObject({
        kind: 'recurrence',
        rule: {
          frequency: 'daily',
          interval: 1,
          start: '2024-01-01T09:00:00Z',
          until: '2024-01-05T23:59:59Z',
        },
      });
    });

    it('should read the nth weekday of the month', () => {
      const time = normalizeTime(
        {recurrenceText: 'first Monday of every month at 10am'},
        utc,
      );
      expect(time).toMatchObject({
        rule: {
          frequency: 'monthly',
          byWeekday: ['MO'],
          bySetPosition: 1,
          start: '2024-01-01T10:00:00Z',
        },
      });
    });

    it('should read "every other Thursday" with a start date', () => {
      const time = normalizeTime(
        {recurrenceText: 'every other Thursday starting 2024-01-11'},
        utc,
      );
      expect(time).toMatchObject({
        allDay: true,
        rule: {
          frequency: 'weekly',
          interval: 2,
          byWeekday: ['TH'],
          start: '2024-01-11T00:00:00Z',
        },
      });
    });

    it('should take the time from the date phrase', () => {
      const time = normalizeTime(
        {dateText: 'at 4pm', recurrenceText: 'every Friday'},
        utc,
      );
      expect(time).toMatchObject({
        allDay: false,
        rule: {byWeekday: ['FR'], start: '2024-01-05T16:00:00Z'},
      });
    });
  });
});

describe('looksRecurring', () => {
  it('should spot repeat words', () => {
    expect(looksRecurring('Every Monday')).toBe(true);
    expect(looksRecurring('weekly sync')).toBe(true);
    expect(looksRecurring('Tuesdays at noon')).toBe(true);
  });

  it('should not flag single dates', () => {
    expect(looksRecurring('next Tuesday at 3pm')).toBe(false);
    expect(looksRecurring('tomorrow')).toBe(false);
  });
});
