import {Auth, calendar_v3, google} from 'googleapis';
import {DateTime} from 'luxon';
import {PermanentSyncError} from '../events/errors.js';
import type {CalendarEventPayload, CalendarService} from '../events/ports.js';
import {toRRuleLine} from '../events/recurrence.js';
import {classifyGoogleError, googleStatusOf} from './errors.js';

const SOURCE_TAG = 'inbox-event-sync';

function isoOf(dt: DateTime): string {
  const iso = dt.toISO({suppressMilliseconds: true});
  if (!iso) {
    throw new PermanentSyncError(`Invalid event time: ${dt.invalidExplanation ?? 'unknown'}`);
  }
  return iso;
}

/**
 * Calendar representation of a payload. Every time field is written,
 * with nulls for the unused ones, so a patch can switch an event between
 * timed, all-day and recurring.
 */
export function toGoogleEvent(payload: CalendarEventPayload): calendar_v3.Schema$Event {
  const {time} = payload;
  const startIso = time.kind === 'instant' ? time.start : time.rule.start;
  const start = DateTime.fromISO(startIso, {setZone: true}).setZone(time.timezone);

  let startField: calendar_v3.Schema$EventDateTime;
  let endField: calendar_v3.Schema$EventDateTime;
  if (time.allDay) {
    startField = {date: start.toFormat('yyyy-MM-dd'), dateTime: null, timeZone: time.timezone};
    endField = {
      date: start.plus({days: 1}).toFormat('yyyy-MM-dd'),
      dateTime: null,
      timeZone: time.timezone,
    };
  } else {
    startField = {dateTime: isoOf(start), date: null, timeZone: time.timezone};
    endField = {
      dateTime: isoOf(start.plus({minutes: payload.durationMinutes})),
      date: null,
      timeZone: time.timezone,
    };
  }

  return {
    summary: payload.title,
    description: payload.description || null,
    location: payload.location || null,
    start: startField,
    end: endField,
    recurrence: time.kind === 'recurrence' ? [toRRuleLine(time)] : null,
    extendedProperties: {private: {source: SOURCE_TAG}},
  };
}

/**
 * Google Calendar implementation of CalendarService. Errors are
 * classified, not retried; the reconciler owns retries.
 */
export class GoogleCalendarService implements CalendarService {
  private readonly calendar: calendar_v3.Calendar;

  constructor(
    auth: Auth.OAuth2Client,
    private readonly calendarId = 'primary',
  ) {
    this.calendar = google.calendar({version: 'v3', auth});
  }

  async create(
    event: CalendarEventPayload,
    idempotencyKey: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const startTime = Date.now();
    try {
      const res = await this.calendar.events.insert(
        {
          calendarId: this.calendarId,
          requestBody: {...toGoogleEvent(event), id: idempotencyKey},
        },
        {signal},
      );
      const id = res.data.id;
      if (!id) {
        throw new PermanentSyncError('Invalid response from Calendar API: missing event id');
      }
      console.log(
        `[Calendar API] [${new Date().toISOString()}] Created event ${id} (${Date.now() - startTime}ms)`,
      );
      return id;
    } catch (error) {
      if (error instanceof PermanentSyncError) throw error;
      // The id is ours: a conflict means an earlier attempt already created it.
      if (googleStatusOf(error) === 409) {
        console.log(`[Calendar API] Event ${idempotencyKey} already exists, treating create as done`);
        return idempotencyKey;
      }
      this.logError('create', error);
      throw classifyGoogleError(error, 'Calendar create');
    }
  }

  async update(
    externalEventId: string,
    event: CalendarEventPayload,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await this.calendar.events.patch(
        {
          calendarId: this.calendarId,
          eventId: externalEventId,
          requestBody: toGoogleEvent(event),
        },
        {signal},
      );
      console.log(
        `[Calendar API] [${new Date().toISOString()}] Updated event ${externalEventId}`,
      );
    } catch (error) {
      this.logError('update', error, externalEventId);
      throw classifyGoogleError(error, 'Calendar update');
    }
  }

  async cancel(externalEventId: string, signal?: AbortSignal): Promise<void> {
    try {
      await this.calendar.events.delete(
        {
          calendarId: this.calendarId,
          eventId: externalEventId,
        },
        {signal},
      );
      console.log(
        `[Calendar API] [${new Date().toISOString()}] Cancelled event ${externalEventId}`,
      );
    } catch (error) {
      const status = googleStatusOf(error);
      if (status === 404 || status === 410) {
        console.log(`[Calendar API] Event ${externalEventId} already gone (${status})`);
        return;
      }
      this.logError('cancel', error, externalEventId);
      throw classifyGoogleError(error, 'Calendar cancel');
    }
  }

  private logError(operation: string, error: unknown, eventId?: string): void {
    console.error(`[Calendar API] [${new Date().toISOString()}] ${operation} failed:`, {
      eventId,
      status: googleStatusOf(error),
      errorType: error instanceof Error ? error.constructor.name : typeof error,
      message: error instanceof Error ? error.message : String(error),
    });
  }
}
