// src/utils/calendarProvider.ts

import { google, type calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { formatInTimeZone } from 'date-fns-tz';
import type { TimezoneNormalizer } from '../lib/timezone.js';
import type { CalendarEvent, EventWrite } from '../types/calendar.js';

/**
 * Remote calendar operations the assistant depends on.
 * Implementations throw on provider errors; callers decide how to surface them.
 */
export interface CalendarProvider {
  listUpcoming(limit: number): Promise<CalendarEvent[]>;
  listRange(timeMin: Date, timeMax: Date): Promise<CalendarEvent[]>;
  getEvent(eventId: string): Promise<CalendarEvent>;
  insertEvent(event: EventWrite): Promise<CalendarEvent>;
  updateEvent(eventId: string, event: EventWrite): Promise<CalendarEvent>;
  deleteEvent(eventId: string): Promise<void>;
  getTimezone(): Promise<string>;
}

/**
 * Read a provider start/end. Timed events carry dateTime; all-day events
 * carry a bare date, which is pinned to UTC midnight.
 */
function readEventTime(time: calendar_v3.Schema$EventDateTime | undefined): {
  at: Date;
  allDay: boolean;
} | null {
  if (time?.dateTime) {
    return { at: new Date(time.dateTime), allDay: false };
  }
  if (time?.date) {
    return { at: new Date(`${time.date}T00:00:00Z`), allDay: true };
  }
  return null;
}

/**
 * Convert a Google Calendar event into the assistant's event shape
 *
 * @returns null if the event has no id or no usable times
 */
export function normalizeGoogleEvent(event: calendar_v3.Schema$Event): CalendarEvent | null {
  const start = readEventTime(event.start);
  const end = readEventTime(event.end);

  if (!event.id || !start || !end) {
    return null;
  }

  return {
    id: event.id,
    summary: event.summary ?? '',
    description: event.description ?? '',
    location: event.location ?? '',
    start: start.at,
    end: end.at,
    allDay: start.allDay,
    attendees: (event.attendees ?? [])
      .map((attendee) => attendee.email)
      .filter((email): email is string => Boolean(email)),
    status: event.status ?? 'confirmed',
    htmlLink: event.htmlLink ?? '',
  };
}

/**
 * Google Calendar v3 implementation
 */
export class GoogleCalendarProvider implements CalendarProvider {
  private calendar: calendar_v3.Calendar;

  constructor(
    auth: OAuth2Client,
    private readonly calendarId: string,
    private readonly timezone: TimezoneNormalizer
  ) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  /**
   * Upcoming events from now, soonest first
   *
   * @param limit - Maximum number of events (Google caps at 250)
   */
  async listUpcoming(limit: number): Promise<CalendarEvent[]> {
    const response = await this.calendar.events.list({
      calendarId: this.calendarId,
      timeMin: this.timezone.now().toISOString(),
      maxResults: limit,
      singleEvents: true,
      orderBy: 'startTime',
    });

    return this.normalizeAll(response.data.items);
  }

  /**
   * Events intersecting [timeMin, timeMax]
   */
  async listRange(timeMin: Date, timeMax: Date): Promise<CalendarEvent[]> {
    const response = await this.calendar.events.list({
      calendarId: this.calendarId,
      timeMin: timeMin.toISOString(),
      timeMax: timeMax.toISOString(),
      singleEvents: true,
      orderBy: 'startTime',
    });

    return this.normalizeAll(response.data.items);
  }

  async getEvent(eventId: string): Promise<CalendarEvent> {
    const response = await this.calendar.events.get({
      calendarId: this.calendarId,
      eventId,
    });

    return this.requireEvent(response.data);
  }

  async insertEvent(event: EventWrite): Promise<CalendarEvent> {
    const response = await this.calendar.events.insert({
      calendarId: this.calendarId,
      requestBody: this.toRequestBody(event),
    });

    return this.requireEvent(response.data);
  }

  async updateEvent(eventId: string, event: EventWrite): Promise<CalendarEvent> {
    const response = await this.calendar.events.update({
      calendarId: this.calendarId,
      eventId,
      requestBody: this.toRequestBody(event),
    });

    return this.requireEvent(response.data);
  }

  async deleteEvent(eventId: string): Promise<void> {
    await this.calendar.events.delete({
      calendarId: this.calendarId,
      eventId,
    });
  }

  /**
   * The calendar's own timezone setting, or UTC if it has none
   */
  async getTimezone(): Promise<string> {
    const response = await this.calendar.calendars.get({ calendarId: this.calendarId });
    return response.data.timeZone || 'UTC';
  }

  private normalizeAll(items: calendar_v3.Schema$Event[] | undefined): CalendarEvent[] {
    return (items ?? [])
      .map((item) => normalizeGoogleEvent(item))
      .filter((event): event is CalendarEvent => event !== null);
  }

  private requireEvent(data: calendar_v3.Schema$Event): CalendarEvent {
    const event = normalizeGoogleEvent(data);
    if (!event) {
      throw new Error('Calendar returned an event without an id or times');
    }
    return event;
  }

  private toRequestBody(event: EventWrite): calendar_v3.Schema$Event {
    const timeZone = this.timezone.timezone;

    return {
      summary: event.summary,
      description: event.description,
      location: event.location,
      start: event.allDay
        ? { date: formatInTimeZone(event.start, 'UTC', 'yyyy-MM-dd') }
        : { dateTime: event.start.toISOString(), timeZone },
      end: event.allDay
        ? { date: formatInTimeZone(event.end, 'UTC', 'yyyy-MM-dd') }
        : { dateTime: event.end.toISOString(), timeZone },
      attendees: event.attendees.map((email) => ({ email })),
    };
  }
}
