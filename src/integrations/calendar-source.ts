/**
 * Read-only Google Calendar events shown alongside tasks
 */

import { calendar_v3, google } from 'googleapis';
import { z } from 'zod';
import { CalendarConfig } from '../config/config-types';
import { AppLogger, createIntegrationLogger, toError } from '../utils/logger';

export const CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar.readonly';

export interface CalendarEvent {
  id: string;
  title: string;
  description: string;
  status: 'EVENT';
  event_start: string | null;
  event_end: string | null;
  assigned_by: 'calendar';
  created_at: string;
}

export interface EventQuery {
  calendarId: string;
  timeMin: string;
  timeMax: string;
}

export type EventLister = (query: EventQuery) => Promise<calendar_v3.Schema$Event[]>;

export interface CalendarSource {
  listUpcomingEvents(): Promise<CalendarEvent[]>;
}

const serviceAccountSchema = z
  .object({
    client_email: z.string(),
    private_key: z.string()
  })
  .passthrough();

/**
 * Decode base64 service-account JSON
 */
export function decodeCredentials(encoded: string): z.infer<typeof serviceAccountSchema> {
  const json: unknown = JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'));
  return serviceAccountSchema.parse(json);
}

export function mapEvent(event: calendar_v3.Schema$Event, now: Date): CalendarEvent {
  return {
    id: `cal_${(event.id ?? '').slice(0, 8)}`,
    title: event.summary ?? 'Untitled Event',
    description: event.description ?? '',
    status: 'EVENT',
    event_start: event.start?.dateTime ?? event.start?.date ?? null,
    event_end: event.end?.dateTime ?? event.end?.date ?? null,
    assigned_by: 'calendar',
    created_at: event.created ?? now.toISOString()
  };
}

function googleLister(credentials: string): EventLister {
  const auth = new google.auth.GoogleAuth({
    credentials: decodeCredentials(credentials),
    scopes: [CALENDAR_SCOPE]
  });
  const calendar = google.calendar({ version: 'v3', auth });

  return async query => {
    const response = await calendar.events.list({
      ...query,
      singleEvents: true,
      orderBy: 'startTime'
    });
    return response.data.items ?? [];
  };
}

export class GoogleCalendarSource implements CalendarSource {
  private readonly logger: AppLogger;

  constructor(
    private readonly config: CalendarConfig,
    private lister?: EventLister,
    private readonly clock: () => Date = () => new Date(),
    logger?: AppLogger
  ) {
    this.logger = logger || createIntegrationLogger('calendar');
  }

  isConfigured(): boolean {
    return Boolean(this.lister || this.config.credentials);
  }

  /**
   * Single events in the next `lookaheadDays` days ordered by start; [] when unconfigured or on failure
   */
  async listUpcomingEvents(): Promise<CalendarEvent[]> {
    if (!this.isConfigured()) {
      return [];
    }

    const now = this.clock();
    const timeMax = new Date(now.getTime() + this.config.lookaheadDays * 24 * 60 * 60 * 1000);

    try {
      if (!this.lister) {
        this.lister = googleLister(this.config.credentials);
      }
      const events = await this.lister({
        calendarId: this.config.calendarId,
        timeMin: now.toISOString(),
        timeMax: timeMax.toISOString()
      });
      return events.map(event => mapEvent(event, now));
    } catch (error) {
      // the error message only; the credentials must not reach the log
      this.logger.warn(`Calendar fetch failed: ${toError(error).message}`, undefined, 'listUpcomingEvents');
      return [];
    }
  }
}
