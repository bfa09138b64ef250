import { z } from 'zod';

import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

/** The caller's upstream tokens, decrypted just in time for one calendar call. */
export type ProviderCredentials = {
  accessToken: string;
  refreshToken: string;
};

export type CalendarEventInput = {
  summary: string;
  description: string;
  startMs: number;
  durationMinutes: number;
};

export type CalendarEvent = {
  id: string;
  htmlLink: string | null;
};

export interface CalendarClient {
  createEvent(credentials: ProviderCredentials, event: CalendarEventInput): Promise<CalendarEvent>;
  deleteEvent(credentials: ProviderCredentials, eventId: string): Promise<void>;
}

/** Non-2xx answer from the calendar API, or no answer at all (`status` 0). */
export class CalendarApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CalendarApiError';
  }
}

const eventResponseSchema = z.object({
  id: z.string(),
  htmlLink: z.string().optional(),
});

const apiErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

export class GoogleCalendarClient implements CalendarClient {
  constructor(private readonly baseUrl: string) {}

  private async send(credentials: ProviderCredentials, method: string, path: string, body?: unknown) {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${credentials.accessToken}`,
          Accept: 'application/json',
          ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      });
    } catch (err) {
      throw new CalendarApiError(`Calendar API unreachable: ${errorMessage(err)}`, 0, { cause: err });
    }
    return response;
  }

  private async failure(response: Response, action: string) {
    const payload: unknown = await response.json().catch(() => null);
    const parsed = apiErrorSchema.safeParse(payload);
    const detail = parsed.success ? `: ${parsed.data.error.message}` : '';
    return new CalendarApiError(`${action} failed with status ${response.status}${detail}`, response.status);
  }

  async createEvent(credentials: ProviderCredentials, event: CalendarEventInput): Promise<CalendarEvent> {
    const start = new Date(event.startMs);
    const end = new Date(event.startMs + event.durationMinutes * 60_000);
    const response = await this.send(credentials, 'POST', '/calendars/primary/events', {
      summary: event.summary,
      description: event.description,
      start: { dateTime: start.toISOString(), timeZone: 'UTC' },
      end: { dateTime: end.toISOString(), timeZone: 'UTC' },
    });
    if (!response.ok) {
      throw await this.failure(response, 'Event creation');
    }

    const parsed = eventResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new CalendarApiError('Event creation returned a malformed event', response.status);
    }
    logger.debug('Calendar', 'Event created', { eventId: parsed.data.id });
    return { id: parsed.data.id, htmlLink: parsed.data.htmlLink ?? null };
  }

  async deleteEvent(credentials: ProviderCredentials, eventId: string): Promise<void> {
    const response = await this.send(
      credentials,
      'DELETE',
      `/calendars/primary/events/${encodeURIComponent(eventId)}`
    );
    // Already gone counts as deleted.
    if (response.ok || response.status === 404 || response.status === 410) {
      return;
    }
    throw await this.failure(response, 'Event deletion');
  }
}
