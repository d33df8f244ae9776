import { z } from "zod";
import { sendsCalendarNotifications } from "../confirmation/mode";
import {
  CALENDAR_ID_PATTERN,
  confirmAndForward,
  parseBody,
  parseQuery,
  pathParam,
  RESOURCE_ID_PATTERN,
  withoutNulls,
  type Operation,
  type OperationContext,
} from "./operations";
import type { HttpMethod } from "../policy/rules";

const EventDateTimeSchema = z
  .object({
    date: z.string().nullish(),
    dateTime: z.string().nullish(),
    timeZone: z.string().nullish(),
  })
  .passthrough();

const AttendeeSchema = z
  .object({
    email: z.string().min(1),
    displayName: z.string().nullish(),
    optional: z.boolean().nullish(),
    responseStatus: z.string().nullish(),
    comment: z.string().nullish(),
    additionalGuests: z.number().int().nullish(),
  })
  .passthrough();

const ReminderSchema = z.object({ method: z.string(), minutes: z.number().int() }).passthrough();

/** Known event fields are checked; anything else is passed through to the backend. */
export const EventBodySchema = z
  .object({
    summary: z.string().nullish(),
    description: z.string().nullish(),
    location: z.string().nullish(),
    start: EventDateTimeSchema.nullish(),
    end: EventDateTimeSchema.nullish(),
    attendees: z.array(AttendeeSchema).nullish(),
    reminders: z
      .object({ useDefault: z.boolean().nullish(), overrides: z.array(ReminderSchema).nullish() })
      .passthrough()
      .nullish(),
    recurrence: z.array(z.string()).nullish(),
    colorId: z.string().nullish(),
    transparency: z.string().nullish(),
    visibility: z.string().nullish(),
    guestsCanInviteOthers: z.boolean().nullish(),
    guestsCanModify: z.boolean().nullish(),
    guestsCanSeeOtherGuests: z.boolean().nullish(),
  })
  .passthrough();

function calendarId(ctx: OperationContext): string {
  return pathParam(ctx.params, "calendarId", CALENDAR_ID_PATTERN, "Invalid calendarId format");
}

function eventId(ctx: OperationContext): string {
  return pathParam(ctx.params, "eventId", RESOURCE_ID_PATTERN, "Invalid event ID format");
}

function eventsPath(calendar: string): string {
  return `/calendars/${encodeURIComponent(calendar)}/events`;
}

/** Create, replace and update share one shape: a body plus optional attendee notification. */
function eventWrite(method: HttpMethod, pattern: string, target: (ctx: OperationContext) => string): Operation {
  return {
    method,
    pattern,
    backend: "calendar",
    execute: async (ctx) => {
      const backendPath = target(ctx);
      const params = parseQuery(ctx.query, { sendUpdates: "string", conferenceDataVersion: "int" });
      const body = parseBody(EventBodySchema, await ctx.readBody());
      const sendUpdates = typeof params.sendUpdates === "string" ? params.sendUpdates : undefined;
      const notifies = sendsCalendarNotifications(sendUpdates);

      return confirmAndForward(ctx, {
        backendPath,
        isMutating: notifies,
        params,
        body: withoutNulls(body),
        context: {
          eventSummary: body.summary ?? undefined,
          eventAttendees: body.attendees?.map((attendee) => attendee.email),
          sendUpdates: notifies ? sendUpdates : undefined,
        },
      });
    },
  };
}

export const calendarOperations: Operation[] = [
  {
    method: "GET",
    pattern: "/calendar/users/me/calendarList",
    backend: "calendar",
    execute: async (ctx) =>
      confirmAndForward(ctx, {
        backendPath: "/users/me/calendarList",
        isMutating: false,
        params: parseQuery(ctx.query, {
          maxResults: "int",
          pageToken: "string",
          showDeleted: "bool",
          showHidden: "bool",
        }),
      }),
  },
  {
    method: "GET",
    pattern: "/calendar/calendars/{calendarId}",
    backend: "calendar",
    execute: async (ctx) =>
      confirmAndForward(ctx, {
        backendPath: `/calendars/${encodeURIComponent(calendarId(ctx))}`,
        isMutating: false,
      }),
  },
  {
    method: "GET",
    pattern: "/calendar/calendars/{calendarId}/events",
    backend: "calendar",
    execute: async (ctx) =>
      confirmAndForward(ctx, {
        backendPath: eventsPath(calendarId(ctx)),
        isMutating: false,
        params: parseQuery(ctx.query, {
          maxResults: "int",
          pageToken: "string",
          timeMin: "string",
          timeMax: "string",
          q: "string",
          singleEvents: "bool",
          orderBy: "string",
          showDeleted: "bool",
          updatedMin: "string",
          syncToken: "string",
        }),
      }),
  },
  {
    method: "GET",
    pattern: "/calendar/calendars/{calendarId}/events/{eventId}",
    backend: "calendar",
    execute: async (ctx) => {
      const calendar = calendarId(ctx);
      return confirmAndForward(ctx, {
        backendPath: `${eventsPath(calendar)}/${eventId(ctx)}`,
        isMutating: false,
        params: parseQuery(ctx.query, { timeZone: "string" }),
      });
    },
  },
  eventWrite("POST", "/calendar/calendars/{calendarId}/events", (ctx) => eventsPath(calendarId(ctx))),
  eventWrite(
    "PUT",
    "/calendar/calendars/{calendarId}/events/{eventId}",
    (ctx) => `${eventsPath(calendarId(ctx))}/${eventId(ctx)}`
  ),
  eventWrite(
    "PATCH",
    "/calendar/calendars/{calendarId}/events/{eventId}",
    (ctx) => `${eventsPath(calendarId(ctx))}/${eventId(ctx)}`
  ),
  {
    method: "DELETE",
    pattern: "/calendar/calendars/{calendarId}/events/{eventId}",
    backend: "calendar",
    execute: async (ctx) => {
      const calendar = calendarId(ctx);
      const event = eventId(ctx);
      const params = parseQuery(ctx.query, { sendUpdates: "string" });
      return confirmAndForward(ctx, {
        backendPath: `${eventsPath(calendar)}/${event}`,
        isMutating: true,
        params,
        context: {
          eventSummary: `Event ID: ${event}`,
          sendUpdates: typeof params.sendUpdates === "string" ? params.sendUpdates : undefined,
        },
      });
    },
  },
];
