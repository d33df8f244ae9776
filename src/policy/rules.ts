export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type PolicyRule = {
  method: HttpMethod;
  pattern: string;
  summary: string;
};

/** Denied under every method; checked before the allow table. */
export const BLOCKED_PATTERNS: readonly string[] = [
  "/mail/users/{userId}/messages/send",
  "/mail/users/{userId}/drafts",
  "/mail/users/{userId}/drafts/send",
  "/mail/users/{userId}/drafts/{draftId}",
  "/mail/users/{userId}/messages/import",
  "/mail/users/{userId}/messages/insert",
];

export const ALLOWED_RULES: readonly PolicyRule[] = [
  { method: "GET", pattern: "/mail/users/{userId}/messages", summary: "List messages" },
  { method: "GET", pattern: "/mail/users/{userId}/messages/{messageId}", summary: "Get a message" },
  { method: "GET", pattern: "/mail/users/{userId}/labels", summary: "List labels" },
  { method: "GET", pattern: "/mail/users/{userId}/labels/{labelId}", summary: "Get a label" },
  { method: "POST", pattern: "/mail/users/{userId}/messages/{messageId}/modify", summary: "Change message labels" },
  { method: "POST", pattern: "/mail/users/{userId}/messages/{messageId}/trash", summary: "Move a message to trash" },
  { method: "POST", pattern: "/mail/users/{userId}/messages/{messageId}/untrash", summary: "Restore a message from trash" },

  { method: "GET", pattern: "/calendar/users/me/calendarList", summary: "List calendars" },
  { method: "GET", pattern: "/calendar/calendars/{calendarId}", summary: "Get calendar metadata" },
  { method: "GET", pattern: "/calendar/calendars/{calendarId}/events", summary: "List events" },
  { method: "GET", pattern: "/calendar/calendars/{calendarId}/events/{eventId}", summary: "Get an event" },
  { method: "POST", pattern: "/calendar/calendars/{calendarId}/events", summary: "Create an event" },
  { method: "PUT", pattern: "/calendar/calendars/{calendarId}/events/{eventId}", summary: "Replace an event" },
  { method: "PATCH", pattern: "/calendar/calendars/{calendarId}/events/{eventId}", summary: "Update an event" },
  { method: "DELETE", pattern: "/calendar/calendars/{calendarId}/events/{eventId}", summary: "Delete an event" },
];

/** Reachable without policy checks or an API key. */
export const EXEMPT_PATHS: readonly string[] = ["/health", "/docs", "/openapi.json"];
export const EXEMPT_PREFIXES: readonly string[] = ["/approval"];
