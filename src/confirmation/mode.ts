export type ConfirmationMode = "NONE" | "MUTATING_ONLY" | "ALL";

export function parseConfirmationMode(value: "none" | "mutating" | "all"): ConfirmationMode {
  switch (value) {
    case "none":
      return "NONE";
    case "mutating":
      return "MUTATING_ONLY";
    case "all":
      return "ALL";
  }
}

export function requiresConfirmation(mode: ConfirmationMode, isMutating: boolean): boolean {
  switch (mode) {
    case "NONE":
      return false;
    case "ALL":
      return true;
    case "MUTATING_ONLY":
      return isMutating;
  }
}

const NOTIFYING_SEND_UPDATES = new Set(["all", "externalOnly"]);

/** Calendar writes only count as mutating when they notify attendees. */
export function sendsCalendarNotifications(sendUpdates: string | undefined): boolean {
  return sendUpdates !== undefined && NOTIFYING_SEND_UPDATES.has(sendUpdates);
}
