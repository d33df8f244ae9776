/**
 * Canonical description of an operation awaiting an operator decision. Mail
 * and calendar operations fill in the context fields that apply to them.
 */
export type ConfirmationRequest = {
  method: string;
  path: string;
  queryParams: Record<string, string>;
  labelsToAdd?: string[];
  labelsToRemove?: string[];
  messageFrom?: string;
  messageSubject?: string;
  messageSnippet?: string;
  eventSummary?: string;
  eventAttendees?: string[];
  sendUpdates?: string;
};

export type ConfirmationContext = Omit<ConfirmationRequest, "method" | "path" | "queryParams">;

export type ConfirmationDeliveryKind = "console" | "web";

export interface ConfirmationDelivery {
  readonly kind: ConfirmationDeliveryKind;
  decide(request: ConfirmationRequest): Promise<boolean>;
}

export function contextOf(request: ConfirmationRequest): ConfirmationContext {
  const { method: _method, path: _path, queryParams: _queryParams, ...context } = request;
  return context;
}
