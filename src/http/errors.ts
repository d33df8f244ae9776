export type ErrorKind = "auth_error" | "forbidden" | "proxy_error" | "backend_error";

export type ErrorEnvelope = {
  error: ErrorKind;
  message: string;
  details?: unknown;
};

export class GatewayError extends Error {
  constructor(
    readonly status: number,
    readonly kind: ErrorKind,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "GatewayError";
  }

  toEnvelope(): ErrorEnvelope {
    return {
      error: this.kind,
      message: this.message,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

export class AuthError extends GatewayError {
  constructor(message: string, status: 401 | 403 = 401) {
    super(status, "auth_error", message);
    this.name = "AuthError";
  }
}

export const POLICY_DENIED_MESSAGE = "This operation is not allowed";

/** Blocked and not-in-allowlist share this error so callers cannot tell the tables apart. */
export class PolicyError extends GatewayError {
  constructor() {
    super(403, "forbidden", POLICY_DENIED_MESSAGE);
    this.name = "PolicyError";
  }
}

export class ConfirmationRejected extends GatewayError {
  constructor() {
    super(403, "forbidden", "Request rejected by operator");
    this.name = "ConfirmationRejected";
  }
}

export class BackendAuthError extends GatewayError {
  constructor() {
    super(502, "backend_error", "Backend authentication failed");
    this.name = "BackendAuthError";
  }
}

export class BackendError extends GatewayError {
  constructor(status: number, message: string, details?: unknown) {
    super(status, "backend_error", message, details);
    this.name = "BackendError";
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, status: 400 | 422 = 400) {
    super(status, "proxy_error", message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = "Not found") {
    super(404, "proxy_error", message);
    this.name = "NotFoundError";
  }
}

export function toErrorResponse(error: unknown): { status: number; envelope: ErrorEnvelope } {
  if (error instanceof GatewayError) {
    return { status: error.status, envelope: error.toEnvelope() };
  }
  return { status: 500, envelope: { error: "proxy_error", message: "Internal server error" } };
}
