import { z } from "zod";
import type { Logger } from "../config/logger";
import { BackendAuthError, BackendError } from "../http/errors";
import type { FetchLike } from "./credentials";
import type { CredentialSession } from "./sessionManager";

export type QueryValue = string | number | boolean | readonly string[] | undefined;

export type ForwardOptions = {
  params?: Record<string, QueryValue>;
  body?: unknown;
};

export type BackendResponse = {
  status: number;
  text: string;
};

export type TranslatedResponse = {
  status: number;
  body?: unknown;
};

export type BackendClientOptions = {
  name: string;
  baseUrl: string;
  session: CredentialSession;
  logger: Logger;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
};

export function buildBackendUrl(baseUrl: string, path: string, params: Record<string, QueryValue> = {}): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}${path}`);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      url.searchParams.append(key, String(value));
      continue;
    }
    for (const entry of value) url.searchParams.append(key, entry);
  }
  return url.toString();
}

/**
 * Executes calls against one backend with the session's credential. A 401 is
 * retried once after a forced refresh; the retry's result is final.
 */
export class BackendClient {
  readonly name: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(private readonly options: BackendClientOptions) {
    this.name = options.name;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async forward(method: string, path: string, options: ForwardOptions = {}): Promise<BackendResponse> {
    if (this.closed) {
      throw new BackendError(502, "Backend request failed");
    }

    const credential = await this.options.session.getCredential();
    if (!credential?.accessToken) {
      this.options.logger.error("backend_no_credential", { backend: this.name, method, path });
      throw new BackendAuthError();
    }

    const url = buildBackendUrl(this.options.baseUrl, path, options.params);
    const first = await this.send(method, url, credential.accessToken, options.body);
    if (first.status !== 401) return first;

    this.options.logger.warn("backend_unauthorized_retry", { backend: this.name, method, path });
    const refreshed = await this.options.session.forceRefresh();
    if (!refreshed?.accessToken) return first;

    return this.send(method, url, refreshed.accessToken, options.body);
  }

  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }

  private async send(method: string, url: string, accessToken: string, body: unknown): Promise<BackendResponse> {
    if (this.closed) {
      throw new BackendError(502, "Backend request failed");
    }

    const controller = new AbortController();
    this.inFlight.add(controller);
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const headers: Record<string, string> = {
      authorization: `Bearer ${accessToken}`,
      accept: "application/json",
    };
    if (body !== undefined) headers["content-type"] = "application/json";

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      return { status: response.status, text: await response.text() };
    } catch (error) {
      this.options.logger.error("backend_request_failed", {
        backend: this.name,
        method,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new BackendError(502, "Backend request failed");
    } finally {
      clearTimeout(timeout);
      this.inFlight.delete(controller);
    }
  }
}

const UpstreamErrorSchema = z.object({
  error: z.object({ message: z.string().min(1) }),
});

/** Maps a raw backend response onto the gateway's response contract. */
export function translateBackendResponse(response: BackendResponse, logger?: Logger): TranslatedResponse {
  if (response.status === 204) return { status: 204 };

  let payload: unknown;
  try {
    payload = JSON.parse(response.text);
  } catch {
    logger?.error("backend_invalid_json", { status: response.status, length: response.text.length });
    throw new BackendError(response.status >= 400 ? response.status : 502, "Invalid JSON response from backend");
  }

  if (response.status >= 400) {
    const upstream = UpstreamErrorSchema.safeParse(payload);
    throw new BackendError(
      response.status,
      upstream.success ? upstream.data.error.message : "Backend API error",
      payload
    );
  }

  return { status: response.status, body: payload };
}
