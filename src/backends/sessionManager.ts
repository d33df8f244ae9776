import type { Logger } from "../config/logger";
import { isExpired, refreshAccessToken, type Credential, type CredentialStore, type FetchLike } from "./credentials";

export type SessionState = "no_credential" | "valid" | "expired_refreshable" | "refresh_failed";

export interface CredentialSession {
  getCredential(): Promise<Credential | null>;
  forceRefresh(): Promise<Credential | null>;
}

export type SessionManagerOptions = {
  fetchImpl?: FetchLike;
  now?: () => Date;
  refreshTimeoutMs?: number;
};

type RefreshReason = "expired" | "rejected";

/**
 * Owns the credential for one backend. Refreshes on expiry and on demand after
 * an upstream 401; concurrent refreshes share one in-flight attempt.
 */
export class BackendSessionManager implements CredentialSession {
  private cached: Credential | null = null;
  private lastRefreshFailed = false;
  private inFlight: Promise<Credential | null> | null = null;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(
    readonly backend: string,
    private readonly store: CredentialStore,
    private readonly logger: Logger,
    private readonly options: SessionManagerOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async getCredential(): Promise<Credential | null> {
    const current = await this.current();
    if (!current) return null;
    if (isExpired(current, this.now())) {
      if (!current.refreshToken) {
        this.logger.warn("credential_expired", { backend: this.backend });
        return null;
      }
      return this.refresh(current, "expired");
    }
    return current;
  }

  async forceRefresh(): Promise<Credential | null> {
    const current = await this.current();
    if (!current?.refreshToken) {
      this.lastRefreshFailed = true;
      this.logger.error("credential_refresh_failed", {
        backend: this.backend,
        reason: "rejected",
        error: current ? "credential has no refresh token" : "no credential",
      });
      return null;
    }
    return this.refresh(current, "rejected");
  }

  state(): SessionState {
    if (this.lastRefreshFailed) return "refresh_failed";
    if (!this.cached) return "no_credential";
    if (isExpired(this.cached, this.now())) {
      return this.cached.refreshToken ? "expired_refreshable" : "no_credential";
    }
    return "valid";
  }

  private async current(): Promise<Credential | null> {
    if (!this.cached) {
      this.cached = await this.store.load();
    }
    return this.cached;
  }

  private refresh(current: Credential, reason: RefreshReason): Promise<Credential | null> {
    if (this.inFlight) return this.inFlight;
    const attempt = this.runRefresh(current, reason).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = attempt;
    return attempt;
  }

  private async runRefresh(current: Credential, reason: RefreshReason): Promise<Credential | null> {
    let next: Credential;
    try {
      next = await refreshAccessToken(this.fetchImpl, current, {
        now: this.now(),
        timeoutMs: this.options.refreshTimeoutMs,
      });
    } catch (error) {
      this.lastRefreshFailed = true;
      this.logger.error("credential_refresh_failed", {
        backend: this.backend,
        reason,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    this.cached = next;
    this.lastRefreshFailed = false;
    this.logger.info("credential_refreshed", { backend: this.backend, reason });
    try {
      await this.store.save(next);
    } catch (error) {
      this.logger.error("credential_persist_failed", {
        backend: this.backend,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return next;
  }
}
