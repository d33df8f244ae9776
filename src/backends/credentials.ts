import { z } from "zod";
import type { Logger } from "../config/logger";
import { readJsonFile, writeJsonAtomic } from "../stores/jsonFile";
import { SerialLock } from "../stores/serialLock";

export const DEFAULT_TOKEN_URI = "https://oauth2.googleapis.com/token";
export const EXPIRY_SKEW_MS = 60_000;

export type Credential = {
  accessToken: string | null;
  refreshToken: string | null;
  tokenUri: string;
  clientId: string | null;
  clientSecret: string | null;
  scopes: string[];
  expiry: Date | null;
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CredentialStore {
  load(): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
}

const optionalText = z.string().nullish();

const StoredCredentialSchema = z.object({
  token: optionalText,
  refresh_token: optionalText,
  token_uri: optionalText,
  client_id: optionalText,
  client_secret: optionalText,
  scopes: z.array(z.string()).nullish(),
  expiry: optionalText,
});

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
  refresh_token: z.string().min(1).optional(),
});

function parseExpiry(value: string | null | undefined): Date | null {
  if (!value) return null;
  // Stored expiries may lack a zone designator; they are UTC.
  const normalized = /(?:Z|[+-]\d{2}:?\d{2})$/.test(value) ? value : `${value}Z`;
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function credentialFromDocument(document: unknown): Credential | null {
  const parsed = StoredCredentialSchema.safeParse(document);
  if (!parsed.success) return null;
  const stored = parsed.data;
  if (!stored.token && !stored.refresh_token) return null;
  return {
    accessToken: stored.token || null,
    refreshToken: stored.refresh_token || null,
    tokenUri: stored.token_uri || DEFAULT_TOKEN_URI,
    clientId: stored.client_id ?? null,
    clientSecret: stored.client_secret ?? null,
    scopes: stored.scopes ?? [],
    expiry: parseExpiry(stored.expiry),
  };
}

export function credentialToDocument(credential: Credential): Record<string, unknown> {
  return {
    token: credential.accessToken,
    ...(credential.refreshToken ? { refresh_token: credential.refreshToken } : {}),
    token_uri: credential.tokenUri,
    ...(credential.clientId ? { client_id: credential.clientId } : {}),
    ...(credential.clientSecret ? { client_secret: credential.clientSecret } : {}),
    scopes: credential.scopes,
    expiry: credential.expiry ? credential.expiry.toISOString() : null,
  };
}

export function isExpired(credential: Credential, now: Date): boolean {
  if (!credential.accessToken) return true;
  if (!credential.expiry) return false;
  return now.getTime() + EXPIRY_SKEW_MS >= credential.expiry.getTime();
}

/**
 * One JSON document per backend. Saving merges over the existing document so
 * fields this gateway does not know about survive a refresh.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly writes = new SerialLock();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<Credential | null> {
    const read = await readJsonFile(this.filePath);
    if (read.kind === "missing") {
      this.logger.warn("credential_missing", { file: this.filePath });
      return null;
    }
    if (read.kind === "invalid") {
      this.logger.error("credential_load_failed", { file: this.filePath, error: read.error });
      return null;
    }

    const credential = credentialFromDocument(read.value);
    if (!credential) {
      this.logger.error("credential_load_failed", { file: this.filePath, error: "unrecognized credential document" });
    }
    return credential;
  }

  save(credential: Credential): Promise<void> {
    return this.writes.run(async () => {
      const read = await readJsonFile(this.filePath);
      const existing = read.kind === "ok" ? z.record(z.unknown()).safeParse(read.value) : null;
      await writeJsonAtomic(this.filePath, {
        ...(existing?.success ? existing.data : {}),
        ...credentialToDocument(credential),
      });
    });
  }
}

export class MemoryCredentialStore implements CredentialStore {
  saved: Credential[] = [];

  constructor(private credential: Credential | null = null) {}

  async load(): Promise<Credential | null> {
    return this.credential;
  }

  async save(credential: Credential): Promise<void> {
    this.credential = credential;
    this.saved.push(credential);
  }
}

/** Exchanges the refresh token at the token endpoint; throws on any failure. */
export async function refreshAccessToken(
  fetchImpl: FetchLike,
  credential: Credential,
  options: { now?: Date; timeoutMs?: number } = {}
): Promise<Credential> {
  if (!credential.refreshToken) {
    throw new Error("credential has no refresh token");
  }

  const form = new URLSearchParams({ grant_type: "refresh_token", refresh_token: credential.refreshToken });
  if (credential.clientId) form.set("client_id", credential.clientId);
  if (credential.clientSecret) form.set("client_secret", credential.clientSecret);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? 30_000);
  let payload: unknown;
  try {
    const response = await fetchImpl(credential.tokenUri, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded", accept: "application/json" },
      body: form.toString(),
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new Error(`token endpoint -> ${response.status}`);
    }
    payload = await response.json();
  } finally {
    clearTimeout(timeout);
  }

  const parsed = TokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error("token endpoint returned a malformed response");
  }

  const now = options.now ?? new Date();
  return {
    ...credential,
    accessToken: parsed.data.access_token,
    refreshToken: parsed.data.refresh_token ?? credential.refreshToken,
    expiry: parsed.data.expires_in ? new Date(now.getTime() + parsed.data.expires_in * 1000) : null,
  };
}
