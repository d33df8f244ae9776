import crypto from "node:crypto";
import { z } from "zod";
import type { Logger } from "../config/logger";
import { AuthError } from "../http/errors";
import { readJsonFile, writeJsonAtomic } from "../stores/jsonFile";
import { SerialLock } from "../stores/serialLock";

export const API_KEY_PREFIX = "mcg_";
const KEY_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const KEY_BODY_LENGTH = 32;
const KEY_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const ApiKeyRecordSchema = z.object({
  name: z.string(),
  createdAt: z.string(),
  lastUsedAt: z.string().nullable().default(null),
  enabled: z.boolean().default(true),
});

const ApiKeyFileSchema = z.object({
  keys: z.record(ApiKeyRecordSchema).default({}),
});

export type ApiKeyRecord = z.infer<typeof ApiKeyRecordSchema>;

export type ApiKeySummary = ApiKeyRecord & { keySuffix: string };

export type ApiKeyValidation =
  | { status: "valid"; name: string }
  | { status: "disabled"; name: string }
  | { status: "unknown" };

export class ApiKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ApiKeyError";
  }
}

export function generateApiKey(): string {
  let body = "";
  for (let i = 0; i < KEY_BODY_LENGTH; i += 1) {
    body += KEY_ALPHABET[crypto.randomInt(KEY_ALPHABET.length)];
  }
  return `${API_KEY_PREFIX}${body}`;
}

export function maskApiKey(key: string): string {
  return `${"*".repeat(Math.max(0, key.length - 4))}${key.slice(-4)}`;
}

/**
 * API keys live in one JSON document keyed by the secret itself. Every call
 * reads the file so keys managed from the CLI apply to a running gateway.
 */
export class ApiKeyStore {
  private readonly writes = new SerialLock();

  constructor(
    readonly filePath: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createKey(name: string): Promise<string> {
    if (!KEY_NAME_PATTERN.test(name)) {
      throw new ApiKeyError("Key name must be 1-64 characters of letters, digits, '_' or '-'");
    }
    return this.mutate((keys) => {
      if (Object.values(keys).some((record) => record.name === name)) {
        throw new ApiKeyError(`API key with name '${name}' already exists`);
      }
      const key = generateApiKey();
      keys[key] = { name, createdAt: this.now().toISOString(), lastUsedAt: null, enabled: true };
      return key;
    });
  }

  async getKeyByName(name: string): Promise<{ key: string; record: ApiKeyRecord } | null> {
    const keys = await this.read();
    for (const [key, record] of Object.entries(keys)) {
      if (record.name === name) return { key, record };
    }
    return null;
  }

  async validateKey(key: string): Promise<ApiKeyValidation> {
    if (!key.startsWith(API_KEY_PREFIX)) return { status: "unknown" };
    const keys = await this.read();
    const record = Object.prototype.hasOwnProperty.call(keys, key) ? keys[key] : undefined;
    if (!record) return { status: "unknown" };
    return record.enabled ? { status: "valid", name: record.name } : { status: "disabled", name: record.name };
  }

  touchLastUsed(key: string): Promise<void> {
    return this.mutate((keys) => {
      const record = keys[key];
      if (record) record.lastUsedAt = this.now().toISOString();
    });
  }

  setEnabled(name: string, enabled: boolean): Promise<boolean> {
    return this.mutate((keys) => {
      const record = Object.values(keys).find((entry) => entry.name === name);
      if (!record) return false;
      record.enabled = enabled;
      return true;
    });
  }

  revokeKey(name: string): Promise<boolean> {
    return this.mutate((keys) => {
      const match = Object.entries(keys).find(([, record]) => record.name === name);
      if (!match) return false;
      delete keys[match[0]];
      return true;
    });
  }

  async listKeys(): Promise<ApiKeySummary[]> {
    const keys = await this.read();
    return Object.entries(keys).map(([key, record]) => ({ ...record, keySuffix: key.slice(-4) }));
  }

  private async read(): Promise<Record<string, ApiKeyRecord>> {
    const loaded = await this.load();
    if (loaded.kind === "invalid") {
      this.logger.error("api_keys_load_failed", { file: this.filePath, error: loaded.error });
      return {};
    }
    return loaded.keys;
  }

  private async load(): Promise<{ kind: "ok"; keys: Record<string, ApiKeyRecord> } | { kind: "invalid"; error: string }> {
    const read = await readJsonFile(this.filePath);
    if (read.kind === "missing") return { kind: "ok", keys: {} };
    if (read.kind === "invalid") return read;
    const parsed = ApiKeyFileSchema.safeParse(read.value);
    if (!parsed.success) {
      return { kind: "invalid", error: parsed.error.issues[0]?.message ?? "unrecognized key file" };
    }
    return { kind: "ok", keys: parsed.data.keys };
  }

  /** Read-modify-write under the lock. An unreadable file is never overwritten; an unchanged one is not rewritten. */
  private mutate<T>(change: (keys: Record<string, ApiKeyRecord>) => T): Promise<T> {
    return this.writes.run(async () => {
      const loaded = await this.load();
      if (loaded.kind === "invalid") {
        this.logger.error("api_keys_load_failed", { file: this.filePath, error: loaded.error });
        throw new ApiKeyError(`API keys file ${this.filePath} is unreadable; fix or remove it before making changes`);
      }
      const keys = loaded.keys;
      const before = JSON.stringify(keys);
      const result = change(keys);
      if (JSON.stringify(keys) !== before) {
        await writeJsonAtomic(this.filePath, { keys });
      }
      return result;
    });
  }
}

/** Resolves a bearer `Authorization` header to the key's name, or throws `AuthError`. */
export async function authenticate(store: ApiKeyStore, header: string | undefined): Promise<{ name: string }> {
  if (!header) {
    throw new AuthError("Missing Authorization header");
  }
  const match = /^Bearer (.*)$/.exec(header);
  if (!match) {
    throw new AuthError("Invalid Authorization header format");
  }
  const key = match[1].trim();
  if (!key) {
    throw new AuthError("Invalid API key");
  }

  const result = await store.validateKey(key);
  if (result.status === "unknown") {
    throw new AuthError("Invalid API key");
  }
  if (result.status === "disabled") {
    throw new AuthError("API key is disabled", 403);
  }

  await store.touchLastUsed(key);
  return { name: result.name };
}
