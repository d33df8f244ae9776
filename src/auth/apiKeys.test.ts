import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { silentLogger } from "../config/logger";
import { AuthError } from "../http/errors";
import { ApiKeyError, ApiKeyStore, authenticate, generateApiKey, maskApiKey } from "./apiKeys";

const clock = () => new Date("2026-03-01T08:00:00.000Z");

async function withStore(run: (store: ApiKeyStore, filePath: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "gateway-keys-"));
  const filePath = path.join(dir, "api_keys.json");
  try {
    await run(new ApiKeyStore(filePath, silentLogger, clock), filePath);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

async function expectAuthError(promise: Promise<unknown>, status: number, message: string): Promise<void> {
  await assert.rejects(promise, (error: unknown) => {
    assert.ok(error instanceof AuthError);
    assert.equal(error.status, status);
    assert.equal(error.message, message);
    assert.equal(error.kind, "auth_error");
    return true;
  });
}

test("generateApiKey uses the prefix and a lowercase alphanumeric body", () => {
  const key = generateApiKey();
  assert.match(key, /^mcg_[a-z0-9]{32}$/);
  assert.notEqual(generateApiKey(), key);
});

test("maskApiKey keeps only the last four characters", () => {
  assert.equal(maskApiKey("mcg_abcdefgh"), "********efgh");
});

test("createKey persists the key and rejects duplicate or malformed names", async () => {
  await withStore(async (store, filePath) => {
    const key = await store.createKey("agent-1");
    const stored = JSON.parse(await fs.readFile(filePath, "utf8"));
    assert.deepEqual(stored, {
      keys: { [key]: { name: "agent-1", createdAt: "2026-03-01T08:00:00.000Z", lastUsedAt: null, enabled: true } },
    });

    await assert.rejects(store.createKey("agent-1"), ApiKeyError);
    await assert.rejects(store.createKey("bad name"), ApiKeyError);
    await assert.rejects(store.createKey(""), ApiKeyError);
    await assert.rejects(store.createKey("x".repeat(65)), ApiKeyError);
  });
});

test("validateKey distinguishes valid, disabled and unknown keys", async () => {
  await withStore(async (store) => {
    const key = await store.createKey("agent");
    assert.deepEqual(await store.validateKey(key), { status: "valid", name: "agent" });
    assert.deepEqual(await store.validateKey("mcg_unknown"), { status: "unknown" });
    assert.deepEqual(await store.validateKey("sk-not-ours"), { status: "unknown" });

    assert.equal(await store.setEnabled("agent", false), true);
    assert.deepEqual(await store.validateKey(key), { status: "disabled", name: "agent" });
    assert.equal(await store.setEnabled("nobody", true), false);
  });
});

test("revokeKey deletes the key and listKeys shows only a suffix", async () => {
  await withStore(async (store) => {
    const first = await store.createKey("first");
    await store.createKey("second");

    const listed = await store.listKeys();
    assert.deepEqual(
      listed.map((entry) => entry.name),
      ["first", "second"]
    );
    assert.equal(listed[0]?.keySuffix, first.slice(-4));
    assert.equal(listed[1]?.keySuffix.length, 4);

    assert.equal(await store.revokeKey("first"), true);
    assert.equal(await store.revokeKey("first"), false);
    assert.equal(await store.getKeyByName("first"), null);
    assert.deepEqual(await store.validateKey(first), { status: "unknown" });
  });
});

test("a corrupt key file reads as an empty store", async () => {
  await withStore(async (store, filePath) => {
    await fs.writeFile(filePath, "[[[", "utf8");
    assert.deepEqual(await store.listKeys(), []);
  });
});

test("changes are refused while the key file is unreadable and the file is left as it was", async () => {
  await withStore(async (store, filePath) => {
    const original = JSON.stringify({ keys: { mcg_aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa: { name: "agent", created_at: "2026-01-01" } } });
    await fs.writeFile(filePath, original, "utf8");

    await assert.rejects(store.setEnabled("agent", false), ApiKeyError);
    await assert.rejects(store.revokeKey("agent"), ApiKeyError);
    await assert.rejects(store.createKey("second"), ApiKeyError);

    assert.equal(await fs.readFile(filePath, "utf8"), original);
  });
});

test("a change that matches nothing does not rewrite the file", async () => {
  await withStore(async (store, filePath) => {
    await store.createKey("agent");
    const before = await fs.stat(filePath);
    const contents = await fs.readFile(filePath, "utf8");

    assert.equal(await store.setEnabled("ghost", false), false);
    assert.equal(await store.revokeKey("ghost"), false);

    const after = await fs.stat(filePath);
    assert.equal(after.ino, before.ino);
    assert.equal(await fs.readFile(filePath, "utf8"), contents);
  });
});

test("concurrent creates are serialized without losing keys", async () => {
  await withStore(async (store) => {
    await Promise.all(["a", "b", "c", "d"].map((name) => store.createKey(name)));
    assert.deepEqual(
      (await store.listKeys()).map((entry) => entry.name).sort(),
      ["a", "b", "c", "d"]
    );
  });
});

test("authenticate maps header problems onto auth errors", async () => {
  await withStore(async (store) => {
    const key = await store.createKey("agent");

    await expectAuthError(authenticate(store, undefined), 401, "Missing Authorization header");
    await expectAuthError(authenticate(store, `Token ${key}`), 401, "Invalid Authorization header format");
    await expectAuthError(authenticate(store, "Bearer "), 401, "Invalid API key");
    await expectAuthError(authenticate(store, "Bearer mcg_wrong"), 401, "Invalid API key");

    await store.setEnabled("agent", false);
    await expectAuthError(authenticate(store, `Bearer ${key}`), 403, "API key is disabled");
  });
});

test("authenticate returns the key name and records its use", async () => {
  await withStore(async (store) => {
    const key = await store.createKey("agent");
    assert.deepEqual(await authenticate(store, `Bearer ${key}`), { name: "agent" });
    assert.equal((await store.getKeyByName("agent"))?.record.lastUsedAt, "2026-03-01T08:00:00.000Z");
  });
});
