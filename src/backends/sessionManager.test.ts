import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { silentLogger } from "../config/logger";
import { FileCredentialStore, MemoryCredentialStore, type Credential, type FetchLike } from "./credentials";
import { BackendSessionManager } from "./sessionManager";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function credential(overrides: Partial<Credential> = {}): Credential {
  return {
    accessToken: "test-access",
    refreshToken: "test-refresh",
    tokenUri: "https://oauth.test/token",
    clientId: "test-client",
    clientSecret: "test-secret",
    scopes: ["mail.modify"],
    expiry: new Date("2026-03-01T13:00:00.000Z"),
    ...overrides,
  };
}

type Call = { url: string; body: string };

function tokenEndpoint(responses: Array<() => Response>): { fetchImpl: FetchLike; calls: Call[] } {
  const calls: Call[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, body: typeof init?.body === "string" ? init.body : "" });
    await new Promise((resolve) => setTimeout(resolve, 5));
    const next = responses.shift();
    if (!next) throw new Error("unexpected token request");
    return next();
  };
  return { fetchImpl, calls };
}

const granted = (token: string) => () =>
  new Response(JSON.stringify({ access_token: token, expires_in: 3600 }), { status: 200 });

test("a valid stored credential is returned without refreshing", async () => {
  const { fetchImpl, calls } = tokenEndpoint([]);
  const session = new BackendSessionManager("mail", new MemoryCredentialStore(credential()), silentLogger, {
    fetchImpl,
    now: () => NOW,
  });

  assert.equal(session.state(), "no_credential");
  assert.equal((await session.getCredential())?.accessToken, "test-access");
  assert.equal(session.state(), "valid");
  assert.equal(calls.length, 0);
});

test("an expired credential is refreshed and persisted", async () => {
  const store = new MemoryCredentialStore(credential({ expiry: new Date("2026-03-01T12:00:30.000Z") }));
  const { fetchImpl, calls } = tokenEndpoint([granted("test-access-2")]);
  const session = new BackendSessionManager("mail", store, silentLogger, { fetchImpl, now: () => NOW });

  const refreshed = await session.getCredential();

  assert.equal(refreshed?.accessToken, "test-access-2");
  assert.equal(refreshed?.refreshToken, "test-refresh");
  assert.equal(refreshed?.expiry?.toISOString(), "2026-03-01T13:00:00.000Z");
  assert.deepEqual(calls, [
    {
      url: "https://oauth.test/token",
      body: "grant_type=refresh_token&refresh_token=test-refresh&client_id=test-client&client_secret=test-secret",
    },
  ]);
  assert.equal(store.saved.length, 1);
  assert.equal(store.saved[0]?.accessToken, "test-access-2");
  assert.equal(session.state(), "valid");
});

test("a missing credential yields no credential", async () => {
  const session = new BackendSessionManager("calendar", new MemoryCredentialStore(null), silentLogger);
  assert.equal(await session.getCredential(), null);
  assert.equal(await session.forceRefresh(), null);
  assert.equal(session.state(), "refresh_failed");
});

test("an expired credential without a refresh token is unusable", async () => {
  const store = new MemoryCredentialStore(credential({ refreshToken: null, expiry: new Date("2026-03-01T11:00:00.000Z") }));
  const session = new BackendSessionManager("mail", store, silentLogger, { now: () => NOW });
  assert.equal(await session.getCredential(), null);
  assert.equal(session.state(), "no_credential");
});

test("a failed refresh reports no credential and the failed state", async () => {
  const store = new MemoryCredentialStore(credential({ expiry: new Date("2026-03-01T11:00:00.000Z") }));
  const { fetchImpl } = tokenEndpoint([() => new Response('{"error":"invalid_grant"}', { status: 400 })]);
  const session = new BackendSessionManager("mail", store, silentLogger, { fetchImpl, now: () => NOW });

  assert.equal(session.state(), "no_credential");
  assert.equal(await session.getCredential(), null);
  assert.equal(session.state(), "refresh_failed");
  assert.equal(store.saved.length, 0);
});

test("a malformed token response is a refresh failure", async () => {
  const { fetchImpl } = tokenEndpoint([() => new Response('{"token_type":"Bearer"}', { status: 200 })]);
  const session = new BackendSessionManager("mail", new MemoryCredentialStore(credential()), silentLogger, {
    fetchImpl,
    now: () => NOW,
  });
  assert.equal(await session.forceRefresh(), null);
});

test("forceRefresh refreshes even when the credential is not expired", async () => {
  const { fetchImpl, calls } = tokenEndpoint([granted("test-access-2")]);
  const session = new BackendSessionManager("mail", new MemoryCredentialStore(credential()), silentLogger, {
    fetchImpl,
    now: () => NOW,
  });

  assert.equal((await session.forceRefresh())?.accessToken, "test-access-2");
  assert.equal((await session.getCredential())?.accessToken, "test-access-2");
  assert.equal(calls.length, 1);
});

test("concurrent refreshes share one token request", async () => {
  const { fetchImpl, calls } = tokenEndpoint([granted("test-access-2")]);
  const session = new BackendSessionManager("mail", new MemoryCredentialStore(credential()), silentLogger, {
    fetchImpl,
    now: () => NOW,
  });
  await session.getCredential();

  const [first, second] = await Promise.all([session.forceRefresh(), session.forceRefresh()]);

  assert.equal(calls.length, 1);
  assert.equal(first?.accessToken, "test-access-2");
  assert.equal(second, first);
});

test("FileCredentialStore reads stored documents and preserves unknown fields on save", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "gateway-cred-"));
  const filePath = path.join(dir, "token.json");
  try {
    await fs.writeFile(
      filePath,
      JSON.stringify({
        token: "test-access",
        refresh_token: "test-refresh",
        client_id: "test-client",
        client_secret: "test-secret",
        scopes: ["calendar"],
        expiry: "2026-03-01T13:00:00.123456",
        universe_domain: "example.test",
      }),
      "utf8"
    );
    const store = new FileCredentialStore(filePath, silentLogger);

    const loaded = await store.load();
    assert.equal(loaded?.tokenUri, "https://oauth2.googleapis.com/token");
    assert.equal(loaded?.expiry?.toISOString(), "2026-03-01T13:00:00.123Z");

    assert.ok(loaded);
    await store.save({ ...loaded, accessToken: "test-access-2", expiry: new Date("2026-03-01T14:00:00.000Z") });

    const saved = JSON.parse(await fs.readFile(filePath, "utf8"));
    assert.equal(saved.token, "test-access-2");
    assert.equal(saved.expiry, "2026-03-01T14:00:00.000Z");
    assert.equal(saved.refresh_token, "test-refresh");
    assert.equal(saved.universe_domain, "example.test");
    assert.deepEqual(await fs.readdir(dir), ["token.json"]);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("FileCredentialStore treats missing and corrupt files as no credential", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "gateway-cred-"));
  try {
    assert.equal(await new FileCredentialStore(path.join(dir, "absent.json"), silentLogger).load(), null);

    const corrupt = path.join(dir, "corrupt.json");
    await fs.writeFile(corrupt, "{not json", "utf8");
    assert.equal(await new FileCredentialStore(corrupt, silentLogger).load(), null);

    const empty = path.join(dir, "empty.json");
    await fs.writeFile(empty, "{}", "utf8");
    assert.equal(await new FileCredentialStore(empty, silentLogger).load(), null);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
