import test from "node:test";
import assert from "node:assert/strict";
import { confirmationTimeoutMs, readEnv, redactEnvForLogs } from "./env";

test("readEnv applies defaults for an empty environment", () => {
  const env = readEnv({});
  assert.equal(env.GATEWAY_HOST, "127.0.0.1");
  assert.equal(env.GATEWAY_PORT, 8000);
  assert.equal(env.GATEWAY_CONFIRMATION_MODE, "mutating");
  assert.equal(env.GATEWAY_CONFIRMATION_DELIVERY, "console");
  assert.equal(env.GATEWAY_MAIL_API_BASE_URL, "https://gmail.googleapis.com/gmail/v1");
  assert.equal(env.GATEWAY_SUBSCRIBER_BUFFER, 100);
  assert.equal(confirmationTimeoutMs(env), 300_000);
});

test("readEnv coerces numeric values from strings", () => {
  const env = readEnv({
    GATEWAY_PORT: "0",
    GATEWAY_BACKEND_TIMEOUT_MS: "5000",
    GATEWAY_CONFIRMATION_TIMEOUT_SECONDS: "1.5",
  });
  assert.equal(env.GATEWAY_PORT, 0);
  assert.equal(env.GATEWAY_BACKEND_TIMEOUT_MS, 5000);
  assert.equal(confirmationTimeoutMs(env), 1500);
});

test("a zero confirmation timeout means no deadline", () => {
  const env = readEnv({ GATEWAY_CONFIRMATION_TIMEOUT_SECONDS: "0" });
  assert.equal(confirmationTimeoutMs(env), null);
});

test("readEnv validates strict log level enum", () => {
  assert.throws(() => readEnv({ GATEWAY_LOG_LEVEL: "trace" }), /GATEWAY_LOG_LEVEL/);
});

test("readEnv rejects unknown confirmation modes", () => {
  assert.throws(() => readEnv({ GATEWAY_CONFIRMATION_MODE: "sometimes" }), /GATEWAY_CONFIRMATION_MODE/);
});

test("readEnv lists every invalid variable in one message", () => {
  assert.throws(
    () => readEnv({ GATEWAY_MAIL_API_BASE_URL: "not a url", GATEWAY_PORT: "70000" }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.match(error.message, /GATEWAY_MAIL_API_BASE_URL: GATEWAY_MAIL_API_BASE_URL must be a valid URL/);
      assert.match(error.message, /GATEWAY_PORT/);
      return true;
    }
  );
});

test("redactEnvForLogs reports paths and modes", () => {
  const redacted = redactEnvForLogs(readEnv({ GATEWAY_CONFIRMATION_DELIVERY: "web" }));
  assert.equal(redacted.GATEWAY_CONFIRMATION_DELIVERY, "web");
  assert.equal(redacted.GATEWAY_LOG_FILE, null);
  assert.equal(redacted.GATEWAY_MAIL_TOKEN_FILE, "token.json");
});
