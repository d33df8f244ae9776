import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createLogger, sanitize } from "./logger";

const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

test("sanitize redacts secret-looking keys recursively", () => {
  const value = sanitize({
    keyName: "agent",
    nested: { refresh_token: "test-refresh", list: [{ Authorization: "Bearer test-secret" }] },
    client_secret: "test-secret",
  });
  assert.deepEqual(value, {
    keyName: "agent",
    nested: { refresh_token: "[redacted]", list: [{ Authorization: "[redacted]" }] },
    client_secret: "[redacted]",
  });
});

test("sanitize masks gateway API keys embedded in string values", () => {
  assert.deepEqual(sanitize({ reason: "unknown key mcg_abcdefghijklmnopqrstuvwxyz012345 presented", keyPrefix: "mcg_abcd..." }), {
    reason: "unknown key mcg_[redacted] presented",
    keyPrefix: "mcg_abcd...",
  });
});

test("createLogger writes one JSON line per entry and honours the threshold", () => {
  const lines: string[] = [];
  const logger = createLogger("info", { write: (line) => lines.push(line), now: fixedNow });

  logger.debug("hidden");
  logger.warn("policy_blocked", { method: "POST", path: "/mail/users/me/messages/send" });

  assert.equal(lines.length, 1);
  assert.equal(
    lines[0],
    '{"at":"2026-03-01T12:00:00.000Z","level":"warn","msg":"policy_blocked","meta":{"method":"POST","path":"/mail/users/me/messages/send"}}\n'
  );
});

test("createLogger appends to the log file and creates its directory", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gateway-log-"));
  const filePath = path.join(dir, "nested", "gateway.log");
  try {
    const logger = createLogger("debug", { filePath, write: () => {}, now: fixedNow });
    logger.info("gateway_boot");
    assert.equal(
      fs.readFileSync(filePath, "utf8"),
      '{"at":"2026-03-01T12:00:00.000Z","level":"info","msg":"gateway_boot"}\n'
    );
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
