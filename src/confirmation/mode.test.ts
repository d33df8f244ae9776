import test from "node:test";
import assert from "node:assert/strict";
import { parseConfirmationMode, requiresConfirmation, sendsCalendarNotifications } from "./mode";

test("parseConfirmationMode maps configuration values", () => {
  assert.equal(parseConfirmationMode("none"), "NONE");
  assert.equal(parseConfirmationMode("mutating"), "MUTATING_ONLY");
  assert.equal(parseConfirmationMode("all"), "ALL");
});

test("requiresConfirmation follows the configured mode", () => {
  assert.equal(requiresConfirmation("NONE", true), false);
  assert.equal(requiresConfirmation("NONE", false), false);
  assert.equal(requiresConfirmation("ALL", false), true);
  assert.equal(requiresConfirmation("MUTATING_ONLY", true), true);
  assert.equal(requiresConfirmation("MUTATING_ONLY", false), false);
});

test("calendar notifications count only for all and externalOnly", () => {
  assert.equal(sendsCalendarNotifications("all"), true);
  assert.equal(sendsCalendarNotifications("externalOnly"), true);
  assert.equal(sendsCalendarNotifications("none"), false);
  assert.equal(sendsCalendarNotifications("ALL"), false);
  assert.equal(sendsCalendarNotifications(undefined), false);
});
