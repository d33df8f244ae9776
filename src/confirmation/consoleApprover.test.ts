import test from "node:test";
import assert from "node:assert/strict";
import { PassThrough, Writable } from "node:stream";
import { silentLogger } from "../config/logger";
import { ConsoleApprover, formatPrompt, isAffirmative } from "./consoleApprover";
import type { ConfirmationRequest } from "./types";

const trashRequest: ConfirmationRequest = {
  method: "POST",
  path: "/mail/users/me/messages/m1/trash",
  queryParams: {},
  messageFrom: "alice@example.com",
  messageSubject: "Quarterly report",
  messageSnippet: "Numbers attached",
};

function harness(timeoutMs: number | null = null) {
  const input = new PassThrough();
  let written = "";
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      written += chunk.toString("utf8");
      callback();
    },
  });
  const approver = new ConsoleApprover(silentLogger, { input, output, timeoutMs });
  return { input, approver, output: () => written };
}

async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

function countPrompts(text: string): number {
  return text.split("[CONFIRM]").length - 1;
}

test("formatPrompt lists method, path, query and present context fields", () => {
  const prompt = formatPrompt({
    method: "PATCH",
    path: "/calendar/calendars/primary/events/e1",
    queryParams: { sendUpdates: "all", conferenceDataVersion: "1" },
    eventSummary: "Planning",
    eventAttendees: ["a@example.com", "b@example.com"],
    sendUpdates: "all",
    labelsToAdd: [],
  });

  assert.equal(
    prompt,
    [
      "[CONFIRM] PATCH /calendar/calendars/primary/events/e1",
      "  Query: sendUpdates=all&conferenceDataVersion=1",
      "  Event: Planning",
      "  Attendees: a@example.com, b@example.com",
      "  Send notifications: all",
      "Allow this request? [y/N]: ",
    ].join("\n")
  );
});

test("formatPrompt orders message context before labels", () => {
  const prompt = formatPrompt({
    ...trashRequest,
    labelsToAdd: ["STARRED"],
    labelsToRemove: ["UNREAD", "INBOX"],
  });
  assert.equal(
    prompt,
    [
      "[CONFIRM] POST /mail/users/me/messages/m1/trash",
      "  Subject: Quarterly report",
      "  From: alice@example.com",
      "  Preview: Numbers attached",
      "  Add labels: STARRED",
      "  Remove labels: UNREAD, INBOX",
      "Allow this request? [y/N]: ",
    ].join("\n")
  );
});

test("isAffirmative accepts only y and yes", () => {
  assert.equal(isAffirmative("y"), true);
  assert.equal(isAffirmative("  YES \t"), true);
  assert.equal(isAffirmative(""), false);
  assert.equal(isAffirmative("yep"), false);
  assert.equal(isAffirmative("n"), false);
});

test("confirm approves on yes and reports the outcome", async () => {
  const { input, approver, output } = harness();
  try {
    const decision = approver.confirm(trashRequest);
    await waitFor(() => output().includes("Allow this request? [y/N]: "));
    input.write(" Yes \n");

    assert.equal(await decision, true);
    assert.ok(output().endsWith("[APPROVED]\n"));
  } finally {
    approver.close();
  }
});

test("confirm rejects on empty input", async () => {
  const { input, approver, output } = harness();
  try {
    const decision = approver.confirm(trashRequest);
    await waitFor(() => output().includes("[y/N]"));
    input.write("\n");

    assert.equal(await decision, false);
    assert.ok(output().endsWith("[REJECTED]\n"));
  } finally {
    approver.close();
  }
});

test("confirm treats deadline expiry as a rejection", async () => {
  const { approver, output } = harness(30);
  try {
    assert.equal(await approver.confirm(trashRequest), false);
    assert.ok(output().endsWith("\n[TIMEOUT] Confirmation timed out\n"));
  } finally {
    approver.close();
  }
});

test("concurrent confirmations show one prompt at a time", async () => {
  const { input, approver, output } = harness();
  try {
    const first = approver.confirm(trashRequest);
    const second = approver.confirm({ ...trashRequest, path: "/mail/users/me/messages/m2/untrash" });

    await waitFor(() => countPrompts(output()) === 1);
    await new Promise((resolve) => setTimeout(resolve, 20));
    assert.equal(countPrompts(output()), 1);

    input.write("n\n");
    assert.equal(await first, false);

    await waitFor(() => countPrompts(output()) === 2);
    assert.ok(output().includes("[CONFIRM] POST /mail/users/me/messages/m2/untrash"));
    input.write("y\n");
    assert.equal(await second, true);
  } finally {
    approver.close();
  }
});

test("confirm rejects immediately once the input is closed", async () => {
  const { approver, output } = harness();
  approver.close();
  assert.equal(await approver.confirm(trashRequest), false);
  assert.ok(output().endsWith("[TIMEOUT] Confirmation timed out\n"));
});
