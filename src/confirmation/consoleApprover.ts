import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "../config/logger";
import { SerialLock } from "../stores/serialLock";
import type { ConfirmationRequest } from "./types";

export function formatPrompt(request: ConfirmationRequest): string {
  const lines = [`[CONFIRM] ${request.method} ${request.path}`];

  const query = Object.entries(request.queryParams);
  if (query.length > 0) {
    lines.push(`  Query: ${query.map(([key, value]) => `${key}=${value}`).join("&")}`);
  }
  if (request.messageSubject) lines.push(`  Subject: ${request.messageSubject}`);
  if (request.messageFrom) lines.push(`  From: ${request.messageFrom}`);
  if (request.messageSnippet) lines.push(`  Preview: ${request.messageSnippet}`);
  if (request.labelsToAdd?.length) lines.push(`  Add labels: ${request.labelsToAdd.join(", ")}`);
  if (request.labelsToRemove?.length) lines.push(`  Remove labels: ${request.labelsToRemove.join(", ")}`);
  if (request.eventSummary) lines.push(`  Event: ${request.eventSummary}`);
  if (request.eventAttendees?.length) lines.push(`  Attendees: ${request.eventAttendees.join(", ")}`);
  if (request.sendUpdates) lines.push(`  Send notifications: ${request.sendUpdates}`);

  lines.push("Allow this request? [y/N]: ");
  return lines.join("\n");
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

export type ConsoleApproverOptions = {
  input?: Readable;
  output?: Writable;
  timeoutMs?: number | null;
};

/**
 * Synchronous operator confirmation over an interactive prompt. At most one
 * prompt is on screen; concurrent callers queue behind the lock in arrival order.
 */
export class ConsoleApprover {
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly timeoutMs: number | null;
  private readonly lock = new SerialLock();
  private reader: readline.Interface | null = null;
  private inputClosed = false;

  constructor(
    private readonly logger: Logger,
    options: ConsoleApproverOptions = {}
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.timeoutMs = options.timeoutMs ?? null;
  }

  async confirm(request: ConfirmationRequest, timeoutMs: number | null = this.timeoutMs): Promise<boolean> {
    const prompt = formatPrompt(request);

    return this.lock.run(async () => {
      const answer = await this.ask(prompt, timeoutMs);

      if (answer === null) {
        this.output.write("\n[TIMEOUT] Confirmation timed out\n");
        this.logger.warn("confirmation_timed_out", { delivery: "console", method: request.method, path: request.path });
        return false;
      }

      const approved = isAffirmative(answer);
      this.output.write(approved ? "[APPROVED]\n" : "[REJECTED]\n");
      return approved;
    });
  }

  close(): void {
    this.inputClosed = true;
    this.reader?.close();
    this.reader = null;
  }

  private readerInterface(): readline.Interface | null {
    if (this.inputClosed) return null;
    if (!this.reader) {
      this.reader = readline.createInterface({ input: this.input, output: this.output, terminal: false });
      this.reader.on("close", () => {
        this.inputClosed = true;
        this.reader = null;
      });
    }
    return this.reader;
  }

  /** Resolves with the raw line, or null when the deadline passes or input closes. */
  private ask(prompt: string, timeoutMs: number | null): Promise<string | null> {
    const reader = this.readerInterface();
    if (!reader) {
      this.output.write(prompt);
      return Promise.resolve(null);
    }
    const controller = new AbortController();

    return new Promise<string | null>((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      const finish = (answer: string | null) => {
        if (timer) clearTimeout(timer);
        reader.off("close", onClose);
        resolve(answer);
      };
      const onClose = () => finish(null);

      reader.once("close", onClose);
      if (timeoutMs !== null) {
        timer = setTimeout(() => {
          controller.abort();
          finish(null);
        }, timeoutMs);
      }
      reader.question(prompt, { signal: controller.signal }, (answer) => finish(answer));
    });
  }
}
