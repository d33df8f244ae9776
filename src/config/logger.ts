import fs from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => void;
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
};

export type LoggerOptions = {
  /** Append every line to this file as well, creating its directory. */
  filePath?: string;
  /** Primary sink; stdout when omitted. */
  write?: (line: string) => void;
  now?: () => Date;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// Meta keys that carry credentials: OAuth tokens, client secrets, API keys, headers.
const SECRET_KEY_PATTERN = /password|secret|token|authorization|api_?key/i;
// Gateway API keys can also show up inside otherwise harmless values (paths, messages).
const API_KEY_VALUE_PATTERN = /mcg_[a-z0-9]{8,}/g;

function redactString(value: string): string {
  return value.replace(API_KEY_VALUE_PATTERN, "mcg_[redacted]");
}

export function sanitize(value: unknown): unknown {
  if (typeof value === "string") return redactString(value);
  if (Array.isArray(value)) return value.map(sanitize);
  if (value === null || typeof value !== "object") return value;

  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [key, SECRET_KEY_PATTERN.test(key) ? "[redacted]" : sanitize(inner)])
  );
}

function appendTo(filePath: string): (line: string) => void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  return (line) => fs.appendFileSync(filePath, line);
}

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const sinks = [options.write ?? ((line: string) => void process.stdout.write(line))];
  if (options.filePath) sinks.push(appendTo(options.filePath));
  const now = options.now ?? (() => new Date());

  const emit =
    (lvl: LogLevel) =>
    (msg: string, meta?: Record<string, unknown>): void => {
      if (LEVEL_RANK[lvl] < LEVEL_RANK[level]) return;
      const entry = meta ? { at: now().toISOString(), level: lvl, msg, meta: sanitize(meta) } : { at: now().toISOString(), level: lvl, msg };
      const line = `${JSON.stringify(entry)}\n`;
      for (const sink of sinks) sink(line);
    };

  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
