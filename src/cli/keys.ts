import dotenv from "dotenv";
import { ApiKeyError, ApiKeyStore, maskApiKey } from "../auth/apiKeys";
import { createLogger } from "../config/logger";

export type KeysCommandIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: NodeJS.ProcessEnv;
};

const USAGE =
  "usage: mailcal-gateway-keys <create|list|show|enable|disable|revoke> [--name=<name>] [--api-keys-file=<path>]\n";

function arg(argv: readonly string[], name: string, fallback?: string): string | undefined {
  const prefix = `--${name}=`;
  const row = argv.find((entry) => entry.startsWith(prefix));
  if (!row) return fallback;
  return row.slice(prefix.length);
}

function timestamp(value: string | null, missing: string): string {
  return value ? value.slice(0, 19) : missing;
}

async function listKeys(store: ApiKeyStore, io: KeysCommandIo): Promise<number> {
  const keys = await store.listKeys();
  if (!keys.length) {
    io.stdout("No API keys found.\n");
    return 0;
  }

  const row = (name: string, created: string, lastUsed: string, enabled: string) =>
    `${name.padEnd(20)} ${created.padEnd(20)} ${lastUsed.padEnd(20)} ${enabled.padEnd(8)}\n`;
  io.stdout(row("NAME", "CREATED", "LAST USED", "ENABLED"));
  io.stdout(`${"-".repeat(70)}\n`);
  for (const key of keys) {
    io.stdout(
      row(
        key.name.slice(0, 20),
        timestamp(key.createdAt, "unknown"),
        timestamp(key.lastUsedAt, "never"),
        key.enabled ? "yes" : "no"
      )
    );
  }
  return 0;
}

async function showKey(store: ApiKeyStore, name: string, io: KeysCommandIo): Promise<number> {
  const found = await store.getKeyByName(name);
  if (!found) {
    io.stderr(`Error: API key '${name}' not found\n`);
    return 1;
  }
  const { key, record } = found;
  io.stdout(
    [
      `Name:       ${record.name}`,
      `Key:        ${maskApiKey(key)}`,
      `Created:    ${record.createdAt}`,
      `Last Used:  ${record.lastUsedAt ?? "never"}`,
      `Enabled:    ${record.enabled ? "yes" : "no"}`,
    ].join("\n") + "\n"
  );
  return 0;
}

/** Runs one key-management command; returns the process exit code. */
export async function runKeysCommand(argv: readonly string[], io: KeysCommandIo): Promise<number> {
  const command = argv.find((entry) => !entry.startsWith("--"));
  const filePath = arg(argv, "api-keys-file", io.env?.GATEWAY_API_KEYS_FILE || "api_keys.json") ?? "api_keys.json";
  const logger = createLogger("warn", { write: io.stderr });
  const store = new ApiKeyStore(filePath, logger);

  if (command === "list") {
    return listKeys(store, io);
  }

  const name = arg(argv, "name");
  if (!command || !["create", "show", "enable", "disable", "revoke"].includes(command)) {
    io.stderr(USAGE);
    return 1;
  }
  if (!name) {
    io.stderr(`Error: ${command} requires --name=<name>\n`);
    return 1;
  }

  try {
    return await runNamedCommand(store, command, name, io);
  } catch (error) {
    if (!(error instanceof ApiKeyError)) throw error;
    io.stderr(`Error: ${error.message}\n`);
    return 1;
  }
}

async function runNamedCommand(store: ApiKeyStore, command: string, name: string, io: KeysCommandIo): Promise<number> {
  switch (command) {
    case "create": {
      const key = await store.createKey(name);
      io.stdout(`Created API key '${name}': ${key}\n`);
      return 0;
    }
    case "show":
      return showKey(store, name, io);
    case "enable":
    case "disable": {
      const changed = await store.setEnabled(name, command === "enable");
      if (!changed) {
        io.stderr(`Error: API key '${name}' not found\n`);
        return 1;
      }
      io.stdout(`${command === "enable" ? "Enabled" : "Disabled"} API key '${name}'\n`);
      return 0;
    }
    default: {
      if (!(await store.revokeKey(name))) {
        io.stderr(`Error: API key '${name}' not found\n`);
        return 1;
      }
      io.stdout(`Revoked API key '${name}'\n`);
      return 0;
    }
  }
}

async function main(): Promise<void> {
  dotenv.config();
  process.exitCode = await runKeysCommand(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
  });
}

if (require.main === module) {
  void main().catch((error) => {
    process.stderr.write(`mailcal-gateway-keys fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
    process.exit(1);
  });
}
