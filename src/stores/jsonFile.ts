import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

export type JsonFileRead =
  | { kind: "missing" }
  | { kind: "invalid"; error: string }
  | { kind: "ok"; value: unknown };

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readJsonFile(filePath: string): Promise<JsonFileRead> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return { kind: "missing" };
    return { kind: "invalid", error: error instanceof Error ? error.message : String(error) };
  }

  try {
    return { kind: "ok", value: JSON.parse(raw) };
  } catch (error) {
    return { kind: "invalid", error: error instanceof Error ? error.message : String(error) };
  }
}

/** Writes through a sibling temp file and renames it over the target. */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
