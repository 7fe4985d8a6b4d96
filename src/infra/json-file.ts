import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export type JsonReadResult =
  | { kind: "missing" }
  | { kind: "ok"; value: unknown }
  | { kind: "invalid"; error: Error };

/**
 * Read and parse a JSON file. Distinguishes a missing file from one that
 * exists but cannot be read or parsed; callers decide which of those is fatal.
 */
export async function readJsonFile(filePath: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return { kind: "missing" };
    }
    return { kind: "invalid", error: err instanceof Error ? err : new Error(String(err)) };
  }
  try {
    const value: unknown = JSON.parse(raw);
    return { kind: "ok", value };
  } catch (err) {
    return { kind: "invalid", error: err instanceof Error ? err : new Error(String(err)) };
  }
}

export function readJsonFileSync(filePath: string): JsonReadResult {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return { kind: "missing" };
    }
    return { kind: "invalid", error: err instanceof Error ? err : new Error(String(err)) };
  }
  try {
    const value: unknown = JSON.parse(raw);
    return { kind: "ok", value };
  } catch (err) {
    return { kind: "invalid", error: err instanceof Error ? err : new Error(String(err)) };
  }
}

/** Write JSON through a temp file + rename so readers never see a partial file. */
export async function writeJsonFileAtomically(
  filePath: string,
  value: unknown,
  opts: { mode?: number } = {},
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  await fs.promises.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf8",
    mode: opts.mode ?? 0o600,
  });
  try {
    await fs.promises.rename(tmpPath, filePath);
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true });
    throw err;
  }
}

export function writeJsonFileAtomicallySync(
  filePath: string,
  value: unknown,
  opts: { mode?: number } = {},
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  fs.writeFileSync(tmpPath, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf8",
    mode: opts.mode ?? 0o600,
  });
  fs.renameSync(tmpPath, filePath);
}
