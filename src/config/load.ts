import { ConfigError } from "../infra/errors.js";
import { readJsonFile } from "../infra/json-file.js";
import { resolveConfigPath } from "./paths.js";
import type { LinkConfig } from "./types.link.js";
import { LinkConfigSchema } from "./zod-schema.link.js";

export function parseLinkConfig(value: unknown, source = "config"): LinkConfig {
  const parsed = LinkConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(`${source} is invalid: ${where}${issue?.message ?? "schema mismatch"}`);
  }
  return parsed.data;
}

/** Read the config file; a missing file yields the defaults. */
export async function loadLinkConfig(filePath: string = resolveConfigPath()): Promise<LinkConfig> {
  const read = await readJsonFile(filePath);
  if (read.kind === "missing") {
    return parseLinkConfig({}, filePath);
  }
  if (read.kind === "invalid") {
    throw new ConfigError(`${filePath} is unreadable: ${read.error.message}`, { cause: read.error });
  }
  return parseLinkConfig(read.value, filePath);
}
