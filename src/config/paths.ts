import os from "node:os";
import path from "node:path";

export const STATE_DIR_ENV = "DEVICELINK_STATE_DIR";

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[STATE_DIR_ENV]?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), ".devicelink");
}

export function resolveIdentityPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, "identity.json");
}

export function resolveTrustStorePath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, "trusted-devices.json");
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, "config.json");
}
