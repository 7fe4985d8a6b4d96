import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { withTempHome } from "../../test/helpers/temp-home.js";
import { ConfigError } from "../infra/errors.js";
import { loadLinkConfig, parseLinkConfig } from "./load.js";
import { resolveConfigPath } from "./paths.js";

describe("parseLinkConfig", () => {
  it("fills in defaults", () => {
    const config = parseLinkConfig({ deviceName: "Workstation" });
    expect(config).toEqual({
      deviceName: "Workstation",
      deviceType: "desktop",
      host: "0.0.0.0",
      port: 1716,
      controlPort: 1764,
      discovery: {
        enabled: true,
        port: 1716,
        broadcastAddresses: ["255.255.255.255"],
        intervalMs: 5_000,
        missedAnnouncements: 6,
      },
      reconnect: { baseMs: 1_000, maxMs: 30_000, multiplier: 2 },
      pairingTimeoutMs: 30_000,
      keepAliveIntervalMs: 30_000,
      connectionTimeoutMs: 60_000,
      disabledPlugins: [],
    });
  });

  it("defaults the device name to something non-empty", () => {
    expect(parseLinkConfig({}).deviceName.length).toBeGreaterThan(0);
  });

  it("rejects unknown keys with their path", () => {
    expect(() => parseLinkConfig({ discovery: { enabled: true, ttl: 3 } }, "config.json")).toThrow(
      "config.json is invalid: discovery: Unrecognized key(s) in object: 'ttl'",
    );
  });

  it("rejects a keepalive interval that is not below the connection timeout", () => {
    expect(() => parseLinkConfig({ keepAliveIntervalMs: 60_000, connectionTimeoutMs: 60_000 })).toThrow(
      "config is invalid: connectionTimeoutMs must exceed keepAliveIntervalMs",
    );
  });

  it("rejects a reconnect ceiling below its base", () => {
    expect(() => parseLinkConfig({ reconnect: { baseMs: 5_000, maxMs: 1_000 } })).toThrow(
      "config is invalid: reconnect: reconnect.maxMs must be >= reconnect.baseMs",
    );
  });

  it("throws ConfigError", () => {
    expect(() => parseLinkConfig({ port: 70_000 })).toThrow(ConfigError);
  });
});

describe("loadLinkConfig", () => {
  it("returns defaults when the file is missing", async () => {
    await withTempHome(async () => {
      const config = await loadLinkConfig();
      expect(config.port).toBe(1716);
      expect(config.discovery.enabled).toBe(true);
    });
  });

  it("reads the file from the state dir", async () => {
    await withTempHome(async (stateDir) => {
      await fs.writeFile(
        path.join(stateDir, "config.json"),
        JSON.stringify({ deviceName: "Laptop", deviceType: "laptop", disabledPlugins: ["clipboard"] }),
      );
      const config = await loadLinkConfig();
      expect(config.deviceName).toBe("Laptop");
      expect(config.deviceType).toBe("laptop");
      expect(config.disabledPlugins).toEqual(["clipboard"]);
    });
  });

  it("names the file when it cannot be parsed", async () => {
    await withTempHome(async () => {
      const filePath = resolveConfigPath();
      await fs.writeFile(filePath, "{ not json");
      await expect(loadLinkConfig()).rejects.toThrow(`${filePath} is unreadable:`);
    });
  });
});
