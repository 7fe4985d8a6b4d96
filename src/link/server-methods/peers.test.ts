import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { callHandler } from "../../../test/helpers/handlers.js";
import { startManagedDevice, type ManagedDevice } from "../../../test/helpers/managers.js";
import { SILENT_LOGGER } from "../../infra/logger.js";
import { type AnnouncementSocket, LanDiscovery } from "../discovery.js";
import { MemoryNetwork } from "../memory-connection.js";
import { buildIdentityPacket, encodePacket } from "../packet.js";
import { createLinkPeersHandlers } from "./peers.js";
import type { ControlRequestHandlers } from "./types.js";

const idleSocket: AnnouncementSocket = {
  bind: async () => {},
  send: async () => {},
  onMessage: () => {},
  close: async () => {},
};

function announce(discovery: LanDiscovery, deviceId: string, host: string): void {
  const frame = encodePacket(
    buildIdentityPacket({
      deviceId,
      deviceName: `Device ${deviceId}`,
      deviceType: "phone",
      protocolVersion: 7,
      incomingCapabilities: [],
      outgoingCapabilities: [],
      tcpPort: 1716,
    }),
  );
  discovery.handleDatagram(Buffer.from(frame, "utf8"), { host, port: 1716 });
}

describe("link.peers handlers", () => {
  let local: ManagedDevice;
  let discovery: LanDiscovery;
  let handlers: ControlRequestHandlers;

  beforeEach(async () => {
    local = await startManagedDevice(new MemoryNetwork(), "device-local", "10.0.0.1");
    discovery = new LanDiscovery({ localInfo: () => local.manager.localInfo(), socket: idleSocket, log: SILENT_LOGGER });
    handlers = createLinkPeersHandlers({ manager: local.manager, discovery });
  });

  afterEach(async () => {
    await local.dispose();
  });

  it("link.peers.list returns discovered devices sorted by id", async () => {
    announce(discovery, "phone-b", "10.0.0.9");
    announce(discovery, "phone-a", "10.0.0.8");
    await local.trustStore.pin({
      deviceId: "phone-b",
      publicKey: local.device.publicKey,
      fingerprint: local.device.fingerprint,
    });

    const { ok, payload } = await callHandler(handlers, "link.peers.list");
    expect(ok).toBe(true);
    expect(payload).toEqual({
      peers: [
        expect.objectContaining({ deviceId: "phone-a", host: "10.0.0.8", port: 1716, trusted: false, connected: false }),
        expect.objectContaining({
          deviceId: "phone-b",
          deviceName: "Device phone-b",
          deviceType: "phone",
          protocolVersion: 7,
          trusted: true,
          connected: false,
        }),
      ],
    });
  });

  it("link.peers.list is empty without discovery", async () => {
    const { ok, payload } = await callHandler(
      createLinkPeersHandlers({ manager: local.manager, discovery: null }),
      "link.peers.list",
    );
    expect(ok).toBe(true);
    expect(payload).toEqual({ peers: [] });
  });

  it("link.status reports the manager and discovery", async () => {
    announce(discovery, "phone-a", "10.0.0.8");
    const { ok, payload } = await callHandler(handlers, "link.status");
    expect(ok).toBe(true);
    expect(payload).toEqual({
      deviceId: "device-local",
      deviceName: "Device device-local",
      protocolVersion: 7,
      sessions: 0,
      pendingPairings: 0,
      trustedDevices: 0,
      reconnecting: [],
      plugins: ["ping", "clipboard", "share"],
      discovery: true,
      discoveredPeers: 1,
    });
  });
});
