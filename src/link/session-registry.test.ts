import { describe, expect, it } from "vitest";
import { createTestDevice } from "../../test/helpers/identities.js";
import { SILENT_LOGGER } from "../infra/logger.js";
import { DeviceLink } from "./device-link.js";
import { createMemoryConnectionPair } from "./memory-connection.js";
import { preferLink, type Session, SessionRegistry, summarizeSession } from "./session-registry.js";
import type { AuthenticatedPeer } from "./types.js";

const peer: AuthenticatedPeer = {
  info: {
    deviceId: "peer-b",
    deviceName: "Peer B",
    deviceType: "laptop",
    protocolVersion: 7,
    incomingCapabilities: [],
    outgoingCapabilities: [],
  },
  publicKey: "key",
  fingerprint: "AA:BB",
};

describe("preferLink", () => {
  it("prefers the link dialed by the smaller device id", () => {
    expect(
      preferLink({
        localDeviceId: "peer-a",
        peerDeviceId: "peer-b",
        existing: { initiatorDeviceId: "peer-b" },
        candidate: { initiatorDeviceId: "peer-a" },
      }),
    ).toBe("candidate");
    expect(
      preferLink({
        localDeviceId: "peer-b",
        peerDeviceId: "peer-a",
        existing: { initiatorDeviceId: "peer-b" },
        candidate: { initiatorDeviceId: "peer-a" },
      }),
    ).toBe("candidate");
  });

  it("keeps the existing link when it was dialed by the smaller device id", () => {
    expect(
      preferLink({
        localDeviceId: "peer-a",
        peerDeviceId: "peer-b",
        existing: { initiatorDeviceId: "peer-a" },
        candidate: { initiatorDeviceId: "peer-b" },
      }),
    ).toBe("existing");
  });

  it("takes the newer link when the same device dialed both", () => {
    expect(
      preferLink({
        localDeviceId: "peer-a",
        peerDeviceId: "peer-b",
        existing: { initiatorDeviceId: "peer-a" },
        candidate: { initiatorDeviceId: "peer-a" },
      }),
    ).toBe("candidate");
    expect(
      preferLink({
        localDeviceId: "peer-b",
        peerDeviceId: "peer-a",
        existing: { initiatorDeviceId: "peer-b" },
        candidate: { initiatorDeviceId: "peer-b" },
      }),
    ).toBe("candidate");
  });
});

const local = createTestDevice("peer-a");

function createLink(outbound: boolean): DeviceLink {
  const [connection] = createMemoryConnectionPair({ hostA: "192.168.1.30" });
  return new DeviceLink({
    connection,
    outbound,
    identity: local.identity,
    localInfo: { ...peer.info, deviceId: "peer-a", deviceName: "Peer A" },
    log: SILENT_LOGGER,
  });
}

function createSession(link: DeviceLink): Session {
  return {
    deviceId: "peer-b",
    link,
    peer,
    capabilities: { receivable: ["devicelink.ping"], sendable: ["devicelink.ping"] },
    outbound: link.outbound,
    initiatorDeviceId: link.outbound ? "peer-a" : "peer-b",
    connectedAtMs: 1_000,
  };
}

describe("SessionRegistry", () => {
  it("indexes sessions by device and by link", () => {
    const registry = new SessionRegistry();
    const link = createLink(true);
    registry.register(createSession(link));

    expect(registry.has("peer-b")).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.get("peer-b")?.link).toBe(link);
    expect(registry.list().map((session) => session.deviceId)).toEqual(["peer-b"]);
  });

  it("moves a session onto a new link and ignores the old link afterwards", () => {
    const registry = new SessionRegistry();
    const first = createLink(false);
    const second = createLink(true);
    registry.register(createSession(first));

    const replaced = registry.replaceLink("peer-b", {
      link: second,
      outbound: true,
      initiatorDeviceId: "peer-a",
      address: { host: "192.168.1.30", port: 1716 },
    });

    expect(replaced).toBe(first);
    const session = registry.get("peer-b");
    expect(session?.link).toBe(second);
    expect(session?.initiatorDeviceId).toBe("peer-a");
    expect(session?.connectedAtMs).toBe(1_000);
    expect(session?.address).toEqual({ host: "192.168.1.30", port: 1716 });

    expect(registry.unregister(first.linkId)).toBeNull();
    expect(registry.has("peer-b")).toBe(true);
    expect(registry.unregister(second.linkId)?.deviceId).toBe("peer-b");
    expect(registry.has("peer-b")).toBe(false);
  });

  it("replaces nothing for an unknown device", () => {
    const registry = new SessionRegistry();
    expect(registry.replaceLink("peer-z", { link: createLink(true), outbound: true, initiatorDeviceId: "peer-a" })).toBeNull();
  });

  it("summarizes a session without sharing its arrays", () => {
    const link = createLink(true);
    const session = createSession(link);
    const summary = summarizeSession(session);
    expect(summary).toEqual({
      deviceId: "peer-b",
      deviceName: "Peer B",
      deviceType: "laptop",
      fingerprint: "AA:BB",
      protocolVersion: 7,
      outbound: true,
      remoteAddress: "192.168.1.30",
      connectedAtMs: 1_000,
      lastActivityMs: link.lastActivityMs,
      capabilities: { receivable: ["devicelink.ping"], sendable: ["devicelink.ping"] },
    });
    summary.capabilities.sendable.push("devicelink.share.request");
    expect(session.capabilities.sendable).toEqual(["devicelink.ping"]);
  });
});
