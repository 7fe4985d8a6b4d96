import { afterEach, describe, expect, it, vi } from "vitest";
import { createTestDevice, type TestDevice } from "../../test/helpers/identities.js";
import { DeviceLinkError } from "../infra/errors.js";
import type { ConnectionCloseInfo } from "./connection.js";
import { DeviceLink, LinkCloseCode } from "./device-link.js";
import { buildCertificate, createNonce } from "./handshake.js";
import { createMemoryConnectionPair, type MemoryPacketConnection } from "./memory-connection.js";
import { buildIdentityPacket, createPacket, PACKET_TYPE_CERTIFICATE } from "./packet.js";
import { PROTOCOL_VERSION, type AuthenticatedPeer, type DeviceInfo } from "./types.js";

const laptop = createTestDevice("laptop_1");
const phone = createTestDevice("phone_1");
const mallory = createTestDevice("mallory_1");

function infoFor(deviceId: string, overrides: Partial<DeviceInfo> = {}): DeviceInfo {
  return {
    deviceId,
    deviceName: deviceId,
    deviceType: "desktop",
    protocolVersion: PROTOCOL_VERSION,
    incomingCapabilities: [],
    outgoingCapabilities: [],
    ...overrides,
  };
}

function startLink(
  device: TestDevice,
  connection: MemoryPacketConnection,
  opts: { outbound: boolean; expectedDeviceId?: string; localInfo?: DeviceInfo },
) {
  const link = new DeviceLink({
    connection,
    outbound: opts.outbound,
    identity: device.identity,
    localInfo: opts.localInfo ?? infoFor(device.identity.deviceId),
    ...(opts.expectedDeviceId ? { expectedDeviceId: opts.expectedDeviceId } : {}),
  });
  const events: string[] = [];
  const closes: ConnectionCloseInfo[] = [];
  let peer: AuthenticatedPeer | null = null;
  link.on("authenticated", (authenticated) => {
    peer = authenticated;
    events.push("authenticated");
  });
  link.on("packet", (packet) => events.push(`packet:${packet.type}`));
  link.on("closed", (info) => closes.push(info));
  link.start();
  return { link, events, closes, peer: () => peer };
}

/** The far end of a connection driven by hand instead of by a DeviceLink. */
function rawEnd(connection: MemoryPacketConnection) {
  const received: string[] = [];
  const closes: ConnectionCloseInfo[] = [];
  connection.on("packet", (packet) => received.push(packet.type));
  connection.on("close", (info) => closes.push(info));
  connection.resume();
  return { received, closes };
}

describe("DeviceLink", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("authenticates both ends and records who dialed", async () => {
    const [a, b] = createMemoryConnectionPair({ hostA: "10.0.0.2", hostB: "10.0.0.1" });
    const dialer = startLink(laptop, a, { outbound: true, expectedDeviceId: "phone_1" });
    const listener = startLink(phone, b, { outbound: false });

    await vi.waitFor(() => {
      expect(dialer.link.state).toBe("authenticated");
      expect(listener.link.state).toBe("authenticated");
    });
    expect(dialer.peer()?.fingerprint).toBe(phone.fingerprint);
    expect(listener.peer()?.fingerprint).toBe(laptop.fingerprint);
    expect(listener.peer()?.publicKey).toBe(laptop.publicKey);
    expect(dialer.link.initiatorDeviceId).toBe("laptop_1");
    expect(listener.link.initiatorDeviceId).toBe("laptop_1");
    expect(listener.link.remoteAddress).toBe("10.0.0.1");
  });

  it("authenticates when the peer's handshake is already waiting at start", async () => {
    const [a, b] = createMemoryConnectionPair();
    const listener = startLink(phone, b, { outbound: false });
    // Let the listener's identity and certificate reach the dialer's paused end.
    await new Promise((resolve) => setTimeout(resolve, 0));
    const dialer = startLink(laptop, a, { outbound: true, expectedDeviceId: "phone_1" });

    await vi.waitFor(() => {
      expect(dialer.link.state).toBe("authenticated");
      expect(listener.link.state).toBe("authenticated");
    });
    expect(dialer.closes).toEqual([]);
    expect(listener.closes).toEqual([]);
  });

  it("sends its own certificate before answering a buffered one", async () => {
    const [a, b] = createMemoryConnectionPair();
    const far = rawEnd(b);
    b.send(buildIdentityPacket(infoFor("phone_1")));
    b.send(createPacket(PACKET_TYPE_CERTIFICATE, { ...buildCertificate({ identity: phone.identity, nonce: createNonce() }) }));
    await new Promise((resolve) => setTimeout(resolve, 0));
    startLink(laptop, a, { outbound: true });

    await vi.waitFor(() => expect(far.received).toHaveLength(3));
    expect(far.received).toEqual(["devicelink.identity", "devicelink.certificate", "devicelink.auth"]);
  });

  it("holds packets that arrive before authentication and delivers them after", async () => {
    const [a, b] = createMemoryConnectionPair();
    startLink(laptop, a, { outbound: true });
    a.send(createPacket("devicelink.ping"));
    const listener = startLink(phone, b, { outbound: false });

    await vi.waitFor(() => expect(listener.events).toEqual(["authenticated", "packet:devicelink.ping"]));
  });

  it("refuses to send before authentication", () => {
    const [a] = createMemoryConnectionPair();
    const { link } = startLink(laptop, a, { outbound: true });
    expect(() => link.send(createPacket("devicelink.ping"))).toThrow(DeviceLinkError);
  });

  it("closes when the dialed device is not the one expected", async () => {
    const [a, b] = createMemoryConnectionPair();
    const dialer = startLink(laptop, a, { outbound: true, expectedDeviceId: "tablet_1" });
    const listener = startLink(phone, b, { outbound: false });

    await vi.waitFor(() => expect(listener.closes).toHaveLength(1));
    expect(dialer.closes[0]).toMatchObject({
      code: LinkCloseCode.PROTOCOL_ERROR,
      reason: "unexpected device id",
      initiatedLocally: true,
    });
    expect(listener.closes[0]).toMatchObject({ code: LinkCloseCode.PROTOCOL_ERROR, initiatedLocally: false });
  });

  it("closes a connection to itself", async () => {
    const [a, b] = createMemoryConnectionPair();
    const one = startLink(laptop, a, { outbound: true });
    startLink(laptop, b, { outbound: false });
    await vi.waitFor(() => expect(one.closes).toHaveLength(1));
    expect(one.closes[0]?.code).toBe(LinkCloseCode.PROTOCOL_ERROR);
  });

  it("rejects a certificate signed by a different key", async () => {
    const [a, b] = createMemoryConnectionPair();
    const link = startLink(laptop, a, { outbound: true });
    const far = rawEnd(b);
    b.send(buildIdentityPacket(infoFor("phone_1")));
    b.send(
      createPacket(PACKET_TYPE_CERTIFICATE, {
        ...buildCertificate({ identity: mallory.identity, nonce: createNonce() }),
        deviceId: "phone_1",
      }),
    );

    await vi.waitFor(() => expect(far.closes).toHaveLength(1));
    expect(link.closes[0]).toMatchObject({
      code: LinkCloseCode.AUTH_FAILED,
      reason: "certificate signature is invalid",
    });
    expect(link.link.state).toBe("closed");
  });

  it("rejects peers below the minimum protocol version", async () => {
    const [a, b] = createMemoryConnectionPair();
    const link = startLink(laptop, a, { outbound: true });
    const far = rawEnd(b);
    b.send(buildIdentityPacket(infoFor("phone_1", { protocolVersion: PROTOCOL_VERSION - 1 })));

    await vi.waitFor(() => expect(far.closes).toHaveLength(1));
    expect(link.closes[0]).toMatchObject({
      code: LinkCloseCode.PROTOCOL_ERROR,
      reason: `unsupported protocol version ${PROTOCOL_VERSION - 1}`,
    });
  });

  it("accepts peers on a newer protocol version", async () => {
    const [a, b] = createMemoryConnectionPair();
    const dialer = startLink(laptop, a, { outbound: true });
    startLink(phone, b, { outbound: false, localInfo: infoFor("phone_1", { protocolVersion: PROTOCOL_VERSION + 1 }) });
    await vi.waitFor(() => expect(dialer.link.state).toBe("authenticated"));
    expect(dialer.peer()?.info.protocolVersion).toBe(PROTOCOL_VERSION + 1);
  });

  it("rejects a certificate sent before the identity", async () => {
    const [a, b] = createMemoryConnectionPair();
    const link = startLink(laptop, a, { outbound: true });
    rawEnd(b);
    b.send(createPacket(PACKET_TYPE_CERTIFICATE, { ...buildCertificate({ identity: phone.identity, nonce: createNonce() }) }));
    await vi.waitFor(() => expect(link.closes).toHaveLength(1));
    expect(link.closes[0]?.reason).toBe("certificate before identity");
  });

  it("gives up when the handshake does not finish in time", async () => {
    vi.useFakeTimers();
    const [a, b] = createMemoryConnectionPair();
    const link = startLink(laptop, a, { outbound: true });
    const far = rawEnd(b);

    await vi.advanceTimersByTimeAsync(9_999);
    expect(link.closes).toEqual([]);
    await vi.advanceTimersByTimeAsync(1);
    await vi.waitFor(() => expect(link.closes).toHaveLength(1));
    expect(link.closes[0]).toMatchObject({ code: LinkCloseCode.HANDSHAKE_TIMEOUT, reason: "handshake timed out" });
    expect(far.received).toEqual(["devicelink.identity", "devicelink.certificate"]);
  });
});
