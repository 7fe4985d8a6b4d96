import { afterEach, describe, expect, it, vi } from "vitest";
import { callHandler } from "../../../test/helpers/handlers.js";
import { startManagedDevice, type ManagedDevice } from "../../../test/helpers/managers.js";
import { MemoryNetwork } from "../memory-connection.js";
import { createLinkPairingHandlers } from "./pairing.js";
import { createLinkSessionsHandlers } from "./sessions.js";
import { createLinkTrustHandlers } from "./trust.js";
import type { ControlRequestHandlers } from "./types.js";

const devices: ManagedDevice[] = [];

afterEach(async () => {
  await Promise.all(devices.splice(0).map((device) => device.dispose()));
});

function handlersFor(device: ManagedDevice): ControlRequestHandlers {
  return {
    ...createLinkPairingHandlers({ manager: device.manager }),
    ...createLinkSessionsHandlers({ manager: device.manager }),
    ...createLinkTrustHandlers({ manager: device.manager }),
  };
}

async function startPair() {
  const network = new MemoryNetwork();
  const a = await startManagedDevice(network, "device-a", "10.0.0.1");
  const b = await startManagedDevice(network, "device-b", "10.0.0.2");
  devices.push(a, b);
  a.manager.handleDiscoveredPeer({ info: b.manager.localInfo(), address: b.address, discoveredAtMs: 0, lastSeenMs: 0 });
  return { a, b };
}

describe("link.pairing handlers", () => {
  it("runs a pairing request through to a session", async () => {
    const { a, b } = await startPair();

    const requested = await callHandler(handlersFor(a), "link.pairing.request", { deviceId: "device-b" });
    expect(requested.ok).toBe(true);
    expect(requested.payload).toMatchObject({ attempt: { deviceId: "device-b", direction: "outgoing" } });

    await vi.waitFor(async () => {
      const pending = await callHandler(handlersFor(b), "link.pairing.pending");
      expect(pending.payload).toMatchObject({ pending: [{ deviceId: "device-a", direction: "incoming" }] });
    });

    const accepted = await callHandler(handlersFor(b), "link.pairing.respond", { deviceId: "device-a", accept: true });
    expect(accepted).toMatchObject({ ok: true, payload: { attempt: { deviceId: "device-a", state: "paired" } } });

    await vi.waitFor(() => expect(a.manager.getSession("device-b")).not.toBeNull());
    const sessions = await callHandler(handlersFor(a), "link.sessions.list");
    expect(sessions.payload).toMatchObject({ sessions: [{ deviceId: "device-b", fingerprint: b.device.fingerprint }] });

    const trusted = await callHandler(handlersFor(b), "link.trust.list");
    expect(trusted.payload).toMatchObject({
      devices: [{ deviceId: "device-a", fingerprint: a.device.fingerprint, plugins: {}, connected: true }],
    });
  });

  it("rejects malformed params", async () => {
    const { a } = await startPair();
    const missing = await callHandler(handlersFor(a), "link.pairing.respond", { deviceId: "device-b" });
    expect(missing).toEqual({
      ok: false,
      payload: undefined,
      error: { code: "INVALID_PARAMS", message: "accept: Required" },
    });

    const extra = await callHandler(handlersFor(a), "link.connect", { deviceId: "device-b", force: true });
    expect(extra.ok).toBe(false);
    expect(extra.error?.code).toBe("INVALID_PARAMS");
  });

  it("maps manager errors to their codes", async () => {
    const { a } = await startPair();
    const noRequest = await callHandler(handlersFor(a), "link.pairing.respond", { deviceId: "device-b", accept: true });
    expect(noRequest.error).toEqual({ code: "NO_PENDING_REQUEST", message: "no pairing request from device-b" });

    const notPaired = await callHandler(handlersFor(a), "link.connect", { deviceId: "device-b" });
    expect(notPaired.error).toEqual({ code: "NOT_PAIRED", message: "device device-b is not paired" });

    const plugin = await callHandler(handlersFor(a), "link.plugin.set", {
      deviceId: "device-b",
      pluginId: "ping",
      enabled: false,
    });
    expect(plugin.error).toEqual({ code: "NOT_PAIRED", message: "device device-b is not paired" });
  });

  it("disconnects, unpairs and toggles plugins for paired devices", async () => {
    const { a, b } = await startPair();
    await a.trustStore.pin({ deviceId: "device-b", publicKey: b.device.publicKey, fingerprint: b.device.fingerprint });
    await b.trustStore.pin({ deviceId: "device-a", publicKey: a.device.publicKey, fingerprint: a.device.fingerprint });

    const connected = await callHandler(handlersFor(a), "link.connect", { deviceId: "device-b" });
    expect(connected).toMatchObject({ ok: true, payload: { session: { deviceId: "device-b", outbound: true } } });

    const plugin = await callHandler(handlersFor(a), "link.plugin.set", {
      deviceId: "device-b",
      pluginId: "clipboard",
      enabled: false,
    });
    expect(plugin.payload).toEqual({ deviceId: "device-b", pluginId: "clipboard", enabled: false });
    expect(a.trustStore.isPluginEnabled("device-b", "clipboard")).toBe(false);

    const disconnected = await callHandler(handlersFor(a), "link.disconnect", { deviceId: "device-b" });
    expect(disconnected.payload).toEqual({ disconnected: true });

    const unpaired = await callHandler(handlersFor(a), "link.unpair", { deviceId: "device-b" });
    expect(unpaired.payload).toEqual({ removed: true });
    const again = await callHandler(handlersFor(a), "link.unpair", { deviceId: "device-b" });
    expect(again.payload).toEqual({ removed: false });

    const events = await callHandler(handlersFor(a), "link.security.events");
    expect(events.payload).toEqual({ events: [] });
  });
});
