import { afterEach, describe, expect, it, vi } from "vitest";
import { PairingError } from "../infra/errors.js";
import { type PairingAttempt, PairingManager } from "./pairing.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("PairingManager", () => {
  it("starts an incoming attempt awaiting a decision", () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000);
    const pairing = new PairingManager({ timeoutMs: 5_000 });
    const started: PairingAttempt[] = [];
    pairing.on("started", (attempt) => started.push(attempt));

    const attempt = pairing.begin({
      deviceId: "peer-a",
      direction: "incoming",
      linkId: "link-1",
      peerFingerprint: "AA:BB",
      deviceName: "Phone",
    });

    expect(attempt).toEqual({
      deviceId: "peer-a",
      direction: "incoming",
      state: "awaiting-decision",
      linkId: "link-1",
      peerFingerprint: "AA:BB",
      deviceName: "Phone",
      createdAtMs: 1_000,
      expiresAtMs: 6_000,
    });
    expect(started).toEqual([attempt]);
    expect(pairing.listPending()).toEqual([attempt]);
  });

  it("allows one attempt per device", () => {
    const pairing = new PairingManager();
    pairing.begin({ deviceId: "peer-a", direction: "outgoing", linkId: null });
    expect(() => pairing.begin({ deviceId: "peer-a", direction: "incoming", linkId: "link-2" })).toThrow(PairingError);
    pairing.cancelAll("shutdown");
  });

  it("moves an outgoing attempt to awaiting-decision once a link is attached", () => {
    const pairing = new PairingManager();
    const attempt = pairing.begin({ deviceId: "peer-a", direction: "outgoing", linkId: null });
    expect(attempt.state).toBe("awaiting-certificate");
    expect(pairing.attachLink("peer-a", "link-1", "AA:BB")).toMatchObject({
      state: "awaiting-decision",
      linkId: "link-1",
      peerFingerprint: "AA:BB",
    });
    expect(pairing.attachLink("peer-b", "link-2", "CC:DD")).toBeNull();
    pairing.cancelAll("shutdown");
  });

  it("expires attempts with reason timeout", async () => {
    vi.useFakeTimers();
    const pairing = new PairingManager({ timeoutMs: 5_000 });
    const expired: PairingAttempt[] = [];
    const resolved: PairingAttempt[] = [];
    pairing.on("expired", (attempt) => expired.push(attempt));
    pairing.on("resolved", (attempt) => resolved.push(attempt));
    pairing.begin({ deviceId: "peer-a", direction: "incoming", linkId: "link-1", peerFingerprint: "AA:BB" });

    await vi.advanceTimersByTimeAsync(4_999);
    expect(expired).toEqual([]);
    await vi.advanceTimersByTimeAsync(1);

    expect(expired).toHaveLength(1);
    expect(expired[0]).toMatchObject({ deviceId: "peer-a", state: "expired", reason: "timeout" });
    expect(resolved).toEqual(expired);
    expect(pairing.get("peer-a")).toBeNull();
  });

  it("does not expire an attempt that was resolved first", async () => {
    vi.useFakeTimers();
    const pairing = new PairingManager({ timeoutMs: 5_000 });
    const expired: PairingAttempt[] = [];
    pairing.on("expired", (attempt) => expired.push(attempt));
    pairing.begin({ deviceId: "peer-a", direction: "incoming", linkId: "link-1", peerFingerprint: "AA:BB" });

    expect(pairing.resolve("peer-a", "paired")).toMatchObject({ state: "paired" });
    expect(pairing.resolve("peer-a", "rejected")).toBeNull();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(expired).toEqual([]);
  });

  it("cancels only the attempts running on a closed link", () => {
    const pairing = new PairingManager();
    pairing.begin({ deviceId: "peer-a", direction: "incoming", linkId: "link-1", peerFingerprint: "AA:BB" });
    pairing.begin({ deviceId: "peer-b", direction: "incoming", linkId: "link-2", peerFingerprint: "CC:DD" });

    const cancelled = pairing.cancelForLink("link-1", "link closed");
    expect(cancelled).toHaveLength(1);
    expect(cancelled[0]).toMatchObject({ deviceId: "peer-a", state: "cancelled", reason: "link closed" });
    expect(pairing.listPending().map((attempt) => attempt.deviceId)).toEqual(["peer-b"]);
    pairing.cancelAll("shutdown");
    expect(pairing.listPending()).toEqual([]);
  });

  it("tracks the cooldown a rejecting peer asked for", () => {
    vi.useFakeTimers();
    vi.setSystemTime(20_000);
    const pairing = new PairingManager();
    expect(pairing.cooldownRemaining("peer-a")).toBe(0);

    pairing.setCooldown("peer-a", 60_000);
    expect(pairing.cooldownRemaining("peer-a")).toBe(60_000);
    expect(pairing.cooldownRemaining("peer-a", 50_000)).toBe(30_000);
    expect(pairing.cooldownRemaining("peer-a", 80_000)).toBe(0);
    expect(pairing.cooldownRemaining("peer-a", 50_000)).toBe(0);

    pairing.setCooldown("peer-b", 1_000);
    pairing.clearCooldown("peer-b");
    expect(pairing.cooldownRemaining("peer-b")).toBe(0);
  });
});
