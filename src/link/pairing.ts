import { EventEmitter } from "node:events";
import { PairingError } from "../infra/errors.js";
import { SILENT_LOGGER, shortId, type LinkLogger } from "../infra/logger.js";
import type { DeviceType } from "./types.js";

export const DEFAULT_PAIRING_TIMEOUT_MS = 30_000;
export const DEFAULT_PAIRING_RETRY_AFTER_MS = 60_000;

export type PairingDirection = "outgoing" | "incoming";

export type PairingState =
  | "awaiting-certificate"
  | "awaiting-decision"
  | "paired"
  | "rejected"
  | "expired"
  | "certificate-mismatch"
  | "cancelled";

export type PairingOutcome = Exclude<PairingState, "awaiting-certificate" | "awaiting-decision">;

export type PairingAttempt = {
  deviceId: string;
  direction: PairingDirection;
  state: PairingState;
  /** Link the attempt runs on; null while an outgoing dial is in progress. */
  linkId: string | null;
  peerFingerprint?: string;
  deviceName?: string;
  deviceType?: DeviceType;
  createdAtMs: number;
  expiresAtMs: number;
  reason?: string;
};

export type PairingManagerEvents = {
  started: [attempt: PairingAttempt];
  resolved: [attempt: PairingAttempt];
  /** The local timer ran out (as opposed to the peer reporting a timeout). */
  expired: [attempt: PairingAttempt];
};

type ActiveAttempt = {
  attempt: PairingAttempt;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * In-flight pairing attempts, at most one per device, plus the cooldowns a
 * peer imposed by rejecting us. Nothing here is persisted; the connection
 * manager does the packet exchange and the pinning.
 */
export class PairingManager extends EventEmitter<PairingManagerEvents> {
  private readonly timeoutMs: number;
  private readonly log: LinkLogger;
  private attempts = new Map<string, ActiveAttempt>();
  private cooldownUntil = new Map<string, number>();

  constructor(opts: { timeoutMs?: number; log?: LinkLogger } = {}) {
    super();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_PAIRING_TIMEOUT_MS;
    this.log = opts.log ?? SILENT_LOGGER;
  }

  begin(params: {
    deviceId: string;
    direction: PairingDirection;
    linkId: string | null;
    peerFingerprint?: string;
    deviceName?: string;
    deviceType?: DeviceType;
  }): PairingAttempt {
    if (this.attempts.has(params.deviceId)) {
      throw new PairingError("PAIRING_IN_PROGRESS", `pairing with ${params.deviceId} is already in progress`);
    }
    const now = Date.now();
    const attempt: PairingAttempt = {
      deviceId: params.deviceId,
      direction: params.direction,
      state: params.linkId && params.peerFingerprint ? "awaiting-decision" : "awaiting-certificate",
      linkId: params.linkId,
      ...(params.peerFingerprint ? { peerFingerprint: params.peerFingerprint } : {}),
      ...(params.deviceName ? { deviceName: params.deviceName } : {}),
      ...(params.deviceType ? { deviceType: params.deviceType } : {}),
      createdAtMs: now,
      expiresAtMs: now + this.timeoutMs,
    };
    const timer = setTimeout(() => {
      if (this.attempts.get(attempt.deviceId)?.attempt === attempt) {
        this.log.info(`pairing: request ${attempt.direction === "outgoing" ? "to" : "from"} ${shortId(attempt.deviceId)} expired`);
        const final = this.resolve(attempt.deviceId, "expired", "timeout");
        if (final) {
          this.emit("expired", final);
        }
      }
    }, this.timeoutMs);
    timer.unref?.();
    this.attempts.set(attempt.deviceId, { attempt, timer });
    this.emit("started", { ...attempt });
    return { ...attempt };
  }

  /** Bind an outgoing attempt to the link whose certificate has been verified. */
  attachLink(deviceId: string, linkId: string, peerFingerprint: string): PairingAttempt | null {
    const active = this.attempts.get(deviceId);
    if (!active) {
      return null;
    }
    active.attempt.linkId = linkId;
    active.attempt.peerFingerprint = peerFingerprint;
    active.attempt.state = "awaiting-decision";
    return { ...active.attempt };
  }

  get(deviceId: string): PairingAttempt | null {
    const active = this.attempts.get(deviceId);
    return active ? { ...active.attempt } : null;
  }

  listPending(): PairingAttempt[] {
    return [...this.attempts.values()]
      .map((active) => ({ ...active.attempt }))
      .sort((a, b) => a.createdAtMs - b.createdAtMs);
  }

  /** Finish an attempt. Returns the final attempt, or null when none was pending. */
  resolve(deviceId: string, outcome: PairingOutcome, reason?: string): PairingAttempt | null {
    const active = this.attempts.get(deviceId);
    if (!active) {
      return null;
    }
    clearTimeout(active.timer);
    this.attempts.delete(deviceId);
    const final: PairingAttempt = {
      ...active.attempt,
      state: outcome,
      ...(reason ? { reason } : {}),
    };
    this.emit("resolved", final);
    return final;
  }

  /** Cancel every attempt running on a link that went away. */
  cancelForLink(linkId: string, reason: string): PairingAttempt[] {
    const cancelled: PairingAttempt[] = [];
    for (const active of [...this.attempts.values()]) {
      if (active.attempt.linkId === linkId) {
        const final = this.resolve(active.attempt.deviceId, "cancelled", reason);
        if (final) {
          cancelled.push(final);
        }
      }
    }
    return cancelled;
  }

  cancelAll(reason: string): void {
    for (const deviceId of [...this.attempts.keys()]) {
      this.resolve(deviceId, "cancelled", reason);
    }
  }

  /** The peer rejected us; refuse new requests to it until the cooldown passes. */
  setCooldown(deviceId: string, retryAfterMs: number): void {
    this.cooldownUntil.set(deviceId, Date.now() + retryAfterMs);
  }

  /** Milliseconds left before we may ask the device again (0 when free). */
  cooldownRemaining(deviceId: string, nowMs: number = Date.now()): number {
    const until = this.cooldownUntil.get(deviceId);
    if (until === undefined) {
      return 0;
    }
    if (until <= nowMs) {
      this.cooldownUntil.delete(deviceId);
      return 0;
    }
    return until - nowMs;
  }

  clearCooldown(deviceId: string): void {
    this.cooldownUntil.delete(deviceId);
  }
}
