import type { DeviceLink } from "./device-link.js";
import type { AuthenticatedPeer, NegotiatedCapabilities, PeerAddress } from "./types.js";

export type Session = {
  deviceId: string;
  link: DeviceLink;
  peer: AuthenticatedPeer;
  capabilities: NegotiatedCapabilities;
  outbound: boolean;
  /** Device id of the side that dialed the current transport. */
  initiatorDeviceId: string;
  address?: PeerAddress;
  connectedAtMs: number;
};

export type SessionSummary = {
  deviceId: string;
  deviceName: string;
  deviceType: string;
  fingerprint: string;
  protocolVersion: number;
  outbound: boolean;
  remoteAddress?: string;
  connectedAtMs: number;
  lastActivityMs: number;
  capabilities: NegotiatedCapabilities;
};

export type LinkCandidate = {
  initiatorDeviceId: string;
};

/**
 * Pick between the live session's link and a newly authenticated one for the
 * same device. Both ends reach the same answer. When one device dialed both
 * links it only redials after losing the old one, so the candidate wins.
 * Otherwise the link dialed by the device with the smaller id wins.
 */
export function preferLink(params: {
  localDeviceId: string;
  peerDeviceId: string;
  existing: LinkCandidate;
  candidate: LinkCandidate;
}): "existing" | "candidate" {
  if (params.existing.initiatorDeviceId === params.candidate.initiatorDeviceId) {
    return "candidate";
  }
  const preferredInitiator =
    params.localDeviceId < params.peerDeviceId ? params.localDeviceId : params.peerDeviceId;
  return params.candidate.initiatorDeviceId === preferredInitiator ? "candidate" : "existing";
}

export function summarizeSession(session: Session): SessionSummary {
  return {
    deviceId: session.deviceId,
    deviceName: session.peer.info.deviceName,
    deviceType: session.peer.info.deviceType,
    fingerprint: session.peer.fingerprint,
    protocolVersion: session.peer.info.protocolVersion,
    outbound: session.outbound,
    ...(session.link.remoteAddress ? { remoteAddress: session.link.remoteAddress } : {}),
    connectedAtMs: session.connectedAtMs,
    lastActivityMs: session.link.lastActivityMs,
    capabilities: {
      receivable: [...session.capabilities.receivable],
      sendable: [...session.capabilities.sendable],
    },
  };
}

/** At most one session per device id, indexed by device and by link. */
export class SessionRegistry {
  private sessionsById = new Map<string, Session>();
  private deviceByLink = new Map<string, string>();

  register(session: Session): void {
    const existing = this.sessionsById.get(session.deviceId);
    if (existing) {
      this.deviceByLink.delete(existing.link.linkId);
    }
    this.sessionsById.set(session.deviceId, session);
    this.deviceByLink.set(session.link.linkId, session.deviceId);
  }

  /**
   * Move a session onto a new transport. Identity, capabilities and the
   * connected timestamp are kept; returns the link that was replaced.
   */
  replaceLink(
    deviceId: string,
    next: { link: DeviceLink; outbound: boolean; initiatorDeviceId: string; address?: PeerAddress },
  ): DeviceLink | null {
    const session = this.sessionsById.get(deviceId);
    if (!session) {
      return null;
    }
    const previous = session.link;
    this.deviceByLink.delete(previous.linkId);
    session.link = next.link;
    session.outbound = next.outbound;
    session.initiatorDeviceId = next.initiatorDeviceId;
    if (next.address) {
      session.address = next.address;
    }
    this.deviceByLink.set(next.link.linkId, deviceId);
    return previous;
  }

  /**
   * Remove the session owning `linkId`. A link that was already replaced
   * removes nothing.
   */
  unregister(linkId: string): Session | null {
    const deviceId = this.deviceByLink.get(linkId);
    if (!deviceId) {
      return null;
    }
    this.deviceByLink.delete(linkId);
    const session = this.sessionsById.get(deviceId);
    if (!session || session.link.linkId !== linkId) {
      return null;
    }
    this.sessionsById.delete(deviceId);
    return session;
  }

  get(deviceId: string): Session | undefined {
    return this.sessionsById.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this.sessionsById.has(deviceId);
  }

  list(): Session[] {
    return [...this.sessionsById.values()];
  }

  get size(): number {
    return this.sessionsById.size;
  }
}
