import type { DeviceInfo, NegotiatedCapabilities } from "./types.js";

export type LocalCapabilities = {
  incoming: readonly string[];
  outgoing: readonly string[];
};

function intersect(a: readonly string[], b: readonly string[]): string[] {
  const other = new Set(b);
  return [...new Set(a)].filter((type) => other.has(type)).toSorted();
}

/**
 * Intersect our declared capabilities with what the peer announced.
 * Only types in the result are ever exchanged with that peer.
 */
export function negotiateCapabilities(
  local: LocalCapabilities,
  peer: Pick<DeviceInfo, "incomingCapabilities" | "outgoingCapabilities">,
): NegotiatedCapabilities {
  return {
    receivable: intersect(local.incoming, peer.outgoingCapabilities),
    sendable: intersect(local.outgoing, peer.incomingCapabilities),
  };
}

/**
 * Tracks the negotiated capabilities of every live session and answers
 * capability queries for routing.
 */
export class CapabilityRegistry {
  private capsByPeer = new Map<string, { receivable: Set<string>; sendable: Set<string> }>();

  /** Store what was negotiated when a session comes up or moves to a new link. */
  updatePeer(deviceId: string, negotiated: NegotiatedCapabilities): void {
    this.capsByPeer.set(deviceId, {
      receivable: new Set(negotiated.receivable),
      sendable: new Set(negotiated.sendable),
    });
  }

  /** Called once the device has no session; every type is refused afterwards. */
  removePeer(deviceId: string): void {
    this.capsByPeer.delete(deviceId);
  }

  canReceive(deviceId: string, packetType: string): boolean {
    return this.capsByPeer.get(deviceId)?.receivable.has(packetType) ?? false;
  }

  canSend(deviceId: string, packetType: string): boolean {
    return this.capsByPeer.get(deviceId)?.sendable.has(packetType) ?? false;
  }

  getPeerCapabilities(deviceId: string): NegotiatedCapabilities | null {
    const caps = this.capsByPeer.get(deviceId);
    if (!caps) {
      return null;
    }
    return { receivable: [...caps.receivable], sendable: [...caps.sendable] };
  }
}
