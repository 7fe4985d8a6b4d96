import type { LanDiscovery } from "../discovery.js";
import type { ConnectionManager } from "../manager.js";
import type { ControlRequestHandlers } from "./types.js";

export function createLinkPeersHandlers(deps: {
  manager: ConnectionManager;
  /** Null when discovery is disabled or failed to bind. */
  discovery: LanDiscovery | null;
}): ControlRequestHandlers {
  return {
    "link.peers.list": ({ respond }) => {
      const peers = (deps.discovery?.listPeers() ?? [])
        .map((peer) => ({
          deviceId: peer.info.deviceId,
          deviceName: peer.info.deviceName,
          deviceType: peer.info.deviceType,
          protocolVersion: peer.info.protocolVersion,
          host: peer.address.host,
          port: peer.address.port,
          lastSeenMs: peer.lastSeenMs,
          trusted: deps.manager.trustStore.isTrusted(peer.info.deviceId),
          connected: deps.manager.sessions.has(peer.info.deviceId),
        }))
        .sort((a, b) => a.deviceId.localeCompare(b.deviceId));
      respond(true, { peers });
    },

    "link.status": ({ respond }) => {
      respond(true, {
        ...deps.manager.status(),
        discovery: deps.discovery !== null,
        discoveredPeers: deps.discovery?.listPeers().length ?? 0,
      });
    },
  };
}
