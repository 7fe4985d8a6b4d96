import type { DeviceType } from "../link/types.js";

export type DiscoveryConfig = {
  /** Broadcast and listen for UDP announcements. Default: true. */
  enabled: boolean;
  /** UDP port for announcements. Default: 1716. */
  port: number;
  /** Where announcements are sent. Default: ["255.255.255.255"]. */
  broadcastAddresses: string[];
  /** Announcement interval in milliseconds. Default: 5000. */
  intervalMs: number;
  /** Announcements a peer may miss before it is dropped. Default: 6. */
  missedAnnouncements: number;
};

export type ReconnectConfig = {
  baseMs: number;
  maxMs: number;
  multiplier: number;
};

export type LinkConfig = {
  /** Name announced to peers. Default: the host name. */
  deviceName: string;
  deviceType: DeviceType;
  /** Interface the link listener binds to. Default: "0.0.0.0". */
  host: string;
  /** TCP port for inbound links. Default: 1716. */
  port: number;
  /** Loopback port of the control plane. Default: 1764. */
  controlPort: number;
  discovery: DiscoveryConfig;
  reconnect: ReconnectConfig;
  pairingTimeoutMs: number;
  keepAliveIntervalMs: number;
  connectionTimeoutMs: number;
  /** Built-in plugins not to load. */
  disabledPlugins: string[];
};
