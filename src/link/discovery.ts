import dgram from "node:dgram";
import { EventEmitter } from "node:events";
import { describeError, FramingError } from "../infra/errors.js";
import { SILENT_LOGGER, shortId, type LinkLogger } from "../infra/logger.js";
import { normalizeRemoteHost } from "./connection.js";
import {
  buildIdentityPacket,
  decodePacket,
  encodePacket,
  PACKET_TYPE_IDENTITY,
  parseDeviceInfo,
} from "./packet.js";
import type { DeviceInfo, Packet, PeerRecord } from "./types.js";

export const DEFAULT_DISCOVERY_PORT = 1716;
export const DEFAULT_ANNOUNCE_INTERVAL_MS = 5_000;
export const DEFAULT_MISSED_ANNOUNCEMENTS = 6;

export type AnnouncementSender = { host: string; port: number };

/** The datagram socket discovery runs on. */
export interface AnnouncementSocket {
  bind(port: number): Promise<void>;
  send(data: Buffer, port: number, host: string): Promise<void>;
  onMessage(handler: (data: Buffer, sender: AnnouncementSender) => void): void;
  close(): Promise<void>;
}

export function createUdpAnnouncementSocket(opts: { log?: LinkLogger } = {}): AnnouncementSocket {
  const log = opts.log ?? SILENT_LOGGER;
  const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
  let closed = false;
  return {
    bind: (port) =>
      new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => reject(err);
        socket.once("error", onError);
        socket.bind(port, () => {
          socket.off("error", onError);
          socket.on("error", (err) => log.warn(`discovery: socket error: ${describeError(err)}`));
          socket.setBroadcast(true);
          resolve();
        });
      }),
    send: (data, port, host) =>
      new Promise<void>((resolve, reject) => {
        socket.send(data, port, host, (err) => (err ? reject(err) : resolve()));
      }),
    onMessage: (handler) => {
      socket.on("message", (data, rinfo) => handler(data, { host: rinfo.address, port: rinfo.port }));
    },
    close: () =>
      new Promise<void>((resolve) => {
        if (closed) {
          resolve();
          return;
        }
        closed = true;
        try {
          socket.close(() => resolve());
        } catch (err) {
          // A socket whose bind failed may already be torn down.
          log.debug?.(`discovery: close: ${describeError(err)}`);
          resolve();
        }
      }),
  };
}

export type LanDiscoveryEvents = {
  "peer-discovered": [peer: PeerRecord];
  "peer-updated": [peer: PeerRecord];
  "peer-lost": [deviceId: string];
};

export type LanDiscoveryOptions = {
  /** Current local announcement; read on every tick so capability changes propagate. */
  localInfo: () => DeviceInfo;
  socket: AnnouncementSocket;
  port?: number;
  broadcastAddresses?: string[];
  intervalMs?: number;
  missedAnnouncements?: number;
  log?: LinkLogger;
};

/**
 * Broadcasts our identity on the LAN and keeps a table of devices heard from.
 * The table is observational: nothing here implies trust or opens a session.
 */
export class LanDiscovery extends EventEmitter<LanDiscoveryEvents> {
  private readonly localInfo: () => DeviceInfo;
  private readonly socket: AnnouncementSocket;
  private readonly port: number;
  private readonly broadcastAddresses: string[];
  private readonly intervalMs: number;
  private readonly missedAnnouncements: number;
  private readonly log: LinkLogger;
  private peers = new Map<string, PeerRecord>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(opts: LanDiscoveryOptions) {
    super();
    this.localInfo = opts.localInfo;
    this.socket = opts.socket;
    this.port = opts.port ?? DEFAULT_DISCOVERY_PORT;
    this.broadcastAddresses = opts.broadcastAddresses ?? ["255.255.255.255"];
    this.intervalMs = opts.intervalMs ?? DEFAULT_ANNOUNCE_INTERVAL_MS;
    this.missedAnnouncements = opts.missedAnnouncements ?? DEFAULT_MISSED_ANNOUNCEMENTS;
    this.log = opts.log ?? SILENT_LOGGER;
  }

  /** How long a peer stays listed without a fresh announcement. */
  get livenessWindowMs(): number {
    return this.intervalMs * this.missedAnnouncements;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.socket.onMessage((data, sender) => this.handleDatagram(data, sender));
    await this.socket.bind(this.port);
    this.running = true;
    void this.announce();
    this.timer = setInterval(() => {
      this.prune();
      void this.announce();
    }, this.intervalMs);
    this.timer.unref?.();
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.socket.close();
  }

  listPeers(): PeerRecord[] {
    return [...this.peers.values()].map(clonePeer);
  }

  getPeer(deviceId: string): PeerRecord | null {
    const peer = this.peers.get(deviceId);
    return peer ? clonePeer(peer) : null;
  }

  /** Send one announcement to every broadcast address. Failures are logged; the next tick retries. */
  async announce(): Promise<void> {
    let frame: Buffer;
    try {
      frame = Buffer.from(encodePacket(buildIdentityPacket(this.localInfo())), "utf8");
    } catch (err) {
      this.log.error(`discovery: cannot encode announcement: ${describeError(err)}`);
      return;
    }
    await Promise.all(
      this.broadcastAddresses.map(async (host) => {
        try {
          await this.socket.send(frame, this.port, host);
        } catch (err) {
          this.log.warn(`discovery: announce to ${host}:${this.port} failed: ${describeError(err)}`);
        }
      }),
    );
  }

  /** Drop peers whose last announcement is older than the liveness window. */
  prune(nowMs: number = Date.now()): void {
    for (const [deviceId, peer] of this.peers) {
      if (nowMs - peer.lastSeenMs > this.livenessWindowMs) {
        this.peers.delete(deviceId);
        this.log.info(`discovery: lost ${shortId(deviceId)}`);
        this.emit("peer-lost", deviceId);
      }
    }
  }

  handleDatagram(data: Buffer, sender: AnnouncementSender): void {
    let packet: Packet;
    try {
      packet = decodePacket(data.toString("utf8"));
    } catch (err) {
      if (err instanceof FramingError) {
        this.log.warn(`discovery: dropping malformed announcement from ${sender.host}: ${err.message}`);
        return;
      }
      throw err;
    }
    if (packet.type !== PACKET_TYPE_IDENTITY) {
      this.log.warn(`discovery: dropping ${packet.type} datagram from ${sender.host}`);
      return;
    }
    const info = parseDeviceInfo(packet.body);
    if (!info) {
      this.log.warn(`discovery: dropping invalid identity from ${sender.host}`);
      return;
    }
    if (info.deviceId === this.localInfo().deviceId) {
      return;
    }
    if (info.tcpPort === undefined) {
      this.log.warn(`discovery: ${shortId(info.deviceId)} announced no tcpPort`);
      return;
    }
    const host = normalizeRemoteHost(sender.host) ?? sender.host;
    const now = Date.now();
    const existing = this.peers.get(info.deviceId);
    const record: PeerRecord = {
      info,
      address: { host, port: info.tcpPort },
      discoveredAtMs: existing?.discoveredAtMs ?? now,
      lastSeenMs: now,
    };
    this.peers.set(info.deviceId, record);
    if (existing) {
      this.emit("peer-updated", clonePeer(record));
    } else {
      this.log.info(`discovery: found ${info.deviceName} (${shortId(info.deviceId)}) at ${host}:${info.tcpPort}`);
      this.emit("peer-discovered", clonePeer(record));
    }
  }
}

function clonePeer(peer: PeerRecord): PeerRecord {
  return { ...peer, info: { ...peer.info }, address: { ...peer.address } };
}
