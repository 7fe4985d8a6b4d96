import { EventEmitter } from "node:events";
import type { DeviceIdentity } from "../infra/device-identity.js";
import {
  DeviceLinkError,
  describeError,
  FingerprintConflictError,
  PairingError,
} from "../infra/errors.js";
import { KeyedMutex } from "../infra/keyed-mutex.js";
import { DEFAULT_LOGGER, shortId, type LinkLogger } from "../infra/logger.js";
import { negotiateCapabilities } from "./capabilities.js";
import type { ConnectionCloseInfo, LinkDialer, PacketConnection } from "./connection.js";
import { DeviceLink, LinkCloseCode } from "./device-link.js";
import {
  buildPairPacket,
  createPacket,
  PACKET_TYPE_KEEPALIVE,
  PACKET_TYPE_PAIR,
  PairBodySchema,
  type PairBody,
} from "./packet.js";
import {
  DEFAULT_PAIRING_RETRY_AFTER_MS,
  PairingManager,
  type PairingAttempt,
} from "./pairing.js";
import {
  DEFAULT_RECONNECT_BACKOFF,
  ReconnectScheduler,
  type ReconnectBackoff,
  type ReconnectStatus,
} from "./reconnect.js";
import { PacketRouter, type DevicePlugin, type RouterDiagnostic } from "./router.js";
import {
  preferLink,
  SessionRegistry,
  summarizeSession,
  type Session,
  type SessionSummary,
} from "./session-registry.js";
import type { TrustStore } from "./trust-store.js";
import {
  PROTOCOL_VERSION,
  type AuthenticatedPeer,
  type DeviceInfo,
  type DeviceType,
  type Packet,
  type PeerAddress,
  type PeerRecord,
  type SecurityEvent,
  type SessionStateEvent,
} from "./types.js";

export const DEFAULT_KEEPALIVE_INTERVAL_MS = 30_000;
export const DEFAULT_CONNECTION_TIMEOUT_MS = 60_000;
const MAX_SECURITY_EVENTS = 100;
const SHUTDOWN_GRACE_MS = 2_000;

export type ConnectionManagerOptions = {
  identity: DeviceIdentity;
  deviceName: string;
  deviceType?: DeviceType;
  /** Port announced to peers for inbound links. */
  tcpPort?: number;
  trustStore: TrustStore;
  dialer: LinkDialer;
  plugins?: DevicePlugin[];
  reconnect?: ReconnectBackoff;
  pairingTimeoutMs?: number;
  /** Cooldown we ask a rejected requester to respect. */
  pairingRetryAfterMs?: number;
  keepAliveIntervalMs?: number;
  connectionTimeoutMs?: number;
  handshakeTimeoutMs?: number;
  log?: LinkLogger;
};

export type ConnectionManagerEvents = {
  "session-state": [event: SessionStateEvent];
  "pairing-request": [attempt: PairingAttempt];
  "pairing-resolved": [attempt: PairingAttempt];
  "security-event": [event: SecurityEvent];
  diagnostic: [diagnostic: RouterDiagnostic];
};

type CloseIntent = "duplicate" | "unpaired" | "disconnect" | "shutdown" | "mismatch";

type LinkRole = "handshaking" | "deciding" | "untrusted" | "session";

type LinkOutcome =
  | { kind: "session" }
  | { kind: "untrusted" }
  | { kind: "closed"; info: ConnectionCloseInfo };

type LinkEntry = {
  link: DeviceLink;
  role: LinkRole;
  /** Packets that arrive while the link's role is still being decided. */
  queue: Packet[];
  intent?: CloseIntent;
  expectedDeviceId?: string;
  address?: PeerAddress;
  outcome?: LinkOutcome;
  waiters: Array<(outcome: LinkOutcome) => void>;
  closed: Promise<void>;
};

export type ManagerStatus = {
  deviceId: string;
  deviceName: string;
  protocolVersion: number;
  sessions: number;
  pendingPairings: number;
  trustedDevices: number;
  reconnecting: ReconnectStatus[];
  plugins: string[];
};

/**
 * Owns every link and session of the local device.
 *
 * New links (dialed or accepted) run the handshake in DeviceLink; once the
 * peer is authenticated the manager decides, under a per-device lock, whether
 * the link resumes a trusted session, stays an untrusted link that can carry
 * pairing packets, or is closed (certificate mismatch, lost duplicate).
 */
export class ConnectionManager extends EventEmitter<ConnectionManagerEvents> {
  readonly router: PacketRouter;
  readonly sessions = new SessionRegistry();
  readonly pairing: PairingManager;
  readonly trustStore: TrustStore;

  private readonly identity: DeviceIdentity;
  private readonly deviceName: string;
  private readonly deviceType: DeviceType;
  private tcpPort?: number;
  private readonly dialer: LinkDialer;
  private readonly pairingRetryAfterMs: number;
  private readonly keepAliveIntervalMs: number;
  private readonly connectionTimeoutMs: number;
  private readonly handshakeTimeoutMs?: number;
  private readonly log: LinkLogger;
  private readonly reconnect: ReconnectScheduler;
  private readonly mutex = new KeyedMutex();

  private links = new Map<string, LinkEntry>();
  private untrustedByDevice = new Map<string, LinkEntry>();
  private addresses = new Map<string, PeerAddress>();
  private discovered = new Map<string, DeviceInfo>();
  private dials = new Map<string, Promise<void>>();
  /** Devices the user disconnected; no automatic reconnects until connect(). */
  private suspended = new Set<string>();
  private securityEvents: SecurityEvent[] = [];
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;
  private stopped = false;

  constructor(opts: ConnectionManagerOptions) {
    super();
    this.identity = opts.identity;
    this.deviceName = opts.deviceName;
    this.deviceType = opts.deviceType ?? "desktop";
    this.tcpPort = opts.tcpPort;
    this.trustStore = opts.trustStore;
    this.dialer = opts.dialer;
    this.pairingRetryAfterMs = opts.pairingRetryAfterMs ?? DEFAULT_PAIRING_RETRY_AFTER_MS;
    this.keepAliveIntervalMs = opts.keepAliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS;
    this.connectionTimeoutMs = opts.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
    this.handshakeTimeoutMs = opts.handshakeTimeoutMs;
    this.log = opts.log ?? DEFAULT_LOGGER;

    this.router = new PacketRouter({
      transmit: (deviceId, packet) => this.transmit(deviceId, packet),
      isPluginEnabled: (deviceId, pluginId) => this.trustStore.isPluginEnabled(deviceId, pluginId),
      log: this.log,
    });
    for (const plugin of opts.plugins ?? []) {
      this.router.register(plugin);
    }
    this.router.on("diagnostic", (diagnostic) => this.emit("diagnostic", diagnostic));

    this.pairing = new PairingManager({ timeoutMs: opts.pairingTimeoutMs, log: this.log });
    this.pairing.on("started", (attempt) => {
      this.emitState({ deviceId: attempt.deviceId, state: "pairing", atMs: Date.now() });
    });
    this.pairing.on("resolved", (attempt) => this.emit("pairing-resolved", attempt));
    this.pairing.on("expired", (attempt) => this.onPairingExpired(attempt));

    this.reconnect = new ReconnectScheduler({
      backoff: { ...DEFAULT_RECONNECT_BACKOFF, ...opts.reconnect },
      onAttempt: (deviceId) => void this.attemptReconnect(deviceId),
    });

    this.trustStore.on("unpaired", (deviceId) => {
      this.reconnect.reset(deviceId);
      this.terminateSession(deviceId, { notifyPeer: true, reason: "unpaired" });
    });
  }

  get localDeviceId(): string {
    return this.identity.deviceId;
  }

  /** The identity we announce, with capabilities from the registered plugins. */
  localInfo(): DeviceInfo {
    const caps = this.router.localCapabilities();
    return {
      deviceId: this.identity.deviceId,
      deviceName: this.deviceName,
      deviceType: this.deviceType,
      protocolVersion: PROTOCOL_VERSION,
      incomingCapabilities: [...caps.incoming],
      outgoingCapabilities: [...caps.outgoing],
      ...(this.tcpPort !== undefined ? { tcpPort: this.tcpPort } : {}),
    };
  }

  /** Set the port announced in our identity once the listener is bound. */
  advertisePort(port: number): void {
    this.tcpPort = port;
  }

  start(): void {
    if (this.started || this.stopped) {
      return;
    }
    this.started = true;
    this.keepAliveTimer = setInterval(() => this.keepAliveTick(), this.keepAliveIntervalMs);
    this.keepAliveTimer.unref?.();
    this.log.info(
      `link: manager started (deviceId=${shortId(this.identity.deviceId)}, plugins=${this.router
        .listPlugins()
        .map((plugin) => plugin.id)
        .join(",")})`,
    );
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
    this.reconnect.stop();
    this.pairing.cancelAll("shutdown");
    const closing = [...this.links.values()].map((entry) => {
      entry.intent ??= "shutdown";
      entry.link.close(LinkCloseCode.SHUTDOWN, "shutting down");
      return entry.closed;
    });
    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      graceTimer = setTimeout(resolve, SHUTDOWN_GRACE_MS);
      graceTimer.unref?.();
    });
    await Promise.race([Promise.all(closing), grace]);
    clearTimeout(graceTimer);
    this.log.info("link: manager stopped");
  }

  /** Adopt a connection accepted by the listener. */
  acceptConnection(connection: PacketConnection): void {
    this.adoptLink(connection, { outbound: false });
  }

  /**
   * Record where a device can be reached. A trusted device without a session
   * is dialed right away unless a reconnect is already scheduled for it.
   */
  handleDiscoveredPeer(record: PeerRecord): void {
    const deviceId = record.info.deviceId;
    this.addresses.set(deviceId, { ...record.address });
    this.discovered.set(deviceId, record.info);
    if (
      this.stopped ||
      this.sessions.has(deviceId) ||
      this.suspended.has(deviceId) ||
      this.dials.has(deviceId) ||
      this.reconnect.isScheduled(deviceId) ||
      !this.trustStore.isTrusted(deviceId)
    ) {
      return;
    }
    void this.attemptReconnect(deviceId);
  }

  /**
   * Open a session to a paired device. Resolves once the session is up;
   * an in-flight dial to the same device is shared.
   */
  async connect(deviceId: string): Promise<void> {
    this.assertRunning();
    if (!this.trustStore.isTrusted(deviceId)) {
      throw new DeviceLinkError(`device ${deviceId} is not paired`, "NOT_PAIRED", "trust");
    }
    this.suspended.delete(deviceId);
    if (this.sessions.has(deviceId)) {
      return;
    }
    this.reconnect.cancel(deviceId);
    await this.dialTrusted(deviceId);
  }

  /** Close the device's session and hold off automatic reconnects until the next connect(). */
  disconnect(deviceId: string): { disconnected: boolean } {
    this.suspended.add(deviceId);
    this.reconnect.cancel(deviceId);
    const session = this.sessions.get(deviceId);
    if (!session) {
      return { disconnected: false };
    }
    const entry = this.links.get(session.link.linkId);
    if (entry) {
      entry.intent ??= "disconnect";
    }
    session.link.close(LinkCloseCode.DISCONNECT_REQUESTED, "disconnect requested");
    return { disconnected: true };
  }

  currentSessions(): SessionSummary[] {
    return this.sessions
      .list()
      .map(summarizeSession)
      .sort((a, b) => a.deviceId.localeCompare(b.deviceId));
  }

  getSession(deviceId: string): SessionSummary | null {
    const session = this.sessions.get(deviceId);
    return session ? summarizeSession(session) : null;
  }

  subscribe(listener: (event: SessionStateEvent) => void): () => void {
    this.on("session-state", listener);
    return () => {
      this.off("session-state", listener);
    };
  }

  listPendingPairings(): PairingAttempt[] {
    return this.pairing.listPending();
  }

  listSecurityEvents(): SecurityEvent[] {
    return this.securityEvents.map((event) => ({ ...event }));
  }

  /**
   * Ask a device to pair. Uses an authenticated link to it when one is open,
   * otherwise dials its discovered address. If the device already asked us,
   * this accepts its request.
   */
  async requestPairing(deviceId: string): Promise<PairingAttempt> {
    this.assertRunning();
    const decision = await this.mutex.run(deviceId, async () => {
      if (this.trustStore.isTrusted(deviceId)) {
        throw new PairingError("ALREADY_PAIRED", `device ${deviceId} is already paired`);
      }
      const cooldownMs = this.pairing.cooldownRemaining(deviceId);
      if (cooldownMs > 0) {
        throw new PairingError(
          "PAIRING_COOLDOWN",
          `device ${deviceId} rejected pairing; retry in ${Math.ceil(cooldownMs / 1000)}s`,
        );
      }
      const pending = this.pairing.get(deviceId);
      if (pending?.direction === "incoming") {
        return { kind: "done" as const, attempt: await this.decideIncoming(pending, true) };
      }
      if (pending) {
        throw new PairingError("PAIRING_IN_PROGRESS", `pairing with ${deviceId} is already in progress`);
      }
      const entry = this.untrustedByDevice.get(deviceId);
      const peer = entry?.link.peer;
      if (entry && peer && entry.link.state === "authenticated") {
        const attempt = this.pairing.begin({
          deviceId,
          direction: "outgoing",
          linkId: entry.link.linkId,
          peerFingerprint: peer.fingerprint,
          deviceName: peer.info.deviceName,
          deviceType: peer.info.deviceType,
        });
        this.log.info(`pairing: requesting pairing with ${shortId(deviceId)}`);
        this.sendOn(entry, buildPairPacket({ pair: true }));
        return { kind: "done" as const, attempt };
      }
      const address = this.addresses.get(deviceId);
      if (!address) {
        throw new PairingError("NOT_REACHABLE", `device ${deviceId} has not been discovered`);
      }
      const info = this.discovered.get(deviceId);
      const attempt = this.pairing.begin({
        deviceId,
        direction: "outgoing",
        linkId: null,
        ...(info ? { deviceName: info.deviceName, deviceType: info.deviceType } : {}),
      });
      return { kind: "dial" as const, attempt, address };
    });
    if (decision.kind === "done") {
      return decision.attempt;
    }
    this.log.info(`pairing: dialing ${shortId(deviceId)} at ${decision.address.host}:${decision.address.port}`);
    try {
      const connection = await this.dialer(decision.address);
      this.adoptLink(connection, { outbound: true, expectedDeviceId: deviceId, address: decision.address });
    } catch (err) {
      if (this.pairing.get(deviceId)?.createdAtMs === decision.attempt.createdAtMs) {
        this.pairing.resolve(deviceId, "cancelled", "unreachable");
      }
      throw new PairingError("NOT_REACHABLE", `cannot reach ${deviceId}: ${describeError(err)}`);
    }
    return this.pairing.get(deviceId) ?? decision.attempt;
  }

  /** Accept or reject a pending incoming pairing request. */
  async respondToPairing(deviceId: string, accept: boolean): Promise<PairingAttempt> {
    this.assertRunning();
    return await this.mutex.run(deviceId, async () => {
      const pending = this.pairing.get(deviceId);
      if (!pending || pending.direction !== "incoming") {
        throw new PairingError("NO_PENDING_REQUEST", `no pairing request from ${deviceId}`);
      }
      return await this.decideIncoming(pending, accept);
    });
  }

  /**
   * Forget a device: cancel pairing and reconnects, tell the peer, close the
   * session, and remove the trust entry. Unpairing an unknown device is a no-op.
   */
  async unpair(deviceId: string): Promise<{ removed: boolean }> {
    return await this.mutex.run(deviceId, async () => {
      return await this.forget(deviceId, { notifyPeer: true, reason: "unpaired" });
    });
  }

  async setPluginEnabled(deviceId: string, pluginId: string, enabled: boolean): Promise<void> {
    if (!this.router.listPlugins().some((plugin) => plugin.id === pluginId)) {
      throw new DeviceLinkError(`unknown plugin ${pluginId}`, "UNKNOWN_PLUGIN", "plugin");
    }
    await this.mutex.run(deviceId, async () => {
      await this.trustStore.setPluginEnabled(deviceId, pluginId, enabled);
    });
  }

  status(): ManagerStatus {
    return {
      deviceId: this.identity.deviceId,
      deviceName: this.deviceName,
      protocolVersion: PROTOCOL_VERSION,
      sessions: this.sessions.size,
      pendingPairings: this.pairing.listPending().length,
      trustedDevices: this.trustStore.list().length,
      reconnecting: this.reconnect.list(),
      plugins: this.router.listPlugins().map((plugin) => plugin.id),
    };
  }

  private assertRunning(): void {
    if (this.stopped) {
      throw new DeviceLinkError("connection manager is stopped", "STOPPED", "network");
    }
  }

  private adoptLink(
    connection: PacketConnection,
    opts: { outbound: boolean; expectedDeviceId?: string; address?: PeerAddress },
  ): LinkEntry | null {
    if (this.stopped) {
      connection.close(LinkCloseCode.SHUTDOWN, "shutting down");
      return null;
    }
    const link = new DeviceLink({
      connection,
      outbound: opts.outbound,
      identity: this.identity,
      localInfo: this.localInfo(),
      ...(opts.expectedDeviceId ? { expectedDeviceId: opts.expectedDeviceId } : {}),
      ...(this.handshakeTimeoutMs !== undefined ? { handshakeTimeoutMs: this.handshakeTimeoutMs } : {}),
      log: this.log,
    });
    const entry: LinkEntry = {
      link,
      role: "handshaking",
      queue: [],
      ...(opts.expectedDeviceId ? { expectedDeviceId: opts.expectedDeviceId } : {}),
      ...(opts.address ? { address: opts.address } : {}),
      waiters: [],
      closed: new Promise<void>((resolve) => link.once("closed", () => resolve())),
    };
    this.links.set(link.linkId, entry);
    link.on("authenticated", (peer) => this.onAuthenticated(entry, peer));
    link.on("packet", (packet) => this.onLinkPacket(entry, packet));
    link.on("closed", (info) => this.onLinkClosed(entry, info));
    link.start();
    return entry;
  }

  private waitForOutcome(entry: LinkEntry): Promise<LinkOutcome> {
    if (entry.outcome) {
      return Promise.resolve(entry.outcome);
    }
    return new Promise((resolve) => entry.waiters.push(resolve));
  }

  private settle(entry: LinkEntry, outcome: LinkOutcome): void {
    if (entry.outcome) {
      return;
    }
    entry.outcome = outcome;
    const waiters = entry.waiters;
    entry.waiters = [];
    for (const waiter of waiters) {
      waiter(outcome);
    }
  }

  private onAuthenticated(entry: LinkEntry, peer: AuthenticatedPeer): void {
    entry.role = "deciding";
    this.decide(entry, peer).catch((err: unknown) => {
      this.log.error(`link: failed to admit ${shortId(peer.info.deviceId)}: ${describeError(err)}`);
      entry.link.close(LinkCloseCode.PROTOCOL_ERROR, "internal error");
    });
  }

  private async decide(entry: LinkEntry, peer: AuthenticatedPeer): Promise<void> {
    const deviceId = peer.info.deviceId;
    await this.mutex.run(deviceId, async () => {
      if (entry.link.state !== "authenticated") {
        return;
      }
      const host = entry.address?.host ?? entry.link.remoteAddress;
      const port = entry.address?.port ?? peer.info.tcpPort;
      if (host && port !== undefined) {
        this.addresses.set(deviceId, { host, port });
      }
      const trusted = this.trustStore.lookup(deviceId);
      if (trusted) {
        if (trusted.fingerprint !== peer.fingerprint) {
          this.rejectMismatch(entry, trusted.fingerprint, peer);
          return;
        }
        if (entry.link.outbound && this.suspended.has(deviceId)) {
          entry.intent = "disconnect";
          entry.link.close(LinkCloseCode.DISCONNECT_REQUESTED, "disconnect requested");
          return;
        }
        this.promoteToSession(entry, peer);
        return;
      }
      const pending = this.pairing.get(deviceId);
      if (pending?.peerFingerprint && pending.peerFingerprint !== peer.fingerprint) {
        this.pairing.resolve(deviceId, "certificate-mismatch", "certificate changed during pairing");
        this.rejectMismatch(entry, pending.peerFingerprint, peer);
        return;
      }
      this.admitUntrusted(entry, peer);
    });
  }

  private admitUntrusted(entry: LinkEntry, peer: AuthenticatedPeer): void {
    const deviceId = peer.info.deviceId;
    const previous = this.untrustedByDevice.get(deviceId);
    if (previous && previous !== entry && previous.link.state === "authenticated") {
      const winner = preferLink({
        localDeviceId: this.identity.deviceId,
        peerDeviceId: deviceId,
        existing: { initiatorDeviceId: previous.link.initiatorDeviceId ?? deviceId },
        candidate: { initiatorDeviceId: entry.link.initiatorDeviceId ?? deviceId },
      });
      const loser = winner === "existing" ? entry : previous;
      loser.intent = "duplicate";
      loser.link.close(LinkCloseCode.DUPLICATE, "duplicate");
      if (loser === entry) {
        return;
      }
    }
    entry.role = "untrusted";
    this.untrustedByDevice.set(deviceId, entry);
    this.settle(entry, { kind: "untrusted" });
    this.log.info(`link: unpaired device ${peer.info.deviceName} (${shortId(deviceId)}) connected`);
    const pending = this.pairing.get(deviceId);
    if (pending?.direction === "outgoing" && pending.state === "awaiting-certificate") {
      this.pairing.attachLink(deviceId, entry.link.linkId, peer.fingerprint);
      this.sendOn(entry, buildPairPacket({ pair: true }));
    }
    this.drainQueue(entry);
  }

  private promoteToSession(entry: LinkEntry, peer: AuthenticatedPeer): void {
    const deviceId = peer.info.deviceId;
    const capabilities = negotiateCapabilities(this.router.localCapabilities(), peer.info);
    const initiatorDeviceId = entry.link.initiatorDeviceId ?? deviceId;
    if (this.untrustedByDevice.get(deviceId) === entry) {
      this.untrustedByDevice.delete(deviceId);
    }
    const existing = this.sessions.get(deviceId);
    if (existing && existing.link !== entry.link) {
      const winner =
        existing.link.state === "closed"
          ? "candidate"
          : preferLink({
              localDeviceId: this.identity.deviceId,
              peerDeviceId: deviceId,
              existing: { initiatorDeviceId: existing.initiatorDeviceId },
              candidate: { initiatorDeviceId },
            });
      if (winner === "existing") {
        this.log.info(`link: closing duplicate link to ${shortId(deviceId)}`);
        entry.intent = "duplicate";
        entry.link.close(LinkCloseCode.DUPLICATE, "duplicate");
        return;
      }
      const address = this.addresses.get(deviceId);
      const replaced = this.sessions.replaceLink(deviceId, {
        link: entry.link,
        outbound: entry.link.outbound,
        initiatorDeviceId,
        ...(address ? { address } : {}),
      });
      existing.peer = peer;
      existing.capabilities = capabilities;
      this.router.attachSession(deviceId, peer.info, capabilities);
      entry.role = "session";
      this.reconnect.reset(deviceId);
      this.settle(entry, { kind: "session" });
      if (replaced && replaced.state !== "closed") {
        const replacedEntry = this.links.get(replaced.linkId);
        if (replacedEntry) {
          replacedEntry.intent = "duplicate";
        }
        replaced.close(LinkCloseCode.DUPLICATE, "duplicate");
      }
      this.log.info(`link: session with ${shortId(deviceId)} moved to a new link`);
      this.drainQueue(entry);
      return;
    }
    const address = this.addresses.get(deviceId);
    const session: Session = {
      deviceId,
      link: entry.link,
      peer,
      capabilities,
      outbound: entry.link.outbound,
      initiatorDeviceId,
      ...(address ? { address } : {}),
      connectedAtMs: Date.now(),
    };
    this.sessions.register(session);
    entry.role = "session";
    this.reconnect.reset(deviceId);
    this.router.attachSession(deviceId, peer.info, capabilities);
    this.log.info(
      `link: connected to ${peer.info.deviceName} (${shortId(deviceId)}) ${entry.link.outbound ? "outbound" : "inbound"}`,
    );
    this.emitState({ deviceId, state: "connected", atMs: Date.now() });
    this.settle(entry, { kind: "session" });
    this.drainQueue(entry);
  }

  private rejectMismatch(entry: LinkEntry, pinnedFingerprint: string, peer: AuthenticatedPeer): void {
    const event: SecurityEvent = {
      kind: "certificate-mismatch",
      deviceId: peer.info.deviceId,
      pinnedFingerprint,
      presentedFingerprint: peer.fingerprint,
      ...(entry.link.remoteAddress ? { remoteAddress: entry.link.remoteAddress } : {}),
      atMs: Date.now(),
    };
    this.securityEvents.push(event);
    if (this.securityEvents.length > MAX_SECURITY_EVENTS) {
      this.securityEvents.splice(0, this.securityEvents.length - MAX_SECURITY_EVENTS);
    }
    this.log.error(
      `link: certificate mismatch for ${shortId(event.deviceId)}${event.remoteAddress ? ` from ${event.remoteAddress}` : ""} (pinned ${pinnedFingerprint}, presented ${peer.fingerprint})`,
    );
    entry.intent = "mismatch";
    entry.link.close(LinkCloseCode.CERTIFICATE_MISMATCH, "certificate mismatch");
    this.emit("security-event", { ...event });
  }

  private onLinkPacket(entry: LinkEntry, packet: Packet): void {
    if (entry.role === "handshaking" || entry.role === "deciding") {
      entry.queue.push(packet);
      return;
    }
    this.routePacket(entry, packet);
  }

  private drainQueue(entry: LinkEntry): void {
    const queued = entry.queue;
    entry.queue = [];
    for (const packet of queued) {
      if (entry.link.state !== "authenticated") {
        break;
      }
      this.routePacket(entry, packet);
    }
  }

  private routePacket(entry: LinkEntry, packet: Packet): void {
    const peer = entry.link.peer;
    if (!peer) {
      return;
    }
    const deviceId = peer.info.deviceId;
    if (packet.type === PACKET_TYPE_KEEPALIVE) {
      return;
    }
    if (packet.type === PACKET_TYPE_PAIR) {
      const parsed = PairBodySchema.safeParse(packet.body);
      if (!parsed.success) {
        this.log.warn(`pairing: invalid pair packet from ${shortId(deviceId)}`);
        return;
      }
      const handled =
        entry.role === "session"
          ? this.handleSessionPair(entry, deviceId, parsed.data)
          : this.handleUntrustedPair(entry, peer, parsed.data);
      handled.catch((err: unknown) => {
        this.log.error(`pairing: failed to handle pair packet from ${shortId(deviceId)}: ${describeError(err)}`);
      });
      return;
    }
    if (entry.role === "session") {
      this.router.dispatchInbound(deviceId, packet);
      return;
    }
    this.log.debug?.(`link: dropped ${packet.type} from unpaired ${shortId(deviceId)}`);
  }

  private async handleSessionPair(entry: LinkEntry, deviceId: string, body: PairBody): Promise<void> {
    if (body.pair) {
      // The peer lost its trust entry and is asking again; we still trust it.
      this.sendOn(entry, buildPairPacket({ pair: true }));
      return;
    }
    this.log.info(`pairing: ${shortId(deviceId)} unpaired this device`);
    await this.mutex.run(deviceId, async () => {
      await this.forget(deviceId, { notifyPeer: false, reason: "unpaired by peer" });
    });
  }

  private async handleUntrustedPair(entry: LinkEntry, peer: AuthenticatedPeer, body: PairBody): Promise<void> {
    const deviceId = peer.info.deviceId;
    await this.mutex.run(deviceId, async () => {
      if (entry.role !== "untrusted" || entry.link.state !== "authenticated") {
        return;
      }
      const pending = this.pairing.get(deviceId);
      if (body.pair) {
        if (pending?.direction === "outgoing") {
          this.log.info(`pairing: ${shortId(deviceId)} accepted`);
          await this.completePairing(entry, peer, pending, { notifyPeer: false });
          return;
        }
        if (pending) {
          return;
        }
        const attempt = this.pairing.begin({
          deviceId,
          direction: "incoming",
          linkId: entry.link.linkId,
          peerFingerprint: peer.fingerprint,
          deviceName: peer.info.deviceName,
          deviceType: peer.info.deviceType,
        });
        this.log.info(
          `pairing: request from ${peer.info.deviceName} (${shortId(deviceId)}), fingerprint ${peer.fingerprint}`,
        );
        this.emit("pairing-request", attempt);
        return;
      }
      if (!pending) {
        return;
      }
      if (pending.direction === "incoming") {
        this.pairing.resolve(deviceId, "cancelled", body.reason ?? "cancelled by peer");
        return;
      }
      if (body.reason === "timeout") {
        this.pairing.resolve(deviceId, "expired", "peer timed out");
        return;
      }
      const retryAfterMs = body.retryAfterMs ?? this.pairingRetryAfterMs;
      this.pairing.setCooldown(deviceId, retryAfterMs);
      this.log.info(`pairing: ${shortId(deviceId)} rejected the request (retry after ${retryAfterMs}ms)`);
      this.pairing.resolve(deviceId, "rejected", body.reason ?? "rejected");
    });
  }

  /** Runs under the device's lock. */
  private async decideIncoming(pending: PairingAttempt, accept: boolean): Promise<PairingAttempt> {
    const deviceId = pending.deviceId;
    const entry = pending.linkId ? this.links.get(pending.linkId) : undefined;
    const peer = entry?.link.peer;
    if (!entry || !peer || entry.role !== "untrusted" || entry.link.state !== "authenticated") {
      this.pairing.resolve(deviceId, "cancelled", "link lost");
      throw new PairingError("NO_PENDING_REQUEST", `the link to ${deviceId} is gone`);
    }
    if (!accept) {
      this.sendOn(
        entry,
        buildPairPacket({ pair: false, reason: "rejected", retryAfterMs: this.pairingRetryAfterMs }),
      );
      this.log.info(`pairing: rejected ${shortId(deviceId)}`);
      return this.pairing.resolve(deviceId, "rejected", "rejected") ?? { ...pending, state: "rejected" };
    }
    return await this.completePairing(entry, peer, pending, { notifyPeer: true });
  }

  /** Pin the peer, then turn its link into a session. Runs under the device's lock. */
  private async completePairing(
    entry: LinkEntry,
    peer: AuthenticatedPeer,
    pending: PairingAttempt,
    opts: { notifyPeer: boolean },
  ): Promise<PairingAttempt> {
    const deviceId = peer.info.deviceId;
    try {
      await this.trustStore.pin({
        deviceId,
        publicKey: peer.publicKey,
        fingerprint: peer.fingerprint,
        deviceName: peer.info.deviceName,
        deviceType: peer.info.deviceType,
      });
    } catch (err) {
      if (err instanceof FingerprintConflictError) {
        const final = this.pairing.resolve(deviceId, "certificate-mismatch", err.message);
        this.rejectMismatch(entry, err.pinnedFingerprint, peer);
        return final ?? { ...pending, state: "certificate-mismatch" };
      }
      this.pairing.resolve(deviceId, "cancelled", "trust store write failed");
      throw err;
    }
    if (opts.notifyPeer) {
      this.sendOn(entry, buildPairPacket({ pair: true }));
    }
    this.pairing.clearCooldown(deviceId);
    this.suspended.delete(deviceId);
    const final = this.pairing.resolve(deviceId, "paired");
    this.log.info(`pairing: paired with ${peer.info.deviceName} (${shortId(deviceId)})`);
    this.promoteToSession(entry, peer);
    return final ?? { ...pending, state: "paired" };
  }

  private onPairingExpired(attempt: PairingAttempt): void {
    const entry = attempt.linkId ? this.links.get(attempt.linkId) : undefined;
    if (entry && entry.role === "untrusted" && entry.link.state === "authenticated") {
      this.sendOn(entry, buildPairPacket({ pair: false, reason: "timeout" }));
    }
  }

  /** Runs under the device's lock. */
  private async forget(
    deviceId: string,
    opts: { notifyPeer: boolean; reason: string },
  ): Promise<{ removed: boolean }> {
    this.reconnect.reset(deviceId);
    this.pairing.resolve(deviceId, "cancelled", opts.reason);
    this.terminateSession(deviceId, opts);
    return await this.trustStore.unpair(deviceId);
  }

  private terminateSession(deviceId: string, opts: { notifyPeer: boolean; reason: string }): void {
    const session = this.sessions.get(deviceId);
    if (!session || session.link.state === "closed") {
      return;
    }
    const entry = this.links.get(session.link.linkId);
    if (entry?.intent) {
      return;
    }
    if (entry) {
      entry.intent = "unpaired";
    }
    if (opts.notifyPeer) {
      try {
        session.link.send(buildPairPacket({ pair: false }));
      } catch (err) {
        this.log.warn(`pairing: could not notify ${shortId(deviceId)} of unpair: ${describeError(err)}`);
      }
    }
    session.link.close(LinkCloseCode.UNPAIRED, opts.reason);
  }

  private onLinkClosed(entry: LinkEntry, info: ConnectionCloseInfo): void {
    const link = entry.link;
    this.links.delete(link.linkId);
    this.settle(entry, { kind: "closed", info });
    const deviceId = link.peer?.info.deviceId ?? link.claimedDeviceId ?? entry.expectedDeviceId;
    this.pairing.cancelForLink(link.linkId, "link closed");
    if (!deviceId) {
      return;
    }
    if (this.untrustedByDevice.get(deviceId) === entry) {
      this.untrustedByDevice.delete(deviceId);
    }
    const pending = this.pairing.get(deviceId);
    if (entry.expectedDeviceId && pending?.direction === "outgoing" && pending.linkId === null) {
      this.pairing.resolve(deviceId, "cancelled", "link closed before authentication");
    }

    const intent = entry.intent ?? this.remoteIntent(deviceId, info);
    const session = this.sessions.get(deviceId);
    if (session && session.link === link) {
      if (this.awaitingReplacement(deviceId, info)) {
        this.log.info(`link: ${shortId(deviceId)} closed a duplicate link; waiting for its replacement`);
        return;
      }
      this.finishSession(deviceId, link.linkId, info, intent);
      return;
    }
    if (session && session.link.state === "closed" && !this.hasCandidateLink(deviceId)) {
      // The replacement we were waiting for never arrived.
      this.finishSession(deviceId, session.link.linkId, info, undefined);
      return;
    }
    if (link.outbound && entry.expectedDeviceId && !intent && entry.role !== "session") {
      this.maybeReconnect(entry.expectedDeviceId, describeClose(info));
    }
  }

  /**
   * Close codes from the peer that rule out reconnecting: it unpaired us,
   * disconnected us on purpose, or rejected our certificate. A deliberate
   * disconnect also suspends our own reconnects to it.
   */
  private remoteIntent(deviceId: string, info: ConnectionCloseInfo): CloseIntent | undefined {
    if (info.initiatedLocally) {
      return undefined;
    }
    switch (info.code) {
      case LinkCloseCode.UNPAIRED:
        return "unpaired";
      case LinkCloseCode.CERTIFICATE_MISMATCH:
        return "mismatch";
      case LinkCloseCode.DISCONNECT_REQUESTED:
        this.suspended.add(deviceId);
        return "disconnect";
      default:
        return undefined;
    }
  }

  /** The peer dropped our session link as a duplicate while another link to it is still handshaking. */
  private awaitingReplacement(deviceId: string, info: ConnectionCloseInfo): boolean {
    return !info.initiatedLocally && info.code === LinkCloseCode.DUPLICATE && this.hasCandidateLink(deviceId);
  }

  private hasCandidateLink(deviceId: string): boolean {
    for (const candidate of this.links.values()) {
      if (candidate.role !== "handshaking" && candidate.role !== "deciding") {
        continue;
      }
      const candidateId = candidate.link.claimedDeviceId ?? candidate.expectedDeviceId;
      if (candidateId === deviceId) {
        return true;
      }
    }
    return false;
  }

  private finishSession(
    deviceId: string,
    linkId: string,
    info: ConnectionCloseInfo,
    intent: CloseIntent | undefined,
  ): void {
    const session = this.sessions.unregister(linkId);
    if (!session) {
      return;
    }
    this.router.detachSession(deviceId);
    const reason = intent ?? describeClose(info);
    this.log.info(`link: disconnected from ${shortId(deviceId)} (${reason})`);
    this.emitState({ deviceId, state: "disconnected", reason, atMs: Date.now() });
    if (!intent) {
      this.maybeReconnect(deviceId, reason);
    }
  }

  private maybeReconnect(deviceId: string, reason: string): void {
    if (
      this.stopped ||
      this.suspended.has(deviceId) ||
      this.sessions.has(deviceId) ||
      !this.trustStore.isTrusted(deviceId) ||
      !this.addresses.has(deviceId)
    ) {
      return;
    }
    const delayMs = this.reconnect.schedule(deviceId);
    if (delayMs !== null) {
      this.log.info(
        `link: reconnecting to ${shortId(deviceId)} in ${delayMs}ms (attempt ${this.reconnect.failureCount(deviceId)}, ${reason})`,
      );
    }
  }

  private async attemptReconnect(deviceId: string): Promise<void> {
    if (
      this.stopped ||
      this.sessions.has(deviceId) ||
      this.suspended.has(deviceId) ||
      !this.trustStore.isTrusted(deviceId)
    ) {
      return;
    }
    try {
      await this.dialTrusted(deviceId);
    } catch (err) {
      this.log.warn(`link: reconnect to ${shortId(deviceId)} failed: ${describeError(err)}`);
    }
  }

  private dialTrusted(deviceId: string): Promise<void> {
    const inflight = this.dials.get(deviceId);
    if (inflight) {
      return inflight;
    }
    const dial = this.runDial(deviceId).finally(() => {
      if (this.dials.get(deviceId) === dial) {
        this.dials.delete(deviceId);
      }
    });
    this.dials.set(deviceId, dial);
    return dial;
  }

  private async runDial(deviceId: string): Promise<void> {
    const address = this.addresses.get(deviceId);
    if (!address) {
      throw new DeviceLinkError(`no known address for ${deviceId}`, "NOT_REACHABLE", "network");
    }
    let connection: PacketConnection;
    try {
      connection = await this.dialer(address);
    } catch (err) {
      this.maybeReconnect(deviceId, describeError(err));
      throw err;
    }
    const entry = this.adoptLink(connection, { outbound: true, expectedDeviceId: deviceId, address });
    if (!entry) {
      throw new DeviceLinkError("connection manager is stopped", "STOPPED", "network");
    }
    const outcome = await this.waitForOutcome(entry);
    if (outcome.kind === "closed" && !this.sessions.has(deviceId)) {
      throw new DeviceLinkError(
        `link to ${deviceId} closed before a session was established (${describeClose(outcome.info)})`,
        "CONNECT_FAILED",
        "network",
      );
    }
  }

  private keepAliveTick(): void {
    const now = Date.now();
    for (const session of this.sessions.list()) {
      if (session.link.state !== "authenticated") {
        continue;
      }
      const idleMs = now - session.link.lastActivityMs;
      if (idleMs >= this.connectionTimeoutMs) {
        this.log.warn(`link: no traffic from ${shortId(session.deviceId)} for ${idleMs}ms, closing`);
        session.link.close(LinkCloseCode.KEEPALIVE_TIMEOUT, "keepalive timeout");
        continue;
      }
      try {
        session.link.send(createPacket(PACKET_TYPE_KEEPALIVE));
      } catch (err) {
        this.log.warn(`link: keepalive to ${shortId(session.deviceId)} failed: ${describeError(err)}`);
      }
    }
  }

  private transmit(deviceId: string, packet: Packet): void {
    const session = this.sessions.get(deviceId);
    if (!session) {
      throw new DeviceLinkError(`device ${deviceId} is not connected`, "NOT_CONNECTED", "network");
    }
    session.link.send(packet);
  }

  private sendOn(entry: LinkEntry, packet: Packet): void {
    try {
      entry.link.send(packet);
    } catch (err) {
      this.log.warn(`link: failed to send ${packet.type}: ${describeError(err)}`);
    }
  }

  private emitState(event: SessionStateEvent): void {
    this.router.notifySessionState(event);
    this.emit("session-state", event);
  }
}

function describeClose(info: ConnectionCloseInfo): string {
  const reason = info.reason || info.error?.message || "closed";
  return `${info.code} ${reason}`;
}
