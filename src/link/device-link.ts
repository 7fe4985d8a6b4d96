import { EventEmitter } from "node:events";
import type { DeviceIdentity } from "../infra/device-identity.js";
import { DeviceLinkError } from "../infra/errors.js";
import { SILENT_LOGGER, shortId, type LinkLogger } from "../infra/logger.js";
import type { ConnectionCloseInfo, PacketConnection } from "./connection.js";
import {
  AuthBodySchema,
  buildIdentityPacket,
  CertificateBodySchema,
  createPacket,
  PACKET_TYPE_AUTH,
  PACKET_TYPE_CERTIFICATE,
  PACKET_TYPE_IDENTITY,
  parseDeviceInfo,
} from "./packet.js";
import {
  buildCertificate,
  createNonce,
  signAuthProof,
  verifyAuthProof,
  verifyCertificate,
} from "./handshake.js";
import { MIN_PROTOCOL_VERSION, type AuthenticatedPeer, type DeviceInfo, type Packet } from "./types.js";

/** Close codes used by the engine (4000-4999 is the application range). */
export const LinkCloseCode = {
  NORMAL: 1000,
  SHUTDOWN: 1001,
  DUPLICATE: 4000,
  PROTOCOL_ERROR: 4001,
  HANDSHAKE_TIMEOUT: 4002,
  CERTIFICATE_MISMATCH: 4003,
  UNPAIRED: 4004,
  AUTH_FAILED: 4005,
  DISCONNECT_REQUESTED: 4006,
  KEEPALIVE_TIMEOUT: 4008,
} as const;

export type DeviceLinkState = "handshaking" | "authenticated" | "closed";

export type DeviceLinkEvents = {
  authenticated: [peer: AuthenticatedPeer];
  packet: [packet: Packet];
  closed: [info: ConnectionCloseInfo];
};

export type DeviceLinkOptions = {
  connection: PacketConnection;
  /** Whether this side dialed the connection. */
  outbound: boolean;
  identity: DeviceIdentity;
  localInfo: DeviceInfo;
  /** Outbound dials to a known device refuse any other device id. */
  expectedDeviceId?: string;
  handshakeTimeoutMs?: number;
  log?: LinkLogger;
};

/**
 * One transport connection and its handshake.
 *
 * Both sides send identity and certificate, then answer the peer's nonce with a
 * signature. The link is authenticated once the peer's certificate verifies
 * and its proof of key possession checks out. Anything else the peer sends
 * before that is held and delivered, in order, right after `authenticated`.
 */
export class DeviceLink extends EventEmitter<DeviceLinkEvents> {
  readonly linkId: string;
  readonly outbound: boolean;
  readonly connection: PacketConnection;
  readonly openedAtMs = Date.now();
  lastActivityMs = Date.now();

  private readonly identity: DeviceIdentity;
  private readonly localInfo: DeviceInfo;
  private readonly expectedDeviceId?: string;
  private readonly handshakeTimeoutMs: number;
  private readonly log: LinkLogger;
  private readonly localNonce = createNonce();

  private _state: DeviceLinkState = "handshaking";
  private peerInfo: DeviceInfo | null = null;
  private peerCert: { publicKey: string; fingerprint: string } | null = null;
  private authenticatedPeer: AuthenticatedPeer | null = null;
  private held: Packet[] = [];
  private handshakeTimer: ReturnType<typeof setTimeout> | null = null;
  private started = false;

  constructor(opts: DeviceLinkOptions) {
    super();
    this.connection = opts.connection;
    this.linkId = opts.connection.connId;
    this.outbound = opts.outbound;
    this.identity = opts.identity;
    this.localInfo = opts.localInfo;
    this.expectedDeviceId = opts.expectedDeviceId;
    this.handshakeTimeoutMs = opts.handshakeTimeoutMs ?? 10_000;
    this.log = opts.log ?? SILENT_LOGGER;
  }

  get state(): DeviceLinkState {
    return this._state;
  }

  get peer(): AuthenticatedPeer | null {
    return this.authenticatedPeer;
  }

  get remoteAddress(): string | undefined {
    return this.connection.remoteAddress;
  }

  /** Device id from the peer's identity packet; not yet verified before `authenticated`. */
  get claimedDeviceId(): string | undefined {
    return this.peerInfo?.deviceId;
  }

  /** Device id that dialed this connection, once known. */
  get initiatorDeviceId(): string | undefined {
    if (this.outbound) {
      return this.identity.deviceId;
    }
    return this.peerInfo?.deviceId;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.connection.on("packet", (packet) => this.handlePacket(packet));
    this.connection.on("close", (info) => this.handleClose(info));
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      if (this._state === "handshaking") {
        this.fail(LinkCloseCode.HANDSHAKE_TIMEOUT, "handshake timed out");
      }
    }, this.handshakeTimeoutMs);
    this.handshakeTimer.unref?.();
    // Our certificate must go out before the backlog is replayed: a buffered
    // peer certificate makes us answer with auth straight away.
    if (!this.connection.isClosed) {
      this.write(buildIdentityPacket(this.localInfo));
      this.write(
        createPacket(PACKET_TYPE_CERTIFICATE, {
          ...buildCertificate({ identity: this.identity, nonce: this.localNonce }),
        }),
      );
    }
    this.connection.resume();
  }

  send(packet: Packet): void {
    if (this._state !== "authenticated") {
      throw new DeviceLinkError(
        `link ${this.linkId} is ${this._state}, cannot send ${packet.type}`,
        "NOT_AUTHENTICATED",
        "network",
      );
    }
    this.connection.send(packet);
  }

  close(code: number = LinkCloseCode.NORMAL, reason: string = ""): void {
    this.clearHandshakeTimer();
    this.connection.close(code, reason);
  }

  private write(packet: Packet): void {
    try {
      this.connection.send(packet);
    } catch (err) {
      this.log.warn(`link: failed to send ${packet.type}: ${String(err)}`);
      this.close(LinkCloseCode.PROTOCOL_ERROR, "send failed");
    }
  }

  private handlePacket(packet: Packet): void {
    if (this._state === "closed") {
      return;
    }
    this.lastActivityMs = Date.now();
    if (this._state === "authenticated") {
      if (
        packet.type === PACKET_TYPE_IDENTITY ||
        packet.type === PACKET_TYPE_CERTIFICATE ||
        packet.type === PACKET_TYPE_AUTH
      ) {
        this.log.warn(`link: ignoring ${packet.type} after handshake from ${this.describePeer()}`);
        return;
      }
      this.emit("packet", packet);
      return;
    }

    switch (packet.type) {
      case PACKET_TYPE_IDENTITY:
        this.handleIdentity(packet);
        return;
      case PACKET_TYPE_CERTIFICATE:
        this.handleCertificate(packet);
        return;
      case PACKET_TYPE_AUTH:
        this.handleAuth(packet);
        return;
      default:
        this.held.push(packet);
    }
  }

  private handleIdentity(packet: Packet): void {
    if (this.peerInfo) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "duplicate identity");
      return;
    }
    const info = parseDeviceInfo(packet.body);
    if (!info) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "invalid identity");
      return;
    }
    if (info.deviceId === this.identity.deviceId) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "connected to self");
      return;
    }
    if (this.expectedDeviceId && info.deviceId !== this.expectedDeviceId) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "unexpected device id");
      return;
    }
    if (info.protocolVersion < MIN_PROTOCOL_VERSION) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, `unsupported protocol version ${info.protocolVersion}`);
      return;
    }
    if (info.protocolVersion !== this.localInfo.protocolVersion) {
      this.log.info(
        `link: ${shortId(info.deviceId)} speaks protocol v${info.protocolVersion} (local v${this.localInfo.protocolVersion})`,
      );
    }
    this.peerInfo = info;
  }

  private handleCertificate(packet: Packet): void {
    if (!this.peerInfo) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "certificate before identity");
      return;
    }
    if (this.peerCert) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "duplicate certificate");
      return;
    }
    const parsed = CertificateBodySchema.safeParse(packet.body);
    if (!parsed.success) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "invalid certificate");
      return;
    }
    const verification = verifyCertificate(parsed.data, this.peerInfo.deviceId);
    if (!verification.ok) {
      this.fail(LinkCloseCode.AUTH_FAILED, verification.reason);
      return;
    }
    this.peerCert = { publicKey: parsed.data.publicKey, fingerprint: verification.fingerprint };
    this.write(
      createPacket(PACKET_TYPE_AUTH, {
        signature: signAuthProof({
          identity: this.identity,
          peerDeviceId: this.peerInfo.deviceId,
          peerNonce: parsed.data.nonce,
        }),
      }),
    );
  }

  private handleAuth(packet: Packet): void {
    if (!this.peerInfo || !this.peerCert) {
      this.fail(LinkCloseCode.PROTOCOL_ERROR, "auth before certificate");
      return;
    }
    const parsed = AuthBodySchema.safeParse(packet.body);
    const valid =
      parsed.success &&
      verifyAuthProof({
        peerDeviceId: this.peerInfo.deviceId,
        peerPublicKey: this.peerCert.publicKey,
        localDeviceId: this.identity.deviceId,
        localNonce: this.localNonce,
        signature: parsed.data.signature,
      });
    if (!valid) {
      this.fail(LinkCloseCode.AUTH_FAILED, "proof of key possession failed");
      return;
    }
    this.clearHandshakeTimer();
    this._state = "authenticated";
    this.authenticatedPeer = {
      info: this.peerInfo,
      publicKey: this.peerCert.publicKey,
      fingerprint: this.peerCert.fingerprint,
    };
    this.emit("authenticated", this.authenticatedPeer);
    const held = this.held;
    this.held = [];
    for (const queued of held) {
      if (this._state !== "authenticated") {
        break;
      }
      this.emit("packet", queued);
    }
  }

  private handleClose(info: ConnectionCloseInfo): void {
    if (this._state === "closed") {
      return;
    }
    this.clearHandshakeTimer();
    this._state = "closed";
    this.held = [];
    this.emit("closed", info);
  }

  private fail(code: number, reason: string): void {
    this.log.warn(`link: closing ${this.describePeer()}: ${reason}`);
    this.close(code, reason);
  }

  private describePeer(): string {
    const id = this.peerInfo ? shortId(this.peerInfo.deviceId) : "unidentified peer";
    return this.remoteAddress ? `${id} (${this.remoteAddress})` : id;
  }

  private clearHandshakeTimer(): void {
    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }
  }
}
