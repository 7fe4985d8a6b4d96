export type DeviceType = "desktop" | "laptop" | "phone" | "tablet" | "tv";

/** Local protocol version announced in identity packets. */
export const PROTOCOL_VERSION = 7;

/** Oldest peer protocol version we still talk to. */
export const MIN_PROTOCOL_VERSION = 7;

/** What a device announces about itself (discovery and the connection handshake). */
export type DeviceInfo = {
  deviceId: string;
  deviceName: string;
  deviceType: DeviceType;
  protocolVersion: number;
  /** Packet types this device can receive. */
  incomingCapabilities: string[];
  /** Packet types this device can send. */
  outgoingCapabilities: string[];
  /** TCP port the device accepts link connections on. */
  tcpPort?: number;
};

export type PeerAddress = {
  host: string;
  port: number;
};

/** A device seen on the network. Observational only; never implies trust. */
export type PeerRecord = {
  info: DeviceInfo;
  address: PeerAddress;
  discoveredAtMs: number;
  lastSeenMs: number;
};

export type TrustedDevice = {
  deviceId: string;
  /** SHA-256 fingerprint of the pinned public key. */
  fingerprint: string;
  /** Raw Ed25519 public key (base64url). */
  publicKey: string;
  deviceName?: string;
  deviceType?: DeviceType;
  pairedAt: string;
  /** Per-plugin flags; a missing entry means enabled. */
  plugins: Record<string, boolean>;
};

export type PayloadTransferInfo = {
  port?: number;
  host?: string;
  sha256?: string;
  [key: string]: unknown;
};

export type Packet = {
  /** Sender clock in ms; informational. */
  id: number;
  type: string;
  body: Record<string, unknown>;
  /** Size of an out-of-band binary payload, if any. */
  payloadSize?: number;
  /** Where to fetch the binary payload from. */
  payloadTransferInfo?: PayloadTransferInfo;
};

export type PayloadDescriptor = {
  size: number;
  transferInfo: PayloadTransferInfo;
  sha256?: string;
};

/** A peer whose certificate and proof of key possession have been verified on a link. */
export type AuthenticatedPeer = {
  info: DeviceInfo;
  publicKey: string;
  fingerprint: string;
};

export type NegotiatedCapabilities = {
  /** local.incoming ∩ peer.outgoing */
  receivable: string[];
  /** local.outgoing ∩ peer.incoming */
  sendable: string[];
};

export type SessionState = "connected" | "disconnected" | "pairing";

export type SessionStateEvent = {
  deviceId: string;
  state: SessionState;
  reason?: string;
  atMs: number;
};

export type SecurityEvent = {
  kind: "certificate-mismatch";
  deviceId: string;
  pinnedFingerprint: string;
  presentedFingerprint: string;
  remoteAddress?: string;
  atMs: number;
};
