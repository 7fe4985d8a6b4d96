import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import { WebSocket } from "ws";
import { DeviceLinkError, FramingError } from "../infra/errors.js";
import { rawDataToString } from "../infra/ws.js";
import { decodePacket, encodePacket, MAX_FRAME_BYTES } from "./packet.js";
import type { Packet, PeerAddress } from "./types.js";

export type ConnectionCloseInfo = {
  code: number;
  reason: string;
  /** True when this side called close(). */
  initiatedLocally: boolean;
  error?: Error;
};

export type PacketConnectionEvents = {
  packet: [packet: Packet];
  close: [info: ConnectionCloseInfo];
};

/** Opens an outbound connection to a peer's link port. */
export type LinkDialer = (address: PeerAddress) => Promise<PacketConnection>;

/**
 * A reliable, ordered channel carrying one packet per frame.
 *
 * Connections start paused: decoded packets (and a close) are held until the
 * owner has attached its listeners and calls resume(), so nothing sent by the
 * peer right after the connection opens is lost.
 */
export abstract class PacketConnection extends EventEmitter<PacketConnectionEvents> {
  readonly connId = randomUUID();
  abstract readonly remoteAddress: string | undefined;

  private paused = true;
  private backlog: Packet[] = [];
  private closing = false;
  private closeInfo: ConnectionCloseInfo | null = null;
  private closeEmitted = false;
  private transportError: Error | undefined;

  get isClosed(): boolean {
    return this.closing || this.closeInfo !== null;
  }

  resume(): void {
    if (!this.paused) {
      return;
    }
    this.paused = false;
    const backlog = this.backlog;
    this.backlog = [];
    for (const packet of backlog) {
      this.emit("packet", packet);
    }
    this.emitCloseIfReady();
  }

  send(packet: Packet): void {
    if (this.isClosed) {
      throw new DeviceLinkError(`connection ${this.connId} is closed`, "NOT_OPEN", "network");
    }
    this.writeFrame(encodePacket(packet));
  }

  close(code: number = 1000, reason: string = ""): void {
    if (this.isClosed) {
      return;
    }
    this.closing = true;
    this.closeTransport(code, reason.slice(0, 120));
  }

  protected abstract writeFrame(frame: string): void;

  protected abstract closeTransport(code: number, reason: string): void;

  protected receiveFrame(frame: string): void {
    if (this.isClosed) {
      return;
    }
    let packet: Packet;
    try {
      packet = decodePacket(frame);
    } catch (err) {
      if (err instanceof FramingError) {
        this.transportError = err;
        this.close(err.closeCode, err.message);
        return;
      }
      throw err;
    }
    if (this.paused) {
      this.backlog.push(packet);
      return;
    }
    this.emit("packet", packet);
  }

  protected recordTransportError(err: Error): void {
    this.transportError ??= err;
  }

  protected finishClose(code: number, reason: string): void {
    if (this.closeInfo) {
      return;
    }
    this.closeInfo = {
      code,
      reason,
      initiatedLocally: this.closing,
      ...(this.transportError ? { error: this.transportError } : {}),
    };
    this.emitCloseIfReady();
  }

  private emitCloseIfReady(): void {
    if (this.paused || !this.closeInfo || this.closeEmitted) {
      return;
    }
    this.closeEmitted = true;
    this.emit("close", this.closeInfo);
  }
}

export function normalizeRemoteHost(host: string | undefined): string | undefined {
  if (!host) {
    return undefined;
  }
  return host.startsWith("::ffff:") ? host.slice("::ffff:".length) : host;
}

export class WebSocketPacketConnection extends PacketConnection {
  readonly remoteAddress: string | undefined;
  private readonly socket: WebSocket;

  constructor(socket: WebSocket, remoteAddress?: string) {
    super();
    this.socket = socket;
    this.remoteAddress = normalizeRemoteHost(remoteAddress);
    socket.on("message", (data) => this.receiveFrame(rawDataToString(data)));
    socket.on("close", (code, reason) => this.finishClose(code, rawDataToString(reason)));
    socket.on("error", (err) => this.recordTransportError(err));
    if (socket.readyState === WebSocket.CLOSED) {
      this.finishClose(1006, "socket already closed");
    }
  }

  protected writeFrame(frame: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new DeviceLinkError("websocket is not open", "NOT_OPEN", "network");
    }
    this.socket.send(frame);
  }

  protected closeTransport(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSED) {
      this.finishClose(code, reason);
      return;
    }
    this.socket.close(code, reason);
  }
}

function formatHostForUrl(host: string): string {
  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
}

/**
 * Dial a peer's link port over WebSocket.
 */
export function dialWebSocket(address: PeerAddress, opts: { timeoutMs?: number } = {}): Promise<PacketConnection> {
  const url = `ws://${formatHostForUrl(address.host)}:${address.port}`;
  return new Promise<PacketConnection>((resolve, reject) => {
    const socket = new WebSocket(url, {
      maxPayload: MAX_FRAME_BYTES,
      handshakeTimeout: opts.timeoutMs ?? 10_000,
    });
    const onOpen = () => {
      socket.off("error", onError);
      resolve(new WebSocketPacketConnection(socket, address.host));
    };
    const onError = (err: Error) => {
      socket.off("open", onOpen);
      reject(new DeviceLinkError(`connect to ${url} failed: ${err.message}`, "CONNECT_FAILED", "network", { cause: err }));
    };
    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}

/** Dialer bound to a connect timeout, for the connection manager. */
export function createWebSocketDialer(opts: { timeoutMs?: number } = {}): LinkDialer {
  return (address) => dialWebSocket(address, opts);
}
