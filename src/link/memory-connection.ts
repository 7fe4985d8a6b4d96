/**
 * In-memory transport.
 *
 * Connections come in linked pairs: a frame written on one side is decoded on
 * the other on a later microtask, through the same codec as the WebSocket
 * transport. MemoryNetwork maps host:port to accept callbacks so several
 * connection managers can dial each other inside one process.
 */

import { DeviceLinkError } from "../infra/errors.js";
import { PacketConnection, type LinkDialer } from "./connection.js";
import type { PeerAddress } from "./types.js";

export class MemoryPacketConnection extends PacketConnection {
  readonly remoteAddress: string | undefined;
  private peer: MemoryPacketConnection | null = null;
  private ended = false;

  constructor(remoteAddress?: string) {
    super();
    this.remoteAddress = remoteAddress;
  }

  link(peer: MemoryPacketConnection): void {
    this.peer = peer;
  }

  /** Deliver raw text to the peer, bypassing the encoder. */
  sendRaw(frame: string): void {
    const peer = this.peer;
    if (!peer || this.ended) {
      return;
    }
    queueMicrotask(() => peer.receiveFrame(frame));
  }

  /** Simulate the network vanishing under both ends (no close handshake). */
  drop(): void {
    const peer = this.peer;
    queueMicrotask(() => {
      this.end(1006, "connection lost");
      peer?.end(1006, "connection lost");
    });
  }

  /** End this side only. The peer keeps a half-open connection and its writes go nowhere. */
  dropLocal(): void {
    queueMicrotask(() => this.end(1006, "connection lost"));
  }

  protected writeFrame(frame: string): void {
    this.sendRaw(frame);
  }

  protected closeTransport(code: number, reason: string): void {
    const peer = this.peer;
    queueMicrotask(() => {
      this.end(code, reason);
      peer?.end(code, reason);
    });
  }

  private end(code: number, reason: string): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.finishClose(code, reason);
  }
}

export function createMemoryConnectionPair(params: {
  /** Address the first end sees for its peer. */
  hostA?: string;
  /** Address the second end sees for its peer. */
  hostB?: string;
} = {}): [MemoryPacketConnection, MemoryPacketConnection] {
  const a = new MemoryPacketConnection(params.hostA);
  const b = new MemoryPacketConnection(params.hostB);
  a.link(b);
  b.link(a);
  return [a, b];
}

type Listener = (connection: PacketConnection) => void;

export class MemoryNetwork {
  private listeners = new Map<string, Listener>();
  private unreachableHosts = new Set<string>();
  private connections: Array<{ hosts: [string, string]; end: MemoryPacketConnection }> = [];

  listen(address: PeerAddress, accept: Listener): () => void {
    const key = `${address.host}:${address.port}`;
    this.listeners.set(key, accept);
    return () => {
      if (this.listeners.get(key) === accept) {
        this.listeners.delete(key);
      }
    };
  }

  setReachable(host: string, reachable: boolean): void {
    if (reachable) {
      this.unreachableHosts.delete(host);
    } else {
      this.unreachableHosts.add(host);
    }
  }

  /**
   * Drop every open connection that has `host` at one end. With `halfOpen`
   * only the dialing end notices.
   */
  dropHost(host: string, opts: { halfOpen?: boolean } = {}): void {
    for (const entry of this.connections) {
      if (!entry.hosts.includes(host)) {
        continue;
      }
      if (opts.halfOpen) {
        entry.end.dropLocal();
      } else {
        entry.end.drop();
      }
    }
    this.connections = this.connections.filter((entry) => !entry.hosts.includes(host));
  }

  dialer(localHost: string): LinkDialer {
    return async (address) => {
      const accept = this.listeners.get(`${address.host}:${address.port}`);
      if (!accept || this.unreachableHosts.has(address.host) || this.unreachableHosts.has(localHost)) {
        throw new DeviceLinkError(
          `connect to ${address.host}:${address.port} failed: unreachable`,
          "CONNECT_FAILED",
          "network",
        );
      }
      const [client, server] = createMemoryConnectionPair({ hostA: address.host, hostB: localHost });
      this.connections.push({ hosts: [localHost, address.host], end: client });
      accept(server);
      return client;
    };
  }
}
