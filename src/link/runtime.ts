import type { AddressInfo } from "node:net";
import { WebSocketServer } from "ws";
import type { LinkConfig } from "../config/types.link.js";
import type { DeviceIdentity } from "../infra/device-identity.js";
import { describeError } from "../infra/errors.js";
import { DEFAULT_LOGGER, shortId, type LinkLogger } from "../infra/logger.js";
import { createWebSocketDialer, WebSocketPacketConnection, type LinkDialer } from "./connection.js";
import { ControlServer } from "./control-server.js";
import { createUdpAnnouncementSocket, LanDiscovery, type AnnouncementSocket } from "./discovery.js";
import { ConnectionManager } from "./manager.js";
import { MAX_FRAME_BYTES } from "./packet.js";
import { createBuiltinPlugins } from "./plugins/index.js";
import type { DevicePlugin } from "./router.js";
import { createLinkPairingHandlers } from "./server-methods/pairing.js";
import { createLinkPeersHandlers } from "./server-methods/peers.js";
import { createLinkSessionsHandlers } from "./server-methods/sessions.js";
import { createLinkTrustHandlers } from "./server-methods/trust.js";
import type { ControlRequestHandlers } from "./server-methods/types.js";
import { TrustStore } from "./trust-store.js";

export type LinkNodeRuntimeOptions = {
  identity: DeviceIdentity;
  config: LinkConfig;
  trustStore?: TrustStore;
  /** Defaults to the built-in plugins minus config.disabledPlugins. */
  plugins?: DevicePlugin[];
  announcementSocket?: AnnouncementSocket;
  dialer?: LinkDialer;
  log?: LinkLogger;
};

/**
 * One device on the network: the link listener, LAN discovery, the
 * connection manager and the loopback control plane.
 */
export class LinkNodeRuntime {
  readonly manager: ConnectionManager;
  readonly trustStore: TrustStore;

  private readonly config: LinkConfig;
  private readonly announcementSocket?: AnnouncementSocket;
  private readonly log: LinkLogger;
  private wss: WebSocketServer | null = null;
  private discovery: LanDiscovery | null = null;
  private control: ControlServer | null = null;

  constructor(opts: LinkNodeRuntimeOptions) {
    this.config = opts.config;
    this.log = opts.log ?? DEFAULT_LOGGER;
    this.announcementSocket = opts.announcementSocket;
    this.trustStore = opts.trustStore ?? new TrustStore();
    this.manager = new ConnectionManager({
      identity: opts.identity,
      deviceName: opts.config.deviceName,
      deviceType: opts.config.deviceType,
      trustStore: this.trustStore,
      dialer: opts.dialer ?? createWebSocketDialer(),
      plugins: opts.plugins ?? createBuiltinPlugins({ disabled: opts.config.disabledPlugins }),
      reconnect: opts.config.reconnect,
      pairingTimeoutMs: opts.config.pairingTimeoutMs,
      keepAliveIntervalMs: opts.config.keepAliveIntervalMs,
      connectionTimeoutMs: opts.config.connectionTimeoutMs,
      log: this.log,
    });
  }

  async start(): Promise<{ host: string; port: number }> {
    if (this.wss) {
      return this.listenAddress();
    }
    await this.trustStore.load();
    try {
      await this.startListener();
      this.manager.advertisePort(this.listenAddress().port);
      this.manager.start();
      await this.startDiscovery();
      this.control = new ControlServer({
        port: this.config.controlPort,
        handlers: this.controlHandlers(),
        log: this.log,
      });
      await this.control.start();
    } catch (err) {
      await this.stop();
      throw err;
    }
    return this.listenAddress();
  }

  async stop(): Promise<void> {
    const control = this.control;
    this.control = null;
    await control?.stop();

    const discovery = this.discovery;
    this.discovery = null;
    await discovery?.stop();

    await this.manager.stop();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }
    await this.trustStore.flush();
  }

  listenAddress(): { host: string; port: number } {
    const addr: AddressInfo | string | null = this.wss?.address() ?? null;
    if (!addr || typeof addr === "string") {
      return { host: this.config.host, port: this.config.port };
    }
    return { host: addr.address, port: addr.port };
  }

  controlAddress(): { host: string; port: number } | null {
    return this.control?.listenAddress() ?? null;
  }

  /** Every control-plane method, bound to this runtime. */
  controlHandlers(): ControlRequestHandlers {
    return {
      ...createLinkPeersHandlers({ manager: this.manager, discovery: this.discovery }),
      ...createLinkSessionsHandlers({ manager: this.manager }),
      ...createLinkPairingHandlers({ manager: this.manager }),
      ...createLinkTrustHandlers({ manager: this.manager }),
    };
  }

  private async startListener(): Promise<void> {
    this.wss = await new Promise<WebSocketServer>((resolve, reject) => {
      const server = new WebSocketServer({
        host: this.config.host,
        port: this.config.port,
        maxPayload: MAX_FRAME_BYTES,
      });
      const onError = (err: Error) => {
        server.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        server.off("error", onError);
        resolve(server);
      };
      server.once("error", onError);
      server.once("listening", onListening);
    });
    this.wss.on("connection", (socket, request) => {
      this.manager.acceptConnection(new WebSocketPacketConnection(socket, request.socket.remoteAddress));
    });
    this.wss.on("error", (err) => {
      this.log.error(`link: listener error: ${describeError(err)}`);
    });
    const address = this.listenAddress();
    this.log.info(
      `link: listening on ws://${address.host}:${address.port} (deviceId=${shortId(this.manager.localDeviceId)})`,
    );
  }

  private async startDiscovery(): Promise<void> {
    if (!this.config.discovery.enabled) {
      return;
    }
    const socket = this.announcementSocket ?? createUdpAnnouncementSocket({ log: this.log });
    const discovery = new LanDiscovery({
      localInfo: () => this.manager.localInfo(),
      socket,
      port: this.config.discovery.port,
      broadcastAddresses: this.config.discovery.broadcastAddresses,
      intervalMs: this.config.discovery.intervalMs,
      missedAnnouncements: this.config.discovery.missedAnnouncements,
      log: this.log,
    });
    discovery.on("peer-discovered", (peer) => this.manager.handleDiscoveredPeer(peer));
    discovery.on("peer-updated", (peer) => this.manager.handleDiscoveredPeer(peer));
    try {
      await discovery.start();
    } catch (err) {
      this.log.warn(
        `discovery: cannot bind udp port ${this.config.discovery.port}, continuing without discovery: ${describeError(err)}`,
      );
      await socket.close();
      return;
    }
    this.discovery = discovery;
  }
}
