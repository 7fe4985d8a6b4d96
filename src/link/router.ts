import { EventEmitter } from "node:events";
import { DeviceLinkError, describeError } from "../infra/errors.js";
import { SILENT_LOGGER, shortId, type LinkLogger } from "../infra/logger.js";
import { CapabilityRegistry, type LocalCapabilities } from "./capabilities.js";
import { createPacket, payloadDescriptorOf, RESERVED_PACKET_TYPES } from "./packet.js";
import type {
  DeviceInfo,
  NegotiatedCapabilities,
  Packet,
  PayloadDescriptor,
  SessionStateEvent,
} from "./types.js";

export type SendErrorCode = "NOT_CONNECTED" | "CAPABILITY_REJECTED" | "PLUGIN_DISABLED" | "SEND_FAILED";

export type SendResult = { ok: true } | { ok: false; error: { code: SendErrorCode; message: string } };

export type SendOptions = {
  /** Announce an out-of-band binary payload with the packet. */
  payload?: PayloadDescriptor;
};

/** What a plugin can do: send through its own capability set, and ask who is connected. */
export interface PluginHost {
  send(deviceId: string, type: string, body?: Record<string, unknown>, options?: SendOptions): SendResult;
  isConnected(deviceId: string): boolean;
  connectedDevices(): string[];
  log: LinkLogger;
}

export type PluginPacketContext = {
  deviceId: string;
  peer: DeviceInfo;
  /** Present when the packet announces a binary payload. */
  payload?: PayloadDescriptor;
  host: PluginHost;
};

export interface DevicePlugin {
  readonly id: string;
  /** Packet types this plugin handles. */
  readonly incoming: readonly string[];
  /** Packet types this plugin sends. */
  readonly outgoing: readonly string[];
  /** Called once at registration with the host the plugin sends through. */
  init?(host: PluginHost): void;
  onPacket(packet: Packet, context: PluginPacketContext): void | Promise<void>;
  onSessionStateChanged?(event: SessionStateEvent, host: PluginHost): void;
}

export type RouterDiagnosticKind =
  | "unsupported-type"
  | "no-handler"
  | "plugin-disabled"
  | "handler-error";

export type RouterDiagnostic = {
  kind: RouterDiagnosticKind;
  deviceId: string;
  packetType: string;
  pluginId?: string;
  message?: string;
  atMs: number;
};

export type PacketRouterEvents = {
  diagnostic: [diagnostic: RouterDiagnostic];
};

export type PacketRouterOptions = {
  /** Write a packet to the device's session; throws when the transport refuses it. */
  transmit: (deviceId: string, packet: Packet) => void;
  isPluginEnabled: (deviceId: string, pluginId: string) => boolean;
  log?: LinkLogger;
};

type AttachedSession = {
  peer: DeviceInfo;
};

/**
 * Routes packets between sessions and plugins.
 *
 * Inbound packets run through a queue per (device, plugin), so a plugin sees
 * one device's packets in transport order and a slow or failing handler never
 * holds up other plugins or devices.
 */
export class PacketRouter extends EventEmitter<PacketRouterEvents> {
  private readonly transmit: PacketRouterOptions["transmit"];
  private readonly isPluginEnabled: PacketRouterOptions["isPluginEnabled"];
  private readonly log: LinkLogger;
  private plugins = new Map<string, DevicePlugin>();
  private handlerByType = new Map<string, DevicePlugin>();
  private hosts = new Map<string, PluginHost>();
  private capabilities = new CapabilityRegistry();
  private sessions = new Map<string, AttachedSession>();
  private queues = new Map<string, Promise<void>>();

  constructor(opts: PacketRouterOptions) {
    super();
    this.transmit = opts.transmit;
    this.isPluginEnabled = opts.isPluginEnabled;
    this.log = opts.log ?? SILENT_LOGGER;
  }

  register(plugin: DevicePlugin): void {
    if (this.plugins.has(plugin.id)) {
      throw new DeviceLinkError(`plugin ${plugin.id} is already registered`, "PLUGIN_CONFLICT", "plugin");
    }
    for (const type of [...plugin.incoming, ...plugin.outgoing]) {
      if (RESERVED_PACKET_TYPES.has(type)) {
        throw new DeviceLinkError(`plugin ${plugin.id} cannot use reserved type ${type}`, "PLUGIN_CONFLICT", "plugin");
      }
    }
    for (const type of plugin.incoming) {
      const owner = this.handlerByType.get(type);
      if (owner) {
        throw new DeviceLinkError(
          `plugins ${owner.id} and ${plugin.id} both handle ${type}`,
          "PLUGIN_CONFLICT",
          "plugin",
        );
      }
    }
    this.plugins.set(plugin.id, plugin);
    for (const type of plugin.incoming) {
      this.handlerByType.set(type, plugin);
    }
    const host = this.createHost(plugin);
    this.hosts.set(plugin.id, host);
    plugin.init?.(host);
  }

  listPlugins(): DevicePlugin[] {
    return [...this.plugins.values()];
  }

  /** Capabilities announced in our identity: the union over registered plugins. */
  localCapabilities(): LocalCapabilities {
    const incoming = new Set<string>();
    const outgoing = new Set<string>();
    for (const plugin of this.plugins.values()) {
      plugin.incoming.forEach((type) => incoming.add(type));
      plugin.outgoing.forEach((type) => outgoing.add(type));
    }
    return { incoming: [...incoming].sort(), outgoing: [...outgoing].sort() };
  }

  attachSession(deviceId: string, peer: DeviceInfo, negotiated: NegotiatedCapabilities): void {
    this.sessions.set(deviceId, { peer });
    this.capabilities.updatePeer(deviceId, negotiated);
  }

  detachSession(deviceId: string): void {
    this.sessions.delete(deviceId);
    this.capabilities.removePeer(deviceId);
  }

  getCapabilities(deviceId: string): NegotiatedCapabilities | null {
    return this.capabilities.getPeerCapabilities(deviceId);
  }

  /** Send on behalf of a plugin. Rejections happen before anything is transmitted. */
  send(
    deviceId: string,
    pluginId: string,
    type: string,
    body: Record<string, unknown> = {},
    options: SendOptions = {},
  ): SendResult {
    const plugin = this.plugins.get(pluginId);
    if (!plugin || !plugin.outgoing.includes(type)) {
      return rejected("CAPABILITY_REJECTED", `plugin ${pluginId} does not declare outgoing ${type}`);
    }
    if (!this.sessions.has(deviceId)) {
      return rejected("NOT_CONNECTED", `device ${deviceId} is not connected`);
    }
    if (!this.capabilities.canSend(deviceId, type)) {
      return rejected("CAPABILITY_REJECTED", `device ${deviceId} does not accept ${type}`);
    }
    if (!this.isPluginEnabled(deviceId, pluginId)) {
      return rejected("PLUGIN_DISABLED", `plugin ${pluginId} is disabled for ${deviceId}`);
    }
    try {
      this.transmit(deviceId, createPacket(type, body, options.payload));
    } catch (err) {
      return rejected("SEND_FAILED", describeError(err));
    }
    return { ok: true };
  }

  /** Hand an inbound packet to its plugin's queue, or drop it with a diagnostic. */
  dispatchInbound(deviceId: string, packet: Packet): void {
    const session = this.sessions.get(deviceId);
    if (!session || !this.capabilities.canReceive(deviceId, packet.type)) {
      this.drop("unsupported-type", deviceId, packet.type);
      return;
    }
    const plugin = this.handlerByType.get(packet.type);
    if (!plugin) {
      this.drop("no-handler", deviceId, packet.type);
      return;
    }
    if (!this.isPluginEnabled(deviceId, plugin.id)) {
      this.drop("plugin-disabled", deviceId, packet.type, plugin.id);
      return;
    }
    const host = this.hostFor(plugin);
    const payload = payloadDescriptorOf(packet);
    const context: PluginPacketContext = {
      deviceId,
      peer: session.peer,
      host,
      ...(payload ? { payload } : {}),
    };
    this.enqueue(`${deviceId}\u0000${plugin.id}`, async () => {
      try {
        await plugin.onPacket(packet, context);
      } catch (err) {
        this.log.error(
          `router: plugin ${plugin.id} failed on ${packet.type} from ${shortId(deviceId)}: ${describeError(err)}`,
        );
        this.emit("diagnostic", {
          kind: "handler-error",
          deviceId,
          packetType: packet.type,
          pluginId: plugin.id,
          message: describeError(err),
          atMs: Date.now(),
        });
      }
    });
  }

  notifySessionState(event: SessionStateEvent): void {
    for (const plugin of this.plugins.values()) {
      if (!plugin.onSessionStateChanged || !this.isPluginEnabled(event.deviceId, plugin.id)) {
        continue;
      }
      try {
        plugin.onSessionStateChanged(event, this.hostFor(plugin));
      } catch (err) {
        this.log.error(`router: plugin ${plugin.id} failed on session ${event.state}: ${describeError(err)}`);
      }
    }
  }

  /** Resolves once every queued inbound packet has been handled. */
  async drain(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.values()]);
    }
  }

  private enqueue(key: string, task: () => Promise<void>): void {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const tail = previous.then(task);
    this.queues.set(key, tail);
    void tail.then(() => {
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    });
  }

  private drop(kind: RouterDiagnosticKind, deviceId: string, packetType: string, pluginId?: string): void {
    this.log.debug?.(`router: dropped ${packetType} from ${shortId(deviceId)} (${kind})`);
    this.emit("diagnostic", {
      kind,
      deviceId,
      packetType,
      ...(pluginId ? { pluginId } : {}),
      atMs: Date.now(),
    });
  }

  private hostFor(plugin: DevicePlugin): PluginHost {
    let host = this.hosts.get(plugin.id);
    if (!host) {
      host = this.createHost(plugin);
      this.hosts.set(plugin.id, host);
    }
    return host;
  }

  private createHost(plugin: DevicePlugin): PluginHost {
    return {
      send: (deviceId, type, body, options) => this.send(deviceId, plugin.id, type, body, options),
      isConnected: (deviceId) => this.sessions.has(deviceId),
      connectedDevices: () => [...this.sessions.keys()],
      log: this.log,
    };
  }
}

function rejected(code: SendErrorCode, message: string): SendResult {
  return { ok: false, error: { code, message } };
}
