import { shortId } from "../../infra/logger.js";
import type { DevicePlugin, PluginHost, PluginPacketContext, SendResult } from "../router.js";
import type { Packet } from "../types.js";

export const PACKET_TYPE_PING = "devicelink.ping";

export type PingRecord = {
  count: number;
  lastMessage?: string;
  lastReceivedAtMs: number;
};

/**
 * Answers pings and counts them per device. A reply carries `reply: true` and
 * is never answered, so two devices never ping each other in a loop.
 */
export class PingPlugin implements DevicePlugin {
  readonly id = "ping";
  readonly incoming = [PACKET_TYPE_PING];
  readonly outgoing = [PACKET_TYPE_PING];
  private host: PluginHost | null = null;
  private received = new Map<string, PingRecord>();

  init(host: PluginHost): void {
    this.host = host;
  }

  onPacket(packet: Packet, context: PluginPacketContext): void {
    const message = typeof packet.body.message === "string" ? packet.body.message : undefined;
    const previous = this.received.get(context.deviceId);
    this.received.set(context.deviceId, {
      count: (previous?.count ?? 0) + 1,
      ...(message !== undefined ? { lastMessage: message } : {}),
      lastReceivedAtMs: Date.now(),
    });
    if (packet.body.reply === true) {
      return;
    }
    const result = context.host.send(context.deviceId, PACKET_TYPE_PING, { reply: true });
    if (!result.ok) {
      context.host.log.warn(`ping: reply to ${shortId(context.deviceId)} failed: ${result.error.message}`);
    }
  }

  ping(deviceId: string, message?: string): SendResult {
    if (!this.host) {
      return { ok: false, error: { code: "NOT_CONNECTED", message: "ping plugin is not registered" } };
    }
    return this.host.send(deviceId, PACKET_TYPE_PING, message !== undefined ? { message } : {});
  }

  stats(deviceId: string): PingRecord | null {
    const record = this.received.get(deviceId);
    return record ? { ...record } : null;
  }
}
