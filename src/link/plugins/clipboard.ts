import { shortId } from "../../infra/logger.js";
import type { DevicePlugin, PluginHost, PluginPacketContext, SendResult } from "../router.js";
import type { Packet, SessionStateEvent } from "../types.js";

export const PACKET_TYPE_CLIPBOARD = "devicelink.clipboard";
/** Sent on connect with the sender's current content and when it was set. */
export const PACKET_TYPE_CLIPBOARD_CONNECT = "devicelink.clipboard.connect";

export type ClipboardEntry = {
  content: string;
  timestampMs: number;
};

export class ClipboardPlugin implements DevicePlugin {
  readonly id = "clipboard";
  readonly incoming = [PACKET_TYPE_CLIPBOARD, PACKET_TYPE_CLIPBOARD_CONNECT];
  readonly outgoing = [PACKET_TYPE_CLIPBOARD, PACKET_TYPE_CLIPBOARD_CONNECT];
  private host: PluginHost | null = null;
  private local: ClipboardEntry | null = null;
  private remote = new Map<string, ClipboardEntry>();

  init(host: PluginHost): void {
    this.host = host;
  }

  onPacket(packet: Packet, context: PluginPacketContext): void {
    const content = packet.body.content;
    if (typeof content !== "string") {
      context.host.log.warn(`clipboard: ${packet.type} from ${shortId(context.deviceId)} has no content`);
      return;
    }
    if (packet.type === PACKET_TYPE_CLIPBOARD_CONNECT) {
      const timestampMs = typeof packet.body.timestamp === "number" ? packet.body.timestamp : 0;
      const current = this.remote.get(context.deviceId);
      // Connect packets only win over content that is older.
      if (timestampMs === 0 || (current && current.timestampMs >= timestampMs)) {
        return;
      }
      this.remote.set(context.deviceId, { content, timestampMs });
      return;
    }
    this.remote.set(context.deviceId, { content, timestampMs: Date.now() });
  }

  onSessionStateChanged(event: SessionStateEvent, host: PluginHost): void {
    if (event.state !== "connected" || !this.local) {
      return;
    }
    host.send(event.deviceId, PACKET_TYPE_CLIPBOARD_CONNECT, {
      content: this.local.content,
      timestamp: this.local.timestampMs,
    });
  }

  /** Set the local clipboard and push it to every connected device. */
  setLocalContent(content: string): Record<string, SendResult> {
    this.local = { content, timestampMs: Date.now() };
    const results: Record<string, SendResult> = {};
    if (!this.host) {
      return results;
    }
    for (const deviceId of this.host.connectedDevices()) {
      results[deviceId] = this.host.send(deviceId, PACKET_TYPE_CLIPBOARD, { content });
    }
    return results;
  }

  localContent(): ClipboardEntry | null {
    return this.local ? { ...this.local } : null;
  }

  remoteContent(deviceId: string): ClipboardEntry | null {
    const entry = this.remote.get(deviceId);
    return entry ? { ...entry } : null;
  }
}
