import type { DevicePlugin, PluginHost, PluginPacketContext, SendResult } from "../router.js";
import type { Packet, PayloadDescriptor } from "../types.js";

export const PACKET_TYPE_SHARE_REQUEST = "devicelink.share.request";

const MAX_RECORDED_OFFERS = 50;

export type ShareOffer = {
  deviceId: string;
  filename?: string;
  text?: string;
  url?: string;
  payload?: PayloadDescriptor;
  receivedAtMs: number;
};

/**
 * Records what peers offer to share. Binary payloads are not fetched here:
 * the offer keeps the descriptor (size, where to fetch it, digest) for
 * whatever transfer mechanism picks it up.
 */
export class SharePlugin implements DevicePlugin {
  readonly id = "share";
  readonly incoming = [PACKET_TYPE_SHARE_REQUEST];
  readonly outgoing = [PACKET_TYPE_SHARE_REQUEST];
  private host: PluginHost | null = null;
  private offers: ShareOffer[] = [];

  init(host: PluginHost): void {
    this.host = host;
  }

  onPacket(packet: Packet, context: PluginPacketContext): void {
    const { filename, text, url } = packet.body;
    const offer: ShareOffer = {
      deviceId: context.deviceId,
      ...(typeof filename === "string" ? { filename } : {}),
      ...(typeof text === "string" ? { text } : {}),
      ...(typeof url === "string" ? { url } : {}),
      ...(context.payload ? { payload: context.payload } : {}),
      receivedAtMs: Date.now(),
    };
    this.offers.push(offer);
    if (this.offers.length > MAX_RECORDED_OFFERS) {
      this.offers.splice(0, this.offers.length - MAX_RECORDED_OFFERS);
    }
  }

  shareFile(deviceId: string, params: { filename: string; payload: PayloadDescriptor }): SendResult {
    if (!this.host) {
      return { ok: false, error: { code: "NOT_CONNECTED", message: "share plugin is not registered" } };
    }
    return this.host.send(deviceId, PACKET_TYPE_SHARE_REQUEST, { filename: params.filename }, { payload: params.payload });
  }

  shareText(deviceId: string, text: string): SendResult {
    if (!this.host) {
      return { ok: false, error: { code: "NOT_CONNECTED", message: "share plugin is not registered" } };
    }
    return this.host.send(deviceId, PACKET_TYPE_SHARE_REQUEST, { text });
  }

  listOffers(deviceId?: string): ShareOffer[] {
    return this.offers.filter((offer) => !deviceId || offer.deviceId === deviceId).map((offer) => ({ ...offer }));
  }
}
