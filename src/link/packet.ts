import { z } from "zod";
import { FramingError } from "../infra/errors.js";
import type { DeviceInfo, Packet, PayloadDescriptor } from "./types.js";

export const PACKET_TYPE_IDENTITY = "devicelink.identity";
export const PACKET_TYPE_CERTIFICATE = "devicelink.certificate";
export const PACKET_TYPE_AUTH = "devicelink.auth";
export const PACKET_TYPE_PAIR = "devicelink.pair";
export const PACKET_TYPE_KEEPALIVE = "devicelink.keepalive";

/** Types handled by the engine itself; plugins may not claim them. */
export const RESERVED_PACKET_TYPES: ReadonlySet<string> = new Set([
  PACKET_TYPE_IDENTITY,
  PACKET_TYPE_CERTIFICATE,
  PACKET_TYPE_AUTH,
  PACKET_TYPE_PAIR,
  PACKET_TYPE_KEEPALIVE,
]);

/** Largest accepted frame (one encoded packet). */
export const MAX_FRAME_BYTES = 10 * 1024 * 1024;

const PacketTypeSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[a-z0-9][a-z0-9._-]*$/i, "invalid packet type");

const PayloadTransferInfoSchema = z
  .object({
    port: z.number().int().min(1).max(65535).optional(),
    host: z.string().min(1).optional(),
    sha256: z
      .string()
      .regex(/^[a-f0-9]{64}$/i, "sha256 must be 64 hex characters")
      .optional(),
  })
  .passthrough();

const PacketSchema = z
  .object({
    id: z.number().finite(),
    type: PacketTypeSchema,
    body: z.record(z.unknown()),
    payloadSize: z.number().int().nonnegative().optional(),
    payloadTransferInfo: PayloadTransferInfoSchema.optional(),
  })
  .superRefine((value, ctx) => {
    if (value.payloadSize !== undefined && value.payloadTransferInfo === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "payloadSize requires payloadTransferInfo",
        path: ["payloadTransferInfo"],
      });
    }
  });

export function createPacket(
  type: string,
  body: Record<string, unknown> = {},
  payload?: PayloadDescriptor,
): Packet {
  const packet: Packet = { id: Date.now(), type, body };
  if (payload) {
    packet.payloadSize = payload.size;
    packet.payloadTransferInfo = payload.sha256
      ? { ...payload.transferInfo, sha256: payload.sha256 }
      : { ...payload.transferInfo };
  }
  return packet;
}

export function encodePacket(packet: Packet): string {
  const frame = JSON.stringify(packet);
  if (Buffer.byteLength(frame, "utf8") > MAX_FRAME_BYTES) {
    throw new FramingError(`packet ${packet.type} exceeds ${MAX_FRAME_BYTES} bytes`, 1009);
  }
  return frame;
}

/** Decode one frame. Throws FramingError; the caller closes the connection. */
export function decodePacket(frame: string): Packet {
  if (Buffer.byteLength(frame, "utf8") > MAX_FRAME_BYTES) {
    throw new FramingError(`frame exceeds ${MAX_FRAME_BYTES} bytes`, 1009);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch (err) {
    throw new FramingError("frame is not valid JSON", 1007, { cause: err });
  }
  const parsed = PacketSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new FramingError(`invalid packet${where}: ${issue?.message ?? "schema mismatch"}`);
  }
  const { id, type, body, payloadSize, payloadTransferInfo } = parsed.data;
  const packet: Packet = { id, type, body };
  if (payloadSize !== undefined && payloadTransferInfo !== undefined) {
    packet.payloadSize = payloadSize;
    packet.payloadTransferInfo = payloadTransferInfo;
  }
  return packet;
}

export function payloadDescriptorOf(packet: Packet): PayloadDescriptor | undefined {
  if (packet.payloadSize === undefined || packet.payloadTransferInfo === undefined) {
    return undefined;
  }
  const { sha256, ...transferInfo } = packet.payloadTransferInfo;
  return {
    size: packet.payloadSize,
    transferInfo,
    ...(typeof sha256 === "string" ? { sha256 } : {}),
  };
}

const DeviceTypeSchema = z.enum(["desktop", "laptop", "phone", "tablet", "tv"]).catch("desktop");

export const DeviceInfoSchema = z.object({
  deviceId: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_-]+$/, "device id may only contain letters, digits, '_' and '-'"),
  deviceName: z.string().trim().min(1).max(64),
  deviceType: DeviceTypeSchema,
  protocolVersion: z.number().int().positive(),
  incomingCapabilities: z.array(PacketTypeSchema).default([]),
  outgoingCapabilities: z.array(PacketTypeSchema).default([]),
  tcpPort: z.number().int().min(1).max(65535).optional(),
});

export function parseDeviceInfo(body: Record<string, unknown>): DeviceInfo | null {
  const parsed = DeviceInfoSchema.safeParse(body);
  return parsed.success ? parsed.data : null;
}

export function buildIdentityPacket(info: DeviceInfo): Packet {
  return createPacket(PACKET_TYPE_IDENTITY, { ...info });
}

export const CertificateBodySchema = z.object({
  deviceId: z.string().min(1),
  publicKey: z.string().regex(/^[A-Za-z0-9_-]{43}$/, "publicKey must be a raw base64url Ed25519 key"),
  signature: z.string().min(1),
  nonce: z.string().min(16),
});

export type CertificateBody = z.infer<typeof CertificateBodySchema>;

export const AuthBodySchema = z.object({
  signature: z.string().min(1),
});

export const PairBodySchema = z.object({
  pair: z.boolean(),
  reason: z.string().optional(),
  retryAfterMs: z.number().int().nonnegative().optional(),
});

export type PairBody = z.infer<typeof PairBodySchema>;

export function buildPairPacket(body: PairBody): Packet {
  return createPacket(PACKET_TYPE_PAIR, { ...body });
}
