import os from "node:os";
import { z } from "zod";

export const DEFAULT_LINK_PORT = 1716;
export const DEFAULT_CONTROL_PORT = 1764;

const PortSchema = z.number().int().min(0).max(65_535);

const DiscoverySchema = z
  .object({
    enabled: z.boolean().default(true),
    port: PortSchema.default(DEFAULT_LINK_PORT),
    broadcastAddresses: z.array(z.string().min(1)).min(1).default(["255.255.255.255"]),
    intervalMs: z.number().int().min(1000).default(5_000),
    missedAnnouncements: z.number().int().min(1).default(6),
  })
  .strict();

const ReconnectSchema = z
  .object({
    baseMs: z.number().int().min(1).default(1_000),
    maxMs: z.number().int().min(1).default(30_000),
    multiplier: z.number().min(1).default(2),
  })
  .strict()
  .refine((value) => value.maxMs >= value.baseMs, { message: "reconnect.maxMs must be >= reconnect.baseMs" });

export const LinkConfigSchema = z
  .object({
    deviceName: z.string().trim().min(1).max(64).default(() => os.hostname() || "devicelink"),
    deviceType: z.enum(["desktop", "laptop", "phone", "tablet", "tv"]).default("desktop"),
    host: z.string().min(1).default("0.0.0.0"),
    port: PortSchema.default(DEFAULT_LINK_PORT),
    controlPort: PortSchema.default(DEFAULT_CONTROL_PORT),
    discovery: DiscoverySchema.default({}),
    reconnect: ReconnectSchema.default({}),
    pairingTimeoutMs: z.number().int().min(1000).default(30_000),
    keepAliveIntervalMs: z.number().int().min(1000).default(30_000),
    connectionTimeoutMs: z.number().int().min(1000).default(60_000),
    disabledPlugins: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .refine((value) => value.connectionTimeoutMs > value.keepAliveIntervalMs, {
    message: "connectionTimeoutMs must exceed keepAliveIntervalMs",
  });
