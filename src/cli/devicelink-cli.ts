import { Command } from "commander";
import { z } from "zod";
import { loadLinkConfig } from "../config/load.js";
import { resolveTrustStorePath } from "../config/paths.js";
import type { LinkConfig } from "../config/types.link.js";
import { loadOrCreateDeviceIdentity, publicKeyRawBase64UrlFromPem } from "../infra/device-identity.js";
import { fingerprintPublicKey } from "../infra/fingerprint.js";
import { callControl, type ControlCallResult } from "../link/control-client.js";
import { LinkNodeRuntime } from "../link/runtime.js";
import { TrustStore } from "../link/trust-store.js";

type ControlCaller = typeof callControl;

export type DeviceLinkCliOptions = {
  /** Replaces the control-plane client (tests). */
  callControl?: ControlCaller;
};

const PeersPayloadSchema = z.object({
  peers: z.array(
    z.object({
      deviceId: z.string(),
      deviceName: z.string(),
      host: z.string(),
      port: z.number(),
      trusted: z.boolean(),
      connected: z.boolean(),
    }),
  ),
});

const SessionsPayloadSchema = z.object({
  sessions: z.array(
    z.object({
      deviceId: z.string(),
      deviceName: z.string(),
      outbound: z.boolean(),
      remoteAddress: z.string().optional(),
      capabilities: z.object({ receivable: z.array(z.string()), sendable: z.array(z.string()) }),
    }),
  ),
});

const AttemptSchema = z.object({
  deviceId: z.string(),
  direction: z.enum(["outgoing", "incoming"]),
  state: z.string(),
  deviceName: z.string().optional(),
  peerFingerprint: z.string().optional(),
  expiresAtMs: z.number(),
  reason: z.string().optional(),
});

const PendingPayloadSchema = z.object({ pending: z.array(AttemptSchema) });
const AttemptPayloadSchema = z.object({ attempt: AttemptSchema });
const RemovedPayloadSchema = z.object({ removed: z.boolean() });
const DisconnectedPayloadSchema = z.object({ disconnected: z.boolean() });

const StatusPayloadSchema = z.object({
  deviceId: z.string(),
  deviceName: z.string(),
  protocolVersion: z.number(),
  sessions: z.number(),
  pendingPairings: z.number(),
  trustedDevices: z.number(),
  plugins: z.array(z.string()),
  reconnecting: z.array(z.object({ deviceId: z.string(), failures: z.number() })),
  discovery: z.boolean(),
  discoveredPeers: z.number(),
});

function collectOption(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`invalid port "${value}"`);
  }
  return port;
}

function unwrap<T>(method: string, result: ControlCallResult, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (!result.ok) {
    throw new Error(`${method} failed: ${result.error.code}: ${result.error.message}`);
  }
  const parsed = schema.safeParse(result.payload);
  if (!parsed.success) {
    throw new Error(`${method} returned an unexpected response`);
  }
  return parsed.data;
}

function describeAttempt(attempt: z.infer<typeof AttemptSchema>): string {
  const name = attempt.deviceName ? ` (${attempt.deviceName})` : "";
  const reason = attempt.reason ? `: ${attempt.reason}` : "";
  return `${attempt.deviceId}${name} ${attempt.state}${reason}`;
}

export function createDeviceLinkCli(cliOpts: DeviceLinkCliOptions = {}): Command {
  const call = cliOpts.callControl ?? callControl;
  const program = new Command();
  program
    .name("devicelink")
    .description("devicelink: pair, connect and exchange packets with nearby devices")
    .version("0.1.0")
    .option("--control-port <port>", "Control port of the running daemon (defaults to the configured one)", parsePort);

  const request = async <T>(
    method: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> => {
    const globals = program.opts<{ controlPort?: number }>();
    const port = globals.controlPort ?? (await loadLinkConfig()).controlPort;
    return unwrap(method, await call({ port, method, params }), schema);
  };

  // ── identity ─────────────────────────────────────────────
  program
    .command("identity")
    .description("Print this device's id and certificate fingerprint")
    .action(() => {
      const identity = loadOrCreateDeviceIdentity();
      const fingerprint = fingerprintPublicKey(publicKeyRawBase64UrlFromPem(identity.publicKeyPem));
      console.log(`Device ID:   ${identity.deviceId}`);
      console.log(`Fingerprint: ${fingerprint}`);
    });

  // ── daemon ───────────────────────────────────────────────
  program
    .command("start")
    .description("Run the device daemon (discovery, links, control plane)")
    .option("--host <host>", "Interface for inbound links")
    .option("--port <port>", "Port for inbound links", parsePort)
    .option("--name <name>", "Device name announced to peers")
    .option("--no-discovery", "Do not broadcast or listen for announcements")
    .option("--disable-plugin <id>", "Plugin to leave unloaded (repeatable)", collectOption, [])
    .action(
      async (opts: {
        host?: string;
        port?: number;
        name?: string;
        discovery: boolean;
        disablePlugin: string[];
      }) => {
        const globals = program.opts<{ controlPort?: number }>();
        const loaded = await loadLinkConfig();
        const config: LinkConfig = {
          ...loaded,
          ...(opts.host ? { host: opts.host } : {}),
          ...(opts.port !== undefined ? { port: opts.port } : {}),
          ...(opts.name ? { deviceName: opts.name } : {}),
          ...(globals.controlPort !== undefined ? { controlPort: globals.controlPort } : {}),
          discovery: { ...loaded.discovery, enabled: loaded.discovery.enabled && opts.discovery },
          disabledPlugins: [...loaded.disabledPlugins, ...opts.disablePlugin],
        };
        const identity = loadOrCreateDeviceIdentity();
        const runtime = new LinkNodeRuntime({ identity, config });
        runtime.manager.on("pairing-request", (attempt) => {
          console.log(
            `Pairing request from ${attempt.deviceName ?? attempt.deviceId} (${attempt.deviceId})\n` +
              `  fingerprint ${attempt.peerFingerprint ?? "unknown"}\n` +
              `  run "devicelink accept ${attempt.deviceId}" or "devicelink reject ${attempt.deviceId}"`,
          );
        });

        const address = await runtime.start();
        const control = runtime.controlAddress();
        console.log(`Device ID:   ${identity.deviceId}`);
        console.log(`Listening:   ws://${address.host}:${address.port}`);
        if (control) {
          console.log(`Control:     ws://${control.host}:${control.port}`);
        }
        console.log(`Plugins:     ${runtime.manager.status().plugins.join(", ") || "(none)"}`);
        console.log("Press Ctrl+C to stop.");

        await new Promise<void>((resolve) => {
          const shutdown = async () => {
            process.off("SIGINT", onSignal);
            process.off("SIGTERM", onSignal);
            await runtime.stop();
            resolve();
          };
          const onSignal = () => {
            void shutdown();
          };
          process.once("SIGINT", onSignal);
          process.once("SIGTERM", onSignal);
        });
      },
    );

  // ── discovery and sessions ───────────────────────────────
  program
    .command("peers")
    .description("List devices heard on the network")
    .action(async () => {
      const { peers } = await request("link.peers.list", {}, PeersPayloadSchema);
      if (peers.length === 0) {
        console.log("No devices discovered.");
        return;
      }
      for (const peer of peers) {
        const flags = [peer.trusted ? "paired" : "unpaired", ...(peer.connected ? ["connected"] : [])];
        console.log(`  ${peer.deviceId} (${peer.deviceName})  ${peer.host}:${peer.port}  ${flags.join(", ")}`);
      }
    });

  program
    .command("sessions")
    .description("List connected devices")
    .action(async () => {
      const { sessions } = await request("link.sessions.list", {}, SessionsPayloadSchema);
      if (sessions.length === 0) {
        console.log("No connected devices.");
        return;
      }
      for (const session of sessions) {
        const direction = session.outbound ? "outbound" : "inbound";
        const where = session.remoteAddress ? ` ${session.remoteAddress}` : "";
        console.log(`  ${session.deviceId} (${session.deviceName}) ${direction}${where}`);
        console.log(`    sends: ${session.capabilities.sendable.join(", ") || "(none)"}`);
        console.log(`    receives: ${session.capabilities.receivable.join(", ") || "(none)"}`);
      }
    });

  program
    .command("connect <deviceId>")
    .description("Open a session to a paired device")
    .action(async (deviceId: string) => {
      await request("link.connect", { deviceId }, z.unknown());
      console.log(`Connected: ${deviceId}`);
    });

  program
    .command("disconnect <deviceId>")
    .description("Close a device's session and stop reconnecting to it")
    .action(async (deviceId: string) => {
      const { disconnected } = await request("link.disconnect", { deviceId }, DisconnectedPayloadSchema);
      console.log(disconnected ? `Disconnected: ${deviceId}` : `No session with ${deviceId}`);
    });

  // ── pairing ──────────────────────────────────────────────
  program
    .command("pending")
    .description("List pairing requests in progress")
    .action(async () => {
      const { pending } = await request("link.pairing.pending", {}, PendingPayloadSchema);
      if (pending.length === 0) {
        console.log("No pending pairing requests.");
        return;
      }
      for (const attempt of pending) {
        const fingerprint = attempt.peerFingerprint ? `  ${attempt.peerFingerprint}` : "";
        console.log(`  ${attempt.direction} ${describeAttempt(attempt)}${fingerprint}`);
      }
    });

  program
    .command("pair <deviceId>")
    .description("Ask a discovered device to pair")
    .action(async (deviceId: string) => {
      const { attempt } = await request("link.pairing.request", { deviceId }, AttemptPayloadSchema);
      console.log(`Pairing: ${describeAttempt(attempt)}`);
    });

  program
    .command("accept <deviceId>")
    .description("Accept a device's pairing request")
    .action(async (deviceId: string) => {
      const { attempt } = await request("link.pairing.respond", { deviceId, accept: true }, AttemptPayloadSchema);
      console.log(`Pairing: ${describeAttempt(attempt)}`);
    });

  program
    .command("reject <deviceId>")
    .description("Reject a device's pairing request")
    .action(async (deviceId: string) => {
      const { attempt } = await request("link.pairing.respond", { deviceId, accept: false }, AttemptPayloadSchema);
      console.log(`Pairing: ${describeAttempt(attempt)}`);
    });

  program
    .command("unpair <deviceId>")
    .description("Forget a paired device")
    .action(async (deviceId: string) => {
      const { removed } = await request("link.unpair", { deviceId }, RemovedPayloadSchema);
      console.log(removed ? `Unpaired: ${deviceId}` : `Device not paired: ${deviceId}`);
    });

  // ── trust ────────────────────────────────────────────────
  const trust = program.command("trust").description("Inspect paired devices");

  trust
    .command("list")
    .description("List paired devices from the local trust store")
    .action(async () => {
      const store = new TrustStore({ filePath: resolveTrustStorePath() });
      await store.load();
      const devices = store.list();
      if (devices.length === 0) {
        console.log("No paired devices.");
        return;
      }
      for (const device of devices) {
        const name = device.deviceName ? ` (${device.deviceName})` : "";
        console.log(`  ${device.deviceId}${name}  ${device.fingerprint}  paired ${device.pairedAt}`);
      }
    });

  // ── status ───────────────────────────────────────────────
  program
    .command("status")
    .description("Show daemon status")
    .action(async () => {
      const status = await request("link.status", {}, StatusPayloadSchema);
      console.log(`Device ID:   ${status.deviceId}`);
      console.log(`Name:        ${status.deviceName}`);
      console.log(`Protocol:    ${status.protocolVersion}`);
      console.log(`Sessions:    ${status.sessions}`);
      console.log(`Paired:      ${status.trustedDevices}`);
      console.log(`Pending:     ${status.pendingPairings}`);
      console.log(`Discovery:   ${status.discovery ? `on (${status.discoveredPeers} peers)` : "off"}`);
      console.log(`Plugins:     ${status.plugins.join(", ") || "(none)"}`);
      for (const entry of status.reconnecting) {
        console.log(`Reconnecting ${entry.deviceId} (${entry.failures} failures)`);
      }
    });

  return program;
}
