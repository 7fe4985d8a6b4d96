import type { AddressInfo } from "node:net";
import { WebSocket, WebSocketServer } from "ws";
import { describeError } from "../infra/errors.js";
import { SILENT_LOGGER, type LinkLogger } from "../infra/logger.js";
import { rawDataToString } from "../infra/ws.js";
import { ControlRequestFrameSchema, type ControlResponseFrame } from "./control-protocol.js";
import type { ControlRequestHandlers, RpcError } from "./server-methods/types.js";

const CONTROL_MAX_PAYLOAD = 1024 * 1024;

export type ControlServerOptions = {
  host?: string;
  port: number;
  handlers: ControlRequestHandlers;
  log?: LinkLogger;
};

/**
 * Request/response endpoint for local tooling. Binds to loopback only; there
 * is no authentication beyond that.
 */
export class ControlServer {
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly handlers: ControlRequestHandlers;
  private readonly log: LinkLogger;
  private wss: WebSocketServer | null = null;

  constructor(opts: ControlServerOptions) {
    this.host = opts.host ?? "127.0.0.1";
    this.requestedPort = opts.port;
    this.handlers = opts.handlers;
    this.log = opts.log ?? SILENT_LOGGER;
  }

  async start(): Promise<{ host: string; port: number }> {
    if (this.wss) {
      return this.listenAddress();
    }
    this.wss = await new Promise<WebSocketServer>((resolve, reject) => {
      const server = new WebSocketServer({
        host: this.host,
        port: this.requestedPort,
        maxPayload: CONTROL_MAX_PAYLOAD,
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

    this.wss.on("connection", (socket) => {
      socket.on("message", (raw) => {
        void this.handleMessage(socket, rawDataToString(raw));
      });
      socket.on("error", (err) => {
        this.log.warn(`control: socket error: ${describeError(err)}`);
      });
    });

    const address = this.listenAddress();
    this.log.info(`control: listening on ws://${address.host}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    if (!wss) {
      return;
    }
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
  }

  listenAddress(): { host: string; port: number } {
    const addr: AddressInfo | string | null = this.wss?.address() ?? null;
    if (!addr || typeof addr === "string") {
      return { host: this.host, port: this.requestedPort };
    }
    return { host: addr.address, port: addr.port };
  }

  private async handleMessage(socket: WebSocket, raw: string): Promise<void> {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      send(socket, { type: "res", id: "", ok: false, error: { code: "INVALID_REQUEST", message: "frame is not JSON" } });
      return;
    }
    const parsed = ControlRequestFrameSchema.safeParse(value);
    if (!parsed.success) {
      send(socket, {
        type: "res",
        id: "",
        ok: false,
        error: { code: "INVALID_REQUEST", message: "expected a req frame with id and method" },
      });
      return;
    }
    const frame = parsed.data;
    let responded = false;
    const respond = (ok: boolean, payload?: unknown, error?: RpcError) => {
      if (responded) {
        return;
      }
      responded = true;
      send(socket, {
        type: "res",
        id: frame.id,
        ok,
        ...(payload !== undefined ? { payload } : {}),
        ...(error ? { error } : {}),
      });
    };

    const handler = this.handlers[frame.method];
    if (!handler) {
      respond(false, undefined, { code: "METHOD_NOT_FOUND", message: `unknown method: ${frame.method}` });
      return;
    }
    try {
      await handler({ params: frame.params ?? {}, respond });
    } catch (err) {
      this.log.error(`control: ${frame.method} failed: ${describeError(err)}`);
      respond(false, undefined, { code: "INTERNAL", message: describeError(err) });
    }
  }
}

function send(socket: WebSocket, frame: ControlResponseFrame): void {
  if (socket.readyState !== WebSocket.OPEN) {
    return;
  }
  socket.send(JSON.stringify(frame));
}
