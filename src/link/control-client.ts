import { randomUUID } from "node:crypto";
import { WebSocket } from "ws";
import { DeviceLinkError } from "../infra/errors.js";
import { rawDataToString } from "../infra/ws.js";
import { ControlResponseFrameSchema, type ControlRequestFrame } from "./control-protocol.js";
import type { RpcError } from "./server-methods/types.js";

export type ControlCallResult = { ok: true; payload: unknown } | { ok: false; error: RpcError };

/** Send one request to a running daemon's control plane and wait for its response. */
export function callControl(opts: {
  port: number;
  host?: string;
  method: string;
  params?: Record<string, unknown>;
  timeoutMs?: number;
}): Promise<ControlCallResult> {
  const url = `ws://${opts.host ?? "127.0.0.1"}:${opts.port}`;
  const request: ControlRequestFrame = {
    type: "req",
    id: randomUUID(),
    method: opts.method,
    params: opts.params ?? {},
  };
  return new Promise<ControlCallResult>((resolve, reject) => {
    const socket = new WebSocket(url);
    let settled = false;
    const finish = (outcome: { result: ControlCallResult } | { error: Error }) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.close();
      if ("result" in outcome) {
        resolve(outcome.result);
      } else {
        reject(outcome.error);
      }
    };
    const timer = setTimeout(() => {
      finish({
        error: new DeviceLinkError(`no response to ${opts.method} from ${url}`, "CONTROL_TIMEOUT", "network"),
      });
    }, opts.timeoutMs ?? 15_000);

    socket.once("open", () => socket.send(JSON.stringify(request)));
    socket.on("message", (raw) => {
      let value: unknown;
      try {
        value = JSON.parse(rawDataToString(raw));
      } catch {
        return;
      }
      const parsed = ControlResponseFrameSchema.safeParse(value);
      if (!parsed.success || parsed.data.id !== request.id) {
        return;
      }
      const frame = parsed.data;
      finish({
        result: frame.ok
          ? { ok: true, payload: frame.payload }
          : { ok: false, error: frame.error ?? { code: "UNKNOWN", message: "request failed" } },
      });
    });
    socket.on("error", (err) => {
      finish({
        error: new DeviceLinkError(
          `control plane at ${url} is unavailable (is the daemon running?): ${err.message}`,
          "CONTROL_UNAVAILABLE",
          "network",
          { cause: err },
        ),
      });
    });
    socket.once("close", () => {
      finish({ error: new DeviceLinkError(`control plane at ${url} closed the connection`, "CONTROL_CLOSED", "network") });
    });
  });
}
