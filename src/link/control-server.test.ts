import { afterEach, describe, expect, it } from "vitest";
import { WebSocket } from "ws";
import { errnoCode } from "../infra/json-file.js";
import { rawDataToString } from "../infra/ws.js";
import { callControl } from "./control-client.js";
import { ControlServer } from "./control-server.js";
import type { ControlRequestHandlers } from "./server-methods/types.js";

const handlers: ControlRequestHandlers = {
  "test.echo": ({ params, respond }) => {
    respond(true, { echoed: params });
  },
  "test.fail": ({ respond }) => {
    respond(false, undefined, { code: "NOT_PAIRED", message: "device x is not paired" });
  },
  "test.throw": () => {
    throw new Error("boom");
  },
  "test.twice": ({ respond }) => {
    respond(true, { n: 1 });
    respond(true, { n: 2 });
  },
  "test.silent": () => {},
};

let server: ControlServer | null = null;

afterEach(async () => {
  await server?.stop();
  server = null;
});

async function startOrSkip(): Promise<number | null> {
  server = new ControlServer({ port: 0, handlers });
  try {
    return (await server.start()).port;
  } catch (err) {
    const code = errnoCode(err);
    if (code === "EPERM" || code === "EACCES") {
      server = null;
      return null;
    }
    throw err;
  }
}

function sendRaw(port: number, frame: string): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(`ws://127.0.0.1:${port}`);
    socket.once("open", () => socket.send(frame));
    socket.once("message", (raw) => {
      socket.close();
      resolve(JSON.parse(rawDataToString(raw)));
    });
    socket.once("error", reject);
  });
}

describe("ControlServer", () => {
  it("answers requests through callControl", async () => {
    const port = await startOrSkip();
    if (port === null) {
      return;
    }
    expect(server?.listenAddress()).toEqual({ host: "127.0.0.1", port });

    await expect(callControl({ port, method: "test.echo", params: { deviceId: "peer-a" } })).resolves.toEqual({
      ok: true,
      payload: { echoed: { deviceId: "peer-a" } },
    });
    await expect(callControl({ port, method: "test.fail" })).resolves.toEqual({
      ok: false,
      error: { code: "NOT_PAIRED", message: "device x is not paired" },
    });
    await expect(callControl({ port, method: "test.twice" })).resolves.toEqual({ ok: true, payload: { n: 1 } });
  });

  it("reports unknown methods and handler failures", async () => {
    const port = await startOrSkip();
    if (port === null) {
      return;
    }
    await expect(callControl({ port, method: "test.missing" })).resolves.toEqual({
      ok: false,
      error: { code: "METHOD_NOT_FOUND", message: "unknown method: test.missing" },
    });
    await expect(callControl({ port, method: "test.throw" })).resolves.toEqual({
      ok: false,
      error: { code: "INTERNAL", message: "boom" },
    });
  });

  it("rejects frames that are not requests", async () => {
    const port = await startOrSkip();
    if (port === null) {
      return;
    }
    await expect(sendRaw(port, "{nope")).resolves.toEqual({
      type: "res",
      id: "",
      ok: false,
      error: { code: "INVALID_REQUEST", message: "frame is not JSON" },
    });
    await expect(sendRaw(port, JSON.stringify({ type: "req", method: "test.echo" }))).resolves.toEqual({
      type: "res",
      id: "",
      ok: false,
      error: { code: "INVALID_REQUEST", message: "expected a req frame with id and method" },
    });
  });

  it("times out when a handler never responds", async () => {
    const port = await startOrSkip();
    if (port === null) {
      return;
    }
    await expect(callControl({ port, method: "test.silent", timeoutMs: 100 })).rejects.toMatchObject({
      code: "CONTROL_TIMEOUT",
    });
  });
});

describe("callControl", () => {
  it("fails when nothing is listening", async () => {
    const port = await startOrSkip();
    if (port === null) {
      return;
    }
    await server?.stop();
    server = null;
    await expect(callControl({ port, method: "test.echo", timeoutMs: 2_000 })).rejects.toMatchObject({
      code: "CONTROL_UNAVAILABLE",
    });
  });
});
