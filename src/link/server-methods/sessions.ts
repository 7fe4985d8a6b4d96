import type { ConnectionManager } from "../manager.js";
import { DeviceParamsSchema, parseParams, respondWithError, type ControlRequestHandlers } from "./types.js";

export function createLinkSessionsHandlers(deps: { manager: ConnectionManager }): ControlRequestHandlers {
  return {
    "link.sessions.list": ({ respond }) => {
      respond(true, { sessions: deps.manager.currentSessions() });
    },

    "link.connect": async ({ params, respond }) => {
      const parsed = parseParams(DeviceParamsSchema, params, respond);
      if (!parsed) {
        return;
      }
      try {
        await deps.manager.connect(parsed.deviceId);
        respond(true, { session: deps.manager.getSession(parsed.deviceId) });
      } catch (err) {
        respondWithError(respond, err);
      }
    },

    "link.disconnect": ({ params, respond }) => {
      const parsed = parseParams(DeviceParamsSchema, params, respond);
      if (!parsed) {
        return;
      }
      respond(true, deps.manager.disconnect(parsed.deviceId));
    },
  };
}
