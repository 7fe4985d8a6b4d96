import type { ConnectionManager } from "../manager.js";
import {
  DeviceParamsSchema,
  PairingRespondParamsSchema,
  parseParams,
  respondWithError,
  type ControlRequestHandlers,
} from "./types.js";

export function createLinkPairingHandlers(deps: { manager: ConnectionManager }): ControlRequestHandlers {
  return {
    "link.pairing.pending": ({ respond }) => {
      respond(true, { pending: deps.manager.listPendingPairings() });
    },

    "link.pairing.request": async ({ params, respond }) => {
      const parsed = parseParams(DeviceParamsSchema, params, respond);
      if (!parsed) {
        return;
      }
      try {
        respond(true, { attempt: await deps.manager.requestPairing(parsed.deviceId) });
      } catch (err) {
        respondWithError(respond, err);
      }
    },

    "link.pairing.respond": async ({ params, respond }) => {
      const parsed = parseParams(PairingRespondParamsSchema, params, respond);
      if (!parsed) {
        return;
      }
      try {
        respond(true, { attempt: await deps.manager.respondToPairing(parsed.deviceId, parsed.accept) });
      } catch (err) {
        respondWithError(respond, err);
      }
    },
  };
}
