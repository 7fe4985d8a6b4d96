import type { ConnectionManager } from "../manager.js";
import {
  DeviceParamsSchema,
  parseParams,
  PluginSetParamsSchema,
  respondWithError,
  type ControlRequestHandlers,
} from "./types.js";

export function createLinkTrustHandlers(deps: { manager: ConnectionManager }): ControlRequestHandlers {
  return {
    "link.trust.list": ({ respond }) => {
      const devices = deps.manager.trustStore.list().map((device) => ({
        deviceId: device.deviceId,
        deviceName: device.deviceName,
        deviceType: device.deviceType,
        fingerprint: device.fingerprint,
        pairedAt: device.pairedAt,
        plugins: device.plugins,
        connected: deps.manager.sessions.has(device.deviceId),
      }));
      respond(true, { devices });
    },

    "link.unpair": async ({ params, respond }) => {
      const parsed = parseParams(DeviceParamsSchema, params, respond);
      if (!parsed) {
        return;
      }
      try {
        respond(true, await deps.manager.unpair(parsed.deviceId));
      } catch (err) {
        respondWithError(respond, err);
      }
    },

    "link.plugin.set": async ({ params, respond }) => {
      const parsed = parseParams(PluginSetParamsSchema, params, respond);
      if (!parsed) {
        return;
      }
      try {
        await deps.manager.setPluginEnabled(parsed.deviceId, parsed.pluginId, parsed.enabled);
        respond(true, { deviceId: parsed.deviceId, pluginId: parsed.pluginId, enabled: parsed.enabled });
      } catch (err) {
        respondWithError(respond, err);
      }
    },

    "link.security.events": ({ respond }) => {
      respond(true, { events: deps.manager.listSecurityEvents() });
    },
  };
}
