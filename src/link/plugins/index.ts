import type { DevicePlugin } from "../router.js";
import { ClipboardPlugin } from "./clipboard.js";
import { PingPlugin } from "./ping.js";
import { SharePlugin } from "./share.js";

export { ClipboardPlugin, PACKET_TYPE_CLIPBOARD, PACKET_TYPE_CLIPBOARD_CONNECT } from "./clipboard.js";
export { PingPlugin, PACKET_TYPE_PING } from "./ping.js";
export { SharePlugin, PACKET_TYPE_SHARE_REQUEST } from "./share.js";

export const BUILTIN_PLUGIN_IDS = ["ping", "clipboard", "share"] as const;

/** The built-in plugins, minus the ones switched off in config. */
export function createBuiltinPlugins(opts: { disabled?: readonly string[] } = {}): DevicePlugin[] {
  const disabled = new Set(opts.disabled ?? []);
  const plugins: DevicePlugin[] = [new PingPlugin(), new ClipboardPlugin(), new SharePlugin()];
  return plugins.filter((plugin) => !disabled.has(plugin.id));
}
