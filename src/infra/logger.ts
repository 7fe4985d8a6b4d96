export type LinkLogger = {
  debug?: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export const DEFAULT_LOGGER: LinkLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

export const SILENT_LOGGER: LinkLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Shorten a device id for log lines. */
export function shortId(deviceId: string): string {
  return deviceId.length > 12 ? `${deviceId.slice(0, 12)}…` : deviceId;
}
