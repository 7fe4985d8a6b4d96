export type DeviceLinkErrorCategory =
  | "network"
  | "protocol"
  | "trust"
  | "pairing"
  | "plugin"
  | "storage"
  | "config";

/**
 * Base class for errors raised by the link engine.
 *
 * `code` is stable and machine-readable; `category` follows the error taxonomy
 * (network errors are retried, protocol errors drop the offending unit, trust
 * and storage errors are surfaced to the operator).
 */
export class DeviceLinkError extends Error {
  override readonly name: string = "DeviceLinkError";

  constructor(
    message: string,
    readonly code: string,
    readonly category: DeviceLinkErrorCategory,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A frame could not be decoded into a packet. Fatal to its connection only. */
export class FramingError extends DeviceLinkError {
  override readonly name = "FramingError";

  constructor(
    message: string,
    readonly closeCode: number = 1007,
    options?: { cause?: unknown },
  ) {
    super(message, "FRAMING_ERROR", "protocol", options);
  }
}

export class TrustStoreCorruptError extends DeviceLinkError {
  override readonly name = "TrustStoreCorruptError";

  constructor(
    readonly filePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`trust store at ${filePath} is unreadable: ${detail}`, "TRUST_STORE_CORRUPT", "storage", options);
  }
}

export class FingerprintConflictError extends DeviceLinkError {
  override readonly name = "FingerprintConflictError";

  constructor(
    readonly deviceId: string,
    readonly pinnedFingerprint: string,
    readonly presentedFingerprint: string,
  ) {
    super(
      `device ${deviceId} is already pinned to a different certificate; unpair it first`,
      "FINGERPRINT_CONFLICT",
      "trust",
    );
  }
}

export type PairingErrorCode =
  | "ALREADY_PAIRED"
  | "PAIRING_IN_PROGRESS"
  | "PAIRING_COOLDOWN"
  | "NO_PENDING_REQUEST"
  | "NOT_REACHABLE";

export class PairingError extends DeviceLinkError {
  override readonly name = "PairingError";

  constructor(code: PairingErrorCode, message: string) {
    super(message, code, "pairing");
  }
}

export class ConfigError extends DeviceLinkError {
  override readonly name = "ConfigError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INVALID_CONFIG", "config", options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
