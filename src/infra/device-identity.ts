import crypto from "node:crypto";
import { z } from "zod";
import { resolveIdentityPath } from "../config/paths.js";
import { DeviceLinkError } from "./errors.js";
import { readJsonFileSync, writeJsonFileAtomicallySync } from "./json-file.js";

export type DeviceIdentity = {
  /** Stable opaque id, independent of the key pair. */
  deviceId: string;
  publicKeyPem: string;
  privateKeyPem: string;
};

const StoredIdentitySchema = z.object({
  version: z.literal(1),
  deviceId: z.string().min(1),
  publicKeyPem: z.string().min(1),
  privateKeyPem: z.string().min(1),
  createdAtMs: z.number().int(),
});

/** Device ids are UUIDs with underscores, which keeps them safe in file names and DNS-SD labels. */
export function generateDeviceId(): string {
  return crypto.randomUUID().replace(/-/g, "_");
}

export function generateDeviceIdentity(deviceId: string = generateDeviceId()): DeviceIdentity {
  const { publicKey, privateKey } = crypto.generateKeyPairSync("ed25519");
  return {
    deviceId,
    publicKeyPem: publicKey.export({ type: "spki", format: "pem" }).toString(),
    privateKeyPem: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
  };
}

export function loadOrCreateDeviceIdentity(filePath: string = resolveIdentityPath()): DeviceIdentity {
  const read = readJsonFileSync(filePath);
  if (read.kind === "ok") {
    const parsed = StoredIdentitySchema.safeParse(read.value);
    if (!parsed.success) {
      throw new DeviceLinkError(
        `device identity at ${filePath} is invalid: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`,
        "IDENTITY_CORRUPT",
        "storage",
      );
    }
    const { deviceId, publicKeyPem, privateKeyPem } = parsed.data;
    return { deviceId, publicKeyPem, privateKeyPem };
  }
  if (read.kind === "invalid") {
    throw new DeviceLinkError(
      `device identity at ${filePath} is unreadable: ${read.error.message}`,
      "IDENTITY_CORRUPT",
      "storage",
      { cause: read.error },
    );
  }
  const identity = generateDeviceIdentity();
  writeJsonFileAtomicallySync(filePath, { version: 1, ...identity, createdAtMs: Date.now() });
  return identity;
}

/** Raw 32-byte Ed25519 public key, base64url. */
export function publicKeyRawBase64UrlFromPem(publicKeyPem: string): string {
  const jwk = crypto.createPublicKey(publicKeyPem).export({ format: "jwk" });
  if (typeof jwk.x !== "string") {
    throw new DeviceLinkError("public key is not an Ed25519 key", "INVALID_KEY", "trust");
  }
  return jwk.x;
}

export function signDevicePayload(privateKeyPem: string, payload: string): string {
  const key = crypto.createPrivateKey(privateKeyPem);
  return crypto.sign(null, Buffer.from(payload, "utf8"), key).toString("base64url");
}

/**
 * Verify a base64url signature against a raw base64url Ed25519 public key.
 * Malformed keys or signatures verify as false.
 */
export function verifyDeviceSignature(
  publicKeyRawBase64Url: string,
  payload: string,
  signatureBase64Url: string,
): boolean {
  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey({
      key: { kty: "OKP", crv: "Ed25519", x: publicKeyRawBase64Url },
      format: "jwk",
    });
  } catch {
    return false;
  }
  const signature = Buffer.from(signatureBase64Url, "base64url");
  if (signature.length !== 64) {
    return false;
  }
  return crypto.verify(null, Buffer.from(payload, "utf8"), key, signature);
}
