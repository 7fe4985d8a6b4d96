import crypto from "node:crypto";

/**
 * SHA-256 fingerprint of a raw base64url public key, formatted the way
 * certificate fingerprints are shown to users: upper-case hex pairs joined by ":".
 */
export function fingerprintPublicKey(publicKeyRawBase64Url: string): string {
  const digest = crypto
    .createHash("sha256")
    .update(Buffer.from(publicKeyRawBase64Url, "base64url"))
    .digest("hex")
    .toUpperCase();
  return digest.match(/.{2}/g)?.join(":") ?? digest;
}
