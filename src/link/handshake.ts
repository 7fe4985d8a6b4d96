import crypto from "node:crypto";
import {
  publicKeyRawBase64UrlFromPem,
  signDevicePayload,
  verifyDeviceSignature,
} from "../infra/device-identity.js";
import type { DeviceIdentity } from "../infra/device-identity.js";
import { fingerprintPublicKey } from "../infra/fingerprint.js";
import type { CertificateBody } from "./packet.js";

/**
 * Self-signature payload binding a device id to its public key.
 * Format: "devicelink.certificate|v1|deviceId|publicKey"
 */
export function buildCertificatePayload(params: { deviceId: string; publicKey: string }): string {
  return ["devicelink.certificate", "v1", params.deviceId, params.publicKey].join("|");
}

/**
 * Proof-of-possession payload: the signer answers the verifier's nonce.
 * Format: "devicelink.auth|v1|signerDeviceId|verifierDeviceId|nonce"
 */
export function buildAuthPayload(params: {
  signerDeviceId: string;
  verifierDeviceId: string;
  nonce: string;
}): string {
  return [
    "devicelink.auth",
    "v1",
    params.signerDeviceId,
    params.verifierDeviceId,
    params.nonce,
  ].join("|");
}

export function createNonce(): string {
  return crypto.randomBytes(24).toString("base64url");
}

/**
 * Build the certificate this device presents on every new connection.
 */
export function buildCertificate(params: { identity: DeviceIdentity; nonce: string }): CertificateBody {
  const publicKey = publicKeyRawBase64UrlFromPem(params.identity.publicKeyPem);
  const signature = signDevicePayload(
    params.identity.privateKeyPem,
    buildCertificatePayload({ deviceId: params.identity.deviceId, publicKey }),
  );
  return {
    deviceId: params.identity.deviceId,
    publicKey,
    signature,
    nonce: params.nonce,
  };
}

export type CertificateVerification =
  | { ok: true; fingerprint: string }
  | { ok: false; reason: string };

/**
 * Check that a presented certificate is self-consistent: the signature binds
 * the claimed device id to the key. Whether that key is the one we trust for
 * the device is the trust store's call, not this function's.
 */
export function verifyCertificate(
  cert: CertificateBody,
  expectedDeviceId: string,
): CertificateVerification {
  if (cert.deviceId !== expectedDeviceId) {
    return { ok: false, reason: "certificate device id does not match identity" };
  }
  const valid = verifyDeviceSignature(
    cert.publicKey,
    buildCertificatePayload({ deviceId: cert.deviceId, publicKey: cert.publicKey }),
    cert.signature,
  );
  if (!valid) {
    return { ok: false, reason: "certificate signature is invalid" };
  }
  return { ok: true, fingerprint: fingerprintPublicKey(cert.publicKey) };
}

export function signAuthProof(params: {
  identity: DeviceIdentity;
  peerDeviceId: string;
  peerNonce: string;
}): string {
  return signDevicePayload(
    params.identity.privateKeyPem,
    buildAuthPayload({
      signerDeviceId: params.identity.deviceId,
      verifierDeviceId: params.peerDeviceId,
      nonce: params.peerNonce,
    }),
  );
}

export function verifyAuthProof(params: {
  peerDeviceId: string;
  peerPublicKey: string;
  localDeviceId: string;
  localNonce: string;
  signature: string;
}): boolean {
  return verifyDeviceSignature(
    params.peerPublicKey,
    buildAuthPayload({
      signerDeviceId: params.peerDeviceId,
      verifierDeviceId: params.localDeviceId,
      nonce: params.localNonce,
    }),
    params.signature,
  );
}
