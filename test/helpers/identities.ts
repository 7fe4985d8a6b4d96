import { generateDeviceIdentity, publicKeyRawBase64UrlFromPem, type DeviceIdentity } from "../../src/infra/device-identity.js";
import { fingerprintPublicKey } from "../../src/infra/fingerprint.js";

export type TestDevice = {
  identity: DeviceIdentity;
  publicKey: string;
  fingerprint: string;
};

/** A fresh key pair under a readable device id. */
export function createTestDevice(deviceId: string): TestDevice {
  const identity = generateDeviceIdentity(deviceId);
  const publicKey = publicKeyRawBase64UrlFromPem(identity.publicKeyPem);
  return { identity, publicKey, fingerprint: fingerprintPublicKey(publicKey) };
}
