import { describe, expect, it } from "vitest";
import { createTestDevice } from "../../test/helpers/identities.js";
import { buildCertificate, createNonce, signAuthProof, verifyAuthProof, verifyCertificate } from "./handshake.js";

const laptop = createTestDevice("laptop_1");
const phone = createTestDevice("phone_1");

describe("certificate", () => {
  it("verifies a self-signed certificate and returns the key fingerprint", () => {
    const cert = buildCertificate({ identity: laptop.identity, nonce: createNonce() });
    expect(cert.publicKey).toBe(laptop.publicKey);
    expect(verifyCertificate(cert, "laptop_1")).toEqual({ ok: true, fingerprint: laptop.fingerprint });
  });

  it("formats fingerprints as 32 upper-case hex pairs", () => {
    expect(laptop.fingerprint).toMatch(/^([0-9A-F]{2}:){31}[0-9A-F]{2}$/);
  });

  it("rejects a certificate presented under another identity", () => {
    const cert = buildCertificate({ identity: laptop.identity, nonce: createNonce() });
    expect(verifyCertificate(cert, "phone_1")).toEqual({
      ok: false,
      reason: "certificate device id does not match identity",
    });
  });

  it("rejects a certificate whose key does not sign its device id", () => {
    const cert = { ...buildCertificate({ identity: phone.identity, nonce: createNonce() }), deviceId: "laptop_1" };
    expect(verifyCertificate(cert, "laptop_1")).toEqual({ ok: false, reason: "certificate signature is invalid" });
  });
});

describe("proof of possession", () => {
  it("accepts a signature over the verifier's nonce", () => {
    const nonce = createNonce();
    const signature = signAuthProof({ identity: phone.identity, peerDeviceId: "laptop_1", peerNonce: nonce });
    expect(
      verifyAuthProof({
        peerDeviceId: "phone_1",
        peerPublicKey: phone.publicKey,
        localDeviceId: "laptop_1",
        localNonce: nonce,
        signature,
      }),
    ).toBe(true);
  });

  it("rejects a replayed signature for a different nonce", () => {
    const signature = signAuthProof({ identity: phone.identity, peerDeviceId: "laptop_1", peerNonce: createNonce() });
    expect(
      verifyAuthProof({
        peerDeviceId: "phone_1",
        peerPublicKey: phone.publicKey,
        localDeviceId: "laptop_1",
        localNonce: createNonce(),
        signature,
      }),
    ).toBe(false);
  });

  it("rejects a signature made by another key", () => {
    const nonce = createNonce();
    const signature = signAuthProof({ identity: laptop.identity, peerDeviceId: "laptop_1", peerNonce: nonce });
    expect(
      verifyAuthProof({
        peerDeviceId: "phone_1",
        peerPublicKey: phone.publicKey,
        localDeviceId: "laptop_1",
        localNonce: nonce,
        signature,
      }),
    ).toBe(false);
  });
});
