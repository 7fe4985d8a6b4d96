import { EventEmitter } from "node:events";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { resolveTrustStorePath } from "../config/paths.js";
import {
  DeviceLinkError,
  FingerprintConflictError,
  TrustStoreCorruptError,
} from "../infra/errors.js";
import { withFileLock } from "../infra/file-lock.js";
import { fingerprintPublicKey } from "../infra/fingerprint.js";
import { readJsonFile, writeJsonFileAtomically } from "../infra/json-file.js";
import type { DeviceType, TrustedDevice } from "./types.js";

const STORE_LOCK_OPTIONS = {
  retries: {
    retries: 10,
    factor: 2,
    minTimeout: 100,
    maxTimeout: 10_000,
    randomize: true,
  },
  stale: 30_000,
} as const;

const TrustedDeviceSchema = z.object({
  deviceId: z.string().min(1),
  fingerprint: z.string().regex(/^([0-9A-F]{2}:){31}[0-9A-F]{2}$/, "fingerprint must be SHA-256 hex pairs"),
  publicKey: z.string().min(1),
  deviceName: z.string().optional(),
  deviceType: z.enum(["desktop", "laptop", "phone", "tablet", "tv"]).optional(),
  pairedAt: z.string().min(1),
  plugins: z.record(z.boolean()).default({}),
});

const TrustStoreFileSchema = z.object({
  version: z.literal(1),
  devices: z.array(TrustedDeviceSchema),
});

type TrustStoreFile = z.infer<typeof TrustStoreFileSchema>;

export type PinRequest = {
  deviceId: string;
  publicKey: string;
  fingerprint: string;
  deviceName?: string;
  deviceType?: DeviceType;
};

export type TrustStoreEvents = {
  pinned: [device: TrustedDevice];
  unpaired: [deviceId: string];
};

/**
 * Pinned certificate fingerprints, one per paired device.
 *
 * The in-memory map is authoritative while the process runs; every mutation is
 * written through to disk (serialized, under a file lock, atomic rename)
 * before the returned promise settles.
 */
export class TrustStore extends EventEmitter<TrustStoreEvents> {
  readonly filePath: string;
  private devices = new Map<string, TrustedDevice>();
  private writeChain: Promise<void> = Promise.resolve();

  constructor(opts: { filePath?: string } = {}) {
    super();
    this.filePath = opts.filePath ?? resolveTrustStorePath();
  }

  /**
   * Read the store from disk. A missing file is an empty store; anything that
   * cannot be read or validated throws TrustStoreCorruptError.
   */
  async load(): Promise<void> {
    const read = await readJsonFile(this.filePath);
    if (read.kind === "invalid") {
      throw new TrustStoreCorruptError(this.filePath, read.error.message, { cause: read.error });
    }
    const next = new Map<string, TrustedDevice>();
    if (read.kind === "ok") {
      const parsed = TrustStoreFileSchema.safeParse(read.value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
        throw new TrustStoreCorruptError(this.filePath, `${where}${issue?.message ?? "schema mismatch"}`);
      }
      for (const device of parsed.data.devices) {
        if (fingerprintPublicKey(device.publicKey) !== device.fingerprint) {
          throw new TrustStoreCorruptError(
            this.filePath,
            `fingerprint of ${device.deviceId} does not match its public key`,
          );
        }
        if (next.has(device.deviceId)) {
          throw new TrustStoreCorruptError(this.filePath, `duplicate entry for ${device.deviceId}`);
        }
        next.set(device.deviceId, device);
      }
    }
    this.devices = next;
  }

  lookup(deviceId: string): TrustedDevice | null {
    const device = this.devices.get(deviceId);
    return device ? cloneDevice(device) : null;
  }

  isTrusted(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  list(): TrustedDevice[] {
    return [...this.devices.values()]
      .map(cloneDevice)
      .sort((a, b) => a.deviceId.localeCompare(b.deviceId));
  }

  /**
   * Pin a device's fingerprint. Pinning the fingerprint already on file is a
   * no-op; a different fingerprint throws FingerprintConflictError and leaves
   * the entry untouched.
   */
  async pin(request: PinRequest): Promise<{ pinned: boolean; device: TrustedDevice }> {
    const existing = this.devices.get(request.deviceId);
    if (existing) {
      if (existing.fingerprint !== request.fingerprint) {
        throw new FingerprintConflictError(request.deviceId, existing.fingerprint, request.fingerprint);
      }
      return { pinned: false, device: cloneDevice(existing) };
    }
    const device: TrustedDevice = {
      deviceId: request.deviceId,
      fingerprint: request.fingerprint,
      publicKey: request.publicKey,
      ...(request.deviceName ? { deviceName: request.deviceName } : {}),
      ...(request.deviceType ? { deviceType: request.deviceType } : {}),
      pairedAt: new Date().toISOString(),
      plugins: {},
    };
    this.devices.set(device.deviceId, device);
    try {
      await this.persist();
    } catch (err) {
      if (this.devices.get(device.deviceId) === device) {
        this.devices.delete(device.deviceId);
      }
      throw err;
    }
    this.emit("pinned", cloneDevice(device));
    return { pinned: true, device: cloneDevice(device) };
  }

  /** Remove a device's trust entry. Unpairing an unknown device is a no-op. */
  async unpair(deviceId: string): Promise<{ removed: boolean }> {
    const existing = this.devices.get(deviceId);
    if (!existing) {
      return { removed: false };
    }
    this.devices.delete(deviceId);
    try {
      await this.persist();
    } catch (err) {
      if (!this.devices.has(deviceId)) {
        this.devices.set(deviceId, existing);
      }
      throw err;
    }
    this.emit("unpaired", deviceId);
    return { removed: true };
  }

  async setPluginEnabled(deviceId: string, pluginId: string, enabled: boolean): Promise<void> {
    const existing = this.devices.get(deviceId);
    if (!existing) {
      throw new DeviceLinkError(`device ${deviceId} is not paired`, "NOT_PAIRED", "trust");
    }
    const previous = existing.plugins[pluginId];
    existing.plugins[pluginId] = enabled;
    try {
      await this.persist();
    } catch (err) {
      if (previous === undefined) {
        delete existing.plugins[pluginId];
      } else {
        existing.plugins[pluginId] = previous;
      }
      throw err;
    }
  }

  /** Plugins are enabled unless explicitly turned off for the device. */
  isPluginEnabled(deviceId: string, pluginId: string): boolean {
    return this.devices.get(deviceId)?.plugins[pluginId] ?? true;
  }

  /** Resolves once every write queued so far has reached the disk. */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  private persist(): Promise<void> {
    const write = this.writeChain.then(() => this.writeSnapshot());
    // The caller gets the rejection; the chain itself keeps going.
    this.writeChain = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  private async writeSnapshot(): Promise<void> {
    const snapshot: TrustStoreFile = {
      version: 1,
      devices: this.list(),
    };
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await withFileLock(this.filePath, STORE_LOCK_OPTIONS, async () => {
      await writeJsonFileAtomically(this.filePath, snapshot);
    });
  }
}

function cloneDevice(device: TrustedDevice): TrustedDevice {
  return { ...device, plugins: { ...device.plugins } };
}
