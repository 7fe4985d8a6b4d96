export type ReconnectBackoff = {
  baseMs: number;
  maxMs: number;
  multiplier?: number;
  /** Spread each delay by up to this fraction either way; 0 keeps delays non-decreasing. */
  jitterRatio?: number;
};

export const DEFAULT_RECONNECT_BACKOFF: Required<ReconnectBackoff> = {
  baseMs: 1_000,
  maxMs: 30_000,
  multiplier: 2,
  jitterRatio: 0,
};

/** Wait before the next dial after `failures` consecutive failures. Never above `maxMs`. */
export function reconnectDelayMs(failures: number, backoff: ReconnectBackoff): number {
  if (failures < 1) {
    return 0;
  }
  const grown = backoff.baseMs * Math.pow(backoff.multiplier ?? 2, failures - 1);
  const delay = Math.min(grown, backoff.maxMs);
  const spread = backoff.jitterRatio ? delay * backoff.jitterRatio * (2 * Math.random() - 1) : 0;
  return Math.round(Math.min(Math.max(delay + spread, 0), backoff.maxMs));
}

type ReconnectEntry = {
  failures: number;
  timer: ReturnType<typeof setTimeout> | null;
  /** Bumped on every schedule/cancel; a timer only fires for its own epoch. */
  epoch: number;
  dueAtMs: number | null;
};

export type ReconnectStatus = {
  deviceId: string;
  failures: number;
  dueAtMs: number | null;
};

/**
 * Per-device reconnect timers with exponential backoff.
 *
 * The failure count lives here rather than on the session, so it survives
 * the session that lost its connection and is reset only when a new session
 * for the device is established.
 */
export class ReconnectScheduler {
  private entries = new Map<string, ReconnectEntry>();
  private stopped = false;
  private readonly backoff: ReconnectBackoff;
  private readonly onAttempt: (deviceId: string) => void;

  constructor(opts: { backoff: ReconnectBackoff; onAttempt: (deviceId: string) => void }) {
    this.backoff = opts.backoff;
    this.onAttempt = opts.onAttempt;
  }

  /**
   * Count one more failure for the device and arm its timer.
   * Returns the delay in ms, or null once the scheduler is stopped.
   */
  schedule(deviceId: string): number | null {
    if (this.stopped) {
      return null;
    }
    const entry = this.entry(deviceId);
    this.clearTimer(entry);
    entry.failures += 1;
    const delayMs = reconnectDelayMs(entry.failures, this.backoff);
    const epoch = entry.epoch;
    entry.dueAtMs = Date.now() + delayMs;
    entry.timer = setTimeout(() => {
      if (entry.epoch !== epoch || this.stopped) {
        return;
      }
      entry.timer = null;
      entry.dueAtMs = null;
      this.onAttempt(deviceId);
    }, delayMs);
    entry.timer.unref?.();
    return delayMs;
  }

  /** Disarm the device's timer. The failure count is kept. */
  cancel(deviceId: string): void {
    const entry = this.entries.get(deviceId);
    if (entry) {
      this.clearTimer(entry);
    }
  }

  /** Forget the device entirely (new session, unpair). */
  reset(deviceId: string): void {
    this.cancel(deviceId);
    this.entries.delete(deviceId);
  }

  isScheduled(deviceId: string): boolean {
    return this.entries.get(deviceId)?.timer != null;
  }

  failureCount(deviceId: string): number {
    return this.entries.get(deviceId)?.failures ?? 0;
  }

  list(): ReconnectStatus[] {
    return [...this.entries.entries()].map(([deviceId, entry]) => ({
      deviceId,
      failures: entry.failures,
      dueAtMs: entry.dueAtMs,
    }));
  }

  stop(): void {
    this.stopped = true;
    for (const entry of this.entries.values()) {
      this.clearTimer(entry);
    }
    this.entries.clear();
  }

  private entry(deviceId: string): ReconnectEntry {
    let entry = this.entries.get(deviceId);
    if (!entry) {
      entry = { failures: 0, timer: null, epoch: 0, dueAtMs: null };
      this.entries.set(deviceId, entry);
    }
    return entry;
  }

  private clearTimer(entry: ReconnectEntry): void {
    entry.epoch += 1;
    entry.dueAtMs = null;
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }
}
