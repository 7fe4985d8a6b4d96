import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_RECONNECT_BACKOFF, ReconnectScheduler, reconnectDelayMs } from "./reconnect.js";

describe("reconnectDelayMs", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("doubles from the base and caps at the maximum", () => {
    const delays = [1, 2, 3, 4, 5, 6, 7].map((n) => reconnectDelayMs(n, DEFAULT_RECONNECT_BACKOFF));
    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
  });

  it("is zero before the first failure", () => {
    expect(reconnectDelayMs(0, DEFAULT_RECONNECT_BACKOFF)).toBe(0);
  });

  it("never decreases without jitter", () => {
    let previous = 0;
    for (let n = 1; n <= 20; n += 1) {
      const delay = reconnectDelayMs(n, { baseMs: 250, maxMs: 10_000, multiplier: 1.5 });
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(10_000);
      previous = delay;
    }
  });

  it("spreads delays by the jitter ratio without passing the cap", () => {
    vi.spyOn(Math, "random").mockReturnValue(1);
    expect(reconnectDelayMs(1, { baseMs: 1000, maxMs: 60_000, jitterRatio: 0.2 })).toBe(1200);
    expect(reconnectDelayMs(10, { baseMs: 1000, maxMs: 5000, jitterRatio: 0.2 })).toBe(5000);
    vi.spyOn(Math, "random").mockReturnValue(0);
    expect(reconnectDelayMs(1, { baseMs: 1000, maxMs: 60_000, jitterRatio: 0.2 })).toBe(800);
  });
});

describe("ReconnectScheduler", () => {
  let attempts: string[];
  let scheduler: ReconnectScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    attempts = [];
    scheduler = new ReconnectScheduler({
      backoff: { baseMs: 1000, maxMs: 8000, multiplier: 2 },
      onAttempt: (deviceId) => attempts.push(deviceId),
    });
  });

  afterEach(() => {
    scheduler.stop();
    vi.useRealTimers();
  });

  it("grows the delay with every failure", () => {
    expect(scheduler.schedule("peer-a")).toBe(1000);
    expect(scheduler.schedule("peer-a")).toBe(2000);
    expect(scheduler.schedule("peer-a")).toBe(4000);
    expect(scheduler.schedule("peer-a")).toBe(8000);
    expect(scheduler.schedule("peer-a")).toBe(8000);
    expect(scheduler.failureCount("peer-a")).toBe(5);
  });

  it("fires the attempt once the delay has passed", () => {
    scheduler.schedule("peer-a");
    vi.advanceTimersByTime(999);
    expect(attempts).toEqual([]);
    vi.advanceTimersByTime(1);
    expect(attempts).toEqual(["peer-a"]);
    expect(scheduler.isScheduled("peer-a")).toBe(false);
  });

  it("re-arming replaces the pending timer", () => {
    scheduler.schedule("peer-a");
    scheduler.schedule("peer-a");
    vi.advanceTimersByTime(5000);
    expect(attempts).toEqual(["peer-a"]);
  });

  it("cancel keeps the failure count; reset forgets it", () => {
    scheduler.schedule("peer-a");
    scheduler.schedule("peer-a");
    scheduler.cancel("peer-a");
    vi.advanceTimersByTime(10_000);
    expect(attempts).toEqual([]);
    expect(scheduler.failureCount("peer-a")).toBe(2);
    expect(scheduler.schedule("peer-a")).toBe(4000);

    scheduler.reset("peer-a");
    expect(scheduler.failureCount("peer-a")).toBe(0);
    expect(scheduler.schedule("peer-a")).toBe(1000);
  });

  it("lists devices with their due time", () => {
    vi.setSystemTime(50_000);
    scheduler.schedule("peer-a");
    expect(scheduler.list()).toEqual([{ deviceId: "peer-a", failures: 1, dueAtMs: 51_000 }]);
  });

  it("does nothing once stopped", () => {
    scheduler.schedule("peer-a");
    scheduler.stop();
    vi.advanceTimersByTime(10_000);
    expect(attempts).toEqual([]);
    expect(scheduler.schedule("peer-a")).toBeNull();
  });
});
