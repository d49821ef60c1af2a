import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MAX_TIMER_DELAY_MS, TimerScheduler } from "./timer-scheduler.js";
import type { Logger } from "../logger.js";

const createLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  group: vi.fn(),
  groupEnd: vi.fn(),
});

describe("TimerScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-01-01T00:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires once at the deadline", async () => {
    const onFire = vi.fn().mockResolvedValue(undefined);
    const scheduler = new TimerScheduler(onFire, { logger: createLogger() });

    scheduler.schedule("s1", Date.now() + 1000);
    await vi.advanceTimersByTimeAsync(999);
    expect(onFire).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(onFire).toHaveBeenCalledWith("s1");
    expect(scheduler.has("s1")).toBe(false);
  });

  it("fires a past deadline on the next tick", async () => {
    const onFire = vi.fn().mockResolvedValue(undefined);
    const scheduler = new TimerScheduler(onFire, { logger: createLogger() });

    scheduler.schedule("s1", Date.now() - 60_000);
    await vi.advanceTimersByTimeAsync(0);

    expect(onFire).toHaveBeenCalledWith("s1");
  });

  it("replaces an existing deadline", async () => {
    const onFire = vi.fn().mockResolvedValue(undefined);
    const scheduler = new TimerScheduler(onFire, { logger: createLogger() });

    scheduler.schedule("s1", Date.now() + 1000);
    scheduler.schedule("s1", Date.now() + 5000);
    await vi.advanceTimersByTimeAsync(1000);
    expect(onFire).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(4000);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it("cancels a deadline", async () => {
    const onFire = vi.fn().mockResolvedValue(undefined);
    const scheduler = new TimerScheduler(onFire, { logger: createLogger() });

    scheduler.schedule("s1", Date.now() + 1000);
    expect(scheduler.cancel("s1")).toBe(true);
    expect(scheduler.cancel("s1")).toBe(false);

    await vi.advanceTimersByTimeAsync(2000);
    expect(onFire).not.toHaveBeenCalled();
  });

  it("cancels everything", async () => {
    const onFire = vi.fn().mockResolvedValue(undefined);
    const scheduler = new TimerScheduler(onFire, { logger: createLogger() });

    scheduler.schedule("s1", Date.now() + 1000);
    scheduler.schedule("s2", Date.now() + 2000);
    expect(scheduler.size).toBe(2);

    scheduler.cancelAll();
    await vi.advanceTimersByTimeAsync(3000);
    expect(scheduler.size).toBe(0);
    expect(onFire).not.toHaveBeenCalled();
  });

  it("reaches deadlines beyond the setTimeout limit", async () => {
    const onFire = vi.fn().mockResolvedValue(undefined);
    const scheduler = new TimerScheduler(onFire, { logger: createLogger() });
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;

    scheduler.schedule("s1", Date.now() + thirtyDays);
    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(onFire).not.toHaveBeenCalled();
    expect(scheduler.has("s1")).toBe(true);

    await vi.advanceTimersByTimeAsync(thirtyDays - MAX_TIMER_DELAY_MS);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it("logs a rejected callback", async () => {
    const logger = createLogger();
    const failure = new Error("store down");
    const scheduler = new TimerScheduler(vi.fn().mockRejectedValue(failure), { logger });

    scheduler.schedule("s1", Date.now());
    await vi.advanceTimersByTimeAsync(0);
    await Promise.resolve();
    await Promise.resolve();

    expect(logger.error).toHaveBeenCalledWith("Timer resolution failed for session s1", failure);
  });
});
