/**
 * Timer Scheduler
 *
 * One cancellable deadline per session. Deadlines in the past fire on the
 * next tick. Deadlines beyond the platform setTimeout limit (~24.8 days)
 * are reached by re-arming in chunks.
 */

import { logger as defaultLogger, type Logger } from "../logger.js";
import type { SessionId } from "./types.js";

/** Largest delay setTimeout accepts without overflowing to 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type TimerCallback = (sessionId: SessionId) => Promise<unknown>;

export interface TimerSchedulerOptions {
  now?: () => number;
  logger?: Logger;
}

export class TimerScheduler {
  private readonly timers = new Map<SessionId, ReturnType<typeof setTimeout>>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly onFire: TimerCallback,
    options: TimerSchedulerOptions = {},
  ) {
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Register the deadline for a session, replacing any existing one.
   */
  schedule(sessionId: SessionId, fireAt: number): void {
    this.cancel(sessionId);
    this.arm(sessionId, fireAt);
  }

  /**
   * Drop the session's timer. No-op when none is registered.
   */
  cancel(sessionId: SessionId): boolean {
    const handle = this.timers.get(sessionId);
    if (handle === undefined) {
      return false;
    }
    clearTimeout(handle);
    this.timers.delete(sessionId);
    return true;
  }

  cancelAll(): void {
    for (const handle of this.timers.values()) {
      clearTimeout(handle);
    }
    this.timers.clear();
  }

  has(sessionId: SessionId): boolean {
    return this.timers.has(sessionId);
  }

  get size(): number {
    return this.timers.size;
  }

  private arm(sessionId: SessionId, fireAt: number): void {
    const delay = Math.min(Math.max(0, fireAt - this.now()), MAX_TIMER_DELAY_MS);

    const handle = setTimeout(() => {
      if (fireAt > this.now()) {
        this.arm(sessionId, fireAt);
        return;
      }
      this.timers.delete(sessionId);
      this.fire(sessionId);
    }, delay);

    this.timers.set(sessionId, handle);
  }

  private fire(sessionId: SessionId): void {
    this.logger.debug(`Deadline reached for session ${sessionId}`);
    void this.onFire(sessionId).catch((error: unknown) => {
      this.logger.error(`Timer resolution failed for session ${sessionId}`, error);
    });
  }
}
