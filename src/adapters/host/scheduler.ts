/**
 * Timer Scheduler
 *
 * Scheduler backed by Node timers.
 */

import { Scheduler } from "./types.js";

/** Longest delay a single Node timer holds; longer values fire after 1ms. */
const MAX_TIMER_MS = 2 ** 31 - 1;

export class TimerScheduler implements Scheduler {
  private timers = new Set<NodeJS.Timeout>();

  /**
   * @param onError - Receives a rejection from a scheduled callback
   */
  constructor(private readonly onError: (err: unknown) => void) {}

  schedule(delaySeconds: number, callback: () => Promise<void>): void {
    this.arm(delaySeconds * 1000, callback);
  }

  private arm(remainingMs: number, callback: () => Promise<void>): void {
    const step = Math.min(remainingMs, MAX_TIMER_MS);
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (remainingMs > step) {
        this.arm(remainingMs - step, callback);
        return;
      }
      callback().catch(this.onError);
    }, step);
    this.timers.add(timer);
  }

  get pending(): number {
    return this.timers.size;
  }

  /**
   * Drop every pending callback. Used on shutdown.
   */
  clear(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
