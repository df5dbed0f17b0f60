/**
 * Timeout Scheduler
 *
 * One-shot expiry timers keyed by notification id. At most one timer is
 * outstanding per id. Timers are hints: the expiry handler re-checks the
 * record, since a disarm can lose the race against a timer already firing.
 */

import type { Urgency } from "../notifications/types.js";
import type { UrgencyTimeouts } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";

/** Largest delay setTimeout honours; longer values fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolve the expiry for a notification, in milliseconds, or null for never.
 *
 * An explicit positive request wins; a negative request never expires; zero
 * uses the configured timeout for the urgency, where 0 again means never.
 */
export function resolveTimeout(
  expireTimeout: number,
  urgency: Urgency,
  timeouts: UrgencyTimeouts,
): number | null {
  if (expireTimeout > 0) return expireTimeout;
  if (expireTimeout < 0) return null;

  const configured = timeouts[urgency];
  return configured > 0 ? configured : null;
}

export interface TimeoutSchedulerOptions {
  /** Invoked when a timer fires; should hand off to the engine's queue */
  onExpire: (id: number) => void;
  logger?: Logger;
}

export class TimeoutScheduler {
  private timers = new Map<number, NodeJS.Timeout>();
  private onExpire: (id: number) => void;
  private logger: Logger;

  constructor(options: TimeoutSchedulerOptions) {
    this.onExpire = options.onExpire;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  get armedCount(): number {
    return this.timers.size;
  }

  isArmed(id: number): boolean {
    return this.timers.has(id);
  }

  /** Schedule expiry for `id`, replacing any timer it already has. */
  arm(id: number, durationMs: number): void {
    this.disarm(id);

    const delay = Math.min(Math.max(0, durationMs), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      if (this.timers.get(id) === timer) {
        this.timers.delete(id);
      }
      this.onExpire(id);
    }, delay);

    this.timers.set(id, timer);
    this.logger.debug(`[Scheduler] Armed ${id} for ${delay}ms`);
  }

  /** Cancel the timer for `id`. Returns whether one was armed. */
  disarm(id: number): boolean {
    const timer = this.timers.get(id);
    if (!timer) return false;

    clearTimeout(timer);
    this.timers.delete(id);
    return true;
  }

  disarmAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
