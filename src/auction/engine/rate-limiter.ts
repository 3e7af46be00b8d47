import { EngineError } from './errors';

interface RateWindow {
  windowStart: number;
  count: number;
}

/**
 * Outcome of a check, applied by commit() once the guarded operation has
 * passed every other precondition.
 */
export type RateLimitTicket =
  | { actor: string; reset: true; windowStart: number }
  | { actor: string; reset: false };

/**
 * Per-actor fixed window. The window opens on the first action after the
 * previous one expired; the action that opens it counts as 1.
 */
export class RateLimiter {
  private readonly windows = new Map<string, RateWindow>();

  constructor(
    private readonly periodSeconds: number,
    private readonly maxActions: number,
  ) {}

  check(actor: string, now: number): RateLimitTicket {
    const window = this.windows.get(actor);
    if (window && now < window.windowStart + this.periodSeconds) {
      if (window.count >= this.maxActions) {
        throw new EngineError(
          'RateLimitExceeded',
          `${actor} exceeded ${this.maxActions} actions per ${this.periodSeconds}s`,
        );
      }
      return { actor, reset: false };
    }
    return { actor, reset: true, windowStart: now };
  }

  commit(ticket: RateLimitTicket): void {
    if (ticket.reset) {
      this.windows.set(ticket.actor, {
        windowStart: ticket.windowStart,
        count: 1,
      });
      return;
    }
    const window = this.windows.get(ticket.actor);
    if (window) window.count += 1;
  }

  remaining(actor: string, now: number): number {
    const window = this.windows.get(actor);
    if (!window || now >= window.windowStart + this.periodSeconds) {
      return this.maxActions;
    }
    return Math.max(0, this.maxActions - window.count);
  }

  windowOf(actor: string): Readonly<RateWindow> | null {
    const window = this.windows.get(actor);
    return window ? { ...window } : null;
  }
}
