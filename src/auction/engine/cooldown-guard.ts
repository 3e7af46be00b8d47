import { EngineError } from './errors';

/**
 * Minimum interval between an actor's successful bids. check() is read-only;
 * arm() runs only after the bid has been committed.
 */
export class CooldownGuard {
  private readonly lastBidTime = new Map<string, number>();

  constructor(private readonly cooldownSeconds: number) {}

  check(actor: string, now: number): void {
    const last = this.lastBidTime.get(actor);
    if (last !== undefined && now < last + this.cooldownSeconds) {
      throw new EngineError(
        'CooldownPeriod',
        `${actor} must wait until ${last + this.cooldownSeconds}`,
      );
    }
  }

  arm(actor: string, now: number): void {
    this.lastBidTime.set(actor, now);
  }

  /** 0 when the actor has never bid. */
  cooldownEnds(actor: string): number {
    const last = this.lastBidTime.get(actor);
    return last === undefined ? 0 : last + this.cooldownSeconds;
  }
}
