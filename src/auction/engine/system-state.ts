import { EngineError } from './errors';
import type { SystemMode, SystemState } from './types';

/**
 * Global circuit breaker. Emergency always carries `paused`; Maintenance
 * leaves it alone.
 */
export class SystemStateController {
  private mode: SystemMode = 'Active';
  private paused = false;

  snapshot(): SystemState {
    return { mode: this.mode, paused: this.paused };
  }

  /** Required by creation and bidding. */
  assertOperable(): void {
    if (this.mode !== 'Active') {
      throw new EngineError(
        'InvalidSystemState',
        `System is in ${this.mode} mode`,
      );
    }
    this.assertNotPaused();
  }

  assertNotPaused(): void {
    if (this.paused) {
      throw new EngineError('EmergencyPaused', 'System is paused');
    }
  }

  planEmergency(enabled: boolean): SystemState {
    return enabled
      ? { mode: 'Emergency', paused: true }
      : { mode: 'Active', paused: false };
  }

  planMaintenance(enabled: boolean): SystemState {
    if (this.mode === 'Emergency') {
      throw new EngineError(
        'InvalidSystemState',
        'Maintenance mode cannot change during an emergency',
      );
    }
    return { mode: enabled ? 'Maintenance' : 'Active', paused: this.paused };
  }

  apply(next: SystemState): void {
    this.mode = next.mode;
    this.paused = next.paused;
  }
}
