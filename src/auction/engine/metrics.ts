import type { SystemMetrics } from './types';

export interface MetricsDelta {
  totalAuctions?: number;
  activeAuctions?: number;
  totalVolume?: number;
}

/**
 * Derived counters. Changed only as a side effect of registry and ledger
 * commits.
 */
export class MetricsAggregator {
  private metrics: SystemMetrics = {
    totalAuctions: 0,
    activeAuctions: 0,
    totalVolume: 0,
    lastUpdateTimestamp: 0,
  };

  get(): SystemMetrics {
    return { ...this.metrics };
  }

  apply(delta: MetricsDelta, now: number): SystemMetrics {
    this.metrics = {
      totalAuctions: this.metrics.totalAuctions + (delta.totalAuctions ?? 0),
      activeAuctions: this.metrics.activeAuctions + (delta.activeAuctions ?? 0),
      totalVolume: this.metrics.totalVolume + (delta.totalVolume ?? 0),
      lastUpdateTimestamp: now,
    };
    return this.get();
  }
}
