/**
 * Run statistics
 *
 * Named, monotonically increasing counters for one audit run.
 */

import type { MetricName } from '../../models/types.js';

export class RunStats {
  private readonly counters = new Map<MetricName, number>();

  /**
   * @param metrics - Counters reported even when they stay at zero
   */
  constructor(metrics: readonly MetricName[] = []) {
    for (const metric of metrics) {
      this.counters.set(metric, 0);
    }
  }

  increment(metric: MetricName, by = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`Counters only increase; got ${by} for ${metric}`);
    }
    this.counters.set(metric, this.get(metric) + by);
  }

  get(metric: MetricName): number {
    return this.counters.get(metric) ?? 0;
  }

  /**
   * Whether the metric was seeded or ever incremented during this run
   */
  has(metric: MetricName): boolean {
    return this.counters.has(metric);
  }

  toJSON(): Partial<Record<MetricName, number>> {
    const json: Partial<Record<MetricName, number>> = {};
    for (const [metric, count] of this.counters) {
      json[metric] = count;
    }
    return json;
  }
}
