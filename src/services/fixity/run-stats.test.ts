import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { RunStats } from './run-stats.js';

describe('RunStats', () => {
  it('should report seeded counters at zero', () => {
    const stats = new RunStats(['objects', 'ds']);
    expect(stats.toJSON()).toEqual({ objects: 0, ds: 0 });
    expect(stats.has('objects')).toBe(true);
    expect(stats.has('ds_versions')).toBe(false);
  });

  it('should read unseeded counters as zero without creating them', () => {
    const stats = new RunStats();
    expect(stats.get('missing')).toBe(0);
    expect(stats.has('missing')).toBe(false);
  });

  it('should create a counter on first increment', () => {
    const stats = new RunStats();
    stats.increment('ds_err');
    expect(stats.toJSON()).toEqual({ ds_err: 1 });
  });

  it('should reject decrements', () => {
    const stats = new RunStats(['ok']);
    expect(() => stats.increment('ok', -1)).toThrow(RangeError);
    expect(stats.get('ok')).toBe(0);
  });

  it('should equal the sum of its increments (property test)', () => {
    fc.assert(
      fc.property(fc.array(fc.nat({ max: 50 }), { maxLength: 30 }), steps => {
        const stats = new RunStats(['ds']);
        for (const step of steps) {
          stats.increment('ds', step);
        }
        expect(stats.get('ds')).toBe(steps.reduce((sum, step) => sum + step, 0));
      })
    );
  });
});
