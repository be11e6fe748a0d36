import { describe, expect, it } from 'vitest';
import { MAX_TIMER_MS, monotonicNow } from '../../src/server/clock.js';

describe('clock', () => {
  it('never goes backwards', () => {
    let prev = monotonicNow();
    for (let i = 0; i < 1_000; i += 1) {
      const next = monotonicNow();
      expect(next).toBeGreaterThanOrEqual(prev);
      prev = next;
    }
  });

  it('stays on the epoch scale', () => {
    expect(Math.abs(monotonicNow() - Date.now())).toBeLessThan(5_000);
  });

  it('knows the timer limit', () => {
    expect(MAX_TIMER_MS).toBe(2_147_483_647);
  });
});
