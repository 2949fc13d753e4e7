import { MockClock } from './mock/clock';
import { describe, expect, test } from '@jest/globals';

describe('mock clock', () => {
  test('Stands still unless advanced', () => {
    const clock = new MockClock({ start: 500 });
    const api = clock.api();
    expect(api.performance.now()).toEqual(500);
    expect(api.performance.now()).toEqual(500);
    clock.advanceBy(1500);
    expect(api.performance.now()).toEqual(2000);
    expect(clock.reads).toEqual(3);
  });

  test('Advances by the tick on every read', () => {
    const clock = new MockClock({ tick: 40 });
    const api = clock.api();
    expect([api.performance.now(), api.performance.now(), api.performance.now()]).toEqual([0, 40, 80]);
    expect(clock.now()).toEqual(120);
  });
});
