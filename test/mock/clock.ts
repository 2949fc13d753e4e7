import type { ClockAPI } from '../../src/common/interfaces';

type ClockSettings = {
  // Starting value of performance.now().
  start: number;
  // Milliseconds that pass every time the clock is read.
  tick: number;
};

// Deterministic stand-in for the real clock. Time only moves when advanced
// explicitly or, with a non-zero tick, when it is read.
export class MockClock {
  #settings: ClockSettings = {
    start: 0,
    tick: 0,
  };
  #now: number;
  #reads = 0;

  constructor(settings: Partial<ClockSettings> = {}) {
    this.#settings = { ...this.#settings, ...settings };
    this.#now = this.#settings.start;
  }

  // Public API
  api(): ClockAPI {
    return {
      performance: {
        now: () => {
          const now = this.now();
          ++this.#reads;
          this.#now += this.#settings.tick;
          return now;
        },
      },
    };
  }

  get reads(): number {
    return this.#reads;
  }

  advanceBy(ms: number) {
    this.#now += ms;
  }

  now() {
    return this.#now;
  }
}
