// Subset of the global timing API used for reporting, so tests can substitute
// a mock clock.
export type ClockAPI = {
  performance: {
    now(): number;
  };
};

export const defaultClockAPI: ClockAPI = {
  performance: {
    now: () => performance.now(),
  },
};

export type LogFunction = (line: string) => void;
