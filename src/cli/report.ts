import { defaultClockAPI } from '../common/interfaces';
import type { ClockAPI, LogFunction } from '../common/interfaces';
import { checkCount, ordinal } from '../common/util';
import { createPrimeSequence } from '../library/index';
import type { PrimeStrategy } from '../library/index';
import type { CliConfig } from './config';

export type RunReport = {
  count: number;
  prime: number;
  elapsedMs: number;
  strategy: PrimeStrategy;
};

export type RunEnvironment = {
  clock: ClockAPI;
  log: LogFunction;
};

const defaultEnvironment: RunEnvironment = {
  clock: defaultClockAPI,
  log: (line) => console.log(line),
};

export function formatReport(report: RunReport): string {
  const elapsed = report.elapsedMs.toFixed(3);
  return `The ${ordinal(report.count)} prime is ${report.prime} (${elapsed} ms, ${report.strategy})`;
}

export function runPrimes(
  config: CliConfig,
  environment: Partial<RunEnvironment> = {}
): RunReport {
  checkCount('count', config.count, 1);
  const { clock, log } = { ...defaultEnvironment, ...environment };
  const start = clock.performance.now();
  const primes = createPrimeSequence(config.strategy, { limit: config.limit });
  let prime: number;
  if (config.list) {
    const all = primes.take(config.count);
    for (const p of all) {
      log(String(p));
    }
    prime = all[all.length - 1];
  } else {
    prime = primes.skip(config.count - 1).advance();
  }
  const report: RunReport = {
    count: config.count,
    prime,
    elapsedMs: clock.performance.now() - start,
    strategy: config.strategy,
  };
  log(formatReport(report));
  return report;
}
