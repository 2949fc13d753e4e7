import { checkCount, isPrime } from '../common/util';
import { IncrementalSieve } from './incremental_sieve';
import { PrimeSequence } from './prime_sequence';
import { PrimeSource } from './prime_source';
import { MAX_LIMIT } from './prime_source';
import type { PrimeSourceOptions } from './prime_source';

export const STRATEGIES = ['trial-division', 'sieve'] as const;
export type PrimeStrategy = (typeof STRATEGIES)[number];

export type PrimeOptions = Partial<PrimeSourceOptions> & {
  strategy?: PrimeStrategy;
};

export function isStrategy(value: string): value is PrimeStrategy {
  return STRATEGIES.some((strategy) => strategy === value);
}

export function createPrimeSequence(
  strategy: PrimeStrategy = 'trial-division',
  options: Partial<PrimeSourceOptions> = {}
): PrimeSource {
  switch (strategy) {
    case 'trial-division':
      return new PrimeSequence(options);
    case 'sieve':
      return new IncrementalSieve(options);
    default:
      throw new RangeError(`Unknown strategy ${strategy}`);
  }
}

/**
 * Returns the n-th prime, counting 2 as the first.
 */
export function nthPrime(n: number, options: PrimeOptions = {}): number {
  checkCount('n', n, 1);
  const { strategy, ...sourceOptions } = options;
  return createPrimeSequence(strategy, sourceOptions).skip(n - 1).advance();
}

export function firstPrimes(n: number, options: PrimeOptions = {}): number[] {
  const { strategy, ...sourceOptions } = options;
  return createPrimeSequence(strategy, sourceOptions).take(n);
}

export { isPrime, MAX_LIMIT, PrimeSource, PrimeSequence, IncrementalSieve };
export type { PrimeSourceOptions };
export { PrimeOverflowError } from '../common/errors';
