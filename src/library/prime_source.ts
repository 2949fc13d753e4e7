import { PrimeOverflowError } from '../common/errors';
import { checkCount } from '../common/util';

export type PrimeSourceOptions = {
  // Largest candidate the sequence may test.
  limit: number;
};

// The cursor may step 2 past the limit, and must stay an exact integer when
// it does.
export const MAX_LIMIT = Number.MAX_SAFE_INTEGER - 2;

const defaultOptions: PrimeSourceOptions = {
  limit: MAX_LIMIT,
};

/**
 * Infinite, forward-only sequence of primes. Owns the record of every prime
 * found so far (seeded with 2) and a cursor over odd candidates starting at 3.
 * Subclasses decide whether a candidate is prime; candidates are offered to
 * them exactly once each, in increasing order.
 */
export abstract class PrimeSource implements IterableIterator<number> {
  #record: number[] = [2];
  #produced = 0;
  #nextCandidate = 3;
  #limit: number;

  constructor(options: Partial<PrimeSourceOptions> = {}) {
    const limit = checkCount('limit', options.limit ?? defaultOptions.limit, 2);
    if (limit > MAX_LIMIT) {
      throw new RangeError(`limit must be <= ${MAX_LIMIT}, got ${limit}`);
    }
    this.#limit = limit;
  }

  // Returns whether `candidate` is prime. Every odd number from 3 upwards is
  // passed here once, in order, and the record holds every smaller prime.
  protected abstract testCandidate(candidate: number): boolean;

  // Live view for subclasses; the public accessor hands out copies.
  protected get record(): readonly number[] {
    return this.#record;
  }

  get knownPrimes(): number[] {
    return this.#record.slice();
  }

  get nextCandidate(): number {
    return this.#nextCandidate;
  }

  get count(): number {
    return this.#produced;
  }

  get limit(): number {
    return this.#limit;
  }

  advance(): number {
    // The seeded 2 is handed out first without being tested.
    if (this.#produced < this.#record.length) {
      return this.#record[this.#produced++];
    }
    while (true) {
      const candidate = this.#nextCandidate;
      if (candidate > this.#limit) {
        throw new PrimeOverflowError(candidate, this.#limit);
      }
      this.#nextCandidate += 2;
      if (this.testCandidate(candidate)) {
        this.#record.push(candidate);
        this.#produced++;
        return candidate;
      }
    }
  }

  skip(n: number): this {
    checkCount('skip count', n);
    for (let i = 0; i < n; ++i) {
      this.advance();
    }
    return this;
  }

  take(n: number): number[] {
    checkCount('take count', n);
    const primes: number[] = [];
    for (let i = 0; i < n; ++i) {
      primes.push(this.advance());
    }
    return primes;
  }

  next(): IteratorYieldResult<number> {
    return { done: false, value: this.advance() };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
