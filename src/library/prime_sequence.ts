import { PrimeSource } from './prime_source';

/**
 * Primes by trial division: a candidate is tested against the known primes up
 * to its square root, smallest first, stopping at the first divisor.
 *
 * ```ts
 * const primes = new PrimeSequence();
 * primes.take(5); // [2, 3, 5, 7, 11]
 * new PrimeSequence().skip(999_999).advance(); // 15485863
 * ```
 */
export class PrimeSequence extends PrimeSource {
  protected testCandidate(candidate: number): boolean {
    const primes = this.record;
    const root = Math.floor(Math.sqrt(candidate));
    for (let i = 0; i < primes.length && primes[i] <= root; ++i) {
      if (candidate % primes[i] === 0) return false;
    }
    return true;
  }
}
