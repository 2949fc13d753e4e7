import PriorityQueue from '../common/priority_queue';
import { PrimeSource } from './prime_source';

// Pending odd multiple of a known prime. `step` is twice the prime so even
// multiples are never visited.
type CompositeMarker = {
  next: number;
  step: number;
};

/**
 * Incremental sieve of Eratosthenes. Each odd prime p contributes a marker
 * once the cursor reaches p * p, so only primes up to the square root of the
 * cursor occupy the queue; a candidate is composite exactly when some marker
 * sits on it. Produces the same values as {@link PrimeSequence}.
 */
export class IncrementalSieve extends PrimeSource {
  #markers = new PriorityQueue<CompositeMarker>((a, b) => a.next < b.next);
  // Index in the record of the next prime whose square is still ahead.
  #nextBase = 1;

  get pendingMarkers(): number {
    return this.#markers.size();
  }

  protected testCandidate(candidate: number): boolean {
    const primes = this.record;
    if (this.#nextBase < primes.length) {
      const base = primes[this.#nextBase];
      if (candidate === base * base) {
        this.#markers.push({ next: candidate + base * 2, step: base * 2 });
        ++this.#nextBase;
        return false;
      }
    }
    let composite = false;
    let top = this.#markers.peek();
    // Markers never fall behind the cursor, so only equality needs checking.
    while (top !== undefined && top.next === candidate) {
      composite = true;
      this.#markers.replaceTop({ next: top.next + top.step, step: top.step });
      top = this.#markers.peek();
    }
    return !composite;
  }
}
