/**
 * Thrown when the next odd candidate would exceed the numeric limit a
 * sequence was created with. Primes produced before the failure stay valid,
 * and every later advance fails with the same candidate.
 */
export class PrimeOverflowError extends Error {
  readonly candidate: number;
  readonly limit: number;

  constructor(candidate: number, limit: number) {
    super(`Prime candidate ${candidate} exceeds the limit of ${limit}`);
    this.name = 'PrimeOverflowError';
    this.candidate = candidate;
    this.limit = limit;
  }
}
