// The 25 primes below 100.
export const PRIMES_BELOW_100 = [
  2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31, 37, 41, 43, 47, 53, 59, 61, 67, 71,
  73, 79, 83, 89, 97,
];

// Test oracle: trial division by every integer in (1, n).
export function hasNoProperDivisor(n: number): boolean {
  if (n < 2) return false;
  for (let d = 2; d < n; ++d) {
    if (n % d === 0) return false;
  }
  return true;
}
