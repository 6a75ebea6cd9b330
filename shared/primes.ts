export interface PrimePower {
  prime: number;
  exponent: number;
}

export const isPrime = (num: number): boolean => {
  if (!Number.isInteger(num) || num < 2) return false;
  for (let i = 2; i * i <= num; i++) {
    if (num % i === 0) return false;
  }
  return true;
};

/**
 * Decompose num as p^m with p prime and m >= 1.
 * Returns null when num is not a prime power (including 0, 1 and negatives).
 */
export const primePowerOf = (num: number): PrimePower | null => {
  if (!Number.isInteger(num) || num < 2) return null;

  // The smallest factor of num is necessarily prime
  let prime = num;
  for (let i = 2; i * i <= num; i++) {
    if (num % i === 0) {
      prime = i;
      break;
    }
  }

  let rest = num;
  let exponent = 0;
  while (rest % prime === 0) {
    rest /= prime;
    exponent++;
  }
  return rest === 1 ? { prime, exponent } : null;
};

export const isPrimePower = (num: number): boolean => primePowerOf(num) !== null;

/** Largest prime power strictly below num, or null if there is none */
export const largestPrimePowerBelow = (num: number): number | null => {
  for (let candidate = Math.ceil(num) - 1; candidate >= 2; candidate--) {
    if (isPrimePower(candidate)) return candidate;
  }
  return null;
};
