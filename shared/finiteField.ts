/**
 * Finite field GF(p^m) arithmetic for the projective plane construction.
 *
 * Elements are the integers 0..q-1. An element's base-p digits are the
 * coefficients of a polynomial over GF(p) (digit t is the coefficient of x^t);
 * multiplication reduces modulo the first monic irreducible polynomial of
 * degree m in ascending encoding order. For m = 1 this is plain arithmetic
 * modulo p.
 */

import { primePowerOf } from './primes';

type Poly = number[];

const mod = (value: number, p: number): number => ((value % p) + p) % p;

const toDigits = (value: number, p: number, length: number): Poly => {
  const digits: Poly = [];
  for (let t = 0; t < length; t++) {
    digits.push(value % p);
    value = Math.floor(value / p);
  }
  return digits;
};

const fromDigits = (digits: Poly, p: number): number => {
  let value = 0;
  for (let t = digits.length - 1; t >= 0; t--) {
    value = value * p + digits[t];
  }
  return value;
};

const degreeOf = (poly: Poly): number => {
  for (let t = poly.length - 1; t >= 0; t--) {
    if (poly[t] !== 0) return t;
  }
  return -1;
};

// Remainder of num divided by a monic divisor
const remainder = (num: Poly, divisor: Poly, p: number): Poly => {
  const rest = [...num];
  const d = divisor.length - 1;
  for (let top = degreeOf(rest); top >= d; top = degreeOf(rest)) {
    const factor = rest[top];
    for (let t = 0; t <= d; t++) {
      rest[top - d + t] = mod(rest[top - d + t] - factor * divisor[t], p);
    }
  }
  return rest;
};

const isIrreducible = (poly: Poly, p: number): boolean => {
  const m = poly.length - 1;
  for (let d = 1; d <= Math.floor(m / 2); d++) {
    const count = p ** d;
    for (let code = 0; code < count; code++) {
      const divisor = [...toDigits(code, p, d), 1];
      if (degreeOf(remainder(poly, divisor, p)) === -1) return false;
    }
  }
  return true;
};

const findModulus = (p: number, m: number): Poly => {
  const count = p ** m;
  for (let code = 0; code < count; code++) {
    const candidate = [...toDigits(code, p, m), 1];
    if (isIrreducible(candidate, p)) return candidate;
  }
  // Irreducible polynomials exist for every degree, so this is unreachable
  throw new Error(`No irreducible polynomial of degree ${m} over GF(${p})`);
};

export class GaloisField {
  readonly order: number;
  readonly prime: number;
  readonly degree: number;
  /** Monic modulus, lowest coefficient first */
  readonly modulus: readonly number[];

  private readonly sums: Uint32Array;
  private readonly products: Uint32Array;

  constructor(order: number) {
    const decomposition = primePowerOf(order);
    if (!decomposition) {
      throw new RangeError(`GF(${order}) does not exist: ${order} is not a prime power`);
    }

    this.order = order;
    this.prime = decomposition.prime;
    this.degree = decomposition.exponent;
    this.modulus = findModulus(this.prime, this.degree);

    const q = order;
    const p = this.prime;
    const m = this.degree;
    const digits = Array.from({ length: q }, (_, value) => toDigits(value, p, m));

    this.sums = new Uint32Array(q * q);
    this.products = new Uint32Array(q * q);

    for (let a = 0; a < q; a++) {
      for (let b = a; b < q; b++) {
        const da = digits[a];
        const db = digits[b];

        const sum = fromDigits(da.map((coef, t) => (coef + db[t]) % p), p);

        const product: Poly = new Array<number>(2 * m - 1).fill(0);
        for (let i = 0; i < m; i++) {
          for (let j = 0; j < m; j++) {
            product[i + j] = (product[i + j] + da[i] * db[j]) % p;
          }
        }
        const reduced = m > 1 ? remainder(product, [...this.modulus], p).slice(0, m) : product;
        const prod = fromDigits(reduced, p);

        this.sums[a * q + b] = sum;
        this.sums[b * q + a] = sum;
        this.products[a * q + b] = prod;
        this.products[b * q + a] = prod;
      }
    }
  }

  add(a: number, b: number): number {
    return this.sums[a * this.order + b];
  }

  mul(a: number, b: number): number {
    return this.products[a * this.order + b];
  }
}

const fieldCache = new Map<number, GaloisField>();

/** Shared, lazily built field of the given order */
export function getField(order: number): GaloisField {
  let field = fieldCache.get(order);
  if (!field) {
    field = new GaloisField(order);
    fieldCache.set(order, field);
  }
  return field;
}
