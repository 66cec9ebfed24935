/**
 * Seeded generators for property tests.
 *
 * Every run with the same seed yields the same value, so a failing input
 * reported by `forAll` or `checkLaws` can be reproduced from its iteration.
 */

import type { Arbitrary, Rng } from "./types.js";

/**
 * mulberry32 PRNG
 */
export function random(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Turn an Arbitrary into a seed → value generator for `forAll`.
 */
export function sample<A>(arb: Arbitrary<A>): (seed: number) => A {
  return (seed) => arb.arbitrary(random(seed));
}

// ============================================================================
// Primitives
// ============================================================================

/**
 * Integers in [min, max]
 */
export function arbInt(min: number, max: number): Arbitrary<number> {
  return { arbitrary: (rng) => min + Math.floor(rng() * (max - min + 1)) };
}

const ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 -";

/**
 * Strings of up to `maxLength` characters
 */
export function arbString(maxLength = 12): Arbitrary<string> {
  return {
    arbitrary: (rng) => {
      const length = Math.floor(rng() * (maxLength + 1));
      let out = "";
      for (let i = 0; i < length; i++) {
        out += ALPHABET[Math.floor(rng() * ALPHABET.length)];
      }
      return out;
    },
  };
}

/**
 * One of a fixed set of values
 */
export function arbElement<A>(
  first: A,
  ...rest: readonly A[]
): Arbitrary<A> {
  const values = [first, ...rest];
  return { arbitrary: (rng) => values[Math.floor(rng() * values.length)] };
}

// ============================================================================
// Combinators
// ============================================================================

/**
 * Arrays of up to `maxLength` elements
 */
export function arbArray<A>(
  arb: Arbitrary<A>,
  maxLength = 6,
): Arbitrary<readonly A[]> {
  return {
    arbitrary: (rng) => {
      const length = Math.floor(rng() * (maxLength + 1));
      return Array.from({ length }, () => arb.arbitrary(rng));
    },
  };
}

/**
 * Pairs
 */
export function arbPair<A, B>(
  arbA: Arbitrary<A>,
  arbB: Arbitrary<B>,
): Arbitrary<[A, B]> {
  return { arbitrary: (rng) => [arbA.arbitrary(rng), arbB.arbitrary(rng)] };
}

/**
 * Triples
 */
export function arbTriple<A, B, C>(
  arbA: Arbitrary<A>,
  arbB: Arbitrary<B>,
  arbC: Arbitrary<C>,
): Arbitrary<[A, B, C]> {
  return {
    arbitrary: (rng) => [
      arbA.arbitrary(rng),
      arbB.arbitrary(rng),
      arbC.arbitrary(rng),
    ],
  };
}

/**
 * Map generated values
 */
export function arbMap<A, B>(arb: Arbitrary<A>, f: (a: A) => B): Arbitrary<B> {
  return { arbitrary: (rng) => f(arb.arbitrary(rng)) };
}
