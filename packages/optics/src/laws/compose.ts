/**
 * Composition Laws
 *
 *   - Associativity: compose(compose(x, y), z) behaves as compose(x, compose(y, z))
 *     for both reading and modifying.
 *
 * @module
 */

import { compose, getAll, type Optic } from "../compose.js";
import { eqArray, type Eq } from "../eq.js";
import type { LawSet } from "./types.js";

/**
 * Generate associativity laws for three composable optics.
 * Inputs are `[s, f]`.
 */
export function compositionLaws<S, B, C, A>(
  x: Optic<S, B>,
  y: Optic<B, C>,
  z: Optic<C, A>,
  eqS: Eq<S>,
  eqA: Eq<A>,
): LawSet<[S, (a: A) => A]> {
  const left = compose(compose(x, y), z);
  const right = compose(x, compose(y, z));
  const eqAll = eqArray(eqA);

  return [
    {
      name: "associativity (getAll)",
      arity: 1,
      category: "composition",
      description: "Both groupings read the same occurrences in the same order",
      check: (s) => eqAll.eqv(getAll(left, s), getAll(right, s)),
    },
    {
      name: "associativity (modify)",
      arity: 2,
      category: "composition",
      description: "Both groupings produce the same value when modifying",
      check: (s, f) => eqS.eqv(left.modify(f, s), right.modify(f, s)),
    },
  ];
}
