/**
 * Traversal Laws
 *
 *   - Count preservation: getAll(modify(f, s)).length === getAll(s).length
 *   - Pointwise: getAll(modify(f, s)) === getAll(s).map(f)
 *   - Identity: modify(a => a, s) === s
 *   - Composition: modify(g, modify(f, s)) === modify(a => g(f(a)), s)
 *
 * The pointwise law only holds when occurrences do not overlap, which is
 * the case for every traversal built from `each`, `fromLens` and `compose`.
 *
 * @module
 */

import { eqArray, type Eq } from "../eq.js";
import type { Traversal } from "../traversal.js";
import type { LawSet } from "./types.js";

type Endo<A> = (a: A) => A;

/**
 * Generate the laws for a Traversal. Inputs are `[s, f, g]`.
 */
export function traversalLaws<S, A>(
  t: Traversal<S, A>,
  eqS: Eq<S>,
  eqA: Eq<A>,
): LawSet<[S, Endo<A>, Endo<A>]> {
  const eqAll = eqArray(eqA);

  return [
    {
      name: "count preservation",
      arity: 2,
      category: "traversal",
      description: "modify keeps the number of occurrences",
      check: (s, f) => t.getAll(t.modify(f, s)).length === t.getAll(s).length,
    },
    {
      name: "pointwise",
      arity: 2,
      category: "traversal",
      description: "modify applies f to each occurrence in place: getAll(modify(f, s)) === getAll(s).map(f)",
      check: (s, f) => eqAll.eqv(t.getAll(t.modify(f, s)), t.getAll(s).map(f)),
    },
    {
      name: "identity",
      arity: 1,
      category: "traversal",
      description: "modify(a => a, s) === s",
      check: (s) => eqS.eqv(t.modify((a) => a, s), s),
    },
    {
      name: "composition",
      arity: 3,
      category: "traversal",
      description: "modify(g, modify(f, s)) === modify(a => g(f(a)), s)",
      check: (s, f, g) =>
        eqS.eqv(t.modify(g, t.modify(f, s)), t.modify((a) => g(f(a)), s)),
    },
  ];
}
