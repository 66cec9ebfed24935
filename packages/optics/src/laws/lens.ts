/**
 * Lens Laws
 *
 *   - GetSet: get(set(a, s)) === a
 *   - SetGet: set(get(s), s) === s
 *   - SetSet: set(a2, set(a1, s)) === set(a2, s)
 *
 * @module
 */

import type { Eq } from "../eq.js";
import type { Lens } from "../lens.js";
import type { LawSet } from "./types.js";

/**
 * Generate the laws for a Lens. Inputs are `[s, a1, a2]`.
 *
 * @example
 * ```typescript
 * const laws = lensLaws(name, eqUniversity, eqStrict<string>());
 * checkLaws(laws, arbTriple(arbUniversity, arbString(), arbString()));
 * ```
 */
export function lensLaws<S, A>(
  l: Lens<S, A>,
  eqS: Eq<S>,
  eqA: Eq<A>,
): LawSet<[S, A, A]> {
  return [
    {
      name: "get-set",
      arity: 2,
      category: "lens",
      description: "Reading after a write gives the written value: get(set(a, s)) === a",
      check: (s, a) => eqA.eqv(l.get(l.set(a, s)), a),
    },
    {
      name: "set-get",
      arity: 1,
      category: "lens",
      description: "Writing back what was read changes nothing: set(get(s), s) === s",
      check: (s) => eqS.eqv(l.set(l.get(s), s), s),
    },
    {
      name: "set-set",
      arity: 3,
      category: "lens",
      description: "The last write wins: set(a2, set(a1, s)) === set(a2, s)",
      check: (s, a1, a2) => eqS.eqv(l.set(a2, l.set(a1, s)), l.set(a2, s)),
    },
    {
      name: "modify-get",
      arity: 2,
      category: "lens",
      description: "modify is set after get: modify(() => a, s) === set(a, s)",
      check: (s, a) => eqS.eqv(l.modify(() => a, s), l.set(a, s)),
    },
  ];
}
