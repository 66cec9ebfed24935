/**
 * Eq Typeclass
 *
 * Equality comparison, used by the laws to compare whole values and foci.
 *
 * Laws:
 *   - Reflexivity: eqv(x, x) === true
 *   - Symmetry: eqv(x, y) === eqv(y, x)
 *   - Transitivity: eqv(x, y) && eqv(y, z) => eqv(x, z)
 */

export interface Eq<A> {
  readonly eqv: (x: A, y: A) => boolean;
}

// ============================================================================
// Eq Combinators
// ============================================================================

/**
 * Eq that uses strict equality
 */
export function eqStrict<A>(): Eq<A> {
  return { eqv: (x, y) => x === y };
}

/**
 * Eq by mapping to a comparable value
 */
export function eqBy<A, B>(E: Eq<B>, f: (a: A) => B): Eq<A> {
  return { eqv: (x, y) => E.eqv(f(x), f(y)) };
}

/**
 * Element-wise Eq for arrays (same length, same order)
 */
export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    eqv: (xs, ys) =>
      xs.length === ys.length && xs.every((x, i) => E.eqv(x, ys[i])),
  };
}

/**
 * Field-wise Eq for records, one Eq per field
 *
 * @example
 * ```typescript
 * const eqPoint = eqStruct<Point>({ x: eqStrict(), y: eqStrict() });
 * ```
 */
export function eqStruct<A>(eqs: { readonly [K in keyof A]: Eq<A[K]> }): Eq<A> {
  return {
    eqv: (x, y) => {
      for (const key in eqs) {
        if (!eqs[key].eqv(x[key], y[key])) return false;
      }
      return true;
    },
  };
}
