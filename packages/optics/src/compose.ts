/**
 * Optic Composition
 *
 * Composing outer: Optic<S, B> with inner: Optic<B, A> gives Optic<S, A> of
 * the weaker kind:
 *
 *   Lens      ∘ Lens      = Lens
 *   Lens      ∘ Traversal = Traversal
 *   Traversal ∘ Lens      = Traversal
 *   Traversal ∘ Traversal = Traversal
 *
 * The result kind is fixed by the overloads, so generic code composing two
 * lenses gets a Lens back without a runtime check.
 *
 * Composition is associative: compose(compose(x, y), z) and
 * compose(x, compose(y, z)) behave identically.
 */

import { lens, type Lens } from "./lens.js";
import { traversal, type Traversal } from "./traversal.js";

// ============================================================================
// Optic
// ============================================================================

/**
 * Any optic supported by composition.
 */
export type Optic<S, A> = Lens<S, A> | Traversal<S, A>;

/**
 * The occurrences an optic focuses on, in order.
 */
export function getAll<S, A>(o: Optic<S, A>, s: S): readonly A[] {
  return o.kind === "lens" ? [o.get(s)] : o.getAll(s);
}

/**
 * Apply f to every occurrence an optic focuses on.
 */
export function modify<S, A>(o: Optic<S, A>, f: (a: A) => A, s: S): S {
  return o.modify(f, s);
}

/**
 * Sum of the numeric occurrences an optic focuses on.
 */
export function sumOf<S>(o: Optic<S, number>, s: S): number {
  return getAll(o, s).reduce((acc, n) => acc + n, 0);
}

// ============================================================================
// compose
// ============================================================================

export function compose<S, B, A>(outer: Lens<S, B>, inner: Lens<B, A>): Lens<S, A>;
export function compose<S, B, A>(
  outer: Optic<S, B>,
  inner: Optic<B, A>,
): Traversal<S, A>;
export function compose<S, B, A>(
  outer: Optic<S, B>,
  inner: Optic<B, A>,
): Optic<S, A> {
  const modifyThrough = (f: (a: A) => A, s: S): S =>
    outer.modify((b) => inner.modify(f, b), s);

  if (outer.kind === "lens" && inner.kind === "lens") {
    const o = outer;
    const i = inner;
    return lens<S, A>(
      (s) => i.get(o.get(s)),
      (a, s) => modifyThrough(() => a, s),
    );
  }

  return traversal<S, A>(
    (s) => getAll(outer, s).flatMap((b) => getAll(inner, b)),
    modifyThrough,
  );
}
