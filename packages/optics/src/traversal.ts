/**
 * Traversal
 *
 * A Traversal<S, A> focuses on zero or more A inside an S, in a fixed order.
 *
 * Invariants:
 *   - getAll returns occurrences in document order (index order for arrays)
 *   - modify applies f pointwise and never changes the count or order
 *     of occurrences: getAll(modify(f, s)).length === getAll(s).length
 *   - modify leaves every non-targeted part of S untouched
 */

import type { Lens } from "./lens.js";

// ============================================================================
// Traversal
// ============================================================================

/**
 * Traversal optic - a total accessor for every matching occurrence.
 */
export interface Traversal<S, A> {
  readonly kind: "traversal";
  readonly getAll: (s: S) => readonly A[];
  readonly modify: (f: (a: A) => A, s: S) => S;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Build a Traversal from its read and update functions.
 */
export function traversal<S, A>(
  getAll: (s: S) => readonly A[],
  modify: (f: (a: A) => A, s: S) => S,
): Traversal<S, A> {
  return Object.freeze({ kind: "traversal" as const, getAll, modify });
}

/**
 * Traversal over every element of an array, in index order.
 *
 * @example
 * ```typescript
 * each<number>().modify((n) => n + 1, [1, 2, 3]); // [2, 3, 4]
 * ```
 */
export function each<A>(): Traversal<readonly A[], A> {
  return traversal<readonly A[], A>(
    (as) => as,
    (f, as) => as.map((a) => f(a)),
  );
}

/**
 * View a Lens as a Traversal with exactly one occurrence.
 */
export function fromLens<S, A>(l: Lens<S, A>): Traversal<S, A> {
  return traversal<S, A>((s) => [l.get(s)], l.modify);
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Replace every occurrence with the same value
 */
export function set<S, A>(t: Traversal<S, A>, a: A, s: S): S {
  return t.modify(() => a, s);
}

/**
 * Count the occurrences
 */
export function length<S, A>(t: Traversal<S, A>, s: S): number {
  return t.getAll(s).length;
}
