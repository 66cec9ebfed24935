/**
 * Sequential optic programs.
 *
 * A program reads and rewrites one whole record (a university, a shelf...)
 * through optics, one step after another. Each step receives the record left
 * by the step before it, which is what lets descriptors derived from the
 * starting record keep pointing at the right elements.
 *
 * `extract` and `modifying` turn an optic into a step.
 */

import { getAll, type Optic } from "./compose.js";
import type { Lens } from "./lens.js";
import type { Traversal } from "./traversal.js";

// ============================================================================
// Program
// ============================================================================

export class State<S, A> {
  constructor(private readonly _run: (s: S) => [A, S]) {}

  /** Result and final record. */
  run(s: S): [A, S] {
    return this._run(s);
  }

  /** What the program read. */
  runA(s: S): A {
    return this._run(s)[0];
  }

  /** The record after every step has been applied. */
  runS(s: S): S {
    return this._run(s)[1];
  }

  map<B>(f: (a: A) => B): State<S, B> {
    return new State((s) => {
      const [a, s2] = this._run(s);
      return [f(a), s2];
    });
  }

  /**
   * Pick the next step from this one's result. The next step sees the
   * record this one produced.
   */
  flatMap<B>(f: (a: A) => State<S, B>): State<S, B> {
    return new State((s) => {
      const [a, s2] = this._run(s);
      return f(a).run(s2);
    });
  }

  /** `next` runs on the updated record; only its result is kept. */
  andThen<B>(next: State<S, B>): State<S, B> {
    return this.flatMap(() => next);
  }

  /** For update-only programs. */
  void_(): State<S, void> {
    return this.map(() => undefined);
  }
}

// ============================================================================
// Steps
// ============================================================================

export namespace State {
  /** Yield `a`, leaving the record as is. */
  export function pure<S, A>(a: A): State<S, A> {
    return new State((s) => [a, s]);
  }

  /** Yield the current record. */
  export function get<S>(): State<S, S> {
    return new State((s) => [s, s]);
  }

  /** Replace the record outright. */
  export function set<S>(s: S): State<S, void> {
    return new State(() => [undefined, s]);
  }

  export function modify<S>(f: (s: S) => S): State<S, void> {
    return new State((s) => [undefined, f(s)]);
  }

  /**
   * Yield something computed from the current record, such as the list of
   * descriptors a dynamic nexus derives from it.
   */
  export function gets<S, A>(f: (s: S) => A): State<S, A> {
    return new State((s) => [f(s), s]);
  }
}

// ============================================================================
// Derived Operations
// ============================================================================

/**
 * Run one step per element, left to right, threading the whole value.
 * Steps run in a loop, so collection size does not grow the call stack.
 */
export function traverse<S, A, B>(
  arr: readonly A[],
  f: (a: A) => State<S, B>,
): State<S, B[]> {
  return new State((s) => {
    let current = s;
    const out: B[] = [];
    for (const a of arr) {
      const [b, next] = f(a).run(current);
      out.push(b);
      current = next;
    }
    return [out, current];
  });
}

/** Run programs one after another, collecting what each read. */
export function sequence<S, A>(states: readonly State<S, A>[]): State<S, A[]> {
  return traverse(states, (s) => s);
}

// ============================================================================
// Optic Bridges
// ============================================================================

/**
 * Read the focus of a Lens (every occurrence for a Traversal).
 */
export function extract<S, A>(o: Lens<S, A>): State<S, A>;
export function extract<S, A>(o: Traversal<S, A>): State<S, readonly A[]>;
export function extract<S, A>(o: Optic<S, A>): State<S, A | readonly A[]> {
  return State.gets((s: S) => (o.kind === "lens" ? o.get(s) : getAll(o, s)));
}

/**
 * Modify through an optic, discarding the result.
 */
export function modifying<S, A>(
  o: Optic<S, A>,
  f: (a: A) => A,
): State<S, void> {
  return State.modify((s: S) => o.modify(f, s));
}
