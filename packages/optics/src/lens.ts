/**
 * Lens
 *
 * A Lens<S, A> focuses on exactly one A inside an S. It is total: every S
 * has exactly one A to read and to replace.
 *
 * Instances must satisfy the following laws:
 *   - GetSet: get(set(a, s)) === a
 *   - SetGet: set(get(s), s) === s
 *   - SetSet: set(a2, set(a1, s)) === set(a2, s)
 *
 * The laws are an obligation on whoever supplies `get` and `set`; they are
 * not checked at construction time. See `lensLaws` for runtime verification.
 */

// ============================================================================
// Lens
// ============================================================================

/**
 * Lens optic - a total accessor for a single field.
 */
export interface Lens<S, A> {
  readonly kind: "lens";
  readonly get: (s: S) => A;
  readonly set: (a: A, s: S) => S;
  readonly modify: (f: (a: A) => A, s: S) => S;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Build a Lens from a getter and a setter.
 *
 * @example
 * ```typescript
 * const first = lens<[number, string], number>(
 *   ([n]) => n,
 *   (n, [, s]) => [n, s],
 * );
 * ```
 */
export function lens<S, A>(
  get: (s: S) => A,
  set: (a: A, s: S) => S,
): Lens<S, A> {
  return Object.freeze({
    kind: "lens" as const,
    get,
    set,
    modify: (f: (a: A) => A, s: S) => set(f(get(s)), s),
  });
}

/**
 * Lens onto a record field, selected by key.
 *
 * Setting copies the record and replaces only that key.
 *
 * @example
 * ```typescript
 * interface Point { readonly x: number; readonly y: number }
 * const x = prop<Point>()("x");
 * x.set(3, { x: 1, y: 2 }); // { x: 3, y: 2 }
 * ```
 */
export function prop<S extends object>(): <K extends keyof S>(
  key: K,
) => Lens<S, S[K]> {
  return <K extends keyof S>(key: K) =>
    lens<S, S[K]>(
      (s) => s[key],
      (a, s) => ({ ...s, [key]: a }),
    );
}

/**
 * The identity Lens, focusing on the whole value.
 */
export function id<S>(): Lens<S, S> {
  return lens<S, S>(
    (s) => s,
    (a) => a,
  );
}
