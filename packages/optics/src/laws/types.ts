/**
 * Law Definition Types
 *
 * Laws are data: named predicates over generated inputs that every lawful
 * optic must satisfy. They are checked at run time by `checkLaws`.
 *
 * @example
 * ```typescript
 * const law = defineLaw<[number]>({
 *   name: "double is even",
 *   arity: 1,
 *   check: (n) => (n * 2) % 2 === 0,
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Core Law Type
// ============================================================================

/**
 * A law definition.
 *
 * @template Args - Tuple of the law's inputs. All laws in a set share one
 * input tuple; each law reads the first `arity` entries.
 */
export interface Law<Args extends readonly unknown[]> {
  /**
   * Human-readable name, used in failure reports.
   * @example "get-set", "count preservation"
   */
  readonly name: string;

  readonly check: (...args: Args) => boolean;

  /**
   * Number of inputs the law actually reads.
   */
  readonly arity: number;

  /**
   * Plain-English statement of the law, shown when it fails.
   */
  readonly description?: string;

  /**
   * @example "lens", "traversal", "composition"
   */
  readonly category?: string;
}

/**
 * A collection of laws over the same input tuple.
 */
export type LawSet<Args extends readonly unknown[]> = readonly Law<Args>[];

// ============================================================================
// Arbitrary (for property testing)
// ============================================================================

/**
 * Pseudo-random source in [0, 1).
 */
export type Rng = () => number;

/**
 * Generator of test values drawn from an Rng.
 */
export interface Arbitrary<A> {
  readonly arbitrary: (rng: Rng) => A;
}

// ============================================================================
// Verification Results
// ============================================================================

export type LawCheckResult =
  | {
      readonly status: "passed";
      readonly law: string;
      readonly iterations: number;
    }
  | {
      readonly status: "disproven";
      readonly law: string;
      readonly iteration: number;
      readonly counterexample: string;
      readonly description?: string;
    };

export interface VerificationSummary {
  readonly total: number;
  readonly passed: number;
  readonly disproven: number;
  readonly results: readonly LawCheckResult[];
}

// ============================================================================
// Law Builder Utilities
// ============================================================================

/**
 * Create a law with type inference for the check function.
 */
export function defineLaw<Args extends readonly unknown[]>(
  law: Law<Args>,
): Law<Args> {
  return law;
}

/**
 * Combine multiple law sets over the same inputs into one.
 */
export function combineLaws<Args extends readonly unknown[]>(
  ...lawSets: LawSet<Args>[]
): LawSet<Args> {
  return lawSets.flat();
}

/**
 * Filter laws by category.
 */
export function filterLaws<Args extends readonly unknown[]>(
  laws: LawSet<Args>,
  category: string,
): LawSet<Args> {
  return laws.filter((law) => law.category === category);
}
