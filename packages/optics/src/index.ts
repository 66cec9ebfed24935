/**
 * @optikit/optics - Lenses and Traversals over immutable data
 *
 * Features:
 * - Lens (exactly one focus) and Traversal (zero or more, ordered)
 * - Composition algebra: Lens ∘ Lens = Lens, anything with a Traversal = Traversal
 * - State monad with optic bridges for step-by-step programs
 * - Dynamic nexus: per-element Lenses derived from the current value
 * - Laws as data, with seeded runtime verification
 *
 * @example
 * ```typescript
 * import { prop, each, compose, sumOf } from "@optikit/optics";
 *
 * interface Dep { readonly budget: number }
 * interface Univ { readonly name: string; readonly departments: readonly Dep[] }
 *
 * const budgets = compose(
 *   compose(prop<Univ>()("departments"), each<Dep>()),
 *   prop<Dep>()("budget"),
 * );
 *
 * sumOf(budgets, univ);                    // total budget
 * budgets.modify((b) => b * 2, univ);      // every budget doubled
 * ```
 */

// ============================================================================
// Optics
// ============================================================================

export { lens, prop, id, type Lens } from "./lens.js";
export {
  traversal,
  each,
  fromLens,
  set,
  length,
  type Traversal,
} from "./traversal.js";
export { compose, getAll, modify, sumOf, type Optic } from "./compose.js";

// ============================================================================
// State
// ============================================================================

export {
  State,
  traverse,
  sequence,
  extract,
  modifying,
} from "./state.js";

// ============================================================================
// Dynamic Nexus
// ============================================================================

export { toIndexMap, indexedLenses } from "./nexus.js";

// ============================================================================
// Eq
// ============================================================================

export { eqStrict, eqBy, eqArray, eqStruct, type Eq } from "./eq.js";

// ============================================================================
// Config, Errors, Logging
// ============================================================================

export {
  config,
  loadConfig,
  type OptikitConfig,
  type OptikitConfigInput,
  type StaleAccessorPolicy,
} from "./config.js";
export {
  OpticError,
  StaleAccessorError,
  LawViolationError,
  type OpticErrorCode,
} from "./errors.js";
export { log } from "./log.js";
