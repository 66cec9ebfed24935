/**
 * Optic law definitions and runtime verification.
 *
 * ```typescript
 * import { lensLaws, assertLaws, arbTriple } from "@optikit/optics/laws";
 *
 * assertLaws(lensLaws(name, eqUniv, eqStrict()), arbTriple(arbUniv, arbString(), arbString()));
 * ```
 *
 * @module
 */

export type {
  Law,
  LawSet,
  Rng,
  Arbitrary,
  LawCheckResult,
  VerificationSummary,
} from "./types.js";
export { defineLaw, combineLaws, filterLaws } from "./types.js";

export {
  random,
  sample,
  arbInt,
  arbString,
  arbElement,
  arbArray,
  arbPair,
  arbTriple,
  arbMap,
} from "./arbitrary.js";

export { forAll, checkLaws, assertLaws, type CheckOptions } from "./check.js";

export { lensLaws } from "./lens.js";
export { traversalLaws } from "./traversal.js";
export { compositionLaws } from "./compose.js";
