/**
 * Runtime Law Verification
 *
 * Runs laws against seeded generated inputs. Iteration counts default to
 * the `laws.iterations` config value.
 *
 * @module
 */

import { config } from "../config.js";
import { LawViolationError } from "../errors.js";
import { log } from "../log.js";
import { random } from "./arbitrary.js";
import type {
  Arbitrary,
  LawCheckResult,
  LawSet,
  VerificationSummary,
} from "./types.js";

// ============================================================================
// Property-Based Testing
// ============================================================================

/**
 * Run a property against generated values, throwing on the first failure.
 *
 * @example
 * ```typescript
 * forAll(sample(arbUniversity), (u) => {
 *   expect(logic.totalBudget(u)).toBe(logic2.totalBudget(u));
 * });
 *
 * forAll(sample(arbUniversity), 500, (u) => { ... });
 * ```
 */
export function forAll<T>(
  generator: (seed: number) => T,
  property: (value: T) => void,
): void;
export function forAll<T>(
  generator: (seed: number) => T,
  count: number,
  property: (value: T) => void,
): void;
export function forAll<T>(
  generator: (seed: number) => T,
  countOrProperty: number | ((value: T) => void),
  property?: (value: T) => void,
): void {
  const count =
    typeof countOrProperty === "number"
      ? countOrProperty
      : config.get("laws.iterations");
  const prop = typeof countOrProperty === "function" ? countOrProperty : property;
  if (prop === undefined) {
    throw new TypeError("forAll requires a property function");
  }

  for (let i = 0; i < count; i++) {
    const value = generator(i);
    try {
      prop(value);
    } catch (e) {
      const err = e instanceof Error ? e.message : String(e);
      throw new Error(
        `Property failed after ${i + 1} tests.\n` +
          `Failing input: ${describeInput(value)}\n` +
          `Error: ${err}`,
      );
    }
  }
}

function describeInput(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "function" ? `<function ${v.name || "anonymous"}>` : v,
  );
}

// ============================================================================
// Law Verification
// ============================================================================

export interface CheckOptions {
  /** Generated inputs per law (defaults to config `laws.iterations`) */
  readonly iterations?: number;
}

/**
 * Check every law against the same stream of generated inputs.
 */
export function checkLaws<Args extends readonly unknown[]>(
  laws: LawSet<Args>,
  arb: Arbitrary<Args>,
  options: CheckOptions = {},
): VerificationSummary {
  const iterations = options.iterations ?? config.get("laws.iterations");

  const results = laws.map((law): LawCheckResult => {
    for (let i = 0; i < iterations; i++) {
      const input = arb.arbitrary(random(i));
      if (!law.check(...input)) {
        return {
          status: "disproven",
          law: law.name,
          iteration: i,
          counterexample: describeInput(input.slice(0, law.arity)),
          description: law.description,
        };
      }
    }
    return { status: "passed", law: law.name, iterations };
  });

  const disproven = results.filter((r) => r.status === "disproven").length;
  log.debug(`checked ${laws.length} law(s) x ${iterations}: ${disproven} disproven`);

  return {
    total: results.length,
    passed: results.length - disproven,
    disproven,
    results,
  };
}

/**
 * Like `checkLaws`, but throws a LawViolationError if any law is disproven.
 */
export function assertLaws<Args extends readonly unknown[]>(
  laws: LawSet<Args>,
  arb: Arbitrary<Args>,
  options: CheckOptions = {},
): VerificationSummary {
  const summary = checkLaws(laws, arb, options);
  const failures = summary.results.flatMap((r) =>
    r.status === "disproven" ? [r] : [],
  );

  if (failures.length > 0) {
    throw new LawViolationError(
      failures.map((f) => f.law),
      failures
        .map((f) => `  ${f.law}: ${f.description ?? ""} (input ${f.counterexample})`)
        .join("\n"),
    );
  }
  return summary;
}
