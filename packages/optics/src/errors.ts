/**
 * Optic Error Types
 *
 * Operations on lawful optics are total and never throw. These errors mark
 * usage-contract violations that can be detected at run time.
 */

export type OpticErrorCode = "stale-accessor" | "law-violation";

/**
 * Base class for all optic contract violations.
 */
export class OpticError extends Error {
  constructor(
    message: string,
    public readonly code: OpticErrorCode,
  ) {
    super(message);
    this.name = "OpticError";
  }
}

/**
 * Thrown when a dynamically derived Lens is applied to a value other than
 * the one it was derived from (or one reached from it by its own updates).
 */
export class StaleAccessorError extends OpticError {
  constructor(
    public readonly index: number,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Stale accessor for index ${index}: derived from a collection of ${expected} element(s), applied to one of ${actual}`,
      "stale-accessor",
    );
    this.name = "StaleAccessorError";
  }
}

/**
 * Thrown by `assertLaws` when at least one law is disproven.
 */
export class LawViolationError extends OpticError {
  constructor(
    public readonly laws: readonly string[],
    details: string,
  ) {
    super(`Law(s) violated: ${laws.join(", ")}\n${details}`, "law-violation");
    this.name = "LawViolationError";
  }
}
