/**
 * Dynamic Nexus
 *
 * Instead of a structural Traversal, a collection of sub-records can be
 * exposed as a function from the whole value to one Lens per element. Each
 * Lens closes over a position and reads or replaces that position in the
 * collection of whatever value it is applied to.
 *
 * Precondition: a Lens derived from `s` is only valid against `s` or a value
 * reached from `s` through these same Lenses (which keep positions stable).
 * Applying it to a value whose collection has a different size is a stale
 * use; see `StaleAccessorPolicy`.
 */

import { config } from "./config.js";
import { StaleAccessorError } from "./errors.js";
import { lens, type Lens } from "./lens.js";
import { log } from "./log.js";

/**
 * Rebuild the position → element mapping of a collection.
 */
export function toIndexMap<E>(items: readonly E[]): ReadonlyMap<number, E> {
  return new Map(items.map((e, i) => [i, e] as const));
}

function checkFresh(index: number, expected: number, actual: number): void {
  if (index >= actual) {
    throw new StaleAccessorError(index, expected, actual);
  }
  if (expected === actual) return;

  if (config.get("nexus.staleAccessors") === "reject") {
    throw new StaleAccessorError(index, expected, actual);
  }
  log.warn(
    `stale accessor for index ${index} (derived from ${expected} element(s), applied to ${actual})`,
  );
}

/**
 * One Lens per element of the collection behind `items`, in order.
 *
 * @example
 * ```typescript
 * const departments = prop<Univ>()("departments");
 * const lenses = indexedLenses(departments)(univ);
 * lenses[1].get(univ); // univ.departments[1]
 * ```
 */
export function indexedLenses<S, E>(
  items: Lens<S, readonly E[]>,
): (s: S) => readonly Lens<S, E>[] {
  return (source) => {
    const size = items.get(source).length;

    return Array.from(toIndexMap(items.get(source)).keys(), (i) => {
      const lookup = (s: S): E => {
        const current = items.get(s);
        checkFresh(i, size, current.length);
        return current[i];
      };

      return lens<S, E>(lookup, (e, s) => {
        const current = items.get(s);
        checkFresh(i, size, current.length);
        const next = current.slice();
        next[i] = e;
        return items.set(next, s);
      });
    });
  };
}
