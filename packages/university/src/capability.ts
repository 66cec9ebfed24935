/**
 * Capability Descriptors
 *
 * A descriptor bundles the optics that expose a record type's structure to
 * generic logic. One descriptor is built per concrete record type and handed
 * to the logic explicitly; a descriptor missing any of these fields does not
 * type-check.
 *
 * The nexus between a university and its departments comes in two shapes:
 *   - `University`: a structural Traversal, composed with `Department.budg`
 *   - `University2`: a function rebuilding one `Department<Univ>` per
 *     department from the current value
 */

import type { Lens, Traversal } from "@optikit/optics";

// ============================================================================
// Department
// ============================================================================

export interface Department<Dep> {
  readonly budg: Lens<Dep, number>;
}

export function department<Dep>(budg: Lens<Dep, number>): Department<Dep> {
  return Object.freeze({ budg });
}

// ============================================================================
// University (structural nexus)
// ============================================================================

export interface University<Univ, Dep> {
  readonly name: Lens<Univ, string>;
  readonly comm: Lens<Univ, number>;
  readonly deps: Traversal<Univ, Dep>;
}

export function university<Univ, Dep>(
  optics: University<Univ, Dep>,
): University<Univ, Dep> {
  return Object.freeze({ name: optics.name, comm: optics.comm, deps: optics.deps });
}

// ============================================================================
// University2 (dynamic nexus)
// ============================================================================

/**
 * Each `Department<Univ>` returned by `deps` targets one department but
 * reads and writes the whole `Univ`. The list is only valid for the value it
 * was derived from and for values reached from it through its own Lenses.
 */
export interface University2<Univ> {
  readonly name: Lens<Univ, string>;
  readonly comm: Lens<Univ, number>;
  readonly deps: (u: Univ) => readonly Department<Univ>[];
}

export function university2<Univ>(optics: University2<Univ>): University2<Univ> {
  return Object.freeze({ name: optics.name, comm: optics.comm, deps: optics.deps });
}
