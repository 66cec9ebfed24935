/**
 * A university with a list of departments, plus the
 * descriptors that make it usable by `Logic` and `Logic2`.
 */

import {
  compose,
  each,
  eqArray,
  eqStrict,
  eqStruct,
  indexedLenses,
  prop,
  type Eq,
} from "@optikit/optics";
import {
  arbArray,
  arbInt,
  arbMap,
  arbPair,
  arbString,
  type Arbitrary,
} from "@optikit/optics/laws";
import {
  department,
  university,
  university2,
  type Department,
  type University,
  type University2,
} from "./capability.js";

// ============================================================================
// Records
// ============================================================================

export interface SDepartment {
  readonly budget: number;
}

export interface SUniversity {
  readonly name: string;
  readonly community: number;
  readonly departments: readonly SDepartment[];
}

const univField = prop<SUniversity>();
const depField = prop<SDepartment>();

const name = univField("name");
const community = univField("community");
const departments = univField("departments");
const budget = depField("budget");

// ============================================================================
// Descriptors
// ============================================================================

export const departmentOf: Department<SDepartment> = department(budget);

export const universityOf: University<SUniversity, SDepartment> = university({
  name,
  comm: community,
  deps: compose(departments, each<SDepartment>()),
});

const departmentLenses = indexedLenses(departments);

/**
 * Dynamic nexus: one budget descriptor per department of `u`, each reading
 * and writing the whole university by position.
 */
export function deps2(u: SUniversity): readonly Department<SUniversity>[] {
  return departmentLenses(u).map((l) => department(compose(l, budget)));
}

export const university2Of: University2<SUniversity> = university2({
  name,
  comm: community,
  deps: deps2,
});

// ============================================================================
// Sample Values
// ============================================================================

export const math: SDepartment = { budget: 80000 };
export const cs: SDepartment = { budget: 100000 };
export const urjc: SUniversity = {
  name: "urjc",
  community: 7500,
  departments: [math, cs],
};

// ============================================================================
// Eq & Arbitrary
// ============================================================================

export const eqDepartment: Eq<SDepartment> = eqStruct<SDepartment>({
  budget: eqStrict(),
});

export const eqUniversity: Eq<SUniversity> = eqStruct<SUniversity>({
  name: eqStrict(),
  community: eqStrict(),
  departments: eqArray(eqDepartment),
});

export const arbDepartment: Arbitrary<SDepartment> = arbMap(
  arbInt(0, 1_000_000),
  (b) => ({ budget: b }),
);

export const arbUniversity: Arbitrary<SUniversity> = arbMap(
  arbPair(arbPair(arbString(), arbInt(0, 50_000)), arbArray(arbDepartment)),
  ([[n, c], ds]) => ({ name: n, community: c, departments: ds }),
);
