/**
 * @optikit/university - generic logic over capability descriptors
 *
 * The same four operations (read the name, upper-case it, total the
 * department budgets, double them) written once against descriptors, in two
 * styles:
 *
 * - `Logic`: the department nexus is a Traversal composed with the budget Lens
 * - `Logic2`: the nexus is a function returning one budget Lens per department
 *
 * @example
 * ```typescript
 * const logic = new Logic(universityOf, departmentOf);
 * logic.totalBudget(urjc); // 180000
 *
 * const { doubleUnivBudg, getUnivBudg } = logic.programs;
 * doubleUnivBudg.andThen(getUnivBudg).run(urjc); // [360000, { ... }]
 * ```
 */

export {
  department,
  university,
  university2,
  type Department,
  type University,
  type University2,
} from "./capability.js";
export type { UniversityLogic, UniversityPrograms } from "./programs.js";
export { Logic } from "./logic.js";
export { Logic2 } from "./logic2.js";
export {
  deps2,
  departmentOf,
  universityOf,
  university2Of,
  math,
  cs,
  urjc,
  eqDepartment,
  eqUniversity,
  arbDepartment,
  arbUniversity,
  type SDepartment,
  type SUniversity,
} from "./records.js";
