/**
 * Generic university logic over a structural nexus.
 *
 * Works for any `Univ`/`Dep` pair with a `University` and a `Department`
 * descriptor: the department Traversal is composed with the budget Lens once,
 * and every budget operation goes through that composite.
 */

import {
  State,
  compose,
  extract,
  modifying,
  type Traversal,
} from "@optikit/optics";
import type { Department, University } from "./capability.js";
import {
  double,
  sum,
  toUpperCase,
  type UniversityLogic,
  type UniversityPrograms,
} from "./programs.js";

export class Logic<Univ, Dep> implements UniversityLogic<Univ> {
  private readonly budgets: Traversal<Univ, number>;
  readonly programs: UniversityPrograms<Univ>;

  constructor(
    private readonly univ: University<Univ, Dep>,
    dep: Department<Dep>,
  ) {
    const budgets = compose(univ.deps, dep.budg);
    this.budgets = budgets;

    this.programs = {
      getUnivName: extract(univ.name),
      upcUnivName: modifying(univ.name, toUpperCase),
      getUnivComm: extract(univ.comm),
      getUnivBudg: State.gets((s: Univ) => sum(budgets.getAll(s))),
      doubleUnivBudg: modifying(budgets, double),
    };
  }

  readName(s: Univ): string {
    return this.univ.name.get(s);
  }

  upperName(s: Univ): Univ {
    return this.univ.name.modify(toUpperCase, s);
  }

  readCommunity(s: Univ): number {
    return this.univ.comm.get(s);
  }

  totalBudget(s: Univ): number {
    return sum(this.budgets.getAll(s));
  }

  doubleBudgets(s: Univ): Univ {
    return this.budgets.modify(double, s);
  }
}
