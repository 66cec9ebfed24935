/**
 * Generic university logic over a dynamic nexus.
 *
 * There is no composite optic here: `deps` hands back one Department
 * descriptor per department, each already aimed at the whole `Univ`. Budget
 * operations derive that list from the value they start from and then walk
 * it, each step applied to the value left by the previous one.
 */

import { State, extract, modifying, traverse } from "@optikit/optics";
import type { University2 } from "./capability.js";
import {
  double,
  sum,
  toUpperCase,
  type UniversityLogic,
  type UniversityPrograms,
} from "./programs.js";

export class Logic2<Univ> implements UniversityLogic<Univ> {
  readonly programs: UniversityPrograms<Univ>;

  constructor(private readonly univ: University2<Univ>) {
    const deps = State.gets(univ.deps);

    this.programs = {
      getUnivName: extract(univ.name),
      upcUnivName: modifying(univ.name, toUpperCase),
      getUnivComm: extract(univ.comm),
      getUnivBudg: deps.flatMap((ds) =>
        traverse(ds, (d) => extract(d.budg)).map(sum),
      ),
      doubleUnivBudg: deps.flatMap((ds) =>
        traverse(ds, (d) => modifying(d.budg, double)).void_(),
      ),
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
    return sum(this.univ.deps(s).map((d) => d.budg.get(s)));
  }

  doubleBudgets(s: Univ): Univ {
    return traverse(this.univ.deps(s), (d) => modifying(d.budg, double)).runS(s);
  }
}
