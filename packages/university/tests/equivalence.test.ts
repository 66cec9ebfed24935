/**
 * Cross-variant equivalence: the structural and dynamic nexus must agree.
 */
import { describe, it, expect } from "vitest";
import { forAll, sample } from "@optikit/optics/laws";
import {
  Logic,
  Logic2,
  arbUniversity,
  departmentOf,
  deps2,
  university2Of,
  universityOf,
  urjc,
  type SUniversity,
} from "../src/index.js";

const logic = new Logic(universityOf, departmentOf);
const logic2 = new Logic2(university2Of);

describe("Logic and Logic2", () => {
  describe("on the sample university", () => {
    it("should produce identical results for every operation", () => {
      expect(logic2.readName(urjc)).toBe(logic.readName(urjc));
      expect(logic2.upperName(urjc)).toEqual(logic.upperName(urjc));
      expect(logic2.totalBudget(urjc)).toBe(logic.totalBudget(urjc));
      expect(logic2.doubleBudgets(urjc)).toEqual(logic.doubleBudgets(urjc));
      expect(logic2.totalBudget(logic2.doubleBudgets(urjc))).toBe(
        logic.totalBudget(logic.doubleBudgets(urjc)),
      );
      expect(logic2.doubleBudgets(logic2.doubleBudgets(urjc))).toEqual(
        logic.doubleBudgets(logic.doubleBudgets(urjc)),
      );
    });
  });

  describe("on a large university", () => {
    const large: SUniversity = {
      name: "large",
      community: 1,
      departments: Array.from({ length: 20_000 }, (_, i) => ({ budget: i % 97 })),
    };

    it("totalBudget should agree", () => {
      expect(logic2.totalBudget(large)).toBe(logic.totalBudget(large));
      expect(logic2.programs.getUnivBudg.runA(large)).toBe(logic.totalBudget(large));
    });

    it("doubleBudgets should agree", () => {
      const doubled = logic.doubleBudgets(large);
      expect(doubled.departments[19_999]).toEqual({ budget: (19_999 % 97) * 2 });
      expect(logic2.doubleBudgets(large)).toEqual(doubled);
      expect(logic2.programs.doubleUnivBudg.runS(large)).toEqual(doubled);
    }, 30_000);
  });

  describe("on generated universities", () => {
    it("totalBudget should agree", () => {
      forAll(sample(arbUniversity), (u) => {
        expect(logic2.totalBudget(u)).toBe(logic.totalBudget(u));
      });
    });

    it("doubleBudgets should agree", () => {
      forAll(sample(arbUniversity), (u) => {
        expect(logic2.doubleBudgets(u)).toEqual(logic.doubleBudgets(u));
      });
    });

    it("upperName should agree", () => {
      forAll(sample(arbUniversity), (u) => {
        expect(logic2.upperName(u)).toEqual(logic.upperName(u));
      });
    });

    it("sequenced programs should agree", () => {
      forAll(sample(arbUniversity), (u) => {
        const a = logic.programs.doubleUnivBudg.andThen(logic.programs.getUnivBudg);
        const b = logic2.programs.doubleUnivBudg.andThen(logic2.programs.getUnivBudg);
        expect(b.run(u)).toEqual(a.run(u));
      });
    });

    it("applying dynamic descriptors in any order should match the traversal", () => {
      forAll(sample(arbUniversity), (u) => {
        const reversed = [...deps2(u)]
          .reverse()
          .reduce((acc, d) => d.budg.modify((b) => b * 2, acc), u);
        expect(reversed).toEqual(logic.doubleBudgets(u));
      });
    });
  });
});
