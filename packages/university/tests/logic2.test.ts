/**
 * Logic2 Tests - dynamic nexus
 */
import { afterEach, describe, it, expect } from "vitest";
import { StaleAccessorError, config } from "@optikit/optics";
import { Logic2, deps2, university2Of, urjc, type SUniversity } from "../src/index.js";

const logic2 = new Logic2(university2Of);

afterEach(() => {
  config.reset();
});

describe("Logic2", () => {
  it("readName should read the name", () => {
    expect(logic2.readName(urjc)).toBe("urjc");
  });

  it("upperName should upper-case the name only", () => {
    expect(logic2.upperName(urjc)).toEqual({
      name: "URJC",
      community: 7500,
      departments: [{ budget: 80000 }, { budget: 100000 }],
    });
  });

  it("totalBudget should add up every department budget", () => {
    expect(logic2.totalBudget(urjc)).toBe(180000);
  });

  it("doubleBudgets should double each budget and nothing else", () => {
    expect(logic2.doubleBudgets(urjc)).toEqual({
      name: "urjc",
      community: 7500,
      departments: [{ budget: 160000 }, { budget: 200000 }],
    });
  });

  it("totalBudget after doubleBudgets should be twice the total", () => {
    expect(logic2.totalBudget(logic2.doubleBudgets(urjc))).toBe(360000);
  });

  it("doubling twice should quadruple every budget", () => {
    expect(logic2.doubleBudgets(logic2.doubleBudgets(urjc)).departments).toEqual([
      { budget: 320000 },
      { budget: 400000 },
    ]);
  });

  it("programs should derive the departments from the state they start from", () => {
    const { doubleUnivBudg, getUnivBudg } = logic2.programs;
    expect(doubleUnivBudg.andThen(doubleUnivBudg).andThen(getUnivBudg).runA(urjc)).toBe(
      720000,
    );
  });
});

describe("deps2", () => {
  it("should derive one department descriptor per department", () => {
    const deps = deps2(urjc);
    expect(deps).toHaveLength(2);
    expect(deps.map((d) => d.budg.get(urjc))).toEqual([80000, 100000]);
  });

  it("each descriptor should write its own department back into the university", () => {
    const [, second] = deps2(urjc);
    expect(second.budg.set(1, urjc)).toEqual({
      name: "urjc",
      community: 7500,
      departments: [{ budget: 80000 }, { budget: 1 }],
    });
  });

  it("descriptors should stay valid against the value they produce", () => {
    const [first, second] = deps2(urjc);
    const step1 = first.budg.modify((b) => b + 1, urjc);
    const step2 = second.budg.modify((b) => b + 2, step1);
    expect(step2.departments).toEqual([{ budget: 80001 }, { budget: 100002 }]);
  });

  it("applying the descriptors in reverse order should give the same result", () => {
    const reversed = [...deps2(urjc)]
      .reverse()
      .reduce((u, d) => d.budg.modify((b) => b * 2, u), urjc);
    expect(reversed).toEqual(logic2.doubleBudgets(urjc));
  });

  it("should reject a descriptor applied to a university with more departments", () => {
    const grown: SUniversity = {
      ...urjc,
      departments: [...urjc.departments, { budget: 1 }],
    };
    const [first] = deps2(urjc);
    expect(() => first.budg.get(grown)).toThrow(StaleAccessorError);
    expect(() => first.budg.modify((b) => b * 2, grown)).toThrow(StaleAccessorError);
  });

  it("should reject a descriptor whose department was removed", () => {
    config.set({ nexus: { staleAccessors: "warn" } });
    const shrunk: SUniversity = { ...urjc, departments: [urjc.departments[0]] };
    const [, second] = deps2(urjc);
    expect(() => second.budg.get(shrunk)).toThrow(StaleAccessorError);
  });
});
