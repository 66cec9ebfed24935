/**
 * State Tests
 */
import { describe, it, expect } from "vitest";
import { State, extract, modifying, sequence, traverse } from "./state.js";
import { prop } from "./lens.js";
import { each } from "./traversal.js";
import { compose } from "./compose.js";

interface Counter {
  readonly label: string;
  readonly counts: readonly number[];
}

const label = prop<Counter>()("label");
const counts = compose(prop<Counter>()("counts"), each<number>());

describe("State", () => {
  describe("constructors", () => {
    it("pure should keep the state", () => {
      expect(State.pure<number, string>("a").run(1)).toEqual(["a", 1]);
    });

    it("get should expose the state as the result", () => {
      expect(State.get<number>().run(3)).toEqual([3, 3]);
    });

    it("set should replace the state", () => {
      expect(State.set(9).runS(3)).toBe(9);
    });

    it("modify should transform the state", () => {
      expect(State.modify((n: number) => n + 1).runS(3)).toBe(4);
    });

    it("gets should read a derived value", () => {
      expect(State.gets((s: string) => s.length).runA("abc")).toBe(3);
    });
  });

  describe("sequencing", () => {
    it("andThen should run the second step on the state left by the first", () => {
      const program = State.modify((n: number) => n + 1).andThen(
        State.gets((n: number) => n * 10),
      );
      expect(program.run(1)).toEqual([20, 2]);
    });

    it("traverse should apply steps in order to the running state", () => {
      const append = (x: string) =>
        new State<string, string>((s) => [s + x, s + x]);
      expect(traverse(["a", "b", "c"], append).run("")).toEqual([
        ["a", "ab", "abc"],
        "abc",
      ]);
    });

    it("sequence should collect results in order", () => {
      const tick = State.modify((n: number) => n + 1).andThen(State.get<number>());
      expect(sequence([tick, tick, tick]).run(0)).toEqual([[1, 2, 3], 3]);
    });

    it("traverse should handle long collections without growing the stack", () => {
      const steps = Array.from({ length: 50_000 }, (_, i) => i);
      const [out, total] = traverse(steps, (x) =>
        new State<number, number>((s) => [x, s + 1]),
      ).run(0);
      expect(total).toBe(50_000);
      expect(out).toHaveLength(50_000);
      expect(out[49_999]).toBe(49_999);
    });

    it("traverse of an empty array should leave the state alone", () => {
      expect(traverse([], (x: number) => State.pure<number, number>(x)).run(5)).toEqual([
        [],
        5,
      ]);
    });
  });

  describe("optic bridges", () => {
    const counter: Counter = { label: "c", counts: [1, 2] };

    it("extract should read a Lens focus", () => {
      expect(extract(label).runA(counter)).toBe("c");
    });

    it("extract should read every Traversal occurrence", () => {
      expect(extract(counts).runA(counter)).toEqual([1, 2]);
    });

    it("modifying should update through the optic", () => {
      const program = modifying(counts, (n) => n * 5).andThen(extract(counts));
      expect(program.run(counter)).toEqual([[5, 10], { label: "c", counts: [5, 10] }]);
    });
  });
});
