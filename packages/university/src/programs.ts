/**
 * The operations every university logic provides, as plain functions and as
 * State programs that can be sequenced against an evolving value.
 */

import type { State } from "@optikit/optics";

export interface UniversityPrograms<Univ> {
  readonly getUnivName: State<Univ, string>;
  readonly upcUnivName: State<Univ, void>;
  readonly getUnivComm: State<Univ, number>;
  readonly getUnivBudg: State<Univ, number>;
  readonly doubleUnivBudg: State<Univ, void>;
}

export interface UniversityLogic<Univ> {
  readName(s: Univ): string;
  upperName(s: Univ): Univ;
  readCommunity(s: Univ): number;
  totalBudget(s: Univ): number;
  doubleBudgets(s: Univ): Univ;
  readonly programs: UniversityPrograms<Univ>;
}

export const toUpperCase = (s: string): string => s.toUpperCase();

export const double = (n: number): number => n * 2;

export const sum = (ns: readonly number[]): number =>
  ns.reduce((acc, n) => acc + n, 0);
