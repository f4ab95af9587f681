import type { ScalarFunction } from "@qmc-roots/shared";
import { searchBrackets, type BracketOptions } from "./math/bracket";
import { isPointBracket } from "./math/extract";
import { bisectionRefiner, type RootRefiner } from "./math/root";

export type RootOptions = BracketOptions & {
  refiner?: RootRefiner;
};

/**
 * n roots of f in the image of [0, 1] under options.transform, ascending.
 * Exact zeros are returned as sampled; every other bracket goes to the
 * refiner, whose errors propagate.
 */
export function findRoots(f: ScalarFunction, n: number, options: RootOptions = {}): number[] {
  const refine = options.refiner ?? bisectionRefiner;
  const { brackets } = searchBrackets(f, n, options);

  return brackets.map((b) => (isPointBracket(b) ? b.lo : refine(f, b.lo, b.hi)));
}
