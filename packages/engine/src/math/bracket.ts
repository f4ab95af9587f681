import type { Bracket, ScalarFunction, SearchStats, Transform } from "@qmc-roots/shared";
import { defaultSequence, type SequenceFactory } from "../sequence/sobol";
import { createEvaluator, identity } from "./evaluate";
import { extractBrackets } from "./extract";
import { SampleStore } from "./samples";

export type BracketOptions = {
  transform?: Transform;
  // Called once per search; every search starts from a fresh source.
  sequence?: SequenceFactory;
};

export type BracketSearch = {
  brackets: Bracket[];
  stats: SearchStats;
};

function assertCount(n: number): void {
  if (!Number.isInteger(n)) {
    throw new RangeError(`bracket count must be an integer, got ${n}`);
  }
}

/**
 * Sample transform(z) for z = 0, 1 and then z from the sequence until the
 * samples hold at least n brackets.
 *
 * Never returns if the image of [0, 1] holds fewer than n brackets.
 */
export function searchBrackets(
  f: ScalarFunction,
  n: number,
  options: BracketOptions = {}
): BracketSearch {
  assertCount(n);
  const stats: SearchStats = { evaluations: 0, discarded: 0, samples: 0, detected: 0 };
  if (n <= 0) return { brackets: [], stats };

  const evaluate = createEvaluator(f, options.transform ?? identity);
  const store = new SampleStore();

  const take = (z: number): void => {
    stats.evaluations++;
    if (!store.insert(evaluate(z))) stats.discarded++;
  };

  // The sequence never yields the endpoints themselves.
  take(0);
  take(1);

  const seq = (options.sequence ?? defaultSequence)();
  while (store.count < n) {
    take(seq.next());
  }

  const brackets = extractBrackets(store.entries());
  stats.samples = store.size;
  stats.detected = brackets.length;

  return { brackets: brackets.slice(0, n), stats };
}

export function bracketRoots(f: ScalarFunction, n: number, options?: BracketOptions): Bracket[] {
  return searchBrackets(f, n, options).brackets;
}
