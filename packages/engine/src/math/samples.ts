import BTree from "sorted-btree";
import type { Sample, Sign } from "@qmc-roots/shared";
import { isSignChange } from "./extract";

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Samples ordered by domain value, with a running count of the brackets
 * extractBrackets() would report for the current contents.
 *
 * Brackets only depend on neighbours in key order, so an insertion touches at
 * most the one adjacency it splits and the two it creates.
 */
export class SampleStore {
  private readonly samples = new BTree<number, Sign | null>(undefined, compareNumbers);
  private brackets = 0;

  get count(): number {
    return this.brackets;
  }

  get size(): number {
    return this.samples.size;
  }

  /**
   * @returns false when x is already stored; the sample is dropped and the
   * count does not change.
   */
  insert({ x, s }: Sample): boolean {
    if (this.samples.has(x)) return false;

    const before = this.samples.nextLowerPair(x);
    const after = this.samples.nextHigherPair(x);
    this.samples.set(x, s);

    // The split adjacency no longer exists.
    if (before && after && isSignChange(before[1], after[1])) {
      this.brackets--;
    }

    if (s === 0) this.brackets++;
    if (before && isSignChange(s, before[1])) this.brackets++;
    if (after && isSignChange(s, after[1])) this.brackets++;

    return true;
  }

  *entries(): IterableIterator<Sample> {
    for (const [x, s] of this.samples.entries()) {
      yield { x, s };
    }
  }
}
