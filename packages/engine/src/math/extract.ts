import type { Bracket, Sample, Sign } from "@qmc-roots/shared";

// Nonzero, opposite signs. A sign-less (NaN) sample pairs with nothing.
export function isSignChange(a: Sign | null, b: Sign | null): boolean {
  return a !== null && b !== null && a !== 0 && a === -b;
}

/**
 * Walk samples in increasing x and report every bracket: each exact zero once
 * as (x, x), and each adjacent pair with nonzero opposite signs as (x, y).
 * The result is ordered by lo and pairwise disjoint.
 */
export function extractBrackets(samples: Iterable<Sample>): Bracket[] {
  const out: Bracket[] = [];
  let prev: Sample | undefined;

  for (const cur of samples) {
    if (cur.s === 0) {
      out.push({ lo: cur.x, hi: cur.x });
    } else if (prev && isSignChange(prev.s, cur.s)) {
      out.push({ lo: prev.x, hi: cur.x });
    }
    prev = cur;
  }

  return out;
}

export function isPointBracket(b: Bracket): boolean {
  return b.lo === b.hi;
}
