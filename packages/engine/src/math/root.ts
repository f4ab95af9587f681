import type { ScalarFunction } from "@qmc-roots/shared";
import { RootRefinementError } from "../errors";

export type RootResult = {
  x: number;
  ok: boolean;
  iterations: number;
};

/** Takes f and a bracket with a sign change (or a zero at an end), returns a root. */
export type RootRefiner = (f: ScalarFunction, lo: number, hi: number) => number;

export function bisectRoot(
  f: ScalarFunction,
  a: number,
  b: number,
  tol: number,
  maxIter = 100
): RootResult | null {
  const fa = f(a);
  const fb = f(b);
  // infinities carry a sign; only NaN does not
  if (Number.isNaN(fa) || Number.isNaN(fb)) return null;
  if (fa === 0) return { x: a, ok: true, iterations: 0 };
  if (fb === 0) return { x: b, ok: true, iterations: 0 };
  if (Math.sign(fa) === Math.sign(fb)) return null;

  let lo = a;
  let hi = b;
  let flo = fa;

  for (let i = 0; i < maxIter; i++) {
    const mid = (lo + hi) / 2;
    const fmid = f(mid);
    if (Number.isNaN(fmid)) return null;

    // mid collapsing onto an end means lo and hi are adjacent doubles
    if (Math.abs(hi - lo) <= tol || fmid === 0 || mid === lo || mid === hi) {
      return { x: mid, ok: true, iterations: i + 1 };
    }

    if (Math.sign(flo) !== Math.sign(fmid)) {
      hi = mid;
    } else {
      lo = mid;
      flo = fmid;
    }
  }

  return { x: (lo + hi) / 2, ok: false, iterations: maxIter };
}

/**
 * Bisect down to floating-point resolution. Throws instead of returning a
 * partial answer.
 */
export const bisectionRefiner: RootRefiner = (f, lo, hi) => {
  const result = bisectRoot(f, lo, hi, 0, 2000);
  if (!result) {
    throw new RootRefinementError(lo, hi, "endpoints are NaN or share a sign");
  }
  if (!result.ok) {
    throw new RootRefinementError(lo, hi, `no convergence after ${result.iterations} iterations`);
  }
  return result.x;
};
