import type { Sample, ScalarFunction, Sign, Transform } from "@qmc-roots/shared";
import { SignEvaluationError } from "../errors";

export type Evaluator = (z: number) => Sample;

export const identity: Transform = (z) => z;

export function signOf(v: number): Sign | null {
  if (v > 0) return 1;
  if (v < 0) return -1;
  if (v === 0) return 0; // also -0
  return null;
}

/**
 * Compose transform and f: z in [0, 1] -> (x, sign(f(x))).
 * A NaN from f is kept as a sample without a sign. Anything thrown by f or
 * transform passes through untouched.
 */
export function createEvaluator(f: ScalarFunction, transform: Transform = identity): Evaluator {
  return (z) => {
    const x = transform(z);
    if (Number.isNaN(x)) {
      throw new SignEvaluationError(`transform(${z}) is NaN`, z, x);
    }

    return { x, s: signOf(f(x)) };
  };
}
