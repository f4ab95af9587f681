import type { ScalarFunction } from "@qmc-roots/shared";

/** c0 + c1*x + c2*x^2 + ..., coefficients in ascending powers (Horner). */
export function evalPoly(coeffs: readonly number[], x: number): number {
  return coeffs.reduceRight((acc, c) => acc * x + c, 0);
}

export function polynomial(coeffs: readonly number[]): ScalarFunction {
  return (x) => evalPoly(coeffs, x);
}
