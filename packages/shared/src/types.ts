export type Sign = -1 | 0 | 1;

export type ScalarFunction = (x: number) => number;

// Maps the unit interval onto the function's domain.
export type Transform = (z: number) => number;

export type Sample = {
  x: number;         // domain value
  s: Sign | null;    // sign of f(x); null where f(x) is NaN
};

/**
 * lo === hi: a sampled exact zero.
 * lo < hi: adjacent samples with nonzero, opposite signs.
 */
export type Bracket = {
  lo: number;
  hi: number;
};

export type SearchStats = {
  evaluations: number;
  discarded: number; // samples whose domain value was already stored
  samples: number;
  detected: number;  // brackets in the final store, may exceed the request
};

export type PolynomialCase = {
  id: string;
  coefficients: number[]; // c0 + c1*x + c2*x^2 + ...
  domain: [number, number];
  roots: number[];        // ascending
};
