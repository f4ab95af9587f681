export interface SequenceSource {
  /** Next value in [0, 1). */
  next(): number;
}

export type SequenceFactory = () => SequenceSource;

const TWO_POW_32 = 0x100000000;
const TWO_POW_64 = TWO_POW_32 * TWO_POW_32;
const MAX_BITS = 64;

/**
 * One-dimensional Sobol sequence (direction numbers v_k = 2^-k) in Gray-code
 * order. The leading 0 is skipped, so the first values are
 * 0.5, 0.75, 0.25, 0.375, 0.875, ...
 *
 * The 64-bit state is kept in two unsigned 32-bit words.
 */
export class SobolSequence implements SequenceSource {
  private hi = 0;
  private lo = 0;
  private index = 0;

  next(): number {
    const bit = rightmostZeroBit(this.index);
    if (bit > MAX_BITS) {
      throw new RangeError(`Sobol sequence exhausted after 2^${MAX_BITS} - 1 points`);
    }

    if (bit <= 32) {
      this.hi = (this.hi ^ (1 << (32 - bit))) >>> 0;
    } else {
      this.lo = (this.lo ^ (1 << (64 - bit))) >>> 0;
    }
    this.index++;

    return this.hi / TWO_POW_32 + this.lo / TWO_POW_64;
  }
}

// 1-based position of the lowest unset bit of a non-negative integer.
function rightmostZeroBit(n: number): number {
  let bit = 1;
  let rest = n;
  while (rest % 2 === 1) {
    rest = (rest - 1) / 2;
    bit++;
  }
  return bit;
}

export const defaultSequence: SequenceFactory = () => new SobolSequence();
