/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - Four 32-bit state words seeded through SplitMix32
 * - Returns a double in [0, 1)
 * - Same seed, same sequence of draws in the same call order
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

/**
 * SplitMix32 for state initialization from a single seed.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
type RngState = [number, number, number, number];

export class SeededRandom {
  private readonly s: RngState;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro requires at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Generate next random number in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  /**
   * Random integer in [0, maxExclusive). Returns 0 when maxExclusive is 0.
   *
   * @throws {RangeError} If maxExclusive is negative
   */
  nextInt(maxExclusive: number): number {
    if (maxExclusive < 0) {
      throw new RangeError(`nextInt: maxExclusive must be >= 0, got ${maxExclusive}`);
    }
    return Math.floor(this.next() * maxExclusive);
  }

  /**
   * Random integer in [min, maxExclusive). The upper bound is exclusive, so
   * `nextIntBetween(2, 2)` yields 2 without widening the range.
   *
   * @throws {RangeError} If min > maxExclusive
   */
  nextIntBetween(min: number, maxExclusive: number): number {
    if (min > maxExclusive) {
      throw new RangeError(
        `nextIntBetween: min (${min}) must not exceed maxExclusive (${maxExclusive})`,
      );
    }
    return min + this.nextInt(maxExclusive - min);
  }
}
