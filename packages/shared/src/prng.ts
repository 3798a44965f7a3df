/**
 * A simple and fast 32-bit pseudo-random number generator (PRNG)
 * using the Mulberry32 algorithm.
 */
export class PRNG {
  private seed: number;
  private spareGaussian: number | null = null;

  constructor(seed: number) {
    this.seed = seed;
  }

  /**
   * Returns a random float between 0 (inclusive) and 1 (exclusive).
   * This implementation uses the Mulberry32 algorithm, which has better
   * statistical properties than simple linear congruential generators.
   */
  public nextFloat(): number {
    let t = (this.seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Returns a standard normal deviate (Box-Muller, polar form).
   * Deviates are produced in pairs; the second one is kept for the next call.
   */
  public nextGaussian(): number {
    if (this.spareGaussian !== null) {
      const spare = this.spareGaussian;
      this.spareGaussian = null;
      return spare;
    }
    let u = 0;
    let v = 0;
    let s = 0;
    do {
      u = this.nextFloat() * 2 - 1;
      v = this.nextFloat() * 2 - 1;
      s = u * u + v * v;
    } while (s >= 1 || s === 0);
    const factor = Math.sqrt((-2 * Math.log(s)) / s);
    this.spareGaussian = v * factor;
    return u * factor;
  }
}
