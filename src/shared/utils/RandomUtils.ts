import seedrandom from "seedrandom";

/**
 * Seedable random number source.
 *
 * One instance drives a whole simulation (weather transitions, catch and
 * hunt rolls, migration batch sizes), so the same seed replays the same run.
 * Every helper derives from `float()`; overriding it is enough to script the
 * sequence in tests.
 */
export class RandomSource {
  public readonly seed: string;
  private readonly prng: seedrandom.PRNG;

  constructor(seed?: string) {
    this.seed = seed ?? `village-${Date.now()}`;
    this.prng = seedrandom(this.seed);
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public float(): number {
    return this.prng();
  }

  /**
   * Returns a random floating-point number between min (inclusive) and max (exclusive).
   */
  public floatRange(min: number, max: number): number {
    return min + this.float() * (max - min);
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public intRange(min: number, max: number): number {
    return Math.floor(this.float() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public chance(probability: number): boolean {
    return this.float() < probability;
  }

  public element<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[Math.floor(this.float() * array.length)];
  }

  public elementOrThrow<T>(array: readonly T[]): T {
    const picked = this.element(array);
    if (picked === undefined) throw new Error("Cannot pick from an empty array");
    return picked;
  }

  /**
   * Shuffles an array in place (Fisher-Yates).
   */
  public shuffle<T>(array: T[]): T[] {
    for (let i = array.length - 1; i > 0; i--) {
      const j = Math.floor(this.float() * (i + 1));
      [array[i], array[j]] = [array[j], array[i]];
    }
    return array;
  }
}
