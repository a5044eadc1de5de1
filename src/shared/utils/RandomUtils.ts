import seedrandom from "seedrandom";

/**
 * Shared utility for random number generation.
 * Centralizes RNG so rolls can be seeded and replayed in tests.
 */
export class RandomUtils {
  private static rng: seedrandom.PRNG = seedrandom();

  /**
   * Reseeds the shared generator. Without a seed it falls back to an
   * auto-seeded generator.
   */
  public static seed(seed?: string): void {
    RandomUtils.rng = seed === undefined ? seedrandom() : seedrandom(seed);
  }

  /**
   * Returns a random floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public static float(): number {
    return RandomUtils.rng();
  }

  /**
   * Returns a random integer between min (inclusive) and max (inclusive).
   */
  public static intRange(min: number, max: number): number {
    return Math.floor(RandomUtils.rng() * (max - min + 1)) + min;
  }

  /**
   * Returns true with the specified probability (0-1).
   */
  public static chance(probability: number): boolean {
    return RandomUtils.rng() < probability;
  }
}
