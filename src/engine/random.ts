/**
 * Seeded random number generation.
 *
 * Searches draw every random choice (rollout moves, random tie-breaks) from a
 * `RandomSource`, so two searches with the same seed make the same decisions.
 */

/**
 * Minimal random source: uniform numbers in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

const MASK_64 = (BigInt(1) << BigInt(64)) - BigInt(1);
const SEED_MIX = BigInt('0x9e3779b97f4a7c15');
const MULTIPLIER = BigInt('0x2545f4914f6cdd1d');

/**
 * Xorshift64* PRNG for deterministic randomization.
 * Uses bitwise operations on a 64-bit BigInt state.
 */
export class SeededRandom implements RandomSource {
  private state: bigint;

  constructor(seed: number = Date.now()) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    // Mix seed to avoid short period with small seeds
    const mixed = (BigInt(seed) ^ SEED_MIX) & MASK_64;
    this.state = mixed === BigInt(0) ? SEED_MIX : mixed;
  }

  /**
   * Generate next random number in [0, 1).
   */
  next(): number {
    let x = this.state;
    x ^= x >> BigInt(12);
    x ^= (x << BigInt(25)) & MASK_64;
    x ^= x >> BigInt(27);
    this.state = x;
    const scrambled = (x * MULTIPLIER) & MASK_64;
    // Top 53 bits give a uniformly distributed double
    return Number(scrambled >> BigInt(11)) / 2 ** 53;
  }
}

/**
 * Uniformly pick one element. The array must be non-empty.
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError('pickRandom called with an empty array');
  }
  return items[Math.floor(random.next() * items.length)];
}
