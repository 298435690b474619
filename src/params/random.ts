import { createHash, randomInt } from "crypto";

export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number;
}

function seedFrom(parts: string[]): Buffer {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return h.digest();
}

/**
 * Reproducible draws: the n-th call hashes (seed, n) and maps the first
 * 48 bits onto the requested interval.
 */
export function seededRandom(seed: string): RandomSource {
  let counter = 0;
  return {
    nextInt(min: number, max: number): number {
      const digest = seedFrom([seed, String(counter++)]);
      const unit = digest.readUIntBE(0, 6) / 2 ** 48;
      return Math.floor(min + unit * (max - min + 1));
    }
  };
}

export const systemRandom: RandomSource = {
  nextInt(min: number, max: number): number {
    return randomInt(min, max + 1);
  }
};
