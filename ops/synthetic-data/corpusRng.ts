import crypto from "crypto";
import { AppError } from "../../shared/utils/errors";

export type Rng = {
  next: () => number;
  uniform: (min: number, max: number) => number;
  pick: <T>(values: readonly T[]) => T;
};

export type RngSeed = string | number;

const hashSeed = (input: string): number => {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
};

const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

const entropySeed = () => crypto.randomBytes(4).readUInt32BE(0);

/** Builds an Rng on top of any source of floats in [0, 1). */
export const rngFromSource = (next: () => number): Rng => ({
  next,
  uniform: (min: number, max: number) => min + next() * (max - min),
  pick: <T>(values: readonly T[]) => {
    if (!values.length) {
      throw new AppError("pick() called with empty list", { code: "RNG_EMPTY" });
    }
    return values[Math.floor(next() * values.length)];
  }
});

/**
 * Seeded mulberry32 generator. String seeds are hashed, numbers are used as-is;
 * without a seed the generator starts from fresh entropy and runs are not reproducible.
 */
export const createRng = (seed?: RngSeed): Rng => {
  const base =
    seed === undefined ? entropySeed() : typeof seed === "number" ? seed : hashSeed(seed);
  return rngFromSource(mulberry32(base));
};
