import { nanoid } from "nanoid";

/** Upper bound of render seeds and version nonces */
export const SEED_MAX = 2_000_000_000;

const ID_LENGTH = 20;

/**
 * Produces element and group identifiers, unique within a document.
 */
export interface IdentitySource {
  nextId(): string;
}

/**
 * Produces the integers used for `seed` and `versionNonce`.
 */
export interface JitterSource {
  nextSeed(): number;
}

export function createRandomIdentity(): IdentitySource {
  return { nextId: () => nanoid(ID_LENGTH) };
}

/** Seeds drawn uniformly from [1, SEED_MAX] */
export function createRandomJitter(): JitterSource {
  return { nextSeed: () => Math.floor(Math.random() * SEED_MAX) + 1 };
}

/**
 * Deterministic ids `<prefix>-1`, `<prefix>-2`, … for reproducible output.
 */
export function createCounterIdentity(prefix = "el"): IdentitySource {
  let counter = 0;
  return {
    nextId: () => {
      counter += 1;
      return `${prefix}-${counter}`;
    },
  };
}

/**
 * Deterministic seeds counting up from `start`, wrapping back to 1 past SEED_MAX.
 */
export function createCounterJitter(start = 1): JitterSource {
  let next = start;
  return {
    nextSeed: () => {
      const seed = next;
      next = next >= SEED_MAX ? 1 : next + 1;
      return seed;
    },
  };
}
