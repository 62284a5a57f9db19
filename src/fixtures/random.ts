import type { Randomizer } from "@faker-js/faker";
import { v4 as uuidv4, v5 as uuidv5 } from "uuid";

/** RFC 4122 URL namespace, so derived ids match other UUIDv5 tooling. */
const URL_NAMESPACE = "6ba7b811-9dad-11d1-80b4-00c04fd430c8";

export interface WeightedOutcome<T> {
  value: T;
  weight: number;
}

/**
 * Seeded pseudo-random source (mulberry32). Implements faker's Randomizer so a
 * Faker instance and the generators draw from one reproducible stream.
 */
export class Random implements Randomizer {
  private state = 0;

  constructor(seed: number = 1337) {
    this.seed(seed);
  }

  seed(seed: number | number[]): void {
    const parts = Array.isArray(seed) ? seed : [seed];
    let state = 0;
    for (const part of parts) {
      const whole = Math.trunc(part);
      state = (Math.imul(state, 31) + (whole | 0)) | 0;
      // Seeds past 32 bits fold their high word in too.
      const high = Math.floor(whole / 0x100000000);
      if (high !== 0) state = (Math.imul(state, 31) + (high | 0)) | 0;
    }
    this.state = state;
  }

  /** Uniform in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    if (max < min) [min, max] = [max, min];
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[Math.floor(this.next() * items.length)];
  }

  /** True with probability p. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Fisher-Yates shuffle into a new array. */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }

  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) {
      out[i] = Math.floor(this.next() * 256);
    }
    return out;
  }
}

/**
 * Draw one value with probability proportional to its weight. Zero-weight
 * outcomes are never chosen; when every weight is zero the draw is uniform.
 */
export function weightedChoice<T>(
  random: Random,
  outcomes: readonly WeightedOutcome<T>[]
): T {
  if (outcomes.length === 0) {
    throw new RangeError("weightedChoice needs at least one outcome");
  }
  const total = outcomes.reduce((sum, o) => sum + Math.max(0, o.weight), 0);
  if (total <= 0) {
    return random.pick(outcomes).value;
  }
  let roll = random.next() * total;
  for (const outcome of outcomes) {
    const weight = Math.max(0, outcome.weight);
    if (weight === 0) continue;
    if (roll < weight) return outcome.value;
    roll -= weight;
  }
  // Floating point remainder: fall back to the last positive outcome.
  for (let i = outcomes.length - 1; i >= 0; i--) {
    if (outcomes[i].weight > 0) return outcomes[i].value;
  }
  return outcomes[outcomes.length - 1].value;
}

/** Shorthand for building outcome lists from parallel value/weight arrays. */
export function weighted<T>(
  values: readonly T[],
  weights: readonly number[]
): WeightedOutcome<T>[] {
  if (values.length !== weights.length) {
    throw new RangeError(
      `weighted(): ${values.length} values but ${weights.length} weights`
    );
  }
  return values.map((value, i) => ({ value, weight: weights[i] }));
}

/** Random v4 UUID drawn from the seeded stream. */
export function randomUuid(random: Random): string {
  return uuidv4({ random: random.bytes(16) });
}

/** Deterministic UUIDv5 of the trimmed parts joined with "::". */
export function stableUuid(...parts: string[]): string {
  return uuidv5(parts.map((p) => p.trim()).join("::"), URL_NAMESPACE);
}

/**
 * Beta(a, b) for positive integers via order statistics: the a-th smallest of
 * a + b - 1 uniforms.
 */
export function betaInteger(random: Random, a: number, b: number): number {
  const draws = Array.from({ length: a + b - 1 }, () => random.next());
  draws.sort((x, y) => x - y);
  return draws[a - 1];
}
