import type { PairingPolicy } from "./config.js";
import { ShortfallError } from "./errors.js";

export interface PairingOptions<C, R> {
  /** Label used in shortfall errors. */
  entity: string;
  target: number;
  /** Draws allowed per requested row, unless the policy overrides it. */
  attemptFactor: number;
  policy: PairingPolicy;
  /** Draw one candidate uniformly from the pools. */
  draw: () => C;
  /** Uniqueness key of a candidate, e.g. `${participantId}|${sessionId}`. */
  key: (candidate: C) => string;
  /** Materialize a row; undefined rejects the candidate without recording it. */
  build: (candidate: C) => R | undefined;
  allowDuplicates?: boolean;
  /** Keys already taken before this run of pairing. */
  used?: Set<string>;
}

export interface PairingResult<R> {
  rows: R[];
  requested: number;
  attempts: number;
  maxAttempts: number;
}

export function maxAttemptsFor(
  target: number,
  attemptFactor: number,
  policy: PairingPolicy
): number {
  return Math.max(0, target) * (policy.attemptFactor ?? attemptFactor);
}

/**
 * Draw candidates until `target` rows exist or the attempt budget is spent.
 * Collisions on the key are skipped. Running out of budget returns fewer rows,
 * or throws ShortfallError under the "fail" policy.
 */
export function pairUnique<C, R>(options: PairingOptions<C, R>): PairingResult<R> {
  const used = options.used ?? new Set<string>();
  const maxAttempts = maxAttemptsFor(options.target, options.attemptFactor, options.policy);
  const rows: R[] = [];
  let attempts = 0;

  while (rows.length < options.target && attempts < maxAttempts) {
    attempts++;
    const candidate = options.draw();
    const key = options.key(candidate);
    if (!options.allowDuplicates && used.has(key)) continue;
    const row = options.build(candidate);
    if (row === undefined) continue;
    rows.push(row);
    used.add(key);
  }

  if (rows.length < options.target && options.policy.onShortfall === "fail") {
    throw new ShortfallError(options.entity, options.target, rows.length);
  }
  return { rows, requested: options.target, attempts, maxAttempts };
}

export function pairKey(a: string, b: string): string {
  return `${a}|${b}`;
}
