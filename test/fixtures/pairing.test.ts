import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { maxAttemptsFor, pairKey, pairUnique } from "../../src/fixtures/pairing.js";
import type { PairingPolicy } from "../../src/fixtures/config.js";
import { ShortfallError } from "../../src/fixtures/errors.js";

const ACCEPT: PairingPolicy = { onShortfall: "accept" };

/** Deterministic draw that cycles through the given values. */
function cycle<T>(values: readonly T[]): () => T {
  let i = 0;
  return () => values[i++ % values.length];
}

describe("pairUnique", () => {
  it("stops as soon as the target is reached", () => {
    const result = pairUnique({
      entity: "test",
      target: 2,
      attemptFactor: 10,
      policy: ACCEPT,
      draw: cycle<string>(["a", "b", "c"]),
      key: (c) => c,
      build: (c) => c.toUpperCase(),
    });
    assert.deepStrictEqual(result, { rows: ["A", "B"], requested: 2, attempts: 2, maxAttempts: 20 });
  });

  it("skips collisions and under-delivers when the budget runs out", () => {
    const result = pairUnique({
      entity: "test",
      target: 5,
      attemptFactor: 10,
      policy: ACCEPT,
      draw: cycle<string>(["a", "b", "c"]),
      key: (c) => c,
      build: (c) => c,
    });
    assert.deepStrictEqual(result.rows, ["a", "b", "c"]);
    assert.equal(result.attempts, 50);
    assert.equal(result.requested, 5);
  });

  it("raises ShortfallError under the fail policy", () => {
    assert.throws(
      () =>
        pairUnique({
          entity: "test",
          target: 5,
          attemptFactor: 10,
          policy: { onShortfall: "fail" },
          draw: cycle<string>(["a", "b", "c"]),
          key: (c) => c,
          build: (c) => c,
        }),
      (err: unknown) => {
        assert.ok(err instanceof ShortfallError);
        assert.equal(err.message, "Only 3 of 5 test rows could be generated within the attempt budget");
        assert.equal(err.requested, 5);
        assert.equal(err.produced, 3);
        return true;
      }
    );
  });

  it("does not record keys of candidates the builder rejects", () => {
    const result = pairUnique({
      entity: "test",
      target: 2,
      attemptFactor: 10,
      policy: ACCEPT,
      draw: cycle<string>(["x", "y", "x", "z"]),
      key: (c) => c,
      build: (c) => (c === "x" ? undefined : c),
    });
    assert.deepStrictEqual(result.rows, ["y", "z"]);
    assert.equal(result.attempts, 4);
  });

  it("allows repeated keys when duplicates are allowed", () => {
    const result = pairUnique({
      entity: "test",
      target: 3,
      attemptFactor: 1,
      policy: ACCEPT,
      allowDuplicates: true,
      draw: () => "same",
      key: (c) => c,
      build: (c) => c,
    });
    assert.deepStrictEqual(result.rows, ["same", "same", "same"]);
  });

  it("honors keys taken before the run", () => {
    const used = new Set(["a"]);
    const result = pairUnique({
      entity: "test",
      target: 1,
      attemptFactor: 10,
      policy: ACCEPT,
      used,
      draw: cycle<string>(["a", "b"]),
      key: (c) => c,
      build: (c) => c,
    });
    assert.deepStrictEqual(result.rows, ["b"]);
    assert.equal(result.attempts, 2);
    assert.ok(used.has("b"));
  });

  it("lets the policy override the generator's attempt factor", () => {
    const result = pairUnique({
      entity: "test",
      target: 4,
      attemptFactor: 10,
      policy: { attemptFactor: 2, onShortfall: "accept" },
      draw: () => "same",
      key: (c) => c,
      build: (c) => c,
    });
    assert.equal(result.rows.length, 1);
    assert.equal(result.attempts, 8);
    assert.equal(result.maxAttempts, 8);
  });
});

describe("helpers", () => {
  it("maxAttemptsFor never goes negative", () => {
    assert.equal(maxAttemptsFor(-3, 10, ACCEPT), 0);
    assert.equal(maxAttemptsFor(3, 10, ACCEPT), 30);
  });

  it("pairKey joins with a pipe", () => {
    assert.equal(pairKey("p1", "s1"), "p1|s1");
  });
});
