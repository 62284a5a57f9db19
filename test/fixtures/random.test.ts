import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  Random,
  betaInteger,
  randomUuid,
  stableUuid,
  weighted,
  weightedChoice,
} from "../../src/fixtures/random.js";
import { createContext } from "../../src/fixtures/config.js";

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;
const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("Random", () => {
  it("repeats its sequence for the same seed", () => {
    const a = new Random(7);
    const b = new Random(7);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    assert.deepStrictEqual(seqA, seqB);
  });

  it("differs across seeds", () => {
    assert.notEqual(new Random(1).next(), new Random(2).next());
  });

  it("tells apart seeds that share their low 32 bits", () => {
    assert.notEqual(new Random(1).next(), new Random(2 ** 32 + 1).next());
    assert.notEqual(new Random(-1).next(), new Random(2 ** 32 - 1).next());
  });

  it("reseeding restarts the sequence", () => {
    const r = new Random(99);
    const first = r.next();
    r.next();
    r.seed(99);
    assert.equal(r.next(), first);
  });

  it("keeps next() in [0, 1)", () => {
    const r = new Random(3);
    for (let i = 0; i < 1000; i++) {
      const v = r.next();
      assert.ok(v >= 0 && v < 1, `out of range: ${v}`);
    }
  });

  it("int() is inclusive on both ends and swaps inverted bounds", () => {
    const r = new Random(5);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = r.int(4, 1);
      assert.ok(v >= 1 && v <= 4);
      seen.add(v);
    }
    assert.deepStrictEqual([...seen].sort(), [1, 2, 3, 4]);
  });

  it("pick() rejects an empty list", () => {
    assert.throws(() => new Random(1).pick([]), RangeError);
  });

  it("shuffle() returns a permutation and leaves the input alone", () => {
    const input = [1, 2, 3, 4, 5, 6, 7, 8];
    const out = new Random(11).shuffle(input);
    assert.deepStrictEqual(input, [1, 2, 3, 4, 5, 6, 7, 8]);
    assert.deepStrictEqual([...out].sort((x, y) => x - y), input);
  });

  it("bytes() returns the requested length", () => {
    const bytes = new Random(1).bytes(16);
    assert.equal(bytes.length, 16);
    assert.ok(bytes.every((b) => b >= 0 && b <= 255));
  });

  it("drives faker reproducibly", () => {
    const a = createContext(21);
    const b = createContext(21);
    assert.equal(a.faker.person.firstName(), b.faker.person.firstName());
    assert.equal(a.faker.person.lastName(), b.faker.person.lastName());
  });
});

describe("weightedChoice", () => {
  it("never picks a zero-weight outcome", () => {
    const r = new Random(8);
    const outcomes = weighted(["a", "b", "c"], [5, 0, 1]);
    for (let i = 0; i < 2000; i++) {
      assert.notEqual(weightedChoice(r, outcomes), "b");
    }
  });

  it("follows the weights", () => {
    const r = new Random(13);
    const outcomes = weighted(["heavy", "light"], [9, 1]);
    let heavy = 0;
    for (let i = 0; i < 5000; i++) {
      if (weightedChoice(r, outcomes) === "heavy") heavy++;
    }
    assert.ok(heavy > 4200 && heavy < 4800, `heavy drawn ${heavy} times`);
  });

  it("falls back to a uniform draw when every weight is zero", () => {
    const r = new Random(4);
    const outcomes = weighted(["x", "y"], [0, 0]);
    const seen = new Set<string>();
    for (let i = 0; i < 200; i++) seen.add(weightedChoice(r, outcomes));
    assert.deepStrictEqual([...seen].sort(), ["x", "y"]);
  });

  it("rejects an empty outcome list", () => {
    assert.throws(() => weightedChoice(new Random(1), []), RangeError);
  });

  it("weighted() rejects mismatched lengths", () => {
    assert.throws(() => weighted(["a", "b"], [1]), /2 values but 1 weights/);
  });
});

describe("uuids", () => {
  it("randomUuid() is a v4 uuid reproducible from the seed", () => {
    const a = randomUuid(new Random(17));
    const b = randomUuid(new Random(17));
    assert.match(a, UUID_V4);
    assert.equal(a, b);
  });

  it("stableUuid() is a v5 uuid of the trimmed parts", () => {
    const id = stableUuid("Science Hall", "Lab 4");
    assert.match(id, UUID_V5);
    assert.equal(stableUuid("  Science Hall ", "Lab 4  "), id);
    assert.notEqual(stableUuid("Science Hall", "Lab 5"), id);
  });
});

describe("betaInteger", () => {
  it("stays in [0, 1) and leans toward 1 for Beta(6, 3)", () => {
    const r = new Random(2);
    let sum = 0;
    for (let i = 0; i < 2000; i++) {
      const v = betaInteger(r, 6, 3);
      assert.ok(v >= 0 && v < 1);
      sum += v;
    }
    const mean = sum / 2000;
    // Beta(6, 3) has mean 2/3.
    assert.ok(mean > 0.62 && mean < 0.71, `mean ${mean}`);
  });
});
