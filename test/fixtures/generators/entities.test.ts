import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createContext } from "../../../src/fixtures/config.js";
import { InvalidOptionsError } from "../../../src/fixtures/errors.js";
import { Random, stableUuid } from "../../../src/fixtures/random.js";
import { DAY, SECOND, formatTimestamp, parseTimestamp } from "../../../src/fixtures/time.js";
import type { ConsentVersionRow } from "../../../src/fixtures/types.js";
import { VOCABULARY } from "../../../src/fixtures/vocabulary.js";
import {
  PARTICIPANT_LAYOUT,
  ageOn,
  generateParticipants,
} from "../../../src/fixtures/generators/participants.js";
import { STUDY_LAYOUT, generateStudies } from "../../../src/fixtures/generators/studies.js";
import {
  ROOM_LAYOUT,
  generateRooms,
  roomIdFor,
  roomRefFromRecord,
  roomRefFromRow,
} from "../../../src/fixtures/generators/rooms.js";
import { RESEARCHER_LAYOUT, generateResearchers } from "../../../src/fixtures/generators/researchers.js";
import { generateConsentVersions } from "../../../src/fixtures/generators/consent-versions.js";

const REFERENCE_END = "2025-09-21T23:59:59";

describe("generateParticipants", () => {
  const ctx = createContext(1337);
  const rows = generateParticipants(ctx, { count: 200 });

  it("produces the requested rows in layout order", () => {
    assert.equal(rows.length, 200);
    assert.deepStrictEqual(Object.keys(rows[0]), [...PARTICIPANT_LAYOUT.columns]);
  });

  it("gives every participant a distinct id", () => {
    assert.equal(new Set(rows.map((r) => r.participant_id)).size, 200);
  });

  it("keeps age between 18 and 65 and consistent with the birth date", () => {
    for (const row of rows) {
      assert.ok(row.age >= 18 && row.age <= 65, `age ${row.age}`);
      const dob = parseTimestamp(row.date_of_birth);
      assert.equal(typeof dob, "number");
      assert.equal(ageOn(dob ?? 0, ctx.clock.start), row.age);
    }
  });

  it("formats contact details", () => {
    for (const row of rows) {
      assert.match(row.phone, /^[2-9]\d{2}-[2-9]\d{2}-\d{4}$/);
      assert.match(row.email, /^[a-z0-9-]+@(example|university|mail|campus)\.edu$/);
    }
  });

  it("keeps GPA in [2.0, 4.0] with two decimals", () => {
    for (const row of rows) {
      assert.ok(row.gpa >= 2 && row.gpa <= 4);
      assert.equal(Number(row.gpa.toFixed(2)), row.gpa);
    }
  });

  it("draws statuses and class years from their domains", () => {
    const statuses = new Set(["active", "paused", "ineligible", "banned"]);
    for (const row of rows) {
      assert.ok(statuses.has(row.status));
      assert.ok(row.class_year >= 2025 && row.class_year <= 2030);
      assert.ok(VOCABULARY.participants.majors.includes(row.major));
      assert.ok(row.bio.length > 0 && !row.bio.includes("{major}"));
    }
  });

  it("orders created_at before updated_at, within the year before the reference date", () => {
    const earliest = formatTimestamp(ctx.clock.start - 365 * DAY);
    for (const row of rows) {
      assert.ok(row.created_at >= earliest);
      assert.ok(row.created_at <= row.updated_at);
      assert.ok(row.updated_at <= REFERENCE_END);
    }
  });

  it("is reproducible from the seed", () => {
    assert.deepStrictEqual(generateParticipants(createContext(1337), { count: 200 }), rows);
  });

  it("rejects a negative count", () => {
    assert.throws(() => generateParticipants(createContext(1), { count: -1 }), InvalidOptionsError);
  });
});

describe("ageOn", () => {
  it("counts whole years and respects the birthday", () => {
    const on = Date.UTC(2025, 8, 21);
    assert.equal(ageOn(Date.UTC(2000, 8, 21), on), 25);
    assert.equal(ageOn(Date.UTC(2000, 8, 22), on), 24);
    assert.equal(ageOn(Date.UTC(2000, 9, 1), on), 24);
  });
});

describe("generateStudies", () => {
  const ctx = createContext(7);
  const rows = generateStudies(ctx, { count: 100 });

  it("produces the requested rows in layout order", () => {
    assert.equal(rows.length, 100);
    assert.deepStrictEqual(Object.keys(rows[0]), [...STUDY_LAYOUT.columns]);
  });

  it("keeps eligibility bounds coherent", () => {
    for (const row of rows) {
      assert.ok([18, 21].includes(row.minAge));
      assert.ok(row.minAge <= row.maxAge);
      assert.ok([2.0, 2.3, 2.5, 2.7, 3.0, 3.2, 3.5].includes(row.minGPA));
      assert.ok([0, 7, 14, 21, 30].includes(row.cooldownDays));
      assert.equal(typeof row.active, "boolean");
    }
  });

  it("orders timestamps and caps them at the reference instant", () => {
    for (const row of rows) {
      assert.ok(row.created_at <= row.updated_at);
      assert.ok(row.updated_at <= REFERENCE_END);
    }
  });

  it("mentions compensation in every description", () => {
    for (const row of rows) {
      assert.match(row.description, /Compensation: /);
    }
  });
});

describe("generateRooms", () => {
  const ctx = createContext(3);
  const rows = generateRooms(ctx, { count: 300 });

  it("never repeats a (building, name) pair", () => {
    assert.equal(rows.length, 300);
    assert.equal(new Set(rows.map((r) => `${r.building}::${r.name}`)).size, 300);
    assert.deepStrictEqual(Object.keys(rows[0]), [...ROOM_LAYOUT.columns]);
  });

  it("keeps capacity inside the widest room-type range", () => {
    for (const row of rows) {
      assert.ok(row.capacity >= 10 && row.capacity <= 300, `capacity ${row.capacity}`);
      assert.ok(VOCABULARY.rooms.buildings.includes(row.building));
    }
  });

  it("derives a stable id from building and name", () => {
    const ref = roomRefFromRow(rows[0]);
    assert.equal(ref.roomId, stableUuid(rows[0].building, rows[0].name));
    assert.equal(ref.capacity, rows[0].capacity);
  });
});

describe("roomRefFromRecord", () => {
  it("prefers an explicit room_id", () => {
    const ref = roomRefFromRecord(new Random(1), { room_id: "r-1", name: "Lab 2", building: "X", capacity: "24" });
    assert.deepStrictEqual(ref, { roomId: "r-1", capacity: 24 });
  });

  it("derives the id from building and name", () => {
    const ref = roomRefFromRecord(new Random(1), { name: "Lab 2", building: "Science Hall", capacity: "12" });
    assert.deepStrictEqual(ref, { roomId: roomIdFor("Science Hall", "Lab 2"), capacity: 12 });
  });

  it("falls back to a random id and treats a bad capacity as unknown", () => {
    const ref = roomRefFromRecord(new Random(1), { capacity: "lots" });
    assert.match(ref.roomId, /^[0-9a-f-]{36}$/);
    assert.equal(ref.capacity, undefined);
  });
});

describe("generateResearchers", () => {
  const rows = generateResearchers(createContext(11), { count: 150 });

  it("produces unique institutional emails", () => {
    assert.equal(rows.length, 150);
    assert.deepStrictEqual(Object.keys(rows[0]), [...RESEARCHER_LAYOUT.columns]);
    assert.equal(new Set(rows.map((r) => r.email)).size, 150);
    for (const row of rows) {
      assert.match(row.email, /^[a-z0-9]+@research\.university\.edu$/);
    }
  });

  it("draws departments and titles from the vocabulary", () => {
    for (const row of rows) {
      assert.ok(VOCABULARY.researchers.departments.includes(row.department));
      assert.ok(VOCABULARY.researchers.titles.includes(row.title));
      assert.ok(row.created_at <= REFERENCE_END);
    }
  });
});

describe("generateConsentVersions", () => {
  const ctx = createContext(5);
  const studyIds = Array.from({ length: 40 }, (_, i) => `study-${i}`);
  const rows = generateConsentVersions(ctx, { count: 1000, studyIds });

  function byStudy(list: ConsentVersionRow[]): Map<string, ConsentVersionRow[]> {
    const out = new Map<string, ConsentVersionRow[]>();
    for (const row of list) {
      const chain = out.get(row.study_id) ?? [];
      chain.push(row);
      out.set(row.study_id, chain);
    }
    return out;
  }

  it("gives every study a chain of versions", () => {
    const chains = byStudy(rows);
    assert.equal(chains.size, 40);
    for (const chain of chains.values()) {
      assert.ok(chain.length >= 1 && chain.length <= 5);
      chain.forEach((row, i) => assert.equal(row.version, `v${i + 1}.0`));
    }
  });

  it("chains versions without gaps and leaves the newest open", () => {
    for (const chain of byStudy(rows).values()) {
      for (let i = 0; i + 1 < chain.length; i++) {
        const to = parseTimestamp(chain[i].effectiveTo);
        const nextFrom = parseTimestamp(chain[i + 1].effectiveFrom);
        assert.equal(typeof to, "number");
        assert.equal((to ?? 0) + SECOND, nextFrom);
      }
      assert.equal(chain[chain.length - 1].effectiveTo, null);
    }
  });

  it("starts the first version at least 30 days before the reference date", () => {
    const latest = formatTimestamp(ctx.clock.start - 30 * DAY);
    for (const chain of byStudy(rows).values()) {
      assert.ok(chain[0].effectiveFrom <= latest);
    }
  });

  it("only future-dates drafts", () => {
    for (const chain of byStudy(rows).values()) {
      chain.slice(0, -1).forEach((row) => assert.ok(row.effectiveFrom <= REFERENCE_END));
    }
  });

  it("stops at the requested count", () => {
    const few = generateConsentVersions(createContext(5), { count: 3, studyIds });
    assert.equal(few.length, 3);
  });

  it("leaves the newest version open when the count cuts a chain short", () => {
    const many = Array.from({ length: 50 }, (_, i) => `study-${i}`);
    for (let seed = 0; seed < 50; seed++) {
      const cut = generateConsentVersions(createContext(seed), { count: 7, studyIds: many });
      assert.equal(cut.length, 7);
      for (const chain of byStudy(cut).values()) {
        assert.equal(chain[chain.length - 1].effectiveTo, null, `seed ${seed}, ${chain[0].study_id}`);
        chain.slice(0, -1).forEach((row) => assert.notEqual(row.effectiveTo, null));
      }
    }
  });

  it("yields nothing without studies", () => {
    assert.deepStrictEqual(generateConsentVersions(createContext(5), { count: 10, studyIds: [] }), []);
  });
});
