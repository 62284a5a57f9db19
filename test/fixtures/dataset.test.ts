import { describe, it, after } from "node:test";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as assert from "node:assert/strict";
import { createContext } from "../../src/fixtures/config.js";
import { generateDataset, writeDataset, type DatasetSizes } from "../../src/fixtures/dataset.js";
import { InvalidOptionsError } from "../../src/fixtures/errors.js";
import { readRecords } from "../../src/fixtures/io.js";
import { roomIdFor } from "../../src/fixtures/generators/rooms.js";

const SIZES: DatasetSizes = {
  participants: 30,
  studies: 20,
  rooms: 8,
  researchers: 10,
  consentVersions: 15,
  studyResearchers: 0,
  sessions: 20,
  enrollments: 80,
  payments: 60,
  consents: 40,
};

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "fixtures-dataset-"));

after(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("generateDataset", () => {
  const data = generateDataset(createContext(1337), SIZES);

  it("fills every table to its requested size", () => {
    assert.equal(data.participants.length, 30);
    assert.equal(data.studies.length, 20);
    assert.equal(data.rooms.length, 8);
    assert.equal(data.researchers.length, 10);
    assert.equal(data.consentVersions.length, 15);
    assert.equal(data.sessions.length, 20);
    assert.equal(data.enrollments.length, 80);
    assert.equal(data.payments.length, 60);
    assert.equal(data.consents.length, 40);
  });

  it("resolves every foreign key inside the dataset", () => {
    const studyIds = new Set(data.studies.map((s) => s.study_id));
    const roomIds = new Set(data.rooms.map((r) => roomIdFor(r.building, r.name)));
    const sessionIds = new Set(data.sessions.map((s) => s.session_id));
    const participantIds = new Set(data.participants.map((p) => p.participant_id));
    const researcherIds = new Set(data.researchers.map((r) => r.researcher_id));
    const versionIds = new Set(data.consentVersions.map((v) => v.consent_version_id));
    const enrollmentKeys = new Set(data.enrollments.map((e) => `${e.participant_id}|${e.session_id}`));

    for (const v of data.consentVersions) assert.ok(studyIds.has(v.study_id));
    for (const sr of data.studyResearchers) {
      assert.ok(studyIds.has(sr.study_id));
      assert.ok(researcherIds.has(sr.researcher_id));
    }
    for (const s of data.sessions) {
      assert.ok(studyIds.has(s.study_id));
      assert.ok(roomIds.has(s.room_id));
    }
    for (const e of data.enrollments) {
      assert.ok(participantIds.has(e.participant_id));
      assert.ok(sessionIds.has(e.session_id));
    }
    for (const p of data.payments) assert.ok(enrollmentKeys.has(`${p.participant_id}|${p.session_id}`));
    for (const c of data.consents) {
      assert.ok(participantIds.has(c.participant_id));
      assert.ok(versionIds.has(c.consent_version_id));
    }
  });

  it("gives every study a PI", () => {
    const withPi = new Set(data.studyResearchers.filter((r) => r.role === "PI").map((r) => r.study_id));
    assert.equal(withPi.size, 20);
  });

  it("is reproducible from the seed", () => {
    assert.deepStrictEqual(generateDataset(createContext(1337), SIZES), data);
  });

  it("skips dependent tables when an upstream table is empty", () => {
    const empty = generateDataset(createContext(1), { ...SIZES, studies: 0 });
    assert.equal(empty.sessions.length, 0);
    assert.equal(empty.enrollments.length, 0);
    assert.equal(empty.payments.length, 0);
    assert.equal(empty.consentVersions.length, 0);
    assert.equal(empty.consents.length, 0);
    assert.equal(empty.participants.length, 30);
  });

  it("rejects negative sizes", () => {
    assert.throws(() => generateDataset(createContext(1), { payments: -1 }), InvalidOptionsError);
  });
});

describe("writeDataset", () => {
  const data = generateDataset(createContext(7), SIZES);

  it("writes one CSV per table under its default name", async () => {
    const written = writeDataset(data, path.join(dir, "csv"));
    assert.deepStrictEqual(
      written.map((t) => path.basename(t.target.path)),
      [
        "rooms.csv",
        "studies.csv",
        "participants.csv",
        "researchers.csv",
        "consent_versions.csv",
        "study_researchers.csv",
        "sessions.csv",
        "enrollments.csv",
        "payments.csv",
        "ParticipantConsents.csv",
      ]
    );
    const enrollments = (await readRecords(path.join(dir, "csv", "enrollments.csv"))) ?? [];
    assert.equal(enrollments.length, 80);
    assert.equal(enrollments[0]["participant_id"], data.enrollments[0].participant_id);
  });

  it("writes JSON when asked", async () => {
    const written = writeDataset(data, path.join(dir, "json"), true);
    assert.ok(written.every((t) => t.target.format === "json" && t.target.path.endsWith(".json")));
    const sessions = await readRecords(path.join(dir, "json", "sessions.json"));
    assert.deepStrictEqual(sessions, data.sessions);
  });
});
