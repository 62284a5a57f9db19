import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createContext } from "../../../src/fixtures/config.js";
import { InvalidOptionsError } from "../../../src/fixtures/errors.js";
import type { StudyResearcherRow } from "../../../src/fixtures/types.js";
import {
  STUDY_RESEARCHER_LAYOUT,
  generateStudyResearchers,
  normalizeRoleBounds,
} from "../../../src/fixtures/generators/study-researchers.js";

const studyIds = Array.from({ length: 30 }, (_, i) => `study-${i}`);
const researcherIds = Array.from({ length: 80 }, (_, i) => `researcher-${i}`);

function groupByStudy(rows: StudyResearcherRow[]): Map<string, StudyResearcherRow[]> {
  const out = new Map<string, StudyResearcherRow[]>();
  for (const row of rows) {
    out.set(row.study_id, [...(out.get(row.study_id) ?? []), row]);
  }
  return out;
}

describe("generateStudyResearchers", () => {
  describe("baseline only", () => {
    const result = generateStudyResearchers(createContext(1337), { count: 0, studyIds, researcherIds });

    it("gives every study at least one PI", () => {
      const byStudy = groupByStudy(result.rows);
      assert.equal(byStudy.size, 30);
      for (const rows of byStudy.values()) {
        assert.equal(rows.filter((r) => r.role === "PI").length, 1);
      }
      assert.deepStrictEqual(Object.keys(result.rows[0]), [...STUDY_RESEARCHER_LAYOUT.columns]);
    });

    it("keeps one role per researcher within a study", () => {
      for (const rows of groupByStudy(result.rows).values()) {
        assert.equal(new Set(rows.map((r) => r.researcher_id)).size, rows.length);
      }
    });

    it("assigns 0-2 coordinators and 1-3 RAs", () => {
      for (const rows of groupByStudy(result.rows).values()) {
        const coordinators = rows.filter((r) => r.role === "coordinator").length;
        const ras = rows.filter((r) => r.role === "RA").length;
        assert.ok(coordinators >= 0 && coordinators <= 2);
        assert.ok(ras >= 1 && ras <= 3);
      }
    });

    it("reports the baseline as requested", () => {
      assert.equal(result.baseline, result.rows.length);
      assert.equal(result.requested, result.rows.length);
    });
  });

  it("honors the PI and RA bounds", () => {
    const result = generateStudyResearchers(createContext(2), {
      count: 0,
      studyIds,
      researcherIds,
      piPerStudy: 2,
      raMin: 4,
      raMax: 4,
    });
    for (const rows of groupByStudy(result.rows).values()) {
      assert.equal(rows.filter((r) => r.role === "PI").length, 2);
      assert.equal(rows.filter((r) => r.role === "RA").length, 4);
    }
  });

  it("tops up to the requested count with distinct pairs", () => {
    const result = generateStudyResearchers(createContext(3), { count: 400, studyIds, researcherIds });
    assert.equal(result.rows.length, 400);
    assert.equal(result.requested, 400);
    assert.ok(result.baseline < 400);
    const keys = result.rows.map((r) => `${r.study_id}|${r.researcher_id}`);
    assert.equal(new Set(keys).size, 400);
  });

  it("still names a PI when the researcher pool is tiny", () => {
    const result = generateStudyResearchers(createContext(4), {
      count: 0,
      studyIds: ["only-study"],
      researcherIds: ["solo"],
    });
    assert.deepStrictEqual(result.rows, [{ study_id: "only-study", researcher_id: "solo", role: "PI" }]);
  });

  it("needs researchers for any study", () => {
    assert.throws(
      () => generateStudyResearchers(createContext(1), { count: 0, studyIds, researcherIds: [] }),
      InvalidOptionsError
    );
  });

  it("is reproducible from the seed", () => {
    const a = generateStudyResearchers(createContext(9), { count: 100, studyIds, researcherIds });
    const b = generateStudyResearchers(createContext(9), { count: 100, studyIds, researcherIds });
    assert.deepStrictEqual(a, b);
  });
});

describe("normalizeRoleBounds", () => {
  it("defaults to one PI and one to three RAs", () => {
    assert.deepStrictEqual(normalizeRoleBounds({}), { piPerStudy: 1, raMin: 1, raMax: 3 });
  });

  it("clamps unsatisfiable bounds", () => {
    assert.deepStrictEqual(normalizeRoleBounds({ piPerStudy: 0, raMin: -2, raMax: -5 }), {
      piPerStudy: 1,
      raMin: 0,
      raMax: 1,
    });
    assert.deepStrictEqual(normalizeRoleBounds({ raMin: 4, raMax: 2 }), { piPerStudy: 1, raMin: 4, raMax: 4 });
  });
});
