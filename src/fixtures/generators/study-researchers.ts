import type { GeneratorContext } from "../config.js";
import { pairKey, pairUnique } from "../pairing.js";
import { weighted, weightedChoice, type Random } from "../random.js";
import type { ResearcherRole, StudyResearcherRow, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";

export const STUDY_RESEARCHER_LAYOUT: TableLayout<StudyResearcherRow> = {
  entity: "study researchers",
  defaultFile: "study_researchers.csv",
  columns: ["study_id", "researcher_id", "role"],
};

const TOP_UP_ATTEMPT_FACTOR = 20;
export const FALLBACK_STUDIES = 300;
export const FALLBACK_RESEARCHERS = 500;

const COORDINATOR_COUNTS = weighted([0, 1, 2], [60, 30, 10]);
const TOP_UP_ROLES = weighted<ResearcherRole>(["RA", "coordinator", "PI"], [80, 15, 5]);

export interface StudyResearcherOptions {
  /** Grow to at least this many rows; 0 keeps the per-study baseline only. */
  count: number;
  studyIds: readonly string[];
  researcherIds: readonly string[];
  piPerStudy?: number;
  raMin?: number;
  raMax?: number;
}

export interface StudyResearcherResult {
  rows: StudyResearcherRow[];
  baseline: number;
  requested: number;
}

interface RoleBounds {
  piPerStudy: number;
  raMin: number;
  raMax: number;
}

/** Clamp role counts to something satisfiable: at least one PI, raMax ≥ raMin. */
export function normalizeRoleBounds(options: Partial<RoleBounds>): RoleBounds {
  const piPerStudy = Math.max(1, options.piPerStudy ?? 1);
  const raMin = Math.max(0, options.raMin ?? 1);
  let raMax = options.raMax ?? 3;
  if (raMax < raMin) raMax = Math.max(raMin, 1);
  return { piPerStudy, raMin, raMax };
}

function pickDistinct(
  random: Random,
  researchers: readonly string[],
  taken: ReadonlySet<string>,
  k: number
): string[] {
  return random.shuffle(researchers.filter((r) => !taken.has(r))).slice(0, k);
}

/** PIs first, then coordinators, then RAs; nobody holds two roles on one study. */
function baselineFor(
  random: Random,
  studyId: string,
  researchers: readonly string[],
  bounds: RoleBounds
): StudyResearcherRow[] {
  const rows: StudyResearcherRow[] = [];
  const taken = new Set<string>();
  const assign = (role: ResearcherRole, k: number): void => {
    for (const researcherId of pickDistinct(random, researchers, taken, k)) {
      rows.push({ study_id: studyId, researcher_id: researcherId, role });
      taken.add(researcherId);
    }
  };

  assign("PI", bounds.piPerStudy);
  assign("coordinator", weightedChoice(random, COORDINATOR_COUNTS));
  assign("RA", random.int(bounds.raMin, bounds.raMax));
  return rows;
}

export function generateStudyResearchers(
  ctx: GeneratorContext,
  options: StudyResearcherOptions
): StudyResearcherResult {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  if (options.studyIds.length > 0 && options.researcherIds.length === 0) {
    errors.push({
      rule: "non-empty-pool",
      message: "Study researchers need at least one researcher id",
      path: "researcherIds",
    });
  }
  throwIfInvalid(errors);

  const { random } = ctx;
  const bounds = normalizeRoleBounds(options);
  const rows: StudyResearcherRow[] = [];
  for (const studyId of options.studyIds) {
    rows.push(...baselineFor(random, studyId, options.researcherIds, bounds));
  }
  const baseline = rows.length;

  if (options.count > rows.length && options.studyIds.length > 0) {
    const used = new Set(rows.map((r) => pairKey(r.study_id, r.researcher_id)));
    const topUp = pairUnique({
      entity: "study researcher",
      target: options.count - rows.length,
      attemptFactor: TOP_UP_ATTEMPT_FACTOR,
      policy: ctx.config.pairing,
      used,
      draw: () => ({
        studyId: random.pick(options.studyIds),
        researcherId: random.pick(options.researcherIds),
      }),
      key: (c) => pairKey(c.studyId, c.researcherId),
      build: (c): StudyResearcherRow => ({
        study_id: c.studyId,
        researcher_id: c.researcherId,
        role: weightedChoice(random, TOP_UP_ROLES),
      }),
    });
    rows.push(...topUp.rows);
  }

  return { rows, baseline, requested: Math.max(options.count, baseline) };
}
