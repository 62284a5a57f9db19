import type { GeneratorContext } from "../config.js";
import { randomUuid } from "../random.js";
import { DAY, SECOND, formatTimestamp, randomBetween } from "../time.js";
import type { ConsentVersionRow, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import { VOCABULARY } from "../vocabulary.js";

export const CONSENT_VERSION_LAYOUT: TableLayout<ConsentVersionRow> = {
  entity: "consent versions",
  defaultFile: "consent_versions.csv",
  columns: [
    "consent_version_id", "study_id", "version", "title", "effectiveFrom", "effectiveTo",
  ],
};

const FIRST_VERSION_LOOKBACK_DAYS = 720;
const MAX_VERSIONS_PER_STUDY = 4;
const DRAFT_RATE = 0.1;

export interface ConsentVersionOptions {
  count: number;
  studyIds: readonly string[];
}

/**
 * Per study, a gapless chain of versions: each one ends the second before the
 * next begins and the newest is open-ended. Some studies also carry a draft
 * that only becomes effective after the reference date.
 */
function versionsForStudy(ctx: GeneratorContext, studyId: string): ConsentVersionRow[] {
  const { random, clock } = ctx;
  const title = random.pick(VOCABULARY.consents.titles);
  const windows: { from: number; to: number | null }[] = [];

  let from = randomBetween(random, clock.start - FIRST_VERSION_LOOKBACK_DAYS * DAY, clock.start - 30 * DAY);
  const planned = random.int(1, MAX_VERSIONS_PER_STUDY);
  for (let i = 0; i < planned && from <= clock.end; i++) {
    const next = from + random.int(30, 240) * DAY;
    windows.push({ from, to: next - SECOND });
    from = next;
  }
  windows[windows.length - 1].to = null;

  if (random.chance(DRAFT_RATE)) {
    const draftFrom = clock.start + random.int(7, 60) * DAY;
    const current = windows[windows.length - 1];
    current.to = draftFrom - SECOND;
    windows.push({ from: draftFrom, to: null });
  }

  return windows.map((w, i) => ({
    consent_version_id: randomUuid(random),
    study_id: studyId,
    version: `v${i + 1}.0`,
    title,
    effectiveFrom: formatTimestamp(w.from),
    effectiveTo: w.to === null ? null : formatTimestamp(w.to),
  }));
}

export function generateConsentVersions(
  ctx: GeneratorContext,
  options: ConsentVersionOptions
): ConsentVersionRow[] {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  throwIfInvalid(errors);

  const rows: ConsentVersionRow[] = [];
  for (const studyId of ctx.random.shuffle(options.studyIds)) {
    const room = options.count - rows.length;
    if (room <= 0) break;
    const chain = versionsForStudy(ctx, studyId);
    if (chain.length > room) {
      // A truncated chain still ends open-ended.
      const kept = chain.slice(0, room);
      kept[kept.length - 1].effectiveTo = null;
      rows.push(...kept);
    } else {
      rows.push(...chain);
    }
  }
  return rows;
}
