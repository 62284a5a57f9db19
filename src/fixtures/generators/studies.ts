import type { GeneratorContext } from "../config.js";
import { randomUuid, weighted, weightedChoice, type Random } from "../random.js";
import { DAY, SECOND, formatTimestamp, randomBetween } from "../time.js";
import type { StudyRow, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import { VOCABULARY } from "../vocabulary.js";

export const STUDY_LAYOUT: TableLayout<StudyRow> = {
  entity: "studies",
  defaultFile: "studies.csv",
  columns: [
    "study_id", "title", "description", "minAge", "maxAge", "minGPA",
    "cooldownDays", "active", "created_at", "updated_at",
  ],
};

// Favors lower thresholds: most studies accept a wide GPA range.
const MIN_GPA_WEIGHTS = weighted(
  [2.0, 2.3, 2.5, 2.7, 3.0, 3.2, 3.5],
  [30, 15, 20, 12, 15, 6, 2]
);

const MIN_AGES = [18, 18, 18, 21];
const MAX_AGES = [45, 55, 60, 65];
const COOLDOWN_DAYS = [0, 7, 14, 21, 30];
const DURATION_MINUTES = [20, 30, 35, 45, 60, 75, 90];
const ACTIVE_RATE = 0.7;

export interface StudyOptions {
  count: number;
}

function sentenceCase(s: string): string {
  return s ? s[0].toUpperCase() + s.slice(1) : s;
}

function titleCase(s: string): string {
  return s.replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

function makeTitle(random: Random): string {
  const v = VOCABULARY.studies;
  const topic = random.pick(v.topics);
  const method = random.pick(v.methods);
  const goal = sentenceCase(random.pick(v.goals));
  return random.pick([
    `${topic}: ${goal}`,
    `${topic} via ${titleCase(method)}`,
    `${goal} (${topic})`,
    `${topic} – ${goal}`,
  ]);
}

function makeDescription(random: Random): string {
  const v = VOCABULARY.studies;
  const topic = random.pick(v.topics).toLowerCase();
  const method = random.pick(v.methods);
  const population = random.pick(v.populations);
  const incentive = random.pick(v.incentives);
  const goal = random.pick(v.goals);
  const minutes = random.pick(DURATION_MINUTES);
  return (
    `This ${topic} study uses a ${method} with ${population}. ` +
    `It aims to ${goal}. Approx. ${minutes} minutes. Compensation: ${incentive}. ` +
    "Participation is voluntary; you may withdraw at any time."
  );
}

function makeRow(ctx: GeneratorContext): StudyRow {
  const { random, clock } = ctx;
  const title = makeTitle(random);
  const description = makeDescription(random);
  const minAge = random.pick(MIN_AGES);
  let maxAge = random.pick(MAX_AGES);
  if (maxAge < minAge) maxAge = minAge + random.int(1, 5);

  const createdAt = randomBetween(random, clock.start - 540 * DAY, clock.end);
  const updatedAt = Math.min(
    createdAt + random.int(0, 180) * DAY + random.int(0, 86400) * SECOND,
    clock.end
  );

  return {
    study_id: randomUuid(random),
    title,
    description,
    minAge,
    maxAge,
    minGPA: weightedChoice(random, MIN_GPA_WEIGHTS),
    cooldownDays: random.pick(COOLDOWN_DAYS),
    active: random.chance(ACTIVE_RATE),
    created_at: formatTimestamp(createdAt),
    updated_at: formatTimestamp(Math.max(createdAt, updatedAt)),
  };
}

export function generateStudies(ctx: GeneratorContext, options: StudyOptions): StudyRow[] {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  throwIfInvalid(errors);

  return Array.from({ length: options.count }, () => makeRow(ctx));
}
