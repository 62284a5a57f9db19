import type { GeneratorContext } from "../config.js";
import { betaInteger, randomUuid, weighted, weightedChoice, type Random } from "../random.js";
import { DAY, SECOND, formatDate, formatTimestamp, randomBetween } from "../time.js";
import type { ParticipantRow, ParticipantStatus, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import { VOCABULARY } from "../vocabulary.js";

export const PARTICIPANT_LAYOUT: TableLayout<ParticipantRow> = {
  entity: "participants",
  defaultFile: "participants.csv",
  columns: [
    "participant_id", "first_name", "last_name", "email", "phone",
    "date_of_birth", "age", "gender", "ethnicity", "major", "class_year",
    "gpa", "status", "bio", "created_at", "updated_at",
  ],
};

const STATUS_WEIGHTS = weighted<ParticipantStatus>(
  ["active", "paused", "ineligible", "banned"],
  [78, 12, 8, 2]
);

const CLASS_YEARS = [2025, 2026, 2027, 2028, 2029, 2030];
const MIN_AGE = 18;
const MAX_AGE = 65;

export interface ParticipantOptions {
  count: number;
}

function slugify(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "-")
    .replace(/^-+|-+$/g, "");
}

function makeEmail(random: Random, first: string, last: string): string {
  const handle = random.pick([
    `${first}.${last}`,
    `${first}${last[0]}`,
    `${first[0]}${last}`,
    `${first}${last}${random.int(1, 99)}`,
  ]);
  return `${slugify(handle)}@${random.pick(VOCABULARY.participants.emailDomains)}`;
}

/** NXX-NXX-XXXX: exchange and area blocks never start with 0 or 1. */
function makePhone(random: Random): string {
  const block = (n: number): string => {
    let out = String(random.int(2, 9));
    for (let i = 1; i < n; i++) out += String(random.int(0, 9));
    return out;
  };
  let line = "";
  for (let i = 0; i < 4; i++) line += String(random.int(0, 9));
  return `${block(3)}-${block(3)}-${line}`;
}

/** Whole years between a birth date and the reference date, both UTC midnights. */
export function ageOn(dob: number, on: number): number {
  const d = new Date(dob);
  const t = new Date(on);
  const beforeBirthday =
    t.getUTCMonth() < d.getUTCMonth() ||
    (t.getUTCMonth() === d.getUTCMonth() && t.getUTCDate() < d.getUTCDate());
  return t.getUTCFullYear() - d.getUTCFullYear() - (beforeBirthday ? 1 : 0);
}

function shiftYears(ms: number, years: number): number {
  const d = new Date(ms);
  d.setUTCFullYear(d.getUTCFullYear() + years);
  return d.getTime();
}

/**
 * Draw a target age, then a birthday in the year-long window that yields
 * exactly that age on the reference date.
 */
function makeDateOfBirth(random: Random, today: number): { dob: number; age: number } {
  const target = random.int(MIN_AGE, MAX_AGE);
  const from = shiftYears(today, -(target + 1)) + DAY;
  const to = shiftYears(today, -target);
  const days = Math.max(0, Math.floor((to - from) / DAY));
  const dob = from + random.int(0, days) * DAY;
  return { dob, age: ageOn(dob, today) };
}

/** GPA in [2.0, 4.0] clustered around 3.2-3.6. */
function makeGpa(random: Random): number {
  const g = betaInteger(random, 6, 3);
  return Math.round((2.0 + g * 2.0) * 100) / 100;
}

function makeRow(ctx: GeneratorContext): ParticipantRow {
  const { random, faker, clock } = ctx;
  const first = faker.person.firstName();
  const last = faker.person.lastName();
  const major = random.pick(VOCABULARY.participants.majors);
  const { dob, age } = makeDateOfBirth(random, clock.start);

  const createdAt = randomBetween(random, clock.start - 365 * DAY, clock.end);
  const updatedAt = Math.min(
    createdAt + random.int(0, 120) * DAY + random.int(0, 86400) * SECOND,
    clock.end
  );

  return {
    participant_id: randomUuid(random),
    first_name: first,
    last_name: last,
    email: makeEmail(random, first, last),
    phone: makePhone(random),
    date_of_birth: formatDate(dob),
    age,
    gender: random.pick(VOCABULARY.participants.genders),
    ethnicity: random.pick(VOCABULARY.participants.ethnicities),
    major,
    class_year: random.pick(CLASS_YEARS),
    gpa: makeGpa(random),
    status: weightedChoice(random, STATUS_WEIGHTS),
    bio: random.pick(VOCABULARY.participants.bioTemplates).replace("{major}", major),
    created_at: formatTimestamp(createdAt),
    updated_at: formatTimestamp(Math.max(updatedAt, createdAt)),
  };
}

export function generateParticipants(
  ctx: GeneratorContext,
  options: ParticipantOptions
): ParticipantRow[] {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  throwIfInvalid(errors);

  return Array.from({ length: options.count }, () => makeRow(ctx));
}
