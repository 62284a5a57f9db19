import type { GeneratorContext } from "../config.js";
import { randomUuid, weighted, weightedChoice } from "../random.js";
import { DAY, formatTimestamp, randomBetween } from "../time.js";
import type { ResearcherRow, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import { VOCABULARY } from "../vocabulary.js";

export const RESEARCHER_LAYOUT: TableLayout<ResearcherRow> = {
  entity: "researchers",
  defaultFile: "researchers.csv",
  columns: [
    "researcher_id", "first_name", "last_name", "email", "department",
    "title", "created_at",
  ],
};

// Labs have more junior staff than faculty.
const TITLE_WEIGHTS = weighted(VOCABULARY.researchers.titles, [10, 10, 15, 20, 35, 10]);

export interface ResearcherOptions {
  count: number;
}

export function generateResearchers(
  ctx: GeneratorContext,
  options: ResearcherOptions
): ResearcherRow[] {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  throwIfInvalid(errors);

  const { random, faker, clock } = ctx;
  const handles = new Set<string>();
  const rows: ResearcherRow[] = [];

  for (let i = 0; i < options.count; i++) {
    const first = faker.person.firstName();
    const last = faker.person.lastName();
    const base = `${first[0]}${last}`.toLowerCase().replace(/[^a-z0-9]/g, "");
    let handle = base;
    for (let n = 2; handles.has(handle); n++) handle = `${base}${n}`;
    handles.add(handle);

    rows.push({
      researcher_id: randomUuid(random),
      first_name: first,
      last_name: last,
      email: `${handle}@${VOCABULARY.researchers.emailDomain}`,
      department: random.pick(VOCABULARY.researchers.departments),
      title: weightedChoice(random, TITLE_WEIGHTS),
      created_at: formatTimestamp(randomBetween(random, clock.start - 730 * DAY, clock.end)),
    });
  }
  return rows;
}
