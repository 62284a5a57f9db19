import { MissingInputError } from "./errors.js";
import { firstExisting, readRecords, type InputRecord } from "./io.js";
import { randomUuid, type Random } from "./random.js";

/**
 * Accepted column names per upstream entity, in lookup order. The first alias
 * present on a file's first record is used for every record of that file.
 */
export const COLUMN_ALIASES = {
  participant: ["participant_id", "id"],
  study: ["study_id", "id"],
  researcher: ["researcher_id", "id"],
  consentVersion: ["consent_version_id", "id"],
  room: ["room_id"],
  session: ["session_id"],
} as const satisfies Record<string, readonly string[]>;

export type PoolEntity = keyof typeof COLUMN_ALIASES;

export interface IdPool {
  ids: string[];
  source: "file" | "synthetic";
  /** File the ids came from, when source is "file". */
  path?: string;
}

export interface IdPoolOptions {
  entity: PoolEntity;
  /** Candidate files; the first that exists is read. */
  paths: readonly string[];
  fallbackSize: number;
  /** When set, an unresolvable pool is fatal instead of synthesized. */
  required?: boolean;
}

/** Pick the first alias present on the first record. */
export function resolveColumn(
  records: readonly InputRecord[],
  aliases: readonly string[]
): string | undefined {
  if (records.length === 0) return undefined;
  const first = records[0];
  return aliases.find((alias) => Object.prototype.hasOwnProperty.call(first, alias));
}

/** A trimmed non-empty string for string or number cells, else undefined. */
export function cellText(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/** Text of the first alias with a usable value on one record. */
export function aliasedText(
  record: InputRecord,
  aliases: readonly string[]
): string | undefined {
  for (const alias of aliases) {
    const text = cellText(record[alias]);
    if (text !== undefined) return text;
  }
  return undefined;
}

/** Whole non-negative numbers only; anything else is unknown. */
export function cellInteger(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

export function extractIds(
  records: readonly InputRecord[],
  aliases: readonly string[]
): string[] {
  const column = resolveColumn(records, aliases);
  if (!column) return [];
  const ids: string[] = [];
  for (const record of records) {
    const id = cellText(record[column]);
    if (id) ids.push(id);
  }
  return ids;
}

export function synthesizeIds(random: Random, size: number): string[] {
  return Array.from({ length: size }, () => randomUuid(random));
}

/**
 * Load identifiers for an upstream entity from the first existing candidate
 * file, or synthesize a pool of fresh ids when there is none (or it yields
 * nothing). With `required`, those cases raise MissingInputError instead.
 */
export async function loadIdPool(
  random: Random,
  options: IdPoolOptions
): Promise<IdPool> {
  const aliases = COLUMN_ALIASES[options.entity];
  const filePath = firstExisting(options.paths);

  if (filePath === undefined) {
    if (options.required) {
      throw new MissingInputError(
        `${options.entity} file not found: ${options.paths.join(" or ")}`,
        { paths: options.paths }
      );
    }
    return { ids: synthesizeIds(random, options.fallbackSize), source: "synthetic" };
  }

  const records = (await readRecords(filePath)) ?? [];
  if (options.required && records.length > 0 && !resolveColumn(records, aliases)) {
    throw new MissingInputError(
      `${filePath} must include one of: ${aliases.join(", ")}`,
      { path: filePath, aliases }
    );
  }
  const ids = extractIds(records, aliases);
  if (ids.length > 0) {
    return { ids, source: "file", path: filePath };
  }
  if (options.required) {
    throw new MissingInputError(`No ${options.entity} ids found in ${filePath}`, {
      path: filePath,
    });
  }
  return { ids: synthesizeIds(random, options.fallbackSize), source: "synthetic" };
}
