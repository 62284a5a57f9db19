import type { Random } from "./random.js";

export const SECOND = 1000;
export const MINUTE = 60 * SECOND;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

/**
 * The "today" every timestamp is computed against. `start` is midnight UTC of
 * the reference date, `end` its last second.
 */
export interface ReferenceClock {
  date: string;
  start: number;
  end: number;
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const NAIVE_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/;

export function createClock(date: string): ReferenceClock {
  const start = parseDate(date);
  if (start === undefined) {
    throw new RangeError(`Invalid reference date "${date}" (expected YYYY-MM-DD)`);
  }
  return { date, start, end: start + DAY - SECOND };
}

/** True for a YYYY-MM-DD string naming a real calendar day. */
export function isCalendarDate(value: string): boolean {
  return parseDate(value) !== undefined;
}

function parseDate(value: string): number | undefined {
  const m = DATE_RE.exec(value);
  if (!m) return undefined;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return undefined;
  }
  return ms;
}

/**
 * Parse an input timestamp. Offset-less values ("2025-09-21T10:00:00",
 * "2025-09-21") are read as UTC; anything else goes through Date.parse.
 * Blank or unparsable input yields undefined.
 */
export function parseTimestamp(value: unknown): number | undefined {
  if (typeof value !== "string") return undefined;
  const s = value.trim();
  if (!s) return undefined;

  const date = parseDate(s);
  if (date !== undefined) return date;

  const m = NAIVE_RE.exec(s);
  if (m) {
    const ms = Date.UTC(
      Number(m[1]),
      Number(m[2]) - 1,
      Number(m[3]),
      Number(m[4]),
      Number(m[5]),
      Number(m[6] ?? "0")
    );
    return Number.isNaN(ms) ? undefined : ms;
  }

  const parsed = Date.parse(s);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/** YYYY-MM-DDTHH:MM:SS in UTC, no offset. */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19);
}

/** YYYY-MM-DD in UTC. */
export function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** Whole-second instant uniformly within [a, b]; inverted bounds are swapped. */
export function randomBetween(random: Random, a: number, b: number): number {
  if (b < a) [a, b] = [b, a];
  const seconds = Math.floor((b - a) / SECOND);
  return a + random.int(0, Math.max(0, seconds)) * SECOND;
}
