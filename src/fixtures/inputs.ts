import type { GeneratorContext } from "./config.js";
import type { ReferenceClock } from "./time.js";
import { MissingInputError } from "./errors.js";
import { firstExisting, readRecords } from "./io.js";
import { COLUMN_ALIASES, resolveColumn } from "./pools.js";
import {
  consentWindowFromRecord,
  CONSENT_WINDOW_COLUMNS,
  signableVersions,
  type ConsentWindow,
} from "./generators/consents.js";
import { enrollmentRefFromRecord, synthesizeEnrollments, type EnrollmentRef } from "./generators/payments.js";
import { roomRefFromRecord, type RoomRef } from "./generators/rooms.js";
import {
  sessionRefFromRecord,
  synthesizeRooms,
  synthesizeSessions,
  type SessionRef,
} from "./generators/sessions.js";

/** Where a pool came from, for the operator's log. */
export interface Sourced<T> {
  items: T[];
  source: "file" | "synthetic";
  path?: string;
}

async function readFirst(paths: readonly string[]) {
  const filePath = firstExisting(paths);
  if (filePath === undefined) return undefined;
  return { filePath, records: (await readRecords(filePath)) ?? [] };
}

export async function loadRooms(
  ctx: GeneratorContext,
  paths: readonly string[],
  fallbackSize: number
): Promise<Sourced<RoomRef>> {
  const found = await readFirst(paths);
  if (found && found.records.length > 0) {
    return {
      items: found.records.map((r) => roomRefFromRecord(ctx.random, r)),
      source: "file",
      path: found.filePath,
    };
  }
  return { items: synthesizeRooms(ctx.random, fallbackSize), source: "synthetic" };
}

export async function loadSessions(
  ctx: GeneratorContext,
  paths: readonly string[],
  fallbackSize: number
): Promise<Sourced<SessionRef>> {
  const found = await readFirst(paths);
  if (found && found.records.length > 0) {
    return {
      items: found.records.map(sessionRefFromRecord),
      source: "file",
      path: found.filePath,
    };
  }
  return { items: synthesizeSessions(ctx, fallbackSize), source: "synthetic" };
}

/** Enrollments need participant_id and session_id; files without both are ignored. */
export async function loadEnrollments(
  ctx: GeneratorContext,
  paths: readonly string[],
  fallbackSize: number
): Promise<Sourced<EnrollmentRef>> {
  const found = await readFirst(paths);
  if (found) {
    const items: EnrollmentRef[] = [];
    for (const record of found.records) {
      const ref = enrollmentRefFromRecord(record);
      if (ref) items.push(ref);
    }
    if (items.length > 0) {
      return { items, source: "file", path: found.filePath };
    }
  }
  return { items: synthesizeEnrollments(ctx, fallbackSize), source: "synthetic" };
}

/**
 * Consent versions are required input: a missing file, a missing id or window
 * column, or no version already in effect on the reference date is fatal.
 */
export async function loadConsentVersions(
  filePath: string,
  clock: ReferenceClock
): Promise<Sourced<ConsentWindow>> {
  const records = await readRecords(filePath);
  if (records === undefined) {
    throw new MissingInputError(`consent versions file not found: ${filePath}`, { path: filePath });
  }
  const idColumn = resolveColumn(records, COLUMN_ALIASES.consentVersion);
  const fromColumn = resolveColumn(records, CONSENT_WINDOW_COLUMNS.from);
  if (records.length > 0 && (!idColumn || !fromColumn)) {
    throw new MissingInputError(
      `${filePath} must include ${COLUMN_ALIASES.consentVersion.join(" or ")} and ${CONSENT_WINDOW_COLUMNS.from.join(" or ")}`,
      { path: filePath }
    );
  }
  const items: ConsentWindow[] = [];
  for (const record of records) {
    const window = idColumn ? consentWindowFromRecord(record, idColumn) : undefined;
    if (window) items.push(window);
  }
  const signable = signableVersions(items, clock);
  if (signable.length === 0) {
    throw new MissingInputError(
      `No consent versions found in ${filePath} (or all are future-only)`,
      { path: filePath, read: items.length }
    );
  }
  return { items: signable, source: "file", path: filePath };
}
