import type { GeneratorContext } from "../config.js";
import type { InputRecord } from "../io.js";
import { COLUMN_ALIASES, aliasedText, cellInteger, cellText } from "../pools.js";
import { randomUuid, stableUuid, type Random } from "../random.js";
import { RoomSchedule, type Interval } from "../schedule.js";
import { DAY, HOUR, MINUTE, formatTimestamp, parseTimestamp } from "../time.js";
import type { SessionRow, TableLayout } from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import type { RoomRef } from "./rooms.js";

export const SESSION_LAYOUT: TableLayout<SessionRow> = {
  entity: "sessions",
  defaultFile: "sessions.csv",
  columns: ["session_id", "study_id", "room_id", "startTs", "endTs", "capacity"],
};

/** Scheduling window relative to the reference date, in days. */
export const DAYS_PAST = 10;
export const DAYS_FUTURE = 60;
const START_HOUR_MIN = 8;
const START_HOUR_MAX = 19;
const START_MINUTES = [0, 15, 30, 45];
const DURATION_MIN = 45;
const DURATION_MAX = 120;

/** Capacity range for rooms and sessions whose room capacity is unknown. */
export const FALLBACK_CAPACITY: [number, number] = [18, 60];

export interface SessionOptions {
  count: number;
  studyIds: readonly string[];
  rooms: readonly RoomRef[];
}

export interface SessionResult {
  rows: SessionRow[];
  /** Sessions accepted despite overlapping another in the same room. */
  conflicts: number;
}

/** A session as enrollments see it. Times and capacity may be unknown. */
export interface SessionRef {
  sessionId: string;
  start?: number;
  end?: number;
  capacity?: number;
}

/** Stable session id, the same whether written by this generator or derived by a reader. */
export function sessionIdFor(studyId: string, roomId: string, startTs: string): string {
  return stableUuid(studyId, roomId, startTs);
}

/** A random slot: day in [-10, +60], start 08:00-19:45 on a quarter hour, 45-120 minutes long. */
export function proposeSlot(random: Random, dayStart: number): Interval {
  const start =
    dayStart +
    random.int(-DAYS_PAST, DAYS_FUTURE) * DAY +
    random.int(START_HOUR_MIN, START_HOUR_MAX) * HOUR +
    random.pick(START_MINUTES) * MINUTE;
  return { start, end: start + random.int(DURATION_MIN, DURATION_MAX) * MINUTE };
}

function sessionCapacity(random: Random, roomCapacity: number | undefined): number {
  if (roomCapacity) {
    const hi = Math.max(2, roomCapacity);
    return random.int(Math.max(2, Math.min(6, hi)), hi);
  }
  return random.int(FALLBACK_CAPACITY[0], FALLBACK_CAPACITY[1]);
}

export function synthesizeRooms(random: Random, size: number): RoomRef[] {
  return Array.from({ length: size }, () => ({
    roomId: randomUuid(random),
    capacity: random.int(FALLBACK_CAPACITY[0], FALLBACK_CAPACITY[1]),
  }));
}

export function generateSessions(
  ctx: GeneratorContext,
  options: SessionOptions
): SessionResult {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  if (options.count > 0 && options.studyIds.length === 0) {
    errors.push({ rule: "non-empty-pool", message: "Sessions need at least one study id", path: "studyIds" });
  }
  if (options.count > 0 && options.rooms.length === 0) {
    errors.push({ rule: "non-empty-pool", message: "Sessions need at least one room", path: "rooms" });
  }
  throwIfInvalid(errors);

  const { random, clock } = ctx;
  const schedule = new RoomSchedule(ctx.config.scheduling);
  const rows: SessionRow[] = [];
  let conflicts = 0;

  for (let i = 0; i < options.count; i++) {
    const studyId = random.pick(options.studyIds);
    const room = random.pick(options.rooms);
    const placement = schedule.place(room.roomId, () => proposeSlot(random, clock.start));
    if (placement.conflicted) conflicts++;

    const startTs = formatTimestamp(placement.interval.start);
    rows.push({
      session_id: sessionIdFor(studyId, room.roomId, startTs),
      study_id: studyId,
      room_id: room.roomId,
      startTs,
      endTs: formatTimestamp(placement.interval.end),
      capacity: sessionCapacity(random, room.capacity),
    });
  }
  return { rows, conflicts };
}

export function sessionRefFromRow(row: SessionRow): SessionRef {
  return {
    sessionId: row.session_id,
    start: parseTimestamp(row.startTs),
    end: parseTimestamp(row.endTs),
    capacity: row.capacity,
  };
}

/** Read a session record; a missing session_id is derived from study, room and start. */
export function sessionRefFromRecord(record: InputRecord): SessionRef {
  const startTs = cellText(record["startTs"]) ?? "";
  const sessionId =
    aliasedText(record, COLUMN_ALIASES.session) ??
    sessionIdFor(
      cellText(record["study_id"]) ?? "",
      aliasedText(record, COLUMN_ALIASES.room) ?? "",
      startTs
    );
  return {
    sessionId,
    start: parseTimestamp(startTs),
    end: parseTimestamp(record["endTs"]),
    capacity: cellInteger(record["capacity"]),
  };
}

/** Sessions spread over the scheduling window, for runs without a sessions file. */
export function synthesizeSessions(ctx: GeneratorContext, size: number): SessionRef[] {
  const { random, clock } = ctx;
  return Array.from({ length: size }, () => {
    const slot = proposeSlot(random, clock.start);
    return {
      sessionId: randomUuid(random),
      start: slot.start,
      end: slot.end,
      capacity: random.int(FALLBACK_CAPACITY[0], FALLBACK_CAPACITY[1]),
    };
  });
}
