import type { GeneratorContext } from "../config.js";
import { pairKey, pairUnique } from "../pairing.js";
import { weighted, weightedChoice } from "../random.js";
import { DAY, HOUR, MINUTE, formatTimestamp, randomBetween } from "../time.js";
import {
  SEAT_HOLDING_STATUSES,
  type EnrollmentRow,
  type EnrollmentStatus,
  type TableLayout,
} from "../types.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "../validate.js";
import type { SessionRef } from "./sessions.js";

export const ENROLLMENT_LAYOUT: TableLayout<EnrollmentRow> = {
  entity: "enrollments",
  defaultFile: "enrollments.csv",
  columns: ["participant_id", "session_id", "status", "created_at", "updated_at"],
};

/** How far ahead of a session sign-ups open. */
const ENROLL_OPEN_DAYS = 90;
const ATTEMPT_FACTOR = 15;

/** Seat available, session still ahead: no outcome can be recorded yet. */
export const PENDING_OUTCOME_WEIGHTS = weighted<EnrollmentStatus>(
  ["enrolled", "cancelled", "waitlisted", "no_show", "attended"],
  [70, 12, 8, 0, 0]
);

/** Seat available, session over: "enrolled" means no outcome was recorded. */
export const RECORDED_OUTCOME_WEIGHTS = weighted<EnrollmentStatus>(
  ["attended", "no_show", "cancelled", "enrolled", "waitlisted"],
  [55, 12, 8, 25, 0]
);

export interface EnrollmentOptions {
  count: number;
  participantIds: readonly string[];
  sessions: readonly SessionRef[];
}

export interface EnrollmentResult {
  rows: EnrollmentRow[];
  requested: number;
  attempts: number;
}

/**
 * Seats taken per session. Only seat-holding statuses count, so cancelled and
 * waitlisted sign-ups never block anyone.
 */
export class SeatLedger {
  private readonly taken = new Map<string, number>();

  seatsTaken(sessionId: string): number {
    return this.taken.get(sessionId) ?? 0;
  }

  hasSeat(session: SessionRef): boolean {
    if (session.capacity === undefined) return true;
    return this.seatsTaken(session.sessionId) < Math.max(0, session.capacity);
  }

  occupy(sessionId: string): void {
    this.taken.set(sessionId, this.seatsTaken(sessionId) + 1);
  }
}

function pickStatus(
  ctx: GeneratorContext,
  seatAvailable: boolean,
  end: number
): EnrollmentStatus {
  if (!seatAvailable) return "waitlisted";
  const now = ctx.clock.end;
  return weightedChoice(
    ctx.random,
    end <= now ? RECORDED_OUTCOME_WEIGHTS : PENDING_OUTCOME_WEIGHTS
  );
}

function pickCreatedAt(ctx: GeneratorContext, start: number): number {
  const now = ctx.clock.end;
  let openFrom = start - ENROLL_OPEN_DAYS * DAY;
  let openTo = Math.min(start - HOUR, now);
  if (openTo <= openFrom) {
    openTo = start - 30 * MINUTE;
    openFrom = openTo - DAY;
  }
  return randomBetween(ctx.random, openFrom, openTo);
}

function pickUpdatedAt(
  ctx: GeneratorContext,
  status: EnrollmentStatus,
  createdAt: number,
  start: number,
  end: number
): number {
  const { random } = ctx;
  const now = ctx.clock.end;

  if (status === "cancelled") {
    let last = Math.min(start - 10 * MINUTE, now);
    if (last <= createdAt) last = createdAt + 5 * MINUTE;
    return randomBetween(random, createdAt + MINUTE, last);
  }
  if (status === "attended" || status === "no_show") {
    const base = end <= now ? end : start;
    return randomBetween(random, base, Math.min(base + 3 * HOUR, now));
  }
  let last = Math.min(now, start);
  if (last <= createdAt) last = createdAt + 5 * MINUTE;
  return randomBetween(random, createdAt, last);
}

/**
 * Build one enrollment for a participant and session and book its seat when
 * the status holds one. Missing session times default to a one-hour session a
 * week after the reference date.
 */
export function enrollmentFor(
  ctx: GeneratorContext,
  seats: SeatLedger,
  participantId: string,
  session: SessionRef
): EnrollmentRow {
  const start = session.start ?? ctx.clock.start + 7 * DAY;
  const end = session.end ?? start + HOUR;

  const seatAvailable = seats.hasSeat(session);
  const status = pickStatus(ctx, seatAvailable, end);
  const createdAt = pickCreatedAt(ctx, start);
  const updatedAt = Math.max(createdAt, pickUpdatedAt(ctx, status, createdAt, start, end));

  if (seatAvailable && SEAT_HOLDING_STATUSES.has(status)) {
    seats.occupy(session.sessionId);
  }

  return {
    participant_id: participantId,
    session_id: session.sessionId,
    status,
    created_at: formatTimestamp(createdAt),
    updated_at: formatTimestamp(updatedAt),
  };
}

export function generateEnrollments(
  ctx: GeneratorContext,
  options: EnrollmentOptions
): EnrollmentResult {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  if (options.count > 0 && options.participantIds.length === 0) {
    errors.push({ rule: "non-empty-pool", message: "Enrollments need at least one participant id", path: "participantIds" });
  }
  if (options.count > 0 && options.sessions.length === 0) {
    errors.push({ rule: "non-empty-pool", message: "Enrollments need at least one session", path: "sessions" });
  }
  throwIfInvalid(errors);

  const { random } = ctx;
  const seats = new SeatLedger();
  const result = pairUnique({
    entity: "enrollment",
    target: options.count,
    attemptFactor: ATTEMPT_FACTOR,
    policy: ctx.config.pairing,
    draw: () => ({
      participantId: random.pick(options.participantIds),
      session: random.pick(options.sessions),
    }),
    key: (c) => pairKey(c.participantId, c.session.sessionId),
    build: (c) => enrollmentFor(ctx, seats, c.participantId, c.session),
  });

  return { rows: result.rows, requested: result.requested, attempts: result.attempts };
}
