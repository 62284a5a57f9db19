import type { GeneratorContext } from "../config.js";
import type { InputRecord } from "../io.js";
import { pairKey, pairUnique } from "../pairing.js";
import { cellText, synthesizeIds } from "../pools.js";
import { weighted, weightedChoice, type Random, type WeightedOutcome } from "../random.js";
import type {
  EnrollmentRow,
  EnrollmentStatus,
  PaymentMethod,
  PaymentRow,
  PaymentStatus,
  TableLayout,
} from "../types.js";
import { checkCounts, checkPositive, throwIfInvalid, type ValidationError } from "../validate.js";

export const PAYMENT_LAYOUT: TableLayout<PaymentRow> = {
  entity: "payments",
  defaultFile: "payments.csv",
  columns: ["participant_id", "session_id", "amount", "method", "status"],
};

const ATTEMPT_FACTOR = 10;
const SYNTHETIC_ATTEMPT_FACTOR = 10;
export const FALLBACK_PARTICIPANTS = 1200;
export const FALLBACK_SESSIONS = 400;

// Incentive buckets favor $15-$25.
const AMOUNTS = weighted([10, 15, 20, 25, 30, 40, 50], [10, 22, 28, 20, 12, 5, 3]);

const METHODS = weighted<PaymentMethod>(
  ["gift_card", "cash", "credit_card", "paypal", "venmo"],
  [45, 20, 15, 10, 10]
);

const SYNTHETIC_ENROLLMENT_STATUSES = weighted<EnrollmentStatus>(
  ["enrolled", "waitlisted", "cancelled", "attended", "no_show"],
  [45, 10, 10, 28, 7]
);

/** Payment status distribution per enrollment status. */
const PAYMENT_STATUS_BY_ENROLLMENT: Record<EnrollmentStatus, WeightedOutcome<PaymentStatus>[]> = {
  attended: weighted<PaymentStatus>(["paid", "pending", "refunded", "failed"], [82, 8, 5, 5]),
  no_show: weighted<PaymentStatus>(["waived", "pending", "paid", "refunded", "failed"], [70, 10, 5, 5, 10]),
  cancelled: weighted<PaymentStatus>(["refunded", "void", "failed", "waived"], [60, 35, 3, 2]),
  waitlisted: weighted<PaymentStatus>(["void"], [1]),
  enrolled: weighted<PaymentStatus>(["pending", "paid", "failed", "refunded", "waived"], [85, 5, 3, 2, 5]),
};

/** What payments need from an enrollment. Unknown statuses are kept as read. */
export interface EnrollmentRef {
  participantId: string;
  sessionId: string;
  status: string;
}

export interface PaymentOptions {
  count: number;
  enrollments: readonly EnrollmentRef[];
}

export interface PaymentResult {
  rows: PaymentRow[];
  requested: number;
  attempts: number;
}

function isEnrollmentStatus(value: string): value is EnrollmentStatus {
  return Object.prototype.hasOwnProperty.call(PAYMENT_STATUS_BY_ENROLLMENT, value);
}

/** Unknown or blank enrollment statuses are treated like "enrolled". */
export function paymentStatusFor(random: Random, enrollmentStatus: string): PaymentStatus {
  const s = enrollmentStatus.trim().toLowerCase();
  const outcomes = isEnrollmentStatus(s)
    ? PAYMENT_STATUS_BY_ENROLLMENT[s]
    : PAYMENT_STATUS_BY_ENROLLMENT.enrolled;
  return weightedChoice(random, outcomes);
}

/** No money changes hands for void and waived payments. */
export function movesMoney(status: PaymentStatus): boolean {
  return status !== "void" && status !== "waived";
}

export function paymentFor(random: Random, enrollment: EnrollmentRef): PaymentRow {
  const status = paymentStatusFor(random, enrollment.status);
  const paid = movesMoney(status);
  return {
    participant_id: enrollment.participantId,
    session_id: enrollment.sessionId,
    amount: paid ? weightedChoice(random, AMOUNTS) : 0,
    method: paid ? weightedChoice(random, METHODS) : "none",
    status,
  };
}

export function enrollmentRefFromRow(row: EnrollmentRow): EnrollmentRef {
  return { participantId: row.participant_id, sessionId: row.session_id, status: row.status };
}

/** Records lacking either id are skipped. */
export function enrollmentRefFromRecord(record: InputRecord): EnrollmentRef | undefined {
  const participantId = cellText(record["participant_id"]);
  const sessionId = cellText(record["session_id"]);
  if (!participantId || !sessionId) return undefined;
  const status = cellText(record["status"]) ?? "";
  return { participantId, sessionId, status: status.toLowerCase() };
}

/** A pool of enrollments for runs without an enrollments file. */
export function synthesizeEnrollments(ctx: GeneratorContext, size: number): EnrollmentRef[] {
  const { random } = ctx;
  const participants = synthesizeIds(random, FALLBACK_PARTICIPANTS);
  const sessions = synthesizeIds(random, FALLBACK_SESSIONS);
  return pairUnique({
    entity: "synthetic enrollment",
    target: size,
    attemptFactor: SYNTHETIC_ATTEMPT_FACTOR,
    // The pool is a means to an end; a short pool is never fatal.
    policy: { ...ctx.config.pairing, onShortfall: "accept" },
    draw: () => ({
      participantId: random.pick(participants),
      sessionId: random.pick(sessions),
    }),
    key: (c) => pairKey(c.participantId, c.sessionId),
    build: (c) => ({ ...c, status: weightedChoice(random, SYNTHETIC_ENROLLMENT_STATUSES) }),
  }).rows;
}

export function generatePayments(ctx: GeneratorContext, options: PaymentOptions): PaymentResult {
  const errors: ValidationError[] = [];
  checkCounts({ count: options.count }, errors);
  if (options.count > 0) checkPositive({ enrollments: options.enrollments.length }, errors);
  throwIfInvalid(errors);

  const { random } = ctx;
  const result = pairUnique({
    entity: "payment",
    target: options.count,
    attemptFactor: ATTEMPT_FACTOR,
    policy: ctx.config.pairing,
    draw: () => random.pick(options.enrollments),
    key: (e) => pairKey(e.participantId, e.sessionId),
    build: (e) => paymentFor(random, e),
  });
  return { rows: result.rows, requested: result.requested, attempts: result.attempts };
}
