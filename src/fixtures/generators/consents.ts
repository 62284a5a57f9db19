import type { GeneratorContext } from "../config.js";
import type { InputRecord } from "../io.js";
import { pairKey, pairUnique } from "../pairing.js";
import { cellText, synthesizeIds } from "../pools.js";
import { randomUuid, type Random } from "../random.js";
import { DAY, MINUTE, formatTimestamp, parseTimestamp, randomBetween, type ReferenceClock } from "../time.js";
import type { ConsentVersionRow, ParticipantConsentRow, TableLayout } from "../types.js";
import { checkCounts, checkPositive, checkRate, throwIfInvalid, type ValidationError } from "../validate.js";

export const CONSENT_LAYOUT: TableLayout<ParticipantConsentRow> = {
  entity: "participant consents",
  defaultFile: "ParticipantConsents.csv",
  columns: ["participant_consent_id", "participant_id", "consent_version_id", "signedAt", "withdrawnAt"],
};

const ATTEMPT_FACTOR = 10;
export const DEFAULT_WITHDRAW_RATE = 0.15;
export const DEFAULT_WITHDRAWAL_WINDOW_DAYS = 240;
/** How far back synthetic signatures reach. */
export const SYNTHETIC_SIGNED_WINDOW_DAYS = 540;

/** Effective window of a consent version. `to` undefined means still current. */
export interface ConsentWindow {
  consentVersionId: string;
  from?: number;
  to?: number;
}

export interface ConsentOptions {
  count: number;
  participantIds: readonly string[];
  versions: readonly ConsentWindow[];
  withdrawRate?: number;
  withdrawalWindowDays?: number;
  allowDuplicates?: boolean;
}

export interface SyntheticConsentOptions {
  count: number;
  participantPool: number;
  versionPool: number;
  withdrawRate?: number;
  withdrawalWindowDays?: number;
  allowDuplicates?: boolean;
}

export interface ConsentResult {
  rows: ParticipantConsentRow[];
  requested: number;
  attempts: number;
  /** Versions left after dropping those not yet effective. */
  signableVersions: number;
}

/** Only versions whose window has begun by the reference instant can be signed. */
export function signableVersions(
  versions: readonly ConsentWindow[],
  clock: ReferenceClock
): ConsentWindow[] {
  return versions.filter((v) => v.from !== undefined && v.from <= clock.end);
}

/** Uniform in [from, min(to, now)], or undefined when that window is inverted. */
export function pickSignedAt(
  random: Random,
  version: ConsentWindow,
  clock: ReferenceClock
): number | undefined {
  if (version.from === undefined) return undefined;
  const end = Math.min(version.to ?? clock.end, clock.end);
  if (end < version.from) return undefined;
  return randomBetween(random, version.from, end);
}

/**
 * With probability `rate`, a withdrawal at least a minute after signing and no
 * later than the window cap, the version's end, or now. An empty interval
 * yields no withdrawal.
 */
export function pickWithdrawnAt(
  random: Random,
  signedAt: number,
  version: ConsentWindow,
  clock: ReferenceClock,
  rate: number,
  windowDays: number
): number | undefined {
  if (!random.chance(rate)) return undefined;
  const last = Math.min(signedAt + windowDays * DAY, version.to ?? clock.end, clock.end);
  const earliest = signedAt + MINUTE;
  if (last < earliest) return undefined;
  return randomBetween(random, earliest, last);
}

function validate(
  count: number,
  withdrawRate: number,
  windowDays: number,
  errors: ValidationError[]
): void {
  checkCounts({ count }, errors);
  checkRate("withdrawRate", withdrawRate, errors);
  checkPositive({ withdrawalWindowDays: windowDays }, errors);
}

function runConsents(
  ctx: GeneratorContext,
  count: number,
  participantIds: readonly string[],
  versions: readonly ConsentWindow[],
  withdrawRate: number,
  windowDays: number,
  allowDuplicates: boolean
): ConsentResult {
  const { random, clock } = ctx;
  const result = pairUnique({
    entity: "participant consent",
    target: participantIds.length > 0 && versions.length > 0 ? count : 0,
    attemptFactor: ATTEMPT_FACTOR,
    policy: ctx.config.pairing,
    allowDuplicates,
    draw: () => ({ participantId: random.pick(participantIds), version: random.pick(versions) }),
    key: (c) => pairKey(c.participantId, c.version.consentVersionId),
    build: (c): ParticipantConsentRow | undefined => {
      const signedAt = pickSignedAt(random, c.version, clock);
      if (signedAt === undefined) return undefined;
      const withdrawnAt = pickWithdrawnAt(random, signedAt, c.version, clock, withdrawRate, windowDays);
      return {
        participant_consent_id: randomUuid(random),
        participant_id: c.participantId,
        consent_version_id: c.version.consentVersionId,
        signedAt: formatTimestamp(signedAt),
        withdrawnAt: withdrawnAt === undefined ? null : formatTimestamp(withdrawnAt),
      };
    },
  });
  return {
    rows: result.rows,
    requested: count,
    attempts: result.attempts,
    signableVersions: versions.length,
  };
}

/** Signatures against real participants and consent versions (both required). */
export function generateConsents(ctx: GeneratorContext, options: ConsentOptions): ConsentResult {
  const withdrawRate = options.withdrawRate ?? DEFAULT_WITHDRAW_RATE;
  const windowDays = options.withdrawalWindowDays ?? DEFAULT_WITHDRAWAL_WINDOW_DAYS;
  const errors: ValidationError[] = [];
  validate(options.count, withdrawRate, windowDays, errors);
  throwIfInvalid(errors);

  return runConsents(
    ctx,
    options.count,
    options.participantIds,
    signableVersions(options.versions, ctx.clock),
    withdrawRate,
    windowDays,
    options.allowDuplicates ?? false
  );
}

/**
 * Standalone variant: synthesized participant and version pools, every version
 * effective from 540 days before the reference date and still current.
 */
export function generateSyntheticConsents(
  ctx: GeneratorContext,
  options: SyntheticConsentOptions
): ConsentResult {
  const withdrawRate = options.withdrawRate ?? DEFAULT_WITHDRAW_RATE;
  const windowDays = options.withdrawalWindowDays ?? DEFAULT_WITHDRAWAL_WINDOW_DAYS;
  const errors: ValidationError[] = [];
  validate(options.count, withdrawRate, windowDays, errors);
  checkPositive({ participantPool: options.participantPool, versionPool: options.versionPool }, errors);
  throwIfInvalid(errors);

  const { random, clock } = ctx;
  const participantIds = synthesizeIds(random, options.participantPool);
  const from = clock.start - SYNTHETIC_SIGNED_WINDOW_DAYS * DAY;
  const versions = synthesizeIds(random, options.versionPool).map(
    (consentVersionId): ConsentWindow => ({ consentVersionId, from })
  );

  return runConsents(
    ctx,
    options.count,
    participantIds,
    versions,
    withdrawRate,
    windowDays,
    options.allowDuplicates ?? false
  );
}

export function consentWindowFromRow(row: ConsentVersionRow): ConsentWindow {
  return {
    consentVersionId: row.consent_version_id,
    from: parseTimestamp(row.effectiveFrom),
    to: parseTimestamp(row.effectiveTo ?? ""),
  };
}

/** Column aliases for the effective window, resolved per record. */
const FROM_ALIASES = ["effectiveFrom", "effective_from"] as const;
const TO_ALIASES = ["effectiveTo", "effective_to"] as const;

function firstCell(record: InputRecord, aliases: readonly string[]): unknown {
  for (const alias of aliases) {
    if (record[alias] !== undefined) return record[alias];
  }
  return undefined;
}

export function consentWindowFromRecord(
  record: InputRecord,
  idColumn: string
): ConsentWindow | undefined {
  const consentVersionId = cellText(record[idColumn]);
  if (!consentVersionId) return undefined;
  return {
    consentVersionId,
    from: parseTimestamp(firstCell(record, FROM_ALIASES)),
    to: parseTimestamp(firstCell(record, TO_ALIASES)),
  };
}

export const CONSENT_WINDOW_COLUMNS = { from: FROM_ALIASES, to: TO_ALIASES };
