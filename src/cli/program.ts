import { setImmediate } from "node:timers/promises";
import { Command, InvalidArgumentError } from "commander";
import {
  DEFAULT_CONFIG,
  createContext,
  loadConfig,
  type GeneratorContext,
} from "../fixtures/config.js";
import { generateDataset, writeDataset, DEFAULT_DATASET_SIZES } from "../fixtures/dataset.js";
import { InterruptedError } from "../fixtures/errors.js";
import { loadConsentVersions, loadEnrollments, loadRooms, loadSessions, type Sourced } from "../fixtures/inputs.js";
import { resolveOutput, writeRows } from "../fixtures/io.js";
import { loadIdPool, type IdPool } from "../fixtures/pools.js";
import { createClock } from "../fixtures/time.js";
import type { TableLayout } from "../fixtures/types.js";
import { CONSENT_VERSION_LAYOUT, generateConsentVersions } from "../fixtures/generators/consent-versions.js";
import {
  CONSENT_LAYOUT,
  DEFAULT_WITHDRAWAL_WINDOW_DAYS,
  DEFAULT_WITHDRAW_RATE,
  generateConsents,
  generateSyntheticConsents,
} from "../fixtures/generators/consents.js";
import { ENROLLMENT_LAYOUT, generateEnrollments } from "../fixtures/generators/enrollments.js";
import { PARTICIPANT_LAYOUT, generateParticipants } from "../fixtures/generators/participants.js";
import {
  FALLBACK_PARTICIPANTS,
  FALLBACK_SESSIONS,
  PAYMENT_LAYOUT,
  generatePayments,
} from "../fixtures/generators/payments.js";
import { RESEARCHER_LAYOUT, generateResearchers } from "../fixtures/generators/researchers.js";
import { ROOM_LAYOUT, generateRooms } from "../fixtures/generators/rooms.js";
import { SESSION_LAYOUT, generateSessions } from "../fixtures/generators/sessions.js";
import { STUDY_LAYOUT, generateStudies } from "../fixtures/generators/studies.js";
import {
  FALLBACK_RESEARCHERS,
  FALLBACK_STUDIES,
  STUDY_RESEARCHER_LAYOUT,
  generateStudyResearchers,
} from "../fixtures/generators/study-researchers.js";

export type Log = (line: string) => void;

export interface ProgramOptions {
  log?: Log;
  /** Throw commander errors instead of exiting; usage text goes to `log`. */
  exitOverride?: boolean;
  /** Once aborted, the next command stops before writing and rejects with InterruptedError. */
  signal?: AbortSignal;
}

interface CommonOptions {
  n: number;
  outfile: string;
  json?: boolean;
  seed: number;
  referenceDate?: string;
  config?: string;
}

interface SessionsOptions extends CommonOptions {
  studiesFile: string;
  roomsFile: string;
  studyPool: number;
  roomPool: number;
}

interface EnrollmentsOptions extends CommonOptions {
  participantsFile: string;
  sessionsFile: string;
  participantPool: number;
  sessionPool: number;
}

interface PaymentsOptions extends CommonOptions {
  enrollmentsFile: string;
  fallbackPool: number;
}

interface ConsentOptions extends CommonOptions {
  withdrawRate: number;
  withdrawalWindowDays: number;
  allowDuplicates?: boolean;
}

interface FileConsentsOptions extends ConsentOptions {
  participantsFile: string;
  consentsFile: string;
}

interface SyntheticConsentsOptions extends ConsentOptions {
  participants: number;
  versions: number;
}

interface ConsentVersionsOptions extends CommonOptions {
  studiesFile: string;
  studyPool: number;
}

interface StudyResearchersOptions extends CommonOptions {
  studiesFile: string;
  researchersFile: string;
  studyPool: number;
  researcherPool: number;
  piPerStudy: number;
  raMin: number;
  raMax: number;
}

interface DatasetOptions {
  dir: string;
  json?: boolean;
  seed: number;
  referenceDate?: string;
  config?: string;
  participants: number;
  studies: number;
  rooms: number;
  researchers: number;
  consentVersions: number;
  studyResearchers: number;
  sessions: number;
  enrollments: number;
  payments: number;
  consents: number;
}

// --- Argument parsers ---

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function parsePositive(value: string): number {
  const n = parseCount(value);
  if (n === 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

export function parseSeed(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected an integer seed.");
  }
  const n = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(n)) {
    throw new InvalidArgumentError("Seed is too large.");
  }
  return n;
}

export function parseRate(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError("Expected a number between 0 and 1.");
  }
  return n;
}

export function parseReferenceDate(value: string): string {
  try {
    createClock(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
  return value;
}

// --- Shared plumbing ---

function withRunOptions(cmd: Command): Command {
  return cmd
    .option("--json", "write JSON instead of CSV")
    .option("--seed <n>", "random seed", parseSeed, 1337)
    .option("--reference-date <YYYY-MM-DD>", "date every timestamp is computed against", parseReferenceDate)
    .option("--config <path>", "YAML configuration file");
}

function withCommonOptions(cmd: Command, defaultCount: number, defaultFile: string): Command {
  return withRunOptions(
    cmd
      .option("-n, --n <count>", `rows to generate (default: ${defaultCount})`, parseCount, defaultCount)
      .option("-o, --outfile <path>", "output path (.json selects JSON)", defaultFile)
  );
}

function contextFor(opts: { seed: number; referenceDate?: string; config?: string }): GeneratorContext {
  const base = opts.config ? loadConfig(opts.config) : DEFAULT_CONFIG;
  const config = opts.referenceDate ? { ...base, referenceDate: opts.referenceDate } : base;
  return createContext(opts.seed, config);
}

/** Candidate paths, the explicit one first, without repeats. */
function candidates(file: string, ...alternates: string[]): string[] {
  return [...new Set([file, ...alternates])];
}

function reportPool(log: Log, entity: string, pool: IdPool | Sourced<unknown>): void {
  const size = "ids" in pool ? pool.ids.length : pool.items.length;
  if (pool.source === "file") {
    log(`Loaded ${size} ${entity} from ${pool.path ?? "file"}`);
  } else {
    log(`No usable ${entity} file; synthesized ${size} ${entity}`);
  }
}

/**
 * Generation never yields, so a pending interrupt is only seen here. Let the
 * event loop deliver it, then stop if it arrived.
 */
async function checkpoint(signal: AbortSignal | undefined): Promise<void> {
  await setImmediate();
  if (signal?.aborted) throw new InterruptedError();
}

async function writeAndReport<T extends object>(
  log: Log,
  signal: AbortSignal | undefined,
  opts: CommonOptions,
  layout: TableLayout<T>,
  rows: readonly T[],
  requested?: number
): Promise<void> {
  await checkpoint(signal);
  const target = resolveOutput(opts.outfile, opts.json);
  writeRows(target, layout, rows);
  const short = requested !== undefined && rows.length < requested ? ` (requested ${requested})` : "";
  log(`Wrote ${rows.length} ${layout.entity} to ${target.format.toUpperCase()}: ${target.path}${short}`);
}

function withConsentOptions(cmd: Command): Command {
  return cmd
    .option("--withdraw-rate <p>", "probability a signature is withdrawn", parseRate, DEFAULT_WITHDRAW_RATE)
    .option(
      "--withdrawal-window-days <days>",
      "latest withdrawal, in days after signing",
      parsePositive,
      DEFAULT_WITHDRAWAL_WINDOW_DAYS
    )
    .option("--allow-duplicates", "allow several rows per (participant, consent version)");
}

// --- Program ---

export function buildProgram(options: ProgramOptions = {}): Command {
  const log = options.log ?? console.log;
  const { signal } = options;
  const program = new Command();
  if (options.exitOverride) {
    program.exitOverride().configureOutput({ writeOut: log, writeErr: log });
  }

  program
    .name("participant-fixtures")
    .description("Generate fixture data for research participant management");

  withCommonOptions(
    program.command("participants").description("generate participants"),
    60,
    PARTICIPANT_LAYOUT.defaultFile
  ).action(async (opts: CommonOptions) => {
    const ctx = contextFor(opts);
    await writeAndReport(log, signal, opts, PARTICIPANT_LAYOUT, generateParticipants(ctx, { count: opts.n }));
  });

  withCommonOptions(
    program.command("studies").description("generate studies"),
    40,
    STUDY_LAYOUT.defaultFile
  ).action(async (opts: CommonOptions) => {
    const ctx = contextFor(opts);
    await writeAndReport(log, signal, opts, STUDY_LAYOUT, generateStudies(ctx, { count: opts.n }));
  });

  withCommonOptions(
    program.command("rooms").description("generate rooms"),
    200,
    ROOM_LAYOUT.defaultFile
  ).action(async (opts: CommonOptions) => {
    const ctx = contextFor(opts);
    await writeAndReport(log, signal, opts, ROOM_LAYOUT, generateRooms(ctx, { count: opts.n }));
  });

  withCommonOptions(
    program.command("researchers").description("generate researchers"),
    120,
    RESEARCHER_LAYOUT.defaultFile
  ).action(async (opts: CommonOptions) => {
    const ctx = contextFor(opts);
    await writeAndReport(log, signal, opts, RESEARCHER_LAYOUT, generateResearchers(ctx, { count: opts.n }));
  });

  withCommonOptions(
    program
      .command("consent-versions")
      .description("generate consent version chains per study")
      .option("--studies-file <path>", "studies CSV/JSON", "studies.csv")
      .option("--study-pool <size>", "synthetic study pool size", parsePositive, 100),
    300,
    CONSENT_VERSION_LAYOUT.defaultFile
  ).action(async (opts: ConsentVersionsOptions) => {
    const ctx = contextFor(opts);
    const studies = await loadIdPool(ctx.random, {
      entity: "study",
      paths: candidates(opts.studiesFile, "studies.csv", "study.csv"),
      fallbackSize: opts.studyPool,
    });
    reportPool(log, "studies", studies);
    const rows = generateConsentVersions(ctx, { count: opts.n, studyIds: studies.ids });
    await writeAndReport(log, signal, opts, CONSENT_VERSION_LAYOUT, rows, opts.n);
  });

  withCommonOptions(
    program
      .command("study-researchers")
      .description("assign researchers to studies")
      .option("--studies-file <path>", "studies CSV/JSON", "studies.csv")
      .option("--researchers-file <path>", "researchers CSV/JSON", RESEARCHER_LAYOUT.defaultFile)
      .option("--study-pool <size>", "synthetic study pool size", parsePositive, FALLBACK_STUDIES)
      .option("--researcher-pool <size>", "synthetic researcher pool size", parsePositive, FALLBACK_RESEARCHERS)
      .option("--pi-per-study <count>", "PIs per study", parseCount, 1)
      .option("--ra-min <count>", "fewest RAs per study", parseCount, 1)
      .option("--ra-max <count>", "most RAs per study", parseCount, 3),
    0,
    STUDY_RESEARCHER_LAYOUT.defaultFile
  ).action(async (opts: StudyResearchersOptions) => {
    const ctx = contextFor(opts);
    const studies = await loadIdPool(ctx.random, {
      entity: "study",
      paths: candidates(opts.studiesFile, "studies.csv", "study.csv"),
      fallbackSize: opts.studyPool,
    });
    reportPool(log, "studies", studies);
    const researchers = await loadIdPool(ctx.random, {
      entity: "researcher",
      paths: [opts.researchersFile],
      fallbackSize: opts.researcherPool,
    });
    reportPool(log, "researchers", researchers);
    const result = generateStudyResearchers(ctx, {
      count: opts.n,
      studyIds: studies.ids,
      researcherIds: researchers.ids,
      piPerStudy: opts.piPerStudy,
      raMin: opts.raMin,
      raMax: opts.raMax,
    });
    await writeAndReport(log, signal, opts, STUDY_RESEARCHER_LAYOUT, result.rows, result.requested);
  });

  withCommonOptions(
    program
      .command("sessions")
      .description("schedule sessions of studies in rooms")
      .option("--studies-file <path>", "studies CSV/JSON", "studies.csv")
      .option("--rooms-file <path>", "rooms CSV/JSON", ROOM_LAYOUT.defaultFile)
      .option("--study-pool <size>", "synthetic study pool size", parsePositive, 200)
      .option("--room-pool <size>", "synthetic room pool size", parsePositive, 80),
    500,
    SESSION_LAYOUT.defaultFile
  ).action(async (opts: SessionsOptions) => {
    const ctx = contextFor(opts);
    const studies = await loadIdPool(ctx.random, {
      entity: "study",
      paths: candidates(opts.studiesFile, "studies.csv", "study.csv"),
      fallbackSize: opts.studyPool,
    });
    reportPool(log, "studies", studies);
    const rooms = await loadRooms(ctx, [opts.roomsFile], opts.roomPool);
    reportPool(log, "rooms", rooms);
    const result = generateSessions(ctx, { count: opts.n, studyIds: studies.ids, rooms: rooms.items });
    if (result.conflicts > 0) {
      log(`Accepted ${result.conflicts} overlapping sessions after exhausting slot attempts`);
    }
    await writeAndReport(log, signal, opts, SESSION_LAYOUT, result.rows, opts.n);
  });

  withCommonOptions(
    program
      .command("enrollments")
      .description("enroll participants in sessions")
      .option("--participants-file <path>", "participants CSV/JSON", PARTICIPANT_LAYOUT.defaultFile)
      .option("--sessions-file <path>", "sessions CSV/JSON", SESSION_LAYOUT.defaultFile)
      .option("--participant-pool <size>", "synthetic participant pool size", parsePositive, FALLBACK_PARTICIPANTS)
      .option("--session-pool <size>", "synthetic session pool size", parsePositive, FALLBACK_SESSIONS),
    1000,
    ENROLLMENT_LAYOUT.defaultFile
  ).action(async (opts: EnrollmentsOptions) => {
    const ctx = contextFor(opts);
    const participants = await loadIdPool(ctx.random, {
      entity: "participant",
      paths: [opts.participantsFile],
      fallbackSize: opts.participantPool,
    });
    reportPool(log, "participants", participants);
    const sessions = await loadSessions(ctx, [opts.sessionsFile], opts.sessionPool);
    reportPool(log, "sessions", sessions);
    const result = generateEnrollments(ctx, {
      count: opts.n,
      participantIds: participants.ids,
      sessions: sessions.items,
    });
    await writeAndReport(log, signal, opts, ENROLLMENT_LAYOUT, result.rows, result.requested);
  });

  withCommonOptions(
    program
      .command("payments")
      .description("derive payments from enrollments")
      .option("--enrollments-file <path>", "enrollments CSV/JSON", ENROLLMENT_LAYOUT.defaultFile)
      .option("--fallback-pool <size>", "synthetic enrollment pool size", parsePositive, 2000),
    1000,
    PAYMENT_LAYOUT.defaultFile
  ).action(async (opts: PaymentsOptions) => {
    const ctx = contextFor(opts);
    const enrollments = await loadEnrollments(ctx, [opts.enrollmentsFile], opts.fallbackPool);
    reportPool(log, "enrollments", enrollments);
    const result = generatePayments(ctx, { count: opts.n, enrollments: enrollments.items });
    await writeAndReport(log, signal, opts, PAYMENT_LAYOUT, result.rows, result.requested);
  });

  withConsentOptions(
    withCommonOptions(
      program
        .command("consents")
        .description("sign participants to consent versions read from files")
        .option("--participants-file <path>", "participants CSV/JSON (required)", PARTICIPANT_LAYOUT.defaultFile)
        .option("--consents-file <path>", "consent versions CSV/JSON (required)", CONSENT_VERSION_LAYOUT.defaultFile),
      1000,
      CONSENT_LAYOUT.defaultFile
    )
  ).action(async (opts: FileConsentsOptions) => {
    const ctx = contextFor(opts);
    const participants = await loadIdPool(ctx.random, {
      entity: "participant",
      paths: [opts.participantsFile],
      fallbackSize: 0,
      required: true,
    });
    reportPool(log, "participants", participants);
    const versions = await loadConsentVersions(opts.consentsFile, ctx.clock);
    reportPool(log, "signable consent versions", versions);
    const result = generateConsents(ctx, {
      count: opts.n,
      participantIds: participants.ids,
      versions: versions.items,
      withdrawRate: opts.withdrawRate,
      withdrawalWindowDays: opts.withdrawalWindowDays,
      allowDuplicates: opts.allowDuplicates,
    });
    await writeAndReport(log, signal, opts, CONSENT_LAYOUT, result.rows, result.requested);
  });

  withConsentOptions(
    withCommonOptions(
      program
        .command("consents-synthetic")
        .description("sign synthetic participants to synthetic consent versions")
        .option("--participants <size>", "participant pool size", parsePositive, 500)
        .option("--versions <size>", "consent version pool size", parsePositive, 300),
      1000,
      CONSENT_LAYOUT.defaultFile
    )
  ).action(async (opts: SyntheticConsentsOptions) => {
    const ctx = contextFor(opts);
    const result = generateSyntheticConsents(ctx, {
      count: opts.n,
      participantPool: opts.participants,
      versionPool: opts.versions,
      withdrawRate: opts.withdrawRate,
      withdrawalWindowDays: opts.withdrawalWindowDays,
      allowDuplicates: opts.allowDuplicates,
    });
    await writeAndReport(log, signal, opts, CONSENT_LAYOUT, result.rows, result.requested);
  });

  const sizes = DEFAULT_DATASET_SIZES;
  withRunOptions(
    program
      .command("dataset")
      .description("generate every table, linked, into one directory")
      .option("-d, --dir <path>", "output directory", ".")
      .option("--participants <count>", "participants", parseCount, sizes.participants)
      .option("--studies <count>", "studies", parseCount, sizes.studies)
      .option("--rooms <count>", "rooms", parseCount, sizes.rooms)
      .option("--researchers <count>", "researchers", parseCount, sizes.researchers)
      .option("--consent-versions <count>", "consent versions", parseCount, sizes.consentVersions)
      .option("--study-researchers <count>", "study researchers (0 = baseline)", parseCount, sizes.studyResearchers)
      .option("--sessions <count>", "sessions", parseCount, sizes.sessions)
      .option("--enrollments <count>", "enrollments", parseCount, sizes.enrollments)
      .option("--payments <count>", "payments", parseCount, sizes.payments)
      .option("--consents <count>", "participant consents", parseCount, sizes.consents)
  ).action(async (opts: DatasetOptions) => {
    const ctx = contextFor(opts);
    const dataset = generateDataset(ctx, {
      participants: opts.participants,
      studies: opts.studies,
      rooms: opts.rooms,
      researchers: opts.researchers,
      consentVersions: opts.consentVersions,
      studyResearchers: opts.studyResearchers,
      sessions: opts.sessions,
      enrollments: opts.enrollments,
      payments: opts.payments,
      consents: opts.consents,
    });
    await checkpoint(signal);
    for (const table of writeDataset(dataset, opts.dir, opts.json)) {
      log(`Wrote ${table.rows} ${table.entity} to ${table.target.format.toUpperCase()}: ${table.target.path}`);
    }
  });

  return program;
}
