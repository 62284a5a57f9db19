import * as path from "node:path";
import type { GeneratorContext } from "./config.js";
import { resolveOutput, writeRows, type OutputTarget } from "./io.js";
import { checkCounts, throwIfInvalid, type ValidationError } from "./validate.js";
import { CONSENT_VERSION_LAYOUT, generateConsentVersions } from "./generators/consent-versions.js";
import { CONSENT_LAYOUT, consentWindowFromRow, generateConsents } from "./generators/consents.js";
import { ENROLLMENT_LAYOUT, generateEnrollments } from "./generators/enrollments.js";
import { PARTICIPANT_LAYOUT, generateParticipants } from "./generators/participants.js";
import { PAYMENT_LAYOUT, enrollmentRefFromRow, generatePayments } from "./generators/payments.js";
import { RESEARCHER_LAYOUT, generateResearchers } from "./generators/researchers.js";
import { ROOM_LAYOUT, generateRooms, roomRefFromRow } from "./generators/rooms.js";
import { SESSION_LAYOUT, generateSessions, sessionRefFromRow } from "./generators/sessions.js";
import { STUDY_LAYOUT, generateStudies } from "./generators/studies.js";
import { STUDY_RESEARCHER_LAYOUT, generateStudyResearchers } from "./generators/study-researchers.js";
import type {
  ConsentVersionRow,
  EnrollmentRow,
  ParticipantConsentRow,
  ParticipantRow,
  PaymentRow,
  ResearcherRow,
  RoomRow,
  SessionRow,
  StudyResearcherRow,
  StudyRow,
  TableLayout,
} from "./types.js";

export interface DatasetSizes {
  participants: number;
  studies: number;
  rooms: number;
  researchers: number;
  consentVersions: number;
  /** 0 keeps the per-study baseline. */
  studyResearchers: number;
  sessions: number;
  enrollments: number;
  payments: number;
  consents: number;
}

export const DEFAULT_DATASET_SIZES: DatasetSizes = {
  participants: 60,
  studies: 40,
  rooms: 200,
  researchers: 120,
  consentVersions: 300,
  studyResearchers: 0,
  sessions: 500,
  enrollments: 1000,
  payments: 1000,
  consents: 1000,
};

export interface Dataset {
  participants: ParticipantRow[];
  studies: StudyRow[];
  rooms: RoomRow[];
  researchers: ResearcherRow[];
  consentVersions: ConsentVersionRow[];
  studyResearchers: StudyResearcherRow[];
  sessions: SessionRow[];
  enrollments: EnrollmentRow[];
  payments: PaymentRow[];
  consents: ParticipantConsentRow[];
}

/**
 * Run every generator in dependency order, feeding each one the rows produced
 * upstream so every foreign key resolves within the dataset.
 */
export function generateDataset(
  ctx: GeneratorContext,
  sizes: Partial<DatasetSizes> = {}
): Dataset {
  const n: DatasetSizes = { ...DEFAULT_DATASET_SIZES, ...sizes };
  const errors: ValidationError[] = [];
  checkCounts({ ...n }, errors);
  throwIfInvalid(errors);

  const rooms = generateRooms(ctx, { count: n.rooms });
  const studies = generateStudies(ctx, { count: n.studies });
  const participants = generateParticipants(ctx, { count: n.participants });
  const researchers = generateResearchers(ctx, { count: n.researchers });

  const studyIds = studies.map((s) => s.study_id);
  const consentVersions = generateConsentVersions(ctx, {
    count: n.consentVersions,
    studyIds,
  });
  const studyResearchers =
    researchers.length > 0
      ? generateStudyResearchers(ctx, {
          count: n.studyResearchers,
          studyIds,
          researcherIds: researchers.map((r) => r.researcher_id),
        }).rows
      : [];

  const canSchedule = studies.length > 0 && rooms.length > 0;
  const sessions = canSchedule
    ? generateSessions(ctx, {
        count: n.sessions,
        studyIds,
        rooms: rooms.map(roomRefFromRow),
      }).rows
    : [];

  const participantIds = participants.map((p) => p.participant_id);
  const enrollments =
    participantIds.length > 0 && sessions.length > 0
      ? generateEnrollments(ctx, {
          count: n.enrollments,
          participantIds,
          sessions: sessions.map(sessionRefFromRow),
        }).rows
      : [];

  const payments =
    enrollments.length > 0
      ? generatePayments(ctx, {
          count: n.payments,
          enrollments: enrollments.map(enrollmentRefFromRow),
        }).rows
      : [];

  const consents = generateConsents(ctx, {
    count: n.consents,
    participantIds,
    versions: consentVersions.map(consentWindowFromRow),
  }).rows;

  return {
    participants,
    studies,
    rooms,
    researchers,
    consentVersions,
    studyResearchers,
    sessions,
    enrollments,
    payments,
    consents,
  };
}

export interface WrittenTable {
  entity: string;
  rows: number;
  target: OutputTarget;
}

function writeTable<T extends object>(
  dir: string,
  json: boolean,
  layout: TableLayout<T>,
  rows: readonly T[]
): WrittenTable {
  const target = resolveOutput(path.join(dir, layout.defaultFile), json);
  writeRows(target, layout, rows);
  return { entity: layout.entity, rows: rows.length, target };
}

/** Write each table under its default file name into `dir`. */
export function writeDataset(dataset: Dataset, dir: string, json = false): WrittenTable[] {
  return [
    writeTable(dir, json, ROOM_LAYOUT, dataset.rooms),
    writeTable(dir, json, STUDY_LAYOUT, dataset.studies),
    writeTable(dir, json, PARTICIPANT_LAYOUT, dataset.participants),
    writeTable(dir, json, RESEARCHER_LAYOUT, dataset.researchers),
    writeTable(dir, json, CONSENT_VERSION_LAYOUT, dataset.consentVersions),
    writeTable(dir, json, STUDY_RESEARCHER_LAYOUT, dataset.studyResearchers),
    writeTable(dir, json, SESSION_LAYOUT, dataset.sessions),
    writeTable(dir, json, ENROLLMENT_LAYOUT, dataset.enrollments),
    writeTable(dir, json, PAYMENT_LAYOUT, dataset.payments),
    writeTable(dir, json, CONSENT_LAYOUT, dataset.consents),
  ];
}
