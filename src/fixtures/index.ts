export type {
  ParticipantRow,
  StudyRow,
  RoomRow,
  ResearcherRow,
  ConsentVersionRow,
  SessionRow,
  EnrollmentRow,
  PaymentRow,
  ParticipantConsentRow,
  StudyResearcherRow,
  ParticipantStatus,
  EnrollmentStatus,
  PaymentStatus,
  PaymentMethod,
  ResearcherRole,
  TableLayout,
} from "./types.js";
export { ENROLLMENT_STATUSES, SEAT_HOLDING_STATUSES } from "./types.js";

export {
  FixtureError,
  MissingInputError,
  ShortfallError,
  ScheduleConflictError,
  InvalidOptionsError,
  ConfigError,
  InterruptedError,
} from "./errors.js";
export type { FixtureErrorCode } from "./errors.js";
export type { ValidationError } from "./validate.js";

export { Random, weightedChoice, weighted, randomUuid, stableUuid } from "./random.js";
export type { WeightedOutcome } from "./random.js";
export { createClock, parseTimestamp, formatTimestamp, formatDate, randomBetween } from "./time.js";
export type { ReferenceClock } from "./time.js";

export {
  DEFAULT_CONFIG,
  resolveConfig,
  parseConfig,
  loadConfig,
  createContext,
} from "./config.js";
export type { FixtureConfig, GeneratorContext, PairingPolicy, SchedulingPolicy } from "./config.js";

export { resolveOutput, toCsv, toJson, writeRows, readRecords } from "./io.js";
export type { OutputFormat, OutputTarget, InputRecord } from "./io.js";
export { COLUMN_ALIASES, loadIdPool, resolveColumn } from "./pools.js";
export type { IdPool, PoolEntity } from "./pools.js";
export { pairUnique, pairKey } from "./pairing.js";
export { RoomSchedule, overlaps } from "./schedule.js";
export type { Interval } from "./schedule.js";
export { loadRooms, loadSessions, loadEnrollments, loadConsentVersions } from "./inputs.js";
export type { Sourced } from "./inputs.js";

export { generateParticipants, PARTICIPANT_LAYOUT } from "./generators/participants.js";
export { generateStudies, STUDY_LAYOUT } from "./generators/studies.js";
export { generateRooms, roomIdFor, ROOM_LAYOUT } from "./generators/rooms.js";
export type { RoomRef } from "./generators/rooms.js";
export { generateResearchers, RESEARCHER_LAYOUT } from "./generators/researchers.js";
export { generateConsentVersions, CONSENT_VERSION_LAYOUT } from "./generators/consent-versions.js";
export { generateStudyResearchers, STUDY_RESEARCHER_LAYOUT } from "./generators/study-researchers.js";
export { generateSessions, sessionIdFor, SESSION_LAYOUT } from "./generators/sessions.js";
export type { SessionRef } from "./generators/sessions.js";
export { generateEnrollments, SeatLedger, ENROLLMENT_LAYOUT } from "./generators/enrollments.js";
export { generatePayments, PAYMENT_LAYOUT } from "./generators/payments.js";
export type { EnrollmentRef } from "./generators/payments.js";
export { generateConsents, generateSyntheticConsents, CONSENT_LAYOUT } from "./generators/consents.js";
export type { ConsentWindow } from "./generators/consents.js";

export { generateDataset, writeDataset, DEFAULT_DATASET_SIZES } from "./dataset.js";
export type { Dataset, DatasetSizes, WrittenTable } from "./dataset.js";
