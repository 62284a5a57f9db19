export type ParticipantStatus = "active" | "paused" | "ineligible" | "banned";

export type EnrollmentStatus =
  | "enrolled"
  | "waitlisted"
  | "cancelled"
  | "attended"
  | "no_show";

export const ENROLLMENT_STATUSES: readonly EnrollmentStatus[] = [
  "enrolled", "waitlisted", "cancelled", "attended", "no_show",
];

/** Statuses that consume one of a session's seats. */
export const SEAT_HOLDING_STATUSES: ReadonlySet<EnrollmentStatus> = new Set<EnrollmentStatus>([
  "enrolled", "attended", "no_show",
]);

export type PaymentStatus =
  | "paid"
  | "pending"
  | "failed"
  | "refunded"
  | "waived"
  | "void";

export type PaymentMethod =
  | "gift_card"
  | "cash"
  | "credit_card"
  | "paypal"
  | "venmo"
  | "none";

export type ResearcherRole = "PI" | "coordinator" | "RA";

export interface ParticipantRow {
  participant_id: string;
  first_name: string;
  last_name: string;
  email: string;
  phone: string;
  date_of_birth: string;
  age: number;
  gender: string;
  ethnicity: string;
  major: string;
  class_year: number;
  gpa: number;
  status: ParticipantStatus;
  bio: string;
  created_at: string;
  updated_at: string;
}

export interface StudyRow {
  study_id: string;
  title: string;
  description: string;
  minAge: number;
  maxAge: number;
  minGPA: number;
  cooldownDays: number;
  active: boolean;
  created_at: string;
  updated_at: string;
}

export interface RoomRow {
  name: string;
  building: string;
  capacity: number;
}

export interface ResearcherRow {
  researcher_id: string;
  first_name: string;
  last_name: string;
  email: string;
  department: string;
  title: string;
  created_at: string;
}

export interface ConsentVersionRow {
  consent_version_id: string;
  study_id: string;
  version: string;
  title: string;
  effectiveFrom: string;
  /** null while the version is still current. */
  effectiveTo: string | null;
}

export interface SessionRow {
  session_id: string;
  study_id: string;
  room_id: string;
  startTs: string;
  endTs: string;
  capacity: number;
}

export interface EnrollmentRow {
  participant_id: string;
  session_id: string;
  status: EnrollmentStatus;
  created_at: string;
  updated_at: string;
}

export interface PaymentRow {
  participant_id: string;
  session_id: string;
  amount: number;
  method: PaymentMethod;
  status: PaymentStatus;
}

export interface ParticipantConsentRow {
  participant_consent_id: string;
  participant_id: string;
  consent_version_id: string;
  signedAt: string;
  withdrawnAt: string | null;
}

export interface StudyResearcherRow {
  study_id: string;
  researcher_id: string;
  role: ResearcherRole;
}

/**
 * Output layout of one generated table: the default file name and the
 * fixed column order used for CSV (and the key order for JSON).
 */
export interface TableLayout<T> {
  entity: string;
  defaultFile: string;
  columns: readonly (keyof T & string)[];
}
