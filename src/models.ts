import type { CourseStatus, IntakeStatus, RemovalReason } from "../core/compliance_engine/index.js";

export type { CourseStatus, IntakeStatus, RemovalReason };

export type Clock = () => Date;

// MessageRef addresses one delivered message so it can be edited later.
export type MessageRef = {
  chat_id: string;
  message_id: number;
};

// Participant is the person under supervision; the thread is their collaboration space.
export type Participant = {
  id: number;
  name: string;
  chat_id: string;
  thread_id: string | null;
  reviewer_id: number | null;
  created_at: string;
};

export type Reviewer = {
  id: number;
  name: string;
  chat_id: string;
};

// Course is one enrollment; at most one per participant is open at a time.
export type Course = {
  id: number;
  participant_id: number;
  status: CourseStatus;
  invite_code: string | null;
  invite_used: boolean;
  current_day: number;
  total_days: number;
  extended: boolean;
  scheduled_time: string | null;
  start_date: string | null;
  late_count: number;
  late_dates: string[];
  appeal_count: number;
  appeal_media: string | null;
  appeal_text: string | null;
  appeal_deadline: string | null;
  appeal_review_deadline: string | null;
  removal_reason: RemovalReason | null;
  registration_message: MessageRef | null;
  created_at: string;
  updated_at: string;
};

// IntakeLog is unique per (course_id, day) and is never deleted by normal operation.
export type IntakeLog = {
  id: number;
  course_id: number;
  day: number;
  status: IntakeStatus;
  scheduled_at: string;
  taken_at: string | null;
  delay_minutes: number;
  media_ref: string | null;
  confidence: number | null;
  verified_by: string | null;
  review_started_at: string | null;
  reshoot_deadline: string | null;
  participant_message: MessageRef | null;
  created_at: string;
};

export type CoursePatch = Partial<Omit<Course, "id" | "participant_id" | "created_at" | "updated_at">>;

export type IntakeLogPatch = Partial<Omit<IntakeLog, "id" | "course_id" | "day" | "created_at">>;

export type NewCourse = {
  participant_id: number;
  total_days: number;
  invite_code: string | null;
};

export type NewIntakeLog = {
  course_id: number;
  day: number;
  status: IntakeStatus;
  scheduled_at: string;
  taken_at: string | null;
  delay_minutes: number;
  media_ref: string | null;
  confidence: number | null;
  verified_by: string | null;
  review_started_at: string | null;
};

export type NewParticipant = {
  name: string;
  chat_id: string;
  thread_id: string | null;
  reviewer_id: number | null;
};

export type NewReviewer = {
  name: string;
  chat_id: string;
};
