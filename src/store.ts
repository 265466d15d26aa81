import type { MinuteRange } from "../core/compliance_engine/index.js";
import type {
  Course,
  CoursePatch,
  CourseStatus,
  IntakeLog,
  IntakeLogPatch,
  IntakeStatus,
  MessageRef,
  NewCourse,
  NewIntakeLog,
  NewParticipant,
  NewReviewer,
  Participant,
  Reviewer,
} from "./models.js";

// Every conditional write returns whether it applied; false means another actor got there first.
export interface CourseRepository {
  get(id: number): Promise<Course | null>;
  findOpenByParticipant(participantId: number): Promise<Course | null>;
  findLatestByParticipant(participantId: number): Promise<Course | null>;
  /** Null when the participant already has an open course. */
  create(input: NewCourse): Promise<Course | null>;
  update(id: number, patch: CoursePatch): Promise<void>;
  updateIfStatus(id: number, patch: CoursePatch, expected: CourseStatus): Promise<boolean>;
  deleteIfStatus(id: number, expected: CourseStatus): Promise<boolean>;
  listByStatus(statuses: readonly CourseStatus[]): Promise<Course[]>;
  listByScheduledTime(statuses: readonly CourseStatus[], range: MinuteRange): Promise<Course[]>;
  listAbandonedSetups(createdBefore: Date): Promise<Course[]>;
  listRefusedWithAppealDeadlineBefore(instant: Date): Promise<Course[]>;
  listAppealsWithReviewDeadlineBefore(instant: Date): Promise<Course[]>;
  listEndedBefore(instant: Date): Promise<Course[]>;
}

export interface IntakeLogRepository {
  get(id: number): Promise<IntakeLog | null>;
  findByCourseAndDay(courseId: number, day: number): Promise<IntakeLog | null>;
  findByCourseAndStatus(courseId: number, status: IntakeStatus): Promise<IntakeLog | null>;
  /** Null when a log for the same (course, day) exists. */
  create(input: NewIntakeLog): Promise<IntakeLog | null>;
  update(id: number, patch: IntakeLogPatch): Promise<void>;
  updateIfStatus(id: number, patch: IntakeLogPatch, expected: IntakeStatus): Promise<boolean>;
  listByStatus(status: IntakeStatus): Promise<IntakeLog[]>;
  listReshootsExpiredBefore(instant: Date): Promise<IntakeLog[]>;
  countTakenBetween(from: Date, to: Date): Promise<number>;
}

export interface ParticipantRepository {
  get(id: number): Promise<Participant | null>;
  findByChatId(chatId: string): Promise<Participant | null>;
  create(input: NewParticipant): Promise<Participant>;
  clearThread(id: number): Promise<void>;
  getReviewer(id: number): Promise<Reviewer | null>;
  findReviewerByChatId(chatId: string): Promise<Reviewer | null>;
  createReviewer(input: NewReviewer): Promise<Reviewer>;
}

export interface DashboardRepository {
  getMessage(key: string): Promise<MessageRef | null>;
  saveMessage(key: string, ref: MessageRef): Promise<void>;
}

export interface Store {
  courses: CourseRepository;
  intakeLogs: IntakeLogRepository;
  participants: ParticipantRepository;
  dashboards: DashboardRepository;
  close(): Promise<void>;
}
