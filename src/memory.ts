import {
  ENDED_STATUSES,
  minuteInRange,
  OPEN_STATUSES,
  parseTimeOfDay,
  type MinuteRange,
} from "../core/compliance_engine/index.js";
import type {
  Clock,
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
import type {
  CourseRepository,
  DashboardRepository,
  IntakeLogRepository,
  ParticipantRepository,
  Store,
} from "./store.js";

const copy = <T>(value: T): T => structuredClone(value);

const isBefore = (iso: string | null, instant: Date): boolean => iso !== null && Date.parse(iso) < instant.getTime();

class MemoryCourseRepository implements CourseRepository {
  private readonly rows = new Map<number, Course>();
  private nextId = 1;

  constructor(private readonly clock: Clock) {}

  async get(id: number): Promise<Course | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async findOpenByParticipant(participantId: number): Promise<Course | null> {
    const row = [...this.rows.values()].find(
      (course) => course.participant_id === participantId && OPEN_STATUSES.includes(course.status),
    );
    return row ? copy(row) : null;
  }

  async findLatestByParticipant(participantId: number): Promise<Course | null> {
    const rows = [...this.rows.values()].filter((course) => course.participant_id === participantId);
    const latest = rows.sort((a, b) => b.id - a.id)[0];
    return latest ? copy(latest) : null;
  }

  async create(input: NewCourse): Promise<Course | null> {
    if (await this.findOpenByParticipant(input.participant_id)) {
      return null;
    }
    const now = this.clock().toISOString();
    const course: Course = {
      id: this.nextId++,
      participant_id: input.participant_id,
      status: "setup",
      invite_code: input.invite_code,
      invite_used: false,
      current_day: 0,
      total_days: input.total_days,
      extended: false,
      scheduled_time: null,
      start_date: null,
      late_count: 0,
      late_dates: [],
      appeal_count: 0,
      appeal_media: null,
      appeal_text: null,
      appeal_deadline: null,
      appeal_review_deadline: null,
      removal_reason: null,
      registration_message: null,
      created_at: now,
      updated_at: now,
    };
    this.rows.set(course.id, course);
    return copy(course);
  }

  async update(id: number, patch: CoursePatch): Promise<void> {
    const row = this.rows.get(id);
    if (row) {
      this.rows.set(id, { ...row, ...copy(patch), updated_at: this.clock().toISOString() });
    }
  }

  async updateIfStatus(id: number, patch: CoursePatch, expected: CourseStatus): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.status !== expected) {
      return false;
    }
    await this.update(id, patch);
    return true;
  }

  async deleteIfStatus(id: number, expected: CourseStatus): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.status !== expected) {
      return false;
    }
    return this.rows.delete(id);
  }

  async listByStatus(statuses: readonly CourseStatus[]): Promise<Course[]> {
    return this.select((course) => statuses.includes(course.status));
  }

  async listByScheduledTime(statuses: readonly CourseStatus[], range: MinuteRange): Promise<Course[]> {
    return this.select(
      (course) =>
        statuses.includes(course.status) &&
        course.scheduled_time !== null &&
        minuteInRange(parseTimeOfDay(course.scheduled_time), range),
    );
  }

  async listAbandonedSetups(createdBefore: Date): Promise<Course[]> {
    return this.select(
      (course) => course.status === "setup" && !course.invite_used && isBefore(course.created_at, createdBefore),
    );
  }

  async listRefusedWithAppealDeadlineBefore(instant: Date): Promise<Course[]> {
    return this.select((course) => course.status === "refused" && isBefore(course.appeal_deadline, instant));
  }

  async listAppealsWithReviewDeadlineBefore(instant: Date): Promise<Course[]> {
    return this.select((course) => course.status === "appeal" && isBefore(course.appeal_review_deadline, instant));
  }

  async listEndedBefore(instant: Date): Promise<Course[]> {
    return this.select((course) => ENDED_STATUSES.includes(course.status) && isBefore(course.updated_at, instant));
  }

  private select(predicate: (course: Course) => boolean): Course[] {
    return [...this.rows.values()].filter(predicate).map(copy);
  }
}

class MemoryIntakeLogRepository implements IntakeLogRepository {
  private readonly rows = new Map<number, IntakeLog>();
  private nextId = 1;

  constructor(private readonly clock: Clock) {}

  async get(id: number): Promise<IntakeLog | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async findByCourseAndDay(courseId: number, day: number): Promise<IntakeLog | null> {
    const row = [...this.rows.values()].find((log) => log.course_id === courseId && log.day === day);
    return row ? copy(row) : null;
  }

  async findByCourseAndStatus(courseId: number, status: IntakeStatus): Promise<IntakeLog | null> {
    const row = [...this.rows.values()].find((log) => log.course_id === courseId && log.status === status);
    return row ? copy(row) : null;
  }

  async create(input: NewIntakeLog): Promise<IntakeLog | null> {
    if (await this.findByCourseAndDay(input.course_id, input.day)) {
      return null;
    }
    const log: IntakeLog = {
      ...input,
      id: this.nextId++,
      reshoot_deadline: null,
      participant_message: null,
      created_at: this.clock().toISOString(),
    };
    this.rows.set(log.id, log);
    return copy(log);
  }

  async update(id: number, patch: IntakeLogPatch): Promise<void> {
    const row = this.rows.get(id);
    if (row) {
      this.rows.set(id, { ...row, ...copy(patch) });
    }
  }

  async updateIfStatus(id: number, patch: IntakeLogPatch, expected: IntakeStatus): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.status !== expected) {
      return false;
    }
    await this.update(id, patch);
    return true;
  }

  async listByStatus(status: IntakeStatus): Promise<IntakeLog[]> {
    return [...this.rows.values()].filter((log) => log.status === status).map(copy);
  }

  async listReshootsExpiredBefore(instant: Date): Promise<IntakeLog[]> {
    return [...this.rows.values()]
      .filter((log) => log.status === "reshoot" && isBefore(log.reshoot_deadline, instant))
      .map(copy);
  }

  async countTakenBetween(from: Date, to: Date): Promise<number> {
    return [...this.rows.values()].filter((log) => {
      if (log.status !== "taken" || log.taken_at === null) return false;
      const takenAt = Date.parse(log.taken_at);
      return takenAt >= from.getTime() && takenAt < to.getTime();
    }).length;
  }
}

class MemoryParticipantRepository implements ParticipantRepository {
  private readonly participants = new Map<number, Participant>();
  private readonly reviewers = new Map<number, Reviewer>();
  private nextParticipantId = 1;
  private nextReviewerId = 1;

  constructor(private readonly clock: Clock) {}

  async get(id: number): Promise<Participant | null> {
    const row = this.participants.get(id);
    return row ? copy(row) : null;
  }

  async findByChatId(chatId: string): Promise<Participant | null> {
    const row = [...this.participants.values()].find((participant) => participant.chat_id === chatId);
    return row ? copy(row) : null;
  }

  async create(input: NewParticipant): Promise<Participant> {
    const participant: Participant = {
      ...input,
      id: this.nextParticipantId++,
      created_at: this.clock().toISOString(),
    };
    this.participants.set(participant.id, participant);
    return copy(participant);
  }

  async clearThread(id: number): Promise<void> {
    const row = this.participants.get(id);
    if (row) {
      this.participants.set(id, { ...row, thread_id: null });
    }
  }

  async getReviewer(id: number): Promise<Reviewer | null> {
    const row = this.reviewers.get(id);
    return row ? copy(row) : null;
  }

  async findReviewerByChatId(chatId: string): Promise<Reviewer | null> {
    const row = [...this.reviewers.values()].find((reviewer) => reviewer.chat_id === chatId);
    return row ? copy(row) : null;
  }

  async createReviewer(input: NewReviewer): Promise<Reviewer> {
    const reviewer: Reviewer = { ...input, id: this.nextReviewerId++ };
    this.reviewers.set(reviewer.id, reviewer);
    return copy(reviewer);
  }
}

class MemoryDashboardRepository implements DashboardRepository {
  private readonly messages = new Map<string, MessageRef>();

  async getMessage(key: string): Promise<MessageRef | null> {
    const ref = this.messages.get(key);
    return ref ? copy(ref) : null;
  }

  async saveMessage(key: string, ref: MessageRef): Promise<void> {
    this.messages.set(key, copy(ref));
  }
}

// In-process store: the development mode without DATABASE_URL, and the store behind every test.
export class MemoryStore implements Store {
  readonly courses: MemoryCourseRepository;
  readonly intakeLogs: MemoryIntakeLogRepository;
  readonly participants: MemoryParticipantRepository;
  readonly dashboards = new MemoryDashboardRepository();

  constructor(clock: Clock = () => new Date()) {
    this.courses = new MemoryCourseRepository(clock);
    this.intakeLogs = new MemoryIntakeLogRepository(clock);
    this.participants = new MemoryParticipantRepository(clock);
  }

  async close(): Promise<void> {}
}
