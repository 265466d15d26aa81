import { promises as fs } from "node:fs";
import path from "node:path";
import pg from "pg";
import type { Pool } from "pg";
import { z } from "zod";

import {
  COURSE_STATUSES,
  ENDED_STATUSES,
  formatTimeOfDay,
  INTAKE_STATUSES,
  OPEN_STATUSES,
  REMOVAL_REASONS,
  type MinuteRange,
} from "../core/compliance_engine/index.js";
import type { Logger } from "./logger.js";
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
import type {
  CourseRepository,
  DashboardRepository,
  IntakeLogRepository,
  ParticipantRepository,
  Store,
} from "./store.js";

const timestamp = z.union([z.date(), z.string()]).transform((value) => new Date(value).toISOString());
const messageRef = z.object({ chat_id: z.string(), message_id: z.number() });

const courseRow = z.object({
  id: z.number(),
  participant_id: z.number(),
  status: z.enum(COURSE_STATUSES),
  invite_code: z.string().nullable(),
  invite_used: z.boolean(),
  current_day: z.number(),
  total_days: z.number(),
  extended: z.boolean(),
  scheduled_time: z.string().nullable(),
  start_date: z.string().nullable(),
  late_count: z.number(),
  late_dates: z.array(z.string()),
  appeal_count: z.number(),
  appeal_media: z.string().nullable(),
  appeal_text: z.string().nullable(),
  appeal_deadline: timestamp.nullable(),
  appeal_review_deadline: timestamp.nullable(),
  removal_reason: z.enum(REMOVAL_REASONS).nullable(),
  registration_message: messageRef.nullable(),
  created_at: timestamp,
  updated_at: timestamp,
});

const intakeLogRow = z.object({
  id: z.number(),
  course_id: z.number(),
  day: z.number(),
  status: z.enum(INTAKE_STATUSES),
  scheduled_at: timestamp,
  taken_at: timestamp.nullable(),
  delay_minutes: z.number(),
  media_ref: z.string().nullable(),
  confidence: z.number().nullable(),
  verified_by: z.string().nullable(),
  review_started_at: timestamp.nullable(),
  reshoot_deadline: timestamp.nullable(),
  participant_message: messageRef.nullable(),
  created_at: timestamp,
});

const participantRow = z.object({
  id: z.number(),
  name: z.string(),
  chat_id: z.string(),
  thread_id: z.string().nullable(),
  reviewer_id: z.number().nullable(),
  created_at: timestamp,
});

const reviewerRow = z.object({ id: z.number(), name: z.string(), chat_id: z.string() });

// Dates and times come back as text so the process time zone never shifts them.
const COURSE_COLUMNS = `id, participant_id, status, invite_code, invite_used, current_day, total_days, extended,
  to_char(scheduled_time, 'HH24:MI') AS scheduled_time, start_date::text AS start_date, late_count, late_dates,
  appeal_count, appeal_media, appeal_text, appeal_deadline, appeal_review_deadline, removal_reason,
  registration_message, created_at, updated_at`;

const INTAKE_LOG_COLUMNS = `id, course_id, day, status, scheduled_at, taken_at, delay_minutes, media_ref, confidence,
  verified_by, review_started_at, reshoot_deadline, participant_message, created_at`;

type ColumnKind = "plain" | "json" | "time" | "date";

const COURSE_WRITABLE: Record<keyof CoursePatch, ColumnKind> = {
  status: "plain",
  invite_code: "plain",
  invite_used: "plain",
  current_day: "plain",
  total_days: "plain",
  extended: "plain",
  scheduled_time: "time",
  start_date: "date",
  late_count: "plain",
  late_dates: "json",
  appeal_count: "plain",
  appeal_media: "plain",
  appeal_text: "plain",
  appeal_deadline: "plain",
  appeal_review_deadline: "plain",
  removal_reason: "plain",
  registration_message: "json",
};

const INTAKE_LOG_WRITABLE: Record<keyof IntakeLogPatch, ColumnKind> = {
  status: "plain",
  scheduled_at: "plain",
  taken_at: "plain",
  delay_minutes: "plain",
  media_ref: "plain",
  confidence: "plain",
  verified_by: "plain",
  review_started_at: "plain",
  reshoot_deadline: "plain",
  participant_message: "json",
};

type Assignments = { fields: string[]; values: unknown[] };

const buildAssignments = (
  patch: Record<string, unknown>,
  columns: Record<string, ColumnKind>,
): Assignments => {
  const fields: string[] = [];
  const values: unknown[] = [];
  const push = (column: string, value: unknown, cast?: string) => {
    values.push(value);
    fields.push(`${column} = $${values.length}${cast ? `::${cast}` : ""}`);
  };
  for (const [column, value] of Object.entries(patch)) {
    if (value === undefined || !Object.hasOwn(columns, column)) continue;
    const kind = columns[column];
    if (kind === "json") push(column, value === null ? null : JSON.stringify(value), "jsonb");
    else if (kind === "time") push(column, value, "time");
    else if (kind === "date") push(column, value, "date");
    else push(column, value);
  }
  return { fields, values };
};

const timeParam = (minuteOfDay: number): string => formatTimeOfDay(minuteOfDay);

class PostgresCourseRepository implements CourseRepository {
  constructor(private readonly pool: Pool) {}

  async get(id: number): Promise<Course | null> {
    return this.one(`SELECT ${COURSE_COLUMNS} FROM courses WHERE id = $1`, [id]);
  }

  async findOpenByParticipant(participantId: number): Promise<Course | null> {
    return this.one(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE participant_id = $1 AND status = ANY($2::text[]) LIMIT 1`,
      [participantId, OPEN_STATUSES],
    );
  }

  async findLatestByParticipant(participantId: number): Promise<Course | null> {
    return this.one(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE participant_id = $1 ORDER BY id DESC LIMIT 1`,
      [participantId],
    );
  }

  async create(input: NewCourse): Promise<Course | null> {
    return this.one(
      `INSERT INTO courses (participant_id, total_days, invite_code)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING
       RETURNING ${COURSE_COLUMNS}`,
      [input.participant_id, input.total_days, input.invite_code],
    );
  }

  async update(id: number, patch: CoursePatch): Promise<void> {
    const { fields, values } = buildAssignments(patch, COURSE_WRITABLE);
    values.push(id);
    await this.pool.query(
      `UPDATE courses SET ${[...fields, "updated_at = now()"].join(", ")} WHERE id = $${values.length}`,
      values,
    );
  }

  async updateIfStatus(id: number, patch: CoursePatch, expected: CourseStatus): Promise<boolean> {
    const { fields, values } = buildAssignments(patch, COURSE_WRITABLE);
    values.push(id, expected);
    const result = await this.pool.query(
      `UPDATE courses SET ${[...fields, "updated_at = now()"].join(", ")}
       WHERE id = $${values.length - 1} AND status = $${values.length}
       RETURNING id`,
      values,
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteIfStatus(id: number, expected: CourseStatus): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM courses WHERE id = $1 AND status = $2`, [id, expected]);
    return (result.rowCount ?? 0) > 0;
  }

  async listByStatus(statuses: readonly CourseStatus[]): Promise<Course[]> {
    return this.many(`SELECT ${COURSE_COLUMNS} FROM courses WHERE status = ANY($1::text[]) ORDER BY id`, [statuses]);
  }

  async listByScheduledTime(statuses: readonly CourseStatus[], range: MinuteRange): Promise<Course[]> {
    const condition =
      range.from <= range.to
        ? "scheduled_time BETWEEN $2::time AND $3::time"
        : "(scheduled_time >= $2::time OR scheduled_time <= $3::time)";
    return this.many(
      `SELECT ${COURSE_COLUMNS} FROM courses
       WHERE status = ANY($1::text[]) AND scheduled_time IS NOT NULL AND ${condition}
       ORDER BY id`,
      [statuses, timeParam(range.from), timeParam(range.to)],
    );
  }

  async listAbandonedSetups(createdBefore: Date): Promise<Course[]> {
    return this.many(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE status = 'setup' AND NOT invite_used AND created_at < $1`,
      [createdBefore],
    );
  }

  async listRefusedWithAppealDeadlineBefore(instant: Date): Promise<Course[]> {
    return this.many(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE status = 'refused' AND appeal_deadline < $1`,
      [instant],
    );
  }

  async listAppealsWithReviewDeadlineBefore(instant: Date): Promise<Course[]> {
    return this.many(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE status = 'appeal' AND appeal_review_deadline < $1`,
      [instant],
    );
  }

  async listEndedBefore(instant: Date): Promise<Course[]> {
    return this.many(
      `SELECT ${COURSE_COLUMNS} FROM courses WHERE status = ANY($1::text[]) AND updated_at < $2`,
      [ENDED_STATUSES, instant],
    );
  }

  private async one(sql: string, values: unknown[]): Promise<Course | null> {
    const result = await this.pool.query(sql, values);
    const row: unknown = result.rows[0];
    return row === undefined ? null : courseRow.parse(row);
  }

  private async many(sql: string, values: unknown[]): Promise<Course[]> {
    const result = await this.pool.query(sql, values);
    return result.rows.map((row: unknown) => courseRow.parse(row));
  }
}

class PostgresIntakeLogRepository implements IntakeLogRepository {
  constructor(private readonly pool: Pool) {}

  async get(id: number): Promise<IntakeLog | null> {
    return this.one(`SELECT ${INTAKE_LOG_COLUMNS} FROM intake_logs WHERE id = $1`, [id]);
  }

  async findByCourseAndDay(courseId: number, day: number): Promise<IntakeLog | null> {
    return this.one(`SELECT ${INTAKE_LOG_COLUMNS} FROM intake_logs WHERE course_id = $1 AND day = $2`, [courseId, day]);
  }

  async findByCourseAndStatus(courseId: number, status: IntakeStatus): Promise<IntakeLog | null> {
    return this.one(
      `SELECT ${INTAKE_LOG_COLUMNS} FROM intake_logs WHERE course_id = $1 AND status = $2 ORDER BY day DESC LIMIT 1`,
      [courseId, status],
    );
  }

  async create(input: NewIntakeLog): Promise<IntakeLog | null> {
    return this.one(
      `INSERT INTO intake_logs
         (course_id, day, status, scheduled_at, taken_at, delay_minutes, media_ref, confidence, verified_by, review_started_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (course_id, day) DO NOTHING
       RETURNING ${INTAKE_LOG_COLUMNS}`,
      [
        input.course_id,
        input.day,
        input.status,
        input.scheduled_at,
        input.taken_at,
        input.delay_minutes,
        input.media_ref,
        input.confidence,
        input.verified_by,
        input.review_started_at,
      ],
    );
  }

  async update(id: number, patch: IntakeLogPatch): Promise<void> {
    const { fields, values } = buildAssignments(patch, INTAKE_LOG_WRITABLE);
    if (fields.length === 0) return;
    values.push(id);
    await this.pool.query(`UPDATE intake_logs SET ${fields.join(", ")} WHERE id = $${values.length}`, values);
  }

  async updateIfStatus(id: number, patch: IntakeLogPatch, expected: IntakeStatus): Promise<boolean> {
    const { fields, values } = buildAssignments(patch, INTAKE_LOG_WRITABLE);
    if (fields.length === 0) return false;
    values.push(id, expected);
    const result = await this.pool.query(
      `UPDATE intake_logs SET ${fields.join(", ")}
       WHERE id = $${values.length - 1} AND status = $${values.length}
       RETURNING id`,
      values,
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listByStatus(status: IntakeStatus): Promise<IntakeLog[]> {
    return this.many(`SELECT ${INTAKE_LOG_COLUMNS} FROM intake_logs WHERE status = $1 ORDER BY id`, [status]);
  }

  async listReshootsExpiredBefore(instant: Date): Promise<IntakeLog[]> {
    return this.many(
      `SELECT ${INTAKE_LOG_COLUMNS} FROM intake_logs WHERE status = 'reshoot' AND reshoot_deadline < $1 ORDER BY id`,
      [instant],
    );
  }

  async countTakenBetween(from: Date, to: Date): Promise<number> {
    const result = await this.pool.query(
      `SELECT count(*)::int AS count FROM intake_logs WHERE status = 'taken' AND taken_at >= $1 AND taken_at < $2`,
      [from, to],
    );
    return z.object({ count: z.number() }).parse(result.rows[0]).count;
  }

  private async one(sql: string, values: unknown[]): Promise<IntakeLog | null> {
    const result = await this.pool.query(sql, values);
    const row: unknown = result.rows[0];
    return row === undefined ? null : intakeLogRow.parse(row);
  }

  private async many(sql: string, values: unknown[]): Promise<IntakeLog[]> {
    const result = await this.pool.query(sql, values);
    return result.rows.map((row: unknown) => intakeLogRow.parse(row));
  }
}

class PostgresParticipantRepository implements ParticipantRepository {
  constructor(private readonly pool: Pool) {}

  async get(id: number): Promise<Participant | null> {
    const result = await this.pool.query(`SELECT * FROM participants WHERE id = $1`, [id]);
    return result.rows[0] === undefined ? null : participantRow.parse(result.rows[0]);
  }

  async findByChatId(chatId: string): Promise<Participant | null> {
    const result = await this.pool.query(`SELECT * FROM participants WHERE chat_id = $1`, [chatId]);
    return result.rows[0] === undefined ? null : participantRow.parse(result.rows[0]);
  }

  async create(input: NewParticipant): Promise<Participant> {
    const result = await this.pool.query(
      `INSERT INTO participants (name, chat_id, thread_id, reviewer_id) VALUES ($1, $2, $3, $4) RETURNING *`,
      [input.name, input.chat_id, input.thread_id, input.reviewer_id],
    );
    return participantRow.parse(result.rows[0]);
  }

  async clearThread(id: number): Promise<void> {
    await this.pool.query(`UPDATE participants SET thread_id = NULL WHERE id = $1`, [id]);
  }

  async getReviewer(id: number): Promise<Reviewer | null> {
    const result = await this.pool.query(`SELECT id, name, chat_id FROM reviewers WHERE id = $1`, [id]);
    return result.rows[0] === undefined ? null : reviewerRow.parse(result.rows[0]);
  }

  async findReviewerByChatId(chatId: string): Promise<Reviewer | null> {
    const result = await this.pool.query(`SELECT id, name, chat_id FROM reviewers WHERE chat_id = $1`, [chatId]);
    return result.rows[0] === undefined ? null : reviewerRow.parse(result.rows[0]);
  }

  async createReviewer(input: NewReviewer): Promise<Reviewer> {
    const result = await this.pool.query(
      `INSERT INTO reviewers (name, chat_id) VALUES ($1, $2) RETURNING id, name, chat_id`,
      [input.name, input.chat_id],
    );
    return reviewerRow.parse(result.rows[0]);
  }
}

class PostgresDashboardRepository implements DashboardRepository {
  constructor(private readonly pool: Pool) {}

  async getMessage(key: string): Promise<MessageRef | null> {
    const result = await this.pool.query(`SELECT message FROM dashboard_messages WHERE key = $1`, [key]);
    return result.rows[0] === undefined ? null : z.object({ message: messageRef }).parse(result.rows[0]).message;
  }

  async saveMessage(key: string, ref: MessageRef): Promise<void> {
    await this.pool.query(
      `INSERT INTO dashboard_messages (key, message) VALUES ($1, $2::jsonb)
       ON CONFLICT (key) DO UPDATE SET message = EXCLUDED.message, updated_at = now()`,
      [key, JSON.stringify(ref)],
    );
  }
}

export class PostgresStore implements Store {
  readonly courses: CourseRepository;
  readonly intakeLogs: IntakeLogRepository;
  readonly participants: ParticipantRepository;
  readonly dashboards: DashboardRepository;
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({
      connectionString,
      ssl: connectionString.includes("sslmode=require") ? { rejectUnauthorized: false } : undefined,
    });
    this.courses = new PostgresCourseRepository(this.pool);
    this.intakeLogs = new PostgresIntakeLogRepository(this.pool);
    this.participants = new PostgresParticipantRepository(this.pool);
    this.dashboards = new PostgresDashboardRepository(this.pool);
  }

  /** Applies every .sql file in the directory, in name order. Statements are idempotent. */
  async migrate(directory: string, logger: Logger): Promise<void> {
    const files = (await fs.readdir(directory)).filter((file) => file.endsWith(".sql")).sort();
    for (const file of files) {
      const sql = await fs.readFile(path.join(directory, file), "utf8");
      await this.pool.query(sql);
      logger.info("Migration applied", { file });
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
