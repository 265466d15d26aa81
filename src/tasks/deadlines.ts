import { isPast, localDateKey, nextDayDeadline } from "../../core/compliance_engine/index.js";
import { closeAppeal } from "../appeals.js";
import type { DedupKind } from "../cache.js";
import type { ComplianceContext } from "../context.js";
import { participantText } from "../messages.js";
import type { Course, IntakeLog } from "../models.js";
import { refuseCourse } from "../removal.js";
import type { ScheduledTask } from "../scheduler.js";

// Deadline sweeps dedup on the local date they run, not on a schedule occurrence.

const wasSentToday = (ctx: ComplianceContext, course: Course, now: Date, kind: DedupKind): Promise<boolean> =>
  ctx.dedup.wasSent(course.id, localDateKey(now, ctx.policy), kind);

const markSentToday = (ctx: ComplianceContext, course: Course, now: Date, kind: DedupKind): Promise<void> =>
  ctx.dedup.markSent(course.id, localDateKey(now, ctx.policy), kind);

const expireLog = async (
  ctx: ComplianceContext,
  log: IntakeLog,
  now: Date,
  from: "pending_review" | "reshoot",
  reason: "review_deadline" | "reshoot_expired",
  kind: DedupKind,
): Promise<boolean> => {
  const course = await ctx.store.courses.get(log.course_id);
  if (!course || course.status !== "active") return false;
  if (await wasSentToday(ctx, course, now, kind)) return false;

  if (!(await ctx.store.intakeLogs.updateIfStatus(log.id, { status: "missed" }, from))) {
    ctx.logger.info("Deadline already handled", { logId: log.id, reason });
    return false;
  }
  const refused = await refuseCourse(ctx, course, { reason, from: "active", participantMessage: log.participant_message });
  await markSentToday(ctx, course, now, kind);
  return refused;
};

/** Pending reviews nobody decided by the next day's deadline remove the course. */
export const expireReviews = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  let acted = 0;
  for (const log of await ctx.store.intakeLogs.listByStatus("pending_review")) {
    if (!log.review_started_at) continue;
    const course = await ctx.store.courses.get(log.course_id);
    if (!course?.scheduled_time) continue;
    const deadline = nextDayDeadline(new Date(log.review_started_at), course.scheduled_time, ctx.policy);
    if (!isPast(deadline, now)) continue;
    if (await expireLog(ctx, log, now, "pending_review", "review_deadline", "review_deadline")) acted += 1;
  }
  return acted;
};

export const expireReshoots = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  let acted = 0;
  for (const log of await ctx.store.intakeLogs.listReshootsExpiredBefore(now)) {
    if (await expireLog(ctx, log, now, "reshoot", "reshoot_expired", "reshoot_deadline")) acted += 1;
  }
  return acted;
};

/** Appeals the reviewer left unanswered past their deadline end as refused. */
export const expireAppeals = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  let acted = 0;
  for (const course of await ctx.store.courses.listAppealsWithReviewDeadlineBefore(now)) {
    if (await wasSentToday(ctx, course, now, "appeal_deadline")) continue;
    const closed = await closeAppeal(ctx, course, "appeal_expired");
    await markSentToday(ctx, course, now, "appeal_deadline");
    if (closed) acted += 1;
  }
  return acted;
};

/** Withdraws the appeal offer once its deadline passes; the participant hears about it once. */
export const expireAppealButtons = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  let acted = 0;
  for (const course of await ctx.store.courses.listRefusedWithAppealDeadlineBefore(now)) {
    if (!(await ctx.store.courses.updateIfStatus(course.id, { appeal_deadline: null }, "refused"))) continue;
    acted += 1;
    if (await wasSentToday(ctx, course, now, "appeal_button_expired")) continue;
    const participant = await ctx.store.participants.get(course.participant_id);
    if (participant) {
      await ctx.notifier.toParticipant(participant, participantText.appealButtonExpired);
    }
    await markSentToday(ctx, course, now, "appeal_button_expired");
  }
  return acted;
};

export const deadlineTasks = (ctx: ComplianceContext): ScheduledTask[] => [
  { name: "review_deadline", run: (now) => expireReviews(ctx, now) },
  { name: "reshoot_deadline", run: (now) => expireReshoots(ctx, now) },
  { name: "appeal_deadline", run: (now) => expireAppeals(ctx, now) },
  { name: "appeal_button_expired", run: (now) => expireAppealButtons(ctx, now) },
];
