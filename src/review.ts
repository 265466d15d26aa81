import { formatLocalDateTime, nextDayDeadline, planApprovedDay } from "../core/compliance_engine/index.js";
import type { ComplianceContext } from "./context.js";
import { participantText, threadText } from "./messages.js";
import type { Course, IntakeLog, Participant } from "./models.js";
import { alreadyHandled, notApplicable, ok, type HandlerOutcome } from "./outcomes.js";
import { commitLoggedDay } from "./progress.js";
import { refuseCourse } from "./removal.js";

export type ReviewResult = {
  log_id: number;
  course_id: number;
  status: IntakeLog["status"];
};

type ReviewTarget = {
  log: IntakeLog;
  course: Course;
  participant: Participant;
};

// Loads the log under review; anything but a pending_review log on an active course was settled elsewhere.
const loadTarget = async (ctx: ComplianceContext, logId: number): Promise<HandlerOutcome<ReviewTarget>> => {
  const log = await ctx.store.intakeLogs.get(logId);
  if (!log) return notApplicable("unknown_log");
  const course = await ctx.store.courses.get(log.course_id);
  if (!course) return notApplicable("unknown_course");
  const participant = await ctx.store.participants.get(course.participant_id);
  if (!participant) return notApplicable("unknown_participant");
  if (log.status !== "pending_review" || course.status !== "active") {
    ctx.logger.info("Review already handled", { logId, status: log.status, courseStatus: course.status });
    return alreadyHandled();
  }
  return ok({ log, course, participant });
};

const verifier = (actorChatId: string): string => `reviewer:${actorChatId}`;

/**
 * Confirms a pending submission. Lateness counts as for an automatic approval, except
 * for a log that went through a reshoot.
 */
export const confirmSubmission = async (
  ctx: ComplianceContext,
  logId: number,
  actorChatId: string,
): Promise<HandlerOutcome<ReviewResult>> => {
  const target = await loadTarget(ctx, logId);
  if (target.kind !== "ok") return target;
  const { log, course, participant } = target.result;

  const plan = planApprovedDay(
    course,
    {
      day: log.day,
      delayMinutes: log.reshoot_deadline === null ? log.delay_minutes : 0,
      scheduledAt: new Date(log.scheduled_at),
      now: ctx.clock(),
    },
    ctx.policy,
  );
  const status = plan.kind === "removed" ? "missed" : "taken";
  if (!(await ctx.store.intakeLogs.updateIfStatus(log.id, { status, verified_by: verifier(actorChatId) }, "pending_review"))) {
    ctx.logger.info("Confirm lost the race", { logId });
    return alreadyHandled();
  }

  await ctx.notifier.toThread(participant, threadText.confirmed(log.day));
  if (!(await commitLoggedDay(ctx, course, participant, plan, log.participant_message, log, status, "pending_review"))) {
    await ctx.store.intakeLogs.update(log.id, { status: "missed" });
    return alreadyHandled();
  }
  return ok({ log_id: log.id, course_id: course.id, status });
};

/** Rejects a pending submission and removes the course without an appeal. */
export const rejectSubmission = async (
  ctx: ComplianceContext,
  logId: number,
  actorChatId: string,
): Promise<HandlerOutcome<ReviewResult>> => {
  const target = await loadTarget(ctx, logId);
  if (target.kind !== "ok") return target;
  const { log, course } = target.result;

  if (!(await ctx.store.intakeLogs.updateIfStatus(log.id, { status: "rejected", verified_by: verifier(actorChatId) }, "pending_review"))) {
    ctx.logger.info("Reject lost the race", { logId });
    return alreadyHandled();
  }
  const refused = await refuseCourse(ctx, course, {
    reason: "manager_reject",
    from: "active",
    participantMessage: log.participant_message,
  });
  return refused ? ok({ log_id: log.id, course_id: course.id, status: "rejected" }) : alreadyHandled();
};

/** Asks for a new video of the same day, due before the next day's deadline. */
export const requestReshoot = async (
  ctx: ComplianceContext,
  logId: number,
  actorChatId: string,
): Promise<HandlerOutcome<ReviewResult>> => {
  const target = await loadTarget(ctx, logId);
  if (target.kind !== "ok") return target;
  const { log, course, participant } = target.result;
  if (!course.scheduled_time) return notApplicable("no_schedule");

  const deadline = nextDayDeadline(ctx.clock(), course.scheduled_time, ctx.policy);
  const moved = await ctx.store.intakeLogs.updateIfStatus(
    log.id,
    { status: "reshoot", reshoot_deadline: deadline.toISOString(), verified_by: verifier(actorChatId) },
    "pending_review",
  );
  if (!moved) {
    ctx.logger.info("Reshoot request lost the race", { logId });
    return alreadyHandled();
  }
  ctx.logger.info("Reshoot requested", { logId, courseId: course.id, deadline: deadline.toISOString() });

  const due = formatLocalDateTime(deadline, ctx.policy);
  await ctx.notifier.replaceOrSend(participant, log.participant_message, participantText.reshootRequested(due));
  await ctx.notifier.toThread(participant, threadText.reshootRequested(log.day, due));
  return ok({ log_id: log.id, course_id: course.id, status: "reshoot" });
};
