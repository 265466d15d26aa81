import type { ApprovedDayPlan } from "../core/compliance_engine/index.js";
import { runClosureSequence } from "./closure.js";
import type { ComplianceContext } from "./context.js";
import { participantText, threadText, threadTitle } from "./messages.js";
import type { Course, IntakeLog, IntakeStatus, MessageRef, Participant } from "./models.js";
import { announceRemoval, appealDeadlineFor, transitionCourse } from "./removal.js";

/**
 * Writes an approved day's plan to the course in one conditional update on `active`
 * and tells everyone about it. False when the course left `active` first.
 */
export const commitApprovedDay = async (
  ctx: ComplianceContext,
  course: Course,
  participant: Participant,
  plan: ApprovedDayPlan,
  participantMessage: MessageRef | null,
): Promise<boolean> => {
  const strikeNote = threadText.lateStrike(plan.strikes, plan.maxStrikes);

  if (plan.kind === "removed") {
    const patch = {
      ...plan.patch,
      status: "refused" as const,
      removal_reason: "max_strikes" as const,
      appeal_deadline: appealDeadlineFor(ctx, course, "max_strikes"),
    };
    if (!(await transitionCourse(ctx, course, "active", patch))) {
      return false;
    }
    await ctx.notifier.toThread(participant, strikeNote);
    await announceRemoval(ctx, { ...course, ...patch }, participantMessage);
    return true;
  }

  if (plan.kind === "completed") {
    const patch = { ...plan.patch, status: "completed" as const };
    if (!(await transitionCourse(ctx, course, "active", patch))) {
      return false;
    }
    await ctx.notifier.replaceOrSend(participant, participantMessage, participantText.completed(course.total_days));
    if (plan.late) await ctx.notifier.toThread(participant, strikeNote);
    await runClosureSequence(
      ctx.notifier,
      participant,
      { ...course, ...patch },
      "completed",
      threadText.completed(course.total_days),
    );
    return true;
  }

  if (!(await ctx.store.courses.updateIfStatus(course.id, plan.patch, "active"))) {
    ctx.logger.info("Day advance already handled", { courseId: course.id, day: plan.day });
    return false;
  }
  ctx.logger.info("Day advanced", { courseId: course.id, day: plan.day, late: plan.late });

  const text = plan.late
    ? participantText.approvedLate(plan.day, course.total_days, plan.strikes, plan.maxStrikes)
    : participantText.approved(plan.day, course.total_days);
  await ctx.notifier.replaceOrSend(participant, participantMessage, text);
  if (plan.late) await ctx.notifier.toThread(participant, strikeNote);
  await ctx.notifier.renameThread(participant, threadTitle(participant.name, plan.day, course.total_days));
  return true;
};

/**
 * commitApprovedDay for a log already written as `written`. When the course write throws
 * and the course has not moved, the log goes back to `revertTo` before the error is
 * rethrown.
 */
export const commitLoggedDay = async (
  ctx: ComplianceContext,
  course: Course,
  participant: Participant,
  plan: ApprovedDayPlan,
  participantMessage: MessageRef | null,
  log: Pick<IntakeLog, "id">,
  written: IntakeStatus,
  revertTo: IntakeStatus,
): Promise<boolean> => {
  try {
    return await commitApprovedDay(ctx, course, participant, plan, participantMessage);
  } catch (error) {
    try {
      const current = await ctx.store.courses.get(course.id);
      if (current?.status === course.status && current.current_day === course.current_day) {
        await ctx.store.intakeLogs.updateIfStatus(log.id, { status: revertTo }, written);
        ctx.logger.warn("Day advance failed, log reverted", { courseId: course.id, logId: log.id, status: revertTo });
      }
    } catch (revertError) {
      ctx.logger.error("Log revert failed", revertError, { courseId: course.id, logId: log.id });
    }
    throw error;
  }
};
