import { hasStrikeFor, planMissedStrike } from "../../core/compliance_engine/index.js";
import type { ComplianceContext } from "../context.js";
import { participantText, threadText } from "../messages.js";
import { refuseCourse } from "../removal.js";
import type { ScheduledTask } from "../scheduler.js";
import { hasSubmissionFor } from "../intake.js";
import { findDueCourses, forEachDueCourse } from "./due.js";

/**
 * A strike for every active course with nothing sent `strikeAfterMinutes` after its
 * scheduled time. The strike that reaches the allowance removes the course.
 */
export const recordMissedStrikes = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  const due = await findDueCourses(ctx, now, ctx.policy.strikeAfterMinutes, ["active"]);
  return forEachDueCourse(ctx, "strike", due, async ({ course, occurrence, dateKey }) => {
    if (await ctx.dedup.wasSent(course.id, dateKey, "strike")) return false;
    if (await hasSubmissionFor(ctx, course, occurrence)) return false;
    if (hasStrikeFor(course.late_dates, occurrence)) {
      await ctx.dedup.markSent(course.id, dateKey, "strike");
      return false;
    }

    const plan = planMissedStrike(course, now, ctx.policy);
    if (plan.kind === "removed") {
      const refused = await refuseCourse(ctx, course, { reason: "max_strikes", from: "active", patch: plan.patch });
      await ctx.dedup.markSent(course.id, dateKey, "strike");
      return refused;
    }

    if (!(await ctx.store.courses.updateIfStatus(course.id, plan.patch, "active"))) {
      ctx.logger.info("Strike already handled", { courseId: course.id });
      await ctx.dedup.markSent(course.id, dateKey, "strike");
      return false;
    }
    ctx.logger.info("Missed strike recorded", { courseId: course.id, strikes: plan.strikes, max: plan.maxStrikes });
    await ctx.dedup.markSent(course.id, dateKey, "strike");

    const participant = await ctx.store.participants.get(course.participant_id);
    if (participant) {
      await ctx.notifier.toParticipant(participant, participantText.strikeWarning(plan.strikes, plan.maxStrikes));
      await ctx.notifier.toThread(participant, threadText.missedStrike(plan.strikes, plan.maxStrikes));
    }
    return true;
  });
};

/** Removal of every active course still without a submission `removalAfterMinutes` after its scheduled time. */
export const removeNoShows = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  const due = await findDueCourses(ctx, now, ctx.policy.removalAfterMinutes, ["active"]);
  return forEachDueCourse(ctx, "removal", due, async ({ course, occurrence, dateKey }) => {
    if (await ctx.dedup.wasSent(course.id, dateKey, "removal")) return false;
    if (await hasSubmissionFor(ctx, course, occurrence)) return false;

    const refused = await refuseCourse(ctx, course, { reason: "no_video", from: "active" });
    await ctx.dedup.markSent(course.id, dateKey, "removal");
    return refused;
  });
};

export const strikeTasks = (ctx: ComplianceContext): ScheduledTask[] => [
  { name: "strike", run: (now) => recordMissedStrikes(ctx, now) },
  { name: "removal", run: (now) => removeNoShows(ctx, now) },
];
