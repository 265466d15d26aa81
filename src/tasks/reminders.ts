import type { ComplianceContext } from "../context.js";
import { participantText } from "../messages.js";
import type { ScheduledTask } from "../scheduler.js";
import { hasSubmissionFor } from "../intake.js";
import { findDueCourses, forEachDueCourse } from "./due.js";

/** One reminder per configured lead time, ahead of the scheduled time. */
export const reminderTasks = (ctx: ComplianceContext): ScheduledTask[] =>
  ctx.policy.reminderLeadMinutes.map((lead) => ({
    name: `reminder_${lead}`,
    run: (now: Date) => sendReminders(ctx, now, lead),
  }));

export const sendReminders = async (ctx: ComplianceContext, now: Date, leadMinutes: number): Promise<number> => {
  const kind = `reminder_${leadMinutes}` as const;
  const due = await findDueCourses(ctx, now, -leadMinutes, ["active"]);
  return forEachDueCourse(ctx, kind, due, async ({ course, occurrence, dateKey }) => {
    if (await ctx.dedup.wasSent(course.id, dateKey, kind)) return false;
    if (await hasSubmissionFor(ctx, course, occurrence)) return false;

    const participant = await ctx.store.participants.get(course.participant_id);
    if (!participant) return false;
    await ctx.notifier.toParticipant(participant, participantText.reminder(leadMinutes));
    await ctx.dedup.markSent(course.id, dateKey, kind);
    return true;
  });
};
