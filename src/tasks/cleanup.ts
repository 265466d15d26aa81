import { subHours } from "date-fns";

import { isPast } from "../../core/compliance_engine/index.js";
import type { ComplianceContext } from "../context.js";
import type { ScheduledTask } from "../scheduler.js";

/**
 * Deletes the collaboration thread of participants whose course ended more than
 * `staleThreadHours` ago. A thread is kept while the participant has an open course
 * or can still appeal.
 */
export const deleteStaleThreads = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  let deleted = 0;
  for (const course of await ctx.store.courses.listEndedBefore(subHours(now, ctx.policy.staleThreadHours))) {
    if (course.status === "refused" && course.appeal_deadline !== null && !isPast(course.appeal_deadline, now)) continue;

    const participant = await ctx.store.participants.get(course.participant_id);
    if (!participant?.thread_id) continue;
    if (await ctx.store.courses.findOpenByParticipant(participant.id)) continue;

    if (await ctx.notifier.deleteThread(participant)) {
      await ctx.store.participants.clearThread(participant.id);
      ctx.logger.info("Stale thread deleted", { participantId: participant.id, courseId: course.id });
      deleted += 1;
    }
  }
  return deleted;
};

/** Setup courses whose invite went unused past `abandonedSetupHours`. */
export const deleteAbandonedSetups = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  let deleted = 0;
  for (const course of await ctx.store.courses.listAbandonedSetups(subHours(now, ctx.policy.abandonedSetupHours))) {
    if (await ctx.store.courses.deleteIfStatus(course.id, "setup")) {
      ctx.logger.info("Abandoned setup deleted", { courseId: course.id });
      deleted += 1;
    }
  }
  return deleted;
};

export const cleanupTasks = (ctx: ComplianceContext): ScheduledTask[] => [
  { name: "stale_threads", run: (now) => deleteStaleThreads(ctx, now) },
  { name: "abandoned_setups", run: (now) => deleteAbandonedSetups(ctx, now) },
];
