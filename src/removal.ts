import {
  appealDeadline,
  canOfferAppeal,
  canTransition,
  formatLocalDateTime,
  isAppealable,
} from "../core/compliance_engine/index.js";
import { runClosureSequence } from "./closure.js";
import type { ComplianceContext } from "./context.js";
import { InvariantError } from "./errors.js";
import { appealButton, generalText, participantText, REMOVAL_REASON_TEXT, threadText } from "./messages.js";
import type { Course, CoursePatch, CourseStatus, MessageRef, RemovalReason } from "./models.js";

/**
 * Guarded status write. The lifecycle table must allow the move; the store decides
 * whether the course was still in `from`.
 */
export const transitionCourse = async (
  ctx: ComplianceContext,
  course: Course,
  from: CourseStatus,
  patch: CoursePatch & { status: CourseStatus },
): Promise<boolean> => {
  if (!canTransition(from, patch.status)) {
    throw new InvariantError(`Course ${course.id}: ${from} -> ${patch.status} is not a valid transition`);
  }
  const applied = await ctx.store.courses.updateIfStatus(course.id, patch, from);
  if (applied) {
    ctx.logger.info("Course transition", { courseId: course.id, from, to: patch.status });
  } else {
    ctx.logger.info("Course transition already handled", { courseId: course.id, from, to: patch.status });
  }
  return applied;
};

/** Appeal window for an automatic removal; null for removals that offer no appeal. */
export const appealDeadlineFor = (ctx: ComplianceContext, course: Course, reason: RemovalReason): string | null =>
  isAppealable(reason) ? appealDeadline(ctx.clock(), course.scheduled_time, ctx.policy).toISOString() : null;

export interface RefuseOptions {
  reason: RemovalReason;
  from: "active" | "appeal";
  /** Fields written in the same conditional update as the status change. */
  patch?: CoursePatch;
  participantMessage?: MessageRef | null;
}

export const refuseCourse = async (ctx: ComplianceContext, course: Course, options: RefuseOptions): Promise<boolean> => {
  const patch = {
    ...options.patch,
    status: "refused" as const,
    removal_reason: options.reason,
    appeal_deadline: appealDeadlineFor(ctx, course, options.reason),
  };
  const applied = await transitionCourse(ctx, course, options.from, patch);
  if (!applied) {
    return false;
  }
  await announceRemoval(ctx, { ...course, ...patch }, options.participantMessage ?? null);
  return true;
};

/** Participant notice (with the appeal affordance where offered), closure sequence, general notice. */
export const announceRemoval = async (
  ctx: ComplianceContext,
  course: Course,
  participantMessage: MessageRef | null,
): Promise<void> => {
  const reason = course.removal_reason;
  if (reason === null) {
    ctx.logger.warn("Removal announced without a reason", { courseId: course.id });
    return;
  }
  const participant = await ctx.store.participants.get(course.participant_id);
  if (!participant) {
    ctx.logger.warn("Participant missing for removed course", { courseId: course.id });
    return;
  }

  const offer = canOfferAppeal(course.appeal_count, reason, ctx.policy) && course.appeal_deadline !== null;
  const lines = [participantText.removed(reason)];
  if (offer && course.appeal_deadline) {
    lines.push(participantText.appealOffer(formatLocalDateTime(new Date(course.appeal_deadline), ctx.policy)));
  }
  await ctx.notifier.replaceOrSend(participant, participantMessage, lines.join("\n"), offer ? appealButton(course.id) : undefined);

  await runClosureSequence(ctx.notifier, participant, course, "refused", threadText.closed(REMOVAL_REASON_TEXT[reason]));
  await ctx.notifier.toGeneral(generalText.removed(participant.name, reason));
};
