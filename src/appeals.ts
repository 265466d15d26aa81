import { appealDeadline, formatLocalDateTime, isAppealable, isPast, nextDayDeadline } from "../core/compliance_engine/index.js";
import type { ComplianceContext } from "./context.js";
import { isVideo, type IncomingMedia } from "./intake.js";
import {
  appealReviewButtons,
  cardButtons,
  generalText,
  participantText,
  threadText,
  threadTitle,
} from "./messages.js";
import type { Course, Participant } from "./models.js";
import { alreadyHandled, notApplicable, ok, type HandlerOutcome } from "./outcomes.js";
import { announceRemoval, transitionCourse } from "./removal.js";

export type AppealResult = {
  course_id: number;
  status: Course["status"];
  appeal_count: number;
};

const result = (course: Course): AppealResult => ({
  course_id: course.id,
  status: course.status,
  appeal_count: course.appeal_count,
});

const cleared = {
  appeal_media: null,
  appeal_text: null,
  appeal_review_deadline: null,
  appeal_deadline: null,
};

/**
 * refused -> appeal, from the participant's appeal button. The number of earlier
 * appeals is not checked here: the button is only offered while appeals remain.
 */
export const startAppeal = async (
  ctx: ComplianceContext,
  courseId: number,
  actorChatId: string,
): Promise<HandlerOutcome<AppealResult>> => {
  const course = await ctx.store.courses.get(courseId);
  if (!course) return notApplicable("unknown_course");
  const participant = await ctx.store.participants.get(course.participant_id);
  if (!participant || participant.chat_id !== actorChatId) return notApplicable("unknown_participant");

  if (course.status !== "refused") {
    return alreadyHandled();
  }
  if (!isAppealable(course.removal_reason)) {
    return notApplicable("appeal_not_allowed");
  }
  const now = ctx.clock();
  if (course.appeal_deadline === null || isPast(course.appeal_deadline, now)) {
    await ctx.notifier.toParticipant(participant, participantText.appealButtonExpired);
    return notApplicable("appeal_expired");
  }

  const reviewDeadline = course.scheduled_time
    ? nextDayDeadline(now, course.scheduled_time, ctx.policy)
    : appealDeadline(now, null, ctx.policy);
  const patch = {
    ...cleared,
    status: "appeal" as const,
    appeal_review_deadline: reviewDeadline.toISOString(),
  };
  if (!(await transitionCourse(ctx, course, "refused", patch))) {
    return alreadyHandled();
  }
  await ctx.notifier.toParticipant(participant, participantText.appealAskMedia);
  return ok(result({ ...course, ...patch }));
};

/** First appeal step: the supporting video. */
export const submitAppealMedia = async (
  ctx: ComplianceContext,
  participant: Participant,
  course: Course,
  media: IncomingMedia,
): Promise<HandlerOutcome<AppealResult>> => {
  if (course.status !== "appeal" || course.appeal_media !== null) {
    return notApplicable("no_pending_step");
  }
  if (!isVideo(media)) {
    await ctx.notifier.toParticipant(participant, participantText.videoOnly);
    return notApplicable("unsupported_media");
  }
  if (!(await ctx.store.courses.updateIfStatus(course.id, { appeal_media: media.ref }, "appeal"))) {
    return alreadyHandled();
  }
  await ctx.notifier.toParticipant(participant, participantText.appealAskText);
  return ok(result(course));
};

/** Second appeal step: the written reason. The evidence then goes to the thread for a decision. */
export const submitAppealText = async (
  ctx: ComplianceContext,
  participant: Participant,
  course: Course,
  text: string,
): Promise<HandlerOutcome<AppealResult>> => {
  const mediaRef = course.appeal_media;
  if (course.status !== "appeal" || mediaRef === null || course.appeal_text !== null) {
    return notApplicable("no_pending_step");
  }
  if (!(await ctx.store.courses.updateIfStatus(course.id, { appeal_text: text }, "appeal"))) {
    return alreadyHandled();
  }
  ctx.logger.info("Appeal submitted", { courseId: course.id });

  const deadline = course.appeal_review_deadline
    ? formatLocalDateTime(new Date(course.appeal_review_deadline), ctx.policy)
    : "-";
  await ctx.notifier.reopenThread(participant);
  await ctx.notifier.mediaToThread(
    participant,
    mediaRef,
    "video",
    threadText.appealEvidence(text, deadline),
    appealReviewButtons(course.id),
  );
  await ctx.notifier.toGeneral(generalText.appealSubmitted(participant.name));
  await ctx.notifier.toParticipant(participant, participantText.appealSubmitted);
  return ok(result(course));
};

const loadAppeal = async (
  ctx: ComplianceContext,
  courseId: number,
): Promise<HandlerOutcome<{ course: Course; participant: Participant }>> => {
  const course = await ctx.store.courses.get(courseId);
  if (!course) return notApplicable("unknown_course");
  const participant = await ctx.store.participants.get(course.participant_id);
  if (!participant) return notApplicable("unknown_participant");
  if (course.status !== "appeal") {
    ctx.logger.info("Appeal already decided", { courseId, status: course.status });
    return alreadyHandled();
  }
  return ok({ course, participant });
};

/** appeal -> active. Every accepted appeal raises the strike allowance by one. */
export const acceptAppeal = async (ctx: ComplianceContext, courseId: number): Promise<HandlerOutcome<AppealResult>> => {
  const loaded = await loadAppeal(ctx, courseId);
  if (loaded.kind !== "ok") return loaded;
  const { course, participant } = loaded.result;

  const patch = {
    ...cleared,
    status: "active" as const,
    appeal_count: course.appeal_count + 1,
    removal_reason: null,
  };
  if (!(await transitionCourse(ctx, course, "appeal", patch))) {
    return alreadyHandled();
  }

  await ctx.notifier.toParticipant(participant, participantText.appealAccepted);
  await ctx.notifier.toThread(participant, threadText.appealAccepted(patch.appeal_count));
  await ctx.notifier.renameThread(participant, threadTitle(participant.name, course.current_day, course.total_days));
  await ctx.notifier.setButtons(
    course.registration_message,
    cardButtons(course.id, !course.extended, ctx.policy.extensionDays),
  );
  return ok(result({ ...course, ...patch }));
};

/** appeal -> refused on a reviewer's decline. */
export const declineAppeal = async (ctx: ComplianceContext, courseId: number): Promise<HandlerOutcome<AppealResult>> => {
  const loaded = await loadAppeal(ctx, courseId);
  if (loaded.kind !== "ok") return loaded;
  const refused = await closeAppeal(ctx, loaded.result.course, "appeal_declined");
  return refused ? ok(refused) : alreadyHandled();
};

/**
 * Ends a pending appeal as refused and clears its evidence. A decline and an unanswered
 * appeal both count as a used appeal.
 */
export const closeAppeal = async (
  ctx: ComplianceContext,
  course: Course,
  reason: "appeal_declined" | "appeal_expired",
): Promise<AppealResult | null> => {
  const patch = {
    ...cleared,
    status: "refused" as const,
    appeal_count: course.appeal_count + 1,
    removal_reason: reason,
  };
  if (!(await transitionCourse(ctx, course, "appeal", patch))) {
    return null;
  }
  const updated = { ...course, ...patch };
  await announceRemoval(ctx, updated, null);
  return result(updated);
};
