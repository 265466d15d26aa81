import {
  checkWindow,
  delayMinutes,
  formatLocalDateTime,
  isPast,
  localDateKey,
  nextDayDeadline,
  planApprovedDay,
  resolveScheduledInstant,
} from "../core/compliance_engine/index.js";
import type { ComplianceContext } from "./context.js";
import { generalText, participantText, reviewButtons, threadText } from "./messages.js";
import type { Course, IntakeLog, IntakeLogPatch, MessageRef, NewIntakeLog, Participant } from "./models.js";
import { alreadyHandled, notApplicable, ok, transportError, type HandlerOutcome, type NotApplicableReason } from "./outcomes.js";
import { verifySubmission, type Verdict } from "./pipeline.js";
import { commitLoggedDay } from "./progress.js";
import { refuseCourse } from "./removal.js";
import type { MediaKind } from "./sink.js";

// IncomingMedia is a participant's submitted file as the chat platform references it.
export type IncomingMedia = {
  ref: string;
  content_type: string;
  kind: MediaKind;
};

export type SubmissionDecision = "advanced" | "completed" | "removed" | "pending_review";

// SubmissionResult is what a handled submission did to the day's log and the course.
export type SubmissionResult = {
  log_id: number;
  day: number;
  decision: SubmissionDecision;
  late: boolean;
};

export const isVideo = (media: IncomingMedia): boolean =>
  media.kind !== "document" || media.content_type.startsWith("video/");

const decline = async <T>(
  ctx: ComplianceContext,
  participant: Participant,
  reason: NotApplicableReason,
  text: string,
): Promise<HandlerOutcome<T>> => {
  await ctx.notifier.toParticipant(participant, text);
  return notApplicable(reason);
};

/**
 * Handles a participant's video for the next unclaimed day, or for an outstanding
 * reshoot. Nothing is written before the classifier has answered.
 */
export const submitMedia = async (
  ctx: ComplianceContext,
  participant: Participant,
  media: IncomingMedia,
): Promise<HandlerOutcome<SubmissionResult>> => {
  const course = await ctx.store.courses.findOpenByParticipant(participant.id);
  if (!course || course.status !== "active") {
    return declineWithoutCourse(ctx, participant);
  }
  if (!isVideo(media)) {
    return decline(ctx, participant, "unsupported_media", participantText.videoOnly);
  }

  const reshoot = await ctx.store.intakeLogs.findByCourseAndStatus(course.id, "reshoot");
  if (reshoot) {
    return submitReshoot(ctx, participant, course, reshoot, media);
  }

  if (course.current_day >= course.total_days) {
    return decline(ctx, participant, "course_finished", participantText.courseFinished);
  }
  if (!course.scheduled_time) {
    return decline(ctx, participant, "no_schedule", participantText.noActiveCourse);
  }

  const now = ctx.clock();
  const window = checkWindow(course.scheduled_time, now, ctx.policy);
  if (window.status === "TOO_EARLY") {
    return decline(ctx, participant, "window_too_early", participantText.tooEarly(window.opensAt ?? course.scheduled_time));
  }
  if (window.status === "CLOSED") {
    return decline(ctx, participant, "window_closed", participantText.windowClosed);
  }

  const scheduledAt = resolveScheduledInstant(course.scheduled_time, now, ctx.policy);
  if (course.start_date !== null && localDateKey(scheduledAt, ctx.policy) < course.start_date) {
    return decline(ctx, participant, "not_started", participantText.notStarted(course.start_date));
  }
  if (await hasSubmissionFor(ctx, course, scheduledAt)) {
    return decline(ctx, participant, "already_submitted", participantText.alreadySubmitted);
  }
  const day = course.current_day + 1;
  const existing = await ctx.store.intakeLogs.findByCourseAndDay(course.id, day);

  const processing = await ctx.notifier.toParticipant(participant, participantText.processing);
  const verdict = await verify(ctx, media);
  if (verdict.kind === "transport_error") {
    await ctx.notifier.replaceOrSend(participant, processing, participantText.retryLater);
    return transportError(verdict.message);
  }

  const delay = delayMinutes(scheduledAt, now);
  const base = {
    course_id: course.id,
    day,
    scheduled_at: scheduledAt.toISOString(),
    taken_at: now.toISOString(),
    delay_minutes: delay,
    media_ref: media.ref,
    confidence: verdict.confidence,
  };

  if (verdict.kind === "needs_review") {
    const log = await storeLog(ctx, existing, {
      ...base,
      status: "pending_review",
      verified_by: null,
      review_started_at: now.toISOString(),
    });
    if (!log) {
      return raceLost(ctx, participant, processing);
    }
    await sendToReview(ctx, participant, course, log, media, verdict.reason, processing);
    return ok({ log_id: log.id, day, decision: "pending_review", late: false });
  }

  const plan = planApprovedDay(course, { day, delayMinutes: delay, scheduledAt, now }, ctx.policy);
  const log = await storeLog(ctx, existing, {
    ...base,
    status: plan.kind === "removed" ? "missed" : "taken",
    verified_by: verdict.verifiedBy,
    review_started_at: null,
  });
  if (!log) {
    return raceLost(ctx, participant, processing);
  }
  await ctx.store.intakeLogs.update(log.id, { participant_message: processing });
  await ctx.notifier.mediaToThread(
    participant,
    media.ref,
    media.kind,
    threadText.submission(day, course.total_days, delay, verdict.confidence),
  );

  if (!(await commitLoggedDay(ctx, course, participant, plan, processing, log, log.status, "missed"))) {
    await ctx.store.intakeLogs.update(log.id, { status: "missed" });
    return raceLost(ctx, participant, processing);
  }
  return ok({ log_id: log.id, day, decision: plan.kind, late: plan.late });
};

/**
 * Whether the participant already sent something for the occurrence at `scheduledAt`:
 * a next-day log still under review or awaiting a reshoot, a next-day log for this very
 * occurrence, or the last counted day's log belonging to it. A next-day `taken` log from
 * an earlier occurrence is an advance that never committed and does not count.
 */
export const hasSubmissionFor = async (ctx: ComplianceContext, course: Course, scheduledAt: Date): Promise<boolean> => {
  const next = await ctx.store.intakeLogs.findByCourseAndDay(course.id, course.current_day + 1);
  if (next && (next.status === "pending_review" || next.status === "reshoot")) {
    return true;
  }
  if (next && next.status !== "missed" && Date.parse(next.scheduled_at) === scheduledAt.getTime()) {
    return true;
  }
  if (course.current_day === 0) {
    return false;
  }
  const last = await ctx.store.intakeLogs.findByCourseAndDay(course.id, course.current_day);
  return last !== null && Date.parse(last.scheduled_at) === scheduledAt.getTime();
};

const declineWithoutCourse = async (
  ctx: ComplianceContext,
  participant: Participant,
): Promise<HandlerOutcome<SubmissionResult>> => {
  const latest = await ctx.store.courses.findLatestByParticipant(participant.id);
  if (latest?.status === "completed") {
    return decline(ctx, participant, "course_finished", participantText.courseFinished);
  }
  return decline(ctx, participant, "no_active_course", participantText.noActiveCourse);
};

const verify = (ctx: ComplianceContext, media: IncomingMedia): Promise<Verdict> =>
  verifySubmission({
    media: ctx.media,
    classifier: ctx.classifier,
    logger: ctx.logger,
    confidenceThreshold: ctx.policy.confidenceThreshold,
    mediaRef: media.ref,
  });

// A `missed` log left by a removal, or a stale one from an advance that never committed, is taken over in place.
const storeLog = async (ctx: ComplianceContext, existing: IntakeLog | null, input: NewIntakeLog): Promise<IntakeLog | null> => {
  if (!existing) {
    return ctx.store.intakeLogs.create(input);
  }
  const { course_id: _courseId, day: _day, ...patch } = input;
  if (!(await ctx.store.intakeLogs.updateIfStatus(existing.id, patch, existing.status))) {
    return null;
  }
  return ctx.store.intakeLogs.get(existing.id);
};

const raceLost = async (
  ctx: ComplianceContext,
  participant: Participant,
  processing: MessageRef | null,
): Promise<HandlerOutcome<SubmissionResult>> => {
  ctx.logger.info("Submission already handled", { participantId: participant.id });
  await ctx.notifier.replaceOrSend(participant, processing, participantText.alreadySubmitted);
  return alreadyHandled();
};

const sendToReview = async (
  ctx: ComplianceContext,
  participant: Participant,
  course: Course,
  log: IntakeLog,
  media: IncomingMedia,
  reason: string,
  processing: MessageRef | null,
): Promise<void> => {
  const now = ctx.clock();
  await ctx.store.intakeLogs.update(log.id, { participant_message: processing });
  const deadline = course.scheduled_time ? nextDayDeadline(now, course.scheduled_time, ctx.policy) : now;
  await ctx.notifier.replaceOrSend(participant, processing, participantText.pendingReview);
  await ctx.notifier.mediaToThread(
    participant,
    media.ref,
    media.kind,
    threadText.reviewNeeded(log.day, course.total_days, reason, formatLocalDateTime(deadline, ctx.policy)),
    reviewButtons(log.id),
  );
  const reviewer = participant.reviewer_id === null ? null : await ctx.store.participants.getReviewer(participant.reviewer_id);
  if (reviewer) {
    await ctx.notifier.toReviewer(reviewer, generalText.reviewNeeded(participant.name, log.day));
  } else {
    await ctx.notifier.toGeneral(generalText.reviewNeeded(participant.name, log.day));
  }
  ctx.logger.info("Submission sent to review", { courseId: course.id, logId: log.id, day: log.day });
};

/**
 * A reshoot is accepted at any time before its deadline and updates the same log.
 * Lateness is not recorded for it.
 */
const submitReshoot = async (
  ctx: ComplianceContext,
  participant: Participant,
  course: Course,
  log: IntakeLog,
  media: IncomingMedia,
): Promise<HandlerOutcome<SubmissionResult>> => {
  const now = ctx.clock();
  if (isPast(log.reshoot_deadline, now)) {
    if (!(await ctx.store.intakeLogs.updateIfStatus(log.id, { status: "missed" }, "reshoot"))) {
      return alreadyHandled();
    }
    const refused = await refuseCourse(ctx, course, { reason: "reshoot_expired", from: "active" });
    return refused ? ok({ log_id: log.id, day: log.day, decision: "removed", late: false }) : alreadyHandled();
  }

  const processing = await ctx.notifier.toParticipant(participant, participantText.processing);
  const verdict = await verify(ctx, media);
  if (verdict.kind === "transport_error") {
    await ctx.notifier.replaceOrSend(participant, processing, participantText.retryLater);
    return transportError(verdict.message);
  }

  const patch: IntakeLogPatch = {
    taken_at: now.toISOString(),
    media_ref: media.ref,
    confidence: verdict.confidence,
    participant_message: processing,
  };

  if (verdict.kind === "needs_review") {
    const moved = await ctx.store.intakeLogs.updateIfStatus(
      log.id,
      { ...patch, status: "pending_review", verified_by: null, review_started_at: now.toISOString() },
      "reshoot",
    );
    if (!moved) {
      return raceLost(ctx, participant, processing);
    }
    await sendToReview(ctx, participant, course, log, media, verdict.reason, processing);
    return ok({ log_id: log.id, day: log.day, decision: "pending_review", late: false });
  }

  if (!(await ctx.store.intakeLogs.updateIfStatus(log.id, { ...patch, status: "taken", verified_by: verdict.verifiedBy }, "reshoot"))) {
    return raceLost(ctx, participant, processing);
  }
  await ctx.notifier.mediaToThread(
    participant,
    media.ref,
    media.kind,
    threadText.submission(log.day, course.total_days, log.delay_minutes, verdict.confidence),
  );

  const plan = planApprovedDay(
    course,
    { day: log.day, delayMinutes: 0, scheduledAt: new Date(log.scheduled_at), now },
    ctx.policy,
  );
  if (!(await commitLoggedDay(ctx, course, participant, plan, processing, log, "taken", "reshoot"))) {
    return raceLost(ctx, participant, processing);
  }
  return ok({ log_id: log.id, day: log.day, decision: plan.kind, late: false });
};

export type StatusGuidance = {
  text: string;
};

/** Answers plain text from a participant with where they stand today. */
export const describeStatus = async (ctx: ComplianceContext, participant: Participant): Promise<HandlerOutcome<StatusGuidance>> => {
  const text = await guidanceFor(ctx, participant);
  await ctx.notifier.toParticipant(participant, text);
  return ok({ text });
};

const guidanceFor = async (ctx: ComplianceContext, participant: Participant): Promise<string> => {
  const course = await ctx.store.courses.findOpenByParticipant(participant.id);
  if (!course) {
    const latest = await ctx.store.courses.findLatestByParticipant(participant.id);
    return latest?.status === "completed" ? participantText.courseFinished : participantText.noActiveCourse;
  }
  if (course.status === "appeal") {
    return course.appeal_media === null ? participantText.appealAskMedia : participantText.appealSubmitted;
  }
  if (course.status !== "active" || !course.scheduled_time) {
    return participantText.noActiveCourse;
  }
  if (course.current_day >= course.total_days) {
    return participantText.courseFinished;
  }

  const reshoot = await ctx.store.intakeLogs.findByCourseAndStatus(course.id, "reshoot");
  if (reshoot?.reshoot_deadline) {
    return participantText.reshootPending(formatLocalDateTime(new Date(reshoot.reshoot_deadline), ctx.policy));
  }

  const now = ctx.clock();
  const window = checkWindow(course.scheduled_time, now, ctx.policy);
  if (window.status === "TOO_EARLY") {
    return participantText.tooEarly(window.opensAt ?? course.scheduled_time);
  }
  const scheduledAt = resolveScheduledInstant(course.scheduled_time, now, ctx.policy);
  if (course.start_date !== null && localDateKey(scheduledAt, ctx.policy) < course.start_date) {
    return participantText.notStarted(course.start_date);
  }
  if (await hasSubmissionFor(ctx, course, scheduledAt)) {
    return participantText.alreadySubmitted;
  }
  return window.status === "OPEN" ? participantText.sendNow : participantText.windowClosed;
};
