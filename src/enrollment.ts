import { randomUUID } from "node:crypto";

import { localDateKey } from "../core/compliance_engine/index.js";
import { runClosureSequence } from "./closure.js";
import type { ComplianceContext } from "./context.js";
import { cardButtons, participantText, threadText, threadTitle } from "./messages.js";
import type { Course, NewParticipant, NewReviewer, Participant, Reviewer } from "./models.js";
import { alreadyHandled, notApplicable, ok, type HandlerOutcome } from "./outcomes.js";
import { transitionCourse } from "./removal.js";

export const registerParticipant = async (
  ctx: ComplianceContext,
  input: NewParticipant,
): Promise<HandlerOutcome<Participant>> => {
  if (await ctx.store.participants.findByChatId(input.chat_id)) {
    return alreadyHandled();
  }
  if (input.reviewer_id !== null && !(await ctx.store.participants.getReviewer(input.reviewer_id))) {
    return notApplicable("unknown_reviewer");
  }
  const participant = await ctx.store.participants.create(input);
  ctx.logger.info("Participant registered", { participantId: participant.id });
  return ok(participant);
};

export const registerReviewer = async (ctx: ComplianceContext, input: NewReviewer): Promise<HandlerOutcome<Reviewer>> => {
  if (await ctx.store.participants.findReviewerByChatId(input.chat_id)) {
    return alreadyHandled();
  }
  return ok(await ctx.store.participants.createReviewer(input));
};

export type NewCourseRequest = {
  participant_id: number;
  total_days?: number;
};

/** Creates a course in `setup` with a fresh single-use invite code. */
export const createCourse = async (ctx: ComplianceContext, request: NewCourseRequest): Promise<HandlerOutcome<Course>> => {
  const participant = await ctx.store.participants.get(request.participant_id);
  if (!participant) return notApplicable("unknown_participant");

  const course = await ctx.store.courses.create({
    participant_id: participant.id,
    total_days: request.total_days ?? ctx.policy.defaultTotalDays,
    invite_code: randomUUID(),
  });
  if (!course) {
    return notApplicable("invalid_status");
  }
  ctx.logger.info("Course created", { courseId: course.id, participantId: participant.id });
  return ok(course);
};

export type ActivationRequest = {
  scheduled_time: string;
  start_date?: string;
};

const loadCourse = async (
  ctx: ComplianceContext,
  courseId: number,
): Promise<HandlerOutcome<{ course: Course; participant: Participant }>> => {
  const course = await ctx.store.courses.get(courseId);
  if (!course) return notApplicable("unknown_course");
  const participant = await ctx.store.participants.get(course.participant_id);
  if (!participant) return notApplicable("unknown_participant");
  return ok({ course, participant });
};

/** setup -> active on the first schedule choice; posts the registration card. */
export const activateCourse = async (
  ctx: ComplianceContext,
  courseId: number,
  request: ActivationRequest,
): Promise<HandlerOutcome<Course>> => {
  const loaded = await loadCourse(ctx, courseId);
  if (loaded.kind !== "ok") return loaded;
  const { course, participant } = loaded.result;
  if (course.status !== "setup") return alreadyHandled();
  if (course.invite_used) return notApplicable("invite_used");

  const patch = {
    status: "active" as const,
    invite_used: true,
    current_day: 0,
    scheduled_time: request.scheduled_time,
    start_date: request.start_date ?? localDateKey(ctx.clock(), ctx.policy),
  };
  if (!(await transitionCourse(ctx, course, "setup", patch))) {
    return alreadyHandled();
  }
  const active: Course = { ...course, ...patch };

  const card = await ctx.notifier.toThread(
    participant,
    threadText.registrationCard(participant.name, request.scheduled_time, patch.start_date, active.total_days),
    cardButtons(active.id, true, ctx.policy.extensionDays),
  );
  if (card) {
    await ctx.store.courses.update(active.id, { registration_message: card });
    active.registration_message = card;
  }
  await ctx.notifier.renameThread(participant, threadTitle(participant.name, 0, active.total_days));
  return ok(active);
};

/**
 * Raises the course length. Without `totalDays` this is the card's one-time extension
 * by the configured number of days; an explicit total must exceed the current one.
 */
export const extendCourse = async (
  ctx: ComplianceContext,
  courseId: number,
  totalDays?: number,
): Promise<HandlerOutcome<Course>> => {
  const loaded = await loadCourse(ctx, courseId);
  if (loaded.kind !== "ok") return loaded;
  const { course, participant } = loaded.result;
  if (course.status !== "active") return alreadyHandled();

  let total: number;
  if (totalDays === undefined) {
    if (course.extended) return notApplicable("already_extended");
    total = course.total_days + ctx.policy.extensionDays;
  } else {
    if (totalDays <= course.total_days) return notApplicable("invalid_total");
    total = totalDays;
  }

  if (!(await ctx.store.courses.updateIfStatus(course.id, { total_days: total, extended: true }, "active"))) {
    return alreadyHandled();
  }
  ctx.logger.info("Course extended", { courseId: course.id, from: course.total_days, to: total });

  await ctx.notifier.toParticipant(participant, participantText.extended(total));
  await ctx.notifier.toThread(participant, threadText.extended(course.total_days, total));
  await ctx.notifier.setButtons(course.registration_message, cardButtons(course.id, false, ctx.policy.extensionDays));
  await ctx.notifier.renameThread(participant, threadTitle(participant.name, course.current_day, total));
  return ok({ ...course, total_days: total, extended: true });
};

/** active -> completed before the last day, on the reviewer's word. */
export const completeCourse = async (ctx: ComplianceContext, courseId: number): Promise<HandlerOutcome<Course>> => {
  const loaded = await loadCourse(ctx, courseId);
  if (loaded.kind !== "ok") return loaded;
  const { course, participant } = loaded.result;
  if (course.status !== "active") return alreadyHandled();

  if (!(await transitionCourse(ctx, course, "active", { status: "completed" }))) {
    return alreadyHandled();
  }
  const completed: Course = { ...course, status: "completed" };
  await ctx.notifier.toParticipant(participant, participantText.completedEarly);
  await runClosureSequence(
    ctx.notifier,
    participant,
    completed,
    "completed",
    threadText.completedEarly(course.current_day, course.total_days),
  );
  return ok(completed);
};

/** setup -> expired for an invite that will not be used. */
export const expireCourse = async (ctx: ComplianceContext, courseId: number): Promise<HandlerOutcome<Course>> => {
  const course = await ctx.store.courses.get(courseId);
  if (!course) return notApplicable("unknown_course");
  if (course.status !== "setup") return alreadyHandled();
  if (!(await transitionCourse(ctx, course, "setup", { status: "expired" }))) {
    return alreadyHandled();
  }
  return ok({ ...course, status: "expired" });
};
