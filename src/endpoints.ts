import { z } from "zod";

import { acceptAppeal, declineAppeal, startAppeal, submitAppealMedia, submitAppealText } from "./appeals.js";
import type { ComplianceContext } from "./context.js";
import {
  activateCourse,
  completeCourse,
  createCourse,
  expireCourse,
  extendCourse,
  registerParticipant,
  registerReviewer,
} from "./enrollment.js";
import { describeStatus, submitMedia } from "./intake.js";
import { notApplicable, type HandlerOutcome } from "./outcomes.js";
import { confirmSubmission, rejectSubmission, requestReshoot } from "./review.js";
import { BUTTON_ACTIONS } from "./sink.js";

export type EndpointResult<T> = {
  status: number;
  body: T;
};

export type ErrorBody = { error: string };

type Reply = EndpointResult<HandlerOutcome<unknown> | ErrorBody>;

const chatId = z.string().trim().min(1);
const positiveId = z.coerce.number().int().positive();
const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");
const dateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const inboundEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("media"),
    chat_id: chatId,
    media_ref: z.string().min(1),
    content_type: z.string().min(1).default("video/mp4"),
    media_kind: z.enum(["video", "video_note", "document"]),
  }),
  z.object({
    type: z.literal("button"),
    chat_id: chatId,
    action: z.enum(BUTTON_ACTIONS),
    target: positiveId,
  }),
  z.object({
    type: z.literal("text"),
    chat_id: chatId,
    text: z.string().trim().min(1),
  }),
]);

export type InboundEvent = z.infer<typeof inboundEventSchema>;

const participantSchema = z.object({
  name: z.string().trim().min(1),
  chat_id: chatId,
  thread_id: z.string().min(1).nullable().optional(),
  reviewer_id: positiveId.nullable().optional(),
});

const reviewerSchema = z.object({
  name: z.string().trim().min(1),
  chat_id: chatId,
});

const courseSchema = z.object({
  participant_id: positiveId,
  total_days: z.number().int().positive().optional(),
});

const activationSchema = z.object({
  scheduled_time: timeOfDay,
  start_date: dateKey.optional(),
});

const extensionSchema = z.object({
  total_days: z.number().int().positive().optional(),
});

const invalid = (error: z.ZodError): EndpointResult<ErrorBody> => ({
  status: 400,
  body: {
    error: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
  },
});

// Benign outcomes are 200s; only an unreachable classifier or media store is an upstream failure.
export const toResult = <T>(outcome: HandlerOutcome<T>, okStatus = 200): EndpointResult<HandlerOutcome<T>> => {
  if (outcome.kind === "transport_error") return { status: 502, body: outcome };
  return { status: outcome.kind === "ok" ? okStatus : 200, body: outcome };
};

/** Routes one inbound chat event to its handler. */
export const dispatchEvent = async (ctx: ComplianceContext, event: InboundEvent): Promise<HandlerOutcome<unknown>> => {
  if (event.type === "button") {
    return dispatchButton(ctx, event.chat_id, event.action, event.target);
  }

  const participant = await ctx.store.participants.findByChatId(event.chat_id);
  if (!participant) return notApplicable("unknown_participant");
  const course = await ctx.store.courses.findOpenByParticipant(participant.id);

  if (event.type === "media") {
    const media = { ref: event.media_ref, content_type: event.content_type, kind: event.media_kind };
    if (course?.status === "appeal" && course.appeal_media === null) {
      return submitAppealMedia(ctx, participant, course, media);
    }
    return submitMedia(ctx, participant, media);
  }

  if (course?.status === "appeal" && course.appeal_media !== null && course.appeal_text === null) {
    return submitAppealText(ctx, participant, course, event.text);
  }
  return describeStatus(ctx, participant);
};

const dispatchButton = (
  ctx: ComplianceContext,
  actorChatId: string,
  action: (typeof BUTTON_ACTIONS)[number],
  target: number,
): Promise<HandlerOutcome<unknown>> => {
  switch (action) {
    case "confirm":
      return confirmSubmission(ctx, target, actorChatId);
    case "reject":
      return rejectSubmission(ctx, target, actorChatId);
    case "reshoot":
      return requestReshoot(ctx, target, actorChatId);
    case "appeal_start":
      return startAppeal(ctx, target, actorChatId);
    case "appeal_accept":
      return acceptAppeal(ctx, target);
    case "appeal_decline":
      return declineAppeal(ctx, target);
    case "extend":
      return extendCourse(ctx, target);
    case "complete":
      return completeCourse(ctx, target);
  }
};

export const postEvent = async (ctx: ComplianceContext, body: unknown): Promise<Reply> => {
  const parsed = inboundEventSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  return toResult(await dispatchEvent(ctx, parsed.data));
};

export const postParticipant = async (ctx: ComplianceContext, body: unknown): Promise<Reply> => {
  const parsed = participantSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  const { name, chat_id, thread_id, reviewer_id } = parsed.data;
  return toResult(
    await registerParticipant(ctx, { name, chat_id, thread_id: thread_id ?? null, reviewer_id: reviewer_id ?? null }),
    201,
  );
};

export const postReviewer = async (ctx: ComplianceContext, body: unknown): Promise<Reply> => {
  const parsed = reviewerSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  return toResult(await registerReviewer(ctx, parsed.data), 201);
};

export const postCourse = async (ctx: ComplianceContext, body: unknown): Promise<Reply> => {
  const parsed = courseSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  return toResult(await createCourse(ctx, parsed.data), 201);
};

export const postActivate = async (ctx: ComplianceContext, id: unknown, body: unknown): Promise<Reply> => {
  const courseId = positiveId.safeParse(id);
  if (!courseId.success) return invalid(courseId.error);
  const parsed = activationSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);
  return toResult(await activateCourse(ctx, courseId.data, parsed.data));
};

export const postExtend = async (ctx: ComplianceContext, id: unknown, body: unknown): Promise<Reply> => {
  const courseId = positiveId.safeParse(id);
  if (!courseId.success) return invalid(courseId.error);
  const parsed = extensionSchema.safeParse(body ?? {});
  if (!parsed.success) return invalid(parsed.error);
  return toResult(await extendCourse(ctx, courseId.data, parsed.data.total_days));
};

export const postExpire = async (ctx: ComplianceContext, id: unknown): Promise<Reply> => {
  const courseId = positiveId.safeParse(id);
  if (!courseId.success) return invalid(courseId.error);
  return toResult(await expireCourse(ctx, courseId.data));
};
