import test from "node:test";
import assert from "node:assert/strict";

import { TransportError } from "./errors.js";
import { describeStatus, submitMedia, type IncomingMedia } from "./intake.js";
import type { CoursePatch } from "./models.js";
import { buildTestContext, seedCourse, seedLog, seedParticipant, seedReviewer } from "./testing/fakes.js";

const video: IncomingMedia = { ref: "file-1", content_type: "video/mp4", kind: "video" };

const setup = async (now: string, coursePatch: CoursePatch = {}) => {
  const harness = buildTestContext(now);
  const reviewer = await seedReviewer(harness.store);
  const participant = await seedParticipant(harness.store, { reviewer_id: reviewer.id });
  const course = await seedCourse(harness.store, participant.id, coursePatch);
  return { ...harness, participant, course };
};

test("an on-time approved video advances the day", async () => {
  const { ctx, store, sink, participant, course } = await setup("2024-05-01T09:05:00Z");

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: 1, day: 6, decision: "advanced", late: false } });
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.current_day, 6);
  assert.equal(updated?.late_count, 0);
  const log = await store.intakeLogs.get(1);
  assert.equal(log?.status, "taken");
  assert.equal(log?.scheduled_at, "2024-05-01T09:00:00.000Z");
  assert.equal(log?.delay_minutes, 5);
  assert.equal(log?.verified_by, "classifier");
  assert.deepEqual(log?.participant_message, { chat_id: "participant-chat", message_id: 101 });
  assert.deepEqual(sink.direct("participant-chat"), ["Video received, checking it now.", "Day 6/21 accepted."]);
  assert.deepEqual(sink.thread("thread-1"), ["Day 6/21, delay 5 min, confidence 0.95."]);
  assert.equal(sink.succeeded("renameThread")[0]?.title, "Dana 6/21");
  assert.deepEqual(sink.direct("reviewer-chat"), []);
  assert.deepEqual(sink.general(), []);
});

test("a late video advances with a strike", async () => {
  const { ctx, store, sink, participant, course } = await setup("2024-05-01T09:45:00Z");

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: 1, day: 6, decision: "advanced", late: true } });
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.current_day, 6);
  assert.equal(updated?.late_count, 1);
  assert.deepEqual(updated?.late_dates, ["2024-05-01T09:45:00.000Z"]);
  assert.equal(sink.direct("participant-chat")[1], "Day 6/21 accepted, but it was late. Strike 1/3.");
  assert.deepEqual(sink.thread("thread-1"), ["Day 6/21, delay 45 min, confidence 0.95.", "Late submission. Strike 1/3."]);
});

test("the strike that reaches the allowance removes the course and the day does not count", async () => {
  const { ctx, store, sink, participant, course } = await setup("2024-05-01T09:45:00Z", {
    late_count: 2,
    late_dates: ["2024-04-28T09:40:00.000Z", "2024-04-29T09:50:00.000Z"],
  });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: 1, day: 6, decision: "removed", late: true } });
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.status, "refused");
  assert.equal(updated?.current_day, 5);
  assert.equal(updated?.late_count, 3);
  assert.equal(updated?.removal_reason, "max_strikes");
  assert.equal(updated?.appeal_deadline, "2024-05-02T07:00:00.000Z");
  assert.equal((await store.intakeLogs.get(1))?.status, "missed");

  const edit = sink.succeeded("editMessage").at(-1);
  assert.equal(
    edit?.text,
    "You have been removed from the course: too many late submissions.\nYou can appeal until 02.05 07:00.",
  );
  assert.deepEqual(edit?.buttons, [{ label: "Appeal", action: "appeal_start", target: course.id }]);
  assert.equal(sink.succeeded("renameThread")[0]?.title, "Dana 5/21 [removed]");
  assert.equal(sink.succeeded("closeThread").length, 1);
  assert.deepEqual(sink.general(), ["Dana removed: too many late submissions."]);
});

test("a classifier outage changes nothing and asks for a retry", async () => {
  const { ctx, store, sink, classifier, logger, participant, course } = await setup("2024-05-01T09:05:00Z");
  classifier.enqueue(new TransportError("Classifier failed with HTTP 503"));

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "transport_error", message: "Classifier failed with HTTP 503" });
  assert.equal(await store.intakeLogs.findByCourseAndDay(course.id, 6), null);
  assert.equal((await store.courses.get(course.id))?.current_day, 5);
  assert.deepEqual(sink.direct("participant-chat"), [
    "Video received, checking it now.",
    "The video could not be checked right now. Please send it again in a minute.",
  ]);
  assert.equal(logger.messages("warn").length, 1);
});

test("an uncertain verdict waits for the reviewer", async () => {
  const { ctx, store, sink, classifier, participant, course } = await setup("2024-05-01T09:05:00Z");
  classifier.enqueue({ approved: false, confidence: 0.5, reason: "blurry" });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: 1, day: 6, decision: "pending_review", late: false } });
  const log = await store.intakeLogs.get(1);
  assert.equal(log?.status, "pending_review");
  assert.equal(log?.review_started_at, "2024-05-01T09:05:00.000Z");
  assert.equal((await store.courses.get(course.id))?.current_day, 5);

  const media = sink.succeeded("sendMedia")[0];
  assert.equal(media?.text, "Day 6/21 needs review (blurry). Decide before 02.05 07:00.");
  assert.deepEqual(
    media?.buttons?.map((button) => button.action),
    ["confirm", "reject", "reshoot"],
  );
  assert.deepEqual(sink.direct("reviewer-chat"), ["Dana, day 6: video waiting for review."]);
  assert.equal(sink.direct("participant-chat")[1], "The video went to your reviewer for a manual check.");
});

test("without a reviewer the review request goes to the general channel", async () => {
  const harness = buildTestContext("2024-05-01T09:05:00Z");
  const participant = await seedParticipant(harness.store);
  await seedCourse(harness.store, participant.id);
  harness.classifier.enqueue({ approved: true, confidence: 0.4, reason: "" });

  await submitMedia(harness.ctx, participant, video);

  assert.deepEqual(harness.sink.general(), ["Dana, day 6: video waiting for review."]);
});

test("videos outside the window are declined", async () => {
  const { ctx, sink, setNow, participant, classifier } = await setup("2024-05-01T08:30:00Z");

  assert.deepEqual(await submitMedia(ctx, participant, video), { kind: "not_applicable", reason: "window_too_early" });
  assert.deepEqual(sink.direct("participant-chat"), ["Too early. The window opens at 08:50."]);

  setNow("2024-05-01T11:30:00Z");
  assert.deepEqual(await submitMedia(ctx, participant, video), { kind: "not_applicable", reason: "window_closed" });
  assert.equal(sink.direct("participant-chat")[1], "Today's window has closed.");
  assert.equal(classifier.calls, 0);
});

test("a second video for the same occurrence is declined", async () => {
  const { ctx, store, sink, setNow, classifier, participant, course } = await setup("2024-05-01T09:05:00Z");
  await submitMedia(ctx, participant, video);

  setNow("2024-05-01T09:20:00Z");
  const outcome = await submitMedia(ctx, participant, { ...video, ref: "file-2" });

  assert.deepEqual(outcome, { kind: "not_applicable", reason: "already_submitted" });
  assert.equal((await store.courses.get(course.id))?.current_day, 6);
  assert.equal(await store.intakeLogs.findByCourseAndDay(course.id, 7), null);
  assert.equal(classifier.calls, 1);
  assert.equal(sink.direct("participant-chat").at(-1), "Today's video is already in. See you tomorrow.");
});

test("non-video documents and missing courses are declined", async () => {
  const { ctx, store, sink, participant } = await setup("2024-05-01T09:05:00Z");
  assert.deepEqual(
    await submitMedia(ctx, participant, { ref: "file-9", content_type: "application/pdf", kind: "document" }),
    { kind: "not_applicable", reason: "unsupported_media" },
  );
  assert.deepEqual(sink.direct("participant-chat"), ["Please send a video."]);

  const stranger = await seedParticipant(store, { name: "Sam", chat_id: "stranger-chat", thread_id: null });
  assert.deepEqual(await submitMedia(ctx, stranger, video), { kind: "not_applicable", reason: "no_active_course" });
  assert.deepEqual(sink.direct("stranger-chat"), ["You have no active course."]);
});

test("a completed course answers that it is finished", async () => {
  const { ctx, store, sink, participant, course } = await setup("2024-05-01T09:05:00Z");
  await store.courses.update(course.id, { status: "completed", current_day: 21 });

  assert.deepEqual(await submitMedia(ctx, participant, video), { kind: "not_applicable", reason: "course_finished" });
  assert.deepEqual(sink.direct("participant-chat"), ["Your course is already finished."]);
});

test("the last day completes the course and closes the thread", async () => {
  const { ctx, store, sink, participant, course } = await setup("2024-05-01T09:05:00Z", { current_day: 20 });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: 1, day: 21, decision: "completed", late: false } });
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.status, "completed");
  assert.equal(updated?.current_day, 21);
  assert.equal(sink.direct("participant-chat")[1], "All 21 days done. The course is complete.");
  assert.equal(sink.succeeded("renameThread")[0]?.title, "Dana 21/21 [done]");
  assert.deepEqual(sink.succeeded("editButtons")[0]?.buttons, []);
  assert.deepEqual(sink.thread("thread-1"), ["Day 21/21, delay 5 min, confidence 0.95.", "Completed all 21 days."]);
  assert.equal(sink.succeeded("closeThread").length, 1);
});

test("a missed log left by a removal is reused after reinstatement", async () => {
  const { ctx, store, participant, course } = await setup("2024-05-01T09:50:00Z", {
    late_count: 3,
    late_dates: ["2024-04-28T09:40:00.000Z", "2024-04-29T09:50:00.000Z", "2024-05-01T09:45:00.000Z"],
    appeal_count: 1,
  });
  const missed = await seedLog(store, course.id, 6, { status: "missed", delay_minutes: 45 });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: missed.id, day: 6, decision: "advanced", late: false } });
  const log = await store.intakeLogs.get(missed.id);
  assert.equal(log?.status, "taken");
  assert.equal(log?.delay_minutes, 50);
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.current_day, 6);
  assert.equal(updated?.late_count, 3);
});

test("an approved reshoot counts the day without lateness", async () => {
  const { ctx, store, sink, participant, course } = await setup("2024-05-01T15:00:00Z");
  const log = await seedLog(store, course.id, 6, { status: "reshoot", reshoot_deadline: "2024-05-02T07:00:00.000Z" });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: log.id, day: 6, decision: "advanced", late: false } });
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.current_day, 6);
  assert.equal(updated?.late_count, 0);
  const stored = await store.intakeLogs.get(log.id);
  assert.equal(stored?.status, "taken");
  assert.equal(stored?.media_ref, "file-1");
  assert.deepEqual(sink.thread("thread-1"), ["Day 6/21, delay 5 min, confidence 0.95."]);
  assert.deepEqual(sink.direct("participant-chat"), ["Video received, checking it now.", "Day 6/21 accepted."]);
});

test("a reshoot after its deadline removes the course without an appeal", async () => {
  const { ctx, store, sink, classifier, participant, course } = await setup("2024-05-02T08:00:00Z");
  const log = await seedLog(store, course.id, 6, { status: "reshoot", reshoot_deadline: "2024-05-02T07:00:00.000Z" });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: log.id, day: 6, decision: "removed", late: false } });
  assert.equal(classifier.calls, 0);
  assert.equal((await store.intakeLogs.get(log.id))?.status, "missed");
  const updated = await store.courses.get(course.id);
  assert.equal(updated?.status, "refused");
  assert.equal(updated?.removal_reason, "reshoot_expired");
  assert.equal(updated?.appeal_deadline, null);
  assert.deepEqual(sink.direct("participant-chat"), [
    "You have been removed from the course: the requested reshoot was not sent in time.",
  ]);
  assert.equal(sink.succeeded("sendMessage").find((call) => call.destination?.kind === "direct")?.buttons, undefined);
});

test("plain text is answered with where the participant stands", async () => {
  const { ctx, sink, setNow, participant } = await setup("2024-05-01T08:30:00Z");

  assert.deepEqual(await describeStatus(ctx, participant), {
    kind: "ok",
    result: { text: "Too early. The window opens at 08:50." },
  });

  setNow("2024-05-01T09:05:00Z");
  await describeStatus(ctx, participant);
  await submitMedia(ctx, participant, video);
  await describeStatus(ctx, participant);

  setNow("2024-05-01T11:30:00Z");
  await describeStatus(ctx, participant);

  assert.deepEqual(sink.direct("participant-chat"), [
    "Too early. The window opens at 08:50.",
    "The window is open. Send your video now.",
    "Video received, checking it now.",
    "Day 6/21 accepted.",
    "Today's video is already in. See you tomorrow.",
    "Today's video is already in. See you tomorrow.",
  ]);
});

test("a failed day advance puts the log back so the video can be sent again", async (t) => {
  const { ctx, store, logger, participant, course } = await setup("2024-05-01T09:05:00Z");
  const update = t.mock.method(store.courses, "updateIfStatus");
  update.mock.mockImplementationOnce(async () => {
    throw new Error("connection reset");
  });

  await assert.rejects(submitMedia(ctx, participant, video), { message: "connection reset" });

  assert.equal((await store.intakeLogs.get(1))?.status, "missed");
  assert.equal((await store.courses.get(course.id))?.current_day, 5);
  assert.ok(logger.messages("warn").includes("Day advance failed, log reverted"));

  const retried = await submitMedia(ctx, participant, { ...video, ref: "file-2" });

  assert.deepEqual(retried, { kind: "ok", result: { log_id: 1, day: 6, decision: "advanced", late: false } });
  assert.equal((await store.intakeLogs.get(1))?.media_ref, "file-2");
  assert.equal((await store.courses.get(course.id))?.current_day, 6);
});

test("a taken log from an earlier occurrence that never counted does not block today", async () => {
  const { ctx, store, participant, course } = await setup("2024-05-01T09:05:00Z");
  const stale = await seedLog(store, course.id, 6, { status: "taken", scheduled_at: "2024-04-30T09:00:00.000Z" });

  const outcome = await submitMedia(ctx, participant, video);

  assert.deepEqual(outcome, { kind: "ok", result: { log_id: stale.id, day: 6, decision: "advanced", late: false } });
  assert.equal((await store.intakeLogs.get(stale.id))?.scheduled_at, "2024-05-01T09:00:00.000Z");
  assert.equal((await store.courses.get(course.id))?.current_day, 6);
});

test("videos before the course's start date are declined", async () => {
  const { ctx, store, sink, classifier, participant, course } = await setup("2024-05-01T09:05:00Z", {
    start_date: "2024-05-02",
  });

  assert.deepEqual(await submitMedia(ctx, participant, video), { kind: "not_applicable", reason: "not_started" });
  assert.equal(classifier.calls, 0);
  assert.equal(await store.intakeLogs.findByCourseAndDay(course.id, 6), null);
  assert.deepEqual(await describeStatus(ctx, participant), {
    kind: "ok",
    result: { text: "Your course starts on 2024-05-02." },
  });
  assert.deepEqual(sink.direct("participant-chat"), [
    "Your course starts on 2024-05-02.",
    "Your course starts on 2024-05-02.",
  ]);
});
