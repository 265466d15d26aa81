import test from "node:test";
import assert from "node:assert/strict";

import type { CoursePatch } from "../models.js";
import { buildTestContext, seedCourse, seedLog, seedParticipant } from "../testing/fakes.js";
import { recordMissedStrikes, removeNoShows, strikeTasks } from "./strikes.js";

const setup = async (now: string, patch: CoursePatch = {}) => {
  const harness = buildTestContext(now);
  const participant = await seedParticipant(harness.store);
  const course = await seedCourse(harness.store, participant.id, patch);
  return { ...harness, participant, course };
};

test("a missing video earns one strike thirty minutes after the scheduled time", async () => {
  const { ctx, store, sink, setNow, course } = await setup("2024-05-01T09:30:00Z");

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-01T09:30:00Z")), 1);
  setNow("2024-05-01T09:33:00Z");
  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-01T09:33:00Z")), 0);

  const updated = await store.courses.get(course.id);
  assert.equal(updated?.status, "active");
  assert.equal(updated?.late_count, 1);
  assert.deepEqual(updated?.late_dates, ["2024-05-01T09:30:00.000Z"]);
  assert.deepEqual(sink.direct("participant-chat"), ["No video yet today. Strike 1/3."]);
  assert.deepEqual(sink.thread("thread-1"), ["No video 30 minutes after the scheduled time. Strike 1/3."]);
});

test("an occurrence that already has a strike is not struck again", async () => {
  const { ctx, store, sink, course } = await setup("2024-05-01T09:32:00Z", {
    late_count: 1,
    late_dates: ["2024-05-01T09:31:00.000Z"],
  });

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-01T09:32:00Z")), 0);

  assert.equal((await store.courses.get(course.id))?.late_count, 1);
  assert.deepEqual(sink.calls, []);
});

test("a submitted video prevents the strike", async () => {
  const { ctx, store, sink, course } = await setup("2024-05-01T09:30:00Z");
  await seedLog(store, course.id, 6);

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-01T09:30:00Z")), 0);
  assert.equal((await store.courses.get(course.id))?.late_count, 0);
  assert.deepEqual(sink.calls, []);
});

test("the strike that reaches the allowance removes the course with an appeal offer", async () => {
  const { ctx, store, sink, course } = await setup("2024-05-01T09:30:00Z", {
    late_count: 2,
    late_dates: ["2024-04-28T09:40:00.000Z", "2024-04-29T09:50:00.000Z"],
  });

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-01T09:30:00Z")), 1);

  const updated = await store.courses.get(course.id);
  assert.equal(updated?.status, "refused");
  assert.equal(updated?.removal_reason, "max_strikes");
  assert.equal(updated?.late_count, 3);
  assert.equal(updated?.appeal_deadline, "2024-05-02T07:00:00.000Z");
  const notice = sink.succeeded("sendMessage").find((call) => call.destination?.kind === "direct");
  assert.equal(
    notice?.text,
    "You have been removed from the course: too many late submissions.\nYou can appeal until 02.05 07:00.",
  );
  assert.deepEqual(notice?.buttons, [{ label: "Appeal", action: "appeal_start", target: course.id }]);
});

test("an evening schedule is struck against yesterday's occurrence after midnight", async () => {
  const { ctx, store, course } = await setup("2024-05-02T00:20:00Z", { scheduled_time: "23:50" });

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-02T00:20:00Z")), 1);
  assert.deepEqual((await store.courses.get(course.id))?.late_dates, ["2024-05-02T00:20:00.000Z"]);
  assert.equal(await ctx.dedup.wasSent(course.id, "2024-05-01", "strike"), true);
});

test("a video sent before midnight for an evening schedule counts after it", async () => {
  const { ctx, store, sink, course } = await setup("2024-05-02T00:20:00Z", {
    scheduled_time: "23:50",
    current_day: 6,
  });
  await seedLog(store, course.id, 6, {
    status: "taken",
    scheduled_at: "2024-05-01T23:50:00.000Z",
    taken_at: "2024-05-01T23:55:00.000Z",
  });

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-02T00:20:00Z")), 0);
  assert.equal((await store.courses.get(course.id))?.late_count, 0);
  assert.deepEqual(sink.calls, []);
});

test("no video by the end of the window removes the course", async () => {
  const { ctx, store, sink, setNow, course } = await setup("2024-05-01T11:00:00Z");

  assert.equal(await removeNoShows(ctx, new Date("2024-05-01T11:00:00Z")), 1);
  setNow("2024-05-01T11:03:00Z");
  assert.equal(await removeNoShows(ctx, new Date("2024-05-01T11:03:00Z")), 0);

  const updated = await store.courses.get(course.id);
  assert.equal(updated?.status, "refused");
  assert.equal(updated?.removal_reason, "no_video");
  assert.equal(updated?.appeal_deadline, "2024-05-02T07:00:00.000Z");
  assert.deepEqual(sink.general(), ["Dana removed: no video was sent in time."]);
  assert.deepEqual(
    strikeTasks(ctx).map((task) => task.name),
    ["strike", "removal"],
  );
});

test("a course that fails does not stop the strikes for the others", async (t) => {
  const { ctx, store, sink, logger, course } = await setup("2024-05-01T09:30:00Z");
  const other = await seedParticipant(store, { name: "Sam", chat_id: "sam-chat", thread_id: "thread-2" });
  const otherCourse = await seedCourse(store, other.id);
  const read = store.intakeLogs.findByCourseAndDay.bind(store.intakeLogs);
  t.mock.method(store.intakeLogs, "findByCourseAndDay", async (courseId: number, day: number) => {
    if (courseId === course.id) throw new Error("read timeout");
    return read(courseId, day);
  });

  assert.equal(await recordMissedStrikes(ctx, new Date("2024-05-01T09:30:00Z")), 1);

  assert.equal((await store.courses.get(course.id))?.late_count, 0);
  assert.equal((await store.courses.get(otherCourse.id))?.late_count, 1);
  assert.deepEqual(sink.direct("sam-chat"), ["No video yet today. Strike 1/3."]);
  assert.deepEqual(logger.messages("error"), [`Task strike failed for course ${course.id}`]);
});
