import test from "node:test";
import assert from "node:assert/strict";

import { buildTestContext, seedCourse, seedLog, seedParticipant } from "../testing/fakes.js";
import { DASHBOARD_KEY, refreshDashboard } from "./dashboard.js";

const now = new Date("2024-05-01T12:00:00Z");

const setup = async () => {
  const harness = buildTestContext(now);
  const active = await seedParticipant(harness.store);
  const course = await seedCourse(harness.store, active.id);
  await seedLog(harness.store, course.id, 6, { status: "taken" });
  const waiting = await seedParticipant(harness.store, { name: "Sam", chat_id: "sam-chat" });
  await harness.store.courses.create({ participant_id: waiting.id, total_days: 21, invite_code: "invite-2" });
  return harness;
};

const expected = [
  "Summary for 2024-05-01",
  "setup: 1",
  "active: 1",
  "appeal: 0",
  "refused: 0",
  "completed: 0",
  "expired: 0",
  "videos accepted today: 1",
].join("\n");

test("the summary is posted once, then edited in place", async () => {
  const { ctx, store, sink } = await setup();

  assert.equal(await refreshDashboard(ctx, now), 1);
  assert.equal(await refreshDashboard(ctx, now), 1);

  assert.deepEqual(sink.general(), [expected]);
  const edit = sink.succeeded("editMessage")[0];
  assert.deepEqual(edit?.ref, { chat_id: "group", message_id: 101 });
  assert.equal(edit?.text, expected);
  assert.deepEqual(await store.dashboards.getMessage(DASHBOARD_KEY), { chat_id: "group", message_id: 101 });
});

test("a deleted summary message is replaced by a new one", async () => {
  const { ctx, store, sink } = await setup();
  await refreshDashboard(ctx, now);
  sink.failNext("editMessage", "not_found");

  assert.equal(await refreshDashboard(ctx, now), 1);

  assert.equal(sink.general().length, 2);
  assert.deepEqual(await store.dashboards.getMessage(DASHBOARD_KEY), { chat_id: "group", message_id: 102 });
});
