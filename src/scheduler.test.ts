import test from "node:test";
import assert from "node:assert/strict";

import { Scheduler, type ScheduledTask } from "./scheduler.js";
import { RecordingLogger } from "./testing/fakes.js";

const clock = () => new Date("2024-05-01T09:00:00Z");

test("a failing task does not stop the rest of the tick", async () => {
  const logger = new RecordingLogger();
  const seen: string[] = [];
  const tasks: ScheduledTask[] = [
    {
      name: "broken",
      run: async () => {
        throw new Error("store unavailable");
      },
    },
    {
      name: "healthy",
      run: async (now) => {
        seen.push(now.toISOString());
        return 2;
      },
    },
  ];

  const report = await new Scheduler(tasks, { intervalMs: 60_000, clock, logger }).tick();

  assert.deepEqual(report, {
    started_at: "2024-05-01T09:00:00.000Z",
    tasks: [
      { name: "broken", ok: false, error: "store unavailable" },
      { name: "healthy", ok: true, acted: 2 },
    ],
  });
  assert.deepEqual(seen, ["2024-05-01T09:00:00.000Z"]);
  assert.deepEqual(logger.messages("error"), ["Task broken failed"]);
  assert.deepEqual(logger.messages("info"), ["Task healthy acted on 2 record(s)"]);
});

test("stop waits for the running tick and ends the loop", async () => {
  const logger = new RecordingLogger();
  let runs = 0;
  const scheduler = new Scheduler(
    [
      {
        name: "count",
        run: async () => {
          runs += 1;
          return 0;
        },
      },
    ],
    { intervalMs: 60_000, clock, logger },
  );

  scheduler.start();
  scheduler.start();
  await scheduler.stop();

  assert.equal(runs, 1);
  assert.deepEqual(logger.messages("info"), ["Scheduler started", "Scheduler stopped"]);
});
