import test from "node:test";
import assert from "node:assert/strict";

import { ConsoleLogger, isLogLevel } from "./logger.js";

test("logger drops messages below its level", (t) => {
  const log = t.mock.method(console, "log", () => undefined);
  const warn = t.mock.method(console, "warn", () => undefined);

  const logger = new ConsoleLogger("scheduler", "warn");
  logger.info("tick finished");
  logger.warn("task failed", { task: "removal" });

  assert.equal(log.mock.callCount(), 0);
  assert.equal(warn.mock.callCount(), 1);
  assert.deepEqual(warn.mock.calls[0]?.arguments, ["[scheduler] task failed", { task: "removal" }]);
});

test("child loggers extend the prefix", (t) => {
  const log = t.mock.method(console, "log", () => undefined);

  new ConsoleLogger("app").child("intake").info("submission received");

  assert.deepEqual(log.mock.calls[0]?.arguments, ["[app:intake] submission received"]);
});

test("errors carry the error object before the context", (t) => {
  const error = t.mock.method(console, "error", () => undefined);
  const failure = new Error("boom");

  new ConsoleLogger("app").error("task crashed", failure, { task: "strike" });

  assert.deepEqual(error.mock.calls[0]?.arguments, ["[app] task crashed", failure, { task: "strike" }]);
});

test("isLogLevel recognises the four levels", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("trace"), false);
});
