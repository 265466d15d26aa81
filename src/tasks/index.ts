import type { ComplianceContext } from "../context.js";
import type { ScheduledTask } from "../scheduler.js";
import { cleanupTasks } from "./cleanup.js";
import { dashboardTask } from "./dashboard.js";
import { deadlineTasks } from "./deadlines.js";
import { reminderTasks } from "./reminders.js";
import { strikeTasks } from "./strikes.js";

/** The scheduler's catalogue, in the order each tick runs it. */
export const buildTasks = (ctx: ComplianceContext): ScheduledTask[] => [
  ...reminderTasks(ctx),
  ...strikeTasks(ctx),
  ...deadlineTasks(ctx),
  ...cleanupTasks(ctx),
  dashboardTask(ctx),
];
