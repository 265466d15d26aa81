import { addHours } from "date-fns";

import { COURSE_STATUSES, localDateKey, startOfLocalDay } from "../../core/compliance_engine/index.js";
import type { ComplianceContext } from "../context.js";
import type { CourseStatus } from "../models.js";
import type { ScheduledTask } from "../scheduler.js";

export const DASHBOARD_KEY = "summary";

export type DashboardSummary = {
  date: string;
  counts: Record<CourseStatus, number>;
  submittedToday: number;
};

export const collectSummary = async (ctx: ComplianceContext, now: Date): Promise<DashboardSummary> => {
  const counts: Record<CourseStatus, number> = {
    setup: 0,
    active: 0,
    appeal: 0,
    refused: 0,
    completed: 0,
    expired: 0,
  };
  for (const course of await ctx.store.courses.listByStatus(COURSE_STATUSES)) {
    counts[course.status] += 1;
  }
  const dayStart = startOfLocalDay(now, ctx.policy);
  const submittedToday = await ctx.store.intakeLogs.countTakenBetween(dayStart, addHours(dayStart, 24));
  return { date: localDateKey(now, ctx.policy), counts, submittedToday };
};

export const renderSummary = (summary: DashboardSummary): string =>
  [
    `Summary for ${summary.date}`,
    ...COURSE_STATUSES.map((status) => `${status}: ${summary.counts[status]}`),
    `videos accepted today: ${summary.submittedToday}`,
  ].join("\n");

/**
 * Edits the summary into the saved general-thread message. When that message is gone
 * a new one is posted and remembered.
 */
export const refreshDashboard = async (ctx: ComplianceContext, now: Date): Promise<number> => {
  const text = renderSummary(await collectSummary(ctx, now));
  const ref = await ctx.store.dashboards.getMessage(DASHBOARD_KEY);
  if (ref && (await ctx.notifier.editMessage(ref, text))) {
    return 1;
  }
  const posted = await ctx.notifier.toGeneral(text);
  if (!posted) {
    return 0;
  }
  await ctx.store.dashboards.saveMessage(DASHBOARD_KEY, posted);
  return 1;
};

export const dashboardTask = (ctx: ComplianceContext): ScheduledTask => ({
  name: "dashboard",
  run: (now) => refreshDashboard(ctx, now),
});
