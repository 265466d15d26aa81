import {
  localDateKey,
  resolveOccurrence,
  scheduledTimeRange,
} from "../../core/compliance_engine/index.js";
import type { ComplianceContext } from "../context.js";
import type { Course, CourseStatus } from "../models.js";

export type DueCourse = {
  course: Course;
  /** The scheduled instant the task acts for. */
  occurrence: Date;
  /** Local date of the occurrence; the dedup key's day. */
  dateKey: string;
};

/**
 * Courses whose scheduled time was `offsetMinutes` ago (ahead, when negative) as of
 * `now`. Each candidate is re-checked against its concrete occurrence, so an evening
 * schedule seen after midnight resolves to yesterday's instant or is dropped.
 * Occurrences before the course's start date are skipped.
 */
export const findDueCourses = async (
  ctx: ComplianceContext,
  now: Date,
  offsetMinutes: number,
  statuses: readonly CourseStatus[],
): Promise<DueCourse[]> => {
  const interval = ctx.policy.schedulerIntervalMinutes;
  const range = scheduledTimeRange(now, offsetMinutes, interval, ctx.policy);
  const candidates = await ctx.store.courses.listByScheduledTime(statuses, range);

  const due: DueCourse[] = [];
  for (const course of candidates) {
    if (!course.scheduled_time) continue;
    const occurrence = resolveOccurrence(course.scheduled_time, now, offsetMinutes, interval, ctx.policy);
    if (!occurrence) continue;
    const dateKey = localDateKey(occurrence, ctx.policy);
    if (course.start_date !== null && dateKey < course.start_date) continue;
    due.push({ course, occurrence, dateKey });
  }
  return due;
};

/**
 * Runs `action` for each due course in turn. A course whose action throws is logged
 * and the rest still run. Returns how many actions reported acting.
 */
export const forEachDueCourse = async (
  ctx: ComplianceContext,
  task: string,
  due: readonly DueCourse[],
  action: (item: DueCourse) => Promise<boolean>,
): Promise<number> => {
  let acted = 0;
  for (const item of due) {
    try {
      if (await action(item)) acted += 1;
    } catch (error) {
      ctx.logger.error(`Task ${task} failed for course ${item.course.id}`, error, { courseId: item.course.id, dateKey: item.dateKey });
    }
  }
  return acted;
};
