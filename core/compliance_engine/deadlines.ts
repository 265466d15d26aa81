import { addHours, isAfter, subHours } from "date-fns"

import { atLocalTime, LocalZone, parseTimeOfDay } from "./time.js"

export interface DeadlineOptions extends LocalZone {
  deadlineHoursBefore: number
}

/**
 * The local day after `from`, at the scheduled time minus the configured lead.
 * Reviewer response, reshoot and appeal response deadlines all use it.
 */
export function nextDayDeadline(from: Date, scheduledTime: string, options: DeadlineOptions): Date {
  const scheduledToday = atLocalTime(from, parseTimeOfDay(scheduledTime), options)
  return subHours(addHours(scheduledToday, 24), options.deadlineHoursBefore)
}

/**
 * How long a removed participant may press the appeal button: until the next
 * occurrence of the scheduled time minus the lead, or a day without a schedule.
 */
export function appealDeadline(now: Date, scheduledTime: string | null, options: DeadlineOptions): Date {
  if (!scheduledTime) {
    return addHours(now, 24)
  }
  const candidate = subHours(atLocalTime(now, parseTimeOfDay(scheduledTime), options), options.deadlineHoursBefore)
  return isAfter(candidate, now) ? candidate : addHours(candidate, 24)
}

export function isPast(deadline: Date | string | null, now: Date): boolean {
  if (deadline === null) {
    return false
  }
  return isAfter(now, typeof deadline === "string" ? new Date(deadline) : deadline)
}
