import { addMinutes, differenceInMinutes, isAfter, isBefore, subHours, subMinutes } from "date-fns"

import { atLocalTime, formatTimeOfDay, localMinuteOfDay, LocalZone, MINUTES_PER_DAY, parseTimeOfDay } from "./time.js"

export type WindowStatus = "TOO_EARLY" | "OPEN" | "CLOSED"

export interface WindowCheck {
  status: WindowStatus
  /** Local "HH:MM" at which today's window opens; only set for TOO_EARLY. */
  opensAt?: string
}

export interface WindowOptions extends LocalZone {
  openBeforeMinutes: number
  openAfterMinutes: number
}

/** Inclusive range of local minutes-of-day; `from > to` wraps past midnight. */
export interface MinuteRange {
  from: number
  to: number
}

const withinInclusive = (instant: Date, start: Date, end: Date): boolean =>
  !isBefore(instant, start) && !isAfter(instant, end)

/**
 * Classifies `now` against the window around a course's scheduled time.
 * Yesterday's window is considered too, so a window that started before
 * local midnight stays open after it.
 */
export function checkWindow(scheduledTime: string, now: Date, options: WindowOptions): WindowCheck {
  const today = atLocalTime(now, parseTimeOfDay(scheduledTime), options)
  const yesterday = subHours(today, 24)

  const opens = (scheduled: Date) => subMinutes(scheduled, options.openBeforeMinutes)
  const closes = (scheduled: Date) => addMinutes(scheduled, options.openAfterMinutes)

  if (withinInclusive(now, opens(today), closes(today))) {
    return { status: "OPEN" }
  }
  if (withinInclusive(now, opens(yesterday), closes(yesterday))) {
    return { status: "OPEN" }
  }
  if (isBefore(now, opens(today))) {
    return { status: "TOO_EARLY", opensAt: formatTimeOfDay(localMinuteOfDay(opens(today), options)) }
  }
  return { status: "CLOSED" }
}

/**
 * The scheduled instant a submission at `now` belongs to: today's, unless
 * today's window has not opened yet, in which case yesterday's.
 */
export function resolveScheduledInstant(scheduledTime: string, now: Date, options: WindowOptions): Date {
  const today = atLocalTime(now, parseTimeOfDay(scheduledTime), options)
  return isBefore(now, subMinutes(today, options.openBeforeMinutes)) ? subHours(today, 24) : today
}

export function delayMinutes(scheduledAt: Date, takenAt: Date): number {
  return Math.max(0, differenceInMinutes(takenAt, scheduledAt))
}

/**
 * Scheduled times a task should consider at `now`, for a task that acts
 * `offsetMinutes` after the scheduled time (negative for reminders ahead of it).
 * The range spans one tick interval ending at `now - offsetMinutes`.
 */
export function scheduledTimeRange(
  now: Date,
  offsetMinutes: number,
  intervalMinutes: number,
  zone: LocalZone,
): MinuteRange {
  const to = localMinuteOfDay(subMinutes(now, offsetMinutes), zone)
  const from = (to - intervalMinutes + MINUTES_PER_DAY) % MINUTES_PER_DAY
  return { from, to }
}

export function minuteInRange(minuteOfDay: number, range: MinuteRange): boolean {
  return range.from <= range.to
    ? minuteOfDay >= range.from && minuteOfDay <= range.to
    : minuteOfDay >= range.from || minuteOfDay <= range.to
}

/**
 * Resolves the concrete scheduled instant a time-window task refers to and
 * re-verifies it against `now`: the task acts only when between `offsetMinutes`
 * and `offsetMinutes + intervalMinutes` have elapsed since that instant. For an
 * evening schedule seen just after midnight this yields yesterday's instant.
 */
export function resolveOccurrence(
  scheduledTime: string,
  now: Date,
  offsetMinutes: number,
  intervalMinutes: number,
  zone: LocalZone,
): Date | null {
  const reference = subMinutes(now, offsetMinutes)
  let occurrence = atLocalTime(reference, parseTimeOfDay(scheduledTime), zone)
  if (isAfter(occurrence, reference)) {
    occurrence = subHours(occurrence, 24)
  }

  const elapsed = differenceInMinutes(now, occurrence, { roundingMethod: "floor" })
  if (elapsed < offsetMinutes || elapsed > offsetMinutes + intervalMinutes) {
    return null
  }
  return occurrence
}
