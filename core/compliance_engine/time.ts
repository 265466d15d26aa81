import { addMinutes, subMinutes } from "date-fns"

export const MINUTES_PER_DAY = 24 * 60
const MS_PER_DAY = MINUTES_PER_DAY * 60_000

/** Every schedule is interpreted in one fixed-offset local zone. */
export interface LocalZone {
  utcOffsetMinutes: number
}

const mod = (value: number, divisor: number): number => ((value % divisor) + divisor) % divisor

const pad = (value: number): string => String(value).padStart(2, "0")

/**
 * Parses "HH:MM" (seconds tolerated, as a database `time` column returns them)
 * into minutes after local midnight.
 */
export function parseTimeOfDay(value: string): number {
  const match = /^(\d{1,2}):(\d{2})(?::\d{2})?$/.exec(value.trim())
  if (!match) {
    throw new Error(`Invalid time of day: "${value}"`)
  }
  const hours = Number(match[1])
  const minutes = Number(match[2])
  if (hours > 23 || minutes > 59) {
    throw new Error(`Invalid time of day: "${value}"`)
  }
  return hours * 60 + minutes
}

export function formatTimeOfDay(minuteOfDay: number): string {
  const normalized = mod(minuteOfDay, MINUTES_PER_DAY)
  return `${pad(Math.floor(normalized / 60))}:${pad(normalized % 60)}`
}

// Shifting by the offset lets the UTC getters read local wall-clock fields.
const toWallClock = (instant: Date, zone: LocalZone): Date => addMinutes(instant, zone.utcOffsetMinutes)

export function localMinuteOfDay(instant: Date, zone: LocalZone): number {
  const wall = toWallClock(instant, zone)
  return wall.getUTCHours() * 60 + wall.getUTCMinutes()
}

/** Local calendar date as "YYYY-MM-DD". */
export function localDateKey(instant: Date, zone: LocalZone): string {
  return toWallClock(instant, zone).toISOString().slice(0, 10)
}

export function startOfLocalDay(instant: Date, zone: LocalZone): Date {
  const wall = toWallClock(instant, zone).getTime()
  return subMinutes(new Date(wall - mod(wall, MS_PER_DAY)), zone.utcOffsetMinutes)
}

/** The instant at `minuteOfDay` on the local day containing `instant`. */
export function atLocalTime(instant: Date, minuteOfDay: number, zone: LocalZone): Date {
  return addMinutes(startOfLocalDay(instant, zone), minuteOfDay)
}

/** The instant of local midnight starting the given "YYYY-MM-DD" date. */
export function startOfDateKey(dateKey: string, zone: LocalZone): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(dateKey)) {
    throw new Error(`Invalid date: "${dateKey}"`)
  }
  return subMinutes(new Date(`${dateKey}T00:00:00.000Z`), zone.utcOffsetMinutes)
}

export function daysBetweenDateKeys(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY)
}

export function addDaysToDateKey(dateKey: string, days: number): string {
  return new Date(Date.parse(`${dateKey}T00:00:00Z`) + days * MS_PER_DAY).toISOString().slice(0, 10)
}

/** "DD.MM HH:MM" in local time, for participant-facing deadlines. */
export function formatLocalDateTime(instant: Date, zone: LocalZone): string {
  const wall = toWallClock(instant, zone)
  return `${pad(wall.getUTCDate())}.${pad(wall.getUTCMonth() + 1)} ${pad(wall.getUTCHours())}:${pad(wall.getUTCMinutes())}`
}
