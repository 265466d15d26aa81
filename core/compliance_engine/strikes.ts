import { addHours, isBefore } from "date-fns"

import { isAppealable, RemovalReason } from "./lifecycle.js"

export interface StrikePolicy {
  lateThresholdMinutes: number
  baseStrikes: number
  maxAppeals: number
}

/** The slice of a course the strike rules read. */
export interface StrikeLedger {
  current_day: number
  total_days: number
  late_count: number
  late_dates: readonly string[]
  appeal_count: number
}

export interface LedgerPatch {
  current_day?: number
  late_count?: number
  late_dates?: string[]
  status?: "completed" | "refused"
  removal_reason?: RemovalReason
}

export type ApprovedDayPlan =
  | { kind: "advanced"; day: number; late: boolean; strikes: number; maxStrikes: number; patch: LedgerPatch }
  | { kind: "completed"; day: number; late: boolean; strikes: number; maxStrikes: number; patch: LedgerPatch }
  | { kind: "removed"; day: number; late: true; strikes: number; maxStrikes: number; patch: LedgerPatch }

export interface ApprovedDayInput {
  day: number
  delayMinutes: number
  scheduledAt: Date
  now: Date
}

/** Each accepted appeal raises the allowance by one. */
export const maxStrikes = (appealCount: number, policy: StrikePolicy): number => policy.baseStrikes + appealCount

export const isLate = (delay: number, policy: StrikePolicy): boolean => delay > policy.lateThresholdMinutes

export function canOfferAppeal(appealCount: number, reason: RemovalReason | null, policy: StrikePolicy): boolean {
  return appealCount < policy.maxAppeals && isAppealable(reason)
}

/** Whether a strike was already recorded in the day following `scheduledAt`. */
export function hasStrikeFor(lateDates: readonly string[], scheduledAt: Date): boolean {
  const end = addHours(scheduledAt, 24)
  return lateDates.some((value) => {
    const recorded = new Date(value)
    return !isBefore(recorded, scheduledAt) && isBefore(recorded, end)
  })
}

export function recordStrike(ledger: StrikeLedger, at: Date): { late_count: number; late_dates: string[] } {
  return {
    late_count: ledger.late_count + 1,
    late_dates: [...ledger.late_dates, at.toISOString()],
  }
}

/**
 * Plans the course update for an approved submission of `day`. A strike that
 * reaches the allowance removes the course and leaves `current_day` where it
 * was, so the approved day never counts.
 */
export function planApprovedDay(ledger: StrikeLedger, input: ApprovedDayInput, policy: StrikePolicy): ApprovedDayPlan {
  const allowance = maxStrikes(ledger.appeal_count, policy)
  const late = isLate(input.delayMinutes, policy) && !hasStrikeFor(ledger.late_dates, input.scheduledAt)

  if (!late) {
    const patch: LedgerPatch = { current_day: input.day }
    if (input.day >= ledger.total_days) {
      return { kind: "completed", day: input.day, late, strikes: ledger.late_count, maxStrikes: allowance, patch: { ...patch, status: "completed" } }
    }
    return { kind: "advanced", day: input.day, late, strikes: ledger.late_count, maxStrikes: allowance, patch }
  }

  const strike = recordStrike(ledger, input.now)
  if (strike.late_count >= allowance) {
    return {
      kind: "removed",
      day: input.day,
      late,
      strikes: strike.late_count,
      maxStrikes: allowance,
      patch: { ...strike, status: "refused", removal_reason: "max_strikes" },
    }
  }

  const patch: LedgerPatch = { ...strike, current_day: input.day }
  if (input.day >= ledger.total_days) {
    return { kind: "completed", day: input.day, late, strikes: strike.late_count, maxStrikes: allowance, patch: { ...patch, status: "completed" } }
  }
  return { kind: "advanced", day: input.day, late, strikes: strike.late_count, maxStrikes: allowance, patch }
}

export type MissedStrikePlan =
  | { kind: "warned"; strikes: number; maxStrikes: number; patch: LedgerPatch }
  | { kind: "removed"; strikes: number; maxStrikes: number; patch: LedgerPatch }

/** Strike for a scheduled occurrence that produced no submission in time. */
export function planMissedStrike(ledger: StrikeLedger, now: Date, policy: StrikePolicy): MissedStrikePlan {
  const allowance = maxStrikes(ledger.appeal_count, policy)
  const strike = recordStrike(ledger, now)
  if (strike.late_count >= allowance) {
    return {
      kind: "removed",
      strikes: strike.late_count,
      maxStrikes: allowance,
      patch: { ...strike, status: "refused", removal_reason: "max_strikes" },
    }
  }
  return { kind: "warned", strikes: strike.late_count, maxStrikes: allowance, patch: strike }
}
