import type { LocalZone } from "./time.js"

export interface CompliancePolicy extends LocalZone {
  openBeforeMinutes: number
  openAfterMinutes: number
  confidenceThreshold: number
  lateThresholdMinutes: number
  baseStrikes: number
  maxAppeals: number
  deadlineHoursBefore: number
  reminderLeadMinutes: readonly number[]
  strikeAfterMinutes: number
  removalAfterMinutes: number
  schedulerIntervalMinutes: number
  dedupTtlSeconds: number
  staleThreadHours: number
  abandonedSetupHours: number
  defaultTotalDays: number
  extensionDays: number
}

// Asia/Tashkent is UTC+5 without daylight saving.
export const DEFAULT_POLICY: CompliancePolicy = {
  utcOffsetMinutes: 300,
  openBeforeMinutes: 10,
  openAfterMinutes: 120,
  confidenceThreshold: 0.85,
  lateThresholdMinutes: 30,
  baseStrikes: 3,
  maxAppeals: 2,
  deadlineHoursBefore: 2,
  reminderLeadMinutes: [60, 10],
  strikeAfterMinutes: 30,
  removalAfterMinutes: 120,
  schedulerIntervalMinutes: 5,
  dedupTtlSeconds: 86_400,
  staleThreadHours: 24,
  abandonedSetupHours: 24,
  defaultTotalDays: 21,
  extensionDays: 21,
}

export function createPolicy(overrides: Partial<CompliancePolicy> = {}): CompliancePolicy {
  return { ...DEFAULT_POLICY, ...overrides }
}
