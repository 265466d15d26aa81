export {
  MINUTES_PER_DAY,
  parseTimeOfDay,
  formatTimeOfDay,
  localMinuteOfDay,
  localDateKey,
  startOfLocalDay,
  atLocalTime,
  startOfDateKey,
  daysBetweenDateKeys,
  addDaysToDateKey,
  formatLocalDateTime,
} from "./time.js"
export type { LocalZone } from "./time.js"
export {
  checkWindow,
  resolveScheduledInstant,
  delayMinutes,
  scheduledTimeRange,
  minuteInRange,
  resolveOccurrence,
} from "./window.js"
export type { WindowStatus, WindowCheck, WindowOptions, MinuteRange } from "./window.js"
export { nextDayDeadline, appealDeadline, isPast } from "./deadlines.js"
export type { DeadlineOptions } from "./deadlines.js"
export {
  COURSE_STATUSES,
  INTAKE_STATUSES,
  REMOVAL_REASONS,
  APPEALABLE_REASONS,
  COURSE_TRANSITIONS,
  OPEN_STATUSES,
  ENDED_STATUSES,
  canTransition,
  isTerminal,
  isAppealable,
} from "./lifecycle.js"
export type { CourseStatus, IntakeStatus, RemovalReason } from "./lifecycle.js"
export {
  maxStrikes,
  isLate,
  canOfferAppeal,
  hasStrikeFor,
  recordStrike,
  planApprovedDay,
  planMissedStrike,
} from "./strikes.js"
export type { StrikePolicy, StrikeLedger, LedgerPatch, ApprovedDayPlan, ApprovedDayInput, MissedStrikePlan } from "./strikes.js"
export { DEFAULT_POLICY, createPolicy } from "./policy.js"
export type { CompliancePolicy } from "./policy.js"
