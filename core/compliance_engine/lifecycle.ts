export const COURSE_STATUSES = ["setup", "active", "appeal", "refused", "completed", "expired"] as const

export type CourseStatus = (typeof COURSE_STATUSES)[number]

export const INTAKE_STATUSES = ["pending", "taken", "pending_review", "reshoot", "rejected", "missed"] as const

export type IntakeStatus = (typeof INTAKE_STATUSES)[number]

export const REMOVAL_REASONS = [
  "no_video",
  "max_strikes",
  "manager_reject",
  "review_deadline",
  "reshoot_expired",
  "appeal_declined",
  "appeal_expired",
] as const

export type RemovalReason = (typeof REMOVAL_REASONS)[number]

/** Automatic removals; only these offer the participant an appeal. */
export const APPEALABLE_REASONS: readonly RemovalReason[] = ["no_video", "max_strikes"]

export const COURSE_TRANSITIONS: Record<CourseStatus, readonly CourseStatus[]> = {
  setup: ["active", "expired"],
  active: ["completed", "refused"],
  appeal: ["active", "refused"],
  refused: ["appeal"],
  completed: [],
  expired: [],
}

export const OPEN_STATUSES: readonly CourseStatus[] = ["setup", "active", "appeal"]

export const ENDED_STATUSES: readonly CourseStatus[] = ["refused", "completed", "expired"]

export function canTransition(from: CourseStatus, to: CourseStatus): boolean {
  return COURSE_TRANSITIONS[from].includes(to)
}

/** `refused` is terminal unless an appeal is opened from it. */
export function isTerminal(status: CourseStatus): boolean {
  return COURSE_TRANSITIONS[status].length === 0
}

export function isAppealable(reason: RemovalReason | null): boolean {
  return reason !== null && APPEALABLE_REASONS.includes(reason)
}
