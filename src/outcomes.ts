// HandlerOutcome is what every inbound operation returns; benign results are values, not exceptions.
export type HandlerOutcome<T = undefined> =
  | { kind: "ok"; result: T }
  | { kind: "not_applicable"; reason: NotApplicableReason }
  | { kind: "already_handled" }
  | { kind: "transport_error"; message: string };

export type NotApplicableReason =
  | "unknown_participant"
  | "unknown_reviewer"
  | "unknown_course"
  | "unknown_log"
  | "no_active_course"
  | "course_finished"
  | "window_too_early"
  | "window_closed"
  | "already_submitted"
  | "unsupported_media"
  | "no_schedule"
  | "not_started"
  | "invalid_status"
  | "appeal_not_allowed"
  | "appeal_expired"
  | "already_extended"
  | "invalid_total"
  | "invite_used"
  | "no_pending_step";

export const ok = <T>(result: T): HandlerOutcome<T> => ({ kind: "ok", result });

export const notApplicable = <T = never>(reason: NotApplicableReason): HandlerOutcome<T> => ({
  kind: "not_applicable",
  reason,
});

export const alreadyHandled = <T = never>(): HandlerOutcome<T> => ({ kind: "already_handled" });

export const transportError = <T = never>(message: string): HandlerOutcome<T> => ({ kind: "transport_error", message });
