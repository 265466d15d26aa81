export type ComplianceErrorCode = "TRANSPORT" | "NOTIFICATION" | "CONFIG" | "INVARIANT";

export abstract class ComplianceError extends Error {
  abstract readonly code: ComplianceErrorCode;
  abstract readonly recoverable: boolean;
  readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Media download or classifier failure; the participant is asked to retry and nothing is mutated.
export class TransportError extends ComplianceError {
  readonly code = "TRANSPORT" as const;
  readonly recoverable = true;
}

export type NotificationErrorKind = "transient" | "already_applied" | "forbidden" | "not_found" | "rejected";

export class NotificationError extends ComplianceError {
  readonly code = "NOTIFICATION" as const;
  readonly kind: NotificationErrorKind;
  readonly recoverable: boolean;

  constructor(kind: NotificationErrorKind, message: string, cause?: Error) {
    super(message, cause);
    this.kind = kind;
    this.recoverable = kind === "transient";
  }
}

export class ConfigError extends ComplianceError {
  readonly code = "CONFIG" as const;
  readonly recoverable = false;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

// A guarded write was attempted for a move the lifecycle table forbids.
export class InvariantError extends ComplianceError {
  readonly code = "INVARIANT" as const;
  readonly recoverable = false;
}

export const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

export const isNotificationError = (value: unknown, kind?: NotificationErrorKind): value is NotificationError =>
  value instanceof NotificationError && (kind === undefined || value.kind === kind);
