export const ReminderErrorCode = {
  VALIDATION: "VALIDATION",
  NOT_FOUND: "NOT_FOUND",
  TRIGGER_COMPILE: "TRIGGER_COMPILE",
  PERSISTENCE: "PERSISTENCE",
} as const;

export type ReminderErrorCode =
  (typeof ReminderErrorCode)[keyof typeof ReminderErrorCode];

/**
 * Base class for every error the reminder core throws on purpose.
 * Anything else reaching the bot is an internal fault.
 */
export class ReminderError extends Error {
  readonly code: ReminderErrorCode;

  constructor(code: ReminderErrorCode, message: string) {
    super(message);
    this.name = "ReminderError";
    this.code = code;
  }
}

/**
 * Input from the user was rejected. The message is safe to show as is.
 */
export class ValidationError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.VALIDATION, message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ReminderError {
  readonly jobId: string;

  constructor(jobId: string) {
    super(ReminderErrorCode.NOT_FOUND, `Reminder ${jobId} not found`);
    this.name = "NotFoundError";
    this.jobId = jobId;
  }
}

export class TriggerCompileError extends ReminderError {
  constructor(message: string) {
    super(ReminderErrorCode.TRIGGER_COMPILE, message);
    this.name = "TriggerCompileError";
  }
}

/**
 * The data file could not be read or written.
 */
export class PersistenceError extends ReminderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ReminderErrorCode.PERSISTENCE, message);
    this.name = "PersistenceError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isReminderError(e: unknown): e is ReminderError {
  return e instanceof ReminderError;
}
