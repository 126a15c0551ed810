/**
 * Recurrence codes offered to users. A closed set, not a cron expression.
 */
export const RECURRENCES = [
  "once",
  "daily",
  "weekly",
  "weekdays",
  "mon_wed_fri",
  "tue_thu",
] as const;

export type Recurrence = (typeof RECURRENCES)[number];

/**
 * Something sent along with the reminder text.
 */
export type Attachment =
  | { kind: "text"; content: string }
  | { kind: "photo"; fileId: string; caption?: string }
  | { kind: "document"; fileId: string; fileName?: string; caption?: string };

/**
 * A persisted reminder
 */
export type Reminder = {
  jobId: string; // stable identifier, also the scheduler handle
  ownerId: number; // Telegram chat id for sending reminders
  text: string; // what to remind
  timeOfDay: string; // "HH:mm", wall clock in the owner's timezone
  recurrence: Recurrence;
  attachment?: Attachment;
  createdAtIso: string;
  updatedAtIso: string;
  // Last time the schedule itself was set; fixes the weekday of `weekly`
  anchorIso?: string;
};

/**
 * A fully validated reminder as produced by the dialogue layer.
 */
export type ReminderDraft = {
  text: string;
  timeOfDay: string;
  recurrence: Recurrence;
  attachment?: Attachment;
};

/**
 * A single field change coming from the edit flow.
 */
export type ReminderEdit =
  | { field: "text"; value: string }
  | { field: "time"; value: string }
  | { field: "recurrence"; value: Recurrence }
  | { field: "attachment"; value: Attachment | null };

/**
 * The data file structure
 */
export type RemindersFile = {
  version: number;
  reminders: Reminder[];
  timezones: Record<string, string>; // ownerId -> IANA zone
};

export const CURRENT_REMINDERS_VERSION = 1;

export function isRecurrence(value: string): value is Recurrence {
  return RECURRENCES.some((recurrence) => recurrence === value);
}
