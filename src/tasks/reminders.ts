import type { Attachment, Recurrence, Reminder } from "./schema";
import { formatTimeOnly } from "./time";

/**
 * ISO weekday numbers (1 = Monday ... 7 = Sunday) a recurrence fires on.
 * `once` and `weekly` are resolved by the trigger compiler instead.
 */
export const RECURRENCE_WEEKDAYS: Record<
  Exclude<Recurrence, "once" | "weekly">,
  readonly number[]
> = {
  daily: [1, 2, 3, 4, 5, 6, 7],
  weekdays: [1, 2, 3, 4, 5],
  mon_wed_fri: [1, 3, 5],
  tue_thu: [2, 4],
};

/**
 * Returns a human-readable label for a recurrence code.
 */
export function getRecurrenceLabel(recurrence: Recurrence): string {
  switch (recurrence) {
    case "once":
      return "Once";
    case "daily":
      return "Every day";
    case "weekly":
      return "Every week";
    case "weekdays":
      return "Weekdays (Mon-Fri)";
    case "mon_wed_fri":
      return "Mon, Wed, Fri";
    case "tue_thu":
      return "Tue, Thu";
  }
}

/**
 * Short description of an attachment for lists and confirmations.
 */
export function describeAttachment(attachment: Attachment | undefined): string {
  if (!attachment) {
    return "none";
  }

  switch (attachment.kind) {
    case "text":
      return `text: ${attachment.content}`;
    case "photo":
      return "photo" + (attachment.caption ? ` (${attachment.caption})` : "");
    case "document":
      return (
        `document: ${attachment.fileName ?? "untitled"}` +
        (attachment.caption ? ` (${attachment.caption})` : "")
      );
  }
}

/**
 * Builds the text delivered when a reminder fires.
 */
export function buildReminderMessage(
  reminder: Reminder,
  zone: string,
  nowMs: number,
): string {
  return `⏰ Reminder: ${reminder.text}\n🕒 Your time: ${formatTimeOnly(nowMs, zone)} (${zone})`;
}

/**
 * Multi-line summary used after creating or editing a reminder.
 */
export function formatReminderSummary(reminder: Reminder, zone: string): string {
  return (
    `📝 Text: ${reminder.text}\n` +
    `⏰ Time: ${reminder.timeOfDay} (${zone})\n` +
    `🔄 Repeat: ${getRecurrenceLabel(reminder.recurrence)}\n` +
    `💬 Attachment: ${describeAttachment(reminder.attachment)}`
  );
}
