import type { Context } from "telegraf";
import { describeAttachment, getRecurrenceLabel } from "../tasks/reminders";
import type { Reminder } from "../tasks/schema";
import type { BotDeps } from "./context";
import { mainMenu } from "./menu";

/**
 * Renders reminders in creation order.
 */
export function formatReminderList(reminders: Reminder[]): string {
  const lines = reminders.map(
    (reminder, i) =>
      `${i + 1}. ${reminder.text}\n` +
      `   ⏰ Time: ${reminder.timeOfDay}\n` +
      `   🔄 Repeat: ${getRecurrenceLabel(reminder.recurrence)}\n` +
      `   💬 Attachment: ${describeAttachment(reminder.attachment)}\n` +
      `   🆔 ID: ${reminder.jobId}`,
  );
  return `📋 Your reminders:\n\n${lines.join("\n\n")}`;
}

/**
 * Handles the /list command.
 */
export async function handleList(ctx: Context, deps: BotDeps) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  const reminders = await deps.service.listReminders(userId);
  if (reminders.length === 0) {
    await ctx.reply("You have no reminders.", { reply_markup: mainMenu() });
    return;
  }

  const zone = await deps.service.getTimezone(userId);
  await ctx.reply(`${formatReminderList(reminders)}\n\nTimezone: ${zone}`, {
    reply_markup: mainMenu(),
  });
}
