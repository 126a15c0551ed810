import { Context, Markup } from "telegraf";
import type { Reminder } from "../tasks/schema";
import type { BotDeps } from "./context";
import { mainMenu } from "./menu";

/**
 * Short button label for a reminder.
 */
export function reminderButtonLabel(reminder: Reminder): string {
  return `${reminder.timeOfDay} — ${reminder.text.substring(0, 30)}`;
}

/**
 * Handles the /delete command.
 * Shows inline keyboard to select a reminder to delete.
 */
export async function handleDelete(ctx: Context, deps: BotDeps) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  const reminders = await deps.service.listReminders(userId);
  if (reminders.length === 0) {
    await ctx.reply("You have no reminders.", { reply_markup: mainMenu() });
    return;
  }

  const buttons = reminders.map((reminder) => [
    Markup.button.callback(`❌ ${reminderButtonLabel(reminder)}`, `del:${reminder.jobId}`),
  ]);

  await ctx.reply("Select a reminder to delete:", {
    reply_markup: Markup.inlineKeyboard(buttons).reply_markup,
  });
}

/**
 * Handles callback query for deleting a reminder.
 */
export async function handleDeleteCallback(
  ctx: Context,
  deps: BotDeps,
  jobId: string,
): Promise<void> {
  await ctx.answerCbQuery();

  const reminder = await deps.service.getReminder(jobId);
  if (!reminder || reminder.ownerId !== ctx.from?.id) {
    await ctx.reply("Reminder not found or already deleted.");
    return;
  }

  await deps.service.deleteReminder(jobId);
  await ctx.editMessageText(`❌ Deleted: ${reminderButtonLabel(reminder)}`);
}
