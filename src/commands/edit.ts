import { Context, Markup } from "telegraf";
import { formatReminderSummary } from "../tasks/reminders";
import { isRecurrence, type ReminderEdit } from "../tasks/schema";
import { reminderButtonLabel } from "./cancel";
import type { BotDeps } from "./context";
import { attachmentKeyboard, cancelKeyboard, mainMenu, recurrenceKeyboard } from "./menu";
import { CANCEL_LABEL, REMOVE_LABEL, toAttachment, type WizardInput } from "./wizard";

type EditField = ReminderEdit["field"];

const FIELD_LABELS: Record<EditField, string> = {
  text: "📝 Text",
  time: "⏰ Time",
  recurrence: "🔄 Repeat",
  attachment: "💬 Attachment",
};

function isEditField(value: string): value is EditField {
  return value in FIELD_LABELS;
}

/**
 * Turns the user's answer into an edit of the chosen field.
 * Returns null when the input does not fit the field.
 */
export function toReminderEdit(field: EditField, input: WizardInput): ReminderEdit | null {
  switch (field) {
    case "text":
      return input.kind === "text" ? { field, value: input.text } : null;
    case "time":
      return input.kind === "text" ? { field, value: input.text } : null;
    case "recurrence":
      return input.kind === "recurrence" && isRecurrence(input.recurrence)
        ? { field, value: input.recurrence }
        : null;
    case "attachment": {
      if (input.kind === "text" && input.text.trim() === REMOVE_LABEL) {
        return { field, value: null };
      }
      const attachment = toAttachment(input);
      return attachment ? { field, value: attachment } : null;
    }
  }
}

/**
 * Handles the /edit command.
 * Shows inline keyboard to select a reminder to edit.
 */
export async function handleEdit(ctx: Context, deps: BotDeps) {
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
    Markup.button.callback(`✏️ ${reminderButtonLabel(reminder)}`, `edit:${reminder.jobId}`),
  ]);

  await ctx.reply("Select a reminder to edit:", {
    reply_markup: Markup.inlineKeyboard(buttons).reply_markup,
  });
}

/**
 * Handles callback query for picking the reminder to edit.
 */
export async function handleEditSelect(ctx: Context, deps: BotDeps, jobId: string) {
  await ctx.answerCbQuery();

  const userId = ctx.from?.id;
  const reminder = await deps.service.getReminder(jobId);
  if (userId === undefined || !reminder || reminder.ownerId !== userId) {
    await ctx.reply("Reminder not found.");
    return;
  }

  deps.sessions.set(userId, { kind: "edit", jobId, field: null });

  const buttons = Object.entries(FIELD_LABELS).map(([field, label]) => [
    Markup.button.callback(label, `field:${field}`),
  ]);
  await ctx.editMessageText(`Editing: ${reminder.text}\n\nWhat do you want to change?`, {
    reply_markup: Markup.inlineKeyboard(buttons).reply_markup,
  });
}

/**
 * Handles callback query for picking the field; asks for the new value.
 */
export async function handleEditField(ctx: Context, deps: BotDeps, field: string) {
  await ctx.answerCbQuery();

  const userId = ctx.from?.id;
  const session = userId !== undefined ? deps.sessions.get(userId) : undefined;
  if (userId === undefined || session?.kind !== "edit" || !isEditField(field)) {
    await ctx.reply("This edit has expired. Start again with /edit.");
    return;
  }

  deps.sessions.set(userId, { ...session, field });

  switch (field) {
    case "text":
      await ctx.reply("Send the new text:", { reply_markup: cancelKeyboard() });
      break;
    case "time":
      await ctx.reply("Send the new time as HH:MM:", { reply_markup: cancelKeyboard() });
      break;
    case "recurrence":
      await ctx.reply("How often should it repeat?", { reply_markup: recurrenceKeyboard() });
      break;
    case "attachment":
      await ctx.reply("Send a new comment (text, photo or file):", {
        reply_markup: attachmentKeyboard(true),
      });
      break;
  }
}

/**
 * Applies the new value for the field chosen earlier.
 */
export async function handleEditInput(
  ctx: Context,
  deps: BotDeps,
  userId: number,
  session: { jobId: string; field: EditField | null },
  input: WizardInput,
): Promise<void> {
  if (input.kind === "text" && input.text.trim() === CANCEL_LABEL) {
    deps.sessions.clear(userId);
    await ctx.reply("Editing cancelled.", { reply_markup: mainMenu() });
    return;
  }
  if (!session.field) {
    await ctx.reply("Pick the field to change from the buttons above.");
    return;
  }

  const edit = toReminderEdit(session.field, input);
  if (!edit) {
    await ctx.reply("That does not fit this field, please try again.");
    return;
  }

  // Validation errors propagate and keep the session for another try
  const updated = await deps.service.editField(session.jobId, edit);
  deps.sessions.clear(userId);

  const zone = await deps.service.getTimezone(userId);
  await ctx.reply(`✅ Reminder updated!\n\n${formatReminderSummary(updated, zone)}`, {
    reply_markup: mainMenu(),
  });
}
