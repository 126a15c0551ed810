import type { Context } from "telegraf";
import { formatReminderSummary, getRecurrenceLabel } from "../tasks/reminders";
import type { Recurrence } from "../tasks/schema";
import type { BatchItem } from "../tasks/service";
import { replyError, type BotDeps } from "./context";
import { attachmentKeyboard, cancelKeyboard, mainMenu, recurrenceKeyboard } from "./menu";
import {
  advanceWizard,
  CANCEL_LABEL,
  INITIAL_PROMPT,
  parseBatchLines,
  type WizardInput,
  type WizardState,
} from "./wizard";

/**
 * Starts the add-reminder conversation.
 */
export async function handleAddStart(ctx: Context, deps: BotDeps) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  deps.sessions.set(userId, { kind: "create", state: { step: "text" } });
  await ctx.reply(INITIAL_PROMPT, { reply_markup: cancelKeyboard() });
}

/**
 * Moves the add-reminder conversation one step forward.
 */
export async function handleWizardInput(
  ctx: Context,
  deps: BotDeps,
  userId: number,
  state: WizardState,
  input: WizardInput,
): Promise<void> {
  const result = advanceWizard(state, input);

  switch (result.type) {
    case "cancelled":
      deps.sessions.clear(userId);
      await ctx.reply("Reminder creation cancelled.", { reply_markup: mainMenu() });
      return;
    case "retry":
      await ctx.reply(result.error);
      return;
    case "continue":
      deps.sessions.set(userId, { kind: "create", state: result.state });
      if (result.state.step === "recurrence") {
        await ctx.reply(result.prompt, { reply_markup: recurrenceKeyboard() });
      } else if (result.state.step === "attachment") {
        await ctx.editMessageText(
          `Repeat: ${getRecurrenceLabel(result.state.recurrence)}`,
        );
        await ctx.reply(result.prompt, { reply_markup: attachmentKeyboard() });
      } else {
        await ctx.reply(result.prompt, { reply_markup: cancelKeyboard() });
      }
      return;
    case "done": {
      // A rejected draft keeps the user on the last step
      const reminder = await deps.service.createReminder(userId, result.draft);
      deps.sessions.clear(userId);
      const zone = await deps.service.getTimezone(userId);
      await ctx.reply(`✅ Reminder created!\n\n${formatReminderSummary(reminder, zone)}`, {
        reply_markup: mainMenu(),
      });
      return;
    }
  }
}

/**
 * Starts a batch: several `HH:MM text` lines sharing one recurrence.
 */
export async function handleBatchStart(ctx: Context, deps: BotDeps) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  deps.sessions.set(userId, { kind: "batch", items: null });
  await ctx.reply(
    "Send one reminder per line as HH:MM text, for example:\n08:00 Vitamins\n13:00 Lunch break",
    { reply_markup: cancelKeyboard() },
  );
}

export async function handleBatchInput(
  ctx: Context,
  deps: BotDeps,
  userId: number,
  input: WizardInput,
): Promise<void> {
  if (input.kind !== "text") {
    await ctx.reply("Please send the reminders as text.");
    return;
  }
  if (input.text.trim() === CANCEL_LABEL) {
    deps.sessions.clear(userId);
    await ctx.reply("Batch cancelled.", { reply_markup: mainMenu() });
    return;
  }

  const { items, errors } = parseBatchLines(input.text);
  if (errors.length > 0) {
    await ctx.reply(`Could not read these lines:\n${errors.join("\n")}\n\nPlease send the list again.`);
    return;
  }
  if (items.length === 0) {
    await ctx.reply("The list is empty. Please send at least one line.");
    return;
  }

  deps.sessions.set(userId, { kind: "batch", items });
  await ctx.reply(`Got ${items.length} reminders. How often should they repeat?`, {
    reply_markup: recurrenceKeyboard(),
  });
}

export async function createBatchFromSession(
  ctx: Context,
  deps: BotDeps,
  userId: number,
  items: BatchItem[],
  recurrence: Recurrence,
): Promise<void> {
  const reminders = await deps.service.createBatch(userId, items, recurrence);
  deps.sessions.clear(userId);

  const lines = reminders.map((r) => `- ${r.timeOfDay} — ${r.text}`);
  await ctx.editMessageText(`Repeat: ${getRecurrenceLabel(recurrence)}`);
  await ctx.reply(`✅ Created ${reminders.length} reminders:\n${lines.join("\n")}`, {
    reply_markup: mainMenu(),
  });
}

/**
 * Schedules a one-shot reminder for the next minute.
 */
export async function handleTestReminder(ctx: Context, deps: BotDeps) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  try {
    const reminder = await deps.service.sendTestReminder(userId);
    const zone = await deps.service.getTimezone(userId);
    await ctx.reply(
      `A test reminder will arrive at ${reminder.timeOfDay}.\nTimezone: ${zone}`,
      { reply_markup: mainMenu() },
    );
  } catch (e) {
    await replyError(ctx, deps, e);
  }
}
