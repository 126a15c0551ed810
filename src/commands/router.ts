import type { Context } from "telegraf";
import { isRecurrence } from "../tasks/schema";
import { createBatchFromSession, handleBatchInput, handleWizardInput } from "./add";
import { handleDeleteCallback } from "./cancel";
import { replyError, type BotDeps } from "./context";
import { handleEditField, handleEditInput, handleEditSelect } from "./edit";
import { mainMenu } from "./menu";
import { handleTimezoneCallback } from "./timezone";
import type { WizardInput } from "./wizard";

/**
 * Routes a plain message (text, photo or document) to the open conversation.
 */
export async function handleMessage(ctx: Context, deps: BotDeps, input: WizardInput) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  const session = deps.sessions.get(userId);
  try {
    switch (session?.kind) {
      case "create":
        await handleWizardInput(ctx, deps, userId, session.state, input);
        return;
      case "batch":
        if (session.items === null) {
          await handleBatchInput(ctx, deps, userId, input);
        } else {
          await ctx.reply("Pick how often the reminders repeat from the buttons above.");
        }
        return;
      case "edit":
        await handleEditInput(ctx, deps, userId, session, input);
        return;
      default:
        await ctx.reply("Unknown command. Use the menu buttons.", { reply_markup: mainMenu() });
    }
  } catch (e) {
    await replyError(ctx, deps, e);
  }
}

/**
 * A recurrence button was pressed; it belongs to whichever flow is open.
 */
async function handleRecurrenceChoice(ctx: Context, deps: BotDeps, code: string) {
  await ctx.answerCbQuery();

  const userId = ctx.from?.id;
  const session = userId !== undefined ? deps.sessions.get(userId) : undefined;
  if (userId === undefined || !session) {
    await ctx.reply("This choice has expired.", { reply_markup: mainMenu() });
    return;
  }

  const input: WizardInput = { kind: "recurrence", recurrence: code };
  switch (session.kind) {
    case "create":
      await handleWizardInput(ctx, deps, userId, session.state, input);
      return;
    case "batch":
      if (session.items && isRecurrence(code)) {
        await createBatchFromSession(ctx, deps, userId, session.items, code);
      } else {
        await ctx.reply("Send the list of reminders first.");
      }
      return;
    case "edit":
      await handleEditInput(ctx, deps, userId, session, input);
      return;
  }
}

/**
 * Dispatches inline button presses by their `prefix:value` data.
 */
export async function handleCallback(ctx: Context, deps: BotDeps, data: string) {
  const separator = data.indexOf(":");
  const prefix = separator === -1 ? data : data.slice(0, separator);
  const value = separator === -1 ? "" : data.slice(separator + 1);

  try {
    switch (prefix) {
      case "freq":
        await handleRecurrenceChoice(ctx, deps, value);
        break;
      case "del":
        await handleDeleteCallback(ctx, deps, value);
        break;
      case "edit":
        await handleEditSelect(ctx, deps, value);
        break;
      case "field":
        await handleEditField(ctx, deps, value);
        break;
      case "tz":
        await handleTimezoneCallback(ctx, deps, value);
        break;
      default:
        await ctx.answerCbQuery();
        console.log(`[Bot] Unknown callback data: ${data}`);
    }
  } catch (e) {
    await replyError(ctx, deps, e);
  }
}
