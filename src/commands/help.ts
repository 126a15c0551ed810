import type { Context } from "telegraf";
import type { BotDeps } from "./context";
import { mainMenu } from "./menu";

/**
 * Handles /start: greets the user and shows the main menu.
 */
export async function handleStart(ctx: Context, deps: BotDeps) {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  deps.sessions.clear(userId);
  const zone = await deps.service.getTimezone(userId);
  await ctx.reply(
    `Hi, ${ctx.from?.first_name ?? "there"}!\n` +
      "I keep track of your reminders.\n" +
      `Current timezone: ${zone}\n\n` +
      "Pick an action from the menu:",
    { reply_markup: mainMenu() },
  );
}

/**
 * Handles the /help command.
 * Lists all available slash commands and their descriptions.
 */
export async function handleHelp(ctx: Context) {
  const helpMessage = `Available commands:

/add - Create a reminder step by step
/batch - Create several reminders at once
/list - Show your reminders
/edit - Change a reminder
/delete - Delete a reminder
/timezone - Pick your timezone (or /timezone Europe/London)
/test - Send a test reminder in a minute
/ping - Check that the bot is alive
/cancel - Abort the current step`;

  await ctx.reply(helpMessage, { reply_markup: mainMenu() });
}

export async function handlePing(ctx: Context, deps: BotDeps) {
  const { running, activeTasks } = deps.service.health();
  await ctx.reply(
    `🟢 Bot is alive\nScheduler: ${running ? "running" : "stopped"}, ${activeTasks} active reminders`,
  );
}
