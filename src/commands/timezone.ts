import type { Context } from "telegraf";
import type { BotDeps } from "./context";
import { mainMenu, timezoneKeyboard } from "./menu";

/**
 * Handles /timezone. With an argument the zone is set directly,
 * otherwise a few common zones are offered as buttons.
 */
export async function handleTimezone(ctx: Context, deps: BotDeps, zone = "") {
  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  if (zone.trim()) {
    await deps.service.setTimezone(userId, zone.trim());
    await ctx.reply(`Timezone changed to: ${zone.trim()}`, { reply_markup: mainMenu() });
    return;
  }

  const current = await deps.service.getTimezone(userId);
  await ctx.reply(`Current timezone: ${current}\nSelect your timezone:`, {
    reply_markup: timezoneKeyboard(),
  });
}

/**
 * Handles callback query for a timezone button.
 */
export async function handleTimezoneCallback(ctx: Context, deps: BotDeps, zone: string) {
  await ctx.answerCbQuery();

  const userId = ctx.from?.id;
  if (userId === undefined) {
    return;
  }

  await deps.service.setTimezone(userId, zone);
  await ctx.editMessageText(`Timezone changed to: ${zone}`);
}
