import { Telegraf } from "telegraf";
import {
  handleAddStart,
  handleBatchStart,
  handleTestReminder,
} from "./commands/add";
import { handleDelete } from "./commands/cancel";
import {
  SessionStore,
  replyError,
  type BotDeps,
} from "./commands/context";
import { handleEdit } from "./commands/edit";
import { handleHelp, handlePing, handleStart } from "./commands/help";
import { handleList } from "./commands/list";
import { MENU, mainMenu } from "./commands/menu";
import { handleCallback, handleMessage } from "./commands/router";
import { handleTimezone } from "./commands/timezone";
import { loadConfig } from "./config";
import { ReminderService } from "./tasks/service";
import { JsonFileStore } from "./tasks/store";
import { TelegramDispatcher } from "./telegram/dispatcher";
import { withTimeout } from "./utils/timeout";

const config = loadConfig();

const bot = new Telegraf(config.botToken);
const store = new JsonFileStore(config.dataFile);

const service = new ReminderService({
  reminders: store,
  timezones: store,
  dispatcher: new TelegramDispatcher(bot.telegram),
  defaultTimezone: config.defaultTimezone,
  graceMs: config.graceMs,
  checkIntervalMs: config.checkIntervalMs,
});

const deps: BotDeps = { service, sessions: new SessionStore() };

// Command handlers
bot.start((ctx) => handleStart(ctx, deps));
bot.help((ctx) => handleHelp(ctx));
bot.command("ping", (ctx) => handlePing(ctx, deps));
bot.command("add", (ctx) => handleAddStart(ctx, deps));
bot.command("batch", (ctx) => handleBatchStart(ctx, deps));
bot.command("list", (ctx) => handleList(ctx, deps));
bot.command("edit", (ctx) => handleEdit(ctx, deps));
bot.command("delete", (ctx) => handleDelete(ctx, deps));
bot.command("test", (ctx) => handleTestReminder(ctx, deps));
bot.command("timezone", async (ctx) => {
  try {
    await handleTimezone(ctx, deps, ctx.payload);
  } catch (e) {
    await replyError(ctx, deps, e);
  }
});
bot.command("cancel", async (ctx) => {
  if (ctx.from) {
    deps.sessions.clear(ctx.from.id);
  }
  await ctx.reply("Cancelled.", { reply_markup: mainMenu() });
});

// Main menu buttons
bot.hears(MENU.add, (ctx) => handleAddStart(ctx, deps));
bot.hears(MENU.list, (ctx) => handleList(ctx, deps));
bot.hears(MENU.delete, (ctx) => handleDelete(ctx, deps));
bot.hears(MENU.edit, (ctx) => handleEdit(ctx, deps));
bot.hears(MENU.timezone, (ctx) => handleTimezone(ctx, deps));
bot.hears(MENU.test, (ctx) => handleTestReminder(ctx, deps));

// Conversation input
bot.on("text", async (ctx, next) => {
  const text = ctx.message.text;

  // Pass to next middleware for unknown commands
  if (text.startsWith("/")) {
    return next();
  }
  await handleMessage(ctx, deps, { kind: "text", text });
});

bot.on("photo", async (ctx) => {
  const photos = ctx.message.photo;
  // Telegram lists sizes smallest first
  const largest = photos[photos.length - 1];
  if (!largest) {
    return;
  }
  await handleMessage(ctx, deps, {
    kind: "photo",
    fileId: largest.file_id,
    caption: ctx.message.caption,
  });
});

bot.on("document", async (ctx) => {
  const { document } = ctx.message;
  await handleMessage(ctx, deps, {
    kind: "document",
    fileId: document.file_id,
    fileName: document.file_name,
    caption: ctx.message.caption,
  });
});

// Callback query handler for inline buttons
bot.on("callback_query", async (ctx) => {
  const callbackQuery = ctx.callbackQuery;

  // Handle only callback queries with data (not game queries)
  if (!("data" in callbackQuery) || !callbackQuery.data) {
    return;
  }
  await handleCallback(ctx, deps, callbackQuery.data);
});

/**
 * Catches middleware errors that aren't caught by specific handlers.
 */
bot.catch((err, ctx) => {
  replyError(ctx, deps, err).catch((e) => console.error("[Bot] Reply failed", e));
});

async function shutdown(signal: string) {
  console.log(`Received ${signal}, shutting down...`);
  bot.stop(signal);
  await service.stop();
  process.exit(0);
}

/**
 * Loads persisted reminders, then starts polling.
 */
async function main() {
  console.log("Starting bot...");

  console.log("Validating Telegram token...");
  const botInfo = await withTimeout(bot.telegram.getMe(), 15000, "[Bot] getMe");
  console.log("Token validated...");

  const result = await service.start();
  if (result) {
    console.log(
      `Scheduler initialized: ${result.scheduled.length} reminders, ${result.skipped.length} skipped`,
    );
  }

  for (const signal of ["SIGINT", "SIGTERM"]) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error("Failed to shut down cleanly:", err);
        process.exit(1);
      });
    });
  }

  // Polling runs until stopped, so the launch promise is not awaited
  console.log(`Bot started as @${botInfo.username}`);
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    console.error("Failed to launch polling:", err);
    console.error("Hint: Check network/proxy/firewall settings. Telegram API may be unreachable.");
    process.exit(1);
  });
}

main().catch((err) => {
  console.error("Fatal error during startup:", err);
  process.exit(1);
});
