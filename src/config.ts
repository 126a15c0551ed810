import env, { loadDotEnv } from "./env";
import { DEFAULT_GRACE_MS, DEFAULT_CHECK_INTERVAL_MS } from "./tasks/scheduler";
import { DEFAULT_TIMEZONE, isValidTimezone } from "./tasks/time";

export type AppConfig = {
  botToken: string;
  defaultTimezone: string;
  dataFile: string;
  graceMs: number;
  checkIntervalMs: number;
};

/**
 * Builds the process configuration from the environment (and any .env file).
 * Fails at startup rather than at the first reminder.
 */
export function loadConfig(): AppConfig {
  loadDotEnv();

  const defaultTimezone = env("DEFAULT_TIMEZONE", "string", DEFAULT_TIMEZONE);
  if (!isValidTimezone(defaultTimezone)) {
    throw new Error(`DEFAULT_TIMEZONE is not a valid IANA zone: '${defaultTimezone}'`);
  }

  const graceSeconds = env("MISFIRE_GRACE_SECONDS", "number", DEFAULT_GRACE_MS / 1000);
  const checkSeconds = env(
    "SCHEDULER_CHECK_INTERVAL_SECONDS",
    "number",
    DEFAULT_CHECK_INTERVAL_MS / 1000,
  );
  if (graceSeconds < 0 || checkSeconds <= 0) {
    throw new Error("MISFIRE_GRACE_SECONDS must be >= 0 and SCHEDULER_CHECK_INTERVAL_SECONDS > 0");
  }

  return {
    botToken: env("TELEGRAM_BOT_TOKEN"),
    defaultTimezone,
    dataFile: env("DATA_FILE", "string", "./reminders.json"),
    graceMs: graceSeconds * 1000,
    checkIntervalMs: checkSeconds * 1000,
  };
}
