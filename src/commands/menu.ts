import { Markup } from "telegraf";
import { getRecurrenceLabel } from "../tasks/reminders";
import { RECURRENCES } from "../tasks/schema";
import { CANCEL_LABEL, REMOVE_LABEL, SKIP_LABEL } from "./wizard";

export const MENU = {
  add: "➕ Add reminder",
  list: "📋 My reminders",
  delete: "❌ Delete reminder",
  edit: "✏️ Edit reminder",
  timezone: "🌍 Timezone",
  test: "🔄 Test reminder",
} as const;

/**
 * Timezones offered as buttons; any other IANA zone works with /timezone <zone>.
 */
export const TIMEZONE_CHOICES = [
  { label: "Moscow (MSK)", zone: "Europe/Moscow" },
  { label: "Kyiv (EET)", zone: "Europe/Kyiv" },
  { label: "London (GMT)", zone: "Europe/London" },
  { label: "New York (EST)", zone: "America/New_York" },
] as const;

export function mainMenu() {
  return Markup.keyboard([
    [MENU.add],
    [MENU.list, MENU.delete],
    [MENU.edit, MENU.timezone],
    [MENU.test],
  ]).resize().reply_markup;
}

export function cancelKeyboard() {
  return Markup.keyboard([[CANCEL_LABEL]]).resize().reply_markup;
}

export function attachmentKeyboard(allowRemove = false) {
  const rows = allowRemove ? [[REMOVE_LABEL], [CANCEL_LABEL]] : [[SKIP_LABEL], [CANCEL_LABEL]];
  return Markup.keyboard(rows).resize().reply_markup;
}

/**
 * One inline button per recurrence code; the callback data is `freq:<code>`.
 */
export function recurrenceKeyboard() {
  return Markup.inlineKeyboard(
    RECURRENCES.map((code) => [Markup.button.callback(getRecurrenceLabel(code), `freq:${code}`)]),
  ).reply_markup;
}

export function timezoneKeyboard() {
  return Markup.inlineKeyboard(
    TIMEZONE_CHOICES.map(({ label, zone }) => [Markup.button.callback(label, `tz:${zone}`)]),
  ).reply_markup;
}
