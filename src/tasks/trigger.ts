import { DateTime } from "luxon";
import { TriggerCompileError } from "./errors";
import { RECURRENCE_WEEKDAYS } from "./reminders";
import { isRecurrence } from "./schema";
import { formatTimeOfDay, isValidTimezone, parseTimeOfDay, type TimeOfDay } from "./time";

/**
 * When a task becomes due: either one absolute instant, or a wall-clock rule
 * that is re-evaluated in its timezone for every occurrence.
 */
export type Trigger =
  | { kind: "date"; fireAtMs: number; timezone: string }
  | {
      kind: "recurring";
      hour: number;
      minute: number;
      weekdays: readonly number[]; // ISO weekdays, 1 = Monday
      timezone: string;
    };

export type TriggerInput = {
  timeOfDay: string;
  recurrence: string;
  timezone: string;
  now: number;
  // Start of the reminder's life; `weekly` fires on the weekday of the
  // first occurrence at or after it. Defaults to `now`.
  anchor?: number;
};

function occurrenceOn(day: DateTime, time: TimeOfDay): DateTime {
  return day.set({
    hour: time.hour,
    minute: time.minute,
    second: 0,
    millisecond: 0,
  });
}

/**
 * First occurrence of `time` at or after `fromMs` in `zone`, looking at most
 * one calendar day ahead.
 */
function firstOccurrence(fromMs: number, time: TimeOfDay, zone: string): DateTime {
  const from = DateTime.fromMillis(fromMs, { zone });
  const today = occurrenceOn(from, time);
  if (today.toMillis() >= fromMs) {
    return today;
  }
  return occurrenceOn(from.plus({ days: 1 }), time);
}

/**
 * Compiles a stored reminder's time, recurrence and timezone into a trigger.
 * Pure: the same input always yields an equal trigger.
 */
export function compileTrigger(input: TriggerInput): Trigger {
  const time = parseTimeOfDay(input.timeOfDay);
  if (!time) {
    throw new TriggerCompileError(`Unparseable time of day: "${input.timeOfDay}"`);
  }
  if (!isValidTimezone(input.timezone)) {
    throw new TriggerCompileError(`Unknown timezone: "${input.timezone}"`);
  }
  if (!isRecurrence(input.recurrence)) {
    throw new TriggerCompileError(`Unknown recurrence: "${input.recurrence}"`);
  }

  const zone = input.timezone;

  switch (input.recurrence) {
    case "once":
      return {
        kind: "date",
        fireAtMs: firstOccurrence(input.now, time, zone).toMillis(),
        timezone: zone,
      };
    case "weekly": {
      const first = firstOccurrence(input.anchor ?? input.now, time, zone);
      return { kind: "recurring", ...time, weekdays: [first.weekday], timezone: zone };
    }
    default:
      return {
        kind: "recurring",
        ...time,
        weekdays: RECURRENCE_WEEKDAYS[input.recurrence],
        timezone: zone,
      };
  }
}

/**
 * Computes the first firing instant at or after `fromMs`.
 * Returns null when a date trigger already lies in the past.
 */
export function nextFireTime(trigger: Trigger, fromMs: number): number | null {
  if (trigger.kind === "date") {
    return trigger.fireAtMs >= fromMs ? trigger.fireAtMs : null;
  }

  const startDay = DateTime.fromMillis(fromMs, { zone: trigger.timezone }).startOf("day");

  // Eight days covers a full week plus today's already-passed slot
  for (let i = 0; i <= 7; i++) {
    const day = startDay.plus({ days: i });
    if (!trigger.weekdays.includes(day.weekday)) {
      continue;
    }
    const candidate = occurrenceOn(day, trigger).toMillis();
    if (candidate >= fromMs) {
      return candidate;
    }
  }

  return null;
}

/**
 * One-line description of a trigger for logs.
 */
export function describeTrigger(trigger: Trigger): string {
  if (trigger.kind === "date") {
    const at = DateTime.fromMillis(trigger.fireAtMs, { zone: trigger.timezone });
    return `once at ${at.toISO()}`;
  }
  return `${formatTimeOfDay(trigger)} on [${trigger.weekdays.join(",")}] (${trigger.timezone})`;
}
