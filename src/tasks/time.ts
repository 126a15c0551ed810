import { DateTime, IANAZone } from "luxon";
import type { TimezoneStore } from "./store";

export const DEFAULT_TIMEZONE = "Europe/Moscow";

export type TimeOfDay = { hour: number; minute: number };

/**
 * Parses "HH:mm" (or "H:mm") into hour and minute.
 * Returns null for anything that is not a valid wall-clock time.
 */
export function parseTimeOfDay(text: string): TimeOfDay | null {
  const match = text.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    return null;
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return null;
  }

  return { hour, minute };
}

/**
 * Returns the canonical "HH:mm" form of a time, or null if it does not parse.
 */
export function normalizeTimeOfDay(text: string): string | null {
  const parsed = parseTimeOfDay(text);
  if (!parsed) {
    return null;
  }
  return formatTimeOfDay(parsed);
}

export function formatTimeOfDay({ hour, minute }: TimeOfDay): string {
  return `${String(hour).padStart(2, "0")}:${String(minute).padStart(2, "0")}`;
}

/**
 * Checks that a string names an IANA zone luxon can resolve.
 */
export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

/**
 * Gets the current UTC time as ISO string.
 */
export function getNowUtc(): string {
  return new Date().toISOString();
}

/**
 * Formats just the time portion (HH:mm) of an instant in a zone.
 */
export function formatTimeOnly(ms: number, zone: string): string {
  return DateTime.fromMillis(ms, { zone }).toFormat("HH:mm");
}

/**
 * Maps an owner to the IANA zone their reminders are compiled against.
 * Owners without a stored setting get the process-wide default.
 */
export class TimezoneResolver {
  constructor(
    private readonly store: TimezoneStore,
    readonly defaultZone: string = DEFAULT_TIMEZONE,
  ) {}

  async resolve(ownerId: number): Promise<string> {
    const stored = await this.store.getTimezone(ownerId);
    return stored ?? this.defaultZone;
  }

  /**
   * Resolves every owner at once, for rehydration.
   */
  async resolveAll(ownerIds: Iterable<number>): Promise<Map<number, string>> {
    const zones = new Map<number, string>();
    for (const ownerId of ownerIds) {
      if (!zones.has(ownerId)) {
        zones.set(ownerId, await this.resolve(ownerId));
      }
    }
    return zones;
  }
}
