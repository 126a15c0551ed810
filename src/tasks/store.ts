import fs from "fs";
import path from "path";
import { z } from "zod";
import { PersistenceError } from "./errors";
import {
  CURRENT_REMINDERS_VERSION,
  RECURRENCES,
  type Reminder,
  type RemindersFile,
} from "./schema";

export type ReminderUpdates = Partial<
  Omit<Reminder, "jobId" | "ownerId" | "createdAtIso">
>;

/**
 * Durable reminder records, keyed by job id with lookups by owner.
 * Listing preserves insertion order.
 */
export interface ReminderStore {
  addReminders(reminders: Reminder[]): Promise<void>;
  getReminder(jobId: string): Promise<Reminder | null>;
  updateReminder(jobId: string, updates: ReminderUpdates): Promise<Reminder | null>;
  removeReminder(jobId: string): Promise<boolean>;
  listReminders(ownerId: number): Promise<Reminder[]>;
  listAllReminders(): Promise<Reminder[]>;
}

/**
 * Per-owner timezone settings.
 */
export interface TimezoneStore {
  getTimezone(ownerId: number): Promise<string | null>;
  setTimezone(ownerId: number, zone: string): Promise<void>;
}

const attachmentSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), content: z.string() }),
  z.object({
    kind: z.literal("photo"),
    fileId: z.string().min(1),
    caption: z.string().optional(),
  }),
  z.object({
    kind: z.literal("document"),
    fileId: z.string().min(1),
    fileName: z.string().optional(),
    caption: z.string().optional(),
  }),
]);

const reminderSchema = z.object({
  jobId: z.string().min(1),
  ownerId: z.number().int(),
  text: z.string(),
  // Kept loose here: a bad time is a trigger compile error, not a load error
  timeOfDay: z.string(),
  recurrence: z.enum(RECURRENCES),
  attachment: attachmentSchema.optional(),
  createdAtIso: z.string(),
  updatedAtIso: z.string(),
  anchorIso: z.string().optional(),
});

const fileSchema = z.object({
  version: z.number().int(),
  reminders: z.array(z.unknown()),
  timezones: z.record(z.string(), z.string()).default({}),
});

function emptyFile(): RemindersFile {
  return { version: CURRENT_REMINDERS_VERSION, reminders: [], timezones: {} };
}

/**
 * Reminder and timezone store backed by a single JSON file.
 * Every operation re-reads the file; writes go through a temp file and a rename.
 */
export class JsonFileStore implements ReminderStore, TimezoneStore {
  // Promise queue to serialize read-modify-write cycles
  private queue: Promise<unknown> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Loads the data file. A missing file is an empty store; malformed
   * reminder entries are dropped with a log line.
   */
  load(): RemindersFile {
    if (!fs.existsSync(this.filePath)) {
      return emptyFile();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
    } catch (e) {
      throw new PersistenceError(`Failed to read ${this.filePath}: ${e}`, { cause: e });
    }

    const file = fileSchema.safeParse(raw);
    if (!file.success) {
      throw new PersistenceError(
        `Invalid data file ${this.filePath}: ${file.error.issues[0]?.message ?? "unknown shape"}`,
      );
    }

    const reminders: Reminder[] = [];
    file.data.reminders.forEach((entry, index) => {
      const parsed = reminderSchema.safeParse(entry);
      if (parsed.success) {
        reminders.push(parsed.data);
      } else {
        console.error(
          `[Store] Dropping malformed reminder at index ${index}: ${parsed.error.issues[0]?.message}`,
        );
      }
    });

    return {
      version: file.data.version,
      reminders,
      timezones: file.data.timezones,
    };
  }

  /**
   * Saves the data file atomically.
   */
  save(data: RemindersFile): void {
    const content = JSON.stringify(data, null, 2);
    const tmp = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmp, content, "utf8");
      fs.renameSync(tmp, this.filePath);
    } catch (e) {
      throw new PersistenceError(`Failed to write ${this.filePath}: ${e}`, { cause: e });
    }
  }

  private serialize<T>(operation: () => T): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.catch(() => undefined);
    return run;
  }

  addReminders(reminders: Reminder[]): Promise<void> {
    return this.serialize(() => {
      const data = this.load();
      for (const reminder of reminders) {
        if (data.reminders.some((r) => r.jobId === reminder.jobId)) {
          throw new PersistenceError(`Duplicate job id ${reminder.jobId}`);
        }
      }
      data.reminders.push(...reminders);
      this.save(data);
    });
  }

  getReminder(jobId: string): Promise<Reminder | null> {
    return this.serialize(
      () => this.load().reminders.find((r) => r.jobId === jobId) ?? null,
    );
  }

  /**
   * Updates an existing reminder by job id.
   */
  updateReminder(jobId: string, updates: ReminderUpdates): Promise<Reminder | null> {
    return this.serialize(() => {
      const data = this.load();
      const index = data.reminders.findIndex((r) => r.jobId === jobId);
      if (index === -1) {
        return null;
      }

      const updated: Reminder = { ...data.reminders[index], ...updates };
      data.reminders[index] = updated;
      this.save(data);
      return updated;
    });
  }

  /**
   * Removes a reminder. Returns true if it was found and removed.
   */
  removeReminder(jobId: string): Promise<boolean> {
    return this.serialize(() => {
      const data = this.load();
      const index = data.reminders.findIndex((r) => r.jobId === jobId);
      if (index === -1) {
        return false;
      }

      data.reminders.splice(index, 1);
      this.save(data);
      return true;
    });
  }

  listReminders(ownerId: number): Promise<Reminder[]> {
    return this.serialize(() =>
      this.load().reminders.filter((r) => r.ownerId === ownerId),
    );
  }

  listAllReminders(): Promise<Reminder[]> {
    return this.serialize(() => this.load().reminders);
  }

  getTimezone(ownerId: number): Promise<string | null> {
    return this.serialize(() => this.load().timezones[String(ownerId)] ?? null);
  }

  setTimezone(ownerId: number, zone: string): Promise<void> {
    return this.serialize(() => {
      const data = this.load();
      data.timezones[String(ownerId)] = zone;
      this.save(data);
    });
  }
}
