import { DateTime } from "luxon";
import { nanoid } from "nanoid";
import { NotFoundError, ValidationError } from "./errors";
import { buildReminderMessage } from "./reminders";
import {
  ReminderScheduler,
  type RehydrateResult,
  type SchedulerStatus,
} from "./scheduler";
import {
  isRecurrence,
  type Attachment,
  type Recurrence,
  type Reminder,
  type ReminderDraft,
  type ReminderEdit,
} from "./schema";
import type { ReminderStore, ReminderUpdates, TimezoneStore } from "./store";
import {
  DEFAULT_TIMEZONE,
  TimezoneResolver,
  formatTimeOfDay,
  getNowUtc,
  isValidTimezone,
  normalizeTimeOfDay,
} from "./time";
import { compileTrigger, type Trigger } from "./trigger";

export type DeliveryOutcome =
  | "ok"
  | "not_found"
  | "permanent_failure"
  | "transient_failure";

/**
 * Sends fired reminders to their owner. Abstracts away Telegram-specific details.
 */
export interface ReminderDispatcher {
  deliver(
    ownerId: number,
    text: string,
    attachment?: Attachment,
  ): Promise<DeliveryOutcome>;
  close?(): Promise<void> | void;
}

export type ReminderServiceOptions = {
  reminders: ReminderStore;
  timezones: TimezoneStore;
  dispatcher: ReminderDispatcher;
  defaultTimezone?: string;
  graceMs?: number;
  checkIntervalMs?: number;
  generateId?: () => string;
};

export type BatchItem = { timeOfDay: string; text: string };

export type ServiceHealth = SchedulerStatus & { defaultTimezone: string };

export const TEST_REMINDER_TEXT = "TEST REMINDER";

function validateText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ValidationError("Reminder text cannot be empty.");
  }
  return trimmed;
}

function validateTimeOfDay(timeOfDay: string): string {
  const normalized = normalizeTimeOfDay(timeOfDay);
  if (!normalized) {
    throw new ValidationError(
      `Invalid time "${timeOfDay}". Use HH:MM, for example 09:30.`,
    );
  }
  return normalized;
}

function validateRecurrence(recurrence: string): Recurrence {
  if (!isRecurrence(recurrence)) {
    throw new ValidationError(`Unknown recurrence "${recurrence}".`);
  }
  return recurrence;
}

function validateAttachment(attachment: Attachment): Attachment {
  if (attachment.kind === "text" && !attachment.content.trim()) {
    throw new ValidationError("Attachment text cannot be empty.");
  }
  if (attachment.kind !== "text" && !attachment.fileId) {
    throw new ValidationError("Attachment file is missing.");
  }
  return attachment;
}

/**
 * True when neither the time nor the recurrence was edited in between.
 */
function sameSchedule(before: Reminder, after: Reminder): boolean {
  return (
    before.timeOfDay === after.timeOfDay &&
    before.recurrence === after.recurrence &&
    before.anchorIso === after.anchorIso
  );
}

/**
 * Compiles a stored reminder against its owner's zone.
 */
export function compileReminder(reminder: Reminder, zone: string, now: number): Trigger {
  const anchor = Date.parse(reminder.anchorIso ?? reminder.createdAtIso);
  return compileTrigger({
    timeOfDay: reminder.timeOfDay,
    recurrence: reminder.recurrence,
    timezone: zone,
    now,
    anchor: Number.isFinite(anchor) ? anchor : undefined,
  });
}

/**
 * The reminder core as seen by the dialogue layer: every mutation writes the
 * store first and only then touches the scheduler.
 */
export class ReminderService {
  readonly scheduler: ReminderScheduler;
  readonly resolver: TimezoneResolver;
  private readonly reminders: ReminderStore;
  private readonly timezones: TimezoneStore;
  private readonly dispatcher: ReminderDispatcher;
  private readonly generateId: () => string;

  constructor(options: ReminderServiceOptions) {
    this.reminders = options.reminders;
    this.timezones = options.timezones;
    this.dispatcher = options.dispatcher;
    this.resolver = new TimezoneResolver(
      options.timezones,
      options.defaultTimezone ?? DEFAULT_TIMEZONE,
    );
    this.generateId = options.generateId ?? (() => `rem_${nanoid(12)}`);
    this.scheduler = new ReminderScheduler({
      onFire: (ownerId, jobId) => this.handleFire(ownerId, jobId),
      onMissed: (ownerId, jobId, lateMs) => this.handleMissed(ownerId, jobId, lateMs),
      graceMs: options.graceMs,
      checkIntervalMs: options.checkIntervalMs,
    });
  }

  /**
   * Loads every persisted reminder, then activates the fire loop.
   * Returns null if the service was already running.
   */
  async start(): Promise<RehydrateResult | null> {
    let result: RehydrateResult | null = null;

    await this.scheduler.start(async () => {
      const records = await this.reminders.listAllReminders();
      const zones = await this.resolver.resolveAll(records.map((r) => r.ownerId));
      const now = Date.now();

      console.log(`[Reminders] Rehydrating ${records.length} reminders`);
      result = this.scheduler.rehydrate(records, (record) =>
        compileReminder(
          record,
          zones.get(record.ownerId) ?? this.resolver.defaultZone,
          now,
        ),
      );
    });

    return result;
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
    await this.dispatcher.close?.();
  }

  health(): ServiceHealth {
    return { ...this.scheduler.status(), defaultTimezone: this.resolver.defaultZone };
  }

  async createReminder(ownerId: number, draft: ReminderDraft): Promise<Reminder> {
    const [reminder] = await this.persistAndSchedule(ownerId, [
      {
        text: validateText(draft.text),
        timeOfDay: validateTimeOfDay(draft.timeOfDay),
        recurrence: validateRecurrence(draft.recurrence),
        attachment: draft.attachment ? validateAttachment(draft.attachment) : undefined,
      },
    ]);
    return reminder;
  }

  /**
   * Creates several reminders sharing one recurrence. Either all are
   * created or none is.
   */
  async createBatch(
    ownerId: number,
    items: BatchItem[],
    recurrence: Recurrence,
  ): Promise<Reminder[]> {
    if (items.length === 0) {
      throw new ValidationError("Batch is empty.");
    }

    const validRecurrence = validateRecurrence(recurrence);
    const drafts: ReminderDraft[] = items.map((item) => ({
      text: validateText(item.text),
      timeOfDay: validateTimeOfDay(item.timeOfDay),
      recurrence: validRecurrence,
    }));

    return this.persistAndSchedule(ownerId, drafts);
  }

  /**
   * Updates one field. Time and recurrence changes replace the live task.
   */
  async editField(jobId: string, edit: ReminderEdit): Promise<Reminder> {
    const existing = await this.reminders.getReminder(jobId);
    if (!existing) {
      throw new NotFoundError(jobId);
    }

    const nowIso = getNowUtc();
    const updates: ReminderUpdates = { updatedAtIso: nowIso };
    let reschedule = false;

    switch (edit.field) {
      case "text":
        updates.text = validateText(edit.value);
        break;
      case "time":
        updates.timeOfDay = validateTimeOfDay(edit.value);
        updates.anchorIso = nowIso;
        reschedule = true;
        break;
      case "recurrence":
        updates.recurrence = validateRecurrence(edit.value);
        updates.anchorIso = nowIso;
        reschedule = true;
        break;
      case "attachment":
        updates.attachment = edit.value ? validateAttachment(edit.value) : undefined;
        break;
    }

    // Compile before writing so a bad trigger leaves both sides untouched
    let trigger: Trigger | null = null;
    if (reschedule) {
      const zone = await this.resolver.resolve(existing.ownerId);
      trigger = compileReminder({ ...existing, ...updates }, zone, Date.now());
    }

    const updated = await this.reminders.updateReminder(jobId, updates);
    if (!updated) {
      throw new NotFoundError(jobId);
    }

    if (trigger) {
      this.scheduler.schedule(jobId, updated.ownerId, trigger);
    }

    console.log(`[Reminders] Edited ${edit.field} of ${jobId}`);
    return updated;
  }

  async deleteReminder(jobId: string): Promise<void> {
    const removed = await this.reminders.removeReminder(jobId);
    this.scheduler.cancel(jobId);

    if (!removed) {
      throw new NotFoundError(jobId);
    }
    console.log(`[Reminders] Deleted ${jobId}`);
  }

  /**
   * Lists an owner's reminders in creation order.
   */
  listReminders(ownerId: number): Promise<Reminder[]> {
    return this.reminders.listReminders(ownerId);
  }

  getReminder(jobId: string): Promise<Reminder | null> {
    return this.reminders.getReminder(jobId);
  }

  getTimezone(ownerId: number): Promise<string> {
    return this.resolver.resolve(ownerId);
  }

  /**
   * Stores a new zone and recompiles the owner's live reminders so that
   * future firings follow it. Occurrences already missed are not replayed.
   */
  async setTimezone(ownerId: number, zone: string): Promise<void> {
    if (!isValidTimezone(zone)) {
      throw new ValidationError(`Unknown timezone "${zone}".`);
    }

    await this.timezones.setTimezone(ownerId, zone);

    const now = Date.now();
    for (const reminder of await this.reminders.listReminders(ownerId)) {
      try {
        this.scheduler.schedule(reminder.jobId, ownerId, compileReminder(reminder, zone, now));
      } catch (e) {
        console.error(`[Reminders] Failed to recompile ${reminder.jobId}: ${e}`);
      }
    }
    console.log(`[Reminders] Timezone of ${ownerId} set to ${zone}`);
  }

  /**
   * Creates a one-shot reminder for the minute after the current one.
   */
  async sendTestReminder(ownerId: number): Promise<Reminder> {
    const zone = await this.resolver.resolve(ownerId);
    const inOneMinute = DateTime.now().setZone(zone).plus({ minutes: 1 });

    return this.createReminder(ownerId, {
      text: TEST_REMINDER_TEXT,
      timeOfDay: formatTimeOfDay(inOneMinute),
      recurrence: "once",
    });
  }

  /**
   * Delivery callback. Reads the current record, so edits made after
   * scheduling are reflected.
   */
  async handleFire(ownerId: number, jobId: string): Promise<void> {
    const reminder = await this.reminders.getReminder(jobId);
    if (!reminder) {
      console.log(`[Reminders] ${jobId} not found, dropping its task`);
      this.scheduler.cancel(jobId);
      return;
    }

    const zone = await this.resolver.resolve(reminder.ownerId);
    const message = buildReminderMessage(reminder, zone, Date.now());

    let outcome: DeliveryOutcome;
    try {
      outcome = await this.dispatcher.deliver(reminder.ownerId, message, reminder.attachment);
    } catch (e) {
      console.error(`[Reminders] Delivery of ${jobId} threw: ${e}`);
      outcome = "transient_failure";
    }

    // Edits may have landed while the delivery was in flight
    const current = await this.reminders.getReminder(jobId);
    const oneShot =
      current !== null && current.recurrence === "once" && sameSchedule(reminder, current);

    switch (outcome) {
      case "ok":
        console.log(`[Reminders] Sent ${jobId} to ${ownerId}`);
        if (oneShot) {
          await this.reminders.removeReminder(jobId);
          this.scheduler.cancel(jobId);
          console.log(`[Reminders] ${jobId} removed after one-shot delivery`);
        }
        break;
      case "not_found":
      case "permanent_failure":
        console.error(`[Reminders] ${ownerId} is unreachable (${outcome}), retiring ${jobId}`);
        await this.reminders.removeReminder(jobId);
        this.scheduler.cancel(jobId);
        break;
      case "transient_failure":
        console.error(`[Reminders] Failed to send ${jobId}, next occurrence will retry`);
        // A live task means an edit or a timezone change already rescheduled it
        if (current && oneShot && !this.scheduler.get(jobId)) {
          const currentZone = await this.resolver.resolve(current.ownerId);
          this.scheduler.schedule(
            jobId,
            current.ownerId,
            compileReminder(current, currentZone, Date.now() + 1),
          );
        }
        break;
    }
  }

  /**
   * A one-shot reminder fell outside the grace window; it will not fire.
   */
  async handleMissed(ownerId: number, jobId: string, lateMs: number): Promise<void> {
    console.error(
      `[Reminders] ${jobId} for ${ownerId} missed by ${Math.round(lateMs / 1000)}s, removing`,
    );
    await this.reminders.removeReminder(jobId);
  }

  private async persistAndSchedule(
    ownerId: number,
    drafts: ReminderDraft[],
  ): Promise<Reminder[]> {
    const zone = await this.resolver.resolve(ownerId);
    const now = Date.now();
    const nowIso = new Date(now).toISOString();

    const entries = drafts.map((draft) => {
      const reminder: Reminder = {
        jobId: this.generateId(),
        ownerId,
        text: draft.text,
        timeOfDay: draft.timeOfDay,
        recurrence: draft.recurrence,
        createdAtIso: nowIso,
        updatedAtIso: nowIso,
        anchorIso: nowIso,
      };
      if (draft.attachment) {
        reminder.attachment = draft.attachment;
      }
      return { reminder, trigger: compileReminder(reminder, zone, now) };
    });

    await this.reminders.addReminders(entries.map((e) => e.reminder));

    for (const { reminder, trigger } of entries) {
      this.scheduler.schedule(reminder.jobId, ownerId, trigger);
    }

    console.log(`[Reminders] Created ${entries.length} reminder(s) for ${ownerId}`);
    return entries.map((e) => e.reminder);
  }
}
