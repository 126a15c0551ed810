import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, PersistenceError, ValidationError } from "./errors";
import type { Attachment, Reminder } from "./schema";
import {
  ReminderService,
  TEST_REMINDER_TEXT,
  type DeliveryOutcome,
  type ReminderDispatcher,
} from "./service";
import type { ReminderStore, ReminderUpdates, TimezoneStore } from "./store";

// 10:00 in Moscow
const NOW = Date.parse("2024-01-01T07:00:00Z");
const OWNER = 1;

class MemoryStore implements ReminderStore, TimezoneStore {
  readonly reminders: Reminder[] = [];
  readonly timezones = new Map<number, string>();

  async addReminders(reminders: Reminder[]) {
    this.reminders.push(...reminders);
  }

  async getReminder(jobId: string) {
    return this.reminders.find((r) => r.jobId === jobId) ?? null;
  }

  async updateReminder(jobId: string, updates: ReminderUpdates) {
    const index = this.reminders.findIndex((r) => r.jobId === jobId);
    if (index === -1) {
      return null;
    }
    const updated: Reminder = { ...this.reminders[index], ...updates };
    this.reminders[index] = updated;
    return updated;
  }

  async removeReminder(jobId: string) {
    const index = this.reminders.findIndex((r) => r.jobId === jobId);
    if (index === -1) {
      return false;
    }
    this.reminders.splice(index, 1);
    return true;
  }

  async listReminders(ownerId: number) {
    return this.reminders.filter((r) => r.ownerId === ownerId);
  }

  async listAllReminders() {
    return [...this.reminders];
  }

  async getTimezone(ownerId: number) {
    return this.timezones.get(ownerId) ?? null;
  }

  async setTimezone(ownerId: number, zone: string) {
    this.timezones.set(ownerId, zone);
  }
}

class BrokenStore extends MemoryStore {
  override async addReminders(): Promise<void> {
    throw new PersistenceError("disk full");
  }

  override async updateReminder(): Promise<Reminder | null> {
    throw new PersistenceError("disk full");
  }
}

class RecordingDispatcher implements ReminderDispatcher {
  readonly deliveries: Array<{ ownerId: number; text: string; attachment?: Attachment }> = [];
  outcome: DeliveryOutcome = "ok";
  closed = false;

  async deliver(ownerId: number, text: string, attachment?: Attachment) {
    this.deliveries.push({ ownerId, text, attachment });
    return this.outcome;
  }

  close() {
    this.closed = true;
  }
}

/**
 * Holds every delivery until the test releases it.
 */
class GatedDispatcher implements ReminderDispatcher {
  readonly deliveries: string[] = [];
  private readonly waiting: Array<(outcome: DeliveryOutcome) => void> = [];

  deliver(_ownerId: number, text: string): Promise<DeliveryOutcome> {
    this.deliveries.push(text);
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(outcome: DeliveryOutcome) {
    for (const resolve of this.waiting.splice(0)) {
      resolve(outcome);
    }
  }
}

async function settle() {
  for (let i = 0; i < 50; i++) {
    await Promise.resolve();
  }
}

async function advance(ms: number) {
  await vi.advanceTimersByTimeAsync(ms);
  await settle();
}

describe("ReminderService", () => {
  let store: MemoryStore;
  let dispatcher: RecordingDispatcher;
  let service: ReminderService;

  function createService(
    reminders: MemoryStore = store,
    using: ReminderDispatcher = dispatcher,
  ) {
    let counter = 0;
    return new ReminderService({
      reminders,
      timezones: reminders,
      dispatcher: using,
      defaultTimezone: "Europe/Moscow",
      generateId: () => `rem_${++counter}`,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    store = new MemoryStore();
    dispatcher = new RecordingDispatcher();
    service = createService();
  });

  afterEach(async () => {
    await service.stop();
    vi.useRealTimers();
  });

  describe("createReminder", () => {
    it("persists the reminder and schedules its first occurrence", async () => {
      const reminder = await service.createReminder(OWNER, {
        text: "  Vitamins ",
        timeOfDay: "9:00",
        recurrence: "daily",
      });

      expect(reminder).toMatchObject({
        jobId: "rem_1",
        ownerId: OWNER,
        text: "Vitamins",
        timeOfDay: "09:00",
        recurrence: "daily",
        createdAtIso: "2024-01-01T07:00:00.000Z",
      });
      expect(store.reminders).toEqual([reminder]);
      expect(service.scheduler.get("rem_1")?.nextFireAtMs).toBe(
        Date.parse("2024-01-02T06:00:00Z"),
      );
    });

    it("rejects invalid input without touching the store or the scheduler", async () => {
      await expect(
        service.createReminder(OWNER, { text: "   ", timeOfDay: "09:00", recurrence: "daily" }),
      ).rejects.toThrow("Reminder text cannot be empty.");
      await expect(
        service.createReminder(OWNER, { text: "Walk", timeOfDay: "25:61", recurrence: "daily" }),
      ).rejects.toThrow(ValidationError);

      expect(store.reminders).toEqual([]);
      expect(service.scheduler.listActive().size).toBe(0);
    });

    it("leaves the scheduler untouched when the store fails", async () => {
      service = createService(new BrokenStore());

      await expect(
        service.createReminder(OWNER, { text: "Walk", timeOfDay: "09:00", recurrence: "daily" }),
      ).rejects.toThrow(PersistenceError);
      expect(service.scheduler.listActive().size).toBe(0);
    });
  });

  describe("createBatch", () => {
    it("creates every item with the shared recurrence", async () => {
      const created = await service.createBatch(
        OWNER,
        [
          { timeOfDay: "08:00", text: "Breakfast" },
          { timeOfDay: "13:00", text: "Lunch" },
        ],
        "weekdays",
      );

      expect(created.map((r) => [r.jobId, r.recurrence])).toEqual([
        ["rem_1", "weekdays"],
        ["rem_2", "weekdays"],
      ]);
      expect(service.scheduler.listActive()).toEqual(new Set(["rem_1", "rem_2"]));
    });

    it("creates nothing when one item is invalid", async () => {
      await expect(
        service.createBatch(
          OWNER,
          [
            { timeOfDay: "08:00", text: "Breakfast" },
            { timeOfDay: "8 pm", text: "Dinner" },
          ],
          "daily",
        ),
      ).rejects.toThrow('Invalid time "8 pm". Use HH:MM, for example 09:30.');

      expect(store.reminders).toEqual([]);
    });

    it("rejects an empty batch", async () => {
      await expect(service.createBatch(OWNER, [], "daily")).rejects.toThrow("Batch is empty.");
    });
  });

  describe("firing", () => {
    it("delivers a one-shot reminder once and removes it", async () => {
      await service.start();
      await service.createReminder(OWNER, { text: "Water", timeOfDay: "10:01", recurrence: "once" });

      await advance(60_000);

      expect(dispatcher.deliveries).toEqual([
        {
          ownerId: OWNER,
          text: "⏰ Reminder: Water\n🕒 Your time: 10:01 (Europe/Moscow)",
          attachment: undefined,
        },
      ]);
      expect(store.reminders).toEqual([]);
      expect(service.scheduler.listActive().size).toBe(0);
    });

    it("keeps a daily reminder after delivering it", async () => {
      await service.start();
      await service.createReminder(OWNER, {
        text: "Water",
        timeOfDay: "10:01",
        recurrence: "daily",
        attachment: { kind: "text", content: "two glasses" },
      });

      await advance(60_000);

      expect(dispatcher.deliveries).toHaveLength(1);
      expect(dispatcher.deliveries[0]?.attachment).toEqual({ kind: "text", content: "two glasses" });
      expect(store.reminders).toHaveLength(1);
      expect(service.scheduler.get("rem_1")?.nextFireAtMs).toBe(
        Date.parse("2024-01-02T07:01:00Z"),
      );
    });

    it("retires a reminder whose owner blocked the bot", async () => {
      dispatcher.outcome = "permanent_failure";
      await service.start();
      await service.createReminder(OWNER, { text: "Water", timeOfDay: "10:01", recurrence: "daily" });

      await advance(60_000);

      expect(store.reminders).toEqual([]);
      expect(service.scheduler.get("rem_1")).toBeUndefined();
    });

    it("keeps a one-shot reminder for tomorrow after a transient failure", async () => {
      dispatcher.outcome = "transient_failure";
      await service.start();
      await service.createReminder(OWNER, { text: "Water", timeOfDay: "10:01", recurrence: "once" });

      await advance(60_000);

      expect(dispatcher.deliveries).toHaveLength(1);
      expect(store.reminders).toHaveLength(1);
      expect(service.scheduler.get("rem_1")?.nextFireAtMs).toBe(
        Date.parse("2024-01-02T07:01:00Z"),
      );
    });

    it("drops the task of a reminder deleted behind its back", async () => {
      const { jobId } = await service.createReminder(OWNER, {
        text: "Water",
        timeOfDay: "09:00",
        recurrence: "daily",
      });
      await store.removeReminder(jobId);

      await service.handleFire(OWNER, jobId);

      expect(dispatcher.deliveries).toEqual([]);
      expect(service.scheduler.get(jobId)).toBeUndefined();
    });

    it("removes a one-shot reminder that missed its window", async () => {
      await service.start();
      await service.createReminder(OWNER, { text: "Water", timeOfDay: "10:01", recurrence: "once" });

      vi.setSystemTime(NOW + 10 * 60_000);
      service.scheduler.checkHealth();
      await settle();

      expect(dispatcher.deliveries).toEqual([]);
      expect(store.reminders).toEqual([]);
    });
  });

  describe("edits during an in-flight delivery", () => {
    let gate: GatedDispatcher;

    beforeEach(async () => {
      gate = new GatedDispatcher();
      service = createService(store, gate);
      await service.start();
      await service.createReminder(OWNER, { text: "Water", timeOfDay: "10:01", recurrence: "once" });
      await advance(60_000);
      expect(gate.deliveries).toHaveLength(1);
    });

    afterEach(() => {
      gate.release("ok");
    });

    it("keeps a reminder switched to daily after the one-shot delivery succeeds", async () => {
      await service.editField("rem_1", { field: "recurrence", value: "daily" });

      gate.release("ok");
      await settle();

      expect(store.reminders.map((r) => [r.jobId, r.recurrence])).toEqual([["rem_1", "daily"]]);
      expect(service.scheduler.get("rem_1")).toBeDefined();
    });

    it("keeps the edited time after a transient failure", async () => {
      await service.editField("rem_1", { field: "time", value: "12:00" });

      gate.release("transient_failure");
      await settle();

      expect(service.scheduler.get("rem_1")?.nextFireAtMs).toBe(
        Date.parse("2024-01-01T09:00:00Z"),
      );
      expect(store.reminders[0]?.timeOfDay).toBe("12:00");
    });

    it("retires the one-shot and the task a timezone change created", async () => {
      await service.setTimezone(OWNER, "Europe/London");
      expect(service.scheduler.get("rem_1")).toBeDefined();

      gate.release("ok");
      await settle();

      expect(store.reminders).toEqual([]);
      expect(service.scheduler.get("rem_1")).toBeUndefined();
    });
  });

  describe("editField", () => {
    it("replaces the trigger when the time changes", async () => {
      await service.start();
      const { jobId } = await service.createReminder(OWNER, {
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
      });

      const updated = await service.editField(jobId, { field: "time", value: "11:00" });
      expect(updated.timeOfDay).toBe("11:00");
      expect(service.scheduler.get(jobId)?.nextFireAtMs).toBe(Date.parse("2024-01-01T08:00:00Z"));

      // Covers 11:00 today and the old 09:00 tomorrow
      await advance(24 * 60 * 60 * 1000 - 1);

      expect(dispatcher.deliveries.map((d) => d.text)).toEqual([
        "⏰ Reminder: Walk\n🕒 Your time: 11:00 (Europe/Moscow)",
      ]);
    });

    it("updates text without rescheduling", async () => {
      const { jobId } = await service.createReminder(OWNER, {
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
      });
      const before = service.scheduler.get(jobId);

      await service.editField(jobId, { field: "text", value: "Run" });

      expect(store.reminders[0]?.text).toBe("Run");
      expect(service.scheduler.get(jobId)).toEqual(before);
    });

    it("removes an attachment", async () => {
      const { jobId } = await service.createReminder(OWNER, {
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
        attachment: { kind: "photo", fileId: "file-1" },
      });

      const updated = await service.editField(jobId, { field: "attachment", value: null });

      expect(updated.attachment).toBeUndefined();
    });

    it("leaves everything as it was on invalid input", async () => {
      const { jobId } = await service.createReminder(OWNER, {
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
      });
      const before = service.scheduler.get(jobId);

      await expect(service.editField(jobId, { field: "time", value: "noon" })).rejects.toThrow(
        ValidationError,
      );
      expect(store.reminders[0]?.timeOfDay).toBe("09:00");
      expect(service.scheduler.get(jobId)).toEqual(before);
    });

    it("keeps the old trigger when the store fails", async () => {
      const broken = new BrokenStore();
      service = createService(broken);
      broken.reminders.push({
        jobId: "rem_x",
        ownerId: OWNER,
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
        createdAtIso: "2024-01-01T07:00:00.000Z",
        updatedAtIso: "2024-01-01T07:00:00.000Z",
      });
      await service.start();
      const before = service.scheduler.get("rem_x");

      await expect(
        service.editField("rem_x", { field: "time", value: "11:00" }),
      ).rejects.toThrow(PersistenceError);
      expect(service.scheduler.get("rem_x")).toEqual(before);
    });

    it("fails for an unknown reminder", async () => {
      await expect(service.editField("rem_404", { field: "text", value: "x" })).rejects.toThrow(
        NotFoundError,
      );
    });
  });

  describe("deleteReminder", () => {
    it("removes the record and its task", async () => {
      const { jobId } = await service.createReminder(OWNER, {
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
      });

      await service.deleteReminder(jobId);

      expect(store.reminders).toEqual([]);
      expect(service.scheduler.get(jobId)).toBeUndefined();
      await expect(service.deleteReminder(jobId)).rejects.toThrow(`Reminder ${jobId} not found`);
    });
  });

  describe("start", () => {
    it("rehydrates stored reminders and skips broken ones", async () => {
      store.reminders.push(
        {
          jobId: "good",
          ownerId: OWNER,
          text: "Walk",
          timeOfDay: "09:00",
          recurrence: "daily",
          createdAtIso: "2023-12-01T07:00:00.000Z",
          updatedAtIso: "2023-12-01T07:00:00.000Z",
        },
        {
          jobId: "broken",
          ownerId: OWNER,
          text: "Walk",
          timeOfDay: "99:99",
          recurrence: "daily",
          createdAtIso: "2023-12-01T07:00:00.000Z",
          updatedAtIso: "2023-12-01T07:00:00.000Z",
        },
      );
      store.timezones.set(OWNER, "Europe/London");

      const result = await service.start();

      expect(result?.scheduled).toEqual(["good"]);
      expect(result?.skipped.map((s) => s.jobId)).toEqual(["broken"]);
      expect(service.scheduler.get("good")?.nextFireAtMs).toBe(
        Date.parse("2024-01-01T09:00:00Z"),
      );
      expect(await service.start()).toBeNull();
    });

    it("stops the loop and closes the dispatcher", async () => {
      await service.start();
      await service.stop();

      expect(service.health()).toMatchObject({ running: false, defaultTimezone: "Europe/Moscow" });
      expect(dispatcher.closed).toBe(true);
    });
  });

  describe("setTimezone", () => {
    it("moves live reminders to the new zone", async () => {
      const { jobId } = await service.createReminder(OWNER, {
        text: "Walk",
        timeOfDay: "09:00",
        recurrence: "daily",
      });

      await service.setTimezone(OWNER, "Europe/London");

      expect(await service.getTimezone(OWNER)).toBe("Europe/London");
      expect(service.scheduler.get(jobId)?.nextFireAtMs).toBe(
        Date.parse("2024-01-01T09:00:00Z"),
      );
    });

    it("rejects an unknown zone", async () => {
      await expect(service.setTimezone(OWNER, "Mars/Olympus")).rejects.toThrow(ValidationError);
      expect(await service.getTimezone(OWNER)).toBe("Europe/Moscow");
    });
  });

  it("schedules a test reminder for the next minute", async () => {
    vi.setSystemTime(Date.parse("2024-01-01T07:00:30Z"));

    const reminder = await service.sendTestReminder(OWNER);

    expect(reminder).toMatchObject({
      text: TEST_REMINDER_TEXT,
      timeOfDay: "10:01",
      recurrence: "once",
    });
    expect(service.scheduler.get(reminder.jobId)?.nextFireAtMs).toBe(
      Date.parse("2024-01-01T07:01:00Z"),
    );
  });
});
