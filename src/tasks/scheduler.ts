import type { Reminder } from "./schema";
import { describeTrigger, nextFireTime, type Trigger } from "./trigger";

// Maximum delay for setTimeout (24 hours to avoid 32-bit overflow)
const MAX_DELAY_MS = 1000 * 60 * 60 * 24;

export const DEFAULT_GRACE_MS = 5 * 60 * 1000;
export const DEFAULT_CHECK_INTERVAL_MS = 60 * 1000;

// How far behind a task may fall before the self-check restarts the loop
const STALL_TOLERANCE_MS = 1000;

export type FireHandler = (ownerId: number, jobId: string) => Promise<void>;
export type MissedHandler = (
  ownerId: number,
  jobId: string,
  lateMs: number,
) => Promise<void>;

export type SchedulerOptions = {
  onFire: FireHandler;
  // Called when a one-shot task is retired without firing
  onMissed?: MissedHandler;
  graceMs?: number;
  checkIntervalMs?: number;
};

export type TaskState = "pending" | "retired";

export type ScheduledTask = {
  jobId: string;
  ownerId: number;
  trigger: Trigger;
  nextFireAtMs: number;
  state: TaskState;
  fireCount: number;
};

export type SchedulerStatus = {
  running: boolean;
  activeTasks: number;
  nextFireAtMs: number | null;
};

export type RehydrateResult = {
  scheduled: string[];
  skipped: Array<{ jobId: string; reason: string }>;
};

/**
 * Owns the live task set and the single timer that fires due tasks.
 *
 * Tasks may be registered while stopped; nothing fires until `start()` arms
 * the loop. Replacing or cancelling a task is a synchronous map update, so a
 * superseded trigger can never fire afterwards.
 */
export class ReminderScheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly onFire: FireHandler;
  private readonly onMissed?: MissedHandler;
  private readonly graceMs: number;
  private readonly checkIntervalMs: number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private watchdog: ReturnType<typeof setInterval> | null = null;
  private running = false;
  // start/stop run one at a time
  private lock: Promise<unknown> = Promise.resolve();

  constructor(options: SchedulerOptions) {
    this.onFire = options.onFire;
    this.onMissed = options.onMissed;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  }

  /**
   * Registers a task, replacing any task already under `jobId`.
   */
  schedule(jobId: string, ownerId: number, trigger: Trigger): ScheduledTask | null {
    const now = Date.now();
    // A date trigger keeps its instant even if it just slipped into the past;
    // the fire loop applies the grace window to it.
    const nextFireAtMs =
      trigger.kind === "date" ? trigger.fireAtMs : nextFireTime(trigger, now);

    if (nextFireAtMs === null) {
      console.error(`[Scheduler] No upcoming occurrence for ${jobId}, not scheduling`);
      this.cancel(jobId);
      return null;
    }

    const replaced = this.tasks.has(jobId);
    const task: ScheduledTask = {
      jobId,
      ownerId,
      trigger,
      nextFireAtMs,
      state: "pending",
      fireCount: 0,
    };
    this.tasks.set(jobId, task);

    console.log(
      `[Scheduler] ${replaced ? "Replaced" : "Scheduled"} ${jobId}: ${describeTrigger(trigger)}, ` +
        `next in ${Math.round((nextFireAtMs - now) / 1000 / 60)} minutes`,
    );

    this.arm();
    return { ...task };
  }

  /**
   * Removes a task. Unknown ids are ignored.
   */
  cancel(jobId: string): boolean {
    const task = this.tasks.get(jobId);
    if (!task) {
      return false;
    }

    task.state = "retired";
    this.tasks.delete(jobId);
    console.log(`[Scheduler] Cancelled ${jobId}`);
    this.arm();
    return true;
  }

  get(jobId: string): ScheduledTask | undefined {
    const task = this.tasks.get(jobId);
    return task ? { ...task } : undefined;
  }

  listActive(): Set<string> {
    return new Set(this.tasks.keys());
  }

  status(): SchedulerStatus {
    let nextFireAtMs: number | null = null;
    for (const task of this.tasks.values()) {
      if (nextFireAtMs === null || task.nextFireAtMs < nextFireAtMs) {
        nextFireAtMs = task.nextFireAtMs;
      }
    }
    return { running: this.running, activeTasks: this.tasks.size, nextFireAtMs };
  }

  /**
   * Rebuilds the task set from persisted records. Records whose trigger
   * cannot be compiled are skipped; tasks without a record are dropped.
   */
  rehydrate(
    records: Reminder[],
    compile: (record: Reminder) => Trigger,
  ): RehydrateResult {
    const result: RehydrateResult = { scheduled: [], skipped: [] };
    const known = new Set(records.map((r) => r.jobId));

    for (const jobId of [...this.tasks.keys()]) {
      if (!known.has(jobId)) {
        console.log(`[Scheduler] Dropping orphaned task ${jobId}`);
        this.cancel(jobId);
      }
    }

    for (const record of records) {
      try {
        const trigger = compile(record);
        if (this.schedule(record.jobId, record.ownerId, trigger)) {
          result.scheduled.push(record.jobId);
        } else {
          result.skipped.push({ jobId: record.jobId, reason: "no upcoming occurrence" });
        }
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        console.error(`[Scheduler] Skipping ${record.jobId}: ${reason}`);
        result.skipped.push({ jobId: record.jobId, reason });
      }
    }

    console.log(
      `[Scheduler] Rehydrated ${result.scheduled.length} tasks, skipped ${result.skipped.length}`,
    );
    return result;
  }

  /**
   * Activates the fire loop. Returns false if it was already running.
   * `prepare` runs under the same lock before the loop is armed, so the task
   * set can be fully built first.
   */
  start(prepare?: () => Promise<void> | void): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.running) {
        return false;
      }

      if (prepare) {
        await prepare();
      }
      this.running = true;
      this.watchdog = setInterval(() => this.checkHealth(), this.checkIntervalMs);
      this.arm();
      console.log(`[Scheduler] Started with ${this.tasks.size} tasks`);
      return true;
    });
  }

  /**
   * Disarms the fire loop and waits for in-flight deliveries.
   * Registered tasks are kept for a later `start()`.
   */
  stop(): Promise<void> {
    return this.exclusive(async () => {
      if (!this.running) {
        return;
      }

      this.running = false;
      this.disarm();
      if (this.watchdog) {
        clearInterval(this.watchdog);
        this.watchdog = null;
      }

      await Promise.allSettled([...this.inFlight]);
      console.log("[Scheduler] Stopped");
    });
  }

  /**
   * Self-check run by the watchdog. Restarts the loop in place when it is
   * running without a timer or has fallen behind a due task.
   * Returns true if a restart was needed.
   */
  checkHealth(): boolean {
    if (!this.running) {
      return false;
    }

    const now = Date.now();
    const stalled = [...this.tasks.values()].some(
      (task) => task.nextFireAtMs < now - STALL_TOLERANCE_MS,
    );
    const unarmed = this.timer === null && this.tasks.size > 0;

    if (!stalled && !unarmed) {
      return false;
    }

    console.error(`[Scheduler] Fire loop stalled (unarmed: ${unarmed}), restarting`);
    this.disarm();
    this.tick();
    return true;
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.lock.then(operation);
    this.lock = run.catch(() => undefined);
    return run;
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Points the single timer at the earliest pending task.
   */
  private arm(): void {
    this.disarm();
    if (!this.running) {
      return;
    }

    let earliest: number | null = null;
    for (const task of this.tasks.values()) {
      if (earliest === null || task.nextFireAtMs < earliest) {
        earliest = task.nextFireAtMs;
      }
    }
    if (earliest === null) {
      return;
    }

    const delayMs = Math.max(0, earliest - Date.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
    }, Math.min(delayMs, MAX_DELAY_MS));
  }

  /**
   * Fires every due task, then re-arms.
   */
  private tick(): void {
    const now = Date.now();

    for (const task of [...this.tasks.values()]) {
      if (task.nextFireAtMs > now || this.tasks.get(task.jobId) !== task) {
        continue;
      }

      const lateMs = now - task.nextFireAtMs;
      const missed = lateMs > this.graceMs;

      if (task.trigger.kind === "date") {
        task.state = "retired";
        this.tasks.delete(task.jobId);
      } else {
        const next = nextFireTime(task.trigger, now + 1);
        if (next === null) {
          task.state = "retired";
          this.tasks.delete(task.jobId);
        } else {
          task.nextFireAtMs = next;
        }
      }

      if (missed) {
        console.error(
          `[Scheduler] ${task.jobId} is ${Math.round(lateMs / 1000)}s late, skipping this occurrence`,
        );
        if (task.state === "retired" && this.onMissed) {
          this.track(task.jobId, () => this.onMissed?.(task.ownerId, task.jobId, lateMs));
        }
        continue;
      }

      task.fireCount++;
      console.log(`[Scheduler] Firing ${task.jobId} for ${task.ownerId}`);
      this.track(task.jobId, () => this.onFire(task.ownerId, task.jobId));
    }

    this.arm();
  }

  /**
   * Runs a callback as an independent unit of work; failures are logged.
   */
  private track(jobId: string, callback: () => Promise<void> | undefined): void {
    const run: Promise<void> = Promise.resolve()
      .then(callback)
      .catch((e) => {
        console.error(`[Scheduler] Callback for ${jobId} failed: ${e}`);
      })
      .then(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }
}
