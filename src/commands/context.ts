import { isReminderError, ReminderErrorCode } from "../tasks/errors";
import type { ReminderEdit } from "../tasks/schema";
import type { BatchItem, ReminderService } from "../tasks/service";
import { mainMenu } from "./menu";
import type { WizardState } from "./wizard";

export const GENERIC_ERROR_MESSAGE = "Something went wrong, please try again.";

/**
 * Where a user is in a multi-message flow.
 */
export type Session =
  | { kind: "create"; state: WizardState }
  | { kind: "batch"; items: BatchItem[] | null }
  | { kind: "edit"; jobId: string; field: ReminderEdit["field"] | null };

/**
 * Open conversations, one per user.
 */
export class SessionStore {
  private readonly sessions = new Map<number, Session>();

  get(userId: number): Session | undefined {
    return this.sessions.get(userId);
  }

  set(userId: number, session: Session): void {
    this.sessions.set(userId, session);
  }

  clear(userId: number): void {
    this.sessions.delete(userId);
  }
}

/**
 * What every command handler works with.
 */
export type BotDeps = {
  service: ReminderService;
  sessions: SessionStore;
};

/**
 * The part of a telegraf context an error reply needs.
 */
export type Replier = {
  from?: { id: number };
  reply(text: string, extra?: { reply_markup?: ReturnType<typeof mainMenu> }): Promise<unknown>;
};

/**
 * Reports an error to the user. Validation and not-found errors keep the
 * conversation where it is; anything else ends it with the generic message.
 */
export async function replyError(
  ctx: Replier,
  deps: Pick<BotDeps, "sessions">,
  e: unknown,
): Promise<void> {
  if (
    isReminderError(e) &&
    (e.code === ReminderErrorCode.VALIDATION || e.code === ReminderErrorCode.NOT_FOUND)
  ) {
    await ctx.reply(e.message);
    return;
  }

  console.error("[Bot] Handler failed:", e);
  const userId = ctx.from?.id;
  if (userId !== undefined) {
    deps.sessions.clear(userId);
  }
  await ctx.reply(GENERIC_ERROR_MESSAGE, { reply_markup: mainMenu() });
}
