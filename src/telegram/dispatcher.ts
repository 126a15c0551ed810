import { TelegramError } from "telegraf";
import type { Attachment } from "../tasks/schema";
import type { DeliveryOutcome, ReminderDispatcher } from "../tasks/service";

/**
 * The subset of the Telegram API used to deliver reminders.
 */
export interface TelegramSender {
  sendMessage(chatId: number, text: string): Promise<unknown>;
  sendPhoto(chatId: number, photo: string, extra: { caption: string }): Promise<unknown>;
  sendDocument(chatId: number, document: string, extra: { caption: string }): Promise<unknown>;
}

export type Delivery =
  | { method: "message"; text: string }
  | { method: "photo"; fileId: string; caption: string }
  | { method: "document"; fileId: string; caption: string };

/**
 * Decides which Telegram call carries a reminder and what it says.
 */
export function buildDelivery(text: string, attachment?: Attachment): Delivery {
  if (!attachment) {
    return { method: "message", text };
  }

  switch (attachment.kind) {
    case "text":
      return { method: "message", text: `${text}\n\n💬 Comment: ${attachment.content}` };
    case "photo":
    case "document":
      return {
        method: attachment.kind,
        fileId: attachment.fileId,
        caption: text + (attachment.caption ? `\n\n💬 ${attachment.caption}` : ""),
      };
  }
}

/**
 * Maps a failed Telegram call to a delivery outcome. Only a recipient that
 * blocked the bot or no longer exists is permanent.
 */
export function classifyDeliveryError(e: unknown): DeliveryOutcome {
  if (!(e instanceof TelegramError)) {
    return "transient_failure";
  }

  if (e.code === 403) {
    return "permanent_failure";
  }
  if (e.code === 400 && /chat not found|user not found/i.test(e.description)) {
    return "not_found";
  }
  return "transient_failure";
}

export class TelegramDispatcher implements ReminderDispatcher {
  constructor(private readonly telegram: TelegramSender) {}

  async deliver(
    ownerId: number,
    text: string,
    attachment?: Attachment,
  ): Promise<DeliveryOutcome> {
    const delivery = buildDelivery(text, attachment);

    try {
      switch (delivery.method) {
        case "message":
          await this.telegram.sendMessage(ownerId, delivery.text);
          break;
        case "photo":
          await this.telegram.sendPhoto(ownerId, delivery.fileId, { caption: delivery.caption });
          break;
        case "document":
          await this.telegram.sendDocument(ownerId, delivery.fileId, { caption: delivery.caption });
          break;
      }
      return "ok";
    } catch (e) {
      const outcome = classifyDeliveryError(e);
      console.error(`[Dispatcher] Failed to send to ${ownerId} (${outcome}): ${e}`);
      return outcome;
    }
  }
}
