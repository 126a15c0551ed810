import { describe, expect, it, vi } from "vitest";
import { ValidationError } from "../tasks/errors";
import { GENERIC_ERROR_MESSAGE, SessionStore, replyError } from "./context";
import { mainMenu } from "./menu";

function fakeContext() {
  return { from: { id: 7 }, reply: vi.fn(async () => undefined) };
}

describe("replyError", () => {
  it("shows a validation message and keeps the conversation", async () => {
    const ctx = fakeContext();
    const sessions = new SessionStore();
    sessions.set(7, { kind: "create", state: { step: "text" } });

    await replyError(ctx, { sessions }, new ValidationError("Reminder text cannot be empty."));

    expect(ctx.reply).toHaveBeenCalledWith("Reminder text cannot be empty.");
    expect(sessions.get(7)).toEqual({ kind: "create", state: { step: "text" } });
  });

  it("ends the conversation on an unexpected error and brings back the menu", async () => {
    const ctx = fakeContext();
    const sessions = new SessionStore();
    sessions.set(7, { kind: "batch", items: null });

    await replyError(ctx, { sessions }, new Error("socket hang up"));

    expect(ctx.reply).toHaveBeenCalledWith(GENERIC_ERROR_MESSAGE, { reply_markup: mainMenu() });
    expect(sessions.get(7)).toBeUndefined();
  });
});
