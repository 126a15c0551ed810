import { isRecurrence, type Attachment, type Recurrence, type ReminderDraft } from "../tasks/schema";
import type { BatchItem } from "../tasks/service";
import { normalizeTimeOfDay } from "../tasks/time";

export const CANCEL_LABEL = "🔙 Cancel";
export const SKIP_LABEL = "Skip";
export const REMOVE_LABEL = "Remove attachment";

/**
 * Steps of the "add reminder" conversation, each carrying what was
 * collected so far.
 */
export type WizardState =
  | { step: "text" }
  | { step: "time"; text: string }
  | { step: "recurrence"; text: string; timeOfDay: string }
  | { step: "attachment"; text: string; timeOfDay: string; recurrence: Recurrence };

/**
 * What the user sent, independent of Telegram's message shapes.
 */
export type WizardInput =
  | { kind: "text"; text: string }
  | { kind: "recurrence"; recurrence: string }
  | { kind: "photo"; fileId: string; caption?: string }
  | { kind: "document"; fileId: string; fileName?: string; caption?: string };

export type WizardResult =
  | { type: "continue"; state: WizardState; prompt: string }
  | { type: "retry"; state: WizardState; error: string }
  | { type: "done"; draft: ReminderDraft }
  | { type: "cancelled" };

export const INITIAL_PROMPT = "Enter the reminder text:";

function isCancel(input: WizardInput): boolean {
  return input.kind === "text" && input.text.trim() === CANCEL_LABEL;
}

function onText(state: { step: "text" }, input: WizardInput): WizardResult {
  const text = input.kind === "text" ? input.text.trim() : "";
  if (!text) {
    return { type: "retry", state, error: "Please send the reminder text as a message." };
  }
  return {
    type: "continue",
    state: { step: "time", text },
    prompt: "Enter the time as HH:MM (for example 14:30):",
  };
}

function onTime(state: { step: "time"; text: string }, input: WizardInput): WizardResult {
  const timeOfDay = input.kind === "text" ? normalizeTimeOfDay(input.text) : null;
  if (!timeOfDay) {
    return {
      type: "retry",
      state,
      error: "Invalid time format. Please enter the time as HH:MM (for example 09:30):",
    };
  }
  return {
    type: "continue",
    state: { step: "recurrence", text: state.text, timeOfDay },
    prompt: "How often should it repeat?",
  };
}

function onRecurrence(
  state: { step: "recurrence"; text: string; timeOfDay: string },
  input: WizardInput,
): WizardResult {
  if (input.kind !== "recurrence" || !isRecurrence(input.recurrence)) {
    return { type: "retry", state, error: "Please pick one of the buttons above." };
  }
  return {
    type: "continue",
    state: { ...state, step: "attachment", recurrence: input.recurrence },
    prompt: `You can attach a comment (text, photo or file) or press '${SKIP_LABEL}'.`,
  };
}

function onAttachment(
  state: { step: "attachment"; text: string; timeOfDay: string; recurrence: Recurrence },
  input: WizardInput,
): WizardResult {
  const draft: ReminderDraft = {
    text: state.text,
    timeOfDay: state.timeOfDay,
    recurrence: state.recurrence,
  };

  if (input.kind === "recurrence") {
    return { type: "retry", state, error: "Send a comment or press Skip." };
  }
  if (input.kind === "text" && input.text.trim() === SKIP_LABEL) {
    return { type: "done", draft };
  }

  const attachment = toAttachment(input);
  if (!attachment) {
    return { type: "retry", state, error: "The comment cannot be empty." };
  }
  return { type: "done", draft: { ...draft, attachment } };
}

/**
 * Converts a message into an attachment, or null for an empty text.
 */
export function toAttachment(input: WizardInput): Attachment | null {
  switch (input.kind) {
    case "text": {
      const content = input.text.trim();
      return content ? { kind: "text", content } : null;
    }
    case "photo":
      return { kind: "photo", fileId: input.fileId, caption: input.caption };
    case "document":
      return {
        kind: "document",
        fileId: input.fileId,
        fileName: input.fileName,
        caption: input.caption,
      };
    case "recurrence":
      return null;
  }
}

/**
 * Feeds one user input into the conversation. Only a complete draft ever
 * leaves as `done`; invalid input keeps the current step.
 */
export function advanceWizard(state: WizardState, input: WizardInput): WizardResult {
  if (isCancel(input)) {
    return { type: "cancelled" };
  }

  switch (state.step) {
    case "text":
      return onText(state, input);
    case "time":
      return onTime(state, input);
    case "recurrence":
      return onRecurrence(state, input);
    case "attachment":
      return onAttachment(state, input);
  }
}

/**
 * Parses a batch message: one `HH:MM text` per line, blank lines ignored.
 */
export function parseBatchLines(message: string): { items: BatchItem[]; errors: string[] } {
  const items: BatchItem[] = [];
  const errors: string[] = [];

  for (const line of message.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    const match = trimmed.match(/^(\d{1,2}:\d{2})\s+(.+)$/);
    const timeOfDay = match ? normalizeTimeOfDay(match[1]) : null;
    if (!match || !timeOfDay) {
      errors.push(trimmed);
      continue;
    }
    items.push({ timeOfDay, text: match[2].trim() });
  }

  return { items, errors };
}
