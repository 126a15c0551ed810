import { describe, expect, it } from "vitest";
import {
  buildReminderMessage,
  describeAttachment,
  formatReminderSummary,
  getRecurrenceLabel,
} from "./reminders";
import type { Reminder } from "./schema";

const reminder: Reminder = {
  jobId: "rem_1",
  ownerId: 1,
  text: "Stretch",
  timeOfDay: "16:45",
  recurrence: "mon_wed_fri",
  createdAtIso: "2024-01-01T07:00:00.000Z",
  updatedAtIso: "2024-01-01T07:00:00.000Z",
};

describe("reminder formatting", () => {
  it("labels recurrences", () => {
    expect(getRecurrenceLabel("once")).toBe("Once");
    expect(getRecurrenceLabel("weekdays")).toBe("Weekdays (Mon-Fri)");
    expect(getRecurrenceLabel("tue_thu")).toBe("Tue, Thu");
  });

  it("describes attachments", () => {
    expect(describeAttachment(undefined)).toBe("none");
    expect(describeAttachment({ kind: "text", content: "mat" })).toBe("text: mat");
    expect(describeAttachment({ kind: "photo", fileId: "p", caption: "pose" })).toBe("photo (pose)");
    expect(describeAttachment({ kind: "document", fileId: "d" })).toBe("document: untitled");
  });

  it("shows the delivery time in the owner's zone", () => {
    expect(buildReminderMessage(reminder, "Europe/Moscow", Date.parse("2024-01-01T13:45:00Z"))).toBe(
      "⏰ Reminder: Stretch\n🕒 Your time: 16:45 (Europe/Moscow)",
    );
  });

  it("summarises a reminder", () => {
    expect(formatReminderSummary(reminder, "Europe/Kyiv")).toBe(
      "📝 Text: Stretch\n" +
        "⏰ Time: 16:45 (Europe/Kyiv)\n" +
        "🔄 Repeat: Mon, Wed, Fri\n" +
        "💬 Attachment: none",
    );
  });
});
