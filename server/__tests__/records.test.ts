import { describe, it, expect } from "vitest";
import {
  adaptMeetingDocument,
  detectMeetingDocument,
  extractTranscriptSection,
  normalizeMeetingDate,
} from "../transcript/records";
import { ValidationError } from "../utils/errorHandler";

const driveContent = [
  "Sprint sync notes",
  "Attendees: Kim, Lee",
  "📖 Transcript",
  "Mar 14, 2025",
  "Sprint sync - Transcript",
  "[00:00:01] Kim: hi",
  "[00:00:04] Lee: hello",
  "",
].join("\n");

describe("detectMeetingDocument", () => {
  it("tags canonical documents", () => {
    const detected = detectMeetingDocument({ _id: 42, title: "Sync", transcript: "" });
    expect(detected.schema).toBe("canonical");
  });

  it("tags Drive exports", () => {
    const detected = detectMeetingDocument({ id: "d1", name: "Sync", content: "" });
    expect(detected.schema).toBe("drive");
  });

  it("rejects anything else", () => {
    expect(() => detectMeetingDocument({ title: "No transcript" })).toThrow(ValidationError);
    expect(() => detectMeetingDocument("text")).toThrow(ValidationError);
  });
});

describe("adaptMeetingDocument", () => {
  it("adapts canonical documents", () => {
    const record = adaptMeetingDocument(
      { _id: 42, title: "Sync", date: "2025-03-14T09:00:00Z", participants: ["Kim"], transcript: "[00:00:01] Kim: hi" },
      "fallback",
    );

    expect(record).toEqual({
      id: "42",
      title: "Sync",
      date: "2025-03-14T09:00:00Z",
      participants: ["Kim"],
      transcript: "[00:00:01] Kim: hi",
    });
  });

  it("uses the fallback id and a null date when they are missing", () => {
    const record = adaptMeetingDocument({ title: "Sync", date: "sometime", transcript: "" }, "fallback");

    expect(record.id).toBe("fallback");
    expect(record.date).toBeNull();
    expect(record).not.toHaveProperty("participants");
  });

  it("adapts Drive exports", () => {
    const record = adaptMeetingDocument(
      { id: "d1", name: "Sprint sync - Transcript", createdTime: "2025-03-14T09:00:00.000Z", content: driveContent },
      "fallback",
    );

    expect(record).toEqual({
      id: "d1",
      title: "Sprint sync",
      date: "2025-03-14T09:00:00.000Z",
      transcript: "[00:00:01] Kim: hi\n[00:00:04] Lee: hello",
    });
  });
});

describe("extractTranscriptSection", () => {
  it("accepts a plain Transcript heading", () => {
    expect(extractTranscriptSection("Header\nTranscript\n[00:00:01] Kim: hi")).toBe("[00:00:01] Kim: hi");
  });

  it("drops the Korean heading, date line and title line", () => {
    const content = "회의 메모\n📖 스크립트\n2025년 7월 9일\n주간 회의 - 스크립트\n[00:00:01] Kim: 안녕하세요";
    expect(extractTranscriptSection(content)).toBe("[00:00:01] Kim: 안녕하세요");
  });

  it("returns content without a marker unchanged", () => {
    expect(extractTranscriptSection("  [00:00:01] Kim: hi  ")).toBe("[00:00:01] Kim: hi");
  });
});

describe("normalizeMeetingDate", () => {
  it("keeps valid dates as written", () => {
    expect(normalizeMeetingDate(" 2025-03-14 ")).toBe("2025-03-14");
  });

  it("returns null for missing or unreadable dates", () => {
    expect(normalizeMeetingDate(undefined)).toBeNull();
    expect(normalizeMeetingDate(null)).toBeNull();
    expect(normalizeMeetingDate("next Friday")).toBeNull();
  });
});
