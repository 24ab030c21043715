import { describe, it, expect } from "vitest";
import type { ParticipantStats } from "@shared/schema";
import { extractJsonObject, readStructuredReport, reconcileParticipants } from "../analysis/structuredOutput";

const stats: Record<string, ParticipantStats> = {
  Kim: { speakCount: 2, totalWords: 5, timestamps: [], statements: [] },
  Lee: { speakCount: 1, totalWords: 1, timestamps: [], statements: [] },
};

describe("extractJsonObject", () => {
  it("reads fenced JSON", () => {
    expect(extractJsonObject('Here you go:\n```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it("reads the outermost object from surrounding text", () => {
    expect(extractJsonObject('Result: {"a": {"b": 2}} done')).toEqual({ a: { b: 2 } });
  });

  it("returns null when there is no object", () => {
    expect(extractJsonObject("[1, 2]")).toBeNull();
    expect(extractJsonObject("no json here")).toBeNull();
    expect(extractJsonObject("")).toBeNull();
  });
});

describe("reconcileParticipants", () => {
  it("overwrites counts and drops unknown or duplicate names", () => {
    const reported = [
      { name: " Kim ", speak_count: 99, role: "lead" },
      { name: "Ghost" },
      { name: "Kim", role: "duplicate" },
      { name: "Lee", word_count: 0 },
      "not an object",
    ];

    expect(reconcileParticipants(reported, stats)).toEqual([
      { name: "Kim", role: "lead", speak_count: 2, word_count: 5, speaking_percentage: 83.3 },
      { name: "Lee", speak_count: 1, word_count: 1, speaking_percentage: 16.7 },
    ]);
  });

  it("ignores names that only exist on the object prototype", () => {
    const reported = [{ name: "constructor" }, { name: "toString" }, { name: "Kim" }];

    expect(reconcileParticipants(reported, stats)).toEqual([
      { name: "Kim", speak_count: 2, word_count: 5, speaking_percentage: 83.3 },
    ]);
  });

  it("returns an empty list for non-arrays", () => {
    expect(reconcileParticipants({ name: "Kim" }, stats)).toEqual([]);
  });
});

describe("readStructuredReport", () => {
  it("accepts participants_analysis as the participant list", () => {
    const report = readStructuredReport(
      '{"summary": {"overview": "ok"}, "participants_analysis": [{"name": "Lee"}]}',
      stats,
    );

    expect(report).toEqual({
      summary: { overview: "ok" },
      participants: [{ name: "Lee", speak_count: 1, word_count: 1, speaking_percentage: 16.7 }],
    });
  });

  it("returns undefined for replies without data", () => {
    expect(readStructuredReport('{"summary": {"topics": []}}', stats)).toBeUndefined();
    expect(readStructuredReport("plain text answer", stats)).toBeUndefined();
  });
});
