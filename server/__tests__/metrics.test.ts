import { describe, it, expect } from "vitest";
import type { AggregatedParticipantStats, ParticipantStats } from "@shared/schema";
import {
  averageStatementsPerMeeting,
  participationRate,
  roundTo,
  summarizeParticipants,
  wordShare,
} from "../analysis/metrics";

function stats(speakCount: number, totalWords: number): ParticipantStats {
  return { speakCount, totalWords, timestamps: [], statements: [] };
}

function aggregated(speakCount: number, totalWords: number, meetingsAttended: number): AggregatedParticipantStats {
  return { ...stats(speakCount, totalWords), meetingsAttended };
}

describe("rates", () => {
  it("computes percentages", () => {
    expect(participationRate(1, 4)).toBe(25);
    expect(wordShare(30, 120)).toBe(25);
  });

  it("returns 0 when there is nothing to divide by", () => {
    expect(participationRate(0, 0)).toBe(0);
    expect(wordShare(5, 0)).toBe(0);
    expect(averageStatementsPerMeeting(aggregated(3, 10, 0))).toBe(0);
  });

  it("averages statements over meetings attended", () => {
    expect(averageStatementsPerMeeting(aggregated(3, 10, 2))).toBe(1.5);
  });

  it("rounds to the given digits", () => {
    expect(roundTo(66.6666, 1)).toBe(66.7);
    expect(roundTo(2.5, 0)).toBe(3);
  });
});

describe("summarizeParticipants", () => {
  it("summarizes a single meeting", () => {
    const summary = summarizeParticipants({ Kim: stats(2, 5), Lee: stats(1, 1) });

    expect(summary).toEqual([
      {
        name: "Kim",
        speakCount: 2,
        totalWords: 5,
        meetingsAttended: 1,
        participationRate: 66.7,
        wordShare: 83.3,
        averageStatementsPerMeeting: 2,
      },
      {
        name: "Lee",
        speakCount: 1,
        totalWords: 1,
        meetingsAttended: 1,
        participationRate: 33.3,
        wordShare: 16.7,
        averageStatementsPerMeeting: 1,
      },
    ]);
  });

  it("sorts aggregated participants by statements", () => {
    const summary = summarizeParticipants({
      Kim: aggregated(3, 9, 2),
      Lee: aggregated(1, 1, 1),
      Park: aggregated(2, 3, 1),
    });

    expect(summary.map(p => [p.name, p.participationRate, p.wordShare, p.averageStatementsPerMeeting])).toEqual([
      ["Kim", 50, 69.2, 1.5],
      ["Park", 33.3, 23.1, 2],
      ["Lee", 16.7, 7.7, 1],
    ]);
  });

  it("breaks ties by name", () => {
    const summary = summarizeParticipants({ Lee: stats(1, 1), Kim: stats(1, 1) });
    expect(summary.map(p => p.name)).toEqual(["Kim", "Lee"]);
  });

  it("returns an empty list for no participants", () => {
    expect(summarizeParticipants({})).toEqual([]);
  });
});
