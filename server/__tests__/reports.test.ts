import { describe, it, expect, vi } from "vitest";
import type { InsertRecording } from "@shared/schema";
import { TemplateRegistry } from "../analysis/prompts/registry";
import {
  buildDailyReport,
  buildWeeklyReport,
  dailyWindow,
  defaultReportDate,
  parseReportDate,
  weeklyWindow,
  type ReportDeps,
} from "../analysis/reports";
import { MemStorage } from "../storage";
import { createNameNormalizer } from "../transcript/participants";
import { ValidationError } from "../utils/errorHandler";

const registry = TemplateRegistry.fromDefinition({
  templates: {
    daily_report: {
      "1.0": { content: "Daily report for {date}: {participants}", is_latest: true, scope: "aggregate" },
    },
    weekly_report: {
      "1.0": { content: "Weekly report ending {date}, {meeting_count} meetings", is_latest: true, scope: "aggregate" },
    },
  },
});

function recording(id: string, date: string, transcript = "[00:00:01] Kim: status update"): InsertRecording {
  return { document: { _id: id, title: `Meeting ${id}`, date, transcript } };
}

async function setup(generate: ReportDeps["generate"]): Promise<ReportDeps> {
  const storage = new MemStorage();
  await storage.createRecording(recording("mon", "2025-03-10T09:00:00"));
  await storage.createRecording(recording("thu", "2025-03-13T10:00:00"));
  await storage.createRecording(recording("fri-am", "2025-03-14T09:30:00", "[00:00:01] Lee: morning"));
  await storage.createRecording(recording("fri-pm", "2025-03-14T16:00:00"));
  await storage.createRecording(recording("old", "2025-03-07T12:00:00"));
  return {
    registry,
    normalizer: createNameNormalizer(),
    generate,
    defaultModel: "test-model",
    storage,
  };
}

describe("report windows", () => {
  it("covers one calendar day", () => {
    const window = dailyWindow("2025-03-14");
    expect(window.from).toEqual(new Date(2025, 2, 14, 0, 0, 0, 0));
    expect(window.to).toEqual(new Date(2025, 2, 14, 23, 59, 59, 999));
  });

  it("covers the seven days ending on the report date", () => {
    const window = weeklyWindow("2025-03-14");
    expect(window.from).toEqual(new Date(2025, 2, 8, 0, 0, 0, 0));
    expect(window.to).toEqual(new Date(2025, 2, 14, 23, 59, 59, 999));
  });

  it("defaults to the previous day", () => {
    expect(defaultReportDate(new Date(2025, 2, 15, 8, 0))).toBe("2025-03-14");
  });

  it("rejects malformed dates", () => {
    expect(() => parseReportDate("2025/03/14")).toThrow(ValidationError);
    expect(() => parseReportDate("2025-02-30")).toThrow('Report date must be YYYY-MM-DD (got "2025-02-30")');
  });
});

describe("buildDailyReport", () => {
  it("analyzes the day's meetings and stores the report", async () => {
    const generate = vi.fn(async (_prompt: string, _model: string) => "daily summary");
    const deps = await setup(generate);

    const report = await buildDailyReport("2025-03-14", deps);

    expect(report).toMatchObject({
      status: "success",
      scope: "daily",
      reportDate: "2025-03-14",
      meetingIds: ["fri-am", "fri-pm"],
      templateUsed: "daily_report",
      totalStatements: 2,
    });

    const prompt = generate.mock.calls[0][0];
    expect(prompt).toContain("Daily report for 2025-03-14: Lee, Kim");
    expect(prompt.endsWith("**Additional instructions:**\nReport date: 2025-03-14")).toBe(true);

    const stored = await deps.storage.listAnalysisResults("fri-am");
    expect(stored).toHaveLength(1);
    expect(stored[0]).toMatchObject({ scope: "daily", reportDate: "2025-03-14", meetingIds: ["fri-am", "fri-pm"] });
  });

  it("passes custom instructions after the report date", async () => {
    const generate = vi.fn(async (_prompt: string, _model: string) => "ok");
    const deps = await setup(generate);

    await buildDailyReport("2025-03-14", deps, { customInstructions: "Highlight blockers." });

    expect(generate.mock.calls[0][0].endsWith("Report date: 2025-03-14\nHighlight blockers.")).toBe(true);
  });

  it("returns null when no meetings were recorded", async () => {
    const generate = vi.fn(async (_prompt: string, _model: string) => "ok");
    const deps = await setup(generate);

    expect(await buildDailyReport("2025-03-12", deps)).toBeNull();
    expect(generate).not.toHaveBeenCalled();
  });

  it("rejects malformed report dates", async () => {
    const generate = vi.fn(async (_prompt: string, _model: string) => "ok");
    const deps = await setup(generate);

    await expect(buildDailyReport("March 14", deps)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("buildWeeklyReport", () => {
  it("includes the whole week", async () => {
    const generate = vi.fn(async (_prompt: string, _model: string) => "weekly summary");
    const deps = await setup(generate);

    const report = await buildWeeklyReport("2025-03-14", deps);

    expect(report?.scope).toBe("weekly");
    expect(report?.modelUsed).toBe("gemini-2.5-pro");
    expect(report?.meetingIds).toEqual(["mon", "thu", "fri-am", "fri-pm"]);
    expect(generate.mock.calls[0][0]).toContain("Weekly report ending 2025-03-14, 4 meetings");
  });

  it("includes every meeting in a busy week", async () => {
    const generate = vi.fn(async (_prompt: string, _model: string) => "weekly summary");
    const deps = await setup(generate);
    for (let i = 0; i < 60; i++) {
      const minute = String(i).padStart(2, "0");
      await deps.storage.createRecording(recording(`busy-${i}`, `2025-03-12T11:${minute}:00`));
    }

    const report = await buildWeeklyReport("2025-03-14", deps);

    expect(report?.meetingIds).toHaveLength(64);
    expect(generate.mock.calls[0][0]).toContain("Weekly report ending 2025-03-14, 64 meetings");
  });
});
