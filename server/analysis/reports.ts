/**
 * Daily and weekly reports.
 *
 * Fetches the meetings recorded in a date window, analyses them together
 * with the report template, and stores the result. The window is computed
 * here for the storage query only; inside the prompt the report date is just
 * an anchor, like any meeting date.
 */

import { endOfDay, format, isValid, parseISO, startOfDay, subDays } from "date-fns";
import type { AggregateAnalysisResult } from "@shared/schema";
import { ANALYSIS_CONSTANTS } from "../config/constants";
import { MODEL_ASSIGNMENTS } from "../config/models";
import type { IStorage } from "../storage";
import { ValidationError } from "../utils/errorHandler";
import { logInfo } from "../utils/logger";
import { analyzeAggregatedMeetings, type AnalysisDeps } from "./pipeline";

export type ReportDeps = AnalysisDeps & {
  storage: IStorage;
};

export type ReportOptions = {
  version?: string;
  model?: string;
  customInstructions?: string;
};

export type ReportWindow = {
  reportDate: string;
  from: Date;
  to: Date;
};

const REPORT_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export function parseReportDate(value: string): Date {
  const parsed = parseISO(value);
  if (!REPORT_DATE_RE.test(value) || !isValid(parsed)) {
    throw new ValidationError(`Report date must be YYYY-MM-DD (got "${value}")`);
  }
  return parsed;
}

/**
 * Report date for scheduled runs: the day before `now`.
 */
export function defaultReportDate(now: Date = new Date()): string {
  return format(subDays(now, 1), "yyyy-MM-dd");
}

export function dailyWindow(reportDate: string): ReportWindow {
  const day = parseReportDate(reportDate);
  return { reportDate, from: startOfDay(day), to: endOfDay(day) };
}

/**
 * The seven days ending on (and including) reportDate.
 */
export function weeklyWindow(reportDate: string): ReportWindow {
  const end = parseReportDate(reportDate);
  const start = subDays(end, ANALYSIS_CONSTANTS.WEEKLY_REPORT_DAYS - 1);
  return { reportDate, from: startOfDay(start), to: endOfDay(end) };
}

async function buildReport(
  window: ReportWindow,
  scope: "daily" | "weekly",
  templateName: string,
  deps: ReportDeps,
  options: ReportOptions,
): Promise<AggregateAnalysisResult | null> {
  const meetings = await deps.storage.listMeetings({ from: window.from, to: window.to, limit: null });
  if (meetings.length === 0) {
    logInfo(`[Reports] No meetings for ${scope} report ${window.reportDate}`);
    return null;
  }

  const instructions = [`Report date: ${window.reportDate}`, options.customInstructions?.trim()]
    .filter((line): line is string => Boolean(line))
    .join("\n");

  const result = await analyzeAggregatedMeetings(meetings, deps, {
    templateName,
    version: options.version,
    model: options.model,
    customInstructions: instructions,
    scope,
    reportDate: window.reportDate,
  });

  await deps.storage.saveAnalysisResult(result);
  logInfo(`[Reports] ${scope} report ${window.reportDate}: ${result.status}`, {
    meetingCount: meetings.length,
    template: result.templateUsed,
    templateVersion: result.templateVersion,
  });
  return result;
}

export async function buildDailyReport(
  reportDate: string,
  deps: ReportDeps,
  options: ReportOptions = {},
): Promise<AggregateAnalysisResult | null> {
  return buildReport(dailyWindow(reportDate), "daily", ANALYSIS_CONSTANTS.DAILY_REPORT_TEMPLATE, deps, options);
}

export async function buildWeeklyReport(
  reportDate: string,
  deps: ReportDeps,
  options: ReportOptions = {},
): Promise<AggregateAnalysisResult | null> {
  return buildReport(weeklyWindow(reportDate), "weekly", ANALYSIS_CONSTANTS.WEEKLY_REPORT_TEMPLATE, deps, {
    ...options,
    model: options.model ?? MODEL_ASSIGNMENTS.WEEKLY_REPORT,
  });
}
