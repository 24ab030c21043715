/**
 * Structured output for JSON-format templates.
 *
 * The model's reply is read as JSON (code fences stripped, otherwise the
 * outermost {...} taken). Participant counts the model reports are never
 * trusted: they are overwritten with the computed statistics, participants
 * the transcript never contained are dropped and duplicates collapse to the
 * first entry.
 */

import { z } from "zod";
import type { ParticipantStats, ReportParticipant, StructuredReport } from "@shared/schema";
import { countWords } from "./statistics";
import { roundTo, wordShare } from "./metrics";

const CODE_FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;

const reportParticipantSchema = z.object({ name: z.string().min(1) }).passthrough();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(candidate: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function extractJsonObject(text: string): Record<string, unknown> | null {
  const fenced = CODE_FENCE_RE.exec(text);
  const candidate = (fenced ? fenced[1] : text).trim();
  if (!candidate) return null;

  const direct = tryParseObject(candidate);
  if (direct) return direct;

  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return tryParseObject(candidate.slice(start, end + 1));
}

/**
 * Replaces model-reported counts with computed ones. speaking_percentage is
 * the participant's share of words, one decimal.
 */
export function reconcileParticipants(
  reported: unknown,
  stats: Record<string, ParticipantStats>,
): ReportParticipant[] {
  if (!Array.isArray(reported)) return [];

  const totalWords = countWords(stats);
  const seen = new Set<string>();
  const reconciled: ReportParticipant[] = [];

  for (const item of reported) {
    const parsed = reportParticipantSchema.safeParse(item);
    if (!parsed.success) continue;

    const name = parsed.data.name.trim();
    if (!Object.hasOwn(stats, name) || seen.has(name)) continue;
    const computed = stats[name];
    seen.add(name);

    reconciled.push({
      ...parsed.data,
      name,
      speak_count: computed.speakCount,
      word_count: computed.totalWords,
      speaking_percentage: roundTo(wordShare(computed.totalWords, totalWords), 1),
    });
  }

  return reconciled;
}

function hasContent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.values(value).some(hasContent);
  return true;
}

/**
 * Reads a JSON reply into a report, or returns undefined when the reply is
 * not JSON or carries no data. `participants_analysis` is accepted as an
 * older name for `participants`.
 */
export function readStructuredReport(
  text: string,
  stats: Record<string, ParticipantStats>,
): StructuredReport | undefined {
  const raw = extractJsonObject(text);
  if (!raw) return undefined;

  const { participants, participants_analysis, ...rest } = raw;
  const reported = participants ?? participants_analysis;

  const report: StructuredReport = { ...rest };
  if (reported !== undefined) {
    report.participants = reconcileParticipants(reported, stats);
  }

  return hasContent(report) ? report : undefined;
}
