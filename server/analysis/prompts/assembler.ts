/**
 * Prompt Assembler
 *
 * Turns a resolved template plus per-request data into the final prompt.
 * Template bodies are treated as opaque text: only the known placeholders
 * below are replaced, in a single pass, so JSON examples and other braces in
 * a template survive untouched.
 *
 *   {date}                 meeting date as YYYY-MM-DD, or N/A
 *   {participants}         comma-separated canonical names
 *   {statistics}           one line per participant
 *   {meetings_data}        the transcript block
 *   {meeting_count}        number of meetings covered
 *   {custom_instructions}  caller-supplied instructions, or empty
 *
 * The meeting date is only ever copied in. Turning "next Friday" into a
 * calendar date is left to the model, which the templates instruct to do
 * against this anchor.
 */

import { formatISO, isValid, parseISO } from "date-fns";
import type { ParticipantStats, Statement } from "@shared/schema";
import { ANALYSIS_CONSTANTS } from "../../config/constants";
import { summarizeParticipants } from "../metrics";
import { countStatements } from "../statistics";
import type { ResolvedTemplate } from "./registry";

export type PromptRequest = {
  templateName: string;
  requestedVersion?: string;
  meetingDate: string | Date | null;
  title?: string;
  participants: readonly string[];
  statistics: Record<string, ParticipantStats>;
  transcript: string;
  meetingCount?: number;
  customInstructions?: string;
};

const PLACEHOLDER_RE = /\{(date|participants|statistics|meetings_data|meeting_count|custom_instructions)\}/g;
const ISO_DATE_PREFIX_RE = /^(\d{4}-\d{2}-\d{2})/;

const MEETING_HEADER =
  "The following is a meeting transcript with per-participant speaking statistics. " +
  "Base every statement on the transcript; when something is not stated, leave it out instead of guessing.";

/**
 * Calendar date of a meeting in YYYY-MM-DD, or null when it is unknown.
 * Strings keep the day they were written with; no time zone shifting.
 */
export function toAnchorDate(value: string | Date | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return isValid(value) ? formatISO(value, { representation: "date" }) : null;
  }
  const match = ISO_DATE_PREFIX_RE.exec(value.trim());
  if (!match) return null;
  return isValid(parseISO(match[1])) ? match[1] : null;
}

export function formatParticipantList(participants: readonly string[]): string {
  return participants.length > 0 ? participants.join(", ") : "(none)";
}

export function formatConversation(statements: readonly Statement[]): string {
  if (statements.length === 0) {
    return "(no statements)";
  }
  return statements
    .map((s) => (s.timestamp ? `[${s.timestamp}] ${s.speaker}: ${s.text}` : `${s.speaker}: ${s.text}`))
    .join("\n");
}

function formatActiveRange(timestamps: readonly (string | null)[]): string {
  const known = timestamps.filter((ts): ts is string => ts !== null);
  if (known.length === 0) return "N/A";
  return `${known[0]} ~ ${known[known.length - 1]}`;
}

/**
 * One line per participant, most statements first. Percentages come from
 * metrics.ts and are shown with one decimal.
 */
export function formatStatistics(stats: Record<string, ParticipantStats>): string {
  const summary = summarizeParticipants(stats);
  if (summary.length === 0) {
    return "(no participants)";
  }
  return summary
    .map((row) => {
      const entry = stats[row.name];
      const parts = [
        `${row.speakCount} statements (${row.participationRate.toFixed(1)}%)`,
        `${row.totalWords} words (${row.wordShare.toFixed(1)}%)`,
        `active ${formatActiveRange(entry.timestamps)}`,
      ];
      if ("meetingsAttended" in entry) {
        parts.push(`${row.meetingsAttended} meetings`);
      }
      return `- ${row.name}: ${parts.join(", ")}`;
    })
    .join("\n");
}

/**
 * Transcript block for one meeting: info, statistics, then the conversation.
 */
export function formatMeetingTranscript(
  meeting: { title: string; date: string | null },
  statements: readonly Statement[],
  stats: Record<string, ParticipantStats>,
): string {
  return [
    "=== Meeting Info ===",
    `Title: ${meeting.title}`,
    `Date: ${toAnchorDate(meeting.date) ?? ANALYSIS_CONSTANTS.UNKNOWN_DATE}`,
    `Participants: ${formatParticipantList(Object.keys(stats))}`,
    `Statements: ${countStatements(stats)}`,
    "",
    "=== Participant Statistics ===",
    formatStatistics(stats),
    "",
    "=== Conversation ===",
    formatConversation(statements),
  ].join("\n");
}

export function formatMeetingSection(
  meeting: { title: string; date: string | null },
  statements: readonly Statement[],
): string {
  const date = toAnchorDate(meeting.date) ?? ANALYSIS_CONSTANTS.UNKNOWN_DATE;
  return `=== Meeting: ${meeting.title} (${date}) ===\n${formatConversation(statements)}`;
}

function substitutePlaceholders(content: string, request: PromptRequest, anchorDate: string | null): string {
  const values: Record<string, string> = {
    date: anchorDate ?? ANALYSIS_CONSTANTS.UNKNOWN_DATE,
    participants: formatParticipantList(request.participants),
    statistics: formatStatistics(request.statistics),
    meetings_data: request.transcript.trim(),
    meeting_count: String(request.meetingCount ?? 1),
    custom_instructions: request.customInstructions?.trim() ?? "",
  };
  return content.replace(PLACEHOLDER_RE, (_match, key: string) => values[key] ?? "");
}

function buildHeader(request: PromptRequest): string {
  const count = request.meetingCount ?? 1;
  if (count > 1) {
    return `The following are ${count} meeting transcripts with combined speaking statistics. ` +
      "Base every statement on the transcripts; when something is not stated, leave it out instead of guessing.";
  }
  return MEETING_HEADER;
}

/**
 * Layout:
 *   header
 *   transcript block        (skipped when the template places {meetings_data} itself)
 *   Participants / Meeting date
 *   ---
 *   template body
 *   Additional instructions (skipped when the template places {custom_instructions} itself)
 */
export function assemblePrompt(template: Pick<ResolvedTemplate, "content">, request: PromptRequest): string {
  const anchorDate = toAnchorDate(request.meetingDate);
  const body = substitutePlaceholders(template.content, request, anchorDate).trim();
  const sections: string[] = [buildHeader(request)];

  const transcript = request.transcript.trim();
  if (transcript && !template.content.includes("{meetings_data}")) {
    sections.push(transcript);
  }

  const contextLines = [`Participants: ${formatParticipantList(request.participants)}`];
  if (anchorDate) {
    contextLines.push(`Meeting date: ${anchorDate}`);
  }
  sections.push(contextLines.join("\n"));

  sections.push("---");
  sections.push(body);

  const instructions = request.customInstructions?.trim();
  if (instructions && !template.content.includes("{custom_instructions}")) {
    sections.push(`**Additional instructions:**\n${instructions}`);
  }

  return sections.join("\n\n");
}
