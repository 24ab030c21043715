/**
 * Meeting record adapters.
 *
 * Stored documents arrive in one of two shapes:
 * - canonical: { _id | id, title, date, participants?, transcript }
 * - drive:     { id, name, createdTime, content }  (Google Drive export)
 *
 * detectMeetingDocument() tags the shape once at the ingestion boundary;
 * toMeetingRecord() converts either variant into the MeetingRecord the
 * pipeline works with. Nothing downstream looks at raw field names.
 */

import { isValid, parseISO } from "date-fns";
import {
  canonicalMeetingDocumentSchema,
  driveMeetingDocumentSchema,
  type CanonicalMeetingDocument,
  type DriveMeetingDocument,
  type MeetingRecord,
} from "@shared/schema";
import { ValidationError } from "../utils/errorHandler";
import { normalizeLineEndings } from "./parser";

export type MeetingDocument =
  | { schema: "canonical"; document: CanonicalMeetingDocument }
  | { schema: "drive"; document: DriveMeetingDocument };

// Drive exports use the English or the Korean section heading
const TRANSCRIPT_MARKERS: RegExp[] = [
  /📖\s*스크립트/,
  /📖\s*Transcript/i,
  /^\s*스크립트\s*$/,
  /^\s*Transcript\s*$/i,
  /Transcript/i,
];
const DATE_LINE_PATTERNS: RegExp[] = [
  /^[A-Z][a-z]{2}\s+\d{1,2},\s+\d{4}$/, // Nov 17, 2025
  /^\d{4}년\s+\d{1,2}월\s+\d{1,2}일$/, // 2025년 7월 9일
];
const TITLE_LINE_RE = /\s-\s*(?:Transcript|스크립트)$/i;

export function detectMeetingDocument(input: unknown): MeetingDocument {
  const canonical = canonicalMeetingDocumentSchema.safeParse(input);
  if (canonical.success) {
    return { schema: "canonical", document: canonical.data };
  }

  const drive = driveMeetingDocumentSchema.safeParse(input);
  if (drive.success) {
    return { schema: "drive", document: drive.data };
  }

  throw new ValidationError(
    "Meeting document matches neither the canonical schema ({ title, transcript }) " +
    "nor the Drive export schema ({ id, name, content })",
  );
}

/**
 * Keeps an ISO 8601 meeting date exactly as written (so the calendar day is
 * the one the recorder saw) and returns null for anything unreadable, so an
 * unknown date is never guessed.
 */
export function normalizeMeetingDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  return isValid(parseISO(trimmed)) ? trimmed : null;
}

/**
 * Cuts a Drive export down to its transcript section: everything after the
 * transcript marker, minus the date line and the "<title> - Transcript" line
 * that follow it. Content without a marker is returned unchanged.
 */
export function extractTranscriptSection(content: string): string {
  const lines = normalizeLineEndings(content).split("\n");

  for (const marker of TRANSCRIPT_MARKERS) {
    const markerIndex = lines.findIndex((line) => marker.test(line));
    if (markerIndex === -1) continue;

    let start = markerIndex + 1;
    if (start < lines.length && DATE_LINE_PATTERNS.some((pattern) => pattern.test(lines[start].trim()))) {
      start++;
    }
    if (start < lines.length && TITLE_LINE_RE.test(lines[start].trim())) {
      start++;
    }
    return lines.slice(start).join("\n").trim();
  }

  return content.trim();
}

export function toMeetingRecord(input: MeetingDocument, fallbackId: string): MeetingRecord {
  switch (input.schema) {
    case "canonical": {
      const doc = input.document;
      const id = doc._id ?? doc.id ?? fallbackId;
      return {
        id: String(id),
        title: doc.title,
        date: normalizeMeetingDate(doc.date),
        ...(doc.participants && { participants: doc.participants }),
        transcript: doc.transcript,
      };
    }
    case "drive": {
      const doc = input.document;
      return {
        id: doc.id,
        title: doc.name.replace(TITLE_LINE_RE, "").trim() || doc.name,
        date: normalizeMeetingDate(doc.createdTime),
        transcript: extractTranscriptSection(doc.content),
      };
    }
    default: {
      const _exhaustive: never = input;
      throw new Error(`[Records] Unhandled document schema: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function adaptMeetingDocument(input: unknown, fallbackId: string): MeetingRecord {
  return toMeetingRecord(detectMeetingDocument(input), fallbackId);
}
