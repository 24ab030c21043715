/**
 * Transcript statement parser.
 *
 * Responsibilities:
 * - Split raw transcript text into ordered, attributed statements
 * - Keep the raw speaker label exactly as written (normalization happens later)
 * - Route unattributable lines to the preamble or to the skipped count
 *
 * This file MUST NOT:
 * - Resolve aliases or clean speaker names
 * - Compute statistics
 *
 * Recognized markers:
 *   [00:01:23] Kim: text      [01:23] Kim: text
 *   00:01:23 Kim: text        01:23 Kim: text
 *   00:01:23                  (timestamp alone opens a block; the
 *   Kim: text                  "Speaker: text" lines below it share it)
 *
 * Layer: Ingestion (deterministic, pure)
 */

import type { Statement } from "@shared/schema";
import { TRANSCRIPT_CONSTANTS } from "../config/constants";

const TIMESTAMP = String.raw`\d{2}:\d{2}(?::\d{2})?`;

const BRACKETED_MARKER_RE = new RegExp(String.raw`^\[(${TIMESTAMP})\]\s*([^:]+):\s*(.*)$`);
const INLINE_MARKER_RE = new RegExp(String.raw`^(${TIMESTAMP})\s+([^:]+):\s*(.*)$`);
const BARE_TIMESTAMP_RE = new RegExp(String.raw`^(${TIMESTAMP})$`);
// Only honoured inside a timestamp block. The label may not start with a digit
// and the colon must be followed by whitespace, so URLs and clock times stay text.
const BLOCK_SPEAKER_RE = /^([^:\d\s][^:]{0,59}):(?:\s+(.*))?$/;

// Recording-tool notices that look like speaker lines
const SYSTEM_SPEAKER_PATTERNS: RegExp[] = [
  /^Transcription\s+ended/i,
  /^Session\s+ended/i,
  /Meeting\s+ended\s+after/i,
  /^Recording\s+(started|stopped)/i,
  /^This\s+editable\s+transcript/i,
  /^You\s+should\s+review/i,
  /^Please\s+provide\s+feedback/i,
  /^Get\s+tips/i,
  /^\*/,
  /^\d{2}:\d{2}(:\d{2})?$/,
  /^\d+$/,
  /^Attachments\b/i,
  /'s\s+Presentation$/i,
  /^\uFEFF/,
];

// Notices that also appear on a line of their own, outside any marker
const STANDALONE_NOTICE_PATTERNS: RegExp[] = [
  /^Transcription\s+ended/i,
  /^Session\s+ended/i,
  /Meeting\s+ended\s+after/i,
  /^Recording\s+(started|stopped)/i,
  /^This\s+editable\s+transcript/i,
  /^You\s+should\s+review/i,
  /^Get\s+tips/i,
];

export type ParseEvent =
  | { kind: "statement"; statement: Statement }
  | { kind: "preamble"; line: string }
  | { kind: "skipped"; line: string };

export type ParsedTranscript = {
  statements: Statement[];
  preamble: string[];
  skippedLines: number;
};

type LineMarker = {
  timestamp: string;
  speaker: string;
  text: string;
  opensInline: boolean;
};

type OpenStatement = {
  timestamp: string | null;
  speaker: string;
  parts: string[];
};

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function isSystemSpeaker(label: string): boolean {
  const trimmed = label.trim();
  return SYSTEM_SPEAKER_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export function isStandaloneNotice(line: string): boolean {
  const trimmed = line.trim();
  return STANDALONE_NOTICE_PATTERNS.some((pattern) => pattern.test(trimmed));
}

export function normalizeLineEndings(raw: string): string {
  return raw.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

function matchLineMarker(line: string, blockTimestamp: string | null): LineMarker | null {
  const inline = BRACKETED_MARKER_RE.exec(line) ?? INLINE_MARKER_RE.exec(line);
  if (inline) {
    return {
      timestamp: inline[1],
      speaker: inline[2].trim(),
      text: inline[3].trim(),
      opensInline: true,
    };
  }

  if (blockTimestamp !== null) {
    const speakerLine = BLOCK_SPEAKER_RE.exec(line);
    if (speakerLine) {
      return {
        timestamp: blockTimestamp,
        speaker: speakerLine[1].trim(),
        text: (speakerLine[2] ?? "").trim(),
        opensInline: false,
      };
    }
  }

  return null;
}

function closeStatement(open: OpenStatement): Statement {
  const text = open.parts.join(" ").trim();
  return {
    timestamp: open.timestamp,
    speaker: open.speaker,
    text,
    wordCount: countWords(text),
  };
}

/**
 * Lazily yields parse events in transcript order. Each call starts from a
 * fresh state, so iterating twice over the same input gives the same events.
 *
 * A statement is yielded once the next marker (or the end of input) shows
 * that no more continuation lines follow it.
 */
export function* readTranscript(raw: string): Generator<ParseEvent, void, undefined> {
  const lines = normalizeLineEndings(raw).split("\n");

  let open: OpenStatement | null = null;
  let blockTimestamp: string | null = null;
  let skipping = false;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    const marker = matchLineMarker(line, blockTimestamp);
    if (marker) {
      if (open) {
        yield { kind: "statement", statement: closeStatement(open) };
        open = null;
      }
      if (marker.opensInline) {
        blockTimestamp = null;
      }
      if (marker.speaker && isSystemSpeaker(marker.speaker)) {
        skipping = true;
        yield { kind: "skipped", line };
        continue;
      }
      skipping = false;
      open = {
        timestamp: marker.timestamp,
        speaker: marker.speaker,
        parts: marker.text ? [marker.text] : [],
      };
      continue;
    }

    const bare = BARE_TIMESTAMP_RE.exec(line);
    if (bare) {
      blockTimestamp = bare[1];
      continue;
    }

    if (isStandaloneNotice(line)) {
      if (open) {
        yield { kind: "statement", statement: closeStatement(open) };
        open = null;
      }
      skipping = true;
      yield { kind: "skipped", line };
      continue;
    }

    if (skipping) {
      yield { kind: "skipped", line };
      continue;
    }

    if (open) {
      open.parts.push(line);
      continue;
    }

    yield { kind: "preamble", line };
  }

  if (open) {
    yield { kind: "statement", statement: closeStatement(open) };
  }
}

export function parseTranscript(raw: string): ParsedTranscript {
  const result: ParsedTranscript = { statements: [], preamble: [], skippedLines: 0 };

  for (const event of readTranscript(raw)) {
    switch (event.kind) {
      case "statement":
        result.statements.push(event.statement);
        break;
      case "preamble":
        result.preamble.push(event.line);
        break;
      case "skipped":
        result.skippedLines++;
        break;
      default: {
        const _exhaustive: never = event;
        throw new Error(`[Parser] Unhandled event: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  return result;
}

/**
 * Explains why a transcript produced no statements, or null when it did.
 */
export function describeParseFailure(raw: string): string | null {
  const trimmed = normalizeLineEndings(raw).trim();
  if (!trimmed) {
    return "Transcript is empty";
  }

  const parsed = parseTranscript(trimmed);
  if (parsed.statements.length > 0) {
    return null;
  }
  if (trimmed.length < TRANSCRIPT_CONSTANTS.MIN_PARSEABLE_LENGTH) {
    return `Transcript is too short (${trimmed.length} characters)`;
  }
  if (parsed.skippedLines > 0 && parsed.preamble.length === 0) {
    return "Transcript only contains recording notices";
  }
  return 'No speaker markers found (expected "[HH:MM:SS] Speaker: text" or "HH:MM:SS Speaker: text")';
}
