/**
 * Participant name normalization.
 *
 * normalize(raw):
 *   1. remove balanced [...] and (...) groups at any depth
 *   2. collapse whitespace, trim
 *   3. exact, case-sensitive alias lookup
 *
 * normalize(normalize(x)) === normalize(x) holds because bracket removal is
 * itself idempotent and alias targets are checked to be fixed points when the
 * table is built.
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import type { MeetingRecord, Statement } from "@shared/schema";
import { ConfigurationError } from "../utils/errorHandler";
import { TRANSCRIPT_CONSTANTS } from "../config/constants";
import { parseTranscript } from "./parser";

export type NameAliases = Readonly<Record<string, string>>;

export interface NameNormalizer {
  normalize(raw: string): string;
  readonly aliases: NameAliases;
}

const CLOSER_TO_OPENER: Record<string, string> = { "]": "[", ")": "(" };

/**
 * Removes every balanced bracket group. A closer pairs with the nearest open
 * bracket of its own kind; brackets with no partner are left in place.
 */
export function stripBracketedSegments(raw: string): string {
  const stack: { char: string; index: number }[] = [];
  const removed = new Array<boolean>(raw.length).fill(false);

  for (let i = 0; i < raw.length; i++) {
    const char = raw[i];
    if (char === "[" || char === "(") {
      stack.push({ char, index: i });
      continue;
    }
    const opener = CLOSER_TO_OPENER[char];
    if (!opener) continue;

    let depth = stack.length - 1;
    while (depth >= 0 && stack[depth].char !== opener) {
      depth--;
    }
    if (depth < 0) continue;

    removed.fill(true, stack[depth].index, i + 1);
    stack.length = depth;
  }

  let result = "";
  for (let i = 0; i < raw.length; i++) {
    if (!removed[i]) result += raw[i];
  }
  return result;
}

export function cleanParticipantName(raw: string): string {
  return stripBracketedSegments(raw).replace(/\s+/g, " ").trim();
}

export function createNameNormalizer(aliases: Record<string, string> = {}, source = "name aliases"): NameNormalizer {
  const table = new Map<string, string>();

  for (const [alias, canonical] of Object.entries(aliases)) {
    const key = cleanParticipantName(alias);
    if (!key) {
      throw new ConfigurationError(source, `alias "${alias}" is empty once cleaned`);
    }
    if (cleanParticipantName(canonical) !== canonical || !canonical) {
      throw new ConfigurationError(source, `canonical name "${canonical}" for alias "${alias}" is not a clean name`);
    }
    const existing = table.get(key);
    if (existing !== undefined && existing !== canonical) {
      throw new ConfigurationError(source, `alias "${key}" maps to both "${existing}" and "${canonical}"`);
    }
    table.set(key, canonical);
  }

  for (const [alias, canonical] of table) {
    const next = table.get(canonical);
    if (next !== undefined && next !== canonical) {
      throw new ConfigurationError(
        source,
        `canonical name "${canonical}" (for "${alias}") is itself an alias of "${next}"`,
      );
    }
  }

  const frozen: NameAliases = Object.freeze(Object.fromEntries(table));

  return {
    aliases: frozen,
    normalize(raw: string): string {
      const cleaned = cleanParticipantName(raw);
      return table.get(cleaned) ?? cleaned;
    },
  };
}

const aliasFileSchema = z.object({
  aliases: z.record(z.string(), z.string()).default({}),
});

export function loadNameNormalizer(filePath: string): NameNormalizer {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filePath, `cannot read alias file (${reason})`);
  }

  const parsed = aliasFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(filePath, fromZodError(parsed.error).message);
  }

  const normalizer = createNameNormalizer(parsed.data.aliases, filePath);
  console.log(`[Participants] Loaded ${Object.keys(normalizer.aliases).length} name aliases from ${filePath}`);
  return normalizer;
}

/**
 * Replaces each raw speaker label with its canonical name. Labels that are
 * empty once cleaned (e.g. "[Guest]") go to the unknown-speaker bucket so
 * every statement stays attributed.
 */
export function attributeStatements(statements: readonly Statement[], normalizer: NameNormalizer): Statement[] {
  return statements.map((statement) => ({
    ...statement,
    speaker: normalizer.normalize(statement.speaker) || TRANSCRIPT_CONSTANTS.UNKNOWN_SPEAKER,
  }));
}

/**
 * Canonical names across meetings: declared participant lists plus everyone
 * who speaks in a transcript, sorted.
 */
export function collectParticipants(records: readonly MeetingRecord[], normalizer: NameNormalizer): string[] {
  const names = new Set<string>();

  for (const record of records) {
    for (const declared of record.participants ?? []) {
      const name = normalizer.normalize(declared);
      if (name) names.add(name);
    }
    for (const statement of parseTranscript(record.transcript).statements) {
      const name = normalizer.normalize(statement.speaker);
      if (name) names.add(name);
    }
  }

  return Array.from(names).sort((a, b) => a.localeCompare(b));
}
