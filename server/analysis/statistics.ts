/**
 * Participant statistics.
 *
 * Raw counts only: statement count, word count, timestamps and statement
 * texts per canonical name. Percentages and averages are derived in
 * metrics.ts so the arithmetic lives in one place.
 *
 * Input statements must already carry canonical speaker names
 * (see attributeStatements in server/transcript/participants.ts).
 */

import type { AggregatedParticipantStats, ParticipantStats, Statement } from "@shared/schema";

export type ParticipantStatsMap = Record<string, ParticipantStats>;
export type AggregatedStatsMap = Record<string, AggregatedParticipantStats>;

function emptyStats(): ParticipantStats {
  return { speakCount: 0, totalWords: 0, timestamps: [], statements: [] };
}

export function computeParticipantStats(statements: readonly Statement[]): ParticipantStatsMap {
  const stats = new Map<string, ParticipantStats>();

  for (const statement of statements) {
    let entry = stats.get(statement.speaker);
    if (!entry) {
      entry = emptyStats();
      stats.set(statement.speaker, entry);
    }
    entry.speakCount++;
    entry.totalWords += statement.wordCount;
    entry.timestamps.push(statement.timestamp);
    entry.statements.push(statement.text);
  }

  return Object.fromEntries(stats);
}

/**
 * Merges per-meeting statistics. Sums and concatenations follow the order of
 * the input list; meetingsAttended counts meetings with at least one statement.
 */
export function aggregateParticipantStats(perMeeting: readonly ParticipantStatsMap[]): AggregatedStatsMap {
  const merged = new Map<string, AggregatedParticipantStats>();

  for (const meeting of perMeeting) {
    for (const [name, stats] of Object.entries(meeting)) {
      let entry = merged.get(name);
      if (!entry) {
        entry = { ...emptyStats(), meetingsAttended: 0 };
        merged.set(name, entry);
      }
      entry.speakCount += stats.speakCount;
      entry.totalWords += stats.totalWords;
      entry.timestamps.push(...stats.timestamps);
      entry.statements.push(...stats.statements);
      if (stats.speakCount > 0) {
        entry.meetingsAttended++;
      }
    }
  }

  return Object.fromEntries(merged);
}

export function countStatements(stats: Record<string, ParticipantStats>): number {
  let total = 0;
  for (const entry of Object.values(stats)) {
    total += entry.speakCount;
  }
  return total;
}

export function countWords(stats: Record<string, ParticipantStats>): number {
  let total = 0;
  for (const entry of Object.values(stats)) {
    total += entry.totalWords;
  }
  return total;
}
