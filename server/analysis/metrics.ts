import type { AggregatedParticipantStats, ParticipantStats, ParticipantSummary } from "@shared/schema";
import { countStatements, countWords } from "./statistics";

/**
 * speakCount / totalStatements * 100. Zero statements gives 0, not NaN.
 */
export function participationRate(speakCount: number, totalStatements: number): number {
  if (totalStatements <= 0) return 0;
  return (speakCount / totalStatements) * 100;
}

export function wordShare(words: number, totalWords: number): number {
  if (totalWords <= 0) return 0;
  return (words / totalWords) * 100;
}

export function averageStatementsPerMeeting(stats: AggregatedParticipantStats): number {
  if (stats.meetingsAttended <= 0) return 0;
  return stats.speakCount / stats.meetingsAttended;
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function isAggregated(stats: ParticipantStats): stats is AggregatedParticipantStats {
  return "meetingsAttended" in stats;
}

/**
 * One row per participant, most statements first (ties by name).
 * Single-meeting statistics count as one meeting attended.
 */
export function summarizeParticipants(stats: Record<string, ParticipantStats>): ParticipantSummary[] {
  const totalStatements = countStatements(stats);
  const totalWords = countWords(stats);

  return Object.entries(stats)
    .map(([name, entry]): ParticipantSummary => {
      const meetingsAttended = isAggregated(entry) ? entry.meetingsAttended : entry.speakCount > 0 ? 1 : 0;
      return {
        name,
        speakCount: entry.speakCount,
        totalWords: entry.totalWords,
        meetingsAttended,
        participationRate: roundTo(participationRate(entry.speakCount, totalStatements), 1),
        wordShare: roundTo(wordShare(entry.totalWords, totalWords), 1),
        averageStatementsPerMeeting: roundTo(averageStatementsPerMeeting({ ...entry, meetingsAttended }), 1),
      };
    })
    .sort((a, b) => b.speakCount - a.speakCount || a.name.localeCompare(b.name));
}
