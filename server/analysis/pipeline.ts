/**
 * Meeting analysis pipeline.
 *
 * Purpose:
 * parse -> attribute speakers -> statistics -> resolve template -> assemble
 * prompt -> model call -> AnalysisResult, for one meeting, a batch of
 * meetings, or several meetings analysed together.
 *
 * Failure policy:
 * - template/version/custom-prompt problems throw: the request itself is wrong
 * - anything that fails after that (model errors, timeouts) becomes a result
 *   with status "error" for that meeting only; a batch never rejects
 *
 * Layer: Analysis (orchestration)
 */

import { parseISO } from "date-fns";
import type {
  AggregateAnalysisResult,
  AnalysisOutcome,
  AnalysisResult,
  MeetingRecord,
  ParticipantStats,
  Statement,
  StructuredReport,
} from "@shared/schema";
import { ANALYSIS_CONSTANTS, BATCH_CONSTANTS } from "../config/constants";
import type { GenerateFn } from "../llm/client";
import { parseTranscript, describeParseFailure } from "../transcript/parser";
import { attributeStatements, type NameNormalizer } from "../transcript/participants";
import { classifyAnalysisError, ValidationError } from "../utils/errorHandler";
import { AnalysisLogger } from "../utils/logger";
import { summarizeParticipants } from "./metrics";
import { assemblePrompt, formatMeetingSection, formatMeetingTranscript, toAnchorDate, type PromptRequest } from "./prompts/assembler";
import type { TemplateFormat, TemplateRegistry } from "./prompts/registry";
import { aggregateParticipantStats, computeParticipantStats, countStatements } from "./statistics";
import { readStructuredReport } from "./structuredOutput";

export type AnalysisDeps = {
  registry: TemplateRegistry;
  normalizer: NameNormalizer;
  generate: GenerateFn;
  defaultModel: string;
  defaultTemplate?: string;
  batchSize?: number;
  now?: () => Date;
};

export type AnalysisOptions = {
  templateName?: string;
  version?: string;
  model?: string;
  customInstructions?: string;
  /** Replaces the template body entirely; recorded as template "custom", version null. */
  customPrompt?: string;
};

export type AggregateOptions = AnalysisOptions & {
  scope?: AggregateAnalysisResult["scope"];
  /** Anchor date for the prompt; defaults to the earliest meeting's date. */
  reportDate?: string;
};

type SelectedTemplate = {
  name: string;
  version: string | null;
  content: string;
  format: TemplateFormat;
};

type PreparedMeeting = {
  record: MeetingRecord;
  statements: Statement[];
  stats: Record<string, ParticipantStats>;
  participants: string[];
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function nowIso(deps: AnalysisDeps): string {
  return (deps.now ? deps.now() : new Date()).toISOString();
}

export function selectTemplate(deps: AnalysisDeps, options: AnalysisOptions, fallbackTemplate: string): SelectedTemplate {
  if (options.customPrompt !== undefined) {
    const content = options.customPrompt.trim();
    if (content.length < ANALYSIS_CONSTANTS.MIN_CUSTOM_PROMPT_LENGTH) {
      throw new ValidationError(
        `Custom prompt must be at least ${ANALYSIS_CONSTANTS.MIN_CUSTOM_PROMPT_LENGTH} characters (got ${content.length})`,
      );
    }
    return { name: ANALYSIS_CONSTANTS.CUSTOM_TEMPLATE_NAME, version: null, content, format: "text" };
  }

  const resolved = deps.registry.resolve(options.templateName ?? fallbackTemplate, options.version);
  return {
    name: resolved.name,
    version: resolved.version,
    content: resolved.content,
    format: resolved.format,
  };
}

/**
 * Parses and attributes one meeting. Declared participants who never speak
 * are listed after the speakers.
 */
export function prepareMeeting(record: MeetingRecord, normalizer: NameNormalizer): PreparedMeeting {
  const { statements: raw } = parseTranscript(record.transcript);
  const statements = attributeStatements(raw, normalizer);
  const stats = computeParticipantStats(statements);

  const participants = Object.keys(stats);
  for (const declared of record.participants ?? []) {
    const name = normalizer.normalize(declared);
    if (name && !participants.includes(name)) {
      participants.push(name);
    }
  }

  return { record, statements, stats, participants };
}

function byMeetingDate(a: MeetingRecord, b: MeetingRecord): number {
  const left = a.date ? parseISO(a.date).getTime() : Number.NaN;
  const right = b.date ? parseISO(b.date).getTime() : Number.NaN;
  if (Number.isNaN(left) && Number.isNaN(right)) return 0;
  if (Number.isNaN(left)) return 1;
  if (Number.isNaN(right)) return -1;
  return left - right;
}

async function callModel(
  prompt: string,
  model: string,
  template: SelectedTemplate,
  stats: Record<string, ParticipantStats>,
  deps: AnalysisDeps,
  logger: AnalysisLogger,
): Promise<AnalysisOutcome> {
  try {
    logger.startStage("model");
    const text = await deps.generate(prompt, model);
    logger.debug("Model call finished", { stageMs: logger.endStage("model"), chars: text.length });

    let structuredAnalysis: StructuredReport | undefined;
    if (template.format === "json") {
      structuredAnalysis = readStructuredReport(text, stats);
      if (!structuredAnalysis) {
        logger.warn("JSON template returned no readable JSON; keeping raw text");
      }
    }
    return structuredAnalysis
      ? { status: "success", analysis: text, structuredAnalysis }
      : { status: "success", analysis: text };
  } catch (error) {
    const classified = classifyAnalysisError(error);
    logger.error("Analysis failed", error, { errorKind: classified.kind });
    return { status: "error", error: classified.errorMessage, errorKind: classified.kind };
  }
}

async function runMeeting(
  record: MeetingRecord,
  template: SelectedTemplate,
  deps: AnalysisDeps,
  options: AnalysisOptions,
  logger: AnalysisLogger,
): Promise<AnalysisResult> {
  const model = options.model ?? deps.defaultModel;
  const meetingLogger = logger.child({ meetingId: record.id, template: template.name, templateVersion: template.version, model });

  let prepared: PreparedMeeting;
  try {
    prepared = prepareMeeting(record, deps.normalizer);
  } catch (error) {
    const classified = classifyAnalysisError(error);
    meetingLogger.error("Transcript preparation failed", error);
    const failed: AnalysisResult = {
      status: "error",
      error: classified.errorMessage,
      errorKind: classified.kind,
      meetingId: record.id,
      title: record.title,
      meetingDate: record.date,
      participantStats: {},
      totalStatements: 0,
      templateUsed: template.name,
      templateVersion: template.version,
      modelUsed: model,
      timestamp: nowIso(deps),
    };
    return deepFreeze(failed);
  }

  const totalStatements = countStatements(prepared.stats);
  if (totalStatements === 0) {
    meetingLogger.warn("No statements parsed", { reason: describeParseFailure(record.transcript) });
  }

  const request: PromptRequest = {
    templateName: template.name,
    requestedVersion: template.version ?? undefined,
    meetingDate: record.date,
    title: record.title,
    participants: prepared.participants,
    statistics: prepared.stats,
    transcript: formatMeetingTranscript(record, prepared.statements, prepared.stats),
    meetingCount: 1,
    customInstructions: options.customInstructions,
  };
  const prompt = assemblePrompt(template, request);

  const outcome = await callModel(prompt, model, template, prepared.stats, deps, meetingLogger);
  meetingLogger.info(`Meeting analysis ${outcome.status}`, { totalStatements });

  const result: AnalysisResult = {
    ...outcome,
    meetingId: record.id,
    title: record.title,
    meetingDate: record.date,
    participantStats: prepared.stats,
    totalStatements,
    templateUsed: template.name,
    templateVersion: template.version,
    modelUsed: model,
    timestamp: nowIso(deps),
  };
  return deepFreeze(result);
}

export async function analyzeMeeting(
  record: MeetingRecord,
  deps: AnalysisDeps,
  options: AnalysisOptions = {},
): Promise<AnalysisResult> {
  const template = selectTemplate(deps, options, deps.defaultTemplate ?? ANALYSIS_CONSTANTS.DEFAULT_TEMPLATE);
  const logger = new AnalysisLogger({ template: template.name, templateVersion: template.version });
  return runMeeting(record, template, deps, options, logger);
}

/**
 * Analyses meetings independently, batchSize at a time. Results line up with
 * the input order; a failing meeting yields an error result in its slot.
 */
export async function analyzeMeetings(
  records: readonly MeetingRecord[],
  deps: AnalysisDeps,
  options: AnalysisOptions = {},
): Promise<AnalysisResult[]> {
  const template = selectTemplate(deps, options, deps.defaultTemplate ?? ANALYSIS_CONSTANTS.DEFAULT_TEMPLATE);
  const batchSize = Math.max(1, deps.batchSize ?? BATCH_CONSTANTS.DEFAULT_BATCH_SIZE);
  const logger = new AnalysisLogger({ template: template.name, templateVersion: template.version });
  logger.info(`Analyzing ${records.length} meetings`, { batchSize });

  const results: AnalysisResult[] = [];
  for (let i = 0; i < records.length; i += batchSize) {
    const batch = records.slice(i, i + batchSize);
    const batchResults = await Promise.all(
      batch.map((record) => runMeeting(record, template, deps, options, logger)),
    );
    results.push(...batchResults);
  }

  const failed = results.filter((r) => r.status === "error").length;
  logger.info(`Batch finished: ${results.length - failed} succeeded, ${failed} failed`);
  return results;
}

/**
 * Analyses several meetings in one prompt, ordered by date (undated last),
 * with statistics merged across them.
 */
export async function analyzeAggregatedMeetings(
  records: readonly MeetingRecord[],
  deps: AnalysisDeps,
  options: AggregateOptions = {},
): Promise<AggregateAnalysisResult> {
  if (records.length === 0) {
    throw new ValidationError("No meetings to analyze");
  }

  const template = selectTemplate(deps, options, ANALYSIS_CONSTANTS.AGGREGATED_TEMPLATE);
  const model = options.model ?? deps.defaultModel;
  const logger = new AnalysisLogger({ template: template.name, templateVersion: template.version, model });

  const ordered = [...records].sort(byMeetingDate);
  const prepared = ordered.map((record) => prepareMeeting(record, deps.normalizer));
  const stats = aggregateParticipantStats(prepared.map((p) => p.stats));

  const participants = Object.keys(stats);
  for (const meeting of prepared) {
    for (const name of meeting.participants) {
      if (!participants.includes(name)) participants.push(name);
    }
  }

  const anchorDates = ordered
    .map((record) => toAnchorDate(record.date))
    .filter((date): date is string => date !== null);
  const dateRange = anchorDates.length > 0
    ? { start: anchorDates[0], end: anchorDates[anchorDates.length - 1] }
    : null;

  const request: PromptRequest = {
    templateName: template.name,
    requestedVersion: template.version ?? undefined,
    meetingDate: options.reportDate ?? dateRange?.start ?? null,
    participants,
    statistics: stats,
    transcript: prepared.map((p) => formatMeetingSection(p.record, p.statements)).join("\n\n"),
    meetingCount: ordered.length,
    customInstructions: options.customInstructions,
  };

  logger.info(`Aggregated analysis of ${ordered.length} meetings`);
  const outcome = await callModel(assemblePrompt(template, request), model, template, stats, deps, logger);

  const result: AggregateAnalysisResult = {
    ...outcome,
    scope: options.scope ?? "aggregate",
    meetingIds: ordered.map((r) => r.id),
    meetingTitles: ordered.map((r) => r.title),
    dateRange,
    reportDate: options.reportDate ?? null,
    participantStats: stats,
    participantSummary: summarizeParticipants(stats),
    totalStatements: countStatements(stats),
    templateUsed: template.name,
    templateVersion: template.version,
    modelUsed: model,
    timestamp: nowIso(deps),
  };
  return deepFreeze(result);
}
