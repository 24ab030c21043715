/**
 * Application Constants
 *
 * Centralized configuration values used across the analysis pipeline.
 * Values that operators may need to change per deployment live in
 * settings.ts and are read from the environment instead.
 */

/**
 * Transcript parsing
 */
export const TRANSCRIPT_CONSTANTS = {
  /**
   * Bucket for statements whose speaker label is empty once cleaned.
   */
  UNKNOWN_SPEAKER: "Unknown",

  /**
   * Transcripts shorter than this (trimmed characters) are reported as
   * "too short" when they yield no statements.
   */
  MIN_PARSEABLE_LENGTH: 10,
} as const;

/**
 * Analysis pipeline
 */
export const ANALYSIS_CONSTANTS = {
  DEFAULT_TEMPLATE: "default",
  AGGREGATED_TEMPLATE: "comprehensive_review",
  DAILY_REPORT_TEMPLATE: "daily_report",
  WEEKLY_REPORT_TEMPLATE: "weekly_report",

  /**
   * templateUsed recorded for a caller-supplied prompt.
   */
  CUSTOM_TEMPLATE_NAME: "custom",

  /**
   * Custom prompts shorter than this are rejected as incomplete.
   */
  MIN_CUSTOM_PROMPT_LENGTH: 50,

  /**
   * Placeholder substituted when the meeting date is unknown.
   */
  UNKNOWN_DATE: "N/A",

  WEEKLY_REPORT_DAYS: 7,
} as const;

/**
 * Batch processing
 */
export const BATCH_CONSTANTS = {
  /**
   * Meetings analysed concurrently within one batch.
   */
  DEFAULT_BATCH_SIZE: 5,

  MAX_BATCH_MEETINGS: 100,
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Model call timeout for one meeting (milliseconds).
   */
  MODEL_CALL_TIMEOUT_MS: 180000, // 3 minutes
} as const;

/**
 * Storage queries
 */
export const STORAGE_CONSTANTS = {
  DEFAULT_MEETING_LIMIT: 50,
  MAX_MEETING_LIMIT: 500,
} as const;
