/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the models the analysis pipeline can call.
 * The provider is derived from the model name (see server/llm/client.ts),
 * so any model listed here can be passed as `model` to an analysis request.
 *
 * MODEL TIERS:
 *
 * GEMINI FLASH - default for meeting analysis
 *   Large context window, cheap enough to run once per recorded meeting.
 *
 * GEMINI PRO - weekly reports
 *   A week of transcripts needs the longer reasoning budget.
 *
 * OPENAI / CLAUDE - alternative providers, chosen per request.
 */

export const LLM_MODELS = {
  FAST_CLASSIFICATION: "gpt-4o-mini",
  STANDARD_REASONING: "gpt-4o",
} as const;

export const GEMINI_MODELS = {
  /**
   * Fast Gemini model, 1M token context window.
   * Default for individual meeting analysis.
   */
  FLASH: "gemini-2.0-flash",

  /**
   * Stronger reasoning for multi-meeting reports.
   */
  PRO: "gemini-2.5-pro",
} as const;

export const CLAUDE_MODELS = {
  SONNET: "claude-3-7-sonnet-latest",
} as const;

/**
 * Model assignments by analysis task.
 * DEFAULT_MODEL in the environment overrides MEETING_ANALYSIS, which also
 * serves aggregated analyses and daily reports.
 */
export const MODEL_ASSIGNMENTS = {
  MEETING_ANALYSIS: GEMINI_MODELS.FLASH,
  WEEKLY_REPORT: GEMINI_MODELS.PRO,
} as const;

/**
 * Output token limits by model
 */
export const TOKEN_LIMITS: Record<string, number> = {
  [LLM_MODELS.FAST_CLASSIFICATION]: 4000,
  [LLM_MODELS.STANDARD_REASONING]: 8000,
  [GEMINI_MODELS.FLASH]: 8192,
  [GEMINI_MODELS.PRO]: 16384,
  [CLAUDE_MODELS.SONNET]: 8192,
};
