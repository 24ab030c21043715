/**
 * Runtime settings read from the environment.
 *
 * Parsed once with zod so a bad value fails at startup rather than on the
 * first request. Tests call loadSettings() with their own env object.
 */

import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { MODEL_ASSIGNMENTS } from "./models";
import { ANALYSIS_CONSTANTS, BATCH_CONSTANTS, TIMEOUT_CONSTANTS } from "./constants";

const CONFIG_DIR = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_TEMPLATES_PATH = path.join(CONFIG_DIR, "prompt_templates.json");
export const DEFAULT_ALIASES_PATH = path.join(CONFIG_DIR, "name_aliases.json");

const settingsSchema = z.object({
  DEFAULT_MODEL: z.string().min(1).default(MODEL_ASSIGNMENTS.MEETING_ANALYSIS),
  DEFAULT_TEMPLATE: z.string().min(1).default(ANALYSIS_CONSTANTS.DEFAULT_TEMPLATE),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(TIMEOUT_CONSTANTS.MODEL_CALL_TIMEOUT_MS),
  ANALYSIS_BATCH_SIZE: z.coerce.number().int().min(1).max(50).default(BATCH_CONSTANTS.DEFAULT_BATCH_SIZE),
  PROMPT_TEMPLATES_PATH: z.string().min(1).default(DEFAULT_TEMPLATES_PATH),
  NAME_ALIASES_PATH: z.string().min(1).default(DEFAULT_ALIASES_PATH),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().url().optional(),
});

export type Settings = {
  defaultModel: string;
  defaultTemplate: string;
  modelTimeoutMs: number;
  batchSize: number;
  templatesPath: string;
  aliasesPath: string;
  port: number;
  databaseUrl: string | undefined;
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`[Settings] ${fromZodError(parsed.error).message}`);
  }
  const values = parsed.data;
  return {
    defaultModel: values.DEFAULT_MODEL,
    defaultTemplate: values.DEFAULT_TEMPLATE,
    modelTimeoutMs: values.MODEL_TIMEOUT_MS,
    batchSize: values.ANALYSIS_BATCH_SIZE,
    templatesPath: values.PROMPT_TEMPLATES_PATH,
    aliasesPath: values.NAME_ALIASES_PATH,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
  };
}
