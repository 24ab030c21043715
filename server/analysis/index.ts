/**
 * Analysis Module
 *
 * Wires the registry, name normalizer, model client and storage from
 * runtime settings. Routes and scripts build their dependencies here;
 * tests build them by hand.
 */

import { loadSettings, type Settings } from "../config/settings";
import { createGenerate } from "../llm/client";
import { storage as defaultStorage, type IStorage } from "../storage";
import { loadNameNormalizer } from "../transcript/participants";
import { loadTemplateRegistry } from "./prompts/registry";
import type { ReportDeps } from "./reports";

export * from "./pipeline";
export * from "./reports";

export function createAnalysisDeps(settings: Settings = loadSettings(), storage: IStorage = defaultStorage): ReportDeps {
  return {
    registry: loadTemplateRegistry(settings.templatesPath),
    normalizer: loadNameNormalizer(settings.aliasesPath),
    generate: createGenerate({ timeoutMs: settings.modelTimeoutMs }),
    defaultModel: settings.defaultModel,
    defaultTemplate: settings.defaultTemplate,
    batchSize: settings.batchSize,
    storage,
  };
}
