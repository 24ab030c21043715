/**
 * Template Registry
 *
 * Named prompt templates, each with one or more numbered versions, exactly
 * one of which is flagged latest. Loaded once at startup, frozen, and passed
 * to whatever needs it; there is no mutation API.
 *
 * Resolution rules:
 * - unknown name                    -> TemplateNotFoundError
 * - explicit version that is absent -> VersionNotFoundError (never the latest instead)
 * - no version, or "latest"         -> the flagged version
 *
 * File format (server/config/prompt_templates.json):
 *   { "templates": { "<name>": { "<version>": { content, description, is_latest, format?, scope? } } } }
 */

import * as fs from "fs";
import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { ConfigurationError, TemplateNotFoundError, VersionNotFoundError } from "../../utils/errorHandler";

export const LATEST_VERSION = "latest";

const VERSION_RE = /^\d+(\.\d+)*$/;

const templateVersionSchema = z.object({
  content: z.string().min(1, "content is required"),
  description: z.string().default(""),
  is_latest: z.boolean().default(false),
  format: z.enum(["text", "json"]).default("text"),
  scope: z.enum(["meeting", "aggregate"]).default("meeting"),
  created_at: z.string().optional(),
  author: z.string().optional(),
});

const templateFileSchema = z.object({
  templates: z.record(
    z.string().min(1),
    z.record(z.string().regex(VERSION_RE, "version keys must look like 1.0 or 2.1.3"), templateVersionSchema),
  ),
});

export type TemplateFormat = "text" | "json";
export type TemplateScope = "meeting" | "aggregate";

export type TemplateVersion = Readonly<{
  content: string;
  description: string;
  isLatest: boolean;
  format: TemplateFormat;
  scope: TemplateScope;
  createdAt?: string;
  author?: string;
}>;

export type ResolvedTemplate = Readonly<{
  name: string;
  version: string;
  content: string;
  description: string;
  format: TemplateFormat;
  scope: TemplateScope;
}>;

export type TemplateSummary = {
  name: string;
  latestVersion: string;
  description: string;
  format: TemplateFormat;
  scope: TemplateScope;
  versions: string[];
};

export function compareVersions(a: string, b: string): number {
  const left = a.split(".").map(Number);
  const right = b.split(".").map(Number);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export class TemplateRegistry {
  private readonly templates: ReadonlyMap<string, ReadonlyMap<string, TemplateVersion>>;
  private readonly latest: ReadonlyMap<string, string>;

  private constructor(
    templates: Map<string, Map<string, TemplateVersion>>,
    latest: Map<string, string>,
  ) {
    this.templates = templates;
    this.latest = latest;
    Object.freeze(this);
  }

  /**
   * Validates a parsed template file. Rejects any template that does not
   * flag exactly one version as latest.
   */
  static fromDefinition(definition: unknown, source = "template definition"): TemplateRegistry {
    const parsed = templateFileSchema.safeParse(definition);
    if (!parsed.success) {
      throw new ConfigurationError(source, fromZodError(parsed.error).message);
    }

    const templates = new Map<string, Map<string, TemplateVersion>>();
    const latest = new Map<string, string>();

    for (const [name, versions] of Object.entries(parsed.data.templates)) {
      const versionKeys = Object.keys(versions).sort(compareVersions);
      if (versionKeys.length === 0) {
        throw new ConfigurationError(source, `template "${name}" has no versions`);
      }

      const flagged = versionKeys.filter((key) => versions[key].is_latest);
      if (flagged.length !== 1) {
        const detail = flagged.length === 0 ? "none" : flagged.join(", ");
        throw new ConfigurationError(
          source,
          `template "${name}" must flag exactly one version with is_latest (flagged: ${detail})`,
        );
      }

      const entries = new Map<string, TemplateVersion>();
      for (const key of versionKeys) {
        const raw = versions[key];
        entries.set(key, Object.freeze({
          content: raw.content,
          description: raw.description,
          isLatest: raw.is_latest,
          format: raw.format,
          scope: raw.scope,
          ...(raw.created_at !== undefined && { createdAt: raw.created_at }),
          ...(raw.author !== undefined && { author: raw.author }),
        }));
      }

      templates.set(name, entries);
      latest.set(name, flagged[0]);
    }

    return new TemplateRegistry(templates, latest);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  resolve(name: string, version?: string): ResolvedTemplate {
    const versions = this.templates.get(name);
    if (!versions) {
      throw new TemplateNotFoundError(name, this.templateNames());
    }

    const requested = version === undefined || version === LATEST_VERSION
      ? this.getLatestVersion(name)
      : version;

    const entry = versions.get(requested);
    if (!entry) {
      throw new VersionNotFoundError(name, requested, Array.from(versions.keys()));
    }

    return Object.freeze({
      name,
      version: requested,
      content: entry.content,
      description: entry.description,
      format: entry.format,
      scope: entry.scope,
    });
  }

  getLatestVersion(name: string): string {
    const version = this.latest.get(name);
    if (version === undefined) {
      throw new TemplateNotFoundError(name, this.templateNames());
    }
    return version;
  }

  /**
   * Version strings in ascending numeric order ("1.10" after "1.9").
   */
  listVersions(name: string): string[] {
    const versions = this.templates.get(name);
    if (!versions) {
      throw new TemplateNotFoundError(name, this.templateNames());
    }
    return Array.from(versions.keys());
  }

  getVersionInfo(name: string, version: string): TemplateVersion {
    const entry = this.templates.get(name)?.get(version);
    if (!entry) {
      if (!this.templates.has(name)) {
        throw new TemplateNotFoundError(name, this.templateNames());
      }
      throw new VersionNotFoundError(name, version, this.listVersions(name));
    }
    return entry;
  }

  listTemplates(): TemplateSummary[] {
    return this.templateNames().map((name) => {
      const latestVersion = this.getLatestVersion(name);
      const latestEntry = this.getVersionInfo(name, latestVersion);
      return {
        name,
        latestVersion,
        description: latestEntry.description,
        format: latestEntry.format,
        scope: latestEntry.scope,
        versions: this.listVersions(name),
      };
    });
  }

  private templateNames(): string[] {
    return Array.from(this.templates.keys()).sort();
  }
}

export function loadTemplateRegistry(filePath: string): TemplateRegistry {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filePath, `cannot read template file (${reason})`);
  }

  const registry = TemplateRegistry.fromDefinition(data, filePath);
  console.log(`[Templates] Loaded ${registry.listTemplates().length} templates from ${filePath}`);
  return registry;
}
