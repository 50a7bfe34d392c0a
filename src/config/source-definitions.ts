// ---------------------------------------------------------------------------
// Source definitions loader.
// Reads the sources YAML file, validates it with Zod, and returns typed
// SourceDefinition[] objects in file order.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import { SourceName } from "../core/types.js";
import type { SourceDefinition } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const SourceDefinitionSchema = z.object({
  name: z.nativeEnum(SourceName),
  enabled: z.boolean().default(true),
  baseUrl: z.string().url(),
  lookupUrls: z.array(z.string().url()).default([]),
  apiKeyEnvVar: z
    .string()
    .regex(/^[A-Z_][A-Z0-9_]*$/)
    .optional(),
});

export const SourcesFileSchema = z.object({
  sources: z.array(SourceDefinitionSchema).min(1),
});

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse and validate the YAML text of a sources file.
 *
 * Throws {@link ConfigurationError} on malformed YAML, schema violations or
 * a source listed twice.
 */
export function parseSourceDefinitions(text: string, origin = "sources file"): SourceDefinition[] {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new ConfigurationError(`${origin} is not valid YAML`, { cause: err });
  }

  const result = SourcesFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`${origin} failed validation: ${issues.join("; ")}`, {
      cause: result.error,
    });
  }

  const seen = new Set<SourceName>();
  const definitions: SourceDefinition[] = [];
  for (const source of result.data.sources) {
    if (seen.has(source.name)) {
      throw new ConfigurationError(`${origin} defines "${source.name}" more than once`);
    }
    seen.add(source.name);
    definitions.push({
      name: source.name,
      enabled: source.enabled,
      baseUrl: source.baseUrl,
      lookupUrls: source.lookupUrls,
      apiKeyEnvVar: source.apiKeyEnvVar,
    });
  }
  return definitions;
}

/** Read and validate a sources file; relative paths resolve against cwd. */
export function loadSourceDefinitions(file: string): SourceDefinition[] {
  const absolute = path.resolve(file);
  if (!fs.existsSync(absolute)) {
    throw new ConfigurationError(`Sources file does not exist: ${absolute}`);
  }
  return parseSourceDefinitions(fs.readFileSync(absolute, "utf-8"), path.basename(absolute));
}

/** Look up the API key a definition names, or `null` when unset. */
export function resolveApiKey(
  definition: SourceDefinition,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (!definition.apiKeyEnvVar) return null;
  const value = env[definition.apiKeyEnvVar];
  return value && value.length > 0 ? value : null;
}
