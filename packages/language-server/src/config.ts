/**
 * Server configuration.
 *
 * Read from `initializationOptions` on initialize and from the `msbuild` section of
 * `workspace/didChangeConfiguration` settings. Invalid settings fall back to the
 * defaults and are reported as issues for the log.
 */
import { z } from "zod";

export const serverConfigSchema = z.object({
  diagnostics: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),
  analyzers: z
    .object({
      /** Analyzer ids to skip. */
      disabled: z.array(z.string()).default([]),
    })
    .default({}),
  /** Extra schema files, absolute or relative to the workspace root. */
  schemas: z.array(z.string()).default([]),
  imports: z
    .object({
      enabled: z.boolean().default(true),
      maxDepth: z.number().int().min(0).default(8),
    })
    .default({}),
});

export type MsBuildServerConfig = z.infer<typeof serverConfigSchema>;

export const DEFAULT_CONFIG: MsBuildServerConfig = serverConfigSchema.parse({});

export interface ConfigParseResult {
  config: MsBuildServerConfig;
  issues: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse raw settings. Accepts either the section itself or an object holding it
 * under `msbuild`; null and undefined yield the defaults.
 */
export function parseServerConfig(raw: unknown): ConfigParseResult {
  if (raw === null || raw === undefined) return { config: DEFAULT_CONFIG, issues: [] };
  const section = isRecord(raw) && "msbuild" in raw ? raw["msbuild"] : raw;
  const parsed = serverConfigSchema.safeParse(section ?? {});
  if (parsed.success) return { config: parsed.data, issues: [] };
  return {
    config: DEFAULT_CONFIG,
    issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
  };
}
