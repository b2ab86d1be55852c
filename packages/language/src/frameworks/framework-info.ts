/* =======================================================================================
 * Target frameworks
 * ---------------------------------------------------------------------------------------
 * Known framework identifiers, versions, profiles and target platforms (bundled JSON),
 * and validation of framework short names such as `net8.0-windows10.0.19041.0`,
 * `netstandard2.0`, `net472` or `net40-client`.
 * ======================================================================================= */

import { z } from "zod";
import frameworksJson from "../data/frameworks.json" with { type: "json" };

const frameworkSchema = z.object({
  identifier: z.string(),
  shortName: z.string(),
  versions: z.array(z.string()),
  profiles: z.record(z.string(), z.array(z.string())).default({}),
  platforms: z.boolean().default(false),
});

const platformSchema = z.object({
  name: z.string(),
  versions: z.array(z.string()),
});

const frameworksDocumentSchema = z.object({
  frameworks: z.array(frameworkSchema),
  platforms: z.array(platformSchema),
});

type FrameworksDocument = z.infer<typeof frameworksDocumentSchema>;
type FrameworkEntry = FrameworksDocument["frameworks"][number];

/** A framework the document targets, e.g. `.NETFramework` 4.7.2 with profile `Client`. */
export interface FrameworkReference {
  readonly identifier: string;
  readonly version: readonly number[];
  readonly profile: string | null;
}

export type FrameworkNameValidation =
  | { kind: "ok"; framework: FrameworkReference }
  | { kind: "malformed" }
  | { kind: "unknown-identifier"; identifier: string }
  | { kind: "unknown-version"; version: string }
  | { kind: "unknown-platform"; platform: string }
  | { kind: "unknown-profile"; profile: string }
  | { kind: "unknown-platform-version"; platform: string; platformVersion: string };

const SHORT_NAME = /^([a-z]+)([0-9][0-9.]*)?(?:-([a-z]+)([0-9][0-9.]*)?)?$/i;

/** The first major version of `net` that denotes the unified runtime rather than the desktop framework. */
const NET_CORE_UNIFIED_MAJOR = 5;

let data: FrameworksDocument | null = null;

function frameworks(): FrameworksDocument {
  data ??= frameworksDocumentSchema.parse(frameworksJson);
  return data;
}

// =============================================================================
// Versions
// =============================================================================

/**
 * Parse a framework version component: dotted (`4.7.2`, `8.0`) or compact (`472`,
 * where every digit is a component). Returns null when malformed.
 */
export function parseFrameworkVersion(text: string): number[] | null {
  if (text.length === 0) return null;
  if (text.includes(".")) {
    const parts = text.split(".");
    if (parts.some((part) => !/^\d+$/.test(part))) return null;
    return parts.map(Number);
  }
  if (!/^\d+$/.test(text)) return null;
  return [...text].map(Number);
}

/** Versions compare equal when they differ only by trailing zero components. */
export function areVersionsEquivalent(a: readonly number[], b: readonly number[]): boolean {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if ((a[i] ?? 0) !== (b[i] ?? 0)) return false;
  }
  return true;
}

export function formatFrameworkVersion(version: readonly number[]): string {
  return version.join(".");
}

// =============================================================================
// Lookups
// =============================================================================

function findByIdentifier(identifier: string): FrameworkEntry | null {
  const lower = identifier.toLowerCase();
  return frameworks().frameworks.find((f) => f.identifier.toLowerCase() === lower) ?? null;
}

export function isKnownFrameworkIdentifier(identifier: string): boolean {
  return findByIdentifier(identifier) !== null;
}

export function isKnownFrameworkVersion(identifier: string, version: readonly number[]): boolean {
  const framework = findByIdentifier(identifier);
  if (!framework) return false;
  return framework.versions.some((known) => {
    const parsed = parseFrameworkVersion(known);
    return parsed !== null && areVersionsEquivalent(parsed, version);
  });
}

export function isFrameworkProfileValid(identifier: string, version: readonly number[], profile: string): boolean {
  const framework = findByIdentifier(identifier);
  if (!framework) return false;
  const lower = profile.toLowerCase();
  for (const [versionText, profiles] of Object.entries(framework.profiles)) {
    const parsed = parseFrameworkVersion(versionText);
    if (parsed && areVersionsEquivalent(parsed, version)) {
      return profiles.some((p) => p.toLowerCase() === lower);
    }
  }
  return false;
}

/** Short name used in `TargetFramework` for a framework identifier, if known. */
export function getFrameworkShortName(identifier: string): string | null {
  return findByIdentifier(identifier)?.shortName ?? null;
}

// =============================================================================
// Short names
// =============================================================================

export function validateFrameworkShortName(value: string): FrameworkNameValidation {
  const match = SHORT_NAME.exec(value);
  if (!match) return { kind: "malformed" };
  const [, letters = "", versionText, suffix, suffixVersionText] = match;
  if (versionText === undefined) return { kind: "malformed" };

  const version = parseFrameworkVersion(versionText);
  if (!version) return { kind: "malformed" };

  const framework = resolveShortName(letters, version);
  if (!framework) return { kind: "unknown-identifier", identifier: letters };

  if (!isKnownFrameworkVersion(framework.identifier, version)) {
    return { kind: "unknown-version", version: versionText };
  }

  let profile: string | null = null;
  if (suffix !== undefined) {
    const usesPlatforms = framework.platforms && (version[0] ?? 0) >= NET_CORE_UNIFIED_MAJOR;
    if (usesPlatforms) {
      const platform = frameworks().platforms.find((p) => p.name.toLowerCase() === suffix.toLowerCase());
      if (!platform) return { kind: "unknown-platform", platform: suffix };
      if (suffixVersionText !== undefined) {
        const platformVersion = parseFrameworkVersion(suffixVersionText);
        if (!platformVersion) return { kind: "malformed" };
        const known = platform.versions.some((v) => {
          const parsed = parseFrameworkVersion(v);
          return parsed !== null && areVersionsEquivalent(parsed, platformVersion);
        });
        if (!known) {
          return { kind: "unknown-platform-version", platform: suffix, platformVersion: suffixVersionText };
        }
      }
    } else {
      profile = suffix + (suffixVersionText ?? "");
      if (!isFrameworkProfileValid(framework.identifier, version, profile)) {
        return { kind: "unknown-profile", profile };
      }
    }
  }

  return { kind: "ok", framework: { identifier: framework.identifier, version, profile } };
}

function resolveShortName(letters: string, version: readonly number[]): FrameworkEntry | null {
  const lower = letters.toLowerCase();
  if (lower === "net" && (version[0] ?? 0) >= NET_CORE_UNIFIED_MAJOR) {
    return findByIdentifier(".NETCoreApp");
  }
  return frameworks().frameworks.find((f) => f.shortName.toLowerCase() === lower) ?? null;
}
