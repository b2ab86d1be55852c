/**
 * GUID text formats:
 * - `N`: 32 hex digits
 * - `D`: hyphenated 8-4-4-4-12
 * - `B`: `D` in braces
 * - `P`: `D` in parentheses
 * - `X`: hex-prefixed fields, `{0x...,0x...,0x...,{0x..,...}}`
 */

const H = "[0-9a-fA-F]";
const D_BODY = `${H}{8}-${H}{4}-${H}{4}-${H}{4}-${H}{12}`;
const X_BYTE = `0[xX]${H}{1,2}`;

const GUID_FORMATS: Readonly<Record<GuidFormat, RegExp>> = {
  N: new RegExp(`^${H}{32}$`),
  D: new RegExp(`^${D_BODY}$`),
  B: new RegExp(`^\\{${D_BODY}\\}$`),
  P: new RegExp(`^\\(${D_BODY}\\)$`),
  X: new RegExp(
    `^\\{0[xX]${H}{1,8},0[xX]${H}{1,4},0[xX]${H}{1,4},\\{${X_BYTE}(?:,${X_BYTE}){7}\\}\\}$`,
  ),
};

export type GuidFormat = "N" | "D" | "B" | "P" | "X";

export function isGuidFormat(value: string): value is GuidFormat {
  return value === "N" || value === "D" || value === "B" || value === "P" || value === "X";
}

/** Accepts any of the supported formats. */
export function isValidGuid(value: string): boolean {
  return Object.values(GUID_FORMATS).some((pattern) => pattern.test(value));
}

export function matchesGuidFormat(value: string, format: GuidFormat): boolean {
  return GUID_FORMATS[format].test(value);
}
