/* =======================================================================================
 * Version literals
 * ---------------------------------------------------------------------------------------
 * - Version: 2 to 4 dot-separated non-negative 32-bit integers (`1.0`, `1.2.3.4`)
 * - NuGet version: 1 to 4 numeric parts with optional `-prerelease` and `+metadata`
 *   labels; floating forms (`1.*`, `1.0.0-*`, `*`) are accepted
 * - NuGet version range: a version (minimum, inclusive) or interval notation such as
 *   `[1.0,2.0)`, `(,1.0]`, `[1.0]`
 * ======================================================================================= */

const INT32_MAX = 2 ** 31 - 1;
const LABEL = "[0-9A-Za-z-]+(?:\\.[0-9A-Za-z-]+)*";
const NUGET_VERSION = new RegExp(`^\\d+(?:\\.\\d+){0,3}(?:-${LABEL})?(?:\\+${LABEL})?$`);
const NUGET_FLOATING = new RegExp(`^(?:\\*|\\d+(?:\\.\\d+){0,2}\\.\\*|\\d+(?:\\.\\d+){0,3}-(?:${LABEL}\\.)?\\*)$`);

/** Numeric components of a Version literal; null when malformed. */
export function parseVersion(value: string): number[] | null {
  const parts = value.split(".");
  if (parts.length < 2 || parts.length > 4) return null;
  const numbers: number[] = [];
  for (const part of parts) {
    if (!/^\d+$/.test(part)) return null;
    const n = Number(part);
    if (n > INT32_MAX) return null;
    numbers.push(n);
  }
  return numbers;
}

export function isValidNuGetVersion(value: string): boolean {
  return NUGET_VERSION.test(value);
}

export function isValidNuGetVersionRange(value: string): boolean {
  const text = value.trim();
  if (text.length === 0) return false;

  const open = text[0];
  if (open !== "[" && open !== "(") {
    return isValidNuGetVersion(text) || NUGET_FLOATING.test(text);
  }

  const close = text[text.length - 1];
  if (text.length < 2 || (close !== "]" && close !== ")")) return false;
  const body = text.slice(1, -1);
  const parts = body.split(",").map((part) => part.trim());

  if (parts.length === 1) {
    // exact version: only `[x]` is meaningful
    const [only = ""] = parts;
    return open === "[" && close === "]" && isValidNuGetVersion(only);
  }
  if (parts.length !== 2) return false;

  const [min = "", max = ""] = parts;
  if (min.length === 0 && max.length === 0) return false;
  if (min.length > 0 && !isValidNuGetVersion(min)) return false;
  if (max.length > 0 && !isValidNuGetVersion(max)) return false;
  return true;
}
