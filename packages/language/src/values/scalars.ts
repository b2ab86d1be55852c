// Scalar literal checks: booleans, 64-bit integers, absolute URLs

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function isValidBool(value: string): boolean {
  const lower = value.toLowerCase();
  return lower === "true" || lower === "false";
}

export function isValidInt64(value: string): boolean {
  if (!/^[+-]?\d+$/.test(value)) return false;
  const parsed = BigInt(value.startsWith("+") ? value.slice(1) : value);
  return parsed >= INT64_MIN && parsed <= INT64_MAX;
}

export function isAbsoluteUrl(value: string): boolean {
  try {
    return new URL(value).protocol.length > 1;
  } catch {
    return false;
  }
}
