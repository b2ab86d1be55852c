/**
 * Per-node outcome used for fault containment: a failure while analyzing one node is
 * captured here instead of unwinding the traversal. Cancellation is never captured.
 */

import { CancellationError } from "./cancellation.js";

export type NodeResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

export function runContained<T>(fn: () => T): NodeResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (CancellationError.isCancellationError(error)) throw error;
    return { ok: false, error };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
