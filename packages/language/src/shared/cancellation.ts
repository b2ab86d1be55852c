/**
 * Cooperative cancellation.
 *
 * Passes poll a token between element visits and unwind with a CancellationError,
 * which is the only exception allowed to escape per-node containment.
 */

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
}

export const NEVER_CANCELLED: CancellationToken = { isCancellationRequested: false };

export class CancellationError extends Error {
  constructor(message: string = "Analysis cancelled") {
    super(message);
    this.name = "CancellationError";
  }

  static isCancellationError(error: unknown): error is CancellationError {
    return (
      error instanceof CancellationError ||
      (error instanceof Error && error.name === "CancellationError")
    );
  }
}

export function throwIfCancelled(token: CancellationToken | undefined): void {
  if (token?.isCancellationRequested) {
    throw new CancellationError();
  }
}
