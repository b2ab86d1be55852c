/* =======================================================================================
 * Analysis entry point
 * ---------------------------------------------------------------------------------------
 * text → markup tree → inference → validation → analyzers → filters
 *
 * Cancellation yields `{ status: "cancelled" }` and no diagnostics; any other failure
 * escaping the per-node containment propagates to the caller.
 * ======================================================================================= */

import type { MsBuildAnalyzer } from "./analysis/analyzer.js";
import { runAnalyzers } from "./analysis/analyzer-driver.js";
import { BUILTIN_ANALYZERS } from "./analysis/analyzers/index.js";
import { DiagnosticSink } from "./diagnostics/emitter.js";
import type { MsBuildDiagnostic } from "./diagnostics/types.js";
import { createDocument, type CreateDocumentOptions, type MsBuildDocument } from "./language/document.js";
import { CancellationError } from "./shared/cancellation.js";
import { validateDocument } from "./validation/validator.js";

export interface AnalyzeOptions extends CreateDocumentOptions {
  /** Defaults to the bundled analyzers. */
  analyzers?: readonly MsBuildAnalyzer[];
}

export type AnalysisResult =
  | { status: "completed"; document: MsBuildDocument; diagnostics: readonly MsBuildDiagnostic[] }
  | { status: "cancelled" };

export function analyzeDocument(text: string, options: AnalyzeOptions = {}): AnalysisResult {
  const passOptions = { token: options.token, logger: options.logger };
  try {
    const document = createDocument(text, options);
    const sink = new DiagnosticSink(text.length);
    validateDocument(document, { ...passOptions, sink });
    const diagnostics = runAnalyzers(document, options.analyzers ?? BUILTIN_ANALYZERS, sink, passOptions);
    return { status: "completed", document, diagnostics };
  } catch (e) {
    if (CancellationError.isCancellationError(e)) return { status: "cancelled" };
    throw e;
  }
}
