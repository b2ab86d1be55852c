/**
 * Type mapping utilities: engine spans, diagnostics and references → LSP types
 */
import {
  DiagnosticSeverity as LspDiagnosticSeverity,
  DiagnosticTag,
  DocumentHighlightKind,
  type Diagnostic,
  type DocumentHighlight,
  type Location,
  type Range,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { MsBuildDiagnostic, SymbolReference, SymbolUsage, TextSpan } from "@msbuild-ls/language";

/** Diagnostics from the validator carry this source; analyzer diagnostics keep their id. */
export const CORE_DIAGNOSTIC_SOURCE = "msbuild";

export function spanToRange(span: TextSpan, doc: TextDocument): Range {
  return { start: doc.positionAt(span.start), end: doc.positionAt(span.end) };
}

export function referenceToRange(reference: SymbolReference, doc: TextDocument): Range {
  return spanToRange({ start: reference.offset, end: reference.offset + reference.length }, doc);
}

function toLspSeverity(severity: MsBuildDiagnostic["severity"]): LspDiagnosticSeverity {
  switch (severity) {
    case "warning":
      return LspDiagnosticSeverity.Warning;
    case "info":
      return LspDiagnosticSeverity.Information;
    default:
      return LspDiagnosticSeverity.Error;
  }
}

const UNNECESSARY_CODES: ReadonlySet<string> = new Set([
  "UnreadProperty",
  "UnreadItem",
  "UnreadMetadata",
  "HasDefaultValue",
]);

function toLspTags(code: string): DiagnosticTag[] | undefined {
  if (code === "DeprecatedWithMessage") return [DiagnosticTag.Deprecated];
  if (UNNECESSARY_CODES.has(code)) return [DiagnosticTag.Unnecessary];
  return undefined;
}

export function mapDiagnostics(diags: readonly MsBuildDiagnostic[], doc: TextDocument): Diagnostic[] {
  return diags.map((diag) => {
    const base: Diagnostic = {
      range: spanToRange(diag.span, doc),
      message: diag.message,
      severity: toLspSeverity(diag.severity),
      code: diag.code,
      source: diag.source === "core" ? CORE_DIAGNOSTIC_SOURCE : diag.source,
    };
    const tags = toLspTags(diag.code);
    if (tags) base.tags = tags;
    if (diag.data) base.data = diag.data;
    return base;
  });
}

export function mapLocations(references: readonly SymbolReference[], doc: TextDocument): Location[] {
  return references.map((reference) => ({ uri: doc.uri, range: referenceToRange(reference, doc) }));
}

function toHighlightKind(usage: SymbolUsage): DocumentHighlightKind {
  return usage === "read" ? DocumentHighlightKind.Read : DocumentHighlightKind.Write;
}

export function mapHighlights(references: readonly SymbolReference[], doc: TextDocument): DocumentHighlight[] {
  return references.map((reference) => ({
    range: referenceToRange(reference, doc),
    kind: toHighlightKind(reference.usage),
  }));
}
