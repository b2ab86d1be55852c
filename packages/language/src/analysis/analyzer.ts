/* =======================================================================================
 * Analyzer contract
 * ---------------------------------------------------------------------------------------
 * Analyzers add rules without touching the validator. During `initialize` an analyzer
 * registers:
 * - write actions, fired for every value written to a named property, item or metadata
 * - core diagnostic filters, which may suppress validator diagnostics of one code
 *
 * Actions fire in no particular order. Filters run after every diagnostic has been
 * produced and can only remove.
 * ======================================================================================= */

import type { CoreDiagnosticCode } from "../diagnostics/catalog/index.js";
import type { EmitDiagnosticInput } from "../diagnostics/emitter.js";
import type { DiagnosticDescriptor, MsBuildDiagnostic } from "../diagnostics/types.js";
import type { MsBuildDocument } from "../language/document.js";
import type { XAttribute, XElement } from "../markup/xml-dom.js";
import type { ExpressionNode } from "../parsing/expression-ast.js";

export interface MsBuildAnalyzer {
  /** Stable id; also the `source` of the diagnostics the analyzer reports. */
  readonly id: string;
  readonly supportedDiagnostics: readonly DiagnosticDescriptor[];
  initialize(context: AnalyzerRegistration): void;
}

export interface WriteActionContext {
  readonly document: MsBuildDocument;
  /** The element carrying the value (the item element for metadata attributes). */
  readonly element: XElement;
  /** Null for element text values. */
  readonly attribute: XAttribute | null;
  readonly node: ExpressionNode;
  /** Raw value text. */
  readonly text: string;
  /** Report one of the analyzer's supported diagnostics. */
  report(code: string, input: EmitDiagnosticInput): void;
}

export interface PropertyWriteContext extends WriteActionContext {
  readonly propertyName: string;
}

export interface ItemWriteContext extends WriteActionContext {
  readonly itemName: string;
}

export interface MetadataWriteContext extends WriteActionContext {
  readonly itemName: string;
  readonly metadataName: string;
}

/** Metadata selector; `itemName` null matches the metadata on any item. */
export interface MetadataSelector {
  itemName: string | null;
  name: string;
}

/** Returns true to suppress the diagnostic. */
export type CoreDiagnosticFilter = (diagnostic: MsBuildDiagnostic) => boolean;

export interface AnalyzerRegistration {
  registerPropertyWriteAction(action: (ctx: PropertyWriteContext) => void, ...propertyNames: string[]): void;
  registerItemWriteAction(action: (ctx: ItemWriteContext) => void, ...itemNames: string[]): void;
  registerMetadataWriteAction(action: (ctx: MetadataWriteContext) => void, ...metadata: MetadataSelector[]): void;
  registerCoreDiagnosticFilter(filter: CoreDiagnosticFilter, ...codes: CoreDiagnosticCode[]): void;
}
