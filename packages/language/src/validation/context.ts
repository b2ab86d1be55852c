/* =======================================================================================
 * Validation context
 * ---------------------------------------------------------------------------------------
 * Explicit per-pass state handed to every rule: the document, the diagnostic emitter
 * and the logger, plus the shared checks (usage, deprecation, property writes) that
 * several rules need.
 *
 * Usage checks: a symbol an explicit or imported schema knows counts as used; otherwise
 * the document's own inferred usage decides.
 * ======================================================================================= */

import type { coreDiagnostics } from "../diagnostics/catalog/index.js";
import type { DeprecatedData } from "../diagnostics/catalog/structure.js";
import type { DiagnosticEmitter } from "../diagnostics/emitter.js";
import type { SymbolUsage } from "../language/inference.js";
import type { MsBuildDocument } from "../language/document.js";
import type { TextSpan } from "../model/span.js";
import type { SchemaLookupOptions } from "../schema/schema.js";
import { kindNoun, type ItemSymbol, type MetadataSymbol, type PropertySymbol } from "../schema/symbols.js";
import type { Logger } from "../shared/logger.js";

export interface ValidationContext {
  readonly document: MsBuildDocument;
  readonly diagnostics: DiagnosticEmitter<typeof coreDiagnostics>;
  readonly logger: Logger;
}

export interface UsageCheck<T> {
  used: boolean;
  /** The symbol from an explicit or imported schema, if any. */
  symbol: T | null;
}

/** Lookup that ignores the document's own inferred schema. */
export const EXTERNAL_ONLY: SchemaLookupOptions = { skipInferred: true };

export function checkPropertyUsage(ctx: ValidationContext, name: string, usage: SymbolUsage): UsageCheck<PropertySymbol> {
  const symbol = ctx.document.schemas.getProperty(name, EXTERNAL_ONLY);
  return {
    used: symbol !== null || (ctx.document.inferredSchema?.isPropertyUsed(name, usage) ?? false),
    symbol,
  };
}

export function checkItemUsage(ctx: ValidationContext, name: string, usage: SymbolUsage): UsageCheck<ItemSymbol> {
  const symbol = ctx.document.schemas.getItem(name, EXTERNAL_ONLY);
  return {
    used: symbol !== null || (ctx.document.inferredSchema?.isItemUsed(name, usage) ?? false),
    symbol,
  };
}

export function checkMetadataUsage(
  ctx: ValidationContext,
  itemName: string,
  name: string,
  usage: SymbolUsage,
): UsageCheck<MetadataSymbol> {
  const symbol = ctx.document.schemas.getMetadata(itemName, name, EXTERNAL_ONLY);
  return {
    used: symbol !== null || (ctx.document.inferredSchema?.isMetadataUsed(itemName, name, usage) ?? false),
    symbol,
  };
}

/** Reports DeprecatedWithMessage when the symbol is deprecated; returns whether it was. */
export function checkDeprecated(
  ctx: ValidationContext,
  symbol: { readonly kind: string; readonly name: string; readonly deprecationMessage?: string },
  span: TextSpan,
): boolean {
  if (symbol.deprecationMessage === undefined) return false;
  const data: DeprecatedData = { symbolKind: kindNoun(symbol), name: symbol.name };
  ctx.diagnostics.emit("DeprecatedWithMessage", {
    span,
    args: [kindNoun(symbol), symbol.name, symbol.deprecationMessage],
    data,
  });
  return true;
}

export function checkPropertyWrite(ctx: ValidationContext, property: PropertySymbol, span: TextSpan): void {
  if (property.reserved) {
    ctx.diagnostics.emit("PropertyWriteReserved", { span, args: [property.name] });
  } else if (property.readOnly) {
    ctx.diagnostics.emit("PropertyWriteReadonly", { span, args: [property.name] });
  }
}
