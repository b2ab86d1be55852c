/**
 * LSP feature handlers: references, document highlight, definition
 *
 * Failures are logged and answered with null.
 */
import type {
  CancellationToken as LspCancellationToken,
  Definition,
  DocumentHighlight,
  DocumentHighlightParams,
  Location,
  ReferenceParams,
  TextDocumentPositionParams,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import {
  findReferences,
  formatError,
  resolveSymbolAt,
  type MsBuildDocument,
  type ResolvedSymbolAt,
  type SymbolReference,
  type VisitorOptions,
} from "@msbuild-ls/language";
import type { ServerContext } from "../context.js";
import { mapHighlights, mapLocations } from "../mapping/lsp-types.js";

interface SymbolQuery {
  doc: TextDocument;
  document: MsBuildDocument;
  symbol: ResolvedSymbolAt;
  options: VisitorOptions;
}

function querySymbol(
  ctx: ServerContext,
  params: TextDocumentPositionParams,
  token: LspCancellationToken | undefined,
): SymbolQuery | null {
  const doc = ctx.documents.get(params.textDocument.uri);
  if (!doc) return null;
  const document = ctx.getDocument(doc.uri);
  if (!document) return null;
  const options: VisitorOptions = { logger: ctx.logger, ...(token ? { token } : {}) };
  const symbol = resolveSymbolAt(document, doc.offsetAt(params.position), options);
  return symbol ? { doc, document, symbol, options } : null;
}

function referencesOf(query: SymbolQuery): SymbolReference[] {
  return findReferences(query.document, query.symbol.target, query.options);
}

export function handleReferences(
  ctx: ServerContext,
  params: ReferenceParams,
  token?: LspCancellationToken,
): Location[] | null {
  try {
    const query = querySymbol(ctx, params, token);
    if (!query) return null;
    const references = referencesOf(query).filter(
      (reference) => params.context.includeDeclaration || reference.usage !== "declaration",
    );
    return mapLocations(references, query.doc);
  } catch (e) {
    ctx.logger.error(`[references] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

export function handleDocumentHighlight(
  ctx: ServerContext,
  params: DocumentHighlightParams,
  token?: LspCancellationToken,
): DocumentHighlight[] | null {
  try {
    const query = querySymbol(ctx, params, token);
    if (!query) return null;
    return mapHighlights(referencesOf(query), query.doc);
  } catch (e) {
    ctx.logger.error(`[documentHighlight] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

/** Targets and tasks go to their declarations; properties to the places they are written. */
export function handleDefinition(
  ctx: ServerContext,
  params: TextDocumentPositionParams,
  token?: LspCancellationToken,
): Definition | null {
  try {
    const query = querySymbol(ctx, params, token);
    if (!query) return null;
    const { kind } = query.symbol.target;
    if (kind === "item" || kind === "metadata") return null;
    const definitionUsage = kind === "property" ? "write" : "declaration";
    const definitions = referencesOf(query).filter((reference) => reference.usage === definitionUsage);
    return definitions.length > 0 ? mapLocations(definitions, query.doc) : null;
  } catch (e) {
    ctx.logger.error(`[definition] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

/**
 * Registers all LSP feature handlers on the connection.
 */
export function registerFeatureHandlers(ctx: ServerContext): void {
  ctx.connection.onReferences((params, token) => handleReferences(ctx, params, token));
  ctx.connection.onDocumentHighlight((params, token) => handleDocumentHighlight(ctx, params, token));
  ctx.connection.onDefinition((params, token) => handleDefinition(ctx, params, token));
}
