/**
 * LSP lifecycle handlers: initialize, document events, configuration changes
 */
import {
  TextDocumentSyncKind,
  type DidChangeConfigurationParams,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import { formatError, type CancellationToken } from "@msbuild-ls/language";
import type { ServerContext } from "../context.js";
import { parseServerConfig } from "../config.js";
import { mapDiagnostics } from "../mapping/lsp-types.js";

/**
 * Cancelled when the open document is no longer at `doc`'s version. Analysis runs
 * synchronously, so this only catches a `doc` that was already stale when the pass began.
 */
function versionToken(ctx: ServerContext, doc: TextDocument): CancellationToken {
  return {
    get isCancellationRequested() {
      return ctx.documents.get(doc.uri)?.version !== doc.version;
    },
  };
}

export async function refreshDocument(ctx: ServerContext, doc: TextDocument): Promise<void> {
  try {
    const result = ctx.analyze(doc, versionToken(ctx, doc));
    if (result.status === "cancelled") {
      ctx.logger.log(`[diagnostics] cancelled ${doc.uri}@${doc.version}`);
      return;
    }
    const diagnostics = ctx.config.diagnostics.enabled ? mapDiagnostics(result.diagnostics, doc) : [];
    await ctx.connection.sendDiagnostics({ uri: doc.uri, version: doc.version, diagnostics });
  } catch (e: unknown) {
    // previously published diagnostics stay in place
    ctx.logger.error(`refreshDocument failed for ${doc.uri}: ${formatError(e)}`);
  }
}

async function refreshAllOpenDocuments(ctx: ServerContext): Promise<void> {
  for (const doc of ctx.documents.all()) {
    await refreshDocument(ctx, doc);
  }
}

function applyConfiguration(ctx: ServerContext, raw: unknown, origin: string): void {
  const { config, issues } = parseServerConfig(raw);
  for (const issue of issues) {
    ctx.logger.warn(`[config] invalid ${origin} setting ${issue}; using defaults`);
  }
  ctx.configure(config);
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.workspaceRoot = params.rootUri ? URI.parse(params.rootUri).fsPath : null;
  ctx.logger.info(`initialize: root=${ctx.workspaceRoot ?? "<cwd>"}`);
  applyConfiguration(ctx, params.initializationOptions, "initialization");
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      definitionProvider: true,
      referencesProvider: true,
      documentHighlightProvider: true,
    },
  };
}

export async function handleDidChangeConfiguration(
  ctx: ServerContext,
  params: DidChangeConfigurationParams,
): Promise<void> {
  applyConfiguration(ctx, params.settings, "workspace");
  await refreshAllOpenDocuments(ctx);
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params) => handleInitialize(ctx, params));

  ctx.connection.onDidChangeConfiguration((params) => {
    ctx.logger.log("didChangeConfiguration: reloading schemas and refreshing open documents");
    void handleDidChangeConfiguration(ctx, params);
  });

  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri}`);
    void refreshDocument(ctx, e.document);
  });

  ctx.documents.onDidChangeContent((e) => {
    ctx.logger.log(`didChange ${e.document.uri}`);
    void refreshDocument(ctx, e.document);
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
    ctx.forget(e.document.uri);
    void ctx.connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
  });
}
