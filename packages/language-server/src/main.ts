/**
 * MSBuild Language Server - Entry Point
 *
 * Creates the server context and wires the handlers:
 *
 * - context.ts            - ServerContext with configuration and per-document analysis
 * - mapping/lsp-types.ts  - Conversion from engine spans and diagnostics to LSP types
 * - handlers/features.ts  - References, document highlight, definition
 * - handlers/lifecycle.ts - Initialize, configuration and document events
 */
import { createConnection, ProposedFeatures, TextDocuments } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import type { Logger } from "@msbuild-ls/language";
import { createServerContext } from "./context.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const logger: Logger = {
  log: (m: string) => connection.console.log(`[msbuild-ls] ${m}`),
  info: (m: string) => connection.console.info(`[msbuild-ls] ${m}`),
  warn: (m: string) => connection.console.warn(`[msbuild-ls] ${m}`),
  error: (m: string) => connection.console.error(`[msbuild-ls] ${m}`),
};

const ctx = createServerContext({ connection, documents, logger });

registerLifecycleHandlers(ctx);
registerFeatureHandlers(ctx);

documents.listen(connection);
connection.listen();
