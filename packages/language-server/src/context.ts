import type { Connection, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import {
  analyzeDocument,
  BUILTIN_ANALYZERS,
  CancellationError,
  type AnalysisResult,
  type CancellationToken,
  type Logger,
  type MsBuildDocument,
  type MsBuildSchema,
  type SchemaProvider,
} from "@msbuild-ls/language";
import { DEFAULT_CONFIG, type MsBuildServerConfig } from "./config.js";
import { readTextFileSync, type ReadTextFile } from "./services/files.js";
import { collectImportedSchemas } from "./services/imports.js";
import { loadConfiguredSchemas } from "./services/schemas.js";

/**
 * Shared server context passed to all handlers.
 * Holds the connection, the configuration and the last analysis of each open document.
 */
export interface ServerContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;

  // Mutable state
  workspaceRoot: string | null;
  readonly config: MsBuildServerConfig;

  /** Replace the configuration and reload the configured schema files. */
  configure(config: MsBuildServerConfig): void;
  /** Analyze a document version, reusing the cached result when it is current. */
  analyze(doc: TextDocument, token?: CancellationToken): AnalysisResult;
  /** The analyzed document for an open URI, or null when it is not open or analysis was cancelled. */
  getDocument(uri: string): MsBuildDocument | null;
  forget(uri: string): void;
}

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
  readFile?: ReadTextFile;
}

interface CachedAnalysis {
  version: number;
  result: Extract<AnalysisResult, { status: "completed" }>;
}

export function documentFileName(uri: string): string {
  const parsed = URI.parse(uri);
  return parsed.scheme === "file" ? parsed.fsPath : parsed.path;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger } = init;
  const readFile = init.readFile ?? readTextFileSync;

  // Mutable state - set during onInitialize and configuration changes
  let workspaceRoot: string | null = null;
  let config: MsBuildServerConfig = DEFAULT_CONFIG;
  let explicitSchemas: MsBuildSchema[] = [];
  const cache = new Map<string, CachedAnalysis>();

  function configure(next: MsBuildServerConfig): void {
    config = next;
    explicitSchemas = loadConfiguredSchemas(config.schemas, workspaceRoot, logger, readFile);
    cache.clear();
    logger.info(
      `[config] schemas=${explicitSchemas.length} imports=${config.imports.enabled ? config.imports.maxDepth : "off"} ` +
        `disabledAnalyzers=${config.analyzers.disabled.join(",") || "<none>"}`,
    );
  }

  function analyze(doc: TextDocument, token?: CancellationToken): AnalysisResult {
    const cached = cache.get(doc.uri);
    if (cached && cached.version === doc.version) return cached.result;

    const fileName = documentFileName(doc.uri);
    const text = doc.getText();
    let importedSchemas: SchemaProvider[] = [];
    if (config.imports.enabled) {
      try {
        importedSchemas = collectImportedSchemas(text, fileName, {
          maxDepth: config.imports.maxDepth,
          logger,
          readFile,
          ...(token ? { token } : {}),
        });
      } catch (e) {
        if (CancellationError.isCancellationError(e)) return { status: "cancelled" };
        throw e;
      }
    }

    const disabled = new Set(config.analyzers.disabled.map((id) => id.toLowerCase()));
    const result = analyzeDocument(text, {
      fileName,
      explicitSchemas,
      importedSchemas,
      analyzers: BUILTIN_ANALYZERS.filter((analyzer) => !disabled.has(analyzer.id.toLowerCase())),
      logger,
      ...(token ? { token } : {}),
    });

    if (result.status === "completed") {
      cache.set(doc.uri, { version: doc.version, result });
    }
    return result;
  }

  function getDocument(uri: string): MsBuildDocument | null {
    const doc = documents.get(uri);
    if (!doc) return null;
    const result = analyze(doc);
    return result.status === "completed" ? result.document : null;
  }

  function forget(uri: string): void {
    cache.delete(uri);
  }

  return {
    connection,
    documents,
    logger,

    get workspaceRoot() { return workspaceRoot; },
    set workspaceRoot(v) { workspaceRoot = v; },

    get config() { return config; },

    configure,
    analyze,
    getDocument,
    forget,
  };
}
