/**
 * Test factory functions.
 *
 * Provides:
 * 1. An in-memory file reader standing in for the disk
 * 2. A server context over mock connection and document store objects
 * 3. Text documents for `file:///ws/...` URIs
 */
import { vi } from "vitest";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createServerContext } from "@msbuild-ls/language-server";

export function createLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Reads from a path → text map; missing paths read as null. */
export function memoryFiles(files: Record<string, string>) {
  return vi.fn((filePath: string): string | null => files[filePath] ?? null);
}

export function textDocument(name: string, text: string, version = 1): TextDocument {
  return TextDocument.create(`file:///ws/${name}`, "msbuild", version, text);
}

/** A real server context whose connection, document store and disk are in memory. */
export function createTestContext(files: Record<string, string> = {}, docs: TextDocument[] = []) {
  const logger = createLogger();
  const connection = { sendDiagnostics: vi.fn(async (_params: unknown) => {}) };
  const open = new Map(docs.map((doc) => [doc.uri, doc]));
  const documents = {
    get: (uri: string) => open.get(uri),
    all: () => [...open.values()],
  };
  const readFile = memoryFiles(files);
  const ctx = createServerContext({
    connection: connection as never,
    documents: documents as never,
    logger,
    readFile,
  });
  ctx.workspaceRoot = "/ws";
  return { ctx, logger, connection, open, readFile };
}
