import { describe, test, expect, vi } from "vitest";
import {
  DEFAULT_CONFIG,
  handleDidChangeConfiguration,
  handleInitialize,
  refreshDocument,
  registerLifecycleHandlers,
} from "@msbuild-ls/language-server";
import { createLogger, createTestContext, textDocument } from "../helpers/test-factories.js";

const TEXT = `<Project Sdk="Microsoft.NET.Sdk">\n  <PropertyGroup>\n    <Foo>1</Foo>\n  </PropertyGroup>\n</Project>`;

describe("refreshDocument", () => {
  test("publishes mapped diagnostics for the analyzed version", async () => {
    const doc = textDocument("app.csproj", TEXT);
    const { ctx, connection } = createTestContext({}, [doc]);

    await refreshDocument(ctx, doc);

    expect(connection.sendDiagnostics).toHaveBeenCalledTimes(1);
    expect(connection.sendDiagnostics.mock.calls[0]?.[0]).toMatchObject({
      uri: "file:///ws/app.csproj",
      version: 1,
      diagnostics: [
        {
          range: { start: { line: 2, character: 5 }, end: { line: 2, character: 8 } },
          message: "The property 'Foo' is never read",
          severity: 2,
          code: "UnreadProperty",
          source: "msbuild",
          tags: [1],
        },
      ],
    });
  });

  test("publishes nothing when the document moved on", async () => {
    const stale = textDocument("app.csproj", TEXT, 1);
    const { ctx, connection, logger } = createTestContext({}, [textDocument("app.csproj", TEXT, 2)]);

    await refreshDocument(ctx, stale);

    expect(connection.sendDiagnostics).not.toHaveBeenCalled();
    expect(logger.log).toHaveBeenCalledWith("[diagnostics] cancelled file:///ws/app.csproj@1");
  });

  test("publishes an empty list when diagnostics are disabled", async () => {
    const doc = textDocument("app.csproj", TEXT);
    const { ctx, connection } = createTestContext({}, [doc]);
    ctx.configure({ ...DEFAULT_CONFIG, diagnostics: { enabled: false } });

    await refreshDocument(ctx, doc);

    expect(connection.sendDiagnostics).toHaveBeenCalledWith({ uri: doc.uri, version: 1, diagnostics: [] });
  });

  test("keeps previous diagnostics when analysis throws", async () => {
    const ctx = {
      logger: createLogger(),
      connection: { sendDiagnostics: vi.fn() },
      config: DEFAULT_CONFIG,
      analyze: vi.fn(() => {
        throw new Error("analysis failed");
      }),
    };
    const doc = textDocument("app.csproj", TEXT);

    await refreshDocument(ctx as never, doc);

    expect(ctx.connection.sendDiagnostics).not.toHaveBeenCalled();
    expect(ctx.logger.error).toHaveBeenCalledWith(
      expect.stringContaining("refreshDocument failed for file:///ws/app.csproj: Error: analysis failed"),
    );
  });
});

describe("handleInitialize", () => {
  test("records the workspace root and applies initialization options", () => {
    const { ctx } = createTestContext();
    const result = handleInitialize(ctx, {
      processId: null,
      rootUri: "file:///repo",
      capabilities: {},
      initializationOptions: { msbuild: { imports: { enabled: false } } },
    });

    expect(result.capabilities).toEqual({
      textDocumentSync: 2,
      definitionProvider: true,
      referencesProvider: true,
      documentHighlightProvider: true,
    });
    expect(ctx.workspaceRoot).toBe("/repo");
    expect(ctx.config.imports).toEqual({ enabled: false, maxDepth: 8 });
  });

  test("logs invalid options and keeps the defaults", () => {
    const { ctx, logger } = createTestContext();
    handleInitialize(ctx, {
      processId: null,
      rootUri: null,
      capabilities: {},
      initializationOptions: { msbuild: { diagnostics: { enabled: "yes" } } },
    });

    expect(ctx.workspaceRoot).toBeNull();
    expect(ctx.config).toBe(DEFAULT_CONFIG);
    expect(logger.warn).toHaveBeenCalledWith(
      "[config] invalid initialization setting diagnostics.enabled: Expected boolean, received string; using defaults",
    );
  });
});

describe("handleDidChangeConfiguration", () => {
  test("refreshes open documents with the new settings", async () => {
    const doc = textDocument("app.csproj", TEXT);
    const { ctx, connection } = createTestContext({}, [doc]);

    await handleDidChangeConfiguration(ctx, { settings: { msbuild: { diagnostics: { enabled: false } } } });

    expect(ctx.config.diagnostics.enabled).toBe(false);
    expect(connection.sendDiagnostics).toHaveBeenCalledWith({ uri: doc.uri, version: 1, diagnostics: [] });
  });
});

describe("registerLifecycleHandlers onDidClose", () => {
  test("clears diagnostics and forgets the document", () => {
    const documents = {
      onDidOpen: vi.fn(),
      onDidChangeContent: vi.fn(),
      onDidClose: vi.fn((_handler: (e: { document: { uri: string } }) => void) => {}),
    };
    const connection = {
      onInitialize: vi.fn(),
      onDidChangeConfiguration: vi.fn(),
      sendDiagnostics: vi.fn(),
    };
    const ctx = { logger: createLogger(), documents, connection, forget: vi.fn() };

    registerLifecycleHandlers(ctx as never);
    const closeHandler = documents.onDidClose.mock.calls[0]?.[0];
    expect(closeHandler).toBeDefined();

    const docUri = "file:///ws/app.csproj";
    closeHandler?.({ document: { uri: docUri } });

    expect(ctx.forget).toHaveBeenCalledWith(docUri);
    expect(connection.sendDiagnostics).toHaveBeenCalledWith({ uri: docUri, diagnostics: [] });
  });
});
