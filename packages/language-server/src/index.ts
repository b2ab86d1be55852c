// Public API of the language server (handlers are exported for embedding and tests)
export { createServerContext, documentFileName, type ServerContext, type ServerContextInit } from "./context.js";
export {
  DEFAULT_CONFIG,
  parseServerConfig,
  serverConfigSchema,
  type ConfigParseResult,
  type MsBuildServerConfig,
} from "./config.js";
export { handleDefinition, handleDocumentHighlight, handleReferences, registerFeatureHandlers } from "./handlers/features.js";
export {
  handleDidChangeConfiguration,
  handleInitialize,
  refreshDocument,
  registerLifecycleHandlers,
} from "./handlers/lifecycle.js";
export {
  CORE_DIAGNOSTIC_SOURCE,
  mapDiagnostics,
  mapHighlights,
  mapLocations,
  referenceToRange,
  spanToRange,
} from "./mapping/lsp-types.js";
export { collectImportedSchemas, literalImports, type ImportResolverOptions } from "./services/imports.js";
export { loadConfiguredSchemas } from "./services/schemas.js";
export { readTextFileSync, type ReadTextFile } from "./services/files.js";
