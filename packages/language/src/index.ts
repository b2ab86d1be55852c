// Public API of the analysis engine

export { analyzeDocument, type AnalysisResult, type AnalyzeOptions } from "./analyze.js";

// Documents and passes
export { createDocument, documentKindFromFileName, MsBuildDocument } from "./language/document.js";
export type { CreateDocumentOptions, DocumentKind } from "./language/document.js";
export { InferredSchema, inferSchema } from "./language/inference.js";
export type { InferenceOptions, SymbolUsage, TaskAssemblyDeclaration, TaskAssemblyResolver } from "./language/inference.js";
export { DocumentVisitor, elementValues } from "./language/document-visitor.js";
export type { ResolvedAttribute, ResolvedElement, VisitedValue, VisitorOptions } from "./language/document-visitor.js";
export type { ResolvedSymbol } from "./language/symbol-resolution.js";
export { findReferences, resolveSymbolAt } from "./language/references.js";
export type { ResolvedSymbolAt, SymbolReference, SymbolTarget } from "./language/references.js";
export { DocumentValidator, validateDocument, type ValidationOptions } from "./validation/validator.js";

// Analyzers
export { runAnalyzers } from "./analysis/analyzer-driver.js";
export { BUILTIN_ANALYZERS, runtimeIdentifierAnalyzer } from "./analysis/analyzers/index.js";
export type {
  AnalyzerRegistration,
  CoreDiagnosticFilter,
  ItemWriteContext,
  MetadataSelector,
  MetadataWriteContext,
  MsBuildAnalyzer,
  PropertyWriteContext,
  WriteActionContext,
} from "./analysis/analyzer.js";

// Diagnostics
export * from "./diagnostics/index.js";

// Markup and expressions
export { parseXml } from "./markup/xml-reader.js";
export { XAttribute, XDocument, XElement, XText } from "./markup/xml-dom.js";
export type { MarkupIssue, XNode } from "./markup/xml-dom.js";
export { parseExpression } from "./parsing/expression-parser.js";
export * from "./parsing/expression-ast.js";
export { unescapeTrimmed, unescapeXml, type UnescapedValue } from "./parsing/escaping.js";
export * from "./model/span.js";

// Schemas
export { MsBuildSchema, SchemaCollection, tryGetKnownValue } from "./schema/schema.js";
export type { KnownValueResult, SchemaLookupOptions, SchemaOrigin, SchemaProvider } from "./schema/schema.js";
export { loadSchemaJson, loadSchemaText } from "./schema/schema-loader.js";
export { getBuiltinSchema } from "./schema/builtin.js";
export * from "./schema/symbols.js";
export * from "./schema/value-kind.js";
export { getLanguageSyntax, LanguageSyntax, ELEMENT_KINDS } from "./syntax/language-syntax.js";
export type { AttributeKind, AttributeSyntax, ElementKind, ElementSyntax } from "./syntax/language-syntax.js";

// Shared
export { CancellationError, NEVER_CANCELLED, throwIfCancelled, type CancellationToken } from "./shared/cancellation.js";
export { formatError, NOOP_LOGGER, type Logger } from "./shared/logger.js";
export { SchemaLoadError } from "./shared/errors.js";
export { runContained, errorMessage, type NodeResult } from "./shared/node-result.js";

// Value formats
export * from "./frameworks/framework-info.js";
export { isKnownCulture, isKnownLcid, isValidCultureName, parseLcid } from "./cultures/culture-info.js";
export * from "./values/clr-names.js";
export * from "./values/guid.js";
export * from "./values/scalars.js";
export * from "./values/versions.js";
