/* =======================================================================================
 * Documents
 * ---------------------------------------------------------------------------------------
 * A parsed build file together with everything a pass needs to interpret it: its kind,
 * the grammar, and the ordered schema sources (explicit > imported > inferred).
 *
 * createDocument() runs inference against a provisional document first, then returns
 * the final document whose schema collection includes the inferred schema.
 * ======================================================================================= */

import type { FrameworkReference } from "../frameworks/framework-info.js";
import type { XDocument } from "../markup/xml-dom.js";
import { parseXml } from "../markup/xml-reader.js";
import { getBuiltinSchema } from "../schema/builtin.js";
import { SchemaCollection, type SchemaProvider } from "../schema/schema.js";
import type { CancellationToken } from "../shared/cancellation.js";
import type { Logger } from "../shared/logger.js";
import { getLanguageSyntax, type LanguageSyntax } from "../syntax/language-syntax.js";
import { inferSchema, type InferredSchema, type TaskAssemblyResolver } from "./inference.js";

export type DocumentKind = "project" | "props" | "targets" | "other";

/** `*.*proj` is a project; `.props` and `.targets` are imports; anything else is other. */
export function documentKindFromFileName(fileName: string): DocumentKind {
  const dot = fileName.lastIndexOf(".");
  if (dot < 0) return "other";
  const extension = fileName.slice(dot + 1).toLowerCase();
  if (extension === "props") return "props";
  if (extension === "targets") return "targets";
  if (extension.endsWith("proj")) return "project";
  return "other";
}

export class MsBuildDocument {
  readonly schemas: SchemaCollection;

  constructor(
    readonly fileName: string,
    readonly kind: DocumentKind,
    readonly xml: XDocument,
    readonly syntax: LanguageSyntax,
    explicitSchemas: readonly SchemaProvider[],
    importedSchemas: readonly SchemaProvider[],
    readonly inferredSchema: InferredSchema | null,
  ) {
    this.schemas = new SchemaCollection(explicitSchemas, importedSchemas, inferredSchema);
  }

  get text(): string {
    return this.xml.text;
  }

  get isProject(): boolean {
    return this.kind === "project";
  }

  /** Frameworks the document declares; empty before inference. */
  get frameworks(): readonly FrameworkReference[] {
    return this.inferredSchema?.frameworks ?? [];
  }
}

export interface CreateDocumentOptions {
  fileName?: string;
  /** Overrides the kind derived from `fileName`. */
  kind?: DocumentKind;
  /** Schemas supplied by the host, searched before everything else. */
  explicitSchemas?: readonly SchemaProvider[];
  /** Schemas inferred from imported documents. */
  importedSchemas?: readonly SchemaProvider[];
  /** Append the bundled core schema to the explicit schemas. Defaults to true. */
  includeBuiltinSchema?: boolean;
  syntax?: LanguageSyntax;
  taskAssemblyResolver?: TaskAssemblyResolver;
  token?: CancellationToken;
  logger?: Logger;
}

/**
 * Parse `text` and infer its schema.
 *
 * @throws CancellationError when the token is cancelled during inference
 */
export function createDocument(text: string, options: CreateDocumentOptions = {}): MsBuildDocument {
  const fileName = options.fileName ?? "";
  const kind = options.kind ?? documentKindFromFileName(fileName);
  const xml = parseXml(text);
  const syntax = options.syntax ?? getLanguageSyntax();
  const explicit = [
    ...(options.explicitSchemas ?? []),
    ...(options.includeBuiltinSchema === false ? [] : [getBuiltinSchema()]),
  ];
  const imported = options.importedSchemas ?? [];

  const provisional = new MsBuildDocument(fileName, kind, xml, syntax, explicit, imported, null);
  const inferred = inferSchema(provisional, {
    ...(options.taskAssemblyResolver ? { taskAssemblyResolver: options.taskAssemblyResolver } : {}),
    ...(options.token ? { token: options.token } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });
  return new MsBuildDocument(fileName, kind, xml, syntax, explicit, imported, inferred);
}
