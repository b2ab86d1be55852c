/* =======================================================================================
 * Imported documents
 * ---------------------------------------------------------------------------------------
 * Follows `<Import Project="...">` elements whose project path is a literal file path,
 * infers each imported document, and returns the inferred schemas nearest first.
 * Paths with property references or wildcards, SDK imports and unreadable files are
 * skipped. Each file is visited once, which also breaks import cycles.
 * ======================================================================================= */

import path from "node:path";
import {
  createDocument,
  parseXml,
  unescapeTrimmed,
  type CancellationToken,
  type Logger,
  type SchemaProvider,
  type XElement,
} from "@msbuild-ls/language";
import { readTextFileSync, type ReadTextFile } from "./files.js";

export interface ImportResolverOptions {
  maxDepth: number;
  logger: Logger;
  readFile?: ReadTextFile;
  token?: CancellationToken;
}

export function collectImportedSchemas(text: string, filePath: string, options: ImportResolverOptions): SchemaProvider[] {
  const readFile = options.readFile ?? readTextFileSync;
  const schemas: SchemaProvider[] = [];
  const visited = new Set<string>([path.resolve(filePath)]);

  const visit = (sourceText: string, sourcePath: string, depth: number): void => {
    if (depth >= options.maxDepth) return;
    for (const importPath of literalImports(sourceText, sourcePath)) {
      if (visited.has(importPath)) continue;
      visited.add(importPath);

      const importedText = readFile(importPath);
      if (importedText === null) {
        options.logger.warn(`[imports] cannot read ${importPath} (imported by ${sourcePath})`);
        continue;
      }
      const document = createDocument(importedText, {
        fileName: importPath,
        logger: options.logger,
        ...(options.token ? { token: options.token } : {}),
      });
      if (document.inferredSchema) schemas.push(document.inferredSchema);
      visit(importedText, importPath, depth + 1);
    }
  };

  visit(text, path.resolve(filePath), 0);
  return schemas;
}

/** Absolute paths of the literal project imports of a document, in document order. */
export function literalImports(text: string, filePath: string): string[] {
  const project = parseXml(text).projectElement;
  if (!project) return [];
  const directory = path.dirname(filePath);
  const imports: string[] = [];

  const collect = (parent: XElement): void => {
    for (const child of parent.elements()) {
      if (child.nameEquals("ImportGroup")) {
        collect(child);
      } else if (child.nameEquals("Import") && !child.hasAttribute("Sdk")) {
        const projectPath = literalProjectPath(child);
        if (projectPath) imports.push(path.resolve(directory, projectPath));
      }
    }
  };
  collect(project);
  return imports;
}

function literalProjectPath(element: XElement): string | null {
  const attribute = element.getAttribute("Project");
  if (!attribute?.value || !attribute.valueSpan) return null;
  const value = unescapeTrimmed(attribute.value, attribute.valueSpan.start).value;
  if (value.length === 0 || /[$@%]\(|[*?]/.test(value)) return null;
  return value.replace(/\\/g, "/");
}
