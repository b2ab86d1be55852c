import path from "node:path";
import { errorMessage, loadSchemaText, type Logger, type MsBuildSchema } from "@msbuild-ls/language";
import { readTextFileSync, type ReadTextFile } from "./files.js";

/**
 * Load the configured schema files as explicit schemas, in configuration order.
 * Files that cannot be read or fail validation are logged and skipped.
 */
export function loadConfiguredSchemas(
  schemaPaths: readonly string[],
  workspaceRoot: string | null,
  logger: Logger,
  readFile: ReadTextFile = readTextFileSync,
): MsBuildSchema[] {
  const schemas: MsBuildSchema[] = [];
  for (const schemaPath of schemaPaths) {
    const resolved = path.resolve(workspaceRoot ?? process.cwd(), schemaPath);
    const text = readFile(resolved);
    if (text === null) {
      logger.warn(`[schemas] cannot read ${resolved}`);
      continue;
    }
    try {
      schemas.push(loadSchemaText(text, "explicit", resolved));
    } catch (e) {
      logger.error(`[schemas] ignoring ${resolved}: ${errorMessage(e)}`);
    }
  }
  return schemas;
}
