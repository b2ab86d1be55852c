import builtinJson from "../data/builtin-schema.json" with { type: "json" };
import type { MsBuildSchema } from "./schema.js";
import { loadSchemaJson } from "./schema-loader.js";

let builtin: MsBuildSchema | null = null;

/** Core properties, items, tasks and targets shipped with the engine. */
export function getBuiltinSchema(): MsBuildSchema {
  builtin ??= loadSchemaJson(builtinJson, "explicit", "builtin-schema.json");
  return builtin;
}
