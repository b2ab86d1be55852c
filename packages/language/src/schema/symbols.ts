/* =======================================================================================
 * Typed symbols
 * ---------------------------------------------------------------------------------------
 * The descriptors that govern a name's expected shape. Capabilities that only some
 * symbols have (deprecation, default value, custom type) are optional fields rather
 * than separate interfaces.
 * ======================================================================================= */

import type { ValueKind } from "./value-kind.js";

export type SymbolKind =
  | "property"
  | "item"
  | "metadata"
  | "task"
  | "task-parameter"
  | "target"
  | "value";

export interface SymbolBase {
  readonly name: string;
  readonly description?: string;
  readonly valueKind: ValueKind;
  readonly deprecationMessage?: string;
  readonly defaultValue?: string;
  readonly customType?: CustomTypeInfo;
}

export interface KnownValueSymbol extends SymbolBase {
  readonly kind: "value";
}

export interface CustomTypeInfo {
  readonly name?: string;
  readonly values: readonly KnownValueSymbol[];
  /** When false the value set is closed and anything else is an error. */
  readonly allowUnknownValues: boolean;
  readonly baseKind?: ValueKind;
  readonly analyzerHints: Readonly<Record<string, string>>;
}

export interface PropertySymbol extends SymbolBase {
  readonly kind: "property";
  readonly reserved?: boolean;
  readonly readOnly?: boolean;
}

export interface ItemSymbol extends SymbolBase {
  readonly kind: "item";
}

export interface MetadataSymbol extends SymbolBase {
  readonly kind: "metadata";
  /** Owning item; null for metadata every item has. */
  readonly itemName: string | null;
}

export interface TaskParameterSymbol extends SymbolBase {
  readonly kind: "task-parameter";
  readonly required: boolean;
  readonly isOutput: boolean;
}

/**
 * How a task became known:
 * - `assembly`: declared and resolved from an assembly (or a schema)
 * - `assembly-unresolved`: declared by a UsingTask whose assembly could not be resolved
 * - `task-factory`: declared in-document through a TaskFactory
 * - `inferred`: only seen as a usage, never declared
 */
export type TaskDeclarationKind = "assembly" | "assembly-unresolved" | "task-factory" | "inferred";

export interface TaskSymbol extends SymbolBase {
  readonly kind: "task";
  readonly declarationKind: TaskDeclarationKind;
  readonly namespace?: string;
  /** Keyed by lower-cased parameter name. */
  readonly parameters: ReadonlyMap<string, TaskParameterSymbol>;
}

export interface TargetSymbol extends SymbolBase {
  readonly kind: "target";
}

export type TypedSymbol =
  | PropertySymbol
  | ItemSymbol
  | MetadataSymbol
  | TaskSymbol
  | TaskParameterSymbol
  | TargetSymbol
  | KnownValueSymbol;

/** Lower-case noun for messages ("property", "task parameter", ...). */
export function kindNoun(symbol: { readonly kind: string }): string {
  switch (symbol.kind) {
    case "task-parameter":
      return "task parameter";
    case "value":
      return "value";
    default:
      return symbol.kind;
  }
}

export function titleCaseKindNoun(symbol: { readonly kind: string }): string {
  return kindNoun(symbol)
    .split(" ")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function taskParameterMap(parameters: Iterable<TaskParameterSymbol>): Map<string, TaskParameterSymbol> {
  const map = new Map<string, TaskParameterSymbol>();
  for (const parameter of parameters) map.set(parameter.name.toLowerCase(), parameter);
  return map;
}
