/* =======================================================================================
 * Value kinds
 * ---------------------------------------------------------------------------------------
 * A value kind is a base tag plus modifiers:
 * - `list`: whether `;` (and optionally `,`) separate multiple values
 * - `literal`: whether embedded expressions are forbidden
 *
 * Textual form used by schema files: `Tag`, `Tag[]` (semicolon list),
 * `Tag[,]` (semicolon-or-comma list), with a trailing `!` for literal-only.
 * ======================================================================================= */

import type { ExpressionOptions, ListMode } from "../parsing/expression-ast.js";

export const VALUE_KIND_TAGS = [
  "Unknown",
  "Nothing",
  "Data",
  "Bool",
  "Int",
  "String",
  "Guid",
  "Url",
  "Version",
  "NuGetVersion",
  "NuGetVersionRange",
  "TargetFramework",
  "TargetFrameworkIdentifier",
  "TargetFrameworkVersion",
  "TargetFrameworkProfile",
  "Culture",
  "Lcid",
  "ClrNamespace",
  "ClrType",
  "ClrTypeName",
  "TargetName",
  "PropertyName",
  "ItemName",
  "Condition",
  "CustomType",
  "File",
  "Folder",
  "TaskFactory",
] as const;

export type ValueKindTag = (typeof VALUE_KIND_TAGS)[number];

export interface ValueKind {
  tag: ValueKindTag;
  list: ListMode;
  literal: boolean;
}

export const UNKNOWN_KIND: ValueKind = { tag: "Unknown", list: "none", literal: false };
export const NOTHING_KIND: ValueKind = { tag: "Nothing", list: "none", literal: false };

const VALUE_KIND_PATTERN = /^([A-Za-z]+)(\[,?\])?(!)?$/;

function isValueKindTag(value: string): value is ValueKindTag {
  return (VALUE_KIND_TAGS as readonly string[]).includes(value);
}

/** Parse the textual form of a value kind; returns null when malformed. */
export function parseValueKind(text: string): ValueKind | null {
  const match = VALUE_KIND_PATTERN.exec(text.trim());
  if (!match) return null;
  const [, tag = "", list, literal] = match;
  if (!isValueKindTag(tag)) return null;
  return {
    tag,
    list: list === "[]" ? "semicolon" : list === "[,]" ? "semicolon-or-comma" : "none",
    literal: literal === "!",
  };
}

export function formatValueKind(kind: ValueKind): string {
  const list = kind.list === "semicolon" ? "[]" : kind.list === "semicolon-or-comma" ? "[,]" : "";
  return `${kind.tag}${list}${kind.literal ? "!" : ""}`;
}

export function allowsLists(kind: ValueKind): boolean {
  return kind.list !== "none";
}

export function allowsExpressions(kind: ValueKind): boolean {
  return !kind.literal;
}

/**
 * Parser options for a value of the given kind. Item, metadata and transform syntax
 * stays enabled so the validator can see (and report on) whatever was written.
 */
export function expressionOptionsFor(kind: ValueKind): ExpressionOptions {
  return { lists: kind.list, items: true, metadata: true, transforms: true };
}
