/* =======================================================================================
 * Expression AST
 * ---------------------------------------------------------------------------------------
 * Nodes of the embedded macro language: `$(Property)`, `@(Item->'%(Meta)', ';')`,
 * `%(Item.Meta)`, lists and literal text. All spans are absolute document offsets.
 * Malformed input is represented by `error` nodes; the parser never throws.
 * ======================================================================================= */

import type { TextSpan } from "../model/span.js";

export type ExpressionErrorKind =
  | "ExpectingIdentifier"
  | "ExpectingMethodName"
  | "ExpectingRightParen"
  | "ExpectingRightBracket"
  | "ExpectingApostrophe"
  | "ExpectingValue"
  | "IncompleteReference"
  | "ItemsDisallowed"
  | "MetadataDisallowed";

export type ListMode = "none" | "semicolon" | "semicolon-or-comma";

export interface ExpressionOptions {
  lists: ListMode;
  items: boolean;
  metadata: boolean;
  transforms: boolean;
}

export const DEFAULT_EXPRESSION_OPTIONS: ExpressionOptions = {
  lists: "none",
  items: true,
  metadata: true,
  transforms: true,
};

export interface ExprText {
  kind: "text";
  /** Raw (still escaped) text. */
  value: string;
  span: TextSpan;
}

export interface ExprQuoted {
  kind: "quoted";
  quote: string;
  expression: ExpressionNode;
  span: TextSpan;
}

export interface ExprCall {
  kind: "call";
  name: string;
  nameSpan: TextSpan;
  /** Null for a member access without an argument list. */
  args: ExpressionNode[] | null;
  span: TextSpan;
}

export interface ExprProperty {
  kind: "property";
  /** Empty for a static call such as `$([System.IO.Path]::Combine(...))`. */
  name: string;
  nameSpan: TextSpan;
  staticType: { name: string; span: TextSpan } | null;
  calls: ExprCall[];
  span: TextSpan;
}

export interface ExprItem {
  kind: "item";
  name: string;
  nameSpan: TextSpan;
  /** Quoted transforms (`->'%(Filename)'`) and item functions (`->Distinct()`), in order. */
  transforms: Array<ExprQuoted | ExprCall>;
  separator: ExprQuoted | null;
  span: TextSpan;
}

export interface ExprMetadata {
  kind: "metadata";
  itemName: string | null;
  itemNameSpan: TextSpan | null;
  name: string;
  nameSpan: TextSpan;
  span: TextSpan;
}

export interface ExprConcat {
  kind: "concat";
  parts: ExpressionNode[];
  span: TextSpan;
}

export interface ExprList {
  kind: "list";
  nodes: ExpressionNode[];
  span: TextSpan;
}

export interface ExprError {
  kind: "error";
  errorKind: ExpressionErrorKind;
  /** Consumed text of the malformed reference. */
  span: TextSpan;
  /** Offset where parsing failed. */
  at: number;
}

export type ExpressionNode =
  | ExprText
  | ExprQuoted
  | ExprProperty
  | ExprItem
  | ExprMetadata
  | ExprConcat
  | ExprList
  | ExprError;

export type ExprReference = ExprProperty | ExprItem | ExprMetadata;

export function isReference(node: ExpressionNode): node is ExprReference {
  return node.kind === "property" || node.kind === "item" || node.kind === "metadata";
}

/**
 * Visits a node and all of its descendants, depth-first in source order.
 * `transformItem` is the item whose transform encloses the node, used to resolve
 * unqualified metadata.
 */
export function walkExpression(
  node: ExpressionNode,
  visit: (node: ExpressionNode, transformItem: ExprItem | null) => void,
  transformItem: ExprItem | null = null,
): void {
  visit(node, transformItem);
  switch (node.kind) {
    case "quoted":
      walkExpression(node.expression, visit, transformItem);
      break;
    case "concat":
      for (const part of node.parts) walkExpression(part, visit, transformItem);
      break;
    case "list":
      for (const child of node.nodes) walkExpression(child, visit, transformItem);
      break;
    case "property":
      for (const call of node.calls) walkCallArgs(call, visit, transformItem);
      break;
    case "item":
      for (const transform of node.transforms) {
        if (transform.kind === "quoted") {
          walkExpression(transform, visit, node);
        } else {
          walkCallArgs(transform, visit, node);
        }
      }
      if (node.separator) walkExpression(node.separator, visit, transformItem);
      break;
    default:
      break;
  }
}

function walkCallArgs(
  call: ExprCall,
  visit: (node: ExpressionNode, transformItem: ExprItem | null) => void,
  transformItem: ExprItem | null,
): void {
  for (const arg of call.args ?? []) walkExpression(arg, visit, transformItem);
}

/** Top-level members of a value: list entries, or the single node itself. */
export function listMembers(node: ExpressionNode): ExpressionNode[] {
  return node.kind === "list" ? node.nodes : [node];
}

/** Top-level segments of a single value: concat parts, or the node itself. */
export function segments(node: ExpressionNode): ExpressionNode[] {
  return node.kind === "concat" ? node.parts : [node];
}

/**
 * The innermost reference whose name (or item qualifier) touches `offset`, with the
 * transform item that encloses it.
 */
export function findReferenceAtOffset(
  node: ExpressionNode,
  offset: number,
): { node: ExprReference; transformItem: ExprItem | null } | null {
  let found: { node: ExprReference; transformItem: ExprItem | null } | null = null;
  walkExpression(node, (child, transformItem) => {
    if (!isReference(child)) return;
    const touchesQualifier =
      child.kind === "metadata" && child.itemNameSpan !== null && offset >= child.itemNameSpan.start && offset <= child.itemNameSpan.end;
    if (touchesQualifier || (offset >= child.nameSpan.start && offset <= child.nameSpan.end)) {
      found = { node: child, transformItem };
    }
  });
  return found;
}
