/* =======================================================================================
 * References
 * ---------------------------------------------------------------------------------------
 * - resolveSymbolAt(): the property, item, metadata, target or task named at an offset
 * - findReferences(): every place a symbol is declared, written or read, each spanning
 *   exactly the name in the source
 *
 * Only start-tag names count for elements. A metadata item qualifier (`%(Item.Meta)`)
 * is a reference to the item; unqualified metadata resolves to the enclosing transform's
 * item, else the enclosing item element.
 * ======================================================================================= */

import type { XElement } from "../markup/xml-dom.js";
import { spanTouchesOffset, type TextSpan } from "../model/span.js";
import { listMembers, walkExpression, type ExprText } from "../parsing/expression-ast.js";
import { unescapeTrimmed } from "../parsing/escaping.js";
import type { ElementSyntax } from "../syntax/language-syntax.js";
import { parseTaskName } from "../values/clr-names.js";
import type { MsBuildDocument } from "./document.js";
import {
  DocumentVisitor,
  enclosingItemName,
  type ResolvedAttribute,
  type ResolvedElement,
  type VisitedValue,
  type VisitorOptions,
} from "./document-visitor.js";
import type { SymbolUsage } from "./inference.js";

export type SymbolTarget =
  | { kind: "property"; name: string }
  | { kind: "item"; name: string }
  | { kind: "metadata"; itemName: string; name: string }
  | { kind: "target"; name: string }
  | { kind: "task"; name: string };

export interface SymbolReference {
  offset: number;
  length: number;
  usage: SymbolUsage;
}

const same = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/** A name occurrence found while walking the document. */
interface Occurrence {
  target: SymbolTarget;
  span: TextSpan;
  usage: SymbolUsage;
}

/**
 * Walks the document and reports every symbol name occurrence. Subclasses decide what
 * to keep.
 */
abstract class OccurrenceVisitor extends DocumentVisitor {
  protected abstract found(occurrence: Occurrence): void;

  protected override visitResolvedElement(resolved: ResolvedElement): void {
    const { element, syntax } = resolved;
    switch (syntax.syntaxKind) {
      case "Property":
        this.found({ target: { kind: "property", name: element.name }, span: element.nameSpan, usage: "write" });
        break;
      case "Item":
      case "ItemDefinition":
        this.found({ target: { kind: "item", name: element.name }, span: element.nameSpan, usage: "write" });
        break;
      case "Metadata":
        if (element.parent) {
          this.found({
            target: { kind: "metadata", itemName: element.parent.name, name: element.name },
            span: element.nameSpan,
            usage: "write",
          });
        }
        break;
      case "Task":
        this.found({ target: { kind: "task", name: element.name }, span: element.nameSpan, usage: "read" });
        break;
      default:
        break;
    }
    super.visitResolvedElement(resolved);
  }

  protected override visitResolvedAttribute(resolved: ResolvedAttribute): void {
    const { element, attribute, syntax } = resolved;
    if (syntax.syntaxKind === "Item_Metadata") {
      this.found({
        target: { kind: "metadata", itemName: element.name, name: attribute.name },
        span: attribute.nameSpan,
        usage: "write",
      });
    }
    super.visitResolvedAttribute(resolved);
  }

  protected override visitValue(value: VisitedValue): void {
    const enclosingItem = enclosingItemName(value.element, value.elementSyntax);
    walkExpression(value.expression, (node, transformItem) => {
      switch (node.kind) {
        case "property":
          if (node.name.length > 0) {
            this.found({ target: { kind: "property", name: node.name }, span: node.nameSpan, usage: "read" });
          }
          break;
        case "item":
          this.found({ target: { kind: "item", name: node.name }, span: node.nameSpan, usage: "read" });
          break;
        case "metadata": {
          if (node.itemName !== null && node.itemNameSpan !== null) {
            this.found({ target: { kind: "item", name: node.itemName }, span: node.itemNameSpan, usage: "read" });
          }
          const itemName = node.itemName ?? transformItem?.name ?? enclosingItem;
          if (itemName) {
            this.found({ target: { kind: "metadata", itemName, name: node.name }, span: node.nameSpan, usage: "read" });
          }
          break;
        }
        default:
          break;
      }
    });

    switch (value.attributeSyntax?.syntaxKind) {
      case "Target_Name":
        this.literals(value, "target", "declaration");
        return;
      case "Output_PropertyName":
        this.literals(value, "property", "write");
        return;
      case "Output_ItemName":
        this.literals(value, "item", "write");
        return;
      case "UsingTask_TaskName":
        this.taskDeclaration(value);
        return;
      default:
        if (value.symbol.valueKind.tag === "TargetName") this.literals(value, "target", "read");
    }
  }

  private literals(value: VisitedValue, kind: "property" | "item" | "target", usage: SymbolUsage): void {
    for (const member of listMembers(value.expression)) {
      if (member.kind !== "text") continue;
      const literal = literalSpan(member);
      if (literal) this.found({ target: { kind, name: literal.value }, span: literal.span, usage });
    }
  }

  private taskDeclaration(value: VisitedValue): void {
    if (value.expression.kind !== "text") return;
    const literal = literalSpan(value.expression);
    const taskName = literal ? parseTaskName(literal.value) : null;
    if (!literal || !taskName) return;
    // only the simple name is a reference; the namespace prefix is not
    const start = literal.span.end - taskName.name.length;
    this.found({
      target: { kind: "task", name: taskName.name },
      span: { start, end: literal.span.end },
      usage: "declaration",
    });
  }
}

function literalSpan(node: ExprText): { value: string; span: TextSpan } | null {
  const { value, trimmedOffset, escapedLength } = unescapeTrimmed(node.value, node.span.start);
  if (value.length === 0) return null;
  return { value, span: { start: trimmedOffset, end: trimmedOffset + escapedLength } };
}

function matches(target: SymbolTarget, candidate: SymbolTarget): boolean {
  if (target.kind !== candidate.kind || !same(target.name, candidate.name)) return false;
  if (target.kind === "metadata" && candidate.kind === "metadata") return same(target.itemName, candidate.itemName);
  return true;
}

// =============================================================================
// Find references
// =============================================================================

class ReferenceCollector extends OccurrenceVisitor {
  readonly results: SymbolReference[] = [];

  constructor(
    document: MsBuildDocument,
    private readonly target: SymbolTarget,
    options: VisitorOptions,
  ) {
    super(document, options);
  }

  protected found({ target, span, usage }: Occurrence): void {
    if (matches(this.target, target)) {
      this.results.push({ offset: span.start, length: span.end - span.start, usage });
    }
  }
}

/**
 * Every declaration, write and read of `target` in the document, ordered by offset.
 *
 * @throws CancellationError when the token is cancelled
 */
export function findReferences(
  document: MsBuildDocument,
  target: SymbolTarget,
  options: VisitorOptions = {},
): SymbolReference[] {
  const collector = new ReferenceCollector(document, target, options);
  collector.run();
  return collector.results.sort((a, b) => a.offset - b.offset);
}

// =============================================================================
// Resolve at offset
// =============================================================================

class SymbolLocator extends OccurrenceVisitor {
  result: Occurrence | null = null;

  constructor(
    document: MsBuildDocument,
    private readonly offset: number,
    options: VisitorOptions,
  ) {
    super(document, options);
  }

  protected override visitElement(element: XElement, parentSyntax: ElementSyntax | null): void {
    // only descend into elements that contain the offset
    if (this.offset < element.span.start || this.offset > element.span.end) return;
    super.visitElement(element, parentSyntax);
  }

  protected found(occurrence: Occurrence): void {
    if (spanTouchesOffset(occurrence.span, this.offset)) {
      this.result = occurrence;
    }
  }
}

export interface ResolvedSymbolAt {
  target: SymbolTarget;
  span: TextSpan;
  usage: SymbolUsage;
}

/** The symbol whose name touches `offset` (end inclusive), with the span of that name. */
export function resolveSymbolAt(
  document: MsBuildDocument,
  offset: number,
  options: VisitorOptions = {},
): ResolvedSymbolAt | null {
  const locator = new SymbolLocator(document, offset, options);
  locator.run();
  return locator.result;
}
