/* =======================================================================================
 * Document visitor
 * ---------------------------------------------------------------------------------------
 * Depth-first walk over the markup tree that resolves every element and attribute
 * against the language syntax and the document's schemas, and parses every value as a
 * macro expression. Passes (inference, validation, analyzers, references) subclass it
 * and override the hooks they need.
 *
 * Cancellation is polled before each element.
 * ======================================================================================= */

import type { XAttribute, XElement, XText } from "../markup/xml-dom.js";
import type { ExpressionNode } from "../parsing/expression-ast.js";
import { parseExpression } from "../parsing/expression-parser.js";
import { expressionOptionsFor } from "../schema/value-kind.js";
import { NEVER_CANCELLED, throwIfCancelled, type CancellationToken } from "../shared/cancellation.js";
import { NOOP_LOGGER, type Logger } from "../shared/logger.js";
import type { AttributeSyntax, ElementSyntax } from "../syntax/language-syntax.js";
import type { MsBuildDocument } from "./document.js";
import { resolveAttributeSymbol, resolveElementSymbol, type ResolvedSymbol } from "./symbol-resolution.js";

export interface VisitorOptions {
  token?: CancellationToken;
  logger?: Logger;
}

export interface ResolvedElement {
  element: XElement;
  syntax: ElementSyntax;
  symbol: ResolvedSymbol;
}

export interface ResolvedAttribute {
  element: XElement;
  attribute: XAttribute;
  elementSyntax: ElementSyntax;
  syntax: AttributeSyntax;
  elementSymbol: ResolvedSymbol;
  symbol: ResolvedSymbol;
}

export interface VisitedValue {
  element: XElement;
  /** Null for element text values. */
  attribute: XAttribute | null;
  elementSyntax: ElementSyntax;
  attributeSyntax: AttributeSyntax | null;
  /** The symbol that governs the value: the attribute's if any, else the element's. */
  symbol: ResolvedSymbol;
  /** Raw (escaped) text. */
  text: string;
  /** Document offset of `text[0]`. */
  offset: number;
  expression: ExpressionNode;
}

export abstract class DocumentVisitor {
  protected readonly token: CancellationToken;
  protected readonly logger: Logger;

  constructor(
    protected readonly document: MsBuildDocument,
    options: VisitorOptions = {},
  ) {
    this.token = options.token ?? NEVER_CANCELLED;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  run(): void {
    for (const node of this.document.xml.nodes) {
      if (node.kind === "element") this.visitElement(node, null);
    }
  }

  protected visitElement(element: XElement, parentSyntax: ElementSyntax | null): void {
    throwIfCancelled(this.token);
    const syntax = this.document.syntax.resolveElement(element, parentSyntax);
    if (!syntax) {
      this.visitUnknownElement(element);
      return;
    }
    const symbol = resolveElementSymbol(this.document.schemas, element, syntax);
    this.visitResolvedElement({ element, syntax, symbol });
  }

  protected visitUnknownElement(element: XElement): void {
    for (const child of element.elements()) {
      throwIfCancelled(this.token);
      this.visitUnknownElement(child);
    }
  }

  /** Visits attributes, then the text value, then child elements. */
  protected visitResolvedElement(resolved: ResolvedElement): void {
    const { element, syntax, symbol } = resolved;

    for (const attribute of element.attributes) {
      const attributeSyntax = this.document.syntax.resolveAttribute(attribute, syntax);
      if (!attributeSyntax) {
        this.visitUnknownAttribute(element, attribute);
        continue;
      }
      this.visitResolvedAttribute({
        element,
        attribute,
        elementSyntax: syntax,
        syntax: attributeSyntax,
        elementSymbol: symbol,
        symbol: resolveAttributeSymbol(this.document.schemas, attribute, attributeSyntax, symbol),
      });
    }

    if (syntax.valueKind.tag !== "Nothing") {
      for (const text of elementValues(element)) {
        this.visitValue(this.createValue(element, null, syntax, null, symbol, text.text, text.span.start));
      }
    }

    for (const child of element.elements()) {
      this.visitElement(child, syntax);
    }
  }

  protected visitUnknownAttribute(_element: XElement, _attribute: XAttribute): void {}

  protected visitResolvedAttribute(resolved: ResolvedAttribute): void {
    const { attribute } = resolved;
    if (attribute.value === null || attribute.valueSpan === null || attribute.value.trim().length === 0) return;
    this.visitValue(
      this.createValue(
        resolved.element,
        attribute,
        resolved.elementSyntax,
        resolved.syntax,
        resolved.symbol,
        attribute.value,
        attribute.valueSpan.start,
      ),
    );
  }

  protected visitValue(_value: VisitedValue): void {}

  private createValue(
    element: XElement,
    attribute: XAttribute | null,
    elementSyntax: ElementSyntax,
    attributeSyntax: AttributeSyntax | null,
    symbol: ResolvedSymbol,
    text: string,
    offset: number,
  ): VisitedValue {
    return {
      element,
      attribute,
      elementSyntax,
      attributeSyntax,
      symbol,
      text,
      offset,
      expression: parseExpression(text, offset, expressionOptionsFor(symbol.valueKind)),
    };
  }
}

/**
 * The text value of an element: its non-whitespace text children, provided the element
 * has no child elements. Comments split a value into several parts.
 */
export function elementValues(element: XElement): XText[] {
  if (element.hasElementChildren) return [];
  return element.children.filter((child): child is XText => child.kind === "text" && !child.isWhitespace);
}

/** The item name unqualified metadata refers to outside a transform, if any. */
export function enclosingItemName(element: XElement, syntax: ElementSyntax): string | null {
  switch (syntax.syntaxKind) {
    case "Item":
    case "ItemDefinition":
      return element.name;
    case "Metadata":
      return element.parent?.name ?? null;
    default:
      return null;
  }
}
