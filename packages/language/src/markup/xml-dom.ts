/* =======================================================================================
 * Markup tree
 * ---------------------------------------------------------------------------------------
 * Element/attribute/text nodes with offset spans. Attribute values and text are kept
 * exactly as written (still escaped) so every span maps one-to-one onto the source.
 * ======================================================================================= */

import type { TextSpan } from "../model/span.js";

export type XNode = XElement | XText;

export class XAttribute {
  readonly kind = "attribute";

  constructor(
    readonly parent: XElement,
    readonly name: string,
    readonly nameSpan: TextSpan,
    /** Raw attribute value, null when the attribute has no `=value` part. */
    readonly value: string | null,
    /** Span of the value between the quotes. */
    readonly valueSpan: TextSpan | null,
    readonly span: TextSpan,
  ) {}

  nameEquals(name: string): boolean {
    return this.name.toLowerCase() === name.toLowerCase();
  }
}

export class XText {
  readonly kind = "text";

  constructor(
    readonly parent: XElement | null,
    readonly text: string,
    readonly span: TextSpan,
  ) {}

  get isWhitespace(): boolean {
    return this.text.trim().length === 0;
  }
}

export class XElement {
  readonly kind = "element";
  readonly attributes: XAttribute[] = [];
  readonly children: XNode[] = [];
  /** Whole element, from `<` to the end of the closing tag (or of the start tag when self-closing). */
  span: TextSpan;
  /** Content between the start tag and the closing tag; null for self-closing elements. */
  contentSpan: TextSpan | null = null;
  closingNameSpan: TextSpan | null = null;
  isSelfClosing = false;
  /** False when the start tag or the element itself was never closed. */
  isComplete = false;

  constructor(
    readonly parent: XElement | null,
    readonly name: string,
    readonly nameSpan: TextSpan,
  ) {
    this.span = { start: nameSpan.start - 1, end: nameSpan.end };
  }

  get hasPrefix(): boolean {
    return this.name.includes(":");
  }

  nameEquals(name: string): boolean {
    return this.name.toLowerCase() === name.toLowerCase();
  }

  getAttribute(name: string): XAttribute | null {
    const lower = name.toLowerCase();
    return this.attributes.find((a) => a.name.toLowerCase() === lower) ?? null;
  }

  hasAttribute(name: string): boolean {
    return this.getAttribute(name) !== null;
  }

  *elements(): Iterable<XElement> {
    for (const child of this.children) {
      if (child.kind === "element") yield child;
    }
  }

  get hasElementChildren(): boolean {
    return this.children.some((c) => c.kind === "element");
  }

  nextSiblingElement(): XElement | null {
    const siblings = this.parent?.children;
    if (!siblings) return null;
    const index = siblings.indexOf(this);
    for (let i = index + 1; i < siblings.length; i++) {
      const sibling = siblings[i];
      if (sibling?.kind === "element") return sibling;
    }
    return null;
  }

  /** Name spans of the start tag and, when present, the closing tag. */
  nameSpans(): TextSpan[] {
    return this.closingNameSpan ? [this.nameSpan, this.closingNameSpan] : [this.nameSpan];
  }
}

export interface MarkupIssue {
  message: string;
  span: TextSpan;
}

export class XDocument {
  constructor(
    readonly text: string,
    readonly nodes: readonly XNode[],
    readonly issues: readonly MarkupIssue[],
  ) {}

  get rootElements(): XElement[] {
    return this.nodes.filter((n): n is XElement => n.kind === "element");
  }

  /** The first top-level element named Project, if any. */
  get projectElement(): XElement | null {
    return this.rootElements.find((e) => e.nameEquals("Project")) ?? null;
  }
}
