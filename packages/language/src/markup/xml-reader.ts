/**
 * Error-tolerant markup reader.
 *
 * saxes tokenizes the input and reports well-formedness errors, which become issues.
 * Spans are recovered from the source text at each event, and attribute values and
 * text are sliced out of the source still escaped. Nesting follows the tokenizer: a
 * closing tag pops open elements until it meets its own name, and every element popped
 * on the way (or still open at the end of the input) is marked incomplete.
 *
 * Comments, processing instructions and doctype declarations are skipped. CDATA
 * sections become text nodes covering their content.
 */

import { SaxesParser } from "saxes";
import type { TextSpan } from "../model/span.js";
import { XAttribute, XDocument, XElement, XText, type MarkupIssue, type XNode } from "./xml-dom.js";

export function parseXml(text: string): XDocument {
  return new XmlTreeBuilder(text).build();
}

const NAME_TERMINATOR = /[\s/>=<"']/;
const SAXES_POSITION_PREFIX = /^\d+:\d+: /;

class XmlTreeBuilder {
  private readonly parser = new SaxesParser({ xmlns: false, position: true });
  private readonly roots: XNode[] = [];
  private readonly stack: XElement[] = [];
  private readonly issues: MarkupIssue[] = [];
  /** End of the last markup construct; text runs from here to the next one. */
  private cursor = 0;
  /** Element whose start tag has been opened but not yet terminated. */
  private pending: XElement | null = null;
  private attributeCursor = 0;
  /** The closing tag being processed; one tag can pop several elements. */
  private closing: { start: number; end: number; name: string; nameSpan: TextSpan } | null = null;

  constructor(private readonly text: string) {}

  build(): XDocument {
    const { parser } = this;

    parser.on("error", (error) => {
      const at = Math.min(parser.position, this.text.length);
      this.issues.push({
        message: error.message.replace(SAXES_POSITION_PREFIX, ""),
        span: { start: Math.max(0, at - 1), end: at },
      });
    });
    parser.on("opentagstart", (tag) => this.openTagStart(tag.name));
    parser.on("attribute", (attribute) => this.attribute(attribute.name));
    parser.on("opentag", (tag) => this.openTag(tag.isSelfClosing));
    parser.on("closetag", (tag) => {
      if (!tag.isSelfClosing) this.closeTag();
    });
    parser.on("cdata", () => this.cdata());
    parser.on("comment", () => this.skip("<!--"));
    parser.on("processinginstruction", () => this.skip("<?"));
    parser.on("xmldecl", () => this.skip("<?"));
    parser.on("doctype", () => this.skip("<!"));

    parser.write(this.text).close();
    this.finish();

    return new XDocument(this.text, this.roots, this.issues);
  }

  // ===========================================================================
  // Events
  // ===========================================================================

  private openTagStart(name: string): void {
    const start = this.constructStart(`<${name}`);
    this.settlePending(start);
    this.flushText(start);
    const element = new XElement(this.current, name, { start: start + 1, end: start + 1 + name.length });
    this.append(element);
    this.pending = element;
    this.attributeCursor = element.nameSpan.end;
  }

  private attribute(name: string): void {
    const element = this.pending;
    if (!element) return;
    const nameStart = this.text.indexOf(name, this.attributeCursor);
    if (nameStart < 0) return;
    const nameSpan = { start: nameStart, end: nameStart + name.length };

    let pos = this.skipWhitespace(nameSpan.end);
    if (this.text[pos] !== "=") {
      element.attributes.push(new XAttribute(element, name, nameSpan, null, null, nameSpan));
      this.attributeCursor = nameSpan.end;
      return;
    }
    pos = this.skipWhitespace(pos + 1);

    const quote = this.text[pos];
    let valueSpan: TextSpan;
    let end: number;
    if (quote === "\"" || quote === "'") {
      const close = this.text.indexOf(quote, pos + 1);
      valueSpan = { start: pos + 1, end: close >= 0 ? close : this.text.length };
      end = close >= 0 ? close + 1 : this.text.length;
    } else {
      let valueEnd = pos;
      while (valueEnd < this.text.length && !/[\s>]/.test(this.text[valueEnd] ?? "") && !this.text.startsWith("/>", valueEnd)) {
        valueEnd++;
      }
      valueSpan = { start: pos, end: valueEnd };
      end = valueEnd;
    }

    const value = this.text.slice(valueSpan.start, valueSpan.end);
    element.attributes.push(new XAttribute(element, name, nameSpan, value, valueSpan, { start: nameStart, end }));
    this.attributeCursor = end;
  }

  private openTag(isSelfClosing: boolean): void {
    const element = this.pending;
    if (!element) return;
    this.pending = null;
    const end = this.parser.position;
    element.span = { start: element.span.start, end };
    this.cursor = end;
    if (isSelfClosing) {
      element.isSelfClosing = true;
      element.isComplete = true;
      return;
    }
    element.contentSpan = { start: end, end };
    this.stack.push(element);
  }

  private closeTag(): void {
    const end = this.parser.position;
    let closing = this.closing;
    if (!closing || closing.end !== end) {
      const start = this.constructStart("</");
      this.settlePending(start);
      this.flushText(start);
      this.cursor = end;
      const nameStart = start + 2;
      let nameEnd = nameStart;
      while (nameEnd < end && !NAME_TERMINATOR.test(this.text[nameEnd] ?? "")) nameEnd++;
      closing = { start, end, name: this.text.slice(nameStart, nameEnd), nameSpan: { start: nameStart, end: nameEnd } };
      this.closing = closing;
    }

    const element = this.stack.pop();
    if (!element) return;
    if (element.name !== closing.name) {
      // opened inside the closed element and never closed itself
      this.close(element, closing.start);
      return;
    }
    element.span = { start: element.span.start, end };
    if (element.contentSpan) element.contentSpan = { start: element.contentSpan.start, end: closing.start };
    element.closingNameSpan = closing.nameSpan;
    element.isComplete = true;
  }

  private cdata(): void {
    const end = this.parser.position;
    const start = this.constructStart("<![CDATA[");
    this.settlePending(start);
    this.flushText(start);
    const contentStart = start + "<![CDATA[".length;
    const contentEnd = Math.max(contentStart, end - "]]>".length);
    this.append(new XText(this.current, this.text.slice(contentStart, contentEnd), { start: contentStart, end: contentEnd }));
    this.cursor = end;
  }

  private skip(opener: string): void {
    const start = this.constructStart(opener);
    this.settlePending(start);
    this.flushText(start);
    this.cursor = this.parser.position;
  }

  private finish(): void {
    this.settlePending(this.text.length);
    this.flushText(this.text.length);
    // anything still open was never closed
    while (this.stack.length > 0) {
      const open = this.stack.pop();
      if (open) this.close(open, this.text.length);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private get current(): XElement | null {
    return this.stack[this.stack.length - 1] ?? null;
  }

  private append(node: XNode): void {
    const parent = this.current;
    if (parent) {
      parent.children.push(node);
    } else {
      this.roots.push(node);
    }
  }

  /** Start of the construct the tokenizer just finished (or is inside of). */
  private constructStart(opener: string): number {
    const found = this.text.lastIndexOf(opener, this.parser.position);
    return found >= this.cursor ? found : this.cursor;
  }

  private flushText(end: number): void {
    if (end > this.cursor) {
      this.append(new XText(this.current, this.text.slice(this.cursor, end), { start: this.cursor, end }));
      this.cursor = end;
    }
  }

  /** A start tag that was never terminated ends where the next construct begins. */
  private settlePending(end: number): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.span = { start: pending.span.start, end };
    this.cursor = Math.max(this.cursor, end);
  }

  private close(element: XElement, end: number): void {
    element.span = { start: element.span.start, end };
    if (element.contentSpan) element.contentSpan = { start: element.contentSpan.start, end };
  }

  private skipWhitespace(pos: number): number {
    let next = pos;
    while (next < this.text.length && /\s/.test(this.text[next] ?? "")) next++;
    return next;
  }
}
