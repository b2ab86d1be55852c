/* =======================================================================================
 * Expression parser
 * ---------------------------------------------------------------------------------------
 * Recursive descent over the raw (escaped) value text:
 *
 *   Expr        := Segment*            (split on list separators when lists are enabled)
 *   Segment     := Text | PropertyRef | ItemRef | MetadataRef
 *   PropertyRef := '$(' (Ident | '[' Type ']::' Call) ('.' Call)* ')'
 *   ItemRef     := '@(' Ident ('->' (Quoted | Call))* (',' Quoted)? ')'
 *   MetadataRef := '%(' (Ident '.')? Ident ')'
 *   Call        := Ident ('(' (Arg (',' Arg)*)? ')')?
 *
 * A malformed reference becomes an `error` node and scanning resumes right after the
 * failure point, so callers always get a usable tree.
 * ======================================================================================= */

import type { TextSpan } from "../model/span.js";
import {
  DEFAULT_EXPRESSION_OPTIONS,
  type ExprCall,
  type ExprError,
  type ExprItem,
  type ExprMetadata,
  type ExprProperty,
  type ExprQuoted,
  type ExpressionErrorKind,
  type ExpressionNode,
  type ExpressionOptions,
} from "./expression-ast.js";

/**
 * Parse a value into an expression tree.
 *
 * @param text - raw attribute value or element content
 * @param baseOffset - document offset of `text[0]`
 */
export function parseExpression(
  text: string,
  baseOffset = 0,
  options: Partial<ExpressionOptions> = {},
): ExpressionNode {
  const parser = new ExpressionParser(text, baseOffset, { ...DEFAULT_EXPRESSION_OPTIONS, ...options });
  return parser.parse();
}

class ExpressionParseFailure extends Error {
  constructor(
    readonly errorKind: ExpressionErrorKind,
    readonly at: number,
  ) {
    super(errorKind);
    this.name = "ExpressionParseFailure";
  }
}

const QUOTES = new Set(["'", "\"", "`"]);
const IDENT_START = /[A-Za-z_]/;
const IDENT_PART = /[A-Za-z0-9_-]/;

class ExpressionParser {
  private pos = 0;
  private transformDepth = 0;

  constructor(
    private readonly text: string,
    private readonly base: number,
    private readonly options: ExpressionOptions,
  ) {}

  parse(): ExpressionNode {
    const members: ExpressionNode[] = [];
    for (;;) {
      const memberStart = this.pos;
      const parts = this.parseSegments(null, true);
      members.push(this.combine(parts, memberStart, this.pos));
      if (this.pos >= this.text.length) break;
      this.pos++; // list separator
    }
    const [only] = members;
    if (members.length === 1 && only) return only;
    return { kind: "list", nodes: members, span: this.span(0, this.text.length) };
  }

  // ===========================================================================
  // Segments
  // ===========================================================================

  private parseSegments(stopQuote: string | null, splitLists: boolean): ExpressionNode[] {
    const parts: ExpressionNode[] = [];
    let textStart = this.pos;

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (stopQuote !== null && ch === stopQuote) break;
      if (splitLists && this.isListSeparator(ch)) break;
      if ((ch === "$" || ch === "@" || ch === "%") && this.text[this.pos + 1] === "(") {
        if (this.pos > textStart) parts.push(this.textNode(textStart, this.pos));
        parts.push(this.parseReference());
        textStart = this.pos;
        continue;
      }
      this.pos++;
    }

    if (this.pos > textStart) parts.push(this.textNode(textStart, this.pos));
    return parts;
  }

  private parseReference(): ExpressionNode {
    const start = this.pos;
    const sigil = this.text[start];
    try {
      if (sigil === "$") return this.parseProperty();
      if (sigil === "@") {
        const item = this.parseItem();
        return this.options.items ? item : this.errorNode("ItemsDisallowed", start, start);
      }
      const metadata = this.parseMetadata();
      const allowed = this.options.metadata || this.transformDepth > 0;
      return allowed ? metadata : this.errorNode("MetadataDisallowed", start, start);
    } catch (e) {
      if (!(e instanceof ExpressionParseFailure)) throw e;
      this.pos = Math.max(e.at, start + 1);
      return this.errorNode(e.errorKind, start, e.at);
    }
  }

  // ===========================================================================
  // References
  // ===========================================================================

  private parseProperty(): ExprProperty {
    const start = this.pos;
    this.pos += 2; // '$('
    this.skipWhitespace();

    let name = "";
    let nameSpan = this.span(this.pos, this.pos);
    let staticType: ExprProperty["staticType"] = null;
    const calls: ExprCall[] = [];

    if (this.text[this.pos] === "[") {
      const typeStart = this.pos + 1;
      const close = this.text.indexOf("]", typeStart);
      if (close < 0) this.fail("ExpectingRightBracket", this.text.length);
      staticType = { name: this.text.slice(typeStart, close), span: this.span(typeStart, close) };
      this.pos = close + 1;
      if (!this.text.startsWith("::", this.pos)) this.fail("ExpectingMethodName", this.pos);
      this.pos += 2;
      calls.push(this.parseCall());
    } else {
      const nameStart = this.pos;
      name = this.readIdentifier();
      if (!name) this.fail("ExpectingIdentifier", this.pos);
      nameSpan = this.span(nameStart, this.pos);
    }

    for (;;) {
      this.skipWhitespace();
      const ch = this.text[this.pos];
      if (ch === ")") {
        this.pos++;
        return { kind: "property", name, nameSpan, staticType, calls, span: this.span(start, this.pos) };
      }
      if (ch === ".") {
        this.pos++;
        calls.push(this.parseCall());
        continue;
      }
      this.expectClose(ch);
    }
  }

  private parseItem(): ExprItem {
    const start = this.pos;
    this.pos += 2; // '@('
    this.skipWhitespace();
    const nameStart = this.pos;
    const name = this.readIdentifier();
    if (!name) this.fail("ExpectingIdentifier", this.pos);
    const nameSpan = this.span(nameStart, this.pos);

    const transforms: ExprItem["transforms"] = [];
    let separator: ExprQuoted | null = null;

    for (;;) {
      this.skipWhitespace();
      if (this.text.startsWith("->", this.pos) && separator === null) {
        if (!this.options.transforms) this.fail("ExpectingRightParen", this.pos);
        this.pos += 2;
        this.skipWhitespace();
        if (QUOTES.has(this.text[this.pos] ?? "")) {
          this.transformDepth++;
          try {
            transforms.push(this.parseQuoted());
          } finally {
            this.transformDepth--;
          }
        } else {
          transforms.push(this.parseCall());
        }
        continue;
      }
      const ch = this.text[this.pos];
      if (ch === "," && separator === null) {
        this.pos++;
        this.skipWhitespace();
        if (!QUOTES.has(this.text[this.pos] ?? "")) this.fail("ExpectingApostrophe", this.pos);
        separator = this.parseQuoted();
        continue;
      }
      if (ch === ")") {
        this.pos++;
        return { kind: "item", name, nameSpan, transforms, separator, span: this.span(start, this.pos) };
      }
      this.expectClose(ch);
    }
  }

  private parseMetadata(): ExprMetadata {
    const start = this.pos;
    this.pos += 2; // '%('
    this.skipWhitespace();
    const firstStart = this.pos;
    const first = this.readIdentifier();
    if (!first) this.fail("ExpectingIdentifier", this.pos);
    const firstSpan = this.span(firstStart, this.pos);

    let itemName: string | null = null;
    let itemNameSpan: TextSpan | null = null;
    let name = first;
    let nameSpan = firstSpan;

    if (this.text[this.pos] === ".") {
      this.pos++;
      const secondStart = this.pos;
      const second = this.readIdentifier();
      if (!second) this.fail("ExpectingIdentifier", this.pos);
      itemName = first;
      itemNameSpan = firstSpan;
      name = second;
      nameSpan = this.span(secondStart, this.pos);
    }

    this.skipWhitespace();
    const ch = this.text[this.pos];
    if (ch !== ")") this.expectClose(ch);
    this.pos++;
    return { kind: "metadata", itemName, itemNameSpan, name, nameSpan, span: this.span(start, this.pos) };
  }

  // ===========================================================================
  // Calls, arguments, quoted strings
  // ===========================================================================

  private parseCall(): ExprCall {
    const nameStart = this.pos;
    const name = this.readIdentifier();
    if (!name) this.fail("ExpectingMethodName", this.pos);
    const nameSpan = this.span(nameStart, this.pos);
    const args = this.text[this.pos] === "(" ? this.parseArguments() : null;
    return { kind: "call", name, nameSpan, args, span: this.span(nameStart, this.pos) };
  }

  private parseArguments(): ExpressionNode[] {
    this.pos++; // '('
    const args: ExpressionNode[] = [];
    this.skipWhitespace();
    if (this.text[this.pos] === ")") {
      this.pos++;
      return args;
    }
    for (;;) {
      this.skipWhitespace();
      args.push(this.parseArgument());
      this.skipWhitespace();
      const ch = this.text[this.pos];
      if (ch === ",") {
        this.pos++;
        continue;
      }
      if (ch === ")") {
        this.pos++;
        return args;
      }
      this.expectClose(ch);
    }
  }

  private parseArgument(): ExpressionNode {
    const ch = this.text[this.pos];
    if (ch !== undefined && QUOTES.has(ch)) return this.parseQuoted();
    if ((ch === "$" || ch === "@" || ch === "%") && this.text[this.pos + 1] === "(") {
      return this.parseReference();
    }

    const start = this.pos;
    let depth = 0;
    while (this.pos < this.text.length) {
      const c = this.text[this.pos];
      if (c === "(") depth++;
      else if (c === ")") {
        if (depth === 0) break;
        depth--;
      } else if (c === "," && depth === 0) break;
      this.pos++;
    }
    if (this.pos === start) this.fail("ExpectingValue", this.pos);
    return this.textNode(start, this.pos);
  }

  private parseQuoted(): ExprQuoted {
    const start = this.pos;
    const quote = this.text[this.pos] ?? "'";
    this.pos++;
    const innerStart = this.pos;
    const parts = this.parseSegments(quote, false);
    if (this.text[this.pos] !== quote) this.fail("ExpectingApostrophe", this.pos);
    const expression = this.combine(parts, innerStart, this.pos);
    this.pos++;
    return { kind: "quoted", quote, expression, span: this.span(start, this.pos) };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private expectClose(ch: string | undefined): never {
    this.fail(ch === undefined ? "IncompleteReference" : "ExpectingRightParen", this.pos);
  }

  private fail(kind: ExpressionErrorKind, at: number): never {
    throw new ExpressionParseFailure(kind, at);
  }

  private readIdentifier(): string {
    const start = this.pos;
    if (!IDENT_START.test(this.text[this.pos] ?? "")) return "";
    this.pos++;
    while (this.pos < this.text.length && IDENT_PART.test(this.text[this.pos] ?? "")) {
      // `->` starts a transform
      if (this.text[this.pos] === "-" && this.text[this.pos + 1] === ">") break;
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos] ?? "")) {
      this.pos++;
    }
  }

  private isListSeparator(ch: string | undefined): boolean {
    switch (this.options.lists) {
      case "semicolon":
        return ch === ";";
      case "semicolon-or-comma":
        return ch === ";" || ch === ",";
      default:
        return false;
    }
  }

  private combine(parts: ExpressionNode[], start: number, end: number): ExpressionNode {
    const [first] = parts;
    if (parts.length === 1 && first) return first;
    if (parts.length === 0) return this.textNode(start, end);
    return { kind: "concat", parts, span: this.span(start, end) };
  }

  private textNode(start: number, end: number): ExpressionNode {
    return { kind: "text", value: this.text.slice(start, end), span: this.span(start, end) };
  }

  private errorNode(errorKind: ExpressionErrorKind, start: number, at: number): ExprError {
    return { kind: "error", errorKind, span: this.span(start, this.pos), at: this.base + at };
  }

  private span(start: number, end: number): TextSpan {
    return { start: this.base + start, end: this.base + end };
  }
}
