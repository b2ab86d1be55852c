/* =======================================================================================
 * Document validator
 * ---------------------------------------------------------------------------------------
 * Second pass over a document (after inference). Walks the tree depth-first, reports
 * unknown elements and attributes, dispatches each resolved element to its rule, and
 * validates every value.
 *
 * Fault containment: a failure while validating one element becomes an InternalError
 * on that element's name and the walk continues. Cancellation is not contained.
 * ======================================================================================= */

import { coreDiagnostics } from "../diagnostics/catalog/index.js";
import { createDiagnosticEmitter, DiagnosticSink } from "../diagnostics/emitter.js";
import type { MsBuildDiagnostic } from "../diagnostics/types.js";
import type { XAttribute, XElement } from "../markup/xml-dom.js";
import {
  DocumentVisitor,
  type ResolvedAttribute,
  type ResolvedElement,
  type VisitedValue,
  type VisitorOptions,
} from "../language/document-visitor.js";
import type { MsBuildDocument } from "../language/document.js";
import { errorMessage, runContained } from "../shared/node-result.js";
import { formatError } from "../shared/logger.js";
import type { UnusedMetadataData } from "../diagnostics/catalog/symbols.js";
import { checkDeprecated, checkMetadataUsage, type ValidationContext } from "./context.js";
import { ELEMENT_RULES } from "./element-rules.js";
import { validateValue } from "./value-rules.js";

export interface ValidationOptions extends VisitorOptions {
  /** Sink to append to; a new one is created when omitted. */
  sink?: DiagnosticSink;
}

/**
 * Validate a document produced by `createDocument`.
 *
 * @throws CancellationError when the token is cancelled
 */
export function validateDocument(document: MsBuildDocument, options: ValidationOptions = {}): readonly MsBuildDiagnostic[] {
  const sink = options.sink ?? new DiagnosticSink(document.text.length);
  new DocumentValidator(document, sink, options).run();
  return sink.diagnostics;
}

export class DocumentValidator extends DocumentVisitor {
  private readonly ctx: ValidationContext;

  constructor(document: MsBuildDocument, sink: DiagnosticSink, options: VisitorOptions = {}) {
    super(document, options);
    this.ctx = {
      document,
      diagnostics: createDiagnosticEmitter(coreDiagnostics, sink),
      logger: this.logger,
    };
  }

  override run(): void {
    for (const issue of this.document.xml.issues) {
      this.ctx.diagnostics.emit("MalformedMarkup", { span: issue.span, args: [issue.message] });
    }
    if (!this.document.xml.projectElement) {
      this.ctx.diagnostics.emit("MissingProjectElement", { span: { start: 0, end: 0 } });
    }
    super.run();
  }

  protected override visitUnknownElement(element: XElement): void {
    this.ctx.diagnostics.emit("UnknownElement", { span: element.span, args: [element.name] });
    super.visitUnknownElement(element);
  }

  protected override visitUnknownAttribute(_element: XElement, attribute: XAttribute): void {
    this.ctx.diagnostics.emit("UnknownAttribute", { span: attribute.span, args: [attribute.name] });
  }

  protected override visitResolvedElement(resolved: ResolvedElement): void {
    const { element, syntax } = resolved;
    const result = runContained(() => {
      this.validateResolvedElement(resolved);
      if (element.isComplete && syntax.syntaxKind !== "TaskBody" && syntax.syntaxKind !== "ProjectExtensions") {
        super.visitResolvedElement(resolved);
      }
    });
    if (!result.ok) {
      this.ctx.diagnostics.emit("InternalError", { span: element.nameSpan, args: [errorMessage(result.error)] });
      this.logger.error(`[validator] failed for element '${element.name}': ${formatError(result.error)}`);
    }
  }

  private validateResolvedElement(resolved: ResolvedElement): void {
    const { element, syntax, symbol } = resolved;
    const { diagnostics } = this.ctx;

    checkDeprecated(this.ctx, syntax, element.nameSpan);
    if (symbol !== syntax) checkDeprecated(this.ctx, symbol, element.nameSpan);

    for (const attribute of syntax.attributes) {
      if (attribute.required && !attribute.isAbstract && !element.hasAttribute(attribute.name)) {
        diagnostics.emit("MissingRequiredAttribute", { span: element.nameSpan, args: [element.name, attribute.name] });
      }
    }

    ELEMENT_RULES[syntax.syntaxKind]?.(this.ctx, resolved);

    if (syntax.valueKind.tag === "Nothing") {
      for (const child of element.children) {
        if (child.kind === "text" && !child.isWhitespace) {
          diagnostics.emit("UnexpectedText", { span: child.span, args: [element.name] });
        }
      }
    }
  }

  protected override visitResolvedAttribute(resolved: ResolvedAttribute): void {
    const { element, attribute, syntax, symbol } = resolved;
    const { diagnostics } = this.ctx;

    if (syntax.syntaxKind === "Item_Metadata" && !checkMetadataUsage(this.ctx, element.name, attribute.name, "read").used) {
      const data: UnusedMetadataData = { itemName: element.name, name: attribute.name, spans: [attribute.nameSpan] };
      diagnostics.emit("UnreadMetadata", { span: attribute.nameSpan, args: [element.name, attribute.name], data });
    }

    checkDeprecated(this.ctx, syntax, attribute.nameSpan);
    if (symbol !== syntax) checkDeprecated(this.ctx, symbol, attribute.nameSpan);

    if (attribute.value === null || attribute.value.trim().length === 0) {
      diagnostics.emit(syntax.required ? "RequiredAttributeEmpty" : "AttributeEmpty", {
        span: attribute.nameSpan,
        args: [attribute.name],
      });
      return;
    }

    super.visitResolvedAttribute(resolved);
  }

  protected override visitValue(value: VisitedValue): void {
    validateValue(this.ctx, value);
  }
}
