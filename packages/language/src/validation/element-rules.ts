/* =======================================================================================
 * Element rules
 * ---------------------------------------------------------------------------------------
 * One rule per element kind, looked up in a dispatch table. Kinds without special
 * checks have no entry. Rules run after the checks shared by every resolved element
 * (deprecation, required attributes).
 * ======================================================================================= */

import type { UnusedMetadataData, UnusedSymbolData } from "../diagnostics/catalog/symbols.js";
import type { XElement } from "../markup/xml-dom.js";
import type { ResolvedElement } from "../language/document-visitor.js";
import type { ElementKind } from "../syntax/language-syntax.js";
import { checkItemUsage, checkMetadataUsage, checkPropertyUsage, checkPropertyWrite, type ValidationContext } from "./context.js";
import { validateTaskParameters, validateUsingTask } from "./task-rules.js";

export type ElementRule = (ctx: ValidationContext, resolved: ResolvedElement) => void;

export const ELEMENT_RULES: Partial<Record<ElementKind, ElementRule>> = {
  Project: validateProjectHasTargets,
  OnError: validateOnErrorIsLast,
  Otherwise: validateOtherwiseIsLast,
  Output: validateOutputTarget,
  UsingTask: validateUsingTask,
  Import: validateImportVersions,
  Item: validateItem,
  Task: validateTaskParameters,
  Property: validateProperty,
  Metadata: validateMetadata,
};

function validateProjectHasTargets(ctx: ValidationContext, { element }: ResolvedElement): void {
  if (!ctx.document.isProject || element.hasAttribute("Sdk")) return;
  for (const child of element.elements()) {
    if (child.hasPrefix) continue;
    if (child.nameEquals("Target") || child.nameEquals("Import")) return;
  }
  ctx.diagnostics.emit("NoTargets", { span: element.nameSpan });
}

function validateOnErrorIsLast(ctx: ValidationContext, { element }: ResolvedElement): void {
  const next = element.nextSiblingElement();
  if (next && !next.nameEquals("OnError")) {
    ctx.diagnostics.emit("OnErrorMustBeLastInTarget", { span: next.nameSpan });
  }
}

function validateOtherwiseIsLast(ctx: ValidationContext, { element }: ResolvedElement): void {
  const next = element.nextSiblingElement();
  if (next) {
    ctx.diagnostics.emit("OtherwiseMustBeLastInChoose", { span: next.nameSpan });
  }
}

function validateOutputTarget(ctx: ValidationContext, { element }: ResolvedElement): void {
  if (!element.hasAttribute("ItemName") && !element.hasAttribute("PropertyName")) {
    ctx.diagnostics.emit("OutputMustHavePropertyOrItemName", { span: element.nameSpan });
  }
}

function validateImportVersions(ctx: ValidationContext, { element }: ResolvedElement): void {
  if (element.hasAttribute("Sdk")) return;
  for (const attribute of element.attributes) {
    if (attribute.nameEquals("Version")) {
      ctx.diagnostics.emit("ImportVersionRequiresSdk", { span: attribute.nameSpan });
    } else if (attribute.nameEquals("MinVersion") || attribute.nameEquals("MinimumVersion")) {
      ctx.diagnostics.emit("ImportMinVersionRequiresSdk", { span: attribute.nameSpan, args: [attribute.name] });
    }
  }
}

/** Items directly under an ItemGroup that is itself inside a Target. */
function isInTarget(element: XElement): boolean {
  return element.parent?.parent?.nameEquals("Target") ?? false;
}

function validateItem(ctx: ValidationContext, { element }: ResolvedElement): void {
  const { diagnostics } = ctx;
  const inTarget = isInTarget(element);
  let hasSource = false;

  for (const attribute of element.attributes) {
    if (attribute.nameEquals("Include") || attribute.nameEquals("Remove")) {
      hasSource = true;
    } else if (attribute.nameEquals("Update")) {
      hasSource = true;
      if (inTarget) {
        diagnostics.emit("ItemAttributeNotValidInTarget", { span: attribute.nameSpan, args: [attribute.name] });
      }
    } else if (
      attribute.nameEquals("KeepMetadata") ||
      attribute.nameEquals("RemoveMetadata") ||
      attribute.nameEquals("KeepDuplicates")
    ) {
      if (!inTarget) {
        diagnostics.emit("ItemAttributeOnlyValidInTarget", { span: attribute.nameSpan, args: [attribute.name] });
      }
    }
  }

  if (!hasSource && !inTarget) {
    diagnostics.emit("ItemMustHaveInclude", { span: element.nameSpan });
  }

  if (!checkItemUsage(ctx, element.name, "read").used) {
    const data: UnusedSymbolData = { name: element.name, spans: element.nameSpans() };
    diagnostics.emit("UnreadItem", { span: element.nameSpan, args: [element.name], data });
  }
}

function validateProperty(ctx: ValidationContext, { element, symbol }: ResolvedElement): void {
  if (!checkPropertyUsage(ctx, element.name, "read").used) {
    const data: UnusedSymbolData = { name: element.name, spans: element.nameSpans() };
    ctx.diagnostics.emit("UnreadProperty", { span: element.nameSpan, args: [element.name], data });
  }
  if (symbol.kind === "property") {
    checkPropertyWrite(ctx, symbol, element.nameSpan);
  }
}

function validateMetadata(ctx: ValidationContext, { element }: ResolvedElement): void {
  const itemName = element.parent?.name;
  if (itemName === undefined) return;
  if (!checkMetadataUsage(ctx, itemName, element.name, "read").used) {
    const data: UnusedMetadataData = { itemName, name: element.name, spans: element.nameSpans() };
    ctx.diagnostics.emit("UnreadMetadata", { span: element.nameSpan, args: [itemName, element.name], data });
  }
}

