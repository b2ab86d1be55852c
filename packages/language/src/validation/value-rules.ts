/* =======================================================================================
 * Value rules
 * ---------------------------------------------------------------------------------------
 * Checks on every attribute and element value:
 * - redundant default values (project files only)
 * - shape: lists and expressions where the governing kind forbids them
 * - expression errors, unwritten references, deprecated references
 * - literal formats and known values for typed symbols
 * ======================================================================================= */

import {
  isKnownCulture,
  isKnownLcid,
  isValidCultureName,
  parseLcid,
} from "../cultures/culture-info.js";
import { EXPRESSION_ERROR_CODES, type UnexpectedShapeData } from "../diagnostics/catalog/expressions.js";
import type { NameData } from "../diagnostics/catalog/structure.js";
import type { DefaultValueData, UnusedMetadataData } from "../diagnostics/catalog/symbols.js";
import type { FixableValueData } from "../diagnostics/catalog/values.js";
import {
  areVersionsEquivalent,
  formatFrameworkVersion,
  isFrameworkProfileValid,
  isKnownFrameworkIdentifier,
  isKnownFrameworkVersion,
  validateFrameworkShortName,
} from "../frameworks/framework-info.js";
import { enclosingItemName, type VisitedValue } from "../language/document-visitor.js";
import { spanFromLength } from "../model/span.js";
import { listMembers, segments, walkExpression, type ExprText, type ExpressionNode } from "../parsing/expression-ast.js";
import { unescapeTrimmed } from "../parsing/escaping.js";
import { tryGetKnownValue } from "../schema/schema.js";
import { kindNoun, titleCaseKindNoun } from "../schema/symbols.js";
import { allowsExpressions, allowsLists, formatValueKind, type ValueKindTag } from "../schema/value-kind.js";
import { clrNameComponentCount } from "../values/clr-names.js";
import { isGuidFormat, isValidGuid, matchesGuidFormat } from "../values/guid.js";
import { isAbsoluteUrl, isValidBool, isValidInt64 } from "../values/scalars.js";
import { isValidNuGetVersion, isValidNuGetVersionRange, parseVersion } from "../values/versions.js";
import {
  checkDeprecated,
  checkItemUsage,
  checkMetadataUsage,
  checkPropertyUsage,
  checkPropertyWrite,
  EXTERNAL_ONLY,
  type ValidationContext,
} from "./context.js";

/** Kinds that describe untyped text; a `;` in them is never reported as a list. */
const UNTYPED_KINDS: ReadonlySet<ValueKindTag> = new Set(["Unknown", "Data", "Condition", "Nothing"]);

export function validateValue(ctx: ValidationContext, value: VisitedValue): void {
  const { symbol, expression } = value;

  checkDefaultValue(ctx, value);

  if (allowsLists(symbol.valueKind)) {
    for (const member of listMembers(expression)) {
      if (member.kind === "text") validateLiteral(ctx, value, member);
    }
  } else {
    const separator = UNTYPED_KINDS.has(symbol.valueKind.tag) ? null : findListSeparator(expression);
    if (separator !== null) {
      const data: UnexpectedShapeData = { name: symbol.name };
      ctx.diagnostics.emit("UnexpectedList", {
        span: { start: separator, end: expression.span.end },
        args: [kindNoun(symbol), symbol.name],
        data,
      });
    } else if (expression.kind === "text") {
      validateLiteral(ctx, value, expression);
    }
  }

  if (!allowsExpressions(symbol.valueKind)) {
    const nonText = listMembers(expression).flatMap(segments).find((node) => node.kind !== "text");
    if (nonText) {
      ctx.diagnostics.emit("UnexpectedExpression", {
        span: nonText.span,
        args: [kindNoun(symbol), symbol.name],
      });
    }
  }

  validateReferences(ctx, value);
}

function checkDefaultValue(ctx: ValidationContext, { symbol, text, attribute, element }: VisitedValue): void {
  if (!ctx.document.isProject || symbol.defaultValue === undefined) return;
  if (symbol.defaultValue.toLowerCase() !== text.toLowerCase()) return;
  const data: DefaultValueData = { symbolKind: kindNoun(symbol), name: symbol.name, defaultValue: symbol.defaultValue };
  ctx.diagnostics.emit("HasDefaultValue", {
    span: attribute?.span ?? element.span,
    args: [titleCaseKindNoun(symbol), symbol.name, symbol.defaultValue],
    data,
  });
}

/** Offset of the first `;` in the value's literal text, outside any reference. */
function findListSeparator(expression: ExpressionNode): number | null {
  for (const segment of segments(expression)) {
    if (segment.kind !== "text") continue;
    const index = segment.value.indexOf(";");
    if (index >= 0) return segment.span.start + index;
  }
  return null;
}

// =============================================================================
// References inside expressions
// =============================================================================

function validateReferences(ctx: ValidationContext, value: VisitedValue): void {
  const { diagnostics, document } = ctx;
  const enclosingItem = enclosingItemName(value.element, value.elementSyntax);

  walkExpression(value.expression, (node, transformItem) => {
    switch (node.kind) {
      case "error": {
        const withSymbol = node.errorKind === "ItemsDisallowed" || node.errorKind === "MetadataDisallowed";
        diagnostics.emit(EXPRESSION_ERROR_CODES[node.errorKind], {
          span: spanFromLength(node.at, Math.max(1, node.span.end - node.at)),
          args: withSymbol ? [kindNoun(value.symbol), value.symbol.name] : [],
        });
        break;
      }
      case "metadata": {
        const itemName = node.itemName ?? transformItem?.name ?? enclosingItem;
        if (!itemName) break;
        const usage = checkMetadataUsage(ctx, itemName, node.name, "write");
        if (!usage.used && document.isProject) {
          const data: UnusedMetadataData = { itemName, name: node.name, spans: [node.nameSpan] };
          diagnostics.emit("UnwrittenMetadata", { span: node.span, args: [itemName, node.name], data });
        }
        if (usage.symbol) checkDeprecated(ctx, usage.symbol, node.nameSpan);
        break;
      }
      case "property": {
        if (node.name.length === 0) break;
        const usage = checkPropertyUsage(ctx, node.name, "write");
        if (!usage.used && document.isProject) {
          const data: NameData = { name: node.name };
          diagnostics.emit("UnwrittenProperty", { span: node.span, args: [node.name], data });
        }
        if (usage.symbol) checkDeprecated(ctx, usage.symbol, node.span);
        break;
      }
      case "item": {
        const usage = checkItemUsage(ctx, node.name, "write");
        if (!usage.used && document.isProject) {
          const data: NameData = { name: node.name };
          diagnostics.emit("UnwrittenItem", { span: node.span, args: [node.name], data });
        }
        if (usage.symbol) checkDeprecated(ctx, usage.symbol, node.span);
        break;
      }
      default:
        break;
    }
  });
}

// =============================================================================
// Literals
// =============================================================================

function validateLiteral(ctx: ValidationContext, visited: VisitedValue, node: ExprText): void {
  const { value, trimmedOffset, escapedLength } = unescapeTrimmed(node.value, node.span.start);
  if (value.length === 0) return;

  const { symbol } = visited;
  const { diagnostics, document } = ctx;
  const span = spanFromLength(trimmedOffset, escapedLength);
  const kind = symbol.valueKind.tag;
  const customType = kind === "CustomType" ? symbol.customType : undefined;

  const error = (code: LiteralErrorCode, ...args: string[]): void => {
    diagnostics.emit(code, { span, args });
  };
  const fixable = (code: "UnknownValue" | "InvalidBool", ...args: string[]): void => {
    const data: FixableValueData = {
      name: value,
      valueKind: formatValueKind(symbol.valueKind),
      ...(symbol.customType?.name !== undefined ? { customType: symbol.customType.name } : {}),
    };
    diagnostics.emit(code, { span, args, data });
  };

  if (customType && !customType.allowUnknownValues) {
    const known = tryGetKnownValue(symbol, value);
    if (known.kind === "unknown-error") {
      fixable("UnknownValue", titleCaseKindNoun(symbol), symbol.name, value);
      return;
    }
    if (known.kind === "matched") checkDeprecated(ctx, known.value, node.span);
  }

  switch (customType?.baseKind?.tag ?? kind) {
    case "Guid": {
      if (!isValidGuid(value)) error("InvalidGuid", value);
      const format = customType?.analyzerHints["GuidFormat"];
      if (format !== undefined) {
        if (!isGuidFormat(format)) {
          ctx.logger.error(`[validator] GuidFormat analyzer hint has invalid value '${format}'`);
        } else if (!matchesGuidFormat(value, format)) {
          error("GuidIncorrectFormat", value, format);
        }
      }
      break;
    }
    case "Int":
      if (!isValidInt64(value)) error("InvalidInteger", value);
      break;
    case "Bool":
      if (!isValidBool(value)) fixable("InvalidBool", value);
      break;
    case "Url":
      if (!isAbsoluteUrl(value)) error("InvalidUrl", value);
      break;
    case "Version":
      if (!parseVersion(value)) error("InvalidVersion", value);
      break;
    case "NuGetVersion":
      if (!isValidNuGetVersion(value)) error("InvalidNuGetVersion", value);
      break;
    case "NuGetVersionRange":
      if (!isValidNuGetVersionRange(value)) error("InvalidNuGetVersionRange", value);
      break;
    case "TargetName": {
      const target = document.schemas.getTarget(value, EXTERNAL_ONLY);
      if (target) checkDeprecated(ctx, target, node.span);
      break;
    }
    case "PropertyName": {
      const property = document.schemas.getProperty(value, EXTERNAL_ONLY);
      if (property) {
        checkDeprecated(ctx, property, node.span);
        if (visited.attributeSyntax?.syntaxKind === "Output_PropertyName") {
          checkPropertyWrite(ctx, property, node.span);
        }
      }
      break;
    }
    case "ItemName": {
      const item = document.schemas.getItem(value, EXTERNAL_ONLY);
      if (item) checkDeprecated(ctx, item, node.span);
      break;
    }
    case "Lcid": {
      const lcid = parseLcid(value);
      if (lcid === null) {
        error("InvalidLcid", value);
      } else if (!isKnownLcid(lcid)) {
        error("UnknownLcid", value);
      }
      break;
    }
    case "Culture":
      if (!isValidCultureName(value)) {
        error("InvalidCulture", value);
      } else if (!isKnownCulture(value)) {
        error("UnknownCulture", value);
      }
      break;
    case "TargetFramework":
      validateTargetFramework(value, error);
      break;
    case "TargetFrameworkIdentifier":
      if (!isKnownFrameworkIdentifier(value)) error("UnknownTargetFrameworkIdentifier", value);
      break;
    case "TargetFrameworkVersion":
      validateTargetFrameworkVersion(ctx, value, error);
      break;
    case "TargetFrameworkProfile": {
      const [first] = document.frameworks;
      if (!first) break;
      const matched = document.frameworks.some(
        (fx) => fx.profile === value && isFrameworkProfileValid(fx.identifier, fx.version, value),
      );
      if (!matched) {
        error("UnknownTargetFrameworkProfile", value, first.identifier, formatFrameworkVersion(first.version));
      }
      break;
    }
    case "ClrNamespace":
      if (clrNameComponentCount(value) === null) error("InvalidClrNamespace", value);
      break;
    case "ClrType":
      if (clrNameComponentCount(value) === null) error("InvalidClrType", value);
      break;
    case "ClrTypeName":
      if (clrNameComponentCount(value) !== 1) error("InvalidClrTypeName", value);
      break;
    default:
      break;
  }
}

type LiteralErrorCode =
  | "InvalidGuid"
  | "GuidIncorrectFormat"
  | "InvalidInteger"
  | "InvalidUrl"
  | "InvalidVersion"
  | "InvalidNuGetVersion"
  | "InvalidNuGetVersionRange"
  | "InvalidLcid"
  | "UnknownLcid"
  | "InvalidCulture"
  | "UnknownCulture"
  | "InvalidTargetFramework"
  | "UnknownTargetFramework"
  | "TargetFrameworkHasUnknownVersion"
  | "TargetFrameworkHasUnknownTargetPlatform"
  | "TargetFrameworkHasUnknownProfile"
  | "TargetFrameworkHasUnknownTargetPlatformVersion"
  | "UnknownTargetFrameworkIdentifier"
  | "UnknownTargetFrameworkVersion"
  | "UnknownTargetFrameworkProfile"
  | "InvalidClrNamespace"
  | "InvalidClrType"
  | "InvalidClrTypeName";

type LiteralError = (code: LiteralErrorCode, ...args: string[]) => void;

function validateTargetFramework(value: string, error: LiteralError): void {
  const result = validateFrameworkShortName(value);
  switch (result.kind) {
    case "ok":
      break;
    case "malformed":
      error("InvalidTargetFramework", value);
      break;
    case "unknown-identifier":
      error("UnknownTargetFramework", value);
      break;
    case "unknown-version":
      error("TargetFrameworkHasUnknownVersion", value, result.version);
      break;
    case "unknown-platform":
      error("TargetFrameworkHasUnknownTargetPlatform", value, result.platform);
      break;
    case "unknown-profile":
      error("TargetFrameworkHasUnknownProfile", value, result.profile);
      break;
    case "unknown-platform-version":
      error("TargetFrameworkHasUnknownTargetPlatformVersion", value, result.platformVersion, result.platform);
      break;
  }
}

function validateTargetFrameworkVersion(ctx: ValidationContext, value: string, error: LiteralError): void {
  const parsed = parseVersion(value.replace(/^[vV]+/, ""));
  if (!parsed) {
    error("InvalidVersion", value);
    return;
  }
  const version = [0, 1, 2, 3].map((i) => parsed[i] ?? 0);
  const frameworks = ctx.document.frameworks;
  const [first] = frameworks;
  if (!first) return;
  const matched = frameworks.some(
    (fx) => areVersionsEquivalent(fx.version, version) && isKnownFrameworkVersion(fx.identifier, version),
  );
  if (!matched) error("UnknownTargetFrameworkVersion", value, first.identifier);
}

