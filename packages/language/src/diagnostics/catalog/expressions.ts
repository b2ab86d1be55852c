import type { ExpressionErrorKind } from "../../parsing/expression-ast.js";
import { defineDiagnostic } from "../types.js";

export type UnexpectedShapeData = { name: string };

export const expressionDiagnostics = {
  UnexpectedList: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Unexpected list",
    message: "The {0} '{1}' does not expect a list",
    data: { required: ["name"] },
  }),
  UnexpectedExpression: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Unexpected expression",
    message: "The {0} '{1}' does not expect an expression",
  }),
  ExpressionIncomplete: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Incomplete expression",
    message: "The expression is incomplete",
  }),
  ExpressionExpectingIdentifier: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Expected identifier",
    message: "Expected an identifier",
  }),
  ExpressionExpectingMethodName: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Expected method name",
    message: "Expected a method name",
  }),
  ExpressionExpectingRightParen: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Expected ')'",
    message: "Expected ')'",
  }),
  ExpressionExpectingRightBracket: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Expected ']'",
    message: "Expected ']'",
  }),
  ExpressionExpectingApostrophe: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Expected closing quote",
    message: "Expected a closing quote",
  }),
  ExpressionExpectingValue: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Expected value",
    message: "Expected a value",
  }),
  ExpressionItemsDisallowed: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Item reference not allowed",
    message: "The {0} '{1}' does not allow item references",
  }),
  ExpressionMetadataDisallowed: defineDiagnostic({
    category: "expressions",
    defaultSeverity: "error",
    title: "Metadata reference not allowed",
    message: "The {0} '{1}' does not allow metadata references",
  }),
} as const;

export type ExpressionDiagnosticCode = keyof typeof expressionDiagnostics;

export const EXPRESSION_ERROR_CODES = {
  IncompleteReference: "ExpressionIncomplete",
  ExpectingIdentifier: "ExpressionExpectingIdentifier",
  ExpectingMethodName: "ExpressionExpectingMethodName",
  ExpectingRightParen: "ExpressionExpectingRightParen",
  ExpectingRightBracket: "ExpressionExpectingRightBracket",
  ExpectingApostrophe: "ExpressionExpectingApostrophe",
  ExpectingValue: "ExpressionExpectingValue",
  ItemsDisallowed: "ExpressionItemsDisallowed",
  MetadataDisallowed: "ExpressionMetadataDisallowed",
} as const satisfies Record<ExpressionErrorKind, ExpressionDiagnosticCode>;
