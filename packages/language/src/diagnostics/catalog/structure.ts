import { defineDiagnostic } from "../types.js";

export type NameData = { name: string };

export type DeprecatedData = { symbolKind: string; name: string };

export const structureDiagnostics = {
  MissingProjectElement: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Missing Project element",
    message: "The document does not have a Project element",
  }),
  UnknownElement: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Unknown element",
    message: "Unknown element '{0}'",
    data: { required: ["name"] },
  }),
  UnknownAttribute: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Unknown attribute",
    message: "Unknown attribute '{0}'",
    data: { required: ["name"] },
  }),
  MissingRequiredAttribute: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Missing required attribute",
    message: "The '{0}' element is missing the required attribute '{1}'",
  }),
  RequiredAttributeEmpty: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Required attribute is empty",
    message: "The required attribute '{0}' is empty",
  }),
  AttributeEmpty: defineDiagnostic({
    category: "structure",
    defaultSeverity: "warning",
    title: "Attribute is empty",
    message: "The attribute '{0}' is empty",
  }),
  UnexpectedText: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Unexpected text",
    message: "The element '{0}' does not take a text value",
  }),
  NoTargets: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "No targets",
    message: "The project does not define or import any targets",
    description: "A project without an Sdk, Import or Target cannot be built.",
  }),
  OnErrorMustBeLastInTarget: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "OnError must be last",
    message: "OnError elements must be the last elements in a target",
  }),
  OtherwiseMustBeLastInChoose: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Otherwise must be last",
    message: "The Otherwise element must be the last element in a Choose",
  }),
  OutputMustHavePropertyOrItemName: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Output without destination",
    message: "Output elements must have a PropertyName or ItemName attribute",
  }),
  ImportVersionRequiresSdk: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Import version without Sdk",
    message: "The Version attribute is only valid on imports that have an Sdk attribute",
  }),
  ImportMinVersionRequiresSdk: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Import minimum version without Sdk",
    message: "The {0} attribute is only valid on imports that have an Sdk attribute",
  }),
  ItemAttributeNotValidInTarget: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Item attribute not valid in target",
    message: "The '{0}' attribute is not valid on items inside targets",
  }),
  ItemAttributeOnlyValidInTarget: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Item attribute only valid in target",
    message: "The '{0}' attribute is only valid on items inside targets",
  }),
  ItemMustHaveInclude: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Item without Include",
    message: "Items outside targets must have an Include, Update or Remove attribute",
  }),
  MalformedMarkup: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Malformed markup",
    message: "{0}",
  }),
  InternalError: defineDiagnostic({
    category: "structure",
    defaultSeverity: "error",
    title: "Internal error",
    message: "Internal error: {0}",
  }),
  DeprecatedWithMessage: defineDiagnostic({
    category: "structure",
    defaultSeverity: "warning",
    title: "Deprecated",
    message: "The {0} '{1}' is deprecated: {2}",
    data: { required: ["symbolKind", "name"] },
  }),
} as const;
