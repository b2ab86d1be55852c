import { defineDiagnostic } from "../types.js";

/** Captured for misspelled-value fixes. */
export type FixableValueData = { name: string; valueKind: string; customType?: string };

export const valueDiagnostics = {
  UnknownValue: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown value",
    message: "{0} '{1}' does not have a known value '{2}'",
    data: { required: ["name", "valueKind"], optional: ["customType"] },
  }),
  InvalidBool: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid bool",
    message: "Invalid bool value '{0}'",
    data: { required: ["name", "valueKind"] },
  }),
  InvalidGuid: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid GUID",
    message: "Invalid GUID value '{0}'",
  }),
  GuidIncorrectFormat: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "GUID has incorrect format",
    message: "The GUID '{0}' does not use the expected format '{1}'",
  }),
  InvalidInteger: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid integer",
    message: "Invalid integer value '{0}'",
  }),
  InvalidUrl: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid URL",
    message: "Invalid URL '{0}'",
  }),
  InvalidVersion: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid version",
    message: "Invalid version '{0}'",
  }),
  InvalidNuGetVersion: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid package version",
    message: "Invalid package version '{0}'",
  }),
  InvalidNuGetVersionRange: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid package version range",
    message: "Invalid package version range '{0}'",
  }),
  InvalidTargetFramework: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid target framework",
    message: "Invalid target framework '{0}'",
  }),
  UnknownTargetFramework: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target framework",
    message: "Unknown target framework '{0}'",
  }),
  TargetFrameworkHasUnknownVersion: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target framework version",
    message: "The target framework '{0}' has an unknown version '{1}'",
  }),
  TargetFrameworkHasUnknownTargetPlatform: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target platform",
    message: "The target framework '{0}' has an unknown target platform '{1}'",
  }),
  TargetFrameworkHasUnknownProfile: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target framework profile",
    message: "The target framework '{0}' has an unknown profile '{1}'",
  }),
  TargetFrameworkHasUnknownTargetPlatformVersion: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target platform version",
    message: "The target framework '{0}' has an unknown version '{1}' for target platform '{2}'",
  }),
  UnknownTargetFrameworkIdentifier: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target framework identifier",
    message: "Unknown target framework identifier '{0}'",
  }),
  UnknownTargetFrameworkVersion: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target framework version",
    message: "Unknown version '{0}' for target framework '{1}'",
  }),
  UnknownTargetFrameworkProfile: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Unknown target framework profile",
    message: "Unknown profile '{0}' for target framework '{1}' version '{2}'",
  }),
  InvalidCulture: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid culture",
    message: "Invalid culture name '{0}'",
  }),
  UnknownCulture: defineDiagnostic({
    category: "values",
    defaultSeverity: "warning",
    title: "Unknown culture",
    message: "Unknown culture '{0}'",
  }),
  InvalidLcid: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid LCID",
    message: "Invalid LCID '{0}'",
  }),
  UnknownLcid: defineDiagnostic({
    category: "values",
    defaultSeverity: "warning",
    title: "Unknown LCID",
    message: "Unknown LCID '{0}'",
  }),
  InvalidClrNamespace: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid namespace",
    message: "Invalid namespace '{0}'",
  }),
  InvalidClrType: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid type",
    message: "Invalid type '{0}'",
  }),
  InvalidClrTypeName: defineDiagnostic({
    category: "values",
    defaultSeverity: "error",
    title: "Invalid type name",
    message: "Invalid type name '{0}'",
  }),
} as const;
