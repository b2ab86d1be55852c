export { defineDiagnostic } from "./types.js";
export type {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticData,
  DiagnosticDataRequirement,
  DiagnosticDescriptor,
  DiagnosticSeverity,
  DiagnosticSpec,
  DiagnosticsCatalog,
  MsBuildDiagnostic,
} from "./types.js";
export * from "./emitter.js";
export * from "./catalog/index.js";
