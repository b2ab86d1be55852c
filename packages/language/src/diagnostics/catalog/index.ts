import type { DiagnosticCode, DiagnosticDescriptor, DiagnosticsCatalog } from "../types.js";
import { expressionDiagnostics } from "./expressions.js";
import { structureDiagnostics } from "./structure.js";
import { symbolDiagnostics } from "./symbols.js";
import { taskDiagnostics } from "./tasks.js";
import { valueDiagnostics } from "./values.js";

// Diagnostics produced by the validator itself.
export const coreDiagnostics = {
  ...structureDiagnostics,
  ...taskDiagnostics,
  ...symbolDiagnostics,
  ...valueDiagnostics,
  ...expressionDiagnostics,
} as const satisfies DiagnosticsCatalog;

export type CoreDiagnosticCode = DiagnosticCode<typeof coreDiagnostics>;

export const diagnosticsByCategory = {
  structure: structureDiagnostics,
  tasks: taskDiagnostics,
  symbols: symbolDiagnostics,
  values: valueDiagnostics,
  expressions: expressionDiagnostics,
} as const;

export function isCoreDiagnosticCode(code: string): code is CoreDiagnosticCode {
  return Object.hasOwn(coreDiagnostics, code);
}

export function coreDescriptor(code: CoreDiagnosticCode): DiagnosticDescriptor {
  return { code, ...coreDiagnostics[code] };
}

export * from "./expressions.js";
export * from "./structure.js";
export * from "./symbols.js";
export * from "./tasks.js";
export * from "./values.js";
