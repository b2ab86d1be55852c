import type { TextSpan } from "../model/span.js";

/** UI severity; `info` is used for hints such as redundant default values. */
export type DiagnosticSeverity = "error" | "warning" | "info";

/** Category is the primary axis for grouping and reporting. */
export type DiagnosticCategory =
  | "structure" // Element/attribute grammar and ordering.
  | "tasks" // Task declarations and invocations.
  | "symbols" // Unused, unwritten and protected symbols.
  | "values" // Literal value formats and known values.
  | "expressions" // Malformed or disallowed macro expressions.
  | "analyzer"; // Contributed by an analyzer rather than the validator.

/** Structured properties for automated fixers. Keys are camelCase. */
export type DiagnosticData = { readonly [key: string]: unknown };

/** Required/optional data fields document what fixers can rely on. */
export type DiagnosticDataRequirement = {
  readonly required?: readonly string[];
  readonly optional?: readonly string[];
};

/** Single source of truth for severity and presentation of a diagnostic code. */
export type DiagnosticSpec = {
  readonly category: DiagnosticCategory;
  readonly defaultSeverity: DiagnosticSeverity;
  /** Short, stable title for listings. */
  readonly title: string;
  /** Message with `{0}`-style placeholders filled from the message arguments. */
  readonly message: string;
  readonly description?: string;
  readonly data?: DiagnosticDataRequirement;
};

/** Preserves literal types without boilerplate in catalogs. */
export function defineDiagnostic<const TSpec extends DiagnosticSpec>(spec: TSpec): TSpec {
  return spec;
}

export type DiagnosticsCatalog = Record<string, DiagnosticSpec>;

export type DiagnosticCode<Catalog extends DiagnosticsCatalog> = keyof Catalog & string;

/** A spec bound to its code, as declared by analyzers or looked up from a catalog. */
export type DiagnosticDescriptor = DiagnosticSpec & { readonly code: string };

export interface MsBuildDiagnostic {
  readonly code: string;
  readonly severity: DiagnosticSeverity;
  readonly span: TextSpan;
  readonly message: string;
  readonly args: readonly string[];
  readonly data?: DiagnosticData;
  /** `core` for validator diagnostics, otherwise the reporting analyzer's id. */
  readonly source: string;
}
