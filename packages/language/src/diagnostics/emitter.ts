import { clampSpan, type TextSpan } from "../model/span.js";
import type {
  DiagnosticCode,
  DiagnosticData,
  DiagnosticDescriptor,
  DiagnosticSeverity,
  DiagnosticsCatalog,
  MsBuildDiagnostic,
} from "./types.js";

export type EmitDiagnosticInput = {
  span: TextSpan;
  args?: readonly (string | number)[];
  data?: DiagnosticData;
  severity?: DiagnosticSeverity;
};

/** Fill `{n}` placeholders; missing arguments render as empty text. */
export function formatDiagnosticMessage(format: string, args: readonly string[]): string {
  return format.replace(/\{(\d+)\}/g, (_, index: string) => args[Number(index)] ?? "");
}

/**
 * Append-only diagnostic list owned by a single analysis pass. Spans are clamped to the
 * document so nothing reported can point past its end.
 */
export class DiagnosticSink {
  private readonly items: MsBuildDiagnostic[] = [];

  constructor(private readonly textLength: number) {}

  add(descriptor: DiagnosticDescriptor, input: EmitDiagnosticInput, source = "core"): MsBuildDiagnostic {
    const args = (input.args ?? []).map(String);
    const diagnostic: MsBuildDiagnostic = {
      code: descriptor.code,
      severity: input.severity ?? descriptor.defaultSeverity,
      span: clampSpan(input.span, this.textLength),
      message: formatDiagnosticMessage(descriptor.message, args),
      args,
      source,
      ...(input.data ? { data: input.data } : {}),
    };
    this.items.push(diagnostic);
    return diagnostic;
  }

  get diagnostics(): readonly MsBuildDiagnostic[] {
    return this.items;
  }

  get count(): number {
    return this.items.length;
  }
}

export type DiagnosticEmitter<Catalog extends DiagnosticsCatalog> = {
  emit<Code extends DiagnosticCode<Catalog>>(code: Code, input: EmitDiagnosticInput): MsBuildDiagnostic;
};

export function createDiagnosticEmitter<Catalog extends DiagnosticsCatalog>(
  catalog: Catalog,
  sink: DiagnosticSink,
  source = "core",
): DiagnosticEmitter<Catalog> {
  return {
    emit(code, input) {
      const spec = catalog[code];
      if (!spec) {
        throw new Error(`Diagnostic code '${code}' is not in the catalog.`);
      }
      return sink.add({ code, ...spec }, input, source);
    },
  };
}
