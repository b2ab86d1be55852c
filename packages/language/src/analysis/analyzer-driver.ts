/* =======================================================================================
 * Analyzer driver
 * ---------------------------------------------------------------------------------------
 * Initializes analyzers, replays the document's writes to their registered actions in
 * one extra pass, then applies their core diagnostic filters to everything in the sink.
 * Analyzer failures are contained per action and reported as InternalError.
 * ======================================================================================= */

import { coreDiagnostics, isCoreDiagnosticCode, type CoreDiagnosticCode } from "../diagnostics/catalog/index.js";
import { createDiagnosticEmitter, type DiagnosticEmitter, type DiagnosticSink, type EmitDiagnosticInput } from "../diagnostics/emitter.js";
import type { MsBuildDiagnostic } from "../diagnostics/types.js";
import { DocumentVisitor, type VisitedValue, type VisitorOptions } from "../language/document-visitor.js";
import type { MsBuildDocument } from "../language/document.js";
import type { TextSpan } from "../model/span.js";
import { errorMessage, runContained } from "../shared/node-result.js";
import { formatError } from "../shared/logger.js";
import type {
  CoreDiagnosticFilter,
  ItemWriteContext,
  MetadataWriteContext,
  MsBuildAnalyzer,
  PropertyWriteContext,
  WriteActionContext,
} from "./analyzer.js";

interface Registered<T> {
  analyzer: MsBuildAnalyzer;
  action: (ctx: T) => void;
}

const key = (name: string): string => name.toLowerCase();
const ANY_ITEM = "\u0000";

/** Registrations of every initialized analyzer, keyed by lower-cased name. */
class AnalyzerRegistry {
  readonly propertyWrites = new Map<string, Registered<PropertyWriteContext>[]>();
  readonly itemWrites = new Map<string, Registered<ItemWriteContext>[]>();
  /** Keyed by item name (or ANY_ITEM), then metadata name. */
  readonly metadataWrites = new Map<string, Map<string, Registered<MetadataWriteContext>[]>>();
  readonly filters = new Map<CoreDiagnosticCode, { analyzer: MsBuildAnalyzer; filter: CoreDiagnosticFilter }[]>();

  get isEmpty(): boolean {
    return this.propertyWrites.size === 0 && this.itemWrites.size === 0 && this.metadataWrites.size === 0;
  }

  register(analyzer: MsBuildAnalyzer): void {
    analyzer.initialize({
      registerPropertyWriteAction: (action, ...names) => {
        for (const name of names) push(this.propertyWrites, key(name), { analyzer, action });
      },
      registerItemWriteAction: (action, ...names) => {
        for (const name of names) push(this.itemWrites, key(name), { analyzer, action });
      },
      registerMetadataWriteAction: (action, ...selectors) => {
        for (const selector of selectors) {
          const itemKey = selector.itemName === null ? ANY_ITEM : key(selector.itemName);
          let byName = this.metadataWrites.get(itemKey);
          if (!byName) {
            byName = new Map();
            this.metadataWrites.set(itemKey, byName);
          }
          push(byName, key(selector.name), { analyzer, action });
        }
      },
      registerCoreDiagnosticFilter: (filter, ...codes) => {
        for (const code of codes) push(this.filters, code, { analyzer, filter });
      },
    });
  }

  metadataActions(itemName: string, name: string): Registered<MetadataWriteContext>[] {
    return [
      ...(this.metadataWrites.get(key(itemName))?.get(key(name)) ?? []),
      ...(this.metadataWrites.get(ANY_ITEM)?.get(key(name)) ?? []),
    ];
  }
}

function push<K, V>(map: Map<K, V[]>, mapKey: K, value: V): void {
  const existing = map.get(mapKey);
  if (existing) {
    existing.push(value);
  } else {
    map.set(mapKey, [value]);
  }
}

/**
 * Run analyzers over a validated document and return the sink's diagnostics with the
 * analyzers' filters applied.
 *
 * @throws CancellationError when the token is cancelled
 */
export function runAnalyzers(
  document: MsBuildDocument,
  analyzers: readonly MsBuildAnalyzer[],
  sink: DiagnosticSink,
  options: VisitorOptions = {},
): readonly MsBuildDiagnostic[] {
  const core = createDiagnosticEmitter(coreDiagnostics, sink);
  const registry = new AnalyzerRegistry();

  for (const analyzer of analyzers) {
    const result = runContained(() => registry.register(analyzer));
    if (!result.ok) {
      reportFailure(core, options, analyzer, { start: 0, end: 0 }, result.error);
    }
  }

  if (!registry.isEmpty) {
    new AnalyzerVisitor(document, registry, sink, core, options).run();
  }

  return applyFilters(sink.diagnostics, registry, options);
}

function applyFilters(
  diagnostics: readonly MsBuildDiagnostic[],
  registry: AnalyzerRegistry,
  options: VisitorOptions,
): readonly MsBuildDiagnostic[] {
  if (registry.filters.size === 0) return diagnostics;
  return diagnostics.filter((diagnostic) => {
    if (diagnostic.source !== "core" || !isCoreDiagnosticCode(diagnostic.code)) return true;
    const filters = registry.filters.get(diagnostic.code);
    if (!filters) return true;
    for (const { analyzer, filter } of filters) {
      const result = runContained(() => filter(diagnostic));
      if (!result.ok) {
        options.logger?.error(`[analyzer] ${analyzer.id} filter failed: ${formatError(result.error)}`);
      } else if (result.value) {
        return false;
      }
    }
    return true;
  });
}

function reportFailure(
  core: DiagnosticEmitter<typeof coreDiagnostics>,
  options: VisitorOptions,
  analyzer: MsBuildAnalyzer,
  span: TextSpan,
  error: unknown,
): void {
  core.emit("InternalError", { span, args: [`${analyzer.id}: ${errorMessage(error)}`] });
  options.logger?.error(`[analyzer] ${analyzer.id} failed: ${formatError(error)}`);
}

class AnalyzerVisitor extends DocumentVisitor {
  constructor(
    document: MsBuildDocument,
    private readonly registry: AnalyzerRegistry,
    private readonly sink: DiagnosticSink,
    private readonly core: DiagnosticEmitter<typeof coreDiagnostics>,
    private readonly options: VisitorOptions,
  ) {
    super(document, options);
  }

  protected override visitValue(value: VisitedValue): void {
    const { element, attribute, elementSyntax, attributeSyntax } = value;

    if (attribute === null && elementSyntax.syntaxKind === "Property") {
      for (const registered of this.registry.propertyWrites.get(key(element.name)) ?? []) {
        this.fire(registered, value, (base) => ({ ...base, propertyName: element.name }));
      }
    } else if (elementSyntax.syntaxKind === "Item" && attribute?.nameEquals("Include")) {
      for (const registered of this.registry.itemWrites.get(key(element.name)) ?? []) {
        this.fire(registered, value, (base) => ({ ...base, itemName: element.name }));
      }
    } else if (attribute === null && elementSyntax.syntaxKind === "Metadata" && element.parent) {
      const itemName = element.parent.name;
      for (const registered of this.registry.metadataActions(itemName, element.name)) {
        this.fire(registered, value, (base) => ({ ...base, itemName, metadataName: element.name }));
      }
    } else if (attribute && attributeSyntax?.syntaxKind === "Item_Metadata") {
      for (const registered of this.registry.metadataActions(element.name, attribute.name)) {
        this.fire(registered, value, (base) => ({ ...base, itemName: element.name, metadataName: attribute.name }));
      }
    }
  }

  private fire<T extends WriteActionContext>(
    registered: Registered<T>,
    value: VisitedValue,
    extend: (base: WriteActionContext) => T,
  ): void {
    const { analyzer, action } = registered;
    const base: WriteActionContext = {
      document: this.document,
      element: value.element,
      attribute: value.attribute,
      node: value.expression,
      text: value.text,
      report: (code: string, input: EmitDiagnosticInput) => {
        const descriptor = analyzer.supportedDiagnostics.find((d) => d.code === code);
        if (!descriptor) {
          throw new Error(`Analyzer '${analyzer.id}' reported unsupported diagnostic '${code}'`);
        }
        this.sink.add(descriptor, input, analyzer.id);
      },
    };
    const result = runContained(() => action(extend(base)));
    if (!result.ok) {
      reportFailure(this.core, this.options, analyzer, value.element.nameSpan, result.error);
    }
  }
}
