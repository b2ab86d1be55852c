import { defineDiagnostic, type DiagnosticDescriptor } from "../../diagnostics/types.js";
import type { MsBuildAnalyzer, PropertyWriteContext } from "../analyzer.js";

const useRuntimeIdentifiers = {
  code: "UseRuntimeIdentifiersForMultipleRIDs",
  ...defineDiagnostic({
    category: "analyzer",
    defaultSeverity: "error",
    title: "Use RuntimeIdentifiers for multiple RIDs",
    message: "When targeting multiple RIDs, use the RuntimeIdentifiers property instead of RuntimeIdentifier",
  }),
} satisfies DiagnosticDescriptor;

const useRuntimeIdentifier = {
  code: "UseRuntimeIdentifierForSingleRID",
  ...defineDiagnostic({
    category: "analyzer",
    defaultSeverity: "warning",
    title: "Use RuntimeIdentifier for single RID",
    message: "When targeting a single RID, use the RuntimeIdentifier property instead of RuntimeIdentifiers",
  }),
} satisfies DiagnosticDescriptor;

function hasMultipleValues(ctx: PropertyWriteContext): boolean {
  return ctx.node.kind === "list" || (ctx.node.kind === "text" && ctx.node.value.includes(";"));
}

/** Flags RuntimeIdentifier holding several RIDs, and RuntimeIdentifiers holding one. */
export const runtimeIdentifierAnalyzer: MsBuildAnalyzer = {
  id: "runtime-identifier",
  supportedDiagnostics: [useRuntimeIdentifiers, useRuntimeIdentifier],
  initialize(context) {
    context.registerPropertyWriteAction((ctx) => {
      if (hasMultipleValues(ctx)) {
        ctx.report(useRuntimeIdentifiers.code, { span: ctx.element.span });
      }
    }, "RuntimeIdentifier");

    context.registerPropertyWriteAction((ctx) => {
      if (ctx.node.kind === "text" && !ctx.node.value.includes(";")) {
        ctx.report(useRuntimeIdentifier.code, { span: ctx.element.span });
      }
    }, "RuntimeIdentifiers");

    // RuntimeIdentifier lists are reported above with a more specific message.
    context.registerCoreDiagnosticFilter(
      (diagnostic) => diagnostic.data?.["name"] === "RuntimeIdentifier",
      "UnexpectedList",
    );
  },
};
