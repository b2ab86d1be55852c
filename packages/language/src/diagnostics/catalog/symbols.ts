import type { TextSpan } from "../../model/span.js";
import { defineDiagnostic } from "../types.js";

export type UnusedSymbolData = { name: string; spans: readonly TextSpan[] };

export type UnusedMetadataData = UnusedSymbolData & { itemName: string };

export type DefaultValueData = { symbolKind: string; name: string; defaultValue: string };

export const symbolDiagnostics = {
  UnreadProperty: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Unread property",
    message: "The property '{0}' is never read",
    data: { required: ["name", "spans"] },
  }),
  UnreadItem: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Unread item",
    message: "The item '{0}' is never read",
    data: { required: ["name", "spans"] },
  }),
  UnreadMetadata: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Unread metadata",
    message: "The metadata '{1}' of item '{0}' is never read",
    data: { required: ["itemName", "name", "spans"] },
  }),
  UnwrittenProperty: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Unwritten property",
    message: "The property '{0}' is never written",
    data: { required: ["name"] },
  }),
  UnwrittenItem: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Unwritten item",
    message: "The item '{0}' is never written",
    data: { required: ["name"] },
  }),
  UnwrittenMetadata: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Unwritten metadata",
    message: "The metadata '{1}' of item '{0}' is never written",
    data: { required: ["itemName", "name", "spans"] },
  }),
  PropertyWriteReserved: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "error",
    title: "Reserved property written",
    message: "The property '{0}' is reserved and cannot be written",
  }),
  PropertyWriteReadonly: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "warning",
    title: "Read-only property written",
    message: "The property '{0}' is read-only and should not be written",
  }),
  HasDefaultValue: defineDiagnostic({
    category: "symbols",
    defaultSeverity: "info",
    title: "Redundant default value",
    message: "{0} '{1}' has default value '{2}'",
    data: { required: ["symbolKind", "name", "defaultValue"] },
  }),
} as const;
