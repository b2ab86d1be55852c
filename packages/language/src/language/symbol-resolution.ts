// Typed symbol lookup for resolved elements and attributes

import type { XAttribute, XElement } from "../markup/xml-dom.js";
import type { SchemaCollection, SchemaLookupOptions } from "../schema/schema.js";
import type { TypedSymbol } from "../schema/symbols.js";
import type { AttributeSyntax, ElementSyntax } from "../syntax/language-syntax.js";

/**
 * The single descriptor a resolved node carries: a schema symbol when the schema knows
 * the name, otherwise the syntax descriptor itself.
 */
export type ResolvedSymbol = TypedSymbol | ElementSyntax | AttributeSyntax;

export function resolveElementSymbol(
  schemas: SchemaCollection,
  element: XElement,
  syntax: ElementSyntax,
  options?: SchemaLookupOptions,
): ResolvedSymbol {
  switch (syntax.syntaxKind) {
    case "Property":
      return schemas.getProperty(element.name, options) ?? syntax;
    case "Item":
    case "ItemDefinition":
      return schemas.getItem(element.name, options) ?? syntax;
    case "Metadata": {
      const itemName = element.parent?.name ?? null;
      return schemas.getMetadata(itemName, element.name, options) ?? syntax;
    }
    case "Task":
      return schemas.getTask(element.name, options) ?? syntax;
    default:
      return syntax;
  }
}

export function resolveAttributeSymbol(
  schemas: SchemaCollection,
  attribute: XAttribute,
  syntax: AttributeSyntax,
  elementSymbol: ResolvedSymbol,
  options?: SchemaLookupOptions,
): ResolvedSymbol {
  switch (syntax.syntaxKind) {
    case "Item_Metadata":
      return schemas.getMetadata(attribute.parent.name, attribute.name, options) ?? syntax;
    case "Task_Parameter":
      if (elementSymbol.kind === "task") {
        return elementSymbol.parameters.get(attribute.name.toLowerCase()) ?? syntax;
      }
      return syntax;
    default:
      return syntax;
  }
}
