/* =======================================================================================
 * Language syntax
 * ---------------------------------------------------------------------------------------
 * The closed element/attribute grammar of build files, loaded from bundled JSON.
 *
 * - Element kinds are fixed; abstract kinds (Property, Item, Metadata, Task, ...) stand
 *   for user-named elements and match any unprefixed name
 * - Each element has named attributes plus, for Item and Task, an abstract attribute
 *   that matches any other name (item metadata, task parameters)
 * - Name matching is case-insensitive; prefixed names never resolve
 * ======================================================================================= */

import { z } from "zod";
import syntaxJson from "../data/language-syntax.json" with { type: "json" };
import type { XAttribute, XElement } from "../markup/xml-dom.js";
import type { SymbolBase } from "../schema/symbols.js";
import { parseValueKind, UNKNOWN_KIND, type ValueKind } from "../schema/value-kind.js";
import { SchemaLoadError } from "../shared/errors.js";

export const ELEMENT_KINDS = [
  "Project",
  "PropertyGroup",
  "Property",
  "ItemGroup",
  "Item",
  "Metadata",
  "ItemDefinitionGroup",
  "ItemDefinition",
  "Target",
  "Task",
  "Output",
  "OnError",
  "Choose",
  "When",
  "Otherwise",
  "Import",
  "ImportGroup",
  "UsingTask",
  "ParameterGroup",
  "Parameter",
  "TaskBody",
  "Sdk",
  "ProjectExtensions",
] as const;

export type ElementKind = (typeof ELEMENT_KINDS)[number];

/** `${ElementKind}_${AttributeName}` for named attributes, or an abstract kind. */
export type AttributeKind = `${ElementKind}_${string}`;

export interface AttributeSyntax extends SymbolBase {
  readonly kind: "attribute";
  readonly syntaxKind: AttributeKind;
  readonly required: boolean;
  readonly isAbstract: boolean;
}

export interface ElementSyntax extends SymbolBase {
  readonly kind: "element";
  readonly syntaxKind: ElementKind;
  readonly isAbstract: boolean;
  readonly children: readonly ElementSyntax[];
  readonly attributes: readonly AttributeSyntax[];
  readonly abstractChild: ElementSyntax | null;
  readonly abstractAttribute: AttributeSyntax | null;
}

// =============================================================================
// Loading
// =============================================================================

const attributeSchema = z.object({
  description: z.string().optional(),
  type: z.string().default("Unknown"),
  required: z.boolean().default(false),
  deprecated: z.string().optional(),
});

const elementSchema = z.object({
  name: z.string().optional(),
  abstract: z.boolean().default(false),
  description: z.string().optional(),
  value: z.string().default("Unknown"),
  deprecated: z.string().optional(),
  children: z.array(z.enum(ELEMENT_KINDS)).default([]),
  attributes: z.record(z.string(), attributeSchema).default({}),
  abstractAttribute: attributeSchema
    .extend({ kind: z.string().regex(/^[A-Za-z]+_[A-Za-z]+$/) })
    .optional(),
});

const syntaxDocumentSchema = z.object({
  elements: z.record(z.enum(ELEMENT_KINDS), elementSchema),
});

type ElementEntry = z.infer<typeof elementSchema>;
type AttributeEntry = z.infer<typeof attributeSchema>;

/** Mutable shape used while linking children; exposed read-only. */
type MutableElementSyntax = Omit<ElementSyntax, "children" | "abstractChild"> & {
  children: ElementSyntax[];
  abstractChild: ElementSyntax | null;
};

export class LanguageSyntax {
  private constructor(
    private readonly byKind: ReadonlyMap<ElementKind, ElementSyntax>,
    readonly project: ElementSyntax,
  ) {}

  static load(json: unknown, source: string): LanguageSyntax {
    const parsed = syntaxDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new SchemaLoadError(
        source,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
      );
    }

    const issues: string[] = [];
    const elements = new Map<ElementKind, MutableElementSyntax>();

    for (const kind of ELEMENT_KINDS) {
      const entry = parsed.data.elements[kind];
      if (!entry) {
        issues.push(`elements.${kind}: missing`);
        continue;
      }
      elements.set(kind, createElement(kind, entry, issues));
    }

    for (const kind of ELEMENT_KINDS) {
      const entry = parsed.data.elements[kind];
      const element = elements.get(kind);
      if (!element || !entry) continue;
      for (const childKind of entry.children) {
        const child = elements.get(childKind);
        if (!child) continue;
        if (child.isAbstract) {
          element.abstractChild = child;
        } else {
          element.children.push(child);
        }
      }
    }

    const project = elements.get("Project");
    if (!project || issues.length > 0) {
      throw new SchemaLoadError(source, issues.length > 0 ? issues : ["elements.Project: missing"]);
    }
    return new LanguageSyntax(elements, project);
  }

  get(kind: ElementKind): ElementSyntax | null {
    return this.byKind.get(kind) ?? null;
  }

  /** Resolve an element given its parent's syntax (null at the document root). */
  resolveElement(element: XElement, parent: ElementSyntax | null): ElementSyntax | null {
    if (element.hasPrefix || element.name.length === 0) return null;
    if (parent === null) {
      return element.nameEquals(this.project.name) ? this.project : null;
    }
    const named = parent.children.find((child) => element.nameEquals(child.name));
    return named ?? parent.abstractChild;
  }

  resolveAttribute(attribute: XAttribute, element: ElementSyntax): AttributeSyntax | null {
    if (attribute.name.includes(":") || attribute.name.length === 0) return null;
    const named = element.attributes.find((a) => attribute.nameEquals(a.name));
    return named ?? element.abstractAttribute;
  }
}

function createElement(kind: ElementKind, entry: ElementEntry, issues: string[]): MutableElementSyntax {
  const attributes = Object.entries(entry.attributes).map(([name, attribute]) =>
    createAttribute(`${kind}_${name}`, name, attribute, false, `elements.${kind}.attributes.${name}`, issues),
  );
  const abstractAttribute = entry.abstractAttribute
    ? createAttribute(
        toAttributeKind(kind, entry.abstractAttribute.kind),
        entry.abstractAttribute.kind,
        entry.abstractAttribute,
        true,
        `elements.${kind}.abstractAttribute`,
        issues,
      )
    : null;

  return {
    kind: "element",
    syntaxKind: kind,
    name: entry.name ?? kind,
    valueKind: valueKindOf(entry.value, `elements.${kind}.value`, issues),
    isAbstract: entry.abstract,
    attributes,
    abstractAttribute,
    children: [],
    abstractChild: null,
    ...(entry.description !== undefined ? { description: entry.description } : {}),
    ...(entry.deprecated !== undefined ? { deprecationMessage: entry.deprecated } : {}),
  };
}

function createAttribute(
  syntaxKind: AttributeKind,
  name: string,
  entry: AttributeEntry,
  isAbstract: boolean,
  path: string,
  issues: string[],
): AttributeSyntax {
  return {
    kind: "attribute",
    syntaxKind,
    name,
    valueKind: valueKindOf(entry.type, `${path}.type`, issues),
    required: entry.required,
    isAbstract,
    ...(entry.description !== undefined ? { description: entry.description } : {}),
    ...(entry.deprecated !== undefined ? { deprecationMessage: entry.deprecated } : {}),
  };
}

function toAttributeKind(kind: ElementKind, abstractKind: string): AttributeKind {
  const suffix = abstractKind.slice(abstractKind.indexOf("_") + 1);
  return `${kind}_${suffix}`;
}

function valueKindOf(text: string, path: string, issues: string[]): ValueKind {
  const kind = parseValueKind(text);
  if (kind) return kind;
  issues.push(`${path}: invalid value kind '${text}'`);
  return UNKNOWN_KIND;
}

let bundled: LanguageSyntax | null = null;

/** The bundled grammar, validated once on first use. */
export function getLanguageSyntax(): LanguageSyntax {
  bundled ??= LanguageSyntax.load(syntaxJson, "language-syntax.json");
  return bundled;
}
