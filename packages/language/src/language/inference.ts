/* =======================================================================================
 * Schema inference
 * ---------------------------------------------------------------------------------------
 * First pass over a document. Records what the document itself declares and uses so
 * the validator can resolve names the external schemas do not know, and tell whether
 * a symbol is ever read or written.
 *
 * Recorded:
 * - property/item/metadata elements, item metadata attributes, Output PropertyName /
 *   ItemName → Write
 * - `$(P)`, `@(I)`, `%(I.M)` → Read (unqualified metadata resolves to the transform's
 *   item, else the enclosing item element)
 * - Target Name → Declaration; target-name values → Read
 * - UsingTask → declared task; task elements nothing declares → inferred task
 * - TargetFramework(s) short names, else Identifier + Version (+ Profile) → frameworks
 * ======================================================================================= */

import {
  parseFrameworkVersion,
  validateFrameworkShortName,
  type FrameworkReference,
} from "../frameworks/framework-info.js";
import type { XElement } from "../markup/xml-dom.js";
import { listMembers, walkExpression, type ExpressionNode } from "../parsing/expression-ast.js";
import { unescapeTrimmed } from "../parsing/escaping.js";
import { MsBuildSchema } from "../schema/schema.js";
import {
  taskParameterMap,
  type TaskDeclarationKind,
  type TaskParameterSymbol,
} from "../schema/symbols.js";
import { parseValueKind, UNKNOWN_KIND, type ValueKind } from "../schema/value-kind.js";
import { parseTaskName } from "../values/clr-names.js";
import type { MsBuildDocument } from "./document.js";
import {
  DocumentVisitor,
  elementValues,
  enclosingItemName,
  type ResolvedAttribute,
  type ResolvedElement,
  type VisitedValue,
  type VisitorOptions,
} from "./document-visitor.js";

export type SymbolUsage = "read" | "write" | "declaration";

/** A UsingTask that loads its task from an assembly. */
export interface TaskAssemblyDeclaration {
  taskName: string;
  namespace: string | null;
  assemblyName: string | null;
  assemblyFile: string | null;
}

/**
 * Resolves an assembly-backed task declaration to its parameters, or null when the
 * assembly or the task cannot be found.
 */
export type TaskAssemblyResolver = (declaration: TaskAssemblyDeclaration) => readonly TaskParameterSymbol[] | null;

const key = (name: string): string => name.toLowerCase();
const metadataKey = (itemName: string, name: string): string => `${key(itemName)}\u0000${key(name)}`;

export class InferredSchema extends MsBuildSchema {
  private readonly propertyUsage = new Map<string, Set<SymbolUsage>>();
  private readonly itemUsage = new Map<string, Set<SymbolUsage>>();
  private readonly metadataUsage = new Map<string, Set<SymbolUsage>>();
  private readonly targetUsage = new Map<string, Set<SymbolUsage>>();
  private readonly declaredFrameworks: FrameworkReference[] = [];

  constructor(source: string) {
    super("inferred", source);
  }

  get frameworks(): readonly FrameworkReference[] {
    return this.declaredFrameworks;
  }

  isPropertyUsed(name: string, usage: SymbolUsage): boolean {
    return this.propertyUsage.get(key(name))?.has(usage) ?? false;
  }

  isItemUsed(name: string, usage: SymbolUsage): boolean {
    return this.itemUsage.get(key(name))?.has(usage) ?? false;
  }

  isMetadataUsed(itemName: string, name: string, usage: SymbolUsage): boolean {
    return this.metadataUsage.get(metadataKey(itemName, name))?.has(usage) ?? false;
  }

  isTargetUsed(name: string, usage: SymbolUsage): boolean {
    return this.targetUsage.get(key(name))?.has(usage) ?? false;
  }

  // ---------------------------------------------------------------------------
  // Recording (inference pass only)
  // ---------------------------------------------------------------------------

  recordProperty(name: string, usage: SymbolUsage): void {
    if (name.length === 0) return;
    this.addProperty({ kind: "property", name, valueKind: UNKNOWN_KIND });
    mark(this.propertyUsage, key(name), usage);
  }

  recordItem(name: string, usage: SymbolUsage): void {
    if (name.length === 0) return;
    this.addItem({ kind: "item", name, valueKind: UNKNOWN_KIND });
    mark(this.itemUsage, key(name), usage);
  }

  recordMetadata(itemName: string, name: string, usage: SymbolUsage): void {
    if (itemName.length === 0 || name.length === 0) return;
    this.addItem({ kind: "item", name: itemName, valueKind: UNKNOWN_KIND });
    this.addMetadata({ kind: "metadata", itemName, name, valueKind: UNKNOWN_KIND });
    mark(this.metadataUsage, metadataKey(itemName, name), usage);
  }

  recordTarget(name: string, usage: SymbolUsage): void {
    if (name.length === 0) return;
    this.addTarget({ kind: "target", name, valueKind: UNKNOWN_KIND });
    mark(this.targetUsage, key(name), usage);
  }

  recordFramework(framework: FrameworkReference): void {
    this.declaredFrameworks.push(framework);
  }
}

function mark(map: Map<string, Set<SymbolUsage>>, name: string, usage: SymbolUsage): void {
  let usages = map.get(name);
  if (!usages) {
    usages = new Set();
    map.set(name, usages);
  }
  usages.add(usage);
}

export interface InferenceOptions extends VisitorOptions {
  taskAssemblyResolver?: TaskAssemblyResolver;
}

/**
 * Infer the schema of a document. The document's own `inferredSchema` is ignored; the
 * caller builds a new document around the result.
 */
export function inferSchema(document: MsBuildDocument, options: InferenceOptions = {}): InferredSchema {
  const visitor = new InferenceVisitor(document, options);
  visitor.run();
  return visitor.finish();
}

// =============================================================================
// Inference pass
// =============================================================================

interface TaskUsage {
  name: string;
  parameters: Map<string, TaskParameterSymbol>;
}

interface FrameworkValues {
  shortNames: string[];
  identifier: string | null;
  version: string | null;
  profile: string | null;
}

class InferenceVisitor extends DocumentVisitor {
  private readonly schema: InferredSchema;
  private readonly taskUsages = new Map<string, TaskUsage>();
  private readonly frameworkValues: FrameworkValues = { shortNames: [], identifier: null, version: null, profile: null };
  private readonly resolver: TaskAssemblyResolver | undefined;

  constructor(document: MsBuildDocument, options: InferenceOptions) {
    super(document, options);
    this.schema = new InferredSchema(document.fileName || "<document>");
    this.resolver = options.taskAssemblyResolver;
  }

  override run(): void {
    const project = this.document.xml.projectElement;
    if (project) {
      for (const child of project.elements()) {
        if (child.nameEquals("UsingTask")) this.declareTask(child);
      }
    }
    super.run();
  }

  finish(): InferredSchema {
    for (const usage of this.taskUsages.values()) {
      this.schema.setTask({
        kind: "task",
        name: usage.name,
        valueKind: UNKNOWN_KIND,
        declarationKind: "inferred",
        parameters: usage.parameters,
      });
    }
    for (const framework of this.collectFrameworks()) {
      this.schema.recordFramework(framework);
    }
    return this.schema;
  }

  protected override visitResolvedElement(resolved: ResolvedElement): void {
    const { element, syntax } = resolved;
    switch (syntax.syntaxKind) {
      case "Property":
        this.schema.recordProperty(element.name, "write");
        this.collectFrameworkValue(element);
        break;
      case "Item":
      case "ItemDefinition":
        this.schema.recordItem(element.name, "write");
        break;
      case "Metadata":
        if (element.parent) this.schema.recordMetadata(element.parent.name, element.name, "write");
        break;
      case "Target": {
        const name = literalAttribute(element, "Name");
        if (name) this.schema.recordTarget(name, "declaration");
        break;
      }
      case "Output": {
        const propertyName = literalAttribute(element, "PropertyName");
        if (propertyName) this.schema.recordProperty(propertyName, "write");
        const itemName = literalAttribute(element, "ItemName");
        if (itemName) this.schema.recordItem(itemName, "write");
        break;
      }
      case "Task":
        this.recordTaskUsage(element);
        break;
      default:
        break;
    }
    super.visitResolvedElement(resolved);
  }

  protected override visitResolvedAttribute(resolved: ResolvedAttribute): void {
    if (resolved.syntax.syntaxKind === "Item_Metadata") {
      this.schema.recordMetadata(resolved.element.name, resolved.attribute.name, "write");
    }
    super.visitResolvedAttribute(resolved);
  }

  protected override visitValue(value: VisitedValue): void {
    const enclosingItem = enclosingItemName(value.element, value.elementSyntax);
    walkExpression(value.expression, (node, transformItem) => {
      switch (node.kind) {
        case "property":
          this.schema.recordProperty(node.name, "read");
          break;
        case "item":
          this.schema.recordItem(node.name, "read");
          break;
        case "metadata": {
          const itemName = node.itemName ?? transformItem?.name ?? enclosingItem;
          if (itemName) this.schema.recordMetadata(itemName, node.name, "read");
          break;
        }
        default:
          break;
      }
    });

    if (value.symbol.valueKind.tag === "TargetName" && value.attributeSyntax?.syntaxKind !== "Target_Name") {
      for (const name of literalMembers(value.expression, value.offset, value.text)) {
        this.schema.recordTarget(name, "read");
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  private declareTask(element: XElement): void {
    const fullName = literalAttribute(element, "TaskName");
    if (!fullName) return;
    const taskName = parseTaskName(fullName);
    if (!taskName) return;

    const factory = literalAttribute(element, "TaskFactory");
    let declarationKind: TaskDeclarationKind;
    let parameters: readonly TaskParameterSymbol[];
    if (factory) {
      declarationKind = "task-factory";
      parameters = factoryParameters(element);
    } else {
      const resolved = this.resolveAssemblyTask({
        taskName: taskName.name,
        namespace: taskName.namespace,
        assemblyName: literalAttribute(element, "AssemblyName"),
        assemblyFile: literalAttribute(element, "AssemblyFile"),
      });
      declarationKind = resolved ? "assembly" : "assembly-unresolved";
      parameters = resolved ?? [];
    }

    this.schema.setTask(
      {
        kind: "task",
        name: taskName.name,
        valueKind: UNKNOWN_KIND,
        declarationKind,
        parameters: taskParameterMap(parameters),
        ...(taskName.namespace !== null ? { namespace: taskName.namespace } : {}),
      },
      taskName.namespace !== null ? fullName : undefined,
    );
  }

  /** Without a resolver, a task resolves when an external schema describes it. */
  private resolveAssemblyTask(declaration: TaskAssemblyDeclaration): readonly TaskParameterSymbol[] | null {
    if (this.resolver) return this.resolver(declaration);
    const known = this.document.schemas.getTask(declaration.taskName);
    return known ? [...known.parameters.values()] : null;
  }

  private recordTaskUsage(element: XElement): void {
    if (this.schema.getTask(element.name) || this.document.schemas.getTask(element.name)) return;

    let usage = this.taskUsages.get(key(element.name));
    if (!usage) {
      usage = { name: element.name, parameters: new Map() };
      this.taskUsages.set(key(element.name), usage);
    }

    const taskSyntax = this.document.syntax.get("Task");
    for (const attribute of element.attributes) {
      if (!taskSyntax || this.document.syntax.resolveAttribute(attribute, taskSyntax)?.isAbstract !== true) continue;
      addInferredParameter(usage.parameters, attribute.name, false);
    }
    for (const output of element.elements()) {
      if (!output.nameEquals("Output")) continue;
      const parameter = literalAttribute(output, "TaskParameter");
      if (parameter) addInferredParameter(usage.parameters, parameter, true);
    }
  }

  // ---------------------------------------------------------------------------
  // Frameworks
  // ---------------------------------------------------------------------------

  private collectFrameworkValue(element: XElement): void {
    const parts = elementValues(element);
    if (parts.length === 0) return;
    const values = this.frameworkValues;
    const literal = parts.map((part) => unescapeTrimmed(part.text, part.span.start).value).join("");
    if (literal.length === 0 || literal.includes("$(")) return;

    switch (key(element.name)) {
      case "targetframework":
        values.shortNames.push(literal);
        break;
      case "targetframeworks":
        for (const entry of literal.split(";")) {
          const trimmed = entry.trim();
          if (trimmed.length > 0) values.shortNames.push(trimmed);
        }
        break;
      case "targetframeworkidentifier":
        values.identifier = literal;
        break;
      case "targetframeworkversion":
        values.version = literal;
        break;
      case "targetframeworkprofile":
        values.profile = literal;
        break;
      default:
        break;
    }
  }

  private collectFrameworks(): FrameworkReference[] {
    const { shortNames, identifier, version, profile } = this.frameworkValues;
    const frameworks: FrameworkReference[] = [];
    for (const shortName of shortNames) {
      const result = validateFrameworkShortName(shortName);
      if (result.kind === "ok") frameworks.push(result.framework);
    }
    if (frameworks.length > 0 || identifier === null || version === null) return frameworks;

    const parsed = parseFrameworkVersion(version.replace(/^[vV]/, ""));
    if (parsed) frameworks.push({ identifier, version: parsed, profile });
    return frameworks;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/** Trimmed, unescaped attribute value when it contains no expression; else null. */
export function literalAttribute(element: XElement, name: string): string | null {
  const attribute = element.getAttribute(name);
  if (!attribute?.value || !attribute.valueSpan) return null;
  const value = unescapeTrimmed(attribute.value, attribute.valueSpan.start).value;
  if (value.length === 0 || /[$@%]\(/.test(value)) return null;
  return value;
}

/** Unescaped, trimmed text of each pure-text list member. */
function literalMembers(expression: ExpressionNode, offset: number, text: string): string[] {
  const values: string[] = [];
  for (const member of listMembers(expression)) {
    if (member.kind !== "text") continue;
    const relative = member.span.start - offset;
    const raw = text.slice(relative, relative + (member.span.end - member.span.start));
    const value = unescapeTrimmed(raw, member.span.start).value;
    if (value.length > 0) values.push(value);
  }
  return values;
}

function addInferredParameter(parameters: Map<string, TaskParameterSymbol>, name: string, isOutput: boolean): void {
  const existing = parameters.get(key(name));
  if (existing && (existing.isOutput || !isOutput)) return;
  parameters.set(key(name), {
    kind: "task-parameter",
    name,
    valueKind: UNKNOWN_KIND,
    required: false,
    isOutput,
  });
}

function factoryParameters(usingTask: XElement): TaskParameterSymbol[] {
  const parameters: TaskParameterSymbol[] = [];
  for (const group of usingTask.elements()) {
    if (!group.nameEquals("ParameterGroup")) continue;
    for (const parameter of group.elements()) {
      if (parameter.hasPrefix) continue;
      parameters.push({
        kind: "task-parameter",
        name: parameter.name,
        valueKind: parameterValueKind(literalAttribute(parameter, "ParameterType")),
        required: literalAttribute(parameter, "Required")?.toLowerCase() === "true",
        isOutput: literalAttribute(parameter, "Output")?.toLowerCase() === "true",
      });
    }
  }
  return parameters;
}

const PARAMETER_TYPES: Readonly<Record<string, string>> = {
  "system.string": "String",
  "system.boolean": "Bool",
  "system.int32": "Int",
  "system.int64": "Int",
  "microsoft.build.framework.itaskitem": "File",
};

function parameterValueKind(parameterType: string | null): ValueKind {
  if (parameterType === null) return { tag: "String", list: "none", literal: false };
  const isArray = parameterType.endsWith("[]");
  const typeName = isArray ? parameterType.slice(0, -2) : parameterType;
  const tag = PARAMETER_TYPES[typeName.trim().toLowerCase()];
  if (!tag) return UNKNOWN_KIND;
  return parseValueKind(isArray ? `${tag}[]` : tag) ?? UNKNOWN_KIND;
}
