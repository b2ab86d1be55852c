/* =======================================================================================
 * Schema files
 * ---------------------------------------------------------------------------------------
 * JSON schema documents describing properties, items (with their metadata), common
 * metadata, tasks (with parameters), targets and named custom types. Documents are
 * validated with zod and then turned into an MsBuildSchema provider.
 *
 * A symbol's `type` is either a value-kind string (`Bool`, `TargetName[]`), a reference
 * to a named custom type (`@OutputType`), or an inline custom type object.
 * ======================================================================================= */

import { z } from "zod";
import { SchemaLoadError } from "../shared/errors.js";
import { MsBuildSchema, type SchemaOrigin } from "./schema.js";
import {
  taskParameterMap,
  type CustomTypeInfo,
  type KnownValueSymbol,
  type SymbolBase,
  type TaskParameterSymbol,
} from "./symbols.js";
import { parseValueKind, UNKNOWN_KIND, type ValueKind } from "./value-kind.js";

const knownValueSchema = z.union([
  z.string(),
  z.object({
    description: z.string().optional(),
    deprecated: z.string().optional(),
  }),
]);

const customTypeSchema = z.object({
  name: z.string().optional(),
  values: z.record(z.string(), knownValueSchema),
  allowUnknownValues: z.boolean().default(false),
  baseKind: z.string().optional(),
  analyzerHints: z.record(z.string(), z.string()).default({}),
});

const symbolSchema = z.object({
  description: z.string().optional(),
  type: z.union([z.string(), customTypeSchema]).optional(),
  default: z.string().optional(),
  deprecated: z.string().optional(),
});

const propertySchema = symbolSchema.extend({
  reserved: z.boolean().optional(),
  readonly: z.boolean().optional(),
});

const itemSchema = symbolSchema.extend({
  metadata: z.record(z.string(), symbolSchema).default({}),
});

const parameterSchema = symbolSchema.extend({
  required: z.boolean().default(false),
  output: z.boolean().default(false),
});

const taskSchema = z.object({
  description: z.string().optional(),
  deprecated: z.string().optional(),
  namespace: z.string().optional(),
  parameters: z.record(z.string(), parameterSchema).default({}),
});

const targetSchema = z.object({
  description: z.string().optional(),
  deprecated: z.string().optional(),
});

export const schemaDocumentSchema = z.object({
  license: z.string().optional(),
  types: z.record(z.string(), customTypeSchema).default({}),
  properties: z.record(z.string(), propertySchema).default({}),
  items: z.record(z.string(), itemSchema).default({}),
  metadata: z.record(z.string(), symbolSchema).default({}),
  tasks: z.record(z.string(), taskSchema).default({}),
  targets: z.record(z.string(), targetSchema).default({}),
});

export type SchemaDocument = z.infer<typeof schemaDocumentSchema>;
type SymbolEntry = z.infer<typeof symbolSchema>;
type CustomTypeEntry = z.infer<typeof customTypeSchema>;

/** Parse and validate schema JSON text. */
export function loadSchemaText(text: string, origin: SchemaOrigin, source: string): MsBuildSchema {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new SchemaLoadError(source, [e instanceof Error ? e.message : String(e)]);
  }
  return loadSchemaJson(json, origin, source);
}

/** Validate an already-parsed schema document. */
export function loadSchemaJson(json: unknown, origin: SchemaOrigin, source: string): MsBuildSchema {
  const parsed = schemaDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new SchemaLoadError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return new SchemaBuilder(parsed.data, origin, source).build();
}

class SchemaBuilder {
  private readonly issues: string[] = [];
  private readonly namedTypes = new Map<string, CustomTypeInfo>();

  constructor(
    private readonly doc: SchemaDocument,
    private readonly origin: SchemaOrigin,
    private readonly source: string,
  ) {}

  build(): MsBuildSchema {
    const schema = new MsBuildSchema(this.origin, this.source);

    for (const [name, entry] of Object.entries(this.doc.types)) {
      this.namedTypes.set(name.toLowerCase(), this.customType(entry, `types.${name}`, name));
    }

    for (const [name, entry] of Object.entries(this.doc.properties)) {
      schema.addProperty({
        kind: "property",
        ...this.base(name, entry, `properties.${name}`),
        ...(entry.reserved ? { reserved: true } : {}),
        ...(entry.readonly ? { readOnly: true } : {}),
      });
    }

    for (const [name, entry] of Object.entries(this.doc.items)) {
      schema.addItem({ kind: "item", ...this.base(name, entry, `items.${name}`) });
      for (const [metaName, meta] of Object.entries(entry.metadata)) {
        schema.addMetadata({
          kind: "metadata",
          itemName: name,
          ...this.base(metaName, meta, `items.${name}.metadata.${metaName}`),
        });
      }
    }

    for (const [name, entry] of Object.entries(this.doc.metadata)) {
      schema.addMetadata({ kind: "metadata", itemName: null, ...this.base(name, entry, `metadata.${name}`) });
    }

    for (const [fullName, entry] of Object.entries(this.doc.tasks)) {
      const parameters: TaskParameterSymbol[] = Object.entries(entry.parameters).map(([paramName, param]): TaskParameterSymbol => ({
        kind: "task-parameter",
        ...this.base(paramName, param, `tasks.${fullName}.parameters.${paramName}`),
        required: param.required,
        isOutput: param.output,
      }));
      const dot = fullName.lastIndexOf(".");
      const name = dot >= 0 ? fullName.slice(dot + 1) : fullName;
      const namespace = entry.namespace ?? (dot >= 0 ? fullName.slice(0, dot) : undefined);
      schema.setTask({
        kind: "task",
        name,
        valueKind: UNKNOWN_KIND,
        declarationKind: "assembly",
        parameters: taskParameterMap(parameters),
        ...(namespace !== undefined ? { namespace } : {}),
        ...(entry.description !== undefined ? { description: entry.description } : {}),
        ...(entry.deprecated !== undefined ? { deprecationMessage: entry.deprecated } : {}),
      });
    }

    for (const [name, entry] of Object.entries(this.doc.targets)) {
      schema.addTarget({
        kind: "target",
        name,
        valueKind: UNKNOWN_KIND,
        ...(entry.description !== undefined ? { description: entry.description } : {}),
        ...(entry.deprecated !== undefined ? { deprecationMessage: entry.deprecated } : {}),
      });
    }

    if (this.issues.length > 0) {
      throw new SchemaLoadError(this.source, this.issues);
    }
    return schema;
  }

  private base(name: string, entry: SymbolEntry, path: string): SymbolBase {
    const { valueKind, customType } = this.resolveType(entry.type, path);
    return {
      name,
      valueKind,
      ...(entry.description !== undefined ? { description: entry.description } : {}),
      ...(entry.deprecated !== undefined ? { deprecationMessage: entry.deprecated } : {}),
      ...(entry.default !== undefined ? { defaultValue: entry.default } : {}),
      ...(customType ? { customType } : {}),
    };
  }

  private resolveType(
    type: SymbolEntry["type"],
    path: string,
  ): { valueKind: ValueKind; customType: CustomTypeInfo | null } {
    if (type === undefined) return { valueKind: UNKNOWN_KIND, customType: null };

    if (typeof type !== "string") {
      return { valueKind: customKind("none"), customType: this.customType(type, path, undefined) };
    }

    // `@Name` or `@Name[]`
    if (type.startsWith("@")) {
      const list = type.endsWith("[]");
      const typeName = list ? type.slice(1, -2) : type.slice(1);
      const customType = this.namedTypes.get(typeName.toLowerCase());
      if (!customType) {
        this.issues.push(`${path}: unknown custom type '${typeName}'`);
        return { valueKind: UNKNOWN_KIND, customType: null };
      }
      return { valueKind: customKind(list ? "semicolon" : "none"), customType };
    }

    const valueKind = parseValueKind(type);
    if (!valueKind) {
      this.issues.push(`${path}: invalid value kind '${type}'`);
      return { valueKind: UNKNOWN_KIND, customType: null };
    }
    return { valueKind, customType: null };
  }

  private customType(entry: CustomTypeEntry, path: string, name: string | undefined): CustomTypeInfo {
    const values: KnownValueSymbol[] = Object.entries(entry.values).map(([valueName, value]): KnownValueSymbol => {
      const details: { description?: string; deprecated?: string } =
        typeof value === "string" ? { description: value } : value;
      return {
        kind: "value",
        name: valueName,
        valueKind: UNKNOWN_KIND,
        ...(details.description !== undefined ? { description: details.description } : {}),
        ...(details.deprecated !== undefined ? { deprecationMessage: details.deprecated } : {}),
      };
    });

    let baseKind: ValueKind | undefined;
    if (entry.baseKind !== undefined) {
      const parsed = parseValueKind(entry.baseKind);
      if (parsed) {
        baseKind = parsed;
      } else {
        this.issues.push(`${path}.baseKind: invalid value kind '${entry.baseKind}'`);
      }
    }

    const typeName = entry.name ?? name;
    return {
      values,
      allowUnknownValues: entry.allowUnknownValues,
      analyzerHints: entry.analyzerHints,
      ...(typeName !== undefined ? { name: typeName } : {}),
      ...(baseKind ? { baseKind } : {}),
    };
  }
}

function customKind(list: ValueKind["list"]): ValueKind {
  return { tag: "CustomType", list, literal: false };
}
