/* =======================================================================================
 * Schema model
 * ---------------------------------------------------------------------------------------
 * - SchemaProvider: read-only, case-insensitive lookup of typed symbols
 * - MsBuildSchema: map-backed provider used for loaded schema files and inference
 * - SchemaCollection: ordered aggregate (explicit > imported > inferred); the first
 *   provider that knows a name wins
 * ======================================================================================= */

import type {
  CustomTypeInfo,
  ItemSymbol,
  KnownValueSymbol,
  MetadataSymbol,
  PropertySymbol,
  TargetSymbol,
  TaskSymbol,
} from "./symbols.js";

export type SchemaOrigin = "explicit" | "imported" | "inferred";

export interface SchemaProvider {
  readonly origin: SchemaOrigin;
  /** Human-readable source, e.g. a schema file path. */
  readonly source: string;
  getProperty(name: string): PropertySymbol | null;
  getItem(name: string): ItemSymbol | null;
  /** `itemName` null looks only at metadata common to every item. */
  getMetadata(itemName: string | null, name: string): MetadataSymbol | null;
  getTask(name: string): TaskSymbol | null;
  getTarget(name: string): TargetSymbol | null;
}

const key = (name: string): string => name.toLowerCase();

export class MsBuildSchema implements SchemaProvider {
  private readonly properties = new Map<string, PropertySymbol>();
  private readonly items = new Map<string, ItemSymbol>();
  private readonly metadata = new Map<string, Map<string, MetadataSymbol>>();
  private readonly commonMetadata = new Map<string, MetadataSymbol>();
  private readonly tasks = new Map<string, TaskSymbol>();
  private readonly targets = new Map<string, TargetSymbol>();

  constructor(
    readonly origin: SchemaOrigin,
    readonly source: string,
  ) {}

  getProperty(name: string): PropertySymbol | null {
    return this.properties.get(key(name)) ?? null;
  }

  getItem(name: string): ItemSymbol | null {
    return this.items.get(key(name)) ?? null;
  }

  getMetadata(itemName: string | null, name: string): MetadataSymbol | null {
    if (itemName !== null) {
      const own = this.metadata.get(key(itemName))?.get(key(name));
      if (own) return own;
    }
    return this.commonMetadata.get(key(name)) ?? null;
  }

  getTask(name: string): TaskSymbol | null {
    return this.tasks.get(key(name)) ?? null;
  }

  getTarget(name: string): TargetSymbol | null {
    return this.targets.get(key(name)) ?? null;
  }

  // ---------------------------------------------------------------------------
  // Population (loaders and inference only; providers are read-only once built)
  // ---------------------------------------------------------------------------

  /** Adds a property unless one with the same name exists; returns the stored symbol. */
  addProperty(symbol: PropertySymbol): PropertySymbol {
    return addOnce(this.properties, symbol);
  }

  addItem(symbol: ItemSymbol): ItemSymbol {
    return addOnce(this.items, symbol);
  }

  addMetadata(symbol: MetadataSymbol): MetadataSymbol {
    if (symbol.itemName === null) return addOnce(this.commonMetadata, symbol);
    let forItem = this.metadata.get(key(symbol.itemName));
    if (!forItem) {
      forItem = new Map();
      this.metadata.set(key(symbol.itemName), forItem);
    }
    return addOnce(forItem, symbol);
  }

  /** Tasks replace earlier entries, so a declaration can supersede an inferred usage. */
  setTask(symbol: TaskSymbol, alias?: string): void {
    this.tasks.set(key(symbol.name), symbol);
    if (alias !== undefined) this.tasks.set(key(alias), symbol);
  }

  addTarget(symbol: TargetSymbol): TargetSymbol {
    return addOnce(this.targets, symbol);
  }

  allProperties(): Iterable<PropertySymbol> {
    return this.properties.values();
  }

  allItems(): Iterable<ItemSymbol> {
    return this.items.values();
  }

  allTasks(): Iterable<TaskSymbol> {
    return new Set(this.tasks.values());
  }

  allTargets(): Iterable<TargetSymbol> {
    return this.targets.values();
  }
}

function addOnce<T extends { readonly name: string }>(map: Map<string, T>, symbol: T): T {
  const existing = map.get(key(symbol.name));
  if (existing) return existing;
  map.set(key(symbol.name), symbol);
  return symbol;
}

export interface SchemaLookupOptions {
  /**
   * Exclude the current document's own inferred schema, so a document cannot count
   * its own declarations as uses.
   */
  skipInferred?: boolean;
}

export class SchemaCollection {
  constructor(
    readonly explicit: readonly SchemaProvider[],
    readonly imported: readonly SchemaProvider[],
    readonly inferred: SchemaProvider | null,
  ) {}

  providers(options?: SchemaLookupOptions): SchemaProvider[] {
    const ordered = [...this.explicit, ...this.imported];
    if (this.inferred && !options?.skipInferred) ordered.push(this.inferred);
    return ordered;
  }

  getProperty(name: string, options?: SchemaLookupOptions): PropertySymbol | null {
    return this.first((p) => p.getProperty(name), options);
  }

  getItem(name: string, options?: SchemaLookupOptions): ItemSymbol | null {
    return this.first((p) => p.getItem(name), options);
  }

  getMetadata(itemName: string | null, name: string, options?: SchemaLookupOptions): MetadataSymbol | null {
    return this.first((p) => p.getMetadata(itemName, name), options);
  }

  getTask(name: string, options?: SchemaLookupOptions): TaskSymbol | null {
    return this.first((p) => p.getTask(name), options);
  }

  getTarget(name: string, options?: SchemaLookupOptions): TargetSymbol | null {
    return this.first((p) => p.getTarget(name), options);
  }

  private first<T>(lookup: (provider: SchemaProvider) => T | null, options?: SchemaLookupOptions): T | null {
    for (const provider of this.providers(options)) {
      const found = lookup(provider);
      if (found !== null) return found;
    }
    return null;
  }
}

// =============================================================================
// Known values
// =============================================================================

export type KnownValueResult =
  | { kind: "matched"; value: KnownValueSymbol }
  | { kind: "unknown-allowed" }
  | { kind: "unknown-error" };

/**
 * Match a literal against the closed or open value set of a symbol's custom type.
 * Symbols without known values accept anything.
 */
export function tryGetKnownValue(
  symbol: { readonly customType?: CustomTypeInfo },
  text: string,
): KnownValueResult {
  const customType = symbol.customType;
  if (!customType || customType.values.length === 0) return { kind: "unknown-allowed" };
  const lower = text.toLowerCase();
  const value = customType.values.find((v) => v.name.toLowerCase() === lower);
  if (value) return { kind: "matched", value };
  return customType.allowUnknownValues ? { kind: "unknown-allowed" } : { kind: "unknown-error" };
}
