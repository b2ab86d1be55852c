// Culture names and LCIDs the validator recognizes (bundled JSON)

import { z } from "zod";
import culturesJson from "../data/cultures.json" with { type: "json" };

const culturesDocumentSchema = z.object({
  cultures: z.array(z.object({ name: z.string(), lcid: z.number().int().positive() })),
});

interface CultureTables {
  names: ReadonlySet<string>;
  lcids: ReadonlySet<number>;
}

let tables: CultureTables | null = null;

function cultureTables(): CultureTables {
  if (!tables) {
    const { cultures } = culturesDocumentSchema.parse(culturesJson);
    tables = {
      names: new Set(cultures.map((c) => c.name.toLowerCase())),
      lcids: new Set(cultures.map((c) => c.lcid)),
    };
  }
  return tables;
}

const CULTURE_NAME = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

export function isValidCultureName(value: string): boolean {
  return CULTURE_NAME.test(value);
}

export function isKnownCulture(value: string): boolean {
  return cultureTables().names.has(value.toLowerCase());
}

/** Parses a decimal LCID; null when the value is not a positive 32-bit integer. */
export function parseLcid(value: string): number | null {
  if (!/^\d{1,10}$/.test(value)) return null;
  const lcid = Number(value);
  return lcid > 0 && lcid <= 0xffffffff ? lcid : null;
}

export function isKnownLcid(lcid: number): boolean {
  return cultureTables().lcids.has(lcid);
}
