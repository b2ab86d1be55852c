import fs from "node:fs";

/** Reads a text file; null when it cannot be read. */
export type ReadTextFile = (filePath: string) => string | null;

export const readTextFileSync: ReadTextFile = (filePath) => {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch {
    return null;
  }
};
