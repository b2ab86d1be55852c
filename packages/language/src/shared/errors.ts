/** Raised when a schema or bundled data file fails to parse or validate. */
export class SchemaLoadError extends Error {
  constructor(
    readonly source: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid schema '${source}': ${issues.join("; ")}`);
    this.name = "SchemaLoadError";
  }
}
