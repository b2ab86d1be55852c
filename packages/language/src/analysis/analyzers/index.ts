import type { MsBuildAnalyzer } from "../analyzer.js";
import { runtimeIdentifierAnalyzer } from "./runtime-identifier.js";

export { runtimeIdentifierAnalyzer };

/** Analyzers enabled by default. */
export const BUILTIN_ANALYZERS: readonly MsBuildAnalyzer[] = [runtimeIdentifierAnalyzer];
