import { describe, test, expect } from "vitest";
import { collectImportedSchemas, literalImports } from "@msbuild-ls/language-server";
import { createLogger, memoryFiles } from "../helpers/test-factories.js";

const APP = [
  `<Project>`,
  `  <Import Project="build\\common.props" />`,
  `  <ImportGroup>`,
  `    <Import Project="$(Dir)x.props" />`,
  `    <Import Project="missing.props" />`,
  `  </ImportGroup>`,
  `  <Import Project="Sdk.props" Sdk="Microsoft.NET.Sdk" />`,
  `  <Import Project="*.props" />`,
  `</Project>`,
].join("\n");

const FILES = {
  "/ws/build/common.props": [
    `<Project>`,
    `  <PropertyGroup>`,
    `    <CommonProp>1</CommonProp>`,
    `  </PropertyGroup>`,
    `  <Import Project="../app.csproj" />`,
    `  <Import Project="deep.props" />`,
    `</Project>`,
  ].join("\n"),
  "/ws/build/deep.props": `<Project>\n  <ItemGroup>\n    <DeepItem Include="x" />\n  </ItemGroup>\n</Project>`,
};

describe("literalImports", () => {
  test("resolves literal project paths relative to the importing file", () => {
    expect(literalImports(APP, "/ws/app.csproj")).toEqual(["/ws/build/common.props", "/ws/missing.props"]);
  });

  test("returns nothing without a project element", () => {
    expect(literalImports("<Other />", "/ws/app.csproj")).toEqual([]);
  });
});

describe("collectImportedSchemas", () => {
  test("infers imported documents depth first and skips cycles", () => {
    const logger = createLogger();
    const readFile = memoryFiles(FILES);
    const schemas = collectImportedSchemas(APP, "/ws/app.csproj", { maxDepth: 8, logger, readFile });

    expect(schemas.map((schema) => schema.source)).toEqual(["/ws/build/common.props", "/ws/build/deep.props"]);
    expect(schemas[0]?.getProperty("commonprop")?.name).toBe("CommonProp");
    expect(schemas[1]?.getItem("DeepItem")?.name).toBe("DeepItem");
    expect(readFile.mock.calls.map(([filePath]) => filePath)).toEqual([
      "/ws/build/common.props",
      "/ws/build/deep.props",
      "/ws/missing.props",
    ]);
    expect(logger.warn).toHaveBeenCalledWith("[imports] cannot read /ws/missing.props (imported by /ws/app.csproj)");
  });

  test("stops at the configured depth", () => {
    const options = { logger: createLogger(), readFile: memoryFiles(FILES) };
    expect(collectImportedSchemas(APP, "/ws/app.csproj", { ...options, maxDepth: 1 }).map((s) => s.source)).toEqual([
      "/ws/build/common.props",
    ]);
    expect(collectImportedSchemas(APP, "/ws/app.csproj", { ...options, maxDepth: 0 })).toEqual([]);
  });
});
