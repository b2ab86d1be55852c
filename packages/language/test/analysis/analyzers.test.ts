import { describe, it, expect, vi } from "vitest";

import {
  analyzeDocument,
  defineDiagnostic,
  type AnalyzeOptions,
  type MsBuildAnalyzer,
  type MsBuildDiagnostic,
} from "../../src/index.js";

function diagnose(text: string, options: AnalyzeOptions = {}): readonly MsBuildDiagnostic[] {
  const result = analyzeDocument(text, { fileName: "test.csproj", ...options });
  if (result.status !== "completed") throw new Error("analysis was cancelled");
  return result.diagnostics;
}

function propertyGroup(body: string): string {
  return `<Project Sdk="Microsoft.NET.Sdk">\n  <PropertyGroup>\n    ${body}\n  </PropertyGroup>\n</Project>`;
}

function createLogger() {
  return { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function throwingAnalyzer(id: string): MsBuildAnalyzer {
  return {
    id,
    supportedDiagnostics: [],
    initialize(context) {
      context.registerPropertyWriteAction(() => {
        throw new Error("boom");
      }, "Foo");
    },
  };
}

describe("runtime identifier analyzer", () => {
  it("replaces the list diagnostic for several RIDs", () => {
    const text = propertyGroup(`<RuntimeIdentifier>win-x64;linux-x64</RuntimeIdentifier>`);
    const diagnostics = diagnose(text);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({
      code: "UseRuntimeIdentifiersForMultipleRIDs",
      severity: "error",
      source: "runtime-identifier",
    });
    const start = text.indexOf("<RuntimeIdentifier>");
    const end = text.indexOf("</RuntimeIdentifier>") + "</RuntimeIdentifier>".length;
    expect(diagnostics[0]?.span).toEqual({ start, end });

    expect(diagnose(text, { analyzers: [] }).map((d) => d.code)).toEqual(["UnexpectedList"]);
  });

  it("suggests RuntimeIdentifier for a single RID", () => {
    const diagnostics = diagnose(propertyGroup(`<RuntimeIdentifiers>win-x64</RuntimeIdentifiers>`));
    expect(diagnostics.map((d) => [d.code, d.severity])).toEqual([["UseRuntimeIdentifierForSingleRID", "warning"]]);
  });

  it("accepts the matching property", () => {
    expect(diagnose(propertyGroup(`<RuntimeIdentifiers>win-x64;linux-x64</RuntimeIdentifiers>`))).toEqual([]);
  });
});

describe("analyzer driver", () => {
  it("fires item and metadata write actions", () => {
    const itemAction = vi.fn();
    const metadataTexts: string[] = [];
    const linkSet = {
      code: "LinkSet",
      ...defineDiagnostic({
        category: "analyzer",
        defaultSeverity: "warning",
        title: "Link set",
        message: "Link set to '{0}'",
      }),
    };
    const analyzer: MsBuildAnalyzer = {
      id: "links",
      supportedDiagnostics: [linkSet],
      initialize(context) {
        context.registerItemWriteAction(itemAction, "compile");
        context.registerMetadataWriteAction(
          (ctx) => {
            metadataTexts.push(`${ctx.itemName}.${ctx.metadataName}=${ctx.text}`);
            ctx.report("LinkSet", { span: ctx.element.nameSpan, args: [ctx.text] });
          },
          { itemName: null, name: "Link" },
        );
      },
    };
    const text = [
      `<Project Sdk="Microsoft.NET.Sdk">`,
      `  <ItemGroup>`,
      `    <Compile Include="a.cs" Link="x" />`,
      `    <Compile Include="b.cs">`,
      `      <Link>y</Link>`,
      `    </Compile>`,
      `  </ItemGroup>`,
      `</Project>`,
    ].join("\n");

    const diagnostics = diagnose(text, { analyzers: [analyzer] });
    expect(itemAction).toHaveBeenCalledTimes(2);
    expect(metadataTexts).toEqual(["Compile.Link=x", "Compile.Link=y"]);
    expect(diagnostics.filter((d) => d.source === "links").map((d) => d.message)).toEqual([
      "Link set to 'x'",
      "Link set to 'y'",
    ]);
  });

  it("contains a failing action and reports it", () => {
    const logger = createLogger();
    const text = propertyGroup(`<Foo>1</Foo>`);
    const diagnostics = diagnose(text, { analyzers: [throwingAnalyzer("thrower")], logger });
    const internal = diagnostics.filter((d) => d.code === "InternalError");
    const nameStart = text.indexOf("<Foo>") + 1;
    expect(internal).toMatchObject([
      { message: "Internal error: thrower: boom", span: { start: nameStart, end: nameStart + 3 } },
    ]);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(String(logger.error.mock.calls[0]?.[0])).toMatch(/^\[analyzer\] thrower failed: Error: boom/);
  });

  it("reports an analyzer that fails to initialize", () => {
    const analyzer: MsBuildAnalyzer = {
      id: "broken",
      supportedDiagnostics: [],
      initialize() {
        throw new Error("init failed");
      },
    };
    const diagnostics = diagnose(propertyGroup(`<Foo>1</Foo>`), { analyzers: [analyzer] });
    expect(diagnostics.filter((d) => d.code === "InternalError")).toMatchObject([
      { args: ["broken: init failed"], span: { start: 0, end: 0 } },
    ]);
  });

  it("rejects diagnostics an analyzer did not declare", () => {
    const analyzer: MsBuildAnalyzer = {
      id: "sloppy",
      supportedDiagnostics: [],
      initialize(context) {
        context.registerPropertyWriteAction((ctx) => ctx.report("Nope", { span: ctx.element.span }), "Foo");
      },
    };
    const diagnostics = diagnose(propertyGroup(`<Foo>1</Foo>`), { analyzers: [analyzer] });
    expect(diagnostics.filter((d) => d.code === "InternalError").map((d) => d.args)).toEqual([
      ["sloppy: Analyzer 'sloppy' reported unsupported diagnostic 'Nope'"],
    ]);
    expect(diagnostics.some((d) => d.code === "Nope")).toBe(false);
  });
});

describe("analyzeDocument", () => {
  it("returns cancelled when the token is already cancelled", () => {
    const result = analyzeDocument(propertyGroup(`<Foo>1</Foo>`), { token: { isCancellationRequested: true } });
    expect(result).toEqual({ status: "cancelled" });
  });

  it("produces the same diagnostics for the same text", () => {
    const text = propertyGroup(`<RuntimeIdentifier>a;b</RuntimeIdentifier>\n    <Foo>$(Bar)</Foo>`);
    expect(diagnose(text)).toEqual(diagnose(text));
  });
});
