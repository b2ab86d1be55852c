import { describe, it, expect, vi } from "vitest";

import {
  analyzeDocument,
  loadSchemaJson,
  type AnalyzeOptions,
  type MsBuildDiagnostic,
} from "../../src/index.js";

function diagnose(text: string, options: AnalyzeOptions = {}): readonly MsBuildDiagnostic[] {
  const result = analyzeDocument(text, { fileName: "test.csproj", analyzers: [], ...options });
  if (result.status !== "completed") throw new Error("analysis was cancelled");
  return result.diagnostics;
}

function codes(text: string, options?: AnalyzeOptions): string[] {
  return diagnose(text, options).map((d) => d.code);
}

function sdkProject(body: string): string {
  return `<Project Sdk="Microsoft.NET.Sdk">\n${body}\n</Project>`;
}

function propertyGroup(body: string): string {
  return sdkProject(`  <PropertyGroup>\n    ${body}\n  </PropertyGroup>`);
}

function spanOf(text: string, needle: string): { start: number; end: number } {
  const start = text.indexOf(needle);
  return { start, end: start + needle.length };
}

describe("structure", () => {
  it("reports unknown elements and keeps going", () => {
    const text = `<Project>\n  <Foo />\n  <Target Name="Build" />\n</Project>`;
    const diagnostics = diagnose(text);
    expect(diagnostics.map((d) => d.code)).toEqual(["UnknownElement"]);
    expect(diagnostics[0]?.span).toEqual(spanOf(text, "<Foo />"));
    expect(diagnostics[0]?.args).toEqual(["Foo"]);
  });

  it("reports projects without targets or imports", () => {
    const text = "<Project>\n</Project>";
    expect(diagnose(text)).toMatchObject([{ code: "NoTargets", span: { start: 1, end: 8 } }]);
    expect(codes(text, { fileName: "Directory.Build.props" })).toEqual([]);
  });

  it("reports markup issues and a missing Project element", () => {
    expect(codes(`<Project Sdk="X">\n  <PropertyGroup>\n</Project>`)).toEqual(["MalformedMarkup"]);
    expect(diagnose("<Foo />")).toMatchObject([
      { code: "MissingProjectElement", span: { start: 0, end: 0 } },
      { code: "UnknownElement", args: ["Foo"] },
    ]);
  });

  it("requires OnError to come last in a target", () => {
    const text = sdkProject(`  <Target Name="Build">\n    <OnError ExecuteTargets="Clean" />\n    <Message Text="x" />\n  </Target>`);
    const diagnostics = diagnose(text);
    expect(diagnostics.map((d) => d.code)).toEqual(["OnErrorMustBeLastInTarget"]);
    expect(diagnostics[0]?.span).toEqual(spanOf(text, "Message"));
  });

  it("requires Otherwise to come last in a Choose", () => {
    const text = sdkProject(`  <Choose>\n    <Otherwise />\n    <When Condition="true" />\n  </Choose>`);
    expect(codes(text)).toEqual(["OtherwiseMustBeLastInChoose"]);
  });

  it("reports missing required attributes", () => {
    const text = sdkProject(`  <Target />`);
    expect(diagnose(text)).toMatchObject([{ code: "MissingRequiredAttribute", args: ["Target", "Name"] }]);
  });

  it("checks where item operations are allowed", () => {
    const inTarget = sdkProject(
      `  <Target Name="Build">\n    <ItemGroup>\n      <Foo Update="x" />\n    </ItemGroup>\n  </Target>`,
    );
    expect(codes(inTarget)).toEqual(["ItemAttributeNotValidInTarget", "UnreadItem"]);

    const outside = sdkProject(`  <ItemGroup>\n    <Foo KeepMetadata="a" />\n  </ItemGroup>`);
    expect(codes(outside)).toEqual(["ItemAttributeOnlyValidInTarget", "ItemMustHaveInclude", "UnreadItem"]);
  });

  it("reports text in elements that take no value", () => {
    const text = sdkProject(`  <Target Name="Build">oops</Target>`);
    expect(diagnose(text)).toMatchObject([
      {
        code: "UnexpectedText",
        span: spanOf(text, "oops"),
        message: "The element 'Target' does not take a text value",
      },
    ]);
  });

  it("requires a destination on Output", () => {
    const text = sdkProject(
      `  <Target Name="Build">\n    <Copy SourceFiles="a">\n      <Output TaskParameter="CopiedFiles" />\n    </Copy>\n  </Target>`,
    );
    expect(diagnose(text)).toMatchObject([{ code: "OutputMustHavePropertyOrItemName", span: spanOf(text, "Output") }]);
  });

  it("requires an Sdk for import versions", () => {
    const text = sdkProject(`  <Import Project="a.props" MinimumVersion="1.0" />`);
    expect(diagnose(text)).toMatchObject([
      {
        code: "ImportMinVersionRequiresSdk",
        span: spanOf(text, "MinimumVersion"),
        message: "The MinimumVersion attribute is only valid on imports that have an Sdk attribute",
      },
    ]);
  });

  it("flags Version and MinVersion on an import independently", () => {
    const text = sdkProject(`  <Import Project="a.props" Version="1.0" MinVersion="1.0" />`);
    expect(diagnose(text)).toMatchObject([
      { code: "ImportVersionRequiresSdk", span: spanOf(text, "Version") },
      { code: "ImportMinVersionRequiresSdk", span: spanOf(text, "MinVersion"), args: ["MinVersion"] },
    ]);
    expect(codes(sdkProject(`  <Import Project="a.props" Sdk="X" MinVersion="1.0" />`))).toEqual([]);
  });
});

describe("symbols", () => {
  it("reports unread and unwritten properties", () => {
    const text = sdkProject(`  <PropertyGroup>\n    <Foo>1</Foo>\n    <Bar>$(Baz)</Bar>\n  </PropertyGroup>`);
    const diagnostics = diagnose(text);
    expect(diagnostics.map((d) => [d.code, ...d.args])).toEqual([
      ["UnreadProperty", "Foo"],
      ["UnreadProperty", "Bar"],
      ["UnwrittenProperty", "Baz"],
    ]);
    const open = text.indexOf("<Foo>") + 1;
    const close = text.indexOf("</Foo>") + 2;
    expect(diagnostics[0]?.data).toEqual({
      name: "Foo",
      spans: [
        { start: open, end: open + 3 },
        { start: close, end: close + 3 },
      ],
    });
    expect(diagnostics[2]?.span).toEqual(spanOf(text, "$(Baz)"));
  });

  it("counts metadata attributes and qualified references as uses", () => {
    const text = sdkProject(
      `  <ItemGroup>\n    <Foo Include="a" Bar="x" />\n    <Baz Include="@(Foo)" Condition="'%(Foo.Bar)' != ''" />\n  </ItemGroup>`,
    );
    expect(diagnose(text).map((d) => [d.code, ...d.args])).toEqual([["UnreadItem", "Baz"]]);
  });

  it("resolves unqualified metadata to the enclosing item", () => {
    const text = sdkProject(
      `  <ItemGroup>\n    <Foo Include="a">\n      <Bar>x</Bar>\n      <Baz>%(Bar)</Baz>\n    </Foo>\n  </ItemGroup>`,
    );
    expect(diagnose(text).map((d) => [d.code, ...d.args])).toEqual([
      ["UnreadItem", "Foo"],
      ["UnreadMetadata", "Foo", "Baz"],
    ]);
  });

  it("reports deprecated symbols from schemas", () => {
    const schema = loadSchemaJson({ properties: { Old: { deprecated: "Use New" } } }, "explicit", "test.json");
    const text = propertyGroup("<Old>1</Old>");
    const diagnostics = diagnose(text, { explicitSchemas: [schema] });
    expect(diagnostics).toMatchObject([
      {
        code: "DeprecatedWithMessage",
        severity: "warning",
        message: "The property 'Old' is deprecated: Use New",
        span: spanOf(text, "Old"),
        data: { symbolKind: "property", name: "Old" },
      },
    ]);
  });

  it("reports writes to reserved properties", () => {
    expect(codes(propertyGroup("<MSBuildProjectName>x</MSBuildProjectName>"))).toEqual(["PropertyWriteReserved"]);
  });

  it("reports writes to read-only properties", () => {
    const schema = loadSchemaJson({ properties: { Locked: { readonly: true } } }, "explicit", "test.json");
    const text = propertyGroup("<Locked>x</Locked>");
    expect(diagnose(text, { explicitSchemas: [schema] })).toMatchObject([
      { code: "PropertyWriteReadonly", span: spanOf(text, "Locked"), args: ["Locked"] },
    ]);
  });

  it("reports unwritten items and metadata", () => {
    const text = sdkProject(
      `  <ItemGroup>\n    <Foo Include="a" />\n  </ItemGroup>\n  <Target Name="Build">\n    <Message Text="@(Missing)" />\n    <Message Text="@(Foo->'%(Gone)')" />\n  </Target>`,
    );
    const gone = text.indexOf("%(Gone)");
    expect(diagnose(text)).toMatchObject([
      { code: "UnwrittenItem", span: spanOf(text, "@(Missing)"), args: ["Missing"], data: { name: "Missing" } },
      {
        code: "UnwrittenMetadata",
        span: { start: gone, end: gone + 7 },
        args: ["Foo", "Gone"],
        message: "The metadata 'Gone' of item 'Foo' is never written",
        data: { itemName: "Foo", name: "Gone", spans: [{ start: gone + 2, end: gone + 6 }] },
      },
    ]);
  });

  it("reports values equal to the default in project files", () => {
    const text = propertyGroup("<OutputType>library</OutputType>");
    expect(diagnose(text)).toMatchObject([
      {
        code: "HasDefaultValue",
        severity: "info",
        message: "Property 'OutputType' has default value 'Library'",
        span: spanOf(text, "<OutputType>library</OutputType>"),
        data: { symbolKind: "property", name: "OutputType", defaultValue: "Library" },
      },
    ]);
    expect(codes(propertyGroup("<OutputType>Library</OutputType>"), { fileName: "a.targets" })).toEqual([]);
  });
});

describe("values", () => {
  it("rejects values outside a closed set", () => {
    const text = propertyGroup("<OutputType>Banana</OutputType>");
    expect(diagnose(text)).toMatchObject([
      {
        code: "UnknownValue",
        message: "Property 'OutputType' does not have a known value 'Banana'",
        span: spanOf(text, "Banana"),
        data: { name: "Banana", valueKind: "CustomType", customType: "OutputType" },
      },
    ]);
  });

  it("validates booleans with fix data", () => {
    const text = propertyGroup("<Optimize> yes </Optimize>");
    expect(diagnose(text)).toMatchObject([
      { code: "InvalidBool", span: spanOf(text, "yes"), data: { name: "yes", valueKind: "Bool" } },
    ]);
  });

  it("applies the guid format hint", () => {
    const guid = "0f8fad5b-d9cb-469f-a165-70867728950e";
    expect(diagnose(propertyGroup(`<ProjectGuid>${guid}</ProjectGuid>`))).toMatchObject([
      { code: "GuidIncorrectFormat", args: [guid, "B"] },
    ]);
    expect(codes(propertyGroup(`<ProjectGuid>{${guid}}</ProjectGuid>`))).toEqual([]);
    expect(codes(propertyGroup("<ProjectGuid>nope</ProjectGuid>"))).toEqual(["InvalidGuid", "GuidIncorrectFormat"]);
  });

  it("validates integers, urls and versions", () => {
    expect(codes(propertyGroup("<WarningLevel>high</WarningLevel>"))).toEqual(["InvalidInteger"]);
    expect(codes(propertyGroup("<PackageProjectUrl>docs/index.html</PackageProjectUrl>"))).toEqual(["InvalidUrl"]);
    expect(codes(propertyGroup("<Version>1.0.0-</Version>"))).toEqual(["InvalidNuGetVersion"]);
  });

  it("validates target frameworks", () => {
    expect(diagnose(propertyGroup("<TargetFramework>net4.9</TargetFramework>"))).toMatchObject([
      { code: "TargetFrameworkHasUnknownVersion", args: ["net4.9", "4.9"] },
    ]);
    expect(codes(propertyGroup("<TargetFramework>net8.0</TargetFramework>"))).toEqual([]);
    expect(codes(propertyGroup("<TargetFramework>banana</TargetFramework>"))).toEqual(["InvalidTargetFramework"]);
  });

  it("checks framework versions against the declared identifier", () => {
    const text = propertyGroup(
      "<TargetFrameworkIdentifier>.NETFramework</TargetFrameworkIdentifier>\n    <TargetFrameworkVersion>v4.9</TargetFrameworkVersion>",
    );
    expect(diagnose(text)).toMatchObject([{ code: "UnknownTargetFrameworkVersion", args: ["v4.9", ".NETFramework"] }]);
  });

  it("logs invalid guid format hints", () => {
    const schema = loadSchemaJson(
      { properties: { BuildId: { type: { values: {}, allowUnknownValues: true, baseKind: "Guid", analyzerHints: { GuidFormat: "Q" } } } } },
      "explicit",
      "test.json",
    );
    const logger = { log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const guid = "0f8fad5b-d9cb-469f-a165-70867728950e";
    expect(codes(propertyGroup(`<BuildId>${guid}</BuildId>`), { explicitSchemas: [schema], logger })).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith("[validator] GuidFormat analyzer hint has invalid value 'Q'");
  });

  it("validates cultures", () => {
    expect(codes(propertyGroup("<NeutralLanguage>en-US</NeutralLanguage>"))).toEqual([]);
    expect(codes(propertyGroup("<NeutralLanguage>en_US</NeutralLanguage>"))).toEqual(["InvalidCulture"]);
    expect(codes(propertyGroup("<NeutralLanguage>xx-YY</NeutralLanguage>"))).toEqual(["UnknownCulture"]);
  });

  it("reports lists where a single value is expected", () => {
    const text = propertyGroup("<Configuration>Debug;Release</Configuration>");
    const start = text.indexOf(";");
    expect(diagnose(text)).toMatchObject([
      {
        code: "UnexpectedList",
        message: "The property 'Configuration' does not expect a list",
        span: { start, end: start + ";Release".length },
        data: { name: "Configuration" },
      },
    ]);
  });

  it("validates item metadata values", () => {
    const text = sdkProject(`  <ItemGroup>\n    <PackageReference Include="A" Version="[1.0,2.0)" />\n    <PackageReference Include="B" Version="(1.0)" />\n  </ItemGroup>`);
    expect(codes(text)).toEqual(["InvalidNuGetVersionRange"]);
  });

  it("rejects expressions in literal-only values", () => {
    const schema = loadSchemaJson({ properties: { Fixed: { type: "String!" } } }, "explicit", "test.json");
    const text = propertyGroup("<Fixed>a$(Configuration)</Fixed>");
    expect(diagnose(text, { explicitSchemas: [schema] })).toMatchObject([
      {
        code: "UnexpectedExpression",
        span: spanOf(text, "$(Configuration)"),
        args: ["property", "Fixed"],
        message: "The property 'Fixed' does not expect an expression",
      },
    ]);
  });

  it("validates locale identifiers", () => {
    const schema = loadSchemaJson({ properties: { Lang: { type: "Lcid" } } }, "explicit", "test.json");
    const options = { explicitSchemas: [schema] };
    expect(codes(propertyGroup("<Lang>1033</Lang>"), options)).toEqual([]);
    expect(diagnose(propertyGroup("<Lang>abc</Lang>"), options)).toMatchObject([{ code: "InvalidLcid", args: ["abc"] }]);
    expect(diagnose(propertyGroup("<Lang>99999</Lang>"), options)).toMatchObject([{ code: "UnknownLcid", args: ["99999"] }]);
  });

  it("validates type and namespace names", () => {
    const text = propertyGroup("<RootNamespace>My.1Bad</RootNamespace>");
    expect(diagnose(text)).toMatchObject([{ code: "InvalidClrNamespace", span: spanOf(text, "My.1Bad"), args: ["My.1Bad"] }]);
    expect(codes(propertyGroup("<RootNamespace>My.Good</RootNamespace>"))).toEqual([]);

    const alias = sdkProject(`  <ItemGroup>\n    <Using Include="System.Text" Alias="A.B" />\n  </ItemGroup>`);
    expect(diagnose(alias)).toMatchObject([{ code: "InvalidClrTypeName", span: spanOf(alias, "A.B"), args: ["A.B"] }]);
  });

  it("checks target platforms in framework short names", () => {
    expect(diagnose(propertyGroup("<TargetFramework>net8.0-banana</TargetFramework>"))).toMatchObject([
      { code: "TargetFrameworkHasUnknownTargetPlatform", args: ["net8.0-banana", "banana"] },
    ]);
    expect(codes(propertyGroup("<TargetFramework>net8.0-windows</TargetFramework>"))).toEqual([]);
  });

  it("checks framework profiles against the declared framework", () => {
    const framework = (profile: string): string =>
      propertyGroup(
        [
          "<TargetFrameworkIdentifier>.NETFramework</TargetFrameworkIdentifier>",
          "<TargetFrameworkVersion>v4.0</TargetFrameworkVersion>",
          `<TargetFrameworkProfile>${profile}</TargetFrameworkProfile>`,
        ].join("\n    "),
      );
    const text = framework("Banana");
    expect(diagnose(text)).toMatchObject([
      { code: "UnknownTargetFrameworkProfile", span: spanOf(text, "Banana"), args: ["Banana", ".NETFramework", "4.0"] },
    ]);
    expect(codes(framework("Client"))).toEqual([]);
  });

  it("maps expression errors to diagnostics", () => {
    const text = propertyGroup("<Configuration>$(Foo</Configuration>");
    const at = text.indexOf("$(Foo") + 5;
    expect(diagnose(text)).toMatchObject([{ code: "ExpressionIncomplete", span: { start: at, end: at + 1 } }]);
  });
});

describe("tasks", () => {
  it("reports unresolved assembly tasks and their usages", () => {
    const text = sdkProject(
      `  <UsingTask TaskName="Frob" AssemblyFile="frob.dll" />\n  <Target Name="Build">\n    <Frob />\n  </Target>`,
    );
    expect(diagnose(text).map((d) => [d.code, ...d.args])).toEqual([
      ["TaskDefinitionNotResolvedFromAssembly", "Frob"],
      ["FullyQualifiedTaskName", "Frob"],
      ["TaskDefinedButUnresolved", "Frob"],
    ]);
  });

  it("checks parameters of tasks resolved from assemblies", () => {
    const resolver = vi.fn(() => [
      { kind: "task-parameter" as const, name: "Input", valueKind: { tag: "String" as const, list: "none" as const, literal: false }, required: true, isOutput: false },
    ]);
    const text = sdkProject(
      `  <UsingTask TaskName="Acme.Frob" AssemblyFile="frob.dll" />\n  <Target Name="Build">\n    <Frob Other="1" />\n  </Target>`,
    );
    expect(diagnose(text, { taskAssemblyResolver: resolver }).map((d) => [d.code, ...d.args])).toEqual([
      ["UnknownTaskParameter", "Frob", "Other"],
      ["MissingRequiredTaskParameter", "Frob", "Input"],
    ]);
    expect(resolver).toHaveBeenCalledWith({ taskName: "Frob", namespace: "Acme", assemblyName: null, assemblyFile: "frob.dll" });
  });

  it("reports tasks nothing declares", () => {
    const text = sdkProject(`  <Target Name="Build">\n    <Zap Foo="1">\n      <Output TaskParameter="Bar" PropertyName="P" />\n    </Zap>\n  </Target>`);
    expect(codes(text)).toEqual(["TaskNotDefined"]);
  });

  it("checks Output task parameters", () => {
    const text = sdkProject(
      `  <Target Name="Build">\n    <Copy SourceFiles="a">\n      <Output TaskParameter="DestinationFolder" ItemName="Copied" />\n    </Copy>\n  </Target>`,
    );
    const diagnostics = diagnose(text);
    expect(diagnostics.map((d) => d.code)).toEqual(["NonOutputTaskParameter"]);
    expect(diagnostics[0]?.span).toEqual(spanOf(text, "DestinationFolder"));
  });

  it("accepts code task factories and checks their parameters", () => {
    const text = sdkProject(
      [
        `  <UsingTask TaskName="Hello" TaskFactory="RoslynCodeTaskFactory" AssemblyFile="tasks.dll">`,
        `    <ParameterGroup>`,
        `      <Name ParameterType="System.String" Required="true" />`,
        `    </ParameterGroup>`,
        `    <Task>`,
        `      <Code Type="Fragment">x</Code>`,
        `    </Task>`,
        `  </UsingTask>`,
        `  <Target Name="Build">`,
        `    <Hello />`,
        `  </Target>`,
      ].join("\n"),
    );
    expect(diagnose(text).map((d) => [d.code, ...d.args])).toEqual([["MissingRequiredTaskParameter", "Hello", "Name"]]);
  });

  it("reports unknown task factories", () => {
    const text = sdkProject(`  <UsingTask TaskName="A.B" TaskFactory="MyFactory" AssemblyFile="f.dll" />`);
    const diagnostics = diagnose(text);
    expect(diagnostics.map((d) => d.code)).toEqual(["TaskFactoryMustHaveBody", "UnknownTaskFactory"]);
    expect(diagnostics[1]?.span).toEqual(spanOf(text, "MyFactory"));
  });

  it("requires an assembly on UsingTask", () => {
    expect(codes(sdkProject(`  <UsingTask TaskName="A.B" />`))).toEqual(["UsingTaskMustHaveAssembly", "TaskDefinitionNotResolvedFromAssembly"]);
  });

  it("reports empty required parameters without also reporting them missing", () => {
    const text = sdkProject(`  <Target Name="Build">\n    <Exec Command=" " />\n  </Target>`);
    expect(diagnose(text)).toMatchObject([
      { code: "EmptyRequiredTaskParameter", span: spanOf(text, "Command"), args: ["Exec", "Command"] },
      { code: "AttributeEmpty", span: spanOf(text, "Command"), args: ["Command"] },
    ]);
  });

  it("allows only one of AssemblyName and AssemblyFile", () => {
    const text = sdkProject(`  <UsingTask TaskName="A.B" AssemblyName="a" AssemblyFile="a.dll" />`);
    const diagnostics = diagnose(text);
    expect(diagnostics.map((d) => d.code)).toEqual(["TaskFactoryMustHaveOneAssemblyOnly", "TaskDefinitionNotResolvedFromAssembly"]);
    expect(diagnostics[0]?.span).toEqual(spanOf(text, "UsingTask"));
  });

  it("rejects AssemblyName on factory tasks", () => {
    const text = sdkProject(
      `  <UsingTask TaskName="A.B" TaskFactory="CodeTaskFactory" AssemblyName="x">\n    <Task>x</Task>\n  </UsingTask>`,
    );
    expect(diagnose(text)).toMatchObject([{ code: "TaskFactoryCannotHaveAssemblyName", span: spanOf(text, "AssemblyName") }]);
  });

  it("requires a factory for task bodies and parameter groups", () => {
    const text = sdkProject(
      `  <UsingTask TaskName="A.B" AssemblyFile="a.dll">\n    <ParameterGroup />\n    <Task>x</Task>\n  </UsingTask>`,
    );
    const body = text.indexOf("<Task>") + 1;
    expect(diagnose(text)).toMatchObject([
      { code: "TaskBodyMustHaveFactory", span: { start: body, end: body + 4 } },
      { code: "ParameterGroupMustHaveFactory", span: spanOf(text, "ParameterGroup") },
    ]);
  });

  it("rejects malformed task names", () => {
    const text = sdkProject(`  <UsingTask TaskName="A..B" AssemblyFile="a.dll" />`);
    expect(diagnose(text)).toMatchObject([{ code: "InvalidTaskName", span: spanOf(text, "UsingTask") }]);
  });

  it("requires a Code element in Roslyn task bodies", () => {
    const text = sdkProject(
      `  <UsingTask TaskName="Hello" TaskFactory="RoslynCodeTaskFactory" AssemblyFile="tasks.dll">\n    <Task />\n  </UsingTask>`,
    );
    const body = text.indexOf("<Task />") + 1;
    expect(diagnose(text)).toMatchObject([
      {
        code: "RoslynCodeTaskFactoryRequiresCodeElement",
        span: { start: body, end: body + 4 },
        message: "The RoslynCodeTaskFactory task body must have a Code element",
      },
    ]);
  });

  it("reports parameter groups that class code ignores", () => {
    const usingTask = (factory: string, assemblyFile: string, code: string): string =>
      sdkProject(
        [
          `  <UsingTask TaskName="Hello" TaskFactory="${factory}" AssemblyFile="${assemblyFile}">`,
          `    <ParameterGroup>`,
          `      <Name />`,
          `    </ParameterGroup>`,
          `    <Task>`,
          `      ${code}`,
          `    </Task>`,
          `  </UsingTask>`,
        ].join("\n"),
      );

    const text = usingTask("CodeTaskFactory", "$(RoslynCodeTaskFactory)", `<Code Type="Class">x</Code>`);
    expect(diagnose(text)).toMatchObject([
      { code: "RoslynCodeTaskFactoryWithClassIgnoresParameterGroup", span: spanOf(text, "ParameterGroup") },
    ]);
    expect(codes(usingTask("RoslynCodeTaskFactory", "tasks.dll", `<Code Source="task.cs" />`))).toEqual([
      "RoslynCodeTaskFactoryWithClassIgnoresParameterGroup",
    ]);
    expect(codes(usingTask("CodeTaskFactory", "tasks.dll", `<Code Type="Class">x</Code>`))).toEqual([]);
  });
});

describe("fault containment", () => {
  it("reports a failing element and validates the rest", () => {
    const schema = loadSchemaJson(
      { properties: { BuildId: { type: { values: {}, allowUnknownValues: true, baseKind: "Guid", analyzerHints: { GuidFormat: "Q" } } } } },
      "explicit",
      "test.json",
    );
    const logger = {
      log: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn((message: string) => {
        if (message.startsWith("[validator] GuidFormat")) throw new Error("hint lookup failed");
      }),
    };
    const text = propertyGroup("<BuildId>0f8fad5b-d9cb-469f-a165-70867728950e</BuildId>\n    <Optimize>yes</Optimize>");
    expect(diagnose(text, { explicitSchemas: [schema], logger })).toMatchObject([
      { code: "InternalError", span: spanOf(text, "BuildId"), args: ["hint lookup failed"], message: "Internal error: hint lookup failed" },
      { code: "InvalidBool", span: spanOf(text, "yes") },
    ]);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("[validator] failed for element 'BuildId'"));
  });
});
