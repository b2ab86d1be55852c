import { describe, it, expect } from "vitest";

import { createDocument, findReferences, resolveSymbolAt, type SymbolTarget } from "../../src/index.js";

const ITEM_DOC = [
  `<Project>`,
  `  <ItemGroup>`,
  `    <Foo Include="a" />`,
  `    <Bar Include="@(Foo)" Meta="%(Foo.X)" />`,
  `  </ItemGroup>`,
  `  <Target Name="T">`,
  `    <Message Text="@(Foo->'%(Identity)')" />`,
  `  </Target>`,
  `</Project>`,
].join("\n");

const PROPERTY_DOC = [
  `<Project>`,
  `  <PropertyGroup>`,
  `    <Foo>1</Foo>`,
  `    <Bar>$(foo);x</Bar>`,
  `  </PropertyGroup>`,
  `  <Target Name="T">`,
  `    <Exec Command="echo">`,
  `      <Output TaskParameter="ExitCode" PropertyName="Foo" />`,
  `    </Exec>`,
  `  </Target>`,
  `</Project>`,
].join("\n");

const METADATA_DOC = [
  `<Project>`,
  `  <ItemGroup>`,
  `    <Bar Include="x" Foo="1">`,
  `      <Foo>2</Foo>`,
  `    </Bar>`,
  `    <Other Include="@(Bar->'%(Foo)')" Foo="%(Bar.Foo)" />`,
  `  </ItemGroup>`,
  `</Project>`,
].join("\n");

function references(text: string, target: SymbolTarget): [number, number, string][] {
  const document = createDocument(text, { fileName: "test.csproj" });
  return findReferences(document, target).map((r) => [r.offset, r.length, r.usage]);
}

describe("findReferences", () => {
  it("finds item writes, reads and metadata qualifiers", () => {
    expect(references(ITEM_DOC, { kind: "item", name: "foo" })).toEqual([
      [29, 3, "write"],
      [68, 3, "read"],
      [82, 3, "read"],
      [149, 3, "read"],
    ]);
  });

  it("finds property writes and reads case-insensitively", () => {
    expect(references(PROPERTY_DOC, { kind: "property", name: "Foo" })).toEqual([
      [33, 3, "write"],
      [56, 3, "read"],
      [187, 3, "write"],
    ]);
  });

  it("matches metadata by item and name", () => {
    expect(references(METADATA_DOC, { kind: "metadata", itemName: "bar", name: "foo" })).toEqual([
      [45, 3, "write"],
      [61, 3, "write"],
      [114, 3, "read"],
      [133, 3, "read"],
    ]);
    expect(references(METADATA_DOC, { kind: "metadata", itemName: "Other", name: "Foo" })).toEqual([
      [122, 3, "write"],
    ]);
  });

  it("reads every text part of an element split by a comment", () => {
    const text = `<Project>\n  <PropertyGroup>\n    <Foo>1</Foo>\n    <Bar>$(Foo)<!-- $(Foo) -->$(Foo)</Bar>\n  </PropertyGroup>\n</Project>`;
    expect(references(text, { kind: "property", name: "Foo" })).toEqual([
      [33, 3, "write"],
      [56, 3, "read"],
      [77, 3, "read"],
    ]);
  });

  it("finds target declarations and dependencies", () => {
    const text = `<Project>\n  <Target Name="Build" DependsOnTargets="Prepare;$(Extra)" />\n  <Target Name="Prepare" />\n</Project>`;
    expect(references(text, { kind: "target", name: "Prepare" })).toEqual([
      [51, 7, "read"],
      [88, 7, "declaration"],
    ]);
  });

  it("finds the simple name of a task declaration and its usages", () => {
    const text = `<Project>\n  <UsingTask TaskName="Acme.Frob" AssemblyFile="frob.dll" />\n  <Target Name="Build">\n    <Frob />\n  </Target>\n</Project>`;
    expect(references(text, { kind: "task", name: "Frob" })).toEqual([
      [38, 4, "declaration"],
      [100, 4, "read"],
    ]);
  });
});

describe("findReferences on mixed-case documents", () => {
  function offsets(text: string, target: SymbolTarget): number[] {
    const found = findReferences(createDocument(text, { fileName: "test.csproj" }), target);
    for (const reference of found) {
      expect(text.slice(reference.offset, reference.offset + reference.length).toLowerCase()).toBe("foo");
    }
    return found.map((r) => r.offset);
  }

  it("finds every item reference", () => {
    const text = [
      `<project>`,
      `  <itemgroup>`,
      `    <foo />`,
      `    <bar include='@(foo)' condition="'@(Foo)'!='$(Foo)'" somemetadata="@(Foo)" foo='a' />`,
      `    <!-- metadata named like the item is not a reference -->`,
      `    <bar><foo>@(foo)</foo></bar>`,
      `    <baz include="@(foo->'%(foo.bar)')" />`,
      `  </itemgroup>`,
      `</project>`,
    ].join("\n");
    expect(offsets(text, { kind: "item", name: "Foo" })).toEqual([29, 56, 76, 109, 203, 240, 248]);
  });

  it("finds every property reference", () => {
    const text = [
      `<project>`,
      `  <propertygroup>`,
      `    <foo condition="'x$(Foo)'==''">bar $(foo)</foo>`,
      `  </propertygroup>`,
      `  <target name='Foo' DependsOnTargets='$(Foo)'>`,
      `    <itemgroup>`,
      `      <foo />`,
      `      <bar include='$(foo)' condition="'@(Foo)'!='$(Foo)'" somemetadata="$(Foo)" foo='a' />`,
      `      <bar><foo>$(foo)</foo></bar>`,
      `      <foo include="@(bar->'%(baz.foo)$(foo)')" />`,
      `    </itemgroup>`,
      `  </target>`,
      `</project>`,
    ].join("\n");
    expect(offsets(text, { kind: "property", name: "Foo" })).toEqual([33, 52, 69, 140, 199, 229, 252, 287, 344]);
  });

  it("finds every metadata reference for one item", () => {
    const text = [
      `<project>`,
      `  <itemgroup>`,
      `    <bar foo="$(foo)" />`,
      `    <bar>`,
      `        <foo>baz</foo>`,
      `    </bar>`,
      `    <foo>`,
      `        <foo>baz</foo>`,
      `    </foo>`,
      `    <foo include="@(bar->'%(foo)')" foo='a' />`,
      `    <foo include="@(bar->'%(bar.foo)')" />`,
      `    <foo include="@(bar->'%(baz.foo)')" />`,
      `    <bar><foo>@(foo)</foo></bar>`,
      `  </itemgroup>`,
      `  <target name='Foo' DependsOnTargets="@(bar->'%(Foo)')">`,
      `  </target>`,
      `</project>`,
    ].join("\n");
    expect(offsets(text, { kind: "metadata", itemName: "bar", name: "foo" })).toEqual([33, 68, 165, 216, 280, 367]);
  });
});

describe("resolveSymbolAt", () => {
  it("resolves an item element name", () => {
    const document = createDocument(ITEM_DOC, { fileName: "test.csproj" });
    expect(resolveSymbolAt(document, 30)).toEqual({
      target: { kind: "item", name: "Foo" },
      span: { start: 29, end: 32 },
      usage: "write",
    });
  });

  it("resolves a property reference with its written casing", () => {
    const document = createDocument(PROPERTY_DOC, { fileName: "test.csproj" });
    expect(resolveSymbolAt(document, 57)).toEqual({
      target: { kind: "property", name: "foo" },
      span: { start: 56, end: 59 },
      usage: "read",
    });
  });

  it("resolves a metadata qualifier to its item", () => {
    const document = createDocument(ITEM_DOC, { fileName: "test.csproj" });
    expect(resolveSymbolAt(document, 83)).toEqual({
      target: { kind: "item", name: "Foo" },
      span: { start: 82, end: 85 },
      usage: "read",
    });
  });

  it("returns null away from any name", () => {
    const document = createDocument(ITEM_DOC, { fileName: "test.csproj" });
    expect(resolveSymbolAt(document, 0)).toBeNull();
  });
});
