import { describe, it, expect } from "vitest";

import {
  isAbsoluteUrl,
  isKnownCulture,
  isKnownLcid,
  isValidBool,
  isValidGuid,
  isValidInt64,
  isValidNuGetVersion,
  isValidNuGetVersionRange,
  matchesGuidFormat,
  parseLcid,
  parseTaskName,
  parseVersion,
  validateFrameworkShortName,
} from "../../src/index.js";

describe("framework short names", () => {
  it("accepts desktop, unified and platform-specific names", () => {
    expect(validateFrameworkShortName("net472")).toEqual({
      kind: "ok",
      framework: { identifier: ".NETFramework", version: [4, 7, 2], profile: null },
    });
    expect(validateFrameworkShortName("net8.0")).toEqual({
      kind: "ok",
      framework: { identifier: ".NETCoreApp", version: [8, 0], profile: null },
    });
    expect(validateFrameworkShortName("net8.0-windows10.0.19041.0").kind).toBe("ok");
    expect(validateFrameworkShortName("netstandard2.0").kind).toBe("ok");
  });

  it("keeps the profile of desktop frameworks", () => {
    expect(validateFrameworkShortName("net40-client")).toEqual({
      kind: "ok",
      framework: { identifier: ".NETFramework", version: [4, 0], profile: "client" },
    });
  });

  it("classifies failures", () => {
    expect(validateFrameworkShortName("net")).toEqual({ kind: "malformed" });
    expect(validateFrameworkShortName("netfoo1.0")).toEqual({ kind: "unknown-identifier", identifier: "netfoo" });
    expect(validateFrameworkShortName("net4.9")).toEqual({ kind: "unknown-version", version: "4.9" });
    expect(validateFrameworkShortName("net8.0-foo")).toEqual({ kind: "unknown-platform", platform: "foo" });
    expect(validateFrameworkShortName("net45-client")).toEqual({ kind: "unknown-profile", profile: "client" });
  });
});

describe("scalar literals", () => {
  it("validates booleans and 64-bit integers", () => {
    expect(isValidBool("TRUE")).toBe(true);
    expect(isValidBool("yes")).toBe(false);
    expect(isValidInt64("-9223372036854775808")).toBe(true);
    expect(isValidInt64("9223372036854775808")).toBe(false);
    expect(isValidInt64("1.5")).toBe(false);
  });

  it("requires absolute urls", () => {
    expect(isAbsoluteUrl("https://example.com/x")).toBe(true);
    expect(isAbsoluteUrl("/relative/path")).toBe(false);
  });

  it("validates guid formats", () => {
    const d = "0f8fad5b-d9cb-469f-a165-70867728950e";
    expect(isValidGuid(d)).toBe(true);
    expect(isValidGuid(`{${d}}`)).toBe(true);
    expect(matchesGuidFormat(`{${d}}`, "B")).toBe(true);
    expect(matchesGuidFormat(d, "B")).toBe(false);
    expect(isValidGuid("not-a-guid")).toBe(false);
  });
});

describe("versions", () => {
  it("parses two to four components", () => {
    expect(parseVersion("1.2.3")).toEqual([1, 2, 3]);
    expect(parseVersion("1")).toBeNull();
    expect(parseVersion("1.2.3.4.5")).toBeNull();
  });

  it("validates NuGet versions and ranges", () => {
    expect(isValidNuGetVersion("1.0.0-beta.1+build")).toBe(true);
    expect(isValidNuGetVersion("1.0.0-")).toBe(false);
    expect(isValidNuGetVersionRange("[1.0,2.0)")).toBe(true);
    expect(isValidNuGetVersionRange("(,1.0]")).toBe(true);
    expect(isValidNuGetVersionRange("1.*")).toBe(true);
    expect(isValidNuGetVersionRange("(1.0)")).toBe(false);
    expect(isValidNuGetVersionRange("[,]")).toBe(false);
  });
});

describe("cultures and names", () => {
  it("looks up cultures and LCIDs", () => {
    expect(isKnownCulture("EN-us")).toBe(true);
    expect(parseLcid("1033")).toBe(1033);
    expect(parseLcid("0")).toBeNull();
    expect(isKnownLcid(1033)).toBe(true);
  });

  it("splits namespace-qualified task names", () => {
    expect(parseTaskName("My.Tasks.Pack")).toEqual({ name: "Pack", namespace: "My.Tasks" });
    expect(parseTaskName("Pack")).toEqual({ name: "Pack", namespace: null });
    expect(parseTaskName("My..Pack")).toBeNull();
  });
});
