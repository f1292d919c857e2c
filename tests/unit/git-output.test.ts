import { describe, it, expect } from "vitest";
import { parseNameStatusZ } from "../../src/git.js";

describe("parseNameStatusZ", () => {
  it("joins each status with its path", () => {
    expect(parseNameStatusZ("M\0a/Keep.cls\0A\0a/New.cls\0D\0a/Old.cls\0")).toEqual([
      "M\ta/Keep.cls",
      "A\ta/New.cls",
      "D\ta/Old.cls",
    ]);
  });

  it("reads two paths for renames and copies", () => {
    expect(parseNameStatusZ("R087\0a/Old.cls\0a/New.cls\0C100\0a/B.cls\0a/C.cls\0M\0a/D.cls\0")).toEqual([
      "R087\ta/Old.cls\ta/New.cls",
      "C100\ta/B.cls\ta/C.cls",
      "M\ta/D.cls",
    ]);
  });

  it("keeps spaces and non-ASCII characters as they are", () => {
    expect(parseNameStatusZ("A\0layouts/Opportunité Layout.layout-meta.xml\0")).toEqual([
      "A\tlayouts/Opportunité Layout.layout-meta.xml",
    ]);
  });

  it("returns nothing for empty output", () => {
    expect(parseNameStatusZ("")).toEqual([]);
  });
});
