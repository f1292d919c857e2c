import { describe, it, expect } from "vitest";
import {
  isDestructive,
  parseChangeLine,
  parseChangeLines,
  parseStatus,
  splitLines,
} from "../../src/change-record.js";

describe("parseStatus", () => {
  it("maps git letter codes", () => {
    expect(parseStatus("A")).toBe("Added");
    expect(parseStatus("D")).toBe("Deleted");
    expect(parseStatus("M")).toBe("Modified");
    expect(parseStatus("U")).toBe("MergeConflict");
  });

  it("accepts rename codes with a similarity score", () => {
    expect(parseStatus("R")).toBe("Renamed");
    expect(parseStatus("R072")).toBe("Renamed");
    expect(parseStatus("R100")).toBe("Renamed");
  });

  it("maps diff-stat words case-insensitively", () => {
    expect(parseStatus("added")).toBe("Added");
    expect(parseStatus("removed")).toBe("Deleted");
    expect(parseStatus("modified")).toBe("Modified");
    expect(parseStatus("renamed")).toBe("Renamed");
    expect(parseStatus("Merge Conflict")).toBe("MergeConflict");
    expect(parseStatus("remote deleted")).toBe("RemoteDeleted");
  });

  it("maps anything else to Unknown", () => {
    expect(parseStatus("?")).toBe("Unknown");
    expect(parseStatus("X")).toBe("Unknown");
    expect(parseStatus("Random")).toBe("Unknown");
    expect(parseStatus("")).toBe("Unknown");
  });
});

describe("isDestructive", () => {
  it("treats deletions and renames as destructive", () => {
    expect(isDestructive("Deleted")).toBe(true);
    expect(isDestructive("RemoteDeleted")).toBe(true);
    expect(isDestructive("Renamed")).toBe(true);
  });

  it("treats everything else as additive", () => {
    expect(isDestructive("Added")).toBe(false);
    expect(isDestructive("Modified")).toBe(false);
    expect(isDestructive("MergeConflict")).toBe(false);
    expect(isDestructive("Unknown")).toBe(false);
  });
});

describe("parseChangeLine", () => {
  it("parses a tab-separated name-status line", () => {
    expect(parseChangeLine("M\tforce-app/main/default/classes/Foo.cls")).toEqual({
      status: "Modified",
      code: "M",
      path: "force-app/main/default/classes/Foo.cls",
    });
  });

  it("parses a space-padded line", () => {
    expect(parseChangeLine("D       force-app/main/default/classes/Foo.cls")).toEqual({
      status: "Deleted",
      code: "D",
      path: "force-app/main/default/classes/Foo.cls",
    });
  });

  it("strips the line terminator", () => {
    const record = parseChangeLine("A\tforce-app/main/default/classes/Foo.cls\r\n");
    expect(record?.path).toBe("force-app/main/default/classes/Foo.cls");
  });

  it("keeps spaces inside a tab-delimited path", () => {
    const record = parseChangeLine("M\tforce-app/main/default/staticresources/My File.txt");
    expect(record?.path).toBe("force-app/main/default/staticresources/My File.txt");
  });

  it("splits a tab-separated rename into both paths", () => {
    expect(parseChangeLine("R072\tsrc/Old.cls\tsrc/New.cls")).toEqual({
      status: "Renamed",
      code: "R072",
      path: "src/Old.cls",
      renamedPath: "src/New.cls",
    });
  });

  it("splits a space-separated rename after the extension", () => {
    expect(parseChangeLine("R       old/Foo.cls       new/Bar.cls")).toEqual({
      status: "Renamed",
      code: "R",
      path: "old/Foo.cls",
      renamedPath: "new/Bar.cls",
    });
  });

  it("reads two-word statuses as one token", () => {
    expect(parseChangeLine("merge conflict   force-app/main/default/classes/A.cls")).toEqual({
      status: "MergeConflict",
      code: "merge conflict",
      path: "force-app/main/default/classes/A.cls",
    });
  });

  it("ignores blank and single-character lines", () => {
    expect(parseChangeLine("")).toBeUndefined();
    expect(parseChangeLine("M")).toBeUndefined();
    expect(parseChangeLine("M\r")).toBeUndefined();
  });

  it("does not throw on a malformed line", () => {
    expect(parseChangeLine("garbage")).toEqual({
      status: "Unknown",
      code: "garbage",
      path: "",
    });
  });
});

describe("parseChangeLines", () => {
  it("drops blank lines from split output", () => {
    const lines = splitLines("M\ta.cls\n\nD\tb.cls\n");
    expect(lines).toEqual(["M\ta.cls", "", "D\tb.cls", ""]);

    const records = parseChangeLines(lines);
    expect(records.map((r) => r.path)).toEqual(["a.cls", "b.cls"]);
    expect(records.map((r) => r.status)).toEqual(["Modified", "Deleted"]);
  });
});
