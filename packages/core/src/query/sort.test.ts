import { describe, it, expect } from "vitest";
import { sortEntries, parseSortCriterion, parseSortOrder } from "./sort.js";
import type { CallableEntry } from "../schemas/index-document.js";

function callable(name: string, fields: Partial<CallableEntry> = {}): CallableEntry {
  return {
    kind: "callable",
    name,
    category: "utils",
    sourcePath: `/corpus/bash_functions.d/utils/${name}.sh`,
    relativePath: `bash_functions.d/utils/${name}.sh`,
    description: "",
    usage: "",
    requirements: "",
    version: "",
    author: "",
    declaredUnits: [name],
    sizeBytes: 10,
    lineCount: 3,
    modifiedAtEpoch: 1700000000,
    contentHash: "",
    ...fields,
  };
}

describe("sortEntries", () => {
  it("orders b_task and a_task by name", () => {
    const sorted = sortEntries([callable("b_task"), callable("a_task")], "name", "asc");
    expect(sorted.map((e) => e.name)).toEqual(["a_task", "b_task"]);
  });

  it("does not mutate its input", () => {
    const input = [callable("b_task"), callable("a_task")];
    sortEntries(input, "name", "asc");
    expect(input.map((e) => e.name)).toEqual(["b_task", "a_task"]);
  });

  it("sorts by size with name as the tie-break", () => {
    const entries = [
      callable("c", { sizeBytes: 5 }),
      callable("b", { sizeBytes: 20 }),
      callable("a", { sizeBytes: 20 }),
    ];

    expect(sortEntries(entries, "size", "asc").map((e) => e.name)).toEqual(["c", "a", "b"]);
    expect(sortEntries(entries, "size", "desc").map((e) => e.name)).toEqual(["a", "b", "c"]);
  });

  it("sorts by line count", () => {
    const entries = [callable("long", { lineCount: 90 }), callable("short", { lineCount: 2 })];
    expect(sortEntries(entries, "lines", "asc").map((e) => e.name)).toEqual(["short", "long"]);
  });
});

describe("parseSortCriterion", () => {
  it("accepts known criteria in any case", () => {
    expect(parseSortCriterion("SIZE")).toBe("size");
    expect(parseSortCriterion("date")).toBe("date");
  });

  it("falls back to name", () => {
    expect(parseSortCriterion("popularity")).toBe("name");
    expect(parseSortCriterion(undefined)).toBe("name");
  });
});

describe("parseSortOrder", () => {
  it("defaults to ascending", () => {
    expect(parseSortOrder(undefined)).toBe("asc");
    expect(parseSortOrder("DESC")).toBe("desc");
  });
});
