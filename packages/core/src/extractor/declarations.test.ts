import { describe, it, expect } from "vitest";
import { countAliasDefinitions, countLines, scanDeclaredUnits } from "./declarations.js";

describe("scanDeclaredUnits", () => {
  it("finds top-level definitions in order without duplicates", () => {
    const source = [
      "deploy_app() {",
      "  nested() {",
      "    :",
      "  }",
      "}",
      "function clean_up() {",
      "}",
      "helper()",
      "{",
      "}",
      "deploy_app() {",
      "}",
    ].join("\n");

    expect(scanDeclaredUnits(source)).toEqual(["deploy_app", "clean_up", "helper"]);
  });

  it("accepts one-line bodies", () => {
    expect(scanDeclaredUnits("greet() { echo hi; }\n")).toEqual(["greet"]);
  });

  it("ignores calls and keyword-only definitions", () => {
    expect(scanDeclaredUnits("deploy_app\nfunction no_parens {\n}\n")).toEqual([]);
  });
});

describe("countAliasDefinitions", () => {
  it("counts alias lines including indented ones", () => {
    const source = "alias ll='ls -l'\n  alias gs='git status'\n# alias old=x\necho alias\n";
    expect(countAliasDefinitions(source)).toBe(2);
  });
});

describe("countLines", () => {
  it("returns 0 for empty input", () => {
    expect(countLines("")).toBe(0);
  });

  it("counts newline-terminated lines", () => {
    expect(countLines("a\nb\n")).toBe(2);
  });

  it("counts an unterminated last line", () => {
    expect(countLines("a\nb")).toBe(2);
  });
});
