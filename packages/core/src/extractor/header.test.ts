import { describe, it, expect } from "vitest";
import {
  parseHeader,
  parseAboutLine,
  headerLines,
  stripCommentLeader,
  truncate,
} from "./header.js";

const FULL_HEADER = [
  "#!/usr/bin/env bash",
  "#",
  "#   DESCRIPTION:  Master indexer for the repository that creates a",
  "#                 searchable database of all functions.",
  "#         USAGE:  index_build",
  "#  REQUIREMENTS:  jq",
  "#       VERSION:  1.2.0",
  "#        AUTHOR:  Test Author",
  "#",
  "",
  "index_build() {",
  "  :",
  "}",
].join("\n");

describe("parseHeader", () => {
  it("captures every field marker with continuation lines", () => {
    expect(parseHeader(FULL_HEADER)).toEqual({
      description:
        "Master indexer for the repository that creates a searchable database of all functions.",
      usage: "index_build",
      requirements: "jq",
      version: "1.2.0",
      author: "Test Author",
    });
  });

  it("returns empty fields when there is no header", () => {
    expect(parseHeader("echo hi\n")).toEqual({
      description: "",
      usage: "",
      requirements: "",
      version: "",
      author: "",
    });
  });

  it("stops a field at another upper-case marker", () => {
    const source = "# DESCRIPTION: first part\n# NOTES: something else\n# still notes\n";
    expect(parseHeader(source).description).toBe("first part");
  });

  it("treats mixed-case prose with a colon as continuation", () => {
    const source = "# DESCRIPTION: Runs the job.\n# Example: run_job nightly\n";
    expect(parseHeader(source).description).toBe("Runs the job. Example: run_job nightly");
  });

  it("stops a field at a separator rule", () => {
    const source = "# DESCRIPTION: foo\n# ==========\n# bar\n";
    expect(parseHeader(source).description).toBe("foo");
  });

  it("keeps the first occurrence of a repeated marker", () => {
    const source = "# DESCRIPTION: one\n# DESCRIPTION: two\n# more\n";
    expect(parseHeader(source).description).toBe("one");
  });

  it("matches markers case-insensitively", () => {
    expect(parseHeader("# Description: lower case marker\n").description).toBe(
      "lower case marker",
    );
  });

  it("ignores markers after the leading comment block", () => {
    const source = "#!/bin/bash\n# DESCRIPTION: x\necho hi\n# USAGE: late\n";
    const header = parseHeader(source);
    expect(header.description).toBe("x");
    expect(header.usage).toBe("");
  });

  it("skips blank lines between the shebang and the header", () => {
    const source = "#!/bin/bash\n\n\n# DESCRIPTION: after blanks\n";
    expect(parseHeader(source).description).toBe("after blanks");
  });

  it("truncates long descriptions", () => {
    const source = `# DESCRIPTION: ${"word ".repeat(40)}\n`;
    const description = parseHeader(source).description;
    expect(description).toHaveLength(149);
    expect(description.endsWith("word")).toBe(true);
  });
});

describe("headerLines", () => {
  it("returns the leading comment block without the shebang", () => {
    expect(headerLines("#!/bin/sh\n# a\n# b\ncode\n# c\n")).toEqual(["# a", "# b"]);
  });
});

describe("stripCommentLeader", () => {
  it("removes hashes and surrounding whitespace", () => {
    expect(stripCommentLeader("  ##   text here  ")).toBe("text here");
  });
});

describe("truncate", () => {
  it("leaves short text unchanged", () => {
    expect(truncate("short", 10)).toBe("short");
  });

  it("cuts at the limit and trims trailing space", () => {
    expect(truncate("abcd efgh", 5)).toBe("abcd");
  });
});

describe("parseAboutLine", () => {
  it("reads an about-alias description", () => {
    const source = "cite 'about-alias'\nabout-alias 'git shortcuts'\nalias g='git'\n";
    expect(parseAboutLine(source)).toBe("git shortcuts");
  });

  it("accepts double quotes and about-plugin", () => {
    expect(parseAboutLine('about-plugin "docker helpers"\n')).toBe("docker helpers");
  });

  it("returns empty string when absent", () => {
    expect(parseAboutLine("alias ll='ls -l'\n")).toBe("");
  });
});
