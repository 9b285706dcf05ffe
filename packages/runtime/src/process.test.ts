import { describe, it, expect } from "vitest";
import { runWithInput, runInteractive, splitCommandLine } from "./process.js";

describe("runWithInput", () => {
  it("feeds stdin and captures stdout", async () => {
    const result = await runWithInput(
      process.execPath,
      ["-e", "process.stdin.pipe(process.stdout)"],
      "first\nsecond\n",
    );

    expect(result).toEqual({ code: 0, stdout: "first\nsecond\n" });
  });

  it("reports the exit code", async () => {
    const result = await runWithInput(process.execPath, ["-e", "process.exit(130)"], "ignored\n");
    expect(result.code).toBe(130);
  });

  it("rejects when the command cannot be started", async () => {
    await expect(runWithInput("scriptdex-no-such-command", [], "")).rejects.toThrow();
  });
});

describe("runInteractive", () => {
  it("resolves with the exit code", async () => {
    expect(await runInteractive(process.execPath, ["-e", "process.exit(3)"])).toBe(3);
  });
});

describe("splitCommandLine", () => {
  it("splits on whitespace", () => {
    expect(splitCommandLine("  code   --wait ")).toEqual(["code", "--wait"]);
  });

  it("returns an empty list for blank input", () => {
    expect(splitCommandLine("   ")).toEqual([]);
  });
});
