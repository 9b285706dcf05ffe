import { describe, it, expect, vi } from "vitest";
import { createFzfPicker, fzfArgs } from "./fzf-picker.js";
import type { ProcessResult } from "./process.js";

function fakeRun(result: ProcessResult) {
  return vi.fn(async (_command: string, _args: readonly string[], _input: string) => result);
}

describe("createFzfPicker", () => {
  it("sends candidates on stdin and returns the selected line", async () => {
    const run = fakeRun({ code: 0, stdout: "[FUNC] a_task - First task (utils)\n" });
    const picker = createFzfPicker({ run });

    const selected = await picker.pick(["[FUNC] a_task - First task (utils)", "[SCRIPT] backup"], {
      query: "task",
      header: "Pick one",
    });

    expect(selected).toBe("[FUNC] a_task - First task (utils)");
    expect(run).toHaveBeenCalledWith(
      "fzf",
      ["--height=80%", "--border", "--no-multi", "--query=task", "--header=Pick one"],
      "[FUNC] a_task - First task (utils)\n[SCRIPT] backup\n",
    );
  });

  it("returns null when cancelled or nothing matched", async () => {
    for (const code of [1, 130]) {
      const picker = createFzfPicker({ run: fakeRun({ code, stdout: "" }) });
      expect(await picker.pick(["[SCRIPT] backup"])).toBeNull();
    }
  });

  it("throws on other exit codes", async () => {
    const picker = createFzfPicker({ command: "sk", run: fakeRun({ code: 2, stdout: "" }) });
    await expect(picker.pick(["[SCRIPT] backup"])).rejects.toThrow("sk exited with code 2");
  });

  it("does not start the picker without candidates", async () => {
    const run = fakeRun({ code: 0, stdout: "" });
    expect(await createFzfPicker({ run }).pick([])).toBeNull();
    expect(run).not.toHaveBeenCalled();
  });

  it("checks availability of the configured command", async () => {
    const exists = vi.fn(async (command: string) => command === "sk");

    expect(await createFzfPicker({ command: "sk", exists }).isAvailable()).toBe(true);
    expect(await createFzfPicker({ exists }).isAvailable()).toBe(false);
  });
});

describe("fzfArgs", () => {
  it("omits empty query and header", () => {
    expect(fzfArgs({ query: "" })).toEqual(["--height=80%", "--border", "--no-multi"]);
  });
});
