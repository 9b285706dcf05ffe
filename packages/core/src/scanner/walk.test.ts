import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { listCollectionFiles, entryNameFor, groupByName } from "./walk.js";
import { withTempDir, writeCorpus } from "../test-utils/corpus.js";
import { DEFAULTS } from "../schemas/app-config.js";

describe("entryNameFor", () => {
  it("strips alias suffixes for aliases", () => {
    expect(entryNameFor("aliases", "/c/aliases/git.aliases.bash")).toBe("git");
    expect(entryNameFor("aliases", "/c/aliases/docker.aliases.sh")).toBe("docker");
    expect(entryNameFor("aliases", "/c/aliases/general.sh")).toBe("general");
  });

  it("strips only the extension elsewhere", () => {
    expect(entryNameFor("callables", "/c/fn/a.aliases.sh")).toBe("a.aliases");
    expect(entryNameFor("scripts", "/c/bin/backup.bash")).toBe("backup");
  });
});

describe("listCollectionFiles", () => {
  it("recurses, filters by extension and sorts by path", async () => {
    await withTempDir(async (root) => {
      await writeCorpus(root, [
        { path: "bash_functions.d/utils/b.sh", content: "b() {\n}\n" },
        { path: "bash_functions.d/deploy/a.sh", content: "a() {\n}\n", mtimeEpoch: 1700000000 },
        { path: "bash_functions.d/utils/readme.md", content: "# notes\n" },
        { path: "bash_functions.d/.git/hook.sh", content: "\n" },
      ]);

      const { files, issues } = await listCollectionFiles(
        root,
        "callables",
        DEFAULTS.collections.callables,
      );

      expect(issues).toEqual([]);
      expect(files.map((f) => f.path)).toEqual([
        join(root, "bash_functions.d", "deploy", "a.sh"),
        join(root, "bash_functions.d", "utils", "b.sh"),
      ]);
      expect(files[0]).toEqual({
        collection: "callables",
        name: "a",
        path: join(root, "bash_functions.d", "deploy", "a.sh"),
        sizeBytes: 8,
        modifiedAtEpoch: 1700000000,
      });
    });
  });

  it("does not descend when the collection is flat", async () => {
    await withTempDir(async (root) => {
      await writeCorpus(root, [
        { path: "aliases/git.aliases.bash", content: "alias g='git'\n" },
        { path: "aliases/old/legacy.sh", content: "alias l='ls'\n" },
      ]);

      const { files } = await listCollectionFiles(root, "aliases", DEFAULTS.collections.aliases);

      expect(files.map((f) => f.name)).toEqual(["git"]);
    });
  });

  it("requires the executable bit for scripts", async () => {
    await withTempDir(async (root) => {
      await writeCorpus(root, [
        { path: "scripts/backup.sh", content: "echo\n", executable: true },
        { path: "scripts/draft.sh", content: "echo\n" },
        { path: "bin/tool.bash", content: "echo\n", executable: true },
      ]);

      const { files } = await listCollectionFiles(root, "scripts", DEFAULTS.collections.scripts);

      expect(files.map((f) => f.name)).toEqual(["tool", "backup"]);
    });
  });

  it("skips a missing directory without an issue", async () => {
    await withTempDir(async (root) => {
      const listing = await listCollectionFiles(root, "aliases", DEFAULTS.collections.aliases);
      expect(listing).toEqual({ files: [], issues: [] });
    });
  });
});

describe("groupByName", () => {
  it("keeps path order within a group", () => {
    const base = { collection: "callables" as const, sizeBytes: 1, modifiedAtEpoch: 1 };
    const groups = groupByName([
      { ...base, name: "dup", path: "/a/dup.sh" },
      { ...base, name: "one", path: "/a/one.sh" },
      { ...base, name: "dup", path: "/b/dup.sh" },
    ]);

    expect([...groups.keys()]).toEqual(["dup", "one"]);
    expect(groups.get("dup")?.map((f) => f.path)).toEqual(["/a/dup.sh", "/b/dup.sh"]);
  });
});
