import { describe, it, expect, vi, afterEach } from "vitest";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createIndexStore } from "./store.js";
import { createCorpusScanner } from "../../scanner/index.js";
import { DEFAULTS } from "../../schemas/app-config.js";
import { PersistenceFailureError } from "../../errors/catalog.js";
import { withTempDir, writeCorpus, silentLogger } from "../../test-utils/corpus.js";

const failures = vi.hoisted(() => ({ rename: false, unreadable: new Set<string>() }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return {
    ...actual,
    rename: async (...args: Parameters<typeof actual.rename>) => {
      if (failures.rename) {
        throw Object.assign(new Error("EACCES: permission denied, rename"), { code: "EACCES" });
      }
      return actual.rename(...args);
    },
    readFile: async (...args: Parameters<typeof actual.readFile>) => {
      const [path] = args;
      if (typeof path === "string" && failures.unreadable.has(path)) {
        throw Object.assign(new Error("EIO: i/o error, read"), { code: "EIO" });
      }
      return actual.readFile(...args);
    },
  };
});

function storeFor(root: string) {
  const logger = silentLogger();
  return createIndexStore({
    indexPath: join(root, ".index", "master_index.json"),
    corpusRoot: root,
    scanner: createCorpusScanner({
      corpusRoot: root,
      collections: DEFAULTS.collections,
      concurrency: 2,
      logger,
    }),
    logger,
  });
}

async function writeTasks(root: string): Promise<string[]> {
  return writeCorpus(root, [
    { path: "bash_functions.d/utils/a_task.sh", content: "# DESCRIPTION: First\na_task() {\n}\n", mtimeEpoch: 1700000000 },
    { path: "bash_functions.d/utils/b_task.sh", content: "# DESCRIPTION: Second\nb_task() {\n}\n", mtimeEpoch: 1700000000 },
  ]);
}

afterEach(() => {
  failures.rename = false;
  failures.unreadable.clear();
});

describe("index store under filesystem failures", () => {
  it("keeps the previous index intact when the rename fails", async () => {
    await withTempDir(async (root) => {
      await writeTasks(root);
      const indexDir = join(root, ".index");
      const indexPath = join(indexDir, "master_index.json");
      const first = await storeFor(root).build();
      const before = await readFile(indexPath, "utf-8");

      await writeCorpus(root, [{ path: "bash_functions.d/utils/c_task.sh", content: "c_task() {\n}\n" }]);
      failures.rename = true;
      await expect(storeFor(root).build()).rejects.toBeInstanceOf(PersistenceFailureError);
      failures.rename = false;

      expect(await readFile(indexPath, "utf-8")).toBe(before);
      expect((await readdir(indexDir)).filter((name) => name.includes(".tmp."))).toEqual([]);
      expect(await storeFor(root).load()).toEqual(first.document);
    });
  });

  it("builds a partial index when a file cannot be read", async () => {
    await withTempDir(async (root) => {
      const [aTask] = await writeTasks(root);
      if (aTask === undefined) throw new Error("fixture not written");
      failures.unreadable.add(aTask);

      const { document, issues } = await storeFor(root).build();

      expect(issues).toEqual([{ path: aTask, reason: "EIO: i/o error, read" }]);
      expect(Object.keys(document.callables)).toEqual(["a_task", "b_task"]);
      expect(document.callables.b_task?.description).toBe("Second");
      expect(document.callables.a_task).toMatchObject({
        description: "",
        contentHash: "",
        sizeBytes: 0,
      });
      expect(await storeFor(root).load()).toEqual(document);
    });
  });
});
