import { describe, it, expect, vi } from "vitest";
import { readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { createIndexStore } from "./store.js";
import { createCorpusScanner } from "../../scanner/index.js";
import { DEFAULTS } from "../../schemas/app-config.js";
import { PersistenceFailureError } from "../../errors/catalog.js";
import { withTempDir, writeCorpus, scriptHeader, silentLogger } from "../../test-utils/corpus.js";

function storeFor(
  root: string,
  options: { indexPath?: string; logger?: Logger; now?: () => Date } = {},
) {
  const logger = options.logger ?? silentLogger();
  return createIndexStore({
    indexPath: options.indexPath ?? join(root, ".index", "master_index.json"),
    corpusRoot: root,
    scanner: createCorpusScanner({
      corpusRoot: root,
      collections: DEFAULTS.collections,
      concurrency: 4,
      logger,
    }),
    logger,
    now: options.now,
  });
}

async function writeSampleCorpus(root: string): Promise<void> {
  await writeCorpus(root, [
    {
      path: "bash_functions.d/deploy/deploy_app.sh",
      content: scriptHeader({ description: "Deploys the application" }) + "deploy_app() {\n}\n",
      mtimeEpoch: 1700000000,
    },
    { path: "bash_functions.d/utils/a_task.sh", content: "a_task() {\n}\n", mtimeEpoch: 1700000000 },
    { path: "bash_functions.d/utils/b_task.sh", content: "b_task() {\n}\n", mtimeEpoch: 1700000000 },
    { path: "aliases/git.aliases.bash", content: "alias g='git'\n", mtimeEpoch: 1700000000 },
    { path: "scripts/backup.sh", content: "echo\n", executable: true, mtimeEpoch: 1700000000 },
  ]);
}

describe("createIndexStore", () => {
  describe("build / load", () => {
    it("round-trips a document whose totals match the maps", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        const store = storeFor(root);

        const { document, issues } = await store.build();
        const loaded = await store.load();

        expect(issues).toEqual([]);
        expect(loaded).toEqual(document);
        expect(loaded?.schemaVersion).toBe("1.0");
        expect(loaded?.corpusRoot).toBe(root);
        expect(loaded?.statistics.totalCallables).toBe(Object.keys(loaded?.callables ?? {}).length);
        expect(loaded?.statistics.totalAliases).toBe(1);
        expect(loaded?.statistics.totalScripts).toBe(1);
        expect(loaded?.statistics.totalCategories).toBe(2);
        expect(loaded?.statistics.totalCallables).toBe(3);
      });
    });

    it("builds an empty aliases collection without touching categories", async () => {
      await withTempDir(async (root) => {
        await writeCorpus(root, [
          { path: "bash_functions.d/utils/a_task.sh", content: "a_task() {\n}\n" },
        ]);

        const { document } = await storeFor(root).build();

        expect(document.statistics.totalAliases).toBe(0);
        expect(document.aliases).toEqual({});
        expect(Object.keys(document.categories)).toEqual(["utils"]);
      });
    });

    it("leaves no temporary file behind", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        const store = storeFor(root);
        await store.build();

        expect(await readdir(join(root, ".index"))).toEqual(["master_index.json"]);
      });
    });

    it("returns null when no index exists", async () => {
      await withTempDir(async (root) => {
        expect(await storeFor(root).load()).toBeNull();
      });
    });

    it("treats a corrupt index as missing and warns", async () => {
      await withTempDir(async (root) => {
        const indexPath = join(root, "index.json");
        await writeFile(indexPath, "{ not json");
        const warn = vi.fn();
        const logger: Partial<Logger> = { warn, info: vi.fn(), debug: vi.fn() };

        const loaded = await storeFor(root, { indexPath, logger: logger as Logger }).load();

        expect(loaded).toBeNull();
        expect(warn).toHaveBeenCalledTimes(1);
      });
    });

    it("treats a document with the wrong shape as missing", async () => {
      await withTempDir(async (root) => {
        const indexPath = join(root, "index.json");
        await writeFile(indexPath, JSON.stringify({ schemaVersion: "0.1" }));

        expect(await storeFor(root, { indexPath }).load()).toBeNull();
      });
    });

    it("never moves lastUpdatedAtUTC backwards", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        await storeFor(root, { now: () => new Date("2099-01-01T00:00:00.500Z") }).build();

        const { document } = await storeFor(root, {
          now: () => new Date("2026-01-21T10:00:00Z"),
        }).build();

        expect(document.lastUpdatedAtUTC).toBe("2099-01-01T00:00:00Z");
      });
    });

    it("throws PersistenceFailureError when the index cannot be written", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        await writeFile(join(root, "blocker"), "a file, not a directory");
        const store = storeFor(root, { indexPath: join(root, "blocker", "index.json") });

        const failure = store.build();

        await expect(failure).rejects.toBeInstanceOf(PersistenceFailureError);
        await expect(failure).rejects.toMatchObject({ errorCode: "PERSISTENCE_FAILURE", exitCode: 2 });
        expect(await readFile(join(root, "blocker"), "utf-8")).toBe("a file, not a directory");
      });
    });
  });

  describe("refresh", () => {
    it("creates the index when none exists", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);

        const result = await storeFor(root).refresh();

        expect(result.status).toBe("created");
        expect(result.changedFiles).toHaveLength(5);
        expect(result.document.statistics.totalCallables).toBe(3);
      });
    });

    it("reports up-to-date without rewriting", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        await storeFor(root, { now: () => new Date("2026-01-21T10:00:00Z") }).build();

        const result = await storeFor(root, {
          now: () => new Date("2026-02-01T00:00:00Z"),
        }).refresh();

        expect(result.status).toBe("up-to-date");
        expect(result.changedFiles).toEqual([]);
        expect(result.removedFiles).toEqual([]);
        expect(result.document.lastUpdatedAtUTC).toBe("2026-01-21T10:00:00Z");
      });
    });

    it("re-extracts modified files and matches a full build", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        const store = storeFor(root);
        await store.build();
        const [changed] = await writeCorpus(root, [
          {
            path: "bash_functions.d/utils/a_task.sh",
            content: "# DESCRIPTION: Runs task A\na_task() {\n}\n",
            mtimeEpoch: 1700000100,
          },
        ]);

        const result = await store.refresh();
        const rebuilt = await store.build();

        expect(result.status).toBe("updated");
        expect(result.changedFiles).toEqual([changed]);
        expect(result.removedFiles).toEqual([]);
        expect(result.document.callables.a_task?.description).toBe("Runs task A");
        expect(result.document.callables).toEqual(rebuilt.document.callables);
        expect(result.document.categories).toEqual(rebuilt.document.categories);
      });
    });

    it("drops entries whose files were removed", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        const store = storeFor(root);
        await store.build();
        const removed = join(root, "bash_functions.d", "deploy", "deploy_app.sh");
        await rm(removed);

        const result = await store.refresh();

        expect(result.status).toBe("updated");
        expect(result.removedFiles).toEqual([removed]);
        expect(result.document.callables.deploy_app).toBeUndefined();
        expect(Object.keys(result.document.categories)).toEqual(["utils"]);
        expect(result.document.statistics.totalCallables).toBe(2);
      });
    });
  });

  describe("stats", () => {
    it("returns null without an index", async () => {
      await withTempDir(async (root) => {
        expect(await storeFor(root).stats()).toBeNull();
      });
    });

    it("lists top categories by callable count", async () => {
      await withTempDir(async (root) => {
        await writeSampleCorpus(root);
        const store = storeFor(root);
        await store.build();

        const summary = await store.stats();

        expect(summary?.topCategories.map((c) => [c.name, c.callableCount])).toEqual([
          ["utils", 2],
          ["deploy", 1],
        ]);
        expect(summary?.indexPath).toBe(join(root, ".index", "master_index.json"));
      });
    });
  });
});
