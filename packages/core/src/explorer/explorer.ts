import type { Logger } from "pino";
import type { AppConfig } from "../schemas/app-config.js";
import type { IndexStore } from "../storage/index/index.js";
import type { QueryEngine } from "../query/engine.js";
import type { LocateResult, SearchResult } from "../query/types.js";
import type { CollectionName } from "../schemas/index-document.js";
import { listCollectionFiles } from "../scanner/index.js";
import type { FuzzyPicker } from "./picker.js";
import { buildCandidates, filesystemCandidates, parseCandidate, type CandidateTag } from "./candidates.js";

export type ExploreAction = "view" | "edit" | "load" | "print";

export const EXPLORE_ACTIONS: readonly ExploreAction[] = ["view", "edit", "load", "print"];

const PICKER_HEADER = "Search scripts - Enter to select, Esc to cancel";

const TAG_COLLECTIONS: Record<CandidateTag, CollectionName> = {
  FUNC: "callables",
  ALIAS: "aliases",
  SCRIPT: "scripts",
};

export type ExploreOutcome =
  | {
      /** No fuzzy finder; `fallback` holds a plain search for the initial term. */
      status: "unavailable";
      fallback: SearchResult;
    }
  | { status: "cancelled" }
  | {
      status: "selected";
      tag: CandidateTag;
      name: string;
      /** Resolved file, null when the selection no longer exists. */
      path: string | null;
      located: LocateResult;
    };

export interface ExplorerOptions {
  store: Pick<IndexStore, "load">;
  engine: QueryEngine;
  picker: FuzzyPicker;
  corpusRoot: string;
  collections: AppConfig["collections"];
  logger: Logger;
}

export interface Explorer {
  explore(initialTerm?: string): Promise<ExploreOutcome>;
}

/** Shell line that loads a file into the calling shell when evaluated. */
export function loadCommand(path: string): string {
  return `source '${path.replace(/'/g, `'\\''`)}'`;
}

export function createExplorer(options: ExplorerOptions): Explorer {
  const { store, engine, picker, corpusRoot, collections, logger } = options;

  async function candidates(): Promise<string[]> {
    const document = await store.load();
    if (document !== null) return buildCandidates(document);
    const listing = await listCollectionFiles(
      corpusRoot,
      "callables",
      collections.callables,
      logger,
    );
    return filesystemCandidates(listing.files);
  }

  return {
    async explore(initialTerm = "") {
      if (!(await picker.isAvailable())) {
        logger.warn("Fuzzy finder not available, falling back to search");
        return { status: "unavailable", fallback: await engine.search(initialTerm, "all") };
      }

      const selected = await picker.pick(await candidates(), {
        query: initialTerm,
        header: PICKER_HEADER,
      });
      const parsed = selected === null ? null : parseCandidate(selected);
      if (parsed === null) return { status: "cancelled" };

      // Names may repeat across collections; the tag picks which one was meant.
      const located = await engine.locate(parsed.name, { collection: TAG_COLLECTIONS[parsed.tag] });
      const path =
        located.status === "indexed"
          ? located.entry.sourcePath
          : located.status === "file"
            ? located.path
            : null;
      return { status: "selected", ...parsed, path, located };
    },
  };
}
