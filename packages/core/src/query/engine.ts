import { readFile } from "node:fs/promises";
import { basename, dirname, join, relative } from "node:path";
import micromatch from "micromatch";
import type { Logger } from "pino";
import type { AppConfig, SearchConfig } from "../schemas/app-config.js";
import type { CollectionName, Entry, IndexDocument } from "../schemas/index-document.js";
import { listCollectionFiles, entryNameFor, type CandidateFile } from "../scanner/index.js";
import { defaultEntryName } from "../extractor/index.js";
import { IndexNotFoundError } from "../errors/catalog.js";
import type { IndexStore } from "../storage/index/index.js";
import { readLines, walkFiles } from "./files.js";
import { collectionsFor, entriesOf, lookupEntry, searchDocument } from "./search.js";
import { sortEntries } from "./sort.js";
import { compilePattern, grepLines } from "./grep.js";
import { countUsage, type UsageCount } from "./usage.js";
import type {
  DescribeResult,
  FileHit,
  FindScope,
  GrepMatch,
  GrepOptions,
  GrepResult,
  LineHit,
  LocateResult,
  SearchResult,
  SearchScope,
  SortCriterion,
  SortOrder,
} from "./types.js";

const MAX_SUGGESTIONS = 5;
const PREVIEW_SCAN_LINES = 30;
const PREVIEW_LINES = 10;

export interface QueryEngineOptions {
  store: Pick<IndexStore, "load">;
  corpusRoot: string;
  collections: AppConfig["collections"];
  search: SearchConfig;
  /** Shell history read by `popular`; without one every count is zero. */
  historyFile?: string;
  logger: Logger;
}

export interface LocateOptions {
  collection?: CollectionName;
}

export interface QueryEngine {
  search(term: string, scope: SearchScope): Promise<SearchResult>;
  find(glob: string, scope: FindScope): Promise<FileHit[]>;
  /** Resolves a name; `collection` restricts the indexed lookup to one collection. */
  locate(name: string, options?: LocateOptions): Promise<LocateResult>;
  sort(scope: FindScope, criterion: SortCriterion, order: SortOrder): Promise<Entry[]>;
  grep(pattern: string, options?: GrepOptions): Promise<GrepResult>;
  describe(name: string, options?: { source?: boolean }): Promise<DescribeResult>;
  recent(count: number): Promise<Entry[]>;
  popular(count: number): Promise<UsageCount[]>;
}

export function createQueryEngine(options: QueryEngineOptions): QueryEngine {
  const { store, corpusRoot, collections, search: searchConfig, historyFile, logger } = options;
  let documentPromise: Promise<IndexDocument | null> | undefined;

  // One load per engine, so repeated queries see the same document.
  function loadDocument(): Promise<IndexDocument | null> {
    documentPromise ??= store.load();
    return documentPromise;
  }

  async function requireDocument(): Promise<IndexDocument> {
    const document = await loadDocument();
    if (document === null) throw new IndexNotFoundError({ corpusRoot });
    return document;
  }

  function toFileHit(collection: CollectionName | null, path: string): FileHit {
    return {
      kind: "file",
      collection,
      name: collection === null ? defaultEntryName(path) : entryNameFor(collection, path),
      path,
      relativePath: relative(corpusRoot, path),
      category: basename(dirname(path)),
    };
  }

  async function collectionFiles(collection: CollectionName): Promise<CandidateFile[]> {
    const listing = await listCollectionFiles(
      corpusRoot,
      collection,
      collections[collection],
      logger,
    );
    return listing.files;
  }

  async function contentSearch(term: string): Promise<LineHit[]> {
    const needle = term.toLowerCase();
    const hits: LineHit[] = [];
    for (const collection of ["callables", "aliases"] as const) {
      for (const file of await collectionFiles(collection)) {
        const lines = await readLines(file.path, logger);
        if (lines === null) continue;
        for (const [index, line] of lines.entries()) {
          if (!line.toLowerCase().includes(needle)) continue;
          hits.push({
            kind: "line",
            path: file.path,
            relativePath: relative(corpusRoot, file.path),
            lineNumber: index + 1,
            line: line.trim(),
          });
          if (hits.length >= searchConfig.contentLimit) return hits;
        }
      }
    }
    return hits;
  }

  async function directSearch(term: string, scope: FindScope): Promise<FileHit[]> {
    const needle = term.toLowerCase();
    const hits: FileHit[] = [];
    for (const collection of collectionsFor(scope)) {
      const matching = (await collectionFiles(collection))
        .filter((file) => file.name.toLowerCase().includes(needle))
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      hits.push(...matching.map((file) => toFileHit(collection, file.path)));
    }
    return hits;
  }

  async function search(term: string, scope: SearchScope): Promise<SearchResult> {
    if (scope === "content") {
      return { mode: "direct", hits: await contentSearch(term) };
    }
    const document = await loadDocument();
    if (document === null) {
      logger.debug({ term, scope }, "No index, searching the filesystem");
      const hits = [
        ...(await directSearch(term, scope)),
        ...(scope === "all" ? await contentSearch(term) : []),
      ];
      return { mode: "direct", hits };
    }
    return { mode: "indexed", hits: searchDocument(document, term, scope) };
  }

  async function find(glob: string, scope: FindScope): Promise<FileHit[]> {
    const roots: Array<{ collection: CollectionName | null; dir: string }> =
      scope === "all"
        ? [{ collection: null, dir: corpusRoot }]
        : collections[scope].dirs.map((dir) => ({ collection: scope, dir: join(corpusRoot, dir) }));

    const hits: FileHit[] = [];
    for (const root of roots) {
      for (const path of await walkFiles(root.dir, logger)) {
        if (micromatch.isMatch(basename(path), glob, { nocase: true })) {
          hits.push(toFileHit(root.collection, path));
        }
      }
    }
    return hits;
  }

  async function preview(path: string, keep: (line: string) => boolean): Promise<string[]> {
    const lines = await readLines(path, logger);
    if (lines === null) return [];
    return lines.slice(0, PREVIEW_SCAN_LINES).filter(keep);
  }

  async function locate(name: string, locateOptions?: LocateOptions): Promise<LocateResult> {
    const document = await loadDocument();
    const only = locateOptions?.collection;
    const indexed =
      document === null ? null : lookupEntry(document, name, only === undefined ? undefined : [only]);
    if (indexed) {
      const code = await preview(indexed.entry.sourcePath, (line) => !line.startsWith("#"));
      return { status: "indexed", ...indexed, preview: code.slice(0, PREVIEW_LINES) };
    }

    const files = await walkFiles(corpusRoot, logger);
    for (const candidate of [`${name}.sh`, `${name}.bash`, name]) {
      const path = files.find((file) => basename(file) === candidate);
      if (path !== undefined) {
        return {
          status: "file",
          path,
          header: await preview(path, (line) => line.startsWith("#")),
        };
      }
    }

    const needle = name.toLowerCase();
    const suggestions = files
      .filter((file) => basename(file).toLowerCase().includes(needle))
      .slice(0, MAX_SUGGESTIONS)
      .map((file) => relative(corpusRoot, file));
    return { status: "missing", suggestions };
  }

  async function sort(
    scope: FindScope,
    criterion: SortCriterion,
    order: SortOrder,
  ): Promise<Entry[]> {
    const document = await requireDocument();
    const entries = collectionsFor(scope).flatMap((collection) => entriesOf(document, collection));
    return sortEntries(entries, criterion, order);
  }

  async function grep(pattern: string, grepOptions?: GrepOptions): Promise<GrepResult> {
    const contextLines = grepOptions?.contextLines ?? searchConfig.defaultContextLines;
    const { regex, literal } = compilePattern(
      pattern,
      grepOptions?.ignoreCase ?? searchConfig.ignoreCase,
    );

    const scan = async (
      collection: "callables" | "aliases",
    ): Promise<{ matches: GrepMatch[]; truncated: boolean }> => {
      const limit = searchConfig.grepLimits[collection];
      const matches: GrepMatch[] = [];
      for (const file of await collectionFiles(collection)) {
        const lines = await readLines(file.path, logger);
        if (lines === null) continue;
        matches.push(
          ...grepLines(lines, regex, contextLines, {
            path: file.path,
            relativePath: relative(corpusRoot, file.path),
          }),
        );
        if (matches.length > limit) return { matches: matches.slice(0, limit), truncated: true };
      }
      return { matches, truncated: false };
    };

    const callables = await scan("callables");
    const aliases = await scan("aliases");
    return {
      literal,
      callables: callables.matches,
      aliases: aliases.matches,
      truncated: { callables: callables.truncated, aliases: aliases.truncated },
    };
  }

  async function describe(
    name: string,
    describeOptions?: { source?: boolean },
  ): Promise<DescribeResult> {
    const located = await locate(name);
    if (!describeOptions?.source || located.status === "missing") {
      return { located, source: null };
    }
    const path = located.status === "indexed" ? located.entry.sourcePath : located.path;
    try {
      return { located, source: await readFile(path, "utf-8") };
    } catch (err) {
      logger.warn({ path, reason: err instanceof Error ? err.message : String(err) }, "Could not read source");
      return { located, source: null };
    }
  }

  async function recent(count: number): Promise<Entry[]> {
    const sorted = await sort("callables", "date", "desc");
    return sorted.slice(0, Math.max(0, count));
  }

  async function popular(count: number): Promise<UsageCount[]> {
    if (historyFile === undefined) return [];
    const document = await loadDocument();
    const names =
      document !== null
        ? Object.keys(document.callables)
        : (await collectionFiles("callables")).map((file) => file.name);
    const lines = await readLines(historyFile, logger);
    if (lines === null) return [];
    return countUsage(lines, names).slice(0, Math.max(0, count));
  }

  return { search, find, locate, sort, grep, describe, recent, popular };
}
