import { dirname } from "node:path";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig } from "../schemas/app-config.js";
import {
  COLLECTION_NAMES,
  compareNames,
  type AliasEntry,
  type CallableEntry,
  type CategoryEntry,
  type CollectionName,
  type Entry,
  type ScriptEntry,
} from "../schemas/index-document.js";
import { extractMetadata, type ExtractedFile, type ScanIssue } from "../extractor/index.js";
import { groupByName, listCollectionFiles, type CandidateFile } from "./walk.js";

const PROGRESS_INTERVAL = 50;

export interface ScannerOptions {
  corpusRoot: string;
  collections: AppConfig["collections"];
  concurrency: number;
  logger: Logger;
}

export interface CorpusListing {
  files: Record<CollectionName, CandidateFile[]>;
  issues: ScanIssue[];
}

export interface CorpusScan {
  callables: Record<string, CallableEntry>;
  aliases: Record<string, AliasEntry>;
  scripts: Record<string, ScriptEntry>;
  categories: Record<string, CategoryEntry>;
  issues: ScanIssue[];
  /** Files whose metadata was read from disk in this scan. */
  extractedFiles: string[];
}

/** Returns a previously indexed entry that is still current for a candidate. */
export type ReuseLookup = (candidate: CandidateFile) => Entry | undefined;

export interface ScanOptions {
  listing?: CorpusListing;
  reuse?: ReuseLookup;
}

export interface CorpusScanner {
  list(): Promise<CorpusListing>;
  scan(options?: ScanOptions): Promise<CorpusScan>;
}

interface ResolvedGroup {
  entry: Entry;
  issue: ScanIssue | null;
  extractedFrom: string | null;
}

export function entryFromExtraction(
  collection: CollectionName,
  extracted: ExtractedFile,
): Entry {
  switch (collection) {
    case "callables":
      return { kind: "callable", ...extracted.metadata };
    case "aliases":
      return { kind: "alias", ...extracted.metadata, aliasCount: extracted.aliasCount };
    case "scripts":
      return { kind: "script", ...extracted.metadata, executable: extracted.executable };
  }
}

/**
 * Categories come from callables only: one per containing directory name,
 * with the directory of the last callable in path order as its path.
 */
export function deriveCategories(
  callables: Record<string, CallableEntry>,
): Record<string, CategoryEntry> {
  const ordered = Object.values(callables).sort((a, b) =>
    compareNames(a.sourcePath, b.sourcePath),
  );
  const found = new Map<string, CategoryEntry>();
  for (const entry of ordered) {
    const existing = found.get(entry.category);
    found.set(entry.category, {
      name: entry.category,
      path: dirname(entry.sourcePath),
      callableCount: (existing?.callableCount ?? 0) + 1,
    });
  }
  const sorted = [...found.values()].sort((a, b) => compareNames(a.name, b.name));
  return Object.fromEntries(sorted.map((category): [string, CategoryEntry] => [category.name, category]));
}

// Object.fromEntries defines own properties, so a name like "__proto__" stays a key.
function byName<T extends Entry>(entries: T[]): Record<string, T> {
  const sorted = [...entries].sort((a, b) => compareNames(a.name, b.name));
  return Object.fromEntries(sorted.map((entry): [string, T] => [entry.name, entry]));
}

export function createCorpusScanner(options: ScannerOptions): CorpusScanner {
  const { corpusRoot, collections, concurrency, logger } = options;

  async function list(): Promise<CorpusListing> {
    const files: Record<CollectionName, CandidateFile[]> = {
      callables: [],
      aliases: [],
      scripts: [],
    };
    const issues: ScanIssue[] = [];
    for (const collection of COLLECTION_NAMES) {
      const listing = await listCollectionFiles(
        corpusRoot,
        collection,
        collections[collection],
        logger,
      );
      files[collection] = listing.files;
      issues.push(...listing.issues);
    }
    return { files, issues };
  }

  async function resolveGroup(
    collection: CollectionName,
    group: CandidateFile[],
    reuse: ReuseLookup | undefined,
  ): Promise<ResolvedGroup | null> {
    // Later paths win; an earlier duplicate only counts if the later one vanished.
    for (let i = group.length - 1; i >= 0; i--) {
      const candidate = group[i];
      if (!candidate) continue;
      const reused = reuse?.(candidate);
      if (reused) return { entry: reused, issue: null, extractedFrom: null };

      const extracted = await extractMetadata(candidate.path, {
        corpusRoot,
        name: candidate.name,
        logger,
      });
      if (extracted === null) {
        logger.debug({ path: candidate.path }, "File disappeared before extraction, skipping");
        continue;
      }
      return {
        entry: entryFromExtraction(collection, extracted),
        issue: extracted.issue,
        extractedFrom: candidate.path,
      };
    }
    return null;
  }

  async function scan(scanOptions?: ScanOptions): Promise<CorpusScan> {
    const listing = scanOptions?.listing ?? (await list());
    const limit = pLimit(concurrency);

    const jobs: Array<Promise<ResolvedGroup | null>> = [];
    for (const collection of COLLECTION_NAMES) {
      for (const group of groupByName(listing.files[collection]).values()) {
        jobs.push(limit(() => resolveGroup(collection, group, scanOptions?.reuse)));
      }
    }

    let done = 0;
    const total = jobs.length;
    const tracked = jobs.map(async (job) => {
      const result = await job;
      done++;
      if (done % PROGRESS_INTERVAL === 0 || done === total) {
        logger.info({ done, total }, "Indexing progress");
      }
      return result;
    });
    const results = await Promise.all(tracked);

    const callables: CallableEntry[] = [];
    const aliases: AliasEntry[] = [];
    const scripts: ScriptEntry[] = [];
    const issues = [...listing.issues];
    const extractedFiles: string[] = [];

    for (const result of results) {
      if (result === null) continue;
      if (result.issue) issues.push(result.issue);
      if (result.extractedFrom !== null) extractedFiles.push(result.extractedFrom);
      const { entry } = result;
      switch (entry.kind) {
        case "callable":
          callables.push(entry);
          break;
        case "alias":
          aliases.push(entry);
          break;
        case "script":
          scripts.push(entry);
          break;
      }
    }

    if (issues.length > 0) {
      logger.warn({ count: issues.length }, "Some files could not be read; index is partial");
    }

    const callableMap = byName(callables);
    return {
      callables: callableMap,
      aliases: byName(aliases),
      scripts: byName(scripts),
      categories: deriveCategories(callableMap),
      issues,
      extractedFiles,
    };
  }

  return { list, scan };
}
