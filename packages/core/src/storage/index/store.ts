import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import {
  COLLECTION_NAMES,
  INDEX_SCHEMA_VERSION,
  IndexDocumentSchema,
  compareNames,
  computeStatistics,
  type CategoryEntry,
  type Entry,
  type IndexDocument,
  type IndexStatistics,
} from "../../schemas/index-document.js";
import type { ScanIssue } from "../../extractor/index.js";
import {
  groupByName,
  type CorpusListing,
  type CorpusScan,
  type CorpusScanner,
  type ReuseLookup,
} from "../../scanner/index.js";
import { PersistenceFailureError } from "../../errors/catalog.js";
import { nextUpdatedAt } from "./timestamp.js";

const TOP_CATEGORY_COUNT = 5;

export interface IndexStoreOptions {
  indexPath: string;
  corpusRoot: string;
  scanner: CorpusScanner;
  logger: Logger;
  /** Clock override for tests. */
  now?: () => Date;
}

export interface BuildResult {
  document: IndexDocument;
  issues: ScanIssue[];
}

export type RefreshStatus = "created" | "updated" | "up-to-date";

export interface RefreshResult {
  status: RefreshStatus;
  document: IndexDocument;
  /** Files that were new or modified since the previous document. */
  changedFiles: string[];
  /** Source paths of entries whose file is gone. */
  removedFiles: string[];
  issues: ScanIssue[];
}

export interface IndexSummary {
  indexPath: string;
  corpusRoot: string;
  lastUpdatedAtUTC: string;
  statistics: IndexStatistics;
  topCategories: CategoryEntry[];
}

export interface IndexStore {
  readonly indexPath: string;
  build(): Promise<BuildResult>;
  /** Returns null when there is no usable index; callers fall back to the filesystem. */
  load(): Promise<IndexDocument | null>;
  refresh(): Promise<RefreshResult>;
  stats(): Promise<IndexSummary | null>;
}

export interface ListingDiff {
  changedFiles: string[];
  removedFiles: string[];
}

function isCurrent(
  entry: Entry | undefined,
  candidate: { path: string; sizeBytes: number; modifiedAtEpoch: number },
): entry is Entry {
  return (
    entry !== undefined &&
    entry.sourcePath === candidate.path &&
    entry.sizeBytes === candidate.sizeBytes &&
    entry.modifiedAtEpoch === candidate.modifiedAtEpoch
  );
}

/**
 * Compare a fresh listing with a document. Only the file a full build would
 * keep for each name is considered, so shadowed duplicates never count as
 * changes.
 */
export function diffListing(
  document: IndexDocument,
  listing: CorpusListing,
): ListingDiff {
  const changedFiles: string[] = [];
  const removedFiles: string[] = [];

  for (const collection of COLLECTION_NAMES) {
    const indexed: Record<string, Entry> = document[collection];
    const groups = groupByName(listing.files[collection]);

    for (const [name, group] of groups) {
      const winner = group[group.length - 1];
      if (winner && !isCurrent(indexed[name], winner)) changedFiles.push(winner.path);
    }
    for (const [name, entry] of Object.entries(indexed)) {
      if (!groups.has(name)) removedFiles.push(entry.sourcePath);
    }
  }

  return { changedFiles, removedFiles };
}

function reuseFrom(document: IndexDocument): ReuseLookup {
  return (candidate) => {
    const indexed: Record<string, Entry> = document[candidate.collection];
    const entry = indexed[candidate.name];
    return isCurrent(entry, candidate) ? entry : undefined;
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function topCategories(
  document: IndexDocument,
  count: number = TOP_CATEGORY_COUNT,
): CategoryEntry[] {
  return Object.values(document.categories)
    .sort(
      (a, b) => b.callableCount - a.callableCount || compareNames(a.name, b.name),
    )
    .slice(0, count);
}

export function createIndexStore(options: IndexStoreOptions): IndexStore {
  const { indexPath, corpusRoot, scanner, logger } = options;
  const now = options.now ?? (() => new Date());

  async function load(): Promise<IndexDocument | null> {
    let raw: string;
    try {
      raw = await readFile(indexPath, "utf-8");
    } catch (err: unknown) {
      const code =
        err instanceof Error && "code" in err
          ? (err as NodeJS.ErrnoException).code
          : undefined;
      if (code === "ENOENT" || code === "ENOTDIR") {
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.warn({ indexPath, reason: describeError(err) }, "Index is not valid JSON, ignoring it");
      return null;
    }

    const result = IndexDocumentSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn(
        { indexPath, issues: result.error.issues.length },
        "Index does not match the expected schema, ignoring it",
      );
      return null;
    }
    return result.data;
  }

  /** Atomic write: mkdir -p, write temp file, rename */
  async function writeDocument(document: IndexDocument): Promise<void> {
    const tempPath = indexPath + ".tmp." + randomUUID();
    try {
      await mkdir(dirname(indexPath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(document, null, 2) + "\n", "utf-8");
      await rename(tempPath, indexPath);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn({ tempPath, reason: describeError(cleanupErr) }, "Could not remove temporary index file");
      });
      throw new PersistenceFailureError({ indexPath, reason: describeError(err) });
    }
  }

  async function persist(
    scan: CorpusScan,
    previous: IndexDocument | null,
    startedAt: number,
  ): Promise<IndexDocument> {
    const durationSeconds = Math.round(Date.now() - startedAt) / 1000;
    const document: IndexDocument = {
      schemaVersion: INDEX_SCHEMA_VERSION,
      lastUpdatedAtUTC: nextUpdatedAt(previous?.lastUpdatedAtUTC ?? null, now()),
      corpusRoot,
      statistics: computeStatistics(scan, durationSeconds),
      callables: scan.callables,
      aliases: scan.aliases,
      scripts: scan.scripts,
      categories: scan.categories,
    };
    await writeDocument(document);
    logger.info(
      { indexPath, ...document.statistics },
      "Index written",
    );
    return document;
  }

  async function build(): Promise<BuildResult> {
    const startedAt = Date.now();
    const previous = await load();
    logger.info({ corpusRoot }, "Building index");
    const scan = await scanner.scan();
    const document = await persist(scan, previous, startedAt);
    return { document, issues: scan.issues };
  }

  async function refresh(): Promise<RefreshResult> {
    const startedAt = Date.now();
    const previous = await load();
    if (previous === null) {
      logger.info({ indexPath }, "No index yet, building");
      const scan = await scanner.scan();
      const document = await persist(scan, null, startedAt);
      return {
        status: "created",
        document,
        changedFiles: scan.extractedFiles,
        removedFiles: [],
        issues: scan.issues,
      };
    }

    const listing = await scanner.list();
    const { changedFiles, removedFiles } = diffListing(previous, listing);
    if (changedFiles.length === 0 && removedFiles.length === 0) {
      logger.info({ indexPath }, "Index is up to date");
      return {
        status: "up-to-date",
        document: previous,
        changedFiles,
        removedFiles,
        issues: listing.issues,
      };
    }

    logger.info(
      { changed: changedFiles.length, removed: removedFiles.length },
      "Updating index",
    );
    const scan = await scanner.scan({ listing, reuse: reuseFrom(previous) });
    const document = await persist(scan, previous, startedAt);
    return { status: "updated", document, changedFiles, removedFiles, issues: scan.issues };
  }

  async function stats(): Promise<IndexSummary | null> {
    const document = await load();
    if (document === null) return null;
    return {
      indexPath,
      corpusRoot: document.corpusRoot,
      lastUpdatedAtUTC: document.lastUpdatedAtUTC,
      statistics: document.statistics,
      topCategories: topCategories(document),
    };
  }

  return { indexPath, build, load, refresh, stats };
}
