import { readdir, stat } from "node:fs/promises";
import type { Stats } from "node:fs";
import { basename, extname, join } from "node:path";
import type { Logger } from "pino";
import type { CollectionConfig } from "../schemas/app-config.js";
import type { CollectionName } from "../schemas/index-document.js";
import type { ScanIssue } from "../extractor/index.js";
import { defaultEntryName } from "../extractor/index.js";

/** A file that belongs to a collection, with the facts refresh compares. */
export interface CandidateFile {
  collection: CollectionName;
  name: string;
  path: string;
  sizeBytes: number;
  modifiedAtEpoch: number;
}

export interface CollectionListing {
  files: CandidateFile[];
  issues: ScanIssue[];
}

const ALIAS_SUFFIXES = [".aliases.bash", ".aliases.sh"];

/** Entry name for a file in the given collection. */
export function entryNameFor(collection: CollectionName, filePath: string): string {
  if (collection === "aliases") {
    const file = basename(filePath);
    for (const suffix of ALIAS_SUFFIXES) {
      if (file.endsWith(suffix) && file.length > suffix.length) {
        return file.slice(0, -suffix.length);
      }
    }
  }
  return defaultEntryName(filePath);
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * List the files of one collection, sorted by path. Missing directories are
 * skipped; unreadable directories and files are reported as issues.
 */
export async function listCollectionFiles(
  corpusRoot: string,
  collection: CollectionName,
  config: CollectionConfig,
  logger?: Logger,
): Promise<CollectionListing> {
  const files: CandidateFile[] = [];
  const issues: ScanIssue[] = [];

  const walk = async (dir: string, top: boolean): Promise<void> => {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      const code = errorCode(err);
      if (top && (code === "ENOENT" || code === "ENOTDIR")) {
        logger?.debug({ dir, collection }, "Collection directory missing, skipping");
        return;
      }
      logger?.warn({ dir, reason: describeError(err) }, "Could not read directory");
      issues.push({ path: dir, reason: describeError(err) });
      return;
    }

    for (const name of names) {
      const path = join(dir, name);
      let info: Stats;
      try {
        info = await stat(path);
      } catch (err) {
        if (errorCode(err) === "ENOENT") continue;
        logger?.warn({ path, reason: describeError(err) }, "Could not stat file");
        issues.push({ path, reason: describeError(err) });
        continue;
      }

      if (info.isDirectory()) {
        if (config.recursive && !name.startsWith(".")) await walk(path, false);
        continue;
      }
      if (!info.isFile() || !config.extensions.includes(extname(name))) continue;
      if (config.requireExecutable && (info.mode & 0o111) === 0) continue;

      files.push({
        collection,
        name: entryNameFor(collection, path),
        path,
        sizeBytes: info.size,
        modifiedAtEpoch: Math.floor(info.mtimeMs / 1000),
      });
    }
  };

  for (const dir of config.dirs) {
    await walk(join(corpusRoot, dir), true);
  }

  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { files, issues };
}

/**
 * Group candidates by entry name, preserving path order inside each group.
 * The last candidate of a group is the one a full build keeps.
 */
export function groupByName(files: CandidateFile[]): Map<string, CandidateFile[]> {
  const groups = new Map<string, CandidateFile[]>();
  for (const file of files) {
    const group = groups.get(file.name);
    if (group) group.push(file);
    else groups.set(file.name, [file]);
  }
  return groups;
}
