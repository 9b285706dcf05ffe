import { readFile, stat } from "node:fs/promises";
import { createHash } from "node:crypto";
import { basename, dirname, extname, relative } from "node:path";
import type { Stats } from "node:fs";
import type { Logger } from "pino";
import type { FileMetadata } from "../schemas/index-document.js";
import { emptyHeader, parseAboutLine, parseHeader } from "./header.js";
import { countAliasDefinitions, countLines, scanDeclaredUnits } from "./declarations.js";

/** A file that could not be fully read during a scan. */
export interface ScanIssue {
  path: string;
  reason: string;
}

export interface ExtractOptions {
  corpusRoot: string;
  /** Entry name; defaults to the file name without its extension. */
  name?: string;
  logger?: Logger;
}

export interface ExtractedFile {
  metadata: FileMetadata;
  aliasCount: number;
  executable: boolean;
  /** Set when the file exists but its contents could not be read. */
  issue: ScanIssue | null;
}

export function defaultEntryName(filePath: string): string {
  const file = basename(filePath);
  return file.slice(0, file.length - extname(file).length) || file;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function baseMetadata(filePath: string, options: ExtractOptions): FileMetadata {
  return {
    name: options.name ?? defaultEntryName(filePath),
    category: basename(dirname(filePath)),
    sourcePath: filePath,
    relativePath: relative(options.corpusRoot, filePath),
    ...emptyHeader(),
    declaredUnits: [],
    sizeBytes: 0,
    lineCount: 0,
    modifiedAtEpoch: 0,
    contentHash: "",
  };
}

/**
 * Extract index metadata from one script file.
 *
 * Returns null when the file no longer exists (or is not a regular file), so
 * callers never index a path that is gone. A file that exists but cannot be
 * read yields empty text fields and a `ScanIssue`.
 */
export async function extractMetadata(
  filePath: string,
  options: ExtractOptions,
): Promise<ExtractedFile | null> {
  const metadata = baseMetadata(filePath, options);

  let stats: Stats;
  try {
    stats = await stat(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    return unreadable(metadata, describeError(err), options);
  }
  if (!stats.isFile()) return null;

  metadata.modifiedAtEpoch = Math.floor(stats.mtimeMs / 1000);
  const executable = (stats.mode & 0o111) !== 0;

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    return { ...unreadable(metadata, describeError(err), options), executable };
  }

  const source = buffer.toString("utf-8");
  const header = parseHeader(source);
  if (header.description === "") {
    header.description = parseAboutLine(source);
  }

  return {
    metadata: {
      ...metadata,
      ...header,
      declaredUnits: scanDeclaredUnits(source),
      sizeBytes: stats.size,
      lineCount: countLines(source),
      contentHash: createHash("sha256").update(buffer).digest("hex"),
    },
    aliasCount: countAliasDefinitions(source),
    executable,
    issue: null,
  };
}

function unreadable(
  metadata: FileMetadata,
  reason: string,
  options: ExtractOptions,
): ExtractedFile {
  options.logger?.warn({ path: metadata.sourcePath, reason }, "Could not read file, indexing without metadata");
  return {
    metadata,
    aliasCount: 0,
    executable: false,
    issue: { path: metadata.sourcePath, reason },
  };
}
