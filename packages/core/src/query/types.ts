import type { CollectionName, Entry } from "../schemas/index-document.js";

export type SearchScope = "all" | "callables" | "aliases" | "scripts" | "content";
export type FindScope = "all" | "callables" | "aliases" | "scripts";
export type SortCriterion = "name" | "size" | "date" | "lines" | "category";
export type SortOrder = "asc" | "desc";

export const SEARCH_SCOPES: readonly SearchScope[] = [
  "all",
  "callables",
  "aliases",
  "scripts",
  "content",
];
export const FIND_SCOPES: readonly FindScope[] = ["all", "callables", "aliases", "scripts"];
export const SORT_CRITERIA: readonly SortCriterion[] = ["name", "size", "date", "lines", "category"];

/** An indexed entry matched by name or metadata. */
export interface EntryHit {
  kind: "entry";
  collection: CollectionName;
  entry: Entry;
}

/** A file matched by name on disk, without index metadata. */
export interface FileHit {
  kind: "file";
  /** Null when the file was found outside the configured collections. */
  collection: CollectionName | null;
  name: string;
  path: string;
  relativePath: string;
  category: string;
}

/** One matching line from a content scan. */
export interface LineHit {
  kind: "line";
  path: string;
  relativePath: string;
  lineNumber: number;
  line: string;
}

export type SearchHit = EntryHit | FileHit | LineHit;

export interface SearchResult {
  /** "direct" when the index was not consulted. */
  mode: "indexed" | "direct";
  hits: SearchHit[];
}

export type LocateResult =
  | {
      status: "indexed";
      collection: CollectionName;
      entry: Entry;
      /** First code lines of the file, comments skipped. */
      preview: string[];
    }
  | {
      status: "file";
      path: string;
      /** Comment lines from the top of the file. */
      header: string[];
    }
  | {
      status: "missing";
      /** Corpus-relative paths whose file name contains the requested name. */
      suggestions: string[];
    };

export interface DescribeResult {
  located: LocateResult;
  /** Full file text when requested and the name resolved to a file. */
  source: string | null;
}

export interface ContextLine {
  lineNumber: number;
  line: string;
}

export interface GrepMatch {
  path: string;
  relativePath: string;
  lineNumber: number;
  line: string;
  before: ContextLine[];
  after: ContextLine[];
}

export interface GrepOptions {
  contextLines?: number;
  ignoreCase?: boolean;
}

export interface GrepResult {
  /** True when the pattern was not a valid regular expression and matched literally. */
  literal: boolean;
  callables: GrepMatch[];
  aliases: GrepMatch[];
  /** Scopes whose matches were cut at the configured limit. */
  truncated: { callables: boolean; aliases: boolean };
}

/** The name navigation uses for a hit. */
export function hitName(hit: SearchHit): string {
  switch (hit.kind) {
    case "entry":
      return hit.entry.name;
    case "file":
      return hit.name;
    case "line":
      return `${hit.relativePath}:${hit.lineNumber}`;
  }
}
