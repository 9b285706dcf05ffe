export { createQueryEngine, type QueryEngine, type QueryEngineOptions, type LocateOptions } from "./engine.js";
export { sortEntries, parseSortCriterion, parseSortOrder } from "./sort.js";
export { searchDocument, lookupEntry, entriesOf, collectionsFor } from "./search.js";
export { compilePattern, grepLines } from "./grep.js";
export { walkFiles, readLines } from "./files.js";
export { countUsage, type UsageCount } from "./usage.js";
export {
  hitName,
  SEARCH_SCOPES,
  FIND_SCOPES,
  SORT_CRITERIA,
  type SearchScope,
  type FindScope,
  type SortCriterion,
  type SortOrder,
  type SearchHit,
  type EntryHit,
  type FileHit,
  type LineHit,
  type SearchResult,
  type LocateResult,
  type DescribeResult,
  type GrepMatch,
  type GrepOptions,
  type GrepResult,
  type ContextLine,
} from "./types.js";
