import { compareNames, type Entry } from "../schemas/index-document.js";
import { SORT_CRITERIA, type SortCriterion, type SortOrder } from "./types.js";

/** Unknown criteria sort by name. */
export function parseSortCriterion(input: string | undefined): SortCriterion {
  const normalized = (input ?? "").toLowerCase();
  return SORT_CRITERIA.find((criterion) => criterion === normalized) ?? "name";
}

export function parseSortOrder(input: string | undefined): SortOrder {
  return (input ?? "").toLowerCase() === "desc" ? "desc" : "asc";
}

function byIdentity(a: Entry, b: Entry): number {
  return (
    compareNames(a.name, b.name) ||
    compareNames(a.kind, b.kind) ||
    compareNames(a.sourcePath, b.sourcePath)
  );
}

function byCriterion(criterion: Exclude<SortCriterion, "name">, a: Entry, b: Entry): number {
  switch (criterion) {
    case "size":
      return a.sizeBytes - b.sizeBytes;
    case "date":
      return a.modifiedAtEpoch - b.modifiedAtEpoch;
    case "lines":
      return a.lineCount - b.lineCount;
    case "category":
      return compareNames(a.category, b.category);
  }
}

/**
 * Sort entries without mutating the input. Equal criterion values keep name
 * order in both directions; a descending name sort is the exact reverse of
 * the ascending one.
 */
export function sortEntries(
  entries: readonly Entry[],
  criterion: SortCriterion,
  order: SortOrder,
): Entry[] {
  if (criterion === "name") {
    const ascending = [...entries].sort(byIdentity);
    return order === "asc" ? ascending : ascending.reverse();
  }
  const direction = order === "asc" ? 1 : -1;
  return [...entries].sort(
    (a, b) => direction * byCriterion(criterion, a, b) || byIdentity(a, b),
  );
}
