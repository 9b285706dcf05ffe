import {
  COLLECTION_NAMES,
  compareNames,
  type CollectionName,
  type Entry,
  type IndexDocument,
} from "../schemas/index-document.js";
import type { EntryHit, FindScope } from "./types.js";

export function collectionsFor(scope: FindScope): readonly CollectionName[] {
  return scope === "all" ? COLLECTION_NAMES : [scope];
}

function entryMatches(entry: Entry, needle: string): boolean {
  return [entry.name, entry.description, entry.category, entry.usage].some((field) =>
    field.toLowerCase().includes(needle),
  );
}

/** Entries of a collection in name order. */
export function entriesOf(document: IndexDocument, collection: CollectionName): Entry[] {
  const byName: Record<string, Entry> = document[collection];
  return Object.values(byName).sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Case-insensitive substring match over name, description, category and
 * usage, grouped by collection and ordered by name inside each group.
 */
export function searchDocument(
  document: IndexDocument,
  term: string,
  scope: FindScope,
): EntryHit[] {
  const needle = term.toLowerCase();
  const hits: EntryHit[] = [];
  for (const collection of collectionsFor(scope)) {
    for (const entry of entriesOf(document, collection)) {
      if (entryMatches(entry, needle)) hits.push({ kind: "entry", collection, entry });
    }
  }
  return hits;
}

/** Exact-name lookup, preferring callables, then aliases, then scripts. */
export function lookupEntry(
  document: IndexDocument,
  name: string,
  collections: readonly CollectionName[] = COLLECTION_NAMES,
): { collection: CollectionName; entry: Entry } | null {
  for (const collection of collections) {
    const entries: Record<string, Entry> = document[collection];
    const entry = entries[name];
    if (entry && Object.hasOwn(entries, name)) return { collection, entry };
  }
  return null;
}
