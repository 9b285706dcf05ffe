import { z } from "zod";

export const INDEX_SCHEMA_VERSION = "1.0";

const EntryBaseSchema = z.object({
  name: z.string().min(1),
  category: z.string(),
  sourcePath: z.string().min(1),
  relativePath: z.string(),
  description: z.string(),
  usage: z.string(),
  requirements: z.string(),
  version: z.string(),
  author: z.string(),
  declaredUnits: z.array(z.string()),
  sizeBytes: z.number().int().min(0),
  lineCount: z.number().int().min(0),
  modifiedAtEpoch: z.number().int().min(0),
  contentHash: z.string(),
});

export const CallableEntrySchema = EntryBaseSchema.extend({
  kind: z.literal("callable"),
});

export const AliasEntrySchema = EntryBaseSchema.extend({
  kind: z.literal("alias"),
  aliasCount: z.number().int().min(0),
});

export const ScriptEntrySchema = EntryBaseSchema.extend({
  kind: z.literal("script"),
  executable: z.boolean(),
});

export const EntrySchema = z.discriminatedUnion("kind", [
  CallableEntrySchema,
  AliasEntrySchema,
  ScriptEntrySchema,
]);

export const CategoryEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  callableCount: z.number().int().min(0),
});

export const IndexStatisticsSchema = z.object({
  totalCallables: z.number().int().min(0),
  totalAliases: z.number().int().min(0),
  totalScripts: z.number().int().min(0),
  totalCategories: z.number().int().min(0),
  lastBuildDurationSeconds: z.number().min(0),
});

export const IndexDocumentSchema = z.object({
  schemaVersion: z.literal(INDEX_SCHEMA_VERSION),
  lastUpdatedAtUTC: z.string().datetime(),
  corpusRoot: z.string(),
  statistics: IndexStatisticsSchema,
  callables: z.record(z.string(), CallableEntrySchema),
  aliases: z.record(z.string(), AliasEntrySchema),
  scripts: z.record(z.string(), ScriptEntrySchema),
  categories: z.record(z.string(), CategoryEntrySchema),
});

export type CallableEntry = z.infer<typeof CallableEntrySchema>;
export type AliasEntry = z.infer<typeof AliasEntrySchema>;
export type ScriptEntry = z.infer<typeof ScriptEntrySchema>;
export type Entry = z.infer<typeof EntrySchema>;
export type EntryKind = Entry["kind"];
export type CategoryEntry = z.infer<typeof CategoryEntrySchema>;
export type IndexStatistics = z.infer<typeof IndexStatisticsSchema>;
export type IndexDocument = z.infer<typeof IndexDocumentSchema>;

/** Fields shared by every entry kind, as produced by the extractor. */
export type FileMetadata = Omit<CallableEntry, "kind">;

/** Collection names as they appear in the index document. */
export type CollectionName = "callables" | "aliases" | "scripts";

export const COLLECTION_NAMES: readonly CollectionName[] = [
  "callables",
  "aliases",
  "scripts",
];

/** Build statistics whose totals always match the map sizes. */
export function computeStatistics(
  document: Pick<IndexDocument, "callables" | "aliases" | "scripts" | "categories">,
  lastBuildDurationSeconds: number,
): IndexStatistics {
  return {
    totalCallables: Object.keys(document.callables).length,
    totalAliases: Object.keys(document.aliases).length,
    totalScripts: Object.keys(document.scripts).length,
    totalCategories: Object.keys(document.categories).length,
    lastBuildDurationSeconds,
  };
}

/** Code-point ordering for entry names, independent of the host locale. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
