export {
  DEFAULTS,
  AppConfigSchema,
  CollectionConfigSchema,
  type AppConfig,
  type CollectionConfig,
  type LoggingConfig,
  type SearchConfig,
  type ExplorerConfig,
  type UsageConfig,
} from "./app-config.js";
export {
  INDEX_SCHEMA_VERSION,
  COLLECTION_NAMES,
  CallableEntrySchema,
  AliasEntrySchema,
  ScriptEntrySchema,
  EntrySchema,
  CategoryEntrySchema,
  IndexStatisticsSchema,
  IndexDocumentSchema,
  computeStatistics,
  compareNames,
  type CallableEntry,
  type AliasEntry,
  type ScriptEntry,
  type Entry,
  type EntryKind,
  type CategoryEntry,
  type IndexStatistics,
  type IndexDocument,
  type FileMetadata,
  type CollectionName,
} from "./index-document.js";
export {
  SessionNameSchema,
  SearchSessionSchema,
  type SearchSession,
} from "./session.js";
