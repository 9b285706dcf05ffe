export {
  createIndexStore,
  diffListing,
  topCategories,
  type IndexStore,
  type IndexStoreOptions,
  type BuildResult,
  type RefreshResult,
  type RefreshStatus,
  type IndexSummary,
  type ListingDiff,
} from "./store.js";
export { formatUtcSeconds, nextUpdatedAt } from "./timestamp.js";
