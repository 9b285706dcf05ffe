export {
  createCorpusScanner,
  deriveCategories,
  entryFromExtraction,
  type CorpusScanner,
  type CorpusScan,
  type CorpusListing,
  type ScannerOptions,
  type ScanOptions,
  type ReuseLookup,
} from "./scanner.js";
export {
  listCollectionFiles,
  groupByName,
  entryNameFor,
  type CandidateFile,
  type CollectionListing,
} from "./walk.js";
