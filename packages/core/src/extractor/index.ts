export {
  parseHeader,
  parseAboutLine,
  headerLines,
  stripCommentLeader,
  collapseWhitespace,
  truncate,
  emptyHeader,
  MAX_TEXT_LENGTH,
  type HeaderFields,
  type HeaderField,
} from "./header.js";
export {
  scanDeclaredUnits,
  countAliasDefinitions,
  countLines,
} from "./declarations.js";
export {
  extractMetadata,
  defaultEntryName,
  type ExtractOptions,
  type ExtractedFile,
  type ScanIssue,
} from "./extract.js";
