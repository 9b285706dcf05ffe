export {
  DEFAULT_CORPUS_ROOT,
  STATE_DIR_NAME,
  CONFIG_FILENAME,
  INDEX_FILENAME,
  SESSIONS_DIR_NAME,
  ACTIVE_SESSION_FILENAME,
  ENV_CORPUS_ROOT,
  ENV_CONFIG_PATH,
  ENV_INDEX_PATH,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveCorpusRoot,
  stateDirFor,
  defaultConfigPath,
  resolvePaths,
  resolveHistoryPath,
  type ResolvedPaths,
} from "./paths.js";
