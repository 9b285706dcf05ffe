import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_CORPUS_ROOT = join(homedir(), ".bash.d");

/** Directory under the corpus root holding the index, config and sessions. */
export const STATE_DIR_NAME = ".index";
export const CONFIG_FILENAME = "config.json";
export const INDEX_FILENAME = "master_index.json";
export const SESSIONS_DIR_NAME = "sessions";
export const ACTIVE_SESSION_FILENAME = "active-session.json";

export const ENV_CORPUS_ROOT = "SCRIPTDEX_HOME";
export const ENV_CONFIG_PATH = "SCRIPTDEX_CONFIG";
export const ENV_INDEX_PATH = "SCRIPTDEX_INDEX_FILE";
