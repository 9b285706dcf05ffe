import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { AppConfig } from "../schemas/app-config.js";
import {
  ACTIVE_SESSION_FILENAME,
  CONFIG_FILENAME,
  DEFAULT_CORPUS_ROOT,
  INDEX_FILENAME,
  SESSIONS_DIR_NAME,
  STATE_DIR_NAME,
} from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured corpus root (or default) to an absolute path.
 */
export function resolveCorpusRoot(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_CORPUS_ROOT));
}

export function stateDirFor(corpusRoot: string): string {
  return join(corpusRoot, STATE_DIR_NAME);
}

export function defaultConfigPath(corpusRoot: string): string {
  return join(stateDirFor(corpusRoot), CONFIG_FILENAME);
}

export interface ResolvedPaths {
  corpusRoot: string;
  stateDir: string;
  indexPath: string;
  sessionsDir: string;
  activeSessionPath: string;
}

/**
 * Derives every on-disk location from the corpus root. An explicit index path
 * wins over `config.index.path`, which wins over the derived default.
 */
export function resolvePaths(
  corpusRoot: string,
  config: AppConfig,
  indexPathOverride?: string,
): ResolvedPaths {
  const stateDir = stateDirFor(corpusRoot);
  const configuredIndex = indexPathOverride ?? config.index.path;
  return {
    corpusRoot,
    stateDir,
    indexPath:
      configuredIndex !== null
        ? resolve(expandHomePath(configuredIndex))
        : join(stateDir, INDEX_FILENAME),
    sessionsDir:
      config.index.sessionsDir !== null
        ? resolve(expandHomePath(config.index.sessionsDir))
        : join(stateDir, SESSIONS_DIR_NAME),
    activeSessionPath: join(stateDir, ACTIVE_SESSION_FILENAME),
  };
}

/** Shell history used for usage counts: config, then `$HISTFILE`, then ~/.bash_history. */
export function resolveHistoryPath(config: AppConfig, histfile?: string): string {
  return resolve(expandHomePath(config.usage.historyFile ?? histfile ?? "~/.bash_history"));
}
