import { resolve } from "node:path";
import {
  ENV_CONFIG_PATH,
  ENV_CORPUS_ROOT,
  ENV_INDEX_PATH,
  expandHomePath,
  loadConfig,
  resolveCorpusRoot,
  resolveHistoryPath,
  resolvePaths,
  type ResolvedPaths,
} from "@scriptdex/core/config";
import type { AppConfig } from "@scriptdex/core/schemas";
import { createLogger, type Logger } from "@scriptdex/core/logger";
import { ConfigError } from "@scriptdex/core/errors";
import { createCorpusScanner } from "@scriptdex/core/scanner";
import { createIndexStore, type IndexStore } from "@scriptdex/core/storage/index";
import { createQueryEngine, type QueryEngine } from "@scriptdex/core/query";
import {
  createSessionStore,
  SearchNavigator,
  type SessionStore,
} from "@scriptdex/core/navigation";
import { createExplorer, type Explorer, type FuzzyPicker } from "@scriptdex/core/explorer";
import { createFzfPicker, openInEditor, openInPager } from "@scriptdex/runtime";

/** Opens a selected file; resolves to the child's exit code. */
export interface Launcher {
  view(path: string): Promise<number | null>;
  edit(path: string): Promise<number | null>;
}

export interface CliContext {
  config: AppConfig;
  paths: ResolvedPaths;
  logger: Logger;
  store: IndexStore;
  engine: QueryEngine;
  sessions: SessionStore;
  /** Restored from the active session, so navigation spans invocations. */
  navigator: SearchNavigator;
  explorer: Explorer;
  launcher: Launcher;
}

export interface CreateContextOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  picker?: FuzzyPicker;
  launcher?: Launcher;
  now?: () => Date;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function readConfig(configPath: string | undefined, corpusRoot: string): Promise<AppConfig> {
  try {
    return await loadConfig({ configPath, corpusRoot });
  } catch (err) {
    throw new ConfigError({ configPath, reason: describeError(err) });
  }
}

export async function createCliContext(options: CreateContextOptions = {}): Promise<CliContext> {
  const env = options.env ?? process.env;
  const corpusRoot = resolveCorpusRoot(env[ENV_CORPUS_ROOT] || undefined);
  const configOverride = env[ENV_CONFIG_PATH];
  const configPath = configOverride ? resolve(expandHomePath(configOverride)) : undefined;

  const config = await readConfig(configPath, corpusRoot);
  const paths = resolvePaths(corpusRoot, config, env[ENV_INDEX_PATH] || undefined);
  const logger = options.logger ?? createLogger(config.logging);

  const scanner = createCorpusScanner({
    corpusRoot,
    collections: config.collections,
    concurrency: config.scan.concurrency,
    logger,
  });
  const store = createIndexStore({
    indexPath: paths.indexPath,
    corpusRoot,
    scanner,
    logger,
    now: options.now,
  });
  const engine = createQueryEngine({
    store,
    corpusRoot,
    collections: config.collections,
    search: config.search,
    historyFile: resolveHistoryPath(config, env.HISTFILE || undefined),
    logger,
  });
  const sessions = createSessionStore({
    sessionsDir: paths.sessionsDir,
    activeSessionPath: paths.activeSessionPath,
    logger,
    now: options.now,
  });

  const navigator = new SearchNavigator();
  navigator.onStateChange((event) => logger.debug(event, "Navigation state changed"));
  const active = await sessions.readActive();
  if (active !== null) {
    navigator.restore(active);
  }

  const explorer = createExplorer({
    store,
    engine,
    picker: options.picker ?? createFzfPicker({ command: config.explorer.fuzzyCommand }),
    corpusRoot,
    collections: config.collections,
    logger,
  });

  const launcher: Launcher = options.launcher ?? {
    view: (path) => openInPager(path, { command: config.explorer.pager, env }),
    edit: (path) => openInEditor(path, { command: config.explorer.editor, env }),
  };

  logger.debug({ corpusRoot, indexPath: paths.indexPath }, "Context ready");

  return { config, paths, logger, store, engine, sessions, navigator, explorer, launcher };
}
