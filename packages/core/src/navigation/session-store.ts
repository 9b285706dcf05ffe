import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import {
  SearchSessionSchema,
  SessionNameSchema,
  type SearchSession,
} from "../schemas/session.js";
import {
  InvalidSessionNameError,
  PersistenceFailureError,
  SessionNotFoundError,
} from "../errors/catalog.js";
import { formatUtcSeconds } from "../storage/index/timestamp.js";
import { clampCursor, type NavigationSnapshot } from "./navigator.js";

/** Name recorded in the active-session file. */
export const ACTIVE_SESSION_NAME = "active";

export interface SessionStoreOptions {
  sessionsDir: string;
  /** Where the active results live between CLI invocations. */
  activeSessionPath: string;
  logger: Logger;
  /** Clock override for tests. */
  now?: () => Date;
}

export interface SessionSummary {
  name: string;
  savedAtUTC: string;
  resultCount: number;
}

export interface SessionStore {
  /** Save under `name`, replacing any earlier session with that name. */
  save(name: string, snapshot: NavigationSnapshot): Promise<SearchSession>;
  recall(name: string): Promise<SearchSession>;
  list(): Promise<SessionSummary[]>;
  readActive(): Promise<SearchSession | null>;
  writeActive(snapshot: NavigationSnapshot): Promise<void>;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createSessionStore(options: SessionStoreOptions): SessionStore {
  const { sessionsDir, activeSessionPath, logger } = options;
  const now = options.now ?? (() => new Date());

  function validName(name: string): string {
    const parsed = SessionNameSchema.safeParse(name);
    if (!parsed.success) throw new InvalidSessionNameError({ name });
    return parsed.data;
  }

  function toSession(name: string, snapshot: NavigationSnapshot): SearchSession {
    return {
      name,
      savedAtUTC: formatUtcSeconds(now()),
      results: [...snapshot.results],
      cursor: clampCursor(snapshot.cursor, snapshot.results.length),
    };
  }

  /** Atomic write: mkdir -p, write temp file, rename */
  async function writeSession(path: string, session: SearchSession): Promise<void> {
    const tempPath = path + ".tmp." + randomUUID();
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, JSON.stringify(session, null, 2) + "\n", "utf-8");
      await rename(tempPath, path);
    } catch (err) {
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn({ tempPath, reason: describeError(cleanupErr) }, "Could not remove temporary session file");
      });
      throw new PersistenceFailureError({ path, reason: describeError(err) });
    }
  }

  /** null when the file is absent; throws a SyntaxError or ZodError when corrupt. */
  async function readSession(path: string): Promise<SearchSession | null> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw err;
    }
    return SearchSessionSchema.parse(JSON.parse(raw));
  }

  return {
    async save(name, snapshot) {
      const session = toSession(validName(name), snapshot);
      await writeSession(join(sessionsDir, `${session.name}.json`), session);
      logger.debug({ name: session.name, results: session.results.length }, "Session saved");
      return session;
    },

    async recall(name) {
      const valid = validName(name);
      const path = join(sessionsDir, `${valid}.json`);
      let session: SearchSession | null;
      try {
        session = await readSession(path);
      } catch (err) {
        logger.warn({ path, reason: describeError(err) }, "Session file is unreadable");
        throw new SessionNotFoundError({ name: valid, reason: "unreadable" });
      }
      if (session === null) throw new SessionNotFoundError({ name: valid });
      return session;
    },

    async list() {
      let files: string[];
      try {
        files = await readdir(sessionsDir);
      } catch (err) {
        if (errorCode(err) === "ENOENT") return [];
        throw err;
      }

      const summaries: SessionSummary[] = [];
      for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
        const path = join(sessionsDir, file);
        try {
          const session = await readSession(path);
          if (session === null) continue;
          summaries.push({
            name: session.name,
            savedAtUTC: session.savedAtUTC,
            resultCount: session.results.length,
          });
        } catch (err) {
          logger.warn({ path, reason: describeError(err) }, "Skipping unreadable session file");
        }
      }
      return summaries;
    },

    async readActive() {
      try {
        return await readSession(activeSessionPath);
      } catch (err) {
        logger.warn({ path: activeSessionPath, reason: describeError(err) }, "Ignoring unreadable active session");
        return null;
      }
    },

    async writeActive(snapshot) {
      await writeSession(activeSessionPath, toSession(ACTIVE_SESSION_NAME, snapshot));
    },
  };
}
