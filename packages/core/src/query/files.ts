import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { Dirent } from "node:fs";
import type { Logger } from "pino";

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err
    ? (err as NodeJS.ErrnoException).code
    : undefined;
}

/**
 * Every regular file below `dir`, sorted by path. Dot-directories are not
 * entered and a missing `dir` yields no files.
 */
export async function walkFiles(dir: string, logger?: Logger): Promise<string[]> {
  const files: string[] = [];

  const visit = async (current: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(current, { withFileTypes: true });
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOENT" || code === "ENOTDIR") return;
      logger?.warn({ dir: current, code }, "Could not read directory");
      return;
    }
    for (const entry of entries) {
      const path = join(current, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith(".")) await visit(path);
      } else if (entry.isFile()) {
        files.push(path);
      }
    }
  };

  await visit(dir);
  return files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/** File lines, or null when the file cannot be read. */
export async function readLines(path: string, logger?: Logger): Promise<string[] | null> {
  try {
    const text = await readFile(path, "utf-8");
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] === "") lines.pop();
    return lines;
  } catch (err) {
    logger?.warn({ path, code: errorCode(err) }, "Could not read file");
    return null;
  }
}
