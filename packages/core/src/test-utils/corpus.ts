/**
 * Fixtures for tests that need a script corpus on disk.
 */

import { chmod, mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import pino, { type Logger } from "pino";

export async function withTempDir(
  fn: (dir: string) => Promise<void>,
  prefix = "scriptdex-test-",
): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export interface FixtureFile {
  /** Path relative to the corpus root. */
  path: string;
  content: string;
  executable?: boolean;
  /** Modification time in whole seconds since the epoch. */
  mtimeEpoch?: number;
}

/** Write fixture files under `root`, returning their absolute paths. */
export async function writeCorpus(
  root: string,
  files: FixtureFile[],
): Promise<string[]> {
  const written: string[] = [];
  for (const file of files) {
    const target = join(root, file.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, file.content, "utf-8");
    await chmod(target, file.executable ? 0o755 : 0o644);
    if (file.mtimeEpoch !== undefined) {
      await utimes(target, file.mtimeEpoch, file.mtimeEpoch);
    }
    written.push(target);
  }
  return written;
}

/** Header block in the style of the corpus' own scripts. */
export function scriptHeader(fields: {
  description?: string;
  usage?: string;
  requirements?: string;
  version?: string;
  author?: string;
}): string {
  const lines = ["#!/usr/bin/env bash", "#"];
  if (fields.description) lines.push(`#   DESCRIPTION:  ${fields.description}`);
  if (fields.usage) lines.push(`#         USAGE:  ${fields.usage}`);
  if (fields.requirements) lines.push(`#  REQUIREMENTS:  ${fields.requirements}`);
  if (fields.version) lines.push(`#       VERSION:  ${fields.version}`);
  if (fields.author) lines.push(`#        AUTHOR:  ${fields.author}`);
  lines.push("#");
  return lines.join("\n") + "\n";
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
