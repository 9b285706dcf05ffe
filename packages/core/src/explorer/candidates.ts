import type { IndexDocument } from "../schemas/index-document.js";
import { entriesOf } from "../query/search.js";
import type { CandidateFile } from "../scanner/index.js";
import { basename, dirname } from "node:path";

export type CandidateTag = "FUNC" | "ALIAS" | "SCRIPT";

const CANDIDATE_LINE = /^\[(FUNC|ALIAS|SCRIPT)\]\s+(\S+)/;

/** One picker line per entry: kind tag, name and short description. */
export function buildCandidates(document: IndexDocument): string[] {
  return [
    ...entriesOf(document, "callables").map(
      (e) => `[FUNC] ${e.name} - ${e.description} (${e.category})`,
    ),
    ...entriesOf(document, "aliases").map((e) => `[ALIAS] ${e.name} - ${e.description}`),
    ...entriesOf(document, "scripts").map((e) => `[SCRIPT] ${e.name}`),
  ];
}

/** Candidates for callables found on disk when there is no index. */
export function filesystemCandidates(files: readonly CandidateFile[]): string[] {
  return files.map((file) => `[FUNC] ${file.name} (${basename(dirname(file.path))})`);
}

export function parseCandidate(line: string): { tag: CandidateTag; name: string } | null {
  const match = CANDIDATE_LINE.exec(line);
  if (!match) return null;
  const [, tag, name] = match;
  if ((tag !== "FUNC" && tag !== "ALIAS" && tag !== "SCRIPT") || name === undefined) return null;
  return { tag, name };
}
