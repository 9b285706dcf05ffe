import type { ContextLine, GrepMatch } from "./types.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile a user pattern. An invalid regular expression is matched as
 * literal text instead.
 */
export function compilePattern(
  pattern: string,
  ignoreCase: boolean,
): { regex: RegExp; literal: boolean } {
  const flags = ignoreCase ? "i" : "";
  try {
    return { regex: new RegExp(pattern, flags), literal: false };
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    return { regex: new RegExp(escapeRegExp(pattern), flags), literal: true };
  }
}

function contextRange(lines: string[], from: number, to: number): ContextLine[] {
  const context: ContextLine[] = [];
  for (let i = Math.max(0, from); i <= Math.min(lines.length - 1, to); i++) {
    context.push({ lineNumber: i + 1, line: lines[i] ?? "" });
  }
  return context;
}

/** Matching lines of one file with surrounding context. */
export function grepLines(
  lines: string[],
  regex: RegExp,
  contextLines: number,
  file: { path: string; relativePath: string },
): GrepMatch[] {
  const matches: GrepMatch[] = [];
  lines.forEach((line, index) => {
    if (!regex.test(line)) return;
    matches.push({
      path: file.path,
      relativePath: file.relativePath,
      lineNumber: index + 1,
      line,
      before: contextRange(lines, index - contextLines, index - 1),
      after: contextRange(lines, index + 1, index + contextLines),
    });
  });
  return matches;
}
