/**
 * Best-effort syntactic scan for top-level function definitions.
 *
 * Matches `name() {`, `name()` with the brace on the next line, and the
 * `function name() {` form, at column 0 only. Indented (nested or
 * conditionally defined) functions are not reported; this is a heuristic,
 * not a shell parser.
 */
const DECLARATION = /^(?:function\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*\(\)\s*(?:\{.*)?$/;

const ALIAS_DEFINITION = /^\s*alias\s+[^=\s]+=/;

export function scanDeclaredUnits(source: string): string[] {
  const seen = new Set<string>();
  for (const line of source.split(/\r?\n/)) {
    const match = DECLARATION.exec(line);
    if (match?.[1]) seen.add(match[1]);
  }
  return [...seen];
}

export function countAliasDefinitions(source: string): number {
  let count = 0;
  for (const line of source.split(/\r?\n/)) {
    if (ALIAS_DEFINITION.test(line)) count++;
  }
  return count;
}

export function countLines(source: string): number {
  if (source === "") return 0;
  const newlines = source.split("\n").length - 1;
  // `wc -l` semantics plus a final unterminated line.
  return source.endsWith("\n") ? newlines : newlines + 1;
}
