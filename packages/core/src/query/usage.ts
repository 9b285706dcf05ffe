import { compareNames } from "../schemas/index-document.js";

export interface UsageCount {
  name: string;
  count: number;
}

/**
 * Counts history lines whose first word is one of `names`. Names never seen
 * are left out; the rest sort by count, most used first, then by name.
 */
export function countUsage(lines: readonly string[], names: readonly string[]): UsageCount[] {
  const counts = new Map<string, number>(names.map((name) => [name, 0]));
  for (const line of lines) {
    const first = line.trimStart().split(/\s+/, 1)[0] ?? "";
    const seen = counts.get(first);
    if (seen !== undefined) counts.set(first, seen + 1);
  }
  return [...counts]
    .filter(([, count]) => count > 0)
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || compareNames(a.name, b.name));
}
