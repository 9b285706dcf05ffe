import type {
  CollectionName,
  Entry,
} from "@scriptdex/core/schemas";
import type {
  GrepMatch,
  GrepResult,
  LocateResult,
  SearchHit,
  SearchResult,
  SortCriterion,
  UsageCount,
} from "@scriptdex/core/query";
import type { IndexSummary } from "@scriptdex/core/storage/index";
import type { SessionSummary } from "@scriptdex/core/navigation";

const SECTION_TITLES: Record<CollectionName, string> = {
  callables: "Callables",
  aliases: "Aliases",
  scripts: "Scripts",
};

export function matchCount(count: number): string {
  return `Found ${count} matches`;
}

function hitSection(hit: SearchHit): string {
  switch (hit.kind) {
    case "entry":
      return SECTION_TITLES[hit.collection];
    case "file":
      return hit.collection === null ? "Files" : SECTION_TITLES[hit.collection];
    case "line":
      return "Content";
  }
}

function hitLines(hit: SearchHit, verbose: boolean): string[] {
  switch (hit.kind) {
    case "entry": {
      const { entry } = hit;
      const lines = [`  ${entry.name} [${entry.category}]`];
      if (verbose) {
        if (entry.description) lines.push(`    Description: ${entry.description}`);
        if (entry.usage) lines.push(`    Usage: ${entry.usage}`);
        lines.push(`    File: ${entry.sourcePath}`);
      }
      return lines;
    }
    case "file":
      return verbose
        ? [`  ${hit.name} [${hit.category}]`, `    File: ${hit.path}`]
        : [`  ${hit.name} [${hit.category}]`];
    case "line":
      return [`  ${hit.relativePath}:${hit.lineNumber}: ${hit.line}`];
  }
}

/** Hits under one heading per collection, in result order. */
export function formatHits(hits: readonly SearchHit[], verbose = false): string[] {
  const lines: string[] = [];
  let section: string | null = null;
  for (const hit of hits) {
    const title = hitSection(hit);
    if (title !== section) {
      if (section !== null) lines.push("");
      lines.push(`${title}:`);
      section = title;
    }
    lines.push(...hitLines(hit, verbose));
  }
  return lines;
}

export function formatSearch(
  term: string,
  scope: string,
  result: SearchResult,
  verbose: boolean,
): string[] {
  const lines = [`Searching for: '${term}' (scope: ${scope})`];
  if (result.mode === "direct" && scope !== "content") {
    lines.push("No index found, searching files directly");
  }
  lines.push("");
  if (result.hits.length === 0) {
    lines.push("  (no matches)");
  } else {
    lines.push(...formatHits(result.hits, verbose));
  }
  lines.push("", matchCount(result.hits.length));
  return lines;
}

export function formatLocate(name: string, located: LocateResult): string[] {
  switch (located.status) {
    case "indexed": {
      const { entry } = located;
      const lines = [`Found: ${entry.name} (${entry.kind})`];
      if (entry.category) lines.push(`Category:    ${entry.category}`);
      if (entry.description) lines.push(`Description: ${entry.description}`);
      lines.push(`Location:    ${entry.sourcePath}`);
      if (located.preview.length > 0) lines.push("", "Preview:", ...located.preview);
      return lines;
    }
    case "file":
      return [`Found: ${located.path}`, ...(located.header.length > 0 ? ["", ...located.header] : [])];
    case "missing":
      return located.suggestions.length > 0
        ? [`Not found: ${name}`, "", "Similar names:", ...located.suggestions.map((s) => `  ${s}`)]
        : [`Not found: ${name}`];
  }
}

export function formatDescribe(located: LocateResult, name: string, source: string | null): string[] {
  if (located.status !== "indexed") {
    const lines = formatLocate(name, located);
    return source === null ? lines : [...lines, "", "Source:", ...source.replace(/\n$/, "").split("\n")];
  }

  const { entry } = located;
  const lines = [
    `Name:         ${entry.name}`,
    `Kind:         ${entry.kind}`,
    `Category:     ${entry.category}`,
    `Description:  ${entry.description}`,
    `Usage:        ${entry.usage}`,
    `Requirements: ${entry.requirements}`,
    `Version:      ${entry.version}`,
    `Author:       ${entry.author}`,
    `Declares:     ${entry.declaredUnits.join(", ")}`,
    `Lines:        ${entry.lineCount}`,
    `Size:         ${entry.sizeBytes} bytes`,
    `Modified:     ${new Date(entry.modifiedAtEpoch * 1000).toISOString()}`,
    `File:         ${entry.sourcePath}`,
  ];
  if (entry.kind === "alias") lines.push(`Aliases:      ${entry.aliasCount}`);
  if (entry.kind === "script") lines.push(`Executable:   ${entry.executable ? "yes" : "no"}`);
  if (source !== null) lines.push("", "Source:", ...source.replace(/\n$/, "").split("\n"));
  return lines;
}

export function formatUsage(usage: readonly UsageCount[]): string[] {
  return usage.map(({ name, count }) => `  Used ${count} times: ${name}`);
}

function criterionValue(entry: Entry, criterion: SortCriterion): string {
  switch (criterion) {
    case "name":
      return entry.kind;
    case "size":
      return `${entry.sizeBytes} bytes`;
    case "date":
      return new Date(entry.modifiedAtEpoch * 1000).toISOString();
    case "lines":
      return `${entry.lineCount} lines`;
    case "category":
      return entry.category;
  }
}

export function formatSorted(entries: readonly Entry[], criterion: SortCriterion): string[] {
  return entries.map((entry) => `  ${entry.name}  ${criterionValue(entry, criterion)}`);
}

function grepMatchLines(match: GrepMatch): string[] {
  return [
    ...match.before.map((c) => `${match.relativePath}-${c.lineNumber}-${c.line}`),
    `${match.relativePath}:${match.lineNumber}:${match.line}`,
    ...match.after.map((c) => `${match.relativePath}-${c.lineNumber}-${c.line}`),
  ];
}

export function formatGrep(pattern: string, result: GrepResult): string[] {
  const lines = [`Searching content for: '${pattern}'`];
  if (result.literal) lines.push("Pattern is not a valid regular expression, matching it literally");

  const sections: Array<["callables" | "aliases", GrepMatch[]]> = [
    ["callables", result.callables],
    ["aliases", result.aliases],
  ];
  for (const [collection, matches] of sections) {
    if (matches.length === 0) continue;
    lines.push("", `${SECTION_TITLES[collection]}:`);
    matches.forEach((match, i) => {
      if (i > 0 && (match.before.length > 0 || match.after.length > 0)) lines.push("--");
      lines.push(...grepMatchLines(match));
    });
    if (result.truncated[collection]) lines.push(`(showing the first ${matches.length} matches)`);
  }
  lines.push("", matchCount(result.callables.length + result.aliases.length));
  return lines;
}

export function formatStats(summary: IndexSummary): string[] {
  const { statistics } = summary;
  return [
    `Index:        ${summary.indexPath}`,
    `Corpus:       ${summary.corpusRoot}`,
    `Updated:      ${summary.lastUpdatedAtUTC}`,
    `Callables:    ${statistics.totalCallables}`,
    `Aliases:      ${statistics.totalAliases}`,
    `Scripts:      ${statistics.totalScripts}`,
    `Categories:   ${statistics.totalCategories}`,
    `Build time:   ${statistics.lastBuildDurationSeconds}s`,
    "",
    "Top categories:",
    ...summary.topCategories.map((c) => `  ${c.name} (${c.callableCount})`),
  ];
}

export function formatSessions(sessions: readonly SessionSummary[]): string[] {
  return sessions.map((s) => `  ${s.name}  ${s.resultCount} results  ${s.savedAtUTC}`);
}

/** The result list with the cursor marked. */
export function formatResults(results: readonly string[], cursor: number): string[] {
  return results.map((name, i) => `${i === cursor ? ">" : " "} ${i + 1}. ${name}`);
}
