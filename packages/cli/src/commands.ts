import {
  EXIT_FAILURE,
  EXIT_NOT_FOUND,
  EXIT_OK,
  IndexError,
  NoMatchesError,
} from "@scriptdex/core/errors";
import {
  hitName,
  type FindScope,
  type SearchScope,
  type SortCriterion,
  type SortOrder,
} from "@scriptdex/core/query";
import { loadCommand, type ExploreAction } from "@scriptdex/core/explorer";
import type { NavigationResult } from "@scriptdex/core/navigation";
import type { CliContext } from "./context.js";
import type { Output } from "./output.js";
import {
  formatDescribe,
  formatGrep,
  formatHits,
  formatLocate,
  formatResults,
  formatSearch,
  formatSessions,
  formatSorted,
  formatStats,
  formatUsage,
  matchCount,
} from "./format.js";

export type NavigationDirection = "next" | "prev" | "first" | "last";

export type CliCommand =
  | { kind: "build" }
  | { kind: "refresh" }
  | { kind: "stats" }
  | { kind: "search"; term: string; scope: SearchScope; verbose: boolean; countOnly: boolean }
  | { kind: "find"; pattern: string; scope: FindScope }
  | { kind: "locate"; name: string }
  | { kind: "sort"; criterion: SortCriterion; order: SortOrder; scope: FindScope }
  | { kind: "describe"; name: string; source: boolean }
  | { kind: "grep"; pattern: string; contextLines?: number; ignoreCase?: boolean }
  | { kind: "fuzzy"; initialTerm?: string; action: ExploreAction }
  | { kind: "edit"; name: string }
  | { kind: "recent"; count: number }
  | { kind: "popular"; count: number }
  | { kind: "save"; name: string }
  | { kind: "recall"; name?: string }
  | { kind: "navigate"; direction: NavigationDirection };

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

function print(output: Output, lines: readonly string[]): void {
  for (const line of lines) output.out(line);
}

/** Make `names` the active results; an empty list leaves the previous ones in place. */
async function activate(ctx: CliContext, names: readonly string[]): Promise<void> {
  if (names.length === 0) return;
  ctx.navigator.load(names);
  await ctx.sessions.writeActive(ctx.navigator.snapshot());
}

function requireMatches(count: number, details: Record<string, unknown>): number {
  if (count === 0) throw new NoMatchesError(details);
  return EXIT_OK;
}

function describeIssues(ctx: CliContext, output: Output, issues: readonly { path: string; reason: string }[]): void {
  if (issues.length === 0) return;
  output.err(`Skipped ${issues.length} unreadable files:`);
  for (const issue of issues) output.err(`  ${issue.path}: ${issue.reason}`);
  ctx.logger.debug({ count: issues.length }, "Scan issues reported");
}

/** Full metadata for the entry the cursor now points at. */
async function describeCurrent(ctx: CliContext, output: Output, name: string | null): Promise<void> {
  if (name === null) return;
  const { located } = await ctx.engine.describe(name);
  print(output, ["", ...formatDescribe(located, name, null)]);
}

function navigationLine(result: NavigationResult): string {
  const position = `(${result.cursor + 1}/${result.total})`;
  switch (result.outcome) {
    case "moved":
      return `${result.current ?? ""} ${position}`;
    case "at-first":
      return `Already at first result: ${result.current ?? ""} ${position}`;
    case "at-last":
      return `Already at last result: ${result.current ?? ""} ${position}`;
    case "empty":
      return "No active results. Run a search first.";
  }
}

async function execute(command: CliCommand, ctx: CliContext, output: Output): Promise<number> {
  switch (command.kind) {
    case "build": {
      const { document, issues } = await ctx.store.build();
      const { statistics } = document;
      output.out(
        `Indexed ${statistics.totalCallables} callables, ${statistics.totalAliases} aliases, ` +
          `${statistics.totalScripts} scripts in ${statistics.lastBuildDurationSeconds}s`,
      );
      output.out(`Index written to ${ctx.store.indexPath}`);
      describeIssues(ctx, output, issues);
      return EXIT_OK;
    }

    case "refresh": {
      const result = await ctx.store.refresh();
      switch (result.status) {
        case "up-to-date":
          output.out("Index is up to date");
          break;
        case "created":
          output.out(`Index created with ${result.changedFiles.length} files`);
          break;
        case "updated":
          output.out(
            `Index updated: ${result.changedFiles.length} changed, ${result.removedFiles.length} removed`,
          );
          break;
      }
      describeIssues(ctx, output, result.issues);
      return EXIT_OK;
    }

    case "stats": {
      const summary = await ctx.store.stats();
      if (summary === null) {
        output.err("Index not found. Run: scriptdex build");
        return EXIT_NOT_FOUND;
      }
      print(output, formatStats(summary));
      return EXIT_OK;
    }

    case "search": {
      const result = await ctx.engine.search(command.term, command.scope);
      if (command.countOnly) {
        output.out(matchCount(result.hits.length));
      } else {
        print(output, formatSearch(command.term, command.scope, result, command.verbose));
      }
      await activate(ctx, result.hits.map(hitName));
      return requireMatches(result.hits.length, { term: command.term, scope: command.scope });
    }

    case "find": {
      const hits = await ctx.engine.find(command.pattern, command.scope);
      print(output, [`Finding: '${command.pattern}' (scope: ${command.scope})`, ""]);
      if (hits.length > 0) print(output, [...formatHits(hits), ""]);
      output.out(matchCount(hits.length));
      await activate(ctx, hits.map(hitName));
      return requireMatches(hits.length, { pattern: command.pattern, scope: command.scope });
    }

    case "locate": {
      const located = await ctx.engine.locate(command.name);
      print(output, formatLocate(command.name, located));
      return located.status === "missing" ? EXIT_NOT_FOUND : EXIT_OK;
    }

    case "sort": {
      const entries = await ctx.engine.sort(command.scope, command.criterion, command.order);
      output.out(`Sorted by ${command.criterion} (${command.order}), scope: ${command.scope}`);
      print(output, formatSorted(entries, command.criterion));
      output.out(matchCount(entries.length));
      await activate(ctx, entries.map((entry) => entry.name));
      return requireMatches(entries.length, { scope: command.scope });
    }

    case "describe": {
      const { located, source } = await ctx.engine.describe(command.name, { source: command.source });
      print(output, formatDescribe(located, command.name, source));
      return located.status === "missing" ? EXIT_NOT_FOUND : EXIT_OK;
    }

    case "grep": {
      const result = await ctx.engine.grep(command.pattern, {
        contextLines: command.contextLines,
        ignoreCase: command.ignoreCase,
      });
      print(output, formatGrep(command.pattern, result));
      return requireMatches(result.callables.length + result.aliases.length, { pattern: command.pattern });
    }

    case "fuzzy":
      return explore(command.initialTerm, command.action, ctx, output);

    case "edit": {
      const located = await ctx.engine.locate(command.name);
      if (located.status === "missing") {
        print(output, formatLocate(command.name, located));
        return EXIT_NOT_FOUND;
      }
      const path = located.status === "indexed" ? located.entry.sourcePath : located.path;
      return (await ctx.launcher.edit(path)) === 0 ? EXIT_OK : EXIT_FAILURE;
    }

    case "recent": {
      const entries = await ctx.engine.recent(command.count);
      output.out(`${entries.length} most recently modified callables`);
      print(output, formatSorted(entries, "date"));
      await activate(ctx, entries.map((entry) => entry.name));
      return requireMatches(entries.length, { count: command.count });
    }

    case "popular": {
      const usage = await ctx.engine.popular(command.count);
      output.out(`${usage.length} most used callables`);
      print(output, formatUsage(usage));
      await activate(ctx, usage.map((item) => item.name));
      return requireMatches(usage.length, { count: command.count });
    }

    case "save": {
      const session = await ctx.sessions.save(command.name, ctx.navigator.snapshot());
      output.out(`Saved session '${session.name}' (${session.results.length} results)`);
      return EXIT_OK;
    }

    case "recall": {
      if (command.name === undefined) {
        const sessions = await ctx.sessions.list();
        if (sessions.length === 0) {
          output.out("No saved sessions");
          return EXIT_NOT_FOUND;
        }
        print(output, ["Saved sessions:", ...formatSessions(sessions)]);
        return EXIT_OK;
      }
      const session = await ctx.sessions.recall(command.name);
      ctx.navigator.restore(session);
      const snapshot = ctx.navigator.snapshot();
      await ctx.sessions.writeActive(snapshot);
      output.out(`Recalled session '${session.name}' (${snapshot.results.length} results)`);
      print(output, formatResults(snapshot.results, snapshot.cursor));
      await describeCurrent(ctx, output, ctx.navigator.current());
      return EXIT_OK;
    }

    case "navigate": {
      const result = ctx.navigator[command.direction]();
      output.out(navigationLine(result));
      if (result.outcome === "empty") return EXIT_NOT_FOUND;
      await ctx.sessions.writeActive(ctx.navigator.snapshot());
      await describeCurrent(ctx, output, result.current);
      return EXIT_OK;
    }

    default:
      return assertNever(command);
  }
}

async function explore(
  initialTerm: string | undefined,
  action: ExploreAction,
  ctx: CliContext,
  output: Output,
): Promise<number> {
  const outcome = await ctx.explorer.explore(initialTerm);
  switch (outcome.status) {
    case "unavailable": {
      output.err(`Fuzzy finder '${ctx.config.explorer.fuzzyCommand}' is not available, showing search results`);
      const { hits } = outcome.fallback;
      if (hits.length > 0) print(output, formatHits(hits));
      output.out(matchCount(hits.length));
      await activate(ctx, hits.map(hitName));
      return EXIT_NOT_FOUND;
    }
    case "cancelled":
      output.err("No selection");
      return EXIT_NOT_FOUND;
    case "selected":
      break;
  }

  if (outcome.path === null) {
    output.err(`Not found: ${outcome.name}`);
    return EXIT_NOT_FOUND;
  }

  switch (action) {
    case "load":
      output.out(loadCommand(outcome.path));
      return EXIT_OK;
    case "print":
      output.out(outcome.path);
      return EXIT_OK;
    case "view":
    case "edit": {
      output.err(`Selected: ${outcome.name} [${outcome.tag}]`);
      const code = action === "view" ? await ctx.launcher.view(outcome.path) : await ctx.launcher.edit(outcome.path);
      return code === 0 ? EXIT_OK : EXIT_FAILURE;
    }
  }
}

/**
 * Run one command. Catalogued errors become their exit code with the message
 * on the error stream; anything else propagates.
 */
export async function runCommand(command: CliCommand, ctx: CliContext, output: Output): Promise<number> {
  try {
    return await execute(command, ctx, output);
  } catch (err) {
    if (err instanceof IndexError) {
      output.err(err.message);
      ctx.logger.debug({ error: err.toJSON() }, "Command failed");
      return err.exitCode;
    }
    throw err;
  }
}
