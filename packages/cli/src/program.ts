import { Command, CommanderError, InvalidArgumentError } from "commander";
import { EXIT_FAILURE, EXIT_OK } from "@scriptdex/core/errors";
import {
  FIND_SCOPES,
  SEARCH_SCOPES,
  parseSortCriterion,
  parseSortOrder,
  type FindScope,
  type SearchScope,
} from "@scriptdex/core/query";
import { EXPLORE_ACTIONS, type ExploreAction } from "@scriptdex/core/explorer";
import type { CliCommand, NavigationDirection } from "./commands.js";
import type { Output } from "./output.js";

export { runCommand, type CliCommand, type NavigationDirection } from "./commands.js";
export { createCliContext, type CliContext, type CreateContextOptions, type Launcher } from "./context.js";
export { createBufferedOutput, processOutput, type BufferedOutput, type Output } from "./output.js";

const VERSION = "0.1.0";
const DEFAULT_RECENT_COUNT = 10;

export type Dispatch = (command: CliCommand) => Promise<void>;

function oneOf<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value) => {
    const found = choices.find((choice) => choice === value);
    if (found === undefined) {
      throw new InvalidArgumentError(`Expected one of: ${choices.join(", ")}.`);
    }
    return found;
  };
}

function count(min: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer of at least ${min}.`);
    }
    return parsed;
  };
}

const parseSearchScope = oneOf<SearchScope>(SEARCH_SCOPES);
const parseFindScope = oneOf<FindScope>(FIND_SCOPES);
const parseAction = oneOf<ExploreAction>(EXPLORE_ACTIONS);

/**
 * Build the command tree. Actions only translate arguments into a
 * `CliCommand`; `dispatch` does the work.
 */
export function createProgram(dispatch: Dispatch, output: Output): Command {
  const program = new Command();

  program
    .name("scriptdex")
    .description("Index and search a personal shell-script corpus")
    .version(VERSION, "-V, --version", "Output the version number")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.out(text.trimEnd()),
      writeErr: (text) => output.err(text.trimEnd()),
    });

  program
    .command("build")
    .description("Scan the corpus and write a fresh index")
    .action(() => dispatch({ kind: "build" }));

  program
    .command("refresh")
    .alias("update")
    .description("Re-index only files that changed since the last build")
    .action(() => dispatch({ kind: "refresh" }));

  program
    .command("stats")
    .description("Show index statistics")
    .action(() => dispatch({ kind: "stats" }));

  program
    .command("search")
    .description("Search names and descriptions")
    .argument("<term>", "case-insensitive substring")
    .option("-s, --scope <scope>", `one of: ${SEARCH_SCOPES.join(", ")}`, parseSearchScope, "all")
    .option("-v, --verbose", "show descriptions and file paths", false)
    .option("-c, --count-only", "only print the number of matches", false)
    .action((term: string, opts: { scope: SearchScope; verbose: boolean; countOnly: boolean }) =>
      dispatch({ kind: "search", term, scope: opts.scope, verbose: opts.verbose, countOnly: opts.countOnly }),
    );

  program
    .command("find")
    .description("Find files whose name matches a glob")
    .argument("<pattern>", "glob such as 'git*'")
    .option("-s, --scope <scope>", `one of: ${FIND_SCOPES.join(", ")}`, parseFindScope, "callables")
    .action((pattern: string, opts: { scope: FindScope }) =>
      dispatch({ kind: "find", pattern, scope: opts.scope }),
    );

  program
    .command("locate")
    .description("Show where an entry lives, with a short preview")
    .argument("<name>")
    .action((name: string) => dispatch({ kind: "locate", name }));

  program
    .command("sort")
    .description("List indexed entries in order")
    .argument("[criterion]", "name, size, date, lines or category", "name")
    .argument("[order]", "asc or desc", "asc")
    .argument("[scope]", `one of: ${FIND_SCOPES.join(", ")}`, parseFindScope, "callables")
    .action((criterion: string, order: string, scope: FindScope) =>
      dispatch({
        kind: "sort",
        criterion: parseSortCriterion(criterion),
        order: parseSortOrder(order),
        scope,
      }),
    );

  program
    .command("describe")
    .description("Show all metadata for an entry")
    .argument("<name>")
    .option("--source", "include the file contents", false)
    .action((name: string, opts: { source: boolean }) =>
      dispatch({ kind: "describe", name, source: opts.source }),
    );

  program
    .command("grep")
    .description("Search file contents with a regular expression")
    .argument("<pattern>")
    .argument("[contextLines]", "lines of context around each match", count(0))
    .option("-i, --ignore-case", "match case-insensitively")
    .action((pattern: string, contextLines: number | undefined, opts: { ignoreCase?: boolean }) =>
      dispatch({ kind: "grep", pattern, contextLines, ignoreCase: opts.ignoreCase }),
    );

  program
    .command("fuzzy")
    .alias("explore")
    .description("Pick an entry interactively")
    .argument("[term]", "initial query")
    .option("-a, --action <action>", `one of: ${EXPLORE_ACTIONS.join(", ")}`, parseAction, "view")
    .action((term: string | undefined, opts: { action: ExploreAction }) =>
      dispatch({ kind: "fuzzy", initialTerm: term, action: opts.action }),
    );

  program
    .command("recent")
    .description("List the most recently modified callables")
    .argument("[count]", "how many to show", count(1), DEFAULT_RECENT_COUNT)
    .action((n: number) => dispatch({ kind: "recent", count: n }));

  program
    .command("popular")
    .description("List the callables shell history runs most often")
    .argument("[count]", "how many to show", count(1), DEFAULT_RECENT_COUNT)
    .action((n: number) => dispatch({ kind: "popular", count: n }));

  program
    .command("edit")
    .description("Open an entry's file in the editor")
    .argument("<name>")
    .action((name: string) => dispatch({ kind: "edit", name }));

  program
    .command("save")
    .description("Save the active results under a name")
    .argument("<name>")
    .action((name: string) => dispatch({ kind: "save", name }));

  program
    .command("recall")
    .description("Restore a saved session, or list sessions")
    .argument("[name]")
    .action((name: string | undefined) => dispatch({ kind: "recall", name }));

  const directions: Array<[NavigationDirection, string]> = [
    ["next", "Move to the next result"],
    ["prev", "Move to the previous result"],
    ["first", "Move to the first result"],
    ["last", "Move to the last result"],
  ];
  for (const [direction, description] of directions) {
    program
      .command(direction)
      .description(description)
      .action(() => dispatch({ kind: "navigate", direction }));
  }

  return program;
}

export interface RunCliOptions {
  run: (command: CliCommand) => Promise<number>;
  output: Output;
}

/** Parse user arguments (no node/script prefix) and run the command. Resolves to the exit code. */
export async function runCli(argv: readonly string[], options: RunCliOptions): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createProgram(async (command) => {
    exitCode = await options.run(command);
  }, options.output);

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_OK : EXIT_FAILURE;
    }
    throw err;
  }
  return exitCode;
}
