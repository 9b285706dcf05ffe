import { runInteractive, splitCommandLine, type RunInteractive } from "./process.js";

export interface LaunchOptions {
  /** Configured command line; null falls back to the environment. */
  command: string | null;
  env?: NodeJS.ProcessEnv;
  run?: RunInteractive;
}

async function launch(
  commandLine: string,
  path: string,
  run: RunInteractive,
): Promise<number | null> {
  const [command, ...args] = splitCommandLine(commandLine);
  if (command === undefined) {
    throw new Error("Empty command line");
  }
  return run(command, [...args, path]);
}

/** Show a file in the pager: configured, then $PAGER, then less. */
export function openInPager(path: string, options: LaunchOptions): Promise<number | null> {
  const env = options.env ?? process.env;
  return launch(options.command || env.PAGER || "less", path, options.run ?? runInteractive);
}

/** Open a file in the editor: configured, then $EDITOR, then vim. */
export function openInEditor(path: string, options: LaunchOptions): Promise<number | null> {
  const env = options.env ?? process.env;
  return launch(options.command || env.EDITOR || "vim", path, options.run ?? runInteractive);
}
