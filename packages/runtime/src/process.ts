import { spawn } from "node:child_process";

export interface ProcessResult {
  code: number | null;
  stdout: string;
}

/** Runs a command with `input` on stdin, capturing stdout. stderr stays on the terminal. */
export type RunWithInput = (
  command: string,
  args: readonly string[],
  input: string,
) => Promise<ProcessResult>;

/** Runs a command attached to the terminal, resolving with its exit code. */
export type RunInteractive = (
  command: string,
  args: readonly string[],
) => Promise<number | null>;

export const runWithInput: RunWithInput = (command, args, input) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ["pipe", "pipe", "inherit"] });
    let stdout = "";

    child.stdout?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout }));

    // The child may exit before reading everything (e.g. cancelled early).
    child.stdin?.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code !== "EPIPE") reject(err);
    });
    child.stdin?.end(input);
  });

export const runInteractive: RunInteractive = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: "inherit" });
    child.on("error", reject);
    child.on("close", (code) => resolve(code));
  });

/** Split a configured command line such as "code --wait" into argv. */
export function splitCommandLine(commandLine: string): string[] {
  return commandLine.trim().split(/\s+/).filter((part) => part.length > 0);
}
