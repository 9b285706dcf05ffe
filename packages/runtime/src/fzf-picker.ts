import type { FuzzyPicker, PickOptions } from "@scriptdex/core/explorer";
import { runWithInput, type RunWithInput } from "./process.js";
import { commandExists } from "./which.js";

/** fzf exits 1 when nothing matched and 130 when interrupted. */
const NO_SELECTION_CODES = new Set([1, 130]);

export interface FzfPickerOptions {
  /** Executable name or path. Default: "fzf" */
  command?: string;
  run?: RunWithInput;
  exists?: (command: string) => Promise<boolean>;
}

export function fzfArgs(options?: PickOptions): string[] {
  const args = ["--height=80%", "--border", "--no-multi"];
  if (options?.query) args.push(`--query=${options.query}`);
  if (options?.header) args.push(`--header=${options.header}`);
  return args;
}

/** FuzzyPicker backed by an external fzf process. */
export function createFzfPicker(options: FzfPickerOptions = {}): FuzzyPicker {
  const command = options.command ?? "fzf";
  const run = options.run ?? runWithInput;
  const exists = options.exists ?? ((cmd: string) => commandExists(cmd));

  return {
    isAvailable() {
      return exists(command);
    },

    async pick(candidates, pickOptions) {
      if (candidates.length === 0) return null;
      const input = candidates.join("\n") + "\n";
      const { code, stdout } = await run(command, fzfArgs(pickOptions), input);

      if (code !== null && NO_SELECTION_CODES.has(code)) return null;
      if (code !== 0) {
        throw new Error(`${command} exited with code ${code ?? "null"}`);
      }
      const [selected] = stdout.split("\n");
      return selected !== undefined && selected.length > 0 ? selected : null;
    },
  };
}
