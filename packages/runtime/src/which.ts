import { access, constants } from "node:fs/promises";
import { delimiter, join } from "node:path";

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Whether `command` resolves to an executable, directly or through PATH. */
export async function commandExists(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<boolean> {
  if (command.length === 0) return false;
  if (command.includes("/")) return isExecutable(command);

  for (const dir of (env.PATH ?? "").split(delimiter)) {
    if (dir.length === 0) continue;
    if (await isExecutable(join(dir, command))) return true;
  }
  return false;
}
