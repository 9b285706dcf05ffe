import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { AppConfigSchema, type AppConfig } from "../schemas/app-config.js";
import { defaultConfigPath, resolveCorpusRoot } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  corpusRoot?: string;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    defaultConfigPath(resolveCorpusRoot(options?.corpusRoot))
  );
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<AppConfig> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // Missing file: defaults apply
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = AppConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}
