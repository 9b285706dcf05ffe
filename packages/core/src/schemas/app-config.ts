import { z } from "zod";

export const DEFAULTS = {
  collections: {
    callables: {
      dirs: ["bash_functions.d"],
      extensions: [".sh"],
      recursive: true,
      requireExecutable: false,
    },
    aliases: {
      dirs: ["aliases"],
      extensions: [".bash", ".sh"],
      recursive: false,
      requireExecutable: false,
    },
    scripts: {
      dirs: ["scripts", "bin"],
      extensions: [".sh", ".bash"],
      recursive: false,
      requireExecutable: true,
    },
  },
  index: {
    path: null,
    sessionsDir: null,
  },
  scan: {
    concurrency: 8,
  },
  search: {
    contentLimit: 20,
    grepLimits: {
      callables: 50,
      aliases: 20,
    },
    defaultContextLines: 2,
    ignoreCase: false,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  explorer: {
    fuzzyCommand: "fzf",
    editor: null,
    pager: null,
  },
  usage: {
    historyFile: null,
  },
};

export const CollectionConfigSchema = z.object({
  dirs: z.array(z.string().min(1)).min(1),
  extensions: z
    .array(z.string().startsWith("."))
    .min(1)
    .describe("File extensions picked up in this collection, with the dot"),
  recursive: z.boolean(),
  requireExecutable: z.boolean(),
});

export const AppConfigSchema = z.object({
  collections: z
    .object({
      callables: CollectionConfigSchema.default(DEFAULTS.collections.callables),
      aliases: CollectionConfigSchema.default(DEFAULTS.collections.aliases),
      scripts: CollectionConfigSchema.default(DEFAULTS.collections.scripts),
    })
    .default(DEFAULTS.collections),
  index: z
    .object({
      path: z
        .string()
        .nullable()
        .default(DEFAULTS.index.path)
        .describe("Canonical index path; null derives it from the corpus root"),
      sessionsDir: z.string().nullable().default(DEFAULTS.index.sessionsDir),
    })
    .default(DEFAULTS.index),
  scan: z
    .object({
      concurrency: z
        .number()
        .int()
        .min(1)
        .max(64)
        .default(DEFAULTS.scan.concurrency),
    })
    .default(DEFAULTS.scan),
  search: z
    .object({
      contentLimit: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.search.contentLimit),
      grepLimits: z
        .object({
          callables: z
            .number()
            .int()
            .positive()
            .default(DEFAULTS.search.grepLimits.callables),
          aliases: z
            .number()
            .int()
            .positive()
            .default(DEFAULTS.search.grepLimits.aliases),
        })
        .default(DEFAULTS.search.grepLimits),
      defaultContextLines: z
        .number()
        .int()
        .min(0)
        .default(DEFAULTS.search.defaultContextLines),
      ignoreCase: z.boolean().default(DEFAULTS.search.ignoreCase),
    })
    .default(DEFAULTS.search),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "silent"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  explorer: z
    .object({
      fuzzyCommand: z.string().min(1).default(DEFAULTS.explorer.fuzzyCommand),
      editor: z
        .string()
        .nullable()
        .default(DEFAULTS.explorer.editor)
        .describe("Editor command; null falls back to $EDITOR, then vim"),
      pager: z
        .string()
        .nullable()
        .default(DEFAULTS.explorer.pager)
        .describe("Pager command; null falls back to $PAGER, then less"),
    })
    .default(DEFAULTS.explorer),
  usage: z
    .object({
      historyFile: z
        .string()
        .nullable()
        .default(DEFAULTS.usage.historyFile)
        .describe("Shell history read for usage counts; null falls back to $HISTFILE, then ~/.bash_history"),
    })
    .default(DEFAULTS.usage),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type CollectionConfig = z.infer<typeof CollectionConfigSchema>;
export type LoggingConfig = AppConfig["logging"];
export type SearchConfig = AppConfig["search"];
export type ExplorerConfig = AppConfig["explorer"];
export type UsageConfig = AppConfig["usage"];
