import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { resolveRuntimeConfig, type RuntimeConfig } from "./config.js";
import { listCategories, loadCatalog } from "./core/catalog.js";
import { ExitCode, ParseConfigError, TagsiftError, formatExitCodesHelp } from "./core/errors.js";
import { readJsonPayload, writeDefaultConfig, type ConfigFormat } from "./core/files.js";
import { splitCsv } from "./core/normalize.js";
import { SELECTION_FALLBACKS, isSelectionFallback, type SelectionFallback } from "./core/query.js";
import { prepareSelection, runSelection, type SelectOverrides } from "./core/runner.js";
import type { MediaItem } from "./core/selector.js";
import { formatCliError } from "./utils/format-error.js";
import { formatStrong, logger, setVerbose } from "./utils/logger.js";

type ConfigArgs = {
  config?: string;
  catalog?: string;
};

type SelectArgs = {
  query?: string;
  limit?: number;
  fallback?: string;
  random?: boolean;
  mediaType?: string;
  provider?: string;
  search?: string;
  excludeIds?: string;
  queryJson?: string;
};

function loadRuntime(args: ConfigArgs): RuntimeConfig {
  return resolveRuntimeConfig({
    cli: { catalog: args.catalog },
    cwd: process.cwd(),
    configPath: args.config
  });
}

function toFallback(value: string | undefined): SelectionFallback | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (!isSelectionFallback(normalized)) {
    throw new ParseConfigError(`Invalid fallback mode: ${value}`);
  }
  return normalized;
}

function toOverrides(args: SelectArgs): SelectOverrides {
  const excludeIds = splitCsv(args.excludeIds);
  return {
    ...(args.limit !== undefined ? { limit: args.limit } : {}),
    ...(args.random !== undefined ? { random: args.random } : {}),
    ...(args.fallback !== undefined ? { fallback: toFallback(args.fallback) } : {}),
    ...(args.mediaType ? { mediaType: args.mediaType } : {}),
    ...(args.provider ? { provider: args.provider } : {}),
    ...(args.search ? { search: args.search } : {}),
    ...(excludeIds.length > 0 ? { excludeIds } : {})
  };
}

function printItems(items: MediaItem[]): void {
  for (const item of items) {
    console.log(`${item.id}\t${item.mediaType}\t${item.provider}\t${item.title}`);
  }
}

async function main(): Promise<void> {
  const cli = yargs(hideBin(process.argv))
    .scriptName("tagsift")
    .strict()
    .wrap(100)
    .option("config", { type: "string", describe: "Path to config file (tagsift.toml or tagsift.json)" })
    .option("catalog", { type: "string", describe: "Catalogue snapshot (JSON)" })
    .option("verbose", { type: "boolean", describe: "Log filtering and fallback decisions" })
    .option("events-json", { type: "boolean", describe: "Stream newline-delimited JSON events to stdout" })
    .middleware((argv) => {
      setVerbose(argv.verbose === true);
    })
    .epilogue(`Exit Codes:\n${formatExitCodesHelp()}`);

  cli.command(
    "select [query]",
    "Select media matching a tag query (e.g. \"owner=papa&mood=calm\")",
    (yy) =>
      yy
        .positional("query", { type: "string", describe: "Query string of tag filters and reserved keys" })
        .option("limit", { type: "number", describe: "Maximum number of items (1-100)" })
        .option("fallback", { type: "string", choices: SELECTION_FALLBACKS, describe: "Relaxation when nothing matches" })
        .option("random", { type: "boolean", describe: "Shuffle strict matches" })
        .option("media-type", { type: "string", describe: "Only this media type" })
        .option("provider", { type: "string", describe: "Only this provider" })
        .option("search", { type: "string", describe: "Title or description must contain this text" })
        .option("exclude-ids", { type: "string", describe: "Comma-separated item ids to leave out" })
        .option("query-json", { type: "string", describe: "Structured query payload (JSON file); replaces tag filters" })
        .option("json", { type: "boolean", describe: "Output items as JSON" }),
    async (argv) => {
      const runtime = loadRuntime(argv);
      const snapshot = loadCatalog(runtime.catalog);
      const payload = argv.queryJson ? readJsonPayload(argv.queryJson) : undefined;

      const run = runSelection(
        runtime,
        snapshot,
        { query: argv.query, payload, overrides: toOverrides(argv) },
        { eventsJson: argv.eventsJson === true }
      );

      if (argv.json) {
        console.log(JSON.stringify(run.items, null, 2));
        return;
      }
      if (argv.eventsJson) return;

      printItems(run.items);
      const label = run.phase === "fallback" ? `fallback: ${run.fallback}` : run.phase;
      logger.note(`${run.items.length} item(s) (${label})`);
    }
  );

  cli.command(
    "explain [query]",
    "Show how a query is parsed, without reading the catalogue",
    (yy) =>
      yy
        .positional("query", { type: "string", describe: "Query string of tag filters and reserved keys" })
        .option("query-json", { type: "string", describe: "Structured query payload (JSON file)" }),
    async (argv) => {
      const runtime = loadRuntime(argv);
      const payload = argv.queryJson ? readJsonPayload(argv.queryJson) : undefined;
      const prepared = prepareSelection(runtime, { query: argv.query, payload });

      console.log(JSON.stringify({
        options: {
          ...prepared.options,
          excludeIds: Array.from(prepared.options.excludeIds)
        },
        includeOrder: prepared.includeOrder,
        group: prepared.group
      }, null, 2));
    }
  );

  cli.command(
    "categories",
    "List tag categories and values present in the catalogue",
    (yy) => yy.option("json", { type: "boolean", describe: "Output as JSON" }),
    async (argv) => {
      const runtime = loadRuntime(argv);
      const categories = listCategories(loadCatalog(runtime.catalog));

      if (argv.json) {
        console.log(JSON.stringify(Object.fromEntries(categories), null, 2));
        return;
      }
      for (const [category, values] of categories) {
        console.log(`${formatStrong(category)}: ${values.join(", ")}`);
      }
    }
  );

  cli.command(
    "init-config [format]",
    "Create a default config file (tagsift.toml or tagsift.json)",
    (yy) =>
      yy
        .positional("format", {
          type: "string",
          choices: ["toml", "json"] as const,
          default: "toml",
          describe: "Config file format"
        })
        .option("output", {
          type: "string",
          alias: "o",
          describe: "Output filename (default: tagsift.toml or tagsift.json)"
        }),
    async (argv) => {
      const format: ConfigFormat = argv.format === "json" ? "json" : "toml";
      const filename = argv.output || `tagsift.${format}`;
      const isDefaultName = filename === "tagsift.toml" || filename === "tagsift.json";

      try {
        writeDefaultConfig(filename, format);
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "EEXIST") {
          throw new ParseConfigError(`${filename} already exists. Remove it first or use a different filename with --output.`);
        }
        throw error;
      }
      logger.success(`Created ${filename}`);

      if (!isDefaultName) {
        logger.info(`\nNote: To use this config file, specify it with the --config flag:`);
        logger.info(`  tagsift --config ${filename} <command>`);
      }
    }
  );

  await cli
    .demandCommand(1)
    .help()
    .fail((msg, err) => {
      const formatted = formatCliError(err) || msg || "Unknown error";
      logger.error(formatted);
      process.exit(err instanceof TagsiftError ? err.exitCode : ExitCode.GENERAL_ERROR);
    })
    .parseAsync();
}

main().catch((error: unknown) => {
  logger.error(formatCliError(error) || "Unknown error");
  process.exit(error instanceof TagsiftError ? error.exitCode : ExitCode.GENERAL_ERROR);
});
