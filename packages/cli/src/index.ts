import { Command, Option } from "commander";
import { RunCancelledError, type AuthorIdentityKey, type DeltaEngineConfig } from "@refdelta/delta-engine";
import type { CommitTimestampField } from "@refdelta/core";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { formatDeltaOutput, type DeltaOutputMode } from "./application/format-delta-output.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import {
  ConfigError,
  parsePositiveInteger,
  parseRepositoryArgument,
  resolveConnectionConfig,
} from "./application/resolve-config.js";
import { runDeltaCommand } from "./application/run-delta-command.js";

const readVersion = (): string => {
  const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));

  return typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string"
    ? parsed.version
    : "0.0.0";
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

type DeltaCliOptions = {
  base: string;
  target: string;
  repository: string[];
  after?: string;
  before?: string;
  dateField: CommitTimestampField;
  authorIdentity: AuthorIdentityKey;
  concurrency?: string;
  maxPages?: string;
  maxDurationMs?: string;
  timeoutMs?: string;
  gitlabUrl?: string;
  token?: string;
  output: DeltaOutputMode;
  json?: boolean;
  logLevel: LogLevel;
};

const buildEngineConfig = (options: DeltaCliOptions): Partial<DeltaEngineConfig> => {
  const concurrency = parsePositiveInteger(options.concurrency, "--concurrency");
  const maxPages = parsePositiveInteger(options.maxPages, "--max-pages");
  const maxDurationMs = parsePositiveInteger(options.maxDurationMs, "--max-duration-ms");

  return {
    dateField: options.dateField,
    authorIdentity: options.authorIdentity,
    ...(concurrency === undefined ? {} : { concurrency }),
    ...(maxPages === undefined ? {} : { maxPages }),
    ...(maxDurationMs === undefined ? {} : { maxDurationMs }),
  };
};

const program = new Command();

program
  .name("refdelta")
  .description("Find the commits reachable from a target ref but not from a base ref across GitLab repositories")
  .version(readVersion());

program
  .command("delta")
  .requiredOption("--base <ref>", "base ref (tag, branch or commit id)")
  .requiredOption("--target <ref>", "target ref (tag, branch or commit id)")
  .addOption(
    new Option("--repository <idOrPath>", "repository id or namespaced path (repeatable)")
      .argParser(collect)
      .default([]),
  )
  .option("--after <date>", "keep commits at or after this date (YYYY-MM-DD or ISO timestamp)")
  .option("--before <date>", "keep commits before this date (YYYY-MM-DD or ISO timestamp)")
  .addOption(
    new Option("--date-field <field>", "timestamp the date window applies to")
      .choices(["committed", "authored"])
      .default("committed"),
  )
  .addOption(
    new Option("--author-identity <key>", "how unique authors are counted")
      .choices(["name", "email"])
      .default("name"),
  )
  .option("--concurrency <count>", "repositories processed in parallel")
  .option("--max-pages <count>", "maximum history pages read per ref")
  .option("--max-duration-ms <ms>", "maximum time spent reading one ref's history")
  .option("--timeout-ms <ms>", "overall run timeout")
  .option("--gitlab-url <url>", "GitLab base URL (defaults to REFDELTA_GITLAB_URL)")
  .option("--token <token>", "GitLab access token (defaults to REFDELTA_GITLAB_TOKEN)")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["REFDELTA_LOG_LEVEL"])),
  )
  .addOption(
    new Option("--output <mode>", "output mode: summary (default) or json (summary and every result)")
      .choices(["summary", "json"])
      .default("summary"),
  )
  .option("--json", "shortcut for --output json")
  .action(async (options: DeltaCliOptions) => {
    const logger = createStderrLogger(options.logLevel);
    const outputMode: DeltaOutputMode = options.json === true ? "json" : options.output;

    try {
      if (options.repository.length === 0) {
        throw new ConfigError("at least one --repository is required");
      }
      const connection = resolveConnectionConfig({
        ...(options.gitlabUrl === undefined ? {} : { gitlabUrl: options.gitlabUrl }),
        ...(options.token === undefined ? {} : { token: options.token }),
      });
      const timeoutMs = parsePositiveInteger(options.timeoutMs, "--timeout-ms");
      const report = await runDeltaCommand(
        {
          baseRef: options.base,
          targetRef: options.target,
          repositories: options.repository.map(parseRepositoryArgument),
          dateWindow: {
            ...(options.after === undefined ? {} : { after: options.after }),
            ...(options.before === undefined ? {} : { before: options.before }),
          },
          config: buildEngineConfig(options),
          ...(timeoutMs === undefined ? {} : { timeoutMs }),
        },
        connection,
        logger,
      );
      process.stdout.write(`${formatDeltaOutput(report, outputMode)}\n`);
    } catch (error) {
      if (error instanceof RunCancelledError) {
        logger.error(error.message);
        process.stdout.write(`${formatDeltaOutput({ results: error.results, summary: error.summary }, outputMode)}\n`);
      } else {
        logger.error(error instanceof Error ? error.message : String(error));
      }
      process.exitCode = 1;
    }
  });

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

await program.parseAsync(argv);
