#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { IssuemarkConfig } from "./config.js";
import { ConfigError, DEFAULT_CONFIG_PATH, loadIssuemarkConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { reconcile } from "./reconciler.js";
import { withRetry } from "./retry.js";
import type { RemoteClientOverrides } from "./remote-client.js";
import { createRemoteClient } from "./remote-client.js";
import { MarkdownSpecSource, SpecParseError } from "./spec-parser.js";
import { formatReconcileReport, formatRunSummary } from "./summary-output.js";
import { SyncEngine } from "./sync-engine.js";
import { syncWithIndex } from "./sync-with-index.js";

type CommandName = "sync" | "plan" | "reconcile";

const COMMANDS: CommandName[] = ["sync", "plan", "reconcile"];

interface CommandOptions {
  configPath?: string;
  dryRun?: boolean;
  prune?: boolean;
}

interface ParseResult {
  command?: CommandName;
  options?: CommandOptions;
  error?: string;
  showHelp?: boolean;
}

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd: string;
  env: Record<string, string | undefined>;
  remote?: RemoteClientOverrides;
}

const USAGE = [
  "Usage:",
  "  issuemark sync [--config <path>] [--dry-run] [--prune]",
  "  issuemark plan [--config <path>]",
  "  issuemark reconcile [--config <path>]",
  "",
  "Options:",
  "  --config   Path to the configuration file (default: .issuemark.json)",
  "  --dry-run  Record planned actions without changing any issue",
  "  --prune    Close open issues that no spec item refers to",
];

const isCommandName = (value: string): value is CommandName =>
  COMMANDS.some((command) => command === value);

const parseOptionValue = (
  arg: string,
  argv: string[],
  index: number,
): { value?: string; nextIndex: number; error?: string } => {
  const equalsIndex = arg.indexOf("=");
  if (equalsIndex !== -1) {
    const value = arg.slice(equalsIndex + 1);
    if (!value) {
      return {
        nextIndex: index,
        error: `Missing value for ${arg.slice(0, equalsIndex)}`,
      };
    }
    return { value, nextIndex: index };
  }
  const value = argv[index + 1];
  if (!value) {
    return { nextIndex: index, error: `Missing value for ${arg}` };
  }
  return { value, nextIndex: index + 1 };
};

export const parseArgs = (argv: string[]): ParseResult => {
  if (argv.length === 0) {
    return { error: "Missing command." };
  }
  const command = argv[0];
  if (command === "--help" || command === "-h") {
    return { showHelp: true };
  }
  if (!isCommandName(command)) {
    return { error: `Unknown command '${command}'.` };
  }

  const options: CommandOptions = {};
  for (let i = 1; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      return { command, options, showHelp: true };
    }
    if (arg === "--config" || arg.startsWith("--config=")) {
      const parsed = parseOptionValue(arg, argv, i);
      if (parsed.error) {
        return { error: parsed.error };
      }
      options.configPath = parsed.value;
      i = parsed.nextIndex;
      continue;
    }
    if (arg === "--dry-run" && command === "sync") {
      options.dryRun = true;
      continue;
    }
    if (arg === "--prune" && command === "sync") {
      options.prune = true;
      continue;
    }
    return { error: `Unknown option '${arg}'.` };
  }
  return { command, options };
};

const resolveFromBase = (value: string, baseDir: string): string =>
  path.isAbsolute(value) ? value : path.resolve(baseDir, value);

const loadContext = async (
  options: CommandOptions,
  io: CliIo,
): Promise<{ config: IssuemarkConfig; configDir: string; logger: Logger }> => {
  const configPath = resolveFromBase(options.configPath ?? DEFAULT_CONFIG_PATH, io.cwd);
  const config = await loadIssuemarkConfig(configPath, { cwd: io.cwd, env: io.env });
  const logger = createLogger({
    level: config.logging.level,
    format: config.logging.format,
    output: io.stderr,
    errorOutput: io.stderr,
  });
  return { config, configDir: path.dirname(configPath), logger };
};

const runSyncCommand = async (
  options: CommandOptions,
  io: CliIo,
  forceDryRun: boolean,
): Promise<void> => {
  const { config, configDir, logger } = await loadContext(options, io);
  const remote = createRemoteClient(config.github, io.remote);
  const engine = new SyncEngine({
    remote,
    logger: logger.child({ repo: config.github.repo ?? null }),
    retry: config.retry,
    dispatcher: config.concurrency,
  });
  const dryRun = forceDryRun || (options.dryRun ?? config.sync.dryRun);

  const { summary, artifact } = await syncWithIndex(engine, {
    specPath: resolveFromBase(config.paths.specFile, configDir),
    indexPath: resolveFromBase(config.paths.indexFile, configDir),
    indexMirror: config.paths.indexMirror
      ? resolveFromBase(config.paths.indexMirror, configDir)
      : undefined,
    summaryPath: resolveFromBase(config.paths.summaryFile, configDir),
    repo: config.github.repo ?? null,
    update: config.sync.update,
    respectStatus: config.sync.respectStatus,
    prune: options.prune ?? config.sync.prune,
    milestoneRequired: config.sync.milestoneRequired,
    truncateBodyDiff: config.sync.truncateBodyDiff,
    dryRun,
  });

  if (config.logging.format === "json") {
    io.stdout.write(`${JSON.stringify(artifact, null, 2)}\n`);
  } else {
    io.stdout.write(formatRunSummary(summary));
  }
  if (summary.errors.length > 0) {
    process.exitCode = 1;
  }
};

const runReconcileCommand = async (options: CommandOptions, io: CliIo): Promise<void> => {
  const { config, configDir, logger } = await loadContext(options, io);
  const remote = createRemoteClient(config.github, io.remote);
  const items = await new MarkdownSpecSource().readItems(
    resolveFromBase(config.paths.specFile, configDir),
  );
  const records = await withRetry(() => remote.list(), config.retry);
  const report = reconcile(items, records);
  logger.debug("Reconcile finished", { drift: report.summary.driftCount });

  if (config.logging.format === "json") {
    io.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  } else {
    io.stdout.write(formatReconcileReport(report));
  }
  if (!report.inSync) {
    process.exitCode = 1;
  }
};

const isDirectRun = (): boolean => {
  if (!process.argv[1]) {
    return false;
  }
  const currentPath = fileURLToPath(import.meta.url);
  return path.resolve(process.argv[1]) === currentPath;
};

const handleError = (error: unknown, stderr: NodeJS.WritableStream = process.stderr): void => {
  if (error instanceof ConfigError) {
    stderr.write(`Configuration error: ${error.message}\n`);
  } else if (error instanceof SpecParseError) {
    stderr.write(`Spec error: ${error.message}\n`);
  } else if (error instanceof Error) {
    stderr.write(`${error.message}\n`);
  } else {
    stderr.write("Unknown error\n");
  }
  process.exitCode = 1;
};

export const runCli = async (
  argv = process.argv.slice(2),
  io: CliIo = {
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: process.cwd(),
    env: process.env,
  },
): Promise<void> => {
  const parsed = parseArgs(argv);
  if (parsed.error) {
    io.stderr.write(`${parsed.error}\n${USAGE.join("\n")}\n`);
    process.exitCode = 1;
    return;
  }
  if (parsed.showHelp || !parsed.command) {
    io.stderr.write(`${USAGE.join("\n")}\n`);
    return;
  }
  const options = parsed.options ?? {};
  try {
    if (parsed.command === "reconcile") {
      await runReconcileCommand(options, io);
      return;
    }
    await runSyncCommand(options, io, parsed.command === "plan");
  } catch (error) {
    handleError(error, io.stderr);
  }
};

if (isDirectRun()) {
  runCli().catch((error: unknown) => handleError(error));
}
