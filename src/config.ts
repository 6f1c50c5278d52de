import { readFile } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_CONFIG_PATH = ".issuemark.json";

export type RemoteBackend = "rest" | "cli" | "memory";
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "text" | "json";

export interface SyncBehaviorConfig {
  update: boolean;
  respectStatus: boolean;
  prune: boolean;
  dryRun: boolean;
  milestoneRequired: boolean;
  truncateBodyDiff: number;
}

export interface ConcurrencyConfig {
  enabled: boolean;
  maxWorkers: number;
  batchSize: number;
  threshold: number;
  batchPauseMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export interface IssuemarkConfig {
  version: number;
  paths: {
    specFile: string;
    indexFile: string;
    indexMirror?: string;
    summaryFile: string;
  };
  github: {
    repo?: string;
    backend: RemoteBackend;
    token?: string;
    apiUrl: string;
  };
  sync: SyncBehaviorConfig;
  concurrency: ConcurrencyConfig;
  retry: RetryConfig;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type PlainObject = Record<string, unknown>;
type Env = Record<string, string | undefined>;

const DEFAULT_BACKEND: RemoteBackend = "cli";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_LOG_FORMAT: LogFormat = "text";

const DEFAULTS = {
  version: 1,
  paths: {
    indexFile: ".issuemark/index.json",
    summaryFile: "issues_summary.json",
  },
  github: {
    backend: DEFAULT_BACKEND,
    apiUrl: "https://api.github.com",
  },
  sync: {
    update: true,
    respectStatus: true,
    prune: false,
    dryRun: false,
    milestoneRequired: false,
    truncateBodyDiff: 80,
  },
  concurrency: {
    enabled: false,
    maxWorkers: 4,
    batchSize: 10,
    threshold: 10,
    batchPauseMs: 100,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
  },
  logging: {
    level: DEFAULT_LOG_LEVEL,
    format: DEFAULT_LOG_FORMAT,
  },
};

const TOKEN_ENV_VARS = ["ISSUEMARK_GITHUB_TOKEN", "GITHUB_TOKEN", "GH_TOKEN"];
const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

const VALID_BACKENDS: RemoteBackend[] = ["rest", "cli", "memory"];
const VALID_LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];
const VALID_LOG_FORMATS: LogFormat[] = ["text", "json"];

const isPlainObject = (value: unknown): value is PlainObject =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const requireObject = (value: unknown, label: string): PlainObject => {
  if (!isPlainObject(value)) {
    throw new ConfigError(`${label} must be an object`);
  }
  return value;
};

const optionalObject = (value: unknown, label: string): PlainObject => {
  if (value === undefined) {
    return {};
  }
  if (!isPlainObject(value)) {
    throw new ConfigError(`${label} must be an object`);
  }
  return value;
};

const requireNonEmptyString = (value: unknown, label: string): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Missing required ${label}`);
  }
  return value;
};

const optionalString = (
  value: unknown,
  label: string,
  fallback: string,
): string => {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
  return value;
};

const optionalNonEmptyString = (
  value: unknown,
  label: string,
): string | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const optionalBoolean = (
  value: unknown,
  label: string,
  fallback: boolean,
): boolean => {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${label} must be a boolean`);
  }
  return value;
};

const optionalInteger = (
  value: unknown,
  label: string,
  fallback: number,
  minValue: number,
): number => {
  if (value === undefined) {
    return fallback;
  }
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < minValue
  ) {
    throw new ConfigError(
      `${label} must be an integer greater than or equal to ${minValue}`,
    );
  }
  return value;
};

const isOneOf = <T extends string>(
  value: string,
  allowed: readonly T[],
): value is T => allowed.some((item) => item === value);

const optionalEnum = <T extends string>(
  value: unknown,
  label: string,
  fallback: T,
  allowed: readonly T[],
): T => {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
  if (!isOneOf(value, allowed)) {
    throw new ConfigError(
      `${label} must be one of: ${allowed.map((item) => `'${item}'`).join(", ")}`,
    );
  }
  return value;
};

const resolveToken = (value: unknown, env: Env): string | undefined => {
  const configured = optionalNonEmptyString(value, "github.token");
  if (configured !== undefined) {
    // "$NAME" defers to the environment variable of that name.
    if (configured.startsWith("$")) {
      return optionalNonEmptyString(env[configured.slice(1)], "github.token");
    }
    return configured;
  }
  for (const name of TOKEN_ENV_VARS) {
    const candidate = env[name]?.trim();
    if (candidate) {
      return candidate;
    }
  }
  return undefined;
};

export const normalizeConfig = (
  input: unknown,
  env: Env = process.env,
): IssuemarkConfig => {
  const root = requireObject(input, "Config");

  const version = optionalInteger(root.version, "version", DEFAULTS.version, 1);

  const pathsInput = requireObject(root.paths, "paths");
  const paths: IssuemarkConfig["paths"] = {
    specFile: requireNonEmptyString(pathsInput.specFile, "paths.specFile"),
    indexFile: optionalString(
      pathsInput.indexFile,
      "paths.indexFile",
      DEFAULTS.paths.indexFile,
    ),
    summaryFile: optionalString(
      pathsInput.summaryFile,
      "paths.summaryFile",
      DEFAULTS.paths.summaryFile,
    ),
  };
  const indexMirror = optionalNonEmptyString(
    pathsInput.indexMirror,
    "paths.indexMirror",
  );
  if (indexMirror !== undefined) {
    paths.indexMirror = indexMirror;
  }

  const githubInput = optionalObject(root.github, "github");
  const backend = optionalEnum(
    githubInput.backend,
    "github.backend",
    DEFAULTS.github.backend,
    VALID_BACKENDS,
  );
  const repo = optionalNonEmptyString(githubInput.repo, "github.repo");
  if (repo !== undefined && !REPO_PATTERN.test(repo)) {
    throw new ConfigError("github.repo must look like 'owner/name'");
  }
  const token = resolveToken(githubInput.token, env);
  if (backend === "rest") {
    const missing: string[] = [];
    if (!repo) {
      missing.push("repo");
    }
    if (!token) {
      missing.push("token");
    }
    if (missing.length > 0) {
      throw new ConfigError(
        `Missing required GitHub settings for rest backend: ${missing.join(", ")}`,
      );
    }
  }
  const github: IssuemarkConfig["github"] = {
    backend,
    apiUrl: optionalString(
      githubInput.apiUrl,
      "github.apiUrl",
      DEFAULTS.github.apiUrl,
    ),
  };
  if (repo !== undefined) {
    github.repo = repo;
  }
  if (token !== undefined) {
    github.token = token;
  }

  const syncInput = optionalObject(root.sync, "sync");
  const sync: SyncBehaviorConfig = {
    update: optionalBoolean(syncInput.update, "sync.update", DEFAULTS.sync.update),
    respectStatus: optionalBoolean(
      syncInput.respectStatus,
      "sync.respectStatus",
      DEFAULTS.sync.respectStatus,
    ),
    prune: optionalBoolean(syncInput.prune, "sync.prune", DEFAULTS.sync.prune),
    dryRun: optionalBoolean(syncInput.dryRun, "sync.dryRun", DEFAULTS.sync.dryRun),
    milestoneRequired: optionalBoolean(
      syncInput.milestoneRequired,
      "sync.milestoneRequired",
      DEFAULTS.sync.milestoneRequired,
    ),
    truncateBodyDiff: optionalInteger(
      syncInput.truncateBodyDiff,
      "sync.truncateBodyDiff",
      DEFAULTS.sync.truncateBodyDiff,
      0,
    ),
  };

  const concurrencyInput = optionalObject(root.concurrency, "concurrency");
  const concurrency: ConcurrencyConfig = {
    enabled: optionalBoolean(
      concurrencyInput.enabled,
      "concurrency.enabled",
      DEFAULTS.concurrency.enabled,
    ),
    maxWorkers: optionalInteger(
      concurrencyInput.maxWorkers,
      "concurrency.maxWorkers",
      DEFAULTS.concurrency.maxWorkers,
      1,
    ),
    batchSize: optionalInteger(
      concurrencyInput.batchSize,
      "concurrency.batchSize",
      DEFAULTS.concurrency.batchSize,
      1,
    ),
    threshold: optionalInteger(
      concurrencyInput.threshold,
      "concurrency.threshold",
      DEFAULTS.concurrency.threshold,
      1,
    ),
    batchPauseMs: optionalInteger(
      concurrencyInput.batchPauseMs,
      "concurrency.batchPauseMs",
      DEFAULTS.concurrency.batchPauseMs,
      0,
    ),
  };

  const retryInput = optionalObject(root.retry, "retry");
  const retry: RetryConfig = {
    maxAttempts: optionalInteger(
      retryInput.maxAttempts,
      "retry.maxAttempts",
      DEFAULTS.retry.maxAttempts,
      1,
    ),
    baseDelayMs: optionalInteger(
      retryInput.baseDelayMs,
      "retry.baseDelayMs",
      DEFAULTS.retry.baseDelayMs,
      0,
    ),
  };
  if (retryInput.maxDelayMs !== undefined) {
    retry.maxDelayMs = optionalInteger(
      retryInput.maxDelayMs,
      "retry.maxDelayMs",
      0,
      0,
    );
  }

  const loggingInput = optionalObject(root.logging, "logging");
  const logging = {
    level: optionalEnum(
      loggingInput.level,
      "logging.level",
      DEFAULTS.logging.level,
      VALID_LOG_LEVELS,
    ),
    format: optionalEnum(
      loggingInput.format,
      "logging.format",
      DEFAULTS.logging.format,
      VALID_LOG_FORMATS,
    ),
  };

  return {
    version,
    paths,
    github,
    sync,
    concurrency,
    retry,
    logging,
  };
};

const resolveConfigPath = (configPath: string | undefined, cwd: string): string => {
  const targetPath = configPath ?? DEFAULT_CONFIG_PATH;
  return path.isAbsolute(targetPath) ? targetPath : path.resolve(cwd, targetPath);
};

export const loadIssuemarkConfig = async (
  configPath?: string,
  options?: { cwd?: string; env?: Env },
): Promise<IssuemarkConfig> => {
  const cwd = options?.cwd ?? process.cwd();
  const resolvedPath = resolveConfigPath(configPath, cwd);
  let rawConfig: string;
  try {
    rawConfig = await readFile(resolvedPath, "utf8");
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown file system error";
    throw new ConfigError(`Failed to read config at ${resolvedPath}: ${message}`);
  }

  let parsedConfig: unknown;
  try {
    parsedConfig = JSON.parse(rawConfig);
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown JSON parse error";
    throw new ConfigError(`Invalid JSON in config at ${resolvedPath}: ${message}`);
  }

  return normalizeConfig(parsedConfig, options?.env ?? process.env);
};
