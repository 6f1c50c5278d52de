import { execFile } from "node:child_process";

import type {
  RemoteClient,
  RemoteCreateInput,
  RemoteId,
  RemoteOperation,
  RemoteRecord,
  RemoteUpdateInput,
} from "./adapters.js";
import { RemoteFailure } from "./adapters.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export interface GitHubCliClientConfig {
  repo?: string;
  command?: string;
  runner?: CommandRunner;
}

type PlainObject = Record<string, unknown>;

const LIST_FIELDS = "number,title,body,labels,milestone,state";
const LIST_LIMIT = "1000";
const ISSUE_URL_REGEX = /\/issues\/(\d+)/;
const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

const isPlainObject = (value: unknown): value is PlainObject =>
  value !== null && typeof value === "object" && !Array.isArray(value);

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { maxBuffer: MAX_OUTPUT_BYTES }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      if (typeof error.code !== "number") {
        reject(error);
        return;
      }
      resolve({ exitCode: error.code, stdout, stderr });
    });
  });

const labelNames = (value: unknown): string[] =>
  Array.isArray(value)
    ? value.flatMap((label) =>
        isPlainObject(label) && typeof label.name === "string" ? [label.name] : [],
      )
    : [];

const parseListedIssue = (value: unknown): RemoteRecord => {
  if (
    !isPlainObject(value) ||
    typeof value.number !== "number" ||
    typeof value.title !== "string"
  ) {
    throw new RemoteFailure("Unexpected gh issue list output", { operation: "list" });
  }
  const milestone =
    isPlainObject(value.milestone) && typeof value.milestone.title === "string"
      ? value.milestone.title
      : null;
  return {
    id: value.number,
    title: value.title,
    labels: labelNames(value.labels),
    milestone: milestone === "" ? null : milestone,
    body: typeof value.body === "string" ? value.body : "",
    state: typeof value.state === "string" && value.state.toUpperCase() === "CLOSED"
      ? "CLOSED"
      : "OPEN",
  };
};

const parseJson = (operation: RemoteOperation, text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown JSON error";
    throw new RemoteFailure(`Invalid JSON from gh: ${message}`, {
      operation,
      diagnostic: text,
    });
  }
};

/** Talks to GitHub through the `gh` command line tool. */
export class GitHubCliClient implements RemoteClient {
  private readonly repo: string | undefined;
  private readonly command: string;
  private readonly runner: CommandRunner;

  constructor(config: GitHubCliClientConfig = {}) {
    this.repo = config.repo;
    this.command = config.command ?? "gh";
    this.runner = config.runner ?? runCommand;
  }

  async list(): Promise<RemoteRecord[]> {
    const stdout = await this.run("list", [
      "issue",
      "list",
      "--state",
      "all",
      "--limit",
      LIST_LIMIT,
      "--json",
      LIST_FIELDS,
    ]);
    const parsed = parseJson("list", stdout.trim() === "" ? "[]" : stdout);
    if (!Array.isArray(parsed)) {
      throw new RemoteFailure("Unexpected gh issue list output", { operation: "list" });
    }
    return parsed.map(parseListedIssue);
  }

  async create(input: RemoteCreateInput): Promise<RemoteId | null> {
    const args = ["issue", "create", "--title", input.title, "--body", input.body];
    (input.labels ?? []).forEach((label) => {
      args.push("--label", label);
    });
    if (input.milestone) {
      args.push("--milestone", input.milestone);
    }
    const stdout = await this.run("create", args);
    const match = ISSUE_URL_REGEX.exec(stdout);
    return match ? Number(match[1]) : null;
  }

  async update(id: RemoteId, input: RemoteUpdateInput): Promise<void> {
    const args = ["issue", "edit", String(id)];
    if (input.body !== undefined) {
      args.push("--body", input.body);
    }
    if (input.labels !== undefined) {
      const current = await this.viewLabels(id);
      const desired = new Set(input.labels);
      input.labels
        .filter((label) => !current.has(label))
        .forEach((label) => args.push("--add-label", label));
      [...current]
        .filter((label) => !desired.has(label))
        .forEach((label) => args.push("--remove-label", label));
    }
    if (input.milestone === null) {
      args.push("--remove-milestone");
    } else if (input.milestone !== undefined) {
      args.push("--milestone", input.milestone);
    }
    if (args.length > 3) {
      await this.run("update", args);
    }
    if (input.state === "closed") {
      await this.close(id);
    } else if (input.state === "open") {
      await this.run("update", ["issue", "reopen", String(id)]);
    }
  }

  async close(id: RemoteId): Promise<void> {
    await this.run("close", ["issue", "close", String(id)]);
  }

  private async viewLabels(id: RemoteId): Promise<Set<string>> {
    const stdout = await this.run("update", ["issue", "view", String(id), "--json", "labels"]);
    const parsed = parseJson("update", stdout);
    return new Set(isPlainObject(parsed) ? labelNames(parsed.labels) : []);
  }

  private async run(operation: RemoteOperation, args: string[]): Promise<string> {
    const fullArgs = this.repo ? [...args, "--repo", this.repo] : args;
    let result: CommandResult;
    try {
      result = await this.runner(this.command, fullArgs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RemoteFailure(`Failed to run ${this.command}: ${message}`, {
        operation,
        diagnostic: message,
      });
    }
    if (result.exitCode !== 0) {
      const diagnostic = [result.stderr.trim(), result.stdout.trim()]
        .filter((part) => part !== "")
        .join("\n");
      throw new RemoteFailure(
        `${this.command} ${args[0]} ${args[1]} failed (exit ${result.exitCode})`,
        { operation, diagnostic },
      );
    }
    return result.stdout;
  }
}
