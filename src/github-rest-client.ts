import type {
  RemoteClient,
  RemoteCreateInput,
  RemoteId,
  RemoteOperation,
  RemoteRecord,
  RemoteUpdateInput,
} from "./adapters.js";
import { RemoteFailure } from "./adapters.js";

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body?: string },
) => Promise<Response>;

export interface GitHubRestClientConfig {
  repo: string;
  token: string;
  apiUrl?: string;
  fetch?: FetchLike;
}

type PlainObject = Record<string, unknown>;
type JsonBody = Record<string, unknown>;

const DEFAULT_API_URL = "https://api.github.com";
const PAGE_SIZE = 100;

const isPlainObject = (value: unknown): value is PlainObject =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const unexpected = (operation: RemoteOperation, detail: string): RemoteFailure =>
  new RemoteFailure(`Unexpected GitHub response: ${detail}`, { operation });

const parseLabelName = (value: unknown): string | null => {
  if (typeof value === "string") {
    return value;
  }
  if (isPlainObject(value) && typeof value.name === "string") {
    return value.name;
  }
  return null;
};

/** Null for pull requests, which share the issues endpoint. */
const parseIssue = (value: unknown): RemoteRecord | null => {
  if (!isPlainObject(value)) {
    throw unexpected("list", "issue must be an object");
  }
  if (value.pull_request !== undefined) {
    return null;
  }
  if (typeof value.number !== "number" || typeof value.title !== "string") {
    throw unexpected("list", "issue is missing number or title");
  }
  const labels = Array.isArray(value.labels)
    ? value.labels
        .map(parseLabelName)
        .filter((label): label is string => label !== null)
    : [];
  const milestone =
    isPlainObject(value.milestone) && typeof value.milestone.title === "string"
      ? value.milestone.title
      : null;
  return {
    id: value.number,
    title: value.title,
    labels,
    milestone,
    body: typeof value.body === "string" ? value.body : "",
    state: value.state === "closed" ? "CLOSED" : "OPEN",
  };
};

const describeNetworkError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
  const code =
    error.cause instanceof Error && "code" in error.cause
      ? ` (${String(error.cause.code)})`
      : "";
  return `${error.message}${cause}${code}`;
};

export class GitHubRestClient implements RemoteClient {
  private readonly repo: string;
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly fetch: FetchLike;
  private milestones: Map<string, number> | null = null;

  constructor(config: GitHubRestClientConfig) {
    this.repo = config.repo;
    this.token = config.token;
    this.apiUrl = (config.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.fetch = config.fetch ?? fetch;
  }

  async list(): Promise<RemoteRecord[]> {
    const records: RemoteRecord[] = [];
    for (let page = 1; ; page += 1) {
      const batch = await this.request("list", "GET", `issues`, undefined, {
        state: "all",
        per_page: String(PAGE_SIZE),
        page: String(page),
      });
      if (!Array.isArray(batch)) {
        throw unexpected("list", "issue list must be an array");
      }
      batch.forEach((entry) => {
        const record = parseIssue(entry);
        if (record) {
          records.push(record);
        }
      });
      if (batch.length < PAGE_SIZE) {
        return records;
      }
    }
  }

  async create(input: RemoteCreateInput): Promise<RemoteId | null> {
    const payload: JsonBody = { title: input.title, body: input.body };
    if (input.labels && input.labels.length > 0) {
      payload.labels = input.labels;
    }
    if (input.milestone) {
      payload.milestone = await this.resolveMilestone("create", input.milestone);
    }
    const created = await this.request("create", "POST", "issues", payload);
    if (!isPlainObject(created) || typeof created.number !== "number") {
      throw unexpected("create", "created issue has no number");
    }
    return created.number;
  }

  async update(id: RemoteId, input: RemoteUpdateInput): Promise<void> {
    const payload: JsonBody = {};
    if (input.body !== undefined) {
      payload.body = input.body;
    }
    if (input.labels !== undefined) {
      payload.labels = input.labels;
    }
    if (input.milestone !== undefined) {
      payload.milestone = input.milestone === null
        ? null
        : await this.resolveMilestone("update", input.milestone);
    }
    if (input.state !== undefined) {
      payload.state = input.state;
    }
    if (Object.keys(payload).length === 0) {
      return;
    }
    await this.request("update", "PATCH", `issues/${id}`, payload);
  }

  async close(id: RemoteId): Promise<void> {
    await this.request("close", "PATCH", `issues/${id}`, { state: "closed" });
  }

  private async resolveMilestone(
    operation: RemoteOperation,
    title: string,
  ): Promise<number> {
    if (!this.milestones) {
      const listed = await this.request(operation, "GET", "milestones", undefined, {
        state: "all",
        per_page: String(PAGE_SIZE),
      });
      if (!Array.isArray(listed)) {
        throw unexpected(operation, "milestone list must be an array");
      }
      const milestones = new Map<string, number>();
      listed.forEach((entry) => {
        if (
          isPlainObject(entry) &&
          typeof entry.title === "string" &&
          typeof entry.number === "number"
        ) {
          milestones.set(entry.title.toLowerCase(), entry.number);
        }
      });
      this.milestones = milestones;
    }
    const number = this.milestones.get(title.toLowerCase());
    if (number === undefined) {
      throw new RemoteFailure(`Milestone '${title}' not found in ${this.repo}`, {
        operation,
      });
    }
    return number;
  }

  private async request(
    operation: RemoteOperation,
    method: string,
    resource: string,
    payload?: JsonBody,
    query?: Record<string, string>,
  ): Promise<unknown> {
    const url = new URL(`${this.apiUrl}/repos/${this.repo}/${resource}`);
    if (query) {
      url.search = new URLSearchParams(query).toString();
    }
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${this.token}`,
      "X-GitHub-Api-Version": "2022-11-28",
    };
    const init: Parameters<FetchLike>[1] = { method, headers };
    if (payload) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(payload);
    }

    let response: Response;
    try {
      response = await this.fetch(url.toString(), init);
    } catch (error) {
      const detail = describeNetworkError(error);
      throw new RemoteFailure(`GitHub request failed: ${detail}`, {
        operation,
        diagnostic: detail,
      });
    }

    if (!response.ok) {
      const status = response.status;
      let detail = "";
      try {
        detail = (await response.text()).trim();
      } catch {
        detail = "";
      }
      const retryAfter = response.headers.get("retry-after");
      const diagnostic = [
        `HTTP ${status}${detail ? `: ${detail}` : ""}`,
        ...(retryAfter ? [`Retry-After: ${retryAfter}`] : []),
      ].join("\n");
      const message = status === 401
        ? "Invalid GitHub token"
        : `GitHub API error (${status})${detail ? `: ${detail}` : ""}`;
      throw new RemoteFailure(message, { operation, diagnostic, status });
    }

    if (response.status === 204) {
      return undefined;
    }
    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("json")) {
      return undefined;
    }
    return response.json();
  }
}
