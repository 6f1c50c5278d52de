import { describe, expect, it, vi } from "vitest";

import type { RemoteRecord, SpecItem } from "./adapters.js";
import { RemoteFailure } from "./adapters.js";
import { matchRecord } from "./diff-engine.js";
import type { LogData, Logger } from "./logger.js";
import { InMemoryRemoteClient } from "./memory-remote-client.js";
import { createItemFingerprint } from "./spec-parser.js";
import { ensureSlugMarker } from "./slug-marker.js";
import { PreconditionError, SyncEngine, decideAction } from "./sync-engine.js";

const makeItem = (
  slug: string,
  overrides: Partial<Omit<SpecItem, "fingerprint" | "slug">> = {},
): SpecItem => {
  const fields = {
    slug,
    title: slug.charAt(0).toUpperCase() + slug.slice(1),
    labels: [],
    milestone: null,
    status: null,
    ...overrides,
    body: ensureSlugMarker(overrides.body ?? "B\n", slug),
  };
  return { ...fields, fingerprint: createItemFingerprint(fields) };
};

const recordFor = (
  item: SpecItem,
  id: number,
  overrides: Partial<RemoteRecord> = {},
): RemoteRecord => ({
  id,
  title: item.title,
  labels: [...item.labels],
  milestone: item.milestone,
  body: item.body,
  state: "OPEN",
  ...overrides,
});

interface CapturedLog {
  level: string;
  message: string;
  data?: LogData;
}

const createCapturingLogger = (entries: CapturedLog[]): Logger => {
  const logger: Logger = {
    level: "debug",
    format: "text",
    debug: (message, data) => entries.push({ level: "debug", message, data }),
    info: (message, data) => entries.push({ level: "info", message, data }),
    warn: (message, data) => entries.push({ level: "warn", message, data }),
    error: (message, data) => entries.push({ level: "error", message, data }),
    child: () => logger,
  };
  return logger;
};

const instantRetry = { sleep: vi.fn(async (_delayMs: number) => undefined), random: () => 0 };

describe("decideAction", () => {
  it("creates when nothing matches", () => {
    const item = makeItem("alpha");

    expect(decideAction(item, matchRecord(item, []), null).action).toBe("create");
  });

  it("closes an open record when the item is closed", () => {
    const beta = makeItem("beta", { status: "closed" });
    const record = recordFor(beta, 4);

    const decision = decideAction(beta, matchRecord(beta, [record]), null, {
      update: true,
      respectStatus: true,
    });

    expect(decision.action).toBe("close");
    expect(decision.record?.id).toBe(4);
  });

  it("ignores status when respectStatus is off", () => {
    const beta = makeItem("beta", { status: "closed" });
    const record = recordFor(beta, 4);

    const decision = decideAction(beta, matchRecord(beta, [record]), null, {
      update: true,
      respectStatus: false,
    });

    expect(decision).toMatchObject({ action: "skip", reason: "in sync" });
  });

  it("skips differing records when updates are disabled", () => {
    const item = makeItem("alpha", { labels: ["x"] });
    const record = recordFor(item, 1, { labels: [] });

    const decision = decideAction(item, matchRecord(item, [record]), null, {
      update: false,
      respectStatus: true,
    });

    expect(decision).toMatchObject({ action: "skip", reason: "updates disabled", settles: false });
  });

  it("trusts the prior fingerprint", () => {
    const item = makeItem("alpha", { labels: ["x"] });
    const record = recordFor(item, 1, { labels: [] });

    const decision = decideAction(item, matchRecord(item, [record]), item.fingerprint);

    expect(decision).toMatchObject({ action: "skip", reason: "unchanged since last sync" });
  });
});

describe("SyncEngine.plan", () => {
  it("plans a create for a new item", () => {
    const engine = new SyncEngine({ remote: new InMemoryRemoteClient() });
    const alpha = makeItem("alpha", { title: "Alpha", labels: ["x"], body: "B" });

    const plan = engine.plan([alpha], []);

    expect(plan).toEqual([
      {
        external_id: "alpha",
        title: "Alpha",
        action: "create",
        number: null,
        labels: ["x"],
        milestone: null,
        reason: "no matching issue",
      },
    ]);
  });

  it("summarizes update changes", () => {
    const engine = new SyncEngine({ remote: new InMemoryRemoteClient() });
    const alpha = makeItem("alpha", { labels: ["x", "y"] });

    const [entry] = engine.plan([alpha], [recordFor(alpha, 9, { labels: ["x"] })]);

    expect(entry).toMatchObject({
      action: "update",
      number: 9,
      changes: {
        labelsAdded: 1,
        labelsRemoved: 0,
        milestoneChanged: false,
        bodyChanged: false,
      },
    });
  });
});

describe("SyncEngine.sync", () => {
  it("creates, updates, closes and skips in one run", async () => {
    const alpha = makeItem("alpha", { labels: ["x"] });
    const beta = makeItem("beta", { status: "closed" });
    const gamma = makeItem("gamma", { labels: ["new"] });
    const delta = makeItem("delta");
    const remote = new InMemoryRemoteClient({
      records: [
        recordFor(beta, 1),
        recordFor(gamma, 2, { labels: ["old"] }),
        recordFor(delta, 3),
      ],
    });
    const engine = new SyncEngine({ remote, retry: instantRetry });

    const summary = await engine.sync([alpha, beta, gamma, delta]);

    expect(summary.totals).toEqual({
      specs: 4,
      created: 1,
      updated: 1,
      closed: 1,
      skipped: 1,
    });
    expect(summary.mapping).toEqual({ alpha: 4, beta: 1, gamma: 2, delta: 3 });
    expect(summary.changes.created).toEqual([
      { external_id: "alpha", title: "Alpha", hash: alpha.fingerprint, number: 4 },
    ]);
    expect(summary.changes.closed).toEqual([{ external_id: "beta", number: 1 }]);
    expect(summary.changes.updated[0]).toMatchObject({
      external_id: "gamma",
      number: 2,
      diff: { labelsAdded: ["new"], labelsRemoved: ["old"], bodyChanged: false },
    });
    expect(remote.calls.find((call) => call.operation === "update")).toEqual({
      operation: "update",
      id: 2,
      input: { labels: ["new"] },
    });
    expect(remote.records.find((record) => record.id === 1)?.state).toBe("CLOSED");
    expect(summary.plan).toBeUndefined();
  });

  it("records the plan without mutating in dry-run", async () => {
    const remote = new InMemoryRemoteClient();
    const logs: CapturedLog[] = [];
    const engine = new SyncEngine({ remote, logger: createCapturingLogger(logs) });
    const alpha = makeItem("alpha", { title: "Alpha", labels: ["x"], body: "B" });

    const summary = await engine.sync([alpha], { dryRun: true });

    expect(remote.calls.map((call) => call.operation)).toEqual(["list"]);
    expect(summary.totals.created).toBe(1);
    expect(summary.mapping).toEqual({});
    expect(summary.plan?.map((entry) => [entry.external_id, entry.action])).toEqual([
      ["alpha", "create"],
    ]);
    expect(logs).toContainEqual({
      level: "info",
      message: "Sync action",
      data: { slug: "alpha", action: "create", dryRun: true, number: null },
    });
  });

  it("fails before any remote call when a required milestone is missing", async () => {
    const remote = new InMemoryRemoteClient();
    const engine = new SyncEngine({ remote });
    const items = ["a", "b", "c", "d", "e", "f"].map((slug) => makeItem(slug));

    const run = engine.sync(items, { milestoneRequired: true });

    await expect(run).rejects.toBeInstanceOf(PreconditionError);
    await expect(run).rejects.toThrow(
      "Milestone required but missing for 6 spec(s): a, b, c, d, e, …",
    );
    expect(remote.calls).toEqual([]);
  });

  it("isolates a failing item and keeps going", async () => {
    const remote = new InMemoryRemoteClient();
    remote.failNext(
      "create",
      new RemoteFailure("GitHub API error (422)", { operation: "create", status: 422 }),
    );
    const engine = new SyncEngine({ remote, retry: instantRetry });

    const summary = await engine.sync([makeItem("alpha"), makeItem("beta")]);

    expect(summary.totals).toMatchObject({ created: 1, skipped: 1 });
    expect(summary.errors).toEqual([
      {
        external_id: "alpha",
        number: null,
        operation: "create",
        message: "GitHub API error (422)",
      },
    ]);
    expect(summary.mapping).toEqual({ beta: 1 });
    expect(summary.results[0]).toMatchObject({ slug: "alpha", settled: false });
  });

  it("retries transient failures through the wrapper", async () => {
    const remote = new InMemoryRemoteClient();
    remote.failNext("create", new Error("API rate limit exceeded"));
    const sleep = vi.fn(async (_delayMs: number) => undefined);
    const engine = new SyncEngine({
      remote,
      retry: { sleep, random: () => 0, baseDelayMs: 10 },
    });

    const summary = await engine.sync([makeItem("alpha")]);

    expect(summary.totals.created).toBe(1);
    expect(sleep).toHaveBeenCalledWith(10);
    expect(remote.calls.filter((call) => call.operation === "create")).toHaveLength(2);
  });

  it("prunes open records no item refers to", async () => {
    const alpha = makeItem("alpha");
    const remote = new InMemoryRemoteClient({
      records: [
        recordFor(alpha, 1),
        { id: 2, title: "Stray", labels: [], milestone: null, body: "", state: "OPEN" },
        { id: 3, title: "Done", labels: [], milestone: null, body: "", state: "CLOSED" },
      ],
    });
    const engine = new SyncEngine({ remote });

    const summary = await engine.sync([alpha], { prune: true });

    expect(summary.pruned).toEqual([2]);
    expect(remote.calls.filter((call) => call.operation === "close")).toEqual([
      { operation: "close", id: 2 },
    ]);
  });

  it("does not prune in dry-run", async () => {
    const remote = new InMemoryRemoteClient({
      records: [{ id: 2, title: "Stray", labels: [], milestone: null, body: "", state: "OPEN" }],
    });
    const engine = new SyncEngine({ remote });

    const summary = await engine.sync([makeItem("alpha")], { prune: true, dryRun: true });

    expect(summary.pruned).toEqual([]);
    expect(remote.records[0].state).toBe("OPEN");
  });

  it("warns when several records match one item", async () => {
    const alpha = makeItem("alpha");
    const remote = new InMemoryRemoteClient({
      records: [recordFor(alpha, 7), recordFor(alpha, 8)],
    });
    const engine = new SyncEngine({ remote });

    const summary = await engine.sync([alpha]);

    expect(summary.warnings).toEqual([
      "Multiple issues match slug alpha by title: #7, #8; using #7",
    ]);
    expect(summary.mapping).toEqual({ alpha: 7 });
  });

  it("runs the concurrent dispatcher for large runs", async () => {
    const items = Array.from({ length: 12 }, (_, index) => makeItem(`item-${index}`));
    const remote = new InMemoryRemoteClient();
    const engine = new SyncEngine({
      remote,
      dispatcher: {
        enabled: true,
        maxWorkers: 2,
        batchSize: 5,
        threshold: 10,
        batchPauseMs: 0,
      },
    });

    const summary = await engine.sync(items);

    expect(summary.totals.created).toBe(12);
    expect(summary.changes.created.map((entry) => entry.external_id)).toEqual(
      items.map((item) => item.slug),
    );
    expect(new Set(Object.values(summary.mapping)).size).toBe(12);
  });
});
