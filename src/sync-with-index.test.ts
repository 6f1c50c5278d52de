import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { RemoteFailure } from "./adapters.js";
import {
  computeSignature,
  createEmptyIndexDocument,
  loadIndexDocument,
  persistIndexDocument,
} from "./index-store.js";
import { createSilentLogger } from "./logger.js";
import { InMemoryRemoteClient } from "./memory-remote-client.js";
import { SpecParseError, parseSpecText } from "./spec-parser.js";
import { SyncEngine } from "./sync-engine.js";
import type { SyncWithIndexOptions } from "./sync-with-index.js";
import { syncWithIndex } from "./sync-with-index.js";

const FIXED_TIME = "2026-03-04T05:06:07.000Z";

const SPEC = [
  "## [slug: alpha]",
  "",
  "```yaml",
  "title: Alpha",
  "labels: [x]",
  "body: First",
  "```",
  "",
  "## [slug: beta]",
  "",
  "```yaml",
  "title: Beta",
  "body: Second",
  "```",
  "",
].join("\n");

describe("syncWithIndex", () => {
  let tempDir: string;
  let specPath: string;
  let indexPath: string;
  let summaryPath: string;
  let remote: InMemoryRemoteClient;
  let engine: SyncEngine;

  const run = (overrides: Partial<SyncWithIndexOptions> = {}) =>
    syncWithIndex(engine, {
      specPath,
      indexPath,
      summaryPath,
      repo: "octo/repo",
      time: () => FIXED_TIME,
      warn: () => undefined,
      ...overrides,
    });

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "issuemark-sync-"));
    specPath = path.join(tempDir, "spec.md");
    indexPath = path.join(tempDir, ".issuemark", "index.json");
    summaryPath = path.join(tempDir, "out", "summary.json");
    await writeFile(specPath, SPEC, "utf8");
    remote = new InMemoryRemoteClient();
    engine = new SyncEngine({ remote, logger: createSilentLogger() });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("creates issues and records them in the signed index", async () => {
    const [alpha, beta] = parseSpecText(SPEC);

    const { summary, artifact, index } = await run();

    expect(summary.mapping).toEqual({ alpha: 1, beta: 2 });
    expect(index.entries).toEqual({
      alpha: { issue: 1, hash: alpha.fingerprint },
      beta: { issue: 2, hash: beta.fingerprint },
    });
    expect(index.repo).toBe("octo/repo");
    expect(artifact).toMatchObject({
      schemaVersion: 1,
      generated_at: FIXED_TIME,
      dry_run: false,
      totals: { specs: 2, created: 2, updated: 0, closed: 0, skipped: 0 },
      mapping_size: 2,
      mapping_signature: computeSignature(index.entries),
    });
    expect(JSON.parse(await readFile(summaryPath, "utf8"))).toEqual(artifact);
    const reloaded = await loadIndexDocument(indexPath);
    expect(reloaded.entries).toEqual(index.entries);
  });

  it("skips unchanged items on the next run", async () => {
    await run();

    const { summary } = await run();

    expect(summary.totals).toMatchObject({ created: 0, skipped: 2 });
    expect(summary.results.map((result) => result.reason)).toEqual([
      "unchanged since last sync",
      "unchanged since last sync",
    ]);
    expect(remote.calls.filter((call) => call.operation === "create")).toHaveLength(2);
  });

  it("keeps a failed item out of the index and retries it next run", async () => {
    remote.failNext(
      "create",
      new RemoteFailure("GitHub API error (422)", { operation: "create", status: 422 }),
    );

    const { index } = await run();

    expect(index.entries.alpha).toBeUndefined();
    expect(index.entries.beta).toEqual({ issue: 1, hash: parseSpecText(SPEC)[1].fingerprint });
    expect(JSON.parse(await readFile(summaryPath, "utf8"))).toMatchObject({
      totals: { created: 1, skipped: 1 },
      errors: [
        {
          external_id: "alpha",
          number: null,
          operation: "create",
          message: "GitHub API error (422)",
        },
      ],
    });

    const retried = await run();

    expect(retried.summary.results.map((result) => [result.slug, result.action])).toEqual([
      ["alpha", "create"],
      ["beta", "skip"],
    ]);
    expect(retried.summary.errors).toEqual([]);
    expect(retried.index.entries.alpha).toEqual({
      issue: 2,
      hash: parseSpecText(SPEC)[0].fingerprint,
    });
  });

  it("keeps the stored hash when updates are disabled", async () => {
    const [alpha] = parseSpecText(SPEC);
    await run();
    await writeFile(specPath, SPEC.replace("labels: [x]", "labels: [x, y]"), "utf8");

    const { summary, index } = await run({ update: false });

    expect(summary.results[0]).toMatchObject({
      slug: "alpha",
      action: "skip",
      reason: "updates disabled",
      settled: false,
    });
    expect(index.entries.alpha).toEqual({ issue: 1, hash: alpha.fingerprint });
  });

  it("leaves the index untouched in dry-run", async () => {
    const { artifact } = await run({ dryRun: true });

    expect(artifact.dry_run).toBe(true);
    expect(artifact.plan?.map((entry) => entry.action)).toEqual(["create", "create"]);
    await expect(access(indexPath)).rejects.toThrow();
    expect(remote.records).toEqual([]);
  });

  it("writes nothing when the spec does not parse", async () => {
    await writeFile(specPath, "## [slug: alpha]\n\nno fence here\n", "utf8");

    await expect(run()).rejects.toBeInstanceOf(SpecParseError);

    expect(remote.calls).toEqual([]);
    await expect(access(indexPath)).rejects.toThrow();
    await expect(access(summaryPath)).rejects.toThrow();
  });

  it("drops index entries for slugs no longer in the spec", async () => {
    await persistIndexDocument(indexPath, {
      ...createEmptyIndexDocument("octo/repo"),
      entries: { gone: { issue: 9, hash: "0000000000000000" } },
    });

    const { index } = await run();

    expect(Object.keys(index.entries).sort()).toEqual(["alpha", "beta"]);
  });
});
