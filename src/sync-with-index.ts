import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { IsoTimestamp, RemoteId } from "./adapters.js";
import type { IndexDocument } from "./index-store.js";
import {
  loadIndexDocument,
  mergeRunIntoIndex,
  persistIndexDocument,
  priorFingerprints,
  pruneIndexEntries,
} from "./index-store.js";
import { MarkdownSpecSource } from "./spec-parser.js";
import type {
  PlanEntry,
  RunError,
  RunSummary,
  RunTotals,
  SyncEngine,
  SyncOptions,
} from "./sync-engine.js";

export const SUMMARY_SCHEMA_VERSION = 1;

export interface SyncWithIndexOptions extends Omit<SyncOptions, "priorFingerprints"> {
  specPath: string;
  indexPath: string;
  indexMirror?: string;
  summaryPath?: string;
  repo?: string | null;
  warn?: (message: string) => void;
  time?: () => IsoTimestamp;
  specSource?: MarkdownSpecSource;
}

export interface SummaryArtifact {
  schemaVersion: number;
  generated_at: IsoTimestamp;
  dry_run: boolean;
  totals: RunTotals;
  changes: RunSummary["changes"];
  mapping: Record<string, RemoteId>;
  errors: RunError[];
  warnings: string[];
  pruned: RemoteId[];
  plan?: PlanEntry[];
  mapping_size: number;
  mapping_signature: string;
}

export interface SyncWithIndexResult {
  summary: RunSummary;
  artifact: SummaryArtifact;
  index: IndexDocument;
}

const settledFingerprints = (summary: RunSummary): Record<string, string> => {
  const fingerprints: Record<string, string> = {};
  summary.results.forEach((result) => {
    if (result.settled && result.number !== null) {
      fingerprints[result.slug] = result.fingerprint;
    }
  });
  return fingerprints;
};

export const buildSummaryArtifact = (
  summary: RunSummary,
  index: IndexDocument,
  generatedAt: IsoTimestamp,
): SummaryArtifact => {
  const artifact: SummaryArtifact = {
    schemaVersion: SUMMARY_SCHEMA_VERSION,
    generated_at: generatedAt,
    dry_run: summary.dryRun,
    totals: summary.totals,
    changes: summary.changes,
    mapping: summary.mapping,
    errors: summary.errors,
    warnings: summary.warnings,
    pruned: summary.pruned,
    mapping_size: Object.keys(index.entries).length,
    mapping_signature: index.signature,
  };
  if (summary.plan) {
    artifact.plan = summary.plan;
  }
  return artifact;
};

/**
 * Parses the spec file, syncs it against the remote, and folds the result
 * into the local index. Parse and precondition failures write nothing.
 */
export const syncWithIndex = async (
  engine: SyncEngine,
  options: SyncWithIndexOptions,
): Promise<SyncWithIndexResult> => {
  const {
    specPath,
    indexPath,
    indexMirror,
    summaryPath,
    repo,
    warn,
    time = () => new Date().toISOString(),
    specSource = new MarkdownSpecSource(),
    ...syncOptions
  } = options;
  const logger = engine.logger;
  const dryRun = syncOptions.dryRun ?? false;

  const items = await specSource.readItems(specPath);
  const prior = await loadIndexDocument(indexPath, { warn, logger });

  const summary = await engine.sync(items, {
    ...syncOptions,
    priorFingerprints: priorFingerprints(prior),
  });

  const merged = mergeRunIntoIndex(prior, summary.mapping, settledFingerprints(summary));
  const { document: pruned, removed } = pruneIndexEntries(
    merged,
    items.map((item) => item.slug),
  );
  if (removed.length > 0) {
    logger.info("Pruned stale index entries", { slugs: removed });
  }

  let index: IndexDocument = { ...pruned, repo: repo ?? prior.repo };
  if (!dryRun) {
    index = await persistIndexDocument(indexPath, index, {
      mirror: indexMirror,
      time,
    });
    logger.debug("Index persisted", { indexPath, entries: Object.keys(index.entries).length });
  }

  const artifact = buildSummaryArtifact(summary, index, time());
  if (summaryPath) {
    await mkdir(path.dirname(summaryPath), { recursive: true });
    await writeFile(summaryPath, `${JSON.stringify(artifact, null, 2)}\n`, "utf8");
  }
  return { summary, artifact, index };
};
