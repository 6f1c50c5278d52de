import type {
  RemoteClient,
  RemoteId,
  RemoteOperation,
  RemoteRecord,
  RemoteUpdateInput,
  SpecItem,
} from "./adapters.js";
import type { ChangeCounts, ChangeSet, MatchResult } from "./diff-engine.js";
import {
  computeChangeSet,
  matchRecord,
  needsUpdate,
  summarizeChangeSet,
  truncateDiffLines,
} from "./diff-engine.js";
import type { DispatchOptions } from "./dispatcher.js";
import { dispatchItems, SEQUENTIAL_DISPATCH } from "./dispatcher.js";
import type { Logger } from "./logger.js";
import { createSilentLogger } from "./logger.js";
import type { RetryOptions } from "./retry.js";
import { withRetry } from "./retry.js";

export type SyncAction = "create" | "update" | "close" | "skip";

export interface SyncBehavior {
  update: boolean;
  respectStatus: boolean;
}

export interface SyncOptions extends Partial<SyncBehavior> {
  dryRun?: boolean;
  prune?: boolean;
  milestoneRequired?: boolean;
  priorFingerprints?: ReadonlyMap<string, string>;
  /** Caps the body diff kept in the summary; the engine default applies otherwise. */
  truncateBodyDiff?: number;
}

export interface SyncEngineOptions {
  remote: RemoteClient;
  logger?: Logger;
  retry?: RetryOptions;
  dispatcher?: DispatchOptions;
}

export interface ActionDecision {
  action: SyncAction;
  reason: string;
  record: RemoteRecord | null;
  changes?: ChangeSet;
  /** True when the remote matches the item once the action succeeds. */
  settles: boolean;
}

export interface PlanEntry {
  external_id: string;
  title: string;
  action: SyncAction;
  number: RemoteId | null;
  labels: string[];
  milestone: string | null;
  reason: string;
  changes?: ChangeCounts;
}

export interface ItemResult {
  slug: string;
  title: string;
  action: SyncAction;
  number: RemoteId | null;
  reason: string;
  fingerprint: string;
  settled: boolean;
  changes?: ChangeSet;
  error?: string;
}

export interface RunTotals {
  specs: number;
  created: number;
  updated: number;
  closed: number;
  skipped: number;
}

export interface CreatedChange {
  external_id: string;
  title: string;
  hash: string;
  number: RemoteId | null;
}

export interface UpdatedChange {
  external_id: string;
  number: RemoteId;
  diff: ChangeSet;
}

export interface ClosedChange {
  external_id: string;
  number: RemoteId;
}

export interface RunError {
  external_id: string | null;
  number: RemoteId | null;
  operation: RemoteOperation | "prune";
  message: string;
}

export interface RunSummary {
  dryRun: boolean;
  totals: RunTotals;
  changes: {
    created: CreatedChange[];
    updated: UpdatedChange[];
    closed: ClosedChange[];
  };
  mapping: Record<string, RemoteId>;
  errors: RunError[];
  warnings: string[];
  pruned: RemoteId[];
  plan?: PlanEntry[];
  results: ItemResult[];
}

interface PlannedItem {
  item: SpecItem;
  match: MatchResult;
  decision: ActionDecision;
}

export class PreconditionError extends Error {
  readonly slugs: string[];

  constructor(message: string, slugs: string[]) {
    super(message);
    this.name = "PreconditionError";
    this.slugs = slugs;
  }
}

const DEFAULT_BEHAVIOR: SyncBehavior = { update: true, respectStatus: true };
const MISSING_MILESTONE_PREVIEW = 5;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const sameLabels = (changes: ChangeSet): boolean =>
  changes.labelsAdded.length === 0 && changes.labelsRemoved.length === 0;

export const assertMilestones = (items: SpecItem[]): void => {
  const missing = items
    .filter((item) => item.milestone === null)
    .map((item) => item.slug);
  if (missing.length === 0) {
    return;
  }
  const preview = missing.slice(0, MISSING_MILESTONE_PREVIEW).join(", ");
  const suffix = missing.length > MISSING_MILESTONE_PREVIEW ? ", …" : "";
  throw new PreconditionError(
    `Milestone required but missing for ${missing.length} spec(s): ${preview}${suffix}`,
    missing,
  );
};

/** Fixed-order state machine: create, close, update, skip. */
export const decideAction = (
  item: SpecItem,
  match: MatchResult,
  priorFingerprint: string | null | undefined,
  behavior: SyncBehavior = DEFAULT_BEHAVIOR,
): ActionDecision => {
  const record = match.record;
  if (!record) {
    return { action: "create", reason: "no matching issue", record: null, settles: true };
  }
  if (behavior.respectStatus && item.status === "closed" && record.state !== "CLOSED") {
    return { action: "close", reason: "closed in spec", record, settles: true };
  }
  const changed = needsUpdate(item, record, priorFingerprint);
  if (behavior.update && changed) {
    return {
      action: "update",
      reason: "content differs",
      record,
      changes: computeChangeSet(item, record),
      settles: true,
    };
  }
  if (changed) {
    return { action: "skip", reason: "updates disabled", record, settles: false };
  }
  const unchanged = Boolean(priorFingerprint) && priorFingerprint === item.fingerprint;
  return {
    action: "skip",
    reason: unchanged ? "unchanged since last sync" : "in sync",
    record,
    settles: true,
  };
};

const toPlanEntry = ({ item, decision }: PlannedItem): PlanEntry => {
  const entry: PlanEntry = {
    external_id: item.slug,
    title: item.title,
    action: decision.action,
    number: decision.record?.id ?? null,
    labels: [...item.labels],
    milestone: item.milestone,
    reason: decision.reason,
  };
  if (decision.changes) {
    entry.changes = summarizeChangeSet(decision.changes);
  }
  return entry;
};

const buildUpdateInput = (item: SpecItem, changes: ChangeSet): RemoteUpdateInput => {
  const input: RemoteUpdateInput = {};
  if (changes.bodyChanged) {
    input.body = item.body;
  }
  if (!sameLabels(changes)) {
    input.labels = [...item.labels];
  }
  if (changes.milestoneTo !== undefined) {
    input.milestone = item.milestone;
  }
  return input;
};

export class SyncEngine {
  readonly remote: RemoteClient;
  readonly logger: Logger;
  private readonly retry: RetryOptions;
  private readonly dispatcher: DispatchOptions;

  constructor(options: SyncEngineOptions) {
    this.remote = options.remote;
    this.logger = options.logger ?? createSilentLogger();
    this.retry = options.retry ?? {};
    this.dispatcher = options.dispatcher ?? SEQUENTIAL_DISPATCH;
  }

  /** Decisions for every item without touching the remote. */
  plan(
    items: SpecItem[],
    records: RemoteRecord[],
    priorFingerprints: ReadonlyMap<string, string> = new Map(),
    behavior: Partial<SyncBehavior> = {},
  ): PlanEntry[] {
    return this.decideAll(items, records, priorFingerprints, behavior, []).map(
      toPlanEntry,
    );
  }

  async sync(items: SpecItem[], options: SyncOptions = {}): Promise<RunSummary> {
    const dryRun = options.dryRun ?? false;
    if (options.milestoneRequired) {
      assertMilestones(items);
    }

    const records = await this.callRemote("list", () => this.remote.list());
    this.logger.debug("Fetched remote issues", { count: records.length });

    const warnings: string[] = [];
    const planned = this.decideAll(
      items,
      records,
      options.priorFingerprints ?? new Map(),
      options,
      warnings,
    );

    const outcomes = await dispatchItems(
      planned,
      (entry) => this.applyDecision(entry, dryRun),
      this.dispatcher,
    );

    const results = outcomes.map((outcome): ItemResult => {
      if (outcome.status === "ok") {
        return outcome.value;
      }
      const { item, decision } = outcome.item;
      const message = describeError(outcome.error);
      this.logger.error("Sync action failed", {
        slug: item.slug,
        action: decision.action,
        error: message,
      });
      return {
        slug: item.slug,
        title: item.title,
        action: decision.action,
        number: decision.record?.id ?? null,
        reason: decision.reason,
        fingerprint: item.fingerprint,
        settled: false,
        error: message,
      };
    });

    const errors: RunError[] = results
      .filter((result) => result.error !== undefined)
      .map((result) => ({
        external_id: result.slug,
        number: result.number,
        operation: result.action === "skip" ? "list" : result.action,
        message: result.error ?? "",
      }));

    const pruned: RemoteId[] = [];
    if (options.prune && !dryRun) {
      const referenced = new Set<RemoteId>();
      planned.forEach(({ decision }) => {
        if (decision.record) {
          referenced.add(decision.record.id);
        }
      });
      results.forEach((result) => {
        if (result.number !== null) {
          referenced.add(result.number);
        }
      });
      for (const record of records) {
        if (record.state !== "OPEN" || referenced.has(record.id)) {
          continue;
        }
        this.logger.info("Sync action", {
          slug: null,
          action: "prune",
          dryRun,
          number: record.id,
        });
        try {
          await this.callRemote("close", () => this.remote.close(record.id));
          pruned.push(record.id);
        } catch (error) {
          const message = describeError(error);
          this.logger.error("Prune failed", { number: record.id, error: message });
          errors.push({
            external_id: null,
            number: record.id,
            operation: "prune",
            message,
          });
        }
      }
    }

    const summary = this.summarize(results, {
      dryRun,
      errors,
      warnings,
      pruned,
      truncateBodyDiff: options.truncateBodyDiff,
    });
    if (dryRun) {
      summary.plan = planned.map(toPlanEntry);
    }
    return summary;
  }

  private decideAll(
    items: SpecItem[],
    records: RemoteRecord[],
    priorFingerprints: ReadonlyMap<string, string>,
    behavior: Partial<SyncBehavior>,
    warnings: string[],
  ): PlannedItem[] {
    const resolved: SyncBehavior = {
      update: behavior.update ?? DEFAULT_BEHAVIOR.update,
      respectStatus: behavior.respectStatus ?? DEFAULT_BEHAVIOR.respectStatus,
    };
    return items.map((item) => {
      const match = matchRecord(item, records);
      if (match.ambiguous && match.record) {
        const warning =
          `Multiple issues match slug ${item.slug} by ${match.strategy ?? "title"}: ` +
          `${match.candidates.map((id) => `#${id}`).join(", ")}; using #${match.record.id}`;
        this.logger.warn(warning, { slug: item.slug, candidates: match.candidates });
        warnings.push(warning);
      }
      const decision = decideAction(
        item,
        match,
        priorFingerprints.get(item.slug),
        resolved,
      );
      this.logger.debug("Sync decision", {
        slug: item.slug,
        action: decision.action,
        reason: decision.reason,
      });
      return { item, match, decision };
    });
  }

  private async applyDecision(
    { item, decision }: PlannedItem,
    dryRun: boolean,
  ): Promise<ItemResult> {
    const result: ItemResult = {
      slug: item.slug,
      title: item.title,
      action: decision.action,
      number: decision.record?.id ?? null,
      reason: decision.reason,
      fingerprint: item.fingerprint,
      settled: decision.settles && !dryRun,
    };
    if (decision.changes) {
      result.changes = decision.changes;
    }
    if (decision.action === "skip") {
      return result;
    }

    this.logger.info("Sync action", {
      slug: item.slug,
      action: decision.action,
      dryRun,
      number: result.number,
    });
    if (dryRun) {
      return result;
    }

    const record = decision.record;
    if (decision.action === "create") {
      result.number = await this.callRemote("create", () =>
        this.remote.create({
          title: item.title,
          body: item.body,
          labels: [...item.labels],
          milestone: item.milestone,
        }),
      );
    } else if (decision.action === "close" && record) {
      await this.callRemote("close", () => this.remote.close(record.id));
    } else if (decision.action === "update" && record && decision.changes) {
      const input = buildUpdateInput(item, decision.changes);
      await this.callRemote("update", () => this.remote.update(record.id, input));
    }
    return result;
  }

  private callRemote<T>(operation: RemoteOperation, call: () => Promise<T>): Promise<T> {
    return withRetry(call, {
      ...this.retry,
      onRetry: (info) => {
        this.logger.warn("Retrying remote call", {
          operation,
          attempt: info.attempt,
          delayMs: Math.round(info.delayMs),
          reason: info.reason,
        });
        this.retry.onRetry?.(info);
      },
    });
  }

  private summarize(
    results: ItemResult[],
    extras: {
      dryRun: boolean;
      errors: RunError[];
      warnings: string[];
      pruned: RemoteId[];
      truncateBodyDiff?: number;
    },
  ): RunSummary {
    const summary: RunSummary = {
      dryRun: extras.dryRun,
      totals: { specs: results.length, created: 0, updated: 0, closed: 0, skipped: 0 },
      changes: { created: [], updated: [], closed: [] },
      mapping: {},
      errors: extras.errors,
      warnings: extras.warnings,
      pruned: extras.pruned,
      results,
    };

    results.forEach((result) => {
      if (result.number !== null) {
        summary.mapping[result.slug] = result.number;
      }
      if (result.error !== undefined || result.action === "skip") {
        summary.totals.skipped += 1;
        return;
      }
      if (result.action === "create") {
        summary.totals.created += 1;
        summary.changes.created.push({
          external_id: result.slug,
          title: result.title,
          hash: result.fingerprint,
          number: result.number,
        });
      } else if (result.action === "update" && result.number !== null && result.changes) {
        summary.totals.updated += 1;
        const diff = extras.truncateBodyDiff === undefined
          ? result.changes
          : {
              ...result.changes,
              bodyDiff: truncateDiffLines(result.changes.bodyDiff, extras.truncateBodyDiff),
            };
        summary.changes.updated.push({
          external_id: result.slug,
          number: result.number,
          diff,
        });
      } else if (result.action === "close" && result.number !== null) {
        summary.totals.closed += 1;
        summary.changes.closed.push({
          external_id: result.slug,
          number: result.number,
        });
      }
    });
    return summary;
  }
}
