import type { ChangeSet } from "./diff-engine.js";
import type { DriftReport } from "./reconciler.js";
import { formatDriftReport } from "./reconciler.js";
import type { PlanEntry, RunError, RunSummary } from "./sync-engine.js";

export interface RunSummaryOutputOptions {
  includePlan?: boolean;
  includeBodyDiff?: boolean;
}

const singleLine = (value: string): string => value.replace(/\s+/g, " ").trim();

const quote = (value: string): string => `"${singleLine(value)}"`;

const describeChangeSet = (changes: ChangeSet): string => {
  const parts: string[] = [];
  if (changes.labelsAdded.length > 0) {
    parts.push(`labels added ${changes.labelsAdded.join(", ")}`);
  }
  if (changes.labelsRemoved.length > 0) {
    parts.push(`labels removed ${changes.labelsRemoved.join(", ")}`);
  }
  if (changes.milestoneTo !== undefined) {
    parts.push(`milestone: '${changes.milestoneFrom ?? ""}' -> '${changes.milestoneTo}'`);
  }
  if (changes.bodyChanged) {
    parts.push("body changed");
  }
  return parts.length > 0 ? parts.join("; ") : "no field changes";
};

const describeError = (error: RunError): string => {
  const target = error.external_id
    ? `[${error.external_id}]`
    : `#${error.number ?? "?"}`;
  return `${target} ${error.operation} failed: ${singleLine(error.message)}`;
};

const describePlanEntry = (entry: PlanEntry): string => {
  const target = entry.number === null ? "" : ` #${entry.number}`;
  return `[${entry.external_id}] ${entry.action}${target} (${entry.reason})`;
};

export const formatRunSummary = (
  summary: RunSummary,
  options: RunSummaryOutputOptions = {},
): string => {
  const includePlan = options.includePlan ?? true;
  const includeBodyDiff = options.includeBodyDiff ?? false;
  const { totals, changes } = summary;

  const lines: string[] = [];
  lines.push(summary.dryRun ? "Sync summary (dry run)" : "Sync summary");
  lines.push(
    `Specs: ${totals.specs}, Created: ${totals.created}, Updated: ${totals.updated}, ` +
      `Closed: ${totals.closed}, Skipped: ${totals.skipped}`,
  );

  if (changes.created.length > 0) {
    lines.push("");
    lines.push("Created");
    changes.created.forEach((entry) => {
      const target = entry.number === null ? "" : ` -> #${entry.number}`;
      lines.push(`- [${entry.external_id}] ${quote(entry.title)}${target}`);
    });
  }

  if (changes.updated.length > 0) {
    lines.push("");
    lines.push("Updated");
    changes.updated.forEach((entry) => {
      lines.push(`- [${entry.external_id}] #${entry.number}: ${describeChangeSet(entry.diff)}`);
      if (includeBodyDiff) {
        entry.diff.bodyDiff.forEach((line) => lines.push(`    ${line}`));
      }
    });
  }

  if (changes.closed.length > 0) {
    lines.push("");
    lines.push("Closed");
    changes.closed.forEach((entry) => {
      lines.push(`- [${entry.external_id}] #${entry.number}`);
    });
  }

  if (summary.pruned.length > 0) {
    lines.push("");
    lines.push("Pruned");
    summary.pruned.forEach((number) => lines.push(`- #${number}`));
  }

  if (summary.warnings.length > 0) {
    lines.push("");
    lines.push("Warnings");
    summary.warnings.forEach((warning) => lines.push(`- ${warning}`));
  }

  if (summary.errors.length > 0) {
    lines.push("");
    lines.push("Errors");
    summary.errors.forEach((error) => lines.push(`- ${describeError(error)}`));
  }

  if (includePlan && summary.plan && summary.plan.length > 0) {
    lines.push("");
    lines.push("Plan");
    summary.plan.forEach((entry) => lines.push(`- ${describePlanEntry(entry)}`));
  }

  return `${lines.join("\n")}\n`;
};

export const formatReconcileReport = (report: DriftReport): string =>
  `${formatDriftReport(report).join("\n")}\n`;
