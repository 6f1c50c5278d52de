import type { RemoteId, RemoteRecord, SpecItem } from "./adapters.js";
import type { ChangeSet } from "./diff-engine.js";
import { computeChangeSet, isChangeSetEmpty } from "./diff-engine.js";
import { hasSlugMarker } from "./slug-marker.js";

export type DriftEntry =
  | { kind: "spec_only"; slug: string; title: string }
  | { kind: "live_only"; number: RemoteId; title: string }
  | { kind: "diff"; slug: string; number: RemoteId; changes: ChangeSet };

export interface DriftReport {
  summary: {
    specCount: number;
    liveCount: number;
    driftCount: number;
  };
  drift: DriftEntry[];
  inSync: boolean;
}

/** Title first, then the first item in spec order whose marker the body carries. */
const findItemForRecord = (
  record: RemoteRecord,
  items: SpecItem[],
  byTitle: Map<string, SpecItem>,
): SpecItem | undefined =>
  byTitle.get(record.title) ?? items.find((item) => hasSlugMarker(record.body, item.slug));

const firstBy = (items: SpecItem[], key: (item: SpecItem) => string): Map<string, SpecItem> => {
  const index = new Map<string, SpecItem>();
  items.forEach((item) => {
    if (!index.has(key(item))) {
      index.set(key(item), item);
    }
  });
  return index;
};

/** Compares spec items with live records. Read-only. */
export const reconcile = (items: SpecItem[], records: RemoteRecord[]): DriftReport => {
  const byTitle = firstBy(items, (item) => item.title);
  const matchedSlugs = new Set<string>();
  const liveDrift: DriftEntry[] = [];

  records.forEach((record) => {
    const item = findItemForRecord(record, items, byTitle);
    if (!item) {
      liveDrift.push({ kind: "live_only", number: record.id, title: record.title });
      return;
    }
    matchedSlugs.add(item.slug);
    const changes = computeChangeSet(item, record);
    if (!isChangeSetEmpty(changes)) {
      liveDrift.push({ kind: "diff", slug: item.slug, number: record.id, changes });
    }
  });

  const specDrift = items
    .filter((item) => !matchedSlugs.has(item.slug))
    .map((item): DriftEntry => ({ kind: "spec_only", slug: item.slug, title: item.title }));

  const drift = [...specDrift, ...liveDrift];
  return {
    summary: {
      specCount: items.length,
      liveCount: records.length,
      driftCount: drift.length,
    },
    drift,
    inSync: drift.length === 0,
  };
};

const describeChanges = (changes: ChangeSet): string => {
  const parts: string[] = [];
  if (changes.labelsAdded.length > 0) {
    parts.push(`labels +${changes.labelsAdded.join(",")}`);
  }
  if (changes.labelsRemoved.length > 0) {
    parts.push(`labels -${changes.labelsRemoved.join(",")}`);
  }
  if (changes.milestoneTo !== undefined) {
    parts.push(`milestone '${changes.milestoneFrom ?? ""}' -> '${changes.milestoneTo}'`);
  }
  if (changes.bodyChanged) {
    parts.push("body changed");
  }
  return parts.join("; ");
};

const describeEntry = (entry: DriftEntry): string => {
  switch (entry.kind) {
    case "spec_only":
      return `- spec only: ${entry.slug} (${entry.title})`;
    case "live_only":
      return `- live only: #${entry.number} ${entry.title}`;
    case "diff":
      return `- diff: ${entry.slug} (#${entry.number}) ${describeChanges(entry.changes)}`;
  }
};

export const formatDriftReport = (report: DriftReport): string[] => {
  const { specCount, liveCount, driftCount } = report.summary;
  const lines = [
    `Reconcile: ${specCount} spec(s), ${liveCount} live issue(s), ${driftCount} drift item(s)`,
  ];
  if (report.inSync) {
    lines.push("In sync.");
    return lines;
  }
  report.drift.forEach((entry) => {
    lines.push(describeEntry(entry));
  });
  return lines;
};
