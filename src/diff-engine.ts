import DiffMatchPatch from "diff-match-patch";

import type { RemoteId, RemoteRecord, SpecItem } from "./adapters.js";
import { hasSlugMarker } from "./slug-marker.js";

export const MAX_BODY_DIFF_LINES = 120;
export const TRUNCATION_MARKER = "... (truncated)";
const DIFF_CONTEXT_LINES = 3;

// Operation codes used by diff-match-patch tuples.
const DIFF_DELETE = -1;
const DIFF_INSERT = 1;

export type MatchStrategy = "title" | "marker";

export interface MatchResult {
  record: RemoteRecord | null;
  strategy: MatchStrategy | null;
  /** Every record satisfying the winning strategy, in fetch order. */
  candidates: RemoteId[];
  ambiguous: boolean;
}

export interface ChangeSet {
  labelsAdded: string[];
  labelsRemoved: string[];
  milestoneFrom?: string;
  milestoneTo?: string;
  bodyChanged: boolean;
  bodyDiff: string[];
}

export interface ChangeCounts {
  labelsAdded: number;
  labelsRemoved: number;
  milestoneChanged: boolean;
  bodyChanged: boolean;
}

interface LineOp {
  kind: "equal" | "delete" | "insert";
  text: string;
  oldIndex: number;
  newIndex: number;
}

const NO_MATCH: MatchResult = {
  record: null,
  strategy: null,
  candidates: [],
  ambiguous: false,
};

const toMatch = (
  strategy: MatchStrategy,
  matches: RemoteRecord[],
): MatchResult => ({
  record: matches[0],
  strategy,
  candidates: matches.map((record) => record.id),
  ambiguous: matches.length > 1,
});

export const matchRecord = (
  item: SpecItem,
  records: RemoteRecord[],
): MatchResult => {
  const byTitle = records.filter((record) => record.title === item.title);
  if (byTitle.length > 0) {
    return toMatch("title", byTitle);
  }
  const byMarker = records.filter((record) =>
    hasSlugMarker(record.body, item.slug),
  );
  if (byMarker.length > 0) {
    return toMatch("marker", byMarker);
  }
  return NO_MATCH;
};

const areLabelSetsEqual = (left: string[], right: string[]): boolean => {
  const leftSet = new Set(left);
  const rightSet = new Set(right);
  return (
    leftSet.size === rightSet.size &&
    [...leftSet].every((label) => rightSet.has(label))
  );
};

export const needsUpdate = (
  item: SpecItem,
  record: RemoteRecord,
  priorFingerprint?: string | null,
): boolean => {
  if (priorFingerprint && priorFingerprint === item.fingerprint) {
    return false;
  }
  if (!areLabelSetsEqual(item.labels, record.labels)) {
    return true;
  }
  if ((item.milestone ?? "") !== (record.milestone ?? "")) {
    return true;
  }
  return record.body.trim() !== item.body.trim();
};

const splitLines = (text: string): string[] => {
  const trimmed = text.trim();
  return trimmed === "" ? [] : trimmed.split(/\r?\n/);
};

const computeLineOps = (before: string[], after: string[]): LineOp[] => {
  const dmp = new DiffMatchPatch();
  const encoded = dmp.diff_linesToChars_(
    before.map((line) => `${line}\n`).join(""),
    after.map((line) => `${line}\n`).join(""),
  );
  const diffs = dmp.diff_main(encoded.chars1, encoded.chars2, false);
  dmp.diff_charsToLines_(diffs, encoded.lineArray);

  const ops: LineOp[] = [];
  let oldIndex = 0;
  let newIndex = 0;
  for (const [operation, chunk] of diffs) {
    const lines = chunk.split("\n").slice(0, -1);
    for (const text of lines) {
      if (operation === DIFF_DELETE) {
        ops.push({ kind: "delete", text, oldIndex, newIndex });
        oldIndex += 1;
      } else if (operation === DIFF_INSERT) {
        ops.push({ kind: "insert", text, oldIndex, newIndex });
        newIndex += 1;
      } else {
        ops.push({ kind: "equal", text, oldIndex, newIndex });
        oldIndex += 1;
        newIndex += 1;
      }
    }
  }
  return ops;
};

const formatRange = (start: number, length: number): string => {
  if (length === 1) {
    return `${start + 1}`;
  }
  if (length === 0) {
    return `${start},0`;
  }
  return `${start + 1},${length}`;
};

const groupHunks = (ops: LineOp[]): Array<[number, number]> => {
  const hunks: Array<[number, number]> = [];
  ops.forEach((op, index) => {
    if (op.kind === "equal") {
      return;
    }
    const start = Math.max(0, index - DIFF_CONTEXT_LINES);
    const end = Math.min(ops.length, index + 1 + DIFF_CONTEXT_LINES);
    const last = hunks[hunks.length - 1];
    if (last && start <= last[1]) {
      last[1] = end;
    } else {
      hunks.push([start, end]);
    }
  });
  return hunks;
};

/** Unified diff (`--- remote` / `+++ spec`) over the trimmed bodies. */
export const unifiedBodyDiff = (remoteBody: string, specBody: string): string[] => {
  const ops = computeLineOps(splitLines(remoteBody), splitLines(specBody));
  const hunks = groupHunks(ops);
  if (hunks.length === 0) {
    return [];
  }
  const lines = ["--- remote", "+++ spec"];
  for (const [start, end] of hunks) {
    const slice = ops.slice(start, end);
    const oldLength = slice.filter((op) => op.kind !== "insert").length;
    const newLength = slice.filter((op) => op.kind !== "delete").length;
    lines.push(
      `@@ -${formatRange(slice[0].oldIndex, oldLength)} ` +
        `+${formatRange(slice[0].newIndex, newLength)} @@`,
    );
    slice.forEach((op) => {
      const prefix = op.kind === "delete" ? "-" : op.kind === "insert" ? "+" : " ";
      lines.push(`${prefix}${op.text}`);
    });
  }
  return lines;
};

export const truncateDiffLines = (lines: string[], limit: number): string[] =>
  lines.length > limit ? [...lines.slice(0, limit), TRUNCATION_MARKER] : lines;

export const computeChangeSet = (
  item: SpecItem,
  record: RemoteRecord,
): ChangeSet => {
  const changes: ChangeSet = {
    labelsAdded: [],
    labelsRemoved: [],
    bodyChanged: false,
    bodyDiff: [],
  };
  const desired = new Set(item.labels);
  const existing = new Set(record.labels);
  changes.labelsAdded = [...desired].filter((label) => !existing.has(label)).sort();
  changes.labelsRemoved = [...existing].filter((label) => !desired.has(label)).sort();

  const desiredMilestone = item.milestone ?? "";
  const existingMilestone = record.milestone ?? "";
  if (desiredMilestone !== existingMilestone) {
    changes.milestoneFrom = existingMilestone;
    changes.milestoneTo = desiredMilestone;
  }

  if (record.body.trim() !== item.body.trim()) {
    changes.bodyChanged = true;
    changes.bodyDiff = truncateDiffLines(
      unifiedBodyDiff(record.body, item.body),
      MAX_BODY_DIFF_LINES,
    );
  }
  return changes;
};

export const isChangeSetEmpty = (changes: ChangeSet): boolean =>
  changes.labelsAdded.length === 0 &&
  changes.labelsRemoved.length === 0 &&
  changes.milestoneTo === undefined &&
  !changes.bodyChanged;

export const summarizeChangeSet = (changes: ChangeSet): ChangeCounts => ({
  labelsAdded: changes.labelsAdded.length,
  labelsRemoved: changes.labelsRemoved.length,
  milestoneChanged: changes.milestoneTo !== undefined,
  bodyChanged: changes.bodyChanged,
});
