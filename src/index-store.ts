import { createHash } from "node:crypto";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import type { IsoTimestamp, RemoteId } from "./adapters.js";
import type { Logger } from "./logger.js";

type PlainObject = Record<string, unknown>;

export const INDEX_VERSION = 1;

export interface IndexEntry {
  issue: RemoteId;
  hash?: string;
}

export type IndexEntries = Record<string, IndexEntry>;

export interface IndexDocument {
  version: number;
  generatedAt: IsoTimestamp;
  repo: string | null;
  entries: IndexEntries;
  signature: string;
}

export interface IndexLoadOptions {
  warn?: (message: string) => void;
  logger?: Logger;
}

export interface IndexPersistOptions {
  mirror?: string;
  time?: () => IsoTimestamp;
}

const isPlainObject = (value: unknown): value is PlainObject =>
  value !== null && typeof value === "object" && !Array.isArray(value);

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const canonicalize = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (isPlainObject(value)) {
    const sorted: PlainObject = {};
    Object.keys(value)
      .sort()
      .forEach((key) => {
        sorted[key] = canonicalize(value[key]);
      });
    return sorted;
  }
  return value;
};

/** sha256 over the entries serialized with recursively sorted keys. */
export const computeSignature = (entries: unknown): string =>
  createHash("sha256")
    .update(JSON.stringify(canonicalize(entries)), "utf8")
    .digest("hex");

export const createEmptyIndexDocument = (
  repo: string | null = null,
  generatedAt: IsoTimestamp = new Date().toISOString(),
): IndexDocument => ({
  version: INDEX_VERSION,
  generatedAt,
  repo,
  entries: {},
  signature: computeSignature({}),
});

const warnWithOptions = (
  options: IndexLoadOptions,
  message: string,
  data?: Record<string, unknown>,
): void => {
  if (options.warn) {
    options.warn(message);
    return;
  }
  if (options.logger) {
    options.logger.warn(message, data);
    return;
  }
  console.warn(message);
};

const requireIssueId = (value: unknown, label: string): RemoteId => {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${label} must be an integer`);
  }
  return value;
};

const parseEntries = (value: unknown): IndexEntries => {
  if (!isPlainObject(value)) {
    throw new Error("index.entries must be an object");
  }
  const entries: IndexEntries = {};
  Object.entries(value).forEach(([slug, raw]) => {
    if (!isPlainObject(raw)) {
      throw new Error(`index.entries.${slug} must be an object`);
    }
    const entry: IndexEntry = {
      issue: requireIssueId(raw.issue, `index.entries.${slug}.issue`),
    };
    if (typeof raw.hash === "string") {
      entry.hash = raw.hash;
    }
    entries[slug] = entry;
  });
  return entries;
};

const parseLegacyMapping = (value: unknown): IndexEntries => {
  if (!isPlainObject(value)) {
    throw new Error("index.mapping must be an object");
  }
  const entries: IndexEntries = {};
  Object.entries(value).forEach(([slug, issue]) => {
    entries[slug] = { issue: requireIssueId(issue, `index.mapping.${slug}`) };
  });
  return entries;
};

export const loadIndexDocument = async (
  indexPath: string,
  options: IndexLoadOptions = {},
): Promise<IndexDocument> => {
  let raw: string;
  try {
    raw = await readFile(indexPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return createEmptyIndexDocument();
    }
    const message = error instanceof Error ? error.message : "Unknown file system error";
    warnWithOptions(
      options,
      `Ignoring index at ${indexPath}: failed to read (${message})`,
      { indexPath, error: message, reason: "read_failed" },
    );
    return createEmptyIndexDocument();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown JSON error";
    warnWithOptions(
      options,
      `Ignoring index at ${indexPath}: invalid JSON (${message})`,
      { indexPath, error: message, reason: "invalid_json" },
    );
    return createEmptyIndexDocument();
  }

  if (!isPlainObject(parsed)) {
    warnWithOptions(options, `Ignoring index at ${indexPath}: not an object`, {
      indexPath,
      reason: "validation_error",
    });
    return createEmptyIndexDocument();
  }

  const repo = typeof parsed.repo === "string" ? parsed.repo : null;
  const generatedAt =
    typeof parsed.generated_at === "string"
      ? parsed.generated_at
      : new Date().toISOString();

  try {
    if (!("entries" in parsed) && "mapping" in parsed) {
      const entries = parseLegacyMapping(parsed.mapping);
      return {
        version: INDEX_VERSION,
        generatedAt,
        repo,
        entries,
        signature: computeSignature(entries),
      };
    }

    const signature = computeSignature(parsed.entries);
    if (typeof parsed.signature === "string" && parsed.signature !== signature) {
      warnWithOptions(
        options,
        `Ignoring index at ${indexPath}: signature mismatch`,
        { indexPath, reason: "signature_mismatch" },
      );
      return createEmptyIndexDocument(repo);
    }
    const entries = parseEntries(parsed.entries);
    return {
      version: typeof parsed.version === "number" ? parsed.version : INDEX_VERSION,
      generatedAt,
      repo,
      entries,
      signature: computeSignature(entries),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown validation error";
    warnWithOptions(
      options,
      `Ignoring index at ${indexPath}: ${message}`,
      { indexPath, error: message, reason: "validation_error" },
    );
    return createEmptyIndexDocument(repo);
  }
};

export const indexMapping = (entries: IndexEntries): Record<string, RemoteId> =>
  Object.fromEntries(
    Object.entries(entries).map(([slug, entry]) => [slug, entry.issue]),
  );

const serializeIndexDocument = (document: IndexDocument): string =>
  `${JSON.stringify(
    {
      version: document.version,
      generated_at: document.generatedAt,
      repo: document.repo,
      entries: document.entries,
      signature: document.signature,
      mapping: indexMapping(document.entries),
    },
    null,
    2,
  )}\n`;

const writeAtomically = async (target: string, payload: string): Promise<void> => {
  await mkdir(path.dirname(target), { recursive: true });
  const temporary = `${target}.tmp`;
  await writeFile(temporary, payload, "utf8");
  await rename(temporary, target);
};

/** Re-signs and writes the document; returns what was written. */
export const persistIndexDocument = async (
  indexPath: string,
  document: IndexDocument,
  options: IndexPersistOptions = {},
): Promise<IndexDocument> => {
  const time = options.time ?? (() => new Date().toISOString());
  const signed: IndexDocument = {
    ...document,
    version: INDEX_VERSION,
    generatedAt: time(),
    signature: computeSignature(document.entries),
  };
  const payload = serializeIndexDocument(signed);
  await writeAtomically(indexPath, payload);
  if (options.mirror) {
    await writeAtomically(options.mirror, payload);
  }
  return signed;
};

export const pruneIndexEntries = (
  document: IndexDocument,
  slugs: Iterable<string>,
): { document: IndexDocument; removed: string[] } => {
  const keep = new Set(slugs);
  const entries: IndexEntries = {};
  const removed: string[] = [];
  Object.entries(document.entries).forEach(([slug, entry]) => {
    if (keep.has(slug)) {
      entries[slug] = entry;
    } else {
      removed.push(slug);
    }
  });
  return {
    document: { ...document, entries, signature: computeSignature(entries) },
    removed,
  };
};

/**
 * Applies this run's slug -> id results. A fingerprint is stored only for
 * slugs listed in `fingerprints`; other slugs keep their previous hash while
 * the id is unchanged.
 */
export const mergeRunIntoIndex = (
  document: IndexDocument,
  mapping: Record<string, RemoteId>,
  fingerprints: Record<string, string>,
): IndexDocument => {
  const entries: IndexEntries = { ...document.entries };
  Object.entries(mapping).forEach(([slug, issue]) => {
    const previous = document.entries[slug];
    const entry: IndexEntry = { issue };
    const hash =
      fingerprints[slug] ??
      (previous && previous.issue === issue ? previous.hash : undefined);
    if (hash !== undefined) {
      entry.hash = hash;
    }
    entries[slug] = entry;
  });
  return { ...document, entries, signature: computeSignature(entries) };
};

export const priorFingerprints = (document: IndexDocument): Map<string, string> => {
  const fingerprints = new Map<string, string>();
  Object.entries(document.entries).forEach(([slug, entry]) => {
    if (entry.hash) {
      fingerprints.set(slug, entry.hash);
    }
  });
  return fingerprints;
};
