import { createHash } from "node:crypto";
import { readFile, writeFile } from "node:fs/promises";

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

import type { ItemStatus, SpecItem } from "./adapters.js";
import { ensureSlugMarker } from "./slug-marker.js";

type PlainObject = Record<string, unknown>;

export class SpecParseError extends Error {
  readonly slug: string | null;

  constructor(message: string, slug: string | null = null) {
    super(message);
    this.name = "SpecParseError";
    this.slug = slug;
  }
}

export const LABEL_CANON_MAP: Readonly<Record<string, string>> = {
  "p0-critical": "P0-critical",
  "p1-important": "P1-important",
  "p2-enhancement": "P2-enhancement",
};

const HEADING_REGEX = /^##\s*\[slug:\s*([a-z0-9][a-z0-9-_]*)\s*\]$/i;
const LEGACY_HEADING_REGEX = /^##\s+\d{3}\s*\|/;
const FENCE_OPEN_REGEX = /^\s*```yaml\b/;
const FENCE_CLOSE_REGEX = /^```\s*$/;
const FINGERPRINT_SEPARATOR = "\x1f";
const FINGERPRINT_LENGTH = 16;

const isPlainObject = (value: unknown): value is PlainObject =>
  value !== null && typeof value === "object" && !Array.isArray(value);

export const canonicalizeLabel = (label: string): string =>
  LABEL_CANON_MAP[label.toLowerCase()] ?? label;

export const createItemFingerprint = (
  item: Omit<SpecItem, "fingerprint">,
): string => {
  const labels = [...new Set(item.labels)].sort();
  const payload = [
    item.slug,
    item.title,
    labels.join(","),
    item.milestone ?? "",
    item.status ?? "",
    item.body.trim(),
  ].join(FINGERPRINT_SEPARATOR);
  return createHash("sha256")
    .update(payload, "utf8")
    .digest("hex")
    .slice(0, FINGERPRINT_LENGTH);
};

const normalizeBody = (value: unknown): string => {
  if (value === undefined || value === null) {
    return "\n";
  }
  if (Array.isArray(value)) {
    return `${value.map((line) => String(line)).join("\n")}\n`;
  }
  const text = String(value);
  return text.endsWith("\n") ? text : `${text}\n`;
};

const parseLabels = (value: unknown, slug: string): string[] => {
  let tokens: string[] = [];
  if (value === undefined || value === null) {
    tokens = [];
  } else if (typeof value === "string") {
    tokens = value.split(",");
  } else if (Array.isArray(value)) {
    tokens = value.map((label) => String(label));
  } else {
    throw new SpecParseError(
      `labels for slug ${slug} must be a list or a comma-separated string`,
      slug,
    );
  }
  return tokens
    .map((label) => label.trim())
    .filter((label) => label !== "")
    .map(canonicalizeLabel);
};

const parseMilestone = (value: unknown, slug: string): string | null => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    throw new SpecParseError(`milestone for slug ${slug} must be a string`, slug);
  }
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
};

const parseStatus = (value: unknown, slug: string): ItemStatus | null => {
  if (value === undefined || value === null) {
    return null;
  }
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (normalized === "open" || normalized === "closed") {
    return normalized;
  }
  throw new SpecParseError(
    `status for slug ${slug} must be one of: 'open', 'closed'`,
    slug,
  );
};

const parseItemBlock = (slug: string, block: string[]): SpecItem => {
  let loaded: unknown;
  try {
    loaded = parseYaml(block.join("\n"));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown YAML error";
    throw new SpecParseError(`Invalid YAML for slug ${slug}: ${message}`, slug);
  }
  const data = loaded ?? {};
  if (!isPlainObject(data)) {
    throw new SpecParseError(`YAML for slug ${slug} must be a mapping`, slug);
  }
  const title = typeof data.title === "string" ? data.title.trim() : "";
  if (title === "") {
    throw new SpecParseError(`Missing title in slug ${slug}`, slug);
  }
  const fields = {
    slug,
    title,
    labels: parseLabels(data.labels, slug),
    milestone: parseMilestone(data.milestone, slug),
    status: parseStatus(data.status, slug),
    body: ensureSlugMarker(normalizeBody(data.body), slug),
  };
  return { ...fields, fingerprint: createItemFingerprint(fields) };
};

/**
 * Parses the whole spec text or throws; there is no partial result.
 * Duplicate slugs are returned as-is.
 */
export const parseSpecText = (text: string): SpecItem[] => {
  const lines = text.split(/\r?\n/);
  const items: SpecItem[] = [];
  let index = 0;

  while (index < lines.length) {
    const line = lines[index];
    const heading = HEADING_REGEX.exec(line);
    if (!heading) {
      if (LEGACY_HEADING_REGEX.test(line)) {
        throw new SpecParseError(
          "Legacy numeric issue format detected. Use slug+YAML format.",
        );
      }
      index += 1;
      continue;
    }
    const slug = heading[1].toLowerCase();
    index += 1;
    while (index < lines.length && lines[index].trim() === "") {
      index += 1;
    }
    if (index >= lines.length || !FENCE_OPEN_REGEX.test(lines[index])) {
      throw new SpecParseError(`Missing \`\`\`yaml fenced block for slug ${slug}`, slug);
    }
    index += 1;
    const block: string[] = [];
    while (index < lines.length && !FENCE_CLOSE_REGEX.test(lines[index])) {
      block.push(lines[index]);
      index += 1;
    }
    if (index >= lines.length) {
      throw new SpecParseError(`Unterminated YAML block for slug ${slug}`, slug);
    }
    index += 1;
    items.push(parseItemBlock(slug, block));
  }

  if (items.length === 0) {
    throw new SpecParseError("No slug headings found in spec file");
  }
  return items;
};

const renderItem = (item: SpecItem): string => {
  const data: PlainObject = { title: item.title };
  if (item.labels.length > 0) {
    data.labels = [...item.labels];
  }
  if (item.milestone !== null) {
    data.milestone = item.milestone;
  }
  if (item.status !== null) {
    data.status = item.status;
  }
  data.body = item.body;
  return [
    `## [slug: ${item.slug}]`,
    "",
    "```yaml",
    stringifyYaml(data).trimEnd(),
    "```",
  ].join("\n");
};

/** Renders items back to spec text, markers included. */
export const renderSpecText = (items: SpecItem[]): string =>
  `${items.map(renderItem).join("\n\n")}\n`;

export class MarkdownSpecSource {
  async readItems(path: string): Promise<SpecItem[]> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      const message =
        error instanceof Error ? error.message : "Unknown file system error";
      throw new SpecParseError(`Failed to read spec file at ${path}: ${message}`);
    }
    return parseSpecText(raw);
  }

  async writeItems(path: string, items: SpecItem[]): Promise<void> {
    await writeFile(path, renderSpecText(items), "utf8");
  }
}
