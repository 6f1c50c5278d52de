export const SLUG_PATTERN = /^[a-z0-9][a-z0-9-_]*$/;

const MARKER_PREFIX = "<!-- issuemark:slug=";
const MARKER_SUFFIX = " -->";
const MARKER_SEARCH_REGEX = /<!-- issuemark:slug=(.*?)-->/g;

export class SlugFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SlugFormatError";
  }
}

export type SlugMarkerParseResult =
  | { status: "ok"; slug: string }
  | {
      status: "missing" | "ambiguous";
      reason: string;
      matches: string[];
    };

export const isValidSlug = (slug: string): boolean => SLUG_PATTERN.test(slug);

export const formatSlugMarker = (slug: string): string => {
  if (!isValidSlug(slug)) {
    throw new SlugFormatError(
      `Slug '${slug}' must match ${SLUG_PATTERN.source}`,
    );
  }
  return `${MARKER_PREFIX}${slug}${MARKER_SUFFIX}`;
};

export const hasSlugMarker = (body: string, slug: string): boolean =>
  body.includes(formatSlugMarker(slug));

/** Prepends the marker unless the body already carries it. */
export const ensureSlugMarker = (body: string, slug: string): string => {
  const marker = formatSlugMarker(slug);
  if (body.includes(marker)) {
    return body;
  }
  return `${marker}\n\n${body}`;
};

export const findSlugMarkers = (body: string | null): SlugMarkerParseResult => {
  if (!body) {
    return {
      status: "missing",
      reason: "Body is empty",
      matches: [],
    };
  }
  const matches = Array.from(body.matchAll(MARKER_SEARCH_REGEX), (match) =>
    (match[1] ?? "").trim(),
  ).filter((slug) => slug !== "");
  const distinct = [...new Set(matches)];
  if (distinct.length === 0) {
    return {
      status: "missing",
      reason: "No slug marker found in body",
      matches,
    };
  }
  if (distinct.length > 1) {
    return {
      status: "ambiguous",
      reason: "Multiple slug markers found in body",
      matches: distinct,
    };
  }
  return { status: "ok", slug: distinct[0] };
};

export const extractSlug = (body: string | null): string | null => {
  const parsed = findSlugMarkers(body);
  return parsed.status === "ok" ? parsed.slug : null;
};
