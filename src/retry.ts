import { RemoteFailure } from "./adapters.js";

export type FailureClassification =
  | { kind: "transient"; hintMs: number | null; reason: string }
  | { kind: "permanent" };

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  reason: string;
  error: unknown;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Jitter source in [0, 1). */
  random?: () => number;
  sleep?: (delayMs: number) => Promise<void>;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 500;
const MAX_JITTER_MS = 250;

const TRANSIENT_MARKERS = ["secondary rate", "abuse detection", "rate limit"];
const NETWORK_MARKERS = [
  "timeout",
  "etimedout",
  "econnreset",
  "connection reset",
  "temporarily unavailable",
];
const TRANSIENT_STATUSES = new Set([429, 502, 503, 504]);
const RETRY_HINT_PATTERNS = [
  /retry[-\s]after:?\s*(\d+)/i,
  /wait\s*(\d+)\s*seconds/i,
];

export const sleep = (delayMs: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, delayMs));

const describeFailure = (error: unknown): string => {
  if (error instanceof RemoteFailure) {
    return `${error.message}\n${error.diagnostic}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/** Wait hint in milliseconds, or null when the text carries none or a zero wait. */
export const parseRetryHint = (text: string): number | null => {
  for (const pattern of RETRY_HINT_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      const hintMs = Number(match[1]) * 1000;
      return hintMs > 0 ? hintMs : null;
    }
  }
  return null;
};

export const classifyFailure = (error: unknown): FailureClassification => {
  const text = describeFailure(error);
  const lowered = text.toLowerCase();
  const marker = [...TRANSIENT_MARKERS, ...NETWORK_MARKERS].find((token) =>
    lowered.includes(token),
  );
  const status = error instanceof RemoteFailure ? error.status : null;
  if (marker !== undefined) {
    return { kind: "transient", hintMs: parseRetryHint(text), reason: marker };
  }
  if (status !== null && TRANSIENT_STATUSES.has(status)) {
    return {
      kind: "transient",
      hintMs: parseRetryHint(text),
      reason: `http ${status}`,
    };
  }
  return { kind: "permanent" };
};

export const computeBackoffMs = (
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "random"> = {},
): number => {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const random = options.random ?? Math.random;
  const delayMs = baseDelayMs * 2 ** (attempt - 1) + random() * MAX_JITTER_MS;
  return options.maxDelayMs === undefined
    ? delayMs
    : Math.min(delayMs, options.maxDelayMs);
};

/**
 * Runs `operation` until it succeeds, fails permanently, or runs out of
 * attempts. The last error is rethrown unchanged.
 */
export const withRetry = async <T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> => {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const wait = options.sleep ?? sleep;
  let attempt = 1;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      const classification = classifyFailure(error);
      if (classification.kind === "permanent" || attempt >= maxAttempts) {
        throw error;
      }
      const chosenMs = classification.hintMs ?? computeBackoffMs(attempt, options);
      const delayMs = options.maxDelayMs === undefined
        ? chosenMs
        : Math.min(chosenMs, options.maxDelayMs);
      options.onRetry?.({
        attempt,
        delayMs,
        reason: classification.reason,
        error,
      });
      await wait(delayMs);
      attempt += 1;
    }
  }
};
