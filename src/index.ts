export {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  loadIssuemarkConfig,
  normalizeConfig,
} from "./config.js";
export type {
  ConcurrencyConfig,
  IssuemarkConfig,
  LogFormat,
  LogLevel,
  RemoteBackend,
  RetryConfig,
  SyncBehaviorConfig,
} from "./config.js";
export { createLogger, createSilentLogger, redact } from "./logger.js";
export type { LogData, LogEntry, Logger, LoggerOptions } from "./logger.js";
export { RemoteFailure } from "./adapters.js";
export type {
  IsoTimestamp,
  ItemStatus,
  RemoteClient,
  RemoteCreateInput,
  RemoteId,
  RemoteOperation,
  RemoteRecord,
  RemoteState,
  RemoteUpdateInput,
  SpecItem,
} from "./adapters.js";
export {
  SLUG_PATTERN,
  SlugFormatError,
  ensureSlugMarker,
  extractSlug,
  findSlugMarkers,
  formatSlugMarker,
} from "./slug-marker.js";
export type { SlugMarkerParseResult } from "./slug-marker.js";
export {
  LABEL_CANON_MAP,
  MarkdownSpecSource,
  SpecParseError,
  canonicalizeLabel,
  createItemFingerprint,
  parseSpecText,
  renderSpecText,
} from "./spec-parser.js";
export {
  MAX_BODY_DIFF_LINES,
  computeChangeSet,
  isChangeSetEmpty,
  matchRecord,
  needsUpdate,
  summarizeChangeSet,
  unifiedBodyDiff,
} from "./diff-engine.js";
export type { ChangeCounts, ChangeSet, MatchResult, MatchStrategy } from "./diff-engine.js";
export { classifyFailure, computeBackoffMs, parseRetryHint, withRetry } from "./retry.js";
export type { FailureClassification, RetryAttemptInfo, RetryOptions } from "./retry.js";
export { dispatchItems, resolveWorkerCount } from "./dispatcher.js";
export type { DispatchOptions, DispatchOutcome } from "./dispatcher.js";
export {
  computeSignature,
  createEmptyIndexDocument,
  loadIndexDocument,
  mergeRunIntoIndex,
  persistIndexDocument,
  priorFingerprints,
  pruneIndexEntries,
} from "./index-store.js";
export type { IndexDocument, IndexEntry } from "./index-store.js";
export { PreconditionError, SyncEngine, decideAction } from "./sync-engine.js";
export type {
  ActionDecision,
  ItemResult,
  PlanEntry,
  RunSummary,
  SyncAction,
  SyncEngineOptions,
  SyncOptions,
} from "./sync-engine.js";
export { reconcile, formatDriftReport } from "./reconciler.js";
export type { DriftEntry, DriftReport } from "./reconciler.js";
export { GitHubRestClient } from "./github-rest-client.js";
export type { FetchLike, GitHubRestClientConfig } from "./github-rest-client.js";
export { GitHubCliClient, runCommand } from "./github-cli-client.js";
export type { CommandResult, CommandRunner } from "./github-cli-client.js";
export { InMemoryRemoteClient, createSequence } from "./memory-remote-client.js";
export { createRemoteClient } from "./remote-client.js";
export { syncWithIndex } from "./sync-with-index.js";
export type {
  SummaryArtifact,
  SyncWithIndexOptions,
  SyncWithIndexResult,
} from "./sync-with-index.js";
export { formatReconcileReport, formatRunSummary } from "./summary-output.js";
