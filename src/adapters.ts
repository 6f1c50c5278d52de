export type IsoTimestamp = string;

export type ItemStatus = "open" | "closed";

export type RemoteState = "OPEN" | "CLOSED";

export type RemoteId = number;

/** A parsed entry of the spec file. Values are never mutated after parsing. */
export interface SpecItem {
  slug: string;
  title: string;
  labels: string[];
  milestone: string | null;
  status: ItemStatus | null;
  body: string;
  fingerprint: string;
}

export interface RemoteRecord {
  id: RemoteId;
  title: string;
  labels: string[];
  milestone: string | null;
  body: string;
  state: RemoteState;
}

export interface RemoteCreateInput {
  title: string;
  body: string;
  labels?: string[];
  milestone?: string | null;
}

export interface RemoteUpdateInput {
  body?: string;
  labels?: string[];
  milestone?: string | null;
  state?: "open" | "closed";
}

export type RemoteOperation = "create" | "update" | "close" | "list";

export interface RemoteClient {
  /** Resolves to the new record id, or null when the backend cannot report it. */
  create(input: RemoteCreateInput): Promise<RemoteId | null>;
  update(id: RemoteId, input: RemoteUpdateInput): Promise<void>;
  close(id: RemoteId): Promise<void>;
  list(): Promise<RemoteRecord[]>;
}

/**
 * Uniform failure raised by every remote backend. `diagnostic` keeps the raw
 * text (command output, response body, headers of interest) for retry
 * classification.
 */
export class RemoteFailure extends Error {
  readonly operation: RemoteOperation;
  readonly diagnostic: string;
  readonly status: number | null;

  constructor(
    message: string,
    options: {
      operation: RemoteOperation;
      diagnostic?: string;
      status?: number | null;
    },
  ) {
    super(message);
    this.name = "RemoteFailure";
    this.operation = options.operation;
    this.diagnostic = options.diagnostic ?? message;
    this.status = options.status ?? null;
  }
}
