import type {
  RemoteClient,
  RemoteCreateInput,
  RemoteId,
  RemoteOperation,
  RemoteRecord,
  RemoteUpdateInput,
} from "./adapters.js";
import { RemoteFailure } from "./adapters.js";

export interface RemoteCall {
  operation: RemoteOperation;
  id?: RemoteId;
  input?: RemoteCreateInput | RemoteUpdateInput;
}

export interface InMemoryRemoteClientOptions {
  records?: RemoteRecord[];
  nextId?: () => RemoteId;
}

export const createSequence = (start = 1): (() => RemoteId) => {
  let next = start;
  return () => {
    const value = next;
    next += 1;
    return value;
  };
};

const copyRecord = (record: RemoteRecord): RemoteRecord => ({
  ...record,
  labels: [...record.labels],
});

/** Process-local issue tracker. Each instance owns its id sequence. */
export class InMemoryRemoteClient implements RemoteClient {
  readonly calls: RemoteCall[] = [];
  private readonly store = new Map<RemoteId, RemoteRecord>();
  private readonly nextId: () => RemoteId;
  private readonly failures: Array<{ operation: RemoteOperation; error: Error }> = [];

  constructor(options: InMemoryRemoteClientOptions = {}) {
    (options.records ?? []).forEach((record) => {
      this.store.set(record.id, copyRecord(record));
    });
    const highest = Math.max(0, ...this.store.keys());
    this.nextId = options.nextId ?? createSequence(highest + 1);
  }

  get records(): RemoteRecord[] {
    return [...this.store.values()].map(copyRecord);
  }

  /** The next call of `operation` rejects with `error`. */
  failNext(operation: RemoteOperation, error: Error): void {
    this.failures.push({ operation, error });
  }

  async list(): Promise<RemoteRecord[]> {
    this.track({ operation: "list" });
    return this.records;
  }

  async create(input: RemoteCreateInput): Promise<RemoteId | null> {
    this.track({ operation: "create", input });
    const id = this.nextId();
    this.store.set(id, {
      id,
      title: input.title,
      body: input.body,
      labels: [...(input.labels ?? [])],
      milestone: input.milestone ?? null,
      state: "OPEN",
    });
    return id;
  }

  async update(id: RemoteId, input: RemoteUpdateInput): Promise<void> {
    this.track({ operation: "update", id, input });
    const record = this.require("update", id);
    if (input.body !== undefined) {
      record.body = input.body;
    }
    if (input.labels !== undefined) {
      record.labels = [...input.labels];
    }
    if (input.milestone !== undefined) {
      record.milestone = input.milestone;
    }
    if (input.state !== undefined) {
      record.state = input.state === "closed" ? "CLOSED" : "OPEN";
    }
  }

  async close(id: RemoteId): Promise<void> {
    this.track({ operation: "close", id });
    this.require("close", id).state = "CLOSED";
  }

  private track(call: RemoteCall): void {
    this.calls.push(call);
    const index = this.failures.findIndex((failure) => failure.operation === call.operation);
    if (index >= 0) {
      const [failure] = this.failures.splice(index, 1);
      throw failure.error;
    }
  }

  private require(operation: RemoteOperation, id: RemoteId): RemoteRecord {
    const record = this.store.get(id);
    if (!record) {
      throw new RemoteFailure(`Issue #${id} not found`, { operation, status: 404 });
    }
    return record;
  }
}
