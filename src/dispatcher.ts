import { sleep } from "./retry.js";

export type DispatchOutcome<TItem, TValue> =
  | { status: "ok"; item: TItem; value: TValue }
  | { status: "error"; item: TItem; error: unknown };

export interface DispatchOptions {
  enabled: boolean;
  maxWorkers: number;
  batchSize: number;
  threshold: number;
  batchPauseMs: number;
  sleep?: (delayMs: number) => Promise<void>;
}

export const SEQUENTIAL_DISPATCH: DispatchOptions = {
  enabled: false,
  maxWorkers: 1,
  batchSize: 10,
  threshold: 10,
  batchPauseMs: 100,
};

export const resolveWorkerCount = (itemCount: number, maxWorkers: number): number => {
  const cap = Math.max(1, maxWorkers);
  if (itemCount <= 5) {
    return 1;
  }
  if (itemCount <= 20) {
    return Math.min(2, cap);
  }
  if (itemCount <= 50) {
    return Math.min(3, cap);
  }
  return cap;
};

export const isConcurrentDispatch = (
  itemCount: number,
  options: DispatchOptions,
): boolean => options.enabled && itemCount >= options.threshold;

const settle = async <TItem, TValue>(
  item: TItem,
  index: number,
  processor: (item: TItem, index: number) => Promise<TValue>,
): Promise<DispatchOutcome<TItem, TValue>> => {
  try {
    return { status: "ok", item, value: await processor(item, index) };
  } catch (error) {
    return { status: "error", item, error };
  }
};

const runPool = async <TItem, TValue>(
  batch: TItem[],
  offset: number,
  workers: number,
  processor: (item: TItem, index: number) => Promise<TValue>,
): Promise<Array<DispatchOutcome<TItem, TValue>>> => {
  const results = new Array<DispatchOutcome<TItem, TValue>>(batch.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < batch.length) {
      const position = next;
      next += 1;
      results[position] = await settle(batch[position], offset + position, processor);
    }
  };
  await Promise.all(
    Array.from({ length: Math.min(workers, batch.length) }, () => worker()),
  );
  return results;
};

/**
 * Runs `processor` over every item and returns one outcome per item in input
 * order. A failing item becomes an error outcome in both modes.
 */
export const dispatchItems = async <TItem, TValue>(
  items: TItem[],
  processor: (item: TItem, index: number) => Promise<TValue>,
  options: DispatchOptions = SEQUENTIAL_DISPATCH,
): Promise<Array<DispatchOutcome<TItem, TValue>>> => {
  if (!isConcurrentDispatch(items.length, options)) {
    const outcomes: Array<DispatchOutcome<TItem, TValue>> = [];
    for (const [index, item] of items.entries()) {
      outcomes.push(await settle(item, index, processor));
    }
    return outcomes;
  }

  const wait = options.sleep ?? sleep;
  const batchSize = Math.max(1, options.batchSize);
  const workers = resolveWorkerCount(items.length, options.maxWorkers);
  const outcomes: Array<DispatchOutcome<TItem, TValue>> = [];
  for (let offset = 0; offset < items.length; offset += batchSize) {
    if (offset > 0 && options.batchPauseMs > 0) {
      await wait(options.batchPauseMs);
    }
    const batch = items.slice(offset, offset + batchSize);
    outcomes.push(...(await runPool(batch, offset, workers, processor)));
  }
  return outcomes;
};
