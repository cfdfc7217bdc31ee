import { ValidationError } from "../core/errors";

export type BoundedResult<I, T> =
  | { status: "fulfilled"; item: I; value: T }
  | { status: "rejected"; item: I; reason: unknown };

export const assertConcurrencyLimit = (limit: number) => {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Límite de concurrencia inválido: ${limit}`);
  }
};

/**
 * Runs `task` over `items` in sequential batches of `limit`. Every batch is
 * fully settled before the next one starts, so the slowest item of a batch
 * holds the rest back. Results keep the input order, one entry per item.
 */
export const runBounded = async <I, T>(
  items: readonly I[],
  limit: number,
  task: (item: I, index: number) => Promise<T>,
): Promise<BoundedResult<I, T>[]> => {
  assertConcurrencyLimit(limit);
  const results: BoundedResult<I, T>[] = [];
  for (let start = 0; start < items.length; start += limit) {
    const batch = items.slice(start, start + limit);
    const settled = await Promise.allSettled(
      batch.map((item, offset) => Promise.resolve().then(() => task(item, start + offset))),
    );
    settled.forEach((outcome, offset) => {
      const item = batch[offset];
      results.push(
        outcome.status === "fulfilled"
          ? { status: "fulfilled", item, value: outcome.value }
          : { status: "rejected", item, reason: outcome.reason },
      );
    });
  }
  return results;
};

export const fulfilledValues = <I, T>(results: BoundedResult<I, T>[]) =>
  results.flatMap((result) => (result.status === "fulfilled" ? [result.value] : []));
