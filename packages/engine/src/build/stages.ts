/**
 * Pipeline Stages
 *
 * A stage runs one task per item concurrently and waits for all of them
 * (fan-out/fan-in). If any task fails, the failure of the earliest item is
 * rethrown, so the reported error does not depend on timing.
 */

export async function fanOut<T, R>(
  items: readonly T[],
  task: (item: T, index: number) => Promise<R> | R,
): Promise<R[]> {
  const settled = await Promise.allSettled(items.map(async (item, index) => task(item, index)));

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}
