/**
 * Runs tasks on at most `limit` workers. Results keep input order; a throwing task
 * becomes a rejected entry instead of stopping its siblings.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
): Promise<Array<PromiseSettledResult<T>>> {
  if (tasks.length === 0) return [];
  const resolvedLimit = Math.max(1, Math.min(Math.floor(limit) || 1, tasks.length));
  const results: Array<PromiseSettledResult<T>> = Array.from({ length: tasks.length });
  let next = 0;

  const workers = Array.from({ length: resolvedLimit }, async () => {
    while (true) {
      const index = next;
      next += 1;
      if (index >= tasks.length) return;
      try {
        results[index] = { status: "fulfilled", value: await tasks[index]() };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  });

  await Promise.all(workers);
  return results;
}
