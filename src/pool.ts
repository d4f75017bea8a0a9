/**
 * Fixed-width worker pool
 */

import { errorMessage } from './errors.js';

/**
 * Run tasks with at most `width` in flight. Results are collected in
 * completion order; a task that rejects is logged and contributes nothing.
 */
export async function runPool<T>(tasks: Array<() => Promise<T>>, width: number): Promise<T[]> {
  const results: T[] = [];
  const limit = Math.max(1, width);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const index = nextIndex++;
      try {
        results.push(await tasks[index]());
      } catch (err) {
        console.error(`  Task ${index + 1}/${tasks.length} failed: ${errorMessage(err)}`);
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, tasks.length) }, () => worker());
  await Promise.all(workers);

  return results;
}
