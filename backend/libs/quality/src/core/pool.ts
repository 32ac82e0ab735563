// core/pool.ts
// Bounded fan-out over columns with a positional fan-in.
//
// Workers pull the next column index, yield to the event loop, check the
// abort signal, and store the result at the column's original position, so
// completion order never leaks into the output.

import { availableParallelism } from "node:os";
import { setImmediate as nextTick } from "node:timers/promises";

import { AnalysisAbortedError } from "../errors.js";

export type PoolOptions = {
  concurrency?: number;        // <= 0 or unset: available parallelism
  signal?: AbortSignal;
};

export function resolveConcurrency(n?: number): number {
  return n && n > 0 ? Math.floor(n) : Math.max(1, availableParallelism());
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new AnalysisAbortedError(signal.reason);
}

export async function mapColumns<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => R | Promise<R>,
  opts: PoolOptions = {}
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.min(resolveConcurrency(opts.concurrency), items.length);
  let next = 0;
  let failed = false;

  async function worker(): Promise<void> {
    while (!failed && next < items.length) {
      const i = next++;
      try {
        await nextTick();
        throwIfAborted(opts.signal);
        results[i] = await fn(items[i], i);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  }

  throwIfAborted(opts.signal);
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
