import os from "node:os";
import pLimit from "p-limit";

export interface ScheduleOptions<T, R> {
  width: number;
  run: (item: T) => Promise<R>;
  recover: (item: T, error: unknown) => R;
  onSettled?: (result: R, done: number, total: number) => void;
}

export function defaultWidth(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Runs `run` once per item with at most `width` in flight and resolves once
 * every item has settled. Results come back in input order. A rejected item
 * is passed to `recover` and never cancels the others.
 */
export async function schedule<T, R>(items: readonly T[], options: ScheduleOptions<T, R>): Promise<R[]> {
  const limit = pLimit(Math.max(1, Math.floor(options.width)));
  let done = 0;

  return Promise.all(
    items.map((item) =>
      limit(async () => {
        let result: R;
        try {
          result = await options.run(item);
        } catch (err) {
          result = options.recover(item, err);
        }
        done++;
        options.onSettled?.(result, done, items.length);
        return result;
      })
    )
  );
}
