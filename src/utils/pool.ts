/**
 * Bounded worker pool for fan-out over a fixed list of items.
 *
 * At most `width` task bodies run at once and outcomes come back in input
 * order. A per-task timeout rejects that item and aborts its signal, but the
 * worker does not take another item until the body has settled. A batch
 * timeout stops dispatching, aborts every in-flight signal and
 * returns without waiting for them. Tasks are expected to check their
 * signal before publishing side effects.
 */

import { AnalysisTimeoutError, toError } from '../core/errors.js';
import { withTimeout } from './retry.js';

export type TaskOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: Error };

export interface BoundedRunOptions {
  taskTimeoutMs?: number;
  batchTimeoutMs?: number;
  /** Used in timeout messages */
  label?: (index: number) => string;
}

export async function runBounded<T, R>(
  items: readonly T[],
  width: number,
  task: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  options: BoundedRunOptions = {},
): Promise<Array<TaskOutcome<R>>> {
  if (width < 1) throw new Error('Pool width must be at least 1');

  const label = options.label ?? ((index: number) => `task ${index}`);
  const outcomes = Array.from<TaskOutcome<R> | undefined>({ length: items.length });
  const inFlight = new Set<AbortController>();
  let next = 0;
  let expired = false;

  const runOne = async (index: number): Promise<void> => {
    const controller = new AbortController();
    inFlight.add(controller);
    const pending = Promise.resolve().then(() => task(items[index], index, controller.signal));
    const { taskTimeoutMs } = options;

    try {
      const value = taskTimeoutMs
        ? await withTimeout(pending, taskTimeoutMs, () => {
            const error = new AnalysisTimeoutError(label(index), taskTimeoutMs);
            controller.abort(error);
            return error;
          })
        : await pending;
      if (!expired) outcomes[index] = { status: 'fulfilled', value };
    } catch (err) {
      if (!expired) outcomes[index] = { status: 'rejected', reason: toError(err) };
    }

    // A timed-out body still holds its slot until it settles.
    await pending.catch(() => undefined);
    inFlight.delete(controller);
  };

  const worker = async (): Promise<void> => {
    while (!expired && next < items.length) {
      await runOne(next++);
    }
  };

  const workers = Promise.all(
    Array.from({ length: Math.min(width, items.length) }, () => worker()),
  );

  const { batchTimeoutMs } = options;
  if (batchTimeoutMs) {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'expired'>(resolve => {
      timer = setTimeout(() => resolve('expired'), batchTimeoutMs);
    });
    const winner = await Promise.race([workers.then(() => 'done' as const), deadline]);
    clearTimeout(timer);
    if (winner === 'expired') {
      expired = true;
      const error = new AnalysisTimeoutError('batch', batchTimeoutMs);
      for (const controller of inFlight) controller.abort(error);
    }
  } else {
    await workers;
  }

  return outcomes.map((outcome, index) =>
    outcome ?? { status: 'rejected', reason: new AnalysisTimeoutError(`${label(index)} (batch)`, batchTimeoutMs ?? 0) },
  );
}
