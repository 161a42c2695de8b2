import type { Operator } from "../_types.ts";
import { createStatefulOperator } from "../operators.ts";

/**
 * Runs a task on some execution context and returns a function that
 * cancels it if it has not run yet.
 *
 * Schedulers are plain functions, so any context (a UI frame callback, a
 * worker message loop) can be adapted in one line.
 */
export type Scheduler = (task: () => void) => () => void;

/**
 * Runs tasks on the macrotask queue via `setTimeout(task, 0)`.
 *
 * Tasks scheduled one after another run in the same order.
 */
export const asyncScheduler: Scheduler = (task) => {
  const timeout = setTimeout(task, 0);
  return () => clearTimeout(timeout);
};

/**
 * Runs tasks on the microtask queue, after the current job but before any
 * timer or I/O callback.
 */
export const microtaskScheduler: Scheduler = (task) => {
  let cancelled = false;
  queueMicrotask(() => {
    if (!cancelled) task();
  });
  return () => { cancelled = true; };
};

/**
 * Runs tasks right away, on the caller's stack.
 */
export const immediateScheduler: Scheduler = (task) => {
  task();
  return () => {};
};

/**
 * Re-emits every value, and the completion, on the given scheduler.
 *
 * Order is preserved as long as the scheduler runs tasks in the order they
 * were scheduled. Unsubscribing cancels everything still pending.
 *
 * > Note: errors are not rescheduled; they are forwarded immediately.
 *
 * @example
 * ```ts
 * import { pipe, observeOn, asyncScheduler } from "./helpers/mod.ts";
 *
 * const later = pipe(Observable.of(1, 2), observeOn(asyncScheduler));
 * later.subscribe(console.log);
 * console.log("subscribed");
 * // "subscribed", then 1, 2 on later ticks
 * ```
 *
 * ## Practical Use Case
 *
 * Use `observeOn` to move work off the emitter's stack, e.g. to deliver
 * values from a synchronous source on a later tick so observers that
 * subscribe right after it still see them.
 *
 * @typeParam T - Type of values from the source stream
 * @param scheduler - Where to deliver values
 */
export function observeOn<T>(scheduler: Scheduler): Operator<T, T> {
  return createStatefulOperator<T, T, { pending: Set<() => void> }>({
    name: 'observeOn',
    createState: () => ({ pending: new Set() }),

    transform(chunk, state, controller) {
      schedule(state.pending, scheduler, () => controller.enqueue(chunk));
    },

    flush(state, controller) {
      schedule(state.pending, scheduler, () => controller.terminate());
    },

    cancel(state) {
      const pending = Array.from(state.pending);
      state.pending.clear();
      for (const cancelTask of pending) cancelTask();
    }
  });
}

function schedule(pending: Set<() => void>, scheduler: Scheduler, task: () => void): void {
  let ran = false;
  let cancelTask: (() => void) | null = null;

  cancelTask = scheduler(() => {
    ran = true;
    if (cancelTask) pending.delete(cancelTask);
    task();
  });

  // The immediate scheduler has already run the task
  if (!ran) pending.add(cancelTask);
}
