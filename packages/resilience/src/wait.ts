import { Result } from "better-result";
import { TimeoutError } from "@hostnet/errors";
import { withTimeout } from "./timeout";
import type { WaitForEventOptions } from "./types";

/**
 * Arms a listener, runs the action, then waits for a matching event.
 *
 * The listener is in place before the action runs, so an event fired by
 * the action itself cannot be missed. A failed action ends the wait with
 * the action's own error; only an expired or aborted wait is a TimeoutError.
 *
 * @example
 * ```ts
 * const result = await waitForEvent({
 *   subscribe: (listener) => driver.subscribe("eth0", listener),
 *   act: () => driver.setState("eth0", "up"),
 *   until: (event) => (event.flags & IFF_UP) !== 0,
 *   timeoutMs: 2000,
 * });
 * ```
 */
export async function waitForEvent<T, E>(
  options: WaitForEventOptions<T, E>
): Promise<Result<void, E | TimeoutError>> {
  let settle: () => void = () => {};
  const satisfied = new Promise<void>((resolve) => {
    settle = resolve;
  });

  const subscription = options.subscribe((event) => {
    if (options.until(event)) {
      settle();
    }
  });
  if (subscription.isErr()) {
    return Result.err(subscription.error);
  }
  const unsubscribe = subscription.unwrap();
  let release: () => void = () => {};

  try {
    const acted = await options.act();
    if (acted.isErr()) {
      return Result.err(acted.error);
    }

    if (options.reached && (await options.reached())) {
      return Result.ok(undefined);
    }

    const cancellable = abortable(satisfied, options.signal);
    release = cancellable.release;
    const waited = await withTimeout(
      cancellable.wait,
      options.timeoutMs,
      options.message
    );
    if (waited.isErr()) {
      return Result.err(waited.error);
    }
    return Result.ok(undefined);
  } finally {
    release();
    unsubscribe();
  }
}

/**
 * Races `promise` against the signal. `release` detaches the abort listener
 * and must run however the wait ends, including when the timeout wins.
 */
function abortable(promise: Promise<void>, signal?: AbortSignal): { wait: Promise<void>; release: () => void } {
  if (!signal) {
    return { wait: promise, release: () => {} };
  }
  const cancelled = () => new TimeoutError({ message: "Wait cancelled" });
  if (signal.aborted) {
    return { wait: Promise.reject(cancelled()), release: () => {} };
  }
  let onAbort: () => void = () => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(cancelled());
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return {
    wait: Promise.race([promise, aborted]),
    release: () => signal.removeEventListener("abort", onAbort),
  };
}
