import type { Result } from "better-result";

/**
 * Options for a subscribe-then-act wait
 */
export interface WaitForEventOptions<T, E> {
  /** Arm the listener. Returns the function that disarms it. */
  subscribe: (listener: (event: T) => void) => Result<() => void, E>;
  /** The mutating command, issued only once the listener is armed */
  act: () => Promise<Result<void, E>>;
  /** Predicate an event must satisfy to end the wait */
  until: (event: T) => boolean;
  /** Checked right after `act`, for state that was already reached */
  reached?: () => Promise<boolean>;
  /** Upper bound on the wait in milliseconds */
  timeoutMs: number;
  /** Aborting ends the wait with a TimeoutError */
  signal?: AbortSignal;
  /** Message of the TimeoutError */
  message?: string;
}
