import { Result } from "better-result";
import { TimeoutError } from "@hostnet/errors";

/**
 * Wraps a promise with a timeout, returning a Result type.
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param message - Optional custom error message
 *
 * @example
 * ```ts
 * const result = await withTimeout(linkUp, 2000, "eth0 did not come up");
 * if (result.isErr()) {
 *   logger.error(result.error.message);
 * }
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message?: string
): Promise<Result<T, TimeoutError>> {
  return Result.tryPromise({
    try: async () => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(
            new TimeoutError({
              message: message ?? `Operation timed out after ${timeoutMs}ms`,
            })
          );
        }, timeoutMs);
      });

      try {
        return await Promise.race([promise, timeoutPromise]);
      } finally {
        if (timeoutId) {
          clearTimeout(timeoutId);
        }
      }
    },
    catch: (error) => {
      if (TimeoutError.is(error)) {
        return error;
      }
      return new TimeoutError({
        message: message ?? `Operation timed out after ${timeoutMs}ms`,
      });
    },
  });
}
