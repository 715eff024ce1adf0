import { OperationTimeoutError } from '../resources/errors';

/** Largest delay `setTimeout` honours, longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Run `work` under a deadline. On expiry the signal handed to `work` is aborted with an
 * {@link OperationTimeoutError} and the returned promise rejects with it, whether or not
 * `work` has noticed yet. Long running work should call `signal.throwIfAborted()` between steps.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OperationTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
  });

  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
