import { GatewayTimeoutError } from './errors.js';

/**
 * Run an external call with a hard deadline.
 *
 * The task receives an AbortSignal that fires when the deadline passes, so
 * SDKs that honour it can cancel the underlying request. The caller gets a
 * GatewayTimeoutError either way.
 */
export async function withDeadline<T>(
  gateway: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GatewayTimeoutError(gateway, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
