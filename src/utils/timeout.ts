/**
 * Runs an abortable operation under a deadline
 */

import { TimeoutError } from '../errors.js';

export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs?: number
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || timeoutMs <= 0) {
    return run(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
