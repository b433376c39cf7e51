import { OperationTimeoutError } from '../errors.js';

/**
 * Races `task` against a timer. The underlying call is not interrupted; its late
 * settlement is ignored once the timeout has fired.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: () => Promise<T>
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task();
  }

  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  const pending = task();
  // a late rejection after the timeout must not surface as unhandled
  pending.catch(() => undefined);

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
