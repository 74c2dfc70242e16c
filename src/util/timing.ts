import { ProbeTimeoutError } from '../errors';

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Races `task` against a timer. The task itself keeps running after a timeout;
 * only the caller stops waiting for it.
 */
export async function withTimeout<T>(label: string, timeoutMs: number, task: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new ProbeTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([ task(), timeout ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Waits `ms`, or less if `signal` aborts first.
 * Resolves `true` when the full delay elapsed and `false` when it was interrupted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.min(ms, MAX_TIMER_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
