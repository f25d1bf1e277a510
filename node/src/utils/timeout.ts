// src/utils/timeout.ts

export class TimeoutElapsedError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Operation exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutElapsedError';
  }
}

/**
 * Races `run` against a timer. The signal handed to `run` aborts when the timer wins so the
 * callee can drop its socket; the returned promise settles either way and the timer is cleared.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the timeout wins the race over a callee that rejects on abort.
      reject(new TimeoutElapsedError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
