/**
 * Timeout helper for capability boundaries.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Races a promise against a timer. Rejects with TimeoutError when the timer
 * wins, after calling onTimeout; a promise that ignores onTimeout keeps
 * running but its result is dropped.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  errorMessage: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(errorMessage, ms));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export const TIMEOUTS = {
  /** Connectivity probe (HEAD request) */
  CONNECTIVITY_PROBE: 3_000,
  /** Local model generation */
  LOCAL_MODEL: 20_000,
} as const;
