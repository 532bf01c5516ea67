export class TimeoutElapsedError extends Error {
  constructor(readonly operation: string, readonly ms: number) {
    super(`${operation} timed out after ${ms}ms`);
    this.name = 'TimeoutElapsedError';
  }
}

/**
 * Race `work` against a timer. The timer is always cleared so nothing is left
 * pending once the race settles.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutElapsedError(operation, ms)), ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
