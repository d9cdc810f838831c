export class TimeoutError extends Error {
  constructor(ms: number) {
    super(`Request timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/** Rejects after `ms`, aborting the controller so the underlying request stops. */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  abort?: AbortController,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      abort?.abort();
      reject(new TimeoutError(ms));
    }, ms);
    promise
      .then((value) => resolve(value))
      .catch((error: unknown) =>
        reject(error instanceof Error ? error : new Error(String(error))),
      )
      .finally(() => clearTimeout(timer));
  });
}
