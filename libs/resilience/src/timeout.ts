import { TimeoutError } from './errors';

/**
 * Bounds a single attempt of `operation`. A non-positive timeout disables the bound.
 * The underlying promise is not cancelled; its late result is discarded.
 */
export function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label = 'operation',
): () => Promise<T> {
  if (!(timeoutMs > 0)) {
    return operation;
  }

  return () =>
    new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new TimeoutError(`${label} did not complete`, timeoutMs));
      }, timeoutMs);

      let pending: Promise<T>;
      try {
        pending = operation();
      } catch (error) {
        clearTimeout(timer);
        reject(error);
        return;
      }

      pending.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
}
