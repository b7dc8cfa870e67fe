/**
 * Races a promise against a timer. The underlying work is not cancelled; only
 * the caller stops waiting for it.
 */
export const withTimeout = <T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> => {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return work;
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    work.then(
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
};
