export type Lazy<T> = {
  get(): Promise<T>;
};

/**
 * Single-assignment guard around an async loader. Concurrent callers share the
 * in-flight load; a rejected load is forgotten so the next caller retries.
 */
export function lazyOnce<T>(load: () => Promise<T>): Lazy<T> {
  let pending: Promise<T> | null = null;

  return {
    get() {
      if (!pending) {
        pending = load().catch((err: unknown) => {
          pending = null;
          throw err;
        });
      }
      return pending;
    },
  };
}
