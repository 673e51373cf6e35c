/**
 * In-flight request sharing.
 *
 * Wraps an async operation so that callers arriving while it runs receive
 * the same promise. Once it settles, the next call starts a fresh run.
 */
export function dedup<T>(operation: () => Promise<T>): () => Promise<T> {
  let current: Promise<T> | null = null;

  return () => {
    if (current) return current;

    const started = operation().finally(() => {
      if (current === started) current = null;
    });
    current = started;
    return started;
  };
}
