export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Stops polling; the result is then `null`. */
  signal?: AbortSignal;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calls `getter` until it returns a value or `timeoutMs` has elapsed. The
 * engine does not announce when state machines or inputs become available, so
 * readiness is observed by polling. The getter always runs at least once.
 */
export async function pollFor<T>(
  getter: () => T | null | undefined,
  options: PollOptions
): Promise<T | null> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    if (options.signal?.aborted) return null;
    const value = getter();
    if (value !== null && value !== undefined) return value;
    if (Date.now() >= deadline) return null;
    await delay(options.intervalMs);
  }
}
