export type SleepResult = "elapsed" | "cancelled";

/**
 * Waits for `ms` milliseconds unless `signal` aborts first. Resolves with
 * which of the two happened; it never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<SleepResult> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve("cancelled");
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve("cancelled");
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve("elapsed");
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
