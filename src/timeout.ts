import { OperationTimeoutError } from "./errors";

/**
 * Runs `work` with an abort signal that fires after `timeoutMs` or when
 * `parent` aborts. Settles as soon as either happens, even if `work`
 * ignores its signal. The signal is aborted once the call settles.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new OperationTimeoutError(timeoutMs)), timeoutMs);
  const forwardAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    forwardAbort();
  } else {
    parent?.addEventListener("abort", forwardAbort, { once: true });
  }

  let stopWaiting = (): void => {};
  try {
    controller.signal.throwIfAborted();
    const aborted = new Promise<never>((_, reject) => {
      const onAbort = () => reject(controller.signal.reason);
      controller.signal.addEventListener("abort", onAbort, { once: true });
      stopWaiting = () => controller.signal.removeEventListener("abort", onAbort);
    });
    return await Promise.race([work(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
    stopWaiting();
    // Cancels requests the work left running
    controller.abort();
  }
}
