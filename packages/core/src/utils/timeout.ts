/**
 * Run `operation` with a signal that aborts after `timeoutMs`
 *
 * On expiry the signal is aborted and the call rejects with `onTimeout()`,
 * whether or not the operation honours the signal. A missing, zero or
 * non-finite timeout disables the limit; the signal then never fires.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return operation(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), expiry]);
  } finally {
    clearTimeout(timer);
  }
}
