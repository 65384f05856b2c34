import { logger } from '../core/logger';
import { BackendTimeoutError, RequestCancelledError } from '../core/errors';
import { CallOptions } from '../types/capabilities';

/**
 * Wraps a promise with a timeout and, optionally, the caller's abort signal.
 * The timer is always cleared once the race settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string,
  signal?: AbortSignal
): Promise<T> {
  throwIfAborted(signal, errorMessage);

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new BackendTimeoutError(`Timeout: ${errorMessage} (${timeoutMs}ms)`, { timeoutMs }));
    }, timeoutMs);

    if (signal) {
      onAbort = () => reject(new RequestCancelledError(`Cancelled: ${errorMessage}`));
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Runs a backend call under the caller's deadline. The call receives its own
 * signal, aborted on timeout or when the caller cancels, so HTTP clients can
 * drop the in-flight request.
 */
export async function callWithDeadline<T>(
  label: string,
  options: CallOptions,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  throwIfAborted(options.signal, label);

  const controller = new AbortController();
  const relay = () => controller.abort();
  options.signal?.addEventListener('abort', relay, { once: true });

  try {
    return await withTimeout(call(controller.signal), options.timeoutMs, label, options.signal);
  } catch (error) {
    controller.abort();
    if (error instanceof BackendTimeoutError) {
      logger.warn('Backend call timed out', { call: label, timeoutMs: options.timeoutMs });
    }
    throw error;
  } finally {
    options.signal?.removeEventListener('abort', relay);
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RequestCancelledError(`Request cancelled during ${stage}`);
  }
}
