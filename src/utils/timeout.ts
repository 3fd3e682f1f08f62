/**
 * Bounded waits for calls into metric sources
 */

import { MonitoringError, ErrorCategory, ErrorSeverity } from '../error-handling/error-types';

/**
 * Resolve with the operation's result, or reject with a TIMEOUT MonitoringError
 * once `timeoutMs` elapses or `signal` aborts. The timer is always cleared.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  component: string,
  label: string,
  signal?: AbortSignal
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new MonitoringError(
        `${label} timed out after ${timeoutMs}ms`,
        ErrorCategory.TIMEOUT,
        ErrorSeverity.LOW,
        component,
        label,
        { timeoutMs }
      ));
    }, Math.max(0, timeoutMs));

    if (signal) {
      onAbort = () => {
        reject(new MonitoringError(
          `${label} cancelled`,
          ErrorCategory.TIMEOUT,
          ErrorSeverity.LOW,
          component,
          label,
          { cancelled: true }
        ));
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    if (signal && onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}
