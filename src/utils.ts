/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so a
 * sleeping loop can be woken for shutdown without an error path.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}...`;
}

export function isAbortError(error: unknown): boolean {
  return isPlainObject(error) && error.name === 'AbortError';
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error && error.message.length > 0) {
    return error.message;
  }
  if (isPlainObject(error)) {
    if (typeof error.message === 'string') {
      return error.message;
    }
    if (isPlainObject(error.error) && typeof error.error.message === 'string') {
      return error.error.message;
    }
  }
  return 'unknown error';
}
