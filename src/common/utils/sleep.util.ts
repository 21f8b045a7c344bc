function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Resolve after `ms`, reject with an AbortError as soon as the signal aborts
 */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  if (abortSignal?.aborted) {
    return Promise.reject(createAbortError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(createAbortError());
    };
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Like sleep, but an abort ends the wait early instead of failing it.
 * Resolves to false when the wait was interrupted.
 */
export async function waitUnlessAborted(ms: number, abortSignal: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, abortSignal);
    return true;
  } catch (error) {
    if (abortSignal.aborted) {
      return false;
    }
    throw error;
  }
}
