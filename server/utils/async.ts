export const abortError = (signal?: AbortSignal | null): Error => {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) {
    return reason;
  }
  return new Error('Aborted');
};

export const sleep = (ms: number, signal?: AbortSignal | null): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface LinkedAbort {
  signal: AbortSignal;
  /** Detaches listeners and clears the timer; call once the guarded work settles. */
  dispose: () => void;
}

/**
 * An abort signal that fires when the parent aborts or after `timeoutMs`.
 * A non-positive timeout means no deadline of its own.
 */
export const linkAbortSignal = (parent: AbortSignal | undefined, timeoutMs: number, label = 'Operation'): LinkedAbort => {
  const controller = new AbortController();
  const timer =
    timeoutMs > 0
      ? setTimeout(() => controller.abort(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs)
      : null;

  const onParentAbort = () => controller.abort(abortError(parent));
  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
};
