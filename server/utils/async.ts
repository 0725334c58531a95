export interface Deadline {
  signal: AbortSignal;
  /** True once the deadline itself (not the parent signal) fired. */
  expired: () => boolean;
  dispose: () => void;
}

/**
 * Abort signal that fires after `ms` or when `parent` aborts, whichever comes first.
 */
export const createDeadline = (ms: number, parent?: AbortSignal | null): Deadline => {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, ms);

  const onParentAbort = () => controller.abort();
  if (parent) {
    if (parent.aborted) {
      controller.abort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    expired: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
};
