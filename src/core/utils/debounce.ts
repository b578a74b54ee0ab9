export type Debounced<A extends unknown[]> = ((...args: A) => void) & {
  /** Drop the pending call, if any */
  cancel: () => void;
  pending: () => boolean;
};

/**
 * Creates a debounced function that delays invoking `fn` until after `wait` milliseconds
 * have elapsed since the last time the debounced function was invoked.
 *
 * @example
 * const reload = debounce((file: string) => cache.invalidatePath(file), 100);
 * watcher.on('change', reload);
 * // Later: reload.cancel() to drop a pending call
 */
export function debounce<A extends unknown[]>(
  fn: (...args: A) => void,
  wait: number,
): Debounced<A> {
  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  const cancel = () => {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
      timeoutId = null;
    }
  };

  const debounced = (...args: A) => {
    cancel();
    timeoutId = setTimeout(() => {
      timeoutId = null;
      fn(...args);
    }, wait);
  };

  return Object.assign(debounced, {
    cancel,
    pending: () => timeoutId !== null,
  });
}
