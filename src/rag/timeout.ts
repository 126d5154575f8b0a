import { QueryCancelledError, TimeoutError } from "./errors.js";

/**
 * Run `op` with its own AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts. Rejects with TimeoutError or QueryCancelledError even if
 * `op` ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  op: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new QueryCancelledError(operation);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const err = new QueryCancelledError(operation);
        controller.abort(err);
        reject(err);
      };
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([op(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) parent.removeEventListener("abort", onParentAbort);
  }
}
