import { TimeoutError } from "../errors.js";

/**
 * Race `work` against a timer. On expiry `onTimeout` runs (typically to abort
 * the underlying call) and the race rejects with a TimeoutError. The timer is
 * always cleared.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  stage: "generation" | "execution",
  onTimeout?: () => void
): Promise<T> {
  let timerId: ReturnType<typeof setTimeout> | undefined;
  try {
    const timer = new Promise<never>((_, reject) => {
      timerId = setTimeout(() => {
        // Reject first so the race settles on the timeout, not the abort it triggers
        reject(new TimeoutError(stage, timeoutMs));
        onTimeout?.();
      }, timeoutMs);
    });
    return await Promise.race([work, timer]);
  } finally {
    if (timerId !== undefined) clearTimeout(timerId);
  }
}

/**
 * An AbortController that also aborts when `parent` does. Call `dispose`
 * once the attempt settles to drop the listener.
 */
export function linkedAbort(parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => undefined };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => undefined };
  }
  const forward = () => controller.abort(parent.reason);
  parent.addEventListener("abort", forward, { once: true });
  return { controller, dispose: () => parent.removeEventListener("abort", forward) };
}
