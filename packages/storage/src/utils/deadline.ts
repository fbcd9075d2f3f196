import type { StoreCallOptions } from "../types";

export interface Deadline {
  readonly signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Derives one signal from the caller's abort signal and an optional per-call
 * timeout. `dispose()` must run once the call settles.
 */
export function createDeadline(options: StoreCallOptions = {}): Deadline {
  const controller = new AbortController();
  const upstream = options.signal;
  let expired = false;

  const onAbort = () => controller.abort(upstream?.reason);
  if (upstream?.aborted) {
    controller.abort(upstream.reason);
  } else {
    upstream?.addEventListener("abort", onAbort, { once: true });
  }

  const timer =
    options.timeoutMs && options.timeoutMs > 0
      ? setTimeout(() => {
          expired = true;
          controller.abort(new Error(`deadline of ${options.timeoutMs}ms exceeded`));
        }, options.timeoutMs)
      : undefined;
  timer?.unref();

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose() {
      if (timer) clearTimeout(timer);
      upstream?.removeEventListener("abort", onAbort);
    },
  };
}
