import type { FetchFunction } from "@ai-sdk/provider-utils";

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function withTimeoutSignal(
  signal: AbortSignal | null | undefined,
  timeoutMs: number
): { signal: AbortSignal; cleanup: () => void } {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return { signal: signal ?? new AbortController().signal, cleanup: () => {} };
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort(new Error(`Request timeout after ${timeoutMs}ms`));
  }, timeoutMs);

  const onAbort = () => controller.abort(signal?.reason);
  if (signal) {
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      clearTimeout(timeoutId);
      if (signal) signal.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Wraps fetch so every request aborts after timeoutMs.
 * The timer covers the whole exchange, body included, and is cleared once
 * the body has been read or the request fails.
 */
export function createTimeoutFetch(
  timeoutMs: number,
  baseFetch: typeof fetch = globalThis.fetch
): FetchFunction {
  return async (input, init = {}) => {
    const { signal, cleanup } = withTimeoutSignal(init.signal, timeoutMs);
    try {
      const response = await baseFetch(input, { ...init, signal });
      const body = NULL_BODY_STATUSES.has(response.status) ? null : await response.arrayBuffer();
      return new Response(body, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      });
    } finally {
      cleanup();
    }
  };
}
