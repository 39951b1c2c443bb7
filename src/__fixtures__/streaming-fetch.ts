// Test fixture: fetch whose response body breaks off after the first chunk

export interface StreamingFetchOptions {
  /** Sent before the body fails or stalls */
  chunk: string;
  /** `error` drops the connection, `stall` never sends the rest */
  then: 'error' | 'stall';
  status?: number;
}

/**
 * Headers arrive at once; the body then errors or hangs. A stalled body
 * fails with the request signal's reason once that signal aborts, as the
 * real fetch does.
 */
export function streamingFetch(options: StreamingFetchOptions): typeof fetch {
  return async (_input, init) => {
    const signal = init?.signal;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(options.chunk));
        if (options.then === 'error') {
          controller.error(new TypeError('terminated'));
          return;
        }
        if (signal) {
          signal.addEventListener('abort', () => controller.error(signal.reason), { once: true });
        }
      },
    });
    return new Response(body, {
      status: options.status ?? 200,
      headers: { 'content-type': 'application/json' },
    });
  };
}
