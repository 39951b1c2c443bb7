// Test fixture: route fetch calls into an in-process hono app

import type { Hono } from 'hono';

/**
 * A fetch that serves requests from `app`. Like the real fetch it rejects
 * with the signal's reason once the request is aborted.
 */
export function honoFetch(app: Hono): typeof fetch {
  return async (input, init) => {
    const signal = init?.signal;
    signal?.throwIfAborted();
    const pending = Promise.resolve(app.fetch(new Request(input, init)));
    if (!signal) {
      return pending;
    }
    return new Promise<Response>((resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      pending.then(resolve, reject);
    });
  };
}
