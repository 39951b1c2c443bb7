import type { Logger } from '../../logger.js';
import { ProviderError, TransportError, errorMessage } from '../../errors.js';

export interface PostJsonRequest {
  provider: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  fetch: typeof fetch;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger: Logger;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * POST a JSON body to a model endpoint and return the decoded JSON response.
 *
 * The timeout covers the whole exchange, body included. Network failures
 * (also while reading the body), timeouts, 401 and 403 become
 * `TransportError`; any other non-2xx status or an undecodable body becomes
 * `ProviderError`.
 */
export async function postJson(request: PostJsonRequest): Promise<unknown> {
  const { provider, logger } = request;
  const controller = new AbortController();
  let timedOut = false;

  const onAbort = (): void => controller.abort(request.signal?.reason);
  if (request.signal?.aborted) {
    controller.abort(request.signal.reason);
  } else {
    request.signal?.addEventListener('abort', onAbort, { once: true });
  }

  const timer =
    request.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, request.timeoutMs)
      : undefined;

  const fail = (error: unknown): TransportError => {
    if (timedOut) {
      logger.warn({ timeoutMs: request.timeoutMs }, `${provider} request timed out`);
      return new TransportError(`${provider} request timed out after ${request.timeoutMs}ms`, {
        timeout: true,
        cause: error,
      });
    }
    if (request.signal?.aborted) {
      logger.info(`${provider} request aborted`);
      return new TransportError(`${provider} request aborted`, { cause: error });
    }
    logger.error({ error: errorMessage(error) }, `${provider} request failed`);
    return new TransportError(`${provider} request failed: ${errorMessage(error)}`, { cause: error });
  };

  // the timer and the caller's signal stay armed until the body is read
  let response: Response;
  let text: string;
  try {
    response = await request.fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });
    text = await response.text();
  } catch (error) {
    throw fail(error);
  } finally {
    clearTimeout(timer);
    request.signal?.removeEventListener('abort', onAbort);
  }

  if (response.status === 401 || response.status === 403) {
    throw new TransportError(`${provider} rejected the credentials: ${response.status} - ${text}`);
  }

  if (!response.ok) {
    throw new ProviderError(
      `${provider} API error: ${response.status} - ${text}`,
      provider,
      response.status,
      parseRetryAfter(response.headers.get('retry-after'))
    );
  }

  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new ProviderError(`${provider} returned a malformed response body`, provider, response.status, undefined, error);
  }
}
