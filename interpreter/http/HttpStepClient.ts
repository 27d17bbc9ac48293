import { NULL, fromJSON, map, num, str, type Value } from '@core/types/value';
import { httpLogger as logger } from '@core/utils/logger';
import { DEFAULT_HTTP_TIMEOUT_MS } from '@core/config/loader';

export interface HttpStepRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpStepClientOptions {
  timeoutMs?: number;
  /** Defaults to the global fetch, looked up on every request */
  fetch?: FetchFunction;
}

/**
 * Non-2xx answer. The message carries the response text as the server sent it.
 */
export class HttpStatusError extends Error {
  constructor(public readonly status: number, body: string) {
    super(`HTTP ${status}: ${body}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Request cancelled by the caller or by the client's own timeout.
 */
export class HttpAbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HttpAbortError';
  }
}

/**
 * Performs one HTTP step and shapes the response as `{ body, status, headers }`.
 */
export class HttpStepClient {
  readonly timeoutMs: number;
  private readonly fetchImpl?: FetchFunction;

  constructor(options: HttpStepClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
  }

  async send(request: HttpStepRequest, signal?: AbortSignal): Promise<Value> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    logger.debug('Sending request', { method: request.method, url: request.url });
    const fetchImpl = this.fetchImpl ?? fetch;
    let response: Response;
    let text: string;
    try {
      response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal
      });
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HttpAbortError(timedOut ? `request timed out after ${this.timeoutMs}ms` : 'request aborted');
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }

    logger.debug('Received response', { url: request.url, status: response.status });
    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(response.status, text);
    }

    const headers: Array<[string, Value]> = [];
    response.headers.forEach((value, key) => {
      headers.push([key.toLowerCase(), str(value)]);
    });
    return map([
      ['body', parseBody(text)],
      ['status', num(response.status)],
      ['headers', map(headers)]
    ]);
  }
}

/**
 * Empty payloads are null, JSON payloads are decoded, anything else is text.
 */
export function parseBody(text: string): Value {
  if (text === '') {
    return NULL;
  }
  try {
    return fromJSON(JSON.parse(text));
  } catch {
    return str(text);
  }
}
