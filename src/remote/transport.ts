import { RequestCancelled, describeError } from '../errors/index.js';

// Largest delay a Node timer honors; anything above fires after 1 ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface TransportRequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export type TransportResult =
  | { ok: true; status: number; body: unknown }
  | { ok: false; reason: string; status?: number; detail?: string };

export type ReachResult =
  | { reached: true; status: number }
  | { reached: false; reason: string };

/**
 * One outbound exchange with a remote dependency. Transport failures come
 * back as values; only cancellation of the caller's signal throws.
 */
export interface Transport {
  postJson(url: string, body: unknown, options: TransportRequestOptions): Promise<TransportResult>;
  reach(url: string, options: TransportRequestOptions): Promise<ReachResult>;
}

type Exchange<T> = { done: T } | { failure: string; detail?: string };

export class FetchTransport implements Transport {
  constructor(private readonly fetchImpl?: typeof fetch) {}

  async postJson(url: string, body: unknown, options: TransportRequestOptions): Promise<TransportResult> {
    const init: RequestInit = {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json', ...options.headers },
      body: JSON.stringify(body)
    };

    const exchange = await this.exchange<TransportResult>(url, init, options, async response => {
      const text = await response.text();

      if (!response.ok) {
        return { ok: false, reason: `http ${response.status}`, status: response.status };
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return { ok: true, status: response.status, body: parsed };
      } catch (error) {
        return { ok: false, reason: 'invalid json body', status: response.status, detail: describeError(error) };
      }
    });

    if ('done' in exchange) return exchange.done;
    return { ok: false, reason: exchange.failure, detail: exchange.detail };
  }

  async reach(url: string, options: TransportRequestOptions): Promise<ReachResult> {
    const exchange = await this.exchange<ReachResult>(
      url,
      { method: 'GET', headers: options.headers },
      options,
      async response => {
        await response.text();
        return { reached: true, status: response.status };
      }
    );

    if ('done' in exchange) return exchange.done;
    return { reached: false, reason: exchange.failure };
  }

  // The deadline covers reading the body as well as the response head.
  private async exchange<T>(
    url: string,
    init: RequestInit,
    options: TransportRequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<Exchange<T>> {
    if (options.signal?.aborted) {
      throw new RequestCancelled(`Request cancelled before calling ${url}`);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, Math.min(options.timeoutMs, MAX_TIMEOUT_MS));
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const doFetch = this.fetchImpl ?? fetch;
      const response = await doFetch(url, { ...init, signal: controller.signal });
      return { done: await read(response) };
    } catch (error) {
      if (options.signal?.aborted) {
        throw new RequestCancelled(`Request cancelled while calling ${url}`, { cause: error });
      }
      if (timedOut) {
        return { failure: 'timeout' };
      }
      return { failure: 'connection error', detail: describeError(error) };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
