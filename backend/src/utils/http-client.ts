import nodeFetch from 'node-fetch';

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': 'KayakFishingForecast/1.0',
  Accept: 'application/json',
};

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export interface FetchOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type FetchLike = (url: string, options: FetchOptions) => Promise<FetchResponseLike>;

export type FetchWithTimeout = (url: string, options?: FetchOptions, timeoutMs?: number) => Promise<FetchResponseLike>;

const fetchImpl: FetchLike =
  typeof globalThis.fetch === 'function'
    ? (url, options) => globalThis.fetch(url, options)
    : (url, { headers, signal }) => nodeFetch(url, { headers, signal });

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetcher: FetchLike = fetchImpl): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const upstreamSignal = options.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };
    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
      }
    }
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetcher(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
