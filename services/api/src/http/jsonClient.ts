// src/http/jsonClient.ts
import { RemoteFetchError } from '../errors';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface JsonClientOptions {
  /**
   * Every request path is resolved against this address.
   */
  baseUrl: string;
  /**
   * Requests still pending after this many milliseconds are aborted.
   */
  timeoutMs?: number;
  /**
   * Allows dependency injection for testing.
   */
  fetch?: FetchLike;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Thin GET-only JSON client over fetch. Holds no per-request state, so one
 * instance is shared by every caller in the process.
 */
export class JsonClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: JsonClientOptions) {
    if (!options.baseUrl.trim()) throw new Error('baseUrl is required');

    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    const fetchImpl: FetchLike = options.fetch ?? globalThis.fetch;
    this.fetchImpl = fetchImpl.bind(globalThis);
  }

  async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RemoteFetchError(`GET ${url} failed: ${reason}`, { cause: err, metadata: { url } });
    }

    if (!res.ok) {
      const detail = await safeErrorBody(res);
      throw new RemoteFetchError(`GET ${url} returned ${res.status} ${res.statusText}${detail}`, {
        status: res.status,
        metadata: { url },
      });
    }

    try {
      return await res.json();
    } catch (err) {
      throw new RemoteFetchError(`GET ${url} returned a body that is not JSON`, {
        cause: err,
        status: res.status,
        metadata: { url },
      });
    }
  }
}

async function safeErrorBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text}` : '';
  } catch {
    return '';
  }
}
