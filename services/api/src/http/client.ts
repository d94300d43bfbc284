import { JsonClient } from './jsonClient';
import { config } from '../config';

let client: JsonClient | null = null;

/**
 * Process-wide client for the remote JSON API. Created on first use and
 * reused by every request afterwards.
 */
export function getHttpClient(): JsonClient {
  if (!client) {
    client = new JsonClient({
      baseUrl: config.remote.baseUrl,
      timeoutMs: config.remote.timeoutMs,
    });
  }
  return client;
}
