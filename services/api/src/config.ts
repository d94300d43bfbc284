import 'dotenv/config';

const DEFAULT_REMOTE_BASE_URL = 'https://jsonplaceholder.typicode.com';

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  port: intFromEnv(process.env.PORT, 8080),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  remote: {
    baseUrl: process.env.REMOTE_API_BASE_URL || DEFAULT_REMOTE_BASE_URL,
    // outbound requests are aborted after this
    timeoutMs: intFromEnv(process.env.REMOTE_TIMEOUT_MS, 5000),
  },
  product: {
    // stands in for a storage round trip
    lookupDelayMs: intFromEnv(process.env.PRODUCT_LOOKUP_DELAY_MS, 500),
  },
};
