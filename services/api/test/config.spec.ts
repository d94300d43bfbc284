import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const ORIGINAL_ENV = { ...process.env };

function restoreEnv() {
  process.env = { ...ORIGINAL_ENV };
}

describe('config', () => {
  beforeEach(() => {
    vi.resetModules();
    restoreEnv();
  });

  afterEach(() => {
    vi.resetModules();
    restoreEnv();
  });

  it('reads numeric settings from the environment', async () => {
    process.env.REMOTE_TIMEOUT_MS = '1500';
    process.env.PRODUCT_LOOKUP_DELAY_MS = '20';
    process.env.PORT = '9090';

    const { config } = await import('../src/config');

    expect(config.remote.timeoutMs).toBe(1500);
    expect(config.product.lookupDelayMs).toBe(20);
    expect(config.port).toBe(9090);
  });

  it('falls back to defaults when numeric settings are not numbers', async () => {
    process.env.REMOTE_TIMEOUT_MS = 'soon';
    process.env.PRODUCT_LOOKUP_DELAY_MS = '';
    process.env.PORT = 'http';

    const { config } = await import('../src/config');

    expect(config.remote.timeoutMs).toBe(5000);
    expect(config.product.lookupDelayMs).toBe(500);
    expect(config.port).toBe(8080);
  });
});
