import { describe, it, expect, afterEach, vi } from 'vitest';
import { getConfig, getRetryConfig, loadConfig, resetConfig } from '../src/config/index.js';

describe('Configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('should apply defaults', () => {
    const config = loadConfig();

    expect(config.port).toBe(3001);
    expect(config.host).toBe('0.0.0.0');
    expect(config.apiKey).toBeUndefined();
    expect(config.retry).toEqual({ retryFailed: true, maxRetries: 3, delayMs: 1000 });
    expect(config.logPageSize).toBe(100);
    expect(config.phasesFile).toBeUndefined();
  });

  it('should read values from the environment', () => {
    vi.stubEnv('WORKGRAPH_PORT', '8080');
    vi.stubEnv('WORKGRAPH_API_KEY', 'test-secret');
    vi.stubEnv('WORKGRAPH_RETRY_FAILED', 'false');
    vi.stubEnv('WORKGRAPH_MAX_RETRIES', '5');
    vi.stubEnv('WORKGRAPH_RETRY_DELAY_MS', '0');
    vi.stubEnv('WORKGRAPH_PHASES_FILE', '/etc/workgraph/phases.yaml');

    const config = loadConfig();

    expect(config.port).toBe(8080);
    expect(config.apiKey).toBe('test-secret');
    expect(config.retry).toEqual({ retryFailed: false, maxRetries: 5, delayMs: 0 });
    expect(config.phasesFile).toBe('/etc/workgraph/phases.yaml');
  });

  it('should accept 1 and 0 as booleans', () => {
    vi.stubEnv('WORKGRAPH_RETRY_FAILED', '0');
    expect(loadConfig().retry.retryFailed).toBe(false);

    vi.stubEnv('WORKGRAPH_RETRY_FAILED', '1');
    expect(loadConfig().retry.retryFailed).toBe(true);
  });

  it('should treat an empty API key as unset', () => {
    vi.stubEnv('WORKGRAPH_API_KEY', '');

    expect(loadConfig().apiKey).toBeUndefined();
  });

  it('should reject out-of-range values', () => {
    vi.stubEnv('WORKGRAPH_MAX_RETRIES', '11');

    expect(() => loadConfig()).toThrow('Configuration validation failed');
  });

  it('should reject unknown boolean spellings', () => {
    vi.stubEnv('WORKGRAPH_RETRY_FAILED', 'yes');

    expect(() => loadConfig()).toThrow('Configuration validation failed');
  });

  it('should cache the singleton until reset', () => {
    vi.stubEnv('WORKGRAPH_MAX_RETRIES', '4');
    const first = getConfig();

    vi.stubEnv('WORKGRAPH_MAX_RETRIES', '6');
    expect(getConfig()).toBe(first);
    expect(getRetryConfig().maxRetries).toBe(4);

    resetConfig();
    expect(getRetryConfig().maxRetries).toBe(6);
  });
});
