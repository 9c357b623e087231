import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({}, '/srv/app')).toEqual({
      redisUrl: 'redis://localhost:6379',
      logLevel: 'info',
      storageDir: '/srv/app/test/storage',
      monitorDir: '/srv/app/test/monitor',
      logFile: '/srv/app/test/monitor/storage_monitor.log',
      connect: { maxRetries: 3, retryDelayMs: 2000, timeoutMs: 10_000, commandTimeoutMs: 5000 },
      reconnectDelayMs: 2000,
      fetch: { batchSize: 1, timeoutMs: 1000 },
      publishQueueLimit: 1000,
      health: null,
    });
  });

  it('resolves directories against the working directory', () => {
    const config = loadConfig({ STORAGE_DIR: 'in', MONITOR_DIR: '/var/monitor' }, '/srv/app');

    expect(config.storageDir).toBe('/srv/app/in');
    expect(config.monitorDir).toBe('/var/monitor');
    expect(config.logFile).toBe('/var/monitor/storage_monitor.log');
  });

  it('uses LOG_FILE when set', () => {
    expect(loadConfig({ LOG_FILE: 'logs/events.log' }, '/srv/app').logFile).toBe('/srv/app/logs/events.log');
  });

  it('coerces numeric variables', () => {
    const config = loadConfig(
      { CONNECT_MAX_RETRIES: '0', CONNECT_RETRY_DELAY_MS: '250', COMMAND_TIMEOUT_MS: '1500', FETCH_BATCH_SIZE: '10' },
      '/srv/app',
    );

    expect(config.connect.maxRetries).toBe(0);
    expect(config.connect.retryDelayMs).toBe(250);
    expect(config.connect.commandTimeoutMs).toBe(1500);
    expect(config.fetch.batchSize).toBe(10);
  });

  it('enables the health server only when HEALTH_PORT is set', () => {
    expect(loadConfig({ HEALTH_PORT: '8080' }, '/srv/app').health).toEqual({ port: 8080, host: '0.0.0.0' });
    expect(loadConfig({ HEALTH_PORT: '8080', HEALTH_HOST: '127.0.0.1' }, '/srv/app').health).toEqual({
      port: 8080,
      host: '127.0.0.1',
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ REDIS_URL: '', LOG_LEVEL: '', HEALTH_PORT: '' }, '/srv/app');

    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.logLevel).toBe('info');
    expect(config.health).toBeNull();
  });

  it('reports every invalid variable', () => {
    let error: unknown;
    try {
      loadConfig({ LOG_LEVEL: 'verbose', FETCH_TIMEOUT_MS: '-5' }, '/srv/app');
    } catch (err: unknown) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^LOG_LEVEL: /);
    expect(error.issues[1]).toMatch(/^FETCH_TIMEOUT_MS: /);
  });

  it('rejects a malformed REDIS_URL', () => {
    expect(() => loadConfig({ REDIS_URL: 'not a url' }, '/srv/app')).toThrow(ConfigError);
  });
});
