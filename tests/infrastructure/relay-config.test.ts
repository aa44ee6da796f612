import { describe, it, expect } from 'vitest';
import { ConfigError, loadRelayConfig } from '../../src/infrastructure/config/relay-config.js';

const BASE_ENV = { WEBHOOK_URL: 'https://hooks.example.test/services/test-token' };

describe('loadRelayConfig', () => {
  it('applies defaults under the standard TORQUE home', () => {
    expect(loadRelayConfig(BASE_ENV)).toEqual({
      serverLogsDir: '/var/spool/torque/server_logs',
      accountingLogsDir: '/var/spool/torque/server_priv/accounting',
      webhook: { url: BASE_ENV.WEBHOOK_URL, username: undefined, channel: undefined },
      minPostDelaySeconds: 6,
      replayFiles: 7,
      failurePolicy: 'continue',
      failureCooldownSeconds: 120,
      watch: { usePolling: false, pollIntervalMs: 1000 },
      status: null,
      logLevel: 'info',
    });
  });

  it('derives both directories from TORQUE_HOME', () => {
    const config = loadRelayConfig({ ...BASE_ENV, TORQUE_HOME: '/opt/torque' });
    expect(config.serverLogsDir).toBe('/opt/torque/server_logs');
    expect(config.accountingLogsDir).toBe('/opt/torque/server_priv/accounting');
  });

  it('lets explicit directories override TORQUE_HOME', () => {
    const config = loadRelayConfig({
      ...BASE_ENV,
      TORQUE_HOME: '/opt/torque',
      SERVER_LOGS_DIR: '/data/server',
      ACCOUNTING_LOGS_DIR: '/data/accounting',
    });
    expect(config.serverLogsDir).toBe('/data/server');
    expect(config.accountingLogsDir).toBe('/data/accounting');
  });

  it('coerces numbers and flags', () => {
    const config = loadRelayConfig({
      ...BASE_ENV,
      MIN_POST_DELAY_SECONDS: '2',
      REPLAY_FILES: '3',
      FAILURE_POLICY: 'abort',
      FAILURE_COOLDOWN_SECONDS: '30',
      WATCH_POLLING: 'true',
      WATCH_POLL_INTERVAL_MS: '250',
      STATUS_PORT: '9100',
      STATUS_HOST: '0.0.0.0',
      LOG_LEVEL: 'debug',
    });
    expect(config).toMatchObject({
      minPostDelaySeconds: 2,
      replayFiles: 3,
      failurePolicy: 'abort',
      failureCooldownSeconds: 30,
      watch: { usePolling: true, pollIntervalMs: 250 },
      status: { port: 9100, host: '0.0.0.0' },
      logLevel: 'debug',
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadRelayConfig({ ...BASE_ENV, STATUS_PORT: '', WEBHOOK_CHANNEL: '' });
    expect(config.status).toBeNull();
    expect(config.webhook.channel).toBeUndefined();
  });

  it('requires WEBHOOK_URL', () => {
    expect(() => loadRelayConfig({})).toThrow(ConfigError);
    try {
      loadRelayConfig({});
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual(['WEBHOOK_URL: Required']);
      }
    }
  });

  it('lists every invalid variable', () => {
    try {
      loadRelayConfig({ WEBHOOK_URL: 'not a url', FAILURE_POLICY: 'retry', REPLAY_FILES: '-1' });
      expect.unreachable('loadRelayConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues).toHaveLength(3);
      expect(err.issues[0]).toBe('WEBHOOK_URL: WEBHOOK_URL must be a valid URL');
      expect(err.message).toMatch(/^Invalid configuration: /);
    }
  });
});
