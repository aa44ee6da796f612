import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import type { DispatcherStatus } from '../../src/infrastructure/notifications/index.js';
import type { TailerSnapshot } from '../../src/infrastructure/tailer/index.js';
import { buildStatusServer } from '../../src/interfaces/http/status-server.js';

const dispatcher: DispatcherStatus = {
  state: 'waiting',
  delivered: 12,
  rateLimited: 1,
  failed: 0,
  retryAfterSeconds: 30,
  lastError: null,
  queued: 4,
};

const tailers: TailerSnapshot[] = [
  {
    directory: '/var/spool/torque/server_logs',
    source: 'server',
    state: 'watching',
    activeFile: '/var/spool/torque/server_logs/20150227',
    offset: 2048,
  },
  {
    directory: '/var/spool/torque/server_priv/accounting',
    source: 'accounting',
    state: 'idle',
    activeFile: null,
    offset: 0,
  },
];

describe('status routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await buildStatusServer(pino({ level: 'silent' }), {
      dispatcherStatus: () => dispatcher,
      tailers: () => tailers,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('GET /health reports liveness', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('GET /status returns dispatcher retry state and tailer positions', async () => {
    const res = await app.inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ dispatcher, tailers });
  });

  it('unknown routes are 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/events' });

    expect(res.statusCode).toBe(404);
  });
});
