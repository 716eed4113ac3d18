import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';
import { buildTestApp, type TestApp } from './test-app.js';

describe('operational endpoints', () => {
  let testApp: TestApp;

  beforeEach(() => {
    vi.stubEnv('ORCHESTRATOR_CONFIG_PATH', '/tmp/adcp-orchestrator-health-test-missing.json');
    clearConfigCacheForTests();
    testApp = buildTestApp({ rank: async () => [] });
  });

  afterEach(() => {
    testApp.db.close();
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
  });

  it('GET /health reports liveness in the envelope', async () => {
    const response = await request(testApp.app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.ok).toBe(true);
    expect(response.body.data).toEqual({ status: 'ok', service: 'adcp-orchestrator', version: '0.1.0' });
    expect(response.body.correlationId).toBe(response.headers['x-request-id']);
  });

  it('GET /circuits lists breakers that have seen failures', async () => {
    testApp.breaker.recordFailure('pub-a');

    const response = await request(testApp.app).get('/circuits');

    expect(response.status).toBe(200);
    expect(response.body.data.failureThreshold).toBe(3);
    expect(response.body.data.ttlMs).toBe(60_000);
    expect(response.body.data.circuits).toEqual([
      { key: 'pub-a', state: 'closed', consecutiveFailures: 1, openedAt: null, remainingCooldownMs: 0 },
    ]);
  });

  it('GET /preflight passes with a valid config and a seeded registry', async () => {
    const response = await request(testApp.app).get('/preflight');

    expect(response.status).toBe(200);
    expect(response.body.data.overallStatus).toBe('ok');
    expect(response.body.data.checks).toEqual([
      { name: 'config', status: 'ok', message: 'Runtime configuration is valid' },
      {
        name: 'registry',
        status: 'ok',
        message: 'Registry reachable: 2 tenant(s), 1 enabled external agent(s)',
      },
      { name: 'agents', status: 'ok', message: 'At least one agent is available' },
    ]);
  });

  it('GET /preflight fails on malformed settings', async () => {
    vi.stubEnv('ORCH_CONCURRENCY', 'lots');

    const response = await request(testApp.app).get('/preflight');

    expect(response.status).toBe(200);
    expect(response.body.data.overallStatus).toBe('fail');
    expect(response.body.data.checks[0]).toEqual({
      name: 'config',
      status: 'fail',
      message: "ORCH_CONCURRENCY must be a positive integer, got 'lots'.",
    });
  });

  it('answers unknown routes with a 404 envelope', async () => {
    const response = await request(testApp.app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body.ok).toBe(false);
    expect(response.body.error).toBe('Not found.');
  });
});
