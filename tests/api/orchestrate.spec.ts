import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import request from 'supertest';
import type { AgentTransport } from '../../src/services/agent-transport.js';
import type { AgentTarget, RankedItem } from '../../src/types/orchestration.js';
import { NO_AGENTS_MESSAGE } from '../../src/api/handlers/orchestrate.js';
import { buildTestApp, type TestApp } from './test-app.js';

const ITEMS: RankedItem[] = [
  { product_id: 'p-low', reason: 'weak match', score: 0.3 },
  { product_id: 'p-none', reason: 'unscored', score: null },
  { product_id: 'p-high', reason: 'strong match', score: 0.95 },
];

describe('POST /orchestrate', () => {
  let calls: AgentTarget[];
  let testApp: TestApp;

  beforeEach(() => {
    calls = [];
    const transport: AgentTransport = {
      rank: async (target) => {
        calls.push(target);
        return ITEMS;
      },
    };
    testApp = buildTestApp(transport);
  });

  afterEach(() => {
    testApp.db.close();
  });

  it('fans out to the requested agents and answers in request order', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({
        brief: 'sports campaign',
        internal_tenant_slugs: ['pub-a', 'ghost-pub'],
        external_urls: ['https://partner.example.com/rank'],
        timeout_ms: 500,
      });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      total_agents: 3,
      context_id: 'ctx-test',
      timeout_ms: 500,
      results: [
        { agent: { type: 'internal', slug: 'pub-a' }, items: ITEMS, error: null },
        {
          agent: { type: 'internal', slug: 'ghost-pub' },
          items: [],
          error: { type: 'invalid_request', message: "Tenant 'ghost-pub' not found", status: 404 },
        },
        { agent: { type: 'external', url: 'https://partner.example.com/rank' }, items: ITEMS, error: null },
      ],
    });
    expect(calls.map((target) => target.endpoint)).toEqual([
      'http://localhost:8000/mcp/agents/pub-a/rank',
      'https://partner.example.com/rank',
    ]);
  });

  it('defaults omitted lists to every tenant and every enabled partner', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports campaign' });

    expect(response.status).toBe(200);
    expect(response.body.total_agents).toBe(3);
    expect(response.body.timeout_ms).toBe(1_000);
    expect(response.body.results.map((result: { agent: unknown }) => result.agent)).toEqual([
      { type: 'internal', slug: 'pub-a' },
      { type: 'internal', slug: 'empty-pub' },
      { type: 'external', url: 'https://one.example.com/rank' },
    ]);
  });

  it('treats an explicit empty list as none', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports campaign', internal_tenant_slugs: [] });

    expect(response.status).toBe(200);
    expect(response.body.total_agents).toBe(1);
    expect(response.body.results[0].agent).toEqual({ type: 'external', url: 'https://one.example.com/rank' });
  });

  it('sorts items by score when asked', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports', internal_tenant_slugs: ['pub-a'], external_urls: [], sort_by_score: true });

    expect(response.status).toBe(200);
    expect(response.body.results[0].items.map((item: RankedItem) => item.product_id)).toEqual([
      'p-high',
      'p-low',
      'p-none',
    ]);
  });

  it('rejects a blank brief before any call', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: '   ', internal_tenant_slugs: ['pub-a'] });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { type: 'invalid_request', message: 'Brief must be non-empty', status: 400 },
    });
    expect(calls).toEqual([]);
  });

  it('rejects a request that selects no agents', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports', internal_tenant_slugs: [], external_urls: [] });

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({ type: 'invalid_request', message: NO_AGENTS_MESSAGE, status: 400 });
  });

  it('rejects malformed fields', async () => {
    const badTimeout = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports', timeout_ms: -5 });
    const badSlugs = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports', internal_tenant_slugs: 'pub-a' });

    expect(badTimeout.status).toBe(400);
    expect(badTimeout.body.error.message).toBe("Field 'timeout_ms' must be a positive integer");
    expect(badSlugs.status).toBe(400);
    expect(badSlugs.body.error.message).toBe("Field 'internal_tenant_slugs' must be a list of strings");
  });

  it('rejects a timeout longer than the largest timer delay', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports', internal_tenant_slugs: ['pub-a'], timeout_ms: 3_000_000_000 });

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({
      type: 'invalid_request',
      message: "Field 'timeout_ms' must not exceed 2147483647",
      status: 400,
    });
    expect(calls).toEqual([]);
  });

  it('rejects a body that is not valid JSON', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .set('Content-Type', 'application/json')
      .send('{"brief": ');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: { type: 'invalid_request', message: 'Request body is not valid JSON', status: 400 },
    });
  });

  it('echoes a request id header', async () => {
    const response = await request(testApp.app)
      .post('/orchestrate')
      .send({ brief: 'sports', internal_tenant_slugs: ['pub-a'] });

    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
