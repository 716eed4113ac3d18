import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  AgentTransportRouter,
  ExternalAgentTransport,
  InternalAgentTransport,
  type AgentTransport,
  type RankCallContext,
} from '../../src/services/agent-transport.js';
import { AgentError } from '../../src/services/agent-errors.js';
import type { AgentTarget } from '../../src/types/orchestration.js';

const context: RankCallContext = {
  contextId: 'ctx-1',
  deadline: Date.now() + 60_000,
  timeoutMs: 500,
  signal: new AbortController().signal,
};

const external: AgentTarget = { kind: 'external', key: 'https://agent.example.com/rank', endpoint: 'https://agent.example.com/rank' };
const internal: AgentTarget = { kind: 'internal', key: 'pub-a', endpoint: 'http://localhost:8000/mcp/agents/pub-a/rank' };

function stubErrorBody(type: string, status: number): void {
  vi.stubGlobal('fetch', vi.fn(async () => new Response(
    JSON.stringify({ error: { type, message: 'quota exhausted', status } }),
    { status },
  )));
}

describe('agent transports', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reports unknown external error kinds as ai_request_error', async () => {
    stubErrorBody('rate_limited', 429);

    await expect(new ExternalAgentTransport().rank(external, 'brief', context)).rejects.toMatchObject({
      kind: 'ai_request_error',
      message: "Agent reported 'rate_limited': quota exhausted",
      status: 429,
    });
  });

  it('keeps known external error kinds as reported', async () => {
    stubErrorBody('no_products', 422);

    await expect(new ExternalAgentTransport().rank(external, 'brief', context)).rejects.toMatchObject({
      kind: 'no_products',
      message: 'quota exhausted',
      status: 422,
    });
  });

  it('passes internal errors through unchanged', async () => {
    stubErrorBody('rate_limited', 429);

    const rejection = new InternalAgentTransport().rank(internal, 'brief', context);
    await expect(rejection).rejects.toBeInstanceOf(AgentError);
    await expect(rejection).rejects.toMatchObject({ kind: 'rate_limited', status: 429 });
  });

  it('routes each target to the variant for its kind', async () => {
    const internalVariant: AgentTransport = { rank: vi.fn(async () => [{ product_id: 'i', reason: 'r', score: null }]) };
    const externalVariant: AgentTransport = { rank: vi.fn(async () => [{ product_id: 'e', reason: 'r', score: null }]) };
    const router = new AgentTransportRouter({ internal: internalVariant, external: externalVariant });

    expect(await router.rank(internal, 'brief', context)).toEqual([{ product_id: 'i', reason: 'r', score: null }]);
    expect(await router.rank(external, 'brief', context)).toEqual([{ product_id: 'e', reason: 'r', score: null }]);
    expect(internalVariant.rank).toHaveBeenCalledTimes(1);
    expect(externalVariant.rank).toHaveBeenCalledTimes(1);
  });
});
