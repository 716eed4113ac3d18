import { describe, expect, it } from 'vitest';
import { aggregateOutcomes, sortItemsByScore, toWireResponse } from '../../src/services/result-aggregator.js';
import type { AgentOutcome } from '../../src/types/orchestration.js';

const outcomes: AgentOutcome[] = [
  {
    target: { kind: 'internal', key: 'pub-a', endpoint: 'http://localhost:8000/mcp/agents/pub-a/rank' },
    items: [
      { product_id: 'a-1', reason: 'low', score: 0.2 },
      { product_id: 'a-2', reason: 'none', score: null },
      { product_id: 'a-3', reason: 'high', score: 0.9 },
      { product_id: 'a-4', reason: 'low too', score: 0.2 },
    ],
    error: null,
    durationMs: 12,
  },
  {
    target: { kind: 'external', key: 'https://agent.example.com/rank', endpoint: 'https://agent.example.com/rank' },
    items: [],
    error: { type: 'timeout', message: 'Request timed out after 500ms', status: 408 },
    durationMs: 500,
  },
];

describe('sortItemsByScore', () => {
  it('sorts by descending score, keeps ties stable and puts unscored items last', () => {
    expect(sortItemsByScore(outcomes[0].items).map((item) => item.product_id)).toEqual(['a-3', 'a-1', 'a-4', 'a-2']);
  });

  it('does not mutate its input', () => {
    const items = [...outcomes[0].items];
    sortItemsByScore(items);
    expect(items.map((item) => item.product_id)).toEqual(['a-1', 'a-2', 'a-3', 'a-4']);
  });
});

describe('aggregateOutcomes', () => {
  it('keeps agent order and item order by default', () => {
    const result = aggregateOutcomes(outcomes, { contextId: 'ctx-1', timeoutMs: 500 });

    expect(result.totalAgents).toBe(2);
    expect(result.outcomes).toBe(outcomes);
  });

  it('sorts items within each agent when asked', () => {
    const result = aggregateOutcomes(outcomes, { contextId: 'ctx-1', timeoutMs: 500, sortByScore: true });

    expect(result.outcomes.map((outcome) => outcome.target.key)).toEqual(['pub-a', 'https://agent.example.com/rank']);
    expect(result.outcomes[0].items.map((item) => item.product_id)).toEqual(['a-3', 'a-1', 'a-4', 'a-2']);
  });
});

describe('toWireResponse', () => {
  it('renders agents as internal slugs or external urls', () => {
    const body = toWireResponse(aggregateOutcomes(outcomes, { contextId: 'ctx-7', timeoutMs: 500 }));

    expect(body.total_agents).toBe(2);
    expect(body.context_id).toBe('ctx-7');
    expect(body.timeout_ms).toBe(500);
    expect(body.results[0].agent).toEqual({ type: 'internal', slug: 'pub-a' });
    expect(body.results[0].error).toBeNull();
    expect(body.results[1]).toEqual({
      agent: { type: 'external', url: 'https://agent.example.com/rank' },
      items: [],
      error: { type: 'timeout', message: 'Request timed out after 500ms', status: 408 },
    });
  });
});
