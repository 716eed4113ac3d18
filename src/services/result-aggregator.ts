import type { AgentOutcome, OrchestrationResult, RankedItem } from '../types/orchestration.js';
import type { OrchestrateResponseBody, WireAgentResult } from '../types/api.js';

export interface AggregateOptions {
    contextId: string;
    timeoutMs: number;
    sortByScore?: boolean;
}

/**
 * Stable sort by descending score. Unscored items go after scored ones and keep
 * their relative order, as do ties.
 */
export function sortItemsByScore(items: RankedItem[]): RankedItem[] {
    return [...items].sort((a, b) => {
        if (a.score === null || b.score === null) {
            if (a.score === b.score) {
                return 0;
            }
            return a.score === null ? 1 : -1;
        }
        return b.score - a.score;
    });
}

/** Assemble the result from outcomes already in submission order. Items are never re-ranked across agents. */
export function aggregateOutcomes(outcomes: AgentOutcome[], options: AggregateOptions): OrchestrationResult {
    return {
        contextId: options.contextId,
        totalAgents: outcomes.length,
        timeoutMs: options.timeoutMs,
        outcomes: options.sortByScore
            ? outcomes.map((outcome) => ({ ...outcome, items: sortItemsByScore(outcome.items) }))
            : outcomes,
    };
}

function toWireAgentResult(outcome: AgentOutcome): WireAgentResult {
    const agent = outcome.target.kind === 'internal'
        ? { type: 'internal' as const, slug: outcome.target.key }
        : { type: 'external' as const, url: outcome.target.key };

    return {
        agent,
        items: outcome.items.map((item) => ({
            product_id: item.product_id,
            reason: item.reason,
            score: item.score,
        })),
        error: outcome.error,
    };
}

export function toWireResponse(result: OrchestrationResult): OrchestrateResponseBody {
    return {
        total_agents: result.totalAgents,
        context_id: result.contextId,
        timeout_ms: result.timeoutMs,
        results: result.outcomes.map(toWireAgentResult),
    };
}
