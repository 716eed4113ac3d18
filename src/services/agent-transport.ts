import type { AgentKind, AgentTarget, RankedItem } from '../types/orchestration.js';
import { AgentError, isAgentErrorKind } from './agent-errors.js';
import { postRankRequest } from './rank-http-client.js';

export interface RankCallContext {
    contextId: string | null;
    /** Epoch ms after which the call counts as timed out. */
    deadline: number;
    timeoutMs: number;
    /** Aborted by the dispatcher when the deadline passes. */
    signal: AbortSignal;
}

/**
 * One capability shared by every agent variant. Resolves with the agent's items
 * in the agent's own order, or rejects with an {@link AgentError}.
 */
export interface AgentTransport {
    rank(target: AgentTarget, brief: string, context: RankCallContext): Promise<RankedItem[]>;
}

function toHttpCall(brief: string, context: RankCallContext) {
    return {
        brief,
        contextId: context.contextId,
        signal: context.signal,
        timeoutMs: context.timeoutMs,
        deadline: context.deadline,
    };
}

/** Loopback call to this service's own ranking endpoint. Its typed errors pass through unchanged. */
export class InternalAgentTransport implements AgentTransport {
    async rank(target: AgentTarget, brief: string, context: RankCallContext): Promise<RankedItem[]> {
        return postRankRequest(target.endpoint, toHttpCall(brief, context));
    }
}

/**
 * Call to a third-party agent. Error kinds outside the shared taxonomy are
 * reported as `ai_request_error`, keeping the agent's message.
 */
export class ExternalAgentTransport implements AgentTransport {
    async rank(target: AgentTarget, brief: string, context: RankCallContext): Promise<RankedItem[]> {
        try {
            return await postRankRequest(target.endpoint, toHttpCall(brief, context));
        } catch (error) {
            if (error instanceof AgentError && !isAgentErrorKind(error.kind)) {
                throw new AgentError(
                    'ai_request_error',
                    `Agent reported '${error.kind}': ${error.message}`,
                    error.status ?? 502,
                );
            }
            throw error;
        }
    }
}

/** Picks the variant by the target's tag. */
export class AgentTransportRouter implements AgentTransport {
    readonly #variants: Record<AgentKind, AgentTransport>;

    constructor(variants: Record<AgentKind, AgentTransport>) {
        this.#variants = variants;
    }

    rank(target: AgentTarget, brief: string, context: RankCallContext): Promise<RankedItem[]> {
        return this.#variants[target.kind].rank(target, brief, context);
    }
}

export function createDefaultTransport(): AgentTransport {
    return new AgentTransportRouter({
        internal: new InternalAgentTransport(),
        external: new ExternalAgentTransport(),
    });
}
