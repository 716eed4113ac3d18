import { randomUUID } from 'node:crypto';
import type {
    AgentOutcome,
    AgentTarget,
    BriefRequest,
    OrchestrateInput,
    OrchestrationResult,
} from '../types/orchestration.js';
import type { AgentRegistry } from './agent-registry.js';
import type { AgentTransport } from './agent-transport.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { AgentDispatcher, MAX_TIMEOUT_MS } from './agent-dispatcher.js';
import { OrchestrationRequestError } from './agent-errors.js';
import { resolveAgentTargets } from './agent-resolver.js';
import { aggregateOutcomes } from './result-aggregator.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_TIMEOUT_MS = 8_000;
const DEFAULT_MAX_CONCURRENT_CALLS = 8;

export interface OrchestrationServiceDeps {
    registry: Pick<AgentRegistry, 'tenantExists'>;
    transport: AgentTransport;
    breaker: CircuitBreakerRegistry;
}

export interface OrchestrationServiceOptions {
    serviceBaseUrl: string;
    defaultTimeoutMs?: number;
    maxConcurrentCalls?: number;
    /** Source of context ids; defaults to random UUIDs. */
    createContextId?: () => string;
}

export class OrchestrationService {
    readonly #registry: Pick<AgentRegistry, 'tenantExists'>;
    readonly #dispatcher: AgentDispatcher;
    readonly #serviceBaseUrl: string;
    readonly #defaultTimeoutMs: number;
    readonly #maxConcurrentCalls: number;
    readonly #createContextId: () => string;

    constructor(deps: OrchestrationServiceDeps, options: OrchestrationServiceOptions) {
        this.#registry = deps.registry;
        this.#dispatcher = new AgentDispatcher(deps.transport, deps.breaker);
        this.#serviceBaseUrl = options.serviceBaseUrl;
        this.#defaultTimeoutMs = Math.min(
            MAX_TIMEOUT_MS,
            Math.max(1, Number(options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS)),
        );
        this.#maxConcurrentCalls = Math.max(
            1,
            Math.floor(Number(options.maxConcurrentCalls ?? DEFAULT_MAX_CONCURRENT_CALLS)),
        );
        this.#createContextId = options.createContextId ?? randomUUID;
    }

    get defaultTimeoutMs(): number {
        return this.#defaultTimeoutMs;
    }

    /**
     * Fan a brief out to every selected agent and merge the outcomes.
     *
     * Throws {@link OrchestrationRequestError} only for a blank brief, before
     * anything is resolved or dispatched. Every per-agent failure, including
     * unknown tenants and open breakers, lands in that agent's outcome.
     */
    async orchestrate(input: OrchestrateInput): Promise<OrchestrationResult> {
        if (!input.brief || !input.brief.trim()) {
            throw new OrchestrationRequestError('Brief must be non-empty');
        }

        const contextId = this.#createContextId();
        const timeoutMs = input.timeoutMs && input.timeoutMs > 0
            ? Math.min(input.timeoutMs, MAX_TIMEOUT_MS)
            : this.#defaultTimeoutMs;

        const slots = await resolveAgentTargets(input, this.#registry, {
            serviceBaseUrl: this.#serviceBaseUrl,
        });

        const readyTargets: AgentTarget[] = slots
            .filter((slot) => slot.status === 'ready')
            .map((slot) => slot.target);

        const request: BriefRequest = {
            brief: input.brief,
            targets: readyTargets,
            timeoutMs,
            concurrencyLimit: this.#maxConcurrentCalls,
        };
        const dispatched = await this.#dispatcher.dispatch(request, contextId);

        let readyIndex = 0;
        const outcomes: AgentOutcome[] = slots.map((slot) => {
            if (slot.status === 'rejected') {
                return { target: slot.target, items: [], error: slot.error.toWire(), durationMs: 0 };
            }
            const outcome = dispatched[readyIndex];
            readyIndex += 1;
            return outcome;
        });

        const failed = outcomes.filter((outcome) => outcome.error !== null).length;
        void logThought(
            `[Orchestration] Context ${contextId}: ${outcomes.length} agent(s), ${outcomes.length - failed} succeeded, ${failed} failed.`,
        );

        return aggregateOutcomes(outcomes, {
            contextId,
            timeoutMs,
            sortByScore: input.sortByScore ?? false,
        });
    }
}
