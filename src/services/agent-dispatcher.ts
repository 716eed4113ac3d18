import type { AgentOutcome, AgentTarget, BriefRequest } from '../types/orchestration.js';
import type { AgentTransport } from './agent-transport.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { AgentError, toAgentError } from './agent-errors.js';
import { logThought } from '../utils/logger.js';

/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Runs one transport call per target with a bounded number in flight.
 *
 * Each call gets its own deadline; when it passes the call's signal is aborted
 * and the outcome is recorded as `timeout` without waiting for the transport.
 * Outcomes come back in target order whatever the completion order, and every
 * attempted call is reported to the circuit breaker before its slot frees up.
 */
export class AgentDispatcher {
    readonly #transport: AgentTransport;
    readonly #breaker: CircuitBreakerRegistry;

    constructor(transport: AgentTransport, breaker: CircuitBreakerRegistry) {
        this.#transport = transport;
        this.#breaker = breaker;
    }

    async dispatch(request: BriefRequest, contextId: string | null): Promise<AgentOutcome[]> {
        const { targets } = request;
        const outcomes = new Array<AgentOutcome>(targets.length);
        const workerCount = Math.min(targets.length, Math.max(1, Math.floor(request.concurrencyLimit)));
        let cursor = 0;

        const worker = async (): Promise<void> => {
            while (cursor < targets.length) {
                const index = cursor;
                cursor += 1;
                outcomes[index] = await this.#runOne(targets[index], request, contextId);
            }
        };

        await Promise.all(Array.from({ length: workerCount }, () => worker()));
        return outcomes;
    }

    async #runOne(target: AgentTarget, request: BriefRequest, contextId: string | null): Promise<AgentOutcome> {
        const startedAt = Date.now();

        if (!this.#breaker.allow(target.key)) {
            return {
                target,
                items: [],
                error: AgentError.circuitOpen(target.key).toWire(),
                durationMs: 0,
            };
        }

        const timeoutMs = Math.min(request.timeoutMs, MAX_TIMEOUT_MS);
        const controller = new AbortController();
        const deadlineTimer = setTimeout(() => controller.abort(), timeoutMs);
        const deadlineExceeded = new Promise<never>((_, reject) => {
            controller.signal.addEventListener(
                'abort',
                () => reject(AgentError.timeout(timeoutMs)),
                { once: true },
            );
        });

        try {
            const items = await Promise.race([
                this.#transport.rank(target, request.brief, {
                    contextId,
                    deadline: startedAt + timeoutMs,
                    timeoutMs,
                    signal: controller.signal,
                }),
                deadlineExceeded,
            ]);
            this.#breaker.recordSuccess(target.key);
            return { target, items, error: null, durationMs: Date.now() - startedAt };
        } catch (error) {
            const agentError = toAgentError(error);
            this.#breaker.recordFailure(target.key);
            void logThought(
                `[Dispatcher] ${target.kind} agent '${target.key}' failed with ${agentError.kind}: ${agentError.message}`,
            );
            return {
                target,
                items: [],
                error: agentError.toWire(),
                durationMs: Date.now() - startedAt,
            };
        } finally {
            clearTimeout(deadlineTimer);
        }
    }
}
