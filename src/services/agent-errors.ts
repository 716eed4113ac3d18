import type { AgentErrorKind, TypedError } from '../types/orchestration.js';

export const ERROR_STATUS: Record<AgentErrorKind, number> = {
    invalid_request: 400,
    no_products: 422,
    ai_config_error: 500,
    ai_request_error: 502,
    invalid_response: 502,
    timeout: 408,
    circuit_open: 503,
    internal: 500,
};

const KNOWN_KINDS = new Set<string>(Object.keys(ERROR_STATUS));

export function isAgentErrorKind(value: unknown): value is AgentErrorKind {
    return typeof value === 'string' && KNOWN_KINDS.has(value);
}

/** A per-agent failure. Always attached to that agent's outcome; never thrown past the dispatcher. */
export class AgentError extends Error {
    readonly kind: string;
    readonly status: number | null;

    constructor(kind: AgentErrorKind | string, message: string, status?: number | null) {
        super(message);
        this.name = 'AgentError';
        this.kind = kind;
        this.status = status === undefined
            ? (isAgentErrorKind(kind) ? ERROR_STATUS[kind] : null)
            : status;
    }

    static timeout(timeoutMs: number): AgentError {
        return new AgentError('timeout', `Request timed out after ${timeoutMs}ms`);
    }

    static circuitOpen(key: string): AgentError {
        return new AgentError('circuit_open', `Circuit breaker open for agent '${key}'; call skipped.`);
    }

    static fromWire(error: TypedError): AgentError {
        return new AgentError(error.type, error.message, error.status);
    }

    toWire(): TypedError {
        return { type: this.kind, message: this.message, status: this.status };
    }
}

/** Raised once per request, before any dispatch, when the top-level request is malformed. */
export class OrchestrationRequestError extends Error {
    readonly kind = 'invalid_request' as const;
    readonly status = 400;

    constructor(message: string) {
        super(message);
        this.name = 'OrchestrationRequestError';
    }
}

/** Normalize anything a transport threw into the shared taxonomy. */
export function toAgentError(error: unknown): AgentError {
    if (error instanceof AgentError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AgentError('internal', `Unexpected error: ${message}`);
}
