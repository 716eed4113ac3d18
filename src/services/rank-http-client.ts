import type { RankedItem, TypedError } from '../types/orchestration.js';
import type { RankRequestBody } from '../types/api.js';
import { AgentError } from './agent-errors.js';

const MAX_ERROR_BODY_CHARS = 200;

export type ParsedRankResponse =
    | { kind: 'items'; items: RankedItem[] }
    | { kind: 'error'; error: TypedError }
    | { kind: 'violation'; reason: string };

export interface RankHttpCall {
    brief: string;
    contextId: string | null;
    signal: AbortSignal;
    timeoutMs: number;
    deadline: number;
}

export function buildRankRequest(brief: string, contextId: string | null): RankRequestBody {
    return { brief, context_id: contextId };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseItem(value: unknown): RankedItem | null {
    if (!isRecord(value)) {
        return null;
    }
    const { product_id: productId, reason, score } = value;
    if (typeof productId !== 'string' || typeof reason !== 'string') {
        return null;
    }
    if (score === undefined || score === null) {
        return { product_id: productId, reason, score: null };
    }
    if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 1) {
        return null;
    }
    return { product_id: productId, reason, score };
}

/** Validate a decoded body against the ranking wire contract. Extra fields are dropped. */
export function parseRankResponse(payload: unknown): ParsedRankResponse {
    if (!isRecord(payload)) {
        return { kind: 'violation', reason: 'response body is not a JSON object' };
    }

    const hasItems = 'items' in payload;
    const hasError = 'error' in payload;
    if (hasItems && hasError) {
        return { kind: 'violation', reason: 'response carries both items and error' };
    }

    if (hasError) {
        const error = payload.error;
        if (!isRecord(error) || typeof error.type !== 'string' || typeof error.message !== 'string') {
            return { kind: 'violation', reason: 'error object lacks type or message' };
        }
        const status = typeof error.status === 'number' && Number.isInteger(error.status)
            ? error.status
            : null;
        return { kind: 'error', error: { type: error.type, message: error.message, status } };
    }

    if (!Array.isArray(payload.items)) {
        return { kind: 'violation', reason: 'items is missing or not an array' };
    }

    const items: RankedItem[] = [];
    for (const raw of payload.items) {
        const item = parseItem(raw);
        if (!item) {
            return { kind: 'violation', reason: 'an item lacks a string product_id or reason, or has an invalid score' };
        }
        items.push(item);
    }
    return { kind: 'items', items };
}

function describeFailure(error: unknown): string {
    if (error instanceof Error) {
        const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
        return `${error.message}${cause}`;
    }
    return String(error);
}

/**
 * POST a brief to a ranking endpoint and decode the reply.
 *
 * Resolves with the agent's items in the agent's order. Rejects with an
 * {@link AgentError}; error bodies returned by the agent are surfaced as-is, so
 * callers decide whether to normalize them.
 */
export async function postRankRequest(endpoint: string, call: RankHttpCall): Promise<RankedItem[]> {
    const timedOut = (): boolean => call.signal.aborted || Date.now() >= call.deadline;

    let response: Response;
    try {
        response = await fetch(endpoint, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                Accept: 'application/json',
            },
            body: JSON.stringify(buildRankRequest(call.brief, call.contextId)),
            signal: call.signal,
        });
    } catch (error) {
        if (timedOut()) {
            throw AgentError.timeout(call.timeoutMs);
        }
        throw new AgentError('ai_request_error', `Agent unreachable: ${describeFailure(error)}`, 502);
    }

    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        if (timedOut()) {
            throw AgentError.timeout(call.timeoutMs);
        }
        throw new AgentError('ai_request_error', `Failed to read agent response: ${describeFailure(error)}`, 502);
    }

    let payload: unknown;
    try {
        payload = JSON.parse(text);
    } catch {
        if (!response.ok) {
            throw new AgentError(
                'ai_request_error',
                `HTTP ${response.status}: ${text.slice(0, MAX_ERROR_BODY_CHARS)}`,
                response.status,
            );
        }
        throw new AgentError('invalid_response', 'Agent returned malformed JSON', 502);
    }

    const parsed = parseRankResponse(payload);
    if (parsed.kind === 'error') {
        throw AgentError.fromWire({
            ...parsed.error,
            status: parsed.error.status ?? (response.ok ? null : response.status),
        });
    }

    if (!response.ok) {
        throw new AgentError(
            'ai_request_error',
            `HTTP ${response.status}: ${text.slice(0, MAX_ERROR_BODY_CHARS)}`,
            response.status,
        );
    }

    if (parsed.kind === 'violation') {
        throw new AgentError(
            'invalid_response',
            `Agent response does not match the ranking contract: ${parsed.reason}`,
            502,
        );
    }

    return parsed.items;
}
