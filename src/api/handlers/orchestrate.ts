import type { Request, Response } from 'express';
import type { OrchestrateInput } from '../../types/orchestration.js';
import type { AgentRegistry } from '../../services/agent-registry.js';
import type { OrchestrationService } from '../../services/orchestration-service.js';
import { MAX_TIMEOUT_MS } from '../../services/agent-dispatcher.js';
import { toWireResponse } from '../../services/result-aggregator.js';
import { AgentError, OrchestrationRequestError } from '../../services/agent-errors.js';
import { logThought } from '../../utils/logger.js';
import { sendInvalidRequest, sendWireError } from '../shared.js';

export const NO_AGENTS_MESSAGE =
    'No agents available. Please ensure at least one tenant exists or external agent is configured.';

export interface OrchestrateDeps {
    service: Pick<OrchestrationService, 'orchestrate'>;
    registry: Pick<AgentRegistry, 'listTenantSlugs' | 'listEnabledExternalAgents'>;
}

type FieldResult<T> = { ok: true; value: T } | { ok: false; message: string };

function readStringList(body: Record<string, unknown>, field: string): FieldResult<string[] | null> {
    const value = body[field];
    if (value === undefined || value === null) {
        return { ok: true, value: null };
    }
    if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
        return { ok: false, message: `Field '${field}' must be a list of strings` };
    }
    return { ok: true, value };
}

function readTimeout(body: Record<string, unknown>): FieldResult<number | undefined> {
    const value = body.timeout_ms;
    if (value === undefined || value === null) {
        return { ok: true, value: undefined };
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        return { ok: false, message: "Field 'timeout_ms' must be a positive integer" };
    }
    if (value > MAX_TIMEOUT_MS) {
        return { ok: false, message: `Field 'timeout_ms' must not exceed ${MAX_TIMEOUT_MS}` };
    }
    return { ok: true, value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * POST /orchestrate — Fan a brief out to the selected agents.
 *
 * Omitted selector lists default to every tenant and every enabled external
 * agent; an explicit empty list selects none.
 */
export function handleOrchestrate(deps: OrchestrateDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const body: unknown = req.body;
        if (!isRecord(body)) {
            sendInvalidRequest(res, 'Request body must be a JSON object');
            return;
        }

        const brief = body.brief;
        if (typeof brief !== 'string' || !brief.trim()) {
            sendInvalidRequest(res, 'Brief must be non-empty');
            return;
        }

        const slugs = readStringList(body, 'internal_tenant_slugs');
        if (!slugs.ok) {
            sendInvalidRequest(res, slugs.message);
            return;
        }
        const urls = readStringList(body, 'external_urls');
        if (!urls.ok) {
            sendInvalidRequest(res, urls.message);
            return;
        }
        const timeout = readTimeout(body);
        if (!timeout.ok) {
            sendInvalidRequest(res, timeout.message);
            return;
        }
        const rawSortByScore = body.sort_by_score;
        if (rawSortByScore !== undefined && typeof rawSortByScore !== 'boolean') {
            sendInvalidRequest(res, "Field 'sort_by_score' must be a boolean");
            return;
        }
        const sortByScore = rawSortByScore === true;

        try {
            const internalTenantSlugs = slugs.value ?? await deps.registry.listTenantSlugs();
            const externalUrls = urls.value
                ?? (await deps.registry.listEnabledExternalAgents()).map((agent) => agent.url);

            if (internalTenantSlugs.length === 0 && externalUrls.length === 0) {
                sendInvalidRequest(res, NO_AGENTS_MESSAGE);
                return;
            }

            const input: OrchestrateInput = {
                brief,
                internalTenantSlugs,
                externalUrls,
                timeoutMs: timeout.value,
                sortByScore,
            };
            const result = await deps.service.orchestrate(input);
            res.status(200).json(toWireResponse(result));
        } catch (err) {
            if (err instanceof OrchestrationRequestError) {
                sendInvalidRequest(res, err.message);
                return;
            }
            const message = err instanceof Error ? err.message : String(err);
            void logThought(`[Orchestration] Request failed: ${message}`);
            sendWireError(res, new AgentError('internal', `Orchestration failed: ${message}`).toWire());
        }
    };
}
