import type { Request, Response } from 'express';
import type { RankedItem } from '../../types/orchestration.js';
import type { RankSuccessBody } from '../../types/api.js';
import type { ProductCatalog } from '../../services/agent-registry.js';
import {
    AiConfigError,
    AiRequestError,
    AiTimeoutError,
    NoProductsError,
    type ProductRecord,
    type RankingProvider,
} from '../../services/ranking-provider.js';
import { AgentError, toAgentError } from '../../services/agent-errors.js';
import { logThought } from '../../utils/logger.js';
import { sendInvalidRequest, sendWireError } from '../shared.js';

const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

export interface RankDeps {
    catalog: ProductCatalog;
    provider: RankingProvider;
    providerTimeoutMs?: number;
}

/** Map a ranking-provider failure onto the shared error taxonomy. */
export function rankingErrorToAgentError(err: unknown): AgentError {
    if (err instanceof AiConfigError) return new AgentError('ai_config_error', err.message);
    if (err instanceof AiTimeoutError) return new AgentError('timeout', err.message);
    if (err instanceof AiRequestError) return new AgentError('ai_request_error', err.message);
    if (err instanceof NoProductsError) return new AgentError('no_products', err.message);
    return toAgentError(err);
}

async function rankWithinDeadline(
    provider: RankingProvider,
    brief: string,
    products: ProductRecord[],
    timeoutMs: number,
): Promise<RankedItem[]> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(
            () => reject(new AiTimeoutError(`Ranking timed out after ${timeoutMs}ms`)),
            timeoutMs,
        );
    });
    try {
        return await Promise.race([provider.rankProducts({ brief, products }), deadline]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * POST /mcp/agents/:slug/rank — Rank one tenant's catalogue.
 *
 * Speaks the ranking wire contract: `{ items }` on success, otherwise
 * `{ error: { type, message, status } }` with the same HTTP status.
 */
export function handleRank(deps: RankDeps) {
    const providerTimeoutMs = Math.max(1, Number(deps.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS));

    return async (req: Request, res: Response): Promise<void> => {
        const slug = req.params.slug ?? '';
        const body: unknown = req.body;
        const brief = typeof body === 'object' && body !== null && 'brief' in body ? body.brief : undefined;

        try {
            if (!(await deps.catalog.tenantExists(slug))) {
                sendInvalidRequest(res, `Tenant '${slug}' not found`, 404);
                return;
            }

            if (typeof brief !== 'string' || !brief.trim()) {
                sendInvalidRequest(res, 'Brief is required and must be non-empty');
                return;
            }

            const products = await deps.catalog.listProductsForTenant(slug);
            if (products.length === 0) {
                throw new NoProductsError(
                    `No products found for tenant '${slug}'. Please add products before using AI evaluation.`,
                );
            }

            const items = await rankWithinDeadline(deps.provider, brief.trim(), products, providerTimeoutMs);
            const success: RankSuccessBody = { items };
            res.status(200).json(success);
        } catch (err) {
            const agentError = rankingErrorToAgentError(err);
            void logThought(`[Rank] Tenant '${slug}' ranking failed (${agentError.kind}): ${agentError.message}`);
            sendWireError(res, agentError.toWire());
        }
    };
}
