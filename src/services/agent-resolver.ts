import type { AgentSelectors, AgentTarget } from '../types/orchestration.js';
import type { AgentRegistry } from './agent-registry.js';
import { AgentError } from './agent-errors.js';

/** URL-safe tenant identifier. Cannot contain `:` or `/`, so it never collides with a URL key. */
export const TENANT_SLUG_PATTERN = /^[a-z0-9][a-z0-9_-]*$/i;

export type ResolvedSlot =
    | { status: 'ready'; target: AgentTarget }
    | { status: 'rejected'; target: AgentTarget; error: AgentError };

export interface ResolverOptions {
    /** Base URL of the local ranking service used for internal loopback calls. */
    serviceBaseUrl: string;
}

export function internalRankEndpoint(serviceBaseUrl: string, slug: string): string {
    return `${serviceBaseUrl.replace(/\/+$/, '')}/mcp/agents/${encodeURIComponent(slug)}/rank`;
}

function isHttpUrl(value: string): boolean {
    try {
        const parsed = new URL(value);
        return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Turn raw selectors into an ordered, de-duplicated slot list.
 *
 * Internal slugs come first, then external URLs, each in submission order; the
 * first occurrence of a key keeps its position. Malformed or unknown selectors
 * stay in the list as rejected slots so every requested agent is accounted for.
 */
export async function resolveAgentTargets(
    selectors: AgentSelectors,
    registry: Pick<AgentRegistry, 'tenantExists'>,
    options: ResolverOptions,
): Promise<ResolvedSlot[]> {
    const seen = new Set<string>();
    const pending: Array<ResolvedSlot | Promise<ResolvedSlot>> = [];

    for (const rawSlug of selectors.internalTenantSlugs) {
        const slug = rawSlug.trim();
        if (seen.has(slug)) {
            continue;
        }
        seen.add(slug);

        const target: AgentTarget = {
            kind: 'internal',
            key: slug,
            endpoint: internalRankEndpoint(options.serviceBaseUrl, slug),
        };

        if (!TENANT_SLUG_PATTERN.test(slug)) {
            pending.push({
                status: 'rejected',
                target,
                error: new AgentError('invalid_request', `Malformed tenant slug '${slug}'`, 400),
            });
            continue;
        }

        pending.push(
            registry.tenantExists(slug).then(
                (exists): ResolvedSlot => exists
                    ? { status: 'ready', target }
                    : {
                        status: 'rejected',
                        target,
                        error: new AgentError('invalid_request', `Tenant '${slug}' not found`, 404),
                    },
                (error: unknown): ResolvedSlot => {
                    const message = error instanceof Error ? error.message : String(error);
                    return {
                        status: 'rejected',
                        target,
                        error: new AgentError('internal', `Registry lookup failed for tenant '${slug}': ${message}`),
                    };
                },
            ),
        );
    }

    for (const rawUrl of selectors.externalUrls) {
        const url = rawUrl.trim();
        if (seen.has(url)) {
            continue;
        }
        seen.add(url);

        const target: AgentTarget = { kind: 'external', key: url, endpoint: url };
        if (!isHttpUrl(url)) {
            pending.push({
                status: 'rejected',
                target,
                error: new AgentError('invalid_request', `Malformed agent URL '${url}'`, 400),
            });
            continue;
        }

        pending.push({ status: 'ready', target });
    }

    return Promise.all(pending);
}
