import type { Request, Response } from 'express';
import type { PreflightCheck, PreflightData, PreflightStatus } from '../../types/api.js';
import type { AgentRegistry } from '../../services/agent-registry.js';
import { validateRuntimeConfig } from '../../config/env-validator.js';
import { sendOk } from '../shared.js';

export interface PreflightDeps {
    registry: Pick<AgentRegistry, 'listTenantSlugs' | 'listEnabledExternalAgents'>;
}

function overallStatusOf(checks: PreflightCheck[]): PreflightStatus {
    if (checks.some((check) => check.status === 'fail')) return 'fail';
    if (checks.some((check) => check.status === 'warn')) return 'warn';
    return 'ok';
}

/** GET /preflight — Configuration report plus registry reachability. */
export function handlePreflight(deps: PreflightDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        const config = validateRuntimeConfig();
        const checks: PreflightCheck[] = [
            {
                name: 'config',
                status: config.ok ? 'ok' : 'fail',
                message: config.ok
                    ? 'Runtime configuration is valid'
                    : config.issues.map((issue) => issue.message).join(' '),
            },
        ];

        try {
            const [slugs, externalAgents] = await Promise.all([
                deps.registry.listTenantSlugs(),
                deps.registry.listEnabledExternalAgents(),
            ]);
            checks.push({
                name: 'registry',
                status: 'ok',
                message: `Registry reachable: ${slugs.length} tenant(s), ${externalAgents.length} enabled external agent(s)`,
            });
            checks.push(
                slugs.length + externalAgents.length > 0
                    ? { name: 'agents', status: 'ok', message: 'At least one agent is available' }
                    : {
                        name: 'agents',
                        status: 'warn',
                        message: 'No agents available; add a tenant or enable an external agent',
                    },
            );
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            checks.push({ name: 'registry', status: 'fail', message: `Registry check failed: ${message}` });
        }

        // Always 200: overallStatus carries the verdict.
        const data: PreflightData = { overallStatus: overallStatusOf(checks), checks, config };
        sendOk(res, data);
    };
}
