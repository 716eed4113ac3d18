import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleServiceInfo } from './handlers/health.js';
import { handleOrchestrate } from './handlers/orchestrate.js';
import { handleRank } from './handlers/rank.js';
import { handlePreflight } from './handlers/preflight.js';
import { handleCircuits } from './handlers/circuits.js';
import { handleUncaughtError, requestLogger, sendError } from './shared.js';
import type { AgentRegistry, ProductCatalog } from '../services/agent-registry.js';
import type { CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import type { OrchestrationService } from '../services/orchestration-service.js';
import type { RankingProvider } from '../services/ranking-provider.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    service: Pick<OrchestrationService, 'orchestrate'>;
    registry: AgentRegistry;
    catalog: ProductCatalog;
    provider: RankingProvider;
    breaker: CircuitBreakerRegistry;
    version: string;
    adcpVersion: string;
    providerTimeoutMs?: number;
}

/**
 * Build the HTTP API.
 *
 * Endpoints:
 *   POST /orchestrate              — Fan a brief out to internal and external agents
 *   GET  /mcp/                     — Protocol version and capabilities
 *   POST /mcp/agents/:slug/rank    — Rank one tenant's products (internal agent)
 *   GET  /health                   — Liveness
 *   GET  /preflight                — Config validation and registry reachability
 *   GET  /circuits                 — Circuit breaker snapshot
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json());
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth({ version: deps.version }));
    app.get('/preflight', handlePreflight({ registry: deps.registry }));
    app.get('/circuits', handleCircuits({ breaker: deps.breaker }));

    app.post('/orchestrate', handleOrchestrate({ service: deps.service, registry: deps.registry }));

    app.get('/mcp/', handleServiceInfo({ adcpVersion: deps.adcpVersion }));
    app.post(
        '/mcp/agents/:slug/rank',
        handleRank({
            catalog: deps.catalog,
            provider: deps.provider,
            providerTimeoutMs: deps.providerTimeoutMs,
        }),
    );

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    app.use(handleUncaughtError);

    return app;
}

/** Create the API and start listening. Resolves once the port is bound. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            void logThought(`[API] HTTP server listening on http://localhost:${port}.`);
            resolve(server);
        });
    });
}
