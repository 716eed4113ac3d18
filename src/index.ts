import 'dotenv/config';
import { assertRuntimeConfig } from './config/env-validator.js';
import { getConfigValue, loadRuntimeSettings } from './config/json-config.js';
import { startApiServer } from './api/router.js';
import { createDatabase } from './services/db.js';
import { SqliteAgentRegistry } from './services/agent-registry.js';
import { CircuitBreakerRegistry } from './services/circuit-breaker.js';
import { createDefaultTransport } from './services/agent-transport.js';
import { OrchestrationService } from './services/orchestration-service.js';
import { KeywordRankingProvider } from './services/ranking-provider.js';
import { logger, logThought } from './utils/logger.js';

const SERVICE_VERSION = process.env.npm_package_version ?? '0.1.0';

async function main(): Promise<void> {
    try {
        assertRuntimeConfig();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Orchestrator] Startup blocked by config validation: ${message}`);
        process.exit(1);
    }

    logger.level = getConfigValue('LOG_LEVEL') ?? 'info';
    const settings = loadRuntimeSettings();

    const db = createDatabase(settings.databasePath);
    const registry = new SqliteAgentRegistry(db);
    const breaker = new CircuitBreakerRegistry({
        failureThreshold: settings.failureThreshold,
        ttlMs: settings.circuitTtlMs,
    });

    const service = new OrchestrationService(
        { registry, transport: createDefaultTransport(), breaker },
        {
            serviceBaseUrl: settings.serviceBaseUrl,
            defaultTimeoutMs: settings.defaultTimeoutMs,
            maxConcurrentCalls: settings.concurrency,
        },
    );

    const server = await startApiServer(
        {
            service,
            registry,
            catalog: registry,
            provider: new KeywordRankingProvider(),
            breaker,
            version: SERVICE_VERSION,
            adcpVersion: settings.adcpVersion,
        },
        settings.apiPort,
    );

    void logThought(
        `[Orchestrator] Ready: timeout=${settings.defaultTimeoutMs}ms concurrency=${settings.concurrency} ` +
        `breaker=${settings.failureThreshold}/${settings.circuitTtlMs}ms base=${settings.serviceBaseUrl}`,
    );

    const shutdown = (signal: string): void => {
        void logThought(`[Orchestrator] ${signal} received, shutting down.`);
        server.close(() => {
            db.close();
            process.exit(0);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Orchestrator] Fatal startup error: ${message}`);
    process.exit(1);
});
