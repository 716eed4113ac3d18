import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { MAX_TIMEOUT_MS } from '../services/agent-dispatcher.js';

export interface OrchestratorConfig {
    runtime: {
        apiPort: number;
        serviceBaseUrl: string;
        logLevel: string;
        adcpVersion: string;
    };
    orchestration: {
        defaultTimeoutMs: number;
        concurrency: number;
    };
    circuitBreaker: {
        failureThreshold: number;
        ttlSeconds: number;
    };
    storage: {
        databasePath: string;
    };
}

/** Parsed, clamped settings handed to the services at startup. */
export interface RuntimeSettings {
    apiPort: number;
    serviceBaseUrl: string;
    adcpVersion: string;
    defaultTimeoutMs: number;
    concurrency: number;
    failureThreshold: number;
    circuitTtlMs: number;
    databasePath: string;
}

export const DEFAULT_CONFIG: OrchestratorConfig = {
    runtime: {
        apiPort: 8000,
        serviceBaseUrl: 'http://localhost:8000',
        logLevel: 'info',
        adcpVersion: 'adcp-demo-0.1',
    },
    orchestration: {
        defaultTimeoutMs: 8000,
        concurrency: 8,
    },
    circuitBreaker: {
        failureThreshold: 3,
        ttlSeconds: 60,
    },
    storage: {
        databasePath: 'data/orchestrator.db',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.ORCHESTRATOR_CONFIG_PATH) {
        return path.resolve(process.env.ORCHESTRATOR_CONFIG_PATH);
    }
    return path.resolve('orchestrator.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOr(section: Record<string, unknown>, key: string, fallback: number): number {
    const value = section[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function stringOr(section: Record<string, unknown>, key: string, fallback: string): string {
    const value = section[key];
    return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function sectionOf(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = record[key];
    return isRecord(value) ? value : {};
}

function mergeWithDefaults(loaded: unknown): OrchestratorConfig {
    const record = isRecord(loaded) ? loaded : {};
    const runtime = sectionOf(record, 'runtime');
    const orchestration = sectionOf(record, 'orchestration');
    const circuitBreaker = sectionOf(record, 'circuitBreaker');
    const storage = sectionOf(record, 'storage');
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiPort: numberOr(runtime, 'apiPort', defaults.runtime.apiPort),
            serviceBaseUrl: stringOr(runtime, 'serviceBaseUrl', defaults.runtime.serviceBaseUrl),
            logLevel: stringOr(runtime, 'logLevel', defaults.runtime.logLevel),
            adcpVersion: stringOr(runtime, 'adcpVersion', defaults.runtime.adcpVersion),
        },
        orchestration: {
            defaultTimeoutMs: numberOr(orchestration, 'defaultTimeoutMs', defaults.orchestration.defaultTimeoutMs),
            concurrency: numberOr(orchestration, 'concurrency', defaults.orchestration.concurrency),
        },
        circuitBreaker: {
            failureThreshold: numberOr(circuitBreaker, 'failureThreshold', defaults.circuitBreaker.failureThreshold),
            ttlSeconds: numberOr(circuitBreaker, 'ttlSeconds', defaults.circuitBreaker.ttlSeconds),
        },
        storage: {
            databasePath: stringOr(storage, 'databasePath', defaults.storage.databasePath),
        },
    };
}

// ── Flat key adapter ────────────────────────────────────────────────────────

let cachedConfig: OrchestratorConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): OrchestratorConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Orchestrator Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function structuredValue(config: OrchestratorConfig, key: string): unknown {
    switch (key) {
        case 'API_PORT': return config.runtime.apiPort;
        case 'SERVICE_BASE_URL': return config.runtime.serviceBaseUrl;
        case 'LOG_LEVEL': return config.runtime.logLevel;
        case 'ADCP_VERSION': return config.runtime.adcpVersion;
        case 'ORCH_TIMEOUT_MS_DEFAULT': return config.orchestration.defaultTimeoutMs;
        case 'ORCH_CONCURRENCY': return config.orchestration.concurrency;
        case 'CB_FAILURE_THRESHOLD': return config.circuitBreaker.failureThreshold;
        case 'CB_TTL_SECONDS': return config.circuitBreaker.ttlSeconds;
        case 'DATABASE_PATH': return config.storage.databasePath;
        default: return undefined;
    }
}

/**
 * Gets a configured value: a non-blank environment variable wins, then the
 * config file (already merged with defaults).
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();

    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue.trim();
    }

    const jsonValue = structuredValue(config, key);
    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }

    return undefined;
}

function readInteger(key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const parsed = Number(getConfigValue(key));
    return Number.isInteger(parsed) && parsed >= min && parsed <= max ? parsed : fallback;
}

export function loadRuntimeSettings(): RuntimeSettings {
    return {
        apiPort: readInteger('API_PORT', DEFAULT_CONFIG.runtime.apiPort, 1),
        serviceBaseUrl: getConfigValue('SERVICE_BASE_URL') ?? DEFAULT_CONFIG.runtime.serviceBaseUrl,
        adcpVersion: getConfigValue('ADCP_VERSION') ?? DEFAULT_CONFIG.runtime.adcpVersion,
        defaultTimeoutMs: readInteger(
            'ORCH_TIMEOUT_MS_DEFAULT',
            DEFAULT_CONFIG.orchestration.defaultTimeoutMs,
            1,
            MAX_TIMEOUT_MS,
        ),
        concurrency: readInteger('ORCH_CONCURRENCY', DEFAULT_CONFIG.orchestration.concurrency, 1),
        failureThreshold: readInteger(
            'CB_FAILURE_THRESHOLD',
            DEFAULT_CONFIG.circuitBreaker.failureThreshold,
            1,
        ),
        circuitTtlMs: readInteger('CB_TTL_SECONDS', DEFAULT_CONFIG.circuitBreaker.ttlSeconds, 0) * 1000,
        databasePath: getConfigValue('DATABASE_PATH') ?? DEFAULT_CONFIG.storage.databasePath,
    };
}
