import type { CircuitSnapshot, RankedItem, TypedError } from './orchestration.js';
import type { ConfigValidationResult } from '../config/env-validator.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Ranking wire contract ────────────────────────────────────────────────────

export interface RankRequestBody {
    brief: string;
    context_id: string | null;
}

export interface RankSuccessBody {
    items: RankedItem[];
}

export interface RankErrorBody {
    error: TypedError;
}

// ── Orchestrator entry point ─────────────────────────────────────────────────

export interface OrchestrateRequestBody {
    brief: string;
    internal_tenant_slugs?: string[] | null;
    external_urls?: string[] | null;
    timeout_ms?: number | null;
    sort_by_score?: boolean;
}

export type WireAgentDescriptor =
    | { type: 'internal'; slug: string }
    | { type: 'external'; url: string };

export interface WireAgentResult {
    agent: WireAgentDescriptor;
    items: RankedItem[];
    error: TypedError | null;
}

export interface OrchestrateResponseBody {
    total_agents: number;
    context_id: string;
    timeout_ms: number;
    results: WireAgentResult[];
}

// ── Operations ───────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok';
    service: string;
    version: string;
}

export interface ServiceInfoData {
    service: string;
    adcp_version: string;
    capabilities: string[];
}

export type PreflightStatus = 'ok' | 'warn' | 'fail';

export interface PreflightCheck {
    name: string;
    status: PreflightStatus;
    message: string;
}

export interface PreflightData {
    overallStatus: PreflightStatus;
    checks: PreflightCheck[];
    config: ConfigValidationResult;
}

export interface CircuitsData {
    failureThreshold: number;
    ttlMs: number;
    circuits: CircuitSnapshot[];
}
