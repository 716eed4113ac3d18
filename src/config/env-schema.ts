import { MAX_TIMEOUT_MS } from '../services/agent-dispatcher.js';

/**
 * Registry of every configuration key the orchestrator reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name (also the flat key for `getConfigValue`).
 *   - `format`      How the value is validated.
 *   - `scope`       Subsystem that owns the key.
 *   - `defaultValue` Value used when neither the env nor the config file sets it.
 *   - `max`         Optional inclusive upper bound for integer formats.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the value is invalid.
 */

export type ConfigKeyScope = 'runtime' | 'orchestration' | 'circuit_breaker' | 'storage';

export type ConfigKeyFormat =
  | 'port'
  | 'positive_integer'
  | 'non_negative_integer'
  | 'http_url'
  | 'log_level'
  | 'string';

export interface ConfigKeySpec {
  key: string;
  format: ConfigKeyFormat;
  scope: ConfigKeyScope;
  defaultValue: string;
  max?: number;
  description: string;
  remediation: string;
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime ────────────────────────────────────────────────────────────────
  {
    key: 'API_PORT',
    format: 'port',
    scope: 'runtime',
    defaultValue: '8000',
    description: 'Listening port for the HTTP API.',
    remediation: 'Set API_PORT to an integer between 1 and 65535, e.g. API_PORT=8000.',
  },
  {
    key: 'SERVICE_BASE_URL',
    format: 'http_url',
    scope: 'runtime',
    defaultValue: 'http://localhost:8000',
    description: 'Base URL this service is reachable on; internal agents are called through it.',
    remediation: 'Set SERVICE_BASE_URL to an absolute http(s) URL, e.g. SERVICE_BASE_URL=http://localhost:8000.',
  },
  {
    key: 'LOG_LEVEL',
    format: 'log_level',
    scope: 'runtime',
    defaultValue: 'info',
    description: 'Minimum level written by the logger.',
    remediation: `Set LOG_LEVEL to one of: ${LOG_LEVELS.join(', ')}.`,
  },
  {
    key: 'ADCP_VERSION',
    format: 'string',
    scope: 'runtime',
    defaultValue: 'adcp-demo-0.1',
    description: 'Protocol version advertised by GET /mcp/.',
    remediation: 'Set ADCP_VERSION to the protocol version string agents expect.',
  },

  // ── Orchestration ──────────────────────────────────────────────────────────
  {
    key: 'ORCH_TIMEOUT_MS_DEFAULT',
    format: 'positive_integer',
    scope: 'orchestration',
    defaultValue: '8000',
    max: MAX_TIMEOUT_MS,
    description: 'Per-call deadline in milliseconds when a request does not set timeout_ms.',
    remediation: `Set ORCH_TIMEOUT_MS_DEFAULT to a positive integer number of milliseconds, at most ${MAX_TIMEOUT_MS}.`,
  },
  {
    key: 'ORCH_CONCURRENCY',
    format: 'positive_integer',
    scope: 'orchestration',
    defaultValue: '8',
    description: 'Maximum agent calls in flight for one orchestration request.',
    remediation: 'Set ORCH_CONCURRENCY to a positive integer, e.g. ORCH_CONCURRENCY=8.',
  },

  // ── Circuit breaker ────────────────────────────────────────────────────────
  {
    key: 'CB_FAILURE_THRESHOLD',
    format: 'positive_integer',
    scope: 'circuit_breaker',
    defaultValue: '3',
    description: 'Consecutive failures that open an agent breaker.',
    remediation: 'Set CB_FAILURE_THRESHOLD to a positive integer, e.g. CB_FAILURE_THRESHOLD=3.',
  },
  {
    key: 'CB_TTL_SECONDS',
    format: 'non_negative_integer',
    scope: 'circuit_breaker',
    defaultValue: '60',
    description: 'Seconds an open breaker stays open before admitting a probe call.',
    remediation: 'Set CB_TTL_SECONDS to a non-negative integer, e.g. CB_TTL_SECONDS=60.',
  },

  // ── Storage ────────────────────────────────────────────────────────────────
  {
    key: 'DATABASE_PATH',
    format: 'string',
    scope: 'storage',
    defaultValue: 'data/orchestrator.db',
    description: 'SQLite file holding tenants, products and external agents.',
    remediation: 'Set DATABASE_PATH to a writable file path, e.g. DATABASE_PATH=data/orchestrator.db.',
  },
];
